/**
 * TypeScript types for the execution accuracy evaluator
 */

// Cell value as produced by a query executor
export type RawValue =
  | { kind: 'text'; value: string }
  | { kind: 'integer'; value: number | bigint }
  | { kind: 'float'; value: number }
  | { kind: 'decimal'; value: string } // exact decimal digits, e.g. "12.340"
  | { kind: 'boolean'; value: boolean }
  | { kind: 'null' }
  | { kind: 'other'; value: unknown };

// Values of unrecognized types pass through normalization untouched
export type OpaqueValue = Extract<RawValue, { kind: 'other' }>;

export type NormalizedValue = number | string | null | OpaqueValue;

export type Row = readonly RawValue[];
export type NormalizedRow = readonly NormalizedValue[];

export interface ExecutionSuccess {
  columns: string[];
  data: Row[];
  row_count: number;
}

export interface ExecutionFailure {
  error: string;
}

export type ExecutionResult = ExecutionSuccess | ExecutionFailure;

/**
 * Anything that can run SQL text and hand back rows or an error.
 * Implementations own read-only enforcement and timeouts.
 */
export interface QueryExecutor {
  execute(sql: string): Promise<ExecutionResult>;
}

// Record shape shared by reference and prediction files
export interface QueryRecord {
  SQL: string;
  question_id?: number | string;
  db_id?: string;
  question?: string;
  difficulty?: string;
  [key: string]: unknown;
}

export interface QueryPair {
  index: number;
  reference: QueryRecord;
  predicted: QueryRecord;
}

// One evaluated pair
export interface PairEvaluation {
  index: number;
  question_id?: number | string;
  difficulty?: string;
  reference_sql: string;
  predicted_sql: string;
  correct: boolean;
  reference_error?: string;
  predicted_error?: string;
  reference_row_count?: number;
  predicted_row_count?: number;
  execution_time_ms: number;
}

export interface AccuracyProgress {
  correct: number;
  total: number;
  accuracy: number;
  status: string; // "<correct>/<total> = <accuracy>"
  evaluation: PairEvaluation;
}

export interface AccuracyReport {
  correct: number;
  total: number;
  accuracy: number;
  status: string;
  cancelled: boolean;
  results: PairEvaluation[];
}

export function isExecutionSuccess(result: ExecutionResult): result is ExecutionSuccess {
  return 'data' in result;
}

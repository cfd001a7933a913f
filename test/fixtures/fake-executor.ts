/**
 * In-memory query executor for deterministic testing.
 */

import { fromJsValue } from '../../src/evaluation/value-normalizer.js';
import type { ExecutionResult, QueryExecutor, Row } from '../../src/evaluation/evaluation-types.js';

/**
 * What the fake returns for a given SQL text.
 * A plain value matrix becomes a successful result; an Error is thrown.
 */
export type FakeResponse = unknown[][] | { error: string } | Error;

export interface FakeExecutorConfig {
  /** Responses keyed by exact SQL text */
  responses: Record<string, FakeResponse>;
  /** Simulated latency per SQL text in ms */
  delays?: Record<string, number>;
}

export function toRows(values: unknown[][]): Row[] {
  return values.map(row => row.map(fromJsValue));
}

export class FakeQueryExecutor implements QueryExecutor {
  readonly calls: string[] = [];

  constructor(private readonly config: FakeExecutorConfig) {}

  async execute(sql: string): Promise<ExecutionResult> {
    this.calls.push(sql);

    const delay = this.config.delays?.[sql];
    if (delay) {
      await new Promise(resolve => setTimeout(resolve, delay));
    }

    const response = this.config.responses[sql];
    if (response === undefined) {
      return { error: `relation for "${sql}" does not exist` };
    }
    if (response instanceof Error) {
      throw response;
    }
    if (!Array.isArray(response)) {
      return response;
    }

    const data = toRows(response);
    return {
      columns: (response[0] ?? []).map((_, i) => `col${i}`),
      data,
      row_count: data.length,
    };
  }
}

/**
 * SQL Executor Tool
 * Executes read-only SQL against PostgreSQL and returns rows or an error
 */

import { fromJsValue } from '../evaluation/value-normalizer.js';
import type { ExecutionResult, QueryExecutor, RawValue } from '../evaluation/evaluation-types.js';
import type { DatabaseClient } from './database.js';

// PostgreSQL type OIDs
const BOOL_OID = 16;
const INTEGER_OIDS = new Set([20, 21, 23, 26]); // int8, int2, int4, oid
const FLOAT_OIDS = new Set([700, 701]); // float4, float8
const NUMERIC_OID = 1700;
const TEXT_OIDS = new Set([18, 19, 25, 1042, 1043]); // char, name, text, bpchar, varchar

const MODIFYING_KEYWORDS = /\b(insert|update|delete|merge|truncate|drop|alter|create|grant|revoke)\b/i;

export const UNSUPPORTED_QUERY_ERROR = 'Query not supported.';

/**
 * Strip SQL comments and surrounding whitespace
 */
export function cleanSQL(sql: string): string {
  return sql
    .replace(/--.*$/gm, '')
    .replace(/\/\*[\s\S]*?\*\//g, '')
    .trim();
}

/**
 * Blank out the contents of string literals, quoted identifiers and
 * dollar-quoted strings so their text is not read as SQL
 */
export function maskQuotedText(sql: string): string {
  return sql
    .replace(/\$([A-Za-z_]\w*)?\$[\s\S]*?\$\1\$/g, "''")
    .replace(/'(?:[^']|'')*'/g, "''")
    .replace(/"(?:[^"]|"")*"/g, '""');
}

/**
 * Only a single SELECT statement (optionally behind a WITH clause) may run
 */
export function isReadOnlyQuery(sql: string): boolean {
  const cleaned = maskQuotedText(cleanSQL(sql)).replace(/;\s*$/, '');
  if (!cleaned || cleaned.includes(';')) {
    return false;
  }

  const firstKeyword = /^[(\s]*(\w+)/.exec(cleaned)?.[1].toLowerCase();
  if (firstKeyword === 'select') {
    return true;
  }
  if (firstKeyword === 'with') {
    return !MODIFYING_KEYWORDS.test(cleaned);
  }
  return false;
}

/**
 * Classify a driver cell by its column type
 */
export function toRawValue(cell: unknown, dataTypeID: number): RawValue {
  if (cell === null || cell === undefined) {
    return { kind: 'null' };
  }
  if (dataTypeID === BOOL_OID && typeof cell === 'boolean') {
    return { kind: 'boolean', value: cell };
  }
  if (INTEGER_OIDS.has(dataTypeID)) {
    // int8 arrives as a string to keep full precision
    if (typeof cell === 'string' && /^-?\d+$/.test(cell)) {
      return { kind: 'integer', value: BigInt(cell) };
    }
    if (typeof cell === 'number') {
      return { kind: 'integer', value: cell };
    }
  }
  if (FLOAT_OIDS.has(dataTypeID) && typeof cell === 'number') {
    return { kind: 'float', value: cell };
  }
  if (dataTypeID === NUMERIC_OID && typeof cell === 'string') {
    return { kind: 'decimal', value: cell };
  }
  if (TEXT_OIDS.has(dataTypeID) && typeof cell === 'string') {
    return { kind: 'text', value: cell };
  }
  return fromJsValue(cell);
}

export class PostgresQueryExecutor implements QueryExecutor {
  constructor(private readonly client: DatabaseClient) {}

  async execute(sql: string): Promise<ExecutionResult> {
    if (!isReadOnlyQuery(sql)) {
      return { error: UNSUPPORTED_QUERY_ERROR };
    }

    try {
      const result = await this.client.queryArray(sql);
      const data = result.rows.map(row =>
        row.map((cell, i) => toRawValue(cell, result.fields[i]?.dataTypeID ?? 0))
      );
      return {
        columns: result.fields.map(field => field.name),
        data,
        row_count: data.length,
      };
    } catch (error) {
      return { error: error instanceof Error ? error.message : String(error) };
    }
  }
}

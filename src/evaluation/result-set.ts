/**
 * Row and result-set normalization
 */

import { normalizeValue, valueKey } from './value-normalizer.js';
import type { NormalizedRow, Row } from './evaluation-types.js';

export function normalizeRow(row: Row): NormalizedRow {
  return row.map(normalizeValue);
}

export function rowKey(row: NormalizedRow): string {
  return JSON.stringify(row.map(valueKey));
}

/**
 * Unordered, deduplicated collection of normalized rows, keyed by the
 * structural key of each row.
 */
export class NormalizedResultSet implements Iterable<NormalizedRow> {
  private readonly rowsByKey = new Map<string, NormalizedRow>();

  constructor(rows: Iterable<NormalizedRow> = []) {
    for (const row of rows) {
      this.add(row);
    }
  }

  add(row: NormalizedRow): void {
    const key = rowKey(row);
    if (!this.rowsByKey.has(key)) {
      this.rowsByKey.set(key, row);
    }
  }

  has(row: NormalizedRow): boolean {
    return this.rowsByKey.has(rowKey(row));
  }

  get size(): number {
    return this.rowsByKey.size;
  }

  /**
   * Same membership, order ignored
   */
  equals(other: NormalizedResultSet): boolean {
    if (this.size !== other.size) {
      return false;
    }
    for (const key of this.rowsByKey.keys()) {
      if (!other.rowsByKey.has(key)) {
        return false;
      }
    }
    return true;
  }

  [Symbol.iterator](): Iterator<NormalizedRow> {
    return this.rowsByKey.values();
  }
}

/**
 * Normalize every row and drop duplicates. An already-normalized set is
 * returned as is.
 */
export function normalizeResultSet(rows: readonly Row[] | NormalizedResultSet): NormalizedResultSet {
  if (rows instanceof NormalizedResultSet) {
    return rows;
  }
  return new NormalizedResultSet(rows.map(normalizeRow));
}

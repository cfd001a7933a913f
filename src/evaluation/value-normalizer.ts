/**
 * Value Normalizer - canonical comparable form of a single cell
 */

import { roundNumber } from './rounding.js';
import type { NormalizedValue, RawValue } from './evaluation-types.js';

export const NUMERIC_PRECISION = 5;

const TRUE_TOKENS = new Set(['true', 'yes', '1']);
const FALSE_TOKENS = new Set(['false', 'no', '0']);

/**
 * Normalize a raw cell value:
 * - text is trimmed and lower-cased, boolean-like tokens become 1 / 0
 * - booleans become 1 / 0
 * - numbers of every kind are rounded to 5 decimals
 * - null and unrecognized types are returned as they are
 */
export function normalizeValue(value: RawValue): NormalizedValue {
  switch (value.kind) {
    case 'text': {
      const lower = value.value.trim().toLowerCase();
      if (TRUE_TOKENS.has(lower)) {
        return normalizeValue({ kind: 'integer', value: 1 });
      }
      if (FALSE_TOKENS.has(lower)) {
        return normalizeValue({ kind: 'integer', value: 0 });
      }
      return lower;
    }

    case 'boolean':
      return normalizeValue({ kind: 'integer', value: value.value ? 1 : 0 });

    case 'integer':
    case 'decimal':
      // Decimals go through a double first so they round like the same float
      return roundNumber(Number(value.value), NUMERIC_PRECISION);

    case 'float':
      return roundNumber(value.value, NUMERIC_PRECISION);

    case 'null':
      return null;

    case 'other':
      return value;
  }
}

/**
 * Classify a plain JS value (parsed JSON, driver output) into a RawValue
 */
export function fromJsValue(value: unknown): RawValue {
  if (value === null || value === undefined) {
    return { kind: 'null' };
  }
  if (typeof value === 'string') {
    return { kind: 'text', value };
  }
  if (typeof value === 'boolean') {
    return { kind: 'boolean', value };
  }
  if (typeof value === 'bigint') {
    return { kind: 'integer', value };
  }
  if (typeof value === 'number') {
    return Number.isInteger(value) ? { kind: 'integer', value } : { kind: 'float', value };
  }
  if (typeof value === 'object' && isOpaqueValue(value)) {
    return value;
  }
  return { kind: 'other', value };
}

/**
 * Plain JSON-friendly value of a RawValue. Integers beyond the safe range stay
 * as digit strings.
 */
export function toJsValue(value: RawValue): unknown {
  switch (value.kind) {
    case 'integer':
      if (typeof value.value === 'bigint') {
        const asNumber = Number(value.value);
        return Number.isSafeInteger(asNumber) ? asNumber : value.value.toString();
      }
      return value.value;
    case 'decimal':
      return Number(value.value);
    case 'null':
      return null;
    case 'text':
    case 'float':
    case 'boolean':
    case 'other':
      return value.value;
  }
}

function isOpaqueValue(value: object): value is Extract<RawValue, { kind: 'other' }> {
  return 'kind' in value && value.kind === 'other' && 'value' in value;
}

/**
 * Stable string key for a normalized value. Keys are type-tagged so the number
 * 1 and the text "1.0" never collide.
 */
export function valueKey(value: NormalizedValue): string {
  if (value === null) {
    return 'null';
  }
  if (typeof value === 'number') {
    return `n:${value}`;
  }
  if (typeof value === 'string') {
    return `s:${value}`;
  }
  return `o:${opaqueKey(value.value)}`;
}

function opaqueKey(value: unknown): string {
  if (value instanceof Date) {
    return `date:${Number.isNaN(value.getTime()) ? 'invalid' : value.toISOString()}`;
  }
  if (value instanceof Uint8Array) {
    return `bytes:${Buffer.from(value).toString('hex')}`;
  }
  if (typeof value === 'object' && value !== null) {
    return `json:${JSON.stringify(value, (_key, v: unknown) => (typeof v === 'bigint' ? v.toString() : v))}`;
  }
  return `${typeof value}:${String(value)}`;
}

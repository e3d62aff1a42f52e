/**
 * Utility functions for working with records
 */

import type { FieldValue, Fields, InputRecord } from '../types/index.js';

const FORBIDDEN_FIELD_NAMES = new Set(['__proto__', 'prototype', 'constructor']);

/**
 * Extract all unique field names from an array of field maps, in first-seen order
 */
export function extractFieldNames(rows: ReadonlyArray<Readonly<Fields>>): string[] {
  const fields = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      fields.add(key);
    }
  }
  return Array.from(fields);
}

/**
 * Null, undefined, NaN and blank strings count as missing
 */
export function isMissing(value: FieldValue | undefined): boolean {
  if (value === null || value === undefined) return true;
  if (typeof value === 'number') return Number.isNaN(value);
  if (typeof value === 'string') return value.trim().length === 0;
  return false;
}

/**
 * Text form of a field value, or null when missing
 */
export function fieldText(value: FieldValue | undefined): string | null {
  if (isMissing(value)) return null;
  return String(value);
}

/**
 * Copy and freeze a cleaned row as an immutable input record
 */
export function freezeRecord(recordId: number, fields: Readonly<Fields>): InputRecord {
  const copy: Fields = {};
  for (const [key, value] of Object.entries(fields)) {
    if (FORBIDDEN_FIELD_NAMES.has(key)) continue;
    copy[key] = value;
  }
  return Object.freeze({ recordId, fields: Object.freeze(copy) });
}

/**
 * JSON serialization with sorted object keys, for fingerprints
 */
export function stableStringify(value: unknown): string {
  return JSON.stringify(sortKeys(value));
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortKeys);
  if (typeof value === 'object' && value !== null) {
    const entries: Array<[string, unknown]> = Object.entries(value);
    entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    const out: Record<string, unknown> = {};
    for (const [key, inner] of entries) {
      out[key] = sortKeys(inner);
    }
    return out;
  }
  return value;
}

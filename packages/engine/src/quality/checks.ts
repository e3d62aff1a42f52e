/**
 * Built-in quality checks
 *
 * Each check validates its parameters once, when the assessor is built, and
 * then runs as a pure function over the dataset.
 */

import { z } from 'zod';
import type { FieldValue, QualityCheckName } from '@causeway/core';
import {
  QualityCheckRuntimeError,
  QualityConfigError,
  formatZodError,
  isMissing,
  stableStringify,
} from '@causeway/core';
import type { QualityDataset } from './quality-dataset.js';

/** What a check reports; the assessor turns it into a scored result */
export interface CheckFinding {
  passed: boolean;
  /** Ascending */
  violatingRecordIds: number[];
  message: string;
}

export type BoundCheck = (dataset: QualityDataset) => CheckFinding;

export interface QualityCheckDefinition {
  readonly name: QualityCheckName;
  /** Validate parameters and return the runnable check */
  bind(parameters: Record<string, unknown>): BoundCheck;
}

function defineCheck<P>(
  name: QualityCheckName,
  schema: z.ZodType<P, z.ZodTypeDef, unknown>,
  run: (dataset: QualityDataset, params: P) => CheckFinding
): QualityCheckDefinition {
  return {
    name,
    bind(parameters) {
      const parsed = schema.safeParse(parameters);
      if (!parsed.success) {
        throw new QualityConfigError({
          message: formatZodError(`Invalid parameters for quality check '${name}'`, parsed.error),
          context: { check: name },
        });
      }
      const params = parsed.data;
      return (dataset) => run(dataset, params);
    },
  };
}

/**
 * A field no record carries cannot be checked. Empty datasets pass trivially.
 */
function requireFields(check: QualityCheckName, dataset: QualityDataset, fields: string[]): void {
  if (dataset.records.length === 0) return;
  const absent = fields.filter((f) => !dataset.fieldNames.includes(f));
  if (absent.length > 0) {
    throw new QualityCheckRuntimeError({
      message: `Check '${check}' needs field(s) absent from the dataset: ${absent.join(', ')}`,
      suggestion: 'Fix the field names in the check parameters.',
      context: { check, absent },
    });
  }
}

function toNumber(value: FieldValue | undefined): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string' && value.trim().length > 0) {
    const n = Number(value.trim());
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

function pluralRecords(n: number): string {
  return `${n} record${n === 1 ? '' : 's'}`;
}

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})(?:[T ][0-9:.]+(?:Z|[+-]\d{2}:?\d{2})?)?$/;

/** Calendar date check; rejects impossible dates such as 2023-02-30 */
export function isIsoDate(value: FieldValue | undefined): boolean {
  if (typeof value !== 'string') return false;
  const match = ISO_DATE.exec(value.trim());
  if (!match) return false;
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (month < 1 || month > 12 || day < 1) return false;
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  return day <= daysInMonth;
}

const fieldList = z.array(z.string().min(1)).min(1);

const valueRange = defineCheck(
  'value_range',
  z
    .object({
      field: z.string().min(1),
      min: z.number().optional(),
      max: z.number().optional(),
      allowMissing: z.boolean().default(true),
    })
    .strict()
    .refine((p) => p.min !== undefined || p.max !== undefined, 'min or max is required')
    .refine((p) => p.min === undefined || p.max === undefined || p.min <= p.max, 'min must not exceed max'),
  (dataset, { field, min, max, allowMissing }) => {
    requireFields('value_range', dataset, [field]);
    const violating: number[] = [];
    for (const record of dataset.records) {
      const value = record.fields[field];
      if (isMissing(value)) {
        if (!allowMissing) violating.push(record.recordId);
        continue;
      }
      const n = toNumber(value);
      if (n === null || (min !== undefined && n < min) || (max !== undefined && n > max)) {
        violating.push(record.recordId);
      }
    }
    return {
      passed: violating.length === 0,
      violatingRecordIds: violating,
      message: `${pluralRecords(violating.length)} with ${field} outside [${min ?? '-inf'}, ${max ?? 'inf'}]`,
    };
  }
);

const categoricalDomain = defineCheck(
  'categorical_domain',
  z
    .object({
      field: z.string().min(1),
      allowed: z.array(z.union([z.string(), z.number(), z.boolean()])).min(1),
      caseSensitive: z.boolean().default(false),
      allowMissing: z.boolean().default(true),
    })
    .strict(),
  (dataset, { field, allowed, caseSensitive, allowMissing }) => {
    requireFields('categorical_domain', dataset, [field]);
    const fold = (v: string) => (caseSensitive ? v : v.toLowerCase());
    const domain = new Set(allowed.map((v) => fold(String(v).trim())));
    const violating: number[] = [];
    for (const record of dataset.records) {
      const value = record.fields[field];
      if (isMissing(value)) {
        if (!allowMissing) violating.push(record.recordId);
        continue;
      }
      if (!domain.has(fold(String(value).trim()))) violating.push(record.recordId);
    }
    return {
      passed: violating.length === 0,
      violatingRecordIds: violating,
      message: `${pluralRecords(violating.length)} with ${field} outside the allowed values`,
    };
  }
);

const unmappedRate = defineCheck(
  'unmapped_rate',
  z.object({ threshold: z.number().min(0).max(1).default(0.05) }).strict(),
  (dataset, { threshold }) => {
    const total = dataset.records.length;
    const violating = dataset.records
      .filter((r) => r.outcome.status === 'escalated')
      .map((r) => r.recordId);
    const rate = total === 0 ? 0 : violating.length / total;
    return {
      passed: violating.length === 0 || rate < threshold,
      violatingRecordIds: violating,
      message: `Unmapped rate ${(rate * 100).toFixed(2)}% (threshold ${(threshold * 100).toFixed(2)}%)`,
    };
  }
);

const missingness = defineCheck(
  'missingness',
  z.object({ fields: fieldList, threshold: z.number().min(0).max(1).default(0.1) }).strict(),
  (dataset, { fields, threshold }) => {
    requireFields('missingness', dataset, fields);
    const total = dataset.records.length;
    const failing = fields.filter((field) => {
      const missing = dataset.records.filter((r) => isMissing(r.fields[field])).length;
      return total > 0 && missing / total > threshold;
    });
    const violating = dataset.records
      .filter((r) => failing.some((field) => isMissing(r.fields[field])))
      .map((r) => r.recordId);
    return {
      passed: failing.length === 0,
      violatingRecordIds: violating,
      message:
        failing.length === 0
          ? `Missing rates within ${(threshold * 100).toFixed(2)}%`
          : `Missing rate above ${(threshold * 100).toFixed(2)}% for: ${failing.join(', ')}`,
    };
  }
);

const duplicates = defineCheck(
  'duplicates',
  z.object({ fields: fieldList.optional() }).strict(),
  (dataset, { fields }) => {
    const keyFields = fields ?? dataset.fieldNames.filter((f) => f !== dataset.targetField);
    requireFields('duplicates', dataset, keyFields);
    const seen = new Set<string>();
    const violating: number[] = [];
    for (const record of dataset.records) {
      const key = stableStringify(keyFields.map((f) => record.fields[f] ?? null));
      if (seen.has(key)) {
        violating.push(record.recordId);
      } else {
        seen.add(key);
      }
    }
    return {
      passed: violating.length === 0,
      violatingRecordIds: violating,
      message: `${pluralRecords(violating.length)} repeating an earlier record`,
    };
  }
);

const dateValidity = defineCheck(
  'date_validity',
  z.object({ field: z.string().min(1), allowMissing: z.boolean().default(true) }).strict(),
  (dataset, { field, allowMissing }) => {
    requireFields('date_validity', dataset, [field]);
    const violating: number[] = [];
    for (const record of dataset.records) {
      const value = record.fields[field];
      if (isMissing(value)) {
        if (!allowMissing) violating.push(record.recordId);
        continue;
      }
      if (!isIsoDate(value)) violating.push(record.recordId);
    }
    return {
      passed: violating.length === 0,
      violatingRecordIds: violating,
      message: `${pluralRecords(violating.length)} with an invalid ${field}`,
    };
  }
);

const completeness = defineCheck(
  'completeness',
  z.object({ requiredFields: fieldList }).strict(),
  (dataset, { requiredFields }) => {
    requireFields('completeness', dataset, requiredFields);
    const violating = dataset.records
      .filter((r) => requiredFields.some((field) => isMissing(r.fields[field])))
      .map((r) => r.recordId);
    return {
      passed: violating.length === 0,
      violatingRecordIds: violating,
      message: `${pluralRecords(violating.length)} missing a required field`,
    };
  }
);

export const BUILTIN_CHECKS: readonly QualityCheckDefinition[] = [
  valueRange,
  categoricalDomain,
  unmappedRate,
  missingness,
  duplicates,
  dateValidity,
  completeness,
];

/**
 * Frozen view of the resolved dataset handed to every quality check
 */

import type { HarmonizedRecord } from '@causeway/core';
import { extractFieldNames } from '@causeway/core';

export interface QualityDataset {
  readonly records: readonly HarmonizedRecord[];
  readonly sourceField: string;
  readonly targetField: string;
  /** Union of field names across records, first-seen order */
  readonly fieldNames: readonly string[];
}

export function createQualityDataset(
  records: readonly HarmonizedRecord[],
  fields: { sourceField: string; targetField: string }
): QualityDataset {
  return Object.freeze({
    records,
    sourceField: fields.sourceField,
    targetField: fields.targetField,
    fieldNames: Object.freeze(extractFieldNames(records.map((r) => r.fields))),
  });
}

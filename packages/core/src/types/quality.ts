/**
 * Quality assessment types
 */

export type QualitySeverity = 'info' | 'warning' | 'error' | 'fatal';

/** Names of the built-in quality checks */
export type QualityCheckName =
  | 'value_range'
  | 'categorical_domain'
  | 'unmapped_rate'
  | 'missingness'
  | 'duplicates'
  | 'date_validity'
  | 'completeness';

/** Result of one check execution */
export interface QualityCheckResult {
  checkName: QualityCheckName;
  passed: boolean;
  violationCount: number;
  /** Sorted ascending */
  violatingRecordIds: number[];
  severity: QualitySeverity;
  severityWeight: number;
  /** Points subtracted from the composite score */
  penalty: number;
  message: string;
}

/** Composite quality assessment of a resolved dataset */
export interface QualityAssessment {
  /** Composite score in [0, 100] */
  score: number;
  totalRecords: number;
  results: QualityCheckResult[];
}

/**
 * @causeway/engine
 *
 * Cause resolution and quality engine: resolves raw diagnostic codes to
 * canonical causes, scores the harmonized dataset and records every decision.
 */

// Types
export * from './types/index.js';

// Interfaces
export * from './interfaces/index.js';

// Reference Module
export {
  ReferenceTable,
  parseReferenceCsv,
  parseReferenceJson,
  loadReferenceFile,
} from './reference/index.js';
export type { ReferenceFileOptions } from './reference/index.js';

// Matching
export { ApproximateMatcher } from './matcher/index.js';
export type { ApproximateMatcherOptions } from './matcher/index.js';

// Suggestion Module
export { SuggestionServiceAdapter, HttpSuggestionService } from './suggestion/index.js';
export type {
  SuggestionAdapterOptions,
  SuggestionFailure,
  SuggestionResult,
  HttpSuggestionServiceConfig,
} from './suggestion/index.js';

// Resolution Module
export { ResolutionPolicy } from './resolution/index.js';
export type {
  EventSink,
  ResolutionComponents,
  ResolutionPolicySettings,
  ResolutionTrace,
} from './resolution/index.js';

// Quality Module
export {
  QualityAssessor,
  compositeScore,
  BUILTIN_CHECKS,
  isIsoDate,
  createQualityDataset,
} from './quality/index.js';
export type {
  QualityAssessorOptions,
  BoundCheck,
  CheckFinding,
  QualityCheckDefinition,
  QualityDataset,
} from './quality/index.js';

// Provenance Module
export { ProvenanceLedger, reconstructRun } from './provenance/index.js';
export type {
  LedgerOptions,
  LedgerQueryOptions,
  LedgerSummary,
  StageSummary,
  RunReconstruction,
} from './provenance/index.js';

// Pipeline
import { Pipeline as _Pipeline } from './pipeline/index.js';
import type { RunConfigInput } from '@causeway/core';
import type { PipelineComponents } from './types/index.js';
export { Pipeline, deriveRunId } from './pipeline/index.js';

// Review and formatting
export { buildReviewRows } from './review/index.js';
export type { ReviewRow, ReviewRowOptions } from './review/index.js';
export { formatRunSummary, formatPercent } from './formatters/index.js';

/**
 * Factory function to create a Pipeline
 *
 * @param config - Raw or validated run configuration; validated on each run
 */
export function createPipeline(
  config: RunConfigInput,
  components?: PipelineComponents
): _Pipeline {
  return new _Pipeline(config, components);
}

/**
 * Type exports for core
 */

export type { FieldValue, Fields, InputRecord } from './record.js';

export type {
  Strategy,
  ReferenceEntry,
  CatalogEntry,
  MatchCandidate,
  EscalationReason,
  ResolvedOutcome,
  EscalatedOutcome,
  ResolutionOutcome,
  ResolutionState,
  HarmonizedRecord,
  Escalation,
} from './resolution.js';
export { STRATEGY_ORDER } from './resolution.js';

export type {
  QualitySeverity,
  QualityCheckName,
  QualityCheckResult,
  QualityAssessment,
} from './quality.js';

export type {
  ProvenanceStage,
  ProvenanceDecision,
  ProvenanceEvent,
  ProvenanceEventInput,
  RunStatus,
  LedgerSnapshot,
} from './provenance.js';

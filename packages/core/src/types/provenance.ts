/**
 * Provenance Types
 *
 * Events of the append-only decision ledger.
 */

import type { QualityCheckResult } from './quality.js';
import type {
  EscalationReason,
  MatchCandidate,
  ResolutionState,
  Strategy,
} from './resolution.js';

/** Pipeline stage that produced an event */
export type ProvenanceStage = 'run' | 'resolution' | 'quality';

/** Decisions recorded by the ledger */
export type ProvenanceDecision =
  // run lifecycle
  | 'run_started'
  | 'resolution_started'
  | 'resolution_complete'
  | 'quality_started'
  | 'run_complete'
  | 'run_aborted'
  | 'incomplete_run'
  // strategy attempts
  | 'hit'
  | 'miss'
  | 'accepted'
  | 'below_threshold'
  | 'no_candidate'
  | 'skipped'
  // terminal outcomes
  | 'resolved'
  | 'escalated'
  // quality
  | 'check_passed'
  | 'check_failed'
  | 'quality_scored';

/**
 * Single ledger event. Carries no wall-clock time so that reruns compare equal.
 */
export interface ProvenanceEvent {
  /** Logical, strictly increasing counter starting at 1 */
  sequenceNumber: number;
  /** Null for run-level events */
  recordId: number | null;
  stage: ProvenanceStage;
  /** Short description of what the decision was made on */
  inputSummary: string;
  decision: ProvenanceDecision;
  strategyUsed: Strategy | null;
  confidence: number | null;
  /** Reference table version, matcher catalog version, model or check version */
  ruleVersion: string | null;
  /** Mandatory on suggestion events */
  modelVersion?: string;
  fromState?: ResolutionState;
  toState?: ResolutionState;
  /** Best candidate seen when the event was written */
  candidate?: MatchCandidate | null;
  reason?: EscalationReason;
  /** Full result on quality check events */
  check?: QualityCheckResult;
  /** Composite score on the quality_scored event */
  score?: number;
  details?: Record<string, unknown>;
}

/** Event as written by a component, before the ledger numbers it */
export type ProvenanceEventInput = Omit<ProvenanceEvent, 'sequenceNumber'>;

export type RunStatus = 'running' | 'completed' | 'cancelled' | 'aborted';

/** Serializable view of a ledger */
export interface LedgerSnapshot {
  runId: string;
  status: RunStatus;
  /** Display only, never part of the equality contract */
  startedAt: string;
  /** Display only, never part of the equality contract */
  sealedAt: string | null;
  events: ProvenanceEvent[];
}

/**
 * Resolution types: reference entries, candidates and outcomes
 */

import type { Fields } from './record.js';

/** Strategy that produced a candidate, in precedence order */
export type Strategy = 'direct' | 'fuzzy' | 'suggested';

/** Precedence is fixed and never reordered by configuration */
export const STRATEGY_ORDER: readonly Strategy[] = ['direct', 'fuzzy', 'suggested'];

/** One row of a versioned reference table */
export interface ReferenceEntry {
  sourceCode: string;
  canonicalCode: string;
  tableVersion: string;
}

/** Canonical cause as indexed by the approximate matcher */
export interface CatalogEntry {
  canonicalCode: string;
  /** Display label; the code itself is matched when absent */
  label?: string;
}

/** Candidate mapping produced by any strategy */
export interface MatchCandidate {
  canonicalCode: string;
  /** Confidence between 0 and 1; always 1 for direct hits */
  confidence: number;
  strategy: Strategy;
}

/** Why a record went to human review */
export type EscalationReason = 'below_threshold' | 'no_candidate' | 'run_cancelled';

export interface ResolvedOutcome {
  readonly status: 'resolved';
  readonly candidate: MatchCandidate;
}

export interface EscalatedOutcome {
  readonly status: 'escalated';
  /** Highest-confidence candidate seen across attempted strategies */
  readonly bestCandidate: MatchCandidate | null;
  readonly reason: EscalationReason;
}

export type ResolutionOutcome = ResolvedOutcome | EscalatedOutcome;

/** States of the per-record resolution state machine */
export type ResolutionState =
  | 'unresolved'
  | 'direct_attempted'
  | 'fuzzy_attempted'
  | 'suggestion_attempted'
  | 'resolved'
  | 'escalated';

/** Record after resolution, with the target field filled in */
export interface HarmonizedRecord {
  readonly recordId: number;
  readonly fields: Readonly<Fields>;
  readonly outcome: ResolutionOutcome;
}

/** Entry of the human-review set */
export interface Escalation {
  readonly recordId: number;
  readonly sourceCode: string | null;
  readonly outcome: EscalatedOutcome;
  /** Every candidate the strategies proposed, best first */
  readonly candidates: readonly MatchCandidate[];
}

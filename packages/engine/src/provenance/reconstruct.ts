/**
 * Rebuild the outcome of a run from its ledger events alone
 */

import type {
  MatchCandidate,
  ProvenanceEvent,
  QualityCheckResult,
  ResolutionOutcome,
  RunStatus,
} from '@causeway/core';
import { CausewayError } from '@causeway/core';

export interface RunReconstruction {
  runId: string | null;
  status: RunStatus;
  /** Terminal outcome per record id */
  outcomes: Map<number, ResolutionOutcome>;
  resolvedCount: number;
  escalatedCount: number;
  qualityResults: QualityCheckResult[];
  score: number | null;
}

function integrityError(message: string, context: Record<string, unknown>): CausewayError {
  return new CausewayError({
    code: 'LEDGER_INTEGRITY',
    message,
    suggestion: 'Pass the complete, unmodified event sequence of one run.',
    context,
  });
}

function requireCandidate(event: ProvenanceEvent): MatchCandidate {
  if (!event.candidate) {
    throw integrityError(`Resolved event ${event.sequenceNumber} carries no candidate`, {
      sequenceNumber: event.sequenceNumber,
    });
  }
  return event.candidate;
}

/**
 * @throws CausewayError (LEDGER_INTEGRITY) when sequence numbers are not 1..n
 * or a record reaches more than one terminal state
 */
export function reconstructRun(events: readonly ProvenanceEvent[]): RunReconstruction {
  const outcomes = new Map<number, ResolutionOutcome>();
  const qualityResults: QualityCheckResult[] = [];
  let runId: string | null = null;
  let status: RunStatus = 'running';
  let score: number | null = null;

  for (const [i, event] of events.entries()) {
    if (event.sequenceNumber !== i + 1) {
      throw integrityError(`Expected sequence number ${i + 1}, found ${event.sequenceNumber}`, {
        position: i,
      });
    }

    switch (event.decision) {
      case 'run_started': {
        const id = event.details?.runId;
        if (typeof id === 'string') runId = id;
        break;
      }
      case 'resolved':
      case 'escalated': {
        if (event.recordId === null) break;
        if (outcomes.has(event.recordId)) {
          throw integrityError(`Record ${event.recordId} reached a terminal state twice`, {
            recordId: event.recordId,
          });
        }
        outcomes.set(
          event.recordId,
          event.decision === 'resolved'
            ? { status: 'resolved', candidate: requireCandidate(event) }
            : {
                status: 'escalated',
                bestCandidate: event.candidate ?? null,
                reason: event.reason ?? (event.candidate ? 'below_threshold' : 'no_candidate'),
              }
        );
        break;
      }
      case 'check_passed':
      case 'check_failed':
        if (event.check) qualityResults.push(event.check);
        break;
      case 'quality_scored':
        score = event.score ?? null;
        break;
      case 'run_complete':
        status = 'completed';
        break;
      case 'incomplete_run':
        status = 'cancelled';
        break;
      case 'run_aborted':
        status = 'aborted';
        break;
      default:
        break;
    }
  }

  let resolvedCount = 0;
  for (const outcome of outcomes.values()) {
    if (outcome.status === 'resolved') resolvedCount++;
  }

  return {
    runId,
    status,
    outcomes,
    resolvedCount,
    escalatedCount: outcomes.size - resolvedCount,
    qualityResults,
    score,
  };
}

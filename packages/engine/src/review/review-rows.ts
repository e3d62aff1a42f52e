/**
 * Review export
 *
 * Flattens the escalation set into rows a reviewer fills in. One row per
 * proposed candidate, or a single blank row when nothing was proposed.
 */

import type { Escalation, EscalationReason, Strategy } from '@causeway/core';

export interface ReviewRow {
  recordId: number;
  sourceCode: string;
  /** 1-based; 0 when there is no suggestion */
  suggestionRank: number;
  suggestedCode: string;
  confidence: number | null;
  strategy: Strategy | null;
  reason: EscalationReason;
  /** Left blank for the reviewer */
  humanMapping: string;
}

export interface ReviewRowOptions {
  /** Candidates listed per record (default: 3) */
  maxSuggestions?: number;
}

export function buildReviewRows(
  escalations: readonly Escalation[],
  options: ReviewRowOptions = {}
): ReviewRow[] {
  const max = options.maxSuggestions ?? 3;
  const rows: ReviewRow[] = [];

  for (const escalation of [...escalations].sort((a, b) => a.recordId - b.recordId)) {
    const base = {
      recordId: escalation.recordId,
      sourceCode: escalation.sourceCode ?? '',
      reason: escalation.outcome.reason,
      humanMapping: '',
    };
    const candidates = escalation.candidates.slice(0, max);

    if (candidates.length === 0) {
      rows.push({ ...base, suggestionRank: 0, suggestedCode: '', confidence: null, strategy: null });
      continue;
    }

    candidates.forEach((candidate, i) => {
      rows.push({
        ...base,
        suggestionRank: i + 1,
        suggestedCode: candidate.canonicalCode,
        confidence: candidate.confidence,
        strategy: candidate.strategy,
      });
    });
  }

  return rows;
}

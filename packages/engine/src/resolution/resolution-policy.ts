/**
 * Resolution Policy
 *
 * Per-record state machine that tries the strategies in fixed precedence
 * (direct, fuzzy, suggested) and either resolves the record or escalates it
 * with the best candidate seen. Every transition emits one provenance event.
 */

import type {
  EscalationReason,
  InputRecord,
  MatchCandidate,
  ProvenanceDecision,
  ProvenanceEventInput,
  ResolutionOutcome,
  ResolutionState,
  RunConfig,
  Strategy,
} from '@causeway/core';
import { ConfigError, STRATEGY_ORDER, fieldText } from '@causeway/core';
import type { CandidateMatcher, ReferenceLookup } from '../interfaces/index.js';
import type { SuggestionServiceAdapter } from '../suggestion/index.js';

/** Receives the events of one record, in transition order */
export type EventSink = (event: ProvenanceEventInput) => void;

export interface ResolutionPolicySettings {
  sourceField: string;
  /** Free text handed to the suggestion service instead of the code */
  descriptionField?: string;
  /** Omitted strategies are disabled */
  direct?: { table: ReferenceLookup };
  fuzzy?: { matcher: CandidateMatcher; threshold: number; topK: number };
  suggested?: { adapter: SuggestionServiceAdapter; threshold: number };
}

export interface ResolutionComponents {
  referenceTable?: ReferenceLookup;
  matcher?: CandidateMatcher;
  suggestions?: SuggestionServiceAdapter;
}

export interface ResolutionTrace {
  recordId: number;
  sourceCode: string | null;
  outcome: ResolutionOutcome;
  /** Every proposed candidate, best first, one per canonical code */
  candidates: MatchCandidate[];
}

interface Attempt {
  readonly recordId: number;
  readonly sourceCode: string | null;
  readonly description: string | null;
  accepted: MatchCandidate | null;
  acceptedRuleVersion: string | null;
  acceptedModelVersion?: string;
  /** Rule version of every strategy that ran */
  ruleVersions: Partial<Record<Strategy, string>>;
  /** Set once the suggestion service was consulted */
  modelVersion?: string;
  best: MatchCandidate | null;
  proposed: MatchCandidate[];
}

interface Transition {
  to: ResolutionState;
  decision: ProvenanceDecision;
  strategy: Strategy | null;
  confidence: number | null;
  ruleVersion: string | null;
  modelVersion?: string;
  reason?: EscalationReason;
  details?: Record<string, unknown>;
}

function candidate(canonicalCode: string, confidence: number, strategy: Strategy): MatchCandidate {
  return Object.freeze({ canonicalCode, confidence, strategy });
}

function compareCandidates(a: MatchCandidate, b: MatchCandidate): number {
  if (a.confidence !== b.confidence) return b.confidence - a.confidence;
  const byStrategy = STRATEGY_ORDER.indexOf(a.strategy) - STRATEGY_ORDER.indexOf(b.strategy);
  if (byStrategy !== 0) return byStrategy;
  return a.canonicalCode < b.canonicalCode ? -1 : a.canonicalCode > b.canonicalCode ? 1 : 0;
}

export class ResolutionPolicy {
  constructor(private readonly settings: ResolutionPolicySettings) {}

  /**
   * Wire the policy from a validated run configuration. Enabled strategies
   * must come with their component.
   */
  static fromConfig(config: RunConfig, components: ResolutionComponents): ResolutionPolicy {
    const { direct, fuzzy, suggested } = config.strategies;
    const settings: ResolutionPolicySettings = {
      sourceField: config.sourceField,
      descriptionField: config.descriptionField,
    };

    if (direct.enabled) {
      const table = components.referenceTable;
      if (!table) {
        throw new ConfigError({
          message: 'Direct strategy is enabled but no reference table was provided',
          suggestion: 'Pass reference entries or disable strategies.direct.',
        });
      }
      if (direct.tableVersion !== undefined && direct.tableVersion !== table.version) {
        throw new ConfigError({
          message: `Reference table is pinned to '${table.version}', configuration asks for '${direct.tableVersion}'`,
        });
      }
      settings.direct = { table };
    }

    if (fuzzy.enabled) {
      if (!components.matcher || fuzzy.threshold === undefined) {
        throw new ConfigError({
          message: 'Fuzzy strategy is enabled without a matcher or threshold',
          suggestion: 'Provide a catalog (or reference table) and strategies.fuzzy.threshold.',
        });
      }
      settings.fuzzy = { matcher: components.matcher, threshold: fuzzy.threshold, topK: fuzzy.topK };
    }

    if (suggested.enabled) {
      if (!components.suggestions || suggested.threshold === undefined) {
        throw new ConfigError({
          message: 'Suggested strategy is enabled without a suggestion service or threshold',
          suggestion: 'Provide a suggestion service or disable strategies.suggested.',
        });
      }
      settings.suggested = { adapter: components.suggestions, threshold: suggested.threshold };
    }

    return new ResolutionPolicy(settings);
  }

  /**
   * Run the state machine for one record. Never throws on strategy failures;
   * errors thrown by `emit` propagate.
   */
  async resolve(record: InputRecord, emit: EventSink): Promise<ResolutionTrace> {
    const attempt = this.begin(record);
    let state: ResolutionState = 'unresolved';

    while (state !== 'resolved' && state !== 'escalated') {
      const transition = await this.step(state, record, attempt);
      emit(this.toEvent(attempt, state, transition));
      state = transition.to;
    }

    return this.finish(attempt);
  }

  /**
   * Escalate a record that was never dispatched because the run was cancelled
   */
  cancel(record: InputRecord, emit: EventSink): ResolutionTrace {
    const attempt = this.begin(record);
    emit(
      this.toEvent(attempt, 'unresolved', {
        to: 'escalated',
        decision: 'escalated',
        strategy: null,
        confidence: null,
        ruleVersion: null,
        reason: 'run_cancelled',
      })
    );
    const outcome: ResolutionOutcome = {
      status: 'escalated',
      bestCandidate: null,
      reason: 'run_cancelled',
    };
    return {
      recordId: record.recordId,
      sourceCode: attempt.sourceCode,
      outcome: Object.freeze(outcome),
      candidates: [],
    };
  }

  private begin(record: InputRecord): Attempt {
    const { sourceField, descriptionField } = this.settings;
    return {
      recordId: record.recordId,
      sourceCode: fieldText(record.fields[sourceField])?.trim() ?? null,
      description: descriptionField ? fieldText(record.fields[descriptionField]) : null,
      accepted: null,
      acceptedRuleVersion: null,
      ruleVersions: {},
      best: null,
      proposed: [],
    };
  }

  private async step(
    state: ResolutionState,
    record: InputRecord,
    attempt: Attempt
  ): Promise<Transition> {
    switch (state) {
      case 'unresolved':
        return this.attemptDirect(attempt);
      case 'direct_attempted':
        return attempt.accepted ? this.resolveWith(attempt) : this.attemptFuzzy(attempt);
      case 'fuzzy_attempted':
        return attempt.accepted
          ? this.resolveWith(attempt)
          : this.attemptSuggestion(record, attempt);
      case 'suggestion_attempted':
        return attempt.accepted ? this.resolveWith(attempt) : this.escalate(attempt);
      default:
        throw new Error(`No transition out of terminal state ${state}`);
    }
  }

  private attemptDirect(attempt: Attempt): Transition {
    const direct = this.settings.direct;
    if (!direct) return this.skipped('direct_attempted', 'direct');

    const ruleVersion = direct.table.version;
    attempt.ruleVersions.direct = ruleVersion;
    const code = attempt.sourceCode === null ? undefined : direct.table.lookup(attempt.sourceCode);

    if (code === undefined) {
      return {
        to: 'direct_attempted',
        decision: 'miss',
        strategy: 'direct',
        confidence: null,
        ruleVersion,
      };
    }

    const hit = candidate(code, 1, 'direct');
    this.offer(attempt, hit);
    attempt.accepted = hit;
    attempt.acceptedRuleVersion = ruleVersion;
    return { to: 'direct_attempted', decision: 'hit', strategy: 'direct', confidence: 1, ruleVersion };
  }

  private attemptFuzzy(attempt: Attempt): Transition {
    const fuzzy = this.settings.fuzzy;
    if (!fuzzy) return this.skipped('fuzzy_attempted', 'fuzzy');

    const ruleVersion = fuzzy.matcher.catalogVersion;
    attempt.ruleVersions.fuzzy = ruleVersion;
    const matches =
      attempt.sourceCode === null ? [] : fuzzy.matcher.query(attempt.sourceCode, fuzzy.topK);
    const candidates = matches.map((m) => candidate(m.canonicalCode, m.similarity, 'fuzzy'));
    for (const c of candidates) this.offer(attempt, c);

    const top = candidates[0];
    const details = {
      threshold: fuzzy.threshold,
      candidates: candidates.map((c) => ({ canonicalCode: c.canonicalCode, confidence: c.confidence })),
    };

    if (!top) {
      return { to: 'fuzzy_attempted', decision: 'no_candidate', strategy: 'fuzzy', confidence: null, ruleVersion, details };
    }

    // Threshold is inclusive
    const accepted = top.confidence >= fuzzy.threshold;
    if (accepted) {
      attempt.accepted = top;
      attempt.acceptedRuleVersion = ruleVersion;
    }
    return {
      to: 'fuzzy_attempted',
      decision: accepted ? 'accepted' : 'below_threshold',
      strategy: 'fuzzy',
      confidence: top.confidence,
      ruleVersion,
      details,
    };
  }

  private async attemptSuggestion(record: InputRecord, attempt: Attempt): Promise<Transition> {
    const suggested = this.settings.suggested;
    if (!suggested) return this.skipped('suggestion_attempted', 'suggested');

    const text = attempt.description ?? attempt.sourceCode ?? '';
    const result = await suggested.adapter.suggest(text, {
      recordId: record.recordId,
      sourceField: this.settings.sourceField,
      description: attempt.description,
      fields: record.fields,
    });
    const { modelVersion } = result;
    attempt.ruleVersions.suggested = modelVersion;
    attempt.modelVersion = modelVersion;
    for (const c of result.candidates) this.offer(attempt, c);

    const top = result.candidates[0];
    const details: Record<string, unknown> = {
      threshold: suggested.threshold,
      candidates: result.candidates.map((c) => ({
        canonicalCode: c.canonicalCode,
        confidence: c.confidence,
      })),
    };
    if (result.failure) details.failure = result.failure;

    if (!top) {
      return {
        to: 'suggestion_attempted',
        decision: 'no_candidate',
        strategy: 'suggested',
        confidence: null,
        ruleVersion: modelVersion,
        modelVersion,
        details,
      };
    }

    const accepted = top.confidence >= suggested.threshold;
    if (accepted) {
      attempt.accepted = top;
      attempt.acceptedRuleVersion = modelVersion;
      attempt.acceptedModelVersion = modelVersion;
    }
    return {
      to: 'suggestion_attempted',
      decision: accepted ? 'accepted' : 'below_threshold',
      strategy: 'suggested',
      confidence: top.confidence,
      ruleVersion: modelVersion,
      modelVersion,
      details,
    };
  }

  private resolveWith(attempt: Attempt): Transition {
    const accepted = attempt.accepted;
    if (!accepted) throw new Error('resolveWith called without an accepted candidate');
    return {
      to: 'resolved',
      decision: 'resolved',
      strategy: accepted.strategy,
      confidence: accepted.confidence,
      ruleVersion: attempt.acceptedRuleVersion,
      modelVersion: attempt.acceptedModelVersion,
    };
  }

  private escalate(attempt: Attempt): Transition {
    const best = attempt.best;
    return {
      to: 'escalated',
      decision: 'escalated',
      strategy: best?.strategy ?? null,
      confidence: best?.confidence ?? null,
      ruleVersion: best ? attempt.ruleVersions[best.strategy] ?? null : null,
      modelVersion: attempt.modelVersion,
      reason: best ? 'below_threshold' : 'no_candidate',
    };
  }

  private skipped(to: ResolutionState, strategy: Strategy): Transition {
    return { to, decision: 'skipped', strategy, confidence: null, ruleVersion: null };
  }

  /** Ties keep the earlier candidate, so the earlier strategy wins */
  private offer(attempt: Attempt, c: MatchCandidate): void {
    attempt.proposed.push(c);
    if (!attempt.best || c.confidence > attempt.best.confidence) {
      attempt.best = c;
    }
  }

  private toEvent(attempt: Attempt, from: ResolutionState, t: Transition): ProvenanceEventInput {
    const event: ProvenanceEventInput = {
      recordId: attempt.recordId,
      stage: 'resolution',
      inputSummary: `${this.settings.sourceField}=${attempt.sourceCode ?? '<missing>'}`,
      decision: t.decision,
      strategyUsed: t.strategy,
      confidence: t.confidence,
      ruleVersion: t.ruleVersion,
      fromState: from,
      toState: t.to,
      candidate: t.to === 'resolved' ? attempt.accepted : attempt.best,
    };
    if (t.modelVersion !== undefined) event.modelVersion = t.modelVersion;
    if (t.reason !== undefined) event.reason = t.reason;
    if (t.details !== undefined) event.details = t.details;
    return event;
  }

  private finish(attempt: Attempt): ResolutionTrace {
    const seen = new Set<string>();
    const candidates = [...attempt.proposed].sort(compareCandidates).filter((c) => {
      if (seen.has(c.canonicalCode)) return false;
      seen.add(c.canonicalCode);
      return true;
    });

    const outcome: ResolutionOutcome = attempt.accepted
      ? { status: 'resolved', candidate: attempt.accepted }
      : {
          status: 'escalated',
          bestCandidate: attempt.best,
          reason: attempt.best ? 'below_threshold' : 'no_candidate',
        };

    return {
      recordId: attempt.recordId,
      sourceCode: attempt.sourceCode,
      outcome: Object.freeze(outcome),
      candidates,
    };
  }
}

/**
 * Suggestion Service Adapter
 *
 * Calls the external suggestion service under a concurrency permit and a
 * timeout. Failures never propagate: they are logged and reported as an empty
 * candidate list so the record can still be escalated.
 *
 * A permit is held until the service call settles, also after a timeout,
 * so `maxConcurrency` bounds calls to services that ignore the abort signal.
 */

import type { MatchCandidate } from '@causeway/core';
import { SuggestionServiceError } from '@causeway/core';
import { Logger, Semaphore, TimeoutError, withTimeout } from '@causeway/runtime';
import type { Suggestion, SuggestionContext, SuggestionService } from '../interfaces/index.js';

export type SuggestionFailure = 'timeout' | 'transport';

export interface SuggestionResult {
  /** Best first; confidence desc, then canonical code */
  candidates: MatchCandidate[];
  modelVersion: string;
  failure?: SuggestionFailure;
}

export interface SuggestionAdapterOptions {
  /** Candidates kept per call (default: 3) */
  topK?: number;
  /** Per-call timeout (default: 10000) */
  timeoutMs?: number;
  /** Concurrent calls to the service (default: 4) */
  maxConcurrency?: number;
  logger?: Logger;
}

function toSuggestionError(err: unknown, timeoutMs: number): SuggestionServiceError {
  if (err instanceof SuggestionServiceError) return err;
  if (err instanceof TimeoutError) {
    return new SuggestionServiceError({
      kind: 'timeout',
      message: `Suggestion service timed out after ${timeoutMs}ms`,
      cause: err,
    });
  }
  return new SuggestionServiceError({
    kind: 'transport',
    message: `Suggestion service call failed: ${err instanceof Error ? err.message : String(err)}`,
    cause: err instanceof Error ? err : undefined,
  });
}

function malformedReply(detail: string): SuggestionServiceError {
  return new SuggestionServiceError({
    kind: 'transport',
    message: `Suggestion service returned a malformed reply: ${detail}`,
  });
}

/** Null for suggestions without a code or with a confidence outside [0, 1] */
function toSuggestion(item: object): Suggestion | null {
  const canonicalCode = 'canonicalCode' in item ? item.canonicalCode : undefined;
  const confidence = 'confidence' in item ? item.confidence : undefined;
  if (typeof canonicalCode !== 'string' || canonicalCode.trim().length === 0) return null;
  if (
    typeof confidence !== 'number' ||
    !Number.isFinite(confidence) ||
    confidence < 0 ||
    confidence > 1
  ) {
    return null;
  }
  return { canonicalCode, confidence };
}

export class SuggestionServiceAdapter {
  private readonly permits: Semaphore;
  private readonly topK: number;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(
    private readonly service: SuggestionService,
    options: SuggestionAdapterOptions = {}
  ) {
    this.permits = new Semaphore(options.maxConcurrency ?? 4);
    this.topK = options.topK ?? 3;
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.logger = options.logger ?? new Logger();
  }

  get modelVersion(): string {
    return this.service.modelVersion;
  }

  async suggest(text: string, context: SuggestionContext): Promise<SuggestionResult> {
    const modelVersion = this.service.modelVersion;
    if (text.trim().length === 0) {
      return { candidates: [], modelVersion };
    }

    try {
      const raw = await this.call(text, context);
      return { candidates: this.normalize(raw), modelVersion };
    } catch (err) {
      const error = toSuggestionError(err, this.timeoutMs);
      this.logger.warn('Suggestion service failed, continuing without candidates', {
        recordId: context.recordId,
        kind: error.kind,
        error: error.message,
        modelVersion,
      });
      return { candidates: [], modelVersion, failure: error.kind };
    }
  }

  private async call(text: string, context: SuggestionContext): Promise<unknown> {
    const release = await this.permits.acquire();
    const pending: { call?: Promise<unknown> } = {};
    try {
      return await withTimeout(
        (signal) => {
          const call = this.service.suggest(text, context, signal);
          pending.call = call;
          return call;
        },
        this.timeoutMs,
        () => new TimeoutError(`Suggestion call exceeded ${this.timeoutMs}ms`)
      );
    } finally {
      if (pending.call) void pending.call.then(release, release);
      else release();
    }
  }

  /** Items that are not objects make the whole reply a transport failure */
  private normalize(raw: unknown): MatchCandidate[] {
    if (!Array.isArray(raw)) {
      throw malformedReply(`expected an array, got ${raw === null ? 'null' : typeof raw}`);
    }

    const items: unknown[] = raw;
    const best = new Map<string, number>();
    for (const item of items) {
      if (typeof item !== 'object' || item === null) {
        throw malformedReply(`expected suggestion objects, got ${item === null ? 'null' : typeof item}`);
      }
      const suggestion = toSuggestion(item);
      if (!suggestion) continue;
      const previous = best.get(suggestion.canonicalCode);
      if (previous === undefined || suggestion.confidence > previous) {
        best.set(suggestion.canonicalCode, suggestion.confidence);
      }
    }

    return Array.from(best, ([canonicalCode, confidence]): MatchCandidate => ({
      canonicalCode,
      confidence,
      strategy: 'suggested',
    }))
      .sort((a, b) =>
        b.confidence !== a.confidence
          ? b.confidence - a.confidence
          : a.canonicalCode < b.canonicalCode
            ? -1
            : a.canonicalCode > b.canonicalCode
              ? 1
              : 0
      )
      .slice(0, this.topK);
  }
}

import type {
  Fields,
  HarmonizedRecord,
  ReferenceEntry,
  ResolutionOutcome,
} from '@causeway/core';
import { Logger } from '@causeway/runtime';
import type {
  CandidateMatcher,
  ScoredCode,
  Suggestion,
  SuggestionContext,
  SuggestionService,
} from '../src/index.js';

/** Logger that keeps its lines in memory */
export function memoryLogger(level: 'debug' | 'info' | 'warn' | 'error' = 'debug') {
  const lines: string[] = [];
  const logger = new Logger({ level, format: 'json', sink: (line) => lines.push(line) });
  return { logger, lines };
}

export const silentLogger = new Logger({ level: 'error', sink: () => undefined });

export const REFERENCE_V1: ReferenceEntry[] = [
  { sourceCode: 'A00', canonicalCode: 'Cholera', tableVersion: 'v1' },
  { sourceCode: 'A01', canonicalCode: 'Typhoid', tableVersion: 'v1' },
  { sourceCode: 'I21', canonicalCode: 'IHD', tableVersion: 'v1' },
  { sourceCode: 'A00', canonicalCode: 'Cholera (revised)', tableVersion: 'v2' },
];

/** Matcher answering from a fixed script, counting its calls */
export class ScriptedMatcher implements CandidateMatcher {
  readonly catalogVersion = 'catalog-test';
  calls = 0;

  constructor(private readonly script: Record<string, ScoredCode[]>) {}

  query(text: string): ScoredCode[] {
    this.calls++;
    return this.script[text] ?? [];
  }
}

/** In-process suggestion service with a scripted answer and latency */
export class ScriptedSuggestionService implements SuggestionService {
  readonly modelVersion: string;
  readonly seen: string[] = [];

  constructor(
    private readonly script: Record<string, Suggestion[]>,
    private readonly options: {
      modelVersion?: string;
      delayMs?: (text: string) => number;
      onCall?: (text: string, context: SuggestionContext) => void;
    } = {}
  ) {
    this.modelVersion = options.modelVersion ?? 'model-test-1';
  }

  async suggest(text: string, context: SuggestionContext): Promise<Suggestion[]> {
    this.seen.push(text);
    this.options.onCall?.(text, context);
    const delay = this.options.delayMs?.(text) ?? 0;
    if (delay > 0) await new Promise((resolve) => setTimeout(resolve, delay));
    return this.script[text] ?? [];
  }
}

export function harmonized(
  recordId: number,
  fields: Fields,
  outcome: ResolutionOutcome = {
    status: 'resolved',
    candidate: { canonicalCode: 'X', confidence: 1, strategy: 'direct' },
  }
): HarmonizedRecord {
  return { recordId, fields, outcome };
}

export const ESCALATED: ResolutionOutcome = {
  status: 'escalated',
  bestCandidate: null,
  reason: 'no_candidate',
};

export function deferred<T = void>() {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

import { describe, expect, it } from 'vitest';
import type { ProvenanceEventInput } from '@causeway/core';
import { ConfigError, freezeRecord, parseRunConfig } from '@causeway/core';
import {
  ReferenceTable,
  ResolutionPolicy,
  SuggestionServiceAdapter,
  type ResolutionPolicySettings,
} from '../src/index.js';
import {
  REFERENCE_V1,
  ScriptedMatcher,
  ScriptedSuggestionService,
  silentLogger,
} from './fixtures.js';

const table = ReferenceTable.load(REFERENCE_V1, 'v1');

async function resolve(settings: ResolutionPolicySettings, fields: Record<string, string>) {
  const events: ProvenanceEventInput[] = [];
  const trace = await new ResolutionPolicy(settings).resolve(freezeRecord(0, fields), (e) =>
    events.push(e)
  );
  return { trace, events };
}

function adapterFor(service: ScriptedSuggestionService) {
  return new SuggestionServiceAdapter(service, { logger: silentLogger });
}

describe('ResolutionPolicy', () => {
  it('resolves a direct hit with confidence 1', async () => {
    const { trace, events } = await resolve(
      { sourceField: 'icd10_code', direct: { table } },
      { icd10_code: 'A00' }
    );

    expect(trace.outcome).toEqual({
      status: 'resolved',
      candidate: { canonicalCode: 'Cholera', confidence: 1, strategy: 'direct' },
    });
    expect(events).toEqual([
      {
        recordId: 0,
        stage: 'resolution',
        inputSummary: 'icd10_code=A00',
        decision: 'hit',
        strategyUsed: 'direct',
        confidence: 1,
        ruleVersion: 'v1',
        fromState: 'unresolved',
        toState: 'direct_attempted',
        candidate: { canonicalCode: 'Cholera', confidence: 1, strategy: 'direct' },
      },
      {
        recordId: 0,
        stage: 'resolution',
        inputSummary: 'icd10_code=A00',
        decision: 'resolved',
        strategyUsed: 'direct',
        confidence: 1,
        ruleVersion: 'v1',
        fromState: 'direct_attempted',
        toState: 'resolved',
        candidate: { canonicalCode: 'Cholera', confidence: 1, strategy: 'direct' },
      },
    ]);
  });

  it('escalates a fuzzy candidate below the threshold', async () => {
    const matcher = new ScriptedMatcher({ Z99X: [{ canonicalCode: 'Z99', similarity: 0.8 }] });
    const { trace, events } = await resolve(
      {
        sourceField: 'icd10_code',
        direct: { table },
        fuzzy: { matcher, threshold: 0.85, topK: 5 },
      },
      { icd10_code: 'Z99X' }
    );

    expect(trace.outcome).toEqual({
      status: 'escalated',
      bestCandidate: { canonicalCode: 'Z99', confidence: 0.8, strategy: 'fuzzy' },
      reason: 'below_threshold',
    });
    expect(events.map((e) => [e.fromState, e.toState, e.decision])).toEqual([
      ['unresolved', 'direct_attempted', 'miss'],
      ['direct_attempted', 'fuzzy_attempted', 'below_threshold'],
      ['fuzzy_attempted', 'suggestion_attempted', 'skipped'],
      ['suggestion_attempted', 'escalated', 'escalated'],
    ]);
    expect(events[1]).toMatchObject({
      ruleVersion: 'catalog-test',
      confidence: 0.8,
      details: { threshold: 0.85, candidates: [{ canonicalCode: 'Z99', confidence: 0.8 }] },
    });
    expect(events[3]).toMatchObject({
      reason: 'below_threshold',
      strategyUsed: 'fuzzy',
      ruleVersion: 'catalog-test',
    });
    expect(events[3]?.modelVersion).toBeUndefined();
  });

  it('gives a direct hit precedence over fuzzy matching', async () => {
    const matcher = new ScriptedMatcher({ A00: [{ canonicalCode: 'Other', similarity: 1 }] });
    const { trace } = await resolve(
      {
        sourceField: 'icd10_code',
        direct: { table },
        fuzzy: { matcher, threshold: 0.5, topK: 5 },
      },
      { icd10_code: 'A00' }
    );

    expect(trace.outcome.status === 'resolved' && trace.outcome.candidate.strategy).toBe('direct');
    expect(matcher.calls).toBe(0);
  });

  it('accepts a similarity equal to the threshold', async () => {
    const settings = (similarity: number): ResolutionPolicySettings => ({
      sourceField: 'icd10_code',
      fuzzy: {
        matcher: new ScriptedMatcher({ Z99X: [{ canonicalCode: 'Z99', similarity }] }),
        threshold: 0.85,
        topK: 5,
      },
    });

    const atThreshold = await resolve(settings(0.85), { icd10_code: 'Z99X' });
    const below = await resolve(settings(0.8499), { icd10_code: 'Z99X' });

    expect(atThreshold.trace.outcome).toEqual({
      status: 'resolved',
      candidate: { canonicalCode: 'Z99', confidence: 0.85, strategy: 'fuzzy' },
    });
    expect(below.trace.outcome.status).toBe('escalated');
  });

  it('falls through to the suggestion service and records the model version', async () => {
    const service = new ScriptedSuggestionService(
      { 'crushing chest pain': [{ canonicalCode: 'IHD', confidence: 0.95 }] },
      { modelVersion: 'model-7' }
    );
    const { trace, events } = await resolve(
      {
        sourceField: 'icd10_code',
        descriptionField: 'description',
        direct: { table },
        fuzzy: { matcher: new ScriptedMatcher({}), threshold: 0.85, topK: 5 },
        suggested: { adapter: adapterFor(service), threshold: 0.9 },
      },
      { icd10_code: 'R07.4', description: 'crushing chest pain' }
    );

    expect(trace.outcome).toEqual({
      status: 'resolved',
      candidate: { canonicalCode: 'IHD', confidence: 0.95, strategy: 'suggested' },
    });
    expect(events.map((e) => e.decision)).toEqual(['miss', 'no_candidate', 'accepted', 'resolved']);
    expect(events[2]).toMatchObject({ modelVersion: 'model-7', ruleVersion: 'model-7' });
    expect(events[3]).toMatchObject({ modelVersion: 'model-7', strategyUsed: 'suggested' });
    expect(service.seen).toEqual(['crushing chest pain']);
  });

  it('records the model version when escalating below the suggestion threshold', async () => {
    const service = new ScriptedSuggestionService(
      { Q1: [{ canonicalCode: 'S1', confidence: 0.5 }] },
      { modelVersion: 'model-7' }
    );
    const { trace, events } = await resolve(
      {
        sourceField: 'code',
        fuzzy: { matcher: new ScriptedMatcher({}), threshold: 0.9, topK: 5 },
        suggested: { adapter: adapterFor(service), threshold: 0.9 },
      },
      { code: 'Q1' }
    );

    expect(trace.outcome).toEqual({
      status: 'escalated',
      bestCandidate: { canonicalCode: 'S1', confidence: 0.5, strategy: 'suggested' },
      reason: 'below_threshold',
    });
    expect(events.map((e) => e.decision)).toEqual([
      'skipped',
      'no_candidate',
      'below_threshold',
      'escalated',
    ]);
    expect(events[3]).toMatchObject({
      strategyUsed: 'suggested',
      confidence: 0.5,
      ruleVersion: 'model-7',
      modelVersion: 'model-7',
      reason: 'below_threshold',
    });
  });

  it('keeps the earlier strategy on a confidence tie', async () => {
    const service = new ScriptedSuggestionService({
      Q1: [{ canonicalCode: 'S1', confidence: 0.6 }],
    });
    const { trace } = await resolve(
      {
        sourceField: 'code',
        fuzzy: {
          matcher: new ScriptedMatcher({ Q1: [{ canonicalCode: 'F1', similarity: 0.6 }] }),
          threshold: 0.9,
          topK: 5,
        },
        suggested: { adapter: adapterFor(service), threshold: 0.9 },
      },
      { code: 'Q1' }
    );

    expect(trace.outcome).toEqual({
      status: 'escalated',
      bestCandidate: { canonicalCode: 'F1', confidence: 0.6, strategy: 'fuzzy' },
      reason: 'below_threshold',
    });
    expect(trace.candidates.map((c) => c.canonicalCode)).toEqual(['F1', 'S1']);
  });

  it('escalates with no candidate when nothing was proposed', async () => {
    const { trace, events } = await resolve(
      { sourceField: 'icd10_code', direct: { table } },
      { other: 'x' }
    );

    expect(trace.outcome).toEqual({ status: 'escalated', bestCandidate: null, reason: 'no_candidate' });
    expect(trace.sourceCode).toBeNull();
    expect(events[0]?.inputSummary).toBe('icd10_code=<missing>');
    expect(events.map((e) => e.decision)).toEqual(['miss', 'skipped', 'skipped', 'escalated']);
  });

  it('escalates a cancelled record with a single event', () => {
    const events: ProvenanceEventInput[] = [];
    const trace = new ResolutionPolicy({ sourceField: 'icd10_code', direct: { table } }).cancel(
      freezeRecord(4, { icd10_code: 'A00' }),
      (e) => events.push(e)
    );

    expect(trace.outcome).toEqual({ status: 'escalated', bestCandidate: null, reason: 'run_cancelled' });
    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({
      recordId: 4,
      fromState: 'unresolved',
      toState: 'escalated',
      decision: 'escalated',
      reason: 'run_cancelled',
    });
  });

  it('reads only the source field', async () => {
    const settings: ResolutionPolicySettings = { sourceField: 'icd10_code', direct: { table } };
    const first = await resolve(settings, { icd10_code: 'A01' });
    const again = await resolve(settings, { icd10_code: 'A01', canonical_code: 'Typhoid' });

    expect(again.trace.outcome).toEqual(first.trace.outcome);
  });

  describe('fromConfig', () => {
    const config = parseRunConfig({
      sourceField: 'icd10_code',
      strategies: { direct: { tableVersion: 'v1' }, fuzzy: { enabled: false } },
    });

    it('requires a component for every enabled strategy', () => {
      expect(() => ResolutionPolicy.fromConfig(config, {})).toThrow(ConfigError);
    });

    it('rejects a table pinned to another version', () => {
      expect(() =>
        ResolutionPolicy.fromConfig(config, {
          referenceTable: ReferenceTable.load(REFERENCE_V1, 'v2'),
        })
      ).toThrow("Reference table is pinned to 'v2', configuration asks for 'v1'");
    });

    it('wires the configured strategies', async () => {
      const policy = ResolutionPolicy.fromConfig(config, { referenceTable: table });
      const trace = await policy.resolve(freezeRecord(0, { icd10_code: 'I21' }), () => undefined);
      expect(trace.outcome.status).toBe('resolved');
    });
  });
});

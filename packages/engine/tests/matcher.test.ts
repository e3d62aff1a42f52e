import { describe, expect, it } from 'vitest';
import { ConfigError } from '@causeway/core';
import { ApproximateMatcher } from '../src/index.js';

describe('ApproximateMatcher', () => {
  it('ranks catalog codes by normalized edit distance', () => {
    const matcher = ApproximateMatcher.build([
      { canonicalCode: 'Z99' },
      { canonicalCode: 'Z98' },
      { canonicalCode: 'A00' },
    ]);

    expect(matcher.query('Z99X')).toEqual([
      { canonicalCode: 'Z99', similarity: 0.75 },
      { canonicalCode: 'Z98', similarity: 0.5 },
    ]);
  });

  it('breaks ties by canonical code', () => {
    const matcher = ApproximateMatcher.build([{ canonicalCode: 'B1' }, { canonicalCode: 'A1' }]);
    expect(matcher.query('C1')).toEqual([
      { canonicalCode: 'A1', similarity: 0.5 },
      { canonicalCode: 'B1', similarity: 0.5 },
    ]);
  });

  it('matches labels after case folding and whitespace collapsing', () => {
    const matcher = ApproximateMatcher.build([
      { canonicalCode: 'I21', label: 'Acute myocardial infarction' },
    ]);
    expect(matcher.query('  acute   MYOCARDIAL infarction ')).toEqual([
      { canonicalCode: 'I21', similarity: 1 },
    ]);
  });

  it('truncates to top-k', () => {
    const matcher = ApproximateMatcher.build(
      [{ canonicalCode: 'A3' }, { canonicalCode: 'A1' }, { canonicalCode: 'A2' }],
      { topK: 2 }
    );
    expect(matcher.query('A').map((m) => m.canonicalCode)).toEqual(['A1', 'A2']);
    expect(matcher.query('A', 3).map((m) => m.canonicalCode)).toEqual(['A1', 'A2', 'A3']);
  });

  it('returns nothing for an empty query', () => {
    const matcher = ApproximateMatcher.build([{ canonicalCode: 'A00' }]);
    expect(matcher.query('   ')).toEqual([]);
  });

  it('keeps the first label of a repeated code', () => {
    const matcher = ApproximateMatcher.build([
      { canonicalCode: 'X', label: 'alpha' },
      { canonicalCode: 'X', label: 'beta' },
    ]);
    expect(matcher.size).toBe(1);
    expect(matcher.query('alpha')).toEqual([{ canonicalCode: 'X', similarity: 1 }]);
  });

  it('validates top-k and catalog codes', () => {
    expect(() => ApproximateMatcher.build([], { topK: 0 })).toThrow(ConfigError);
    expect(() => ApproximateMatcher.build([{ canonicalCode: '' }])).toThrow(
      'Catalog entry 0 has an empty canonical code'
    );
  });

  it('supports other similarity algorithms', () => {
    const matcher = ApproximateMatcher.build([{ canonicalCode: 'marhta' }], {
      algorithm: 'jaro_winkler',
      catalogVersion: 'gbd-2021',
    });
    const [top] = matcher.query('martha');
    expect(top?.canonicalCode).toBe('marhta');
    expect(top?.similarity).toBeCloseTo(0.9611, 4);
    expect(matcher.catalogVersion).toBe('gbd-2021');
  });
});

import { describe, expect, it } from 'vitest';
import type { HarmonizedRecord, QualityCheckConfig } from '@causeway/core';
import {
  QualityCheckRuntimeError,
  QualityConfigError,
  qualityCheckConfigSchema,
} from '@causeway/core';
import {
  QualityAssessor,
  compositeScore,
  createQualityDataset,
  isIsoDate,
} from '../src/index.js';
import { ESCALATED, harmonized, silentLogger } from './fixtures.js';

function checks(...raw: unknown[]): QualityCheckConfig[] {
  return raw.map((c) => qualityCheckConfigSchema.parse(c));
}

function dataset(records: HarmonizedRecord[]) {
  return createQualityDataset(records, { sourceField: 'icd10_code', targetField: 'canonical_code' });
}

async function assess(records: HarmonizedRecord[], ...raw: unknown[]) {
  return new QualityAssessor(checks(...raw), { logger: silentLogger }).assess(dataset(records));
}

describe('QualityAssessor', () => {
  it('penalizes an unmapped rate at the threshold', async () => {
    const records = Array.from({ length: 100 }, (_, i) =>
      harmonized(i, { icd10_code: `C${i}` }, i < 5 ? ESCALATED : undefined)
    );

    const assessment = await assess(records, {
      name: 'unmapped_rate',
      severityWeight: 20,
      parameters: { threshold: 0.05 },
    });

    expect(assessment.score).toBe(99);
    expect(assessment.totalRecords).toBe(100);
    expect(assessment.results).toEqual([
      {
        checkName: 'unmapped_rate',
        passed: false,
        violationCount: 5,
        violatingRecordIds: [0, 1, 2, 3, 4],
        severity: 'warning',
        severityWeight: 20,
        penalty: 1,
        message: 'Unmapped rate 5.00% (threshold 5.00%)',
      },
    ]);
  });

  it('passes an unmapped rate below the threshold', async () => {
    const records = [harmonized(0, {}, ESCALATED), harmonized(1, {}), harmonized(2, {})];
    const assessment = await assess(records, {
      name: 'unmapped_rate',
      parameters: { threshold: 0.5 },
    });
    expect(assessment.results[0]?.passed).toBe(true);
    expect(assessment.results[0]?.penalty).toBe(0);
    expect(assessment.score).toBe(100);
  });

  it('checks numeric ranges', async () => {
    const records = [10, 200, 'abc', null, '30'].map((age, i) => harmonized(i, { age }));
    const { results } = await assess(records, {
      name: 'value_range',
      parameters: { field: 'age', min: 0, max: 120 },
    });
    expect(results[0]).toMatchObject({
      passed: false,
      violatingRecordIds: [1, 2],
      message: '2 records with age outside [0, 120]',
    });
  });

  it('checks categorical domains case-insensitively', async () => {
    const records = ['M', 'f', 'X'].map((sex, i) => harmonized(i, { sex }));
    const { results } = await assess(records, {
      name: 'categorical_domain',
      parameters: { field: 'sex', allowed: ['m', 'F'] },
    });
    expect(results[0]?.violatingRecordIds).toEqual([2]);
  });

  it('flags fields missing above the threshold', async () => {
    const records = [1, null, '', 4].map((a, i) => harmonized(i, { a, b: 'x' }));
    const { results } = await assess(records, {
      name: 'missingness',
      parameters: { fields: ['a', 'b'], threshold: 0.25 },
    });
    expect(results[0]).toMatchObject({
      passed: false,
      violatingRecordIds: [1, 2],
      message: 'Missing rate above 25.00% for: a',
    });
  });

  it('finds duplicates over the source fields, ignoring the target field', async () => {
    const records = [
      harmonized(0, { x: 1, y: 2, canonical_code: 'A' }),
      harmonized(1, { x: 1, y: 2, canonical_code: 'B' }),
      harmonized(2, { x: 1, y: 3, canonical_code: 'A' }),
    ];
    const { results } = await assess(records, { name: 'duplicates' });
    expect(results[0]?.violatingRecordIds).toEqual([1]);
  });

  it('validates calendar dates', async () => {
    const dates = ['2023-02-28', '2023-02-30', '2024-02-29', '2023-13-01', 'not a date', null];
    const records = dates.map((d, i) => harmonized(i, { date_of_death: d }));
    const { results } = await assess(records, {
      name: 'date_validity',
      parameters: { field: 'date_of_death' },
    });
    expect(results[0]?.violatingRecordIds).toEqual([1, 3, 4]);
    expect(isIsoDate('2023-01-05T10:00:00Z')).toBe(true);
  });

  it('reports a check that cannot run as a fatal failure', async () => {
    const records = [harmonized(0, { a: 1 }), harmonized(1, { a: 2 })];
    const assessment = await assess(records, {
      name: 'completeness',
      severityWeight: 30,
      parameters: { requiredFields: ['a', 'age'] },
    });

    expect(assessment.results[0]).toMatchObject({
      checkName: 'completeness',
      passed: false,
      severity: 'fatal',
      violationCount: 2,
      penalty: 30,
      message: "Check 'completeness' needs field(s) absent from the dataset: age",
    });
    expect(assessment.score).toBe(70);
  });

  it('rethrows a check that cannot run in strict mode', async () => {
    const assessor = new QualityAssessor(
      checks({ name: 'completeness', parameters: { requiredFields: ['age'] } }),
      { strict: true, logger: silentLogger }
    );
    await expect(assessor.assess(dataset([harmonized(0, { a: 1 })]))).rejects.toBeInstanceOf(
      QualityCheckRuntimeError
    );
  });

  it('rejects unknown checks and invalid parameters when built', () => {
    expect(() => new QualityAssessor(checks({ name: 'nope' }))).toThrow(QualityConfigError);
    expect(
      () => new QualityAssessor(checks({ name: 'value_range', parameters: { field: 'age' } }))
    ).toThrow(QualityConfigError);
  });

  it('keeps configuration order and skips disabled checks', async () => {
    const records = [harmonized(0, { a: 1 })];
    const assessor = new QualityAssessor(
      checks(
        { name: 'duplicates' },
        { name: 'unmapped_rate', enabled: false },
        { name: 'completeness', parameters: { requiredFields: ['a'] } }
      ),
      { logger: silentLogger }
    );
    expect(assessor.checkNames).toEqual(['duplicates', 'completeness']);
    const { results } = await assessor.assess(dataset(records));
    expect(results.map((r) => r.checkName)).toEqual(['duplicates', 'completeness']);
  });

  it('clamps the score at zero', async () => {
    const records = [harmonized(0, {}, ESCALATED)];
    const assessment = await assess(
      records,
      { name: 'unmapped_rate', severityWeight: 80 },
      { name: 'completeness', severityWeight: 80, parameters: { requiredFields: ['a'] } }
    );
    expect(assessment.score).toBe(0);
  });

  it('scores an empty dataset as 100', async () => {
    const assessment = await assess(
      [],
      { name: 'unmapped_rate' },
      { name: 'completeness', parameters: { requiredFields: ['a'] } }
    );
    expect(assessment.totalRecords).toBe(0);
    expect(assessment.results.every((r) => r.passed)).toBe(true);
    expect(assessment.score).toBe(100);
  });
});

describe('compositeScore', () => {
  it('stays within [0, 100]', () => {
    expect(compositeScore([])).toBe(100);
    expect(compositeScore([{ passed: false, penalty: 250 }])).toBe(0);
    expect(compositeScore([{ passed: true, penalty: 250 }])).toBe(100);
    expect(compositeScore([{ passed: false, penalty: -5 }])).toBe(100);
  });
});

import { describe, expect, it } from 'vitest';
import {
  CausewayError,
  ConfigError,
  SuggestionServiceError,
  extractFieldNames,
  fieldText,
  freezeRecord,
  isMissing,
  stableStringify,
  wrapError,
} from '../src/index.js';

describe('record utilities', () => {
  it('collects field names in first-seen order', () => {
    expect(extractFieldNames([{ a: 1, b: 2 }, { b: 3, c: null }])).toEqual(['a', 'b', 'c']);
  });

  it('treats null, NaN and blank strings as missing', () => {
    expect([null, undefined, Number.NaN, '  ', '', 0, false, 'x'].map(isMissing)).toEqual([
      true,
      true,
      true,
      true,
      true,
      false,
      false,
      false,
    ]);
    expect(fieldText(42)).toBe('42');
    expect(fieldText(' ')).toBeNull();
  });

  it('freezes a copy and drops prototype keys', () => {
    const source = { code: 'A00', constructor: 'x' };
    const record = freezeRecord(3, source);

    expect(record).toEqual({ recordId: 3, fields: { code: 'A00' } });
    expect(Object.isFrozen(record.fields)).toBe(true);
    source.code = 'B00';
    expect(record.fields.code).toBe('A00');
  });

  it('serializes with sorted keys at every depth', () => {
    expect(stableStringify({ b: 1, a: { d: 2, c: [{ f: 1, e: 2 }] } })).toBe(
      '{"a":{"c":[{"e":2,"f":1}],"d":2},"b":1}'
    );
  });
});

describe('errors', () => {
  it('formats an actionable message', () => {
    const error = new ConfigError({ message: 'bad threshold', suggestion: 'Use a value in [0, 1].' });

    expect(error.code).toBe('CONFIG_INVALID');
    expect(error.fatal).toBe(true);
    expect(error.toActionableMessage()).toBe(
      'Error [CONFIG_INVALID]: bad threshold\nSuggested action: Use a value in [0, 1].'
    );
  });

  it('treats suggestion failures as recoverable', () => {
    const error = new SuggestionServiceError({ message: 'timed out', kind: 'timeout' });
    expect(error.fatal).toBe(false);
    expect(error.kind).toBe('timeout');
  });

  it('wraps foreign errors and passes its own through', () => {
    const own = new ConfigError({ message: 'x' });
    expect(wrapError(own)).toBe(own);

    const cause = new TypeError('boom');
    const wrapped = wrapError(cause);
    expect(wrapped).toBeInstanceOf(CausewayError);
    expect(wrapped.code).toBe('UNKNOWN');
    expect(wrapped.message).toBe('boom');
    expect(wrapped.cause).toBe(cause);

    expect(wrapError('plain', 'LEDGER_INTEGRITY').code).toBe('LEDGER_INTEGRITY');
  });
});

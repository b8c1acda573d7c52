import {
  isRecord,
  requireField,
  validateArray,
  validateBoolean,
  validateEnum,
  validateFraction,
  validateNumber,
  validateObject,
  validateString,
  ViolationCollector,
} from '../../src/util/validation';

describe('validation utilities', () => {
  let c: ViolationCollector;

  beforeEach(() => {
    c = new ViolationCollector();
  });

  describe('validateNumber', () => {
    it('accepts valid numbers', () => {
      expect(validateNumber(5, 'x', c)).toBe(5);
      expect(validateNumber(10, 'x', c, { min: 5, max: 10 })).toBe(10);
      expect(validateNumber(3, 'x', c, { integer: true })).toBe(3);
      expect(c.hasErrors()).toBe(false);
    });

    it('records range violations', () => {
      expect(validateNumber(4, 'x', c, { min: 5 })).toBeUndefined();
      expect(c.violations).toEqual([{ path: 'x', rule: 'range', message: 'must be within [5, inf]' }]);
    });

    it('rejects non-integers and non-numbers', () => {
      validateNumber(3.5, 'a', c, { integer: true });
      validateNumber('3', 'b', c);
      validateNumber(NaN, 'c', c);

      expect(c.violations).toEqual([
        { path: 'a', rule: 'type', message: 'must be an integer' },
        { path: 'b', rule: 'type', message: 'must be a number' },
        { path: 'c', rule: 'type', message: 'must be a number' },
      ]);
    });
  });

  it('validateFraction bounds values to [0, 1]', () => {
    expect(validateFraction(0.25, 'f', c)).toBe(0.25);
    expect(validateFraction(1.2, 'f', c)).toBeUndefined();
    expect(c.violations).toEqual([{ path: 'f', rule: 'range', message: 'must be within [0, 1]' }]);
  });

  it('requireField treats null as missing', () => {
    expect(requireField({ a: null }, 'a', 'root.a', c)).toBeUndefined();
    expect(requireField({ b: 0 }, 'b', 'root.b', c)).toBe(0);
    expect(c.violations).toEqual([
      { path: 'root.a', rule: 'required', message: 'is not present or has a null value' },
    ]);
  });

  it('validateEnum lists the allowed values', () => {
    expect(validateEnum('a', ['a', 'b'], 'p', c)).toBe('a');
    expect(validateEnum('x', ['a', 'b'], 'p', c)).toBeUndefined();
    expect(c.violations).toEqual([{ path: 'p', rule: 'enum', message: 'must be one of: "a", "b"' }]);
  });

  it('validateBoolean and validateString check types', () => {
    expect(validateBoolean(false, 'flag', c)).toBe(false);
    expect(validateBoolean('true', 'flag', c)).toBeUndefined();
    expect(validateString('  ', 's', c, { minLength: 1 })).toBeUndefined();
    expect(validateString('abc', 's', c, { pattern: /^\d+$/ })).toBeUndefined();
    expect(c.violations.map(v => v.rule)).toEqual(['type', 'type', 'format']);
  });

  it('validateArray and validateObject check structure', () => {
    expect(validateArray([1, 2], 'arr', c)).toEqual([1, 2]);
    expect(validateArray([], 'arr', c, { minLength: 1 })).toBeUndefined();
    expect(validateObject([], 'obj', c)).toBeUndefined();
    expect(c.violations).toEqual([
      { path: 'arr', rule: 'required', message: 'must have at least 1 element(s)' },
      { path: 'obj', rule: 'type', message: 'must be an object' },
    ]);
  });

  it('isRecord excludes arrays and null', () => {
    expect(isRecord({})).toBe(true);
    expect(isRecord([])).toBe(false);
    expect(isRecord(null)).toBe(false);
  });

  it('wraps values into results', () => {
    expect(c.result(7)).toEqual({ ok: true, value: 7 });
    c.add('x', 'range', 'too large');
    expect(c.result(7)).toEqual({ ok: false, violations: [{ path: 'x', rule: 'range', message: 'too large' }] });
    expect(c.count).toBe(1);
  });
});

import { describe, expect, it } from 'vitest';
import {
  FIELD_RULES,
  formatFieldValue,
  parseDecimalInput,
  parseFieldInput,
  parseIntegerInput,
  validateFieldValue,
} from './validation';

const axis = { yAxisMin: 0, yAxisMax: 5 };

describe('parseDecimalInput', () => {
  it('treats blank input as empty', () => {
    expect(parseDecimalInput('')).toEqual({ kind: 'empty' });
    expect(parseDecimalInput('   ')).toEqual({ kind: 'empty' });
  });

  it('treats a lone sign as still typing', () => {
    expect(parseDecimalInput('-')).toEqual({ kind: 'partial' });
    expect(parseDecimalInput('+')).toEqual({ kind: 'partial' });
  });

  it('accepts a dot or a comma as separator', () => {
    expect(parseDecimalInput('1,5')).toEqual({ kind: 'number', value: 1.5 });
    expect(parseDecimalInput('-2.25')).toEqual({ kind: 'number', value: -2.25 });
    expect(parseDecimalInput(' 7 ')).toEqual({ kind: 'number', value: 7 });
  });

  it('rejects letters, inner signs, exponents and repeated separators', () => {
    for (const text of ['abc', '1-2', '1e3', '.', '1.2.3', '1,2,3', '1 2']) {
      expect(parseDecimalInput(text)).toEqual({ kind: 'invalid' });
    }
  });
});

describe('parseIntegerInput', () => {
  it('accepts whole numbers with an optional sign', () => {
    expect(parseIntegerInput('12')).toEqual({ kind: 'number', value: 12 });
    expect(parseIntegerInput('-3')).toEqual({ kind: 'number', value: -3 });
    expect(parseIntegerInput('+')).toEqual({ kind: 'partial' });
  });

  it('rejects decimals', () => {
    expect(parseIntegerInput('1.5')).toEqual({ kind: 'invalid' });
    expect(parseIntegerInput('1,5')).toEqual({ kind: 'invalid' });
  });
});

describe('parseFieldInput', () => {
  it('picks the format from the field', () => {
    expect(parseFieldInput('timeWindow', '2.5')).toEqual({ kind: 'invalid' });
    expect(parseFieldInput('samplingRate', '2,5')).toEqual({ kind: 'number', value: 2.5 });
  });
});

describe('validateFieldValue', () => {
  it('accepts values inside the limits', () => {
    expect(validateFieldValue('yAxisMin', -1, axis)).toBeNull();
    expect(validateFieldValue('yAxisMax', 6, axis)).toBeNull();
    expect(validateFieldValue('timeWindow', 600, axis)).toBeNull();
    expect(validateFieldValue('labelInterval', 1, axis)).toBeNull();
    expect(validateFieldValue('samplingRate', 51.2, axis)).toBeNull();
  });

  it('keeps Y Min below Y Max', () => {
    expect(validateFieldValue('yAxisMin', 5, axis)).toBe('Y Min cannot be greater than or equal to Y Max.');
    expect(validateFieldValue('yAxisMax', 0, axis)).toBe('Y Max cannot be less than or equal to Y Min.');
  });

  it('bounds the Y axis', () => {
    expect(validateFieldValue('yAxisMin', -200000, axis)).toBe('Y Min out of range (-100000 to 100000).');
    expect(validateFieldValue('yAxisMax', 200000, axis)).toBe('Y Max out of range (-100000 to 100000).');
  });

  it('bounds the window, label interval and rate', () => {
    expect(validateFieldValue('timeWindow', 601, axis)).toBe('Time Window too large. Maximum 600 s.');
    expect(validateFieldValue('timeWindow', 0, axis)).toBe('Time Window too small. Minimum 1 s.');
    expect(validateFieldValue('labelInterval', 1001, axis)).toBe('X Labels interval too high. Maximum 1000.');
    expect(validateFieldValue('labelInterval', 0, axis)).toBe('X Labels interval too low. Minimum 1.');
    expect(validateFieldValue('samplingRate', 150, axis)).toBe('Sampling rate too high. Maximum 100 Hz.');
    expect(validateFieldValue('samplingRate', 0.5, axis)).toBe('Sampling rate too low. Minimum 1 Hz.');
  });

  it('has a parse message for every field', () => {
    expect(FIELD_RULES.timeWindow.invalidMessage).toBe('Time Window must be a valid positive number.');
  });
});

describe('formatFieldValue', () => {
  it('writes ordinary values as String does', () => {
    expect(formatFieldValue(10.5)).toBe('10.5');
    expect(formatFieldValue(-250)).toBe('-250');
    expect(formatFieldValue(0.000001)).toBe('0.000001');
  });

  it('spells out small magnitudes without an exponent', () => {
    expect(formatFieldValue(1e-7)).toBe('0.0000001');
    expect(formatFieldValue(1.5e-7)).toBe('0.00000015');
    expect(formatFieldValue(-2.5e-8)).toBe('-0.000000025');
  });

  it('produces text the decimal parser reads back', () => {
    expect(parseDecimalInput(formatFieldValue(1.5e-7))).toEqual({ kind: 'number', value: 1.5e-7 });
  });
});

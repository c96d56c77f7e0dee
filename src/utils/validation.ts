/**
 * Numeric text-field parsing and per-field constraints
 */

import {
  MAX_LABEL_INTERVAL,
  MAX_SAMPLING_RATE_HZ,
  MAX_TIME_WINDOW_SECONDS,
  MAX_Y_AXIS,
  MIN_LABEL_INTERVAL,
  MIN_SAMPLING_RATE_HZ,
  MIN_TIME_WINDOW_SECONDS,
  MIN_Y_AXIS,
} from './constants';

export type FieldKey = 'yAxisMin' | 'yAxisMax' | 'timeWindow' | 'labelInterval' | 'samplingRate';

/**
 * Outcome of reading a text field:
 * - `empty`: blank or whitespace
 * - `partial`: a lone sign while the user is still typing
 * - `invalid`: anything that is not a number in the field's format
 */
export type ParsedInput =
  | { kind: 'empty' }
  | { kind: 'partial' }
  | { kind: 'invalid' }
  | { kind: 'number'; value: number };

function isDigit(c: string): boolean {
  return c >= '0' && c <= '9';
}

/**
 * Parses a decimal typed with either `.` or `,` as the separator.
 * A sign is only allowed in first position; letters, spaces inside the
 * number and exponents are rejected.
 */
export function parseDecimalInput(text: string): ParsedInput {
  const clean = text.trim();
  if (clean.length === 0) return { kind: 'empty' };
  if (clean === '-' || clean === '+') return { kind: 'partial' };

  for (let i = 0; i < clean.length; i++) {
    const c = clean[i];
    if (c === '-' || c === '+') {
      if (i !== 0) return { kind: 'invalid' };
    } else if (c !== '.' && c !== ',' && !isDigit(c)) {
      return { kind: 'invalid' };
    }
  }

  const value = Number(clean.replace(',', '.'));
  return Number.isFinite(value) ? { kind: 'number', value } : { kind: 'invalid' };
}

/** Parses a whole number with an optional leading sign */
export function parseIntegerInput(text: string): ParsedInput {
  const clean = text.trim();
  if (clean.length === 0) return { kind: 'empty' };
  if (clean === '-' || clean === '+') return { kind: 'partial' };
  if (!/^[+-]?\d+$/.test(clean)) return { kind: 'invalid' };

  const value = Number(clean);
  return Number.isSafeInteger(value) ? { kind: 'number', value } : { kind: 'invalid' };
}

export interface FieldRule {
  label: string;
  format: 'decimal' | 'integer';
  min: number;
  max: number;
  /** Shown when the text does not parse */
  invalidMessage: string;
}

export const FIELD_RULES: Record<FieldKey, FieldRule> = {
  yAxisMin: {
    label: 'Y Min',
    format: 'decimal',
    min: MIN_Y_AXIS,
    max: MAX_Y_AXIS,
    invalidMessage: 'Y Min must be a valid number (no letters or special characters allowed).',
  },
  yAxisMax: {
    label: 'Y Max',
    format: 'decimal',
    min: MIN_Y_AXIS,
    max: MAX_Y_AXIS,
    invalidMessage: 'Y Max must be a valid number (no letters or special characters allowed).',
  },
  timeWindow: {
    label: 'Time Window',
    format: 'integer',
    min: MIN_TIME_WINDOW_SECONDS,
    max: MAX_TIME_WINDOW_SECONDS,
    invalidMessage: 'Time Window must be a valid positive number.',
  },
  labelInterval: {
    label: 'X Labels interval',
    format: 'integer',
    min: MIN_LABEL_INTERVAL,
    max: MAX_LABEL_INTERVAL,
    invalidMessage: 'X Labels interval must be a valid positive number (no letters or special characters allowed).',
  },
  samplingRate: {
    label: 'Sampling rate',
    format: 'decimal',
    min: MIN_SAMPLING_RATE_HZ,
    max: MAX_SAMPLING_RATE_HZ,
    invalidMessage: 'Sampling rate must be a valid number (no letters or special characters allowed).',
  },
};

export function parseFieldInput(field: FieldKey, text: string): ParsedInput {
  return FIELD_RULES[field].format === 'integer' ? parseIntegerInput(text) : parseDecimalInput(text);
}

/** Y bounds currently committed; Y Min and Y Max are checked against each other */
export interface AxisContext {
  yAxisMin: number;
  yAxisMax: number;
}

/**
 * Validates a parsed value against its field's limits
 * @returns Error message or null if valid
 */
export function validateFieldValue(field: FieldKey, value: number, axis: AxisContext): string | null {
  const rule = FIELD_RULES[field];

  switch (field) {
    case 'yAxisMin':
      if (value < rule.min || value > rule.max) {
        return `Y Min out of range (${rule.min} to ${rule.max}).`;
      }
      if (value >= axis.yAxisMax) {
        return 'Y Min cannot be greater than or equal to Y Max.';
      }
      return null;
    case 'yAxisMax':
      if (value < rule.min || value > rule.max) {
        return `Y Max out of range (${rule.min} to ${rule.max}).`;
      }
      if (value <= axis.yAxisMin) {
        return 'Y Max cannot be less than or equal to Y Min.';
      }
      return null;
    case 'timeWindow':
      if (value > rule.max) return `Time Window too large. Maximum ${rule.max} s.`;
      if (value < rule.min) return `Time Window too small. Minimum ${rule.min} s.`;
      return null;
    case 'labelInterval':
      if (value > rule.max) return `X Labels interval too high. Maximum ${rule.max}.`;
      if (value < rule.min) return `X Labels interval too low. Minimum ${rule.min}.`;
      return null;
    case 'samplingRate':
      if (value > rule.max) return `Sampling rate too high. Maximum ${rule.max} Hz.`;
      if (value < rule.min) return `Sampling rate too low. Minimum ${rule.min} Hz.`;
      return null;
  }
}

const SMALL_EXPONENT_PATTERN = /^(-?)(\d)(?:\.(\d+))?e-(\d+)$/;

/**
 * Canonical field text for a committed value: invariant culture, no grouping.
 * String() switches to exponent form below 1e-6, which the parsers do not
 * take, so those values are spelled out in plain decimals.
 */
export function formatFieldValue(value: number): string {
  const text = String(value);
  const match = SMALL_EXPONENT_PATTERN.exec(text);
  if (!match) return text;
  const [, sign, lead, rest = '', exponent] = match;
  return `${sign}0.${'0'.repeat(Number(exponent) - 1)}${lead}${rest}`;
}

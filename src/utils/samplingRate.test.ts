import { describe, expect, it } from 'vitest';
import { InvalidSamplingRateError, quantizeSamplingRate, roundHalfAwayFromZero } from './samplingRate';

describe('quantizeSamplingRate', () => {
  it('keeps rates that divide the clock exactly', () => {
    expect(quantizeSamplingRate(51.2)).toEqual({ requestedHz: 51.2, divider: 640, appliedHz: 51.2 });
  });

  it('snaps to the nearest clock divider', () => {
    const rate = quantizeSamplingRate(50);
    expect(rate.divider).toBe(655);
    expect(rate.appliedHz).toBeCloseTo(50.0275, 4);
  });

  it('clamps the divider to 1 for very high requests', () => {
    expect(quantizeSamplingRate(1e9)).toEqual({ requestedHz: 1e9, divider: 1, appliedHz: 32768 });
  });

  it('accepts another clock', () => {
    expect(quantizeSamplingRate(10, 1000)).toEqual({ requestedHz: 10, divider: 100, appliedHz: 10 });
  });

  it('throws for zero, negative and NaN', () => {
    expect(() => quantizeSamplingRate(0)).toThrow(InvalidSamplingRateError);
    expect(() => quantizeSamplingRate(-5)).toThrow(RangeError);
    expect(() => quantizeSamplingRate(Number.NaN)).toThrow(
      'Sampling rate must be a positive rate the device clock can divide down to (got NaN Hz)'
    );
  });

  it('throws when the request is too small for any divider', () => {
    expect(() => quantizeSamplingRate(1e-310)).toThrow(InvalidSamplingRateError);
    expect(() => quantizeSamplingRate(Number.MIN_VALUE)).toThrow(InvalidSamplingRateError);
  });

  it('keeps the applied rate within (0, clock] for tiny and huge requests', () => {
    for (const hz of [1e-300, 0.001, 1, 1e12]) {
      const { appliedHz } = quantizeSamplingRate(hz);
      expect(appliedHz).toBeGreaterThan(0);
      expect(appliedHz).toBeLessThanOrEqual(32768);
    }
  });
});

describe('roundHalfAwayFromZero', () => {
  it('rounds halves away from zero on both sides', () => {
    expect(roundHalfAwayFromZero(2.5)).toBe(3);
    expect(roundHalfAwayFromZero(-2.5)).toBe(-3);
    expect(roundHalfAwayFromZero(0.4)).toBe(0);
  });
});

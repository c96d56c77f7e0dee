import { DEVICE_CLOCK_HZ } from './constants';

/**
 * Raised for a request with no achievable divider: non-positive, NaN, or so
 * small that clock / requested overflows. Callers validate first.
 */
export class InvalidSamplingRateError extends RangeError {
  readonly requestedHz: number;

  constructor(requestedHz: number) {
    super(`Sampling rate must be a positive rate the device clock can divide down to (got ${requestedHz} Hz)`);
    this.name = 'InvalidSamplingRateError';
    this.requestedHz = requestedHz;
  }
}

export interface SamplingRateState {
  requestedHz: number;
  /** Integer clock divider programmed into the firmware */
  divider: number;
  /** clock / divider; the only rate used for capacity and timestamps */
  appliedHz: number;
}

/** Math.round rounds x.5 towards +Infinity; this rounds it away from zero */
export function roundHalfAwayFromZero(value: number): number {
  return Math.sign(value) * Math.round(Math.abs(value));
}

/**
 * Nearest rate the firmware can produce: clock / round(clock / requested).
 * Pure: the same request always yields the same result.
 *
 * @example quantizeSamplingRate(50).appliedHz // 32768 / 655 ≈ 50.0275
 */
export function quantizeSamplingRate(
  requestedHz: number,
  clockHz: number = DEVICE_CLOCK_HZ
): SamplingRateState {
  if (!(requestedHz > 0)) {
    throw new InvalidSamplingRateError(requestedHz);
  }
  const ratio = clockHz / requestedHz;
  if (!Number.isFinite(ratio)) {
    throw new InvalidSamplingRateError(requestedHz);
  }
  const divider = Math.max(1, roundHalfAwayFromZero(ratio));
  return {
    requestedHz,
    divider,
    appliedHz: clockHz / divider,
  };
}

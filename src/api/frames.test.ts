import { describe, expect, it } from 'vitest';
import { FrameError } from './errors';
import { batteryPercentFromVolts, decodeFrame, parseBridgeMessage } from './frames';

describe('batteryPercentFromVolts', () => {
  it('clamps outside the cell range', () => {
    expect(batteryPercentFromVolts(3.2)).toBe(0);
    expect(batteryPercentFromVolts(4.3)).toBe(100);
  });

  it('follows the two linear segments', () => {
    expect(batteryPercentFromVolts(3.7)).toBeCloseTo(48.5, 6);
    expect(batteryPercentFromVolts(4.1)).toBeCloseTo(97, 6);
    expect(batteryPercentFromVolts(4.15)).toBeCloseTo(98.5, 6);
  });
});

describe('decodeFrame', () => {
  it('maps wire fields to channel values', () => {
    const frame = { temperature_c: 21.5, pressure_kpa: 101.25, gyro_x: 3 };
    expect(decodeFrame(frame, ['temperature', 'pressure'])).toEqual({ temperature: 21.5, pressure: 101.25 });
  });

  it('converts millivolts', () => {
    const values = decodeFrame({ battery_mv: 3700, ext_a6_mv: 1650 }, ['batteryVoltage', 'batteryPercent', 'extA6']);
    expect(values.batteryVoltage).toBe(3.7);
    expect(values.batteryPercent).toBeCloseTo(48.5, 6);
    expect(values.extA6).toBe(1.65);
  });

  it('throws on a missing or null field', () => {
    expect(() => decodeFrame({ temperature_c: 21 }, ['temperature', 'pressure'])).toThrow(
      new FrameError('Frame field pressure_kpa missing or invalid')
    );
    expect(() => decodeFrame({ temperature_c: null }, ['temperature'])).toThrow(FrameError);
  });
});

describe('parseBridgeMessage', () => {
  it('keeps only numeric and null frame fields', () => {
    expect(parseBridgeMessage('{"type":"frame","data":{"a":1,"b":null,"c":"x"}}')).toEqual({
      type: 'frame',
      data: { a: 1, b: null },
    });
  });

  it('reads status messages', () => {
    const text = JSON.stringify({
      type: 'status',
      data: { connected: true, streaming: false, sampling_rate_hz: 51.2, device_name: 'test-device' },
    });
    expect(parseBridgeMessage(text)).toEqual({
      type: 'status',
      data: { connected: true, streaming: false, sampling_rate_hz: 51.2, device_name: 'test-device' },
    });
  });

  it('rejects a status without the required fields', () => {
    expect(parseBridgeMessage('{"type":"status","data":{"streaming":true,"sampling_rate_hz":50}}')).toBeNull();
  });

  it('reads device errors', () => {
    expect(parseBridgeMessage('{"type":"error","data":{"message":"link lost"}}')).toEqual({
      type: 'error',
      data: { message: 'link lost' },
    });
  });

  it('returns null for anything else', () => {
    expect(parseBridgeMessage('not json')).toBeNull();
    expect(parseBridgeMessage('[1,2]')).toBeNull();
    expect(parseBridgeMessage('{"type":"other","data":{}}')).toBeNull();
  });
});

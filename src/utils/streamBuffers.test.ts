import { describe, expect, it } from 'vitest';
import { FrameError } from '../api/errors';
import { computeCapacity, computeTimestampMs, SeriesBuffer, StreamRegistry } from './streamBuffers';

describe('computeCapacity', () => {
  it('is window × rate rounded up', () => {
    expect(computeCapacity(20, 51.2)).toBe(1024);
    expect(computeCapacity(2.5, 10)).toBe(25);
    expect(computeCapacity(1, 50.5)).toBe(51);
  });

  it('never drops below one sample', () => {
    expect(computeCapacity(0.01, 1)).toBe(1);
  });
});

describe('computeTimestampMs', () => {
  it('derives milliseconds from the tick counter', () => {
    expect(computeTimestampMs(1, 50)).toBe(20);
    expect(computeTimestampMs(3, 51.2)).toBe(59);
    expect(computeTimestampMs(0, 51.2)).toBe(0);
  });
});

describe('SeriesBuffer', () => {
  it('overwrites the oldest pair once full', () => {
    const buffer = new SeriesBuffer(3);
    [1, 2, 3, 4].forEach((v, i) => buffer.push(v, (i + 1) * 10));

    expect(buffer.length).toBe(3);
    expect(buffer.toSnapshot()).toEqual({ values: [2, 3, 4], timestamps: [20, 30, 40] });
    expect(buffer.latest()).toBe(4);
  });

  it('keeps the newest pairs when shrinking and keeps appending in order', () => {
    const buffer = new SeriesBuffer(3);
    [1, 2, 3, 4].forEach((v, i) => buffer.push(v, i));

    buffer.resize(2);
    expect(buffer.toSnapshot().values).toEqual([3, 4]);

    buffer.push(5, 4);
    expect(buffer.toSnapshot().values).toEqual([4, 5]);

    buffer.resize(4);
    buffer.push(6, 5);
    expect(buffer.toSnapshot()).toEqual({ values: [4, 5, 6], timestamps: [3, 4, 5] });
  });

  it('is empty after clear', () => {
    const buffer = new SeriesBuffer(2);
    buffer.push(0.5, 1);
    buffer.clear();
    expect(buffer.length).toBe(0);
    expect(buffer.latest()).toBeNull();
    expect(buffer.toSnapshot()).toEqual({ values: [], timestamps: [] });
  });
});

describe('StreamRegistry', () => {
  const tick = (registry: StreamRegistry, t: number, p: number) =>
    registry.appendTick({ temperature: t, pressure: p });

  it('stamps every channel of a tick with the same timestamp', () => {
    const registry = new StreamRegistry(['temperature', 'pressure'], { timeWindowSeconds: 1, samplingRateHz: 4 });
    for (let i = 1; i <= 6; i++) tick(registry, i, 100 + i);

    expect(registry.capacity).toBe(4);
    expect(registry.sampleCount).toBe(6);
    expect(registry.elapsedSeconds).toBe(1.5);
    expect(registry.snapshot('temperature')).toEqual({ values: [3, 4, 5, 6], timestamps: [750, 1000, 1250, 1500] });
    expect(registry.snapshot('pressure').timestamps).toEqual([750, 1000, 1250, 1500]);
  });

  it('rejects a tick with a missing value without writing anything', () => {
    const registry = new StreamRegistry(['temperature', 'pressure'], { timeWindowSeconds: 1, samplingRateHz: 4 });
    tick(registry, 1, 101);

    expect(() => registry.appendTick({ temperature: 2 })).toThrow(FrameError);
    expect(() => registry.appendTick({ temperature: 2, pressure: Number.NaN })).toThrow(FrameError);
    expect(registry.sampleCount).toBe(1);
    expect(registry.length('temperature')).toBe(1);
  });

  it('ignores channels it does not hold', () => {
    const registry = new StreamRegistry(['temperature'], { timeWindowSeconds: 1, samplingRateHz: 4 });

    expect(registry.append('pressure', 1, 0)).toBe(false);
    expect(registry.append('notAChannel', 1, 0)).toBe(false);
    expect(registry.has('pressure')).toBe(false);
    expect(registry.snapshot('pressure')).toEqual({ values: [], timestamps: [] });
    expect(registry.latest('pressure')).toBeNull();
    expect(registry.append('temperature', 21, 0)).toBe(true);
  });

  it('trims to a smaller window but keeps the counter', () => {
    const registry = new StreamRegistry(['temperature', 'pressure'], { timeWindowSeconds: 1, samplingRateHz: 4 });
    for (let i = 1; i <= 4; i++) tick(registry, i, 0);

    registry.setTimeWindow(0.5);
    expect(registry.capacity).toBe(2);
    expect(registry.snapshot('temperature').values).toEqual([3, 4]);
    expect(registry.sampleCount).toBe(4);

    tick(registry, 5, 0);
    expect(registry.snapshot('temperature')).toEqual({ values: [4, 5], timestamps: [1000, 1250] });
  });

  it('starts over on a rate change', () => {
    const registry = new StreamRegistry(['temperature', 'pressure'], { timeWindowSeconds: 1, samplingRateHz: 4 });
    for (let i = 1; i <= 3; i++) tick(registry, i, 0);

    registry.resetForSamplingRate(8);
    expect(registry.capacity).toBe(8);
    expect(registry.sampleCount).toBe(0);
    expect(registry.length('temperature')).toBe(0);

    expect(tick(registry, 9, 0)).toBe(125);
  });

  it('collects the values of several channels', () => {
    const registry = new StreamRegistry(['temperature', 'pressure'], { timeWindowSeconds: 1, samplingRateHz: 4 });
    tick(registry, 1, 10);
    tick(registry, 2, 20);

    expect(registry.collectValues(['temperature', 'pressure'])).toEqual([1, 2, 10, 20]);
    expect(registry.latest('pressure')).toBe(20);
  });
});

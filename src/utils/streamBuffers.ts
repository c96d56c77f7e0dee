import { FrameError } from '../api/errors';
import { isChannelId, type ChannelId } from '../components/Charts/config/chartConfig';
import type { SeriesSnapshot } from '../components/Charts/types';
import { CAPACITY_EPSILON } from './constants';

export interface WindowSettings {
  timeWindowSeconds: number;
  samplingRateHz: number;
}

/** Samples retained per channel: ceil(window × rate), never below 1 */
export function computeCapacity(timeWindowSeconds: number, samplingRateHz: number): number {
  return Math.max(1, Math.ceil(timeWindowSeconds * samplingRateHz - CAPACITY_EPSILON));
}

/** Tick timestamp derived from the sample counter, not the wall clock */
export function computeTimestampMs(sampleCounter: number, samplingRateHz: number): number {
  return Math.round((sampleCounter / samplingRateHz) * 1000);
}

/**
 * Ring buffer of (float32 value, int32 timestamp) pairs.
 * Append is O(1) and overwrites the oldest pair once full.
 */
export class SeriesBuffer {
  private values: Float32Array;
  private timestamps: Int32Array;
  private head: number = 0; // Write position
  private size: number = 0;

  constructor(capacity: number) {
    this.values = new Float32Array(capacity);
    this.timestamps = new Int32Array(capacity);
  }

  get capacity(): number {
    return this.values.length;
  }

  get length(): number {
    return this.size;
  }

  /** Oldest element position */
  private get tail(): number {
    return (this.head - this.size + this.capacity) % this.capacity;
  }

  push(value: number, timestampMs: number): void {
    this.values[this.head] = value;
    this.timestamps[this.head] = timestampMs;
    this.head = (this.head + 1) % this.capacity;
    if (this.size < this.capacity) {
      this.size++;
    }
  }

  /** Visits values oldest first without allocating */
  forEachValue(fn: (value: number) => void): void {
    const start = this.tail;
    for (let i = 0; i < this.size; i++) {
      fn(this.values[(start + i) % this.capacity]);
    }
  }

  latest(): number | null {
    if (this.size === 0) return null;
    return this.values[(this.head - 1 + this.capacity) % this.capacity];
  }

  /** Unwraps the ring into fresh arrays, oldest first */
  toSnapshot(): SeriesSnapshot {
    const values: number[] = new Array(this.size);
    const timestamps: number[] = new Array(this.size);
    const start = this.tail;
    for (let i = 0; i < this.size; i++) {
      const j = (start + i) % this.capacity;
      values[i] = this.values[j];
      timestamps[i] = this.timestamps[j];
    }
    return { values, timestamps };
  }

  /** Reallocates to a new capacity keeping the newest pairs that fit */
  resize(capacity: number): void {
    if (capacity === this.capacity) return;
    const keep = Math.min(this.size, capacity);
    const values = new Float32Array(capacity);
    const timestamps = new Int32Array(capacity);
    const start = (this.tail + this.size - keep) % this.capacity;
    for (let i = 0; i < keep; i++) {
      const j = (start + i) % this.capacity;
      values[i] = this.values[j];
      timestamps[i] = this.timestamps[j];
    }
    this.values = values;
    this.timestamps = timestamps;
    this.size = keep;
    this.head = keep % capacity;
  }

  clear(): void {
    this.head = 0;
    this.size = 0;
  }
}

/**
 * One buffer per enabled channel plus the tick counter that timestamps them.
 *
 * Every method runs to completion synchronously, so the frame handler and the
 * render path (both on the event loop) never observe a half-applied append or
 * reset.
 */
export class StreamRegistry {
  private readonly buffers = new Map<ChannelId, SeriesBuffer>();
  private settings: WindowSettings;
  private sampleCounter = 0;

  constructor(channels: readonly ChannelId[], settings: WindowSettings) {
    this.settings = { ...settings };
    const capacity = this.capacity;
    for (const channel of channels) {
      this.buffers.set(channel, new SeriesBuffer(capacity));
    }
  }

  get capacity(): number {
    return computeCapacity(this.settings.timeWindowSeconds, this.settings.samplingRateHz);
  }

  get sampleCount(): number {
    return this.sampleCounter;
  }

  get samplingRateHz(): number {
    return this.settings.samplingRateHz;
  }

  get timeWindowSeconds(): number {
    return this.settings.timeWindowSeconds;
  }

  /** Seconds of signal received since the last reset */
  get elapsedSeconds(): number {
    return this.sampleCounter / this.settings.samplingRateHz;
  }

  channels(): ChannelId[] {
    return [...this.buffers.keys()];
  }

  has(channel: string): boolean {
    return this.bufferFor(channel) !== undefined;
  }

  length(channel: string): number {
    return this.bufferFor(channel)?.length ?? 0;
  }

  /** Appends one pair; returns false (and drops it) for channels not in the registry */
  append(channel: string, value: number, timestampMs: number): boolean {
    const buffer = this.bufferFor(channel);
    if (!buffer) return false;
    buffer.push(value, timestampMs);
    return true;
  }

  /**
   * Appends one device tick to every channel under a single timestamp.
   * The frame must carry a finite value for every registered channel;
   * otherwise nothing is written and a FrameError is thrown.
   * Values for channels outside the registry are ignored.
   */
  appendTick(values: Partial<Record<ChannelId, number>>): number {
    for (const channel of this.buffers.keys()) {
      const value = values[channel];
      if (value === undefined || !Number.isFinite(value)) {
        throw new FrameError(`Missing or non-finite value for ${channel}`);
      }
    }

    this.sampleCounter++;
    const timestampMs = computeTimestampMs(this.sampleCounter, this.settings.samplingRateHz);
    for (const [channel, buffer] of this.buffers) {
      const value = values[channel];
      if (value !== undefined) buffer.push(value, timestampMs);
    }
    return timestampMs;
  }

  /** Copy of a channel's buffer; unknown channels give two empty arrays */
  snapshot(channel: string): SeriesSnapshot {
    return this.bufferFor(channel)?.toSnapshot() ?? { values: [], timestamps: [] };
  }

  latest(channel: string): number | null {
    return this.bufferFor(channel)?.latest() ?? null;
  }

  /** Union of the buffered values of the given channels */
  collectValues(channels: readonly string[]): number[] {
    const out: number[] = [];
    for (const channel of channels) {
      this.bufferFor(channel)?.forEachValue((v) => out.push(v));
    }
    return out;
  }

  clearAll(): void {
    for (const buffer of this.buffers.values()) {
      buffer.clear();
    }
  }

  /** Window change: evict down to the new capacity, keep data and counter */
  setTimeWindow(timeWindowSeconds: number): void {
    this.settings = { ...this.settings, timeWindowSeconds };
    const capacity = this.capacity;
    for (const buffer of this.buffers.values()) {
      buffer.resize(capacity);
    }
  }

  /**
   * Rate change: timestamps from the old rate are meaningless under the new
   * one, so every buffer and the counter start over.
   */
  resetForSamplingRate(samplingRateHz: number): void {
    this.settings = { ...this.settings, samplingRateHz };
    const capacity = this.capacity;
    for (const buffer of this.buffers.values()) {
      buffer.clear();
      buffer.resize(capacity);
    }
    this.sampleCounter = 0;
  }

  private bufferFor(channel: string): SeriesBuffer | undefined {
    return isChannelId(channel) ? this.buffers.get(channel) : undefined;
  }
}

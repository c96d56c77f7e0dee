import { CHANNELS, type ChannelConfig, type ChannelId } from '../components/Charts/config/chartConfig';
import { FrameError } from './errors';
import type { BridgeInboundMessage, BridgeStatus, RawFrame } from './types';

/**
 * Li-ion charge estimate from cell voltage: empty at 3.3 V, 97% at 4.10 V,
 * full at 4.2 V, linear in between.
 */
export function batteryPercentFromVolts(volts: number): number {
  let percent: number;
  if (volts <= 3.3) percent = 0;
  else if (volts >= 4.2) percent = 100;
  else if (volts <= 4.1) percent = ((volts - 3.3) / (4.1 - 3.3)) * 97;
  else percent = 97 + ((volts - 4.1) / (4.2 - 4.1)) * 3;
  return Math.min(100, Math.max(0, percent));
}

function applyTransform(config: ChannelConfig, raw: number): number {
  switch (config.transform) {
    case 'raw':
      return raw;
    case 'millivoltsToVolts':
      return raw / 1000;
    case 'batteryPercent':
      return batteryPercentFromVolts(raw / 1000);
  }
}

/**
 * Maps a wire frame onto channel values for the given channels.
 * Throws FrameError on the first missing or non-finite field so the caller
 * can drop the whole tick.
 */
export function decodeFrame(raw: RawFrame, channels: readonly ChannelId[]): Partial<Record<ChannelId, number>> {
  const values: Partial<Record<ChannelId, number>> = {};
  for (const channel of channels) {
    const config = CHANNELS[channel];
    const field = raw[config.sourceField];
    if (typeof field !== 'number' || !Number.isFinite(field)) {
      throw new FrameError(`Frame field ${config.sourceField} missing or invalid`);
    }
    values[channel] = applyTransform(config, field);
  }
  return values;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toRawFrame(data: unknown): RawFrame | null {
  if (!isRecord(data)) return null;
  const frame: RawFrame = {};
  for (const [key, value] of Object.entries(data)) {
    if (typeof value === 'number' || value === null) {
      frame[key] = value;
    }
  }
  return frame;
}

function toStatus(data: unknown): BridgeStatus | null {
  if (!isRecord(data)) return null;
  const { connected, streaming, sampling_rate_hz, device_name } = data;
  if (typeof connected !== 'boolean' || typeof streaming !== 'boolean' || typeof sampling_rate_hz !== 'number') {
    return null;
  }
  return {
    connected,
    streaming,
    sampling_rate_hz,
    ...(typeof device_name === 'string' ? { device_name } : {}),
  };
}

/** Parses one bridge text message; null when it is not JSON or not a known message */
export function parseBridgeMessage(text: string): BridgeInboundMessage | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return null;
  }
  if (!isRecord(parsed)) return null;

  switch (parsed.type) {
    case 'frame': {
      const data = toRawFrame(parsed.data);
      return data ? { type: 'frame', data } : null;
    }
    case 'status': {
      const data = toStatus(parsed.data);
      return data ? { type: 'status', data } : null;
    }
    case 'error': {
      const data = parsed.data;
      if (isRecord(data) && typeof data.message === 'string') {
        return { type: 'error', data: { message: data.message } };
      }
      return null;
    }
    default:
      return null;
  }
}

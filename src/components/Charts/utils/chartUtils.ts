import type { Theme } from '@mui/material/styles';
import type { AxisRange } from '../types';
import {
  AUTO_RANGE_DECIMALS,
  AUTO_RANGE_FLAT_THRESHOLD,
  AUTO_RANGE_HYSTERESIS,
  AUTO_RANGE_MARGIN,
} from '../../../utils/constants';

export function resolvePaletteColor(theme: Theme, path: string): string {
  const [paletteKey, shade] = path.split('.');
  const palette: object = theme.palette;
  const entry: unknown = Reflect.get(palette, paletteKey);
  if (entry && typeof entry === 'object') {
    const color: unknown = Reflect.get(entry, shade || 'main');
    if (typeof color === 'string') return color;
  }
  return path;
}

/** Rounds half away from zero to `digits` decimals */
export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return (Math.sign(value) * Math.round(Math.abs(value) * factor)) / factor;
}

/**
 * Y bounds that fit the data with a 10% margin.
 * Single-pass min/max; spreading large buffers into Math.min overflows the stack.
 * Non-finite values are skipped. No data gives the fallback.
 */
export function computeAutoRange(values: Iterable<number>, fallback: AxisRange): AxisRange {
  let dataMin = Infinity;
  let dataMax = -Infinity;

  for (const value of values) {
    if (!Number.isFinite(value)) continue;
    if (value < dataMin) dataMin = value;
    if (value > dataMax) dataMax = value;
  }

  if (dataMin === Infinity) {
    return { min: fallback.min, max: fallback.max };
  }

  let min: number;
  let max: number;

  if (Math.abs(dataMax - dataMin) < AUTO_RANGE_FLAT_THRESHOLD) {
    // Flat signal: pad around the centre
    const center = (dataMin + dataMax) / 2;
    const margin = Math.abs(center) * AUTO_RANGE_MARGIN + 0.1;
    min = center - margin;
    max = center + margin;
  } else {
    const margin = (dataMax - dataMin) * AUTO_RANGE_MARGIN;
    min = dataMin - margin;
    max = dataMax + margin;
  }

  return {
    min: roundTo(min, AUTO_RANGE_DECIMALS),
    max: roundTo(max, AUTO_RANGE_DECIMALS),
  };
}

/** True when either bound moved more than the hysteresis threshold */
export function rangeChanged(current: AxisRange, next: AxisRange): boolean {
  return (
    Math.abs(current.min - next.min) > AUTO_RANGE_HYSTERESIS ||
    Math.abs(current.max - next.max) > AUTO_RANGE_HYSTERESIS
  );
}

/**
 * Tick positions (ms) every `intervalSeconds`, anchored to the right edge so
 * the newest sample always sits on a tick.
 */
export function buildTimeTicks(startMs: number, endMs: number, intervalSeconds: number): number[] {
  const step = intervalSeconds * 1000;
  if (!(step > 0) || endMs < startMs) return [];
  const ticks: number[] = [];
  for (let t = endMs; t >= startMs - 1e-6; t -= step) {
    ticks.push(t);
  }
  return ticks.reverse();
}

/** Elapsed-time label for an axis value in ms: "12s", "1:05" */
export function formatElapsed(ms: number): string {
  const total = Math.max(0, Math.round(ms / 1000));
  if (total < 60) return `${total}s`;
  const m = Math.floor(total / 60);
  const s = String(total % 60).padStart(2, '0');
  return `${m}:${s}`;
}

export const CHART_LAYOUT = {
  height: 320,
  yAxis: {
    width: 56,
  },
} as const;

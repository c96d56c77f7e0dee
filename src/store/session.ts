import { atom, type Getter, type Setter } from 'jotai';
import { decodeFrame } from '../api/frames';
import { FrameError } from '../api/errors';
import type { RawFrame, SensorDevice } from '../api/types';
import {
  getAvailableParameters,
  getEnabledChannels,
  getParameterChannels,
  getParameterInfo,
  type ParameterId,
  type SensorId,
} from '../components/Charts/config/chartConfig';
import type { AxisRange } from '../components/Charts/types';
import { computeAutoRange, rangeChanged } from '../components/Charts/utils/chartUtils';
import {
  DEFAULT_LABEL_INTERVAL,
  DEFAULT_SAMPLING_RATE_HZ,
  DEFAULT_TIME_WINDOW_SECONDS,
} from '../utils/constants';
import { logger } from '../utils/logger';
import { quantizeSamplingRate, type SamplingRateState } from '../utils/samplingRate';
import { StreamRegistry } from '../utils/streamBuffers';
import {
  FIELD_RULES,
  formatFieldValue,
  parseFieldInput,
  validateFieldValue,
  type FieldKey,
} from '../utils/validation';
import {
  autoRangeAtom,
  autoRangeEnabledAtom,
  chartRevisionAtom,
  createField,
  deviceAtom,
  deviceSyncAtom,
  droppedFramesAtom,
  enabledSensorsAtom,
  fieldsAtom,
  labelIntervalAtom,
  manualRangeAtom,
  registryAtom,
  samplingRateAtom,
  selectedParameterAtom,
  timeWindowSecondsAtom,
  validationMessageAtom,
} from './atoms';

/**
 * - `committed`: value accepted and applied
 * - `defaulted`: empty input, field reset to its static default
 * - `pending`: lone sign while typing, nothing changed
 * - `rejected`: parse or constraint failure, text rolled back
 * - `ignored`: Y bound edited while auto-range owns the axis
 */
export type FieldCommitStatus = 'committed' | 'defaulted' | 'pending' | 'rejected' | 'ignored';

export interface FieldCommitResult {
  status: FieldCommitStatus;
  message: string | null;
}

export interface StartSessionOptions {
  sensors: readonly SensorId[];
  device?: SensorDevice | null;
}

// ============================================================================
// HELPERS
// ============================================================================

function bumpRevision(set: Setter): void {
  set(chartRevisionAtom, (v) => v + 1);
}

function setField(set: Setter, field: FieldKey, text: string, lastValidValue: number): void {
  set(fieldsAtom, (prev) => ({ ...prev, [field]: { text, lastValidText: text, lastValidValue } }));
}

function setFieldText(set: Setter, field: FieldKey, text: string): void {
  set(fieldsAtom, (prev) => ({ ...prev, [field]: { ...prev[field], text } }));
}

/** Manual range and the Y fields' last valid values always move together */
function commitManualRange(get: Getter, set: Setter, range: AxisRange): void {
  set(manualRangeAtom, range);
  set(fieldsAtom, (prev) => ({
    ...prev,
    yAxisMin: createField(range.min),
    yAxisMax: createField(range.max),
  }));
  if (get(autoRangeEnabledAtom)) {
    showRangeInFields(set, get(autoRangeAtom));
  }
}

function showRangeInFields(set: Setter, range: AxisRange): void {
  setFieldText(set, 'yAxisMin', formatFieldValue(range.min));
  setFieldText(set, 'yAxisMax', formatFieldValue(range.max));
}

function defaultRangeFor(get: Getter): AxisRange {
  const param = get(selectedParameterAtom);
  return param ? getParameterInfo(param).defaultRange : { min: 0, max: 1 };
}

/**
 * Recomputes the auto range from the selected channel(s). Without `force`
 * the axis only moves when a bound shifts by more than the hysteresis.
 */
function recomputeAutoRange(get: Getter, set: Setter, force: boolean): void {
  const param = get(selectedParameterAtom);
  if (!param) return;

  const registry = get(registryAtom);
  const values = registry ? registry.collectValues(getParameterChannels(param)) : [];
  const next = computeAutoRange(values, getParameterInfo(param).defaultRange);

  if (force || rangeChanged(get(autoRangeAtom), next)) {
    set(autoRangeAtom, next);
    showRangeInFields(set, next);
  }
}

/**
 * Best-effort stop → write rate → start. The device may already be stopped
 * or not yet streaming, so each step's failure is logged and ignored; a real
 * disconnect shows up through isConnected().
 */
async function syncDeviceSamplingRate(device: SensorDevice, appliedHz: number): Promise<void> {
  try {
    await device.stopStreaming();
  } catch (err) {
    logger.warn('[Session] Stop before rate change failed (ignored):', err);
  }
  try {
    device.samplingRate = appliedHz;
  } catch (err) {
    logger.warn('[Session] Writing sampling rate to device failed (ignored):', err);
  }
  try {
    await device.startStreaming();
  } catch (err) {
    logger.warn('[Session] Restart after rate change failed (ignored):', err);
  }
}

function applySamplingRate(get: Getter, set: Setter, requestedHz: number): SamplingRateState {
  // Throws before anything is touched
  const rate = quantizeSamplingRate(requestedHz);

  set(samplingRateAtom, rate);
  get(registryAtom)?.resetForSamplingRate(rate.appliedHz);

  const device = get(deviceAtom);
  set(deviceSyncAtom, device ? syncDeviceSamplingRate(device, rate.appliedHz) : Promise.resolve());

  if (get(autoRangeEnabledAtom)) recomputeAutoRange(get, set, true);
  bumpRevision(set);

  logger.info(`[Session] Sampling rate ${requestedHz} Hz → ${rate.appliedHz} Hz (divider ${rate.divider})`);
  return rate;
}

function defaultValueFor(get: Getter, field: FieldKey): number {
  switch (field) {
    case 'yAxisMin':
      return defaultRangeFor(get).min;
    case 'yAxisMax':
      return defaultRangeFor(get).max;
    case 'timeWindow':
      return DEFAULT_TIME_WINDOW_SECONDS;
    case 'labelInterval':
      return DEFAULT_LABEL_INTERVAL;
    case 'samplingRate':
      return DEFAULT_SAMPLING_RATE_HZ;
  }
}

function applyFieldValue(get: Getter, set: Setter, field: FieldKey, value: number, text: string): void {
  switch (field) {
    case 'yAxisMin': {
      const current = get(manualRangeAtom);
      // A default that would cross the other bound resets both
      const range = value < current.max ? { min: value, max: current.max } : defaultRangeFor(get);
      commitManualRange(get, set, range);
      setField(set, 'yAxisMin', text, range.min);
      break;
    }
    case 'yAxisMax': {
      const current = get(manualRangeAtom);
      const range = value > current.min ? { min: current.min, max: value } : defaultRangeFor(get);
      commitManualRange(get, set, range);
      setField(set, 'yAxisMax', text, range.max);
      break;
    }
    case 'timeWindow':
      set(timeWindowSecondsAtom, value);
      setField(set, field, text, value);
      get(registryAtom)?.setTimeWindow(value);
      if (get(autoRangeEnabledAtom)) recomputeAutoRange(get, set, true);
      break;
    case 'labelInterval':
      set(labelIntervalAtom, value);
      setField(set, field, text, value);
      break;
    case 'samplingRate':
      setField(set, field, text, value);
      applySamplingRate(get, set, value);
      break;
  }
  bumpRevision(set);
}

function rejectField(get: Getter, set: Setter, field: FieldKey, message: string): FieldCommitResult {
  setFieldText(set, field, get(fieldsAtom)[field].lastValidText);
  set(validationMessageAtom, message);
  return { status: 'rejected', message };
}

function isYBound(field: FieldKey): boolean {
  return field === 'yAxisMin' || field === 'yAxisMax';
}

/**
 * Checks a numeric value against its field's rules and applies it. `text` is
 * what the field shows afterwards.
 */
function commitValue(get: Getter, set: Setter, field: FieldKey, value: number, text: string): FieldCommitResult {
  const rule = FIELD_RULES[field];
  if (!Number.isFinite(value) || (rule.format === 'integer' && !Number.isInteger(value))) {
    return rejectField(get, set, field, rule.invalidMessage);
  }

  const range = get(manualRangeAtom);
  const error = validateFieldValue(field, value, { yAxisMin: range.min, yAxisMax: range.max });
  if (error) return rejectField(get, set, field, error);

  applyFieldValue(get, set, field, value, text);
  set(validationMessageAtom, null);
  return { status: 'committed', message: null };
}

/** Numeric entry point for the typed setters; no text round trip */
function commitNumber(get: Getter, set: Setter, field: FieldKey, value: number): FieldCommitResult {
  if (isYBound(field) && get(autoRangeEnabledAtom)) {
    return { status: 'ignored', message: null };
  }
  return commitValue(get, set, field, value, formatFieldValue(value));
}

// ============================================================================
// ACTIONS
// ============================================================================

/**
 * Builds the registry for the enabled sensors and resets every field to its
 * default. The device's current rate (when one is given) seeds the rate field.
 */
export const startSessionAtom = atom(null, (_get, set, options: StartSessionOptions) => {
  const device = options.device ?? null;
  const deviceRate = device?.samplingRate ?? DEFAULT_SAMPLING_RATE_HZ;
  const requestedHz = deviceRate > 0 ? deviceRate : DEFAULT_SAMPLING_RATE_HZ;
  const rate = quantizeSamplingRate(requestedHz);
  const sensors = [...options.sensors];

  const registry = new StreamRegistry(getEnabledChannels(sensors), {
    timeWindowSeconds: DEFAULT_TIME_WINDOW_SECONDS,
    samplingRateHz: rate.appliedHz,
  });

  const selected = getAvailableParameters(sensors)[0] ?? null;
  const range = selected ? getParameterInfo(selected).defaultRange : { min: 0, max: 1 };

  set(enabledSensorsAtom, sensors);
  set(deviceAtom, device);
  set(registryAtom, registry);
  set(samplingRateAtom, rate);
  set(timeWindowSecondsAtom, DEFAULT_TIME_WINDOW_SECONDS);
  set(labelIntervalAtom, DEFAULT_LABEL_INTERVAL);
  set(selectedParameterAtom, selected);
  set(autoRangeEnabledAtom, false);
  set(manualRangeAtom, range);
  set(autoRangeAtom, range);
  set(fieldsAtom, {
    yAxisMin: createField(range.min),
    yAxisMax: createField(range.max),
    timeWindow: createField(DEFAULT_TIME_WINDOW_SECONDS),
    labelInterval: createField(DEFAULT_LABEL_INTERVAL),
    samplingRate: createField(requestedHz),
  });
  set(validationMessageAtom, null);
  set(droppedFramesAtom, 0);
  bumpRevision(set);

  logger.info(`[Session] Started with ${registry.channels().length} channels at ${rate.appliedHz} Hz`);
});

export const endSessionAtom = atom(null, (get, set) => {
  get(registryAtom)?.clearAll();
  set(registryAtom, null);
  set(deviceAtom, null);
  set(selectedParameterAtom, null);
  bumpRevision(set);
});

/**
 * Applies one device tick. A malformed or incomplete frame is logged and
 * dropped whole; the next tick proceeds normally.
 * @returns whether the tick was stored
 */
export const ingestFrameAtom = atom(null, (get, set, frame: RawFrame): boolean => {
  const registry = get(registryAtom);
  if (!registry) return false;

  try {
    registry.appendTick(decodeFrame(frame, registry.channels()));
  } catch (err) {
    if (err instanceof FrameError) {
      logger.warn('[Session] Dropping frame:', err.message);
    } else {
      logger.error('[Session] Unexpected error while applying frame:', err);
    }
    set(droppedFramesAtom, (n) => n + 1);
    return false;
  }

  if (get(autoRangeEnabledAtom)) recomputeAutoRange(get, set, false);
  bumpRevision(set);
  return true;
});

export const selectParameterAtom = atom(null, (get, set, param: ParameterId) => {
  if (!getAvailableParameters(get(enabledSensorsAtom)).includes(param)) {
    logger.warn(`[Session] Ignoring selection of disabled parameter ${param}`);
    return;
  }

  set(selectedParameterAtom, param);
  commitManualRange(get, set, getParameterInfo(param).defaultRange);
  if (get(autoRangeEnabledAtom)) recomputeAutoRange(get, set, true);
  set(validationMessageAtom, null);
  bumpRevision(set);
});

/**
 * Switching on computes a fresh range immediately; switching off brings the
 * last committed manual range back.
 */
export const setAutoRangeAtom = atom(null, (get, set, enabled: boolean) => {
  set(autoRangeEnabledAtom, enabled);
  if (enabled) {
    recomputeAutoRange(get, set, true);
  } else {
    showRangeInFields(set, get(manualRangeAtom));
  }
  set(validationMessageAtom, null);
  bumpRevision(set);
});

/** Quantizes, resets the buffers and resyncs the device. Throws InvalidSamplingRateError for hz ≤ 0. */
export const applySamplingRateAtom = atom(null, (get, set, requestedHz: number): SamplingRateState =>
  applySamplingRate(get, set, requestedHz)
);

/**
 * Text-commit entry point for every numeric field: parse, check, then either
 * apply or roll the text back to the last valid value.
 */
export const commitFieldAtom = atom(
  null,
  (get, set, { field, text }: { field: FieldKey; text: string }): FieldCommitResult => {
    if (isYBound(field) && get(autoRangeEnabledAtom)) {
      return { status: 'ignored', message: null };
    }

    const parsed = parseFieldInput(field, text);
    switch (parsed.kind) {
      case 'partial':
        setFieldText(set, field, text);
        set(validationMessageAtom, null);
        return { status: 'pending', message: null };

      case 'empty': {
        const value = defaultValueFor(get, field);
        applyFieldValue(get, set, field, value, formatFieldValue(value));
        set(validationMessageAtom, null);
        return { status: 'defaulted', message: null };
      }

      case 'invalid':
        return rejectField(get, set, field, FIELD_RULES[field].invalidMessage);

      case 'number':
        return commitValue(get, set, field, parsed.value, text.trim());
    }
  }
);

// ============================================================================
// TYPED SETTERS (same checks as the text fields)
// ============================================================================

export const setTimeWindowAtom = atom(null, (get, set, seconds: number): FieldCommitResult =>
  commitNumber(get, set, 'timeWindow', seconds)
);

export const setLabelIntervalAtom = atom(null, (get, set, interval: number): FieldCommitResult =>
  commitNumber(get, set, 'labelInterval', interval)
);

export const setSamplingRateAtom = atom(null, (get, set, hz: number): FieldCommitResult =>
  commitNumber(get, set, 'samplingRate', hz)
);

/**
 * Sets both Y bounds. The pair is checked as a whole first, then committed in
 * the order that keeps min < max true after each step.
 */
export const setYAxisAtom = atom(null, (get, set, range: AxisRange): FieldCommitResult => {
  if (get(autoRangeEnabledAtom)) {
    return { status: 'ignored', message: null };
  }

  const pair = { yAxisMin: range.min, yAxisMax: range.max };
  const error =
    validateFieldValue('yAxisMin', range.min, pair) ?? validateFieldValue('yAxisMax', range.max, pair);
  if (error) {
    set(validationMessageAtom, error);
    return { status: 'rejected', message: error };
  }

  const order: FieldKey[] =
    range.min < get(manualRangeAtom).max ? ['yAxisMin', 'yAxisMax'] : ['yAxisMax', 'yAxisMin'];
  let result: FieldCommitResult = { status: 'committed', message: null };
  for (const field of order) {
    const value = field === 'yAxisMin' ? range.min : range.max;
    result = commitNumber(get, set, field, value);
    if (result.status !== 'committed') break;
  }
  return result;
});

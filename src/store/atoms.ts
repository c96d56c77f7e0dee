import { atom } from 'jotai';
import { selectAtom } from 'jotai/utils';
import type { BridgeStatus, SensorDevice } from '../api/types';
import {
  ALL_SENSOR_IDS,
  getAvailableParameters,
  getEnabledChannels,
  getParameterChannels,
  getParameterInfo,
  isGroupId,
  type ParameterId,
  type SensorId,
} from '../components/Charts/config/chartConfig';
import type { AxisRange, ChartDisplayMode } from '../components/Charts/types';
import {
  DEFAULT_LABEL_INTERVAL,
  DEFAULT_SAMPLING_RATE_HZ,
  DEFAULT_TIME_WINDOW_SECONDS,
} from '../utils/constants';
import { quantizeSamplingRate, type SamplingRateState } from '../utils/samplingRate';
import type { StreamRegistry } from '../utils/streamBuffers';
import { formatFieldValue, type FieldKey } from '../utils/validation';

// ============================================================================
// PRIMITIVE ATOMS - Raw Data Storage
// ============================================================================

/**
 * Bridge WebSocket connection state atoms
 */
export const bridgeConnectedAtom = atom<boolean>(false);
export const bridgeReconnectingAtom = atom<boolean>(false);

/** Last status message from the bridge (device link, streaming flag, rate) */
export const bridgeStatusAtom = atom<BridgeStatus | null>(null);

/** Device the session writes rate changes to; null when streaming from a recording or in tests */
export const deviceAtom = atom<SensorDevice | null>(null);

/** Sensors chosen on the setup screen */
export const enabledSensorsAtom = atom<SensorId[]>([...ALL_SENSOR_IDS]);

/**
 * Buffers of the running session. The registry mutates in place; readers
 * subscribe to chartRevisionAtom to learn that its contents changed.
 */
export const registryAtom = atom<StreamRegistry | null>(null);

export const samplingRateAtom = atom<SamplingRateState>(quantizeSamplingRate(DEFAULT_SAMPLING_RATE_HZ));
export const timeWindowSecondsAtom = atom<number>(DEFAULT_TIME_WINDOW_SECONDS);
export const labelIntervalAtom = atom<number>(DEFAULT_LABEL_INTERVAL);
export const selectedParameterAtom = atom<ParameterId | null>(null);

/**
 * Y axis: the manual range is what the user last committed, the auto range
 * what the calculator last produced. The flag picks the one that is shown.
 */
export const autoRangeEnabledAtom = atom<boolean>(false);
export const manualRangeAtom = atom<AxisRange>({ min: 0, max: 1 });
export const autoRangeAtom = atom<AxisRange>({ min: 0, max: 1 });

export interface EditableField {
  text: string;
  /** Text as typed for the last accepted value; restored on rejection */
  lastValidText: string;
  lastValidValue: number;
}

export type EditableFields = Record<FieldKey, EditableField>;

export function createField(value: number): EditableField {
  const text = formatFieldValue(value);
  return { text, lastValidText: text, lastValidValue: value };
}

export const fieldsAtom = atom<EditableFields>({
  yAxisMin: createField(0),
  yAxisMax: createField(1),
  timeWindow: createField(DEFAULT_TIME_WINDOW_SECONDS),
  labelInterval: createField(DEFAULT_LABEL_INTERVAL),
  samplingRate: createField(DEFAULT_SAMPLING_RATE_HZ),
});

/** Message for the last rejected field edit; null when the last edit was fine */
export const validationMessageAtom = atom<string | null>(null);

/**
 * Refresh notification: incremented after every change that should cause a
 * redraw (new tick, range, window, rate, selection).
 */
export const chartRevisionAtom = atom<number>(0);

/** Frames dropped because they were malformed or incomplete */
export const droppedFramesAtom = atom<number>(0);

/**
 * Device stop/set-rate/start bracket of the latest rate change.
 * Never rejects: failures are logged and swallowed.
 */
export const deviceSyncAtom = atom<Promise<void>>(Promise.resolve());

// ============================================================================
// DERIVED ATOMS - Computed Values
// ============================================================================

export const sessionActiveAtom = atom((get) => get(registryAtom) !== null);

export const yAxisRangeAtom = atom<AxisRange>((get) =>
  get(autoRangeEnabledAtom) ? get(autoRangeAtom) : get(manualRangeAtom)
);

export const enabledChannelsAtom = atom((get) => {
  const registry = get(registryAtom);
  return registry ? registry.channels() : getEnabledChannels(get(enabledSensorsAtom));
});

export const availableParametersAtom = atom((get) => getAvailableParameters(get(enabledSensorsAtom)));

export const selectedChannelsAtom = atom((get) => {
  const param = get(selectedParameterAtom);
  return param ? getParameterChannels(param) : [];
});

export const parameterInfoAtom = atom((get) => {
  const param = get(selectedParameterAtom);
  return param ? getParameterInfo(param) : null;
});

export const chartDisplayModeAtom = selectAtom(
  selectedParameterAtom,
  (param): ChartDisplayMode => (param !== null && isGroupId(param) ? 'multi' : 'single'),
  (a, b) => a === b
);

/** Seconds of signal since the session (or the last rate change) started */
export const elapsedSecondsAtom = atom((get) => {
  get(chartRevisionAtom);
  return get(registryAtom)?.elapsedSeconds ?? 0;
});

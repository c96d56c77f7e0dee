import type { AxisRange } from '../types';

export type SensorId =
  | 'lowNoiseAccel'
  | 'wideRangeAccel'
  | 'gyroscope'
  | 'magnetometer'
  | 'pressureTemperature'
  | 'battery'
  | 'extA6'
  | 'extA7'
  | 'extA15';

export type ChannelId =
  | 'lowNoiseAccelX'
  | 'lowNoiseAccelY'
  | 'lowNoiseAccelZ'
  | 'wideRangeAccelX'
  | 'wideRangeAccelY'
  | 'wideRangeAccelZ'
  | 'gyroscopeX'
  | 'gyroscopeY'
  | 'gyroscopeZ'
  | 'magnetometerX'
  | 'magnetometerY'
  | 'magnetometerZ'
  | 'temperature'
  | 'pressure'
  | 'batteryVoltage'
  | 'batteryPercent'
  | 'extA6'
  | 'extA7'
  | 'extA15';

export type GroupId = 'lowNoiseAccel' | 'wideRangeAccel' | 'gyroscope' | 'magnetometer';

/** Anything the user can put on the chart: one channel or a whole group */
export type ParameterId = ChannelId | GroupId;

/**
 * How a wire field becomes a channel value.
 * - `raw`: used as-is
 * - `millivoltsToVolts`: divided by 1000
 * - `batteryPercent`: millivolts mapped through the Li-ion discharge curve
 */
export type ChannelTransform = 'raw' | 'millivoltsToVolts' | 'batteryPercent';

export interface ChannelConfig {
  id: ChannelId;
  label: string;
  unit: string;
  color: string; // MUI palette path, e.g. "error.main"
  decimals: number;
  sensor: SensorId;
  group?: GroupId;
  /** Static Y bounds used before any data arrives */
  yMin: number;
  yMax: number;
  sourceField: string;
  transform: ChannelTransform;
}

export interface GroupConfig {
  id: GroupId;
  label: string;
  unit: string;
  yMin: number;
  yMax: number;
  channels: readonly ChannelId[];
}

export const CHANNELS: Record<ChannelId, ChannelConfig> = {
  lowNoiseAccelX: {
    id: 'lowNoiseAccelX',
    label: 'Low-Noise Accelerometer X',
    unit: 'm/s²',
    color: 'error.main',
    decimals: 2,
    sensor: 'lowNoiseAccel',
    group: 'lowNoiseAccel',
    yMin: -5,
    yMax: 5,
    sourceField: 'accel_ln_x',
    transform: 'raw',
  },
  lowNoiseAccelY: {
    id: 'lowNoiseAccelY',
    label: 'Low-Noise Accelerometer Y',
    unit: 'm/s²',
    color: 'success.main',
    decimals: 2,
    sensor: 'lowNoiseAccel',
    group: 'lowNoiseAccel',
    yMin: -5,
    yMax: 5,
    sourceField: 'accel_ln_y',
    transform: 'raw',
  },
  lowNoiseAccelZ: {
    id: 'lowNoiseAccelZ',
    label: 'Low-Noise Accelerometer Z',
    unit: 'm/s²',
    color: 'info.main',
    decimals: 2,
    sensor: 'lowNoiseAccel',
    group: 'lowNoiseAccel',
    yMin: -15,
    yMax: 15,
    sourceField: 'accel_ln_z',
    transform: 'raw',
  },
  wideRangeAccelX: {
    id: 'wideRangeAccelX',
    label: 'Wide-Range Accelerometer X',
    unit: 'm/s²',
    color: 'error.main',
    decimals: 2,
    sensor: 'wideRangeAccel',
    group: 'wideRangeAccel',
    yMin: -5,
    yMax: 5,
    sourceField: 'accel_wr_x',
    transform: 'raw',
  },
  wideRangeAccelY: {
    id: 'wideRangeAccelY',
    label: 'Wide-Range Accelerometer Y',
    unit: 'm/s²',
    color: 'success.main',
    decimals: 2,
    sensor: 'wideRangeAccel',
    group: 'wideRangeAccel',
    yMin: -5,
    yMax: 5,
    sourceField: 'accel_wr_y',
    transform: 'raw',
  },
  wideRangeAccelZ: {
    id: 'wideRangeAccelZ',
    label: 'Wide-Range Accelerometer Z',
    unit: 'm/s²',
    color: 'info.main',
    decimals: 2,
    sensor: 'wideRangeAccel',
    group: 'wideRangeAccel',
    yMin: -15,
    yMax: 15,
    sourceField: 'accel_wr_z',
    transform: 'raw',
  },
  gyroscopeX: {
    id: 'gyroscopeX',
    label: 'Gyroscope X',
    unit: 'deg/s',
    color: 'error.main',
    decimals: 1,
    sensor: 'gyroscope',
    group: 'gyroscope',
    yMin: -250,
    yMax: 250,
    sourceField: 'gyro_x',
    transform: 'raw',
  },
  gyroscopeY: {
    id: 'gyroscopeY',
    label: 'Gyroscope Y',
    unit: 'deg/s',
    color: 'success.main',
    decimals: 1,
    sensor: 'gyroscope',
    group: 'gyroscope',
    yMin: -250,
    yMax: 250,
    sourceField: 'gyro_y',
    transform: 'raw',
  },
  gyroscopeZ: {
    id: 'gyroscopeZ',
    label: 'Gyroscope Z',
    unit: 'deg/s',
    color: 'info.main',
    decimals: 1,
    sensor: 'gyroscope',
    group: 'gyroscope',
    yMin: -250,
    yMax: 250,
    sourceField: 'gyro_z',
    transform: 'raw',
  },
  magnetometerX: {
    id: 'magnetometerX',
    label: 'Magnetometer X',
    unit: 'local flux',
    color: 'error.main',
    decimals: 3,
    sensor: 'magnetometer',
    group: 'magnetometer',
    yMin: -5,
    yMax: 5,
    sourceField: 'mag_x',
    transform: 'raw',
  },
  magnetometerY: {
    id: 'magnetometerY',
    label: 'Magnetometer Y',
    unit: 'local flux',
    color: 'success.main',
    decimals: 3,
    sensor: 'magnetometer',
    group: 'magnetometer',
    yMin: -5,
    yMax: 5,
    sourceField: 'mag_y',
    transform: 'raw',
  },
  magnetometerZ: {
    id: 'magnetometerZ',
    label: 'Magnetometer Z',
    unit: 'local flux',
    color: 'info.main',
    decimals: 3,
    sensor: 'magnetometer',
    group: 'magnetometer',
    yMin: -5,
    yMax: 5,
    sourceField: 'mag_z',
    transform: 'raw',
  },
  temperature: {
    id: 'temperature',
    label: 'Temperature',
    unit: '°C',
    color: 'error.main',
    decimals: 2,
    sensor: 'pressureTemperature',
    yMin: 15,
    yMax: 40,
    sourceField: 'temperature_c',
    transform: 'raw',
  },
  pressure: {
    id: 'pressure',
    label: 'Pressure',
    unit: 'kPa',
    color: 'secondary.main',
    decimals: 2,
    sensor: 'pressureTemperature',
    yMin: 90,
    yMax: 110,
    sourceField: 'pressure_kpa',
    transform: 'raw',
  },
  batteryVoltage: {
    id: 'batteryVoltage',
    label: 'Battery Voltage',
    unit: 'V',
    color: 'warning.main',
    decimals: 3,
    sensor: 'battery',
    yMin: 3.3,
    yMax: 4.2,
    sourceField: 'battery_mv',
    transform: 'millivoltsToVolts',
  },
  batteryPercent: {
    id: 'batteryPercent',
    label: 'Battery Percent',
    unit: '%',
    color: 'success.main',
    decimals: 0,
    sensor: 'battery',
    yMin: 0,
    yMax: 100,
    sourceField: 'battery_mv',
    transform: 'batteryPercent',
  },
  extA6: {
    id: 'extA6',
    label: 'External ADC A6',
    unit: 'V',
    color: 'primary.main',
    decimals: 3,
    sensor: 'extA6',
    yMin: 0,
    yMax: 3.3,
    sourceField: 'ext_a6_mv',
    transform: 'millivoltsToVolts',
  },
  extA7: {
    id: 'extA7',
    label: 'External ADC A7',
    unit: 'V',
    color: 'primary.main',
    decimals: 3,
    sensor: 'extA7',
    yMin: 0,
    yMax: 3.3,
    sourceField: 'ext_a7_mv',
    transform: 'millivoltsToVolts',
  },
  extA15: {
    id: 'extA15',
    label: 'External ADC A15',
    unit: 'V',
    color: 'primary.main',
    decimals: 3,
    sensor: 'extA15',
    yMin: 0,
    yMax: 3.3,
    sourceField: 'ext_a15_mv',
    transform: 'millivoltsToVolts',
  },
};

export const GROUPS: Record<GroupId, GroupConfig> = {
  lowNoiseAccel: {
    id: 'lowNoiseAccel',
    label: 'Low-Noise Accelerometer',
    unit: 'm/s²',
    yMin: -20,
    yMax: 20,
    channels: ['lowNoiseAccelX', 'lowNoiseAccelY', 'lowNoiseAccelZ'],
  },
  wideRangeAccel: {
    id: 'wideRangeAccel',
    label: 'Wide-Range Accelerometer',
    unit: 'm/s²',
    yMin: -20,
    yMax: 20,
    channels: ['wideRangeAccelX', 'wideRangeAccelY', 'wideRangeAccelZ'],
  },
  gyroscope: {
    id: 'gyroscope',
    label: 'Gyroscope',
    unit: 'deg/s',
    yMin: -250,
    yMax: 250,
    channels: ['gyroscopeX', 'gyroscopeY', 'gyroscopeZ'],
  },
  magnetometer: {
    id: 'magnetometer',
    label: 'Magnetometer',
    unit: 'local flux',
    yMin: -5,
    yMax: 5,
    channels: ['magnetometerX', 'magnetometerY', 'magnetometerZ'],
  },
};

export const SENSORS: Record<SensorId, { label: string; description: string }> = {
  lowNoiseAccel: { label: 'Low-Noise Accelerometer', description: 'Analog accelerometer, ±2 g' },
  wideRangeAccel: { label: 'Wide-Range Accelerometer', description: 'Digital accelerometer, up to ±16 g' },
  gyroscope: { label: 'Gyroscope', description: 'Angular rate, ±250 deg/s default' },
  magnetometer: { label: 'Magnetometer', description: 'Three-axis magnetic field' },
  pressureTemperature: { label: 'Pressure & Temperature', description: 'Barometric pressure and board temperature' },
  battery: { label: 'Battery', description: 'Battery voltage and estimated charge' },
  extA6: { label: 'External ADC A6', description: 'Expansion connector analog input' },
  extA7: { label: 'External ADC A7', description: 'Expansion connector analog input' },
  extA15: { label: 'External ADC A15', description: 'Expansion connector analog input' },
};

/** Canonical sensor order; also the order of the parameter picker */
export const ALL_SENSOR_IDS: readonly SensorId[] = [
  'lowNoiseAccel',
  'wideRangeAccel',
  'gyroscope',
  'magnetometer',
  'battery',
  'pressureTemperature',
  'extA6',
  'extA7',
  'extA15',
] as const;

const ALL_CHANNEL_IDS = Object.keys(CHANNELS).filter(isChannelId);

export function isChannelId(value: string): value is ChannelId {
  return Object.prototype.hasOwnProperty.call(CHANNELS, value);
}

export function isGroupId(value: string): value is GroupId {
  return Object.prototype.hasOwnProperty.call(GROUPS, value);
}

/** Members of a group, in X/Y/Z order. Unknown names yield an empty list. */
export function getGroupMembers(groupName: string): ChannelId[] {
  return isGroupId(groupName) ? [...GROUPS[groupName].channels] : [];
}

/** Channels that carry data when the given sensors are enabled, in sensor order */
export function getEnabledChannels(sensors: readonly SensorId[]): ChannelId[] {
  const enabled = new Set(sensors);
  return ALL_SENSOR_IDS.filter((s) => enabled.has(s)).flatMap((s) =>
    ALL_CHANNEL_IDS.filter((c) => CHANNELS[c].sensor === s)
  );
}

/**
 * Picker entries for the enabled sensors: each group header followed by its
 * members, then the stand-alone channels.
 */
export function getAvailableParameters(sensors: readonly SensorId[]): ParameterId[] {
  const enabled = new Set(sensors);
  const params: ParameterId[] = [];
  for (const sensor of ALL_SENSOR_IDS) {
    if (!enabled.has(sensor)) continue;
    if (isGroupId(sensor)) params.push(sensor);
    params.push(...ALL_CHANNEL_IDS.filter((c) => CHANNELS[c].sensor === sensor));
  }
  return params;
}

/** Channels drawn for a parameter: the members of a group, or the channel itself */
export function getParameterChannels(param: ParameterId): ChannelId[] {
  return isGroupId(param) ? getGroupMembers(param) : [param];
}

export interface ParameterInfo {
  label: string;
  unit: string;
  title: string;
  defaultRange: AxisRange;
}

export function getParameterInfo(param: ParameterId): ParameterInfo {
  if (isGroupId(param)) {
    const group = GROUPS[param];
    return {
      label: group.label,
      unit: group.unit,
      title: `Real-time ${group.label} (X,Y,Z)`,
      defaultRange: { min: group.yMin, max: group.yMax },
    };
  }
  const channel = CHANNELS[param];
  return {
    label: channel.label,
    unit: channel.unit,
    title: `Real-time ${channel.label}`,
    defaultRange: { min: channel.yMin, max: channel.yMax },
  };
}

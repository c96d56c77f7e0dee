/**
 * Application-wide constants
 * Centralizes magic numbers and configuration values for easier maintenance
 */

// Device Clock
/** Base oscillator of the sensor firmware; every rate is clock / integer divider */
export const DEVICE_CLOCK_HZ = 32768;

// Stream Buffer Configuration
/** Absorbs binary floating-point noise in window × rate products (20 × 51.2 etc.) */
export const CAPACITY_EPSILON = 1e-9;

// Auto-range
/** Spread below which a signal is treated as flat */
export const AUTO_RANGE_FLAT_THRESHOLD = 0.001;
/** Fractional margin added above and below the data */
export const AUTO_RANGE_MARGIN = 0.1;
/** Minimum bound change before the axis is moved */
export const AUTO_RANGE_HYSTERESIS = 0.01;
/** Decimal digits kept on computed bounds */
export const AUTO_RANGE_DECIMALS = 3;

// Field defaults
export const DEFAULT_TIME_WINDOW_SECONDS = 20;
export const DEFAULT_LABEL_INTERVAL = 5;
export const DEFAULT_SAMPLING_RATE_HZ = 51.2;

// Field limits
export const MIN_Y_AXIS = -100_000;
export const MAX_Y_AXIS = 100_000;
export const MIN_TIME_WINDOW_SECONDS = 1;
/** 10 minutes */
export const MAX_TIME_WINDOW_SECONDS = 600;
export const MIN_LABEL_INTERVAL = 1;
export const MAX_LABEL_INTERVAL = 1000;
export const MIN_SAMPLING_RATE_HZ = 1;
export const MAX_SAMPLING_RATE_HZ = 100;

// Timeout Values (milliseconds)
/** Default notification display duration */
export const NOTIFICATION_DURATION = 6000;

/** Chart redraw cadence; ticks in between are drawn together on the next one */
export const CHART_REFRESH_INTERVAL = 250;

// WebSocket Configuration
/** Maximum reconnection interval (milliseconds) */
export const WS_MAX_RECONNECT_INTERVAL = 10000;

/** Base reconnection interval (milliseconds) */
export const WS_BASE_RECONNECT_INTERVAL = 1000;

/** Device bridge host used when VITE_BRIDGE_HOST is not set */
export const DEFAULT_BRIDGE_HOST = 'localhost:8765';

/** Builds the bridge WebSocket URL from VITE_BRIDGE_HOST / VITE_BRIDGE_SECURE */
export function buildWsUrl(path: string, env: ImportMetaEnv = import.meta.env): string {
  const host = env.VITE_BRIDGE_HOST || DEFAULT_BRIDGE_HOST;
  const secure = env.VITE_BRIDGE_SECURE === 'true';
  return `${secure ? 'wss' : 'ws'}://${host}${path}`;
}

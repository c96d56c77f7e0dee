// ============================================================================
// DEVICE COLLABORATOR
// ============================================================================

/**
 * What the stream core needs from a connected sensor.
 * Transport (Bluetooth, serial, bridge) is the implementation's business.
 */
export interface SensorDevice {
  connect(): Promise<void>;
  startStreaming(): Promise<void>;
  stopStreaming(): Promise<void>;
  isConnected(): boolean;
  /** Rate the firmware is programmed with (Hz); writing it reprograms the device */
  samplingRate: number;
}

// ============================================================================
// BRIDGE WIRE FORMAT (JSON over WebSocket)
// ============================================================================

/**
 * One decoded sample tick. Keys are wire field names (see
 * `ChannelConfig.sourceField`); a sensor that is off simply omits its fields.
 */
export type RawFrame = Record<string, number | null>;

export interface BridgeStatus {
  connected: boolean;
  streaming: boolean;
  sampling_rate_hz: number;
  device_name?: string;
}

export type BridgeInboundMessage =
  | { type: 'frame'; data: RawFrame }
  | { type: 'status'; data: BridgeStatus }
  | { type: 'error'; data: { message: string } };

export type BridgeCommand =
  | { type: 'connect' }
  | { type: 'start' }
  | { type: 'stop' }
  | { type: 'set_sampling_rate'; hz: number };

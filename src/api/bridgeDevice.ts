import { DEFAULT_SAMPLING_RATE_HZ } from '../utils/constants';
import { DeviceBridgeError } from './errors';
import type { BridgeCommand, BridgeStatus, SensorDevice } from './types';

/**
 * SensorDevice backed by the WebSocket bridge.
 * The socket itself is owned by `useDeviceBridge`, which attaches its send
 * function here and feeds back status messages. Commands are fire-and-forget:
 * a promise resolves once the command is handed to the socket.
 */
export class BridgeDevice implements SensorDevice {
  private send: ((message: string) => void) | null = null;
  private status: BridgeStatus | null = null;
  private rate: number;

  constructor(initialRateHz: number = DEFAULT_SAMPLING_RATE_HZ) {
    this.rate = initialRateHz;
  }

  attach(send: (message: string) => void): void {
    this.send = send;
  }

  detach(): void {
    this.send = null;
    this.status = null;
  }

  updateStatus(status: BridgeStatus): void {
    this.status = status;
    this.rate = status.sampling_rate_hz;
  }

  isConnected(): boolean {
    return this.send !== null && this.status?.connected === true;
  }

  async connect(): Promise<void> {
    this.dispatch({ type: 'connect' });
  }

  async startStreaming(): Promise<void> {
    this.dispatch({ type: 'start' });
  }

  async stopStreaming(): Promise<void> {
    this.dispatch({ type: 'stop' });
  }

  get samplingRate(): number {
    return this.rate;
  }

  /** Recorded locally even while detached; sent to the bridge when attached */
  set samplingRate(hz: number) {
    this.rate = hz;
    if (this.send) {
      this.dispatch({ type: 'set_sampling_rate', hz });
    }
  }

  private dispatch(command: BridgeCommand): void {
    if (!this.send) {
      throw new DeviceBridgeError(`Cannot send "${command.type}": bridge socket is not open`);
    }
    this.send(JSON.stringify(command));
  }
}

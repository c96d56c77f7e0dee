import { describe, expect, it, vi } from 'vitest';
import { BridgeDevice } from './bridgeDevice';
import { DeviceBridgeError } from './errors';

const status = { connected: true, streaming: false, sampling_rate_hz: 51.2, device_name: 'test-device' };

describe('BridgeDevice', () => {
  it('rejects commands while no socket is attached', async () => {
    const device = new BridgeDevice();
    await expect(device.connect()).rejects.toBeInstanceOf(DeviceBridgeError);
    await expect(device.startStreaming()).rejects.toThrow('Cannot send "start": bridge socket is not open');
  });

  it('records the rate locally while detached', () => {
    const device = new BridgeDevice();
    device.samplingRate = 100;
    expect(device.samplingRate).toBe(100);
  });

  it('sends commands as JSON once attached', async () => {
    const send = vi.fn();
    const device = new BridgeDevice();
    device.attach(send);

    await device.startStreaming();
    device.samplingRate = 50;
    await device.stopStreaming();

    expect(send.mock.calls).toEqual([
      ['{"type":"start"}'],
      ['{"type":"set_sampling_rate","hz":50}'],
      ['{"type":"stop"}'],
    ]);
  });

  it('is connected only with a socket and a linked device', () => {
    const device = new BridgeDevice();
    device.updateStatus(status);
    expect(device.isConnected()).toBe(false);

    device.attach(vi.fn());
    expect(device.isConnected()).toBe(true);
    expect(device.samplingRate).toBe(51.2);

    device.detach();
    expect(device.isConnected()).toBe(false);
  });
});

import { useEffect, useRef } from 'react';
import { useSetAtom, useStore } from 'jotai';
import useWebSocket, { ReadyState } from 'react-use-websocket';
import { BridgeDevice } from '../api/bridgeDevice';
import { parseBridgeMessage } from '../api/frames';
import type { BridgeInboundMessage } from '../api/types';
import {
  bridgeConnectedAtom,
  bridgeReconnectingAtom,
  bridgeStatusAtom,
} from '../store/atoms';
import { ingestFrameAtom } from '../store/session';
import { logger } from '../utils/logger';
import { buildWsUrl, WS_BASE_RECONNECT_INTERVAL, WS_MAX_RECONNECT_INTERVAL } from '../utils/constants';

/**
 * One BridgeDevice per page. The setup screen hands it to the session, and
 * this hook keeps it wired to whatever socket is currently open.
 */
export const bridgeDevice = new BridgeDevice();

/**
 * WebSocket connection to the sensor bridge
 *
 * - Exponential backoff reconnection (1s → 10s cap), never gives up
 * - Frames go straight into the stream registry through ingestFrameAtom
 * - Status messages update bridgeStatusAtom and the shared BridgeDevice
 */
export function useDeviceBridge() {
  const store = useStore();
  const setConnected = useSetAtom(bridgeConnectedAtom);
  const setReconnecting = useSetAtom(bridgeReconnectingAtom);
  const setStatus = useSetAtom(bridgeStatusAtom);

  // Frames arrive at the sampling rate; write through the store so the hook
  // itself does not re-render per tick
  const handleMessageRef = useRef<(message: BridgeInboundMessage) => void>(() => undefined);
  handleMessageRef.current = (message) => {
    switch (message.type) {
      case 'frame':
        store.set(ingestFrameAtom, message.data);
        break;
      case 'status':
        bridgeDevice.updateStatus(message.data);
        setStatus(message.data);
        break;
      case 'error':
        logger.error('[Bridge] Device error:', message.data.message);
        break;
    }
  };

  const { sendMessage, readyState } = useWebSocket(buildWsUrl('/ws'), {
    shouldReconnect: () => true,
    reconnectAttempts: Infinity,
    reconnectInterval: (attemptNumber) =>
      Math.min(Math.pow(2, attemptNumber) * WS_BASE_RECONNECT_INTERVAL, WS_MAX_RECONNECT_INTERVAL),

    onOpen: () => {
      logger.log('[Bridge] Connected');
      setConnected(true);
      setReconnecting(false);
    },

    onClose: () => {
      logger.log('[Bridge] Disconnected');
      setConnected(false);
      setStatus(null);
    },

    onError: (event) => {
      logger.error('[Bridge] Connection error:', event);
      setReconnecting(true);
    },

    onMessage: (event: MessageEvent<unknown>) => {
      if (typeof event.data !== 'string') {
        logger.warn('[Bridge] Ignoring binary message');
        return;
      }
      const message = parseBridgeMessage(event.data);
      if (!message) {
        logger.warn('[Bridge] Unknown message:', event.data);
        return;
      }
      handleMessageRef.current(message);
    },

    share: true,
  });

  useEffect(() => {
    if (readyState === ReadyState.OPEN) {
      bridgeDevice.attach((text) => sendMessage(text));
    } else {
      bridgeDevice.detach();
    }
    setReconnecting(readyState === ReadyState.CONNECTING);
  }, [readyState, sendMessage, setReconnecting]);

  return {
    readyState,
    isConnected: readyState === ReadyState.OPEN,
    isConnecting: readyState === ReadyState.CONNECTING,
  };
}

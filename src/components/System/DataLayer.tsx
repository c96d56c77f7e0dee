import { useDeviceBridge } from '../../hooks/useDeviceBridge';

/**
 * Bridges the sensor WebSocket into Jotai atoms without causing app-wide
 * re-renders. Mount once at the app root so streaming survives route changes.
 */
export function DataLayer() {
  useDeviceBridge();
  return null;
}

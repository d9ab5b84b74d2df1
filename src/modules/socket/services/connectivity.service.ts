/**
 * Connectivity Service
 * Publishes per-device session state for external monitoring
 */

import { EventEmitter } from 'events';
import { logger } from '@/shared/utils';
import { SessionState, type ConnectivityStatusSink, type ConnectivityUpdate } from '../types';

export const CONNECTIVITY_EVENT = 'device_state_changed';

export interface DeviceStatus {
  deviceId: string;
  sessionId: string;
  state: SessionState;
  connected: boolean;
  lastChange: number;
  reason?: string;
}

/**
 * Keeps the latest status per device and re-emits every update.
 * Subscribers attach with `on(CONNECTIVITY_EVENT, listener)`.
 */
export class ConnectivityService extends EventEmitter implements ConnectivityStatusSink {
  private statuses: Map<string, DeviceStatus> = new Map();

  publish(update: ConnectivityUpdate): void {
    const previous = this.statuses.get(update.deviceId);

    // A superseded session closing after its replacement connected must not
    // mark the device as disconnected
    if (
      previous &&
      previous.sessionId !== update.sessionId &&
      previous.connected &&
      !update.connected
    ) {
      logger.debug('Ignoring stale connectivity update', {
        deviceId: update.deviceId,
        sessionId: update.sessionId,
        currentSessionId: previous.sessionId,
      });
    } else {
      this.statuses.set(update.deviceId, {
        deviceId: update.deviceId,
        sessionId: update.sessionId,
        state: update.state,
        connected: update.connected,
        lastChange: update.timestamp,
        reason: update.reason,
      });
    }

    if (previous?.connected !== update.connected) {
      logger.info(update.connected ? 'Device connected' : 'Device disconnected', {
        deviceId: update.deviceId,
        sessionId: update.sessionId,
        reason: update.reason,
      });
    }

    this.emit(CONNECTIVITY_EVENT, update);
  }

  getStatus(deviceId: string): DeviceStatus | undefined {
    return this.statuses.get(deviceId);
  }

  listStatuses(): DeviceStatus[] {
    return Array.from(this.statuses.values());
  }

  isConnected(deviceId: string): boolean {
    return this.statuses.get(deviceId)?.connected ?? false;
  }

  cleanup(): void {
    this.statuses.clear();
    this.removeAllListeners();
  }
}

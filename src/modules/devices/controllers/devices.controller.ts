/**
 * Devices Controller
 * Server-side operations on connected devices
 */

import { protocolConfig } from '@/shared/config';
import { logger } from '@/shared/utils';
import type { ConnectivityService, SessionRegistry } from '@/modules/socket';
import type {
  DeviceConfigDocument,
  DeviceEndpointSettings,
  DeviceStatusView,
  SpeakOutcome,
} from '../types';

export class DevicesController {
  constructor(
    private readonly registry: SessionRegistry,
    private readonly connectivity: ConnectivityService,
    private readonly endpoint: DeviceEndpointSettings
  ) {}

  /**
   * Push text to a connected device to be spoken.
   * Queued until the device's session is idle.
   */
  speak(deviceId: string, message: string): SpeakOutcome {
    const session = this.registry.lookup(deviceId);
    if (!session) {
      logger.info('Speak request for unknown device', { deviceId });
      return 'not_connected';
    }

    const result = session.announce(message);
    logger.info('Speak request', { deviceId, sessionId: session.sessionId, result });

    switch (result) {
      case 'queued':
        return 'queued';
      case 'queue_full':
        return 'queue_full';
      case 'not_ready':
        return 'not_connected';
    }
  }

  listDevices(): DeviceStatusView[] {
    return this.connectivity.listStatuses().map((status) => ({
      device_id: status.deviceId,
      session_id: status.sessionId,
      state: status.state,
      connected: status.connected,
      last_change: status.lastChange,
      reason: status.reason,
    }));
  }

  getDeviceConfig(deviceId: string): DeviceConfigDocument {
    const audio = protocolConfig.defaultAudio;
    return {
      device_id: deviceId,
      websocket_url: this.buildWebSocketUrl(),
      reconnect_interval: this.endpoint.reconnectIntervalMs,
      ping_interval: this.endpoint.heartbeatIntervalMs,
      audio_params: {
        format: audio.format,
        sample_rate: audio.sampleRate,
        channels: audio.channels,
        frame_duration: audio.frameDurationMs,
      },
    };
  }

  /**
   * http -> ws, https -> wss. A plain-http URL without a port gets the
   * server's own port; https is assumed to sit behind a proxy on 443.
   */
  private buildWebSocketUrl(): string {
    const url = new URL(this.endpoint.publicUrl);
    const secure = url.protocol === 'https:' || url.protocol === 'wss:';

    url.protocol = secure ? 'wss:' : 'ws:';
    if (!url.port && !secure) {
      url.port = String(this.endpoint.port);
    }
    url.pathname = this.endpoint.path;
    url.search = '';
    url.hash = '';

    return url.toString();
  }
}

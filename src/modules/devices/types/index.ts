/**
 * Device API Types
 */

import type { SessionState } from '@/modules/socket';

export type SpeakOutcome = 'queued' | 'not_connected' | 'queue_full';

/**
 * Document a device fetches to learn how to reach the voice endpoint
 */
export interface DeviceConfigDocument {
  device_id: string;
  websocket_url: string;
  reconnect_interval: number;
  ping_interval: number;
  audio_params: {
    format: string;
    sample_rate: number;
    channels: number;
    frame_duration: number;
  };
}

export interface DeviceStatusView {
  device_id: string;
  session_id: string;
  state: SessionState;
  connected: boolean;
  last_change: number;
  reason?: string;
}

export interface DeviceEndpointSettings {
  publicUrl: string;
  port: number;
  path: string;
  reconnectIntervalMs: number;
  heartbeatIntervalMs: number;
}

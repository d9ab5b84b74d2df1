/**
 * WebSocket Configuration
 * Device socket, liveness and audio settings
 */

import { env } from './env';

// ~60s of 16kHz opus at generous bitrate; a listen span above this is refused
const MAX_LISTEN_BYTES = 2 * 1024 * 1024;

/**
 * WebSocket server configuration
 */
export const websocketConfig = {
  // WebSocket path devices connect to
  path: env.WEBSOCKET_PATH,

  // Above the listen span cap, so an oversized audio frame is reported as
  // audio_span_too_large instead of a bare 1009 close from ws
  maxPayload: MAX_LISTEN_BYTES + 64 * 1024,

  // Per-message deflate compression
  perMessageDeflate: false, // Disable for lower latency with binary data

  // Client tracking
  clientTracking: true,
};

/**
 * WebSocket server shutdown configuration
 */
export const websocketShutdownConfig = {
  // Timeout for graceful shutdown (milliseconds)
  shutdownTimeout: 5000,

  // Maximum number of concurrent connections
  maxConnections: 1000,
};

/**
 * Heartbeat / liveness configuration
 */
export interface LivenessConfig {
  heartbeatIntervalMs: number;
  timeoutMultiple: number;
}

export const livenessConfig: LivenessConfig = {
  heartbeatIntervalMs: env.HEARTBEAT_INTERVAL_MS,
  timeoutMultiple: env.HEARTBEAT_TIMEOUT_MULTIPLE,
};

/**
 * Protocol and audio defaults negotiated at hello time
 */
export interface ProtocolConfig {
  supportedVersions: readonly number[];
  supportedSampleRates: readonly number[];
  defaultAudio: {
    format: string;
    sampleRate: number;
    bitDepth: number;
    channels: number;
    frameDurationMs: number;
  };
  maxListenBytes: number;
  maxPendingAnnouncements: number;
}

export const protocolConfig: ProtocolConfig = {
  supportedVersions: [1],

  // Accepted `audio_params.sample_rate` values
  supportedSampleRates: [8000, 16000, 24000, 48000],

  defaultAudio: {
    format: 'opus',
    sampleRate: 16000,
    bitDepth: 16,
    channels: 1,
    frameDurationMs: 60,
  },

  maxListenBytes: MAX_LISTEN_BYTES,

  // Server-initiated speech cycles waiting for the session to become idle
  maxPendingAnnouncements: 8,
};

/**
 * Application-defined WebSocket close codes (4000-4999 range)
 */
export const CLOSE_CODES = {
  GOING_AWAY: 1001,
  SUPERSEDED: 4001,
  PROTOCOL_VIOLATION: 4002,
  TIMEOUT: 4008,
} as const;

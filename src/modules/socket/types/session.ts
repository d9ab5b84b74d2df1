/**
 * Session Management Types
 */

// ============================================================================
// Session State
// ============================================================================

export enum SessionState {
  CONNECTING = 'connecting', // Socket open, hello not yet accepted
  IDLE = 'idle',             // Handshake complete, awaiting activity
  LISTENING = 'listening',   // Receiving inbound audio
  PROCESSING = 'processing', // Audio span closed, awaiting pipeline result
  SPEAKING = 'speaking',     // Relaying synthesized audio
  ERROR = 'error',           // Protocol violation, about to close
  CLOSED = 'closed',         // Terminal
}

/**
 * Every transition the state machine may take. Anything else is a bug.
 */
export const ALLOWED_TRANSITIONS: Readonly<Record<SessionState, readonly SessionState[]>> = {
  [SessionState.CONNECTING]: [SessionState.IDLE, SessionState.ERROR, SessionState.CLOSED],
  [SessionState.IDLE]: [
    SessionState.LISTENING,
    SessionState.PROCESSING, // text request
    SessionState.SPEAKING,
    SessionState.ERROR,
    SessionState.CLOSED,
  ],
  [SessionState.LISTENING]: [
    SessionState.PROCESSING,
    SessionState.IDLE,
    SessionState.ERROR,
    SessionState.CLOSED,
  ],
  [SessionState.PROCESSING]: [
    SessionState.IDLE,
    SessionState.SPEAKING,
    SessionState.ERROR,
    SessionState.CLOSED,
  ],
  [SessionState.SPEAKING]: [SessionState.IDLE, SessionState.ERROR, SessionState.CLOSED],
  [SessionState.ERROR]: [SessionState.CLOSED],
  [SessionState.CLOSED]: [],
};

export function isTransitionAllowed(from: SessionState, to: SessionState): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

// ============================================================================
// Identity & Audio
// ============================================================================

/** Accepted form of `device_id` and `client_id` */
export const DEVICE_IDENTIFIER_PATTERN = /^[A-Za-z0-9._:-]{1,64}$/;

export interface DeviceIdentity {
  readonly deviceId: string;
  readonly clientId: string;
}

export interface AudioFormat {
  format: string;
  sampleRate: number;
  bitDepth: number;
  channels: number;
  frameDurationMs: number;
}

// ============================================================================
// Session Snapshot
// ============================================================================

export interface SessionInfo {
  sessionId: string;
  connectionId: string;
  identity?: DeviceIdentity;
  protocolVersion?: number;
  state: SessionState;
  createdAt: number;
  lastActivity: number;
  exchangeId?: string;
  audioFormat: AudioFormat;
  pendingAnnouncements: number;
}

export interface SessionMetadata {
  ipAddress?: string;        // Client IP address
  userAgent?: string;        // Client user agent
}

// ============================================================================
// Connectivity
// ============================================================================

export interface ConnectivityUpdate {
  deviceId: string;
  sessionId: string;
  state: SessionState;
  connected: boolean;
  reason?: string;
  timestamp: number;
}

/**
 * Receives a notification on every state transition of an identified session
 */
export interface ConnectivityStatusSink {
  publish(update: ConnectivityUpdate): void;
}

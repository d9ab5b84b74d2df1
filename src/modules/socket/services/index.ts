/**
 * Socket Services
 * Centralized exports for all socket-related services
 */

export { SessionRegistry } from './session-registry.service';
export type { AnnounceResult, RegisteredSession } from './session-registry.service';
export { ConnectivityService, CONNECTIVITY_EVENT } from './connectivity.service';
export type { DeviceStatus } from './connectivity.service';
export { LivenessMonitor } from './liveness.service';
export type { LivenessHandlers } from './liveness.service';
export {
  InboundAudioBuffer,
  OutboundAudioStream,
  AudioSpanError,
  AudioSpanOverflowError,
  iterateFrames,
} from './audio-buffer.service';
export { DeviceSession, IllegalTransitionError, DEFAULT_PROTOCOL_SETTINGS } from './device-session';
export type { DeviceSessionDeps, ProtocolSettings } from './device-session';
export { WebSocketTransport } from './websocket-transport';

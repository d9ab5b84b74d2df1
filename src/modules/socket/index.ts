/**
 * Socket Module - Public API
 *
 * Only export what other modules should use.
 */

// Server initialization and stats
export { initializeSocketServer, shutdownSocketServer, getSocketStats } from './socket.server';
export type { SocketGateway, SocketServerOptions, SocketStats } from './socket.server';

export {
  SessionRegistry,
  ConnectivityService,
  CONNECTIVITY_EVENT,
  DeviceSession,
} from './services';
export type { AnnounceResult, DeviceStatus, ProtocolSettings, RegisteredSession } from './services';

export { SessionState, CONTROL_MESSAGE_TYPES, DEVICE_IDENTIFIER_PATTERN } from './types';
export type {
  AudioFormat,
  ConnectivityStatusSink,
  ConnectivityUpdate,
  ControlMessage,
  DeviceIdentity,
  ServerMessage,
  SessionInfo,
  SessionMetadata,
  SessionTransport,
} from './types';

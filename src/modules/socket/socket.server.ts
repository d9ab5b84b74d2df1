/**
 * Device WebSocket Server
 * One DeviceSession per accepted connection
 */

import { WebSocketServer, type RawData, type WebSocket } from 'ws';
import type { IncomingMessage, Server as HTTPServer } from 'http';
import { ErrorCode } from '@/shared/errors';
import { errorMessage, generateId, logger } from '@/shared/utils';
import {
  CLOSE_CODES,
  livenessConfig,
  websocketConfig,
  websocketShutdownConfig,
  type LivenessConfig,
} from '@/shared/config';
import type { PipelineBridge } from '@/modules/pipeline';
import {
  ConnectivityService,
  DeviceSession,
  SessionRegistry,
  WebSocketTransport,
  type ProtocolSettings,
} from './services';
import { handleWebSocketMessage, sendError } from './handlers';
import { SessionState, type SessionMetadata } from './types';

export interface SocketServerOptions {
  bridge: PipelineBridge;
  registry?: SessionRegistry;
  connectivity?: ConnectivityService;
  path?: string;
  liveness?: LivenessConfig;
  protocol?: Partial<ProtocolSettings>;
  maxConnections?: number;
  shutdownTimeoutMs?: number;
}

/**
 * Everything the device endpoint owns. Passed to the HTTP layer so it can
 * reach live sessions without any module-level state.
 */
export interface SocketGateway {
  wss: WebSocketServer;
  registry: SessionRegistry;
  connectivity: ConnectivityService;
  bridge: PipelineBridge;
  /** Live sessions by connection id, including ones still in handshake */
  sessions: Map<string, DeviceSession>;
  maxConnections: number;
  shutdownTimeoutMs: number;
  liveness: LivenessConfig;
  protocol?: Partial<ProtocolSettings>;
}

/**
 * Initialize WebSocket server
 */
export function initializeSocketServer(
  httpServer: HTTPServer,
  options: SocketServerOptions
): SocketGateway {
  const path = options.path ?? websocketConfig.path;
  logger.info('Initializing device WebSocket server', { path, pipeline: options.bridge.pipelineName });

  const wss = new WebSocketServer({
    server: httpServer,
    path,
    maxPayload: websocketConfig.maxPayload,
    perMessageDeflate: websocketConfig.perMessageDeflate,
    clientTracking: websocketConfig.clientTracking,
  });

  const gateway: SocketGateway = {
    wss,
    registry: options.registry ?? new SessionRegistry(),
    connectivity: options.connectivity ?? new ConnectivityService(),
    bridge: options.bridge,
    sessions: new Map(),
    maxConnections: options.maxConnections ?? websocketShutdownConfig.maxConnections,
    shutdownTimeoutMs: options.shutdownTimeoutMs ?? websocketShutdownConfig.shutdownTimeout,
    liveness: options.liveness ?? livenessConfig,
    protocol: options.protocol,
  };

  wss.on('connection', (ws: WebSocket, request: IncomingMessage) => {
    handleConnection(gateway, ws, request);
  });

  wss.on('error', (error: Error) => {
    logger.error('WebSocket server error', { error: error.message });
  });

  logger.info('WebSocket server initialized successfully');

  return gateway;
}

/**
 * Handle new WebSocket connection
 */
function handleConnection(gateway: SocketGateway, ws: WebSocket, request: IncomingMessage): void {
  const connectionId = generateId();
  const metadata: SessionMetadata = {
    ipAddress: request.socket.remoteAddress,
    userAgent: request.headers['user-agent'],
  };
  const transport = new WebSocketTransport(ws, `device ${connectionId}`);

  if (gateway.sessions.size >= gateway.maxConnections) {
    logger.warn('Connection limit reached, rejecting device', {
      connectionId,
      limit: gateway.maxConnections,
      ...metadata,
    });
    sendError(transport, ErrorCode.SERVER_ERROR, 'Server at capacity', { sessionId: connectionId })
      .finally(() => transport.close(CLOSE_CODES.GOING_AWAY, 'server at capacity'))
      .catch((error: unknown) => {
        logger.warn('Failed to reject connection', { connectionId, error: errorMessage(error) });
      });
    return;
  }

  const session = new DeviceSession({
    connectionId,
    transport,
    registry: gateway.registry,
    bridge: gateway.bridge,
    connectivity: gateway.connectivity,
    liveness: gateway.liveness,
    protocol: gateway.protocol,
    onClosed: (closed) => {
      gateway.sessions.delete(closed.connectionId);
    },
  });
  gateway.sessions.set(connectionId, session);

  logger.info('Device connected', {
    connectionId,
    sessionId: session.sessionId,
    ...metadata,
  });

  ws.on('message', (data: RawData, isBinary: boolean) => {
    handleWebSocketMessage(session, data, isBinary).catch((error: unknown) => {
      logger.error('Error handling device frame', {
        connectionId,
        sessionId: session.sessionId,
        error: errorMessage(error),
      });
    });
  });

  ws.on('close', (code: number, reason: Buffer) => {
    logger.info('Device disconnected', {
      connectionId,
      sessionId: session.sessionId,
      deviceId: session.getIdentity()?.deviceId,
      code,
      reason: reason.toString(),
    });
    session.handleTransportClosed(code, reason.toString());
  });

  ws.on('error', (error: Error) => {
    session.handleTransportError(error);
  });

  session.start();
}

export interface SocketStats {
  totalConnections: number;
  identifiedSessions: number;
  sessionsByState: Record<string, number>;
  pipeline: ReturnType<PipelineBridge['getMetrics']>;
}

/**
 * Get socket server statistics
 * Exposed for health checks and monitoring
 */
export function getSocketStats(gateway: SocketGateway): SocketStats {
  const sessionsByState: Record<string, number> = {};
  for (const state of Object.values(SessionState)) {
    sessionsByState[state] = 0;
  }
  for (const session of gateway.sessions.values()) {
    const state = session.getState();
    sessionsByState[state] = (sessionsByState[state] ?? 0) + 1;
  }

  return {
    totalConnections: gateway.wss.clients.size,
    identifiedSessions: gateway.registry.size(),
    sessionsByState,
    pipeline: gateway.bridge.getMetrics(),
  };
}

/**
 * Graceful shutdown for WebSocket server
 */
export async function shutdownSocketServer(gateway: SocketGateway): Promise<void> {
  logger.info('Shutting down WebSocket server', { sessions: gateway.sessions.size });

  const closed = Array.from(gateway.wss.clients).map(
    (ws) =>
      new Promise<void>((resolve) => {
        ws.once('close', () => resolve());
      })
  );

  for (const session of Array.from(gateway.sessions.values())) {
    session.shutdown();
  }

  let timer: NodeJS.Timeout | undefined;
  const timedOut = new Promise<'timeout'>((resolve) => {
    timer = setTimeout(() => resolve('timeout'), gateway.shutdownTimeoutMs);
  });

  const result = await Promise.race([Promise.all(closed).then(() => 'closed' as const), timedOut]);
  clearTimeout(timer);

  if (result === 'timeout') {
    logger.warn('WebSocket clients force closed after timeout');
    for (const ws of gateway.wss.clients) {
      ws.terminate();
    }
  }

  gateway.registry.clear();

  await new Promise<void>((resolve) => {
    gateway.wss.close(() => {
      logger.info('WebSocket server closed');
      resolve();
    });
  });
}

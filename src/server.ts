/**
 * Server Composition
 * Express app, HTTP server and device WebSocket endpoint, wired together
 */

import express, { type Express } from 'express';
import { createServer, type Server as HTTPServer } from 'http';
import cors from 'cors';
import { env, livenessConfig, type LivenessConfig } from '@/shared/config';
import { logger } from '@/shared/utils';
import {
  initializeSocketServer,
  shutdownSocketServer,
  getSocketStats,
  type ProtocolSettings,
  type SocketGateway,
} from '@/modules/socket';
import { PipelineBridge, createPipeline, type ConversationPipeline } from '@/modules/pipeline';
import { DevicesController, createDevicesRouter } from '@/modules/devices';

export interface ServerOptions {
  pipeline?: ConversationPipeline;
  pipelineTimeoutMs?: number;
  websocketPath?: string;
  publicUrl?: string;
  liveness?: LivenessConfig;
  protocol?: Partial<ProtocolSettings>;
  reconnectIntervalMs?: number;
  shutdownTimeoutMs?: number;
}

export interface VoiceServer {
  app: Express;
  httpServer: HTTPServer;
  gateway: SocketGateway;
  devices: DevicesController;
  /** Resolves with the bound port */
  listen(port: number): Promise<number>;
  close(): Promise<void>;
}

export function createVoiceServer(options: ServerOptions = {}): VoiceServer {
  const pipeline = options.pipeline ?? createPipeline();
  const bridge = new PipelineBridge(pipeline, {
    timeoutMs: options.pipelineTimeoutMs ?? env.PIPELINE_TIMEOUT_MS,
  });
  const liveness = options.liveness ?? livenessConfig;
  const path = options.websocketPath ?? env.WEBSOCKET_PATH;

  const app = express();
  app.use(cors());
  app.use(express.json());

  const httpServer = createServer(app);
  const gateway = initializeSocketServer(httpServer, {
    bridge,
    path,
    liveness,
    protocol: options.protocol,
    shutdownTimeoutMs: options.shutdownTimeoutMs,
  });

  let boundPort = env.PORT;
  const devices = new DevicesController(gateway.registry, gateway.connectivity, {
    publicUrl: options.publicUrl ?? env.PUBLIC_URL,
    get port() {
      return boundPort;
    },
    path,
    reconnectIntervalMs: options.reconnectIntervalMs ?? env.DEVICE_RECONNECT_INTERVAL_MS,
    heartbeatIntervalMs: liveness.heartbeatIntervalMs,
  });

  // Health check endpoint
  app.get('/health', (_req, res) => {
    const stats = getSocketStats(gateway);
    res.json({
      status: 'ok',
      uptime: process.uptime(),
      pipeline: bridge.pipelineName,
      websocketServer: {
        path,
        totalConnections: stats.totalConnections,
        identifiedSessions: stats.identifiedSessions,
        sessionsByState: stats.sessionsByState,
      },
      exchanges: stats.pipeline,
    });
  });

  app.use('/api/devices', createDevicesRouter(devices));

  const listen = (port: number): Promise<number> =>
    new Promise<number>((resolve, reject) => {
      httpServer.once('error', reject);
      httpServer.listen(port, () => {
        httpServer.off('error', reject);
        const address = httpServer.address();
        boundPort = typeof address === 'object' && address !== null ? address.port : port;
        resolve(boundPort);
      });
    });

  const close = async (): Promise<void> => {
    // Sessions first (1001 to every device), then stop accepting HTTP
    await shutdownSocketServer(gateway);
    if (httpServer.listening) {
      await new Promise<void>((resolve, reject) => {
        httpServer.close((error) => (error ? reject(error) : resolve()));
        httpServer.closeAllConnections();
      });
    }
    gateway.connectivity.cleanup();
    logger.info('Server closed');
  };

  return { app, httpServer, gateway, devices, listen, close };
}

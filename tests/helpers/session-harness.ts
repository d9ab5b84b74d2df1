/**
 * Builds a DeviceSession wired to in-process fakes
 */

import type { LivenessConfig } from '@/shared/config';
import { PipelineBridge, type ConversationPipeline } from '@/modules/pipeline';
import { DeviceSession, SessionRegistry, type ProtocolSettings } from '@/modules/socket/services';
import { handleWebSocketMessage } from '@/modules/socket/handlers';
import type { ConnectivityStatusSink } from '@/modules/socket/types';
import { FakeTransport, RecordingSink, ScriptedPipeline } from './fakes';

export interface HarnessOptions {
  transport?: FakeTransport;
  pipeline?: ConversationPipeline;
  registry?: SessionRegistry;
  connectivity?: ConnectivityStatusSink;
  bridge?: PipelineBridge;
  liveness?: LivenessConfig;
  protocol?: Partial<ProtocolSettings>;
  pipelineTimeoutMs?: number;
  connectionId?: string;
}

export function createHarness(options: HarnessOptions = {}) {
  const transport = options.transport ?? new FakeTransport();
  const registry = options.registry ?? new SessionRegistry();
  const sink = new RecordingSink();
  const pipeline = options.pipeline ?? new ScriptedPipeline();
  const bridge =
    options.bridge ?? new PipelineBridge(pipeline, { timeoutMs: options.pipelineTimeoutMs ?? 1000 });

  const session = new DeviceSession({
    connectionId: options.connectionId ?? 'conn-1',
    transport,
    registry,
    bridge,
    connectivity: options.connectivity ?? sink,
    liveness: options.liveness ?? { heartbeatIntervalMs: 1000, timeoutMultiple: 2 },
    protocol: options.protocol,
  });

  const sendJson = (message: Record<string, unknown>): Promise<void> =>
    handleWebSocketMessage(session, Buffer.from(JSON.stringify(message)), false);

  const sendText = (text: string): Promise<void> => handleWebSocketMessage(session, Buffer.from(text), false);

  const sendAudio = (bytes: number[]): Promise<void> =>
    handleWebSocketMessage(session, Buffer.from(bytes), true);

  const hello = (overrides: Record<string, unknown> = {}): Promise<void> =>
    sendJson({ type: 'hello', version: 1, device_id: 'dev1', client_id: 'client-a', ...overrides });

  return { session, transport, registry, sink, bridge, pipeline, sendJson, sendText, sendAudio, hello };
}

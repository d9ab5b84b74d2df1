/**
 * Pipeline Module Public Exports
 */

export { PipelineBridge } from './services/pipeline-bridge.service';
export type { ExchangeOutcome, PipelineBridgeOptions } from './services/pipeline-bridge.service';
export { createPipeline } from './pipeline.factory';
export { EchoPipeline, ForwardingPipeline } from './adapters';

export type {
  ConversationPipeline,
  ConverseRequest,
  TextConverseRequest,
  SpeakRequest,
  PipelineEvent,
  ExchangeSink,
  PipelineBridgeMetrics,
} from './types';

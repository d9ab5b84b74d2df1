/**
 * Conversational Pipeline Types
 * Contract with the external pipeline collaborator
 */

import type { AudioFormat, DeviceIdentity } from '@/modules/socket/types';
import type { PipelineFailureError } from '@/shared/errors';

/**
 * One event in the pipeline's output stream
 */
export type PipelineEvent =
  | { type: 'transcript'; text: string; isFinal: boolean }
  | { type: 'reply'; text: string }
  | { type: 'audio'; chunk: Uint8Array }
  | { type: 'complete' }
  | { type: 'error'; message: string; code?: string };

export interface ConverseRequest {
  identity: DeviceIdentity;
  /** The closed listen span, in arrival order */
  audio: AsyncIterable<Uint8Array>;
  audioFormat: AudioFormat;
  /** Wake word reported by the device before this exchange, if any */
  wakeWord?: string;
  /** Aborted when the session cancels the exchange */
  signal: AbortSignal;
}

export interface TextConverseRequest {
  identity: DeviceIdentity;
  /** What the device user typed */
  text: string;
  audioFormat: AudioFormat;
  signal: AbortSignal;
}

export interface SpeakRequest {
  identity: DeviceIdentity;
  text: string;
  audioFormat: AudioFormat;
  signal: AbortSignal;
}

/**
 * The conversational/NLU pipeline: recognized audio in, text + synthesized
 * audio out. Implementations must stop producing once `signal` aborts.
 */
export interface ConversationPipeline {
  readonly name: string;
  converse(request: ConverseRequest): AsyncIterable<PipelineEvent>;
  /** Same conversation, starting from text instead of audio */
  converseText(request: TextConverseRequest): AsyncIterable<PipelineEvent>;
  speak(request: SpeakRequest): AsyncIterable<PipelineEvent>;
}

/**
 * Receives bridge output for one exchange, in order.
 * Each call resolves once the session has relayed it to the device.
 */
export interface ExchangeSink {
  onTranscript(text: string): Promise<void>;
  onReply(text: string): Promise<void>;
  onAudio(chunk: Uint8Array): Promise<void>;
  onComplete(): Promise<void>;
  onFailure(error: PipelineFailureError): Promise<void>;
}

export interface ExchangeRequest {
  sessionId: string;
  exchangeId: string;
  identity: DeviceIdentity;
  audioFormat: AudioFormat;
  signal: AbortSignal;
  sink: ExchangeSink;
}

export interface ListenExchangeRequest extends ExchangeRequest {
  audio: readonly Uint8Array[];
  wakeWord?: string;
}

export interface TextExchangeRequest extends ExchangeRequest {
  text: string;
}

export interface AnnouncementExchangeRequest extends ExchangeRequest {
  text: string;
}

export interface PipelineBridgeMetrics {
  openExchanges: number;
  totalExchanges: number;
  totalTextExchanges: number;
  totalAnnouncements: number;
  totalFailures: number;
  totalTimeouts: number;
  totalCancelled: number;
}

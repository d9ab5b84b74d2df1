/**
 * Device Session
 * Protocol state machine for one connected device.
 *
 * Everything that can change the session (device frames, pipeline output,
 * heartbeats, announcements) is posted to a single mailbox and processed
 * strictly in order, one event at a time.
 */

import { CLOSE_CODES, livenessConfig, protocolConfig, type LivenessConfig } from '@/shared/config';
import {
  ErrorCode,
  MalformedMessageError,
  PipelineFailureError,
  ProtocolViolationError,
  TransportError,
} from '@/shared/errors';
import { errorMessage, generateId, logger } from '@/shared/utils';
import type { ExchangeSink, PipelineBridge } from '@/modules/pipeline';
import { classifyPipelineError } from '@/modules/pipeline/utils';
import {
  CONTROL_MESSAGE_TYPES,
  DEVICE_IDENTIFIER_PATTERN,
  SessionState,
  isTransitionAllowed,
  type AbortMessage,
  type AudioFormat,
  type AudioParams,
  type ConnectivityStatusSink,
  type ControlMessage,
  type DeviceIdentity,
  type HelloMessage,
  type InboundFrame,
  type PingMessage,
  type ServerMessage,
  type SessionInfo,
  type SessionTransport,
  type TextMessage,
  type WakewordDetectedMessage,
} from '../types';
import { buildErrorMessage, toProtocolViolation } from '../handlers/error.handler';
import { InboundAudioBuffer, OutboundAudioStream } from './audio-buffer.service';
import { LivenessMonitor } from './liveness.service';
import type { AnnounceResult, RegisteredSession, SessionRegistry } from './session-registry.service';

const MAX_FRAME_DURATION_MS = 120;

export interface ProtocolSettings {
  supportedVersions: readonly number[];
  supportedSampleRates: readonly number[];
  supportedFormats: readonly string[];
  maxListenBytes: number;
  maxPendingAnnouncements: number;
  defaultAudio: AudioFormat;
}

export const DEFAULT_PROTOCOL_SETTINGS: ProtocolSettings = {
  supportedVersions: protocolConfig.supportedVersions,
  supportedSampleRates: protocolConfig.supportedSampleRates,
  supportedFormats: ['opus', 'pcm'],
  maxListenBytes: protocolConfig.maxListenBytes,
  maxPendingAnnouncements: protocolConfig.maxPendingAnnouncements,
  defaultAudio: { ...protocolConfig.defaultAudio },
};

export interface DeviceSessionDeps {
  connectionId: string;
  transport: SessionTransport;
  registry: SessionRegistry;
  bridge: PipelineBridge;
  connectivity: ConnectivityStatusSink;
  liveness?: LivenessConfig;
  protocol?: Partial<ProtocolSettings>;
  /** Called once, after the session reaches Closed */
  onClosed?: (session: DeviceSession) => void;
}

export class IllegalTransitionError extends Error {
  constructor(from: SessionState, to: SessionState) {
    super(`Illegal session transition ${from} -> ${to}`);
    this.name = 'IllegalTransitionError';
  }
}

type PipelineOutput =
  | { type: 'transcript'; text: string }
  | { type: 'reply'; text: string }
  | { type: 'audio'; chunk: Uint8Array }
  | { type: 'complete' }
  | { type: 'failure'; error: PipelineFailureError };

type MailboxEvent =
  | { kind: 'frame'; frame: InboundFrame }
  | { kind: 'malformed'; error: MalformedMessageError }
  | { kind: 'pipeline'; exchangeId: string; output: PipelineOutput }
  | { kind: 'heartbeat' }
  | { kind: 'announce' };

interface MailboxItem {
  event: MailboxEvent;
  done: () => void;
}

interface OpenExchange {
  id: string;
  kind: 'listen' | 'text' | 'announcement';
  controller: AbortController;
  resultSent: boolean;
  speech?: OutboundAudioStream;
}

interface TerminateOptions {
  reason: string;
  closeCode?: number;
  /** Sent best-effort before the socket is closed */
  error?: { code: ErrorCode; message: string };
}

function isConnectedState(state: SessionState): boolean {
  return (
    state === SessionState.IDLE ||
    state === SessionState.LISTENING ||
    state === SessionState.PROCESSING ||
    state === SessionState.SPEAKING
  );
}

export class DeviceSession {
  readonly sessionId: string = generateId();
  readonly connectionId: string;
  readonly createdAt: number = Date.now();

  private state: SessionState = SessionState.CONNECTING;
  private identity?: DeviceIdentity;
  private protocolVersion?: number;
  private audioFormat: AudioFormat;
  private exchange?: OpenExchange;
  private announcements: string[] = [];
  private mailbox: MailboxItem[] = [];
  private draining = false;

  private readonly transport: SessionTransport;
  private readonly registry: SessionRegistry;
  private readonly bridge: PipelineBridge;
  private readonly connectivity: ConnectivityStatusSink;
  private readonly settings: ProtocolSettings;
  private readonly livenessSettings: LivenessConfig;
  private readonly inbound: InboundAudioBuffer;
  private readonly liveness: LivenessMonitor;
  private readonly onClosed?: (session: DeviceSession) => void;

  constructor(deps: DeviceSessionDeps) {
    this.connectionId = deps.connectionId;
    this.transport = deps.transport;
    this.registry = deps.registry;
    this.bridge = deps.bridge;
    this.connectivity = deps.connectivity;
    this.onClosed = deps.onClosed;
    this.settings = { ...DEFAULT_PROTOCOL_SETTINGS, ...deps.protocol };
    this.livenessSettings = deps.liveness ?? livenessConfig;
    this.audioFormat = { ...this.settings.defaultAudio };
    this.inbound = new InboundAudioBuffer(this.settings.maxListenBytes);
    this.liveness = new LivenessMonitor(this.livenessSettings, {
      onIdle: () => this.post({ kind: 'heartbeat' }),
      onTimeout: (idleMs) => this.handleTimeout(idleMs),
    });
  }

  // ==========================================================================
  // Public API (connection handler side)
  // ==========================================================================

  start(): void {
    this.liveness.start();
    logger.debug('Device session started', {
      sessionId: this.sessionId,
      connectionId: this.connectionId,
    });
  }

  getState(): SessionState {
    return this.state;
  }

  getIdentity(): DeviceIdentity | undefined {
    return this.identity;
  }

  getAudioFormat(): AudioFormat {
    return { ...this.audioFormat };
  }

  isClosed(): boolean {
    return this.state === SessionState.CLOSED;
  }

  getInfo(): SessionInfo {
    return {
      sessionId: this.sessionId,
      connectionId: this.connectionId,
      identity: this.identity,
      protocolVersion: this.protocolVersion,
      state: this.state,
      createdAt: this.createdAt,
      lastActivity: this.liveness.getLastActivity(),
      exchangeId: this.exchange?.id,
      audioFormat: this.getAudioFormat(),
      pendingAnnouncements: this.announcements.length,
    };
  }

  /**
   * Record inbound activity. Called for every received frame, before decoding.
   */
  touch(): void {
    this.liveness.touch();
  }

  /**
   * Deliver a decoded frame; resolves once it has been processed
   */
  dispatch(frame: InboundFrame): Promise<void> {
    return this.enqueue({ kind: 'frame', frame });
  }

  /**
   * Deliver a frame the codec could not decode
   */
  rejectMalformed(error: MalformedMessageError): Promise<void> {
    return this.enqueue({ kind: 'malformed', error });
  }

  /**
   * Queue a server-initiated speech cycle (push-text-to-speak)
   */
  announce(text: string): AnnounceResult {
    if (!isConnectedState(this.state)) {
      return 'not_ready';
    }
    if (this.announcements.length >= this.settings.maxPendingAnnouncements) {
      return 'queue_full';
    }

    this.announcements.push(text);
    logger.info('Announcement queued', {
      sessionId: this.sessionId,
      deviceId: this.identity?.deviceId,
      pending: this.announcements.length,
    });

    if (this.state === SessionState.IDLE) {
      this.post({ kind: 'announce' });
    }
    return 'queued';
  }

  /**
   * The socket closed underneath us
   */
  handleTransportClosed(code: number, reason: string): void {
    this.terminate({ reason: `socket closed (${code}${reason ? `: ${reason}` : ''})` });
  }

  /**
   * Socket-level I/O error: always fatal, no retry at this layer
   */
  handleTransportError(error: Error): void {
    logger.error('Device transport failure', {
      sessionId: this.sessionId,
      deviceId: this.identity?.deviceId,
      error: error.message,
    });
    this.terminate({ reason: `transport failure: ${error.message}`, closeCode: CLOSE_CODES.GOING_AWAY });
  }

  /**
   * Close for server shutdown
   */
  shutdown(): void {
    this.terminate({ reason: 'server shutting down', closeCode: CLOSE_CODES.GOING_AWAY });
  }

  // ==========================================================================
  // Mailbox
  // ==========================================================================

  private enqueue(event: MailboxEvent): Promise<void> {
    return new Promise<void>((resolve) => {
      this.post(event, resolve);
    });
  }

  private post(event: MailboxEvent, done: () => void = () => undefined): void {
    if (this.state === SessionState.CLOSED) {
      done();
      return;
    }
    this.mailbox.push({ event, done });
    this.drain().catch((error: unknown) => {
      logger.error('Session mailbox failed', { sessionId: this.sessionId, error: errorMessage(error) });
    });
  }

  private async drain(): Promise<void> {
    if (this.draining) return;
    this.draining = true;

    try {
      for (let item = this.mailbox.shift(); item; item = this.mailbox.shift()) {
        try {
          if (this.state !== SessionState.CLOSED) {
            await this.process(item.event);
          }
        } catch (error) {
          await this.handleProcessingError(error);
        } finally {
          item.done();
        }
      }
    } finally {
      this.draining = false;
    }
  }

  private async process(event: MailboxEvent): Promise<void> {
    switch (event.kind) {
      case 'frame':
        if (event.frame.kind === 'audio') {
          this.handleAudioFrame(event.frame.data);
        } else {
          await this.handleControl(event.frame.message);
        }
        return;

      case 'malformed':
        throw event.error;

      case 'pipeline':
        await this.handlePipelineOutput(event.exchangeId, event.output);
        return;

      case 'heartbeat':
        if (this.state !== SessionState.ERROR) {
          logger.debug('Device idle, sending ping', { sessionId: this.sessionId });
          await this.send({ type: CONTROL_MESSAGE_TYPES.PING, timestamp: Date.now() });
        }
        return;

      case 'announce':
        await this.startNextAnnouncement();
        return;
    }
  }

  private async handleProcessingError(error: unknown): Promise<void> {
    if (this.state === SessionState.CLOSED) {
      return;
    }

    if (error instanceof TransportError) {
      this.handleTransportError(error);
      return;
    }

    const violation = toProtocolViolation(error);
    this.violate(violation);
  }

  // ==========================================================================
  // Device control messages
  // ==========================================================================

  private async handleControl(message: ControlMessage): Promise<void> {
    switch (message.type) {
      case CONTROL_MESSAGE_TYPES.HELLO:
        return this.handleHello(message);

      case CONTROL_MESSAGE_TYPES.WAKEWORD_DETECTED:
        return this.handleWakeword(message);

      case CONTROL_MESSAGE_TYPES.START_LISTEN:
        return this.handleStartListen();

      case CONTROL_MESSAGE_TYPES.STOP_LISTEN:
        return this.handleStopListen();

      case CONTROL_MESSAGE_TYPES.TEXT:
        return this.handleText(message);

      case CONTROL_MESSAGE_TYPES.ABORT:
        return this.handleAbort(message);

      case CONTROL_MESSAGE_TYPES.PING:
        return this.handlePing(message);

      case CONTROL_MESSAGE_TYPES.PONG:
        // Activity already recorded
        return;

      default:
        // Server-originated tags are never valid from a device
        throw this.unexpected(message.type);
    }
  }

  private async handleHello(message: HelloMessage): Promise<void> {
    if (this.state !== SessionState.CONNECTING) {
      throw this.unexpected(message.type);
    }

    if (!DEVICE_IDENTIFIER_PATTERN.test(message.device_id) || !DEVICE_IDENTIFIER_PATTERN.test(message.client_id)) {
      throw new ProtocolViolationError(
        ErrorCode.INVALID_IDENTITY,
        'device_id and client_id must be 1-64 characters of [A-Za-z0-9._:-]'
      );
    }

    if (!this.settings.supportedVersions.includes(message.version)) {
      throw new ProtocolViolationError(
        ErrorCode.UNSUPPORTED_VERSION,
        `Protocol version ${message.version} is not supported (supported: ${this.settings.supportedVersions.join(', ')})`
      );
    }

    this.audioFormat = this.negotiateAudio(message.audio_params);
    this.protocolVersion = message.version;
    const identity: DeviceIdentity = { deviceId: message.device_id, clientId: message.client_id };
    this.identity = identity;

    // Supersedes any live session for this device before we go idle
    this.registry.claim(this.createRegistryHandle(identity));
    this.transitionTo(SessionState.IDLE, 'handshake complete');

    logger.info('Device handshake complete', {
      sessionId: this.sessionId,
      connectionId: this.connectionId,
      deviceId: identity.deviceId,
      clientId: identity.clientId,
      version: message.version,
      sampleRate: this.audioFormat.sampleRate,
    });

    await this.send({
      type: CONTROL_MESSAGE_TYPES.HELLO_ACK,
      version: message.version,
      session_id: this.sessionId,
      audio_params: {
        format: this.audioFormat.format,
        sample_rate: this.audioFormat.sampleRate,
        channels: this.audioFormat.channels,
        frame_duration: this.audioFormat.frameDurationMs,
      },
      heartbeat_interval_ms: this.livenessSettings.heartbeatIntervalMs,
    });
  }

  private negotiateAudio(params: AudioParams | undefined): AudioFormat {
    const defaults = this.settings.defaultAudio;
    const format: AudioFormat = {
      format: params?.format ?? defaults.format,
      sampleRate: params?.sample_rate ?? defaults.sampleRate,
      bitDepth: defaults.bitDepth,
      channels: params?.channels ?? defaults.channels,
      frameDurationMs: params?.frame_duration ?? defaults.frameDurationMs,
    };

    if (!this.settings.supportedFormats.includes(format.format)) {
      throw new ProtocolViolationError(
        ErrorCode.UNSUPPORTED_AUDIO_PARAMS,
        `Audio format "${format.format}" is not supported`
      );
    }
    if (!this.settings.supportedSampleRates.includes(format.sampleRate)) {
      throw new ProtocolViolationError(
        ErrorCode.UNSUPPORTED_AUDIO_PARAMS,
        `Sample rate ${format.sampleRate} is not supported`
      );
    }
    if (format.channels !== 1) {
      throw new ProtocolViolationError(ErrorCode.UNSUPPORTED_AUDIO_PARAMS, 'Only mono audio is supported');
    }
    if (format.frameDurationMs > MAX_FRAME_DURATION_MS) {
      throw new ProtocolViolationError(
        ErrorCode.UNSUPPORTED_AUDIO_PARAMS,
        `Frame duration must not exceed ${MAX_FRAME_DURATION_MS}ms`
      );
    }

    return format;
  }

  private handleWakeword(message: WakewordDetectedMessage): void {
    if (this.state !== SessionState.IDLE) {
      throw this.unexpected(message.type);
    }

    // Informational: does not open a listen cycle
    logger.info('Wake word detected', {
      sessionId: this.sessionId,
      deviceId: this.identity?.deviceId,
      wakeWord: message.wake_word,
    });
    this.bridge.noteWakeWord(this.sessionId, message.wake_word);
  }

  private handleStartListen(): void {
    if (this.exchange || this.isExchangeState()) {
      throw new ProtocolViolationError(
        ErrorCode.EXCHANGE_IN_PROGRESS,
        'start_listen received while an exchange is already open'
      );
    }
    if (this.state !== SessionState.IDLE) {
      throw this.unexpected(CONTROL_MESSAGE_TYPES.START_LISTEN);
    }

    const exchangeId = generateId();
    this.inbound.open(exchangeId);
    this.exchange = {
      id: exchangeId,
      kind: 'listen',
      controller: new AbortController(),
      resultSent: false,
    };
    this.transitionTo(SessionState.LISTENING, 'start_listen');

    logger.debug('Listening started', { sessionId: this.sessionId, exchangeId });
  }

  private handleAudioFrame(data: Uint8Array): void {
    if (this.state !== SessionState.LISTENING) {
      throw new ProtocolViolationError(
        ErrorCode.UNEXPECTED_AUDIO,
        this.state === SessionState.PROCESSING
          ? 'Audio frame received after stop_listen'
          : `Audio frame received while ${this.state}`
      );
    }
    this.inbound.append(data);
  }

  private handleStopListen(): void {
    const exchange = this.exchange;
    if (this.state !== SessionState.LISTENING || !exchange) {
      throw this.unexpected(CONTROL_MESSAGE_TYPES.STOP_LISTEN);
    }

    const frames = this.inbound.close();
    this.transitionTo(SessionState.PROCESSING, 'stop_listen');

    const identity = this.requireIdentity();
    logger.info('Listen span closed, submitting to pipeline', {
      sessionId: this.sessionId,
      deviceId: identity.deviceId,
      exchangeId: exchange.id,
      frameCount: this.inbound.getFrameCount(),
      totalBytes: this.inbound.getByteLength(),
    });

    // Not awaited: pipeline output comes back through the mailbox
    this.bridge
      .runListenExchange({
        sessionId: this.sessionId,
        exchangeId: exchange.id,
        identity,
        audioFormat: this.getAudioFormat(),
        audio: frames,
        signal: exchange.controller.signal,
        sink: this.createSink(exchange.id),
      })
      .catch((error: unknown) => this.reportBridgeRejection(exchange.id, error));
  }

  private handleText(message: TextMessage): void {
    if (this.state !== SessionState.IDLE || this.exchange) {
      throw this.unexpected(message.type);
    }

    const identity = this.requireIdentity();
    // No recognition step: the device already has the text
    const exchange: OpenExchange = {
      id: generateId(),
      kind: 'text',
      controller: new AbortController(),
      resultSent: true,
    };
    this.exchange = exchange;
    this.transitionTo(SessionState.PROCESSING, 'text');

    logger.info('Text request, submitting to pipeline', {
      sessionId: this.sessionId,
      deviceId: identity.deviceId,
      exchangeId: exchange.id,
      length: message.text.length,
    });

    this.bridge
      .runTextExchange({
        sessionId: this.sessionId,
        exchangeId: exchange.id,
        identity,
        audioFormat: this.getAudioFormat(),
        text: message.text,
        signal: exchange.controller.signal,
        sink: this.createSink(exchange.id),
      })
      .catch((error: unknown) => this.reportBridgeRejection(exchange.id, error));
  }

  private async handleAbort(message: AbortMessage): Promise<void> {
    if (this.state === SessionState.IDLE) {
      logger.debug('Abort with nothing to cancel', { sessionId: this.sessionId });
      return;
    }
    if (!this.isExchangeState()) {
      throw this.unexpected(message.type);
    }

    const wasSpeaking = this.state === SessionState.SPEAKING;
    logger.info('Exchange aborted by device', {
      sessionId: this.sessionId,
      exchangeId: this.exchange?.id,
      reason: message.reason,
    });

    this.cancelExchange();
    if (wasSpeaking) {
      await this.send({ type: CONTROL_MESSAGE_TYPES.TTS_END });
    }
    this.transitionTo(SessionState.IDLE, 'aborted by device');
  }

  private async handlePing(message: PingMessage): Promise<void> {
    await this.send({ type: CONTROL_MESSAGE_TYPES.PONG, timestamp: message.timestamp });
  }

  // ==========================================================================
  // Pipeline output
  // ==========================================================================

  private createSink(exchangeId: string): ExchangeSink {
    return {
      onTranscript: (text) => this.enqueue({ kind: 'pipeline', exchangeId, output: { type: 'transcript', text } }),
      onReply: (text) => this.enqueue({ kind: 'pipeline', exchangeId, output: { type: 'reply', text } }),
      onAudio: (chunk) => this.enqueue({ kind: 'pipeline', exchangeId, output: { type: 'audio', chunk } }),
      onComplete: () => this.enqueue({ kind: 'pipeline', exchangeId, output: { type: 'complete' } }),
      onFailure: (error) => this.enqueue({ kind: 'pipeline', exchangeId, output: { type: 'failure', error } }),
    };
  }

  private reportBridgeRejection(exchangeId: string, error: unknown): void {
    logger.error('Pipeline bridge rejected exchange', {
      sessionId: this.sessionId,
      exchangeId,
      error: errorMessage(error),
    });
    this.post({
      kind: 'pipeline',
      exchangeId,
      output: { type: 'failure', error: classifyPipelineError(error) },
    });
  }

  private async handlePipelineOutput(exchangeId: string, output: PipelineOutput): Promise<void> {
    const exchange = this.exchange;
    if (!exchange || exchange.id !== exchangeId) {
      logger.debug('Dropping output of a finished exchange', {
        sessionId: this.sessionId,
        exchangeId,
        type: output.type,
      });
      return;
    }

    switch (output.type) {
      case 'transcript':
        await this.handleTranscript(exchange, output.text);
        return;

      case 'reply':
        await this.handleReplyText(exchange, output.text);
        return;

      case 'audio':
        await this.handleReplyAudio(exchange, output.chunk);
        return;

      case 'complete':
        await this.handleReplyComplete(exchange);
        return;

      case 'failure':
        await this.handlePipelineFailure(exchange, output.error);
        return;
    }
  }

  private async handleTranscript(exchange: OpenExchange, text: string): Promise<void> {
    if (exchange.kind !== 'listen' || exchange.resultSent || this.state !== SessionState.PROCESSING) {
      logger.debug('Ignoring extra transcript', { sessionId: this.sessionId, exchangeId: exchange.id });
      return;
    }
    await this.sendRecognitionResult(exchange, text);
  }

  /**
   * Reply text goes out before the reply's speech; once speaking it is dropped
   */
  private async handleReplyText(exchange: OpenExchange, text: string): Promise<void> {
    if (exchange.kind === 'announcement' || this.state !== SessionState.PROCESSING) {
      logger.debug('Ignoring late reply text', { sessionId: this.sessionId, exchangeId: exchange.id });
      return;
    }
    if (!exchange.resultSent) {
      await this.sendRecognitionResult(exchange, '');
    }
    logger.info('Reply text', { sessionId: this.sessionId, exchangeId: exchange.id, text });
    await this.send({ type: CONTROL_MESSAGE_TYPES.INTENT, text });
  }

  private async handleReplyAudio(exchange: OpenExchange, chunk: Uint8Array): Promise<void> {
    if (this.state === SessionState.PROCESSING) {
      if (!exchange.resultSent) {
        await this.sendRecognitionResult(exchange, '');
      }
      await this.beginSpeaking(exchange);
    }

    if (this.state !== SessionState.SPEAKING || !exchange.speech) {
      throw new IllegalTransitionError(this.state, SessionState.SPEAKING);
    }
    await exchange.speech.write(chunk);
  }

  private async handleReplyComplete(exchange: OpenExchange): Promise<void> {
    if (this.state === SessionState.PROCESSING && exchange.kind === 'listen' && !exchange.resultSent) {
      await this.sendRecognitionResult(exchange, '');
    }

    if (this.state === SessionState.SPEAKING) {
      exchange.speech?.end();
      await this.send({ type: CONTROL_MESSAGE_TYPES.TTS_END });
      logger.info('Reply speech finished', {
        sessionId: this.sessionId,
        exchangeId: exchange.id,
        ...exchange.speech?.getStats(),
      });
    }

    this.finishExchange();
  }

  private async handlePipelineFailure(exchange: OpenExchange, error: PipelineFailureError): Promise<void> {
    if (this.state === SessionState.SPEAKING) {
      exchange.speech?.end();
      await this.send({ type: CONTROL_MESSAGE_TYPES.TTS_END });
    }

    // Recoverable: report, close the exchange, keep the session
    await this.send(buildErrorMessage(error.code, error.message));
    this.finishExchange();
  }

  private async sendRecognitionResult(exchange: OpenExchange, text: string): Promise<void> {
    exchange.resultSent = true;
    logger.info('Recognition result', { sessionId: this.sessionId, exchangeId: exchange.id, text });
    await this.send({ type: CONTROL_MESSAGE_TYPES.RECOGNITION_RESULT, text });
  }

  private async beginSpeaking(exchange: OpenExchange, text?: string): Promise<void> {
    exchange.speech = new OutboundAudioStream((frame) => this.transport.sendAudio(frame));
    await this.send(
      text === undefined
        ? { type: CONTROL_MESSAGE_TYPES.TTS_START }
        : { type: CONTROL_MESSAGE_TYPES.TTS_START, text }
    );
    this.transitionTo(SessionState.SPEAKING, exchange.kind === 'announcement' ? 'announcement' : 'reply');
  }

  private finishExchange(): void {
    this.exchange = undefined;
    this.inbound.discard();
    this.transitionTo(SessionState.IDLE, 'exchange complete');
  }

  /**
   * Cancel the open exchange. The pipeline is notified through its signal;
   * the session does not wait for it.
   */
  private cancelExchange(): void {
    const exchange = this.exchange;
    if (!exchange) return;

    exchange.controller.abort();
    exchange.speech?.end();
    this.exchange = undefined;
    this.inbound.discard();
  }

  // ==========================================================================
  // Announcements
  // ==========================================================================

  private async startNextAnnouncement(): Promise<void> {
    if (this.state !== SessionState.IDLE || this.exchange) {
      return;
    }
    const text = this.announcements.shift();
    if (text === undefined) {
      return;
    }

    const exchange: OpenExchange = {
      id: generateId(),
      kind: 'announcement',
      controller: new AbortController(),
      resultSent: true,
    };
    this.exchange = exchange;
    await this.beginSpeaking(exchange, text);

    logger.info('Announcement started', {
      sessionId: this.sessionId,
      deviceId: this.identity?.deviceId,
      exchangeId: exchange.id,
    });

    this.bridge
      .runAnnouncement({
        sessionId: this.sessionId,
        exchangeId: exchange.id,
        identity: this.requireIdentity(),
        audioFormat: this.getAudioFormat(),
        text,
        signal: exchange.controller.signal,
        sink: this.createSink(exchange.id),
      })
      .catch((error: unknown) => this.reportBridgeRejection(exchange.id, error));
  }

  // ==========================================================================
  // State transitions & teardown
  // ==========================================================================

  private transitionTo(next: SessionState, reason?: string): void {
    const previous = this.state;
    if (previous === next) return;
    if (!isTransitionAllowed(previous, next)) {
      throw new IllegalTransitionError(previous, next);
    }

    this.state = next;
    logger.debug('Session state changed', {
      sessionId: this.sessionId,
      deviceId: this.identity?.deviceId,
      from: previous,
      to: next,
      reason,
    });

    if (this.identity) {
      this.connectivity.publish({
        deviceId: this.identity.deviceId,
        sessionId: this.sessionId,
        state: next,
        connected: isConnectedState(next),
        reason,
        timestamp: Date.now(),
      });
    }

    if (next === SessionState.IDLE && this.announcements.length > 0) {
      this.post({ kind: 'announce' });
    }
  }

  /**
   * Protocol violation: report, move to Error, close
   */
  private violate(violation: ProtocolViolationError): void {
    logger.warn('Protocol violation', {
      sessionId: this.sessionId,
      deviceId: this.identity?.deviceId,
      state: this.state,
      code: violation.code,
      message: violation.message,
    });

    this.transitionTo(SessionState.ERROR, violation.code);
    this.terminate({
      reason: violation.message,
      closeCode: CLOSE_CODES.PROTOCOL_VIOLATION,
      error: { code: violation.code, message: violation.message },
    });
  }

  private handleTimeout(idleMs: number): void {
    logger.warn('Device heartbeat timeout', {
      sessionId: this.sessionId,
      deviceId: this.identity?.deviceId,
      idleMs,
    });
    // Silent to the device: the socket is presumed unresponsive
    this.terminate({ reason: 'heartbeat timeout', closeCode: CLOSE_CODES.TIMEOUT });
  }

  /**
   * Registry view of this session. Holds no state of its own.
   */
  private createRegistryHandle(identity: DeviceIdentity): RegisteredSession {
    return {
      sessionId: this.sessionId,
      identity,
      supersede: (bySessionId) => {
        logger.info('Session superseded', {
          sessionId: this.sessionId,
          deviceId: identity.deviceId,
          bySessionId,
        });
        this.terminate({
          reason: 'superseded by a new connection',
          closeCode: CLOSE_CODES.SUPERSEDED,
          error: {
            code: ErrorCode.IDENTITY_CONFLICT,
            message: 'Another connection claimed this device id',
          },
        });
      },
      announce: (text) => this.announce(text),
      getInfo: () => this.getInfo(),
    };
  }

  /**
   * Move to Closed immediately, whatever the collaborators are doing
   */
  private terminate(options: TerminateOptions): void {
    if (this.state === SessionState.CLOSED) return;

    this.liveness.stop();
    this.cancelExchange();
    this.announcements = [];

    // Anything still queued will never be processed
    for (const item of this.mailbox.splice(0)) {
      item.done();
    }

    if (this.identity) {
      this.registry.release(this.identity.deviceId, this.sessionId);
    }
    this.bridge.releaseSession(this.sessionId);

    this.transitionTo(SessionState.CLOSED, options.reason);

    logger.info('Device session closed', {
      sessionId: this.sessionId,
      connectionId: this.connectionId,
      deviceId: this.identity?.deviceId,
      reason: options.reason,
      duration: Date.now() - this.createdAt,
    });

    this.closeTransport(options).catch((error: unknown) => {
      logger.warn('Error closing device socket', { sessionId: this.sessionId, error: errorMessage(error) });
    });

    this.onClosed?.(this);
  }

  private async closeTransport(options: TerminateOptions): Promise<void> {
    if (!this.transport.isOpen()) {
      return;
    }
    if (options.error) {
      try {
        await this.transport.sendControl(buildErrorMessage(options.error.code, options.error.message));
      } catch (error) {
        logger.debug('Error frame not delivered before close', {
          sessionId: this.sessionId,
          error: errorMessage(error),
        });
      }
    }
    if (options.closeCode !== undefined) {
      this.transport.close(options.closeCode, options.reason.slice(0, 120));
    }
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private async send(message: ServerMessage): Promise<void> {
    await this.transport.sendControl(message);
  }

  private isExchangeState(): boolean {
    return (
      this.state === SessionState.LISTENING ||
      this.state === SessionState.PROCESSING ||
      this.state === SessionState.SPEAKING
    );
  }

  private unexpected(type: string): ProtocolViolationError {
    return new ProtocolViolationError(
      ErrorCode.UNEXPECTED_MESSAGE,
      `Message "${type}" is not allowed while ${this.state}`
    );
  }

  private requireIdentity(): DeviceIdentity {
    if (!this.identity) {
      throw new ProtocolViolationError(ErrorCode.UNEXPECTED_MESSAGE, 'Handshake has not completed');
    }
    return this.identity;
  }
}

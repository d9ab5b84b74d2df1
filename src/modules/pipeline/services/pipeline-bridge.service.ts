/**
 * Pipeline Bridge
 * Turns a closed listen span, a typed request or an announcement into one pipeline
 * invocation and relays the pipeline's output to the session, in order.
 */

import { ErrorCode, ExchangeInProgressError, PipelineFailureError } from '@/shared/errors';
import { errorMessage, logger } from '@/shared/utils';
import { iterateFrames } from '@/modules/socket/services/audio-buffer.service';
import { PIPELINE_TIMEOUT_CONFIG } from '../config/timeout.config';
import { classifyPipelineError } from '../utils';
import type {
  AnnouncementExchangeRequest,
  ConversationPipeline,
  ExchangeRequest,
  ExchangeSink,
  ListenExchangeRequest,
  PipelineBridgeMetrics,
  PipelineEvent,
  TextExchangeRequest,
} from '../types';

export type ExchangeOutcome = 'completed' | 'failed' | 'cancelled';

export interface PipelineBridgeOptions {
  timeoutMs: number;
}

class ExchangeAbortedError extends Error {
  constructor() {
    super('Exchange aborted');
    this.name = 'ExchangeAbortedError';
  }
}

/**
 * Time budget for one exchange. Runs only while the bridge waits on the
 * pipeline; delivery to a back-pressured device does not count.
 */
class PipelineWaitClock {
  private remainingMs: number;
  private startedAt = 0;
  private timer?: NodeJS.Timeout;

  constructor(
    budgetMs: number,
    private readonly onExpired: () => void
  ) {
    this.remainingMs = budgetMs;
  }

  resume(): void {
    if (this.timer) return;
    this.startedAt = Date.now();
    this.timer = setTimeout(this.onExpired, Math.max(0, this.remainingMs));
  }

  pause(): void {
    if (!this.timer) return;
    clearTimeout(this.timer);
    this.timer = undefined;
    this.remainingMs -= Date.now() - this.startedAt;
  }
}

/**
 * Pipeline Bridge Class
 * Holds at most one open exchange per session.
 */
export class PipelineBridge {
  private openExchanges: Map<string, string> = new Map(); // sessionId -> exchangeId
  private wakeWordHints: Map<string, string> = new Map();
  private metrics = {
    totalExchanges: 0,
    totalTextExchanges: 0,
    totalAnnouncements: 0,
    totalFailures: 0,
    totalTimeouts: 0,
    totalCancelled: 0,
  };
  private readonly options: PipelineBridgeOptions;

  constructor(
    private readonly pipeline: ConversationPipeline,
    options: Partial<PipelineBridgeOptions> = {}
  ) {
    this.options = { timeoutMs: PIPELINE_TIMEOUT_CONFIG.EXCHANGE_TIMEOUT_MS, ...options };
  }

  get pipelineName(): string {
    return this.pipeline.name;
  }

  /**
   * Record a wake word as a hint for the session's next exchange
   */
  noteWakeWord(sessionId: string, wakeWord: string | undefined): void {
    logger.debug('Wake word hint recorded', { sessionId, wakeWord });
    if (wakeWord) {
      this.wakeWordHints.set(sessionId, wakeWord);
    }
  }

  /**
   * Submit a closed listen span and relay the reply
   * @throws {ExchangeInProgressError} If the session already has an open exchange
   */
  async runListenExchange(request: ListenExchangeRequest): Promise<ExchangeOutcome> {
    this.claimExchange(request);
    this.metrics.totalExchanges++;

    const wakeWord = this.wakeWordHints.get(request.sessionId);
    this.wakeWordHints.delete(request.sessionId);

    return this.run(request, (signal) =>
      this.pipeline.converse({
        identity: request.identity,
        audio: iterateFrames(request.audio),
        audioFormat: request.audioFormat,
        wakeWord,
        signal,
      })
    );
  }

  /**
   * Submit a typed request and relay the reply
   * @throws {ExchangeInProgressError} If the session already has an open exchange
   */
  async runTextExchange(request: TextExchangeRequest): Promise<ExchangeOutcome> {
    this.claimExchange(request);
    this.metrics.totalTextExchanges++;

    return this.run(request, (signal) =>
      this.pipeline.converseText({
        identity: request.identity,
        text: request.text,
        audioFormat: request.audioFormat,
        signal,
      })
    );
  }

  /**
   * Synthesize server-initiated speech and relay it
   * @throws {ExchangeInProgressError} If the session already has an open exchange
   */
  async runAnnouncement(request: AnnouncementExchangeRequest): Promise<ExchangeOutcome> {
    this.claimExchange(request);
    this.metrics.totalAnnouncements++;

    return this.run(request, (signal) =>
      this.pipeline.speak({
        identity: request.identity,
        text: request.text,
        audioFormat: request.audioFormat,
        signal,
      })
    );
  }

  /**
   * Forget per-session state (session closed)
   */
  releaseSession(sessionId: string): void {
    this.wakeWordHints.delete(sessionId);
  }

  getMetrics(): PipelineBridgeMetrics {
    return { openExchanges: this.openExchanges.size, ...this.metrics };
  }

  private claimExchange(request: ExchangeRequest): void {
    if (this.openExchanges.has(request.sessionId)) {
      throw new ExchangeInProgressError(request.sessionId);
    }
    this.openExchanges.set(request.sessionId, request.exchangeId);
  }

  private async run(
    request: ExchangeRequest,
    start: (signal: AbortSignal) => AsyncIterable<PipelineEvent>
  ): Promise<ExchangeOutcome> {
    const { sessionId, exchangeId } = request;
    const controller = new AbortController();
    let timedOut = false;

    // A cancelled exchange frees the session's slot at once
    const forwardAbort = (): void => {
      this.releaseExchange(sessionId, exchangeId);
      controller.abort();
    };
    if (request.signal.aborted) {
      forwardAbort();
    } else {
      request.signal.addEventListener('abort', forwardAbort, { once: true });
    }

    const clock = new PipelineWaitClock(this.options.timeoutMs, () => {
      timedOut = true;
      controller.abort();
    });

    logger.info('Pipeline exchange started', {
      sessionId,
      exchangeId,
      pipeline: this.pipeline.name,
    });

    try {
      await this.consume(start(controller.signal), controller.signal, request.sink, clock);
    } catch (error) {
      this.releaseExchange(sessionId, exchangeId);

      if (request.signal.aborted) {
        // Cancelled by the session: nothing more is delivered
        this.metrics.totalCancelled++;
        logger.info('Pipeline exchange cancelled', { sessionId, exchangeId });
        return 'cancelled';
      }

      const failure = timedOut
        ? new PipelineFailureError(
            ErrorCode.PIPELINE_TIMEOUT,
            `Pipeline did not respond within ${this.options.timeoutMs}ms`
          )
        : classifyPipelineError(error);

      this.metrics.totalFailures++;
      if (failure.code === ErrorCode.PIPELINE_TIMEOUT) {
        this.metrics.totalTimeouts++;
      }

      logger.error('Pipeline exchange failed', {
        sessionId,
        exchangeId,
        code: failure.code,
        error: errorMessage(error),
      });

      await this.deliverFailure(request.sink, failure, sessionId);
      return 'failed';
    } finally {
      clock.pause();
      request.signal.removeEventListener('abort', forwardAbort);
    }

    // Released before completion is delivered: the session may start its
    // next exchange while handling it
    this.releaseExchange(sessionId, exchangeId);
    logger.info('Pipeline exchange completed', { sessionId, exchangeId });
    await request.sink.onComplete();
    return 'completed';
  }

  private releaseExchange(sessionId: string, exchangeId: string): void {
    if (this.openExchanges.get(sessionId) === exchangeId) {
      this.openExchanges.delete(sessionId);
    }
  }

  /**
   * Pull events one at a time; each is delivered (and flushed to the device)
   * before the next is requested, so a slow socket suspends the pipeline.
   * The clock runs only while waiting on the pipeline.
   * Resolves once the pipeline completes or its stream ends.
   */
  private async consume(
    events: AsyncIterable<PipelineEvent>,
    signal: AbortSignal,
    sink: ExchangeSink,
    clock: PipelineWaitClock
  ): Promise<void> {
    const iterator = events[Symbol.asyncIterator]();

    // A pipeline that ignores the signal must not hold the exchange open
    let rejectAborted: (error: Error) => void = () => undefined;
    const aborted = new Promise<never>((_, reject) => {
      rejectAborted = reject;
    });
    const onAbort = (): void => rejectAborted(new ExchangeAbortedError());
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }

    try {
      for (;;) {
        clock.resume();
        const result = await Promise.race([iterator.next(), aborted]);
        clock.pause();
        if (result.done) {
          // Stream ended without an explicit completion
          return;
        }

        const event = result.value;
        switch (event.type) {
          case 'transcript':
            if (event.isFinal) {
              await sink.onTranscript(event.text);
            } else {
              logger.debug('Partial transcript', { text: event.text });
            }
            break;

          case 'reply':
            await sink.onReply(event.text);
            break;

          case 'audio':
            await sink.onAudio(event.chunk);
            break;

          case 'complete':
            return;

          case 'error':
            throw new PipelineFailureError(
              ErrorCode.PIPELINE_ERROR,
              event.code ? `${event.code}: ${event.message}` : event.message
            );
        }

        if (signal.aborted) {
          throw new ExchangeAbortedError();
        }
      }
    } finally {
      signal.removeEventListener('abort', onAbort);
      if (iterator.return) {
        iterator.return().catch((error: unknown) => {
          logger.warn('Pipeline iterator did not close cleanly', { error: errorMessage(error) });
        });
      }
    }
  }

  private async deliverFailure(
    sink: ExchangeSink,
    failure: PipelineFailureError,
    sessionId: string
  ): Promise<void> {
    try {
      await sink.onFailure(failure);
    } catch (error) {
      logger.error('Failed to report pipeline failure to session', {
        sessionId,
        error: errorMessage(error),
      });
    }
  }
}

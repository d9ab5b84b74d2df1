/**
 * Audio Stream Buffers
 * Inbound: accumulates one listen span of device audio, append-only.
 * Outbound: relays synthesized audio to the device with back-pressure.
 */

import { logger } from '@/shared/utils';

export class AudioSpanError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AudioSpanError';
  }
}

export class AudioSpanOverflowError extends AudioSpanError {
  constructor(limit: number) {
    super(`Listen span exceeds ${limit} bytes`);
    this.name = 'AudioSpanOverflowError';
  }
}

type SpanState = 'empty' | 'open' | 'closed';

interface BufferedAudioChunk {
  audio: Uint8Array;
  receivedAt: number;
}

/**
 * Inbound audio for one Pipeline Exchange.
 * Frames are accepted at whatever size the device sends them, in arrival order.
 */
export class InboundAudioBuffer {
  private state: SpanState = 'empty';
  private chunks: BufferedAudioChunk[] = [];
  private totalBytes = 0;
  private exchangeId?: string;

  constructor(private readonly maxBytes: number) {}

  /**
   * Open a new span. Fails without touching an already-open span.
   */
  open(exchangeId: string): void {
    if (this.state === 'open') {
      throw new AudioSpanError(`Span already open for exchange ${this.exchangeId}`);
    }
    this.chunks = [];
    this.totalBytes = 0;
    this.exchangeId = exchangeId;
    this.state = 'open';
  }

  append(audio: Uint8Array): void {
    if (this.state !== 'open') {
      throw new AudioSpanError(
        this.state === 'closed' ? 'Audio received after span was closed' : 'No open audio span'
      );
    }
    if (this.totalBytes + audio.byteLength > this.maxBytes) {
      throw new AudioSpanOverflowError(this.maxBytes);
    }

    this.chunks.push({ audio, receivedAt: Date.now() });
    this.totalBytes += audio.byteLength;
  }

  /**
   * Close the span; returns the frames in arrival order
   */
  close(): Uint8Array[] {
    if (this.state !== 'open') {
      throw new AudioSpanError('No open audio span to close');
    }
    this.state = 'closed';

    logger.debug('Audio span closed', {
      exchangeId: this.exchangeId,
      frameCount: this.chunks.length,
      totalBytes: this.totalBytes,
    });

    return this.chunks.map((chunk) => chunk.audio);
  }

  /**
   * Release buffered audio (exchange finished or cancelled)
   */
  discard(): void {
    this.chunks = [];
    this.totalBytes = 0;
    this.exchangeId = undefined;
    this.state = 'empty';
  }

  getFrameCount(): number {
    return this.chunks.length;
  }

  getByteLength(): number {
    return this.totalBytes;
  }

}

/**
 * Present a closed span as the audio stream handed to the pipeline
 */
export async function* iterateFrames(frames: readonly Uint8Array[]): AsyncGenerator<Uint8Array> {
  for (const frame of frames) {
    yield frame;
  }
}

/**
 * Outbound synthesized audio for one speaking cycle.
 * Pass-through: nothing is queued here, each write waits for the sink.
 */
export class OutboundAudioStream {
  private framesSent = 0;
  private bytesSent = 0;
  private ended = false;

  constructor(private readonly sink: (frame: Uint8Array) => Promise<void>) {}

  async write(frame: Uint8Array): Promise<void> {
    if (this.ended) {
      throw new AudioSpanError('Audio written after speech ended');
    }
    if (frame.byteLength === 0) {
      return;
    }
    await this.sink(frame);
    this.framesSent++;
    this.bytesSent += frame.byteLength;
  }

  end(): void {
    this.ended = true;
  }

  getStats(): { framesSent: number; bytesSent: number } {
    return { framesSent: this.framesSent, bytesSent: this.bytesSent };
  }
}

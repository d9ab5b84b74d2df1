/**
 * Forwarding Pipeline
 * Hands the listen span to an external conversation service over HTTP and
 * relays its reply (transcript, reply text and base64 audio frames).
 *
 * POST <baseUrl>/converse   body: concatenated audio frames
 * POST <baseUrl>/text       body: { device_id, text }
 * POST <baseUrl>/speak      body: { device_id, message }
 */

import { z } from 'zod';
import { logger } from '@/shared/utils';
import { PIPELINE_TIMEOUT_CONFIG } from '../config/timeout.config';
import type {
  ConversationPipeline,
  ConverseRequest,
  PipelineEvent,
  SpeakRequest,
  TextConverseRequest,
} from '../types';

export const ForwardReplySchema = z.object({
  text: z.string().optional(),
  reply: z.string().optional(),
  frames: z.array(z.string()).optional(),
});

export type ForwardReply = z.infer<typeof ForwardReplySchema>;

export interface ForwardingPipelineOptions {
  baseUrl: string;
  requestTimeoutMs: number;
}

export class ForwardingPipeline implements ConversationPipeline {
  readonly name = 'forward';
  private readonly options: ForwardingPipelineOptions;

  constructor(options: Pick<ForwardingPipelineOptions, 'baseUrl'> & Partial<ForwardingPipelineOptions>) {
    this.options = {
      requestTimeoutMs: PIPELINE_TIMEOUT_CONFIG.FORWARD_REQUEST_TIMEOUT_MS,
      ...options,
      baseUrl: options.baseUrl.replace(/\/+$/, ''),
    };
  }

  async *converse(request: ConverseRequest): AsyncGenerator<PipelineEvent> {
    const frames: Uint8Array[] = [];
    for await (const frame of request.audio) {
      frames.push(frame);
    }

    const headers: Record<string, string> = {
      'content-type': 'application/octet-stream',
      'x-device-id': request.identity.deviceId,
      'x-client-id': request.identity.clientId,
      'x-sample-rate': String(request.audioFormat.sampleRate),
      'x-audio-format': request.audioFormat.format,
      'x-frame-count': String(frames.length),
    };
    if (request.wakeWord) {
      headers['x-wake-word'] = request.wakeWord;
    }

    const reply = await this.post('/converse', Buffer.concat(frames), headers, request.signal);
    yield* this.replyEvents(reply, true);
  }

  async *converseText(request: TextConverseRequest): AsyncGenerator<PipelineEvent> {
    const body = JSON.stringify({ device_id: request.identity.deviceId, text: request.text });
    const reply = await this.post(
      '/text',
      body,
      { 'content-type': 'application/json', 'x-device-id': request.identity.deviceId },
      request.signal
    );
    yield* this.replyEvents(reply, false);
  }

  async *speak(request: SpeakRequest): AsyncGenerator<PipelineEvent> {
    const body = JSON.stringify({ device_id: request.identity.deviceId, message: request.text });
    const reply = await this.post(
      '/speak',
      body,
      { 'content-type': 'application/json', 'x-device-id': request.identity.deviceId },
      request.signal
    );
    yield* this.replyEvents(reply, false);
  }

  private *replyEvents(reply: ForwardReply, withTranscript: boolean): Generator<PipelineEvent> {
    if (withTranscript) {
      yield { type: 'transcript', text: reply.text ?? '', isFinal: true };
    }
    if (reply.reply) {
      yield { type: 'reply', text: reply.reply };
    }
    for (const frame of reply.frames ?? []) {
      yield { type: 'audio', chunk: new Uint8Array(Buffer.from(frame, 'base64')) };
    }
    yield { type: 'complete' };
  }

  private async post(
    path: string,
    body: string | Uint8Array,
    headers: Record<string, string>,
    signal: AbortSignal
  ): Promise<ForwardReply> {
    const url = `${this.options.baseUrl}${path}`;
    const controller = new AbortController();
    const forwardAbort = (): void => controller.abort(signal.reason);
    if (signal.aborted) {
      controller.abort(signal.reason);
    } else {
      signal.addEventListener('abort', forwardAbort, { once: true });
    }
    const timer = setTimeout(() => {
      controller.abort(new Error(`Forward request timed out after ${this.options.requestTimeoutMs}ms`));
    }, this.options.requestTimeoutMs);

    try {
      const response = await fetch(url, {
        method: 'POST',
        headers,
        body,
        signal: controller.signal,
      });
      return await this.readReply(url, response);
    } finally {
      clearTimeout(timer);
      signal.removeEventListener('abort', forwardAbort);
    }
  }

  private async readReply(url: string, response: Response): Promise<ForwardReply> {
    if (!response.ok) {
      const detail = await response.text();
      logger.warn('Forwarding pipeline rejected request', {
        url,
        status: response.status,
        detail: detail.slice(0, 200),
      });
      throw new Error(`Forward request failed with status ${response.status}`);
    }

    const parsed = ForwardReplySchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`Forward reply has unexpected shape: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
    }
    return parsed.data;
  }
}

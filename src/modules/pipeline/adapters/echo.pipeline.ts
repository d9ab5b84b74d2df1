/**
 * Echo Pipeline
 * Loopback pipeline for device bring-up: replies with a fixed transcript and
 * plays the captured audio back to the device. Text requests are echoed as
 * reply text.
 */

import type {
  ConversationPipeline,
  ConverseRequest,
  PipelineEvent,
  SpeakRequest,
  TextConverseRequest,
} from '../types';

export interface EchoPipelineOptions {
  transcript: string;
  echoAudio: boolean;
}

export class EchoPipeline implements ConversationPipeline {
  readonly name = 'echo';
  private readonly options: EchoPipelineOptions;

  constructor(options: Partial<EchoPipelineOptions> = {}) {
    this.options = { transcript: 'echo', echoAudio: true, ...options };
  }

  async *converse(request: ConverseRequest): AsyncGenerator<PipelineEvent> {
    const frames: Uint8Array[] = [];
    for await (const frame of request.audio) {
      if (request.signal.aborted) return;
      frames.push(frame);
    }

    yield { type: 'transcript', text: this.options.transcript, isFinal: true };

    if (this.options.echoAudio) {
      for (const frame of frames) {
        if (request.signal.aborted) return;
        yield { type: 'audio', chunk: frame };
      }
    }

    yield { type: 'complete' };
  }

  async *converseText(request: TextConverseRequest): AsyncGenerator<PipelineEvent> {
    if (request.signal.aborted) return;
    yield { type: 'reply', text: request.text };
    yield { type: 'complete' };
  }

  // No synthesizer behind the echo pipeline: announcements play nothing
  async *speak(request: SpeakRequest): AsyncGenerator<PipelineEvent> {
    if (request.signal.aborted) return;
    yield { type: 'complete' };
  }
}

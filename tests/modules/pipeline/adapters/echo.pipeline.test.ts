/**
 * Echo Pipeline Tests
 */

import { describe, it, expect } from 'vitest';
import { EchoPipeline } from '@/modules/pipeline';
import type { PipelineEvent } from '@/modules/pipeline';
import { iterateFrames } from '@/modules/socket/services';

const identity = { deviceId: 'dev1', clientId: 'client-a' };
const audioFormat = { format: 'opus', sampleRate: 16000, bitDepth: 16, channels: 1, frameDurationMs: 60 };

async function collect(events: AsyncIterable<PipelineEvent>): Promise<PipelineEvent[]> {
  const collected: PipelineEvent[] = [];
  for await (const event of events) {
    collected.push(event);
  }
  return collected;
}

describe('EchoPipeline', () => {
  it('should reply with the configured transcript and the captured audio', async () => {
    const pipeline = new EchoPipeline({ transcript: 'heard you' });

    const events = await collect(
      pipeline.converse({
        identity,
        audioFormat,
        audio: iterateFrames([new Uint8Array([1]), new Uint8Array([2, 3])]),
        signal: new AbortController().signal,
      })
    );

    expect(events).toEqual([
      { type: 'transcript', text: 'heard you', isFinal: true },
      { type: 'audio', chunk: new Uint8Array([1]) },
      { type: 'audio', chunk: new Uint8Array([2, 3]) },
      { type: 'complete' },
    ]);
  });

  it('should skip the audio when echo is off', async () => {
    const pipeline = new EchoPipeline({ echoAudio: false });

    const events = await collect(
      pipeline.converse({
        identity,
        audioFormat,
        audio: iterateFrames([new Uint8Array([1])]),
        signal: new AbortController().signal,
      })
    );

    expect(events).toEqual([{ type: 'transcript', text: 'echo', isFinal: true }, { type: 'complete' }]);
  });

  it('should echo typed requests as reply text', async () => {
    const pipeline = new EchoPipeline();

    const events = await collect(
      pipeline.converseText({ identity, audioFormat, text: 'good morning', signal: new AbortController().signal })
    );

    expect(events).toEqual([{ type: 'reply', text: 'good morning' }, { type: 'complete' }]);
  });

  it('should complete announcements without audio', async () => {
    const pipeline = new EchoPipeline();

    const events = await collect(
      pipeline.speak({ identity, audioFormat, text: 'hello', signal: new AbortController().signal })
    );

    expect(events).toEqual([{ type: 'complete' }]);
  });

  it('should stop when aborted', async () => {
    const pipeline = new EchoPipeline();
    const controller = new AbortController();
    controller.abort();

    const events = await collect(
      pipeline.converse({ identity, audioFormat, audio: iterateFrames([new Uint8Array([1])]), signal: controller.signal })
    );

    expect(events).toEqual([]);
  });
});

/**
 * Audio Stream Buffer Tests
 */

import { describe, it, expect, vi } from 'vitest';
import {
  AudioSpanError,
  AudioSpanOverflowError,
  InboundAudioBuffer,
  OutboundAudioStream,
  iterateFrames,
} from '@/modules/socket/services';

describe('InboundAudioBuffer', () => {
  it('should return frames in arrival order', () => {
    const buffer = new InboundAudioBuffer(1024);
    buffer.open('ex-1');
    buffer.append(new Uint8Array([1]));
    buffer.append(new Uint8Array([2, 3]));
    buffer.append(new Uint8Array([4, 5, 6]));

    expect(buffer.getFrameCount()).toBe(3);
    expect(buffer.getByteLength()).toBe(6);
    expect(buffer.close()).toEqual([new Uint8Array([1]), new Uint8Array([2, 3]), new Uint8Array([4, 5, 6])]);
  });

  it('should refuse audio after close', () => {
    const buffer = new InboundAudioBuffer(1024);
    buffer.open('ex-1');
    buffer.close();

    expect(() => buffer.append(new Uint8Array([1]))).toThrow('Audio received after span was closed');
  });

  it('should refuse audio with no open span', () => {
    const buffer = new InboundAudioBuffer(1024);

    expect(() => buffer.append(new Uint8Array([1]))).toThrow(AudioSpanError);
  });

  it('should not disturb an open span when opened again', () => {
    const buffer = new InboundAudioBuffer(1024);
    buffer.open('ex-1');
    buffer.append(new Uint8Array([1, 2]));

    expect(() => buffer.open('ex-2')).toThrow('Span already open for exchange ex-1');
    buffer.append(new Uint8Array([3]));
    expect(buffer.close()).toEqual([new Uint8Array([1, 2]), new Uint8Array([3])]);
  });

  it('should enforce the byte limit', () => {
    const buffer = new InboundAudioBuffer(4);
    buffer.open('ex-1');
    buffer.append(new Uint8Array([1, 2, 3, 4]));

    expect(() => buffer.append(new Uint8Array([5]))).toThrow(AudioSpanOverflowError);
    expect(buffer.getByteLength()).toBe(4);
  });

  it('should be reusable after discard', () => {
    const buffer = new InboundAudioBuffer(16);
    buffer.open('ex-1');
    buffer.append(new Uint8Array([1]));
    buffer.discard();

    expect(() => buffer.append(new Uint8Array([2]))).toThrow('No open audio span');
    buffer.open('ex-2');
    expect(buffer.getFrameCount()).toBe(0);
  });
});

describe('iterateFrames', () => {
  it('should yield every frame', async () => {
    const seen: number[] = [];
    for await (const frame of iterateFrames([new Uint8Array([1]), new Uint8Array([2])])) {
      seen.push(frame[0] ?? -1);
    }
    expect(seen).toEqual([1, 2]);
  });
});

describe('OutboundAudioStream', () => {
  it('should wait for the sink before each write resolves', async () => {
    let release: () => void = () => undefined;
    const sink = vi.fn(
      () =>
        new Promise<void>((resolve) => {
          release = resolve;
        })
    );
    const stream = new OutboundAudioStream(sink);

    let written = false;
    const pending = stream.write(new Uint8Array([1, 2])).then(() => {
      written = true;
    });
    await Promise.resolve();
    expect(written).toBe(false);

    release();
    await pending;
    expect(written).toBe(true);
    expect(stream.getStats()).toEqual({ framesSent: 1, bytesSent: 2 });
  });

  it('should skip empty frames', async () => {
    const sink = vi.fn(async () => undefined);
    const stream = new OutboundAudioStream(sink);

    await stream.write(new Uint8Array(0));

    expect(sink).not.toHaveBeenCalled();
  });

  it('should refuse writes after end', async () => {
    const stream = new OutboundAudioStream(async () => undefined);
    stream.end();

    await expect(stream.write(new Uint8Array([1]))).rejects.toThrow('Audio written after speech ended');
  });
});

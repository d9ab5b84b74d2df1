/**
 * Frame Codec Tests
 */

import { describe, it, expect } from 'vitest';
import { MalformedMessageError } from '@/shared/errors';
import { FrameCodec } from '@/modules/socket/utils';

describe('FrameCodec', () => {
  describe('decode', () => {
    it('should decode a hello control frame', () => {
      const frame = FrameCodec.decode(
        Buffer.from(
          JSON.stringify({
            type: 'hello',
            version: 1,
            device_id: 'aa:bb:cc:dd:ee:ff',
            client_id: 'c1',
            audio_params: { sample_rate: 16000 },
          })
        ),
        false
      );

      expect(frame).toEqual({
        kind: 'control',
        message: {
          type: 'hello',
          version: 1,
          device_id: 'aa:bb:cc:dd:ee:ff',
          client_id: 'c1',
          audio_params: { sample_rate: 16000 },
        },
      });
    });

    it('should pass binary frames through as audio', () => {
      const frame = FrameCodec.decode(Buffer.from([0xf8, 0xff, 0xfe]), true);

      expect(frame).toEqual({ kind: 'audio', data: new Uint8Array([0xf8, 0xff, 0xfe]) });
    });

    it('should join fragmented binary frames', () => {
      const frame = FrameCodec.decode([Buffer.from([1, 2]), Buffer.from([3])], true);

      expect(frame).toEqual({ kind: 'audio', data: new Uint8Array([1, 2, 3]) });
    });

    it('should copy audio out of the receive buffer', () => {
      const source = Buffer.from([1, 2, 3]);
      const frame = FrameCodec.decode(source, true);
      source[0] = 9;

      expect(frame.kind === 'audio' && frame.data[0]).toBe(1);
    });

    it('should reject an empty binary frame', () => {
      expect(() => FrameCodec.decode(Buffer.alloc(0), true)).toThrow(
        new MalformedMessageError('Empty audio frame')
      );
    });

    it('should not interpret binary data that looks like JSON', () => {
      const frame = FrameCodec.decode(Buffer.from('{"type":"hello"}'), true);

      expect(frame.kind).toBe('audio');
    });
  });

  describe('parseControl', () => {
    it('should reject invalid JSON', () => {
      expect(() => FrameCodec.parseControl('{"type":')).toThrow('Control frame is not valid JSON');
    });

    it('should reject non-object JSON', () => {
      expect(() => FrameCodec.parseControl('[1,2]')).toThrow('Control frame must be a JSON object');
      expect(() => FrameCodec.parseControl('null')).toThrow('Control frame must be a JSON object');
    });

    it('should trim the text of a typed request', () => {
      expect(FrameCodec.parseControl('{"type":"text","text":" open the blinds "}')).toEqual({
        type: 'text',
        text: 'open the blinds',
      });
    });

    it('should reject an empty typed request', () => {
      expect(() => FrameCodec.parseControl('{"type":"text","text":""}')).toThrow(MalformedMessageError);
    });

    it('should reject an unknown type', () => {
      expect(() => FrameCodec.parseControl('{"type":"dance","timestamp":1}')).toThrow(MalformedMessageError);
    });

    it('should name the offending field', () => {
      expect(() => FrameCodec.parseControl('{"type":"start_listen"}')).toThrow(/timestamp/);
    });

    it('should raise errors carrying the malformed_message code', () => {
      try {
        FrameCodec.parseControl('nope');
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(MalformedMessageError);
        expect(error).toMatchObject({ code: 'malformed_message' });
      }
    });
  });

  describe('encodeControl', () => {
    it('should stamp messages without a timestamp', () => {
      const text = FrameCodec.encodeControl({ type: 'tts_end' }, 1700000000000);

      expect(JSON.parse(text)).toEqual({ type: 'tts_end', timestamp: 1700000000000 });
    });

    it('should keep an existing timestamp', () => {
      const text = FrameCodec.encodeControl({ type: 'pong', timestamp: 42 }, 1700000000000);

      expect(JSON.parse(text)).toEqual({ type: 'pong', timestamp: 42 });
    });

    it('should produce frames the decoder accepts', () => {
      const text = FrameCodec.encodeControl({ type: 'recognition_result', text: 'turn on the lights' }, 5);

      expect(FrameCodec.parseControl(text)).toEqual({
        type: 'recognition_result',
        text: 'turn on the lights',
        timestamp: 5,
      });
    });
  });
});

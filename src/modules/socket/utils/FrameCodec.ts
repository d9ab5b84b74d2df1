/**
 * Frame Codec
 * Demultiplexes device WebSocket frames into control messages and audio,
 * and serializes outbound control messages.
 *
 * Text frames carry exactly one JSON control object; binary frames are opaque
 * encoded audio and are passed through without interpretation.
 */

import type { RawData } from 'ws';
import { MalformedMessageError } from '@/shared/errors';
import {
  ControlMessageSchema,
  type ControlMessage,
  type InboundFrame,
  type ServerMessage,
} from '../types';

export class FrameCodec {
  /**
   * Decode one WebSocket message
   * @throws {MalformedMessageError} If the frame is not a valid control message or audio frame
   */
  static decode(data: RawData | string, isBinary: boolean): InboundFrame {
    if (isBinary) {
      const audio = FrameCodec.toUint8Array(data);
      if (audio.byteLength === 0) {
        throw new MalformedMessageError('Empty audio frame');
      }
      return { kind: 'audio', data: audio };
    }

    const text = typeof data === 'string' ? data : Buffer.from(FrameCodec.toUint8Array(data)).toString('utf8');
    return { kind: 'control', message: FrameCodec.parseControl(text) };
  }

  /**
   * Parse a JSON control frame. No partial or best-effort parsing.
   */
  static parseControl(text: string): ControlMessage {
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch {
      throw new MalformedMessageError('Control frame is not valid JSON');
    }

    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new MalformedMessageError('Control frame must be a JSON object');
    }

    const result = ControlMessageSchema.safeParse(parsed);
    if (!result.success) {
      const issue = result.error.issues[0];
      const path = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
      throw new MalformedMessageError(`Invalid control message (${path}${issue?.message ?? 'unknown'})`);
    }

    return result.data;
  }

  /**
   * Serialize an outbound control message, stamping it with the send time
   */
  static encodeControl(message: ServerMessage, now: number = Date.now()): string {
    return JSON.stringify({ ...message, timestamp: message.timestamp ?? now });
  }

  /**
   * Normalize the `ws` RawData variants into one contiguous byte array
   */
  static toUint8Array(data: RawData | string): Uint8Array {
    if (typeof data === 'string') {
      return new Uint8Array(Buffer.from(data, 'utf8'));
    }
    if (Array.isArray(data)) {
      return new Uint8Array(Buffer.concat(data));
    }
    if (data instanceof ArrayBuffer) {
      return new Uint8Array(data.slice(0));
    }
    // Copy: ws may reuse the underlying pooled buffer
    return new Uint8Array(data);
  }
}

/**
 * WebSocket Message Handler
 * Decodes inbound frames and hands them to the owning device session
 */

import type { RawData } from 'ws';
import { MalformedMessageError } from '@/shared/errors';
import { logger } from '@/shared/utils';
import type { DeviceSession } from '../services/device-session';
import { FrameCodec } from '../utils';
import type { InboundFrame } from '../types';

export async function handleWebSocketMessage(
  session: DeviceSession,
  data: RawData | string,
  isBinary: boolean
): Promise<void> {
  if (session.isClosed()) {
    logger.debug('Session closed, dropping frame', {
      sessionId: session.sessionId,
      connectionId: session.connectionId,
    });
    return;
  }

  // Any frame counts as activity, even one we cannot decode
  session.touch();

  let frame: InboundFrame;
  try {
    frame = FrameCodec.decode(data, isBinary);
  } catch (error) {
    if (error instanceof MalformedMessageError) {
      logger.warn('Malformed frame from device', {
        sessionId: session.sessionId,
        connectionId: session.connectionId,
        error: error.message,
      });
      await session.rejectMalformed(error);
      return;
    }
    throw error;
  }

  await session.dispatch(frame);
}

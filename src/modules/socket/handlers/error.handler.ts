/**
 * Centralized Error Reporting for Device Sessions
 * Builds and sends `error` control messages
 */

import { ErrorCode, GatewayError, ProtocolViolationError } from '@/shared/errors';
import { errorMessage, logger } from '@/shared/utils';
import { AudioSpanError, AudioSpanOverflowError } from '../services/audio-buffer.service';
import { CONTROL_MESSAGE_TYPES, type ErrorMessage, type SessionTransport } from '../types';

/**
 * Build an `error` control message
 */
export function buildErrorMessage(code: ErrorCode, message: string): ErrorMessage {
  return {
    type: CONTROL_MESSAGE_TYPES.ERROR,
    code,
    message,
  };
}

/**
 * Send an error to the device. Best-effort: a dead socket is logged, not thrown.
 */
export async function sendError(
  transport: SessionTransport,
  code: ErrorCode,
  message: string,
  context: { sessionId: string; deviceId?: string }
): Promise<boolean> {
  logger.warn('Error sent to device', { ...context, code, message });

  if (!transport.isOpen()) {
    return false;
  }

  try {
    await transport.sendControl(buildErrorMessage(code, message));
    return true;
  } catch (error) {
    logger.warn('Could not deliver error to device', {
      ...context,
      code,
      error: errorMessage(error),
    });
    return false;
  }
}

/**
 * Map an error raised while handling a device frame onto a protocol violation.
 * Anything unrecognized is reported as a server error.
 */
export function toProtocolViolation(error: unknown): ProtocolViolationError {
  if (error instanceof ProtocolViolationError) {
    return error;
  }
  if (error instanceof AudioSpanOverflowError) {
    return new ProtocolViolationError(ErrorCode.AUDIO_SPAN_TOO_LARGE, error.message);
  }
  if (error instanceof AudioSpanError) {
    return new ProtocolViolationError(ErrorCode.UNEXPECTED_AUDIO, error.message);
  }
  if (error instanceof GatewayError) {
    return new ProtocolViolationError(error.code, error.message);
  }

  logger.error('Unexpected error while handling device frame', {
    error: errorMessage(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  return new ProtocolViolationError(ErrorCode.SERVER_ERROR, 'Internal server error');
}

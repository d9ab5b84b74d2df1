/**
 * Gateway Error Taxonomy
 *
 * Every error that reaches a device is reported with one of these
 * machine-readable codes in an `error` control message.
 */

export enum ErrorCode {
  // Protocol violations (fatal to the session)
  MALFORMED_MESSAGE = 'malformed_message',
  UNEXPECTED_MESSAGE = 'unexpected_message',
  UNEXPECTED_AUDIO = 'unexpected_audio',
  INVALID_IDENTITY = 'invalid_identity',
  UNSUPPORTED_VERSION = 'unsupported_version',
  UNSUPPORTED_AUDIO_PARAMS = 'unsupported_audio_params',
  EXCHANGE_IN_PROGRESS = 'exchange_in_progress',
  AUDIO_SPAN_TOO_LARGE = 'audio_span_too_large',

  // Supersession (fatal to the superseded session)
  IDENTITY_CONFLICT = 'identity_conflict',

  // Pipeline failures (recoverable, session returns to idle)
  PIPELINE_ERROR = 'pipeline_error',
  PIPELINE_TIMEOUT = 'pipeline_timeout',

  SERVER_ERROR = 'server_error',
}

/**
 * Base class for errors carrying a wire error code
 */
export class GatewayError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Malformed or out-of-sequence message. Always closes the session.
 */
export class ProtocolViolationError extends GatewayError {}

/**
 * Frame could not be decoded into a recognized control message
 */
export class MalformedMessageError extends ProtocolViolationError {
  constructor(message: string) {
    super(ErrorCode.MALFORMED_MESSAGE, message);
  }
}

/**
 * Pipeline collaborator failed or timed out during an exchange.
 * The exchange is aborted, the session survives.
 */
export class PipelineFailureError extends GatewayError {
  constructor(
    code: ErrorCode.PIPELINE_ERROR | ErrorCode.PIPELINE_TIMEOUT,
    message: string
  ) {
    super(code, message);
  }
}

/**
 * A second exchange was submitted for a session that already has one open
 */
export class ExchangeInProgressError extends GatewayError {
  constructor(sessionId: string) {
    super(ErrorCode.EXCHANGE_IN_PROGRESS, `Pipeline exchange already open for session ${sessionId}`);
  }
}

/**
 * Socket-level I/O failure. No retry at this layer.
 */
export class TransportError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TransportError';
  }
}

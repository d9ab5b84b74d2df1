/**
 * Socket Handlers
 */

export { handleWebSocketMessage } from './message.handler';
export { buildErrorMessage, sendError, toProtocolViolation } from './error.handler';

/**
 * Socket Utilities
 */

export { FrameCodec } from './FrameCodec';
export { WebSocketUtils } from './WebSocketUtils';

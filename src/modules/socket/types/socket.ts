/**
 * WebSocket-related type definitions
 */

import type { ServerMessage } from './protocol';

/**
 * Outbound side of one device connection.
 * Sends resolve once the frame is flushed to the socket.
 */
export interface SessionTransport {
  sendControl(message: ServerMessage): Promise<void>;
  sendAudio(frame: Uint8Array): Promise<void>;
  close(code: number, reason: string): void;
  isOpen(): boolean;
}

/**
 * WebSocket utility functions for safe operations
 */

import { WebSocket } from 'ws';
import { logger } from '@/shared/utils';
import { TransportError } from '@/shared/errors';

export class WebSocketUtils {
  /**
   * Safely close a WebSocket connection with error handling
   */
  static safeClose(ws: WebSocket | undefined, label: string, code?: number, reason?: string): void {
    if (!ws) return;
    if (ws.readyState === WebSocket.CLOSING || ws.readyState === WebSocket.CLOSED) return;

    try {
      ws.close(code, reason);
    } catch (error) {
      logger.warn(`Error closing ${label} WebSocket`, { error });
    }
  }

  /**
   * Check if WebSocket is in a state where it can send messages
   */
  static canSend(ws: WebSocket | undefined): boolean {
    return ws !== undefined && ws.readyState === WebSocket.OPEN;
  }

  /**
   * Send and wait until `ws` reports the frame written to the socket.
   * Awaiting each send is what applies back-pressure to the producer.
   * @throws {TransportError} If the socket is not open or the write fails
   */
  static sendAsync(ws: WebSocket, data: string | Uint8Array, binary: boolean): Promise<void> {
    if (!WebSocketUtils.canSend(ws)) {
      return Promise.reject(new TransportError('WebSocket is not open'));
    }

    return new Promise<void>((resolve, reject) => {
      ws.send(data, { binary }, (error) => {
        if (error) {
          reject(new TransportError(error.message));
          return;
        }
        resolve();
      });
    });
  }
}

/**
 * WebSocket Transport
 * SessionTransport over one `ws` connection
 */

import type { WebSocket } from 'ws';
import { FrameCodec, WebSocketUtils } from '../utils';
import type { ServerMessage, SessionTransport } from '../types';

export class WebSocketTransport implements SessionTransport {
  constructor(
    private readonly ws: WebSocket,
    private readonly label: string
  ) {}

  sendControl(message: ServerMessage): Promise<void> {
    return WebSocketUtils.sendAsync(this.ws, FrameCodec.encodeControl(message), false);
  }

  sendAudio(frame: Uint8Array): Promise<void> {
    return WebSocketUtils.sendAsync(this.ws, frame, true);
  }

  close(code: number, reason: string): void {
    WebSocketUtils.safeClose(this.ws, this.label, code, reason);
  }

  isOpen(): boolean {
    return WebSocketUtils.canSend(this.ws);
  }
}

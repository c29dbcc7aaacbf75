import type WebSocket from 'ws';
import type { DisconnectReason } from '../types.js';

/**
 * One live bidirectional connection to a participant.
 *
 * Messages on a single channel are delivered in send order.
 */
export interface Channel {
  readonly remoteAddress: string;
  isOpen(): boolean;
  send(data: string): void;
  close(code: number, reason: string): void;
}

export const CLOSE_CODES: Readonly<Record<DisconnectReason, number>> = {
  left: 1000,
  session_ended: 4000,
  removed: 4001,
  timeout: 4002,
  channel_error: 4003,
};

export const AUTH_FAILURE_CLOSE_CODE = 4401;

export class WebSocketChannel implements Channel {
  constructor(
    private readonly socket: WebSocket,
    readonly remoteAddress: string,
  ) {}

  isOpen(): boolean {
    return this.socket.readyState === this.socket.OPEN;
  }

  send(data: string): void {
    if (!this.isOpen()) {
      throw new Error('CHANNEL_CLOSED');
    }
    this.socket.send(data);
  }

  close(code: number, reason: string): void {
    if (this.socket.readyState === this.socket.CLOSED || this.socket.readyState === this.socket.CLOSING) {
      return;
    }
    this.socket.close(code, reason);
  }
}

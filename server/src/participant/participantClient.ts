import { EventEmitter } from 'node:events';
import WebSocket from 'ws';
import { toError } from '../lib/errors.js';
import { createLogger } from '../lib/logger.js';
import type { Logger } from '../lib/logger.js';
import type { FocusMode } from '../types.js';
import { decodeMessage, encodeMessage, normalizeSessionCode } from '../ws/codec.js';
import type { Envelope } from '../ws/codec.js';
import type { OutboundMessage, PayloadOf } from '../ws/schemas.js';
import { rawToString } from '../ws/utils.js';

const HEARTBEAT_INTERVAL = 8000;

export interface ParticipantClientOptions {
  heartbeatMs: number;
  joinTimeoutMs: number;
  /**
   * Local enforcement hook. The mode is acknowledged once it resolves; a
   * rejection leaves the mode unacknowledged.
   */
  onFocusMode?: (mode: FocusMode) => Promise<void> | void;
}

export type ParticipantClientEvents = {
  frame: [frame: PayloadOf<'FrameData'>];
  focusMode: [mode: FocusMode];
  roster: [participants: PayloadOf<'RosterUpdate'>['participants']];
  sessionEnded: [];
  disconnected: [code: number, reason: string];
  error: [error: Error];
};

export class JoinRejectedError extends Error {
  constructor(public readonly reason: PayloadOf<'JoinRejected'>['reason']) {
    super(`Join rejected: ${reason}`);
    this.name = 'JoinRejectedError';
  }
}

/**
 * Learner-side endpoint. Joins one session, keeps the channel alive and
 * acknowledges whatever the authority asks it to.
 */
export class ParticipantClient extends EventEmitter<ParticipantClientEvents> {
  private readonly options: ParticipantClientOptions;
  private readonly log: Logger;
  private socket: WebSocket | null = null;
  private heartbeatTimer: NodeJS.Timeout | null = null;
  private sessionCode = '';
  private id: string | null = null;

  constructor(
    private readonly url: string,
    options: Partial<ParticipantClientOptions> = {},
  ) {
    super();
    this.options = {
      heartbeatMs: options.heartbeatMs ?? HEARTBEAT_INTERVAL,
      joinTimeoutMs: options.joinTimeoutMs ?? 10_000,
      onFocusMode: options.onFocusMode,
    };
    this.log = createLogger({ module: 'participant-client' });
  }

  get participantId(): string | null {
    return this.id;
  }

  get isConnected(): boolean {
    return this.socket?.readyState === WebSocket.OPEN;
  }

  /**
   * Opens the channel and joins. Resolves with the participant id.
   */
  join(code: string, password: string, displayName: string): Promise<string> {
    if (this.socket) {
      return Promise.reject(new Error('Client already joined'));
    }
    this.sessionCode = normalizeSessionCode(code);
    const socket = new WebSocket(this.url);
    this.socket = socket;

    return new Promise<string>((resolve, reject) => {
      let settled = false;
      const settle = (fn: () => void) => {
        if (settled) return;
        settled = true;
        clearTimeout(joinTimer);
        fn();
      };

      const joinTimer = setTimeout(() => {
        settle(() => {
          socket.terminate();
          reject(new Error('Join timed out'));
        });
      }, this.options.joinTimeoutMs);

      socket.on('open', () => {
        this.write({ type: 'Join', payload: { displayName, password } });
      });

      socket.on('message', (raw) => {
        let envelope: Envelope;
        try {
          envelope = decodeMessage(rawToString(raw));
        } catch (error) {
          this.log.warn({ err: toError(error) }, 'client_invalid_message');
          return;
        }

        if (envelope.type === 'JoinAccepted') {
          const { participantId } = envelope.payload;
          this.id = participantId;
          this.startHeartbeat();
          settle(() => resolve(participantId));
          return;
        }
        if (envelope.type === 'JoinRejected') {
          const { reason } = envelope.payload;
          settle(() => reject(new JoinRejectedError(reason)));
          return;
        }
        this.handle(envelope);
      });

      socket.on('close', (closeCode, reason) => {
        this.stopHeartbeat();
        this.socket = null;
        const text = reason.toString('utf8');
        settle(() => reject(new Error(`Channel closed before join: ${closeCode} ${text}`)));
        this.emit('disconnected', closeCode, text);
      });

      socket.on('error', (err) => {
        settle(() => reject(err));
        if (this.listenerCount('error') > 0) {
          this.emit('error', err);
        } else {
          this.log.warn({ err }, 'client_socket_error');
        }
      });
    });
  }

  reportViolation(kind: string, detail = ''): boolean {
    return this.write({ type: 'ViolationRaw', payload: { kind, detail } });
  }

  close(): void {
    this.stopHeartbeat();
    if (this.socket && this.socket.readyState === WebSocket.OPEN) {
      this.socket.close(1000, 'left');
    }
  }

  private handle(envelope: Envelope): void {
    switch (envelope.type) {
      case 'FrameData':
        this.write({ type: 'FrameAck', payload: { sequenceNumber: envelope.payload.sequenceNumber } });
        this.emit('frame', envelope.payload);
        break;
      case 'SetFocusMode':
        this.applyFocusMode(envelope.payload.mode);
        break;
      case 'RosterUpdate':
        this.emit('roster', envelope.payload.participants);
        break;
      case 'SessionEnded':
        this.stopHeartbeat();
        this.emit('sessionEnded');
        break;
      case 'Heartbeat':
        this.write({ type: 'Heartbeat', payload: {} });
        break;
      default:
        this.log.debug({ type: envelope.type }, 'client_message_ignored');
    }
  }

  private applyFocusMode(mode: FocusMode): void {
    this.emit('focusMode', mode);
    const hook = this.options.onFocusMode;
    new Promise<void>((resolve) => {
      resolve(hook ? hook(mode) : undefined);
    })
      .then(() => {
        this.write({ type: 'FocusModeAck', payload: { mode } });
      })
      .catch((error: unknown) => {
        this.log.warn({ mode, err: toError(error) }, 'focus_mode_apply_failed');
      });
  }

  private write(message: OutboundMessage): boolean {
    const socket = this.socket;
    if (!socket || socket.readyState !== WebSocket.OPEN) return false;
    socket.send(encodeMessage(message, { sessionCode: this.sessionCode, senderId: this.id }));
    return true;
  }

  private startHeartbeat(): void {
    this.stopHeartbeat();
    this.heartbeatTimer = setInterval(() => {
      this.write({ type: 'Heartbeat', payload: {} });
    }, this.options.heartbeatMs);
  }

  private stopHeartbeat(): void {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
  }
}

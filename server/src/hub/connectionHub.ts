import { EventEmitter } from 'node:events';
import { v4 as uuid } from 'uuid';
import { config } from '../config.js';
import { safeEqual } from '../lib/credentials.js';
import {
  AuthFailure,
  DeliveryError,
  UnknownParticipantError,
  toError,
} from '../lib/errors.js';
import { createLogger } from '../lib/logger.js';
import type { Logger } from '../lib/logger.js';
import type { DisconnectReason, Participant } from '../types.js';
import { decodeMessage, encodeMessage, normalizeSessionCode } from '../ws/codec.js';
import type { Envelope } from '../ws/codec.js';
import type { MessageType, OutboundMessage } from '../ws/schemas.js';
import { CLOSE_CODES } from './channel.js';
import type { Channel } from './channel.js';

export interface SessionBinding {
  readonly code: string;
  readonly password: string;
  isActive(): boolean;
}

export interface HubOptions {
  heartbeatMs: number;
  /** Silence longer than this disconnects with reason `timeout`. */
  connectionTimeoutMs: number;
  maxParticipants: number;
}

const DEFAULT_HUB_OPTIONS: HubOptions = {
  heartbeatMs: config.heartbeatMs,
  connectionTimeoutMs: config.connectionTimeoutMs,
  maxParticipants: config.maxParticipants,
};

/** Message kinds a participant may send once joined. */
const PARTICIPANT_INBOUND = new Set<MessageType>(['FocusModeAck', 'ViolationRaw', 'FrameAck', 'Heartbeat']);

export interface JoinRequest {
  code: string;
  password: string;
  displayName: string;
  remoteAddress: string;
  channel: Channel;
}

export interface DeliveryFailure {
  participantId: string;
  error: Error;
}

export interface BroadcastResult {
  delivered: string[];
  failed: DeliveryFailure[];
}

export type HubEvents = {
  joined: [participant: Participant];
  left: [participant: Participant, reason: DisconnectReason];
  message: [participantId: string, envelope: Envelope];
  roster: [participants: Participant[]];
  deliveryFailed: [failure: DeliveryFailure];
};

interface RosterEntry {
  participant: Participant;
  channel: Channel;
  lastSeen: number;
  closed: boolean;
}

/**
 * Sole writer of one session's roster. Mutations run synchronously from
 * check to write, so a participant is removed exactly once.
 */
export class ConnectionHub extends EventEmitter<HubEvents> {
  private readonly members = new Map<string, RosterEntry>();
  private readonly options: HubOptions;
  private readonly log: Logger;
  private heartbeatTimer: NodeJS.Timeout | null = null;

  constructor(
    private readonly session: SessionBinding,
    options: Partial<HubOptions> = {},
  ) {
    super();
    this.options = { ...DEFAULT_HUB_OPTIONS, ...options };
    this.log = createLogger({ module: 'connection-hub', sessionCode: session.code });
  }

  get size(): number {
    return this.members.size;
  }

  get capacity(): number {
    return this.options.maxParticipants;
  }

  start(): void {
    if (this.heartbeatTimer) return;
    this.heartbeatTimer = setInterval(() => this.checkLiveness(), this.options.heartbeatMs);
  }

  stop(): void {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
  }

  /**
   * Admits a participant. On success the channel has already been sent
   * `JoinAccepted` and everyone else a fresh `RosterUpdate`.
   */
  authenticate(request: JoinRequest): Participant {
    const codeMatches = safeEqual(normalizeSessionCode(request.code), this.session.code);
    const passwordMatches = safeEqual(request.password, this.session.password);
    if (!(codeMatches && passwordMatches)) {
      throw new AuthFailure('InvalidCredentials');
    }
    if (!this.session.isActive()) {
      throw new AuthFailure('SessionNotActive');
    }
    if (this.members.size >= this.options.maxParticipants) {
      throw new AuthFailure('SessionFull');
    }

    const participant: Participant = {
      id: uuid(),
      displayName: request.displayName.trim(),
      remoteAddress: request.remoteAddress,
      joinedAt: Date.now(),
      focusMode: 'off',
      violationCount: 0,
    };

    try {
      request.channel.send(
        encodeMessage(
          { type: 'JoinAccepted', payload: { participantId: participant.id } },
          { sessionCode: this.session.code },
        ),
      );
    } catch (error) {
      throw new DeliveryError(participant.id, error);
    }

    this.members.set(participant.id, {
      participant,
      channel: request.channel,
      lastSeen: Date.now(),
      closed: false,
    });

    this.log.info(
      { participantId: participant.id, displayName: participant.displayName, ip: participant.remoteAddress },
      'participant_joined',
    );
    this.emit('joined', { ...participant });
    this.publishRoster();
    return { ...participant };
  }

  send(targetId: string, message: OutboundMessage): void {
    const entry = this.members.get(targetId);
    if (!entry || entry.closed) {
      throw new UnknownParticipantError(targetId);
    }
    try {
      entry.channel.send(encodeMessage(message, { sessionCode: this.session.code }));
    } catch (error) {
      throw new DeliveryError(targetId, error);
    }
  }

  broadcast(message: OutboundMessage, excludeId?: string): BroadcastResult {
    const data = encodeMessage(message, { sessionCode: this.session.code });
    const result: BroadcastResult = { delivered: [], failed: [] };

    for (const [participantId, entry] of [...this.members.entries()]) {
      if (participantId === excludeId || entry.closed) continue;
      try {
        entry.channel.send(data);
        result.delivered.push(participantId);
      } catch (error) {
        const failure = { participantId, error: toError(error) };
        result.failed.push(failure);
        this.log.warn({ participantId, err: failure.error, type: message.type }, 'broadcast_delivery_failed');
        this.emit('deliveryFailed', failure);
      }
    }

    return result;
  }

  /** False when the participant was already gone. */
  disconnect(participantId: string, reason: DisconnectReason): boolean {
    const entry = this.members.get(participantId);
    if (!entry || entry.closed) {
      return false;
    }
    entry.closed = true;
    this.members.delete(participantId);

    try {
      entry.channel.close(CLOSE_CODES[reason], reason);
    } catch (error) {
      this.log.warn({ participantId, err: toError(error) }, 'channel_close_failed');
    }

    this.log.info({ participantId, reason }, 'participant_left');
    this.emit('left', { ...entry.participant }, reason);
    if (reason !== 'session_ended') {
      this.publishRoster();
    }
    return true;
  }

  receive(participantId: string, raw: string): void {
    const entry = this.members.get(participantId);
    if (!entry || entry.closed) return;
    // Any traffic, valid or not, counts as a sign of life.
    entry.lastSeen = Date.now();

    let envelope: Envelope;
    try {
      envelope = decodeMessage(raw);
    } catch (error) {
      this.log.warn({ participantId, err: toError(error) }, 'ws_invalid_message');
      return;
    }

    if (!PARTICIPANT_INBOUND.has(envelope.type)) {
      this.log.warn({ participantId, type: envelope.type }, 'ws_unexpected_type');
      return;
    }
    this.emit('message', participantId, { ...envelope, senderId: participantId });
  }

  checkLiveness(): void {
    const now = Date.now();
    for (const [participantId, entry] of [...this.members.entries()]) {
      if (now - entry.lastSeen > this.options.connectionTimeoutMs) {
        this.disconnect(participantId, 'timeout');
        continue;
      }
      try {
        entry.channel.send(encodeMessage({ type: 'Heartbeat', payload: {} }, { sessionCode: this.session.code }));
      } catch (error) {
        this.log.warn({ participantId, err: toError(error) }, 'heartbeat_failed');
        this.disconnect(participantId, 'channel_error');
      }
    }
  }

  has(participantId: string): boolean {
    return this.members.has(participantId);
  }

  getParticipant(participantId: string): Participant | undefined {
    const entry = this.members.get(participantId);
    return entry ? { ...entry.participant } : undefined;
  }

  participantIds(): string[] {
    return [...this.members.keys()];
  }

  roster(): Participant[] {
    return [...this.members.values()].map((entry) => ({ ...entry.participant }));
  }

  updateParticipant(
    participantId: string,
    patch: Partial<Pick<Participant, 'focusMode' | 'violationCount'>>,
  ): Participant {
    const entry = this.members.get(participantId);
    if (!entry || entry.closed) {
      throw new UnknownParticipantError(participantId);
    }
    entry.participant = { ...entry.participant, ...patch };
    return { ...entry.participant };
  }

  close(): void {
    this.stop();
    this.broadcast({ type: 'SessionEnded', payload: {} });
    for (const participantId of this.participantIds()) {
      this.disconnect(participantId, 'session_ended');
    }
    this.emit('roster', []);
  }

  private publishRoster(): void {
    const participants = this.roster();
    this.broadcast({ type: 'RosterUpdate', payload: { participants } });
    this.emit('roster', participants);
  }
}

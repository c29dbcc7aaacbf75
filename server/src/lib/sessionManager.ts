import { EventEmitter } from 'node:events';
import { config } from '../config.js';
import { FocusStateMachine } from '../enforcement/focusStateMachine.js';
import type { FocusOptions } from '../enforcement/focusStateMachine.js';
import { ViolationThrottle } from '../enforcement/violationThrottle.js';
import type { ThrottleOptions } from '../enforcement/violationThrottle.js';
import { ConnectionHub } from '../hub/connectionHub.js';
import type { HubOptions } from '../hub/connectionHub.js';
import { ConsoleCaptureFeed } from '../streaming/captureSource.js';
import type { CaptureSource } from '../streaming/captureSource.js';
import { ScreenStreamPipeline } from '../streaming/streamPipeline.js';
import type { StreamOptions } from '../streaming/streamPipeline.js';
import type {
  FocusMode,
  Session,
  SessionInfo,
  SessionStatistics,
  StreamSettings,
} from '../types.js';
import { normalizeSessionCode } from '../ws/codec.js';
import type { Envelope } from '../ws/codec.js';
import type { OutboundMessage } from '../ws/schemas.js';
import { createCodeGenerator, createPasswordGenerator } from './credentials.js';
import {
  AlreadyActiveError,
  CaptureUnavailableError,
  SessionEndedError,
  UnknownParticipantError,
  UnknownSessionError,
} from './errors.js';
import { createLogger } from './logger.js';
import { resolveAuthorityAddress } from './network.js';
import { LoggingPersistenceGateway, PersistenceWriter } from './persistence.js';
import type { PersistenceGateway } from './persistence.js';

export interface SessionManagerOptions {
  persistence: PersistenceGateway;
  authorityAddress: string;
  codeLength: number;
  passwordLength: number;
  endedSessionRetentionMs: number;
  hub: Partial<HubOptions>;
  throttle: Partial<ThrottleOptions>;
  focus: Partial<FocusOptions>;
  stream: Partial<StreamOptions>;
  createCaptureSource: () => CaptureSource;
}

export type SessionManagerEvents = {
  /** Notification bound for the authority console of one session. */
  console: [sessionCode: string, message: OutboundMessage];
};

export interface SessionSummary {
  code: string;
  authorityId: string;
  createdAt: number;
  participantCount: number;
}

interface SessionRuntime {
  session: Session;
  hub: ConnectionHub;
  throttle: ViolationThrottle;
  focus: FocusStateMachine;
  stream: ScreenStreamPipeline;
  capture: CaptureSource;
  finalStatistics?: SessionStatistics;
}

const log = createLogger({ module: 'session-manager' });

/**
 * Top-level authority. Owns every session and, per active session, one
 * connection hub with its enforcement and streaming components.
 *
 * Only authority calls reach this class; participant traffic arrives through
 * the hubs and can never start or end a session.
 */
export class SessionManager extends EventEmitter<SessionManagerEvents> {
  private readonly sessions = new Map<string, SessionRuntime>();
  private readonly options: SessionManagerOptions;
  private readonly persistence: PersistenceWriter;
  private readonly generateCode: () => string;
  private readonly generatePassword: () => string;

  constructor(options: Partial<SessionManagerOptions> = {}) {
    super();
    this.options = {
      persistence: options.persistence ?? new LoggingPersistenceGateway(),
      authorityAddress: options.authorityAddress ?? resolveAuthorityAddress(config.advertiseAddress),
      codeLength: options.codeLength ?? config.codeLength,
      passwordLength: options.passwordLength ?? config.passwordLength,
      endedSessionRetentionMs: options.endedSessionRetentionMs ?? config.endedSessionRetentionMs,
      hub: options.hub ?? {},
      throttle: options.throttle ?? {},
      focus: options.focus ?? {},
      stream: options.stream ?? {},
      createCaptureSource: options.createCaptureSource ?? (() => new ConsoleCaptureFeed()),
    };
    this.persistence = new PersistenceWriter(this.options.persistence);
    this.generateCode = createCodeGenerator(this.options.codeLength);
    this.generatePassword = createPasswordGenerator(this.options.passwordLength);
  }

  startSession(authorityId: string): Session {
    this.removeStale();
    for (const runtime of this.sessions.values()) {
      if (runtime.session.authorityId === authorityId && runtime.session.state === 'active') {
        throw new AlreadyActiveError(authorityId);
      }
    }

    let code = this.generateCode();
    while (this.sessions.has(code)) {
      code = this.generateCode();
    }

    const session: Session = {
      code,
      password: this.generatePassword(),
      authorityId,
      authorityAddress: this.options.authorityAddress,
      createdAt: Date.now(),
      state: 'created',
    };
    const runtime = this.wire(session);
    this.sessions.set(code, runtime);

    session.state = 'active';
    runtime.hub.start();
    runtime.throttle.start();

    this.persistence.recordSession({ ...session });
    log.info({ sessionCode: code, authorityId }, 'session_started');
    return { ...session };
  }

  /**
   * Idempotent: ending an ended session does nothing.
   */
  endSession(sessionCode: string): void {
    const runtime = this.require(sessionCode);
    const { session } = runtime;
    if (session.state === 'ended') return;

    session.state = 'ended';
    session.endedAt = Date.now();
    runtime.finalStatistics = this.buildStatistics(runtime);

    runtime.stream.stop();
    runtime.hub.close();
    runtime.focus.dispose();
    runtime.throttle.dispose();

    this.persistence.finalizeSession(session.code, runtime.finalStatistics);
    this.notify(session.code, { type: 'SessionEnded', payload: {} });
    log.info(
      {
        sessionCode: session.code,
        durationMs: runtime.finalStatistics.durationElapsed,
        violations: runtime.finalStatistics.violationTotal,
      },
      'session_ended',
    );
  }

  getStatistics(sessionCode: string): SessionStatistics {
    const runtime = this.require(sessionCode);
    if (runtime.finalStatistics) {
      return structuredClone(runtime.finalStatistics);
    }
    return this.buildStatistics(runtime);
  }

  getSession(sessionCode: string): Session {
    return { ...this.require(sessionCode).session };
  }

  /**
   * What a joining client may learn about a session. Never the password.
   */
  getSessionInfo(sessionCode: string): SessionInfo {
    const { session, hub } = this.require(sessionCode);
    return {
      code: session.code,
      state: session.state,
      authorityAddress: session.authorityAddress,
      participantCount: hub.size,
      capacity: hub.capacity,
    };
  }

  listSessions(): SessionSummary[] {
    this.removeStale();
    return [...this.sessions.values()]
      .filter((runtime) => runtime.session.state === 'active')
      .map(({ session, hub }) => ({
        code: session.code,
        authorityId: session.authorityId,
        createdAt: session.createdAt,
        participantCount: hub.size,
      }));
  }

  /**
   * The hub a join for this code should go to. Ended sessions keep their
   * hub so a late join is told the session is no longer active.
   */
  findHub(sessionCode: string): ConnectionHub | undefined {
    return this.sessions.get(normalizeSessionCode(sessionCode))?.hub;
  }

  setFocusMode(sessionCode: string, mode: FocusMode, participantId?: string): void {
    this.requireActive(sessionCode).focus.setMode(mode, participantId);
  }

  async startStream(sessionCode: string, settings: StreamSettings): Promise<void> {
    const runtime = this.requireActive(sessionCode);
    if (settings.participantId !== undefined && !runtime.hub.has(settings.participantId)) {
      throw new UnknownParticipantError(settings.participantId);
    }
    try {
      await runtime.stream.start(settings);
    } catch (error) {
      if (error instanceof CaptureUnavailableError) {
        this.notify(runtime.session.code, { type: 'CaptureUnavailable', payload: { reason: error.message } });
      }
      throw error;
    }
  }

  stopStream(sessionCode: string): void {
    this.requireActive(sessionCode).stream.stop();
  }

  removeParticipant(sessionCode: string, participantId: string): void {
    if (!this.requireActive(sessionCode).hub.disconnect(participantId, 'removed')) {
      throw new UnknownParticipantError(participantId);
    }
  }

  /**
   * The console-fed capture source of an active session, when it uses one.
   */
  captureFeed(sessionCode: string): ConsoleCaptureFeed | undefined {
    const runtime = this.sessions.get(normalizeSessionCode(sessionCode));
    if (!runtime || runtime.session.state !== 'active') return undefined;
    return runtime.capture instanceof ConsoleCaptureFeed ? runtime.capture : undefined;
  }

  endSessionsFor(authorityId: string): number {
    let ended = 0;
    for (const runtime of [...this.sessions.values()]) {
      if (runtime.session.authorityId === authorityId && runtime.session.state === 'active') {
        this.endSession(runtime.session.code);
        ended += 1;
      }
    }
    return ended;
  }

  shutdown(): void {
    for (const runtime of [...this.sessions.values()]) {
      this.endSession(runtime.session.code);
    }
  }

  stats(): { sessions: number; participants: number } {
    let sessions = 0;
    let participants = 0;
    for (const runtime of this.sessions.values()) {
      if (runtime.session.state !== 'active') continue;
      sessions += 1;
      participants += runtime.hub.size;
    }
    return { sessions, participants };
  }

  removeStale(): void {
    const now = Date.now();
    for (const [code, runtime] of this.sessions) {
      const { endedAt } = runtime.session;
      if (endedAt !== undefined && now - endedAt > this.options.endedSessionRetentionMs) {
        runtime.hub.removeAllListeners();
        this.sessions.delete(code);
      }
    }
  }

  private wire(session: Session): SessionRuntime {
    const { code } = session;
    const hub = new ConnectionHub(
      { code, password: session.password, isActive: () => session.state === 'active' },
      this.options.hub,
    );
    const throttle = new ViolationThrottle(this.options.throttle);
    const focus = new FocusStateMachine(hub, throttle, { ...this.options.focus, sessionCode: code });
    const capture = this.options.createCaptureSource();
    const stream = new ScreenStreamPipeline(hub, capture, { ...this.options.stream, sessionCode: code });
    const runtime: SessionRuntime = { session, hub, throttle, focus, stream, capture };

    hub.on('joined', (participant) => {
      focus.track(participant.id);
      this.persistence.recordParticipant(code, participant);
    });
    hub.on('left', (participant) => {
      focus.untrack(participant.id);
      stream.removeRecipient(participant.id);
    });
    hub.on('roster', (participants) => {
      this.notify(code, { type: 'RosterUpdate', payload: { participants } });
    });
    hub.on('message', (participantId, envelope) => {
      this.route(runtime, participantId, envelope);
    });
    throttle.on('report', (report) => {
      this.persistence.recordViolation(code, report);
      this.notify(code, { type: 'ViolationReport', payload: report });
    });
    focus.on('compliance', (update) => {
      this.notify(code, { type: 'ComplianceUpdate', payload: update });
    });
    if (capture instanceof ConsoleCaptureFeed) {
      capture.on('configure', (request) => {
        this.notify(code, { type: 'CaptureConfigure', payload: request });
      });
      capture.on('lost', (reason) => {
        if (!stream.isActive) return;
        stream.stop();
        log.warn({ sessionCode: code, reason }, 'capture_lost');
        this.notify(code, { type: 'CaptureUnavailable', payload: { reason } });
      });
    }

    return runtime;
  }

  private route(runtime: SessionRuntime, participantId: string, envelope: Envelope): void {
    switch (envelope.type) {
      case 'FocusModeAck':
        runtime.focus.handleAck(participantId, envelope.payload.mode);
        break;
      case 'ViolationRaw':
        runtime.focus.handleViolation({
          participantId,
          kind: envelope.payload.kind,
          detail: envelope.payload.detail,
          timestamp: Date.now(),
        });
        break;
      case 'FrameAck':
        runtime.stream.acknowledge(participantId, envelope.payload.sequenceNumber);
        break;
      default:
        // Heartbeats only refresh liveness, which the hub already did.
        break;
    }
  }

  private buildStatistics(runtime: SessionRuntime): SessionStatistics {
    const { session, hub, focus, stream } = runtime;
    const participants = hub.roster().map((participant) => ({
      id: participant.id,
      displayName: participant.displayName,
      focusMode: participant.focusMode,
      compliance: focus.complianceOf(participant.id) ?? 'confirmed',
      violationCount: participant.violationCount,
    }));
    return {
      sessionCode: session.code,
      state: session.state,
      participantCount: participants.length,
      violationTotal: focus.violationTotal,
      durationElapsed: (session.endedAt ?? Date.now()) - session.createdAt,
      participants,
      stream: stream.stats(),
    };
  }

  private notify(sessionCode: string, message: OutboundMessage): void {
    this.emit('console', sessionCode, message);
  }

  private require(sessionCode: string): SessionRuntime {
    const normalized = normalizeSessionCode(sessionCode);
    const runtime = this.sessions.get(normalized);
    if (!runtime) {
      throw new UnknownSessionError(normalized);
    }
    return runtime;
  }

  private requireActive(sessionCode: string): SessionRuntime {
    const runtime = this.require(sessionCode);
    if (runtime.session.state !== 'active') {
      throw new SessionEndedError(runtime.session.code);
    }
    return runtime;
  }
}

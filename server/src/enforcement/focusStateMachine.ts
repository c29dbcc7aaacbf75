import { EventEmitter } from 'node:events';
import { config } from '../config.js';
import { UnknownParticipantError, toError } from '../lib/errors.js';
import { createLogger } from '../lib/logger.js';
import type { Logger } from '../lib/logger.js';
import type { ConnectionHub } from '../hub/connectionHub.js';
import type { ComplianceState, FocusMode, ViolationEvent } from '../types.js';
import type { ViolationThrottle } from './violationThrottle.js';

export interface FocusOptions {
  /** How long to wait for `FocusModeAck` before compliance becomes unknown. */
  ackTimeoutMs: number;
}

export interface ComplianceUpdate {
  participantId: string;
  mode: FocusMode;
  compliance: ComplianceState;
}

export type FocusEvents = {
  compliance: [update: ComplianceUpdate];
};

type FocusTransport = Pick<ConnectionHub, 'send' | 'broadcast' | 'updateParticipant'>;

interface FocusRecord {
  mode: FocusMode;
  compliance: ComplianceState;
  violationCount: number;
  ackTimer?: NodeJS.Timeout;
}

/**
 * A missing ack makes compliance unknown, never a violation.
 */
export class FocusStateMachine extends EventEmitter<FocusEvents> {
  private readonly records = new Map<string, FocusRecord>();
  private readonly options: FocusOptions;
  private readonly log: Logger;
  private sessionMode: FocusMode = 'off';
  private acceptedViolations = 0;

  constructor(
    private readonly transport: FocusTransport,
    private readonly throttle: ViolationThrottle,
    options: Partial<FocusOptions> & { sessionCode?: string } = {},
  ) {
    super();
    this.options = { ackTimeoutMs: options.ackTimeoutMs ?? config.focusAckTimeoutMs };
    this.log = createLogger({ module: 'focus', sessionCode: options.sessionCode });
  }

  /** Mode applied to participants that join later. */
  get currentSessionMode(): FocusMode {
    return this.sessionMode;
  }

  /** Raw violations accepted over the whole session, departed participants included. */
  get violationTotal(): number {
    return this.acceptedViolations;
  }

  track(participantId: string): void {
    if (this.records.has(participantId)) return;
    this.records.set(participantId, { mode: 'off', compliance: 'confirmed', violationCount: 0 });
    if (this.sessionMode !== 'off') {
      this.command(participantId, this.sessionMode);
    }
  }

  untrack(participantId: string): void {
    const record = this.records.get(participantId);
    if (!record) return;
    if (record.ackTimer) clearTimeout(record.ackTimer);
    this.records.delete(participantId);
    this.throttle.forgetParticipant(participantId);
  }

  setMode(mode: FocusMode, participantId?: string): void {
    if (participantId !== undefined) {
      if (!this.records.has(participantId)) {
        throw new UnknownParticipantError(participantId);
      }
      this.command(participantId, mode);
      return;
    }

    this.sessionMode = mode;
    const targets = [...this.records.keys()];
    for (const id of targets) {
      this.record(id, mode);
    }
    const result = this.transport.broadcast({ type: 'SetFocusMode', payload: { mode } });
    for (const id of targets) {
      this.armAckTimer(id, mode);
    }
    this.log.info(
      { mode, delivered: result.delivered.length, failed: result.failed.length },
      'focus_mode_broadcast',
    );
  }

  handleAck(participantId: string, mode: FocusMode): void {
    const record = this.records.get(participantId);
    if (!record) return;
    if (record.mode !== mode) {
      this.log.debug({ participantId, acked: mode, recorded: record.mode }, 'focus_ack_stale');
      return;
    }
    if (record.ackTimer) {
      clearTimeout(record.ackTimer);
      record.ackTimer = undefined;
    }
    if (record.compliance !== 'confirmed') {
      record.compliance = 'confirmed';
      this.emit('compliance', { participantId, mode, compliance: 'confirmed' });
    }
  }

  /** False when discarded: unknown participant or mode `off`. */
  handleViolation(event: ViolationEvent): boolean {
    const record = this.records.get(event.participantId);
    if (!record || record.mode === 'off') {
      return false;
    }
    record.violationCount += 1;
    this.acceptedViolations += 1;
    try {
      this.transport.updateParticipant(event.participantId, { violationCount: record.violationCount });
    } catch (error) {
      this.log.debug({ participantId: event.participantId, err: toError(error) }, 'violation_count_not_written');
    }
    this.throttle.record(event);
    return true;
  }

  modeOf(participantId: string): FocusMode | undefined {
    return this.records.get(participantId)?.mode;
  }

  complianceOf(participantId: string): ComplianceState | undefined {
    return this.records.get(participantId)?.compliance;
  }

  dispose(): void {
    for (const record of this.records.values()) {
      if (record.ackTimer) clearTimeout(record.ackTimer);
    }
    this.records.clear();
  }

  private command(participantId: string, mode: FocusMode): void {
    this.record(participantId, mode);
    try {
      this.transport.send(participantId, { type: 'SetFocusMode', payload: { mode } });
    } catch (error) {
      this.log.warn({ participantId, mode, err: toError(error) }, 'focus_command_failed');
    }
    // An undelivered command still waits out the ack bound and ends unknown.
    this.armAckTimer(participantId, mode);
  }

  private record(participantId: string, mode: FocusMode): void {
    const record = this.records.get(participantId);
    if (!record) return;
    record.mode = mode;
    record.compliance = 'pending';
    if (record.ackTimer) {
      clearTimeout(record.ackTimer);
      record.ackTimer = undefined;
    }
    try {
      this.transport.updateParticipant(participantId, { focusMode: mode });
    } catch (error) {
      this.log.debug({ participantId, err: toError(error) }, 'focus_mode_not_written');
    }
  }

  private armAckTimer(participantId: string, mode: FocusMode): void {
    const record = this.records.get(participantId);
    if (!record) return;
    if (record.ackTimer) clearTimeout(record.ackTimer);
    record.ackTimer = setTimeout(() => {
      record.ackTimer = undefined;
      if (record.mode !== mode || record.compliance !== 'pending') return;
      record.compliance = 'unknown';
      this.log.warn({ participantId, mode }, 'focus_ack_timeout');
      this.emit('compliance', { participantId, mode, compliance: 'unknown' });
    }, this.options.ackTimeoutMs);
  }
}

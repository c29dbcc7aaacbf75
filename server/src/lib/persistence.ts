import type { Participant, Session, SessionStatistics, ViolationReport } from '../types.js';
import { toError } from './errors.js';
import { createLogger } from './logger.js';
import type { Logger } from './logger.js';

/**
 * Narrow write-only interface to durable storage.
 */
export interface PersistenceGateway {
  recordSession(session: Session): Promise<void>;
  recordParticipant(sessionCode: string, participant: Participant): Promise<void>;
  recordViolation(sessionCode: string, report: ViolationReport): Promise<void>;
  finalizeSession(sessionCode: string, statistics: SessionStatistics): Promise<void>;
}

/**
 * Writes records to the structured log. Used when no store is configured.
 */
export class LoggingPersistenceGateway implements PersistenceGateway {
  private readonly log = createLogger({ module: 'persistence' });

  async recordSession(session: Session): Promise<void> {
    const { password: _password, ...record } = session;
    this.log.info({ record }, 'session_recorded');
  }

  async recordParticipant(sessionCode: string, participant: Participant): Promise<void> {
    this.log.info({ sessionCode, record: participant }, 'participant_recorded');
  }

  async recordViolation(sessionCode: string, report: ViolationReport): Promise<void> {
    this.log.info({ sessionCode, record: report }, 'violation_recorded');
  }

  async finalizeSession(sessionCode: string, statistics: SessionStatistics): Promise<void> {
    this.log.info({ sessionCode, record: statistics }, 'session_finalized');
  }
}

type GatewayOperation = keyof PersistenceGateway;

/**
 * Fire-and-forget wrapper: calls never block the caller and failures are
 * logged, never thrown.
 */
export class PersistenceWriter {
  private readonly log: Logger;

  constructor(private readonly gateway: PersistenceGateway) {
    this.log = createLogger({ module: 'persistence-writer' });
  }

  recordSession(session: Session): void {
    this.run('recordSession', session.code, () => this.gateway.recordSession(session));
  }

  recordParticipant(sessionCode: string, participant: Participant): void {
    this.run('recordParticipant', sessionCode, () => this.gateway.recordParticipant(sessionCode, participant));
  }

  recordViolation(sessionCode: string, report: ViolationReport): void {
    this.run('recordViolation', sessionCode, () => this.gateway.recordViolation(sessionCode, report));
  }

  finalizeSession(sessionCode: string, statistics: SessionStatistics): void {
    this.run('finalizeSession', sessionCode, () => this.gateway.finalizeSession(sessionCode, statistics));
  }

  private run(operation: GatewayOperation, sessionCode: string, write: () => Promise<void>): void {
    const onFailure = (error: unknown) => {
      this.log.error({ operation, sessionCode, err: toError(error) }, 'persistence_write_failed');
    };
    try {
      write().catch(onFailure);
    } catch (error) {
      onFailure(error);
    }
  }
}

export type ErrorCode =
  | 'ALREADY_ACTIVE'
  | 'AUTH_FAILURE'
  | 'UNKNOWN_PARTICIPANT'
  | 'UNKNOWN_SESSION'
  | 'SESSION_ENDED'
  | 'CAPTURE_UNAVAILABLE'
  | 'UNKNOWN_MESSAGE_TYPE'
  | 'INVALID_MESSAGE'
  | 'DELIVERY_FAILED';

/**
 * Base error class for classroom control-plane errors
 */
export class ClassroomError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'ClassroomError';
  }
}

/**
 * The authority already owns an Active session
 */
export class AlreadyActiveError extends ClassroomError {
  constructor(authorityId: string) {
    super('ALREADY_ACTIVE', `Authority ${authorityId} already has an active session`);
    this.name = 'AlreadyActiveError';
  }
}

export type AuthFailureReason = 'InvalidCredentials' | 'SessionNotActive' | 'SessionFull';

/**
 * Join refused. Only ever reported to the rejected channel.
 */
export class AuthFailure extends ClassroomError {
  constructor(public readonly reason: AuthFailureReason) {
    super('AUTH_FAILURE', reason);
    this.name = 'AuthFailure';
  }
}

export class UnknownParticipantError extends ClassroomError {
  constructor(participantId: string) {
    super('UNKNOWN_PARTICIPANT', `Participant ${participantId} not found`);
    this.name = 'UnknownParticipantError';
  }
}

export class UnknownSessionError extends ClassroomError {
  constructor(sessionCode: string) {
    super('UNKNOWN_SESSION', `Session ${sessionCode} not found`);
    this.name = 'UnknownSessionError';
  }
}

export class SessionEndedError extends ClassroomError {
  constructor(sessionCode: string) {
    super('SESSION_ENDED', `Session ${sessionCode} has ended`);
    this.name = 'SessionEndedError';
  }
}

/**
 * Screen source cannot be accessed (no capture feed, missing monitor)
 */
export class CaptureUnavailableError extends ClassroomError {
  constructor(reason: string) {
    super('CAPTURE_UNAVAILABLE', reason);
    this.name = 'CaptureUnavailableError';
  }
}

export class UnknownMessageTypeError extends ClassroomError {
  constructor(public readonly type: string) {
    super('UNKNOWN_MESSAGE_TYPE', `Unknown message type: ${type}`);
    this.name = 'UnknownMessageTypeError';
  }
}

export class InvalidMessageError extends ClassroomError {
  constructor(message: string) {
    super('INVALID_MESSAGE', message);
    this.name = 'InvalidMessageError';
  }
}

export class DeliveryError extends ClassroomError {
  constructor(participantId: string, cause: unknown) {
    super(
      'DELIVERY_FAILED',
      `Delivery to ${participantId} failed: ${cause instanceof Error ? cause.message : String(cause)}`,
    );
    this.name = 'DeliveryError';
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

import type { QualityName } from './config.js';

export type SessionState = 'created' | 'active' | 'ended';

export type FocusMode = 'off' | 'lightweight' | 'full';

export type ComplianceState = 'confirmed' | 'pending' | 'unknown';

export type DisconnectReason = 'left' | 'timeout' | 'removed' | 'session_ended' | 'channel_error';

export const VIOLATION_KINDS = [
  'focus-lost',
  'window-switch',
  'unauthorized-process',
  'restricted-keys',
  'browser-tabs',
  'low-battery',
  'unknown',
] as const;

export type ViolationKind = (typeof VIOLATION_KINDS)[number];

export interface Session {
  code: string;
  password: string;
  authorityId: string;
  authorityAddress: string;
  createdAt: number;
  endedAt?: number;
  state: SessionState;
}

export interface Participant {
  id: string;
  displayName: string;
  remoteAddress: string;
  joinedAt: number;
  focusMode: FocusMode;
  violationCount: number;
}

export interface ViolationEvent {
  participantId: string;
  kind: string;
  timestamp: number;
  detail: string;
}

export interface ViolationReport {
  participantId: string;
  kind: ViolationKind;
  windowStart: number;
  windowEnd: number;
  occurrenceCount: number;
  representativeDetail: string;
}

export interface Frame {
  sequenceNumber: number;
  capturedAt: number;
  quality: QualityName;
  payload: Buffer;
  monitorIndex: number;
}

export interface StreamSettings {
  quality: QualityName;
  monitorIndex: number;
  /** Restrict delivery to one participant; all participants otherwise. */
  participantId?: string;
}

export interface StreamStats {
  active: boolean;
  framesCaptured: number;
  framesSent: number;
  framesDropped: number;
}

export interface ParticipantStatus {
  id: string;
  displayName: string;
  focusMode: FocusMode;
  compliance: ComplianceState;
  violationCount: number;
}

export interface SessionStatistics {
  sessionCode: string;
  state: SessionState;
  participantCount: number;
  violationTotal: number;
  durationElapsed: number;
  participants: ParticipantStatus[];
  stream: StreamStats;
}

export interface SessionInfo {
  code: string;
  state: SessionState;
  authorityAddress: string;
  participantCount: number;
  capacity: number;
}

/**
 * Everything a learner endpoint needs to join, as handed out on a QR code or
 * a printed slip.
 */
export interface JoinInvitation {
  type: 'focusroom-invite';
  version: string;
  authorityAddress: string;
  port: number;
  sessionCode: string;
  password: string;
}

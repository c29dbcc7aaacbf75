import { describe, expect, it, vi } from 'vitest';
import { PersistenceWriter } from '../lib/persistence.js';
import type { PersistenceGateway } from '../lib/persistence.js';
import type { Session } from '../types.js';

const session: Session = {
  code: 'ABCD2345',
  password: 'test-secret',
  authorityId: 'teacher-1',
  authorityAddress: '192.168.1.10',
  createdAt: 1_000,
  state: 'active',
};

function gateway(overrides: Partial<PersistenceGateway> = {}): PersistenceGateway {
  return {
    recordSession: vi.fn(async () => undefined),
    recordParticipant: vi.fn(async () => undefined),
    recordViolation: vi.fn(async () => undefined),
    finalizeSession: vi.fn(async () => undefined),
    ...overrides,
  };
}

describe('PersistenceWriter', () => {
  it('forwards writes to the gateway', () => {
    const target = gateway();
    const writer = new PersistenceWriter(target);

    writer.recordSession(session);

    expect(target.recordSession).toHaveBeenCalledWith(session);
  });

  it('does not surface rejected writes', async () => {
    const finalizeSession = vi.fn(async () => {
      throw new Error('disk full');
    });
    const writer = new PersistenceWriter(gateway({ finalizeSession }));

    expect(() =>
      writer.finalizeSession('ABCD2345', {
        sessionCode: 'ABCD2345',
        state: 'ended',
        participantCount: 0,
        violationTotal: 0,
        durationElapsed: 0,
        participants: [],
        stream: { active: false, framesCaptured: 0, framesSent: 0, framesDropped: 0 },
      }),
    ).not.toThrow();
    await Promise.resolve();
    expect(finalizeSession).toHaveBeenCalledTimes(1);
  });

  it('does not surface synchronous gateway throws', () => {
    const recordViolation = vi.fn((): Promise<void> => {
      throw new Error('not connected');
    });
    const writer = new PersistenceWriter(gateway({ recordViolation }));

    expect(() =>
      writer.recordViolation('ABCD2345', {
        participantId: 'p-1',
        kind: 'focus-lost',
        windowStart: 0,
        windowEnd: 0,
        occurrenceCount: 1,
        representativeDetail: '',
      }),
    ).not.toThrow();
  });
});

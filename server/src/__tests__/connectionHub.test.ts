import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { CLOSE_CODES } from '../hub/channel.js';
import { AuthFailure, DeliveryError, UnknownParticipantError } from '../lib/errors.js';
import type { DisconnectReason } from '../types.js';
import { encodeMessage } from '../ws/codec.js';
import { FakeChannel, TEST_CODE, TEST_PASSWORD, joinAs, makeHub } from './helpers.js';

function authFailureOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof AuthFailure) return error.reason;
    throw error;
  }
  return undefined;
}

describe('ConnectionHub', () => {
  describe('authenticate', () => {
    it('admits a participant and announces the roster', () => {
      const hub = makeHub();
      const joined = vi.fn();
      hub.on('joined', joined);

      const { participant, channel } = joinAs(hub, '  Ada  ', new FakeChannel('10.0.0.7'));

      expect(participant.displayName).toBe('Ada');
      expect(participant.remoteAddress).toBe('10.0.0.7');
      expect(participant.focusMode).toBe('off');
      expect(participant.violationCount).toBe(0);
      expect(joined).toHaveBeenCalledWith(participant);

      const [accepted, roster] = channel.messages();
      expect(accepted?.type).toBe('JoinAccepted');
      expect(accepted?.payload).toEqual({ participantId: participant.id });
      expect(roster?.type).toBe('RosterUpdate');
      expect(hub.size).toBe(1);
    });

    it('accepts a lower-case code', () => {
      const hub = makeHub();
      const participant = hub.authenticate({
        code: TEST_CODE.toLowerCase(),
        password: TEST_PASSWORD,
        displayName: 'Ada',
        remoteAddress: '10.0.0.7',
        channel: new FakeChannel(),
      });
      expect(hub.has(participant.id)).toBe(true);
    });

    it('rejects bad credentials without touching the roster', () => {
      const hub = makeHub();
      const channel = new FakeChannel();

      const wrongPassword = authFailureOf(() =>
        hub.authenticate({ code: TEST_CODE, password: 'wrong', displayName: 'Eve', remoteAddress: 'x', channel }),
      );
      const wrongCode = authFailureOf(() =>
        hub.authenticate({ code: 'ZZZZ9999', password: TEST_PASSWORD, displayName: 'Eve', remoteAddress: 'x', channel }),
      );

      expect(wrongPassword).toBe('InvalidCredentials');
      expect(wrongCode).toBe('InvalidCredentials');
      expect(hub.size).toBe(0);
      expect(channel.sent).toHaveLength(0);
    });

    it('rejects joins to an inactive session', () => {
      const hub = makeHub({}, { isActive: () => false });
      expect(authFailureOf(() => joinAs(hub, 'Ada'))).toBe('SessionNotActive');
    });

    it('checks credentials before session state', () => {
      const hub = makeHub({}, { isActive: () => false });
      const reason = authFailureOf(() =>
        hub.authenticate({
          code: TEST_CODE,
          password: 'wrong',
          displayName: 'Eve',
          remoteAddress: 'x',
          channel: new FakeChannel(),
        }),
      );
      expect(reason).toBe('InvalidCredentials');
    });

    it('rejects joins beyond capacity', () => {
      const hub = makeHub({ maxParticipants: 1 });
      joinAs(hub, 'Ada');
      expect(authFailureOf(() => joinAs(hub, 'Bob'))).toBe('SessionFull');
      expect(hub.size).toBe(1);
    });

    it('does not admit a channel that cannot be written', () => {
      const hub = makeHub();
      const channel = new FakeChannel();
      channel.failSends = true;

      expect(() => joinAs(hub, 'Ada', channel)).toThrow(DeliveryError);
      expect(hub.size).toBe(0);
    });
  });

  describe('delivery', () => {
    it('sends to one participant', () => {
      const hub = makeHub();
      const ada = joinAs(hub, 'Ada');
      const bob = joinAs(hub, 'Bob');
      const before = bob.channel.sent.length;

      hub.send(ada.participant.id, { type: 'SetFocusMode', payload: { mode: 'full' } });

      expect(ada.channel.ofType('SetFocusMode')).toHaveLength(1);
      expect(bob.channel.sent).toHaveLength(before);
    });

    it('fails unicast to an unknown participant', () => {
      const hub = makeHub();
      expect(() => hub.send('nobody', { type: 'Heartbeat', payload: {} })).toThrow(UnknownParticipantError);
    });

    it('wraps channel failures on unicast', () => {
      const hub = makeHub();
      const { participant, channel } = joinAs(hub, 'Ada');
      channel.failSends = true;
      expect(() => hub.send(participant.id, { type: 'Heartbeat', payload: {} })).toThrow(DeliveryError);
    });

    it('keeps broadcasting past a failing recipient', () => {
      const hub = makeHub();
      const ada = joinAs(hub, 'Ada');
      const bob = joinAs(hub, 'Bob');
      const carol = joinAs(hub, 'Carol');
      const failures = vi.fn();
      hub.on('deliveryFailed', failures);
      bob.channel.failSends = true;

      const result = hub.broadcast({ type: 'SetFocusMode', payload: { mode: 'lightweight' } });

      expect(result.delivered).toEqual([ada.participant.id, carol.participant.id]);
      expect(result.failed.map((failure) => failure.participantId)).toEqual([bob.participant.id]);
      expect(failures).toHaveBeenCalledTimes(1);
      expect(carol.channel.ofType('SetFocusMode')).toHaveLength(1);
    });

    it('skips the excluded participant', () => {
      const hub = makeHub();
      const ada = joinAs(hub, 'Ada');
      const bob = joinAs(hub, 'Bob');

      const result = hub.broadcast({ type: 'Heartbeat', payload: {} }, ada.participant.id);

      expect(result.delivered).toEqual([bob.participant.id]);
    });
  });

  describe('disconnect', () => {
    it('removes a participant exactly once', () => {
      const hub = makeHub();
      const ada = joinAs(hub, 'Ada');
      const bob = joinAs(hub, 'Bob');
      const left = vi.fn();
      hub.on('left', left);

      expect(hub.disconnect(ada.participant.id, 'removed')).toBe(true);
      expect(hub.disconnect(ada.participant.id, 'left')).toBe(false);

      expect(left).toHaveBeenCalledTimes(1);
      expect(left).toHaveBeenCalledWith(ada.participant, 'removed');
      expect(ada.channel.closedWith).toEqual({ code: CLOSE_CODES.removed, reason: 'removed' });
      expect(hub.has(ada.participant.id)).toBe(false);

      const rosters = bob.channel.ofType('RosterUpdate');
      const last = rosters[rosters.length - 1];
      expect(last?.type === 'RosterUpdate' && last.payload.participants.map((p) => p.id)).toEqual([
        bob.participant.id,
      ]);
    });

    it('closes every channel once when the session ends', () => {
      const hub = makeHub();
      const ada = joinAs(hub, 'Ada');
      const bob = joinAs(hub, 'Bob');
      const reasons: DisconnectReason[] = [];
      const rosters = vi.fn();
      hub.on('left', (_participant, reason) => reasons.push(reason));
      hub.on('roster', rosters);

      hub.close();

      for (const { channel } of [ada, bob]) {
        const messages = channel.messages();
        expect(messages[messages.length - 1]?.type).toBe('SessionEnded');
        expect(channel.ofType('SessionEnded')).toHaveLength(1);
        expect(channel.closedWith?.code).toBe(CLOSE_CODES.session_ended);
      }
      expect(reasons).toEqual(['session_ended', 'session_ended']);
      expect(rosters).toHaveBeenCalledWith([]);
      expect(hub.size).toBe(0);
    });
  });

  describe('inbound traffic', () => {
    it('stamps the authenticated sender on accepted messages', () => {
      const hub = makeHub();
      const { participant } = joinAs(hub, 'Ada');
      const received = vi.fn();
      hub.on('message', received);

      hub.receive(
        participant.id,
        encodeMessage(
          { type: 'ViolationRaw', payload: { kind: 'focus-lost', detail: 'alt-tab' } },
          { sessionCode: TEST_CODE, senderId: 'someone-else' },
        ),
      );

      expect(received).toHaveBeenCalledTimes(1);
      const [senderId, envelope] = received.mock.calls[0] ?? [];
      expect(senderId).toBe(participant.id);
      expect(envelope).toMatchObject({
        type: 'ViolationRaw',
        senderId: participant.id,
        payload: { kind: 'focus-lost', detail: 'alt-tab' },
      });
    });

    it('drops undecodable and authority-only messages', () => {
      const hub = makeHub();
      const { participant } = joinAs(hub, 'Ada');
      const received = vi.fn();
      hub.on('message', received);

      hub.receive(participant.id, '{oops');
      hub.receive(participant.id, encodeMessage({ type: 'SessionEnded', payload: {} }, { sessionCode: TEST_CODE }));

      expect(received).not.toHaveBeenCalled();
      expect(hub.has(participant.id)).toBe(true);
    });
  });

  describe('liveness', () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('times out silent participants and keeps talkative ones', () => {
      const hub = makeHub({ heartbeatMs: 1_000, connectionTimeoutMs: 3_000 });
      const quiet = joinAs(hub, 'Quiet');
      const chatty = joinAs(hub, 'Chatty');
      const left = vi.fn();
      hub.on('left', left);
      hub.start();

      vi.advanceTimersByTime(2_500);
      hub.receive(chatty.participant.id, encodeMessage({ type: 'Heartbeat', payload: {} }, { sessionCode: TEST_CODE }));
      vi.advanceTimersByTime(1_500);

      expect(left).toHaveBeenCalledTimes(1);
      expect(left).toHaveBeenCalledWith(quiet.participant, 'timeout');
      expect(quiet.channel.closedWith?.code).toBe(CLOSE_CODES.timeout);
      expect(hub.has(chatty.participant.id)).toBe(true);
      expect(chatty.channel.ofType('Heartbeat').length).toBeGreaterThan(0);
      hub.stop();
    });

    it('drops a participant whose heartbeat cannot be written', () => {
      const hub = makeHub();
      const { participant, channel } = joinAs(hub, 'Ada');
      const left = vi.fn();
      hub.on('left', left);
      channel.failSends = true;

      hub.checkLiveness();

      expect(left).toHaveBeenCalledWith(participant, 'channel_error');
      expect(hub.size).toBe(0);
    });
  });
});

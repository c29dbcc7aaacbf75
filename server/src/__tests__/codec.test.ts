import { describe, expect, it } from 'vitest';
import { InvalidMessageError, UnknownMessageTypeError } from '../lib/errors.js';
import { decodeMessage, encodeMessage, normalizeSessionCode } from '../ws/codec.js';
import { MESSAGE_TYPES, isMessageType } from '../ws/schemas.js';

function raw(type: string, payload: unknown, extra: Record<string, unknown> = {}): string {
  return JSON.stringify({ type, sessionCode: 'ABCD2345', senderId: null, payload, sentAt: 1_000, ...extra });
}

describe('protocol codec', () => {
  it('encodes the envelope with authority defaults', () => {
    const text = encodeMessage({ type: 'SetFocusMode', payload: { mode: 'full' } }, { sessionCode: 'ABCD2345', sentAt: 42 });
    expect(JSON.parse(text)).toEqual({
      type: 'SetFocusMode',
      sessionCode: 'ABCD2345',
      senderId: null,
      payload: { mode: 'full' },
      sentAt: 42,
    });
  });

  it('decodes a join into a typed envelope', () => {
    const envelope = decodeMessage(raw('Join', { displayName: '  Ada ', password: 'test-secret' }));
    expect(envelope.type).toBe('Join');
    if (envelope.type === 'Join') {
      expect(envelope.payload.displayName).toBe('Ada');
      expect(envelope.payload.password).toBe('test-secret');
    }
    expect(envelope.sessionCode).toBe('ABCD2345');
    expect(envelope.sentAt).toBe(1_000);
  });

  it('fills payload defaults on decode', () => {
    const envelope = decodeMessage(raw('ViolationRaw', { kind: 'focus-lost' }));
    expect(envelope.type === 'ViolationRaw' && envelope.payload.detail).toBe('');
  });

  it('rejects tags outside the message set', () => {
    expect(() => decodeMessage(raw('Teleport', {}))).toThrow(UnknownMessageTypeError);
  });

  it('rejects malformed payloads of known tags', () => {
    expect(() => decodeMessage(raw('FrameAck', { sequenceNumber: -1 }))).toThrow(InvalidMessageError);
    expect(() => decodeMessage(raw('SetFocusMode', { mode: 'strict' }))).toThrow(InvalidMessageError);
  });

  it('rejects bad json and bad envelopes', () => {
    expect(() => decodeMessage('{not json')).toThrow(InvalidMessageError);
    expect(() => decodeMessage(JSON.stringify({ type: 'Heartbeat', payload: {} }))).toThrow(InvalidMessageError);
  });

  it('keeps the participant sender id', () => {
    const envelope = decodeMessage(raw('Heartbeat', {}, { senderId: 'p-1' }));
    expect(envelope.senderId).toBe('p-1');
  });

  it('lists every message type', () => {
    expect(MESSAGE_TYPES).toHaveLength(18);
    expect(isMessageType('FrameData')).toBe(true);
    expect(isMessageType('frameData')).toBe(false);
  });

  it('normalizes session codes', () => {
    expect(normalizeSessionCode(' abcd2345 ')).toBe('ABCD2345');
  });
});

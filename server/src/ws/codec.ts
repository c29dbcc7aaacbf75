import { InvalidMessageError, UnknownMessageTypeError } from '../lib/errors.js';
import { envelopeSchema, isMessageType, messageSchema } from './schemas.js';
import type { Message, MessageType, OutboundMessage } from './schemas.js';

export interface EnvelopeHeader {
  sessionCode: string;
  /** Null for authority-originated messages. */
  senderId: string | null;
  sentAt: number;
}

export type Envelope<M extends { type: MessageType } = Message> = M & EnvelopeHeader;

export function encodeMessage(
  message: OutboundMessage,
  header: Pick<EnvelopeHeader, 'sessionCode'> & Partial<EnvelopeHeader>,
): string {
  return JSON.stringify({
    type: message.type,
    sessionCode: header.sessionCode,
    senderId: header.senderId ?? null,
    payload: message.payload,
    sentAt: header.sentAt ?? Date.now(),
  });
}

/**
 * Decodes one wire frame into a typed envelope.
 *
 * Fails with `UnknownMessageTypeError` when the tag is outside the closed
 * message set, and with `InvalidMessageError` for anything else malformed.
 */
export function decodeMessage(raw: string): Envelope {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new InvalidMessageError('Message is not valid JSON');
  }

  const envelope = envelopeSchema.safeParse(json);
  if (!envelope.success) {
    throw new InvalidMessageError(`Malformed envelope: ${envelope.error.issues[0]?.message ?? 'invalid'}`);
  }
  const { type, payload, sessionCode, senderId, sentAt } = envelope.data;
  if (!isMessageType(type)) {
    throw new UnknownMessageTypeError(type);
  }

  const message = messageSchema.safeParse({ type, payload });
  if (!message.success) {
    const issue = message.error.issues[0];
    throw new InvalidMessageError(
      `Invalid ${type} payload${issue ? ` at ${issue.path.join('.')}: ${issue.message}` : ''}`,
    );
  }

  return { ...message.data, sessionCode, senderId, sentAt };
}

export function normalizeSessionCode(code: string): string {
  return code.trim().toUpperCase();
}

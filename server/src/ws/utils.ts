import type WebSocket from 'ws';
import type { IncomingMessage } from 'node:http';
import { encodeMessage } from './codec.js';
import type { EnvelopeHeader } from './codec.js';
import type { OutboundMessage } from './schemas.js';

export function send(
  socket: WebSocket,
  message: OutboundMessage,
  header: Pick<EnvelopeHeader, 'sessionCode'> & Partial<EnvelopeHeader>,
): boolean {
  if (socket.readyState !== socket.OPEN) return false;
  socket.send(encodeMessage(message, header));
  return true;
}

/**
 * Observed peer address, without the IPv4-mapped IPv6 prefix.
 */
export function remoteAddressOf(request: IncomingMessage): string {
  const address = request.socket.remoteAddress;
  if (!address) return 'unknown';
  return address.startsWith('::ffff:') ? address.slice('::ffff:'.length) : address;
}

export function rawToString(raw: WebSocket.RawData): string {
  if (Array.isArray(raw)) return Buffer.concat(raw).toString('utf8');
  if (raw instanceof ArrayBuffer) return Buffer.from(raw).toString('utf8');
  return raw.toString('utf8');
}

import type { IncomingMessage, Server } from 'node:http';
import type { Duplex } from 'node:stream';
import { WebSocketServer } from 'ws';
import type WebSocket from 'ws';
import { config } from '../config.js';
import { AUTH_FAILURE_CLOSE_CODE, WebSocketChannel } from '../hub/channel.js';
import type { ConnectionHub } from '../hub/connectionHub.js';
import { bearerToken, isAuthority } from '../lib/authority.js';
import { AuthFailure, toError } from '../lib/errors.js';
import { createLogger } from '../lib/logger.js';
import type { SessionManager } from '../lib/sessionManager.js';
import { decodeMessage, normalizeSessionCode } from './codec.js';
import type { Envelope } from './codec.js';
import { registerConsoleChannel } from './console.js';
import type { PayloadOf } from './schemas.js';
import { rawToString, remoteAddressOf, send } from './utils.js';

const log = createLogger({ module: 'ws' });

export interface WebSocketOptions {
  authTimeoutMs: number;
  authorityToken?: string;
}

export interface WebSocketServerHandle {
  participants: WebSocketServer;
  consoles: WebSocketServer;
  close(): void;
}

export function registerWebSocketServer(
  httpServer: Server,
  manager: SessionManager,
  options: Partial<WebSocketOptions> = {},
): WebSocketServerHandle {
  const settings: WebSocketOptions = {
    authTimeoutMs: options.authTimeoutMs ?? config.authTimeoutMs,
    authorityToken: options.authorityToken ?? config.authorityToken,
  };
  const participants = new WebSocketServer({ noServer: true });
  const consoles = new WebSocketServer({ noServer: true });

  httpServer.on('upgrade', (request: IncomingMessage, socket: Duplex, head: Buffer) => {
    const url = new URL(request.url ?? '/', 'http://localhost');

    if (url.pathname === '/ws') {
      participants.handleUpgrade(request, socket, head, (client) => {
        participants.emit('connection', client, request);
      });
      return;
    }

    if (url.pathname === '/ws/console') {
      const presented = bearerToken(request.headers.authorization) ?? url.searchParams.get('token') ?? undefined;
      if (!isAuthority(settings.authorityToken, presented, remoteAddressOf(request))) {
        log.warn({ ip: remoteAddressOf(request) }, 'console_upgrade_refused');
        socket.write('HTTP/1.1 401 Unauthorized\r\n\r\n');
        socket.destroy();
        return;
      }
      consoles.handleUpgrade(request, socket, head, (client) => {
        consoles.emit('connection', client, request);
      });
      return;
    }

    socket.destroy();
  });

  participants.on('connection', (socket: WebSocket, request: IncomingMessage) => {
    handleParticipantConnection(socket, request, manager, settings);
  });

  const detachConsoles = registerConsoleChannel(consoles, manager);

  return {
    participants,
    consoles,
    close() {
      detachConsoles();
      for (const client of participants.clients) client.terminate();
      for (const client of consoles.clients) client.terminate();
      participants.close();
      consoles.close();
    },
  };
}

function handleParticipantConnection(
  socket: WebSocket,
  request: IncomingMessage,
  manager: SessionManager,
  settings: WebSocketOptions,
): void {
  const remoteAddress = remoteAddressOf(request);
  const channel = new WebSocketChannel(socket, remoteAddress);
  let membership: { hub: ConnectionHub; participantId: string } | null = null;

  log.info({ ip: remoteAddress }, 'ws_connected');

  const authTimer = setTimeout(() => {
    if (membership) return;
    log.warn({ ip: remoteAddress }, 'ws_auth_timeout');
    socket.close(AUTH_FAILURE_CLOSE_CODE, 'auth_timeout');
  }, settings.authTimeoutMs);

  const reject = (reason: PayloadOf<'JoinRejected'>['reason'], sessionCode: string) => {
    send(socket, { type: 'JoinRejected', payload: { reason } }, { sessionCode });
    socket.close(AUTH_FAILURE_CLOSE_CODE, reason);
    log.warn({ ip: remoteAddress, reason }, 'join_rejected');
  };

  const handleJoin = (raw: string) => {
    let envelope: Envelope;
    try {
      envelope = decodeMessage(raw);
    } catch (error) {
      log.warn({ ip: remoteAddress, err: toError(error) }, 'ws_invalid_message');
      reject('InvalidJoin', '');
      return;
    }
    if (envelope.type !== 'Join') {
      reject('InvalidJoin', envelope.sessionCode);
      return;
    }

    const sessionCode = normalizeSessionCode(envelope.sessionCode);
    const hub = manager.findHub(sessionCode);
    if (!hub) {
      reject('InvalidCredentials', sessionCode);
      return;
    }

    try {
      const participant = hub.authenticate({
        code: sessionCode,
        password: envelope.payload.password,
        displayName: envelope.payload.displayName,
        remoteAddress,
        channel,
      });
      membership = { hub, participantId: participant.id };
      clearTimeout(authTimer);
    } catch (error) {
      if (error instanceof AuthFailure) {
        reject(error.reason, sessionCode);
        return;
      }
      log.error({ ip: remoteAddress, err: toError(error) }, 'join_failed');
      socket.close(AUTH_FAILURE_CLOSE_CODE, 'join_failed');
    }
  };

  socket.on('message', (raw) => {
    const text = rawToString(raw);
    if (membership) {
      membership.hub.receive(membership.participantId, text);
      return;
    }
    handleJoin(text);
  });

  socket.on('close', () => {
    clearTimeout(authTimer);
    if (membership) {
      membership.hub.disconnect(membership.participantId, 'left');
    }
    log.info({ ip: remoteAddress, participantId: membership?.participantId }, 'ws_disconnected');
  });

  socket.on('error', (err) => {
    log.error({ err, ip: remoteAddress }, 'ws_error');
    if (membership) {
      membership.hub.disconnect(membership.participantId, 'channel_error');
    } else {
      socket.close();
    }
  });
}

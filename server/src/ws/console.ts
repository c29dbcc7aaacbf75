import type { IncomingMessage } from 'node:http';
import type WebSocket from 'ws';
import type { WebSocketServer } from 'ws';
import { v4 as uuid } from 'uuid';
import { toError } from '../lib/errors.js';
import { createLogger } from '../lib/logger.js';
import type { SessionManager } from '../lib/sessionManager.js';
import type { ConsoleCaptureFeed } from '../streaming/captureSource.js';
import { decodeMessage, normalizeSessionCode } from './codec.js';
import type { Envelope } from './codec.js';
import type { OutboundMessage } from './schemas.js';
import { rawToString, remoteAddressOf, send } from './utils.js';

const log = createLogger({ module: 'console' });

export const CONSOLE_REFUSED_CLOSE_CODE = 4404;

interface ConsoleAttachment {
  consoleId: string;
  sessionCode: string;
  feed?: ConsoleCaptureFeed;
}

/**
 * Authority console endpoint. A console attaches to one active session,
 * receives that session's notifications and, when it announces monitors,
 * may feed the session's capture source.
 *
 * Returns a function that stops forwarding notifications.
 */
export function registerConsoleChannel(wss: WebSocketServer, manager: SessionManager): () => void {
  const consoles = new Map<string, Set<WebSocket>>();

  const forward = (sessionCode: string, message: OutboundMessage) => {
    const sockets = consoles.get(sessionCode);
    if (!sockets) return;
    for (const socket of sockets) {
      send(socket, message, { sessionCode });
    }
  };
  manager.on('console', forward);

  wss.on('connection', (socket: WebSocket, request: IncomingMessage) => {
    const ip = remoteAddressOf(request);
    let attachment: ConsoleAttachment | null = null;

    log.info({ ip }, 'console_connected');

    socket.on('message', (raw) => {
      let envelope: Envelope;
      try {
        envelope = decodeMessage(rawToString(raw));
      } catch (error) {
        log.warn({ ip, err: toError(error) }, 'console_invalid_message');
        return;
      }

      if (!attachment) {
        if (envelope.type !== 'ConsoleAttach') {
          log.warn({ ip, type: envelope.type }, 'console_not_attached');
          return;
        }
        const sessionCode = normalizeSessionCode(envelope.sessionCode);
        const feed = manager.captureFeed(sessionCode);
        if (!feed) {
          log.warn({ ip, sessionCode }, 'console_attach_refused');
          socket.close(CONSOLE_REFUSED_CLOSE_CODE, 'session_not_active');
          return;
        }

        attachment = { consoleId: uuid(), sessionCode };
        if (envelope.payload.monitors > 0) {
          feed.attach(attachment.consoleId, envelope.payload.monitors);
          attachment.feed = feed;
        }
        const sockets = consoles.get(sessionCode) ?? new Set<WebSocket>();
        sockets.add(socket);
        consoles.set(sessionCode, sockets);

        send(socket, { type: 'ConsoleAttached', payload: { sessionCode } }, { sessionCode });
        log.info(
          {
            ip,
            sessionCode,
            consoleId: attachment.consoleId,
            monitors: envelope.payload.monitors,
            deviceName: envelope.payload.deviceName,
          },
          'console_attached',
        );
        return;
      }

      switch (envelope.type) {
        case 'CaptureFrame': {
          if (!attachment.feed) return;
          const data = Buffer.from(envelope.payload.data, 'base64');
          attachment.feed.push(attachment.consoleId, envelope.payload.monitorIndex, data);
          break;
        }
        case 'Heartbeat':
          break;
        default:
          log.debug({ ip, type: envelope.type }, 'console_message_ignored');
      }
    });

    socket.on('close', () => {
      if (!attachment) return;
      const { consoleId, sessionCode, feed } = attachment;
      feed?.detach(consoleId);
      const sockets = consoles.get(sessionCode);
      sockets?.delete(socket);
      if (sockets && sockets.size === 0) {
        consoles.delete(sessionCode);
      }
      log.info({ ip, sessionCode, consoleId }, 'console_detached');
    });

    socket.on('error', (err) => {
      log.error({ ip, err }, 'console_error');
    });
  });

  return () => {
    manager.off('console', forward);
    consoles.clear();
  };
}

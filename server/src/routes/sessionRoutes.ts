import { Router } from 'express';
import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { z, ZodError } from 'zod';
import { config } from '../config.js';
import { bearerToken, isAuthority } from '../lib/authority.js';
import { ClassroomError, toError } from '../lib/errors.js';
import { createInvitation } from '../lib/invitation.js';
import type { ErrorCode } from '../lib/errors.js';
import { createLogger } from '../lib/logger.js';
import type { SessionManager } from '../lib/sessionManager.js';
import { focusModeSchema, qualitySchema } from '../ws/schemas.js';

const log = createLogger({ module: 'session-routes' });

const startSessionSchema = z.object({
  authorityId: z.string().trim().min(1).max(128),
});

const endSessionsQuerySchema = z.object({
  authorityId: z.string().trim().min(1).max(128),
});

const focusRequestSchema = z.object({
  mode: focusModeSchema,
  participantId: z.string().min(1).optional(),
});

const streamRequestSchema = z.object({
  quality: qualitySchema.default('medium'),
  monitorIndex: z.number().int().nonnegative().default(0),
  participantId: z.string().min(1).optional(),
});

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  ALREADY_ACTIVE: 409,
  SESSION_ENDED: 409,
  AUTH_FAILURE: 403,
  UNKNOWN_PARTICIPANT: 404,
  UNKNOWN_SESSION: 404,
  CAPTURE_UNAVAILABLE: 503,
  UNKNOWN_MESSAGE_TYPE: 400,
  INVALID_MESSAGE: 400,
  DELIVERY_FAILED: 502,
};

export interface SessionRouterOptions {
  authorityToken?: string;
}

function requireAuthority(expectedToken: string | undefined): RequestHandler {
  return (req, res, next) => {
    const remoteAddress = (req.socket.remoteAddress ?? '').replace(/^::ffff:/, '');
    if (!isAuthority(expectedToken, bearerToken(req.headers.authorization), remoteAddress)) {
      res.status(401).json({ error: 'UNAUTHORIZED' });
      return;
    }
    next();
  };
}

/**
 * Authority control surface over HTTP. Apart from the session lookup for
 * joining clients, every route needs authority credentials.
 */
export function createSessionRouter(manager: SessionManager, options: SessionRouterOptions = {}): Router {
  const router = Router();

  router.get('/:code/info', (req, res) => {
    res.json(manager.getSessionInfo(req.params.code));
  });

  router.use(requireAuthority(options.authorityToken ?? config.authorityToken));

  router.post('/', (req, res) => {
    const { authorityId } = startSessionSchema.parse(req.body);
    const session = manager.startSession(authorityId);
    const invitation = createInvitation(session, req.socket.localPort ?? config.port);
    res.status(201).json({ ...session, invitation });
  });

  router.get('/', (_req, res) => {
    res.json({ sessions: manager.listSessions() });
  });

  router.delete('/', (req, res) => {
    const { authorityId } = endSessionsQuerySchema.parse(req.query);
    res.json({ ended: manager.endSessionsFor(authorityId) });
  });

  router.get('/:code', (req, res) => {
    const { password: _password, ...session } = manager.getSession(req.params.code);
    res.json(session);
  });

  router.get('/:code/stats', (req, res) => {
    res.json(manager.getStatistics(req.params.code));
  });

  router.delete('/:code', (req, res) => {
    manager.endSession(req.params.code);
    res.json({ status: 'ended' });
  });

  router.post('/:code/focus', (req, res) => {
    const { mode, participantId } = focusRequestSchema.parse(req.body);
    manager.setFocusMode(req.params.code, mode, participantId);
    res.json({ mode, participantId: participantId ?? null });
  });

  router.post('/:code/stream', (req, res, next) => {
    const settings = streamRequestSchema.parse(req.body ?? {});
    manager
      .startStream(req.params.code, settings)
      .then(() => {
        res.json({ status: 'streaming', ...settings });
      })
      .catch(next);
  });

  router.delete('/:code/stream', (req, res) => {
    manager.stopStream(req.params.code);
    res.json({ status: 'stopped' });
  });

  router.delete('/:code/participants/:participantId', (req, res) => {
    manager.removeParticipant(req.params.code, req.params.participantId);
    res.json({ status: 'removed' });
  });

  router.use(handleSessionError);

  return router;
}

function handleSessionError(err: unknown, req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(err);
    return;
  }
  if (err instanceof ZodError) {
    res.status(400).json({ error: 'INVALID_REQUEST', issues: err.issues });
    return;
  }
  if (err instanceof ClassroomError) {
    res.status(STATUS_BY_CODE[err.code]).json({ error: err.code, message: err.message });
    return;
  }
  log.error({ err: toError(err), path: req.path }, 'request_failed');
  res.status(500).json({ error: 'INTERNAL' });
}

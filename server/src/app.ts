import http from 'node:http';
import express from 'express';
import cors from 'cors';
import { APP_VERSION, config } from './config.js';
import type { SessionManager } from './lib/sessionManager.js';
import { createHealthRouter } from './routes/health.js';
import { createSessionRouter } from './routes/sessionRoutes.js';
import type { SessionRouterOptions } from './routes/sessionRoutes.js';
import { registerWebSocketServer } from './ws/server.js';
import type { WebSocketOptions, WebSocketServerHandle } from './ws/server.js';

export interface ServerOptions extends SessionRouterOptions, Partial<WebSocketOptions> {
  corsOrigins?: string[];
}

export interface ClassroomServer {
  app: express.Express;
  server: http.Server;
  ws: WebSocketServerHandle;
}

export function createServer(manager: SessionManager, options: ServerOptions = {}): ClassroomServer {
  const app = express();

  app.use(
    cors({
      origin: options.corsOrigins ?? config.corsOrigins,
      credentials: true,
    }),
  );
  app.use(express.json({ limit: '1mb' }));

  app.get('/', (_req, res) => {
    res.json({
      name: 'focusroom',
      version: APP_VERSION,
    });
  });

  app.use('/health', createHealthRouter(manager));
  app.use('/api/sessions', createSessionRouter(manager, options));

  const server = http.createServer(app);
  const ws = registerWebSocketServer(server, manager, options);

  return { app, server, ws };
}

import { Router } from 'express';
import os from 'node:os';
import type { SessionManager } from '../lib/sessionManager.js';

export function createHealthRouter(manager: SessionManager): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    const memory = process.memoryUsage();
    const stats = manager.stats();
    res.json({
      status: 'ok',
      uptime: process.uptime(),
      sessions: stats.sessions,
      participants: stats.participants,
      load: os.loadavg(),
      memory: {
        rss: memory.rss,
        heapUsed: memory.heapUsed,
      },
    });
  });

  return router;
}

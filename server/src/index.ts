import { config } from './config.js';
import { createServer } from './app.js';
import { logger } from './lib/logger.js';
import { SessionManager } from './lib/sessionManager.js';

const manager = new SessionManager();
const { server, ws } = createServer(manager);

server.listen(config.port, config.host, () => {
  logger.info({ port: config.port, host: config.host }, 'server_started');
});

const shutdown = (signal: NodeJS.Signals) => {
  logger.info({ signal }, 'shutting_down');
  manager.shutdown();
  ws.close();
  server.close(() => process.exit(0));
};

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

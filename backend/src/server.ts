import http from 'http';

import { loadConfig } from './config';
import { createApp } from './app';
import { connectMongo, disconnectMongo } from './db';
import { configureLogger, errorFields, logger } from './logger';

export function onListenError(err: unknown): void {
  logger.error('server.start_failed', errorFields(err));
  process.exitCode = 1;
}

async function start() {
  const cfg = loadConfig();
  configureLogger({ level: cfg.logLevel, maxDetailsLength: cfg.maxDetailsLength });

  const app = createApp({ cfg });
  const server = http.createServer(app);

  if (cfg.mongoUri) {
    try {
      await connectMongo(cfg.mongoUri, cfg.mongoDb);
      logger.info('db.connected', { db: cfg.mongoDb });
    } catch (e) {
      // probes keep answering without the db
      logger.error('db.connection_failed', errorFields(e));
    }
  }

  server.on('error', onListenError);
  server.listen(cfg.port, '0.0.0.0', () => {
    logger.info('server.listening', { baseUrl: cfg.baseUrl, apiPrefix: cfg.apiPrefix });
  });

  const shutdown = (signal: string) => {
    logger.info('server.shutdown', { signal });
    server.close(() => {
      disconnectMongo()
        .then(() => process.exit(0))
        .catch((e: unknown) => {
          logger.error('db.disconnect_failed', errorFields(e));
          process.exit(1);
        });
    });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

if (require.main === module) {
  start().catch(onListenError);
}

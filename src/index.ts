// Load environment variables first
import 'dotenv/config';

import type { Server } from 'node:http';
import { loadConfig } from './config/index.js';
import { createLogger } from './utils/logger.js';
import { IntentClassifier } from './core/intent/IntentClassifier.js';
import { StatusService } from './core/status/StatusService.js';
import { createStorageAdapter } from './adapters/storage/index.js';
import { createApp, startServer } from './server.js';

const logger = createLogger({ component: 'index' });

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

async function main(): Promise<void> {
  logger.info('Starting law firm assistant backend');

  const config = loadConfig();
  const storage = createStorageAdapter(config);
  const statusService = new StatusService(storage, config);
  const app = createApp({ classifier: new IntentClassifier(), statusService });

  const server = await startServer(app, config.port, config.host);
  logger.info({ host: config.host, port: config.port }, 'Server started successfully');

  const shutdown = (signal: NodeJS.Signals): void => {
    logger.info({ signal }, 'Shutting down');
    closeServer(server)
      .then(() => {
        storage.close();
        process.exit(0);
      })
      .catch((error: unknown) => {
        logger.error({ error }, 'Failed to close HTTP server');
        process.exit(1);
      });
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
  logger.error({ error }, 'Failed to start application');
  process.exit(1);
});

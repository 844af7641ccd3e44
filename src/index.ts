import { createPool } from './db';
import { createApp } from './app';
import { getServerConfig } from './config';
import { InventoryDataService } from './services/chatbotData';
import { logger } from './utils/logger';

const pool = createPool();
const dataService = new InventoryDataService(pool);
const app = createApp({ dataService });
const { port } = getServerConfig();

const server = app.listen(port, () => {
  logger.info(`Chatbot data service listening on port ${port}`);
});

async function checkDatabase() {
  const reachable = await dataService.testConnection();
  if (reachable) {
    logger.info('[startup] Database reachable');
  } else {
    logger.warn('[startup] Database not reachable; lookups will return empty results until it is');
  }
}

void checkDatabase();

function shutdown(signal: string) {
  logger.info(`[shutdown] ${signal} received`);
  server.close(() => {
    pool
      .end()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error('[shutdown] Failed to close database pool', { err: logger.serializeError(err) });
        process.exit(1);
      });
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

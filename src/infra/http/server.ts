import { loadConfig } from '../../config.js';
import type { UserStore } from '../../application/users/userRepository.js';
import { createLogger } from '../logging/logger.js';
import { createPool } from '../db/pool.js';
import { PgUserStore } from '../db/userRepo.js';
import { InMemoryUserStore } from '../db/inMemoryUserRepo.js';
import { createApp } from './app.js';

const config = loadConfig();
const logger = createLogger({ serviceName: config.serviceName, level: config.logLevel });

const pool =
  config.userStore === 'postgres'
    ? createPool({ connectionString: config.databaseUrl, max: config.dbPoolMax }, logger)
    : undefined;

const store: UserStore = pool ? new PgUserStore(pool) : new InMemoryUserStore();

const app = createApp({ store, logger, rateLimit: config.rateLimit });

const server = app.listen(config.port, () => {
  logger.info(
    { port: config.port, store: config.userStore },
    `Server running on http://localhost:${config.port}`
  );
});

function shutdown(signal: NodeJS.Signals): void {
  logger.info({ signal }, 'Shutting down');
  server.close((closeError) => {
    if (closeError) {
      logger.error({ err: closeError }, 'HTTP server did not close cleanly');
      process.exitCode = 1;
    }
    if (!pool) {
      return;
    }
    pool.end().catch((err: unknown) => {
      logger.error({ err }, 'Database pool did not close cleanly');
      process.exitCode = 1;
    });
  });
}

process.once('SIGTERM', shutdown);
process.once('SIGINT', shutdown);

export default app;

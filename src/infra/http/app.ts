import express from 'express';
import type { Logger } from 'pino';
import type { AppConfig } from '../../config.js';
import type { UserStore } from '../../application/users/userRepository.js';
import { UserService } from '../../application/users/userService.js';
import { createUserRoutes } from './routes/users.js';
import { createHealthRoutes } from './routes/health.js';
import { createSwaggerRoutes } from './routes/swagger.js';
import { createErrorHandler, type ErrorResponse } from './middleware/errorHandler.js';
import { createRateLimiter } from './middleware/rateLimit.js';
import { createRequestLogger } from './middleware/requestLogger.js';
import { HttpMetrics } from './metrics.js';

export const API_BASE_PATH = '/api/v1';

export interface AppDependencies {
  store: UserStore;
  logger: Logger;
  rateLimit: AppConfig['rateLimit'];
  metrics?: HttpMetrics;
}

export function createApp({ store, logger, rateLimit, metrics = new HttpMetrics() }: AppDependencies) {
  const app = express();
  const userService = new UserService(store, logger);

  app.disable('x-powered-by');
  app.use(createRequestLogger(logger));
  app.use(metrics.middleware());
  app.use(express.json());

  // Probes, metrics and docs sit outside the rate limit
  app.use(createHealthRoutes(store, metrics));
  app.use(createSwaggerRoutes());

  app.use(API_BASE_PATH, createRateLimiter(rateLimit), createUserRoutes(userService));

  app.use((_req, res) => {
    const response: ErrorResponse = { code: 'NOT_FOUND', message: 'Route not found' };
    res.status(404).json(response);
  });

  // Error handler (must be last)
  app.use(createErrorHandler(logger.child({ component: 'http' })));

  return app;
}

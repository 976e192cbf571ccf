import { Router } from 'express';
import type { UserStore } from '../../../application/users/userRepository.js';
import type { HttpMetrics } from '../metrics.js';
import type { ErrorResponse } from '../middleware/errorHandler.js';

const READINESS_TIMEOUT_MS = 2000;

/**
 * Helper to add timeout to a promise.
 */
export function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<T>((_, reject) => {
    timer = setTimeout(() => reject(new Error('timeout')), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

export function createHealthRoutes(store: UserStore, metrics: HttpMetrics) {
  const router = Router();

  // Liveness: the process is up and serving
  router.get('/healthz', (_req, res) => {
    res.status(200).json({ status: 'ok' });
  });

  // Readiness: the user store answers
  router.get('/readyz', (_req, res, next) => {
    withTimeout(store.ping(), READINESS_TIMEOUT_MS)
      .then(() => {
        res.status(200).json({ status: 'ok' });
      })
      .catch(() => {
        const response: ErrorResponse = {
          code: 'STORE_UNAVAILABLE',
          message: 'User store unavailable',
        };
        res.status(503).json(response);
      })
      .catch(next);
  });

  router.get('/metrics', (_req, res) => {
    res.type('text/plain; version=0.0.4');
    res.send(metrics.toPrometheus());
  });

  return router;
}

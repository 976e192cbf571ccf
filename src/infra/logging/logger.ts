import { pino, stdTimeFunctions, type Logger } from 'pino';

export type { Logger };

export interface LoggerOptions {
  serviceName: string;
  level: string;
}

/**
 * Root structured logger. Every line carries `service`; children add
 * `component` (e.g. `logger.child({ component: 'UserService' })`).
 */
export function createLogger(options: LoggerOptions): Logger {
  return pino({
    level: options.level,
    base: { service: options.serviceName },
    timestamp: stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
  });
}

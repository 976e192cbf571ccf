import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    PORT: z.coerce.number().int().positive().default(3000),
    SERVICE_NAME: z.string().min(1).default('user-service'),
    LOG_LEVEL: z
      .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
      .optional(),
    USER_STORE: z.enum(['postgres', 'memory']).default('postgres'),
    DATABASE_URL: z.string().min(1).optional(),
    DB_POOL_MAX: z.coerce.number().int().positive().default(20),
    RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60_000),
    RATE_LIMIT_MAX: z.coerce.number().int().positive().default(300),
  })
  .superRefine((env, ctx) => {
    if (env.USER_STORE === 'postgres' && !env.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DATABASE_URL'],
        message: 'DATABASE_URL is required when USER_STORE=postgres',
      });
    }
  });

export type UserStoreKind = 'postgres' | 'memory';

export interface AppConfig {
  env: 'development' | 'test' | 'production';
  port: number;
  serviceName: string;
  logLevel: string;
  userStore: UserStoreKind;
  databaseUrl?: string;
  dbPoolMax: number;
  rateLimit: {
    windowMs: number;
    max: number;
  };
}

/**
 * Parse environment variables into a typed config.
 * Throws with the offending variable names; values are never echoed.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const names = [...new Set(parsed.error.issues.map((issue) => issue.path.join('.')))];
    throw new Error(`Invalid configuration: ${names.join(', ')}`);
  }

  const data = parsed.data;
  return {
    env: data.NODE_ENV,
    port: data.PORT,
    serviceName: data.SERVICE_NAME,
    logLevel: data.LOG_LEVEL ?? (data.NODE_ENV === 'test' ? 'silent' : 'info'),
    userStore: data.USER_STORE,
    databaseUrl: data.DATABASE_URL,
    dbPoolMax: data.DB_POOL_MAX,
    rateLimit: {
      windowMs: data.RATE_LIMIT_WINDOW_MS,
      max: data.RATE_LIMIT_MAX,
    },
  };
}

/**
 * backend/src/app/config.ts
 *
 * WHY:
 * - Central place for env parsing + validation (12-factor friendly).
 * - Prevents "undefined env var" bugs at runtime.
 *
 * HOW TO USE:
 * - In dev, we load backend/.env via dotenv.
 * - In prod later, platform injects env vars (no file).
 *
 * TYPING:
 * - nodeEnv is a union ('development' | 'test' | 'production'), not a plain string.
 *   This ensures that comparisons in di.ts (nodeEnv === 'test', nodeEnv === 'production')
 *   are exhaustive and that invalid values ('prod', 'staging') are caught at startup
 *   by Zod rather than silently falling through to the wrong branch.
 */

import 'dotenv/config';
import { z } from 'zod';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');

const ConfigSchema = z.object({
  NODE_ENV: NodeEnvSchema,
  PORT: z.coerce.number().default(3000),

  DATABASE_URL: z.string().min(1),
  REDIS_URL: z.string().min(1),

  // Logging / service identity
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  SERVICE_NAME: z.string().default('passport-hub-backend'),

  BCRYPT_COST: z.coerce.number().int().min(10).max(15).default(12),

  // Session
  SESSION_TTL_SECONDS: z.coerce.number().int().min(300).max(604800).default(86400),

  // Invitation links point at the web app
  PUBLIC_APP_URL: z.string().url().default('http://localhost:5173'),

  // File store (supplier certificate uploads)
  UPLOADS_DIR: z.string().min(1).default('./uploads'),
  UPLOADS_PUBLIC_URL: z.string().url().default('http://localhost:3000/uploads'),

  // Connection workflow
  CONNECTION_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(3),

  // Login throttling (per email)
  LOGIN_RATE_LIMIT: z.coerce.number().int().min(1).default(5),
  LOGIN_RATE_WINDOW_SECONDS: z.coerce.number().int().min(1).default(900),

  // DEV seed bootstrap: System Global reference library (idempotent)
  SEED_ON_START: z
    .enum(['true', 'false'])
    .default('false')
    .transform((v) => v === 'true'),
});

export type NodeEnv = z.infer<typeof NodeEnvSchema>;

export type AppConfig = {
  nodeEnv: NodeEnv;
  port: number;
  databaseUrl: string;
  redisUrl: string;

  logLevel: string;
  serviceName: string;

  bcryptCost: number;

  sessionTtlSeconds: number;

  publicAppUrl: string;

  uploads: {
    dir: string;
    publicUrl: string;
  };

  connectionMaxRetries: number;

  loginRateLimit: {
    limit: number;
    windowSeconds: number;
  };

  seed: {
    enabled: boolean;
  };
};

export function buildConfig(): AppConfig {
  const parsed = ConfigSchema.parse(process.env);

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    databaseUrl: parsed.DATABASE_URL,
    redisUrl: parsed.REDIS_URL,

    logLevel: parsed.LOG_LEVEL,
    serviceName: parsed.SERVICE_NAME,

    bcryptCost: parsed.BCRYPT_COST,

    sessionTtlSeconds: parsed.SESSION_TTL_SECONDS,

    publicAppUrl: parsed.PUBLIC_APP_URL,

    uploads: {
      dir: parsed.UPLOADS_DIR,
      publicUrl: parsed.UPLOADS_PUBLIC_URL,
    },

    connectionMaxRetries: parsed.CONNECTION_MAX_RETRIES,

    loginRateLimit: {
      limit: parsed.LOGIN_RATE_LIMIT,
      windowSeconds: parsed.LOGIN_RATE_WINDOW_SECONDS,
    },

    seed: {
      enabled: parsed.SEED_ON_START,
    },
  };
}

/**
 * backend/src/app/config.ts
 *
 * WHY:
 * - Central place for env parsing + validation (12-factor friendly).
 * - Prevents "undefined env var" bugs at runtime.
 * - The result is frozen and handed to buildDeps(); nothing else reads process.env
 *   for application settings.
 *
 * HOW TO USE:
 * - In dev, we load backend/.env via dotenv.
 * - In prod, the platform injects env vars (no file).
 *
 * TYPING:
 * - nodeEnv is a union ('development' | 'test' | 'production'), not a plain string,
 *   so invalid values ('prod', 'staging') fail at startup instead of silently
 *   falling through to the wrong branch.
 */

import 'dotenv/config';
import { z } from 'zod';
import { BCRYPT_COST } from '../shared/security/bcrypt-password-hasher';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');

// z.coerce.boolean() turns "false" into true; env flags are parsed explicitly.
const BooleanFlagSchema = (fallback: 'true' | 'false') =>
  z
    .enum(['true', 'false', '1', '0'])
    .default(fallback)
    .transform((v) => v === 'true' || v === '1');

/**
 * Only used outside production. Anything deployed must set SESSION_SECRET.
 */
export const DEV_SESSION_SECRET = 'dev-only-session-secret-change-me-please';

const ConfigSchema = z
  .object({
    NODE_ENV: NodeEnvSchema,
    HOST: z.string().min(1).default('127.0.0.1'),
    PORT: z.coerce.number().int().min(0).max(65535).default(3000),

    DATABASE_URL: z.string().min(1).default('pglite://./data/tutor-match'),
    REDIS_URL: z.string().min(1).optional(),

    // Logging / service identity. The logger reads both straight from the environment
    // (it exists before AppConfig); they are parsed here so a typo fails at startup.
    LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
    SERVICE_NAME: z.string().default('tutor-match'),

    // Session
    SESSION_SECRET: z.string().min(32, 'SESSION_SECRET must be at least 32 characters').optional(),
    SESSION_TTL_SECONDS: z.coerce.number().int().min(60).max(86400).default(1800),
    REMEMBER_ME_TTL_SECONDS: z.coerce
      .number()
      .int()
      .min(3600)
      .max(60 * 86400)
      .default(14 * 86400),

    TRUST_PROXY: BooleanFlagSchema('false'),

    MIGRATE_ON_START: BooleanFlagSchema('true'),
    SEED_ON_START: BooleanFlagSchema('false'),
  })
  .superRefine((env, ctx) => {
    if (env.NODE_ENV === 'production' && !env.SESSION_SECRET) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['SESSION_SECRET'],
        message: 'SESSION_SECRET is required in production',
      });
    }
  });

export type NodeEnv = z.infer<typeof NodeEnvSchema>;

export type AppConfig = Readonly<{
  nodeEnv: NodeEnv;
  host: string;
  port: number;
  trustProxy: boolean;

  databaseUrl: string;
  redisUrl: string | null;

  serviceName: string;

  bcryptCost: number;

  session: Readonly<{
    secret: string;
    ttlSeconds: number;
    rememberMeTtlSeconds: number;
  }>;

  migrateOnStart: boolean;
  seedOnStart: boolean;
}>;

export function buildConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.parse(env);

  return Object.freeze({
    nodeEnv: parsed.NODE_ENV,
    host: parsed.HOST,
    port: parsed.PORT,
    trustProxy: parsed.TRUST_PROXY,

    databaseUrl: parsed.DATABASE_URL,
    redisUrl: parsed.REDIS_URL ?? null,

    serviceName: parsed.SERVICE_NAME,

    bcryptCost: BCRYPT_COST,

    session: Object.freeze({
      secret: parsed.SESSION_SECRET ?? DEV_SESSION_SECRET,
      ttlSeconds: parsed.SESSION_TTL_SECONDS,
      rememberMeTtlSeconds: parsed.REMEMBER_ME_TTL_SECONDS,
    }),

    migrateOnStart: parsed.MIGRATE_ON_START,
    seedOnStart: parsed.SEED_ON_START,
  });
}

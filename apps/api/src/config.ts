/**
 * Application configuration
 *
 * Loads and validates environment variables
 */

import { ValidationError } from '@ehr-backend/core';
import { z } from 'zod';

const TENANT_ID_PATTERN = /^[A-Za-z0-9_-]{1,48}$/;

/** Unset and empty variables are treated alike */
function unsetIfEmpty(value: unknown): unknown {
  return value === '' ? undefined : value;
}

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    PORT: z.coerce.number().int().min(1).max(65535).default(3000),
    HOST: z.string().default('0.0.0.0'),
    LOG_LEVEL: z
      .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
      .default('info'),
    DATABASE_URL: z.preprocess(unsetIfEmpty, z.string().url().optional()),
    DATABASE_POOL_MAX: z.coerce.number().int().min(1).max(100).default(10),
    DATABASE_SSL: z
      .enum(['true', 'false'])
      .default('false')
      .transform((value) => value === 'true'),
    TENANT_HEADER: z
      .string()
      .min(1)
      .default('x-tenant-id')
      .transform((value) => value.toLowerCase()),
    DEFAULT_TENANT_ID: z.preprocess(
      unsetIfEmpty,
      z.string().regex(TENANT_ID_PATTERN, 'Invalid tenant id').optional()
    ),
    CORS_ORIGIN: z.preprocess(unsetIfEmpty, z.string().optional()),
    API_BASE_URL: z.string().url().default('http://localhost:3000'),
  })
  .superRefine((env, ctx) => {
    if (env.NODE_ENV === 'production' && env.DATABASE_URL === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DATABASE_URL'],
        message: 'DATABASE_URL is required in production',
      });
    }
  });

export type Env = z.infer<typeof envSchema>;

export interface AppConfig {
  env: Env['NODE_ENV'];
  isDev: boolean;
  isProd: boolean;
  isTest: boolean;
  server: {
    port: number;
    host: string;
    baseUrl: string;
    corsOrigin: string | undefined;
  };
  logger: {
    level: Env['LOG_LEVEL'];
  };
  database: {
    url: string | undefined;
    poolMax: number;
    ssl: boolean;
  };
  tenant: {
    header: string;
    defaultTenantId: string | undefined;
  };
}

/**
 * Validate the environment and build the configuration
 *
 * @throws ValidationError listing the offending variables
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    throw new ValidationError(
      'Invalid environment configuration',
      result.error.flatten().fieldErrors
    );
  }

  const env = result.data;
  return {
    env: env.NODE_ENV,
    isDev: env.NODE_ENV === 'development',
    isProd: env.NODE_ENV === 'production',
    isTest: env.NODE_ENV === 'test',
    server: {
      port: env.PORT,
      host: env.HOST,
      baseUrl: env.API_BASE_URL,
      corsOrigin: env.CORS_ORIGIN,
    },
    logger: {
      level: env.LOG_LEVEL,
    },
    database: {
      url: env.DATABASE_URL,
      poolMax: env.DATABASE_POOL_MAX,
      ssl: env.DATABASE_SSL,
    },
    tenant: {
      header: env.TENANT_HEADER,
      defaultTenantId: env.DEFAULT_TENANT_ID,
    },
  };
}

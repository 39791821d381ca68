import { z } from 'zod';

/** Treats empty strings as unset so `FOO=` behaves like no FOO at all. */
const unsetIfEmpty = (value: unknown): unknown => (value === '' ? undefined : value);

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

/** `*` allows any origin; otherwise a comma-separated list of exact origins. */
function parseOrigins(value: string): '*' | string[] {
  const origins = value.split(',').map((o) => o.trim()).filter((o) => o !== '');
  return origins.includes('*') || origins.length === 0 ? '*' : origins;
}

const envSchema = z.object({
  HOST: z.preprocess(unsetIfEmpty, z.string().default('0.0.0.0')),
  PORT: z.preprocess(unsetIfEmpty, z.coerce.number().int().min(0).max(65_535).default(8080)),
  LOG_LEVEL: z.preprocess(
    unsetIfEmpty,
    z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  ),
  REGISTRY_BACKEND: z.preprocess(unsetIfEmpty, z.enum(['file', 'postgres', 'memory']).default('file')),
  ENDPOINTS_FILE: z.preprocess(unsetIfEmpty, z.string().default('endpoints.json')),
  DATABASE_URL: z.preprocess(unsetIfEmpty, z.string().url().optional()),
  REDIS_URL: z.preprocess(unsetIfEmpty, z.string().url().optional()),
  DELIVERY_TIMEOUT_MS: z.preprocess(
    unsetIfEmpty,
    z.coerce.number().int().min(100).max(120_000).default(10_000),
  ),
  DISPATCH_MODE: z.preprocess(unsetIfEmpty, z.enum(['sync', 'async']).default('sync')),
  FORWARD_HEADERS: z.preprocess(unsetIfEmpty, booleanFlag.default('true')),
  RESPONSE_INCLUDE_OUTCOMES: z.preprocess(unsetIfEmpty, booleanFlag.default('true')),
  HISTORY_SIZE: z.preprocess(unsetIfEmpty, z.coerce.number().int().min(1).max(10_000).default(100)),
  CORS_ORIGIN: z.preprocess(
    unsetIfEmpty,
    z.string().default('*').transform(parseOrigins),
  ),
  BODY_LIMIT_BYTES: z.preprocess(
    unsetIfEmpty,
    z.coerce.number().int().min(1024).max(50 * 1024 * 1024).default(1024 * 1024),
  ),
}).superRefine((env, ctx) => {
  if (env.REGISTRY_BACKEND === 'postgres' && env.DATABASE_URL === undefined) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['DATABASE_URL'],
      message: 'DATABASE_URL is required when REGISTRY_BACKEND=postgres',
    });
  }
});

export type RegistryBackend = 'file' | 'postgres' | 'memory';
export type DispatchMode = 'sync' | 'async';

export interface RelayConfig {
  host: string;
  port: number;
  logLevel: string;
  registry: {
    backend: RegistryBackend;
    endpointsFile: string;
    databaseUrl?: string;
  };
  redisUrl?: string;
  dispatch: {
    timeoutMs: number;
    mode: DispatchMode;
    forwardHeaders: boolean;
    includeOutcomes: boolean;
  };
  historySize: number;
  bodyLimitBytes: number;
  /** Origins browsers may call the API from. */
  corsOrigin: '*' | string[];
}

/**
 * Reads configuration from environment variables.
 *
 * Throws with every invalid key listed, so a misconfigured process
 * fails at boot instead of on the first webhook.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RelayConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }

  const e = parsed.data;

  return {
    host: e.HOST,
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    registry: {
      backend: e.REGISTRY_BACKEND,
      endpointsFile: e.ENDPOINTS_FILE,
      ...(e.DATABASE_URL !== undefined && { databaseUrl: e.DATABASE_URL }),
    },
    ...(e.REDIS_URL !== undefined && { redisUrl: e.REDIS_URL }),
    dispatch: {
      timeoutMs: e.DELIVERY_TIMEOUT_MS,
      mode: e.DISPATCH_MODE,
      forwardHeaders: e.FORWARD_HEADERS,
      includeOutcomes: e.RESPONSE_INCLUDE_OUTCOMES,
    },
    historySize: e.HISTORY_SIZE,
    bodyLimitBytes: e.BODY_LIMIT_BYTES,
    corsOrigin: e.CORS_ORIGIN,
  };
}

/**
 * Typed service configuration parsed from the environment.
 *
 * Entry points load `.env` through dotenv before anything reads this module;
 * everything here only looks at the `env` record it is given.
 */

import { z } from 'zod';
import { ServiceNotConfigured } from '../errors.js';

/** Case-insensitive on/off flag; unset or blank means `fallback`. */
function booleanFlag(fallback: boolean) {
  return z
    .preprocess(
      v => (typeof v === 'string' && v.trim() ? v.trim().toLowerCase() : undefined),
      z.enum(['true', 'false', '1', '0', 'yes', 'no', 'on', 'off']).optional(),
    )
    .transform(v => (v === undefined ? fallback : v === 'true' || v === '1' || v === 'yes' || v === 'on'));
}

const optionalString = z
  .string()
  .optional()
  .transform(v => (v && v.trim() ? v.trim() : undefined));

const EnvSchema = z.object({
  AGIRA_PORT: z.coerce.number().int().min(1).max(65535).default(3040),
  API_KEY: optionalString,

  WEAVIATE_ENABLED: booleanFlag(false),
  WEAVIATE_URL: optionalString,
  WEAVIATE_GRPC_PORT: z.coerce.number().int().min(1).max(65535).default(50051),
  WEAVIATE_API_KEY: optionalString,

  REDIS_CACHE_ENABLED: booleanFlag(false),
  REDIS_CACHE_HOST: z.string().default('localhost'),
  REDIS_CACHE_PORT: z.coerce.number().int().min(1).max(65535).default(6379),
  REDIS_CACHE_DB: z.coerce.number().int().min(0).default(0),
  REDIS_CACHE_PASSWORD: optionalString,
  REDIS_CACHE_SOCKET_TIMEOUT_MS: z.coerce.number().int().min(1).default(5000),
  REDIS_CACHE_CONNECT_TIMEOUT_MS: z.coerce.number().int().min(1).default(5000),
});

export interface WeaviateConfig {
  enabled: boolean;
  url?: string;
  grpcPort: number;
  apiKey?: string;
}

export interface RedisCacheConfig {
  enabled: boolean;
  host: string;
  port: number;
  db: number;
  password?: string;
  socketTimeoutMs: number;
  connectTimeoutMs: number;
}

export interface AppConfig {
  port: number;
  apiKey?: string;
  weaviate: WeaviateConfig;
  redisCache: RedisCacheConfig;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const keys = parsed.error.issues.map(issue => issue.path.join('.')).join(', ');
    throw new ServiceNotConfigured(`Invalid environment configuration: ${keys}`);
  }
  const e = parsed.data;

  return {
    port: e.AGIRA_PORT,
    apiKey: e.API_KEY,
    weaviate: {
      enabled: e.WEAVIATE_ENABLED,
      url: e.WEAVIATE_URL,
      grpcPort: e.WEAVIATE_GRPC_PORT,
      apiKey: e.WEAVIATE_API_KEY,
    },
    redisCache: {
      enabled: e.REDIS_CACHE_ENABLED,
      host: e.REDIS_CACHE_HOST,
      port: e.REDIS_CACHE_PORT,
      db: e.REDIS_CACHE_DB,
      password: e.REDIS_CACHE_PASSWORD,
      socketTimeoutMs: e.REDIS_CACHE_SOCKET_TIMEOUT_MS,
      connectTimeoutMs: e.REDIS_CACHE_CONNECT_TIMEOUT_MS,
    },
  };
}

let cached: AppConfig | null = null;

/** Process-wide configuration, parsed on first use. */
export function getConfig(): AppConfig {
  if (!cached) cached = loadConfig();
  return cached;
}

/** Drop the cached configuration (tests, reloads after editing .env). */
export function resetConfig(): void {
  cached = null;
}

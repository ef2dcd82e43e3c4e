/**
 * Response cache for AI agents.
 *
 * Keys are content hashes of the agent input, namespaced by agent name and
 * version. Every store failure degrades to a cache miss; a store that cannot
 * be reached at start-up disables caching for the process.
 */

import { createHash } from 'node:crypto';
import { Redis } from 'ioredis';
import type { RedisCacheConfig } from '../config/env.js';
import { logger, errorData } from '../utils/logger.js';
import { AgentCacheSchema, type AgentCacheConfig, type AgentDefinition } from './types.js';

/** Minimal key/value contract the cache needs from Redis. */
export interface CacheStore {
  ping(): Promise<unknown>;
  get(key: string): Promise<string | null>;
  setex(key: string, ttlSeconds: number, value: string): Promise<unknown>;
  /** Drop the connection immediately, without waiting for pending replies. */
  disconnect(): void;
  /** Close the connection after pending replies. */
  quit(): Promise<unknown>;
}

export function createRedisStore(config: RedisCacheConfig): CacheStore {
  const client = new Redis({
    host: config.host,
    port: config.port,
    db: config.db,
    password: config.password,
    commandTimeout: config.socketTimeoutMs,
    connectTimeout: config.connectTimeoutMs,
    lazyConnect: true,
    maxRetriesPerRequest: 1,
  });
  client.on('error', (err: unknown) => {
    logger.warn('Redis cache connection error', errorData(err));
  });
  return client;
}

export class AgentCacheService {
  private store: CacheStore | null;
  private enabled: boolean;
  private ready: Promise<void> | null = null;

  /**
   * @param globallyEnabled - REDIS_CACHE_ENABLED
   * @param storeFactory - Builds the backing store; only called when caching is enabled
   */
  constructor(globallyEnabled: boolean, storeFactory: () => CacheStore) {
    this.enabled = globallyEnabled;
    this.store = globallyEnabled ? storeFactory() : null;
  }

  /** Ping the store once; on failure caching stays off for the process. */
  private ensureReady(): Promise<void> {
    if (!this.ready) {
      this.ready = this.connect();
    }
    return this.ready;
  }

  private async connect(): Promise<void> {
    if (!this.store) return;
    try {
      await this.store.ping();
      logger.info('Redis cache connection established');
    } catch (err) {
      logger.warn('Failed to connect to Redis cache, caching disabled', errorData(err));
      this.store.disconnect();
      this.store = null;
      this.enabled = false;
    }
  }

  /**
   * Parse an agent's `cache` block and apply defaults.
   */
  parseCacheConfig(agent: Pick<AgentDefinition, 'cache'>): AgentCacheConfig {
    return AgentCacheSchema.parse(agent.cache ?? {});
  }

  async isCacheEnabled(config?: AgentCacheConfig): Promise<boolean> {
    await this.ensureReady();
    if (!this.enabled || !this.store) return false;
    return config?.enabled ?? false;
  }

  /**
   * Key format: `aiagent:{agentName}:v{agentVersion}:{sha256(input)}`
   */
  buildCacheKey(agentName: string, inputText: string, agentVersion = 1): string {
    const inputHash = createHash('sha256').update(inputText, 'utf8').digest('hex');
    return `aiagent:${agentName}:v${agentVersion}:${inputHash}`;
  }

  async get(cacheKey: string): Promise<string | null> {
    if (!this.store) return null;
    try {
      const value = await this.store.get(cacheKey);
      logger.debug(value ? 'Agent cache hit' : 'Agent cache miss', { cacheKey });
      return value || null;
    } catch (err) {
      logger.warn('Redis GET failed, treating as cache miss', { cacheKey, ...errorData(err) });
      return null;
    }
  }

  async set(cacheKey: string, value: string, ttlSeconds: number): Promise<boolean> {
    if (!this.store) return false;
    try {
      await this.store.setex(cacheKey, ttlSeconds, value);
      logger.debug('Cached agent response', { cacheKey, ttlSeconds });
      return true;
    } catch (err) {
      logger.warn('Redis SET failed', { cacheKey, ...errorData(err) });
      return false;
    }
  }

  async getCachedResponse(agentName: string, inputText: string, config: AgentCacheConfig): Promise<string | null> {
    if (!(await this.isCacheEnabled(config))) return null;
    return this.get(this.buildCacheKey(agentName, inputText, config.agent_version));
  }

  async cacheResponse(
    agentName: string,
    inputText: string,
    responseText: string,
    config: AgentCacheConfig,
  ): Promise<boolean> {
    if (!(await this.isCacheEnabled(config))) return false;
    return this.set(this.buildCacheKey(agentName, inputText, config.agent_version), responseText, config.ttl_seconds);
  }

  /** Close the store connection; the cache is disabled afterwards. */
  async close(): Promise<void> {
    const store = this.store;
    this.store = null;
    this.enabled = false;
    if (!store) return;
    try {
      await store.quit();
    } catch (err) {
      logger.warn('Redis QUIT failed, disconnecting', errorData(err));
      store.disconnect();
    }
  }
}

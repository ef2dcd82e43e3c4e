import { describe, it, expect } from 'vitest';
import { loadConfig } from '../config/env.js';
import { ServiceNotConfigured } from '../errors.js';

describe('loadConfig', () => {
  it('applies defaults to an empty environment', () => {
    expect(loadConfig({})).toEqual({
      port: 3040,
      apiKey: undefined,
      weaviate: { enabled: false, url: undefined, grpcPort: 50051, apiKey: undefined },
      redisCache: {
        enabled: false,
        host: 'localhost',
        port: 6379,
        db: 0,
        password: undefined,
        socketTimeoutMs: 5000,
        connectTimeoutMs: 5000,
      },
    });
  });

  it('parses flags, numbers and trims strings', () => {
    const config = loadConfig({
      AGIRA_PORT: '8080',
      API_KEY: '   ',
      WEAVIATE_ENABLED: 'yes',
      WEAVIATE_URL: ' http://weaviate:8080 ',
      WEAVIATE_API_KEY: 'test-secret',
      REDIS_CACHE_ENABLED: '1',
      REDIS_CACHE_PORT: '6380',
      REDIS_CACHE_DB: '2',
    });

    expect(config.port).toBe(8080);
    expect(config.apiKey).toBeUndefined();
    expect(config.weaviate).toEqual({
      enabled: true,
      url: 'http://weaviate:8080',
      grpcPort: 50051,
      apiKey: 'test-secret',
    });
    expect(config.redisCache).toMatchObject({ enabled: true, port: 6380, db: 2 });
  });

  it('reads flags case-insensitively and treats blank flags as unset', () => {
    expect(loadConfig({ WEAVIATE_ENABLED: 'True', REDIS_CACHE_ENABLED: ' OFF ' })).toMatchObject({
      weaviate: { enabled: true },
      redisCache: { enabled: false },
    });
    expect(loadConfig({ WEAVIATE_ENABLED: '', REDIS_CACHE_ENABLED: '  ' })).toMatchObject({
      weaviate: { enabled: false },
      redisCache: { enabled: false },
    });
  });

  it('names every invalid variable', () => {
    expect(() => loadConfig({ AGIRA_PORT: 'abc', WEAVIATE_ENABLED: 'maybe' })).toThrow(ServiceNotConfigured);
    expect(() => loadConfig({ AGIRA_PORT: 'abc', WEAVIATE_ENABLED: 'maybe' })).toThrow(
      'Invalid environment configuration: AGIRA_PORT, WEAVIATE_ENABLED',
    );
  });
});

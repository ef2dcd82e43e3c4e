import weaviate, { ApiKey, type WeaviateClient } from 'weaviate-client';
import { getConfig, type WeaviateConfig } from '../config/env.js';
import { ServiceDisabled, ServiceNotConfigured } from '../errors.js';
import { logger, errorData } from '../utils/logger.js';

export interface WeaviateEndpoint {
  host: string;
  port: number;
  secure: boolean;
}

/**
 * Split a Weaviate URL into host, port and TLS flag.
 * Without an explicit port, http maps to 80 and https to 443.
 */
export function parseWeaviateUrl(url: string): WeaviateEndpoint {
  let parsed: URL;
  try {
    parsed = new URL(url.includes('://') ? url : `http://${url}`);
  } catch (err) {
    throw new ServiceNotConfigured(`Invalid Weaviate URL: ${url}`, { cause: err });
  }
  const secure = parsed.protocol === 'https:';
  return {
    host: parsed.hostname,
    port: parsed.port ? Number(parsed.port) : secure ? 443 : 80,
    secure,
  };
}

/**
 * Weaviate is enabled and has a URL. Does not connect.
 */
export function isAvailable(config?: WeaviateConfig): boolean {
  try {
    const weaviateConfig = config ?? getConfig().weaviate;
    return weaviateConfig.enabled && Boolean(weaviateConfig.url);
  } catch (err) {
    logger.warn('Weaviate configuration could not be read', errorData(err));
    return false;
  }
}

/**
 * Connect to the configured Weaviate instance. Callers close the client.
 */
export async function getClient(config: WeaviateConfig = getConfig().weaviate): Promise<WeaviateClient> {
  if (!config.enabled) {
    throw new ServiceDisabled('Weaviate service is not enabled');
  }
  if (!config.url) {
    throw new ServiceNotConfigured('Weaviate URL is not configured');
  }

  const endpoint = parseWeaviateUrl(config.url);
  logger.debug('Connecting to Weaviate', { host: endpoint.host, port: endpoint.port, secure: endpoint.secure });

  return weaviate.connectToCustom({
    httpHost: endpoint.host,
    httpPort: endpoint.port,
    httpSecure: endpoint.secure,
    grpcHost: endpoint.host,
    grpcPort: config.grpcPort,
    grpcSecure: endpoint.secure,
    ...(config.apiKey ? { authCredentials: new ApiKey(config.apiKey) } : {}),
  });
}

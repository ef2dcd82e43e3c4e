// Retrieval
export * from './rag/index.js';

// Vector store
export { isAvailable, getClient, parseWeaviateUrl, type WeaviateEndpoint } from './weaviate/client.js';
export {
  ensureSchema,
  ensureSchemaOnce,
  resetSchemaState,
  schemaCollections,
  agiraCollectionConfig,
  SCHEMA_VERSION,
  type SchemaCollections,
} from './weaviate/schema.js';
export {
  openWeaviateCollection,
  withCollection,
  type AgiraObjectCollection,
  type CollectionOpener,
  type CollectionSession,
} from './weaviate/collection.js';
export { WeaviateObjectStore, makeObjectUuid, toStoredProperties, type QueryResult, type SyncResult } from './weaviate/service.js';
export { WeaviateSearchBackend, toSearchHit } from './weaviate/search-backend.js';
export { toAgiraObject, type AgiraObject, type AgiraObjectType, type TrackerRecord } from './weaviate/serializers.js';

// Agents
export { AgentService, buildAgentPrompt, type ExecuteAgentOptions, type TextGenerator } from './agents/agent-service.js';
export { AgentCacheService, createRedisStore, type CacheStore } from './agents/cache.js';
export type { Agent, AgentDefinition, AgentCacheConfig } from './agents/types.js';

// AI
export { AIRouter, type RouterCallOptions } from './ai/router.js';
export { ModelRegistry, loadModelRegistry } from './ai/model-registry.js';
export { AIJobHistory, aiJobHistory, type AIJobEntry } from './ai/job-history.js';
export { calculateCost } from './ai/pricing.js';
export type { AIResponse, ChatMessage, ProviderType, RequestContext } from './ai/types.js';

// Service
export { createApp, startHttpServer } from './server/fastify-server.js';
export { createServices, type AppServices } from './services.js';
export { loadConfig, getConfig, type AppConfig } from './config/env.js';
export { ServiceError, ServiceNotConfigured, ServiceDisabled, AgentConfigError } from './errors.js';

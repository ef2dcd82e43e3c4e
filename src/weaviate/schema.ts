import weaviate, { dataType, type WeaviateClient } from 'weaviate-client';
import { COLLECTION_NAME } from '../rag/config.js';
import { logger } from '../utils/logger.js';

export const SCHEMA_VERSION = 'v1';

/**
 * Collection definition for AgiraObject. `tags` and `url` stay out of the
 * vector; null state is indexed so scope filters can match missing fields.
 */
export function agiraCollectionConfig() {
  return {
    name: COLLECTION_NAME,
    properties: [
      { name: 'type', dataType: dataType.TEXT, description: 'Object type (item, comment, attachment, ...)' },
      { name: 'object_id', dataType: dataType.TEXT, description: 'Tracker id of the object' },
      { name: 'project_id', dataType: dataType.TEXT },
      { name: 'org_id', dataType: dataType.TEXT },
      { name: 'title', dataType: dataType.TEXT },
      { name: 'text', dataType: dataType.TEXT, description: 'Main searchable text (Markdown allowed)' },
      { name: 'status', dataType: dataType.TEXT },
      { name: 'tags', dataType: dataType.TEXT_ARRAY, skipVectorization: true },
      { name: 'url', dataType: dataType.TEXT, skipVectorization: true },
      { name: 'source_system', dataType: dataType.TEXT },
      { name: 'parent_object_id', dataType: dataType.TEXT },
      { name: 'external_key', dataType: dataType.TEXT },
      { name: 'mime_type', dataType: dataType.TEXT },
      { name: 'size_bytes', dataType: dataType.INT },
      { name: 'sha256', dataType: dataType.TEXT },
      { name: 'created_at', dataType: dataType.DATE },
      { name: 'updated_at', dataType: dataType.DATE },
    ],
    vectorizers: weaviate.configure.vectorizer.text2VecContextionary(),
    invertedIndex: weaviate.configure.invertedIndex({ indexNullState: true }),
  };
}

export type AgiraCollectionConfig = ReturnType<typeof agiraCollectionConfig>;

/** The part of the client's collection manager schema setup uses. */
export interface SchemaCollections {
  exists(name: string): Promise<boolean>;
  create(config: AgiraCollectionConfig): Promise<unknown>;
}

export function schemaCollections(client: WeaviateClient): SchemaCollections {
  return {
    exists: name => client.collections.exists(name),
    create: config => client.collections.create(config),
  };
}

/**
 * Create the AgiraObject collection unless it already exists.
 */
export async function ensureSchema(collections: SchemaCollections): Promise<void> {
  if (await collections.exists(COLLECTION_NAME)) {
    logger.debug('Weaviate collection already exists', { collection: COLLECTION_NAME });
    return;
  }

  logger.info('Creating Weaviate collection', { collection: COLLECTION_NAME, schema: SCHEMA_VERSION });
  await collections.create(agiraCollectionConfig());
  logger.info('Weaviate collection created', { collection: COLLECTION_NAME });
}

let schemaPromise: Promise<void> | null = null;

/**
 * ensureSchema() at most once per process. Concurrent callers share one
 * attempt; a failed attempt is forgotten so the next caller retries.
 */
export function ensureSchemaOnce(collections: SchemaCollections): Promise<void> {
  if (!schemaPromise) {
    const attempt = ensureSchema(collections).catch((err: unknown) => {
      if (schemaPromise === attempt) schemaPromise = null;
      throw err;
    });
    schemaPromise = attempt;
  }
  return schemaPromise;
}

/** Forget the completed schema check (tests, after dropping the collection). */
export function resetSchemaState(): void {
  schemaPromise = null;
}

/**
 * Narrow view of the AgiraObject collection used by the store and the
 * hybrid search backend, plus its weaviate-client implementation.
 */

import { Filters, type Collection, type FilterValue } from 'weaviate-client';
import { COLLECTION_NAME } from '../rag/config.js';
import type { ScopeCondition } from '../rag/search-scope.js';
import { getClient } from './client.js';
import { ensureSchemaOnce, schemaCollections } from './schema.js';

export type StoredProperties = Record<string, string | number | Date>;

export interface ReturnedObject {
  properties: Record<string, unknown>;
  /** Hybrid score or near-text distance, when the backend returned one. */
  score: number | null;
}

export interface AgiraObjectCollection {
  exists(uuid: string): Promise<boolean>;
  insert(uuid: string, properties: StoredProperties): Promise<void>;
  replace(uuid: string, properties: StoredProperties): Promise<void>;
  deleteById(uuid: string): Promise<boolean>;
  hybrid(query: string, options: { alpha: number; limit: number; conditions: ScopeCondition[] }): Promise<ReturnedObject[]>;
  nearText(query: string, options: { limit: number; conditions: ScopeCondition[] }): Promise<ReturnedObject[]>;
}

export interface CollectionSession {
  collection: AgiraObjectCollection;
  close(): Promise<void>;
}

export type CollectionOpener = () => Promise<CollectionSession>;

/**
 * Run `fn` against a freshly opened collection and always close it.
 */
export async function withCollection<T>(
  open: CollectionOpener,
  fn: (collection: AgiraObjectCollection) => Promise<T>,
): Promise<T> {
  const session = await open();
  try {
    return await fn(session.collection);
  } finally {
    await session.close();
  }
}

function toFilter(collection: Collection, condition: ScopeCondition): FilterValue {
  const property = collection.filter.byProperty(condition.property);
  switch (condition.kind) {
    case 'equal':
      return property.equal(condition.value);
    case 'not_equal':
      return property.notEqual(condition.value);
    case 'not_null':
      return property.isNull(false);
    case 'any_of': {
      const alternatives = condition.values.map(value => collection.filter.byProperty(condition.property).equal(value));
      return alternatives.length === 1 && alternatives[0] ? alternatives[0] : Filters.or(...alternatives);
    }
  }
}

function toWhere(collection: Collection, conditions: ScopeCondition[]): FilterValue | undefined {
  const filters = conditions.map(c => toFilter(collection, c));
  if (filters.length === 0) return undefined;
  if (filters.length === 1) return filters[0];
  return Filters.and(...filters);
}

class WeaviateAgiraCollection implements AgiraObjectCollection {
  constructor(private readonly collection: Collection) {}

  exists(uuid: string): Promise<boolean> {
    return this.collection.data.exists(uuid);
  }

  async insert(uuid: string, properties: StoredProperties): Promise<void> {
    await this.collection.data.insert({ id: uuid, properties });
  }

  async replace(uuid: string, properties: StoredProperties): Promise<void> {
    await this.collection.data.replace({ id: uuid, properties });
  }

  deleteById(uuid: string): Promise<boolean> {
    return this.collection.data.deleteById(uuid);
  }

  async hybrid(
    query: string,
    options: { alpha: number; limit: number; conditions: ScopeCondition[] },
  ): Promise<ReturnedObject[]> {
    const response = await this.collection.query.hybrid(query, {
      alpha: options.alpha,
      limit: options.limit,
      filters: toWhere(this.collection, options.conditions),
      fusionType: 'RelativeScore',
      returnMetadata: ['score'],
    });
    return response.objects.map(obj => ({
      properties: { ...obj.properties },
      score: obj.metadata?.score ?? null,
    }));
  }

  async nearText(query: string, options: { limit: number; conditions: ScopeCondition[] }): Promise<ReturnedObject[]> {
    const response = await this.collection.query.nearText(query, {
      limit: options.limit,
      filters: toWhere(this.collection, options.conditions),
      returnMetadata: ['distance'],
    });
    return response.objects.map(obj => ({
      properties: { ...obj.properties },
      score: obj.metadata?.distance ?? null,
    }));
  }
}

/**
 * Default opener: connect, make sure the schema exists, hand out the collection.
 */
export const openWeaviateCollection: CollectionOpener = async () => {
  const client = await getClient();
  try {
    await ensureSchemaOnce(schemaCollections(client));
  } catch (err) {
    await client.close();
    throw err;
  }
  return {
    collection: new WeaviateAgiraCollection(client.collections.get(COLLECTION_NAME)),
    close: () => client.close(),
  };
};

import { v5 as uuidv5 } from 'uuid';
import { logger, errorData } from '../utils/logger.js';
import {
  openWeaviateCollection,
  withCollection,
  type CollectionOpener,
  type StoredProperties,
} from './collection.js';
import { toAgiraObject, type AgiraObject, type TrackerRecord } from './serializers.js';

const UUID_NAMESPACE = 'a9c5e8d0-1234-5678-9abc-def012345678';

const PREVIEW_LENGTH = 200;

/**
 * Deterministic object UUID for `<type>:<objectId>`; upserts are idempotent.
 */
export function makeObjectUuid(type: string, objectId: string | number): string {
  return uuidv5(`${type}:${objectId}`, UUID_NAMESPACE);
}

/** Drop empty properties; Weaviate indexes their absence as null. */
export function toStoredProperties(obj: AgiraObject): StoredProperties {
  const properties: StoredProperties = {};
  const entries: Array<[string, string | number | Date | null]> = Object.entries(obj);
  for (const [key, value] of entries) {
    if (value !== null) properties[key] = value;
  }
  return properties;
}

export interface QueryResult {
  type: string | null;
  object_id: string | null;
  title: string | null;
  text_preview: string;
  url: string | null;
  score: number | null;
}

export interface SyncResult {
  upserted: number;
  failed: number;
}

function stringProperty(properties: Record<string, unknown>, key: string): string | null {
  const value = properties[key];
  return typeof value === 'string' ? value : null;
}

/**
 * Writes and reads AgiraObjects in the vector index.
 */
export class WeaviateObjectStore {
  constructor(private readonly open: CollectionOpener = openWeaviateCollection) {}

  /** Insert or replace an object; returns its UUID. */
  async upsertObject(obj: AgiraObject): Promise<string> {
    const uuid = makeObjectUuid(obj.type, obj.object_id);
    const properties = toStoredProperties(obj);

    await withCollection(this.open, async collection => {
      if (await collection.exists(uuid)) {
        await collection.replace(uuid, properties);
      } else {
        await collection.insert(uuid, properties);
      }
    });

    logger.debug('Upserted object', { type: obj.type, object_id: obj.object_id, uuid });
    return uuid;
  }

  upsertRecord(record: TrackerRecord): Promise<string> {
    return this.upsertObject(toAgiraObject(record));
  }

  /** Returns false when the object was not in the index. */
  async deleteObject(type: string, objectId: string | number): Promise<boolean> {
    const uuid = makeObjectUuid(type, objectId);
    const deleted = await withCollection(this.open, collection => collection.deleteById(uuid));
    logger.debug(deleted ? 'Deleted object' : 'Object to delete not found', { type, object_id: String(objectId) });
    return deleted;
  }

  /**
   * Upsert many records over one connection. Failures are counted and logged.
   */
  async syncObjects(records: TrackerRecord[]): Promise<SyncResult> {
    const result: SyncResult = { upserted: 0, failed: 0 };

    await withCollection(this.open, async collection => {
      for (const record of records) {
        const obj = toAgiraObject(record);
        const uuid = makeObjectUuid(obj.type, obj.object_id);
        try {
          const properties = toStoredProperties(obj);
          if (await collection.exists(uuid)) {
            await collection.replace(uuid, properties);
          } else {
            await collection.insert(uuid, properties);
          }
          result.upserted++;
        } catch (err) {
          result.failed++;
          logger.warn('Failed to sync object', { type: obj.type, object_id: obj.object_id, ...errorData(err) });
        }
      }
    });

    logger.info('Synced objects', { ...result });
    return result;
  }

  /**
   * Semantic near-text search within one project.
   * `filters` adds equality conditions on further properties.
   */
  async query(
    projectId: string | number,
    queryText: string,
    topK = 10,
    filters: Record<string, string | number> = {},
  ): Promise<QueryResult[]> {
    const conditions = [
      { kind: 'equal' as const, property: 'project_id', value: String(projectId) },
      ...Object.entries(filters).map(([property, value]) => ({ kind: 'equal' as const, property, value: String(value) })),
    ];

    const objects = await withCollection(this.open, collection =>
      collection.nearText(queryText, { limit: topK, conditions }),
    );

    const results = objects.map(({ properties, score }) => {
      const text = stringProperty(properties, 'text') ?? '';
      return {
        type: stringProperty(properties, 'type'),
        object_id: stringProperty(properties, 'object_id'),
        title: stringProperty(properties, 'title'),
        text_preview: text.length > PREVIEW_LENGTH ? text.slice(0, PREVIEW_LENGTH) + '...' : text,
        url: stringProperty(properties, 'url'),
        score,
      };
    });

    logger.debug('Weaviate query finished', { project_id: String(projectId), results: results.length });
    return results;
  }
}

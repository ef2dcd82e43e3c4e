import { FIELD_MAPPING } from '../rag/config.js';
import { buildScopeConditions } from '../rag/search-scope.js';
import type { HybridSearchBackend, HybridSearchRequest, SearchHit } from '../rag/types.js';
import { isAvailable } from './client.js';
import { openWeaviateCollection, withCollection, type CollectionOpener, type ReturnedObject } from './collection.js';

function stringOrNull(value: unknown): string | null {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return null;
}

function timestampOrNull(value: unknown): string | null {
  if (value instanceof Date) return value.toISOString();
  return stringOrNull(value);
}

/** Map a returned AgiraObject onto logical hit fields. */
export function toSearchHit({ properties, score }: ReturnedObject): SearchHit {
  return {
    object_id: stringOrNull(properties[FIELD_MAPPING.object_id]),
    object_type: stringOrNull(properties[FIELD_MAPPING.object_type]),
    title: stringOrNull(properties[FIELD_MAPPING.title]),
    content: stringOrNull(properties[FIELD_MAPPING.content]) ?? '',
    link: stringOrNull(properties[FIELD_MAPPING.link]),
    source: stringOrNull(properties[FIELD_MAPPING.source]),
    updated_at: timestampOrNull(properties[FIELD_MAPPING.updated_at]),
    score,
  };
}

/**
 * Hybrid search over the AgiraObject collection with relative-score fusion.
 */
export class WeaviateSearchBackend implements HybridSearchBackend {
  constructor(
    private readonly open: CollectionOpener = openWeaviateCollection,
    private readonly available: () => boolean = () => isAvailable(),
  ) {}

  isAvailable(): boolean {
    return this.available();
  }

  async hybridSearch(request: HybridSearchRequest): Promise<SearchHit[]> {
    const objects = await withCollection(this.open, collection =>
      collection.hybrid(request.query, {
        alpha: request.alpha,
        limit: request.limit,
        conditions: buildScopeConditions(request.scope),
      }),
    );
    return objects.map(toSearchHit);
  }
}

/**
 * Retrieval constants shared by the basic and extended pipelines.
 */

export const COLLECTION_NAME = 'AgiraObject';

/** Logical hit fields → AgiraObject property names. */
export const FIELD_MAPPING = {
  object_id: 'object_id',
  object_type: 'type',
  title: 'title',
  content: 'text',
  link: 'url',
  project_id: 'project_id',
  item_id: 'parent_object_id',
  updated_at: 'updated_at',
  source: 'source_system',
} as const;

export const DEFAULT_LIMIT = 20;

/** Hybrid alpha: 0 = pure BM25, 1 = pure vector. */
export const DEFAULT_ALPHA_KEYWORD = 0.2;
export const DEFAULT_ALPHA_SEMANTIC = 0.7;
export const DEFAULT_ALPHA_BALANCED = 0.5;

export const MAX_CONTENT_LENGTH = 600;

/** Over-fetch factor so deduplication can still fill `limit`. */
export const DEDUP_FETCH_MULTIPLIER = 2;

/** Types searched when the caller passes no type filter. */
export const ALLOWED_OBJECT_TYPES: readonly string[] = ['item', 'github_issue', 'github_pr', 'attachment'];

/** Tie-breaker when scores are equal; higher wins. */
export const TYPE_PRIORITY: Readonly<Record<string, number>> = {
  item: 6,
  attachment: 5,
  github_pr: 5,
  github_issue: 4,
  comment: 3,
  change: 2,
  file: 1,
  project: 0,
};

export function typePriority(objectType: string | null | undefined): number {
  return (objectType && TYPE_PRIORITY[objectType]) || 0;
}

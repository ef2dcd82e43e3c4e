/**
 * Basic retrieval pipeline: one hybrid search with a heuristic alpha,
 * deduplicated and ranked into a flat list of context objects.
 */

import { errorMessage } from '../errors.js';
import { logger, errorData } from '../utils/logger.js';
import {
  DEDUP_FETCH_MULTIPLIER,
  DEFAULT_ALPHA_BALANCED,
  DEFAULT_ALPHA_KEYWORD,
  DEFAULT_ALPHA_SEMANTIC,
  DEFAULT_LIMIT,
  MAX_CONTENT_LENGTH,
  typePriority,
} from './config.js';
import type {
  HybridSearchBackend,
  RagContext,
  RagContextObject,
  RagContextStats,
  SearchHit,
  SearchScope,
} from './types.js';

/** Patterns that mark a query as identifier- or error-heavy. */
const KEYWORD_PATTERNS: readonly RegExp[] = [
  /#\d+/, // issue ids
  /\bv\d+(\.\d+)+\b/, // versions
  /[A-Z][a-z]+[A-Z]/, // PascalCase
  /[a-z]+[A-Z][a-z]+/, // camelCase
  /\b[a-z]+_[a-z]+\b/, // snake_case
  /(Exception|Error|Traceback|Stack)/,
  /HTTP\s*[45]\d\d/,
  /(Null|Undefined|Reference)/,
];

/**
 * Pick the hybrid alpha for a query.
 *
 * Short queries with any identifier pattern, or any query with two or more,
 * lean on BM25. Long natural-language questions lean on vectors.
 */
export function determineAlpha(query: string): number {
  const keywordCount = KEYWORD_PATTERNS.filter(pattern => pattern.test(query)).length;
  const wordCount = query.split(/\s+/).filter(Boolean).length;

  if (keywordCount > 0 && wordCount <= 10) return DEFAULT_ALPHA_KEYWORD;
  if (keywordCount >= 2) return DEFAULT_ALPHA_KEYWORD;
  if (wordCount > 10 && keywordCount === 0) return DEFAULT_ALPHA_SEMANTIC;
  return DEFAULT_ALPHA_BALANCED;
}

/**
 * `text.slice(0, end)`, one unit shorter when the cut would split a surrogate pair.
 */
export function sliceText(text: string, end: number): string {
  if (end > 0 && end < text.length) {
    const last = text.charCodeAt(end - 1);
    if (last >= 0xd800 && last <= 0xdbff) return text.slice(0, end - 1);
  }
  return text.slice(0, end);
}

/**
 * Cut content to `maxLength`, preferring a word boundary in the last 20%.
 */
export function truncateContent(content: string, maxLength: number = MAX_CONTENT_LENGTH): string {
  if (!content || content.length <= maxLength) return content;

  let truncated = sliceText(content, maxLength);
  const lastSpace = truncated.lastIndexOf(' ');
  if (lastSpace > maxLength * 0.8) {
    truncated = truncated.slice(0, lastSpace);
  }
  return truncated.trimEnd() + '...';
}

export function generateSummary(items: Pick<RagContextObject, 'object_type'>[]): string {
  if (items.length === 0) return 'No related objects found.';

  const counts = new Map<string, number>();
  for (const item of items) {
    counts.set(item.object_type, (counts.get(item.object_type) ?? 0) + 1);
  }

  const parts = [...counts.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([type, count]) => `${count} ${type}${count > 1 ? 's' : ''}`);

  const total = items.length;
  let summary = `Found ${total} related object${total !== 1 ? 's' : ''}: ${parts.join(', ')}.`;
  if (counts.has('github_issue') || counts.has('github_pr')) {
    summary += ' Includes GitHub issues/PRs.';
  }
  return summary;
}

/**
 * Keep the first hit per object id, then rank by score and type priority.
 */
export function deduplicateAndRank<T extends SearchHit>(results: T[], limit: number): T[] {
  const seen = new Set<string>();
  const unique: T[] = [];

  for (const result of results) {
    if (result.object_id && !seen.has(result.object_id)) {
      seen.add(result.object_id);
      unique.push(result);
    }
  }

  unique.sort(
    (a, b) => (b.score ?? 0) - (a.score ?? 0) || typePriority(b.object_type) - typePriority(a.object_type),
  );
  return unique.slice(0, limit);
}

export interface ContextRequest extends SearchScope {
  query: string;
  limit?: number;
  /** Hybrid weight; chosen by determineAlpha() when omitted. */
  alpha?: number;
  includeDebug?: boolean;
}

export interface ContextDeps {
  backend: HybridSearchBackend;
}

/**
 * Build a flat retrieval context for a query.
 *
 * Backend failures never throw: they end up in `stats.error` with an empty item list.
 */
export async function buildContext(request: ContextRequest, deps: ContextDeps): Promise<RagContext> {
  const { query, limit = DEFAULT_LIMIT, includeDebug = false } = request;
  const alpha = request.alpha ?? determineAlpha(query);
  const debug = includeDebug
    ? { alpha_heuristic: alpha, query_length: query.length, word_count: query.split(/\s+/).filter(Boolean).length }
    : undefined;

  const stats: RagContextStats = { total_results: 0, deduplicated: 0, error: null };

  if (!deps.backend.isAvailable()) {
    logger.warn('Weaviate is not available, returning empty context');
    stats.error = 'Weaviate not configured or disabled';
    return { query, alpha, summary: 'Weaviate is not available.', items: [], stats, ...(debug ? { debug } : {}) };
  }

  const items: RagContextObject[] = [];
  try {
    const hits = await deps.backend.hybridSearch({
      query,
      alpha,
      limit: limit * DEDUP_FETCH_MULTIPLIER,
      scope: {
        projectId: request.projectId,
        itemId: request.itemId,
        currentItemId: request.currentItemId,
        objectTypes: request.objectTypes,
      },
    });
    stats.total_results = hits.length;

    const unique = deduplicateAndRank(hits, limit);
    stats.deduplicated = unique.length;

    for (const hit of unique) {
      items.push({
        object_type: hit.object_type ?? 'unknown',
        object_id: hit.object_id ?? '',
        title: hit.title,
        content: truncateContent(hit.content),
        source: hit.source,
        relevance_score: hit.score,
        link: hit.link,
        updated_at: hit.updated_at,
      });
    }
  } catch (err) {
    logger.error('Error during RAG search', { query, ...errorData(err) });
    stats.error = errorMessage(err);
  }

  return { query, alpha, summary: generateSummary(items), items, stats, ...(debug ? { debug } : {}) };
}

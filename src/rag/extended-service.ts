/**
 * Extended retrieval pipeline.
 *
 * Stages:
 *   1. Question optimisation  — agent rewrites the question into core terms, synonyms, tags
 *   2. Query construction     — one semantic-leaning and one keyword-leaning query
 *   3. Dual hybrid search     — alpha 0.6 and alpha 0.3 over the same scope
 *   4. Fusion and rerank      — weighted merge by object id (see scoring.ts)
 *   5. Layer bundling         — thread (A), item (B) and background (C) tiers
 *
 * When optimisation fails or is skipped, the raw question is used as `core`.
 */

import { z } from 'zod';
import type { RequestContext } from '../ai/types.js';
import { logger, errorData } from '../utils/logger.js';
import { MAX_CONTENT_LENGTH } from './config.js';
import { fuseAndRerank } from './scoring.js';
import { sliceText } from './service.js';
import type {
  ExtendedRagContext,
  ExtendedRagDebug,
  ExtendedRagStats,
  FusedHit,
  HybridSearchBackend,
  OptimizedQuery,
  RagContextObject,
  SearchScope,
  TypedSearchHit,
} from './types.js';

export const QUESTION_OPTIMIZATION_AGENT = 'question-optimization-agent.yml';

export const SEMANTIC_ALPHA = 0.6;
export const KEYWORD_ALPHA = 0.3;
export const SEARCH_LIMIT = 24;
export const FUSED_LIMIT = 6;

const LAYER_A_MAX = 3;
const LAYER_B_MAX = 3;
const LAYER_C_MAX = 2;

const OptimizedQuerySchema = z.object({
  language: z.string(),
  core: z.string(),
  synonyms: z.array(z.string()),
  phrases: z.array(z.string()),
  entities: z.record(z.array(z.string())),
  tags: z.array(z.string()),
  ban: z.array(z.string()),
  followup_questions: z.array(z.string()),
});

/** Runs an agent by filename and returns its text. */
export interface AgentRunner {
  executeAgent(filename: string, inputText: string, options?: RequestContext): Promise<string>;
}

/**
 * Strip a leading Markdown code fence, keeping the lines between the
 * first fence line and the next one.
 */
export function stripCodeFence(response: string): string {
  const cleaned = response.trim();
  if (!cleaned.startsWith('```')) return cleaned;

  const lines = cleaned.split('\n');
  let start = 0;
  let end = lines.length;
  for (let i = 0; i < lines.length; i++) {
    if (lines[i]?.startsWith('```')) {
      if (start === 0) {
        start = i + 1;
      } else {
        end = i;
        break;
      }
    }
  }
  return lines.slice(start, end).join('\n');
}

/**
 * Ask the question-optimisation agent to rewrite `query`.
 * Returns null on any agent, JSON or validation failure.
 */
export async function optimizeQuestion(
  query: string,
  context: RequestContext,
  agents: AgentRunner,
): Promise<OptimizedQuery | null> {
  let cleaned: string;
  try {
    const response = await agents.executeAgent(QUESTION_OPTIMIZATION_AGENT, query, context);
    cleaned = stripCodeFence(response);
  } catch (err) {
    logger.error('Error optimizing question', errorData(err));
    return null;
  }

  let data: unknown;
  try {
    data = JSON.parse(cleaned);
  } catch (err) {
    logger.error('Failed to parse question optimization response as JSON', { ...errorData(err), raw: cleaned });
    return null;
  }

  const parsed = OptimizedQuerySchema.safeParse(data);
  if (!parsed.success) {
    const fields = [...new Set(parsed.error.issues.map(i => String(i.path[0] ?? '(root)')))];
    logger.warn('Invalid question optimization response', { fields });
    return null;
  }

  return { ...parsed.data, raw_response: cleaned };
}

/** core + 3 synonyms + 2 phrases + 2 tags */
export function buildSemanticQuery(optimized: OptimizedQuery): string {
  return [
    optimized.core,
    ...optimized.synonyms.slice(0, 3),
    ...optimized.phrases.slice(0, 2),
    ...optimized.tags.slice(0, 2),
  ].join(' ');
}

/** All tags, then core */
export function buildKeywordQuery(optimized: OptimizedQuery): string {
  return [...optimized.tags, optimized.core].join(' ');
}

/**
 * One hybrid search. Returns [] when the backend is unavailable or fails.
 */
export async function performSearch(
  backend: HybridSearchBackend,
  query: string,
  alpha: number,
  scope: SearchScope,
  limit: number = SEARCH_LIMIT,
): Promise<TypedSearchHit[]> {
  if (!backend.isAvailable()) {
    logger.warn('Weaviate is not available');
    return [];
  }

  try {
    const hits = await backend.hybridSearch({ query, alpha, limit, scope });
    const searchType = alpha >= 0.5 ? 'semantic' : 'keyword';
    return hits.map(hit => ({ ...hit, search_type: searchType }));
  } catch (err) {
    logger.error('Error performing Weaviate search', { alpha, ...errorData(err) });
    return [];
  }
}

function toContextObject(hit: FusedHit): RagContextObject {
  const content =
    hit.content.length > MAX_CONTENT_LENGTH ? sliceText(hit.content, MAX_CONTENT_LENGTH).trimEnd() + '...' : hit.content;
  return {
    object_type: hit.object_type ?? '',
    object_id: hit.object_id,
    title: hit.title,
    content,
    source: hit.source,
    relevance_score: hit.final_score || hit.score,
    link: hit.link,
    updated_at: hit.updated_at || null,
  };
}

export interface Layers {
  layerA: RagContextObject[];
  layerB: RagContextObject[];
  layerC: RagContextObject[];
}

/**
 * Bucket fused results into tiers.
 *
 * Comments go to A, the item itself and other items to B, the rest to C.
 * A result whose tier is full overflows into A, then B, then C; when all
 * three are full it is dropped.
 */
export function separateIntoLayers(results: FusedHit[], itemId?: string): Layers {
  const layerA: RagContextObject[] = [];
  const layerB: RagContextObject[] = [];
  const layerC: RagContextObject[] = [];

  for (const result of results) {
    const obj = toContextObject(result);
    const isItemLevel = obj.object_type === 'item' || (itemId !== undefined && itemId !== '' && obj.object_id === itemId);

    if (obj.object_type === 'comment' && layerA.length < LAYER_A_MAX) {
      layerA.push(obj);
    } else if (isItemLevel && layerB.length < LAYER_B_MAX) {
      layerB.push(obj);
    } else if (layerC.length < LAYER_C_MAX) {
      layerC.push(obj);
    } else if (layerA.length < LAYER_A_MAX) {
      layerA.push(obj);
    } else if (layerB.length < LAYER_B_MAX) {
      layerB.push(obj);
    }
  }

  return { layerA, layerB, layerC };
}

export interface ExtendedContextRequest extends SearchScope, RequestContext {
  query: string;
  skipOptimization?: boolean;
  includeDebug?: boolean;
}

export interface ExtendedContextDeps {
  backend: HybridSearchBackend;
  agents: AgentRunner;
}

/**
 * Build a layered retrieval context for a question.
 */
export async function buildExtendedContext(
  request: ExtendedContextRequest,
  deps: ExtendedContextDeps,
): Promise<ExtendedRagContext> {
  const { query, includeDebug = false } = request;
  const stats: ExtendedRagStats = {
    optimization_success: false,
    sem_results: 0,
    kw_results: 0,
    fused_results: 0,
    layer_a_count: 0,
    layer_b_count: 0,
    layer_c_count: 0,
  };
  const debug: ExtendedRagDebug = {};

  // ── Stage 1: Question optimisation ─────────────────────────────
  let optimized: OptimizedQuery | null = null;
  if (!request.skipOptimization) {
    optimized = await optimizeQuestion(query, { user: request.user, clientIp: request.clientIp }, deps.agents);
    if (optimized) {
      stats.optimization_success = true;
      debug.optimized_query = {
        core: optimized.core,
        synonyms: optimized.synonyms,
        tags: optimized.tags,
        phrases: optimized.phrases,
      };
    }
  }

  const effective: OptimizedQuery = optimized ?? {
    language: 'unknown',
    core: query,
    synonyms: [],
    phrases: [],
    entities: {},
    tags: [],
    ban: [],
    followup_questions: [],
  };
  if (!optimized) {
    logger.info('Question optimization failed or skipped, using raw query');
  }

  // ── Stage 2: Query construction ────────────────────────────────
  const semanticQuery = buildSemanticQuery(effective);
  const keywordQuery = buildKeywordQuery(effective);
  debug.queries = { semantic: semanticQuery, keyword: keywordQuery };

  // ── Stage 3: Dual hybrid search ────────────────────────────────
  const scope: SearchScope = {
    projectId: request.projectId,
    itemId: request.itemId,
    currentItemId: request.currentItemId,
    objectTypes: request.objectTypes,
  };
  const [semResults, kwResults] = await Promise.all([
    performSearch(deps.backend, semanticQuery, SEMANTIC_ALPHA, scope, SEARCH_LIMIT),
    performSearch(deps.backend, keywordQuery, KEYWORD_ALPHA, scope, SEARCH_LIMIT),
  ]);
  stats.sem_results = semResults.length;
  stats.kw_results = kwResults.length;

  // ── Stage 4: Fusion and rerank ─────────────────────────────────
  const fused = fuseAndRerank(semResults, kwResults, request.itemId, FUSED_LIMIT);
  stats.fused_results = fused.length;

  // ── Stage 5: Layer bundling ────────────────────────────────────
  const { layerA, layerB, layerC } = separateIntoLayers(fused, request.itemId);
  stats.layer_a_count = layerA.length;
  stats.layer_b_count = layerB.length;
  stats.layer_c_count = layerC.length;

  const allItems = [...layerA, ...layerB, ...layerC];
  const summary =
    `Retrieved ${allItems.length} relevant items across ${layerA.length} thread-related, ` +
    `${layerB.length} item-context, and ${layerC.length} background snippets.`;

  return {
    query,
    optimized_query: optimized,
    layer_a: layerA,
    layer_b: layerB,
    layer_c: layerC,
    all_items: allItems,
    summary,
    stats,
    ...(includeDebug ? { debug } : {}),
  };
}

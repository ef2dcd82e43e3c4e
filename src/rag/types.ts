/**
 * A single search hit, mapped from an AgiraObject onto logical field names.
 */
export interface SearchHit {
  object_id: string | null;
  object_type: string | null;
  title: string | null;
  content: string;
  link: string | null;
  source: string | null;
  updated_at: string | null;
  score: number | null;
}

export type SearchType = 'semantic' | 'keyword';

export interface TypedSearchHit extends SearchHit {
  search_type: SearchType;
}

/** A hit after merging the semantic and keyword result lists. */
export interface FusedHit extends TypedSearchHit {
  object_id: string;
  sem_score: number;
  kw_score: number;
  final_score: number;
}

/**
 * Where to search. Unset fields do not restrict the search.
 * `objectTypes` left undefined means the default allowed types; `[]` means any type.
 */
export interface SearchScope {
  projectId?: string;
  itemId?: string;
  currentItemId?: string;
  objectTypes?: string[];
}

export interface HybridSearchRequest {
  query: string;
  alpha: number;
  limit: number;
  scope: SearchScope;
}

/**
 * Hybrid (BM25 + vector) search backend used by the retrieval pipelines.
 */
export interface HybridSearchBackend {
  /** Configuration check only; does not connect. */
  isAvailable(): boolean;
  hybridSearch(request: HybridSearchRequest): Promise<SearchHit[]>;
}

export interface RagContextObject {
  object_type: string;
  object_id: string;
  title: string | null;
  content: string;
  source: string | null;
  relevance_score: number | null;
  link: string | null;
  updated_at: string | null;
}

export interface RagContextStats {
  total_results: number;
  deduplicated: number;
  error: string | null;
}

export interface RagContextDebug {
  alpha_heuristic: number;
  query_length: number;
  word_count: number;
}

export interface RagContext {
  query: string;
  alpha: number;
  summary: string;
  items: RagContextObject[];
  stats: RagContextStats;
  debug?: RagContextDebug;
}

/** Question rewritten by the optimisation agent. */
export interface OptimizedQuery {
  language: string;
  core: string;
  synonyms: string[];
  phrases: string[];
  entities: Record<string, string[]>;
  tags: string[];
  ban: string[];
  followup_questions: string[];
  raw_response?: string;
}

export interface ExtendedRagStats {
  optimization_success: boolean;
  sem_results: number;
  kw_results: number;
  fused_results: number;
  layer_a_count: number;
  layer_b_count: number;
  layer_c_count: number;
}

export interface ExtendedRagDebug {
  optimized_query?: Pick<OptimizedQuery, 'core' | 'synonyms' | 'tags' | 'phrases'>;
  queries?: { semantic: string; keyword: string };
}

export interface ExtendedRagContext {
  query: string;
  optimized_query: OptimizedQuery | null;
  /** Thread-level snippets (comments, closely related objects). */
  layer_a: RagContextObject[];
  /** Item-level snippets. */
  layer_b: RagContextObject[];
  /** Project-level background. */
  layer_c: RagContextObject[];
  all_items: RagContextObject[];
  summary: string;
  stats: ExtendedRagStats;
  debug?: ExtendedRagDebug;
}

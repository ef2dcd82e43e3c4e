/**
 * Fusion of the semantic and keyword result lists.
 *
 *   final = w.semantic * sem_score + w.keyword * kw_score
 *         + w.tagMatch * tag_match + w.sameItem * same_item
 *
 * tag_match is 1.0 for objects the keyword search found, 0.5 otherwise.
 * same_item is 1.0 when the object is the item the question is about.
 * All functions are pure.
 */

import { typePriority } from './config.js';
import type { FusedHit, TypedSearchHit } from './types.js';

export interface FusionWeights {
  semantic: number;
  keyword: number;
  tagMatch: number;
  sameItem: number;
}

export const DEFAULT_FUSION_WEIGHTS: Readonly<FusionWeights> = {
  semantic: 0.6,
  keyword: 0.2,
  tagMatch: 0.15,
  sameItem: 0.05,
};

export const DEFAULT_FUSED_LIMIT = 6;

/**
 * Merge both lists by object id, score each object, return the top `limit`.
 *
 * Semantic hits seed the map; keyword hits either set `kw_score` on an
 * existing entry or add a new one with `sem_score = 0`. Hits without an id
 * are dropped. Ties on final score fall back to type priority.
 */
export function fuseAndRerank(
  semResults: TypedSearchHit[],
  kwResults: TypedSearchHit[],
  itemId?: string,
  limit: number = DEFAULT_FUSED_LIMIT,
  weights: FusionWeights = DEFAULT_FUSION_WEIGHTS,
): FusedHit[] {
  const merged = new Map<string, Omit<FusedHit, 'final_score'>>();

  for (const hit of semResults) {
    if (!hit.object_id) continue;
    merged.set(hit.object_id, { ...hit, object_id: hit.object_id, sem_score: hit.score ?? 0, kw_score: 0 });
  }

  for (const hit of kwResults) {
    if (!hit.object_id) continue;
    const existing = merged.get(hit.object_id);
    if (existing) {
      existing.kw_score = hit.score ?? 0;
    } else {
      merged.set(hit.object_id, { ...hit, object_id: hit.object_id, sem_score: 0, kw_score: hit.score ?? 0 });
    }
  }

  const fused: FusedHit[] = [...merged.values()].map(entry => {
    const tagMatch = entry.kw_score > 0 ? 1.0 : 0.5;
    const sameItem = itemId && entry.object_id === itemId ? 1.0 : 0.0;
    const finalScore =
      weights.semantic * entry.sem_score +
      weights.keyword * entry.kw_score +
      weights.tagMatch * tagMatch +
      weights.sameItem * sameItem;
    return { ...entry, final_score: finalScore, score: finalScore };
  });

  fused.sort((a, b) => b.final_score - a.final_score || typePriority(b.object_type) - typePriority(a.object_type));
  return fused.slice(0, limit);
}

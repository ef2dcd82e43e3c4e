import { ALLOWED_OBJECT_TYPES, FIELD_MAPPING } from './config.js';
import type { SearchScope } from './types.js';

/** Backend-neutral filter condition on an AgiraObject property. */
export type ScopeCondition =
  | { kind: 'equal'; property: string; value: string }
  | { kind: 'not_equal'; property: string; value: string }
  | { kind: 'any_of'; property: string; values: string[] }
  | { kind: 'not_null'; property: string };

/**
 * Translate a search scope into AND-combined conditions.
 * Objects without text are always excluded.
 */
export function buildScopeConditions(scope: SearchScope): ScopeCondition[] {
  const conditions: ScopeCondition[] = [];
  const objectTypes = scope.objectTypes ?? ALLOWED_OBJECT_TYPES;

  if (scope.projectId) {
    conditions.push({ kind: 'equal', property: FIELD_MAPPING.project_id, value: scope.projectId });
  }
  if (scope.itemId) {
    conditions.push({ kind: 'equal', property: FIELD_MAPPING.item_id, value: scope.itemId });
  }
  if (scope.currentItemId) {
    conditions.push({ kind: 'not_equal', property: FIELD_MAPPING.object_id, value: scope.currentItemId });
  }
  if (objectTypes.length > 0) {
    conditions.push({ kind: 'any_of', property: FIELD_MAPPING.object_type, values: [...objectTypes] });
  }
  conditions.push({ kind: 'not_null', property: FIELD_MAPPING.content });

  return conditions;
}

export * from './types.js';
export * from './config.js';
export { buildScopeConditions, type ScopeCondition } from './search-scope.js';
export { determineAlpha, truncateContent, sliceText, generateSummary, deduplicateAndRank, buildContext } from './service.js';
export type { ContextRequest, ContextDeps } from './service.js';
export { fuseAndRerank, DEFAULT_FUSION_WEIGHTS, type FusionWeights } from './scoring.js';
export {
  optimizeQuestion,
  stripCodeFence,
  buildSemanticQuery,
  buildKeywordQuery,
  performSearch,
  separateIntoLayers,
  buildExtendedContext,
  QUESTION_OPTIMIZATION_AGENT,
} from './extended-service.js';
export type { AgentRunner, ExtendedContextRequest, ExtendedContextDeps, Layers } from './extended-service.js';
export { toContextText, toExtendedContextText } from './context-text.js';

import { AgentService } from './agents/agent-service.js';
import { aiJobHistory, type AIJobHistory } from './ai/job-history.js';
import type { HybridSearchBackend } from './rag/types.js';
import { WeaviateSearchBackend } from './weaviate/search-backend.js';

/**
 * Long-lived collaborators shared by the HTTP routes and the MCP tools.
 */
export interface AppServices {
  backend: HybridSearchBackend;
  agents: AgentService;
  jobs: AIJobHistory;
}

export function createServices(overrides: Partial<AppServices> = {}): AppServices {
  return {
    backend: overrides.backend ?? new WeaviateSearchBackend(),
    agents: overrides.agents ?? new AgentService(),
    jobs: overrides.jobs ?? aiJobHistory,
  };
}

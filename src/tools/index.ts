import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AppServices } from '../services.js';
import { registerRagContextTool } from './rag-context.js';
import { registerRagExtendedContextTool } from './rag-extended-context.js';
import { registerAgentExecuteTool, registerAgentListTool } from './agent-tools.js';

export function registerTools(server: McpServer, services: AppServices) {
  registerRagContextTool(server, services);
  registerRagExtendedContextTool(server, services);
  registerAgentListTool(server, services);
  registerAgentExecuteTool(server, services);
}

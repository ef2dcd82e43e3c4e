import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { errorMessage } from '../errors.js';
import { AgentExecuteSchema } from '../server/schemas.js';
import type { AppServices } from '../services.js';

export function registerAgentListTool(server: McpServer, services: AppServices) {
  server.registerTool(
    'agent_list',
    {
      description: 'List the configured AI agents (filename, name, description, provider, model).',
      inputSchema: {},
    },
    async () => {
      const agents = services.agents.listAgents().map(a => ({
        filename: a.filename,
        name: a.name ?? a.filename,
        description: a.description ?? null,
        provider: a.provider,
        model: a.model,
      }));
      return { content: [{ type: 'text', text: JSON.stringify({ agents }, null, 2) }] };
    }
  );
}

export function registerAgentExecuteTool(server: McpServer, services: AppServices) {
  server.registerTool(
    'agent_execute',
    {
      description: 'Run an AI agent on input text and return its response. Example: filename="question-optimization-agent.yml".',
      inputSchema: {
        filename: z.string().describe('Agent YAML filename, e.g. question-optimization-agent.yml'),
        ...AgentExecuteSchema.shape,
      },
    },
    async ({ filename, input, parameters }) => {
      try {
        const response = await services.agents.executeAgent(filename, input, { parameters });
        return { content: [{ type: 'text', text: response }] };
      } catch (err) {
        return { content: [{ type: 'text', text: errorMessage(err) }], isError: true };
      }
    }
  );
}

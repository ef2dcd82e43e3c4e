import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { handleContextRequest } from '../server/handlers.js';
import { ContextRequestSchema } from '../server/schemas.js';
import type { AppServices } from '../services.js';

export function registerRagContextTool(server: McpServer, services: AppServices) {
  server.registerTool(
    'rag_context',
    {
      description:
        'Hybrid (keyword + vector) search over tracker items, GitHub issues/PRs and attachments. Returns ranked snippets and a ready-to-use [CONTEXT]/[SOURCES] block. Alpha is chosen from the query when omitted: identifiers and error names favour keywords, long questions favour semantics.',
      inputSchema: ContextRequestSchema.shape,
    },
    async (args) => {
      const context = await handleContextRequest(ContextRequestSchema.parse(args), services);
      const header = `${context.summary}${context.stats.error ? `\nError: ${context.stats.error}` : ''}`;
      return { content: [{ type: 'text', text: `${header}\n\n${context.context_text}` }] };
    }
  );
}

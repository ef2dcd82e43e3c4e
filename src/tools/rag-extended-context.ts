import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { handleExtendedContextRequest } from '../server/handlers.js';
import { ExtendedContextRequestSchema } from '../server/schemas.js';
import type { AppServices } from '../services.js';

export function registerRagExtendedContextTool(server: McpServer, services: AppServices) {
  server.registerTool(
    'rag_extended_context',
    {
      description:
        'Answer-oriented retrieval. Rewrites the question with the question-optimization agent, runs a semantic and a keyword search, fuses them and returns up to 6 snippets in three layers: [#A] thread-related, [#B] item context, [#C] background. Falls back to the raw question if rewriting fails.',
      inputSchema: ExtendedContextRequestSchema.shape,
    },
    async (args) => {
      const context = await handleExtendedContextRequest(ExtendedContextRequestSchema.parse(args), services);
      return { content: [{ type: 'text', text: `${context.summary}\n\n${context.context_text}` }] };
    }
  );
}

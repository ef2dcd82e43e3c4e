import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createMcpServer } from '../server/mcp-handler.js';
import { createServices } from '../services.js';
import { logger } from '../utils/logger.js';

/**
 * Serve the MCP tools over stdin/stdout. Nothing else may write to stdout.
 */
export async function runStdioServer(): Promise<void> {
  const server = createMcpServer(createServices());
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info('MCP stdio server started');
}

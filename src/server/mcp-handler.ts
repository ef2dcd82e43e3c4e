import type { FastifyInstance } from 'fastify';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { SSEServerTransport } from '@modelcontextprotocol/sdk/server/sse.js';
import { z } from 'zod';
import type { AppServices } from '../services.js';
import { registerTools } from '../tools/index.js';
import { logger, errorData } from '../utils/logger.js';
import { paths } from '../utils/paths.js';

const MessageQuery = z.object({ sessionId: z.string().optional() });

const sessions = new Map<string, SSEServerTransport>();

/** MCP server exposing the retrieval and agent tools. */
export function createMcpServer(services: AppServices): McpServer {
  const server = new McpServer({ name: paths.packageJson.name, version: paths.getVersion() });
  registerTools(server, services);
  return server;
}

export function registerMcpHandler(app: FastifyInstance, services: AppServices) {
  // GET /mcp - Establish SSE connection
  app.get('/mcp', async (request, reply) => {
    const server = createMcpServer(services);

    const transport = new SSEServerTransport('/mcp/message', reply.raw);
    sessions.set(transport.sessionId, transport);
    transport.onclose = () => sessions.delete(transport.sessionId);
    transport.onerror = err => logger.error('MCP transport error', errorData(err));

    await server.connect(transport);
    logger.info('MCP session opened', { sessionId: transport.sessionId });
    return reply;
  });

  // POST /mcp/message - Handle MCP messages
  app.post('/mcp/message', async (request, reply) => {
    const { sessionId } = MessageQuery.parse(request.query);

    if (!sessionId) {
      return reply.code(400).send({ error: 'Missing sessionId' });
    }

    const transport = sessions.get(sessionId);
    if (!transport) {
      return reply.code(404).send({ error: 'Session not found' });
    }

    await transport.handlePostMessage(request.raw, reply.raw, request.body);
    return reply;
  });
}

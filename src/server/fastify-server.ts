import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { ZodError } from 'zod';
import { getConfig } from '../config/env.js';
import { AgentConfigError, ServiceDisabled, ServiceNotConfigured } from '../errors.js';
import { createAuthMiddleware } from '../middleware/auth.js';
import { createServices, type AppServices } from '../services.js';
import { logger, errorData } from '../utils/logger.js';
import { paths } from '../utils/paths.js';
import { registerApiRoutes } from './api-routes.js';
import { registerMcpHandler } from './mcp-handler.js';

/**
 * HTTP status for an error thrown by a route.
 */
export function statusForError(error: Error): number {
  if (error instanceof ZodError) return 400;
  if (error instanceof AgentConfigError) {
    return error.reason === 'not_found' ? 404 : error.reason === 'invalid' ? 400 : 500;
  }
  if (error instanceof ServiceDisabled || error instanceof ServiceNotConfigured) return 503;
  if ('statusCode' in error && typeof error.statusCode === 'number' && error.statusCode < 500) {
    return error.statusCode;
  }
  return 500;
}

export interface AppOptions {
  services?: AppServices;
  apiKey?: string;
}

export async function createApp(options: AppOptions = {}): Promise<FastifyInstance> {
  const services = options.services ?? createServices();
  const app = Fastify({ logger: false, bodyLimit: 10 * 1024 * 1024 });

  // CORS
  await app.register(cors, { origin: '*' });

  // Auth middleware
  app.addHook('preHandler', createAuthMiddleware(options.apiKey));

  app.setErrorHandler((error: Error, request, reply) => {
    const status = statusForError(error);
    const data = { method: request.method, url: request.url, status, ...errorData(error) };
    if (status >= 500) {
      logger.error('Request failed', data);
    } else {
      logger.warn('Request rejected', data);
    }

    if (error instanceof ZodError) {
      return reply.code(status).send({ error: 'Invalid request', issues: error.issues });
    }
    return reply.code(status).send({ error: error.message });
  });

  app.addHook('onClose', async () => {
    await services.agents.close();
  });

  // Register routes
  registerApiRoutes(app, services);
  registerMcpHandler(app, services);

  // Health check
  app.get('/health', async () => ({ status: 'ok' }));

  // Version endpoint
  app.get('/version', async () => paths.getVersion());

  return app;
}

export async function startHttpServer(port: number = getConfig().port): Promise<FastifyInstance> {
  const app = await createApp({ apiKey: getConfig().apiKey });
  await app.listen({ port, host: '0.0.0.0' });
  logger.info('HTTP server started', { port });
  console.log(`agira-rag server running on http://localhost:${port}`);
  console.log(`- API: http://localhost:${port}/api`);
  console.log(`- MCP endpoint: http://localhost:${port}/mcp`);

  // Graceful shutdown
  const shutdown = async () => {
    console.log('Shutting down gracefully...');
    await app.close();
    process.exit(0);
  };
  const onSignal = () => {
    shutdown().catch(err => {
      logger.error('Shutdown failed', errorData(err));
      process.exit(1);
    });
  };
  process.once('SIGTERM', onSignal);
  process.once('SIGINT', onSignal);

  return app;
}

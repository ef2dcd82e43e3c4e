import type { FastifyInstance, FastifyRequest } from 'fastify';
import { z } from 'zod';
import type { RequestContext } from '../ai/types.js';
import { AgentConfigError } from '../errors.js';
import type { AppServices } from '../services.js';
import { handleContextRequest, handleExtendedContextRequest } from './handlers.js';
import { AgentExecuteSchema, ContextRequestSchema, ExtendedContextRequestSchema, JobsQuerySchema } from './schemas.js';

const FilenameParams = z.object({ filename: z.string().min(1) });

/** Caller identity recorded in the AI job history. */
function requestContext(request: FastifyRequest): RequestContext {
  const user = request.headers['x-agira-user'];
  return {
    user: typeof user === 'string' && user ? user : undefined,
    clientIp: request.ip,
  };
}

export function registerApiRoutes(app: FastifyInstance, services: AppServices) {
  app.post('/api/rag/context', async request => {
    const body = ContextRequestSchema.parse(request.body);
    return handleContextRequest(body, services);
  });

  app.post('/api/rag/extended-context', async request => {
    const body = ExtendedContextRequestSchema.parse(request.body);
    return handleExtendedContextRequest(body, services, requestContext(request));
  });

  app.get('/api/agents', async () => {
    const agents = services.agents.listAgents().map(agent => ({
      filename: agent.filename,
      name: agent.name ?? agent.filename,
      description: agent.description ?? null,
      provider: agent.provider,
      model: agent.model,
    }));
    return { agents };
  });

  app.get('/api/agents/:filename', async request => {
    const { filename } = FilenameParams.parse(request.params);
    const agent = services.agents.getAgent(filename);
    if (!agent) {
      throw new AgentConfigError(`Agent '${filename}' not found`, 'not_found');
    }
    return agent;
  });

  app.post('/api/agents/:filename/execute', async request => {
    const { filename } = FilenameParams.parse(request.params);
    const { input, parameters } = AgentExecuteSchema.parse(request.body);
    const response = await services.agents.executeAgent(filename, input, {
      ...requestContext(request),
      parameters,
    });
    return { response };
  });

  app.get('/api/ai/jobs', async request => {
    const { limit, agent } = JobsQuerySchema.parse(request.query);
    return { jobs: services.jobs.read({ limit, agent }) };
  });
}

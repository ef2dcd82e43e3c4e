/**
 * Request → service calls, shared by the HTTP routes and the MCP tools.
 */

import type { RequestContext } from '../ai/types.js';
import { toContextText, toExtendedContextText } from '../rag/context-text.js';
import { buildExtendedContext } from '../rag/extended-service.js';
import { buildContext } from '../rag/service.js';
import type { ExtendedRagContext, RagContext } from '../rag/types.js';
import type { AppServices } from '../services.js';
import type { ContextRequestBody, ExtendedContextRequestBody } from './schemas.js';

export async function handleContextRequest(
  body: ContextRequestBody,
  services: Pick<AppServices, 'backend'>,
): Promise<RagContext & { context_text: string }> {
  const context = await buildContext(
    {
      query: body.query,
      projectId: body.project_id,
      itemId: body.item_id,
      currentItemId: body.current_item_id,
      objectTypes: body.object_types,
      limit: body.limit,
      alpha: body.alpha,
      includeDebug: body.include_debug,
    },
    { backend: services.backend },
  );
  return { ...context, context_text: toContextText(context) };
}

export async function handleExtendedContextRequest(
  body: ExtendedContextRequestBody,
  services: Pick<AppServices, 'backend' | 'agents'>,
  requestContext: RequestContext = {},
): Promise<ExtendedRagContext & { context_text: string }> {
  const context = await buildExtendedContext(
    {
      query: body.query,
      projectId: body.project_id,
      itemId: body.item_id,
      currentItemId: body.current_item_id,
      objectTypes: body.object_types,
      skipOptimization: body.skip_optimization,
      includeDebug: body.include_debug,
      user: requestContext.user,
      clientIp: requestContext.clientIp,
    },
    { backend: services.backend, agents: services.agents },
  );
  return { ...context, context_text: toExtendedContextText(context) };
}

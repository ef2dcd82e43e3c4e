import type { FastifyRequest, FastifyReply } from 'fastify';

const PUBLIC_PATHS = new Set(['/health', '/version']);

/**
 * Bearer API key check for /api and /mcp. Disabled when no key is configured.
 */
export function createAuthMiddleware(apiKey: string | undefined) {
  return async function authMiddleware(request: FastifyRequest, reply: FastifyReply) {
    if (!apiKey) return;

    const path = request.url.split('?')[0] ?? request.url;
    if (PUBLIC_PATHS.has(path)) return;

    if (path.startsWith('/mcp') || path.startsWith('/api')) {
      if (request.headers.authorization !== `Bearer ${apiKey}`) {
        return reply.code(401).send({ error: 'Unauthorized' });
      }
    }
  };
}

/**
 * Service-layer errors shared by the vector store, AI router and agent runner.
 *
 * The HTTP and MCP surfaces map these onto status codes; retrieval code
 * catches them and degrades to empty results instead.
 */

export class ServiceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A service is enabled but its configuration is incomplete (e.g. no Weaviate URL). */
export class ServiceNotConfigured extends ServiceError {}

/** A service is explicitly switched off. */
export class ServiceDisabled extends ServiceError {}

/** An agent definition is missing, unreadable or malformed. */
export class AgentConfigError extends ServiceError {
  constructor(
    message: string,
    public readonly reason: 'not_found' | 'invalid' | 'io' = 'invalid',
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

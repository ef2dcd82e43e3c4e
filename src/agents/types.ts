import { z } from 'zod';

export const DEFAULT_CACHE_TTL_SECONDS = 7_776_000; // 90 days

export const AgentCacheSchema = z.object({
  enabled: z.boolean().default(false),
  ttl_seconds: z.number().int().positive().default(DEFAULT_CACHE_TTL_SECONDS),
  key_strategy: z.string().default('content_hash'),
  agent_version: z.number().int().positive().default(1),
});

/**
 * Agent definition as stored in `<agentsDir>/<name>.yml`.
 * Unknown keys are kept so that saving a loaded agent round-trips them.
 */
export const AgentDefinitionSchema = z
  .object({
    name: z.string().optional(),
    description: z.string().optional(),
    provider: z.string().default('openai'),
    model: z.string().default('gpt-3.5-turbo'),
    role: z.string().default(''),
    task: z.string().default(''),
    parameters: z.record(z.unknown()).default({}),
    cache: AgentCacheSchema.partial().optional(),
  })
  .passthrough();

export type AgentDefinition = z.infer<typeof AgentDefinitionSchema>;
export type AgentCacheConfig = z.infer<typeof AgentCacheSchema>;

/** A loaded agent together with the file it came from. */
export type Agent = AgentDefinition & { filename: string };

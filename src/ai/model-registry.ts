/**
 * AI providers and models available to the router, declared in YAML:
 *
 * ```yaml
 * providers:
 *   - name: OpenAI
 *     provider_type: OpenAI
 *     api_key_env: OPENAI_API_KEY
 *     models:
 *       - model_id: gpt-4o-mini
 *         is_default: true
 *         input_price_per_1m_tokens: 0.15
 *         output_price_per_1m_tokens: 0.6
 * ```
 */

import { existsSync, readFileSync } from 'node:fs';
import YAML from 'yaml';
import { z } from 'zod';
import { ServiceNotConfigured } from '../errors.js';
import { logger } from '../utils/logger.js';
import { paths } from '../utils/paths.js';
import { PROVIDER_TYPES, type ProviderType } from './types.js';

const ModelSchema = z.object({
  model_id: z.string().min(1),
  name: z.string().optional(),
  active: z.boolean().default(true),
  is_default: z.boolean().default(false),
  input_price_per_1m_tokens: z.number().nonnegative().optional(),
  output_price_per_1m_tokens: z.number().nonnegative().optional(),
});

const ProviderSchema = z.object({
  name: z.string().min(1),
  provider_type: z.enum(PROVIDER_TYPES),
  api_key_env: z.string().min(1),
  organization_id: z.string().optional(),
  active: z.boolean().default(true),
  models: z.array(ModelSchema).default([]),
});

const RegistryFileSchema = z.object({
  providers: z.array(ProviderSchema).default([]),
});

export type AIModelDefinition = z.infer<typeof ModelSchema>;
export type AIProviderDefinition = z.infer<typeof ProviderSchema>;

export interface ModelSelection {
  provider: AIProviderDefinition;
  model: AIModelDefinition;
}

export class ModelRegistry {
  constructor(private readonly providers: AIProviderDefinition[]) {}

  static fromYaml(content: string): ModelRegistry {
    const parsed = RegistryFileSchema.safeParse(YAML.parse(content) ?? {});
    if (!parsed.success) {
      const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
      throw new ServiceNotConfigured(`Invalid AI model configuration: ${issues}`);
    }
    return new ModelRegistry(parsed.data.providers);
  }

  /** Every model whose own flag and provider flag are active. */
  activeModels(providerType?: ProviderType): ModelSelection[] {
    const selections: ModelSelection[] = [];
    for (const provider of this.providers) {
      if (!provider.active) continue;
      if (providerType && provider.provider_type !== providerType) continue;
      for (const model of provider.models) {
        if (model.active) selections.push({ provider, model });
      }
    }
    return selections;
  }

  /** API key for a provider, read from the environment variable it names. */
  resolveApiKey(provider: AIProviderDefinition, env: NodeJS.ProcessEnv = process.env): string {
    const key = env[provider.api_key_env];
    if (!key) {
      throw new ServiceNotConfigured(
        `API key for provider '${provider.name}' is not set (expected in ${provider.api_key_env})`,
      );
    }
    return key;
  }
}

/**
 * Load the registry from the configured YAML file.
 * A missing file yields an empty registry, so every selection fails as "not configured".
 */
export function loadModelRegistry(file: string = paths.aiModelsFile): ModelRegistry {
  if (!existsSync(file)) {
    logger.warn('AI model configuration not found', { file });
    return new ModelRegistry([]);
  }
  return ModelRegistry.fromYaml(readFileSync(file, 'utf-8'));
}

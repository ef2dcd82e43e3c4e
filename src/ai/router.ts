/**
 * AIRouter — single entry point for chat/generate calls.
 *
 * Selects a provider + model from the registry, dispatches the call and
 * records every attempt (success or failure) in the job history with token
 * counts, duration and cost.
 */

import { ServiceNotConfigured, errorMessage } from '../errors.js';
import type { BaseProvider } from './base-provider.js';
import { GeminiProvider } from './gemini-provider.js';
import { aiJobHistory, type AIJobHistory } from './job-history.js';
import { loadModelRegistry, type AIProviderDefinition, type ModelRegistry, type ModelSelection } from './model-registry.js';
import { OpenAIProvider } from './openai-provider.js';
import { calculateCost } from './pricing.js';
import type { AIResponse, ChatMessage, ChatOptions, ProviderType, RequestContext } from './types.js';

export type ProviderFactory = (provider: AIProviderDefinition, apiKey: string) => BaseProvider;

/** Provider classes by type. Claude is a valid type without an implementation yet. */
const PROVIDER_CLASSES: Partial<Record<ProviderType, ProviderFactory>> = {
  OpenAI: (p, apiKey) => new OpenAIProvider({ apiKey, organizationId: p.organization_id }),
  Gemini: (_provider, apiKey) => new GeminiProvider({ apiKey }),
};

/** Default order when the caller names no provider. */
const DEFAULT_PROVIDER_ORDER: ProviderType[] = ['OpenAI', 'Gemini'];

export interface RouterCallOptions extends ChatOptions, RequestContext {
  modelId?: string;
  providerType?: ProviderType;
  /** Agent name recorded in the job history. */
  agent?: string;
}

export interface AIRouterDeps {
  registry?: ModelRegistry;
  history?: AIJobHistory;
  /** Override provider construction (tests). */
  createProvider?: ProviderFactory;
  now?: () => number;
}

export class AIRouter {
  private registryInstance: ModelRegistry | undefined;
  private readonly history: AIJobHistory;
  private readonly createProviderOverride?: ProviderFactory;
  private readonly now: () => number;

  constructor(deps: AIRouterDeps = {}) {
    this.registryInstance = deps.registry;
    this.history = deps.history ?? aiJobHistory;
    this.createProviderOverride = deps.createProvider;
    this.now = deps.now ?? Date.now;
  }

  private get registry(): ModelRegistry {
    if (!this.registryInstance) {
      this.registryInstance = loadModelRegistry();
    }
    return this.registryInstance;
  }

  /**
   * Select provider and model.
   *
   * 1. providerType + modelId: exact match
   * 2. providerType only: that provider's default model, else its first active model
   * 3. nothing: OpenAI default, Gemini default, then any active OpenAI, then any active Gemini
   */
  selectModel(providerType?: ProviderType, modelId?: string): ModelSelection {
    if (providerType && modelId) {
      const match = this.registry.activeModels(providerType).find(s => s.model.model_id === modelId);
      if (!match) {
        throw new ServiceNotConfigured(
          `No active model found for provider '${providerType}' with model_id '${modelId}'`,
        );
      }
      return match;
    }

    if (providerType) {
      const candidates = this.registry.activeModels(providerType);
      const match = candidates.find(s => s.model.is_default) ?? candidates[0];
      if (!match) {
        throw new ServiceNotConfigured(`No active model found for provider '${providerType}'`);
      }
      return match;
    }

    for (const type of DEFAULT_PROVIDER_ORDER) {
      const match = this.registry.activeModels(type).find(s => s.model.is_default);
      if (match) return match;
    }
    for (const type of DEFAULT_PROVIDER_ORDER) {
      const match = this.registry.activeModels(type)[0];
      if (match) return match;
    }

    throw new ServiceNotConfigured('No active AI model configured');
  }

  private providerInstance(provider: AIProviderDefinition): BaseProvider {
    const factory = this.createProviderOverride ?? PROVIDER_CLASSES[provider.provider_type];
    if (!factory) {
      throw new ServiceNotConfigured(`Provider type '${provider.provider_type}' is not supported`);
    }
    return factory(provider, this.registry.resolveApiKey(provider));
  }

  async chat(messages: ChatMessage[], options: RouterCallOptions = {}): Promise<AIResponse> {
    const { provider, model } = this.selectModel(options.providerType, options.modelId);
    const agent = options.agent ?? 'core.ai';
    const startedAt = this.now();

    const recordJob = (result: {
      input_tokens: number | null;
      output_tokens: number | null;
      error_message?: string;
    }) => {
      this.history.record({
        ts: new Date(startedAt).toISOString(),
        agent,
        user: options.user ?? null,
        client_ip: options.clientIp ?? null,
        provider: provider.provider_type,
        model: model.model_id,
        status: result.error_message === undefined ? 'Completed' : 'Error',
        input_tokens: result.input_tokens,
        output_tokens: result.output_tokens,
        duration_ms: this.now() - startedAt,
        costs: calculateCost(
          result.input_tokens,
          result.output_tokens,
          model.input_price_per_1m_tokens,
          model.output_price_per_1m_tokens,
        ),
        ...(result.error_message === undefined ? {} : { error_message: result.error_message }),
      });
    };

    try {
      const response = await this.providerInstance(provider).chat(messages, model.model_id, {
        temperature: options.temperature,
        maxTokens: options.maxTokens,
      });
      recordJob({ input_tokens: response.input_tokens, output_tokens: response.output_tokens });
      return { ...response, model: model.model_id, provider: provider.provider_type };
    } catch (err) {
      recordJob({ input_tokens: null, output_tokens: null, error_message: errorMessage(err) });
      throw err;
    }
  }

  /** Single-prompt shortcut for chat(). */
  async generate(prompt: string, options: RouterCallOptions = {}): Promise<AIResponse> {
    return this.chat([{ role: 'user', content: prompt }], options);
  }
}

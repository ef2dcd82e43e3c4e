import type { ChatMessage, ChatOptions, ProviderResponse, ProviderType } from './types.js';

export interface ProviderCredentials {
  apiKey: string;
  organizationId?: string;
}

/**
 * Common shape of every AI backend the router can dispatch to.
 */
export abstract class BaseProvider {
  constructor(protected readonly credentials: ProviderCredentials) {}

  abstract readonly providerType: ProviderType;

  abstract chat(messages: ChatMessage[], modelId: string, options?: ChatOptions): Promise<ProviderResponse>;
}

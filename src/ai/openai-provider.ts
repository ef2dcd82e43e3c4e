import OpenAI from 'openai';
import { BaseProvider, type ProviderCredentials } from './base-provider.js';
import type { ChatMessage, ChatOptions, ProviderResponse } from './types.js';

export class OpenAIProvider extends BaseProvider {
  readonly providerType = 'OpenAI' as const;
  private readonly client: OpenAI;

  constructor(credentials: ProviderCredentials) {
    super(credentials);
    this.client = new OpenAI({
      apiKey: credentials.apiKey,
      ...(credentials.organizationId ? { organization: credentials.organizationId } : {}),
    });
  }

  async chat(messages: ChatMessage[], modelId: string, options: ChatOptions = {}): Promise<ProviderResponse> {
    const response = await this.client.chat.completions.create({
      model: modelId,
      messages,
      ...(options.temperature !== undefined ? { temperature: options.temperature } : {}),
      ...(options.maxTokens !== undefined ? { max_tokens: options.maxTokens } : {}),
    });

    return {
      text: response.choices[0]?.message.content ?? '',
      raw: response,
      input_tokens: response.usage?.prompt_tokens ?? null,
      output_tokens: response.usage?.completion_tokens ?? null,
    };
  }
}

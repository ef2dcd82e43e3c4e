export const PROVIDER_TYPES = ['OpenAI', 'Gemini', 'Claude'] as const;
export type ProviderType = (typeof PROVIDER_TYPES)[number];

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface ChatOptions {
  temperature?: number;
  maxTokens?: number;
}

/** Internal response from a provider implementation. */
export interface ProviderResponse {
  text: string;
  raw: unknown;
  input_tokens: number | null;
  output_tokens: number | null;
}

/** Response handed back by the router, with the model that produced it. */
export interface AIResponse extends ProviderResponse {
  model: string;
  provider: ProviderType;
}

/** Who triggered an AI call, for the job history. */
export interface RequestContext {
  user?: string;
  clientIp?: string;
}

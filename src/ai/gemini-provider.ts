import { GoogleGenerativeAI, type Content } from '@google/generative-ai';
import { BaseProvider, type ProviderCredentials } from './base-provider.js';
import type { ChatMessage, ChatOptions, ProviderResponse } from './types.js';

/**
 * Split chat messages into Gemini's system instruction and content turns.
 * System messages are concatenated; assistant turns use the `model` role.
 */
export function toGeminiContents(messages: ChatMessage[]): { systemInstruction?: string; contents: Content[] } {
  let systemInstruction: string | undefined;
  const contents: Content[] = [];

  for (const msg of messages) {
    if (msg.role === 'system') {
      systemInstruction = systemInstruction === undefined ? msg.content : `${systemInstruction}\n\n${msg.content}`;
    } else {
      contents.push({ role: msg.role === 'assistant' ? 'model' : 'user', parts: [{ text: msg.content }] });
    }
  }

  return { systemInstruction, contents };
}

export class GeminiProvider extends BaseProvider {
  readonly providerType = 'Gemini' as const;
  private readonly client: GoogleGenerativeAI;

  constructor(credentials: ProviderCredentials) {
    super(credentials);
    this.client = new GoogleGenerativeAI(credentials.apiKey);
  }

  async chat(messages: ChatMessage[], modelId: string, options: ChatOptions = {}): Promise<ProviderResponse> {
    const { systemInstruction, contents } = toGeminiContents(messages);
    const model = this.client.getGenerativeModel({
      model: modelId,
      ...(systemInstruction ? { systemInstruction } : {}),
      generationConfig: {
        ...(options.temperature !== undefined ? { temperature: options.temperature } : {}),
        ...(options.maxTokens !== undefined ? { maxOutputTokens: options.maxTokens } : {}),
      },
    });

    const result = await model.generateContent({ contents });
    const usage = result.response.usageMetadata;

    return {
      text: result.response.text(),
      raw: result.response,
      input_tokens: usage?.promptTokenCount ?? null,
      output_tokens: usage?.candidatesTokenCount ?? null,
    };
  }
}

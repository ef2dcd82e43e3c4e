import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { vol } from 'memfs';
import { AIRouter, type ProviderFactory } from '../ai/router.js';
import { AIJobHistory } from '../ai/job-history.js';
import { ModelRegistry, loadModelRegistry } from '../ai/model-registry.js';
import { calculateCost } from '../ai/pricing.js';
import { toGeminiContents } from '../ai/gemini-provider.js';
import { BaseProvider } from '../ai/base-provider.js';
import { ServiceNotConfigured } from '../errors.js';
import type { ChatMessage, ChatOptions, ProviderResponse } from '../ai/types.js';

const REGISTRY_YAML = `
providers:
  - name: OpenAI
    provider_type: OpenAI
    api_key_env: TEST_AI_KEY
    models:
      - model_id: gpt-4o-mini
        is_default: true
        input_price_per_1m_tokens: 0.15
        output_price_per_1m_tokens: 0.6
      - model_id: gpt-4o
        input_price_per_1m_tokens: 5
        output_price_per_1m_tokens: 15
      - model_id: retired
        active: false
  - name: Gemini
    provider_type: Gemini
    api_key_env: TEST_AI_KEY
    models:
      - model_id: gemini-a
      - model_id: gemini-b
  - name: Claude
    provider_type: Claude
    api_key_env: TEST_AI_KEY
    active: false
    models:
      - model_id: claude-x
`;

const HISTORY_FILE = '/history-test/ai-jobs.jsonl';

class FakeProvider extends BaseProvider {
  readonly providerType = 'OpenAI' as const;
  readonly calls: Array<{ messages: ChatMessage[]; modelId: string; options?: ChatOptions }> = [];

  constructor(private readonly result: () => ProviderResponse) {
    super({ apiKey: 'test-secret' });
  }

  async chat(messages: ChatMessage[], modelId: string, options?: ChatOptions): Promise<ProviderResponse> {
    this.calls.push({ messages, modelId, options });
    return this.result();
  }
}

function steppingClock(start: number, step: number): () => number {
  let t = start;
  return () => {
    const value = t;
    t += step;
    return value;
  };
}

describe('AIRouter.selectModel', () => {
  const router = new AIRouter({ registry: ModelRegistry.fromYaml(REGISTRY_YAML) });

  it('prefers the OpenAI default when nothing is named', () => {
    expect(router.selectModel().model.model_id).toBe('gpt-4o-mini');
  });

  it('uses the first active model of a provider without a default', () => {
    const selection = router.selectModel('Gemini');
    expect(selection.provider.name).toBe('Gemini');
    expect(selection.model.model_id).toBe('gemini-a');
  });

  it('matches provider and model exactly', () => {
    expect(router.selectModel('OpenAI', 'gpt-4o').model.model_id).toBe('gpt-4o');
  });

  it('ignores inactive models and providers', () => {
    expect(() => router.selectModel('OpenAI', 'retired')).toThrow(
      "No active model found for provider 'OpenAI' with model_id 'retired'",
    );
    expect(() => router.selectModel('Claude')).toThrow("No active model found for provider 'Claude'");
  });

  it('falls back to any active model when no default exists', () => {
    const geminiOnly = new AIRouter({
      registry: ModelRegistry.fromYaml(
        'providers:\n  - name: Gemini\n    provider_type: Gemini\n    api_key_env: K\n    models:\n      - model_id: gemini-b\n',
      ),
    });
    expect(geminiOnly.selectModel().model.model_id).toBe('gemini-b');
  });

  it('fails when nothing is configured', () => {
    const empty = new AIRouter({ registry: new ModelRegistry([]) });
    expect(() => empty.selectModel()).toThrow(ServiceNotConfigured);
    expect(() => empty.selectModel()).toThrow('No active AI model configured');
  });
});

describe('AIRouter.chat', () => {
  let history: AIJobHistory;

  beforeEach(() => {
    process.env.TEST_AI_KEY = 'test-secret';
    if (vol.existsSync('/history-test')) vol.rmSync('/history-test', { recursive: true });
    history = new AIJobHistory(HISTORY_FILE);
  });

  afterEach(() => {
    delete process.env.TEST_AI_KEY;
  });

  it('dispatches to the selected model and records the job', async () => {
    const provider = new FakeProvider(() => ({ text: 'hi', raw: {}, input_tokens: 1000, output_tokens: 500 }));
    const keys: string[] = [];
    const createProvider: ProviderFactory = (_definition, apiKey) => {
      keys.push(apiKey);
      return provider;
    };
    const router = new AIRouter({
      registry: ModelRegistry.fromYaml(REGISTRY_YAML),
      history,
      createProvider,
      now: steppingClock(1_000, 250),
    });

    const response = await router.chat([{ role: 'user', content: 'hello' }], {
      providerType: 'OpenAI',
      modelId: 'gpt-4o',
      user: 'alice',
      clientIp: '10.0.0.1',
      temperature: 0.2,
    });

    expect(response).toEqual({
      text: 'hi',
      raw: {},
      input_tokens: 1000,
      output_tokens: 500,
      model: 'gpt-4o',
      provider: 'OpenAI',
    });
    expect(keys).toEqual(['test-secret']);
    expect(provider.calls).toEqual([
      {
        messages: [{ role: 'user', content: 'hello' }],
        modelId: 'gpt-4o',
        options: { temperature: 0.2, maxTokens: undefined },
      },
    ]);

    const [job] = history.read();
    expect(job).toMatchObject({
      ts: '1970-01-01T00:00:01.000Z',
      agent: 'core.ai',
      user: 'alice',
      client_ip: '10.0.0.1',
      provider: 'OpenAI',
      model: 'gpt-4o',
      status: 'Completed',
      input_tokens: 1000,
      output_tokens: 500,
      duration_ms: 250,
    });
    expect(job?.costs).toBeCloseTo(0.0125);
    expect(job?.error_message).toBeUndefined();
  });

  it('records failures and rethrows', async () => {
    const provider = new FakeProvider(() => {
      throw new Error('rate limited');
    });
    const router = new AIRouter({
      registry: ModelRegistry.fromYaml(REGISTRY_YAML),
      history,
      createProvider: () => provider,
      now: steppingClock(0, 10),
    });

    await expect(router.generate('hello', { agent: 'Summarizer' })).rejects.toThrow('rate limited');

    expect(history.read()).toEqual([
      {
        ts: '1970-01-01T00:00:00.000Z',
        agent: 'Summarizer',
        user: null,
        client_ip: null,
        provider: 'OpenAI',
        model: 'gpt-4o-mini',
        status: 'Error',
        input_tokens: null,
        output_tokens: null,
        duration_ms: 10,
        costs: null,
        error_message: 'rate limited',
      },
    ]);
  });

  it('wraps a single prompt as a user message', async () => {
    const provider = new FakeProvider(() => ({ text: 'ok', raw: null, input_tokens: null, output_tokens: null }));
    const router = new AIRouter({
      registry: ModelRegistry.fromYaml(REGISTRY_YAML),
      history,
      createProvider: () => provider,
    });

    const response = await router.generate('Summarise this', { providerType: 'Gemini' });

    expect(response.model).toBe('gemini-a');
    expect(provider.calls[0]?.messages).toEqual([{ role: 'user', content: 'Summarise this' }]);
    expect(history.read()[0]?.costs).toBeNull();
  });

  it('fails when the API key variable is unset', async () => {
    delete process.env.TEST_AI_KEY;
    const router = new AIRouter({ registry: ModelRegistry.fromYaml(REGISTRY_YAML), history });

    await expect(router.generate('hello')).rejects.toThrow(
      "API key for provider 'OpenAI' is not set (expected in TEST_AI_KEY)",
    );
  });

  it('rejects provider types without an implementation', async () => {
    const router = new AIRouter({
      registry: ModelRegistry.fromYaml(
        'providers:\n  - name: Claude\n    provider_type: Claude\n    api_key_env: TEST_AI_KEY\n    models:\n      - model_id: claude-x\n',
      ),
      history,
    });

    await expect(router.generate('hello', { providerType: 'Claude' })).rejects.toThrow(
      "Provider type 'Claude' is not supported",
    );
  });
});

describe('AIJobHistory.read', () => {
  it('returns newest first, filters by agent and skips malformed lines', () => {
    const file = '/history-read/ai-jobs.jsonl';
    const entry = (agent: string, ts: string) =>
      JSON.stringify({
        ts,
        agent,
        user: null,
        client_ip: null,
        provider: 'OpenAI',
        model: 'gpt-4o-mini',
        status: 'Completed',
        input_tokens: 1,
        output_tokens: 1,
        duration_ms: 1,
        costs: null,
      });
    vol.fromJSON({
      [file]: [entry('a', 't1'), 'not json', entry('b', 't2'), '{"agent":"partial"}', entry('a', 't3')].join('\n') + '\n',
    });
    const history = new AIJobHistory(file);

    expect(history.read().map(e => e.ts)).toEqual(['t3', 't2', 't1']);
    expect(history.read({ agent: 'a' }).map(e => e.ts)).toEqual(['t3', 't1']);
    expect(history.read({ limit: 1 }).map(e => e.ts)).toEqual(['t3']);
  });

  it('returns nothing before the first job', () => {
    expect(new AIJobHistory('/history-none/ai-jobs.jsonl').read()).toEqual([]);
  });
});

describe('ModelRegistry', () => {
  it('rejects unknown provider types', () => {
    expect(() =>
      ModelRegistry.fromYaml('providers:\n  - name: X\n    provider_type: Mistral\n    api_key_env: K\n'),
    ).toThrow(/^Invalid AI model configuration: providers\.0\.provider_type/);
  });

  it('treats a missing file as an empty registry', () => {
    expect(loadModelRegistry('/nowhere/ai-models.yml').activeModels()).toEqual([]);
  });

  it('lists active models across providers', () => {
    const registry = ModelRegistry.fromYaml(REGISTRY_YAML);
    expect(registry.activeModels().map(s => s.model.model_id)).toEqual(['gpt-4o-mini', 'gpt-4o', 'gemini-a', 'gemini-b']);
  });
});

describe('calculateCost', () => {
  it('prices input and output tokens per million', () => {
    expect(calculateCost(1000, 500, 5, 15)).toBeCloseTo(0.0125);
  });

  it('returns null when counts or prices are unknown', () => {
    expect(calculateCost(null, 500, 5, 15)).toBeNull();
    expect(calculateCost(1000, 500, undefined, 15)).toBeNull();
  });
});

describe('toGeminiContents', () => {
  it('merges system messages and maps assistant turns to the model role', () => {
    expect(
      toGeminiContents([
        { role: 'system', content: 'A' },
        { role: 'system', content: 'B' },
        { role: 'user', content: 'hi' },
        { role: 'assistant', content: 'hello' },
      ]),
    ).toEqual({
      systemInstruction: 'A\n\nB',
      contents: [
        { role: 'user', parts: [{ text: 'hi' }] },
        { role: 'model', parts: [{ text: 'hello' }] },
      ],
    });
  });
});

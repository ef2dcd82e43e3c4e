/**
 * In-process stand-ins for the search backend, the agent runner, the AI
 * router and the AgiraObject collection.
 */
import type { TextGenerator } from '../../agents/agent-service.js';
import type { RouterCallOptions } from '../../ai/router.js';
import type { AIResponse } from '../../ai/types.js';
import type { AgentRunner } from '../../rag/extended-service.js';
import type { HybridSearchBackend, HybridSearchRequest, SearchHit } from '../../rag/types.js';
import type { AgiraObjectCollection, CollectionOpener, ReturnedObject, StoredProperties } from '../../weaviate/collection.js';
import type { ScopeCondition } from '../../rag/search-scope.js';

export function hit(overrides: Partial<SearchHit> & { object_id: string | null }): SearchHit {
  return {
    object_type: 'item',
    title: null,
    content: '',
    link: null,
    source: 'agira',
    updated_at: null,
    score: null,
    ...overrides,
  };
}

/** Backend answering each search with the result of `respond`. */
export class FakeSearchBackend implements HybridSearchBackend {
  readonly requests: HybridSearchRequest[] = [];

  constructor(
    private readonly respond: (request: HybridSearchRequest) => SearchHit[] | Promise<SearchHit[]> = () => [],
    private readonly available = true,
  ) {}

  isAvailable(): boolean {
    return this.available;
  }

  async hybridSearch(request: HybridSearchRequest): Promise<SearchHit[]> {
    this.requests.push(request);
    return this.respond(request);
  }
}

export class FakeAgentRunner implements AgentRunner {
  readonly calls: Array<{ filename: string; inputText: string }> = [];

  constructor(private readonly respond: (inputText: string) => string | Promise<string>) {}

  async executeAgent(filename: string, inputText: string): Promise<string> {
    this.calls.push({ filename, inputText });
    return this.respond(inputText);
  }
}

/** Router returning `respond(prompt)` as the model text. */
export class FakeRouter implements TextGenerator {
  readonly calls: Array<{ prompt: string; options: RouterCallOptions | undefined }> = [];

  constructor(private readonly respond: (prompt: string) => string = () => 'Short summary') {}

  async generate(prompt: string, options?: RouterCallOptions): Promise<AIResponse> {
    this.calls.push({ prompt, options });
    return {
      text: this.respond(prompt),
      raw: null,
      input_tokens: 10,
      output_tokens: 5,
      model: options?.modelId ?? 'gpt-4o-mini',
      provider: options?.providerType ?? 'OpenAI',
    };
  }
}

/** AgiraObject collection kept in a Map keyed by UUID. */
export class InMemoryCollection implements AgiraObjectCollection {
  readonly objects = new Map<string, StoredProperties>();
  readonly queries: Array<{ query: string; conditions: ScopeCondition[] }> = [];
  failOn: string | null = null;
  searchResults: ReturnedObject[] = [];

  async exists(uuid: string): Promise<boolean> {
    return this.objects.has(uuid);
  }

  async insert(uuid: string, properties: StoredProperties): Promise<void> {
    if (this.failOn && properties.object_id === this.failOn) throw new Error('insert failed');
    this.objects.set(uuid, properties);
  }

  async replace(uuid: string, properties: StoredProperties): Promise<void> {
    this.objects.set(uuid, properties);
  }

  async deleteById(uuid: string): Promise<boolean> {
    return this.objects.delete(uuid);
  }

  async hybrid(query: string, options: { conditions: ScopeCondition[] }): Promise<ReturnedObject[]> {
    this.queries.push({ query, conditions: options.conditions });
    return this.searchResults;
  }

  async nearText(query: string, options: { conditions: ScopeCondition[] }): Promise<ReturnedObject[]> {
    this.queries.push({ query, conditions: options.conditions });
    return this.searchResults;
  }

  opener(): CollectionOpener & { closed: () => number } {
    let closed = 0;
    const open = async () => ({
      collection: this,
      close: async () => {
        closed++;
      },
    });
    return Object.assign(open, { closed: () => closed });
  }
}

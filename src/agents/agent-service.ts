import { existsSync, mkdirSync, readdirSync, readFileSync, unlinkSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import YAML from 'yaml';
import { getConfig } from '../config/env.js';
import { AgentConfigError, ServiceNotConfigured, errorMessage } from '../errors.js';
import { AIRouter } from '../ai/router.js';
import type { ProviderType, RequestContext } from '../ai/types.js';
import { logger, errorData } from '../utils/logger.js';
import { paths } from '../utils/paths.js';
import { AgentCacheService, createRedisStore } from './cache.js';
import { AgentDefinitionSchema, type Agent, type AgentDefinition } from './types.js';

const PROVIDER_TYPE_MAP: Record<string, ProviderType> = {
  openai: 'OpenAI',
  gemini: 'Gemini',
  claude: 'Claude',
};

/** The router surface the agent runner needs. */
export type TextGenerator = Pick<AIRouter, 'generate'>;

export interface ExecuteAgentOptions extends RequestContext {
  parameters?: Record<string, unknown>;
}

export interface AgentServiceDeps {
  agentsDir?: string;
  router?: TextGenerator;
  cache?: AgentCacheService;
}

/**
 * Build the prompt sent to the model for an agent run.
 */
export function buildAgentPrompt(
  agent: Pick<AgentDefinition, 'role' | 'task'>,
  inputText: string,
  parameters?: Record<string, unknown>,
): string {
  const parts: string[] = [];
  if (agent.role) parts.push(`Role: ${agent.role}`);
  if (agent.task) parts.push(`\nTask: ${agent.task}`);

  if (parameters && Object.keys(parameters).length > 0) {
    parts.push('\nParameters:');
    for (const [key, value] of Object.entries(parameters)) {
      parts.push(`- ${key}: ${formatParameter(value)}`);
    }
  }

  parts.push(`\nInput:\n${inputText}`);
  return parts.join('\n');
}

function formatParameter(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value === null || value === undefined) return String(value);
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

/**
 * Loads, stores and runs AI agents declared as YAML files.
 */
export class AgentService {
  private readonly agentsDirOverride?: string;
  private routerInstance?: TextGenerator;
  private cacheInstance?: AgentCacheService;

  constructor(deps: AgentServiceDeps = {}) {
    this.agentsDirOverride = deps.agentsDir;
    this.routerInstance = deps.router;
    this.cacheInstance = deps.cache;
  }

  get agentsDir(): string {
    return this.agentsDirOverride ?? paths.agentsDir;
  }

  private get router(): TextGenerator {
    if (!this.routerInstance) this.routerInstance = new AIRouter();
    return this.routerInstance;
  }

  private get cache(): AgentCacheService {
    if (!this.cacheInstance) {
      const { redisCache } = getConfig();
      this.cacheInstance = new AgentCacheService(redisCache.enabled, () => createRedisStore(redisCache));
    }
    return this.cacheInstance;
  }

  /** Release the response cache connection, if one was opened. */
  async close(): Promise<void> {
    await this.cacheInstance?.close();
  }

  private filePath(filename: string): string {
    if (filename.includes('/') || filename.includes('\\') || filename.startsWith('.')) {
      throw new AgentConfigError(`Invalid agent filename '${filename}'`, 'invalid');
    }
    return join(this.agentsDir, filename);
  }

  private loadAgentFile(path: string): AgentDefinition {
    const data: unknown = YAML.parse(readFileSync(path, 'utf-8'));
    const parsed = AgentDefinitionSchema.safeParse(data);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
      throw new Error(issues);
    }
    return parsed.data;
  }

  /**
   * All agents in the agents directory, sorted by name.
   * Files that fail to load are logged and skipped.
   */
  listAgents(): Agent[] {
    if (!existsSync(this.agentsDir)) return [];

    const agents: Agent[] = [];
    for (const filename of readdirSync(this.agentsDir).filter(f => f.endsWith('.yml'))) {
      try {
        agents.push({ ...this.loadAgentFile(join(this.agentsDir, filename)), filename });
      } catch (err) {
        logger.error('Error loading agent', { filename, ...errorData(err) });
      }
    }

    return agents.sort((a, b) => (a.name ?? '').localeCompare(b.name ?? ''));
  }

  getAgent(filename: string): Agent | null {
    const path = this.filePath(filename);
    if (!existsSync(path)) return null;

    try {
      return { ...this.loadAgentFile(path), filename };
    } catch (err) {
      throw new AgentConfigError(`Error loading agent ${filename}: ${errorMessage(err)}`, 'invalid', { cause: err });
    }
  }

  saveAgent(filename: string, data: Record<string, unknown>): void {
    const path = this.filePath(filename);
    const { filename: _omit, ...saveData } = data;

    try {
      mkdirSync(this.agentsDir, { recursive: true });
      writeFileSync(path, YAML.stringify(saveData), 'utf-8');
    } catch (err) {
      throw new AgentConfigError(`Error saving agent ${filename}: ${errorMessage(err)}`, 'io', { cause: err });
    }
    logger.info('Saved agent', { filename });
  }

  /** Returns false when no such agent file exists. */
  deleteAgent(filename: string): boolean {
    const path = this.filePath(filename);
    if (!existsSync(path)) return false;

    try {
      unlinkSync(path);
    } catch (err) {
      throw new AgentConfigError(`Error deleting agent ${filename}: ${errorMessage(err)}`, 'io', { cause: err });
    }
    return true;
  }

  /**
   * Run an agent on the given input and return the model's text.
   * Cached responses are returned without calling the model.
   */
  async executeAgent(filename: string, inputText: string, options: ExecuteAgentOptions = {}): Promise<string> {
    const agent = this.getAgent(filename);
    if (!agent) {
      throw new AgentConfigError(`Agent '${filename}' not found`, 'not_found');
    }

    const agentName = agent.name ?? filename;
    const cacheConfig = this.cache.parseCacheConfig(agent);

    const cached = await this.cache.getCachedResponse(agentName, inputText, cacheConfig);
    if (cached !== null) {
      logger.info('Returning cached agent response', { agent: agentName });
      return cached;
    }

    const prompt = buildAgentPrompt(agent, inputText, options.parameters);
    const providerType = PROVIDER_TYPE_MAP[agent.provider.toLowerCase()] ?? 'OpenAI';

    let text: string;
    try {
      const response = await this.router.generate(prompt, {
        modelId: agent.model,
        providerType,
        user: options.user,
        clientIp: options.clientIp,
        agent: agentName,
      });
      text = response.text;
    } catch (err) {
      throw new ServiceNotConfigured(`Error executing agent: ${errorMessage(err)}`, { cause: err });
    }

    await this.cache.cacheResponse(agentName, inputText, text, cacheConfig);
    return text;
  }
}

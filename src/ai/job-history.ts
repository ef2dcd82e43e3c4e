import { appendFileSync, existsSync, mkdirSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { z } from 'zod';
import { logger, errorData } from '../utils/logger.js';
import { paths } from '../utils/paths.js';
import { PROVIDER_TYPES } from './types.js';

const JobEntrySchema = z.object({
  ts: z.string(),
  agent: z.string(),
  user: z.string().nullable(),
  client_ip: z.string().nullable(),
  provider: z.enum(PROVIDER_TYPES),
  model: z.string(),
  status: z.enum(['Completed', 'Error']),
  input_tokens: z.number().nullable(),
  output_tokens: z.number().nullable(),
  duration_ms: z.number(),
  costs: z.number().nullable(),
  error_message: z.string().optional(),
});

export type AIJobEntry = z.infer<typeof JobEntrySchema>;

/**
 * Append-only history of AI calls (one JSON line per finished job).
 */
export class AIJobHistory {
  constructor(private readonly logPathOverride?: string) {}

  private get logPath(): string {
    return this.logPathOverride ?? join(paths.dataDir, '.internal', 'ai-jobs.jsonl');
  }

  record(entry: AIJobEntry): void {
    try {
      const dir = dirname(this.logPath);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
      appendFileSync(this.logPath, JSON.stringify(entry) + '\n', 'utf-8');
    } catch (err) {
      logger.warn('Failed to record AI job', { agent: entry.agent, ...errorData(err) });
    }
  }

  /**
   * Read recent jobs, newest first, optionally filtered by agent name.
   */
  read(options: { limit?: number; agent?: string } = {}): AIJobEntry[] {
    const { limit = 50, agent } = options;

    if (!existsSync(this.logPath)) return [];

    const lines = readFileSync(this.logPath, 'utf-8').trim().split('\n').filter(Boolean);

    let entries = lines
      .map(line => {
        try {
          const parsed = JobEntrySchema.safeParse(JSON.parse(line));
          return parsed.success ? parsed.data : null;
        } catch {
          return null;
        }
      })
      .filter((e): e is AIJobEntry => e !== null);

    if (agent) {
      entries = entries.filter(e => e.agent === agent);
    }

    return entries.reverse().slice(0, limit);
  }
}

export const aiJobHistory = new AIJobHistory();

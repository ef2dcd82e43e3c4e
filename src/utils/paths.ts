import { fileURLToPath } from 'node:url';
import { dirname, isAbsolute, join } from 'node:path';
import { readFileSync } from 'node:fs';
import { z } from 'zod';

const PackageMetadataSchema = z.object({
  name: z.string().default('agira-rag'),
  version: z.string().default('0.0.0'),
});

type PackageMetadata = z.infer<typeof PackageMetadataSchema>;

/**
 * Centralized path resolution for the entire application.
 * All file paths and directory references should go through this singleton.
 */
class PathResolver {
  private static instance: PathResolver;

  /** Root directory of the npm package (where package.json lives) */
  public readonly projectRoot: string;

  private packageMetadata: PackageMetadata | null = null;

  private constructor() {
    // src/utils/paths.ts and dist/utils/paths.js both sit two levels below the root
    const currentDir = dirname(fileURLToPath(import.meta.url));
    this.projectRoot = dirname(dirname(currentDir));
  }

  public static getInstance(): PathResolver {
    if (!PathResolver.instance) {
      PathResolver.instance = new PathResolver();
    }
    return PathResolver.instance;
  }

  /**
   * Parsed package.json metadata, read once on first access.
   */
  public get packageJson(): PackageMetadata {
    if (!this.packageMetadata) {
      const raw: unknown = JSON.parse(readFileSync(this.fromRoot('package.json'), 'utf-8'));
      this.packageMetadata = PackageMetadataSchema.parse(raw);
    }
    return this.packageMetadata;
  }

  /**
   * Get the application version from package.json
   */
  public getVersion(): string {
    return this.packageJson.version;
  }

  /**
   * Data directory for logs and the AI job history.
   * AGIRA_DATA_DIR, relative paths resolved against the project root.
   */
  public get dataDir(): string {
    return this.resolveFromRoot(process.env.AGIRA_DATA_DIR ?? 'data');
  }

  /** Directory holding the agent YAML definitions. */
  public get agentsDir(): string {
    return this.resolveFromRoot(process.env.AGIRA_AGENTS_DIR ?? 'agents');
  }

  /** YAML file declaring AI providers and models. */
  public get aiModelsFile(): string {
    return this.resolveFromRoot(process.env.AGIRA_AI_MODELS_FILE ?? join('config', 'ai-models.yml'));
  }

  /**
   * Resolve a path relative to project root
   * @example paths.fromRoot('agents') → '/path/to/package/agents'
   */
  public fromRoot(...segments: string[]): string {
    return join(this.projectRoot, ...segments);
  }

  private resolveFromRoot(path: string): string {
    return isAbsolute(path) ? path : this.fromRoot(path);
  }
}

// Export singleton instance
export const paths = PathResolver.getInstance();

import { access, readFile, writeFile } from 'fs/promises';
import { z } from 'zod';
import { BlogError, isErrnoCode } from './errors.js';
import { formatPostId } from './slug.js';
import type { BlogConfig, StoredConfig } from './types.js';

const storedConfigSchema = z.object({
  next_id: z.number().int().positive(),
  github_user: z.string().optional(),
  default_public: z.boolean(),
  blog_path: z.string().optional(),
  repo_name: z.string().optional(),
});

export const INITIAL_CONFIG: BlogConfig = {
  nextId: 1,
  defaultPublic: true,
};

/**
 * ConfigStore persists the blog-wide config document (`.toolstate/config.json`).
 *
 * The only value that changes after `init` is `nextId`, and it changes exclusively through
 * `allocateId`. There is no locking: two concurrent `new` runs can hand out the same id.
 */
export class ConfigStore {
  constructor(private configFile: string) {}

  async isInitialized(): Promise<boolean> {
    try {
      await access(this.configFile);
      return true;
    } catch {
      return false;
    }
  }

  async load(): Promise<BlogConfig> {
    let raw: string;
    try {
      raw = await readFile(this.configFile, 'utf-8');
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT')) {
        throw new BlogError('NOT_INITIALIZED', 'gistblog not initialized', {
          hint: "Run 'gistblog init' first",
        });
      }
      throw new BlogError('IO_ERROR', `Failed to read config: ${this.configFile}`, { cause: error });
    }

    const stored = parseDocument(raw, storedConfigSchema, this.configFile);
    return {
      nextId: stored.next_id,
      defaultPublic: stored.default_public,
      githubUser: stored.github_user,
      blogPath: stored.blog_path,
      repoName: stored.repo_name,
    };
  }

  async save(config: BlogConfig): Promise<void> {
    // Built field by field so the key order on disk never depends on the caller.
    const ordered: StoredConfig = {
      next_id: config.nextId,
      ...(config.githubUser !== undefined && { github_user: config.githubUser }),
      default_public: config.defaultPublic,
      ...(config.blogPath !== undefined && { blog_path: config.blogPath }),
      ...(config.repoName !== undefined && { repo_name: config.repoName }),
    };

    try {
      await writeFile(this.configFile, JSON.stringify(ordered, null, 2) + '\n', 'utf-8');
    } catch (error) {
      throw new BlogError('IO_ERROR', `Failed to write config: ${this.configFile}`, { cause: error });
    }
  }

  /**
   * Read-modify-write of the post counter as one step.
   *
   * `create` receives the formatted id (`0001`, ...). The counter is written back only after
   * `create` resolves, so a failed creation does not burn an id.
   */
  async allocateId<T>(create: (id: string, config: BlogConfig) => Promise<T>): Promise<T> {
    const config = await this.load();
    const result = await create(formatPostId(config.nextId), config);
    await this.save({ ...config, nextId: config.nextId + 1 });
    return result;
  }
}

/**
 * Parse and validate a JSON document. Both malformed JSON and a schema mismatch are
 * reported as INVALID_FORMAT naming the file.
 */
export const parseDocument = <T>(raw: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, file: string): T => {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (error) {
    throw new BlogError('INVALID_FORMAT', `Malformed JSON in ${file}`, { cause: error });
  }

  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const detail = issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'invalid document';
    throw new BlogError('INVALID_FORMAT', `Invalid ${file} (${detail})`, { cause: parsed.error });
  }
  return parsed.data;
};

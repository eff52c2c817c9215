import { basename, dirname, join } from 'path';
import { mkdir, readdir, readFile, writeFile } from 'fs/promises';
import { z } from 'zod';
import { META_FILE_NAME } from './config.js';
import { parseDocument } from './configStore.js';
import { BlogError, describeError, isBlogError, isErrnoCode } from './errors.js';
import { postDirName, slugify } from './slug.js';
import type {
  NewPostInput,
  PostListing,
  PostMeta,
  PostRecord,
  PostStatus,
  SkippedPost,
  StoredPostMeta,
} from './types.js';

const storedPostMetaSchema = z
  .object({
    id: z.string().min(1),
    title: z.string(),
    description: z.string(),
    public: z.boolean(),
    created_at: z.string().datetime({ offset: true }),
    gist_id: z.string().optional(),
    gist_url: z.string().optional(),
  })
  .refine((meta) => (meta.gist_id === undefined) === (meta.gist_url === undefined), {
    message: 'gist_id and gist_url must be set together',
  });

const toStored = (meta: PostMeta): StoredPostMeta => ({
  id: meta.id,
  title: meta.title,
  description: meta.description,
  public: meta.public,
  created_at: meta.createdAt,
  ...(meta.remote && { gist_id: meta.remote.id, gist_url: meta.remote.url }),
});

const fromStored = (stored: StoredPostMeta): PostMeta => ({
  id: stored.id,
  title: stored.title,
  description: stored.description,
  public: stored.public,
  createdAt: stored.created_at,
  ...(stored.gist_id !== undefined &&
    stored.gist_url !== undefined && { remote: { id: stored.gist_id, url: stored.gist_url } }),
});

const pad = (n: number): string => String(n).padStart(2, '0');

/**
 * ISO-8601 timestamp in the given UTC offset (local time by default), e.g.
 * `2024-03-05T23:30:00.000-08:00`. A zero offset is written as `Z`.
 */
export const formatTimestamp = (date: Date, offsetMinutes: number = -date.getTimezoneOffset()): string => {
  const local = new Date(date.getTime() + offsetMinutes * 60_000).toISOString().slice(0, 23);
  if (offsetMinutes === 0) return `${local}Z`;

  const sign = offsetMinutes > 0 ? '+' : '-';
  const minutes = Math.abs(offsetMinutes);
  return `${local}${sign}${pad(Math.floor(minutes / 60))}:${pad(minutes % 60)}`;
};

export const postStatus = (meta: PostMeta): PostStatus => (meta.remote ? 'published' : 'draft');

/** Starter markdown written next to the metadata of a fresh post. */
export const starterMarkdown = (title: string, description: string): string => {
  let content = `# ${title}\n\n`;
  if (description) {
    content += `*${description}*\n\n`;
  }
  return content + 'Write your post content here...\n';
};

/**
 * PostStore persists post metadata, one `.meta.json` per post directory under `posts/`.
 *
 * The directory name (`<id>-<slug>`) is what identifies a post on lookup; the metadata
 * file is never consulted to find a post, only to describe it.
 */
export class PostStore {
  constructor(private postsDir: string) {}

  private getMetaPath(postDir: string): string {
    return join(postDir, META_FILE_NAME);
  }

  /** Create a new post directory and its metadata. Never reuses an existing directory. */
  async create(postDir: string, meta: PostMeta): Promise<void> {
    try {
      await mkdir(dirname(postDir), { recursive: true });
      await mkdir(postDir);
    } catch (error) {
      if (isErrnoCode(error, 'EEXIST')) {
        throw new BlogError('IO_ERROR', `Post directory already exists: ${postDir}`);
      }
      throw new BlogError('IO_ERROR', `Failed to create post directory: ${postDir}`, { cause: error });
    }
    await this.writeMeta(postDir, meta, 'wx');
  }

  async load(postDir: string): Promise<PostMeta> {
    const metaPath = this.getMetaPath(postDir);
    let raw: string;
    try {
      raw = await readFile(metaPath, 'utf-8');
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT')) {
        throw new BlogError('NOT_FOUND', `Post metadata not found: ${metaPath}`);
      }
      throw new BlogError('IO_ERROR', `Failed to read post metadata: ${metaPath}`, { cause: error });
    }

    return fromStored(parseDocument(raw, storedPostMetaSchema, metaPath));
  }

  /** Full overwrite of the metadata document. */
  async update(postDir: string, meta: PostMeta): Promise<void> {
    await this.writeMeta(postDir, meta, 'w');
  }

  private async writeMeta(postDir: string, meta: PostMeta, flag: 'w' | 'wx'): Promise<void> {
    const metaPath = this.getMetaPath(postDir);
    try {
      await writeFile(metaPath, JSON.stringify(toStored(meta), null, 2) + '\n', { encoding: 'utf-8', flag });
    } catch (error) {
      throw new BlogError('IO_ERROR', `Failed to write post metadata: ${metaPath}`, { cause: error });
    }
  }

  /**
   * Create the directory, metadata and starter markdown for a new post.
   *
   * The post id must already be allocated (see `ConfigStore.allocateId`).
   */
  async createPost(
    id: string,
    input: NewPostInput,
    createdAt: string = formatTimestamp(new Date())
  ): Promise<PostRecord> {
    const dirName = postDirName(id, input.title);
    const postDir = join(this.postsDir, dirName);
    const meta: PostMeta = {
      id,
      title: input.title,
      description: input.description,
      public: input.public,
      createdAt,
    };

    await this.create(postDir, meta);

    const markdownPath = join(postDir, `${slugify(input.title)}.md`);
    try {
      await writeFile(markdownPath, starterMarkdown(input.title, input.description), { encoding: 'utf-8', flag: 'wx' });
    } catch (error) {
      throw new BlogError('IO_ERROR', `Failed to create markdown file: ${markdownPath}`, { cause: error });
    }

    return { dirName, path: postDir, meta };
  }

  /**
   * Resolve a post id to its directory by name prefix.
   *
   * Matches `<id>-` (separator included, so `0001` never matches `00011-bar`). Names are
   * sorted first; with duplicate prefixes the lexicographically first directory wins.
   */
  async findByPrefix(id: string): Promise<string> {
    const dirNames = await this.listPostDirNames();
    const match = dirNames.find((name) => name.startsWith(`${id}-`));
    if (!match) {
      throw new BlogError('NOT_FOUND', `Post with ID ${id} not found`, {
        hint: "Run 'gistblog list' to see available posts",
      });
    }
    return join(this.postsDir, match);
  }

  /** Resolve and load in one go. */
  async get(id: string): Promise<PostRecord> {
    const path = await this.findByPrefix(id);
    const meta = await this.load(path);
    return { dirName: basename(path), path, meta };
  }

  /**
   * Load every post. Directories whose metadata is missing or malformed are returned
   * as `skipped` so callers can warn and carry on.
   */
  async list(): Promise<PostListing> {
    let dirNames: string[];
    try {
      dirNames = await this.listPostDirNames();
    } catch (error) {
      // No posts directory yet: an empty blog.
      if (isBlogError(error, 'NOT_FOUND')) {
        return { posts: [], skipped: [] };
      }
      throw error;
    }

    const posts: PostRecord[] = [];
    const skipped: SkippedPost[] = [];

    for (const dirName of dirNames) {
      const path = join(this.postsDir, dirName);
      try {
        posts.push({ dirName, path, meta: await this.load(path) });
      } catch (error) {
        skipped.push({ dirName, reason: describeError(error) });
      }
    }

    return { posts, skipped };
  }

  private async listPostDirNames(): Promise<string[]> {
    try {
      const entries = await readdir(this.postsDir, { withFileTypes: true });
      return entries
        .filter((entry) => entry.isDirectory())
        .map((entry) => entry.name)
        .sort();
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT')) {
        throw new BlogError('NOT_FOUND', `Posts directory not found: ${this.postsDir}`);
      }
      throw new BlogError('IO_ERROR', `Failed to read posts directory: ${this.postsDir}`, { cause: error });
    }
  }
}

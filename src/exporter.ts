import { join, relative, sep } from 'path';
import { readdir, readFile, writeFile } from 'fs/promises';
import JSZip from 'jszip';
import { BlogError } from './errors.js';
import { PostStore } from './postStore.js';
import type { ExportSummary, PostRecord, SkippedPost } from './types.js';
import { countPosts, recordedDate } from './uiUtils.js';

export const EXPORT_METADATA_FILE = 'export-metadata.json';

export interface ExportMetadata {
  exported_at: string;
  total_posts: number;
  posts: Array<{
    id: string;
    title: string;
    public: boolean;
    created_at: string;
    gist_url?: string;
  }>;
}

export interface ExportResult {
  summary: ExportSummary;
  /** Posts left out because their metadata could not be read. */
  skipped: SkippedPost[];
  /** Archive entry names, in the order they were added. */
  entries: string[];
}

/**
 * Archive prefix for a post: `YYYY/MM/DD/<dir>`, using the calendar date recorded in
 * `created_at` (not re-projected into the local time zone).
 */
export const archivePrefix = (post: PostRecord): string =>
  `${recordedDate(post.meta.createdAt).replace(/-/g, '/')}/${post.dirName}`;

/**
 * Recursively list files under `rootDir`, hidden files included.
 */
export const listFilesRecursive = async (rootDir: string): Promise<string[]> => {
  const entries = await readdir(rootDir, { withFileTypes: true });
  const files: string[] = [];

  for (const entry of entries.sort((a, b) => a.name.localeCompare(b.name))) {
    const entryPath = join(rootDir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await listFilesRecursive(entryPath)));
    } else if (entry.isFile()) {
      // Only plain files (skip symlinks, sockets and the like).
      files.push(entryPath);
    }
  }

  return files;
};

/**
 * Exporter writes every post (public and private) into a single zip archive, organized by
 * creation date, plus a JSON summary of all posts.
 */
export class Exporter {
  constructor(
    private postStore: PostStore,
    private now: () => Date = () => new Date()
  ) {}

  async exportTo(outputFile: string): Promise<ExportResult> {
    const { posts, skipped } = await this.postStore.list();
    if (posts.length === 0) {
      throw new BlogError('NOT_FOUND', 'No posts found to export');
    }

    const ordered = [...posts].sort(
      (a, b) => Date.parse(a.meta.createdAt) - Date.parse(b.meta.createdAt)
    );

    const zip = new JSZip();
    const entries: string[] = [];

    for (const post of ordered) {
      const prefix = archivePrefix(post);
      let files: string[];
      try {
        files = await listFilesRecursive(post.path);
      } catch (error) {
        throw new BlogError('IO_ERROR', `Failed to add post ${post.meta.id} to archive`, { cause: error });
      }

      for (const file of files) {
        // Zip entry names always use forward slashes.
        const name = `${prefix}/${relative(post.path, file).split(sep).join('/')}`;
        zip.file(name, await readFile(file));
        entries.push(name);
      }
    }

    zip.file(EXPORT_METADATA_FILE, JSON.stringify(this.buildMetadata(ordered), null, 2) + '\n');
    entries.push(EXPORT_METADATA_FILE);

    const archive = await zip.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE' });
    try {
      await writeFile(outputFile, archive);
    } catch (error) {
      throw new BlogError('IO_ERROR', `Failed to write archive: ${outputFile}`, { cause: error });
    }

    const counts = countPosts(ordered);
    return {
      summary: { outputFile, ...counts },
      skipped,
      entries,
    };
  }

  private buildMetadata(posts: PostRecord[]): ExportMetadata {
    return {
      exported_at: this.now().toISOString(),
      total_posts: posts.length,
      posts: posts.map(({ meta }) => ({
        id: meta.id,
        title: meta.title,
        public: meta.public,
        created_at: meta.createdAt,
        ...(meta.remote && { gist_url: meta.remote.url }),
      })),
    };
  }
}

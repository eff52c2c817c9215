import { join } from 'path';
import type { Dirent } from 'fs';
import { readdir } from 'fs/promises';
import { BlogError, isErrnoCode } from './errors.js';
import { PostStore } from './postStore.js';
import type { CommandResult, CommandRunner, PostMeta, PublishOutcome, RemoteRef } from './types.js';

/**
 * GistPublisher is the boundary to GitHub: it drives the `gh` CLI to create or update the
 * gist behind a post and records the result in the post's metadata.
 *
 * Per post the lifecycle is Draft (no remote) -> Published (remote set) -> Published again
 * on every `--update`. There is no way back to Draft.
 */
export class GistPublisher {
  constructor(
    private runner: CommandRunner,
    private postStore: PostStore,
    private gh: string = 'gh'
  ) {}

  async publish(postDir: string, meta: PostMeta, forceUpdate = false): Promise<PublishOutcome> {
    // Guard against publishing the same post twice by accident.
    if (meta.remote && !forceUpdate) {
      return { status: 'already-published', meta, remote: meta.remote };
    }

    await this.ensureAuthenticated();
    const files = await this.collectFiles(postDir);

    let remote: RemoteRef;
    let status: 'created' | 'updated';
    if (meta.remote) {
      await this.updateGist(meta.remote.id, files);
      remote = meta.remote;
      status = 'updated';
    } else {
      remote = await this.createGist(meta, files);
      status = 'created';
    }

    const updated: PostMeta = { ...meta, remote };
    try {
      await this.postStore.update(postDir, updated);
    } catch (error) {
      throw new BlogError(
        'PUBLISHED_NOT_RECORDED',
        `Gist ${remote.url} was published but the post metadata could not be saved`,
        { hint: `Add "gist_id": "${remote.id}" and "gist_url": "${remote.url}" to the post's .meta.json`, cause: error }
      );
    }

    return { status, meta: updated, remote, files };
  }

  async isAuthenticated(): Promise<boolean> {
    try {
      const result = await this.runner.run(this.gh, ['auth', 'status']);
      return result.exitCode === 0;
    } catch {
      // `gh` not installed at all.
      return false;
    }
  }

  /**
   * Every regular, non-hidden file directly inside the post directory, sorted by name.
   * Subdirectories and dot-files (including `.meta.json`) are left out.
   */
  async collectFiles(postDir: string): Promise<string[]> {
    let entries: Dirent[];
    try {
      entries = await readdir(postDir, { withFileTypes: true });
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT')) {
        throw new BlogError('NOT_FOUND', `Post directory not found: ${postDir}`);
      }
      throw new BlogError('IO_ERROR', `Failed to read post directory: ${postDir}`, { cause: error });
    }

    const files = entries
      .filter((entry) => entry.isFile() && !entry.name.startsWith('.'))
      .map((entry) => join(postDir, entry.name))
      .sort();

    if (files.length === 0) {
      throw new BlogError('NO_FILES_TO_PUBLISH', `No files found to publish in ${postDir}`);
    }
    return files;
  }

  private async ensureAuthenticated(): Promise<void> {
    if (!(await this.isAuthenticated())) {
      throw new BlogError('AUTH_REQUIRED', 'GitHub CLI not authenticated', {
        hint: "Run 'gh auth login' first",
      });
    }
  }

  private async createGist(meta: PostMeta, files: string[]): Promise<RemoteRef> {
    const args = ['gist', 'create'];
    if (meta.public) {
      args.push('--public');
    }
    if (meta.description) {
      args.push('--desc', meta.description);
    }
    args.push(...files);

    const result = await this.runGh(args, 'create gist');
    return parseGistUrl(result);
  }

  private async updateGist(gistId: string, files: string[]): Promise<void> {
    await this.runGh(['gist', 'edit', gistId, ...files], 'update gist');
  }

  private async runGh(args: string[], action: string): Promise<string> {
    let result: CommandResult;
    try {
      result = await this.runner.run(this.gh, args);
    } catch (error) {
      throw new BlogError('REMOTE_ERROR', `Failed to ${action}: could not run ${this.gh}`, { cause: error });
    }

    if (result.exitCode !== 0) {
      const detail = result.stderr.trim() || `exit code ${result.exitCode}`;
      throw new BlogError('REMOTE_ERROR', `Failed to ${action}: ${detail}`);
    }
    return result.stdout;
  }
}

/**
 * `gh gist create` prints the gist URL as its only stdout line; the gist id is the last
 * path segment of that URL.
 */
export const parseGistUrl = (stdout: string): RemoteRef => {
  const url = stdout.trim();
  if (!url) {
    throw new BlogError('INVALID_REMOTE_RESPONSE', 'gh returned no gist URL');
  }

  const id = url.replace(/\/+$/, '').split('/').pop();
  if (!id) {
    throw new BlogError('INVALID_REMOTE_RESPONSE', `Invalid gist URL returned: ${url}`);
  }
  return { id, url };
};

/**
 * Central type definitions for the app.
 *
 * Two families of shapes live here:
 * 1) On-disk documents (`Stored*`), which keep the snake_case field names of the JSON files.
 * 2) Runtime records, which the stores, publisher and commands pass around.
 */

/** On-disk representation of `.toolstate/config.json`. */
export interface StoredConfig {
  next_id: number;
  github_user?: string;
  default_public: boolean;
  blog_path?: string;
  repo_name?: string;
}

export interface BlogConfig {
  /** Next sequential post number; rendered as a 4-digit id. */
  nextId: number;
  /** Pre-selected visibility for new posts. */
  defaultPublic: boolean;
  githubUser?: string;
  blogPath?: string;
  repoName?: string;
}

/** On-disk representation of `posts/<dir>/.meta.json`. */
export interface StoredPostMeta {
  id: string;
  title: string;
  description: string;
  public: boolean;
  created_at: string;
  gist_id?: string;
  gist_url?: string;
}

/**
 * Runtime representation of a post's metadata.
 *
 * `remote` is either absent (draft) or carries both the gist id and URL.
 */
export interface PostMeta {
  id: string;
  title: string;
  description: string;
  public: boolean;
  /** Kept as the recorded ISO-8601 string so the recorded offset survives a rewrite. */
  createdAt: string;
  remote?: RemoteRef;
}

export interface RemoteRef {
  id: string;
  url: string;
}

export type PostStatus = 'draft' | 'published';

/** A post as found on disk: its metadata plus where it lives. */
export interface PostRecord {
  /** Directory name under `posts/`, e.g. `0001-hello-world`. */
  dirName: string;
  /** Absolute path of the post directory. */
  path: string;
  meta: PostMeta;
}

/** A post directory whose metadata could not be loaded while listing. */
export interface SkippedPost {
  dirName: string;
  reason: string;
}

export interface PostListing {
  posts: PostRecord[];
  skipped: SkippedPost[];
}

export interface BlogPaths {
  /** Blog repository root. */
  root: string;
  /** `.toolstate/` directory. */
  stateDir: string;
  /** `.toolstate/config.json`. */
  configFile: string;
  /** `posts/` directory. */
  postsDir: string;
  /** `.gitignore` at the blog root. */
  gitignoreFile: string;
}

export interface NewPostInput {
  title: string;
  description: string;
  public: boolean;
}

export type PublishOutcome =
  | { status: 'already-published'; meta: PostMeta; remote: RemoteRef }
  | { status: 'created'; meta: PostMeta; remote: RemoteRef; files: string[] }
  | { status: 'updated'; meta: PostMeta; remote: RemoteRef; files: string[] };

export interface ExportSummary {
  outputFile: string;
  total: number;
  published: number;
  drafts: number;
  private: number;
}

/** Result of running an external executable to completion. */
export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  cwd?: string;
}

/**
 * Seam over process spawning. The production implementation spawns real executables;
 * tests pass an in-process fake.
 */
export interface CommandRunner {
  run(command: string, args: string[], options?: RunOptions): Promise<CommandResult>;
}

/** Opens a path or URL with the platform's default handler. Resolves false on failure. */
export type PathOpener = (target: string) => Promise<boolean>;

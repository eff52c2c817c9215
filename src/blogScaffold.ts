import { join } from 'path';
import { appendFile, mkdir, writeFile } from 'fs/promises';
import { getBlogPaths, ensureBlogDirs } from './config.js';
import { ConfigStore, INITIAL_CONFIG } from './configStore.js';
import { BlogError, describeError } from './errors.js';
import type { CommandRunner } from './types.js';

export const INITIAL_COMMIT_MESSAGE = 'Initial commit: Initialize gistblog';
export const REPO_DESCRIPTION = 'A gist-powered blog created with gistblog';

export const blogReadme = (blogName: string): string => `# ${blogName}

A gist-powered blog managed with gistblog.

## Posts

This repository contains my blog posts, each published as a GitHub Gist.

Posts are organized with descriptive filenames (e.g., \`getting-started-with-node.md\`) rather than generic names.

## Usage

- Create new post: \`gistblog new\`
- List posts: \`gistblog list\`
- Edit post: \`gistblog edit <id>\`
- Publish post: \`gistblog publish <id>\`
- Update existing gist: \`gistblog publish <id> --update\`
- Export all: \`gistblog export\`

## Posts Directory

All posts are organized in the \`posts/\` directory with the format \`XXXX-post-title/\`.
Each post contains a descriptively named markdown file and any auxiliary files.

## Workflow

1. \`gistblog new\` - Create post with interactive prompts
2. \`gistblog edit <id>\` - Open directory to write content
3. \`git add . && git commit\` - Version control your changes
4. \`gistblog publish <id>\` - Publish to GitHub Gists
5. \`gistblog publish <id> --update\` - Update gist after changes
`;

export const BLOG_GITIGNORE = `# gistblog private posts will be added here automatically

# OS generated files
.DS_Store
.DS_Store?
._*
.Spotlight-V100
.Trashes
ehthumbs.db
Thumbs.db

# Export files
*.zip
`;

export interface ScaffoldOptions {
  name: string;
  /** Directory the blog is created in (created when missing). */
  location: string;
  createRepo: boolean;
}

export interface ScaffoldResult {
  root: string;
  /** GitHub repository created, remote `origin` set and pushed. */
  repoCreated: boolean;
  /** Best-effort steps that failed without aborting the scaffold. */
  warnings: string[];
}

/**
 * BlogScaffold creates a new blog repository: directory layout, config, README and
 * .gitignore, a git repository with an initial commit, and optionally a GitHub repository
 * (created, set as `origin` and pushed in one `gh repo create` call).
 *
 * Failures up to and including the initial commit abort; the GitHub steps only warn.
 */
export class BlogScaffold {
  constructor(
    private runner: CommandRunner,
    private binaries: { git: string; gh: string } = { git: 'git', gh: 'gh' }
  ) {}

  async create(options: ScaffoldOptions): Promise<ScaffoldResult> {
    const paths = getBlogPaths(options.location);
    const warnings: string[] = [];

    try {
      await mkdir(paths.root, { recursive: true });
    } catch (error) {
      throw new BlogError('IO_ERROR', `Failed to create blog directory: ${paths.root}`, { cause: error });
    }

    const configStore = new ConfigStore(paths.configFile);
    if (await configStore.isInitialized()) {
      throw new BlogError('IO_ERROR', `A blog already exists at ${paths.root}`);
    }

    await this.git(paths.root, ['init'], 'initialize git repository');

    await ensureBlogDirs(paths);
    await configStore.save({ ...INITIAL_CONFIG, blogPath: '.', repoName: options.name });
    await this.writeText(join(paths.root, 'README.md'), blogReadme(options.name));
    await this.writeText(paths.gitignoreFile, BLOG_GITIGNORE);
    // git does not track empty directories.
    await this.writeText(join(paths.postsDir, '.gitkeep'), '');

    await this.git(paths.root, ['add', '.'], 'add files to git');
    await this.git(paths.root, ['commit', '-m', INITIAL_COMMIT_MESSAGE], 'create initial commit');

    const repoCreated = options.createRepo
      ? await this.createGitHubRepo(paths.root, options.name, warnings)
      : false;

    return { root: paths.root, repoCreated, warnings };
  }

  private async createGitHubRepo(root: string, name: string, warnings: string[]): Promise<boolean> {
    try {
      const auth = await this.runner.run(this.binaries.gh, ['auth', 'status'], { cwd: root });
      if (auth.exitCode !== 0) {
        warnings.push("GitHub CLI not authenticated. Run 'gh auth login', then 'gh repo create'");
        return false;
      }

      const result = await this.runner.run(
        this.binaries.gh,
        ['repo', 'create', name, '--public', '--description', REPO_DESCRIPTION, '--source=.', '--remote=origin', '--push'],
        { cwd: root }
      );
      if (result.exitCode !== 0) {
        warnings.push(`Could not create GitHub repository: ${result.stderr.trim() || `exit code ${result.exitCode}`}`);
        return false;
      }
      return true;
    } catch (error) {
      warnings.push(`Could not run ${this.binaries.gh}: ${describeError(error)}`);
      return false;
    }
  }

  private async git(root: string, args: string[], action: string): Promise<void> {
    let exitCode: number;
    let stderr: string;
    try {
      ({ exitCode, stderr } = await this.runner.run(this.binaries.git, args, { cwd: root }));
    } catch (error) {
      throw new BlogError('IO_ERROR', `Failed to ${action}: could not run ${this.binaries.git}`, { cause: error });
    }
    if (exitCode !== 0) {
      throw new BlogError('IO_ERROR', `Failed to ${action}: ${stderr.trim() || `exit code ${exitCode}`}`);
    }
  }

  private async writeText(file: string, content: string): Promise<void> {
    try {
      await writeFile(file, content, 'utf-8');
    } catch (error) {
      throw new BlogError('IO_ERROR', `Failed to write ${file}`, { cause: error });
    }
  }
}

/**
 * Add `posts/<dir>/` to the blog's .gitignore so a private post never gets committed.
 */
export const ignorePrivatePost = async (gitignoreFile: string, dirName: string): Promise<void> => {
  await appendFile(gitignoreFile, `posts/${dirName}/\n`, 'utf-8');
};

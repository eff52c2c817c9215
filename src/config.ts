import { join, resolve } from 'path';
import { mkdir } from 'fs/promises';
import type { BlogPaths } from './types.js';
import { BlogError } from './errors.js';

export const STATE_DIR_NAME = '.toolstate';
export const POSTS_DIR_NAME = 'posts';
export const META_FILE_NAME = '.meta.json';
export const DEFAULT_EXPORT_FILE = 'gistblog-export.zip';

/**
 * Compute every on-disk location of a blog from its root directory.
 *
 * A blog repository looks like:
 *   <root>/.toolstate/config.json
 *   <root>/posts/<NNNN>-<slug>/.meta.json
 *   <root>/.gitignore
 *
 * There is no global config file; the root is the current directory unless `--cwd` says otherwise.
 */
export const getBlogPaths = (root: string = process.cwd()): BlogPaths => {
  const absoluteRoot = resolve(root);
  const stateDir = join(absoluteRoot, STATE_DIR_NAME);

  return {
    root: absoluteRoot,
    stateDir,
    configFile: join(stateDir, 'config.json'),
    postsDir: join(absoluteRoot, POSTS_DIR_NAME),
    gitignoreFile: join(absoluteRoot, '.gitignore'),
  };
};

/** Executables the tool shells out to. Overridable for non-standard installs. */
export interface ToolBinaries {
  gh: string;
  git: string;
}

export const getToolBinaries = (env: NodeJS.ProcessEnv = process.env): ToolBinaries => ({
  gh: env.GISTBLOG_GH || 'gh',
  git: env.GISTBLOG_GIT || 'git',
});

/**
 * Ensure the blog's state and posts directories exist.
 *
 * `recursive: true` makes this idempotent.
 */
export const ensureBlogDirs = async (paths: BlogPaths): Promise<void> => {
  try {
    await mkdir(paths.stateDir, { recursive: true });
    await mkdir(paths.postsDir, { recursive: true });
  } catch (error) {
    // Nothing else can work without these directories.
    throw new BlogError('IO_ERROR', `Failed to create blog directories under ${paths.root}`, {
      cause: error,
    });
  }
};

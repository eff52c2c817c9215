import chalk from 'chalk';
import * as clack from '@clack/prompts';
import { postStatus } from './postStore.js';
import type { PostRecord } from './types.js';

/**
 * UI helper utilities.
 *
 * These functions centralize:
 * - Presentation: consistent header and status messages
 * - Formatting: truncation, the post table, counts
 *
 * Commands go through these helpers rather than printing directly. In quiet mode
 * (`--quiet`) nothing but fatal errors is printed.
 */
let quiet = false;

export const setQuiet = (value: boolean) => {
  quiet = value;
};

const print = (...lines: string[]) => {
  if (quiet) return;
  for (const line of lines) {
    console.log(line);
  }
};

export const displayHeader = (title: string) => {
  if (!quiet) clack.intro(chalk.bold.magenta(title));
};

export const displaySuccess = (message: string) => {
  // clack provides consistent status styling + spacing; we layer chalk colors on top.
  if (!quiet) clack.log.success(chalk.green(message));
};

export const displayError = (message: string) => {
  if (!quiet) clack.log.error(chalk.red(message));
};

export const displayInfo = (message: string) => {
  if (!quiet) clack.log.info(chalk.blue(message));
};

export const displayWarning = (message: string) => {
  if (!quiet) clack.log.warn(chalk.yellow(message));
};

export const truncateText = (text: string, maxLength: number): string => {
  if (text.length <= maxLength) return text;
  return text.substring(0, maxLength - 3) + '...';
};

/** Calendar date as recorded in an ISO-8601 timestamp, without shifting time zones. */
export const recordedDate = (isoTimestamp: string): string => isoTimestamp.slice(0, 10);

export interface PostCounts {
  total: number;
  published: number;
  drafts: number;
  private: number;
}

export const countPosts = (posts: PostRecord[]): PostCounts => {
  const published = posts.filter((post) => post.meta.remote).length;
  return {
    total: posts.length,
    published,
    drafts: posts.length - published,
    private: posts.filter((post) => !post.meta.public).length,
  };
};

const COLUMNS = [
  { header: 'ID', width: 6 },
  { header: 'Title', width: 32 },
  { header: 'Status', width: 11 },
  { header: 'Visibility', width: 11 },
  { header: 'Created', width: 12 },
  { header: 'Gist URL', width: 40 },
] as const;

// padEnd before coloring: ANSI escapes would otherwise count towards the width.
const cell = (text: string, width: number, color: (value: string) => string = (value) => value) =>
  color(text.padEnd(width));

/** One plain-text table row per post, in the order given. */
export const formatPostRows = (posts: PostRecord[]): string[] =>
  posts.map(({ meta }) => {
    const published = postStatus(meta) === 'published';
    return [
      cell(meta.id, COLUMNS[0].width),
      cell(truncateText(meta.title, 30), COLUMNS[1].width),
      cell(published ? 'Published' : 'Draft', COLUMNS[2].width, published ? chalk.green.bold : chalk.yellow.bold),
      cell(meta.public ? 'Public' : 'Private', COLUMNS[3].width, meta.public ? undefined : chalk.red.bold),
      cell(recordedDate(meta.createdAt), COLUMNS[4].width),
      meta.remote ? truncateText(meta.remote.url, 40) : '-',
    ].join(' ');
  });

export const displayPostTable = (posts: PostRecord[]) => {
  const counts = countPosts(posts);
  print(
    chalk.bold.magenta('\n📝 Blog Posts\n'),
    chalk.bold.magenta(COLUMNS.map((column) => column.header.padEnd(column.width)).join(' ').trimEnd()),
    chalk.dim('─'.repeat(COLUMNS.reduce((sum, column) => sum + column.width + 1, 0))),
    ...formatPostRows(posts),
    `\nTotal posts: ${counts.total}`,
    `Published: ${counts.published}, Drafts: ${counts.drafts}, Private: ${counts.private}\n`
  );
};

export const displayPostInfo = (post: PostRecord) => {
  print(
    chalk.bold('\nPost:'),
    chalk.dim('─'.repeat(50)),
    chalk.bold('ID:          ') + chalk.yellow(post.meta.id),
    chalk.bold('Title:       ') + chalk.white(post.meta.title),
    ...(post.meta.description ? [chalk.bold('Description: ') + chalk.white(post.meta.description)] : []),
    chalk.bold('Visibility:  ') + chalk.white(post.meta.public ? 'Public' : 'Private'),
    chalk.bold('Directory:   ') + chalk.cyan(post.path),
    chalk.dim('─'.repeat(50)) + '\n'
  );
};

export const displayNextSteps = (root: string) => {
  print(
    chalk.bold('\nNext steps:'),
    `  1. cd ${root}`,
    '  2. gistblog new              # Create your first post',
    '  3. gistblog publish 0001     # Publish when ready\n'
  );
};

/**
 * Fatal, command-ending errors go to stderr as a single `Error: ...` line, followed by
 * the hint when there is one. Printed even in quiet mode.
 */
export const displayFatal = (message: string, hint?: string) => {
  console.error(chalk.red(`Error: ${message}`));
  if (hint) {
    console.error(chalk.blue(hint));
  }
};

/**
 * Run `task` behind a clack spinner. When stdout is not a terminal (piped output, CI)
 * the start and stop messages are logged as plain lines instead, or not at all when quiet.
 */
export const withSpinner = async <T>(
  message: string,
  task: () => Promise<T>,
  done: (result: T) => string,
  failed: string
): Promise<T> => {
  if (quiet || !process.stdout.isTTY) {
    displayInfo(message);
    const result = await task();
    displaySuccess(done(result));
    return result;
  }

  const spinner = clack.spinner();
  spinner.start(message);
  try {
    const result = await task();
    spinner.stop(done(result));
    return result;
  } catch (error) {
    spinner.stop(failed);
    throw error;
  }
};

#!/usr/bin/env node
/**
 * Application entry point.
 *
 * Parses the command line with commander and hands each subcommand to `BlogCommands`.
 * Every error ends up in `main()`'s catch, printed as one line.
 */
import { Command } from 'commander';
import { BlogCommands } from './commands.js';
import { getBlogPaths, getToolBinaries } from './config.js';
import { isBlogError } from './errors.js';
import { createPathOpener, ProcessRunner } from './processRunner.js';
import { displayFatal, setQuiet } from './uiUtils.js';

const buildCommands = (program: Command): BlogCommands => {
  const { cwd, quiet } = program.opts<{ cwd?: string; quiet?: boolean }>();
  setQuiet(quiet ?? false);
  const runner = new ProcessRunner();
  return new BlogCommands({
    paths: getBlogPaths(cwd),
    runner,
    openPath: createPathOpener(runner),
    binaries: getToolBinaries(),
  });
};

const createProgram = (): Command => {
  const program = new Command();

  program
    .name('gistblog')
    .description('A gist-powered blog: write posts locally, publish them as GitHub gists')
    .version('1.0.0')
    .option('-C, --cwd <dir>', 'blog root directory (defaults to the current directory)')
    .option('-q, --quiet', 'print nothing but errors');

  program
    .command('init')
    .description('Initialize a new blog repository')
    .argument('[name]', 'blog name; skips the interactive prompts')
    .option('-p, --path <dir>', 'where to create the blog (defaults to ~/<name>)')
    .option('--no-repo', 'do not create a GitHub repository')
    .action(async (name: string | undefined, options: { path?: string; repo: boolean }) => {
      await buildCommands(program).init(name, options);
    });

  program
    .command('new')
    .description('Create a new blog post')
    .option('-t, --title <title>', 'post title')
    .option('-d, --description <description>', 'post description')
    .option('--public', 'make the post public')
    .option('--private', 'make the post private')
    .option('-y, --yes', 'skip the confirmation prompt')
    .action(
      async (options: { title?: string; description?: string; public?: boolean; private?: boolean; yes?: boolean }) => {
        const visibility = options.private ? false : options.public ? true : undefined;
        await buildCommands(program).newPost({
          title: options.title,
          description: options.description,
          public: visibility,
          yes: options.yes,
        });
      }
    );

  program
    .command('list')
    .description('List all blog posts')
    .action(async () => {
      await buildCommands(program).list();
    });

  program
    .command('edit')
    .description('Open a post directory for editing')
    .argument('<id>', 'post id, e.g. 0001 or 1')
    .action(async (id: string) => {
      await buildCommands(program).edit(id);
    });

  program
    .command('publish')
    .description('Publish a post to GitHub Gists')
    .argument('<id>', 'post id, e.g. 0001 or 1')
    .option('-u, --update', 'update the existing gist instead of refusing', false)
    .action(async (id: string, options: { update: boolean }) => {
      await buildCommands(program).publish(id, options.update);
    });

  program
    .command('export')
    .description('Export all posts to a zip file')
    .argument('[file]', 'output archive')
    .action(async (file: string | undefined) => {
      await buildCommands(program).exportPosts(file);
    });

  return program;
};

async function main() {
  try {
    await createProgram().parseAsync(process.argv);
  } catch (error) {
    // Anything thrown by a command is fatal for this invocation.
    displayFatal(error instanceof Error ? error.message : 'Unknown error', isBlogError(error) ? error.hint : undefined);
    process.exitCode = 1;
  }
}

void main();

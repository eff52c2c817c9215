import test from 'node:test';
import { strict as assert } from 'node:assert';
import fs from 'node:fs/promises';
import path from 'node:path';

import {
  BLOG_GITIGNORE,
  BlogScaffold,
  ignorePrivatePost,
  INITIAL_COMMIT_MESSAGE,
  REPO_DESCRIPTION,
} from '../src/blogScaffold.js';
import { isBlogError } from '../src/errors.js';
import { FakeRunner, makeTempDir, readJson, removeDir } from './helpers.js';

const withLocation = async (fn: (location: string) => Promise<void>) => {
  const dir = await makeTempDir('gistblog-scaffold-');
  try {
    await fn(path.join(dir, 'my-blog'));
  } finally {
    await removeDir(dir);
  }
};

test('create lays out the blog and commits it without touching GitHub', async () => {
  await withLocation(async (location) => {
    const runner = new FakeRunner();
    const result = await new BlogScaffold(runner).create({ name: 'my-blog', location, createRepo: false });

    assert.deepEqual(result, { root: location, repoCreated: false, warnings: [] });
    assert.deepEqual(await readJson(path.join(location, '.toolstate', 'config.json')), {
      next_id: 1,
      default_public: true,
      blog_path: '.',
      repo_name: 'my-blog',
    });
    assert.equal(await fs.readFile(path.join(location, '.gitignore'), 'utf-8'), BLOG_GITIGNORE);
    assert.match(await fs.readFile(path.join(location, 'README.md'), 'utf-8'), /^# my-blog\n/);
    assert.equal(await fs.readFile(path.join(location, 'posts', '.gitkeep'), 'utf-8'), '');

    assert.deepEqual(runner.calls.map((call) => [call.command, ...call.args]), [
      ['git', 'init'],
      ['git', 'add', '.'],
      ['git', 'commit', '-m', INITIAL_COMMIT_MESSAGE],
    ]);
    assert.ok(runner.calls.every((call) => call.options?.cwd === location));
  });
});

test('create makes, wires and pushes the GitHub repository in one call', async () => {
  await withLocation(async (location) => {
    const runner = new FakeRunner();
    const result = await new BlogScaffold(runner, { git: 'git', gh: 'gh-test' }).create({
      name: 'my-blog',
      location,
      createRepo: true,
    });

    assert.equal(result.repoCreated, true);
    assert.deepEqual(
      runner.callsTo('gh-test').map((call) => call.args),
      [
        ['auth', 'status'],
        [
          'repo',
          'create',
          'my-blog',
          '--public',
          '--description',
          REPO_DESCRIPTION,
          '--source=.',
          '--remote=origin',
          '--push',
        ],
      ]
    );
  });
});

test('GitHub failures only produce warnings', async () => {
  await withLocation(async (location) => {
    const runner = new FakeRunner((call) => (call.command === 'gh' ? { exitCode: 1 } : {}));
    const result = await new BlogScaffold(runner).create({ name: 'my-blog', location, createRepo: true });

    assert.equal(result.repoCreated, false);
    assert.deepEqual(result.warnings, ["GitHub CLI not authenticated. Run 'gh auth login', then 'gh repo create'"]);
  });
});

test('a failing git step aborts with IO_ERROR', async () => {
  await withLocation(async (location) => {
    const runner = new FakeRunner((call) =>
      call.args[0] === 'commit' ? { exitCode: 128, stderr: 'Author identity unknown\n' } : {}
    );

    await assert.rejects(
      new BlogScaffold(runner).create({ name: 'my-blog', location, createRepo: false }),
      (error: unknown) => {
        assert.ok(isBlogError(error, 'IO_ERROR'));
        assert.equal(error.message, 'Failed to create initial commit: Author identity unknown');
        return true;
      }
    );
  });
});

test('create refuses to scaffold over an existing blog', async () => {
  await withLocation(async (location) => {
    await new BlogScaffold(new FakeRunner()).create({ name: 'my-blog', location, createRepo: false });

    const runner = new FakeRunner();
    await assert.rejects(
      new BlogScaffold(runner).create({ name: 'my-blog', location, createRepo: false }),
      (error: unknown) => isBlogError(error, 'IO_ERROR')
    );
    assert.deepEqual(runner.calls, []);
  });
});

test('ignorePrivatePost appends the post directory to .gitignore', async () => {
  await withLocation(async (location) => {
    await fs.mkdir(location);
    const gitignore = path.join(location, '.gitignore');
    await fs.writeFile(gitignore, BLOG_GITIGNORE);

    await ignorePrivatePost(gitignore, '0003-secret');

    assert.equal(await fs.readFile(gitignore, 'utf-8'), `${BLOG_GITIGNORE}posts/0003-secret/\n`);
  });
});

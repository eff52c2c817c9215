import test, { after, before } from 'node:test';
import { strict as assert } from 'node:assert';
import fs from 'node:fs/promises';
import path from 'node:path';

import { BlogCommands, type Prompter } from '../src/commands.js';
import { getBlogPaths } from '../src/config.js';
import { isBlogError } from '../src/errors.js';
import { setQuiet } from '../src/uiUtils.js';
import type { BlogPaths, NewPostInput } from '../src/types.js';
import { FakeRunner, makeTempBlog, makeTempDir, readJson, removeDir, type RecordedCall } from './helpers.js';

const GIST_URL = 'https://gist.github.com/octo/f00dcafe';

// The test runner owns this process' stdout.
before(() => setQuiet(true));
after(() => setQuiet(false));

const ghResponder = (call: RecordedCall) =>
  call.args[0] === 'gist' && call.args[1] === 'create' ? { stdout: `${GIST_URL}\n` } : {};

/** Answers every new-post wizard with the next queued input (or cancels when empty). */
const queuedPrompter = (inputs: NewPostInput[]): Prompter & { defaults: boolean[] } => {
  const defaults: boolean[] = [];
  return {
    defaults,
    async newPost(defaultPublic) {
      defaults.push(defaultPublic);
      return inputs.shift() ?? null;
    },
    async init() {
      return null;
    },
  };
};

interface Harness {
  paths: BlogPaths;
  runner: FakeRunner;
  opened: string[];
  commands: BlogCommands;
}

const withCommands = async (
  fn: (harness: Harness) => Promise<void>,
  options: { inputs?: NewPostInput[]; openResult?: boolean } = {}
) => {
  const paths = await makeTempBlog();
  const runner = new FakeRunner(ghResponder);
  const opened: string[] = [];
  const commands = new BlogCommands({
    paths,
    runner,
    openPath: async (target) => {
      opened.push(target);
      return options.openResult ?? true;
    },
    binaries: { gh: 'gh', git: 'git' },
    prompter: queuedPrompter(options.inputs ?? []),
  });
  try {
    await fn({ paths, runner, opened, commands });
  } finally {
    await removeDir(paths.root);
  }
};

test('every command except init requires an initialized blog', async () => {
  const root = await makeTempDir('gistblog-uninit-');
  try {
    const commands = new BlogCommands({
      paths: getBlogPaths(root),
      runner: new FakeRunner(),
      openPath: async () => true,
      binaries: { gh: 'gh', git: 'git' },
      prompter: queuedPrompter([]),
    });
    const notInitialized = (error: unknown) => isBlogError(error, 'NOT_INITIALIZED');

    await assert.rejects(commands.newPost(), notInitialized);
    await assert.rejects(commands.list(), notInitialized);
    await assert.rejects(commands.edit('1'), notInitialized);
    await assert.rejects(commands.publish('1'), notInitialized);
    await assert.rejects(commands.exportPosts(), notInitialized);
  } finally {
    await removeDir(root);
  }
});

test('newPost allocates sequential ids and advances the counter', async () => {
  await withCommands(
    async ({ paths, commands }) => {
      const first = await commands.newPost();
      const second = await commands.newPost();

      assert.equal(first?.dirName, '0001-first-post');
      assert.equal(second?.dirName, '0002-second-post');
      assert.deepEqual(await readJson(paths.configFile), { next_id: 3, default_public: true });
      await assert.rejects(fs.access(paths.gitignoreFile));
    },
    {
      inputs: [
        { title: 'First Post', description: '', public: true },
        { title: 'Second Post', description: '', public: true },
      ],
    }
  );
});

test('newPost adds private posts to .gitignore', async () => {
  await withCommands(
    async ({ paths, commands }) => {
      const post = await commands.newPost();
      assert.equal(post?.meta.public, false);
      assert.equal(await fs.readFile(paths.gitignoreFile, 'utf-8'), 'posts/0001-secret-plans/\n');
    },
    { inputs: [{ title: 'Secret Plans', description: 'shh', public: false }] }
  );
});

test('a cancelled newPost creates nothing and keeps the counter', async () => {
  await withCommands(async ({ paths, commands }) => {
    assert.equal(await commands.newPost(), null);
    assert.deepEqual(await fs.readdir(paths.postsDir), []);
    assert.deepEqual(await readJson(paths.configFile), { next_id: 1, default_public: true });
  });
});

test('list returns posts newest id first', async () => {
  await withCommands(
    async ({ commands }) => {
      await commands.newPost();
      await commands.newPost();
      await commands.newPost();

      const listing = await commands.list();
      assert.deepEqual(
        listing.posts.map((post) => post.meta.id),
        ['0003', '0002', '0001']
      );
    },
    {
      inputs: [
        { title: 'One', description: '', public: true },
        { title: 'Two', description: '', public: true },
        { title: 'Three', description: '', public: false },
      ],
    }
  );
});

test('edit accepts an unpadded id and opens the post directory', async () => {
  await withCommands(
    async ({ paths, opened, commands }) => {
      await commands.newPost();
      const post = await commands.edit('1');

      assert.equal(post.meta.id, '0001');
      assert.deepEqual(opened, [path.join(paths.postsDir, '0001-draft')]);
    },
    { inputs: [{ title: 'Draft', description: '', public: true }] }
  );
});

test('edit still succeeds when nothing can open the directory', async () => {
  await withCommands(
    async ({ commands }) => {
      await commands.newPost();
      const post = await commands.edit('0001');
      assert.equal(post.dirName, '0001-draft');
    },
    { inputs: [{ title: 'Draft', description: '', public: true }], openResult: false }
  );
});

test('edit reports an unknown id as NOT_FOUND', async () => {
  await withCommands(async ({ commands }) => {
    await assert.rejects(commands.edit('99'), (error: unknown) => {
      assert.ok(isBlogError(error, 'NOT_FOUND'));
      assert.equal(error.message, 'Post with ID 0099 not found');
      return true;
    });
  });
});

test('publish creates the gist once and refuses to republish without --update', async () => {
  await withCommands(
    async ({ runner, opened, commands }) => {
      await commands.newPost();

      const first = await commands.publish('1');
      assert.equal(first.status, 'created');
      assert.deepEqual(first.remote, { id: 'f00dcafe', url: GIST_URL });
      assert.deepEqual(opened, [GIST_URL]);

      const callsAfterCreate = runner.calls.length;
      const second = await commands.publish('1');
      assert.equal(second.status, 'already-published');
      assert.equal(runner.calls.length, callsAfterCreate);
      assert.deepEqual(opened, [GIST_URL]);

      const third = await commands.publish('1', true);
      assert.equal(third.status, 'updated');
      assert.equal(runner.callsTo('gh', 'gist').at(-1)?.args[1], 'edit');
    },
    { inputs: [{ title: 'Ship It', description: 'Release notes', public: true }] }
  );
});

test('exportPosts writes the default archive in the blog root', async () => {
  await withCommands(
    async ({ paths, commands }) => {
      await commands.newPost();
      const result = await commands.exportPosts();

      const outputFile = path.join(paths.root, 'gistblog-export.zip');
      assert.equal(result.summary.outputFile, outputFile);
      assert.equal(result.summary.total, 1);
      await fs.access(outputFile);
    },
    { inputs: [{ title: 'Archive Me', description: '', public: true }] }
  );
});

test('init with a name skips the prompts and honours --no-repo', async () => {
  const home = await makeTempDir('gistblog-home-');
  try {
    const runner = new FakeRunner();
    const commands = new BlogCommands({
      paths: getBlogPaths(home),
      runner,
      openPath: async () => true,
      binaries: { gh: 'gh', git: 'git' },
      prompter: queuedPrompter([]),
      homeDir: home,
    });

    const result = await commands.init('notes', { repo: false });

    assert.equal(result?.root, path.join(home, 'notes'));
    assert.equal(result?.repoCreated, false);
    assert.equal(runner.callsTo('gh').length, 0);
    await fs.access(path.join(home, 'notes', '.toolstate', 'config.json'));
  } finally {
    await removeDir(home);
  }
});

test('init without a name returns null when the wizard is cancelled', async () => {
  await withCommands(async ({ runner, commands }) => {
    assert.equal(await commands.init(undefined), null);
    assert.deepEqual(runner.calls, []);
  });
});

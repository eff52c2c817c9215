import { homedir, userInfo } from 'os';
import { join, relative, resolve } from 'path';
import { BlogScaffold, ignorePrivatePost, type ScaffoldResult } from './blogScaffold.js';
import { DEFAULT_EXPORT_FILE, type ToolBinaries } from './config.js';
import { ConfigStore } from './configStore.js';
import { describeError } from './errors.js';
import { Exporter, type ExportResult } from './exporter.js';
import { GistPublisher } from './gistPublisher.js';
import { PostStore } from './postStore.js';
import { promptInit, promptNewPost, type InitAnswers, type NewPostPreset } from './prompts.js';
import { normalizePostId } from './slug.js';
import type {
  BlogConfig,
  BlogPaths,
  CommandRunner,
  NewPostInput,
  PathOpener,
  PostListing,
  PostRecord,
  PublishOutcome,
} from './types.js';
import {
  displayHeader,
  displayInfo,
  displayNextSteps,
  displayPostInfo,
  displayPostTable,
  displaySuccess,
  displayWarning,
  withSpinner,
} from './uiUtils.js';

/** The interactive part of `new` and `init`; swapped out in tests. */
export interface Prompter {
  newPost(defaultPublic: boolean, preset: NewPostPreset): Promise<NewPostInput | null>;
  init(defaultName: string, defaultLocation: (name: string) => string): Promise<InitAnswers | null>;
}

export const clackPrompter: Prompter = {
  newPost: promptNewPost,
  init: promptInit,
};

export interface CommandDeps {
  paths: BlogPaths;
  runner: CommandRunner;
  openPath: PathOpener;
  binaries: ToolBinaries;
  prompter?: Prompter;
  homeDir?: string;
  userName?: string;
}

export interface InitOptions {
  /** Where to create the blog; defaults to `~/<name>`. */
  path?: string;
  /** Create a GitHub repository (commander's `--no-repo` sets this to false). */
  repo?: boolean;
}

const PUBLISH_DONE: Record<PublishOutcome['status'], string> = {
  'already-published': 'Nothing to publish',
  created: 'Published successfully! ✅',
  updated: 'Updated existing gist! ✅',
};

const currentUserName = (): string => {
  try {
    return userInfo().username || 'user';
  } catch {
    return 'user';
  }
};

/**
 * BlogCommands is the controller of the application.
 *
 * Each public method is one CLI subcommand. They all follow the same shape:
 * 1) Check preconditions (blog initialized, post exists).
 * 2) Delegate to the stores / publisher / exporter.
 * 3) Report the result through the uiUtils display helpers.
 *
 * Errors from step 1 and 2 propagate to the entry point; best-effort side actions
 * (opening a browser or file manager, .gitignore updates) only warn.
 */
export class BlogCommands {
  private configStore: ConfigStore;
  private postStore: PostStore;
  private publisher: GistPublisher;
  private prompter: Prompter;

  constructor(private deps: CommandDeps) {
    this.configStore = new ConfigStore(deps.paths.configFile);
    this.postStore = new PostStore(deps.paths.postsDir);
    this.publisher = new GistPublisher(deps.runner, this.postStore, deps.binaries.gh);
    this.prompter = deps.prompter ?? clackPrompter;
  }

  async init(name: string | undefined, options: InitOptions = {}): Promise<ScaffoldResult | null> {
    const home = this.deps.homeDir ?? homedir();
    const defaultLocation = (blogName: string) => options.path ?? join(home, blogName);

    let answers: InitAnswers | null;
    if (name) {
      answers = { name, location: defaultLocation(name), createRepo: options.repo ?? true };
    } else {
      displayHeader('🚀 Initialize New Blog');
      const user = this.deps.userName ?? currentUserName();
      answers = await this.prompter.init(`gistblog-${user}`, defaultLocation);
      if (answers && options.repo === false) {
        answers = { ...answers, createRepo: false };
      }
    }

    if (!answers) {
      displayInfo('Cancelled.');
      return null;
    }

    const chosen = answers;
    displayInfo(`Creating blog project: ${chosen.name}`);
    displayInfo(`Location: ${chosen.location}`);

    const result = await withSpinner(
      'Setting up repository...',
      () => new BlogScaffold(this.deps.runner, this.deps.binaries).create(chosen),
      () => 'Repository ready',
      'Setup failed'
    );

    for (const warning of result.warnings) {
      displayWarning(warning);
    }
    if (result.repoCreated) {
      displaySuccess('GitHub repository created and pushed');
    }

    displaySuccess(`Blog '${chosen.name}' created successfully!`);
    displayNextSteps(result.root);

    return result;
  }

  async newPost(preset: NewPostPreset = {}): Promise<PostRecord | null> {
    const config = await this.requireInitialized();

    displayHeader('📝 Create New Blog Post');
    const input = await this.prompter.newPost(config.defaultPublic, preset);
    if (!input) {
      displayInfo('Cancelled.');
      return null;
    }

    const post = await this.configStore.allocateId((id) => this.postStore.createPost(id, input));

    if (!post.meta.public) {
      try {
        await ignorePrivatePost(this.deps.paths.gitignoreFile, post.dirName);
      } catch (error) {
        displayWarning(`Could not update .gitignore: ${describeError(error)}`);
      }
    }

    const relativeDir = relative(this.deps.paths.root, post.path);
    displaySuccess(`Created new post: ${post.dirName}`);
    displayInfo(`Directory: ${relativeDir}/`);
    if (!post.meta.public) {
      displayInfo('🔒 This post is private and added to .gitignore');
    }
    displayInfo(`When ready, publish with: gistblog publish ${post.meta.id}`);

    return post;
  }

  async list(): Promise<PostListing> {
    await this.requireInitialized();
    const listing = await this.postStore.list();

    for (const { dirName, reason } of listing.skipped) {
      displayWarning(`Could not read metadata for ${dirName}: ${reason}`);
    }

    if (listing.posts.length === 0) {
      displayInfo("No posts found. Create your first post with 'gistblog new'");
      return listing;
    }

    // Newest first.
    const posts = [...listing.posts].sort((a, b) => b.meta.id.localeCompare(a.meta.id));
    displayPostTable(posts);
    return { ...listing, posts };
  }

  async edit(id: string): Promise<PostRecord> {
    await this.requireInitialized();
    const post = await this.postStore.get(normalizePostId(id));

    displayInfo(`📁 Opening post directory: ${post.path}`);
    if (await this.deps.openPath(post.path)) {
      displaySuccess('Opened in file manager');
      displayInfo(`Edit your files and run 'gistblog publish ${post.meta.id}' when ready`);
    } else {
      displayWarning('Could not open file manager');
      displayInfo(`📂 Post directory: ${post.path}`);
      displayInfo('You can manually navigate to this directory to edit your files');
    }

    return post;
  }

  async publish(id: string, update = false): Promise<PublishOutcome> {
    await this.requireInitialized();
    const post = await this.postStore.get(normalizePostId(id));

    displayPostInfo(post);
    const outcome = await withSpinner(
      post.meta.remote && update ? `Updating gist for '${post.meta.title}'...` : `Publishing '${post.meta.title}'...`,
      () => this.publisher.publish(post.path, post.meta, update),
      (result) => PUBLISH_DONE[result.status],
      'Publish failed'
    );

    if (outcome.status === 'already-published') {
      displayWarning(`Post already published: ${outcome.remote.url}`);
      displayInfo(`Use 'gistblog publish ${outcome.meta.id} --update' to update the existing gist.`);
      return outcome;
    }

    displayInfo(`Files: ${outcome.files.map((file) => relative(post.path, file)).join(', ')}`);
    displaySuccess(`🔗 Gist URL: ${outcome.remote.url}`);
    displayInfo(`📝 Gist ID: ${outcome.remote.id}`);

    if (!(await this.deps.openPath(outcome.remote.url))) {
      displayWarning('Could not open browser automatically');
      displayInfo(`Please visit: ${outcome.remote.url}`);
    }

    return outcome;
  }

  async exportPosts(outputFile: string = DEFAULT_EXPORT_FILE): Promise<ExportResult> {
    await this.requireInitialized();

    const result = await withSpinner(
      `Exporting posts to ${outputFile}...`,
      () => new Exporter(this.postStore).exportTo(resolve(this.deps.paths.root, outputFile)),
      () => 'Export completed successfully! ✅',
      'Export failed'
    );

    for (const { dirName, reason } of result.skipped) {
      displayWarning(`Could not read metadata for ${dirName}: ${reason}`);
    }

    const { summary } = result;
    displayInfo(`📦 Archive: ${summary.outputFile}`);
    displayInfo(`📊 Total posts: ${summary.total}`);
    displayInfo(`📈 Published: ${summary.published}, Drafts: ${summary.drafts}, Private: ${summary.private}`);

    return result;
  }

  private requireInitialized(): Promise<BlogConfig> {
    // load() raises NOT_INITIALIZED with the "run init" hint when the config is missing.
    return this.configStore.load();
  }
}

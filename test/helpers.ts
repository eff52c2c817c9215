import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { getBlogPaths } from '../src/config.js';
import { ConfigStore, INITIAL_CONFIG } from '../src/configStore.js';
import type { BlogPaths, CommandResult, CommandRunner, RunOptions } from '../src/types.js';

export interface RecordedCall {
  command: string;
  args: string[];
  options?: RunOptions;
}

type Responder = (call: RecordedCall) => Partial<CommandResult> | Error;

/**
 * In-process stand-in for spawning executables. Records every call and answers with
 * whatever the responder returns (exit code 0 and empty output by default).
 */
export class FakeRunner implements CommandRunner {
  calls: RecordedCall[] = [];

  constructor(private responder: Responder = () => ({})) {}

  async run(command: string, args: string[], options?: RunOptions): Promise<CommandResult> {
    const call = { command, args, options };
    this.calls.push(call);
    const response = this.responder(call);
    if (response instanceof Error) throw response;
    return { exitCode: 0, stdout: '', stderr: '', ...response };
  }

  callsTo(command: string, subcommand?: string): RecordedCall[] {
    return this.calls.filter(
      (call) => call.command === command && (subcommand === undefined || call.args[0] === subcommand)
    );
  }
}

export const makeTempDir = (prefix: string): Promise<string> =>
  fs.mkdtemp(path.join(os.tmpdir(), prefix));

/** A temp directory with an initialized blog (config + posts/). */
export const makeTempBlog = async (): Promise<BlogPaths> => {
  const paths = getBlogPaths(await makeTempDir('gistblog-test-'));
  await fs.mkdir(paths.stateDir, { recursive: true });
  await fs.mkdir(paths.postsDir, { recursive: true });
  await new ConfigStore(paths.configFile).save(INITIAL_CONFIG);
  return paths;
};

export const removeDir = (dir: string): Promise<void> => fs.rm(dir, { recursive: true, force: true });

export const readJson = async (file: string): Promise<unknown> => JSON.parse(await fs.readFile(file, 'utf-8'));

import { spawn } from 'child_process';
import type { CommandResult, CommandRunner, PathOpener, RunOptions } from './types.js';

/**
 * Spawns real executables and waits for them to exit.
 *
 * A non-zero exit code is not an error here: callers get the code plus the captured
 * output and decide what it means. Only a failure to start the process (missing binary,
 * permissions) rejects.
 */
export class ProcessRunner implements CommandRunner {
  run(command: string, args: string[], options: RunOptions = {}): Promise<CommandResult> {
    return new Promise((resolve, reject) => {
      const child = spawn(command, args, {
        cwd: options.cwd,
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      let stdout = '';
      let stderr = '';
      child.stdout.setEncoding('utf-8');
      child.stderr.setEncoding('utf-8');
      child.stdout.on('data', (chunk: string) => {
        stdout += chunk;
      });
      child.stderr.on('data', (chunk: string) => {
        stderr += chunk;
      });

      child.once('error', reject);
      child.once('close', (code, signal) => {
        resolve({
          // Killed by a signal: report it like a shell would.
          exitCode: code ?? (signal ? 128 : 1),
          stdout,
          stderr,
        });
      });
    });
  }
}

/**
 * Platform "open" invocation for a directory or URL.
 *
 * - macOS: `open`
 * - Windows: `explorer` for paths, `cmd /c start` for URLs
 * - everything else: `xdg-open`
 */
export const openCommandFor = (
  target: string,
  platform: NodeJS.Platform = process.platform
): { command: string; args: string[] } => {
  const isUrl = /^https?:\/\//.test(target);

  if (platform === 'darwin') return { command: 'open', args: [target] };
  if (platform === 'win32') {
    return isUrl
      ? { command: 'cmd', args: ['/c', 'start', '', target] }
      : { command: 'explorer', args: [target] };
  }
  return { command: 'xdg-open', args: [target] };
};

/**
 * Best-effort opener: never throws, resolves false when the launcher is missing or fails.
 */
export const createPathOpener =
  (runner: CommandRunner, platform: NodeJS.Platform = process.platform): PathOpener =>
  async (target) => {
    const { command, args } = openCommandFor(target, platform);
    try {
      const result = await runner.run(command, args);
      // explorer.exe exits with 1 even when it opened the window.
      return result.exitCode === 0 || (platform === 'win32' && command === 'explorer');
    } catch {
      return false;
    }
  };

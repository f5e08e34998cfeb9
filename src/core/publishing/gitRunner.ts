import { execFile } from 'node:child_process';
import { promisify } from 'node:util';

const execFileAsync = promisify(execFile);

export interface GitRunner {
  run(args: string[]): Promise<string>;
}

/**
 * Runs the `git` binary inside the given working tree.
 */
export function createGitRunner(cwd: string): GitRunner {
  return {
    run: async (args) => {
      try {
        const { stdout } = await execFileAsync('git', args, { cwd });
        return stdout;
      } catch (error) {
        const stderr =
          typeof error === 'object' && error !== null && 'stderr' in error
            ? String(error.stderr).trim()
            : '';
        const stdout =
          typeof error === 'object' && error !== null && 'stdout' in error
            ? String(error.stdout).trim()
            : '';
        const detail = stderr || stdout || String(error);
        throw new Error(`git ${args[0] ?? ''} failed in ${cwd}: ${detail}`, {
          cause: error,
        });
      }
    },
  };
}

/**
 * Git client
 *
 * Read-only repository queries plus the shallow clone used for remote
 * repositories, all through the git command line.
 */

import type { Logger } from 'pino';
import { DEFAULT_TIMEOUTS } from '../../config/defaults';
import type { CommandRunner } from '../command-executor';

export interface CloneRequest {
  repository: string;
  branch: string;
  destination: string;
}

export interface GitClient {
  isRepository(dir: string): Promise<boolean>;
  /** `git status --porcelain` output; empty for a clean tree */
  status(dir: string): Promise<string>;
  shortHead(dir: string): Promise<string>;
  /** Tag pointing exactly at HEAD, if any */
  exactTag(dir: string): Promise<string | undefined>;
  /** Most recent tag reachable from HEAD, if any */
  latestTag(dir: string): Promise<string | undefined>;
  remoteUrl(dir: string, remote?: string): Promise<string | undefined>;
  clone(request: CloneRequest): Promise<{ ok: boolean; output: string }>;
}

/**
 * Create a git client backed by the git binary
 */
export function createGitClient(runner: CommandRunner, logger: Logger, binary = 'git'): GitClient {
  const log = logger.child({ component: 'GitClient' });

  const git = (dir: string, args: string[]) =>
    runner.execute(binary, ['-C', dir, ...args], { timeout: DEFAULT_TIMEOUTS.command });

  const optional = async (dir: string, args: string[]): Promise<string | undefined> => {
    const result = await git(dir, args);
    return result.exitCode === 0 && result.stdout ? result.stdout : undefined;
  };

  return {
    async isRepository(dir: string): Promise<boolean> {
      try {
        const result = await git(dir, ['rev-parse', '--git-dir']);
        return result.exitCode === 0;
      } catch (error) {
        log.debug({ dir, error: error instanceof Error ? error.message : String(error) }, 'git unavailable');
        return false;
      }
    },

    async status(dir: string): Promise<string> {
      const result = await git(dir, ['status', '--porcelain']);
      if (result.exitCode !== 0) {
        throw new Error(`git status failed: ${result.stderr}`);
      }
      return result.stdout;
    },

    async shortHead(dir: string): Promise<string> {
      const result = await git(dir, ['rev-parse', '--short', 'HEAD']);
      if (result.exitCode !== 0) {
        throw new Error(`git rev-parse failed: ${result.stderr}`);
      }
      return result.stdout;
    },

    exactTag(dir: string): Promise<string | undefined> {
      return optional(dir, ['describe', '--exact-match', 'HEAD', '--abbrev=0', '--tags']);
    },

    latestTag(dir: string): Promise<string | undefined> {
      return optional(dir, ['describe', '--abbrev=0', '--tags']);
    },

    remoteUrl(dir: string, remote = 'origin'): Promise<string | undefined> {
      return optional(dir, ['config', '--get', `remote.${remote}.url`]);
    },

    async clone({ repository, branch, destination }: CloneRequest) {
      log.info({ repository, branch, destination }, 'Cloning repository');
      const result = await runner.execute(
        binary,
        ['clone', '--depth', '1', '--single-branch', '-b', branch, repository, destination],
        { timeout: DEFAULT_TIMEOUTS.clone },
      );
      return { ok: result.exitCode === 0, output: result.stderr || result.stdout };
    },
  };
}

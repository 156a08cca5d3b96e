/**
 * Git reader
 *
 * Derives version, reference, tags and repository URL from the working tree.
 */

import type { Logger } from 'pino';
import { DIRTY_VERSION } from '../config/defaults';
import type { DirtyPolicy, SourceValues } from '../domain/types/build';
import type { GitClient } from '../infrastructure/git/client';
import { GitError } from '../lib/errors';

export interface GitReadOptions {
  /** Version and tags come from Git (`--git`) */
  useGit: boolean;
  dirtyPolicy: DirtyPolicy;
}

export interface GitSource {
  values: SourceValues;
  notices: string[];
  isRepository: boolean;
  /** Whether `values.version` came from Git with `--git` set */
  authoritative: boolean;
  /** Uncommitted changes in the working tree */
  dirty: boolean;
}

const GITHUB_SSH = /^git@github\.com:(.+?)(?:\.git)?$/;

/**
 * Turn a remote URL into a browsable one.
 * HTTP(S) URLs are kept; GitHub SSH remotes become https URLs.
 */
export function normalizeRemoteUrl(remote: string): string | undefined {
  const trimmed = remote.trim();
  if (/^https?:\/\//.test(trimmed)) {
    return trimmed;
  }

  const match = trimmed.match(GITHUB_SSH);
  if (match?.[1]) {
    return `https://github.com/${match[1]}`;
  }

  return undefined;
}

const stripV = (tag: string): string => tag.replace(/^v/, '');

export async function readGitSource(
  dir: string,
  git: GitClient,
  { useGit, dirtyPolicy }: GitReadOptions,
  logger?: Logger,
): Promise<GitSource> {
  const notices: string[] = [];

  if (!(await git.isRepository(dir))) {
    if (useGit) {
      throw new GitError('Git is requested but the target is not a git repository', undefined, { dir });
    }
    notices.push('Target is not a git repository, git metadata unavailable');
    return { values: {}, notices, isRepository: false, authoritative: false, dirty: false };
  }

  const values: SourceValues = {};
  const dirty = (await git.status(dir)).length > 0;

  if (dirty) {
    logger?.debug({ dir }, 'Working tree has uncommitted changes');
    values.buildRef = DIRTY_VERSION;
    values.tagTest = true;

    // the policy only picks a version when git is the version source
    if (useGit) {
      switch (dirtyPolicy) {
        case 'fail':
          throw new GitError('Working tree has uncommitted changes', undefined, { dir });
        case 'sentinel':
          values.version = DIRTY_VERSION;
          break;
        case 'keep':
          notices.push('Working tree has uncommitted changes, keeping the configured version');
          break;
      }
    }
  } else {
    const head = await git.shortHead(dir);
    values.buildRef = head;

    const tag = useGit ? await git.exactTag(dir) : undefined;
    if (tag) {
      values.version = stripV(tag);
      if (tag === (await git.latestTag(dir))) {
        values.tagLatest = true;
      }
    } else {
      values.version = head;
      values.tagTest = true;
    }
  }

  const remote = await git.remoteUrl(dir);
  if (remote) {
    const url = normalizeRemoteUrl(remote);
    if (url) {
      values.gitUrl = url;
      values.url = url;
    } else {
      notices.push(`Cannot derive a repository URL from remote '${remote}'`);
    }
  }

  return {
    values,
    notices,
    isRepository: true,
    authoritative: useGit && values.version !== undefined,
    dirty,
  };
}

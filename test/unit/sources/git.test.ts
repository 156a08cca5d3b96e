import { describe, it, expect } from '@jest/globals';
import { normalizeRemoteUrl, readGitSource } from '../../../src/sources/git';
import { GitError } from '../../../src/lib/errors';
import { ExitCode } from '../../../src/domain/types/errors';
import { FakeGit } from '../../utils/test-helpers';

const options = { useGit: true, dirtyPolicy: 'sentinel' } as const;

describe('git reader', () => {
  describe('normalizeRemoteUrl', () => {
    it('should keep HTTP(S) remotes', () => {
      expect(normalizeRemoteUrl('https://example.com/team/addon.git')).toBe('https://example.com/team/addon.git');
    });

    it('should convert GitHub SSH remotes', () => {
      expect(normalizeRemoteUrl('git@github.com:team/addon.git')).toBe('https://github.com/team/addon');
      expect(normalizeRemoteUrl('git@github.com:team/addon')).toBe('https://github.com/team/addon');
    });

    it('should give up on other remotes', () => {
      expect(normalizeRemoteUrl('ssh://git@example.com/team/addon')).toBeUndefined();
    });
  });

  describe('readGitSource', () => {
    it('should use the tag on HEAD when it is the latest tag', async () => {
      const git = new FakeGit({ head: 'f00dcaf', exactTag: 'v2.0.0', latestTag: 'v2.0.0' });

      const source = await readGitSource('/work', git, options);

      expect(source.values).toEqual({ buildRef: 'f00dcaf', version: '2.0.0', tagLatest: true });
      expect(source.authoritative).toBe(true);
    });

    it('should not tag latest for an older tag', async () => {
      const git = new FakeGit({ exactTag: 'v1.0.0', latestTag: 'v2.0.0' });

      const { values } = await readGitSource('/work', git, options);

      expect(values.version).toBe('1.0.0');
      expect(values.tagLatest).toBeUndefined();
    });

    it('should fall back to the short hash and a test tag', async () => {
      const git = new FakeGit({ head: 'abc1234' });

      const { values } = await readGitSource('/work', git, options);

      expect(values).toEqual({ buildRef: 'abc1234', version: 'abc1234', tagTest: true });
    });

    it('should ignore tags without --git', async () => {
      const git = new FakeGit({ head: 'abc1234', exactTag: 'v2.0.0', latestTag: 'v2.0.0' });

      const source = await readGitSource('/work', git, { useGit: false, dirtyPolicy: 'sentinel' });

      expect(source.values.version).toBe('abc1234');
      expect(source.authoritative).toBe(false);
    });

    it('should mark a dirty tree', async () => {
      const git = new FakeGit({ status: ' M Dockerfile\n' });

      const { values } = await readGitSource('/work', git, options);

      expect(values).toEqual({ buildRef: 'dirty', tagTest: true, version: 'dirty' });
    });

    it('should leave the version alone for a dirty tree with the keep policy', async () => {
      const git = new FakeGit({ status: '?? notes.txt' });

      const source = await readGitSource('/work', git, { useGit: true, dirtyPolicy: 'keep' });

      expect(source.values.version).toBeUndefined();
      expect(source.authoritative).toBe(false);
      expect(source.notices).toEqual(['Working tree has uncommitted changes, keeping the configured version']);
    });

    it('should only mark the reference of a dirty tree without --git', async () => {
      const git = new FakeGit({ status: ' M Dockerfile' });

      const source = await readGitSource('/work', git, { useGit: false, dirtyPolicy: 'fail' });

      expect(source.values).toEqual({ buildRef: 'dirty', tagTest: true });
      expect(source.dirty).toBe(true);
      expect(source.notices).toEqual([]);
    });

    it('should refuse a dirty tree with the fail policy', async () => {
      const git = new FakeGit({ status: ' M Dockerfile' });

      await expect(readGitSource('/work', git, { useGit: true, dirtyPolicy: 'fail' })).rejects.toMatchObject({
        exitCode: ExitCode.GIT,
      });
    });

    it('should derive the repository URL from the origin remote', async () => {
      const git = new FakeGit({ remote: 'git@github.com:team/addon.git' });

      const { values } = await readGitSource('/work', git, options);

      expect(values.gitUrl).toBe('https://github.com/team/addon');
      expect(values.url).toBe('https://github.com/team/addon');
    });

    it('should fail outside a repository when git was requested', async () => {
      const git = new FakeGit({ repository: false });

      await expect(readGitSource('/work', git, options)).rejects.toThrow(GitError);
    });

    it('should only report a notice outside a repository without --git', async () => {
      const git = new FakeGit({ repository: false });

      const source = await readGitSource('/work', git, { useGit: false, dirtyPolicy: 'sentinel' });

      expect(source).toEqual({
        values: {},
        notices: ['Target is not a git repository, git metadata unavailable'],
        isRepository: false,
        authoritative: false,
        dirty: false,
      });
    });
  });
});

import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { CommanderError } from 'commander';
import { normalizeArgPairs, parseArgPairs, parseCliArguments } from '../../../src/cli/args';

describe('command line', () => {
  describe('parseCliArguments', () => {
    it('should apply defaults', () => {
      const flags = parseCliArguments([]);

      expect(flags).toMatchObject({
        target: '.',
        branch: 'master',
        architectures: [],
        all: false,
        baseImageOverrides: {},
        tagLatest: false,
        tagTest: false,
        push: false,
        extraBuildArgs: {},
        cache: true,
        parallel: false,
        useGit: false,
        dirtyPolicy: 'sentinel',
        labelOverride: false,
        externalDaemon: false,
        dryRun: false,
      });
      expect(flags.squash).toBeUndefined();
      expect(flags.version).toBeUndefined();
    });

    it('should keep architectures in command line order', () => {
      const flags = parseCliArguments(['--armhf', '--amd64', '--armhf', '-t', 'addon', '-v', '1.0.0']);

      expect(flags.architectures).toEqual(['armhf', 'amd64']);
      expect(flags.target).toBe('addon');
      expect(flags.version).toBe('1.0.0');
    });

    it('should collect base image options', () => {
      const flags = parseCliArguments(['--amd64-from', 'example/base-amd64', '--i386-from', 'example/base-i386', '-f', 'example/{arch}-base']);

      expect(flags.baseImageOverrides).toEqual({ amd64: 'example/base-amd64', i386: 'example/base-i386' });
      expect(flags.baseImageTemplate).toBe('example/{arch}-base');
    });

    it('should accept build arguments in both forms', () => {
      const flags = parseCliArguments(['--arg', 'TOOL_VERSION', '2', '--arg', 'MODE=fast', '--amd64']);

      expect(flags.extraBuildArgs).toEqual({ TOOL_VERSION: '2', MODE: 'fast' });
      expect(flags.architectures).toEqual(['amd64']);
    });

    it('should let the last of --parallel and --single win', () => {
      expect(parseCliArguments(['--parallel', '--single']).parallel).toBe(false);
      expect(parseCliArguments(['--single', '--parallel']).parallel).toBe(true);
    });

    it('should read cache and squash switches', () => {
      expect(parseCliArguments(['--no-cache']).cache).toBe(false);
      expect(parseCliArguments(['--squash']).squash).toBe(true);
      expect(parseCliArguments(['--no-squash']).squash).toBe(false);
    });

    it('should read metadata options', () => {
      const flags = parseCliArguments([
        '-n',
        'Example',
        '--author',
        'Jane Doe',
        '--doc-url',
        'https://example.com/docs',
        '--type',
        'base',
        '-o',
      ]);

      expect(flags).toMatchObject({
        name: 'Example',
        maintainer: 'Jane Doe',
        docUrl: 'https://example.com/docs',
        buildType: 'base',
        labelOverride: true,
      });
    });

    it('should read git and run mode options', () => {
      const flags = parseCliArguments(['-g', '--dirty', 'keep', '-l', '--tag-test', '-p', '--all', '--external-daemon', '--dry-run']);

      expect(flags).toMatchObject({
        useGit: true,
        dirtyPolicy: 'keep',
        tagLatest: true,
        tagTest: true,
        push: true,
        all: true,
        externalDaemon: true,
        dryRun: true,
      });
    });

    describe('invalid input', () => {
      beforeEach(() => {
        jest.spyOn(process.stderr, 'write').mockImplementation(() => true);
      });

      afterEach(() => {
        jest.restoreAllMocks();
      });

      it('should reject unknown options', () => {
        expect(() => parseCliArguments(['--sparc'])).toThrow(CommanderError);
      });

      it('should reject unknown dirty policies', () => {
        expect(() => parseCliArguments(['--dirty', 'maybe'])).toThrow(CommanderError);
      });
    });
  });

  describe('normalizeArgPairs', () => {
    it('should join key and value', () => {
      expect(normalizeArgPairs(['--arg', 'A', '1', '--amd64'])).toEqual(['--arg', 'A=1', '--amd64']);
    });

    it('should leave assignments alone', () => {
      expect(normalizeArgPairs(['--arg', 'A=1', '--amd64'])).toEqual(['--arg', 'A=1', '--amd64']);
    });
  });

  describe('parseArgPairs', () => {
    it('should give bare keys an empty value', () => {
      expect(parseArgPairs(['A=1', 'B'])).toEqual({ A: '1', B: '' });
    });
  });
});

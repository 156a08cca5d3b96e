import { describe, it, expect, afterEach } from '@jest/globals';
import path from 'node:path';
import { mergeSourceValues, parseManifest, readManifests } from '../../../src/sources/manifest';
import { ManifestError } from '../../../src/lib/errors';
import { ExitCode } from '../../../src/domain/types/errors';
import { createTempDir, removeTempDir } from '../../utils/test-helpers';

describe('manifest reader', () => {
  describe('parseManifest', () => {
    it('should map recognized keys onto source values', () => {
      const { values, notices } = parseManifest(
        {
          version: 1.2,
          image: 'example/{arch}-addon',
          arch: ['amd64', 'sparc'],
          build_from: { amd64: 'example/base-amd64:3', mips: 'example/base-mips:3' },
          args: { TOOL_VERSION: 1, FEATURE: true },
          squash: true,
        },
        'config.json',
      );

      expect(values).toEqual({
        version: '1.2',
        image: 'example/{arch}-addon',
        supportedArchitectures: ['amd64'],
        baseImageOverrides: { amd64: 'example/base-amd64:3' },
        extraBuildArgs: { TOOL_VERSION: '1', FEATURE: 'true' },
        squash: true,
      });
      expect(notices).toEqual([
        "Ignoring unknown architecture 'sparc' in config.json",
        "Ignoring build_from for unknown architecture 'mips' in config.json",
      ]);
    });

    it('should ignore unknown keys', () => {
      expect(parseManifest({ slug: 'example', startup: 'once' }, 'config.json').values).toEqual({});
    });

    it('should treat an empty document as no values', () => {
      expect(parseManifest(null, 'build.yaml').values).toEqual({});
    });

    it('should reject a recognized key of the wrong type', () => {
      let caught: unknown;
      try {
        parseManifest({ arch: 'amd64' }, 'config.json');
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ManifestError);
      expect(caught instanceof ManifestError && caught.exitCode).toBe(ExitCode.INVALID_MANIFEST);
    });
  });

  describe('mergeSourceValues', () => {
    it('should keep primary values and merge maps per entry', () => {
      const merged = mergeSourceValues(
        { version: '1', baseImageOverrides: { amd64: 'a' } },
        { version: '2', image: 'img', baseImageOverrides: { amd64: 'b', armhf: 'c' } },
      );

      expect(merged).toEqual({ version: '1', image: 'img', baseImageOverrides: { amd64: 'a', armhf: 'c' } });
    });
  });

  describe('readManifests', () => {
    let dir: string;

    afterEach(async () => {
      await removeTempDir(dir);
    });

    it('should read the config file before the build file', async () => {
      dir = await createTempDir({
        'config.yaml': 'version: 1.0.0\narch:\n  - amd64\n  - armhf\nimage: example/{arch}-addon\n',
        'build.json': JSON.stringify({ build_from: { amd64: 'example/base:amd64' }, squash: true, version: '9.9.9' }),
      });

      const source = await readManifests(dir);

      expect(source.values).toEqual({
        version: '1.0.0',
        supportedArchitectures: ['amd64', 'armhf'],
        image: 'example/{arch}-addon',
        baseImageOverrides: { amd64: 'example/base:amd64' },
        squash: true,
      });
      expect(source.files).toEqual([path.join(dir, 'config.yaml'), path.join(dir, 'build.json')]);
    });

    it('should prefer config.json over config.yaml', async () => {
      dir = await createTempDir({
        'config.json': '{"version": "2.0.0"}',
        'config.yaml': 'version: 3.0.0\n',
      });

      const source = await readManifests(dir);

      expect(source.values.version).toBe('2.0.0');
      expect(source.files).toEqual([path.join(dir, 'config.json')]);
    });

    it('should return empty values without manifests', async () => {
      dir = await createTempDir({ Dockerfile: 'FROM alpine\n' });

      await expect(readManifests(dir)).resolves.toEqual({ values: {}, files: [], notices: [] });
    });

    it('should fail on malformed JSON', async () => {
      dir = await createTempDir({ 'config.json': '{ "version": ' });

      await expect(readManifests(dir)).rejects.toThrow(ManifestError);
    });
  });
});

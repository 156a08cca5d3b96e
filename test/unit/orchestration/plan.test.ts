import { describe, it, expect } from '@jest/globals';
import {
  createBuildPlan,
  createBuildRequest,
  extraTags,
  formatBuildDate,
  imageTags,
  partitionExtraArgs,
} from '../../../src/workflows/orchestration/plan';
import type { DockerfileInventory } from '../../../src/domain/types/build';
import { createBuildConfig } from '../../utils/test-helpers';

const inventory = (...args: string[]): DockerfileInventory => ({
  args: new Set(args),
  labels: new Set<string>(),
  fromCount: 1,
});

const BUILD_DATE = '2024-05-01T12:00:00Z';

describe('build plan', () => {
  describe('formatBuildDate', () => {
    it('should drop milliseconds', () => {
      expect(formatBuildDate(new Date('2024-05-01T12:00:00.123Z'))).toBe(BUILD_DATE);
    });
  });

  describe('imageTags', () => {
    it('should expand the image template for the architecture', () => {
      expect(imageTags(createBuildConfig(), 'armhf')).toEqual({
        image: 'example/armhf-addon',
        version: 'example/armhf-addon:1.0.0',
        latest: 'example/armhf-addon:latest',
        test: 'example/armhf-addon:test',
      });
    });
  });

  describe('extraTags', () => {
    it('should list the requested extra tags', () => {
      expect(extraTags(createBuildConfig(), 'amd64')).toEqual([]);
      expect(extraTags(createBuildConfig({ tagLatest: true, tagTest: true }), 'amd64')).toEqual([
        'example/amd64-addon:latest',
        'example/amd64-addon:test',
      ]);
    });
  });

  describe('partitionExtraArgs', () => {
    it('should pass only declared build arguments', () => {
      const config = createBuildConfig({ extraBuildArgs: { TOOL_VERSION: '2', UNUSED: '3' } });

      expect(partitionExtraArgs(config, inventory('TOOL_VERSION'))).toEqual({
        declared: [['TOOL_VERSION', '2']],
        undeclared: ['UNUSED'],
      });
    });
  });

  describe('createBuildRequest', () => {
    it('should include fixed, declared metadata and declared extra arguments', () => {
      const config = createBuildConfig({ extraBuildArgs: { TOOL_VERSION: '2', UNUSED: '3' } });

      const request = createBuildRequest(config, 'armhf', {
        dockerfile: 'FROM example/base:armhf\n',
        inventory: inventory('BUILD_VERSION', 'BUILD_NAME', 'TOOL_VERSION'),
        buildDate: BUILD_DATE,
        useCache: true,
      });

      expect(request).toEqual({
        context: '/work/addon',
        dockerfile: 'FROM example/base:armhf\n',
        tag: 'example/armhf-addon:1.0.0',
        pull: true,
        squash: false,
        cacheFrom: 'example/armhf-addon:latest',
        buildArgs: [
          ['BUILD_FROM', 'example/base:armhf'],
          ['BUILD_DATE', BUILD_DATE],
          ['BUILD_ARCH', 'armhf'],
          ['BUILD_NAME', 'Example Addon'],
          ['BUILD_VERSION', '1.0.0'],
          ['TOOL_VERSION', '2'],
        ],
      });
    });

    it('should omit the cache source when caching is off', () => {
      const request = createBuildRequest(createBuildConfig(), 'amd64', {
        dockerfile: '',
        inventory: inventory(),
        buildDate: BUILD_DATE,
        useCache: false,
      });

      expect(request.cacheFrom).toBeUndefined();
    });
  });

  describe('createBuildPlan', () => {
    it('should describe every architecture', () => {
      const config = createBuildConfig({ tagTest: true, extraBuildArgs: { UNUSED: '1' } });

      const plan = createBuildPlan(config, 'FROM x\n', inventory(), BUILD_DATE);

      expect(plan.undeclaredArgs).toEqual(['UNUSED']);
      expect(plan.architectures.map(({ architecture, baseImage, tags }) => ({ architecture, baseImage, tags }))).toEqual([
        {
          architecture: 'amd64',
          baseImage: 'example/base:amd64',
          tags: ['example/amd64-addon:1.0.0', 'example/amd64-addon:test'],
        },
        {
          architecture: 'armhf',
          baseImage: 'example/base:armhf',
          tags: ['example/armhf-addon:1.0.0', 'example/armhf-addon:test'],
        },
      ]);
      expect(plan.architectures[0]?.request).not.toHaveProperty('dockerfile');
    });
  });
});

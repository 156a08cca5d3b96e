import { describe, it, expect } from '@jest/globals';
import { buildArguments, createDockerCli, type BuildRequest } from '../../../src/infrastructure/docker/cli';
import { FakeRunner, createTestLogger, result } from '../../utils/test-helpers';

const REQUEST: BuildRequest = {
  context: '/work/addon',
  dockerfile: 'FROM example/base\n',
  tag: 'example/amd64-addon:1.0.0',
  pull: true,
  squash: false,
  cacheFrom: 'example/amd64-addon:latest',
  buildArgs: [
    ['BUILD_FROM', 'example/base:amd64'],
    ['BUILD_ARCH', 'amd64'],
  ],
};

describe('docker cli', () => {
  describe('buildArguments', () => {
    it('should translate a build request', () => {
      expect(buildArguments(REQUEST)).toEqual([
        'build',
        '--pull',
        '--tag',
        'example/amd64-addon:1.0.0',
        '--cache-from',
        'example/amd64-addon:latest',
        '--build-arg',
        'BUILD_FROM=example/base:amd64',
        '--build-arg',
        'BUILD_ARCH=amd64',
        '--file',
        '-',
        '/work/addon',
      ]);
    });

    it('should disable the cache and squash when requested', () => {
      const args = buildArguments({ ...REQUEST, cacheFrom: undefined, squash: true, buildArgs: [] });

      expect(args).toEqual(['build', '--pull', '--tag', 'example/amd64-addon:1.0.0', '--squash', '--no-cache', '--file', '-', '/work/addon']);
    });
  });

  describe('createDockerCli', () => {
    it('should feed the Dockerfile on stdin and stream output lines', async () => {
      const runner = new FakeRunner((_command, _args, options) => {
        options?.onLine?.('Step 1/2 : FROM example/base', 'stdout');
        return result();
      });
      const lines: string[] = [];

      await createDockerCli(runner, createTestLogger(), 'docker-test').build(REQUEST, (line) => lines.push(line));

      expect(runner.calls[0]?.command).toBe('docker-test');
      expect(runner.calls[0]?.options?.input).toBe('FROM example/base\n');
      expect(runner.calls[0]?.options?.timeout).toBe(0);
      expect(lines).toEqual(['Step 1/2 : FROM example/base']);
    });

    it('should run tag and push with the image references', async () => {
      const runner = new FakeRunner();
      const docker = createDockerCli(runner, createTestLogger());

      await docker.pull('example/amd64-addon:latest');
      await docker.tag('example/amd64-addon:1.0.0', 'example/amd64-addon:latest');
      await docker.push('example/amd64-addon:latest');

      expect(runner.commandLines()).toEqual([
        'docker pull example/amd64-addon:latest',
        'docker tag example/amd64-addon:1.0.0 example/amd64-addon:latest',
        'docker push example/amd64-addon:latest',
      ]);
    });

    it('should report daemon availability from docker info', async () => {
      const up = createDockerCli(new FakeRunner(), createTestLogger());
      const down = createDockerCli(new FakeRunner(() => result({ exitCode: 1 })), createTestLogger());
      const broken = createDockerCli(
        new FakeRunner(() => {
          throw new Error('spawn docker ENOENT');
        }),
        createTestLogger(),
      );

      await expect(up.info()).resolves.toBe(true);
      await expect(down.info()).resolves.toBe(false);
      await expect(broken.info()).resolves.toBe(false);
    });
  });
});

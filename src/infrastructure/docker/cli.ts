/**
 * Docker CLI client
 *
 * Talks to the daemon exclusively through the `docker` command line so that
 * the daemon started by the build environment (or any daemon DOCKER_HOST
 * points at) is used without extra configuration.
 */

import type { Logger } from 'pino';
import type { CommandResult, CommandRunner } from '../command-executor';

export type LineSink = (line: string) => void;

/**
 * A single `docker build` invocation
 */
export interface BuildRequest {
  /** Build context directory */
  context: string;
  /** Dockerfile text, fed on stdin */
  dockerfile: string;
  /** Full image reference the result is tagged with */
  tag: string;
  pull: boolean;
  squash: boolean;
  /** Image used as layer cache; absent means --no-cache */
  cacheFrom?: string;
  /** Ordered build arguments */
  buildArgs: ReadonlyArray<readonly [string, string]>;
}

/**
 * Operations the orchestrator needs from the container engine
 */
export interface ContainerEngine {
  info(): Promise<boolean>;
  pull(image: string, output?: LineSink): Promise<CommandResult>;
  build(request: BuildRequest, output?: LineSink): Promise<CommandResult>;
  tag(source: string, target: string, output?: LineSink): Promise<CommandResult>;
  push(image: string, output?: LineSink): Promise<CommandResult>;
}

/**
 * Translate a build request into `docker` arguments
 */
export function buildArguments(request: BuildRequest): string[] {
  const args = ['build'];

  if (request.pull) args.push('--pull');
  args.push('--tag', request.tag);
  if (request.squash) args.push('--squash');

  if (request.cacheFrom) {
    args.push('--cache-from', request.cacheFrom);
  } else {
    args.push('--no-cache');
  }

  for (const [name, value] of request.buildArgs) {
    args.push('--build-arg', `${name}=${value}`);
  }

  args.push('--file', '-', request.context);
  return args;
}

/**
 * Create a Docker client backed by the docker binary
 */
export function createDockerCli(
  runner: CommandRunner,
  logger: Logger,
  binary = 'docker',
): ContainerEngine {
  const log = logger.child({ component: 'DockerCli' });

  // Long running commands: no timeout, output streamed to the caller
  const stream = (args: string[], output?: LineSink, input?: string): Promise<CommandResult> =>
    runner.execute(binary, args, {
      timeout: 0,
      input,
      onLine: output ? (line) => output(line) : undefined,
    });

  return {
    async info(): Promise<boolean> {
      try {
        const result = await runner.execute(binary, ['info'], { timeout: 10000 });
        return result.exitCode === 0;
      } catch (error) {
        log.debug({ error: error instanceof Error ? error.message : String(error) }, 'docker info failed');
        return false;
      }
    },

    pull(image: string, output?: LineSink): Promise<CommandResult> {
      log.debug({ image }, 'Pulling image');
      return stream(['pull', image], output);
    },

    build(request: BuildRequest, output?: LineSink): Promise<CommandResult> {
      const args = buildArguments(request);
      log.debug({ args }, 'Building image');
      return stream(args, output, request.dockerfile);
    },

    tag(source: string, target: string, output?: LineSink): Promise<CommandResult> {
      log.debug({ source, target }, 'Tagging image');
      return stream(['tag', source, target], output);
    },

    push(image: string, output?: LineSink): Promise<CommandResult> {
      log.debug({ image }, 'Pushing image');
      return stream(['push', image], output);
    },
  };
}

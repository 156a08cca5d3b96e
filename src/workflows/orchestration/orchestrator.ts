/**
 * Build Orchestrator
 *
 * Runs the warm-up, build, tag and push phases for every architecture.
 * Phases are barriers: a phase starts once every task of the previous one
 * has settled.
 */

import type { AugmentedDockerfile } from '../../dockerfile/augment';
import type {
  Architecture,
  ArchitectureBuildResult,
  BuildConfig,
  OrchestrationReport,
} from '../../domain/types/build';
import { ExitCode } from '../../domain/types/errors';
import type { Result } from '../../domain/types/result';
import type { ContainerEngine, LineSink } from '../../infrastructure/docker/cli';
import { createTimer, type Logger } from '../../lib/logger';
import { buildImage } from '../../tools/build-image';
import { pushImage } from '../../tools/push-image';
import { tagImage } from '../../tools/tag-image';
import type { ToolContext } from '../../tools/types';
import { warmupCache } from '../../tools/warmup-cache';
import { firstFailure, runPhase, type PhaseOutcome } from './fan-out';
import { createBuildRequest, extraTags, formatBuildDate, imageTags, partitionExtraArgs } from './plan';

export interface OrchestratorDeps {
  engine: ContainerEngine;
  logger: Logger;
  /** Receives every prefixed output line; defaults to stdout */
  write?: (line: string) => void;
  now?: () => Date;
}

/**
 * Sink that prefixes every line with the architecture
 */
export const prefixedSink =
  (arch: Architecture, write: (line: string) => void): LineSink =>
  (line) =>
    write(`[${arch}] ${line}`);

const statusOf = (result: Result<unknown>): number => (result.ok ? 0 : (result.exitCode ?? 1));

export async function orchestrateBuild(
  config: BuildConfig,
  dockerfile: AugmentedDockerfile,
  deps: OrchestratorDeps,
): Promise<OrchestrationReport> {
  const write = deps.write ?? ((line: string) => process.stdout.write(`${line}\n`));
  const logger = deps.logger.child({ component: 'Orchestrator' });
  const buildDate = formatBuildDate((deps.now ?? (() => new Date()))());
  const { architectures, parallel } = config;

  const results = new Map<Architecture, ArchitectureBuildResult>(
    architectures.map((architecture) => [architecture, { architecture }]),
  );
  const report = (exitCode: number, cacheUsed: boolean): OrchestrationReport => ({
    exitCode,
    cacheUsed,
    results: [...results.values()],
  });
  const record = <T>(outcomes: PhaseOutcome<T>[], phase: 'build' | 'tag' | 'push'): void => {
    for (const { architecture, result } of outcomes) {
      const entry = results.get(architecture);
      if (entry) entry[phase] = statusOf(result);
      if (!result.ok) logger.error({ arch: architecture, phase, error: result.error }, `${phase} failed`);
    }
  };
  const contextFor = (arch: Architecture): ToolContext => ({
    engine: deps.engine,
    logger: deps.logger,
    output: prefixedSink(arch, write),
  });

  const { undeclared } = partitionExtraArgs(config, dockerfile.inventory);
  if (undeclared.length > 0) {
    logger.warn({ args: undeclared }, 'Build arguments not declared by the Dockerfile are not passed');
  }

  // Warm-up decides caching for the whole run
  let useCache = config.cacheEnabled;
  if (useCache) {
    const timer = createTimer(logger, 'warmup');
    const outcomes = await runPhase(
      architectures,
      (arch) => warmupCache({ architecture: arch, image: imageTags(config, arch).latest }, contextFor(arch)),
      { parallel, failFast: false },
    );
    if (firstFailure(outcomes)) {
      logger.warn('Cache warm-up failed, building without cache');
      useCache = false;
    }
    timer.end({ useCache });
  }

  const buildTimer = createTimer(logger, 'build', { architectures, parallel });
  const builds = await runPhase(
    architectures,
    (arch) =>
      buildImage(
        {
          architecture: arch,
          request: createBuildRequest(config, arch, {
            dockerfile: dockerfile.text,
            inventory: dockerfile.inventory,
            buildDate,
            useCache,
          }),
        },
        contextFor(arch),
      ),
    { parallel, failFast: true },
  );
  record(builds, 'build');
  if (firstFailure(builds) || builds.length < architectures.length) {
    buildTimer.error('build failed');
    return report(ExitCode.DOCKER_BUILD, useCache);
  }
  buildTimer.end();

  const tagged = architectures.filter((arch) => extraTags(config, arch).length > 0);
  if (tagged.length > 0) {
    const tags = await runPhase(
      tagged,
      (arch) =>
        tagImage(
          { architecture: arch, source: imageTags(config, arch).version, tags: extraTags(config, arch) },
          contextFor(arch),
        ),
      { parallel, failFast: false },
    );
    record(tags, 'tag');
    if (firstFailure(tags)) {
      return report(ExitCode.DOCKER_TAG, useCache);
    }
  }

  if (config.push) {
    const pushTimer = createTimer(logger, 'push');
    const pushes = await runPhase(
      architectures,
      (arch) =>
        pushImage(
          { architecture: arch, tags: [imageTags(config, arch).version, ...extraTags(config, arch)] },
          contextFor(arch),
        ),
      { parallel, failFast: true },
    );
    record(pushes, 'push');
    if (firstFailure(pushes) || pushes.length < architectures.length) {
      pushTimer.error('push failed');
      return report(ExitCode.DOCKER_PUSH, useCache);
    }
    pushTimer.end();
  }

  return report(ExitCode.OK, useCache);
}

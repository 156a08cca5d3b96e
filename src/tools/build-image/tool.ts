/**
 * Build Image Tool
 *
 * Runs a single `docker build` for one architecture
 */

import type { BuildRequest } from '../../infrastructure/docker/cli';
import { createTimer } from '../../lib/logger';
import { Failure, Success, type Result } from '../../domain/types/result';
import type { ArchitectureParams, ToolContext } from '../types';

export interface BuildImageParams extends ArchitectureParams {
  request: BuildRequest;
}

export interface BuildImageResult {
  tag: string;
  /** Whether the build used a cache source */
  cached: boolean;
}

export async function buildImage(
  params: BuildImageParams,
  context: ToolContext,
): Promise<Result<BuildImageResult>> {
  const { architecture, request } = params;
  const logger = context.logger.child({ arch: architecture });
  const timer = createTimer(logger, 'build-image', { tag: request.tag });

  logger.info({ base: request.buildArgs.find(([name]) => name === 'BUILD_FROM')?.[1] }, 'Starting image build');

  try {
    const result = await context.engine.build(request, context.output);
    if (result.exitCode !== 0) {
      timer.error(`docker build exited with ${result.exitCode}`);
      return Failure(`Build of ${request.tag} failed`, result.exitCode);
    }

    timer.end();
    return Success({ tag: request.tag, cached: request.cacheFrom !== undefined });
  } catch (error) {
    timer.error(error);
    return Failure(error instanceof Error ? error.message : String(error));
  }
}

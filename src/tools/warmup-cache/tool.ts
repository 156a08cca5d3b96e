/**
 * Warm-up Cache Tool
 *
 * Pulls the previous `latest` image so the build can use it as cache source
 */

import { createTimer } from '../../lib/logger';
import { Failure, Success, type Result } from '../../domain/types/result';
import type { ArchitectureParams, ToolContext } from '../types';

export interface WarmupCacheParams extends ArchitectureParams {
  /** Image reference to pull, usually `<image>:latest` */
  image: string;
}

export interface WarmupCacheResult {
  image: string;
}

export async function warmupCache(
  params: WarmupCacheParams,
  context: ToolContext,
): Promise<Result<WarmupCacheResult>> {
  const { architecture, image } = params;
  const logger = context.logger.child({ arch: architecture });
  const timer = createTimer(logger, 'warmup-cache', { image });

  try {
    const result = await context.engine.pull(image, context.output);
    if (result.exitCode !== 0) {
      timer.error(result.stderr, { exitCode: result.exitCode });
      return Failure(`Cannot pull ${image} for cache`, result.exitCode);
    }

    timer.end();
    return Success({ image });
  } catch (error) {
    timer.error(error);
    return Failure(error instanceof Error ? error.message : String(error));
  }
}

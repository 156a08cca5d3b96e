/**
 * Push Image Tool
 *
 * Pushes the version tag first, then any extra tags
 */

import { createTimer } from '../../lib/logger';
import { Failure, Success, type Result } from '../../domain/types/result';
import type { ArchitectureParams, ToolContext } from '../types';

export interface PushImageParams extends ArchitectureParams {
  /** Image references in push order */
  tags: string[];
}

export interface PushImageResult {
  pushedTags: string[];
}

export async function pushImage(params: PushImageParams, context: ToolContext): Promise<Result<PushImageResult>> {
  const { architecture, tags } = params;
  const logger = context.logger.child({ arch: architecture });
  const timer = createTimer(logger, 'push-image');
  const pushedTags: string[] = [];

  try {
    for (const tag of tags) {
      const result = await context.engine.push(tag, context.output);
      if (result.exitCode !== 0) {
        timer.error(result.stderr, { tag, pushedTags });
        return Failure(`Push of ${tag} failed`, result.exitCode);
      }
      pushedTags.push(tag);
    }

    timer.end({ pushedTags });
    return Success({ pushedTags });
  } catch (error) {
    timer.error(error, { pushedTags });
    return Failure(error instanceof Error ? error.message : String(error));
  }
}

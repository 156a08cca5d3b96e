/**
 * Tag Image Tool
 *
 * Adds the extra tags (`latest`, `test`) to a freshly built image
 */

import { createTimer } from '../../lib/logger';
import { Failure, Success, type Result } from '../../domain/types/result';
import type { ArchitectureParams, ToolContext } from '../types';

export interface TagImageParams extends ArchitectureParams {
  source: string;
  tags: string[];
}

export interface TagImageResult {
  tags: string[];
}

export async function tagImage(params: TagImageParams, context: ToolContext): Promise<Result<TagImageResult>> {
  const { architecture, source, tags } = params;
  const logger = context.logger.child({ arch: architecture });
  const timer = createTimer(logger, 'tag-image', { source });

  try {
    for (const tag of tags) {
      const result = await context.engine.tag(source, tag, context.output);
      if (result.exitCode !== 0) {
        timer.error(result.stderr, { tag });
        return Failure(`Cannot tag ${source} as ${tag}`, result.exitCode);
      }
    }

    timer.end({ tags });
    return Success({ tags });
  } catch (error) {
    timer.error(error);
    return Failure(error instanceof Error ? error.message : String(error));
  }
}

/**
 * Shared types for tools to prevent circular dependencies
 */

import type { Architecture } from '../domain/types/build';
import type { ContainerEngine, LineSink } from '../infrastructure/docker/cli';
import type { Logger } from '../lib/logger';

/**
 * What every per-architecture tool runs against
 */
export interface ToolContext {
  engine: ContainerEngine;
  logger: Logger;
  /** Receives the docker output lines for this architecture */
  output?: LineSink;
}

export interface ArchitectureParams {
  architecture: Architecture;
}

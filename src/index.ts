/**
 * Main export file for programmatic use
 * Provides the readers, resolver, augmenter and orchestrator for callers that
 * drive a build without the CLI.
 */

export { runCli, type CliRuntime } from './cli/cli';
export { parseCliArguments } from './cli/args';

export { readManifests, parseManifest } from './sources/manifest';
export { readDockerfile, inspectDockerfile } from './sources/dockerfile';
export { readGitSource, normalizeRemoteUrl } from './sources/git';
export { resolveBuildConfig } from './resolver/resolve';
export { augmentDockerfile } from './dockerfile/augment';
export { orchestrateBuild } from './workflows/orchestration/orchestrator';
export { createBuildPlan, type BuildPlan } from './workflows/orchestration/plan';
export { runBuildWorkflow } from './workflows/build-workflow';
export {
  BuildEnvironmentManager,
  ExternalDaemonEnvironment,
  withBuildEnvironment,
  type BuildEnvironment,
} from './environment/lifecycle';

export { CommandExecutor, type CommandRunner } from './infrastructure/command-executor';
export { createDockerCli, type ContainerEngine } from './infrastructure/docker/cli';
export { createGitClient, type GitClient } from './infrastructure/git/client';
export { createEmulationHost, type EmulationHost } from './infrastructure/emulation';

export { ExitCode } from './domain/types/errors';
export { BuildError } from './lib/errors';
export type { Result } from './domain/types/result';
export type * from './domain/types/build';

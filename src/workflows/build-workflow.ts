/**
 * Build workflow
 *
 * clone (optional) → read sources → resolve → augment → dry-run plan, or
 * environment + orchestration.
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import { augmentDockerfile } from '../dockerfile/augment';
import type { CliFlags, OrchestrationReport } from '../domain/types/build';
import { ExitCode } from '../domain/types/errors';
import type { ContainerEngine } from '../infrastructure/docker/cli';
import type { GitClient } from '../infrastructure/git/client';
import { BuildError, GitError } from '../lib/errors';
import { createTimer, type Logger } from '../lib/logger';
import { resolveBuildConfig } from '../resolver/resolve';
import { dockerfilePath, readDockerfile } from '../sources/dockerfile';
import { readGitSource } from '../sources/git';
import { readManifests } from '../sources/manifest';
import { withBuildEnvironment, type BuildEnvironment } from '../environment/lifecycle';
import { orchestrateBuild } from './orchestration/orchestrator';
import { createBuildPlan, formatBuildDate, type BuildPlan } from './orchestration/plan';

export interface WorkflowDeps {
  git: GitClient;
  engine: ContainerEngine;
  logger: Logger;
  /** Created lazily, only when a build actually runs */
  createEnvironment: () => BuildEnvironment;
  /** Working directory the target is resolved against */
  cwd: string;
  /** Prefixed build output and the dry-run plan */
  write?: (line: string) => void;
  now?: () => Date;
}

export type WorkflowOutcome =
  | { kind: 'plan'; plan: BuildPlan }
  | { kind: 'build'; report: OrchestrationReport };

async function isEmptyDirectory(dir: string): Promise<boolean> {
  try {
    return (await fs.readdir(dir)).length === 0;
  } catch {
    return true;
  }
}

async function cloneRepository(flags: CliFlags, deps: WorkflowDeps, repository: string): Promise<void> {
  if (!(await isEmptyDirectory(deps.cwd))) {
    throw new BuildError('Working directory must be empty to clone a repository', ExitCode.NOT_EMPTY, {
      cwd: deps.cwd,
    });
  }

  const cloned = await deps.git.clone({ repository, branch: flags.branch, destination: deps.cwd });
  if (!cloned.ok) {
    throw new GitError(`Cannot clone ${repository}: ${cloned.output}`, ExitCode.GIT_CLONE, {
      repository,
      branch: flags.branch,
    });
  }
}

async function fileExists(file: string): Promise<boolean> {
  try {
    return (await fs.stat(file)).isFile();
  } catch {
    return false;
  }
}

export async function runBuildWorkflow(flags: CliFlags, deps: WorkflowDeps): Promise<WorkflowOutcome> {
  const logger = deps.logger.child({ component: 'Workflow' });
  const write = deps.write ?? ((line: string) => process.stdout.write(`${line}\n`));
  const timer = createTimer(logger, 'build-workflow');

  try {
    if (flags.repository) {
      await cloneRepository(flags, deps, flags.repository);
    }

    const target = path.resolve(deps.cwd, flags.target);
    if (!(await fileExists(dockerfilePath(target)))) {
      throw new BuildError('Dockerfile not found?', ExitCode.DOCKERFILE, { target });
    }

    const manifest = await readManifests(target);
    const git = await readGitSource(
      target,
      deps.git,
      { useGit: flags.useGit, dirtyPolicy: flags.dirtyPolicy },
      logger,
    );
    const dockerfile = await readDockerfile(target);

    const { config, notices } = resolveBuildConfig({
      cli: { ...flags, target },
      manifest: manifest.values,
      dockerfile,
      git,
    });
    for (const notice of [...manifest.notices, ...git.notices, ...notices]) {
      logger.warn(notice);
    }

    const augmented = augmentDockerfile(config, dockerfile.text, dockerfile.inventory);

    if (flags.dryRun) {
      const plan = createBuildPlan(
        config,
        augmented.text,
        augmented.inventory,
        formatBuildDate((deps.now ?? (() => new Date()))()),
      );
      write(JSON.stringify(plan, null, 2));
      timer.end({ dryRun: true });
      return { kind: 'plan', plan };
    }

    const report = await withBuildEnvironment(deps.createEnvironment(), () =>
      orchestrateBuild(config, augmented, { engine: deps.engine, logger: deps.logger, write, now: deps.now }),
    );

    timer.end({ exitCode: report.exitCode, cacheUsed: report.cacheUsed });
    return { kind: 'build', report };
  } catch (error) {
    timer.error(error);
    throw error;
  }
}

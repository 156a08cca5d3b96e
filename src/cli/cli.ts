/**
 * multiarch-build CLI
 * Wires the infrastructure clients together, runs the build workflow and
 * turns its outcome into a process exit code.
 */

import { CommanderError } from 'commander';
import { createConfig, type AppConfig } from '../config/index';
import { ExitCode } from '../domain/types/errors';
import {
  BuildEnvironmentManager,
  ExternalDaemonEnvironment,
  type BuildEnvironment,
} from '../environment/lifecycle';
import { CommandExecutor, type CommandRunner } from '../infrastructure/command-executor';
import { createDockerCli } from '../infrastructure/docker/cli';
import { createEmulationHost } from '../infrastructure/emulation';
import { createGitClient } from '../infrastructure/git/client';
import { exitCodeOf, renderError } from '../lib/errors';
import { createLogger, type Logger } from '../lib/logger';
import { runBuildWorkflow } from '../workflows/build-workflow';
import { parseCliArguments } from './args';
import type { CliFlags } from '../domain/types/build';

export interface CliRuntime {
  runner?: CommandRunner;
  logger?: Logger;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  stdout?: (line: string) => void;
  stderr?: (line: string) => void;
  now?: () => Date;
  /** Install SIGINT/SIGTERM handlers for the duration of the run (default true) */
  handleSignals?: boolean;
}

const SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

function parseFlags(args: readonly string[]): CliFlags | ExitCode {
  try {
    return parseCliArguments(args);
  } catch (error) {
    if (error instanceof CommanderError) {
      // commander has already printed help, version or the usage error
      return error.exitCode === 0 ? ExitCode.OK : ExitCode.UNKNOWN;
    }
    throw error;
  }
}

/**
 * Run the CLI with user arguments; resolves to the process exit code
 */
export async function runCli(args: readonly string[], runtime: CliRuntime = {}): Promise<number> {
  const stdout = runtime.stdout ?? ((line: string) => process.stdout.write(`${line}\n`));
  const stderr = runtime.stderr ?? ((line: string) => process.stderr.write(`${line}\n`));

  const flags = parseFlags(args);
  if (typeof flags === 'number') return flags;

  let config: AppConfig;
  try {
    config = createConfig(runtime.env ?? process.env);
  } catch (error) {
    stderr(renderError(error));
    return ExitCode.UNKNOWN;
  }

  const logger = runtime.logger ?? createLogger({ level: flags.logLevel ?? config.logLevel });
  const runner = runtime.runner ?? new CommandExecutor(logger);
  const engine = createDockerCli(runner, logger, config.binaries.docker);
  const git = createGitClient(runner, logger, config.binaries.git);

  let environment: BuildEnvironment | undefined;
  const createEnvironment = (): BuildEnvironment => {
    environment = flags.externalDaemon
      ? new ExternalDaemonEnvironment(engine, logger)
      : new BuildEnvironmentManager({
          runner,
          engine,
          emulation: createEmulationHost(runner, logger),
          logger,
          daemon: {
            binary: config.binaries.dockerd,
            timeoutMs: config.daemon.timeoutMs,
            pollIntervalMs: config.daemon.pollIntervalMs,
          },
        });
    return environment;
  };

  const onSignal = (signal: NodeJS.Signals): void => {
    logger.warn({ signal }, 'Interrupted, tearing down the build environment');
    void (environment?.release() ?? Promise.resolve())
      .catch((error: unknown) => {
        stderr(renderError(error));
      })
      .finally(() => process.exit(ExitCode.INTERRUPTED));
  };

  const handleSignals = runtime.handleSignals ?? true;
  if (handleSignals) {
    for (const signal of SIGNALS) process.on(signal, onSignal);
  }

  try {
    const outcome = await runBuildWorkflow(flags, {
      git,
      engine,
      logger,
      createEnvironment,
      cwd: runtime.cwd ?? process.cwd(),
      write: stdout,
      now: runtime.now,
    });
    return outcome.kind === 'plan' ? ExitCode.OK : outcome.report.exitCode;
  } catch (error) {
    logger.debug({ error: error instanceof Error ? error.message : String(error) }, 'Build aborted');
    stderr(renderError(error));
    return exitCodeOf(error);
  } finally {
    if (handleSignals) {
      for (const signal of SIGNALS) process.off(signal, onSignal);
    }
  }
}

/**
 * Build environment lifecycle
 *
 * Owns everything a build needs from the host: cross-architecture emulation
 * and a private Docker daemon. Release runs at most once, whichever of
 * normal completion, failure or an interrupt gets there first.
 */

import { DEFAULT_TIMEOUTS } from '../config/defaults';
import { ExitCode } from '../domain/types/errors';
import type { BackgroundProcess, CommandRunner } from '../infrastructure/command-executor';
import type { ContainerEngine } from '../infrastructure/docker/cli';
import type { EmulationHost } from '../infrastructure/emulation';
import { DaemonTimeoutError, EnvironmentError, PollTimeoutError } from '../lib/errors';
import type { Logger } from '../lib/logger';
import { pollUntil } from '../shared/async';

export interface BuildEnvironment {
  acquire(): Promise<void>;
  release(): Promise<void>;
}

export interface DaemonOptions {
  binary?: string;
  timeoutMs?: number;
  pollIntervalMs?: number;
}

export interface EnvironmentDeps {
  runner: CommandRunner;
  engine: ContainerEngine;
  emulation: EmulationHost;
  logger: Logger;
  daemon?: DaemonOptions;
}

/**
 * Manages emulation and a dockerd started for the duration of the build
 */
export class BuildEnvironmentManager implements BuildEnvironment {
  private readonly log: Logger;
  private readonly binary: string;
  private readonly timeoutMs: number;
  private readonly pollIntervalMs: number;
  private daemon: BackgroundProcess | undefined;
  private emulationEnabled = false;
  private acquiring: Promise<void> | undefined;
  private released: Promise<void> | undefined;

  constructor(private readonly deps: EnvironmentDeps) {
    this.log = deps.logger.child({ component: 'BuildEnvironment' });
    this.binary = deps.daemon?.binary ?? 'dockerd';
    this.timeoutMs = deps.daemon?.timeoutMs ?? DEFAULT_TIMEOUTS.daemon;
    this.pollIntervalMs = deps.daemon?.pollIntervalMs ?? DEFAULT_TIMEOUTS.daemonPoll;
  }

  acquire(): Promise<void> {
    this.acquiring = this.setUp();
    return this.acquiring;
  }

  /**
   * Tear everything down. Later calls wait for the first one and report its outcome.
   * An acquire still in flight is allowed to settle first.
   */
  release(): Promise<void> {
    this.released ??= this.teardownAfterAcquire();
    return this.released;
  }

  private async setUp(): Promise<void> {
    if (!(await this.deps.emulation.hasPrivileges())) {
      throw new EnvironmentError('The builder needs to run in privileged mode', ExitCode.PRIVILEGES);
    }

    const enabled = await this.deps.emulation.enable();
    if (!enabled.ok) {
      throw new EnvironmentError(`Cannot enable cross compile features: ${enabled.error}`, ExitCode.CROSS);
    }
    this.emulationEnabled = true;

    await this.startDaemon();
  }

  private async startDaemon(): Promise<void> {
    this.log.info('Starting docker daemon');
    this.daemon = this.deps.runner.spawnBackground(this.binary, ['--experimental=true']);

    try {
      await pollUntil(() => this.deps.engine.info(), {
        intervalMs: this.pollIntervalMs,
        timeoutMs: this.timeoutMs,
        message: 'Docker did not start in time',
      });
    } catch (error) {
      if (error instanceof PollTimeoutError) {
        throw new DaemonTimeoutError(error.message, ExitCode.DOCKER_TIMEOUT, error.timeoutMs);
      }
      throw error;
    }
    this.log.info({ pid: this.daemon.pid }, 'Docker daemon is ready');
  }

  private async stopDaemon(): Promise<void> {
    const daemon = this.daemon;
    if (!daemon?.isRunning()) {
      this.log.info('Docker daemon already stopped');
      return;
    }

    this.log.info({ pid: daemon.pid }, 'Stopping docker daemon');
    daemon.kill('SIGTERM');

    try {
      await pollUntil(() => !daemon.isRunning(), {
        intervalMs: this.pollIntervalMs,
        timeoutMs: this.timeoutMs,
        message: 'Docker did not shut down in time',
      });
    } catch (error) {
      if (error instanceof PollTimeoutError) {
        throw new DaemonTimeoutError(error.message, ExitCode.DOCKER_DIE, error.timeoutMs);
      }
      throw error;
    }
  }

  private async disableEmulation(): Promise<void> {
    if (!this.emulationEnabled) return;
    const disabled = await this.deps.emulation.disable();
    if (!disabled.ok) {
      throw new EnvironmentError(`Cannot disable cross compile features: ${disabled.error}`, ExitCode.CROSS);
    }
    this.emulationEnabled = false;
  }

  private async teardownAfterAcquire(): Promise<void> {
    // an acquire failure is reported to whoever awaited acquire()
    await this.acquiring?.catch((error: unknown) => {
      this.log.debug({ error: error instanceof Error ? error.message : String(error) }, 'Acquire failed before release');
    });
    await this.teardown();
  }

  private async teardown(): Promise<void> {
    const failures: unknown[] = [];

    for (const step of [() => this.stopDaemon(), () => this.disableEmulation()]) {
      try {
        await step();
      } catch (error) {
        this.log.error({ error: error instanceof Error ? error.message : String(error) }, 'Teardown step failed');
        failures.push(error);
      }
    }

    if (failures.length > 0) {
      throw failures[0];
    }
  }
}

/**
 * Uses a daemon that is already running; nothing to set up or tear down
 */
export class ExternalDaemonEnvironment implements BuildEnvironment {
  constructor(
    private readonly engine: ContainerEngine,
    private readonly logger: Logger,
  ) {}

  async acquire(): Promise<void> {
    if (!(await this.engine.info())) {
      throw new EnvironmentError('No running Docker daemon is reachable', ExitCode.DOCKER_UNAVAILABLE);
    }
    this.logger.info('Using the running docker daemon');
  }

  async release(): Promise<void> {}
}

/**
 * Run `fn` inside an acquired environment, releasing it however `fn` ends.
 * An error from `fn` takes precedence over a release error.
 */
export async function withBuildEnvironment<T>(environment: BuildEnvironment, fn: () => Promise<T>): Promise<T> {
  let value: T;
  try {
    await environment.acquire();
    value = await fn();
  } catch (error) {
    await environment.release().catch(() => undefined);
    throw error;
  }
  await environment.release();
  return value;
}

/**
 * Cross-architecture emulation (QEMU through binfmt_misc)
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { Logger } from 'pino';
import { DEFAULT_EMULATION } from '../config/defaults';
import { Failure, Success, type Result } from '../domain/types/result';
import type { CommandRunner } from './command-executor';

export interface EmulationHost {
  /** Whether the process may create network interfaces, i.e. runs privileged */
  hasPrivileges(): Promise<boolean>;
  enable(): Promise<Result<void>>;
  disable(): Promise<Result<void>>;
}

export interface EmulationOptions {
  binfmtPath?: string;
  handlers?: readonly string[];
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

export function createEmulationHost(
  runner: CommandRunner,
  logger: Logger,
  options: EmulationOptions = {},
): EmulationHost {
  const { binfmtPath = DEFAULT_EMULATION.binfmtPath, handlers = DEFAULT_EMULATION.handlers } = options;
  const log = logger.child({ component: 'Emulation' });

  const run = async (command: string, args: string[]): Promise<Result<void>> => {
    try {
      const result = await runner.execute(command, args);
      if (result.exitCode !== 0) {
        return Failure(`${command} ${args.join(' ')} failed: ${result.stderr}`, result.exitCode);
      }
      return Success(undefined);
    } catch (error) {
      return Failure(`${command} ${args.join(' ')} failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  };

  const updateHandlers = async (action: '--enable' | '--disable'): Promise<Result<void>> => {
    for (const handler of handlers) {
      const result = await run('update-binfmts', [action, handler]);
      if (!result.ok) return result;
    }
    return Success(undefined);
  };

  return {
    async hasPrivileges(): Promise<boolean> {
      const added = await run('ip', ['link', 'add', 'dummy0', 'type', 'dummy']);
      if (!added.ok) {
        log.debug({ error: added.error }, 'Privilege probe failed');
        return false;
      }
      await run('ip', ['link', 'delete', 'dummy0']);
      return true;
    },

    async enable(): Promise<Result<void>> {
      log.info('Enabling cross compile features');
      const mounted = await run('mount', ['binfmt_misc', '-t', 'binfmt_misc', binfmtPath]);
      if (!mounted.ok) return mounted;
      return updateHandlers('--enable');
    },

    async disable(): Promise<Result<void>> {
      log.info('Disabling cross compile features');
      if (await exists(path.join(binfmtPath, 'status'))) {
        const unmounted = await run('umount', ['binfmt_misc']);
        if (!unmounted.ok) return unmounted;
      }
      return updateHandlers('--disable');
    },
  };
}

/**
 * Application configuration
 *
 * Runtime settings come from environment variables; build settings come
 * from the command line and the sources read by the resolver.
 */

import { z } from 'zod';
import { DEFAULT_TIMEOUTS } from './defaults';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const EnvironmentSchema = z.object({
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  MULTIARCH_DOCKER_BIN: z.string().min(1).default('docker'),
  MULTIARCH_DOCKERD_BIN: z.string().min(1).default('dockerd'),
  MULTIARCH_GIT_BIN: z.string().min(1).default('git'),
  MULTIARCH_DAEMON_TIMEOUT: z.coerce.number().int().positive().default(DEFAULT_TIMEOUTS.daemon),
  MULTIARCH_POLL_INTERVAL: z.coerce.number().int().positive().default(DEFAULT_TIMEOUTS.daemonPoll),
});

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface AppConfig {
  logLevel: LogLevel;
  binaries: {
    docker: string;
    dockerd: string;
    git: string;
  };
  daemon: {
    timeoutMs: number;
    pollIntervalMs: number;
  };
}

/**
 * Build the application configuration from environment variables
 */
export function createConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvironmentSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid environment configuration: ${issues.join('; ')}`);
  }

  const values = parsed.data;
  return {
    logLevel: values.LOG_LEVEL,
    binaries: {
      docker: values.MULTIARCH_DOCKER_BIN,
      dockerd: values.MULTIARCH_DOCKERD_BIN,
      git: values.MULTIARCH_GIT_BIN,
    },
    daemon: {
      timeoutMs: values.MULTIARCH_DAEMON_TIMEOUT,
      pollIntervalMs: values.MULTIARCH_POLL_INTERVAL,
    },
  };
}

const LogLevelSchema = z.enum(LOG_LEVELS);

export const isLogLevel = (value: string): value is LogLevel => LogLevelSchema.safeParse(value).success;

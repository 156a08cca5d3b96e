/**
 * Structured Error Classes for the builder
 *
 * Every fatal condition is a BuildError carrying the process exit code it
 * maps to, so the CLI can translate any failure into a documented status.
 */

import { ExitCode } from '../domain/types/errors';

/**
 * Base error class for all builder errors
 */
export class BuildError extends Error {
  public readonly exitCode: ExitCode;
  public readonly details: Record<string, unknown>;
  public override readonly cause: Error | undefined;

  constructor(
    message: string,
    exitCode: ExitCode = ExitCode.UNKNOWN,
    details?: Record<string, unknown>,
    cause?: Error,
  ) {
    super(message);
    this.name = 'BuildError';
    this.exitCode = exitCode;
    this.details = details ?? {};
    this.cause = cause;

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert to plain object for structured logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      exitCode: this.exitCode,
      details: this.details,
      cause: this.cause ? { message: this.cause.message } : undefined,
    };
  }
}

/**
 * Input errors detected before any side effect (flags, manifest, Dockerfile)
 */
export class ValidationError extends BuildError {
  constructor(message: string, exitCode: ExitCode, details?: Record<string, unknown>) {
    super(message, exitCode, details);
    this.name = 'ValidationError';
  }
}

export class ManifestError extends BuildError {
  constructor(message: string, file: string, cause?: Error) {
    super(message, ExitCode.INVALID_MANIFEST, { file }, cause);
    this.name = 'ManifestError';
  }
}

export class DockerfileError extends BuildError {
  constructor(message: string, exitCode: ExitCode = ExitCode.DOCKERFILE, details?: Record<string, unknown>) {
    super(message, exitCode, details);
    this.name = 'DockerfileError';
  }
}

export class GitError extends BuildError {
  constructor(message: string, exitCode: ExitCode = ExitCode.GIT, details?: Record<string, unknown>) {
    super(message, exitCode, details);
    this.name = 'GitError';
  }
}

/**
 * Failures enabling emulation, probing privileges or talking to the daemon
 */
export class EnvironmentError extends BuildError {
  constructor(message: string, exitCode: ExitCode, details?: Record<string, unknown>, cause?: Error) {
    super(message, exitCode, details, cause);
    this.name = 'EnvironmentError';
  }
}

/**
 * The daemon did not come up (DOCKER_TIMEOUT) or go down (DOCKER_DIE) in time
 */
export class DaemonTimeoutError extends EnvironmentError {
  constructor(message: string, exitCode: ExitCode.DOCKER_TIMEOUT | ExitCode.DOCKER_DIE, timeoutMs: number) {
    super(message, exitCode, { timeoutMs });
    this.name = 'DaemonTimeoutError';
  }
}

/**
 * Typed timeout raised by pollUntil; callers translate it into the exit code
 * that fits the operation being waited on.
 */
export class PollTimeoutError extends Error {
  constructor(
    message: string,
    public readonly timeoutMs: number,
  ) {
    super(message);
    this.name = 'PollTimeoutError';
  }
}

/**
 * Exit code for anything thrown out of the workflow
 */
export function exitCodeOf(error: unknown): ExitCode {
  return error instanceof BuildError ? error.exitCode : ExitCode.UNKNOWN;
}

/**
 * Render a fatal error for stderr
 */
export function renderError(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  return ` !     ERROR: ${message}`;
}

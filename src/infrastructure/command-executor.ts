/**
 * Command Executor - Utility for executing external commands
 * Provides command execution with timeout, stdin input, line streaming and
 * long-running background processes (the Docker daemon).
 */

import { spawn, type ChildProcess, type SpawnOptions } from 'node:child_process';
import type { Logger } from 'pino';

export type OutputStream = 'stdout' | 'stderr';

export interface CommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Milliseconds before the command is killed; 0 disables the timeout */
  timeout?: number;
  maxBuffer?: number;
  /** Written to the child's stdin, which is then closed */
  input?: string;
  /** Receives every complete output line as it arrives */
  onLine?: (line: string, stream: OutputStream) => void;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  timedOut?: boolean;
}

/**
 * A process left running after the call that started it returned
 */
export interface BackgroundProcess {
  readonly pid: number | undefined;
  isRunning(): boolean;
  kill(signal?: NodeJS.Signals): boolean;
}

/**
 * Seam used by the infrastructure clients; tests substitute a fake
 */
export interface CommandRunner {
  execute(command: string, args?: string[], options?: CommandOptions): Promise<CommandResult>;
  spawnBackground(command: string, args?: string[]): BackgroundProcess;
}

/**
 * Split a byte stream into lines, keeping a partial trailing line until the
 * next chunk or the final flush.
 */
export function createLineSplitter(emit: (line: string) => void): {
  push: (chunk: string) => void;
  flush: () => void;
} {
  let pending = '';

  return {
    push(chunk: string): void {
      pending += chunk;
      const lines = pending.split(/\r?\n/);
      pending = lines.pop() ?? '';
      for (const line of lines) {
        emit(line);
      }
    },
    flush(): void {
      if (pending.length > 0) {
        emit(pending);
        pending = '';
      }
    },
  };
}

export class CommandExecutor implements CommandRunner {
  constructor(private readonly logger: Logger) {}

  /**
   * Execute a command with arguments
   */
  async execute(
    command: string,
    args: string[] = [],
    options: CommandOptions = {},
  ): Promise<CommandResult> {
    const {
      cwd = process.cwd(),
      env = process.env,
      timeout = 30000,
      maxBuffer = 10 * 1024 * 1024, // 10MB
      input,
      onLine,
    } = options;

    this.logger.debug({ command, args, cwd }, 'Executing command');

    return new Promise((resolve, reject) => {
      let stdout = '';
      let stderr = '';
      let timedOut = false;
      let timeoutHandle: NodeJS.Timeout | undefined;

      const spawnOptions: SpawnOptions = {
        cwd,
        env,
        shell: false,
        stdio: [input === undefined ? 'ignore' : 'pipe', 'pipe', 'pipe'],
      };

      const child = spawn(command, args, spawnOptions);

      const splitters = {
        stdout: createLineSplitter((line) => onLine?.(line, 'stdout')),
        stderr: createLineSplitter((line) => onLine?.(line, 'stderr')),
      };

      if (timeout > 0) {
        timeoutHandle = setTimeout(() => {
          timedOut = true;
          child.kill('SIGTERM');
          setTimeout(() => {
            if (child.exitCode === null) {
              child.kill('SIGKILL');
            }
          }, 5000).unref();
        }, timeout);
      }

      // Output beyond maxBuffer is still streamed, only the captured copy is capped
      const capture = (current: string, chunk: string): string =>
        current.length + chunk.length <= maxBuffer ? current + chunk : current;

      child.stdout?.on('data', (data: Buffer) => {
        const chunk = data.toString();
        stdout = capture(stdout, chunk);
        splitters.stdout.push(chunk);
      });

      child.stderr?.on('data', (data: Buffer) => {
        const chunk = data.toString();
        stderr = capture(stderr, chunk);
        splitters.stderr.push(chunk);
      });

      if (input !== undefined && child.stdin) {
        child.stdin.on('error', (error: Error) => {
          this.logger.debug({ command, error: error.message }, 'Command closed stdin early');
        });
        child.stdin.end(input);
      }

      child.on('close', (code: number | null) => {
        if (timeoutHandle) {
          clearTimeout(timeoutHandle);
        }

        splitters.stdout.flush();
        splitters.stderr.flush();

        const exitCode = code ?? -1;

        this.logger.debug({ command, exitCode, timedOut }, 'Command completed');

        resolve({
          stdout: stdout.trim(),
          stderr: stderr.trim(),
          exitCode,
          timedOut,
        });
      });

      child.on('error', (error: Error) => {
        if (timeoutHandle) {
          clearTimeout(timeoutHandle);
        }

        this.logger.error({ command, error: error.message }, 'Command execution failed');

        reject(error);
      });
    });
  }

  /**
   * Start a command that keeps running after this call returns.
   * Its output is discarded.
   */
  spawnBackground(command: string, args: string[] = []): BackgroundProcess {
    this.logger.debug({ command, args }, 'Starting background process');

    const child: ChildProcess = spawn(command, args, { stdio: 'ignore', shell: false });
    let running = true;

    child.on('exit', (code: number | null, signal: NodeJS.Signals | null) => {
      running = false;
      this.logger.debug({ command, code, signal }, 'Background process exited');
    });
    child.on('error', (error: Error) => {
      running = false;
      this.logger.error({ command, error: error.message }, 'Background process failed');
    });

    return {
      pid: child.pid,
      isRunning: () => running,
      kill: (signal: NodeJS.Signals = 'SIGTERM') => child.kill(signal),
    };
  }
}

/**
 * Command Executor - runs kubectl, gcloud, tkn and yq
 *
 * Captures stdout, stderr and their interleaved combination, and honours a
 * timeout and a caller-supplied AbortSignal.
 */

import { spawn } from 'node:child_process';
import type { Logger } from 'pino';
import { DEFAULT_TIMEOUTS } from '../config/defaults';
import { CommandFailedError } from '../lib/errors';

export interface CommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Written to the child's stdin, which is then closed */
  stdin?: string;
  /** Milliseconds; 0 disables */
  timeout?: number;
  signal?: AbortSignal;
  maxBuffer?: number;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
  /** stdout and stderr in arrival order */
  output: string;
  exitCode: number;
  timedOut: boolean;
}

/**
 * What the rest of the harness depends on; tests substitute a scripted fake
 */
export interface CommandRunner {
  execute(program: string, args: readonly string[], options?: CommandOptions): Promise<CommandResult>;
  /**
   * Execute and throw CommandFailedError unless the exit code is 0.
   * Resolves with the combined output.
   */
  run(program: string, args: readonly string[], options?: CommandOptions): Promise<string>;
}

export class CommandExecutor implements CommandRunner {
  constructor(
    private readonly logger: Logger,
    private readonly defaultTimeout: number = DEFAULT_TIMEOUTS.command,
  ) {}

  /**
   * Execute a command with arguments. Never rejects on a non-zero exit code.
   */
  async execute(
    program: string,
    args: readonly string[],
    options: CommandOptions = {},
  ): Promise<CommandResult> {
    const {
      cwd = process.cwd(),
      env = process.env,
      timeout = this.defaultTimeout,
      maxBuffer = 10 * 1024 * 1024, // 10MB
      signal,
      stdin,
    } = options;

    this.logger.debug({ program, args, cwd }, 'Executing command');

    if (signal?.aborted) {
      return { stdout: '', stderr: '', output: '', exitCode: -1, timedOut: true };
    }

    return new Promise((resolve, reject) => {
      let stdout = '';
      let stderr = '';
      let output = '';
      let timedOut = false;
      let overflow = false;
      let timeoutHandle: NodeJS.Timeout | undefined;
      let killHandle: NodeJS.Timeout | undefined;

      const child = spawn(program, [...args], {
        cwd,
        env,
        shell: false,
        stdio: ['pipe', 'pipe', 'pipe'],
      });

      const terminate = (): void => {
        timedOut = true;
        child.kill('SIGTERM');
        killHandle = setTimeout(() => {
          if (child.exitCode === null && child.signalCode === null) {
            child.kill('SIGKILL');
          }
        }, DEFAULT_TIMEOUTS.killGrace);
        killHandle.unref();
      };

      const onAbort = (): void => terminate();
      signal?.addEventListener('abort', onAbort, { once: true });

      if (timeout > 0) {
        timeoutHandle = setTimeout(terminate, timeout);
      }

      const collect = (stream: 'stdout' | 'stderr') => (data: Buffer) => {
        const chunk = data.toString();
        if (output.length + chunk.length > maxBuffer) {
          overflow = true;
          child.kill('SIGTERM');
          return;
        }
        output += chunk;
        if (stream === 'stdout') {
          stdout += chunk;
        } else {
          stderr += chunk;
        }
      };

      child.stdout.on('data', collect('stdout'));
      child.stderr.on('data', collect('stderr'));

      // A child that exits before reading stdin raises EPIPE on the stream
      child.stdin.on('error', (error: NodeJS.ErrnoException) => {
        this.logger.debug({ program, code: error.code }, 'stdin closed early');
      });
      child.stdin.end(stdin ?? '');

      const cleanup = (): void => {
        if (timeoutHandle) clearTimeout(timeoutHandle);
        if (killHandle) clearTimeout(killHandle);
        signal?.removeEventListener('abort', onAbort);
      };

      child.on('close', (code: number | null) => {
        cleanup();

        if (overflow) {
          reject(new Error(`Command output exceeded maximum buffer size of ${maxBuffer} bytes`));
          return;
        }

        const exitCode = code ?? -1;
        this.logger.debug({ program, exitCode, timedOut }, 'Command completed');

        resolve({ stdout, stderr, output, exitCode, timedOut });
      });

      child.on('error', (error: Error) => {
        cleanup();
        this.logger.error({ program, error: error.message }, 'Command execution failed');
        reject(new CommandFailedError(program, args, -1, error.message, { cause: error }));
      });
    });
  }

  async run(program: string, args: readonly string[], options: CommandOptions = {}): Promise<string> {
    const result = await this.execute(program, args, options);
    if (result.exitCode !== 0 || result.timedOut) {
      throw new CommandFailedError(program, args, result.exitCode, result.output, {
        timedOut: result.timedOut,
      });
    }
    return result.output;
  }
}

/**
 * stdout of a finished command, or a CommandFailedError carrying the combined output.
 * For callers that parse stdout and must not see stderr noise.
 */
export function requireStdout(
  program: string,
  args: readonly string[],
  result: CommandResult,
): string {
  if (result.exitCode !== 0 || result.timedOut) {
    throw new CommandFailedError(program, args, result.exitCode, result.output, {
      timedOut: result.timedOut,
    });
  }
  return result.stdout;
}

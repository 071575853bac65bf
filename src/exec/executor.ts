/**
 * Command Executor for External Tools
 *
 * Spawns curl, tar, cmake and friends, captures their output, and turns
 * failures into CommandError.
 */

import { spawn } from 'node:child_process';

import { formatCommand, supportsAnsi } from './verbose.js';

/**
 * Error codes for external command failures
 */
export type CommandErrorCode =
  | 'NOT_FOUND'
  | 'EXECUTION_FAILED'
  | 'TIMEOUT';

/**
 * Error thrown when an external command fails
 */
export class CommandError extends Error {
  constructor(
    message: string,
    public readonly code: CommandErrorCode,
    public readonly exitCode: number | null,
    public readonly stderr: string,
    public readonly command: string,
    public readonly args: readonly string[]
  ) {
    super(message);
    this.name = 'CommandError';
  }
}

/**
 * Options for running a command
 */
export interface RunOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Stream output to this process's stdout/stderr instead of capturing it */
  inheritOutput?: boolean;
  /** Timeout in milliseconds (default: none) */
  timeout?: number;
}

/**
 * Captured result of a successful command
 */
export interface CommandResult {
  stdout: string;
  stderr: string;
}

/**
 * Anything that can run external commands. Collaborators depend on this
 * rather than on CommandExecutor so tests can substitute a fake.
 */
export interface CommandRunner {
  run(command: string, args: readonly string[], options?: RunOptions): Promise<CommandResult>;
  succeeds(command: string, args: readonly string[]): Promise<boolean>;
}

/**
 * Options for constructing a CommandExecutor
 */
export interface CommandExecutorOptions {
  /** Print commands to stderr before execution (default: false) */
  verbose?: boolean;
}

export class CommandExecutor implements CommandRunner {
  private readonly verbose: boolean;

  constructor(options?: CommandExecutorOptions) {
    this.verbose = options?.verbose ?? false;
  }

  /**
   * Run a command to completion.
   *
   * @throws CommandError if the command can't be spawned, exits non-zero,
   *   or exceeds the timeout
   */
  async run(
    command: string,
    args: readonly string[],
    options: RunOptions = {}
  ): Promise<CommandResult> {
    const { cwd, env, inheritOutput = false, timeout } = options;

    if (this.verbose) {
      process.stderr.write(formatCommand(command, args, cwd, supportsAnsi()));
    }

    return new Promise<CommandResult>((resolve, reject) => {
      const child = spawn(command, [...args], {
        cwd,
        env,
        stdio: ['ignore', inheritOutput ? 'inherit' : 'pipe', inheritOutput ? 'inherit' : 'pipe'],
      });

      let stdout = '';
      let stderr = '';
      let settled = false;

      const timeoutId =
        timeout === undefined
          ? undefined
          : setTimeout(() => {
              settled = true;
              child.kill('SIGTERM');
              reject(
                new CommandError(
                  `${command} timed out after ${timeout}ms`,
                  'TIMEOUT',
                  null,
                  stderr,
                  command,
                  args
                )
              );
            }, timeout);

      child.stdout?.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      child.stderr?.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      child.on('error', (error: NodeJS.ErrnoException) => {
        clearTimeout(timeoutId);
        if (settled) return;
        settled = true;
        reject(
          new CommandError(
            error.code === 'ENOENT'
              ? `${command} is not installed or not on PATH`
              : `Failed to run ${command}: ${error.message}`,
            error.code === 'ENOENT' ? 'NOT_FOUND' : 'EXECUTION_FAILED',
            null,
            stderr,
            command,
            args
          )
        );
      });

      child.on('close', (code: number | null) => {
        clearTimeout(timeoutId);
        if (settled) return;
        settled = true;

        if (code !== 0) {
          reject(
            new CommandError(
              this.formatErrorMessage(command, stderr, code),
              'EXECUTION_FAILED',
              code,
              stderr,
              command,
              args
            )
          );
          return;
        }

        resolve({ stdout, stderr });
      });
    });
  }

  /**
   * Check whether a command runs and exits with status 0.
   */
  async succeeds(command: string, args: readonly string[]): Promise<boolean> {
    try {
      await this.run(command, args);
      return true;
    } catch (error) {
      if (error instanceof CommandError) {
        return false;
      }
      throw error;
    }
  }

  /**
   * Build a short message from the last meaningful stderr lines.
   */
  private formatErrorMessage(command: string, stderr: string, exitCode: number | null): string {
    // eslint-disable-next-line no-control-regex
    const clean = stderr.replace(/\x1b\[[0-9;]*[a-zA-Z]/g, '').replace(/\r/g, '');
    const lines = clean
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line.length > 0);

    const errorLine = lines.find(
      (line) => /error/i.test(line) || line.startsWith('CMake Error') || line.startsWith('curl:')
    );
    const detail = errorLine ?? lines.slice(-3).join(' | ');

    if (detail) {
      return `${command} exited with code ${exitCode}: ${detail}`;
    }
    return `${command} exited with code ${exitCode}`;
  }
}

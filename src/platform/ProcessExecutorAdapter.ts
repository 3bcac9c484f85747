/**
 * ProcessExecutorAdapter - Cross-platform process execution implementation
 * Uses execa for reliable cross-platform command execution
 */

import type { IProcessExecutor, ExecOptions, ExecResult } from './IProcessExecutor.js';
import { execa } from 'execa';

/** Standard shell convention for "command not found". */
export const COMMAND_NOT_FOUND = 127;

function errorCode(value: unknown): unknown {
  return typeof value === 'object' && value !== null && 'code' in value ? value.code : undefined;
}

function errorStderr(value: unknown): unknown {
  return typeof value === 'object' && value !== null && 'stderr' in value
    ? value.stderr
    : undefined;
}

export class ProcessExecutorAdapter implements IProcessExecutor {
  /**
   * Execute command and wait for completion
   */
  async execute(
    command: string,
    args: string[] = [],
    options: ExecOptions = {}
  ): Promise<ExecResult> {
    const commandLine = [command, ...args].join(' ');

    try {
      const result = await execa(command, args, {
        cwd: options.cwd,
        env: options.env,
        timeout: options.timeout,
        stdio: options.stdio ?? 'pipe',
        reject: false, // Don't throw on non-zero exit codes
      });

      let exitCode: number | undefined = result.exitCode;
      if (exitCode === undefined) {
        // Spawn failures come back without an exit code
        exitCode = errorCode(result) === 'ENOENT' ? COMMAND_NOT_FOUND : 1;
      }

      return {
        stdout: result.stdout ?? '',
        stderr: result.stderr ?? '',
        exitCode,
        command: result.command || commandLine,
        timedOut: result.timedOut ?? false,
      };
    } catch (error: unknown) {
      const code = errorCode(error);
      const stderr = errorStderr(error);
      return {
        stdout: '',
        stderr:
          typeof stderr === 'string' && stderr
            ? stderr
            : error instanceof Error
              ? error.message
              : String(error),
        exitCode: code === 'ENOENT' ? COMMAND_NOT_FOUND : 1,
        command: commandLine,
        timedOut: false,
      };
    }
  }
}

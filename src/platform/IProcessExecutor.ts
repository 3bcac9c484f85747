/**
 * Platform-agnostic process execution interface
 */

export interface ExecOptions {
  cwd?: string;
  env?: Record<string, string>;
  timeout?: number;
  /**
   * 'inherit' streams the child's output to this process; nothing is captured.
   */
  stdio?: 'pipe' | 'inherit';
}

export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  command: string;
  timedOut: boolean;
}

export interface IProcessExecutor {
  /**
   * Execute command and wait for completion. Never rejects on a non-zero exit.
   */
  execute(command: string, args?: string[], options?: ExecOptions): Promise<ExecResult>;
}

/**
 * Command Executor
 *
 * Runs an external command to completion and captures its output. Used to
 * fetch remote kubeconfigs over SSH; tests substitute their own executor.
 */

import { spawn } from 'node:child_process';

/**
 * Result of command execution
 */
export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * Command executor interface
 */
export interface CommandExecutor {
  /**
   * Execute a command without a shell
   *
   * @param command - Executable followed by its arguments
   * @returns Output and exit code; a non-zero exit does not reject
   * @throws Error if the executable cannot be started
   */
  run(command: readonly string[]): Promise<CommandResult>;
}

/**
 * Executes commands directly via `child_process.spawn`
 */
export class DirectExecutor implements CommandExecutor {
  run(command: readonly string[]): Promise<CommandResult> {
    const [cmd, ...args] = command;
    if (cmd === undefined) {
      return Promise.reject(new Error('Cannot run an empty command'));
    }

    return new Promise((resolve, reject) => {
      const child = spawn(cmd, args, {
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      let stdout = '';
      let stderr = '';

      child.stdout.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      child.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      child.on('error', reject);

      child.on('close', (code: number | null) => {
        resolve({
          stdout,
          stderr,
          exitCode: code ?? 1,
        });
      });
    });
  }
}

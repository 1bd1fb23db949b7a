/**
 * Terminal Tools
 *
 * Runs external commands (gh, the editor CLI, the platform opener) without a
 * shell, so paths and URLs are passed through as single arguments.
 */

import { spawn } from 'child_process';

export interface CommandResult {
  success: boolean;
  command: string;
  stdout: string;
  stderr: string;
  exitCode: number | null;
  error?: string;
}

export interface RunCommandOptions {
  cwd?: string;
  timeout?: number;
}

export type CommandRunner = (
  command: string,
  args: readonly string[],
  options?: RunCommandOptions
) => Promise<CommandResult>;

/**
 * Run a command to completion and collect its output
 */
export const runCommand: CommandRunner = (command, args, options = {}) => {
  const { cwd = process.cwd(), timeout = 60000 } = options;
  const display = [command, ...args].join(' ');

  return new Promise((resolve) => {
    const child = spawn(command, [...args], {
      cwd,
      timeout,
      env: { ...process.env },
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    let stdout = '';
    let stderr = '';

    child.stdout?.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    child.stderr?.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    child.on('close', (code) => {
      resolve({
        success: code === 0,
        command: display,
        stdout: stdout.trim(),
        stderr: stderr.trim(),
        exitCode: code,
      });
    });

    child.on('error', (error) => {
      resolve({
        success: false,
        command: display,
        stdout: stdout.trim(),
        stderr: stderr.trim(),
        exitCode: null,
        error: error.message,
      });
    });
  });
};

/**
 * Start a command that outlives this process (an editor window)
 */
export function spawnDetached(command: string, args: readonly string[]): Promise<void> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, [...args], {
      detached: true,
      stdio: 'ignore',
    });

    child.once('error', reject);
    child.once('spawn', () => {
      child.unref();
      resolve();
    });
  });
}

import { spawn } from 'child_process';

export interface CommandResult {
  code: number;
  stdout: string;
  stderr: string;
}

export interface RunCommandOptions {
  cwd?: string;
  stdio?: 'inherit' | 'pipe';
}

export type CommandRunner = (
  command: readonly string[],
  options?: RunCommandOptions,
) => Promise<CommandResult>;

/**
 * Spawns `command` without a shell and waits for it to close.
 * With `stdio: 'inherit'` the child writes straight to this terminal and the
 * captured output is empty.
 */
export const runCommand: CommandRunner = (command, options = {}) => {
  const [file, ...args] = command;
  if (!file) {
    return Promise.reject(new Error('Cannot run an empty command'));
  }

  return new Promise((resolve, reject) => {
    const stdio = options.stdio ?? 'pipe';
    const child = spawn(file, args, { cwd: options.cwd, stdio });

    let stdout = '';
    let stderr = '';
    child.stdout?.setEncoding('utf8').on('data', (chunk: string) => {
      stdout += chunk;
    });
    child.stderr?.setEncoding('utf8').on('data', (chunk: string) => {
      stderr += chunk;
    });

    child.on('error', reject);
    child.on('close', (code) => {
      // null when the child was killed by a signal
      resolve({ code: code ?? 1, stdout, stderr });
    });
  });
};

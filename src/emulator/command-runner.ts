import { spawn } from 'child_process';

/**
 * Result of a finished command
 */
export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface CommandOptions {
  timeout?: number;
}

export type CommandRunner = (command: string, args: string[], options?: CommandOptions) => Promise<CommandResult>;

/**
 * Run a command to completion and collect its output.
 * Rejects when the command cannot be spawned or outlives `timeout` (the child is killed).
 */
export const runCommand: CommandRunner = (command, args, options = {}) => {
  const { timeout = 5000 } = options;

  return new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      stdio: ['ignore', 'pipe', 'pipe']
    });

    let stdout = '';
    let stderr = '';
    let settled = false;
    let timeoutId: ReturnType<typeof setTimeout> | undefined;

    const finish = (outcome: () => void): void => {
      if (settled) return;
      settled = true;
      if (timeoutId) {
        clearTimeout(timeoutId);
      }
      outcome();
    };

    if (timeout > 0) {
      timeoutId = setTimeout(() => {
        child.kill('SIGKILL');
        finish(() => reject(new Error(`Command timed out after ${timeout}ms: ${command}`)));
      }, timeout);
    }

    child.stdout?.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    child.stderr?.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    child.on('close', (code) => {
      finish(() =>
        resolve({
          stdout: stdout.trim(),
          stderr: stderr.trim(),
          exitCode: code ?? 0
        })
      );
    });

    child.on('error', (error) => {
      finish(() => reject(new Error(`Failed to execute ${command}: ${error.message}`)));
    });
  });
};

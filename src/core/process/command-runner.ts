/**
 * Command Runner
 * Runs the external transfer tools (immich-go, rsync) as child processes
 */

import { spawn } from 'node:child_process';

/** Exit code reported when the command could not be started at all. */
export const SPAWN_FAILURE_EXIT_CODE = 127;

export interface CommandResult {
  exitCode: number;
  error?: string;
}

export interface RunOptions {
  /** 'inherit' shows the tool's own progress output */
  stdio?: 'inherit' | 'ignore';
}

export type CommandRunner = (
  command: string,
  args: string[],
  options?: RunOptions,
) => Promise<CommandResult>;

/**
 * Spawn a command without a shell and resolve with its exit code.
 * Never rejects: a missing binary resolves with exit code 127.
 */
export const runCommand: CommandRunner = (command, args, options = {}) => {
  return new Promise((resolve) => {
    let settled = false;
    const finish = (result: CommandResult) => {
      if (!settled) {
        settled = true;
        resolve(result);
      }
    };

    const child = spawn(command, args, {
      stdio: ['ignore', options.stdio ?? 'inherit', options.stdio ?? 'inherit'],
    });

    child.on('error', (error: Error) => {
      finish({ exitCode: SPAWN_FAILURE_EXIT_CODE, error: error.message });
    });

    child.on('close', (code, signal) => {
      if (code === null) {
        finish({ exitCode: 1, error: `${command} terminated by ${signal}` });
        return;
      }
      finish({ exitCode: code });
    });
  });
};

/**
 * Whether a tool can be started at all.
 */
export async function isToolAvailable(
  command: string,
  versionArgs: string[],
  runner: CommandRunner = runCommand,
): Promise<boolean> {
  const result = await runner(command, versionArgs, { stdio: 'ignore' });
  return result.exitCode !== SPAWN_FAILURE_EXIT_CODE;
}

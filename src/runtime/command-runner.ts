/**
 * Synchronous execution of the watched command.
 *
 * stdout and stderr share one temporary file so the captured output keeps
 * the order the command wrote it in. The call blocks until the command
 * exits.
 */

import { spawnSync } from 'child_process';
import { closeSync, mkdtempSync, openSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';

/** Token list run directly, or a string handed to the shell. */
export type WatchedCommand = string[] | string;

export type CommandResult = {
  exitStatus: number | null;
  signal: NodeJS.Signals | null;
  output: string;
};

export interface CommandRunner {
  run(command: WatchedCommand): CommandResult;
}

export class CommandExecutionError extends Error {
  readonly command: string;

  constructor(command: string, cause: Error) {
    super(`Failed to run \`${command}\`: ${cause.message}`, { cause });
    this.name = 'CommandExecutionError';
    this.command = command;
  }
}

export class CommandFailedError extends Error {
  readonly command: string;
  readonly exitStatus: number | null;
  readonly output: string;

  constructor(command: string, result: CommandResult) {
    const status = result.signal ? `signal ${result.signal}` : `exit status ${result.exitStatus}`;
    const detail = result.output.trimEnd();
    super(`\`${command}\` failed with ${status}${detail ? `:\n${detail}` : ''}`);
    this.name = 'CommandFailedError';
    this.command = command;
    this.exitStatus = result.exitStatus;
    this.output = result.output;
  }
}

export function describeCommand(command: WatchedCommand): string {
  return typeof command === 'string' ? command : command.join(' ');
}

export type SpawnCommandRunnerOptions = {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
};

export class SpawnCommandRunner implements CommandRunner {
  constructor(private options: SpawnCommandRunnerOptions = {}) {}

  run(command: WatchedCommand): CommandResult {
    const shell = typeof command === 'string';
    const file = typeof command === 'string' ? command : command[0];
    const args = typeof command === 'string' ? [] : command.slice(1);
    if (!file) {
      throw new CommandExecutionError(describeCommand(command), new Error('empty command'));
    }

    const dir = mkdtempSync(join(tmpdir(), 'viewpane-'));
    const outPath = join(dir, 'output');
    const fd = openSync(outPath, 'w+');
    try {
      const result = spawnSync(file, args, {
        shell,
        cwd: this.options.cwd,
        env: this.options.env ?? process.env,
        stdio: ['ignore', fd, fd],
        windowsHide: true,
      });
      if (result.error) {
        throw new CommandExecutionError(describeCommand(command), result.error);
      }
      return {
        exitStatus: result.status,
        signal: result.signal,
        output: readFileSync(outPath, 'utf-8'),
      };
    } finally {
      closeSync(fd);
      rmSync(dir, { recursive: true, force: true });
    }
  }
}

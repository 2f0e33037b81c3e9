/**
 * Shell Task Wrapper
 *
 * The callable builds a command line from its arguments; the task runs that
 * line with bash and resolves once it exits with status 0.
 */

import { execFile } from 'child_process';
import { promisify } from 'util';
import { InvalidShellCommandError, ShellExitError, WalltimeExceededError } from '../errors';
import type { ShellResult, TaskKindName } from '../types';
import { BaseTaskWrapper, callTask } from './base';

const execFileAsync = promisify(execFile);

const MAX_BUFFER = 1024 * 1024 * 10;

export interface ShellRunOptions {
  taskName: string;
  walltimeSeconds: number;
  cwd?: string;
}

function readField(error: Error, key: string): unknown {
  const value: unknown = Reflect.get(error, key);
  return value;
}

/**
 * Run a command line with `bash -c`
 *
 * @throws ShellExitError on a non-zero exit
 * @throws WalltimeExceededError when the process is killed for running past its walltime
 */
export async function runShellCommand(
  command: string,
  options: ShellRunOptions
): Promise<ShellResult> {
  const { taskName, walltimeSeconds, cwd } = options;

  try {
    const { stdout, stderr } = await execFileAsync('bash', ['-c', command], {
      cwd,
      timeout: walltimeSeconds > 0 ? walltimeSeconds * 1000 : 0,
      maxBuffer: MAX_BUFFER,
    });
    return { command, exitCode: 0, stdout, stderr };
  } catch (error: unknown) {
    if (error instanceof Error) {
      if (readField(error, 'killed') === true) {
        throw new WalltimeExceededError(taskName, walltimeSeconds);
      }

      const code = readField(error, 'code');
      if (typeof code === 'number') {
        const stderr = readField(error, 'stderr');
        throw new ShellExitError(taskName, code, typeof stderr === 'string' ? stderr : '');
      }
    }
    throw error;
  }
}

export class ShellTaskWrapper extends BaseTaskWrapper<ShellResult> {
  protected readonly kind: TaskKindName = 'bash';

  protected prepare(args: readonly unknown[]): () => Promise<ShellResult> {
    const { displayName, walltimeSeconds } = this.options;

    return async () => {
      const command = await callTask(this.callable, args);

      if (typeof command !== 'string' || command.trim() === '') {
        const received = command === null ? 'null' : typeof command === 'string' ? 'empty string' : typeof command;
        throw new InvalidShellCommandError(displayName, received);
      }

      return runShellCommand(command, { taskName: displayName, walltimeSeconds });
    };
  }
}

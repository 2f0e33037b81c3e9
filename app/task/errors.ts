/**
 * Task Errors
 */

export class TaskError extends Error {
  constructor(
    public readonly code: string,
    message?: string
  ) {
    super(message ?? code);
    this.name = 'TaskError';
  }
}

/**
 * A kind was requested that the registry does not know. This is a
 * configuration defect in the caller and is never retried.
 */
export class InvalidTaskKindError extends TaskError {
  constructor(
    public readonly registryName: string,
    public readonly kind: string
  ) {
    super('INVALID_TASK_KIND', `TaskKindRegistry:${registryName} Invalid task kind requested: ${kind}`);
    this.name = 'InvalidTaskKindError';
  }
}

export class TaskArgumentError extends TaskError {
  constructor(
    public readonly taskName: string,
    public readonly expected: string,
    public readonly received: number
  ) {
    super('TASK_ARGUMENTS', `Task ${taskName} expects ${expected} argument(s), received ${received}`);
    this.name = 'TaskArgumentError';
  }
}

export class InvalidShellCommandError extends TaskError {
  constructor(
    public readonly taskName: string,
    public readonly receivedType: string
  ) {
    super(
      'INVALID_SHELL_COMMAND',
      `Shell task ${taskName} must return a non-empty command string, got ${receivedType}`
    );
    this.name = 'InvalidShellCommandError';
  }
}

export class ShellExitError extends TaskError {
  constructor(
    public readonly taskName: string,
    public readonly exitCode: number,
    public readonly stderr: string
  ) {
    super('SHELL_EXIT', `Shell task ${taskName} exited with code ${exitCode}`);
    this.name = 'ShellExitError';
  }
}

export class WalltimeExceededError extends TaskError {
  constructor(
    public readonly taskName: string,
    public readonly walltimeSeconds: number
  ) {
    super('WALLTIME_EXCEEDED', `Task ${taskName} exceeded walltime of ${walltimeSeconds}s`);
    this.name = 'WalltimeExceededError';
  }
}

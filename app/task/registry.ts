/**
 * Task Kind Registry
 *
 * Maps task kind names to wrapper constructors and hands out factories
 * bound to them.
 */

import { logger as rootLogger, type Logger } from '../utils/logger';
import { InvalidTaskKindError } from './errors';
import {
  copyExecutionParams,
  TaskDescriptorFactory,
  type TaskDescriptorFactoryOptions,
} from './factory';
import type {
  ShellCommandBuilder,
  ShellResult,
  TaskCallable,
  TaskExecutionParams,
  TaskKindName,
  TaskWrapperConstructor,
} from './types';
import { FunctionTaskWrapper } from './wrappers/function-task';
import { ShellTaskWrapper } from './wrappers/shell-task';

/**
 * Wrapper constructor for every kind. Closed: adding a kind means adding
 * it to TaskKindName as well.
 */
export const TASK_KINDS = {
  bash: ShellTaskWrapper,
  function: FunctionTaskWrapper,
} as const satisfies Record<TaskKindName, TaskWrapperConstructor<unknown>>;

/**
 * Alternative names accepted by create()
 */
export const TASK_KIND_ALIASES: Readonly<Record<string, TaskKindName>> = {
  shell: 'bash',
  python: 'function',
};

export interface TaskKindRegistryOptions {
  defaults?: Partial<TaskExecutionParams>;
  logger?: Logger;
}

export class TaskKindRegistry {
  private readonly kindTable: ReadonlyMap<TaskKindName, TaskWrapperConstructor<unknown>>;
  private readonly defaults: Partial<TaskExecutionParams>;
  private readonly log: Logger;

  /**
   * @param name - Identifies this registry in diagnostics
   */
  constructor(
    readonly name: string,
    options: TaskKindRegistryOptions = {}
  ) {
    const table = new Map<TaskKindName, TaskWrapperConstructor<unknown>>();
    table.set('bash', TASK_KINDS.bash);
    table.set('function', TASK_KINDS.function);
    this.kindTable = table;

    this.defaults = copyExecutionParams(options.defaults ?? {});
    this.log = options.logger ?? rootLogger.child('[registry]');
  }

  /**
   * Canonical kind names, in registration order
   */
  kinds(): TaskKindName[] {
    return Array.from(this.kindTable.keys());
  }

  /**
   * Map a kind or alias to its canonical name
   */
  resolveKind(kind: string): TaskKindName | undefined {
    const canonical = TASK_KIND_ALIASES[kind] ?? kind;
    return this.hasKind(canonical) ? canonical : undefined;
  }

  hasKind(kind: string): kind is TaskKindName {
    return this.kinds().some((known) => known === kind);
  }

  /**
   * Create a factory of the given kind bound to a callable
   *
   * @throws InvalidTaskKindError when the kind is not registered
   */
  create<F extends ShellCommandBuilder>(
    kind: 'bash' | 'shell',
    callable: F,
    options?: TaskDescriptorFactoryOptions
  ): TaskDescriptorFactory<F, ShellResult>;
  create<F extends TaskCallable>(
    kind: 'function' | 'python',
    callable: F,
    options?: TaskDescriptorFactoryOptions
  ): TaskDescriptorFactory<F, Awaited<ReturnType<F>>>;
  create<F extends TaskCallable>(
    kind: string,
    callable: F,
    options?: TaskDescriptorFactoryOptions
  ): TaskDescriptorFactory<F, unknown>;
  create<F extends TaskCallable>(
    kind: string,
    callable: F,
    options: TaskDescriptorFactoryOptions = {}
  ): TaskDescriptorFactory<F, unknown> {
    const canonical = this.resolveKind(kind);
    const taskKind = canonical === undefined ? undefined : this.kindTable.get(canonical);

    if (!taskKind) {
      this.log.error('Invalid task kind requested', { registry: this.name, kind });
      throw new InvalidTaskKindError(this.name, kind);
    }

    return new TaskDescriptorFactory(taskKind, callable, {
      ...this.defaults,
      logger: this.log,
      ...options,
    });
  }
}

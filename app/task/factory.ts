/**
 * Task Descriptor Factory
 *
 * Binds one callable to one task kind. The cache identity is derived once,
 * here, so repeated invocations do not re-read or re-hash the source.
 */

import { logger as rootLogger, type Logger } from '../utils/logger';
import { deriveContentIdentity } from './identity';
import { readSignature } from './signature';
import { functionSourceProvider } from './source-provider';
import type {
  ExecutionContext,
  ExecutorSelector,
  FactoryStatus,
  IdentityOrigin,
  TaskCallable,
  TaskExecutionParams,
  TaskFactoryOptions,
  TaskFuture,
  TaskSignature,
  TaskWrapperConstructor,
} from './types';

export const DEFAULT_WALLTIME_SECONDS = 60;
export const DEFAULT_EXECUTORS: ExecutorSelector = 'all';

export interface TaskDescriptorFactoryOptions extends TaskFactoryOptions {
  logger?: Logger;
}

/**
 * Copy the array-valued parameters so later changes by the caller
 * cannot reach a factory or registry that already holds them
 */
export function copyExecutionParams(
  params: Partial<TaskExecutionParams>
): Partial<TaskExecutionParams> {
  const copy: Partial<TaskExecutionParams> = { ...params };
  if (params.auxiliaryFiles !== undefined) {
    copy.auxiliaryFiles = Object.freeze([...params.auxiliaryFiles]);
  }
  if (params.executors !== undefined && typeof params.executors !== 'string') {
    copy.executors = Object.freeze([...params.executors]);
  }
  return copy;
}

export class TaskDescriptorFactory<F extends TaskCallable, T> {
  readonly displayName: string;
  readonly signature: TaskSignature;
  readonly cache: boolean;
  readonly contentIdentity: string;
  readonly identityOrigin: IdentityOrigin;
  readonly executors: ExecutorSelector;
  readonly walltimeSeconds: number;
  readonly auxiliaryFiles: readonly string[];
  readonly context: ExecutionContext | undefined;
  readonly status: FactoryStatus = 'created';

  /**
   * @param taskKind - Wrapper constructor every invocation instantiates
   * @param callable - The function the task runs; held by reference
   * @param options - Execution parameters; array values are copied, the rest forwarded to each wrapper as given
   * @throws TypeError when `callable` is not a function
   */
  constructor(
    readonly taskKind: TaskWrapperConstructor<T>,
    readonly callable: F,
    options: TaskDescriptorFactoryOptions = {}
  ) {
    this.signature = readSignature(callable);
    this.displayName = callable.name || 'anonymous';
    this.cache = options.cache ?? false;
    const { executors, auxiliaryFiles } = copyExecutionParams(options);
    this.executors = executors ?? DEFAULT_EXECUTORS;
    this.walltimeSeconds = options.walltimeSeconds ?? DEFAULT_WALLTIME_SECONDS;
    this.auxiliaryFiles = auxiliaryFiles ?? Object.freeze([]);
    this.context = options.context;

    const { identity, origin } = deriveContentIdentity({
      callable,
      displayName: this.displayName,
      cache: this.cache,
      sourceProvider: options.sourceProvider ?? functionSourceProvider,
      logger: options.logger ?? rootLogger.child('[factory]'),
    });
    this.contentIdentity = identity;
    this.identityOrigin = origin;
  }

  /**
   * Build a fresh wrapper and invoke it with the caller's arguments.
   * The wrapper's future is returned untouched.
   */
  invoke(...args: Parameters<F>): TaskFuture<T> {
    const wrapper = new this.taskKind(this.callable, {
      context: this.context,
      executors: this.executors,
      walltimeSeconds: this.walltimeSeconds,
      cache: this.cache,
      contentIdentity: this.contentIdentity,
      auxiliaryFiles: this.auxiliaryFiles,
      displayName: this.displayName,
      signature: this.signature,
    });

    return wrapper.invoke(...args);
  }

  toString(): string {
    return `<${this.taskKind.name} factory for ${this.displayName}>`;
  }
}

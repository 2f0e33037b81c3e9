import { getDefaultContext } from '../execution/inline-context';
import { validateArguments } from '../signature';
import type {
  TaskCallable,
  TaskFuture,
  TaskKindName,
  TaskWrapper,
  TaskWrapperOptions,
} from '../types';

/**
 * Call a task callable with an argument list it has not been typed against.
 * The wrapper has already checked the arity.
 */
export function callTask(callable: TaskCallable, args: readonly unknown[]): unknown {
  const value: unknown = Reflect.apply(callable, undefined, args);
  return value;
}

/**
 * Shared invoke path: check arguments, then hand a prepared closure to the
 * execution context together with the factory's parameters.
 */
export abstract class BaseTaskWrapper<T> implements TaskWrapper<T> {
  protected abstract readonly kind: TaskKindName;

  constructor(
    protected readonly callable: TaskCallable,
    protected readonly options: TaskWrapperOptions
  ) {}

  protected abstract prepare(args: readonly unknown[]): () => Promise<T>;

  invoke(...args: unknown[]): TaskFuture<T> {
    const { displayName, signature } = this.options;
    validateArguments(displayName, signature, args);

    const context = this.options.context ?? getDefaultContext();
    return context.submit<T>({
      kind: this.kind,
      displayName,
      args,
      executors: this.options.executors,
      walltimeSeconds: this.options.walltimeSeconds,
      cache: this.options.cache,
      contentIdentity: this.options.contentIdentity,
      auxiliaryFiles: this.options.auxiliaryFiles,
      execute: this.prepare(args),
    });
  }
}

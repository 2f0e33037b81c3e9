import type { TaskKindName } from '../types';
import { BaseTaskWrapper, callTask } from './base';

/**
 * Runs the callable in process; the task result is its awaited return value
 */
export class FunctionTaskWrapper extends BaseTaskWrapper<unknown> {
  protected readonly kind: TaskKindName = 'function';

  protected prepare(args: readonly unknown[]): () => Promise<unknown> {
    return async () => callTask(this.callable, args);
  }
}

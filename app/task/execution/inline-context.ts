/**
 * Inline Execution Context
 *
 * Runs submitted tasks in the current process. Used when a factory is built
 * without an execution context of its own.
 */

import { logger as rootLogger, type Logger } from '../../utils/logger';
import { WalltimeExceededError } from '../errors';
import type { DataFuture, ExecutionContext, TaskFuture, TaskSubmission } from '../types';

export interface InlineContextOptions {
  logger?: Logger;
}

/**
 * Reject with WalltimeExceededError if the work has not settled in time.
 * The timer never keeps the process alive on its own.
 */
export function withWalltime<T>(
  work: Promise<T>,
  taskName: string,
  walltimeSeconds: number
): Promise<T> {
  if (!Number.isFinite(walltimeSeconds) || walltimeSeconds <= 0) {
    return work;
  }

  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new WalltimeExceededError(taskName, walltimeSeconds));
    }, walltimeSeconds * 1000);
    timer.unref();

    void work.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}

export class InlineExecutionContext implements ExecutionContext {
  private nextTaskId = 0;
  private readonly log: Logger;

  constructor(options: InlineContextOptions = {}) {
    this.log = options.logger ?? rootLogger.child('[inline]');
  }

  submit<T>(submission: TaskSubmission<T>): TaskFuture<T> {
    const taskId = this.nextTaskId++;
    const { displayName, kind, contentIdentity, walltimeSeconds } = submission;

    this.log.debug('Task submitted', {
      id: taskId,
      task: displayName,
      kind,
      identity: contentIdentity,
      cache: submission.cache,
    });

    // Start on the next microtask so submit() itself never throws for the task
    const result = withWalltime(
      Promise.resolve().then(() => submission.execute()),
      displayName,
      walltimeSeconds
    );

    const outputs = submission.auxiliaryFiles.map((filePath): DataFuture => {
      const ready = result.then(() => filePath);
      // Callers that only await `result` must not trip unhandled rejections
      void ready.catch((error: unknown) => {
        this.log.debug('Output not produced', {
          id: taskId,
          file: filePath,
          reason: error instanceof Error ? error.message : String(error),
        });
      });
      return { filePath, ready };
    });

    return { taskId, kind, contentIdentity, result, outputs };
  }

  /**
   * Number of tasks submitted so far
   */
  get submitted(): number {
    return this.nextTaskId;
  }
}

let defaultContext: InlineExecutionContext | undefined;

/**
 * Process-wide context for factories built without one
 */
export function getDefaultContext(): InlineExecutionContext {
  if (!defaultContext) {
    defaultContext = new InlineExecutionContext();
  }
  return defaultContext;
}

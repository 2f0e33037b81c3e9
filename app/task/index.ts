/**
 * Task Module
 *
 * Exports for task factories, the kind registry and the wrappers.
 */

export {
  TaskDescriptorFactory,
  DEFAULT_EXECUTORS,
  DEFAULT_WALLTIME_SECONDS,
  type TaskDescriptorFactoryOptions,
} from './factory';

export {
  TaskKindRegistry,
  TASK_KINDS,
  TASK_KIND_ALIASES,
  type TaskKindRegistryOptions,
} from './registry';

export {
  deriveContentIdentity,
  digestSource,
  type ContentIdentity,
  type IdentityInput,
} from './identity';

export {
  functionSourceProvider,
  staticSourceProvider,
  chainSourceProviders,
  isNativeSource,
} from './source-provider';

export { readSignature, validateArguments } from './signature';

export {
  InlineExecutionContext,
  getDefaultContext,
  withWalltime,
  type InlineContextOptions,
} from './execution/inline-context';

export { BaseTaskWrapper } from './wrappers/base';
export { FunctionTaskWrapper } from './wrappers/function-task';
export { ShellTaskWrapper, runShellCommand, type ShellRunOptions } from './wrappers/shell-task';

export {
  TaskError,
  InvalidTaskKindError,
  TaskArgumentError,
  InvalidShellCommandError,
  ShellExitError,
  WalltimeExceededError,
} from './errors';

export type {
  TaskKindName,
  FactoryStatus,
  ExecutorSelector,
  TaskCallable,
  ShellCommandBuilder,
  SourceProvider,
  IdentityOrigin,
  TaskParameter,
  TaskSignature,
  DataFuture,
  TaskFuture,
  TaskSubmission,
  ExecutionContext,
  TaskExecutionParams,
  TaskWrapperOptions,
  TaskWrapper,
  TaskWrapperConstructor,
  TaskFactoryOptions,
  ShellResult,
} from './types';

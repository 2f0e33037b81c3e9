/**
 * Task Types
 *
 * Types shared by the task factory, the kind registry and the wrappers.
 */

/**
 * Canonical names of the registered task kinds
 */
export type TaskKindName =
  | 'bash'       // Callable builds a shell command line
  | 'function';  // Callable runs in process

/**
 * Lifecycle of a task factory. Execution states belong to the wrapper.
 */
export type FactoryStatus = 'created';

/**
 * Executor labels a task may run on
 */
export type ExecutorSelector = 'all' | readonly string[];

/**
 * Any function. Arguments are checked by the wrapper, not by the type.
 */
export type TaskCallable = (...args: never[]) => unknown;

/**
 * A callable whose result is the command line of a shell task
 */
export type ShellCommandBuilder = (...args: never[]) => string | Promise<string>;

/**
 * Returns the source text of a callable, or undefined when it has none
 */
export type SourceProvider = (callable: TaskCallable) => string | undefined;

/**
 * Where a factory's content identity came from
 */
export type IdentityOrigin =
  | 'source'          // Digest of the callable's source text
  | 'name-fallback'   // Caching on, but no source: display name
  | 'display-name';   // Caching off: display name

/**
 * One formal parameter of a callable
 */
export interface TaskParameter {
  name: string;
  optional: boolean;
  rest: boolean;
}

/**
 * Formal parameter list of a callable, read once at factory construction
 */
export interface TaskSignature {
  parameters: TaskParameter[];
  required: number;
  variadic: boolean;
}

/**
 * Handle for a file a task produces
 */
export interface DataFuture {
  filePath: string;
  ready: Promise<string>;
}

/**
 * Result handle returned by every wrapper invocation
 */
export interface TaskFuture<T> {
  taskId: number;
  kind: TaskKindName;
  contentIdentity: string;
  result: Promise<T>;
  outputs: DataFuture[];
}

/**
 * A prepared unit of work handed to an execution context
 */
export interface TaskSubmission<T> {
  kind: TaskKindName;
  displayName: string;
  args: readonly unknown[];
  executors: ExecutorSelector;
  walltimeSeconds: number;
  cache: boolean;
  contentIdentity: string;
  auxiliaryFiles: readonly string[];
  execute: () => Promise<T>;
}

/**
 * Schedules and runs submitted tasks
 */
export interface ExecutionContext {
  submit<T>(submission: TaskSubmission<T>): TaskFuture<T>;
}

/**
 * Execution parameters shared by factories and wrappers
 */
export interface TaskExecutionParams {
  executors: ExecutorSelector;
  walltimeSeconds: number;
  cache: boolean;
  auxiliaryFiles: readonly string[];
}

/**
 * Everything a wrapper receives at construction
 */
export interface TaskWrapperOptions extends TaskExecutionParams {
  context?: ExecutionContext;
  contentIdentity: string;
  displayName: string;
  signature: TaskSignature;
}

/**
 * A task wrapper binds a callable to its execution parameters and, when
 * invoked, submits it to an execution context
 */
export interface TaskWrapper<T> {
  invoke(...args: unknown[]): TaskFuture<T>;
}

export interface TaskWrapperConstructor<T> {
  new (callable: TaskCallable, options: TaskWrapperOptions): TaskWrapper<T>;
}

/**
 * Options accepted by a factory; anything omitted takes its default
 */
export interface TaskFactoryOptions extends Partial<TaskExecutionParams> {
  context?: ExecutionContext;
  sourceProvider?: SourceProvider;
}

/**
 * Outcome of a shell task that exited with status 0
 */
export interface ShellResult {
  command: string;
  exitCode: 0;
  stdout: string;
  stderr: string;
}

import {
  InvalidShellCommandError,
  ShellExitError,
  TaskArgumentError,
  WalltimeExceededError,
} from '../../app/task/errors';
import { InlineExecutionContext } from '../../app/task/execution/inline-context';
import { TaskKindRegistry } from '../../app/task/registry';
import { readSignature } from '../../app/task/signature';
import type {
  ExecutionContext,
  TaskCallable,
  TaskFuture,
  TaskSubmission,
  TaskWrapperOptions,
} from '../../app/task/types';
import { FunctionTaskWrapper } from '../../app/task/wrappers/function-task';
import { runShellCommand, ShellTaskWrapper } from '../../app/task/wrappers/shell-task';
import { captureLogger } from '../support/capture-logger';

function wrapperOptions(callable: TaskCallable, overrides: Partial<TaskWrapperOptions> = {}): TaskWrapperOptions {
  return {
    executors: 'all',
    walltimeSeconds: 5,
    cache: false,
    auxiliaryFiles: [],
    contentIdentity: 'identity',
    displayName: callable.name,
    signature: readSignature(callable),
    ...overrides,
  };
}

/**
 * Context stub that records submissions and runs them immediately
 */
class CapturingContext implements ExecutionContext {
  submissions: Array<TaskSubmission<unknown>> = [];

  submit<T>(submission: TaskSubmission<T>): TaskFuture<T> {
    this.submissions.push(submission);
    return {
      taskId: this.submissions.length - 1,
      kind: submission.kind,
      contentIdentity: submission.contentIdentity,
      result: submission.execute(),
      outputs: [],
    };
  }
}

function pair(a: number, b: number): number[] {
  return [a, b];
}

describe('FunctionTaskWrapper', () => {
  it('submits the factory parameters with the call arguments', async () => {
    const context = new CapturingContext();
    const wrapper = new FunctionTaskWrapper(
      pair,
      wrapperOptions(pair, {
        context,
        cache: true,
        executors: ['local'],
        auxiliaryFiles: ['pair.json'],
        contentIdentity: 'feedface',
      })
    );

    const future = wrapper.invoke(3, 4);

    expect(context.submissions).toHaveLength(1);
    const [submitted] = context.submissions;
    expect(submitted.kind).toBe('function');
    expect(submitted.displayName).toBe('pair');
    expect(submitted.args).toEqual([3, 4]);
    expect(submitted.executors).toEqual(['local']);
    expect(submitted.cache).toBe(true);
    expect(submitted.contentIdentity).toBe('feedface');
    expect(submitted.auxiliaryFiles).toEqual(['pair.json']);
    await expect(future.result).resolves.toEqual([3, 4]);
  });

  it('checks arguments before submitting', () => {
    const context = new CapturingContext();
    const wrapper = new FunctionTaskWrapper(pair, wrapperOptions(pair, { context }));

    expect(() => wrapper.invoke(1)).toThrow(TaskArgumentError);
    expect(context.submissions).toHaveLength(0);
  });

  it('awaits asynchronous callables', async () => {
    const context = new InlineExecutionContext({ logger: captureLogger().log });
    const registry = new TaskKindRegistry('test', { logger: captureLogger().log });
    const factory = registry.create(
      'function',
      async function double(x: number): Promise<number> {
        return x * 2;
      },
      { context }
    );

    await expect(factory.invoke(21).result).resolves.toBe(42);
  });

  it('keeps concurrent invocations independent', async () => {
    const context = new InlineExecutionContext({ logger: captureLogger().log });
    const registry = new TaskKindRegistry('test', { logger: captureLogger().log });
    const factory = registry.create(
      'function',
      async function echo(value: string, delayMs: number): Promise<string> {
        await new Promise((resolve) => setTimeout(resolve, delayMs));
        return value;
      },
      { context }
    );

    const futures = ['a', 'b', 'c', 'd'].map((value, i) => factory.invoke(value, (4 - i) * 5));
    const results = await Promise.all(futures.map((f) => f.result));

    expect(results).toEqual(['a', 'b', 'c', 'd']);
    expect(new Set(futures.map((f) => f.taskId)).size).toBe(4);
  });
});

describe('ShellTaskWrapper', () => {
  const registry = new TaskKindRegistry('test', { logger: captureLogger().log });
  const context = new InlineExecutionContext({ logger: captureLogger().log });

  it('runs the command the callable builds', async () => {
    const factory = registry.create(
      'bash',
      function greet(name: string): string {
        return `echo hello ${name}`;
      },
      { context }
    );

    const result = await factory.invoke('world').result;

    expect(result).toEqual({
      command: 'echo hello world',
      exitCode: 0,
      stdout: 'hello world\n',
      stderr: '',
    });
  });

  it('accepts asynchronous command builders', async () => {
    const factory = registry.create(
      'shell',
      async function count(n: number): Promise<string> {
        return `seq ${n}`;
      },
      { context }
    );

    const result = await factory.invoke(3).result;
    expect(result.stdout).toBe('1\n2\n3\n');
  });

  it('rejects builders that return no command', async () => {
    const factory = registry.create(
      'bash',
      function blank(): string {
        return '  ';
      },
      { context }
    );

    await expect(factory.invoke().result).rejects.toThrow(InvalidShellCommandError);
    await expect(factory.invoke().result).rejects.toThrow(
      'Shell task blank must return a non-empty command string, got empty string'
    );
  });

  it('rejects builders that return something other than a string', async () => {
    const notAString = (): number => 7;
    const wrapper = new ShellTaskWrapper(notAString, wrapperOptions(notAString, { context }));

    await expect(wrapper.invoke().result).rejects.toThrow(
      'Shell task notAString must return a non-empty command string, got number'
    );
  });

  it('is tagged as a bash task', () => {
    const capturing = new CapturingContext();
    const build = (): string => 'true';
    const wrapper = new ShellTaskWrapper(build, wrapperOptions(build, { context: capturing }));

    const future = wrapper.invoke();

    expect(future.kind).toBe('bash');
    return future.result;
  });
});

describe('runShellCommand', () => {
  it('reports non-zero exits with their code and stderr', async () => {
    let caught: unknown;
    try {
      await runShellCommand('echo oops >&2; exit 3', { taskName: 'fail', walltimeSeconds: 5 });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ShellExitError);
    if (caught instanceof ShellExitError) {
      expect(caught.exitCode).toBe(3);
      expect(caught.stderr).toBe('oops\n');
      expect(caught.message).toBe('Shell task fail exited with code 3');
    }
  });

  it('kills commands that run past their walltime', async () => {
    await expect(
      runShellCommand('exec sleep 5', { taskName: 'slow', walltimeSeconds: 0.2 })
    ).rejects.toThrow(WalltimeExceededError);
  });

  it('runs in the given directory', async () => {
    const result = await runShellCommand('pwd', { taskName: 'where', walltimeSeconds: 5, cwd: '/' });
    expect(result.stdout).toBe('/\n');
  });
});

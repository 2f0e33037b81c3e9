import { InvalidTaskKindError } from '../../app/task/errors';
import { TaskDescriptorFactory } from '../../app/task/factory';
import { TaskKindRegistry } from '../../app/task/registry';
import { FunctionTaskWrapper } from '../../app/task/wrappers/function-task';
import { ShellTaskWrapper } from '../../app/task/wrappers/shell-task';
import { captureLogger } from '../support/capture-logger';

function listFiles(dir: string): string {
  return `ls ${dir}`;
}

function add(a: number, b: number): number {
  return a + b;
}

describe('TaskKindRegistry', () => {
  it('lists its kinds', () => {
    const registry = new TaskKindRegistry('test', { logger: captureLogger().log });
    expect(registry.kinds()).toEqual(['bash', 'function']);
  });

  it('resolves aliases to canonical kinds', () => {
    const registry = new TaskKindRegistry('test', { logger: captureLogger().log });
    expect(registry.resolveKind('shell')).toBe('bash');
    expect(registry.resolveKind('bash')).toBe('bash');
    expect(registry.resolveKind('function')).toBe('function');
    expect(registry.resolveKind('python')).toBe('function');
    expect(registry.resolveKind('ruby')).toBeUndefined();
    expect(registry.hasKind('function')).toBe(true);
    expect(registry.hasKind('shell')).toBe(false);
  });

  describe('create', () => {
    it('binds bash tasks to the shell wrapper', () => {
      const registry = new TaskKindRegistry('test', { logger: captureLogger().log });
      const factory = registry.create('bash', listFiles);

      expect(factory).toBeInstanceOf(TaskDescriptorFactory);
      expect(factory.taskKind).toBe(ShellTaskWrapper);
      expect(registry.create('shell', listFiles).taskKind).toBe(ShellTaskWrapper);
    });

    it('binds function tasks to the function wrapper', () => {
      const registry = new TaskKindRegistry('test', { logger: captureLogger().log });
      const factory = registry.create('function', add);

      expect(factory.taskKind).toBe(FunctionTaskWrapper);
      expect(factory.callable).toBe(add);
    });

    it('binds python tasks to the function wrapper', () => {
      const registry = new TaskKindRegistry('test', { logger: captureLogger().log });
      const factory = registry.create('python', add);

      expect(factory.taskKind).toBe(FunctionTaskWrapper);
      expect(factory.callable).toBe(add);
    });

    it('forwards parameters unchanged', () => {
      const registry = new TaskKindRegistry('test', { logger: captureLogger().log });
      const factory = registry.create('function', add, {
        cache: true,
        executors: ['local'],
        walltimeSeconds: 10,
        auxiliaryFiles: ['a.txt', 'b.txt'],
        sourceProvider: () => 'abc',
      });

      expect(factory.cache).toBe(true);
      expect(factory.executors).toEqual(['local']);
      expect(factory.walltimeSeconds).toBe(10);
      expect(factory.auxiliaryFiles).toEqual(['a.txt', 'b.txt']);
      expect(factory.contentIdentity).toBe('900150983cd24fb0d6963f7d28e17f72');
    });

    it('fills omitted parameters from registry defaults', () => {
      const registry = new TaskKindRegistry('test', {
        logger: captureLogger().log,
        defaults: { walltimeSeconds: 300, executors: ['gpu'] },
      });

      const defaulted = registry.create('function', add);
      expect(defaulted.walltimeSeconds).toBe(300);
      expect(defaulted.executors).toEqual(['gpu']);

      const explicit = registry.create('function', add, { walltimeSeconds: 5 });
      expect(explicit.walltimeSeconds).toBe(5);
      expect(explicit.executors).toEqual(['gpu']);
    });

    it('keeps its defaults when the caller later changes them', () => {
      const defaults = { auxiliaryFiles: ['log.txt'], executors: ['gpu'] };
      const registry = new TaskKindRegistry('test', { logger: captureLogger().log, defaults });

      defaults.auxiliaryFiles.push('injected.txt');
      defaults.executors.push('injected');
      const factory = registry.create('function', add);

      expect(factory.auxiliaryFiles).toEqual(['log.txt']);
      expect(factory.executors).toEqual(['gpu']);
    });

    it('rejects unknown kinds with a typed error', () => {
      const registry = new TaskKindRegistry('test', { logger: captureLogger().log });

      expect(() => registry.create('nonexistent', add)).toThrow(InvalidTaskKindError);
      expect(() => registry.create('nonexistent', add)).toThrow(
        'TaskKindRegistry:test Invalid task kind requested: nonexistent'
      );
    });

    it('names the registry and the kind on the error', () => {
      const registry = new TaskKindRegistry('pipeline', { logger: captureLogger().log });

      let caught: unknown;
      try {
        registry.create('perl', add);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(InvalidTaskKindError);
      if (caught instanceof InvalidTaskKindError) {
        expect(caught.registryName).toBe('pipeline');
        expect(caught.kind).toBe('perl');
        expect(caught.code).toBe('INVALID_TASK_KIND');
      }
    });

    it('logs the rejection at error level before throwing', () => {
      const { log, lines } = captureLogger();
      const registry = new TaskKindRegistry('test', { logger: log });

      expect(() => registry.create('nonexistent', add)).toThrow(InvalidTaskKindError);
      expect(lines).toEqual([
        { level: 'error', line: '[ERROR] Invalid task kind requested registry=test kind=nonexistent' },
      ]);
    });
  });
});

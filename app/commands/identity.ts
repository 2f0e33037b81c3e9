import { Command } from 'commander';
import { resolve } from 'path';
import type { TaskKindRegistry } from '../task/registry';
import type { TaskCallable } from '../task/types';
import { registryFromConfig } from './registry';

interface IdentityOptions {
  kind: string;
  cache?: boolean;
  config?: string;
}

function isTaskCallable(value: unknown): value is TaskCallable {
  return typeof value === 'function';
}

/**
 * Pick a callable out of a loaded module. Without a name the default export
 * is used, or the module itself when it is a function.
 */
export function resolveExport(loaded: unknown, exportName?: string): TaskCallable {
  const name = exportName ?? 'default';

  if (exportName === undefined && isTaskCallable(loaded)) {
    return loaded;
  }

  const candidate: unknown =
    typeof loaded === 'object' && loaded !== null ? Reflect.get(loaded, name) : undefined;

  if (!isTaskCallable(candidate)) {
    throw new TypeError(`Export "${name}" is not a function`);
  }
  return candidate;
}

/**
 * Build a factory for the callable and report how it is identified.
 * Without `cache` the registry default applies.
 */
export function describeIdentity(
  registry: TaskKindRegistry,
  kind: string,
  callable: TaskCallable,
  cache?: boolean
): string[] {
  const factory = registry.create(kind, callable, cache === undefined ? {} : { cache });

  return [
    `Kind: ${registry.resolveKind(kind) ?? kind}`,
    `Task: ${factory.displayName}`,
    `Cache: ${factory.cache ? 'enabled' : 'disabled'}`,
    `Origin: ${factory.identityOrigin}`,
    `Identity: ${factory.contentIdentity}`,
  ];
}

export const identityCommand = new Command('identity')
  .description('Show the cache identity of a task exported by a module')
  .argument('<module>', 'Path to a CommonJS module')
  .argument('[export]', 'Export name (defaults to the default export)')
  .option('-k, --kind <kind>', 'Task kind', 'function')
  .option('--cache', 'Derive the identity from source')
  .option('--no-cache', 'Use the display name as identity')
  .option('-c, --config <path>', 'Config file')
  .action((modulePath: string, exportName: string | undefined, options: IdentityOptions) => {
    try {
      const registry = registryFromConfig(options.config);
      const loaded: unknown = require(resolve(modulePath));
      const callable = resolveExport(loaded, exportName);

      for (const line of describeIdentity(registry, options.kind, callable, options.cache)) {
        console.log(line);
      }
    } catch (error) {
      console.error(error instanceof Error ? error.message : String(error));
      process.exitCode = 1;
    }
  });

import { Command } from 'commander';
import { TASK_KIND_ALIASES, type TaskKindRegistry } from '../task/registry';
import { registryFromConfig } from './registry';

/**
 * One line per kind: `name  (aliases: a, b)`
 */
export function describeKinds(registry: TaskKindRegistry): string[] {
  return registry.kinds().map((kind) => {
    const aliases = Object.entries(TASK_KIND_ALIASES)
      .filter(([, target]) => target === kind)
      .map(([alias]) => alias);
    const suffix = aliases.length > 0 ? `  (aliases: ${aliases.join(', ')})` : '';
    return `${kind}${suffix}`;
  });
}

export const kindsCommand = new Command('kinds')
  .description('List registered task kinds')
  .option('-c, --config <path>', 'Config file')
  .action((options: { config?: string }) => {
    const registry = registryFromConfig(options.config);

    console.log(`Registry: ${registry.name}`);
    for (const line of describeKinds(registry)) {
      console.log(`  ${line}`);
    }
  });

import { configureLogging, loadConfig } from '../config/index';
import { TaskKindRegistry } from '../task/registry';

/**
 * Registry configured from the config file, with logging applied first so
 * the registry's logger picks up the configured level.
 */
export function registryFromConfig(configPath?: string): TaskKindRegistry {
  const config = loadConfig(configPath);
  configureLogging(config.logging);

  return new TaskKindRegistry(config.registryName, { defaults: config.tasks });
}

import { join } from 'path';
import type { AppConfig } from './schema';

export const CONFIG_FILE_NAME = 'taskmint.json';

/**
 * Environment variable that overrides `logging.level`
 */
export const LOG_LEVEL_ENV = 'TASKMINT_LOG_LEVEL';

/**
 * Default configuration values
 */
export const defaultConfig: AppConfig = {
  registryName: 'default',
  tasks: {
    cache: false,
    executors: 'all',
    walltimeSeconds: 60,
    auxiliaryFiles: [],
  },
  logging: {
    level: 'info',
    timestamps: true,
  },
};

/**
 * Config file in the given directory (the working directory by default)
 */
export function getDefaultConfigPath(dir: string = process.cwd()): string {
  return join(dir, CONFIG_FILE_NAME);
}

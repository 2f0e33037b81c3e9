import { existsSync, readFileSync } from 'fs';
import { dirname, join } from 'path';
import { logger } from '../utils/logger';
import { appConfigSchema, logLevelSchema, type AppConfig, type LoggingConfig } from './schema';
import { LOG_LEVEL_ENV, getDefaultConfigPath } from './defaults';

export type { AppConfig, TaskDefaultsConfig, LoggingConfig } from './schema';
export { defaultConfig, getDefaultConfigPath, CONFIG_FILE_NAME, LOG_LEVEL_ENV } from './defaults';

/**
 * Load configuration from file
 *
 * A missing file yields the defaults. `.env` beside the file is read into
 * `env` without overriding variables already set; `TASKMINT_LOG_LEVEL`
 * then overrides `logging.level`.
 *
 * @throws ZodError when the file or the override does not validate
 */
export function loadConfig(
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env
): AppConfig {
  const path = configPath || getDefaultConfigPath();

  try {
    let rawConfig: unknown = {};

    if (existsSync(path)) {
      rawConfig = JSON.parse(readFileSync(path, 'utf-8'));
    } else if (configPath) {
      logger.warn(`Config file not found at ${path}, using defaults`);
    }

    loadEnvFile(dirname(path), env);

    const config = appConfigSchema.parse(rawConfig);

    const levelOverride = env[LOG_LEVEL_ENV];
    if (levelOverride) {
      config.logging.level = logLevelSchema.parse(levelOverride);
    }

    return config;
  } catch (error) {
    if (error instanceof Error) {
      logger.error(`Failed to load config: ${error.message}`, { path });
    }
    throw error;
  }
}

/**
 * Parse `.env` content into key/value pairs. Accepts an `export ` prefix and
 * strips one layer of matching quotes; malformed lines are skipped.
 */
export function parseEnvFile(content: string): Map<string, string> {
  const entries = new Map<string, string>();

  for (const raw of content.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line || line.startsWith('#')) {
      continue;
    }

    const match = /^(?:export\s+)?([A-Za-z_][A-Za-z0-9_]*)\s*=\s*(.*)$/.exec(line);
    if (!match) {
      continue;
    }

    const [, key, value] = match;
    const quoted = /^(['"])(.*)\1$/.exec(value);
    entries.set(key, quoted ? quoted[2] : value);
  }

  return entries;
}

function loadEnvFile(baseDir: string, env: NodeJS.ProcessEnv): void {
  const envPath = join(baseDir, '.env');
  if (!existsSync(envPath)) {
    return;
  }

  for (const [key, value] of parseEnvFile(readFileSync(envPath, 'utf-8'))) {
    if (env[key] === undefined) {
      env[key] = value;
    }
  }
}

/**
 * Apply logging settings to the shared logger
 */
export function configureLogging(config: LoggingConfig): void {
  logger.setLevel(config.level);
  logger.setTimestamps(config.timestamps);
}

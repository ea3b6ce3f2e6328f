/**
 * Configuration Loader
 *
 * Resolves the config file location, parses it and applies environment
 * overrides. A missing file means defaults.
 */

import { existsSync, readFileSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import { ConfigError } from '../shared/errors/index.js';
import { createLogger } from '../shared/services/logging.service.js';
import { KeyhintsConfigSchema, type KeyhintsConfig } from './config.schema.js';

const logger = createLogger('Config');

export interface LoadConfigOptions {
  /** Explicit file; when set, a missing file is an error */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * $XDG_CONFIG_HOME/keyhints/config.json, else ~/.config/keyhints/config.json
 */
export function defaultConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const base = env.XDG_CONFIG_HOME || join(homedir(), '.config');
  return join(base, 'keyhints', 'config.json');
}

/**
 * Validate an already-parsed config object
 *
 * @throws ConfigError naming every offending path
 */
export function parseConfig(raw: unknown, source = '(inline)'): KeyhintsConfig {
  const parsed = KeyhintsConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
    );
    throw new ConfigError(`Invalid configuration in ${source}: ${issues.join('; ')}`, {
      source,
      issues,
    });
  }

  const config = parsed.data;
  if (config.maxLabelLength < config.minLabelLength) {
    throw new ConfigError(
      `Invalid configuration in ${source}: maxLabelLength must be >= minLabelLength`,
      { source, issues: ['maxLabelLength: must be >= minLabelLength'] },
    );
  }
  return config;
}

/**
 * Load configuration from disk and the environment
 *
 * @throws ConfigError when the file is unreadable or invalid
 */
export function loadConfig(options: LoadConfigOptions = {}): KeyhintsConfig {
  const env = options.env ?? process.env;
  const path = options.configPath ?? defaultConfigPath(env);

  let raw: unknown = {};
  if (existsSync(path)) {
    try {
      raw = JSON.parse(readFileSync(path, 'utf8'));
    } catch (error) {
      throw new ConfigError(
        `Cannot read configuration ${path}`,
        { source: path },
        error instanceof Error ? error : undefined,
      );
    }
    logger.debug('Loaded configuration file', { path });
  } else if (options.configPath) {
    throw new ConfigError(`Configuration file ${path} does not exist`, { source: path });
  }

  const config = parseConfig(raw, path);

  if (env.KEYHINTS_SOCKET) {
    config.socketPath = env.KEYHINTS_SOCKET;
  }

  return config;
}

// Singleton instance
let activeConfig: KeyhintsConfig | null = null;

/**
 * Load and install the process-wide configuration
 */
export function initConfig(options: LoadConfigOptions = {}): KeyhintsConfig {
  activeConfig = loadConfig(options);
  return activeConfig;
}

/**
 * Get the current configuration.
 * Throws if not initialized.
 */
export function getConfig(): KeyhintsConfig {
  if (!activeConfig) {
    throw new Error('Config not initialized. Call initConfig() first.');
  }
  return activeConfig;
}

/**
 * Reset configuration state (for testing).
 */
export function resetConfig(): void {
  activeConfig = null;
}

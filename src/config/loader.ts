/**
 * Configuration loader - reads a JSON5 config file or the environment.
 */

import { existsSync, readFileSync } from 'fs';
import JSON5 from 'json5';
import { isLogLevel } from '../logging/logger.js';
import { expandEnvDeep, type Env } from './env-expand.js';
import { defaultConfig, validateConfig, type CuemarkConfig } from './schema.js';

export const DEFAULT_CONFIG_FILE = 'cuemark.config.json5';

export const ENV_REMOVAL_TOKEN = 'CUEMARK_HOOK_REMOVAL_TOKEN';
export const ENV_LOG_LEVEL = 'LOG_LEVEL';

export function parseConfigContent(content: string): unknown {
  return JSON5.parse(content);
}

/**
 * Load and validate a config file. `${VAR}` and `${VAR:-default}` in string
 * values are expanded from `env`. A missing file yields the defaults.
 *
 * @throws Error when the file is not valid JSON5 or fails validation
 */
export function loadConfig(options: { path?: string; env?: Env } = {}): CuemarkConfig {
  const configPath = options.path ?? DEFAULT_CONFIG_FILE;
  const env = options.env ?? process.env;

  if (!existsSync(configPath)) {
    return defaultConfig();
  }

  const content = readFileSync(configPath, 'utf-8');
  const parsed = parseConfigContent(content);
  const substituted = expandEnvDeep(parsed, env);

  const result = validateConfig(substituted);
  if (!result.success) {
    throw new Error(`Invalid config in ${configPath}: ${result.error}`);
  }
  return result.data;
}

/**
 * Defaults with `CUEMARK_HOOK_REMOVAL_TOKEN` and `LOG_LEVEL` applied.
 * An unrecognised log level is ignored.
 */
export function loadConfigFromEnv(env: Env = process.env): CuemarkConfig {
  const config = defaultConfig();

  const token = env[ENV_REMOVAL_TOKEN]?.trim();
  if (token) {
    config.hooks.removalToken = token;
  }

  const level = env[ENV_LOG_LEVEL]?.trim().toLowerCase();
  if (isLogLevel(level)) {
    config.logging.level = level;
  }

  return config;
}

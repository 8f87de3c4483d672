export {
  cuemarkConfigSchema,
  hooksConfigSchema,
  loggingConfigSchema,
  namespacesConfigSchema,
  validateConfig,
  defaultConfig,
} from './schema.js';
export {
  loadConfig,
  loadConfigFromEnv,
  parseConfigContent,
  DEFAULT_CONFIG_FILE,
  ENV_REMOVAL_TOKEN,
  ENV_LOG_LEVEL,
} from './loader.js';
export { expandEnvVars, expandEnvDeep } from './env-expand.js';

export type { CuemarkConfig, CuemarkConfigInput } from './schema.js';
export type { Env } from './env-expand.js';

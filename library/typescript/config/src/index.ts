export {
  validate,
  loadFromEnv,
  ENV_URL,
  ENV_API_KEY,
  ENV_TIMEOUT_MS,
  ENV_LOG_LEVEL,
  ENV_LOG_FORMAT,
} from './load.js';
export { ConfigError } from './error.js';
export {
  ClientConfigSchema,
  LogConfigSchema,
  MAX_TIMEOUT_MS,
  type ClientConfig,
  type ClientConfigInput,
  type LogConfig,
} from './config.js';

export type { BerthConfig, ConfigSource, LogLevel } from "./config/types.js";
export {
  DEFAULT_CONFIG,
  DEFAULT_SHUTDOWN_GRACE_MS,
  LOG_LEVELS,
  MAX_SHUTDOWN_GRACE_MS,
  isLogLevel,
  isShutdownGrace,
  mergeConfig,
  validateConfig,
} from "./config/schema.js";
export {
  DEFAULT_CONFIG_FILE,
  ENV_KEYS,
  loadConfig,
  type LoadOptions,
  type LoadResult,
} from "./config/loader.js";
export { envHasAny, envString } from "./config/env.js";

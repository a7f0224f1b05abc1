/**
 * Config - Barrel Export
 */
export {
  AppConfig,
  CliOptions,
  loadConfig,
  splitList,
  DEFAULT_OUTPUT_DIR,
  DEFAULT_API_TIMEOUT_MS,
} from './app.config';
export { ConfigError } from './config-error';

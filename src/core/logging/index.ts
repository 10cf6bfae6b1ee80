export {
  createLogger,
  getComponentLogger,
  logger,
} from './logger.js';
export { DEFAULT_LOGGER_CONFIG, getLoggerConfigFromEnv, validateLoggerConfig } from './config.js';
export type { LogLevel, LoggerConfig, ReconcilerLogger } from './types.js';

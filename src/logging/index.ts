export { LogLevel, parseLogLevel } from './LogLevel.js';
export { Logger } from './Logger.js';
export {
  getLogger,
  initializeLogging,
  setGlobalLevel,
  getGlobalLevel,
  shutdownLogging,
  resetLogging,
} from './LoggerFactory.js';
export {
  registerComponent,
  setComponentLevel,
  clearComponentLevel,
  resetDebugRegistry,
  getRegisteredComponents,
} from './DebugModeRegistry.js';
export { getLoggingConfig, resetLoggingConfig } from './config.js';
export type { LogTransport } from './transports.js';

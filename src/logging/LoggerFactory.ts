/**
 * Logger Factory
 *
 * Creates the root winston logger and caches per-component Logger wrappers.
 *
 * Usage:
 *   const logger = getLogger('sync-engine');
 *   logger.info('Content phase complete');
 */

import winston from 'winston';
import { LogLevel } from './LogLevel.js';
import { getLoggingConfig } from './config.js';
import { initFromEnv } from './DebugModeRegistry.js';
import { Logger, setGlobalLevelProvider } from './Logger.js';
import { ConsoleTransport, FileTransport } from './transports.js';
import type { LogTransport } from './transports.js';

/**
 * Winston ranks error highest (0) and trace lowest (4).
 */
const WINSTON_LEVELS: Record<string, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4,
};

function toWinstonLevel(level: LogLevel): string {
  switch (level) {
    case LogLevel.ERROR:
      return 'error';
    case LogLevel.WARN:
      return 'warn';
    case LogLevel.DEBUG:
      return 'debug';
    case LogLevel.TRACE:
      return 'trace';
    default:
      return 'info';
  }
}

let rootLogger: winston.Logger | null = null;
let currentGlobalLevel: LogLevel = LogLevel.INFO;
const loggerCache = new Map<string, Logger>();

/**
 * Initialize logging. getLogger() lazy-initializes with defaults if this is skipped.
 */
export function initializeLogging(additionalTransports?: LogTransport[]): winston.Logger {
  const config = getLoggingConfig();
  currentGlobalLevel = config.logLevel;

  const transports: winston.transport[] = [new ConsoleTransport(config.logFormat).createWinstonTransport()];
  if (config.logFile) {
    transports.push(new FileTransport(config.logFile, config.logFormat).createWinstonTransport());
  }
  for (const t of additionalTransports ?? []) {
    transports.push(t.createWinstonTransport());
  }

  // Trace is the winston threshold; Logger does the real filtering per component.
  const root = winston.createLogger({
    levels: WINSTON_LEVELS,
    level: 'trace',
    transports,
    exitOnError: false,
  });
  rootLogger = root;

  setGlobalLevelProvider(() => currentGlobalLevel);
  initFromEnv(config.debugComponents);

  for (const [component] of loggerCache) {
    loggerCache.set(component, new Logger(component, root));
  }
  return root;
}

export function getLogger(component: string): Logger {
  const cached = loggerCache.get(component);
  if (cached) return cached;

  const root = rootLogger ?? initializeLogging();
  const logger = new Logger(component, root);
  loggerCache.set(component, logger);
  return logger;
}

export function setGlobalLevel(level: LogLevel): void {
  currentGlobalLevel = level;
}

export function getGlobalLevel(): LogLevel {
  return currentGlobalLevel;
}

/**
 * Flush pending writes.
 */
export async function shutdownLogging(): Promise<void> {
  const root = rootLogger;
  if (!root) return;
  await new Promise<void>((resolve) => {
    root.on('finish', resolve);
    root.end();
  });
  rootLogger = null;
  loggerCache.clear();
}

/**
 * Reset all logging state (for testing).
 */
export function resetLogging(): void {
  rootLogger?.close();
  rootLogger = null;
  currentGlobalLevel = LogLevel.INFO;
  loggerCache.clear();
  setGlobalLevelProvider(() => LogLevel.INFO);
}

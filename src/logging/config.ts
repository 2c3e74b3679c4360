/**
 * Logging Configuration
 *
 * Derived from environment variables. Unlike the publish configuration this is
 * cached, since loggers are created at module load; use resetLoggingConfig() in tests.
 */

import { LogLevel, parseLogLevel } from './LogLevel.js';

export interface LoggingConfiguration {
  /** Minimum log level (LOG_LEVEL env, default INFO) */
  logLevel: LogLevel;
  /** Components to enable debug logging for (PUBLISH_DEBUG_COMPONENTS env, comma-separated) */
  debugComponents: string[];
  /** Log output format (LOG_FORMAT env, default 'text') */
  logFormat: 'text' | 'json';
  /** Optional file path to write logs to (LOG_FILE env) */
  logFile?: string;
}

let cachedConfig: LoggingConfiguration | null = null;

function parseFormat(value: string | undefined): 'text' | 'json' {
  if (value === 'json') return 'json';
  return 'text';
}

function parseDebugComponents(value: string | undefined): string[] {
  if (!value || value.trim() === '') return [];
  return value
    .split(',')
    .map((c) => c.trim())
    .filter((c) => c.length > 0);
}

export function getLoggingConfig(env: NodeJS.ProcessEnv = process.env): LoggingConfiguration {
  if (cachedConfig) return cachedConfig;

  cachedConfig = {
    logLevel: parseLogLevel(env['LOG_LEVEL'] ?? 'INFO'),
    debugComponents: parseDebugComponents(env['PUBLISH_DEBUG_COMPONENTS']),
    logFormat: parseFormat(env['LOG_FORMAT']),
    logFile: env['LOG_FILE'] || undefined,
  };

  return cachedConfig;
}

/**
 * Reset cached configuration (for testing)
 */
export function resetLoggingConfig(): void {
  cachedConfig = null;
}

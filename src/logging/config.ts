/**
 * Logging configuration, read from the environment once and cached.
 */

import { LogLevel, parseLogLevel } from './LogLevel.js';

export type LogFormat = 'text' | 'json';

export interface LoggingConfiguration {
  /** Minimum log level (LOG_LEVEL, default INFO) */
  logLevel: LogLevel;
  /** Components with a debug override (GITOPS_DEBUG_COMPONENTS, comma-separated) */
  debugComponents: string[];
  /** Console format (LOG_FORMAT, default 'text') */
  logFormat: LogFormat;
  /** Optional log file (LOG_FILE) */
  logFile?: string;
}

let cachedConfig: LoggingConfiguration | null = null;

function parseDebugComponents(value: string | undefined): string[] {
  if (!value || value.trim() === '') return [];
  return value
    .split(',')
    .map((c) => c.trim())
    .filter((c) => c.length > 0);
}

export function getLoggingConfig(): LoggingConfiguration {
  if (cachedConfig) return cachedConfig;

  cachedConfig = {
    logLevel: parseLogLevel(process.env['LOG_LEVEL'] ?? 'INFO'),
    debugComponents: parseDebugComponents(process.env['GITOPS_DEBUG_COMPONENTS']),
    logFormat: process.env['LOG_FORMAT'] === 'json' ? 'json' : 'text',
    logFile: process.env['LOG_FILE'] || undefined,
  };

  return cachedConfig;
}

/**
 * Reset cached configuration (for testing)
 */
export function resetLoggingConfig(): void {
  cachedConfig = null;
}

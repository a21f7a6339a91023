/**
 * Logger Factory
 *
 * Owns the root winston logger and hands out cached per-component Loggers.
 *
 *   import { getLogger, registerComponent } from '../logging/index.js';
 *
 *   registerComponent('drift', 'Drift detection');
 *   const logger = getLogger('drift');
 *   logger.info('Working tree clean');
 */

import winston from 'winston';
import { LogLevel } from './LogLevel.js';
import { getLoggingConfig } from './config.js';
import { initFromEnv } from './DebugModeRegistry.js';
import { Logger, setGlobalLevelProvider } from './Logger.js';
import { ConsoleTransport, FileTransport } from './transports.js';
import type { LogTransport } from './transports.js';

/** winston: lower number = higher priority */
const WINSTON_LEVELS: Record<string, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4,
};

let rootLogger: winston.Logger | null = null;
let currentGlobalLevel: LogLevel = LogLevel.INFO;
const loggerCache = new Map<string, Logger>();

/**
 * Initialize the logging subsystem. Safe to call again; the existing root
 * logger is reconfigured in place.
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

  const options: winston.LoggerOptions = {
    levels: WINSTON_LEVELS,
    // Filtering happens in Logger so per-component overrides can go below the global level
    level: 'trace',
    transports,
    exitOnError: false,
  };
  const root = rootLogger ?? winston.createLogger(options);
  if (rootLogger) {
    root.configure(options);
  }
  rootLogger = root;

  setGlobalLevelProvider(() => currentGlobalLevel);
  initFromEnv(config.debugComponents);
  return root;
}

function ensureInitialized(): winston.Logger {
  return rootLogger ?? initializeLogging();
}

/**
 * Get (or create) the Logger for a component.
 */
export function getLogger(component: string): Logger {
  const cached = loggerCache.get(component);
  if (cached) return cached;

  const logger = new Logger(component, ensureInitialized);
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
 * Flush pending writes and close transports.
 */
export async function shutdownLogging(): Promise<void> {
  const root = rootLogger;
  if (!root) return;
  await new Promise<void>((resolve) => {
    root.on('finish', () => resolve());
    root.end();
  });
  rootLogger = null;
}

/**
 * Reset all logging state (for testing).
 */
export function resetLogging(): void {
  if (rootLogger) {
    rootLogger.close();
  }
  rootLogger = null;
  currentGlobalLevel = LogLevel.INFO;
  loggerCache.clear();
  setGlobalLevelProvider(() => LogLevel.INFO);
}

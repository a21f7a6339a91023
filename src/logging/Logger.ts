/**
 * Logger
 *
 * Thin wrapper around the shared winston logger, bound to one component name.
 * Level filtering goes through DebugModeRegistry so a single component can be
 * raised to DEBUG without touching the global level.
 */

import winston from 'winston';
import { LogLevel } from './LogLevel.js';
import { shouldLog } from './DebugModeRegistry.js';

/** Injected by LoggerFactory to avoid a circular import */
let globalLevelFn: () => LogLevel = () => LogLevel.INFO;

/**
 * @internal
 */
export function setGlobalLevelProvider(fn: () => LogLevel): void {
  globalLevelFn = fn;
}

const WINSTON_LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.TRACE]: 'trace',
  [LogLevel.DEBUG]: 'debug',
  [LogLevel.INFO]: 'info',
  [LogLevel.WARN]: 'warn',
  [LogLevel.ERROR]: 'error',
};

export class Logger {
  constructor(
    private readonly component: string,
    /** Resolved per call so loggers created at import time follow re-initialisation */
    private readonly root: () => winston.Logger
  ) {}

  trace(message: string, metadata?: Record<string, unknown>): void {
    this.logAt(LogLevel.TRACE, message, undefined, metadata);
  }

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.logAt(LogLevel.DEBUG, message, undefined, metadata);
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.logAt(LogLevel.INFO, message, undefined, metadata);
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.logAt(LogLevel.WARN, message, undefined, metadata);
  }

  /**
   * Log an ERROR-level message. The error's stack is attached as `errorStack`.
   */
  error(message: string, error?: Error, metadata?: Record<string, unknown>): void {
    this.logAt(LogLevel.ERROR, message, error, metadata);
  }

  isDebugEnabled(): boolean {
    return shouldLog(this.component, LogLevel.DEBUG, globalLevelFn());
  }

  /**
   * e.g. logger.child('pipeline') on "coordinator" yields "coordinator.pipeline"
   */
  child(subComponent: string): Logger {
    return new Logger(`${this.component}.${subComponent}`, this.root);
  }

  getComponent(): string {
    return this.component;
  }

  private logAt(level: LogLevel, message: string, error?: Error, metadata?: Record<string, unknown>): void {
    if (!shouldLog(this.component, level, globalLevelFn())) {
      return;
    }

    const meta: Record<string, unknown> = {
      component: this.component,
      ...metadata,
    };
    if (error?.stack) {
      meta['errorStack'] = error.stack;
    }
    this.root().log(WINSTON_LEVEL_NAMES[level], message, meta);
  }
}

/**
 * Winston transports for console and file output.
 *
 * Text lines look like:
 *   INFO  2026-03-02T09:14:07.120Z [coordinator] Deployment succeeded at 4f2c1d0
 */

import winston from 'winston';
import type { LogFormat } from './config.js';

export interface LogTransport {
  name: string;
  createWinstonTransport(): winston.transport;
}

export function formatTextLine(
  level: string,
  timestamp: string,
  message: string,
  component?: string,
  errorStack?: string
): string {
  const componentPart = component ? ` [${component}]` : '';
  let line = `${level.toUpperCase().padEnd(5)} ${timestamp}${componentPart} ${message}`;
  if (errorStack) {
    line += '\n' + errorStack;
  }
  return line;
}

function buildFormat(format: LogFormat): winston.Logform.Format {
  if (format === 'json') {
    return winston.format.combine(winston.format.timestamp(), winston.format.json());
  }
  return winston.format.printf((info) => {
    const component = typeof info['component'] === 'string' ? info['component'] : undefined;
    const errorStack = typeof info['errorStack'] === 'string' ? info['errorStack'] : undefined;
    return formatTextLine(info.level, new Date().toISOString(), String(info.message), component, errorStack);
  });
}

/**
 * Console transport. Every level goes to stdout so a service manager
 * captures a single ordered stream.
 */
export class ConsoleTransport implements LogTransport {
  name = 'console';

  constructor(private format: LogFormat) {}

  createWinstonTransport(): winston.transport {
    return new winston.transports.Console({
      format: buildFormat(this.format),
      stderrLevels: [],
    });
  }
}

/**
 * Size-rotated file transport.
 */
export class FileTransport implements LogTransport {
  name = 'file';

  constructor(
    private filePath: string,
    private format: LogFormat
  ) {}

  createWinstonTransport(): winston.transport {
    return new winston.transports.File({
      filename: this.filePath,
      format: buildFormat(this.format),
      maxsize: 10 * 1024 * 1024,
      maxFiles: 5,
    });
  }
}

/**
 * winston transport that keeps every entry in memory.
 */

import winston from 'winston';
import TransportStream from 'winston-transport';
import type { LogTransport } from '../../src/logging/transports.js';

export interface CapturedEntry {
  level: string;
  message: string;
  meta: Record<string, unknown>;
}

export class CaptureTransport extends TransportStream {
  readonly entries: CapturedEntry[] = [];

  override log(info: winston.Logform.TransformableInfo, next: () => void): void {
    const meta: Record<string, unknown> = {};
    for (const key of Object.keys(info)) {
      if (key !== 'level' && key !== 'message') meta[key] = info[key];
    }
    this.entries.push({ level: info.level, message: String(info.message), meta });
    next();
  }
}

export class CaptureLogTransport implements LogTransport {
  name = 'capture';
  readonly transport = new CaptureTransport();

  createWinstonTransport(): winston.transport {
    return this.transport;
  }
}

export function createCapturingLogger(): { root: winston.Logger; capture: CaptureTransport } {
  const capture = new CaptureTransport();
  const root = winston.createLogger({
    levels: { error: 0, warn: 1, info: 2, debug: 3, trace: 4 },
    level: 'trace',
    transports: [capture],
  });
  return { root, capture };
}

/** winston hands entries to transports through a stream */
export function flushLogs(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

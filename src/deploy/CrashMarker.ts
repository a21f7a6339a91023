/**
 * Write-ahead marker for an in-flight deployment.
 *
 * Written before the first phase that mutates the working tree and removed
 * once the attempt reaches a terminal state that leaves the tree consistent.
 * Finding one at startup means the previous process died mid-deployment.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import type { TriggerReason } from './types.js';

const CrashMarkerSchema = z.object({
  attemptId: z.string(),
  trigger: z.enum(['poll', 'webhook', 'manual']),
  startedAt: z.string(),
  fromCommit: z.string().optional(),
  targetCommit: z.string().optional(),
});

export interface CrashMarkerRecord {
  attemptId: string;
  trigger: TriggerReason;
  /** ISO-8601 */
  startedAt: string;
  fromCommit?: string;
  targetCommit?: string;
}

/**
 * `record` is null when the file exists but cannot be parsed; that still
 * counts as an interrupted deployment.
 */
export type CrashMarkerReadResult =
  | { present: false }
  | { present: true; record: CrashMarkerRecord | null; parseError?: string };

export class CrashMarker {
  constructor(private readonly markerPath: string) {}

  getPath(): string {
    return this.markerPath;
  }

  async read(): Promise<CrashMarkerReadResult> {
    let raw: string;
    try {
      raw = await fs.readFile(this.markerPath, 'utf-8');
    } catch (err) {
      if (isNotFound(err)) return { present: false };
      throw err;
    }

    try {
      const parsed = CrashMarkerSchema.safeParse(JSON.parse(raw));
      if (!parsed.success) {
        return { present: true, record: null, parseError: parsed.error.message };
      }
      return { present: true, record: parsed.data };
    } catch (err) {
      return { present: true, record: null, parseError: err instanceof Error ? err.message : String(err) };
    }
  }

  /**
   * Durable write: temp file, fsync, rename.
   */
  async write(record: CrashMarkerRecord): Promise<void> {
    await fs.mkdir(path.dirname(this.markerPath), { recursive: true });
    const tempPath = `${this.markerPath}.tmp`;
    const handle = await fs.open(tempPath, 'w');
    try {
      await handle.writeFile(JSON.stringify(record, null, 2), 'utf-8');
      await handle.sync();
    } finally {
      await handle.close();
    }
    await fs.rename(tempPath, this.markerPath);
  }

  async clear(): Promise<void> {
    await fs.rm(this.markerPath, { force: true });
  }

  async exists(): Promise<boolean> {
    try {
      await fs.access(this.markerPath);
      return true;
    } catch {
      return false;
    }
  }
}

function isNotFound(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { CrashMarker } from '../../../src/deploy/CrashMarker.js';
import type { CrashMarkerRecord } from '../../../src/deploy/CrashMarker.js';

describe('CrashMarker', () => {
  let tmpDir: string;
  let markerPath: string;
  let marker: CrashMarker;

  const record: CrashMarkerRecord = {
    attemptId: 'attempt-42',
    trigger: 'manual',
    startedAt: '2026-03-01T08:30:00.000Z',
    fromCommit: 'a'.repeat(40),
    targetCommit: 'b'.repeat(40),
  };

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'marker-test-'));
    markerPath = path.join(tmpDir, 'state', 'deployment.marker');
    marker = new CrashMarker(markerPath);
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('reports absence when no marker was written', async () => {
    await expect(marker.read()).resolves.toEqual({ present: false });
    await expect(marker.exists()).resolves.toBe(false);
  });

  it('round-trips a record and creates missing directories', async () => {
    await marker.write(record);

    await expect(marker.read()).resolves.toEqual({ present: true, record });
    await expect(marker.exists()).resolves.toBe(true);
  });

  it('leaves no temp file behind', async () => {
    await marker.write(record);
    await expect(fs.access(`${markerPath}.tmp`)).rejects.toThrow();
  });

  it('replaces an existing marker', async () => {
    await marker.write(record);
    await marker.write({ attemptId: 'attempt-43', trigger: 'poll', startedAt: '2026-03-01T09:00:00.000Z' });

    const result = await marker.read();
    expect(result.present && result.record?.attemptId).toBe('attempt-43');
  });

  it('returns a null record for content that is not JSON', async () => {
    await fs.mkdir(path.dirname(markerPath), { recursive: true });
    await fs.writeFile(markerPath, '{ truncated');

    const result = await marker.read();
    expect(result.present).toBe(true);
    if (result.present) {
      expect(result.record).toBeNull();
      expect(typeof result.parseError).toBe('string');
    }
  });

  it('returns a null record for JSON of the wrong shape', async () => {
    await fs.mkdir(path.dirname(markerPath), { recursive: true });
    await fs.writeFile(markerPath, JSON.stringify({ attemptId: 7, trigger: 'cron' }));

    const result = await marker.read();
    expect(result.present && result.record).toBeNull();
  });

  it('clear() removes the marker and tolerates a missing file', async () => {
    await marker.write(record);
    await marker.clear();
    await expect(marker.exists()).resolves.toBe(false);
    await expect(marker.clear()).resolves.toBeUndefined();
  });
});

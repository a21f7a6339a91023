/**
 * Drift Detector
 *
 * Periodically looks for uncommitted changes in the deployed working tree.
 * Never waits for the working-tree mutex: a check that finds it held is
 * skipped. Drift seen on consecutive checks raises `persistent_drift`.
 */

import { getLogger, registerComponent } from '../logging/index.js';
import { driftChecksSkipped } from '../telemetry/metrics.js';
import type { RepairRegistry } from '../repair/RepairRegistry.js';
import { withTimeout } from './errors.js';
import { normalizePath } from './ReloadPlanner.js';
import type { DriftReport, RepositoryClient } from './types.js';
import type { WorkingTreeMutex } from './WorkingTreeMutex.js';

registerComponent('drift', 'Drift detection');
const logger = getLogger('drift');

export interface DriftDetectorOptions {
  repository: Pick<RepositoryClient, 'status'>;
  mutex: WorkingTreeMutex;
  repairs: RepairRegistry;
  /** Paths the deployer writes itself; a trailing "/" ignores a directory */
  ignoredPaths?: string[];
  /** Check interval for start() (default 300000) */
  intervalMs?: number;
  /** Bound on one status read (default 60000) */
  timeoutMs?: number;
  /** Consecutive dirty checks before the repair is raised (default 2) */
  persistenceThreshold?: number;
}

export type DriftReportHandler = (report: DriftReport) => void;

export class DriftDetector {
  private readonly repository: Pick<RepositoryClient, 'status'>;
  private readonly mutex: WorkingTreeMutex;
  private readonly repairs: RepairRegistry;
  private readonly ignoredPaths: string[];
  private readonly intervalMs: number;
  private readonly timeoutMs: number;
  private readonly persistenceThreshold: number;

  private timer: ReturnType<typeof setInterval> | null = null;
  private lastReport: DriftReport | null = null;
  private consecutiveDirty = 0;
  /** Dirty set the current repair was raised for */
  private signalledKey: string | null = null;
  private handlers = new Set<DriftReportHandler>();

  constructor(options: DriftDetectorOptions) {
    this.repository = options.repository;
    this.mutex = options.mutex;
    this.repairs = options.repairs;
    this.ignoredPaths = (options.ignoredPaths ?? []).map(normalizePath);
    this.intervalMs = options.intervalMs ?? 300_000;
    this.timeoutMs = options.timeoutMs ?? 60_000;
    this.persistenceThreshold = options.persistenceThreshold ?? 2;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => void this.tick(), this.intervalMs);
    this.timer.unref();
    logger.info(`Drift detection every ${Math.round(this.intervalMs / 1000)}s`);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  getLastReport(): DriftReport | null {
    return this.lastReport;
  }

  /**
   * Returns an unsubscribe function.
   */
  onReport(handler: DriftReportHandler): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  /**
   * Run one check now. Resolves null when the working tree was busy.
   */
  async check(): Promise<DriftReport | null> {
    const release = this.mutex.tryAcquire();
    if (!release) {
      logger.debug('Working tree busy, drift check skipped');
      driftChecksSkipped.add(1);
      return null;
    }

    let paths: string[];
    try {
      const status = await withTimeout(this.repository.status(), this.timeoutMs, 'git status');
      paths = [...status.staged, ...status.unstaged, ...status.untracked];
    } finally {
      release();
    }

    const dirtyPaths = [...new Set(paths.map(normalizePath))].filter(p => !this.isIgnored(p)).sort();
    const report: DriftReport = { dirtyPaths, checkedAt: new Date() };
    this.lastReport = report;
    this.evaluate(dirtyPaths);

    for (const handler of this.handlers) {
      try {
        handler(report);
      } catch (err) {
        logger.error('Drift report handler failed', err instanceof Error ? err : undefined);
      }
    }
    return report;
  }

  private evaluate(dirtyPaths: string[]): void {
    if (dirtyPaths.length === 0) {
      if (this.consecutiveDirty > 0) logger.info('Working tree clean again');
      this.consecutiveDirty = 0;
      this.signalledKey = null;
      this.repairs.resolve('persistent_drift');
      return;
    }

    this.consecutiveDirty++;
    logger.info(`Drift detected in ${dirtyPaths.length} path(s)`, { consecutive: this.consecutiveDirty });
    if (this.consecutiveDirty < this.persistenceThreshold) return;

    const key = dirtyPaths.join('\n');
    if (key === this.signalledKey) return;
    this.signalledKey = key;
    this.repairs.raise('persistent_drift', `${dirtyPaths.length} path(s) changed outside git`, {
      details: { paths: dirtyPaths.join(', '), count: String(dirtyPaths.length) },
    });
  }

  private isIgnored(filePath: string): boolean {
    return this.ignoredPaths.some(ignored =>
      ignored.endsWith('/') ? filePath.startsWith(ignored) : filePath === ignored
    );
  }

  private async tick(): Promise<void> {
    try {
      await this.check();
    } catch (err) {
      logger.error('Drift check failed', err instanceof Error ? err : undefined);
    }
  }
}

/**
 * Repair Registry
 *
 * User-facing alerts that need manual action. Each kind is a single slot:
 * raising an active kind again is a no-op unless the details differ, so a
 * repeated condition never produces duplicate notifications.
 */

import { getLogger, registerComponent } from '../logging/index.js';

registerComponent('repairs', 'Repair signals');
const logger = getLogger('repairs');

export const REPAIR_KINDS = [
  'deployment_interrupted',
  'persistent_drift',
  'restart_required',
  'git_lock',
  'secret_sync_failed',
  'integration_updated',
] as const;

export type RepairKind = (typeof REPAIR_KINDS)[number];

export type RepairSeverity = 'warning' | 'error';

export function isRepairKind(value: string): value is RepairKind {
  return (REPAIR_KINDS as readonly string[]).includes(value);
}

export interface RepairIssue {
  kind: RepairKind;
  severity: RepairSeverity;
  message: string;
  details: Record<string, string>;
  raisedAt: Date;
}

export interface RaiseOptions {
  severity?: RepairSeverity;
  details?: Record<string, string>;
}

export type RepairEvent =
  | { type: 'raised'; issue: RepairIssue }
  | { type: 'resolved'; kind: RepairKind };

type RepairHandler = (event: RepairEvent) => void;

export class RepairRegistry {
  private issues = new Map<RepairKind, RepairIssue>();
  private handlers = new Set<RepairHandler>();

  /**
   * Raise a repair. Returns false when an identical one is already active.
   */
  raise(kind: RepairKind, message: string, options: RaiseOptions = {}): boolean {
    const details = options.details ?? {};
    const existing = this.issues.get(kind);
    if (existing && existing.message === message && sameDetails(existing.details, details)) {
      return false;
    }

    const issue: RepairIssue = {
      kind,
      severity: options.severity ?? 'warning',
      message,
      details,
      raisedAt: new Date(),
    };
    this.issues.set(kind, issue);
    logger.warn(`Repair raised: ${kind}: ${message}`, { details });
    this.emit({ type: 'raised', issue });
    return true;
  }

  /**
   * Clear an active repair. Returns false when none was active.
   */
  resolve(kind: RepairKind): boolean {
    if (!this.issues.delete(kind)) return false;
    logger.info(`Repair resolved: ${kind}`);
    this.emit({ type: 'resolved', kind });
    return true;
  }

  isActive(kind: RepairKind): boolean {
    return this.issues.has(kind);
  }

  get(kind: RepairKind): RepairIssue | undefined {
    return this.issues.get(kind);
  }

  /** Active repairs, oldest first */
  list(): RepairIssue[] {
    return [...this.issues.values()].sort((a, b) => a.raisedAt.getTime() - b.raisedAt.getTime());
  }

  /**
   * Returns an unsubscribe function.
   */
  subscribe(handler: RepairHandler): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  clear(): void {
    this.issues.clear();
    this.handlers.clear();
  }

  private emit(event: RepairEvent): void {
    for (const handler of this.handlers) {
      try {
        handler(event);
      } catch (err) {
        logger.error('Repair handler failed', err instanceof Error ? err : new Error(String(err)));
      }
    }
  }
}

function sameDetails(a: Record<string, string>, b: Record<string, string>): boolean {
  const aKeys = Object.keys(a);
  if (aKeys.length !== Object.keys(b).length) return false;
  return aKeys.every(key => a[key] === b[key]);
}

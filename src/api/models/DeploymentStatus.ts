/**
 * JSON projections of coordinator, repair and drift state.
 */

import type { DeploymentFailure } from '../../deploy/errors.js';
import type { ReloadPlan } from '../../deploy/ReloadPlanner.js';
import type { DeploymentState, DeploymentStatus, DriftReport, TriggerReason } from '../../deploy/types.js';
import type { GitLogEntry } from '../../git/GitClient.js';
import type { RepairIssue, RepairKind, RepairSeverity } from '../../repair/RepairRegistry.js';

export interface DeploymentStatusResponse {
  status: DeploymentStatus;
  currentCommit: string | null;
  availableCommit: string | null;
  commitsBehind: number;
  changedFiles: string[];
  error: DeploymentFailure | null;
  reloadPlan: ReloadPlan | null;
  restartRequired: boolean;
  trigger: { reason: TriggerReason; requestedAt: string; detail: string | null } | null;
  startedAt: string | null;
  finishedAt: string | null;
  lastCheckedAt: string | null;
  commitLog: GitLogEntry[];
}

export interface RepairResponse {
  kind: RepairKind;
  severity: RepairSeverity;
  message: string;
  details: Record<string, string>;
  raisedAt: string;
}

export interface DriftReportResponse {
  dirtyPaths: string[];
  checkedAt: string;
}

export function toStatusResponse(state: DeploymentState): DeploymentStatusResponse {
  return {
    status: state.status,
    currentCommit: state.currentCommit ?? null,
    availableCommit: state.availableCommit ?? null,
    commitsBehind: state.commitsBehind,
    changedFiles: state.changedFiles,
    error: state.error ?? null,
    reloadPlan: state.reloadPlan ?? null,
    restartRequired: state.restartRequired,
    trigger: state.trigger
      ? {
          reason: state.trigger.reason,
          requestedAt: state.trigger.requestedAt.toISOString(),
          detail: state.trigger.detail ?? null,
        }
      : null,
    startedAt: state.startedAt?.toISOString() ?? null,
    finishedAt: state.finishedAt?.toISOString() ?? null,
    lastCheckedAt: state.lastCheckedAt?.toISOString() ?? null,
    commitLog: state.commitLog,
  };
}

export function toRepairResponse(issue: RepairIssue): RepairResponse {
  return { ...issue, raisedAt: issue.raisedAt.toISOString() };
}

export function toDriftReportResponse(report: DriftReport): DriftReportResponse {
  return { dirtyPaths: report.dirtyPaths, checkedAt: report.checkedAt.toISOString() };
}

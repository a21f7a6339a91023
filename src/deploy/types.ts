/**
 * Deployment state and the narrow interfaces the coordinator drives.
 */

import type { GitLogEntry, GitStatus } from '../git/GitClient.js';
import type { DeploymentFailure } from './errors.js';
import type { ReloadDomain, ReloadPlan } from './ReloadPlanner.js';

export type DeploymentStatus =
  | 'idle'
  | 'checking'
  | 'pulling'
  | 'syncing_secrets'
  | 'validating'
  | 'reloading'
  | 'succeeded'
  | 'failed';

export type TriggerReason = 'poll' | 'webhook' | 'manual';

export interface DeploymentTrigger {
  reason: TriggerReason;
  requestedAt: Date;
  /** Free-form context, e.g. the commit id a webhook announced */
  detail?: string;
}

export interface DeploymentState {
  status: DeploymentStatus;
  currentCommit?: string;
  availableCommit?: string;
  commitsBehind: number;
  changedFiles: string[];
  error?: DeploymentFailure;
  trigger?: DeploymentTrigger;
  reloadPlan?: ReloadPlan;
  restartRequired: boolean;
  /** Pending commits, newest first */
  commitLog: GitLogEntry[];
  startedAt?: Date;
  finishedAt?: Date;
  lastCheckedAt?: Date;
}

export interface UpdateCheck {
  availableCommit: string;
  commitsBehind: number;
  commits: GitLogEntry[];
}

export interface DriftReport {
  dirtyPaths: string[];
  checkedAt: Date;
}

// ─── Collaborators ───────────────────────────────────────────────

/**
 * One working tree tracked against one remote branch.
 */
export interface RepositoryClient {
  headCommit(): Promise<string>;
  /** Update remote refs; never touches the working tree */
  fetch(): Promise<void>;
  remoteHead(): Promise<string>;
  countCommits(from: string, to: string): Promise<number>;
  commitLog(from: string, to: string, limit: number): Promise<GitLogEntry[]>;
  /** Fetch and merge the tracked branch into the working tree */
  pull(): Promise<void>;
  changedFiles(from: string, to: string): Promise<string[]>;
  /** True while the VCS holds its index lock */
  isLocked(): Promise<boolean>;
  status(): Promise<GitStatus>;
}

export interface SecretSyncResult {
  skipped: boolean;
  secretCount: number;
  outputPath?: string;
}

export interface SecretsSync {
  /** Stops before writing anything once `signal` is aborted */
  sync(signal?: AbortSignal): Promise<SecretSyncResult>;
}

export interface ConfigCheck {
  /** Resolves when the host accepts the configuration; rejects with ValidationError */
  validate(): Promise<void>;
}

export interface DomainReloader {
  reloadDomain(domain: ReloadDomain): Promise<void>;
}

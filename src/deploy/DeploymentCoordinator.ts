/**
 * Deployment Coordinator
 *
 * Owns DeploymentState and runs the deployment pipeline:
 *
 *   checking -> pulling -> syncing_secrets -> validating -> reloading -> succeeded
 *
 * Any phase may end the attempt in `failed`. At most one attempt runs at a
 * time; callers that arrive while one is running receive its promise. The
 * crash marker is written before the pull and is the only thing startup
 * recovery looks at.
 */

import { v4 as uuidv4 } from 'uuid';
import { getLogger, registerComponent } from '../logging/index.js';
import { deploymentDuration, deploymentsCoalesced, deploymentsTotal, domainReloads } from '../telemetry/metrics.js';
import type { RepairRegistry } from '../repair/RepairRegistry.js';
import type { CrashMarker } from './CrashMarker.js';
import { WorkingTreeMutex } from './WorkingTreeMutex.js';
import {
  InterruptedDeploymentError,
  PhaseTimeoutError,
  RepositoryError,
  toDeploymentFailure,
  withTimeout,
} from './errors.js';
import { normalizePath, planReload, RELOAD_RULES } from './ReloadPlanner.js';
import type { ReloadRule } from './ReloadPlanner.js';
import type {
  ConfigCheck,
  DeploymentState,
  DeploymentTrigger,
  DomainReloader,
  RepositoryClient,
  SecretSyncResult,
  SecretsSync,
  TriggerReason,
  UpdateCheck,
} from './types.js';

registerComponent('deploy', 'Deployment pipeline');
const logger = getLogger('deploy');

export interface PhaseTimeouts {
  repositoryMs: number;
  secretsMs: number;
  validationMs: number;
  reloadMs: number;
}

export interface DeploymentCoordinatorOptions {
  repository: RepositoryClient;
  secrets: SecretsSync;
  validator: ConfigCheck;
  reloader: DomainReloader;
  marker: CrashMarker;
  repairs: RepairRegistry;
  timeouts: PhaseTimeouts;
  /** Shared with the drift detector; a private one is created if omitted */
  mutex?: WorkingTreeMutex;
  /** Deployer's own files inside the tree; changes there raise integration_updated */
  selfPath?: string;
  /** Pending commits kept in state.commitLog (default 10) */
  commitLogLimit?: number;
  rules?: readonly ReloadRule[];
}

export type StateListener = (state: DeploymentState) => void;

/**
 * Thrown when a request arrives before start() or after shutdown().
 */
export class CoordinatorNotRunningError extends Error {
  constructor() {
    super('Deployment coordinator is not running');
    this.name = 'CoordinatorNotRunningError';
  }
}

export class DeploymentCoordinator {
  private readonly repository: RepositoryClient;
  private readonly secrets: SecretsSync;
  private readonly validator: ConfigCheck;
  private readonly reloader: DomainReloader;
  private readonly marker: CrashMarker;
  private readonly repairs: RepairRegistry;
  private readonly timeouts: PhaseTimeouts;
  private readonly mutex: WorkingTreeMutex;
  private readonly selfPath: string | undefined;
  private readonly commitLogLimit: number;
  private readonly rules: readonly ReloadRule[];

  private state: DeploymentState = {
    status: 'idle',
    commitsBehind: 0,
    changedFiles: [],
    restartRequired: false,
    commitLog: [],
  };
  private inFlight: Promise<DeploymentState> | null = null;
  /** Timed-out working-tree operations still running; the mutex waits for them */
  private abandoned: Array<Promise<void>> = [];
  private running = false;
  private listeners = new Set<StateListener>();

  constructor(options: DeploymentCoordinatorOptions) {
    this.repository = options.repository;
    this.secrets = options.secrets;
    this.validator = options.validator;
    this.reloader = options.reloader;
    this.marker = options.marker;
    this.repairs = options.repairs;
    this.timeouts = options.timeouts;
    this.mutex = options.mutex ?? new WorkingTreeMutex();
    this.selfPath = options.selfPath ? normalizePath(options.selfPath) : undefined;
    this.commitLogLimit = options.commitLogLimit ?? 10;
    this.rules = options.rules ?? RELOAD_RULES;
  }

  // ───── Lifecycle ─────

  /**
   * Recover from an interrupted attempt, read the applied commit, then accept
   * requests.
   */
  async start(): Promise<void> {
    if (this.running) return;

    const release = await this.mutex.acquire();
    try {
      await this.recover();
      if (this.state.currentCommit === undefined) {
        try {
          const head = await this.git(this.repository.headCommit(), 'read HEAD');
          this.update({ currentCommit: head });
        } catch (err) {
          // Retried lazily by the first check
          logger.warn(`Could not read HEAD at startup: ${toDeploymentFailure(err).message}`);
        }
      }
    } finally {
      await this.settleAbandoned();
      release();
    }

    this.running = true;
    logger.info(`Deployment coordinator started at ${shortCommit(this.state.currentCommit)}`);
  }

  /**
   * Stop accepting requests and wait for the in-flight attempt to finish.
   */
  async shutdown(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    if (this.inFlight) {
      logger.info('Waiting for in-flight deployment to finish');
      await this.inFlight;
    }
    this.listeners.clear();
    logger.info('Deployment coordinator stopped');
  }

  isRunning(): boolean {
    return this.running;
  }

  isDeploying(): boolean {
    return this.inFlight !== null;
  }

  getMutex(): WorkingTreeMutex {
    return this.mutex;
  }

  // ───── State ─────

  getState(): DeploymentState {
    return snapshot(this.state);
  }

  /**
   * Receive a snapshot on every state change. Returns an unsubscribe function.
   */
  onStateChange(listener: StateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // ───── Operations ─────

  /**
   * Run the pipeline, or join the attempt already running.
   * Resolves with the terminal state; pipeline failures do not reject.
   */
  requestDeployment(reason: TriggerReason, detail?: string): Promise<DeploymentState> {
    if (!this.running) {
      return Promise.reject(new CoordinatorNotRunningError());
    }
    if (this.inFlight) {
      logger.debug(`Deployment request (${reason}) joined the running attempt`);
      deploymentsCoalesced.add(1, { 'deployment.trigger': reason });
      return this.inFlight;
    }

    const trigger: DeploymentTrigger = { reason, requestedAt: new Date() };
    if (detail !== undefined) trigger.detail = detail;

    const attempt = this.runAttempt(trigger).finally(() => {
      this.inFlight = null;
    });
    this.inFlight = attempt;
    return attempt;
  }

  /**
   * Check phase only. Updates availability fields, never `status`.
   */
  async checkForUpdates(): Promise<UpdateCheck> {
    if (!this.running) throw new CoordinatorNotRunningError();

    const release = await this.mutex.acquire();
    try {
      const fromCommit = await this.ensureCurrentCommit();
      return await this.check(fromCommit);
    } finally {
      await this.settleAbandoned();
      release();
    }
  }

  /**
   * Re-sync secrets outside a deployment.
   */
  async refreshSecrets(): Promise<SecretSyncResult> {
    if (!this.running) throw new CoordinatorNotRunningError();

    const release = await this.mutex.acquire();
    try {
      return await this.syncSecrets();
    } finally {
      await this.settleAbandoned();
      release();
    }
  }

  // ───── Pipeline ─────

  private async runAttempt(trigger: DeploymentTrigger): Promise<DeploymentState> {
    const release = await this.mutex.acquire();
    try {
      return await this.runPipeline(trigger);
    } finally {
      await this.settleAbandoned();
      release();
    }
  }

  private async runPipeline(trigger: DeploymentTrigger): Promise<DeploymentState> {
    const attemptId = uuidv4();
    const startedAt = new Date();
    let markerWritten = false;
    let keepMarker = false;

    logger.info(`Deployment ${attemptId} started (${trigger.reason})`, { detail: trigger.detail });
    this.update({
      status: 'checking',
      trigger,
      error: undefined,
      startedAt,
      finishedAt: undefined,
      changedFiles: [],
      reloadPlan: undefined,
      restartRequired: false,
    });

    try {
      // Check
      const fromCommit = await this.ensureCurrentCommit();
      const available = await this.check(fromCommit);
      if (available.commitsBehind === 0) {
        logger.info(`Already at ${shortCommit(fromCommit)}, nothing to deploy`);
        // A marker left by an earlier failed pull no longer describes the tree
        if (await this.marker.exists()) await this.marker.clear();
        return this.finish('succeeded', trigger, startedAt);
      }

      // Pull
      this.update({ status: 'pulling' });
      await this.marker.write({
        attemptId,
        trigger: trigger.reason,
        startedAt: startedAt.toISOString(),
        fromCommit,
        targetCommit: available.availableCommit,
      });
      markerWritten = true;
      keepMarker = true;

      if (await this.git(this.repository.isLocked(), 'git lock check')) {
        this.repairs.raise('git_lock', 'The git index lock is held; remove it once no git process is running', {
          severity: 'error',
        });
        throw new RepositoryError('lock_held', 'Git index lock is held by another process');
      }
      await this.git(this.repository.pull(), 'git pull');
      const head = await this.git(this.repository.headCommit(), 'read HEAD');
      const changedFiles = await this.git(this.repository.changedFiles(fromCommit, head), 'git diff');
      keepMarker = false;
      this.repairs.resolve('git_lock');
      this.update({ availableCommit: head, changedFiles });
      logger.info(`Pulled ${shortCommit(fromCommit)}..${shortCommit(head)}: ${changedFiles.length} file(s) changed`);

      // Secrets
      this.update({ status: 'syncing_secrets' });
      await this.syncSecrets();

      // Validate
      this.update({ status: 'validating' });
      await withTimeout(this.validator.validate(), this.timeouts.validationMs, 'configuration check');

      // Plan & reload
      const plan = planReload(changedFiles, this.rules);
      this.update({ status: 'reloading', reloadPlan: plan, restartRequired: plan.restartRequired });
      if (plan.restartRequired) {
        logger.warn('Changes require a host restart; skipping domain reloads');
        this.repairs.raise('restart_required', 'Deployed changes take effect only after a host restart', {
          details: { commit: head },
        });
      } else {
        for (const domain of plan.domains) {
          logger.debug(`Reloading ${domain}`);
          await withTimeout(this.reloader.reloadDomain(domain), this.timeouts.reloadMs, `reload ${domain}`);
          domainReloads.add(1, { 'reload.domain': domain });
        }
      }
      this.checkSelfUpdate(changedFiles, fromCommit, head);

      await this.marker.clear();
      markerWritten = false;
      return this.finish('succeeded', trigger, startedAt, { currentCommit: head, commitsBehind: 0, commitLog: [] });
    } catch (err) {
      const failure = toDeploymentFailure(err);
      logger.error(
        `Deployment ${attemptId} failed during ${this.state.status}: ${failure.message}`,
        err instanceof Error ? err : undefined,
        { kind: failure.kind, reason: failure.reason }
      );
      if (markerWritten && !keepMarker) {
        await this.clearMarkerAfterFailure();
      }
      return this.finish('failed', trigger, startedAt, { error: failure });
    }
  }

  private async check(fromCommit: string): Promise<UpdateCheck> {
    await this.git(this.repository.fetch(), 'git fetch');
    const availableCommit = await this.git(this.repository.remoteHead(), 'read remote HEAD');
    const commitsBehind = await this.git(this.repository.countCommits(fromCommit, availableCommit), 'git rev-list');
    const commits =
      commitsBehind > 0
        ? await this.git(this.repository.commitLog(fromCommit, availableCommit, this.commitLogLimit), 'git log')
        : [];

    this.update({ availableCommit, commitsBehind, commitLog: commits, lastCheckedAt: new Date() });
    logger.debug(`Remote at ${shortCommit(availableCommit)}, ${commitsBehind} commit(s) behind`);
    return { availableCommit, commitsBehind, commits };
  }

  private async syncSecrets(): Promise<SecretSyncResult> {
    try {
      const controller = new AbortController();
      const result = await this.treeOperation(
        this.secrets.sync(controller.signal),
        this.timeouts.secretsMs,
        'secret sync',
        controller
      );
      this.repairs.resolve('secret_sync_failed');
      return result;
    } catch (err) {
      const failure = toDeploymentFailure(err);
      this.repairs.raise('secret_sync_failed', `Secret sync failed: ${failure.message}`, {
        details: failure.reason ? { reason: failure.reason } : {},
      });
      throw err;
    }
  }

  private git<T>(operation: Promise<T>, label: string): Promise<T> {
    return this.treeOperation(operation, this.timeouts.repositoryMs, label);
  }

  /**
   * Bound an operation that touches the working tree. On timeout the
   * operation keeps running, so it is kept until it settles and the mutex
   * is not released before then.
   */
  private async treeOperation<T>(
    operation: Promise<T>,
    timeoutMs: number,
    label: string,
    controller?: AbortController
  ): Promise<T> {
    try {
      return await withTimeout(operation, timeoutMs, label);
    } catch (err) {
      if (err instanceof PhaseTimeoutError) {
        controller?.abort(err);
        this.abandoned.push(operation.then(() => undefined, () => undefined));
      }
      throw err;
    }
  }

  private async settleAbandoned(): Promise<void> {
    const pending = this.abandoned.splice(0);
    if (pending.length === 0) return;
    logger.warn(`Waiting for ${pending.length} timed-out operation(s) before releasing the working tree`);
    await Promise.all(pending);
  }

  private checkSelfUpdate(changedFiles: string[], fromCommit: string, head: string): void {
    const selfPath = this.selfPath;
    if (!selfPath) return;
    const prefix = selfPath.endsWith('/') ? selfPath : `${selfPath}/`;
    if (!changedFiles.some(file => normalizePath(file).startsWith(prefix))) return;

    logger.warn(`Deployer files under ${prefix} changed; restart the deployer to load them`);
    this.repairs.raise('integration_updated', 'The deployer itself was updated and needs a restart', {
      details: { from: shortCommit(fromCommit), to: shortCommit(head) },
    });
  }

  private async ensureCurrentCommit(): Promise<string> {
    if (this.state.currentCommit !== undefined) return this.state.currentCommit;
    const head = await this.git(this.repository.headCommit(), 'read HEAD');
    this.update({ currentCommit: head });
    return head;
  }

  private finish(
    status: 'succeeded' | 'failed',
    trigger: DeploymentTrigger,
    startedAt: Date,
    patch: Partial<DeploymentState> = {}
  ): DeploymentState {
    const finishedAt = new Date();
    this.update({ ...patch, status, finishedAt });
    deploymentsTotal.add(1, { 'deployment.status': status, 'deployment.trigger': trigger.reason });
    deploymentDuration.record(finishedAt.getTime() - startedAt.getTime(), { 'deployment.trigger': trigger.reason });
    if (status === 'succeeded') {
      logger.info(`Deployment succeeded at ${shortCommit(this.state.currentCommit)}`);
    }
    return this.getState();
  }

  private async clearMarkerAfterFailure(): Promise<void> {
    try {
      await this.marker.clear();
    } catch (err) {
      logger.error(`Could not remove crash marker ${this.marker.getPath()}`, err instanceof Error ? err : undefined);
    }
  }

  // ───── Recovery ─────

  private async recover(): Promise<void> {
    const result = await this.marker.read();
    if (!result.present) return;

    const record = result.record;
    let lockHeld = false;
    try {
      lockHeld = await this.git(this.repository.isLocked(), 'git lock check');
    } catch (err) {
      logger.warn(`Could not check git lock during recovery: ${toDeploymentFailure(err).message}`);
    }

    if (lockHeld) {
      logger.warn(`Git lock still held; keeping crash marker ${this.marker.getPath()}`);
    } else {
      await this.marker.clear();
    }

    const startedAt = record?.startedAt ?? 'unknown';
    const error = new InterruptedDeploymentError(
      record
        ? `Deployment ${record.attemptId} started at ${startedAt} was interrupted`
        : `Unreadable crash marker found (${result.parseError ?? 'invalid content'})`
    );
    logger.warn(error.message);

    const patch: Partial<DeploymentState> = { status: 'failed', error: error.toFailure(), finishedAt: new Date() };
    // The interrupted attempt never validated its pull; diff from where it began
    if (record?.fromCommit !== undefined) {
      patch.currentCommit = record.fromCommit;
    }
    this.update(patch);

    const details: Record<string, string> = {
      startedAt,
      lockHeld: String(lockHeld),
      markerPath: this.marker.getPath(),
    };
    if (record?.attemptId) details['attemptId'] = record.attemptId;
    if (record?.fromCommit) details['fromCommit'] = record.fromCommit;
    if (record?.targetCommit) details['targetCommit'] = record.targetCommit;
    this.repairs.raise('deployment_interrupted', error.message, { severity: 'error', details });
  }

  // ───── Internal helpers ─────

  private update(patch: Partial<DeploymentState>): void {
    this.state = { ...this.state, ...patch };
    const current = snapshot(this.state);
    for (const listener of this.listeners) {
      try {
        listener(current);
      } catch (err) {
        logger.error('State listener failed', err instanceof Error ? err : undefined);
      }
    }
  }
}

function snapshot(state: DeploymentState): DeploymentState {
  const copy: DeploymentState = {
    ...state,
    changedFiles: [...state.changedFiles],
    commitLog: state.commitLog.map(entry => ({ ...entry })),
  };
  if (state.reloadPlan) {
    copy.reloadPlan = {
      domains: [...state.reloadPlan.domains],
      restartRequired: state.reloadPlan.restartRequired,
      unmatched: [...state.reloadPlan.unmatched],
    };
  }
  return copy;
}

function shortCommit(commit: string | undefined): string {
  return commit ? commit.slice(0, 7) : 'unknown';
}

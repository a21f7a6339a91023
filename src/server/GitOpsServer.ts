/**
 * Service lifecycle: wires the deployment components together, runs the
 * poll and drift timers and serves the REST API.
 */

import type { Server } from 'http';
import * as path from 'path';
import { startServer } from '../api/server.js';
import { getGitOpsConfig } from '../config/GitOpsConfig.js';
import type { GitOpsConfiguration } from '../config/GitOpsConfig.js';
import { CrashMarker, DeploymentCoordinator, DriftDetector, WorkingTreeMutex } from '../deploy/index.js';
import { GitClient, GitRepository } from '../git/index.js';
import { ConfigValidator, HomeAssistantClient } from '../host/index.js';
import { getLogger, registerComponent } from '../logging/index.js';
import { RepairRegistry } from '../repair/index.js';
import { createSecretStore, SecretsSynchronizer } from '../secrets/index.js';
import { registerObservableGauges } from '../telemetry/metrics.js';

registerComponent('server', 'Server lifecycle');
const logger = getLogger('server');

export class GitOpsServer {
  private readonly config: GitOpsConfiguration;
  private readonly repairs: RepairRegistry;
  private readonly secrets: SecretsSynchronizer;
  private readonly coordinator: DeploymentCoordinator;
  private readonly drift: DriftDetector;

  private server: Server | null = null;
  private pollTimer: ReturnType<typeof setInterval> | null = null;
  private polling = false;
  private running = false;

  constructor(config: GitOpsConfiguration = getGitOpsConfig()) {
    this.config = config;
    this.repairs = new RepairRegistry();

    const mutex = new WorkingTreeMutex();
    // git is killed before the phase timer fires, so a timed-out phase has no git process left behind
    const gitTimeoutMs = Math.max(1, Math.floor(config.timeouts.repositoryMs * 0.9));
    const repository = new GitRepository(new GitClient(config.repoPath, { timeoutMs: gitTimeoutMs }), {
      remote: config.remote,
      branch: config.branch,
    });
    const host = new HomeAssistantClient({
      baseUrl: config.host.url,
      token: config.host.token,
      timeoutMs: Math.max(config.timeouts.validationMs, config.timeouts.reloadMs),
    });
    this.secrets = new SecretsSynchronizer({
      store: createSecretStore(config.secrets),
      configDir: config.repoPath,
      outputFile: config.secrets.outputFile,
      includeFile: config.secrets.includeFile,
    });

    this.coordinator = new DeploymentCoordinator({
      repository,
      secrets: this.secrets,
      validator: new ConfigValidator(host),
      reloader: host,
      marker: new CrashMarker(config.markerPath),
      repairs: this.repairs,
      timeouts: config.timeouts,
      mutex,
      selfPath: config.selfPath,
    });

    this.drift = new DriftDetector({
      repository,
      mutex,
      repairs: this.repairs,
      ignoredPaths: [...this.secrets.managedPaths(), ...markerPathsInTree(config)],
      intervalMs: config.driftIntervalMs,
      timeoutMs: config.timeouts.repositoryMs,
    });
  }

  async start(): Promise<void> {
    if (this.running) {
      throw new Error('config-gitops is already running');
    }

    logger.info(`Starting config-gitops for ${this.config.repoPath} (${this.config.remote}/${this.config.branch})`);
    await this.coordinator.start();

    // Secrets are loaded once at startup; a failure raises a repair but does not stop the service
    try {
      await this.coordinator.refreshSecrets();
    } catch (err) {
      logger.error('Initial secret sync failed', err instanceof Error ? err : undefined);
    }

    registerObservableGauges({
      getCommitsBehind: () => this.coordinator.getState().commitsBehind,
      getActiveRepairCount: () => this.repairs.list().length,
      getDirtyPathCount: () => this.drift.getLastReport()?.dirtyPaths.length ?? 0,
    });

    this.server = await startServer(
      { coordinator: this.coordinator, repairs: this.repairs, drift: this.drift },
      {
        port: this.config.api.port,
        host: this.config.api.host,
        apiToken: this.config.api.token,
        rateLimit: this.config.api.rateLimit,
        webhook: {
          webhookId: this.config.api.webhookId,
          webhookSecret: this.config.api.webhookSecret,
          branch: this.config.branch,
        },
      }
    );

    if (this.config.pollIntervalMs > 0) {
      this.pollTimer = setInterval(() => void this.poll(), this.config.pollIntervalMs);
      this.pollTimer.unref();
      void this.poll();
    }
    if (this.config.driftEnabled) {
      this.drift.start();
    }

    this.running = true;
    logger.info('config-gitops started');
  }

  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }
    logger.info('Stopping config-gitops...');

    if (this.pollTimer) {
      clearInterval(this.pollTimer);
      this.pollTimer = null;
    }
    this.drift.stop();

    const server = this.server;
    if (server) {
      await new Promise<void>((resolve, reject) => {
        server.close(err => (err ? reject(err) : resolve()));
      });
      this.server = null;
    }

    await this.coordinator.shutdown();
    await this.secrets.shutdown();

    this.running = false;
    logger.info('config-gitops stopped');
  }

  isRunning(): boolean {
    return this.running;
  }

  getCoordinator(): DeploymentCoordinator {
    return this.coordinator;
  }

  getRepairs(): RepairRegistry {
    return this.repairs;
  }

  getDriftDetector(): DriftDetector {
    return this.drift;
  }

  getAddress(): { host: string; port: number } | null {
    const address = this.server?.address();
    if (!address || typeof address === 'string') return null;
    return { host: address.address, port: address.port };
  }

  /**
   * One poll tick. A tick still running when the next fires is not doubled.
   */
  private async poll(): Promise<void> {
    if (this.polling) return;
    this.polling = true;
    try {
      if (this.config.autoDeploy) {
        await this.coordinator.requestDeployment('poll');
      } else {
        const check = await this.coordinator.checkForUpdates();
        if (check.commitsBehind > 0) {
          logger.info(`${check.commitsBehind} commit(s) available; auto-deploy is off`);
        }
      }
    } catch (err) {
      logger.error('Poll failed', err instanceof Error ? err : undefined);
    } finally {
      this.polling = false;
    }
  }
}

/**
 * The crash marker, when kept inside the working tree, as a tree-relative path.
 */
function markerPathsInTree(config: GitOpsConfiguration): string[] {
  const relative = path.relative(config.repoPath, config.markerPath);
  if (relative.startsWith('..') || path.isAbsolute(relative)) return [];
  return [relative, `${relative}.tmp`];
}

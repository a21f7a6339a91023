/**
 * Secrets Synchronizer
 *
 * Pulls every secret from the configured store into a generated YAML file
 * inside the config tree and makes sure the main secrets file includes it.
 * The generated file is rewritten whole on every sync; nothing in it is
 * meant to be edited.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import yaml from 'js-yaml';
import { SecretSyncError } from '../deploy/errors.js';
import type { SecretSyncResult, SecretsSync } from '../deploy/types.js';
import { getLogger, registerComponent } from '../logging/index.js';
import type { SecretStore } from './types.js';

registerComponent('secrets', 'Secret synchronisation');
const logger = getLogger('secrets');

export interface SecretsSynchronizerOptions {
  /** null when no store is configured; sync() is then a no-op */
  store: SecretStore | null;
  /** Config tree root */
  configDir: string;
  /** Generated file, relative to configDir (default secrets_gitops.yaml) */
  outputFile?: string;
  /** Main secrets file, relative to configDir (default secrets.yaml) */
  includeFile?: string;
  /** Injectable clock for the header timestamp */
  now?: () => Date;
}

/**
 * Render the generated secrets file: header comments, then a mapping with
 * keys in sorted order.
 */
export function renderSecretsFile(
  secrets: Record<string, string>,
  storeName: string,
  source: string,
  syncedAt: Date
): string {
  const header = [
    '# Managed by config-gitops - DO NOT EDIT MANUALLY',
    `# Synced from ${storeName} at ${syncedAt.toISOString()}`,
    `# Source: ${source}`,
    '',
    '',
  ].join('\n');
  return header + yaml.dump(secrets, { sortKeys: true, lineWidth: -1 });
}

export function includeDirective(outputFile: string): string {
  return `<<: !include ${outputFile}`;
}

export class SecretsSynchronizer implements SecretsSync {
  private readonly store: SecretStore | null;
  private readonly configDir: string;
  private readonly outputFile: string;
  private readonly includeFile: string;
  private readonly now: () => Date;
  private initialized = false;
  private warnedUnconfigured = false;

  constructor(options: SecretsSynchronizerOptions) {
    this.store = options.store;
    this.configDir = options.configDir;
    this.outputFile = options.outputFile ?? 'secrets_gitops.yaml';
    this.includeFile = options.includeFile ?? 'secrets.yaml';
    this.now = options.now ?? (() => new Date());
  }

  getOutputPath(): string {
    return path.join(this.configDir, this.outputFile);
  }

  getIncludePath(): string {
    return path.join(this.configDir, this.includeFile);
  }

  /** Files this synchronizer writes, relative to the config tree */
  managedPaths(): string[] {
    return [this.outputFile, `${this.outputFile}.tmp`];
  }

  async sync(signal?: AbortSignal): Promise<SecretSyncResult> {
    const store = this.store;
    if (!store) {
      if (!this.warnedUnconfigured) {
        logger.warn('No secret store configured, skipping secret sync');
        this.warnedUnconfigured = true;
      }
      return { skipped: true, secretCount: 0 };
    }

    try {
      if (!this.initialized) {
        await store.initialize();
        this.initialized = true;
        logger.info(`Secret store ${store.name} initialized`);
      }
      const secrets = await store.fetchAll();
      if (signal?.aborted) {
        throw new SecretSyncError('unknown', `Secret sync from ${store.name} was cancelled before writing`);
      }
      const outputPath = await this.writeSecretsFile(store, secrets);
      await this.ensureInclude();

      const secretCount = Object.keys(secrets).length;
      logger.info(`Synced ${secretCount} secret(s) from ${store.name}`);
      return { skipped: false, secretCount, outputPath };
    } catch (err) {
      if (err instanceof SecretSyncError) throw err;
      throw new SecretSyncError('unknown', err instanceof Error ? err.message : String(err));
    }
  }

  async shutdown(): Promise<void> {
    if (this.store && this.initialized) {
      await this.store.shutdown();
      this.initialized = false;
    }
  }

  /**
   * Temp file then rename, so the host never reads a half-written file.
   */
  private async writeSecretsFile(store: SecretStore, secrets: Record<string, string>): Promise<string> {
    const outputPath = this.getOutputPath();
    const content = renderSecretsFile(secrets, store.name, store.describeSource(), this.now());
    const tempPath = `${outputPath}.tmp`;
    await fs.writeFile(tempPath, content, { encoding: 'utf-8', mode: 0o600 });
    await fs.rename(tempPath, outputPath);
    logger.debug(`Wrote secrets to ${outputPath}`);
    return outputPath;
  }

  /**
   * Returns true when the main secrets file had to be created or changed.
   */
  async ensureInclude(): Promise<boolean> {
    const includePath = this.getIncludePath();
    const directive = includeDirective(this.outputFile);

    let existing: string | null;
    try {
      existing = await fs.readFile(includePath, 'utf-8');
    } catch (err) {
      if (!(typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT')) throw err;
      existing = null;
    }

    if (existing === null) {
      await fs.writeFile(
        includePath,
        `# Synced secrets (managed by config-gitops)\n${directive}\n\n# Your manual secrets here\n`,
        'utf-8'
      );
      logger.info(`Created ${this.includeFile} with include of ${this.outputFile}`);
      return true;
    }

    if (existing.includes(directive)) return false;

    await fs.writeFile(
      includePath,
      `# Synced secrets (managed by config-gitops)\n${directive}\n\n# Existing secrets\n${existing}`,
      'utf-8'
    );
    logger.info(`Added include of ${this.outputFile} to ${this.includeFile}`);
    return true;
  }
}

/**
 * GitRepository: the deployed working tree tracked against one remote branch.
 *
 * Implements RepositoryClient on top of GitClient and translates git
 * failures into RepositoryError reasons the coordinator can report.
 */

import * as fs from 'fs/promises';
import { GitClient, GitCommandError } from './GitClient.js';
import type { GitLogEntry, GitStatus } from './GitClient.js';
import { PhaseTimeoutError, RepositoryError } from '../deploy/errors.js';
import type { RepositoryErrorReason } from '../deploy/errors.js';
import type { RepositoryClient } from '../deploy/types.js';

export interface GitRepositoryOptions {
  remote?: string;
  branch?: string;
}

const REASON_PATTERNS: Array<[RepositoryErrorReason, RegExp]> = [
  ['lock_held', /index\.lock|Unable to create '.*\.lock'|Another git process/i],
  ['merge_conflict', /CONFLICT|Automatic merge failed|would be overwritten by merge|unmerged files|Not possible to fast-forward/i],
  ['authentication', /Authentication failed|Permission denied|could not read Username|terminal prompts disabled|returned error: 40[13]/i],
  ['network', /Could not resolve host|unable to access|Connection (refused|reset|timed out)|Could not read from remote repository|does not appear to be a git repository|Network is unreachable/i],
];

/**
 * Map git stderr to a failure reason.
 */
export function classifyGitFailure(output: string): RepositoryErrorReason {
  for (const [reason, pattern] of REASON_PATTERNS) {
    if (pattern.test(output)) return reason;
  }
  return 'unknown';
}

export class GitRepository implements RepositoryClient {
  private readonly remote: string;
  private readonly branch: string;

  constructor(
    private readonly client: GitClient,
    options: GitRepositoryOptions = {}
  ) {
    this.remote = options.remote ?? 'origin';
    this.branch = options.branch ?? 'main';
  }

  getClient(): GitClient {
    return this.client;
  }

  headCommit(): Promise<string> {
    return this.run(() => this.client.getCommitHash('HEAD'));
  }

  fetch(): Promise<void> {
    return this.run(() => this.client.fetch(this.remote, this.branch));
  }

  remoteHead(): Promise<string> {
    return this.run(() => this.client.getCommitHash(`refs/remotes/${this.remote}/${this.branch}`));
  }

  countCommits(from: string, to: string): Promise<number> {
    return this.run(() => this.client.countCommits(from, to));
  }

  commitLog(from: string, to: string, limit: number): Promise<GitLogEntry[]> {
    return this.run(() => this.client.log(limit, `${from}..${to}`));
  }

  pull(): Promise<void> {
    return this.run(() => this.client.pull(this.remote, this.branch));
  }

  changedFiles(from: string, to: string): Promise<string[]> {
    if (from === to) return Promise.resolve([]);
    return this.run(() => this.client.diffNameOnly(from, to));
  }

  async isLocked(): Promise<boolean> {
    const lockPath = await this.run(() => this.client.gitPath('index.lock'));
    try {
      await fs.access(lockPath);
      return true;
    } catch {
      return false;
    }
  }

  status(): Promise<GitStatus> {
    return this.run(() => this.client.status());
  }

  private async run<T>(operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (err) {
      if (err instanceof GitCommandError) {
        if (err.timedOut) {
          throw new PhaseTimeoutError(`git ${err.command}`, this.client.getTimeoutMs());
        }
        throw new RepositoryError(classifyGitFailure(err.stderr || err.message), err.message);
      }
      throw err;
    }
  }
}

/**
 * GitClient: shell wrapper around the git CLI.
 *
 * Every operation goes through execFile('git', ...) in the working tree.
 * Commands run with terminal prompts disabled and a per-command timeout so
 * a stuck credential helper or remote can never hang the caller.
 */

import { execFile } from 'child_process';
import * as path from 'path';
import { promisify } from 'util';

const execFileAsync = promisify(execFile);

export interface GitStatus {
  branch: string;
  clean: boolean;
  staged: string[];
  unstaged: string[];
  untracked: string[];
}

export interface GitLogEntry {
  hash: string;
  shortHash: string;
  author: string;
  date: string;
  message: string;
}

export interface GitClientOptions {
  /** Kill the git process after this many ms (default 60000) */
  timeoutMs?: number;
}

/**
 * A git command exited non-zero or was killed.
 */
export class GitCommandError extends Error {
  constructor(
    public readonly command: string,
    message: string,
    public readonly stderr: string,
    public readonly timedOut: boolean
  ) {
    super(`git ${command}: ${message}`);
    this.name = 'GitCommandError';
  }
}

export class GitClient {
  private readonly timeoutMs: number;

  constructor(
    private repoPath: string,
    options: GitClientOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? 60000;
  }

  getTimeoutMs(): number {
    return this.timeoutMs;
  }

  // ───── Repository ─────

  /**
   * Absolute path of a file inside the git directory (e.g. "index.lock").
   */
  async gitPath(name: string): Promise<string> {
    const output = await this.exec(['rev-parse', '--git-path', name]);
    return path.resolve(this.repoPath, output.trim());
  }

  // ───── Working tree ─────

  async status(): Promise<GitStatus> {
    const branch = await this.branch();
    const output = await this.exec(['status', '--porcelain=v1', '--untracked-files=all']);

    const staged: string[] = [];
    const unstaged: string[] = [];
    const untracked: string[] = [];

    for (const line of output.split('\n')) {
      if (line.length < 4) continue;
      const x = line.charAt(0); // index
      const y = line.charAt(1); // worktree
      const entry = line.slice(3);
      // Renames are reported as "old -> new"
      const arrow = entry.indexOf(' -> ');
      const file = unquote(arrow >= 0 ? entry.slice(arrow + 4) : entry);

      if (x === '?' && y === '?') {
        untracked.push(file);
      } else {
        if (x !== ' ' && x !== '?') staged.push(file);
        if (y !== ' ' && y !== '?') unstaged.push(file);
      }
    }

    return {
      branch,
      clean: staged.length === 0 && unstaged.length === 0 && untracked.length === 0,
      staged,
      unstaged,
      untracked,
    };
  }

  // ───── Remote operations ─────

  /**
   * Fetch and merge. Never rebases, never opens an editor.
   */
  async pull(remote?: string, branch?: string): Promise<void> {
    const args = ['pull', '--no-rebase', '--no-edit'];
    if (remote) args.push(remote);
    if (branch) args.push(branch);
    await this.exec(args);
  }

  async fetch(remote?: string, branch?: string): Promise<void> {
    const args = ['fetch'];
    if (remote) args.push(remote);
    if (branch) args.push(branch);
    await this.exec(args);
  }

  // ───── Branching ─────

  async branch(): Promise<string> {
    try {
      const output = await this.exec(['rev-parse', '--abbrev-ref', 'HEAD']);
      return output.trim();
    } catch {
      // No commits yet
      try {
        const symbolic = await this.exec(['symbolic-ref', '--short', 'HEAD']);
        return symbolic.trim();
      } catch {
        return 'main';
      }
    }
  }

  // ───── Diff & history ─────

  async diffNameOnly(from: string, to?: string): Promise<string[]> {
    const args = ['diff', '--name-only', from];
    if (to) args.push(to);
    const output = await this.exec(args);
    return output.split('\n').filter(Boolean);
  }

  /**
   * Number of commits reachable from `to` but not from `from`.
   */
  async countCommits(from: string, to: string): Promise<number> {
    const output = await this.exec(['rev-list', '--count', `${from}..${to}`]);
    const count = parseInt(output.trim(), 10);
    return isNaN(count) ? 0 : count;
  }

  /**
   * Log entries, newest first. `range` is any revision range ("a..b").
   */
  async log(limit?: number, range?: string): Promise<GitLogEntry[]> {
    // Delimiter that won't appear in commit messages
    const SEP = '---GIT_LOG_SEP---';
    const format = `%H${SEP}%h${SEP}%an${SEP}%aI${SEP}%s`;
    const args = ['log', `--format=${format}`];
    if (limit) args.push(`-${limit}`);
    if (range) args.push(range);
    const output = await this.exec(args);

    const entries: GitLogEntry[] = [];
    for (const line of output.split('\n')) {
      if (!line) continue;
      const [hash = '', shortHash = '', author = '', date = '', message = ''] = line.split(SEP);
      entries.push({ hash, shortHash, author, date, message });
    }
    return entries;
  }

  async getCommitHash(ref?: string): Promise<string> {
    const output = await this.exec(['rev-parse', ref || 'HEAD']);
    return output.trim();
  }

  // ───── Internal helpers ─────

  private async exec(args: string[]): Promise<string> {
    try {
      const { stdout } = await execFileAsync('git', args, {
        cwd: this.repoPath,
        maxBuffer: 10 * 1024 * 1024,
        timeout: this.timeoutMs,
        killSignal: 'SIGKILL',
        env: { ...process.env, GIT_TERMINAL_PROMPT: '0' },
      });
      return stdout;
    } catch (err: unknown) {
      const failure = describeExecFailure(err);
      const message = failure.killed
        ? `killed after ${this.timeoutMs}ms`
        : failure.stderr || failure.message || 'Unknown git error';
      throw new GitCommandError(args[0] ?? '', message, failure.stderr, failure.killed);
    }
  }
}

function describeExecFailure(err: unknown): { stderr: string; message: string; killed: boolean } {
  if (typeof err !== 'object' || err === null) {
    return { stderr: '', message: String(err), killed: false };
  }
  const stderr = 'stderr' in err && typeof err.stderr === 'string' ? err.stderr.trim() : '';
  const message = err instanceof Error ? err.message : '';
  const killed = 'killed' in err && err.killed === true;
  return { stderr, message, killed };
}

function unquote(file: string): string {
  if (file.length >= 2 && file.startsWith('"') && file.endsWith('"')) {
    return file.slice(1, -1).replace(/\\(.)/g, '$1');
  }
  return file;
}

/**
 * GitRepository tests against a local bare remote.
 *
 *   remote.git  <- push --  seed/      (stands in for the upstream author)
 *               -- clone -> deployed/  (the working tree under management)
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as os from 'os';
import * as path from 'path';
import * as fs from 'fs/promises';
import { GitClient } from '../../../src/git/GitClient.js';
import { GitRepository, classifyGitFailure } from '../../../src/git/GitRepository.js';
import { cloneRepo, initRepo, publishFile } from '../../helpers/gitFixtures.js';
import { RepositoryError } from '../../../src/deploy/errors.js';
import type { RepositoryErrorReason } from '../../../src/deploy/errors.js';

describe('GitRepository', () => {
  let tmpDir: string;
  let seedDir: string;
  let deployedDir: string;
  let repository: GitRepository;
  let initialCommit: string;

  function publish(file: string, content: string, message: string): Promise<string> {
    return publishFile(seedDir, file, content, message);
  }

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'git-repo-test-'));
    const remoteDir = path.join(tmpDir, 'remote.git');
    seedDir = path.join(tmpDir, 'seed');
    deployedDir = path.join(tmpDir, 'deployed');
    await Promise.all([fs.mkdir(remoteDir), fs.mkdir(seedDir), fs.mkdir(deployedDir)]);

    await initRepo(remoteDir, true);
    await cloneRepo(remoteDir, seedDir);
    initialCommit = await publish('configuration.yaml', 'homeassistant:\n  name: Home\n', 'initial');

    await cloneRepo(remoteDir, deployedDir);
    repository = new GitRepository(new GitClient(deployedDir), { remote: 'origin', branch: 'main' });
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('reads the checked-out commit', async () => {
    expect(await repository.headCommit()).toBe(initialCommit);
  });

  it('fetches without touching the working tree', async () => {
    const next = await publish('automations.yaml', '[]\n', 'add automations');

    await repository.fetch();

    expect(await repository.remoteHead()).toBe(next);
    expect(await repository.headCommit()).toBe(initialCommit);
    expect(await repository.countCommits(initialCommit, next)).toBe(1);

    const log = await repository.commitLog(initialCommit, next, 10);
    expect(log.map((e) => [e.hash, e.message])).toEqual([[next, 'add automations']]);
  });

  it('pulls and lists the changed files', async () => {
    await publish('automations.yaml', '[]\n', 'add automations');
    const next = await publish('scripts/morning.yaml', 'morning: {}\n', 'add script');

    await repository.pull();

    expect(await repository.headCommit()).toBe(next);
    expect((await repository.changedFiles(initialCommit, next)).sort()).toEqual([
      'automations.yaml',
      'scripts/morning.yaml',
    ]);
  });

  it('returns no changed files for identical commits', async () => {
    await expect(repository.changedFiles(initialCommit, initialCommit)).resolves.toEqual([]);
  });

  it('detects the index lock', async () => {
    expect(await repository.isLocked()).toBe(false);
    await fs.writeFile(path.join(deployedDir, '.git', 'index.lock'), '');
    expect(await repository.isLocked()).toBe(true);
  });

  it('reports local edits in status', async () => {
    await fs.writeFile(path.join(deployedDir, 'configuration.yaml'), 'homeassistant:\n  name: Cabin\n');
    await fs.writeFile(path.join(deployedDir, 'notes.txt'), 'todo\n');

    const status = await repository.status();
    expect(status.unstaged).toEqual(['configuration.yaml']);
    expect(status.untracked).toEqual(['notes.txt']);
  });

  it('fails a pull over local edits with merge_conflict', async () => {
    await publish('configuration.yaml', 'homeassistant:\n  name: Upstream\n', 'rename');
    await fs.writeFile(path.join(deployedDir, 'configuration.yaml'), 'homeassistant:\n  name: Local\n');

    const err = await repository.pull().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(RepositoryError);
    expect(err instanceof RepositoryError && err.reason).toBe('merge_conflict');
  });

  it('fails a fetch from an unknown remote with network', async () => {
    const broken = new GitRepository(new GitClient(deployedDir), { remote: 'nowhere', branch: 'main' });

    const err = await broken.fetch().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(RepositoryError);
    expect(err instanceof RepositoryError && err.reason).toBe('network');
  });
});

describe('classifyGitFailure', () => {
  const cases: Array<[string, RepositoryErrorReason]> = [
    ["fatal: Unable to create '/config/.git/index.lock': File exists.", 'lock_held'],
    ['CONFLICT (content): Merge conflict in automations.yaml', 'merge_conflict'],
    ['error: Your local changes to the following files would be overwritten by merge:', 'merge_conflict'],
    ["fatal: Authentication failed for 'https://example.com/repo.git/'", 'authentication'],
    ['fatal: could not read Username for \'https://example.com\': terminal prompts disabled', 'authentication'],
    ["fatal: unable to access 'https://example.com/repo.git/': Could not resolve host: example.com", 'network'],
    ['fatal: Could not read from remote repository.', 'network'],
    ['fatal: bad object HEAD', 'unknown'],
  ];

  it.each(cases)('classifies %s as %s', (output, reason) => {
    expect(classifyGitFailure(output)).toBe(reason);
  });
});

/**
 * CLI commands end to end against an in-process daemon.
 */

import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { createProgram } from '../../../../src/cli/index.js';
import { DEFAULT_URL } from '../../../../src/cli/lib/ApiClient.js';
import { COMMIT_A, COMMIT_B } from '../../../helpers/fakes.js';
import { createApiHarness } from '../../../helpers/apiHarness.js';
import type { ApiHarness } from '../../../helpers/apiHarness.js';
import { serve } from '../../../helpers/httpStub.js';
import type { HttpStub } from '../../../helpers/httpStub.js';

describe('createProgram', () => {
  it('takes the daemon URL and token from the environment', () => {
    const program = createProgram({ GITOPS_URL: 'http://ha.local:8099', GITOPS_API_TOKEN: 'test-token' });
    expect(program.opts()).toMatchObject({ url: 'http://ha.local:8099', token: 'test-token' });
  });

  it('falls back to the default URL', () => {
    const program = createProgram({});
    expect(program.opts()['url']).toBe(DEFAULT_URL);
  });

  it('registers every command group', () => {
    const names = createProgram({}).commands.map((c) => c.name());
    expect(names).toEqual(['status', 'check', 'deploy', 'repairs', 'drift', 'secrets']);
  });
});

describe('CLI commands', () => {
  let harness: ApiHarness;
  let server: HttpStub;
  let printed: string[];
  let restoreSpies: Array<() => void>;

  beforeEach(async () => {
    harness = await createApiHarness();
    server = await serve(harness.app);
    printed = [];
    const log = jest.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
      printed.push(args.map(String).join(' '));
    });
    const exit = jest.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit');
    });
    restoreSpies = [() => log.mockRestore(), () => exit.mockRestore()];
  });

  afterEach(async () => {
    restoreSpies.forEach((restore) => restore());
    await server.close();
    await harness.cleanup();
  });

  function run(...args: string[]): Promise<unknown> {
    return createProgram({}).parseAsync(['node', 'config-gitops', '--url', server.url, '--json', ...args]);
  }

  function lastJson(): unknown {
    return JSON.parse(printed[printed.length - 1] ?? 'null');
  }

  it('status prints the state as JSON', async () => {
    await run('status');
    expect(lastJson()).toMatchObject({ status: 'idle', currentCommit: COMMIT_A });
  });

  it('deploy waits for the attempt', async () => {
    harness.repository.publish(COMMIT_B, ['automations.yaml']);

    await run('deploy', '--detail', 'from cli');

    expect(lastJson()).toMatchObject({
      status: 'succeeded',
      currentCommit: COMMIT_B,
      trigger: { reason: 'manual', detail: 'from cli' },
    });
  });

  it('deploy exits non-zero when the attempt fails', async () => {
    harness.repository.publish(COMMIT_B, ['automations.yaml']);
    harness.repository.pullError = new Error('connection reset');

    await expect(run('deploy')).rejects.toThrow('process.exit');
    expect(process.exit).toHaveBeenCalledWith(1);
    expect(JSON.parse(printed[0] ?? 'null')).toMatchObject({ status: 'failed', currentCommit: COMMIT_A });
  });

  it('repairs lists active repairs by default', async () => {
    harness.repairs.raise('restart_required', 'Restart needed');

    await run('repairs');

    expect(lastJson()).toEqual([expect.objectContaining({ kind: 'restart_required', severity: 'warning' })]);
  });

  it('repairs ack reports a missing repair', async () => {
    await expect(run('repairs', 'ack', 'git_lock')).rejects.toThrow('process.exit');

    expect(lastJson()).toEqual({
      success: false,
      error: 'Failed to acknowledge git_lock: No active git_lock repair',
      details: { statusCode: 404 },
    });
  });

  it('repairs ack clears an active repair', async () => {
    harness.repairs.raise('git_lock', 'Index lock held');

    await run('repairs', 'ack', 'git_lock');

    expect(lastJson()).toEqual({ success: true, message: 'Acknowledged git_lock' });
    expect(harness.repairs.list()).toEqual([]);
  });

  it('drift check prints the fresh report', async () => {
    await run('drift', 'check');
    expect(lastJson()).toMatchObject({ dirtyPaths: [] });
  });

  it('secrets refresh reports the synced count', async () => {
    await run('secrets', 'refresh');
    expect(lastJson()).toEqual({
      success: true,
      message: 'Synced 2 secret(s) to /config/secrets_gitops.yaml',
    });
  });
});

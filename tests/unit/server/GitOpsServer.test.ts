/**
 * Full service against a local bare remote and a stub host API.
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { ApiClient } from '../../../src/cli/lib/ApiClient.js';
import type { GitOpsConfiguration } from '../../../src/config/GitOpsConfig.js';
import { GitOpsServer } from '../../../src/server/GitOpsServer.js';
import { cloneRepo, initRepo, publishFile } from '../../helpers/gitFixtures.js';
import { startHttpStub } from '../../helpers/httpStub.js';
import type { HttpStub } from '../../helpers/httpStub.js';

function configFor(repoPath: string, hostUrl: string): GitOpsConfiguration {
  return {
    repoPath,
    remote: 'origin',
    branch: 'main',
    pollIntervalMs: 0,
    autoDeploy: true,
    driftEnabled: false,
    driftIntervalMs: 60000,
    markerPath: path.join(repoPath, '.git', 'gitops-deploy.json'),
    timeouts: { repositoryMs: 10000, secretsMs: 5000, validationMs: 5000, reloadMs: 5000 },
    host: { url: hostUrl, token: 'test-token' },
    secrets: {
      store: 'none',
      outputFile: 'secrets_gitops.yaml',
      includeFile: 'secrets.yaml',
      envPrefix: 'GITOPS_SECRET_',
      infisical: { url: 'http://127.0.0.1:1', environment: 'prod', path: '/' },
      vault: { path: 'secret/data/homeassistant', auth: 'token' },
    },
    api: { port: 0, host: '127.0.0.1', rateLimit: 1000 },
  };
}

describe('GitOpsServer', () => {
  let tmpDir: string;
  let seedDir: string;
  let deployedDir: string;
  let host: HttpStub;
  let reloaded: string[];
  let server: GitOpsServer;

  function publish(file: string, content: string, message: string): Promise<string> {
    return publishFile(seedDir, file, content, message);
  }

  function client(): ApiClient {
    const address = server.getAddress();
    return new ApiClient({ baseUrl: `http://127.0.0.1:${address?.port ?? 0}`, timeout: 20000 });
  }

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'gitops-server-test-'));
    const remoteDir = path.join(tmpDir, 'remote.git');
    seedDir = path.join(tmpDir, 'seed');
    deployedDir = path.join(tmpDir, 'deployed');
    await Promise.all([fs.mkdir(remoteDir), fs.mkdir(seedDir), fs.mkdir(deployedDir)]);

    await initRepo(remoteDir, true);
    await cloneRepo(remoteDir, seedDir);
    await publish('configuration.yaml', 'homeassistant:\n  name: Home\n', 'initial');
    await cloneRepo(remoteDir, deployedDir);

    reloaded = [];
    host = await startHttpStub((app) => {
      app.post('/api/config/core/check_config', (_req, res) => {
        res.json({ result: 'valid', errors: null });
      });
      app.post('/api/services/:domain/reload', (req, res) => {
        reloaded.push(req.params.domain);
        res.json([]);
      });
    });

    server = new GitOpsServer(configFor(deployedDir, host.url));
  });

  afterEach(async () => {
    await server.stop();
    await host.close();
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('starts, serves the API and stops', async () => {
    await server.start();

    expect(server.isRunning()).toBe(true);
    expect(server.getAddress()?.port).toBeGreaterThan(0);
    expect((await client().getStatus()).status).toBe('idle');

    await server.stop();
    expect(server.isRunning()).toBe(false);
    expect(server.getCoordinator().isRunning()).toBe(false);
  });

  it('refuses a second start', async () => {
    await server.start();
    await expect(server.start()).rejects.toThrow('config-gitops is already running');
  });

  it('deploys a pushed commit and reloads the affected domain', async () => {
    await server.start();
    const next = await publish('automations.yaml', '- id: porch\n  alias: Porch light\n', 'add automation');

    const state = await client().deploy();

    expect(state.status).toBe('succeeded');
    expect(state.currentCommit).toBe(next);
    expect(state.changedFiles).toEqual(['automations.yaml']);
    expect(reloaded).toEqual(['automation']);
    expect(await fs.readFile(path.join(deployedDir, 'automations.yaml'), 'utf-8')).toContain('Porch light');
  });
});

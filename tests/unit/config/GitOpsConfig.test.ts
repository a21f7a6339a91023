import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as path from 'path';
import { getGitOpsConfig, resetGitOpsConfig } from '../../../src/config/GitOpsConfig.js';

describe('GitOpsConfig', () => {
  const originalEnv = { ...process.env };

  beforeEach(() => {
    for (const key of Object.keys(process.env)) {
      if (key.startsWith('GITOPS_') || key.startsWith('INFISICAL_') || key.startsWith('VAULT_')) {
        delete process.env[key];
      }
    }
    delete process.env['PORT'];
    delete process.env['SUPERVISOR_TOKEN'];
    resetGitOpsConfig();
  });

  afterEach(() => {
    process.env = { ...originalEnv };
    resetGitOpsConfig();
  });

  it('should apply defaults', () => {
    const config = getGitOpsConfig();

    expect(config.repoPath).toBe(path.resolve('/config'));
    expect(config.remote).toBe('origin');
    expect(config.branch).toBe('main');
    expect(config.pollIntervalMs).toBe(300_000);
    expect(config.autoDeploy).toBe(true);
    expect(config.driftEnabled).toBe(false);
    expect(config.driftIntervalMs).toBe(300_000);
    expect(config.markerPath).toBe(path.join(path.resolve('/config'), '.git', 'gitops-deploy.json'));
    expect(config.timeouts).toEqual({ repositoryMs: 60000, secretsMs: 30000, validationMs: 120000, reloadMs: 30000 });
    expect(config.secrets.store).toBe('none');
    expect(config.secrets.outputFile).toBe('secrets_gitops.yaml');
    expect(config.api).toEqual({
      port: 8099,
      host: '0.0.0.0',
      webhookId: undefined,
      webhookSecret: undefined,
      token: undefined,
      rateLimit: 100,
    });
  });

  it('should read intervals in seconds', () => {
    process.env['GITOPS_POLL_INTERVAL'] = '0';
    process.env['GITOPS_DRIFT_INTERVAL'] = '45';

    const config = getGitOpsConfig();
    expect(config.pollIntervalMs).toBe(0);
    expect(config.driftIntervalMs).toBe(45_000);
  });

  it('should fall back to defaults for unparsable numbers', () => {
    process.env['GITOPS_GIT_TIMEOUT'] = 'soon';
    expect(getGitOpsConfig().timeouts.repositoryMs).toBe(60000);
  });

  it('should parse booleans', () => {
    process.env['GITOPS_AUTO_DEPLOY'] = 'false';
    process.env['GITOPS_DRIFT_ENABLED'] = 'yes';

    const config = getGitOpsConfig();
    expect(config.autoDeploy).toBe(false);
    expect(config.driftEnabled).toBe(true);
  });

  it('should treat an unknown store as none', () => {
    process.env['GITOPS_SECRETS_STORE'] = 'keychain';
    expect(getGitOpsConfig().secrets.store).toBe('none');
  });

  it('should use the supervisor token when no host token is set', () => {
    process.env['SUPERVISOR_TOKEN'] = 'test-token';
    expect(getGitOpsConfig().host.token).toBe('test-token');
  });

  it('should cache until reset', () => {
    const first = getGitOpsConfig();
    process.env['GITOPS_BRANCH'] = 'production';
    expect(getGitOpsConfig()).toBe(first);

    resetGitOpsConfig();
    expect(getGitOpsConfig().branch).toBe('production');
  });
});

/**
 * GitOps Configuration
 *
 * Every runtime setting comes from the environment (a .env file is loaded by
 * the entry point). Parsed once and cached; use resetGitOpsConfig() in tests.
 */

import * as path from 'path';

export type SecretStoreType = 'none' | 'env' | 'infisical' | 'vault';

export interface GitOpsConfiguration {
  /** Working tree deployed to the host (GITOPS_REPO_PATH, default /config) */
  repoPath: string;
  /** Remote tracked by the working tree (GITOPS_REMOTE, default origin) */
  remote: string;
  /** Branch deployed from the remote (GITOPS_BRANCH, default main) */
  branch: string;
  /** Poll interval in ms (GITOPS_POLL_INTERVAL seconds, default 300; 0 disables) */
  pollIntervalMs: number;
  /** Poll triggers a deployment instead of only checking (GITOPS_AUTO_DEPLOY, default true) */
  autoDeploy: boolean;
  /** Drift detection on/off (GITOPS_DRIFT_ENABLED, default false) */
  driftEnabled: boolean;
  /** Drift check interval in ms (GITOPS_DRIFT_INTERVAL seconds, default 300) */
  driftIntervalMs: number;
  /** Crash marker location (GITOPS_MARKER_PATH, default <repo>/.git/gitops-deploy.json) */
  markerPath: string;
  /** Deployer's own files inside the tree (GITOPS_SELF_PATH, e.g. custom_components/gitops/) */
  selfPath?: string;

  timeouts: {
    /** git fetch/pull (GITOPS_GIT_TIMEOUT ms, default 60000) */
    repositoryMs: number;
    /** secret store round trip (GITOPS_SECRETS_TIMEOUT ms, default 30000) */
    secretsMs: number;
    /** host configuration check (GITOPS_VALIDATE_TIMEOUT ms, default 120000) */
    validationMs: number;
    /** one domain reload (GITOPS_RELOAD_TIMEOUT ms, default 30000) */
    reloadMs: number;
  };

  host: {
    /** Host REST API base URL (GITOPS_HOST_URL, default http://supervisor/core) */
    url: string;
    /** Long-lived access token (GITOPS_HOST_TOKEN or SUPERVISOR_TOKEN) */
    token?: string;
  };

  secrets: {
    store: SecretStoreType;
    /** Generated secrets file, relative to the repo (GITOPS_SECRETS_FILE) */
    outputFile: string;
    /** Main secrets file that includes the generated one (GITOPS_SECRETS_INCLUDE_FILE) */
    includeFile: string;
    envPrefix: string;
    infisical: {
      url: string;
      clientId?: string;
      clientSecret?: string;
      projectId?: string;
      environment: string;
      path: string;
    };
    vault: {
      addr?: string;
      token?: string;
      path: string;
      auth: 'token' | 'approle';
      roleId?: string;
      secretId?: string;
    };
  };

  api: {
    port: number;
    host: string;
    /** Path segment identifying the deployment webhook (GITOPS_WEBHOOK_ID) */
    webhookId?: string;
    /** HMAC secret for X-Hub-Signature-256 (GITOPS_WEBHOOK_SECRET) */
    webhookSecret?: string;
    /** Bearer token for the management routes (GITOPS_API_TOKEN); unset leaves them open */
    token?: string;
    /** Requests per minute per client (GITOPS_API_RATE_LIMIT, default 100) */
    rateLimit: number;
  };
}

let cachedConfig: GitOpsConfiguration | null = null;

function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined || value === '') return defaultValue;
  return value === 'true' || value === '1' || value === 'yes';
}

function parseNumber(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value === '') return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function parseStoreType(value: string | undefined): SecretStoreType {
  switch (value) {
    case 'env':
    case 'infisical':
    case 'vault':
      return value;
    default:
      return 'none';
  }
}

export function getGitOpsConfig(): GitOpsConfiguration {
  if (cachedConfig) return cachedConfig;

  const env = process.env;
  const repoPath = path.resolve(env['GITOPS_REPO_PATH'] || '/config');

  cachedConfig = {
    repoPath,
    remote: env['GITOPS_REMOTE'] || 'origin',
    branch: env['GITOPS_BRANCH'] || 'main',
    pollIntervalMs: parseNumber(env['GITOPS_POLL_INTERVAL'], 300) * 1000,
    autoDeploy: parseBoolean(env['GITOPS_AUTO_DEPLOY'], true),
    driftEnabled: parseBoolean(env['GITOPS_DRIFT_ENABLED'], false),
    driftIntervalMs: parseNumber(env['GITOPS_DRIFT_INTERVAL'], 300) * 1000,
    markerPath: env['GITOPS_MARKER_PATH'] || path.join(repoPath, '.git', 'gitops-deploy.json'),
    selfPath: env['GITOPS_SELF_PATH'] || undefined,
    timeouts: {
      repositoryMs: parseNumber(env['GITOPS_GIT_TIMEOUT'], 60000),
      secretsMs: parseNumber(env['GITOPS_SECRETS_TIMEOUT'], 30000),
      validationMs: parseNumber(env['GITOPS_VALIDATE_TIMEOUT'], 120000),
      reloadMs: parseNumber(env['GITOPS_RELOAD_TIMEOUT'], 30000),
    },
    host: {
      url: env['GITOPS_HOST_URL'] || 'http://supervisor/core',
      token: env['GITOPS_HOST_TOKEN'] || env['SUPERVISOR_TOKEN'] || undefined,
    },
    secrets: {
      store: parseStoreType(env['GITOPS_SECRETS_STORE']),
      outputFile: env['GITOPS_SECRETS_FILE'] || 'secrets_gitops.yaml',
      includeFile: env['GITOPS_SECRETS_INCLUDE_FILE'] || 'secrets.yaml',
      envPrefix: env['GITOPS_SECRETS_ENV_PREFIX'] || 'GITOPS_SECRET_',
      infisical: {
        url: env['INFISICAL_URL'] || 'https://app.infisical.com',
        clientId: env['INFISICAL_CLIENT_ID'] || undefined,
        clientSecret: env['INFISICAL_CLIENT_SECRET'] || undefined,
        projectId: env['INFISICAL_PROJECT_ID'] || undefined,
        environment: env['INFISICAL_ENVIRONMENT'] || 'prod',
        path: env['INFISICAL_PATH'] || '/',
      },
      vault: {
        addr: env['VAULT_ADDR'] || undefined,
        token: env['VAULT_TOKEN'] || undefined,
        path: env['VAULT_SECRET_PATH'] || 'secret/data/homeassistant',
        auth: env['VAULT_AUTH'] === 'approle' ? 'approle' : 'token',
        roleId: env['VAULT_ROLE_ID'] || undefined,
        secretId: env['VAULT_SECRET_ID'] || undefined,
      },
    },
    api: {
      port: parseNumber(env['PORT'], 8099),
      host: env['GITOPS_API_HOST'] || '0.0.0.0',
      webhookId: env['GITOPS_WEBHOOK_ID'] || undefined,
      webhookSecret: env['GITOPS_WEBHOOK_SECRET'] || undefined,
      token: env['GITOPS_API_TOKEN'] || undefined,
      rateLimit: parseNumber(env['GITOPS_API_RATE_LIMIT'], 100),
    },
  };

  return cachedConfig;
}

/**
 * Reset cached configuration (for testing)
 */
export function resetGitOpsConfig(): void {
  cachedConfig = null;
}

import type { SecretStore } from '../types.js';

/**
 * Secrets from process.env. `GITOPS_SECRET_WIFI_PASSWORD` becomes
 * `wifi_password` (prefix stripped, lowercased).
 */
export class EnvSecretStore implements SecretStore {
  readonly name = 'env';

  constructor(
    private readonly prefix: string = 'GITOPS_SECRET_',
    private readonly env: NodeJS.ProcessEnv = process.env
  ) {}

  async initialize(): Promise<void> {
    // process.env is always available
  }

  async fetchAll(): Promise<Record<string, string>> {
    const secrets: Record<string, string> = {};
    for (const [envKey, value] of Object.entries(this.env)) {
      if (value === undefined || !envKey.startsWith(this.prefix)) continue;
      const key = envKey.slice(this.prefix.length).toLowerCase();
      if (key) secrets[key] = value;
    }
    return secrets;
  }

  describeSource(): string {
    return `environment variables prefixed ${this.prefix}`;
  }

  async shutdown(): Promise<void> {
    // Nothing to release
  }
}

import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { SecretSyncError } from '../../deploy/errors.js';
import type { SecretStore } from '../types.js';
import { isNotFound, toSecretSyncError } from './httpErrors.js';

export interface VaultConfig {
  addr?: string;
  token?: string;
  path?: string;          // KV v2 data path, default 'secret/data/homeassistant'
  auth?: 'token' | 'approle';
  roleId?: string;        // AppRole
  secretId?: string;      // AppRole
  timeoutMs?: number;
}

const AppRoleLoginSchema = z.object({
  auth: z.object({ client_token: z.string().min(1) }),
});

// KV v2: { data: { data: { key: value }, metadata: {...} } }
const KvReadSchema = z.object({
  data: z.object({
    data: z.record(z.unknown()).nullable(),
  }),
});

/**
 * HashiCorp Vault KV v2. Every key of the secret at `path` becomes one entry.
 */
export class VaultSecretStore implements SecretStore {
  readonly name = 'vault';
  private http: AxiosInstance | null = null;
  private token: string | null = null;
  private readonly path: string;

  constructor(private readonly config: VaultConfig) {
    this.path = config.path ?? 'secret/data/homeassistant';
  }

  async initialize(): Promise<void> {
    if (!this.config.addr) throw new SecretSyncError('unknown', 'Vault address required (VAULT_ADDR)');

    const http = axios.create({
      baseURL: this.config.addr,
      timeout: this.config.timeoutMs ?? 5000,
    });
    this.http = http;

    switch (this.config.auth ?? 'token') {
      case 'token':
        if (!this.config.token) throw new SecretSyncError('authentication', 'Vault token required (VAULT_TOKEN)');
        this.token = this.config.token;
        break;
      case 'approle':
        this.token = await this.loginAppRole(http);
        break;
    }

    try {
      await http.get('/v1/sys/health', {
        headers: this.headers(),
        validateStatus: (s) => s < 500, // 200 active, 429 standby, 472/473 perf standby
      });
    } catch (err) {
      throw toSecretSyncError(this.name, err);
    }
  }

  async fetchAll(): Promise<Record<string, string>> {
    if (!this.http || !this.token) throw new Error('VaultSecretStore not initialized');

    let data: unknown;
    try {
      const resp = await this.http.get(`/v1/${this.path}`, { headers: this.headers() });
      data = resp.data;
    } catch (err) {
      if (isNotFound(err)) return {};
      throw toSecretSyncError(this.name, err);
    }

    const parsed = KvReadSchema.safeParse(data);
    if (!parsed.success) {
      throw new SecretSyncError('malformed_response', `Unexpected Vault response for ${this.path}`);
    }
    const secrets: Record<string, string> = {};
    for (const [key, value] of Object.entries(parsed.data.data.data ?? {})) {
      secrets[key] = typeof value === 'string' ? value : JSON.stringify(value);
    }
    return secrets;
  }

  describeSource(): string {
    return `${this.path} in Vault`;
  }

  async shutdown(): Promise<void> {
    this.http = null;
    this.token = null;
  }

  private async loginAppRole(http: AxiosInstance): Promise<string> {
    if (!this.config.roleId || !this.config.secretId) {
      throw new SecretSyncError('authentication', 'Vault AppRole requires roleId and secretId');
    }
    let data: unknown;
    try {
      const resp = await http.post('/v1/auth/approle/login', {
        role_id: this.config.roleId,
        secret_id: this.config.secretId,
      });
      data = resp.data;
    } catch (err) {
      throw toSecretSyncError(this.name, err);
    }
    const parsed = AppRoleLoginSchema.safeParse(data);
    if (!parsed.success) {
      throw new SecretSyncError('malformed_response', 'Vault AppRole login returned no client token');
    }
    return parsed.data.auth.client_token;
  }

  private headers(): Record<string, string> {
    return this.token ? { 'X-Vault-Token': this.token } : {};
  }
}

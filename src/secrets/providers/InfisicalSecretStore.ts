import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { SecretSyncError } from '../../deploy/errors.js';
import type { SecretStore } from '../types.js';
import { isUnauthorized, toSecretSyncError } from './httpErrors.js';

export interface InfisicalConfig {
  url: string;
  clientId?: string;
  clientSecret?: string;
  /** Infisical project (workspace) id */
  projectId?: string;
  environment: string;
  path: string;
  timeoutMs?: number;
}

const LoginResponseSchema = z.object({
  accessToken: z.string().min(1),
});

const SecretsResponseSchema = z.object({
  secrets: z.array(
    z.object({
      secretKey: z.string(),
      secretValue: z.string(),
    })
  ),
});

/**
 * Infisical over its REST API, authenticated with a universal-auth machine
 * identity.
 */
export class InfisicalSecretStore implements SecretStore {
  readonly name = 'infisical';
  private http: AxiosInstance | null = null;
  private accessToken: string | null = null;

  constructor(private readonly config: InfisicalConfig) {}

  async initialize(): Promise<void> {
    if (!this.config.clientId || !this.config.clientSecret) {
      throw new SecretSyncError(
        'authentication',
        'Infisical client id and secret required (INFISICAL_CLIENT_ID, INFISICAL_CLIENT_SECRET)'
      );
    }
    if (!this.config.projectId) {
      throw new SecretSyncError('unknown', 'Infisical project id required (INFISICAL_PROJECT_ID)');
    }

    this.http = axios.create({
      baseURL: this.config.url,
      timeout: this.config.timeoutMs ?? 10000,
    });
    this.accessToken = await this.login(this.http);
  }

  async fetchAll(): Promise<Record<string, string>> {
    const http = this.http;
    if (!http || !this.accessToken) throw new Error('InfisicalSecretStore not initialized');

    let data: unknown;
    try {
      data = await this.listSecrets(http, this.accessToken);
    } catch (err) {
      if (!isUnauthorized(err)) throw toSecretSyncError(this.name, err);
      // Access token expired; log in again once
      this.accessToken = await this.login(http);
      try {
        data = await this.listSecrets(http, this.accessToken);
      } catch (retryErr) {
        throw toSecretSyncError(this.name, retryErr);
      }
    }

    const parsed = SecretsResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new SecretSyncError('malformed_response', `Unexpected Infisical secrets response: ${parsed.error.message}`);
    }
    const secrets: Record<string, string> = {};
    for (const secret of parsed.data.secrets) {
      secrets[secret.secretKey] = secret.secretValue;
    }
    return secrets;
  }

  describeSource(): string {
    return `${this.config.path} path in ${this.config.environment} environment`;
  }

  async shutdown(): Promise<void> {
    this.http = null;
    this.accessToken = null;
  }

  private async login(http: AxiosInstance): Promise<string> {
    let data: unknown;
    try {
      const resp = await http.post('/api/v1/auth/universal-auth/login', {
        clientId: this.config.clientId,
        clientSecret: this.config.clientSecret,
      });
      data = resp.data;
    } catch (err) {
      throw toSecretSyncError(this.name, err);
    }
    const parsed = LoginResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new SecretSyncError('malformed_response', 'Infisical login response carried no access token');
    }
    return parsed.data.accessToken;
  }

  private async listSecrets(http: AxiosInstance, token: string): Promise<unknown> {
    const resp = await http.get('/api/v3/secrets/raw', {
      headers: { Authorization: `Bearer ${token}` },
      params: {
        workspaceId: this.config.projectId,
        environment: this.config.environment,
        secretPath: this.config.path,
      },
    });
    return resp.data;
  }
}

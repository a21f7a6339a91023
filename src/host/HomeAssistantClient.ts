/**
 * REST client for the host's API (Home Assistant core).
 */

import axios, { isAxiosError, type AxiosInstance } from 'axios';
import { z } from 'zod';
import { ReloadError } from '../deploy/errors.js';
import type { DomainReloader } from '../deploy/types.js';
import type { ReloadDomain } from '../deploy/ReloadPlanner.js';
import { getLogger, registerComponent } from '../logging/index.js';
import type { ConfigCheckResult, HostOperations } from './types.js';

registerComponent('host', 'Host API client');
const logger = getLogger('host');

export interface HomeAssistantClientOptions {
  /** e.g. http://supervisor/core or http://localhost:8123 */
  baseUrl: string;
  token?: string;
  timeoutMs?: number;
}

const CheckConfigResponseSchema = z.object({
  result: z.enum(['valid', 'invalid']),
  errors: z.string().nullable().optional(),
});

export class HomeAssistantClient implements HostOperations, DomainReloader {
  private readonly http: AxiosInstance;

  constructor(options: HomeAssistantClientOptions) {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (options.token) headers['Authorization'] = `Bearer ${options.token}`;

    this.http = axios.create({
      baseURL: options.baseUrl.replace(/\/+$/, ''),
      timeout: options.timeoutMs ?? 120000,
      headers,
    });
  }

  async checkConfig(): Promise<ConfigCheckResult> {
    const resp = await this.http.post('/api/config/core/check_config');
    const parsed = CheckConfigResponseSchema.safeParse(resp.data);
    if (!parsed.success) {
      throw new Error(`Unexpected check_config response: ${parsed.error.message}`);
    }
    return { result: parsed.data.result, errors: parsed.data.errors ?? null };
  }

  async reloadDomain(domain: ReloadDomain): Promise<void> {
    try {
      await this.http.post(`/api/services/${domain}/reload`, {});
      logger.info(`Reloaded ${domain}`);
    } catch (err) {
      throw new ReloadError(domain, `Reload of ${domain} failed: ${describeHttpError(err)}`);
    }
  }
}

export function describeHttpError(err: unknown): string {
  if (isAxiosError(err)) {
    const status = err.response?.status;
    return status !== undefined ? `HTTP ${status}` : err.message;
  }
  return err instanceof Error ? err.message : String(err);
}

/**
 * API Client for the config-gitops REST API
 *
 * Wraps axios to provide typed access to the daemon's endpoints.
 */

import axios, { AxiosInstance, AxiosResponse } from 'axios';
import type {
  DeployAccepted,
  DeploymentStatusResponse,
  DriftReportResponse,
  DriftResponse,
  RepairResponse,
  SecretSyncResponse,
  UpdateCheckResponse,
} from '../types/index.js';

export const DEFAULT_URL = 'http://localhost:8099';

/**
 * API error with additional context
 */
export class ApiError extends Error {
  constructor(
    message: string,
    public statusCode?: number,
    public response?: unknown
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

export interface ApiClientOptions {
  baseUrl?: string;
  token?: string;
  timeout?: number;
  verbose?: boolean;
}

function createAxiosInstance(options: ApiClientOptions): AxiosInstance {
  const headers: Record<string, string> = {
    'Content-Type': 'application/json',
    Accept: 'application/json',
  };
  if (options.token) headers['Authorization'] = `Bearer ${options.token}`;

  const instance = axios.create({
    baseURL: options.baseUrl || DEFAULT_URL,
    // Deployments wait for validation, which can take minutes
    timeout: options.timeout ?? 300000,
    headers,
    // Don't throw on non-2xx responses - we handle them ourselves
    validateStatus: () => true,
  });

  if (options.verbose) {
    instance.interceptors.request.use((config) => {
      console.log(`[API] ${config.method?.toUpperCase()} ${config.url}`);
      return config;
    });

    instance.interceptors.response.use((response) => {
      console.log(`[API] Response: ${response.status} ${response.statusText}`);
      return response;
    });
  }

  return instance;
}

/**
 * Error text from a `{ error, message }` body, or the fallback.
 */
export function extractErrorMessage(data: unknown, fallback: string): string {
  if (typeof data === 'object' && data !== null) {
    if ('message' in data && typeof data.message === 'string') return data.message;
    if ('error' in data && typeof data.error === 'string') return data.error;
  }
  if (typeof data === 'string' && data.length > 0) {
    return data;
  }
  return fallback;
}

/**
 * Return the body of a 2xx response; throw ApiError otherwise.
 */
function handleResponse<T>(response: AxiosResponse<T>): T {
  if (response.status >= 200 && response.status < 300) {
    return response.data;
  }
  const body: unknown = response.data;
  throw new ApiError(extractErrorMessage(body, response.statusText), response.status, body);
}

export class ApiClient {
  private axios: AxiosInstance;

  constructor(options: ApiClientOptions = {}) {
    this.axios = createAxiosInstance(options);
  }

  // ===========================================================================
  // Deployment
  // ===========================================================================

  async getStatus(): Promise<DeploymentStatusResponse> {
    return handleResponse(await this.axios.get<DeploymentStatusResponse>('/api/deployment/status'));
  }

  async checkForUpdates(): Promise<UpdateCheckResponse> {
    return handleResponse(await this.axios.get<UpdateCheckResponse>('/api/deployment/updates'));
  }

  /**
   * Waits for the terminal state.
   */
  async deploy(detail?: string): Promise<DeploymentStatusResponse> {
    return handleResponse(
      await this.axios.post<DeploymentStatusResponse>('/api/deployment/deploy', { wait: true, detail })
    );
  }

  /**
   * Returns as soon as the daemon accepted the request.
   */
  async deployInBackground(detail?: string): Promise<DeployAccepted> {
    return handleResponse(await this.axios.post<DeployAccepted>('/api/deployment/deploy', { wait: false, detail }));
  }

  async refreshSecrets(): Promise<SecretSyncResponse> {
    return handleResponse(await this.axios.post<SecretSyncResponse>('/api/deployment/secrets/refresh'));
  }

  // ===========================================================================
  // Repairs
  // ===========================================================================

  async getRepairs(): Promise<RepairResponse[]> {
    const body = handleResponse(await this.axios.get<{ repairs: RepairResponse[] }>('/api/repairs'));
    return body.repairs;
  }

  async acknowledgeRepair(kind: string): Promise<void> {
    handleResponse(await this.axios.delete<unknown>(`/api/repairs/${encodeURIComponent(kind)}`));
  }

  // ===========================================================================
  // Drift
  // ===========================================================================

  async getDrift(): Promise<DriftResponse> {
    return handleResponse(await this.axios.get<DriftResponse>('/api/drift'));
  }

  async checkDrift(): Promise<DriftReportResponse> {
    return handleResponse(await this.axios.post<DriftReportResponse>('/api/drift/check'));
  }
}

import { isAxiosError } from 'axios';
import { SecretSyncError } from '../../deploy/errors.js';

/**
 * Translate a failed secret store request into a SecretSyncError.
 */
export function toSecretSyncError(store: string, err: unknown): SecretSyncError {
  if (err instanceof SecretSyncError) return err;
  if (isAxiosError(err)) {
    const status = err.response?.status;
    if (status === 401 || status === 403) {
      return new SecretSyncError('authentication', `${store} rejected the credentials (HTTP ${status})`);
    }
    if (status === undefined) {
      return new SecretSyncError('network', `${store} unreachable: ${err.message}`);
    }
    return new SecretSyncError('unknown', `${store} request failed with HTTP ${status}`);
  }
  return new SecretSyncError('unknown', `${store}: ${err instanceof Error ? err.message : String(err)}`);
}

export function isNotFound(err: unknown): boolean {
  return isAxiosError(err) && err.response?.status === 404;
}

export function isUnauthorized(err: unknown): boolean {
  return isAxiosError(err) && err.response?.status === 401;
}

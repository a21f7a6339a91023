import type { ReloadDomain } from '../deploy/ReloadPlanner.js';

export interface ConfigCheckResult {
  result: 'valid' | 'invalid';
  /** Host diagnostics, null when valid */
  errors: string | null;
}

/**
 * Operations the host process exposes to the deployer.
 */
export interface HostOperations {
  checkConfig(): Promise<ConfigCheckResult>;
  reloadDomain(domain: ReloadDomain): Promise<void>;
}

import type { GitOpsConfiguration } from '../config/GitOpsConfig.js';
import { EnvSecretStore } from './providers/EnvSecretStore.js';
import { InfisicalSecretStore } from './providers/InfisicalSecretStore.js';
import { VaultSecretStore } from './providers/VaultSecretStore.js';
import type { SecretStore } from './types.js';

/**
 * Build the configured store, or null when secret sync is off.
 */
export function createSecretStore(config: GitOpsConfiguration['secrets']): SecretStore | null {
  switch (config.store) {
    case 'env':
      return new EnvSecretStore(config.envPrefix);
    case 'infisical':
      return new InfisicalSecretStore(config.infisical);
    case 'vault':
      return new VaultSecretStore(config.vault);
    case 'none':
      return null;
  }
}

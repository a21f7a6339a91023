import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { createSecretStore } from '../../../src/secrets/createSecretStore.js';
import { EnvSecretStore } from '../../../src/secrets/providers/EnvSecretStore.js';
import { InfisicalSecretStore } from '../../../src/secrets/providers/InfisicalSecretStore.js';
import { VaultSecretStore } from '../../../src/secrets/providers/VaultSecretStore.js';
import { getGitOpsConfig, resetGitOpsConfig } from '../../../src/config/GitOpsConfig.js';
import type { SecretStoreType } from '../../../src/config/GitOpsConfig.js';

describe('createSecretStore', () => {
  beforeEach(() => {
    resetGitOpsConfig();
  });

  afterEach(() => {
    resetGitOpsConfig();
  });

  function storeFor(store: SecretStoreType) {
    return createSecretStore({ ...getGitOpsConfig().secrets, store });
  }

  it('returns null when secret sync is off', () => {
    expect(storeFor('none')).toBeNull();
  });

  it('builds the configured store', () => {
    expect(storeFor('env')).toBeInstanceOf(EnvSecretStore);
    expect(storeFor('infisical')).toBeInstanceOf(InfisicalSecretStore);
    expect(storeFor('vault')).toBeInstanceOf(VaultSecretStore);
  });
});

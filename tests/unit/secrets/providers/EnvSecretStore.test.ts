import { describe, it, expect } from '@jest/globals';
import { EnvSecretStore } from '../../../../src/secrets/providers/EnvSecretStore.js';

describe('EnvSecretStore', () => {
  it('strips the prefix and lowercases keys', async () => {
    const store = new EnvSecretStore('GITOPS_SECRET_', {
      GITOPS_SECRET_WIFI_PASSWORD: 'test-secret',
      GITOPS_SECRET_MQTT_USER: 'broker',
      PATH: '/usr/bin',
    });

    await expect(store.fetchAll()).resolves.toEqual({ wifi_password: 'test-secret', mqtt_user: 'broker' });
  });

  it('skips a variable that is only the prefix', async () => {
    const store = new EnvSecretStore('HA_', { HA_: 'orphan', HA_TOKEN: 'placeholder' });
    await expect(store.fetchAll()).resolves.toEqual({ token: 'placeholder' });
  });

  it('describes its source', () => {
    expect(new EnvSecretStore('HA_', {}).describeSource()).toBe('environment variables prefixed HA_');
  });
});

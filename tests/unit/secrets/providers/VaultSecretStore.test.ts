import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { VaultSecretStore } from '../../../../src/secrets/providers/VaultSecretStore.js';
import { startHttpStub } from '../../../helpers/httpStub.js';
import type { HttpStub } from '../../../helpers/httpStub.js';

describe('VaultSecretStore', () => {
  let stub: HttpStub;
  let kvBody: unknown;
  let kvStatus: number;
  let seenTokens: Array<string | undefined>;

  beforeEach(async () => {
    kvBody = { data: { data: { wifi_password: 'test-wifi', port: 8123 }, metadata: { version: 3 } } };
    kvStatus = 200;
    seenTokens = [];

    stub = await startHttpStub((app) => {
      app.get('/v1/sys/health', (_req, res) => {
        res.status(429).json({ standby: true });
      });
      app.post('/v1/auth/approle/login', (req, res) => {
        if (req.body.role_id === 'role-1' && req.body.secret_id === 'test-secret') {
          res.json({ auth: { client_token: 'approle-token' } });
          return;
        }
        res.status(400).json({ errors: ['invalid role or secret ID'] });
      });
      app.get('/v1/secret/data/homeassistant', (req, res) => {
        const token = req.headers['x-vault-token'];
        seenTokens.push(typeof token === 'string' ? token : undefined);
        if (token !== 'test-token' && token !== 'approle-token') {
          res.status(403).json({ errors: ['permission denied'] });
          return;
        }
        res.status(kvStatus).json(kvBody);
      });
    });
  });

  afterEach(async () => {
    await stub.close();
  });

  it('reads every key of the secret, stringifying non-strings', async () => {
    const vault = new VaultSecretStore({ addr: stub.url, token: 'test-token' });
    await vault.initialize();

    expect(await vault.fetchAll()).toEqual({ wifi_password: 'test-wifi', port: '8123' });
    expect(seenTokens).toEqual(['test-token']);
    expect(vault.describeSource()).toBe('secret/data/homeassistant in Vault');
  });

  it('logs in with AppRole', async () => {
    const vault = new VaultSecretStore({ addr: stub.url, auth: 'approle', roleId: 'role-1', secretId: 'test-secret' });
    await vault.initialize();

    await vault.fetchAll();
    expect(seenTokens).toEqual(['approle-token']);
  });

  it('returns nothing when the secret does not exist', async () => {
    kvStatus = 404;
    kvBody = { errors: [] };
    const vault = new VaultSecretStore({ addr: stub.url, token: 'test-token' });
    await vault.initialize();

    expect(await vault.fetchAll()).toEqual({});
  });

  it('reports a denied token as an authentication failure', async () => {
    const vault = new VaultSecretStore({ addr: stub.url, token: 'wrong-token' });
    await vault.initialize();

    await expect(vault.fetchAll()).rejects.toMatchObject({
      reason: 'authentication',
      message: 'vault rejected the credentials (HTTP 403)',
    });
  });

  it('reports an unexpected body as malformed', async () => {
    kvBody = { data: 'nope' };
    const vault = new VaultSecretStore({ addr: stub.url, token: 'test-token' });
    await vault.initialize();

    await expect(vault.fetchAll()).rejects.toMatchObject({ reason: 'malformed_response' });
  });

  it('requires an address and a token', async () => {
    await expect(new VaultSecretStore({ token: 'test-token' }).initialize()).rejects.toThrow(
      'Vault address required (VAULT_ADDR)'
    );
    await expect(new VaultSecretStore({ addr: stub.url }).initialize()).rejects.toMatchObject({
      reason: 'authentication',
    });
  });

  it('fails AppRole login with bad credentials', async () => {
    const vault = new VaultSecretStore({ addr: stub.url, auth: 'approle', roleId: 'role-1', secretId: 'wrong' });
    await expect(vault.initialize()).rejects.toMatchObject({
      reason: 'unknown',
      message: 'vault request failed with HTTP 400',
    });
  });
});

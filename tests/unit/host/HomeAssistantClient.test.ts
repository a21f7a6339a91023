import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { HomeAssistantClient } from '../../../src/host/HomeAssistantClient.js';
import { ReloadError } from '../../../src/deploy/errors.js';
import { startHttpStub, unreachableUrl } from '../../helpers/httpStub.js';
import type { HttpStub } from '../../helpers/httpStub.js';

describe('HomeAssistantClient', () => {
  let stub: HttpStub;
  let checkBody: unknown;
  let reloaded: string[];
  let authorizations: Array<string | undefined>;

  beforeEach(async () => {
    checkBody = { result: 'valid', errors: null };
    reloaded = [];
    authorizations = [];

    stub = await startHttpStub((app) => {
      app.post('/api/config/core/check_config', (req, res) => {
        authorizations.push(req.headers.authorization);
        res.json(checkBody);
      });
      app.post('/api/services/:domain/reload', (req, res) => {
        if (req.params.domain === 'scene') {
          res.status(500).json({ message: 'boom' });
          return;
        }
        reloaded.push(req.params.domain);
        res.json([]);
      });
    });
  });

  afterEach(async () => {
    await stub.close();
  });

  it('sends the bearer token and parses a valid result', async () => {
    const client = new HomeAssistantClient({ baseUrl: `${stub.url}/`, token: 'test-token' });

    await expect(client.checkConfig()).resolves.toEqual({ result: 'valid', errors: null });
    expect(authorizations).toEqual(['Bearer test-token']);
  });

  it('returns the diagnostics of an invalid configuration', async () => {
    checkBody = { result: 'invalid', errors: "Invalid config for [automation]: required key 'trigger' not provided" };
    const client = new HomeAssistantClient({ baseUrl: stub.url });

    await expect(client.checkConfig()).resolves.toEqual({
      result: 'invalid',
      errors: "Invalid config for [automation]: required key 'trigger' not provided",
    });
  });

  it('rejects an unexpected check response', async () => {
    checkBody = { status: 'ok' };
    const client = new HomeAssistantClient({ baseUrl: stub.url });

    await expect(client.checkConfig()).rejects.toThrow('Unexpected check_config response');
  });

  it('calls the reload service of a domain', async () => {
    const client = new HomeAssistantClient({ baseUrl: stub.url });

    await client.reloadDomain('automation');
    expect(reloaded).toEqual(['automation']);
  });

  it('fails a reload with ReloadError carrying the HTTP status', async () => {
    const client = new HomeAssistantClient({ baseUrl: stub.url });

    const err = await client.reloadDomain('scene').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ReloadError);
    expect(err).toMatchObject({ domain: 'scene', message: 'Reload of scene failed: HTTP 500' });
  });

  it('fails a reload when the host is unreachable', async () => {
    const client = new HomeAssistantClient({ baseUrl: await unreachableUrl() });

    await expect(client.reloadDomain('script')).rejects.toBeInstanceOf(ReloadError);
  });
});

import { describe, it, expect, afterEach } from '@jest/globals';
import request from 'supertest';
import { SecretSyncError } from '../../../../src/deploy/errors.js';
import { COMMIT_A, COMMIT_B, logEntry } from '../../../helpers/fakes.js';
import { createApiHarness } from '../../../helpers/apiHarness.js';
import type { ApiHarness } from '../../../helpers/apiHarness.js';

describe('DeploymentServlet', () => {
  let harness: ApiHarness;

  afterEach(async () => {
    await harness.cleanup();
  });

  describe('GET /api/deployment/status', () => {
    it('returns the idle state after start', async () => {
      harness = await createApiHarness();
      const res = await request(harness.app).get('/api/deployment/status');

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({
        status: 'idle',
        currentCommit: COMMIT_A,
        availableCommit: null,
        commitsBehind: 0,
        error: null,
        trigger: null,
        restartRequired: false,
      });
    });
  });

  describe('GET /api/deployment/updates', () => {
    it('reports commits available on the remote', async () => {
      harness = await createApiHarness();
      harness.repository.publish(COMMIT_B, ['scripts.yaml'], 2);
      harness.repository.commits = [logEntry(COMMIT_B, 'Add script')];

      const res = await request(harness.app).get('/api/deployment/updates');

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({ availableCommit: COMMIT_B, commitsBehind: 2 });
      expect(harness.coordinator.getState().status).toBe('idle');
    });

    it('returns 409 when the coordinator is stopped', async () => {
      harness = await createApiHarness({}, false);
      const res = await request(harness.app).get('/api/deployment/updates');
      expect(res.status).toBe(409);
      expect(res.body.error).toBe('Conflict');
    });
  });

  describe('POST /api/deployment/deploy', () => {
    it('waits for the attempt and returns the final state', async () => {
      harness = await createApiHarness();
      harness.repository.publish(COMMIT_B, ['automations.yaml']);

      const res = await request(harness.app).post('/api/deployment/deploy').send({ detail: 'from test' });

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({
        status: 'succeeded',
        currentCommit: COMMIT_B,
        changedFiles: ['automations.yaml'],
        trigger: { reason: 'manual', detail: 'from test' },
      });
    });

    it('answers 202 at once when wait is false', async () => {
      harness = await createApiHarness();
      harness.repository.publish(COMMIT_B, ['automations.yaml']);

      const res = await request(harness.app).post('/api/deployment/deploy').send({ wait: false });

      expect(res.status).toBe(202);
      expect(res.body.accepted).toBe(true);
      expect(res.body.state).toHaveProperty('status');

      const final = await harness.coordinator.requestDeployment('manual');
      expect(final.currentCommit).toBe(COMMIT_B);
    });

    it('rejects a malformed body', async () => {
      harness = await createApiHarness();
      const res = await request(harness.app).post('/api/deployment/deploy').send({ wait: 'yes' });

      expect(res.status).toBe(400);
      expect(res.body.error).toBe('Bad Request');
      expect(harness.repository.pullCount).toBe(0);
    });

    it('rejects a body that is not JSON', async () => {
      harness = await createApiHarness();
      const res = await request(harness.app)
        .post('/api/deployment/deploy')
        .set('Content-Type', 'application/json')
        .send('{not json');

      expect(res.status).toBe(400);
      expect(res.body.error).toBe('Bad Request');
    });

    it('returns 409 when the coordinator is stopped', async () => {
      harness = await createApiHarness({}, false);
      const res = await request(harness.app).post('/api/deployment/deploy').send({});

      expect(res.status).toBe(409);
      expect(res.body).toEqual({ error: 'Conflict', message: expect.any(String) });
    });

    it('reports a failed pipeline as a failed state, not an HTTP error', async () => {
      harness = await createApiHarness();
      harness.repository.publish(COMMIT_B, ['automations.yaml']);
      harness.secrets.error = new SecretSyncError('network', 'secret store unreachable');

      const res = await request(harness.app).post('/api/deployment/deploy').send({});

      expect(res.status).toBe(200);
      expect(res.body.status).toBe('failed');
      expect(res.body.error).toEqual({ kind: 'secret_sync', reason: 'network', message: 'secret store unreachable' });
    });
  });

  describe('POST /api/deployment/secrets/refresh', () => {
    it('returns the sync result', async () => {
      harness = await createApiHarness();
      const res = await request(harness.app).post('/api/deployment/secrets/refresh');

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ skipped: false, secretCount: 2, outputPath: '/config/secrets_gitops.yaml' });
    });

    it('maps a sync failure to 502 with the failure attached', async () => {
      harness = await createApiHarness();
      harness.secrets.error = new SecretSyncError('authentication', 'token rejected');

      const res = await request(harness.app).post('/api/deployment/secrets/refresh');

      expect(res.status).toBe(502);
      expect(res.body).toEqual({
        error: 'Bad Gateway',
        message: 'token rejected',
        failure: { kind: 'secret_sync', reason: 'authentication', message: 'token rejected' },
      });
    });
  });
});

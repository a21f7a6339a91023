/**
 * WebhookServlet: deployment and secrets-refresh webhooks.
 *
 * Endpoints:
 * - POST /api/webhook/:webhookId          Signed push notification; deploys
 * - POST /api/webhook/:webhookId/secrets  Re-sync secrets in the background
 *
 * The deployment webhook must carry X-Hub-Signature-256, an HMAC-SHA256 of
 * the raw body. With `Accept: text/event-stream` the response streams every
 * state change until the attempt finishes; otherwise it answers 202 at once.
 */

import express, { Router, Request, Response } from 'express';
import * as crypto from 'crypto';
import { z } from 'zod';
import type { DeploymentCoordinator } from '../../deploy/DeploymentCoordinator.js';
import type { DeploymentState } from '../../deploy/types.js';
import { getLogger } from '../../logging/index.js';
import { safeEqual } from '../middleware/auth.js';
import { toStatusResponse } from '../models/DeploymentStatus.js';

const logger = getLogger('api');

export const SIGNATURE_HEADER = 'X-Hub-Signature-256';

export interface WebhookOptions {
  webhookId?: string;
  webhookSecret?: string;
  /** Pushes to other branches are acknowledged and ignored */
  branch?: string;
}

// GitHub push events and hand-rolled CI payloads both pass
const WebhookPayloadSchema = z
  .object({
    ref: z.string().optional(),
    after: z.string().optional(),
    commit: z.string().optional(),
    head_commit: z.object({ id: z.string() }).nullable().optional(),
  })
  .passthrough();

export type WebhookPayload = z.infer<typeof WebhookPayloadSchema>;

export function computeSignature(secret: string, body: Buffer): string {
  return 'sha256=' + crypto.createHmac('sha256', secret).update(body).digest('hex');
}

export function verifySignature(secret: string, body: Buffer, signature: string | undefined): boolean {
  if (!signature) return false;
  return safeEqual(signature, computeSignature(secret, body));
}

/**
 * Commit id the sender announced, if any.
 */
export function announcedCommit(payload: WebhookPayload): string | undefined {
  return payload.after ?? payload.commit ?? payload.head_commit?.id ?? undefined;
}

function writeEvent(res: Response, data: unknown, event?: string): void {
  if (event) res.write(`event: ${event}\n`);
  res.write(`data: ${JSON.stringify(data)}\n\n`);
}

export function createWebhookRouter(coordinator: DeploymentCoordinator, options: WebhookOptions): Router {
  const router = Router();
  // Signatures cover the exact bytes received
  router.use(express.raw({ type: () => true, limit: '1mb' }));

  router.post('/:webhookId', async (req: Request, res: Response) => {
    if (!options.webhookId || req.params['webhookId'] !== options.webhookId) {
      res.status(404).json({ error: 'Not Found', message: 'Unknown webhook' });
      return;
    }
    if (!options.webhookSecret) {
      res.status(503).json({ error: 'Service Unavailable', message: 'Webhook secret not configured' });
      return;
    }

    const body: Buffer = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);
    const signature = req.get(SIGNATURE_HEADER);
    if (!signature) {
      logger.warn('Webhook received without signature');
      res.status(401).json({ error: 'Unauthorized', message: 'Missing signature' });
      return;
    }
    if (!verifySignature(options.webhookSecret, body, signature)) {
      logger.warn(`Webhook signature verification failed (body length ${body.length})`);
      res.status(401).json({ error: 'Unauthorized', message: 'Invalid signature' });
      return;
    }

    let payload: WebhookPayload;
    try {
      const parsed = WebhookPayloadSchema.safeParse(body.length > 0 ? JSON.parse(body.toString('utf-8')) : {});
      if (!parsed.success) {
        res.status(400).json({ error: 'Bad Request', message: parsed.error.message });
        return;
      }
      payload = parsed.data;
    } catch {
      res.status(400).json({ error: 'Bad Request', message: 'Invalid JSON' });
      return;
    }

    if (options.branch && payload.ref && payload.ref !== `refs/heads/${options.branch}`) {
      res.status(202).json({ accepted: false, message: `Ignoring push to ${payload.ref}` });
      return;
    }
    if (!coordinator.isRunning()) {
      res.status(409).json({ error: 'Conflict', message: 'Deployment coordinator is not running' });
      return;
    }

    const detail = announcedCommit(payload);
    const streaming = (req.get('Accept') ?? '').includes('text/event-stream');
    if (!streaming) {
      void coordinator.requestDeployment('webhook', detail).catch((err: unknown) => {
        logger.error('Webhook deployment did not run', err instanceof Error ? err : undefined);
      });
      res.status(202).json({ accepted: true });
      return;
    }

    res.status(200);
    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');
    res.flushHeaders();

    const unsubscribe = coordinator.onStateChange((state: DeploymentState) => {
      writeEvent(res, toStatusResponse(state));
    });
    try {
      const final = await coordinator.requestDeployment('webhook', detail);
      unsubscribe();
      writeEvent(res, toStatusResponse(final), 'done');
    } catch (err) {
      unsubscribe();
      logger.error('Deployment streaming failed', err instanceof Error ? err : undefined);
      writeEvent(res, { status: 'error', error: err instanceof Error ? err.message : String(err) }, 'error');
    }
    res.end();
  });

  router.post('/:webhookId/secrets', (req: Request, res: Response) => {
    if (!options.webhookId || req.params['webhookId'] !== options.webhookId) {
      res.status(404).json({ error: 'Not Found', message: 'Unknown webhook' });
      return;
    }
    if (!coordinator.isRunning()) {
      res.status(409).json({ error: 'Conflict', message: 'Deployment coordinator is not running' });
      return;
    }

    logger.info('Secrets refresh webhook triggered');
    void coordinator.refreshSecrets().catch((err: unknown) => {
      logger.error('Secrets refresh failed', err instanceof Error ? err : undefined);
    });
    res.status(202).json({ accepted: true, message: 'Secrets refresh triggered' });
  });

  return router;
}

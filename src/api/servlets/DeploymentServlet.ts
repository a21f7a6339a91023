/**
 * DeploymentServlet: manual triggers and the read-only status projection.
 *
 * Endpoints:
 * - GET  /api/deployment/status           Current DeploymentState
 * - GET  /api/deployment/updates          Check the remote without deploying
 * - POST /api/deployment/deploy           Run (or join) a deployment
 * - POST /api/deployment/secrets/refresh  Re-sync secrets now
 */

import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { CoordinatorNotRunningError } from '../../deploy/DeploymentCoordinator.js';
import type { DeploymentCoordinator } from '../../deploy/DeploymentCoordinator.js';
import { DeploymentError } from '../../deploy/errors.js';
import { getLogger } from '../../logging/index.js';
import { toStatusResponse } from '../models/DeploymentStatus.js';

const logger = getLogger('api');

const DeployRequestSchema = z.object({
  /** false: answer 202 at once and deploy in the background */
  wait: z.boolean().default(true),
  detail: z.string().max(200).optional(),
});

/**
 * 409 for a stopped coordinator, 502 for a failed external call; anything
 * else goes to the error handler.
 */
export function sendOperationError(err: unknown, res: Response, next: NextFunction): void {
  if (err instanceof CoordinatorNotRunningError) {
    res.status(409).json({ error: 'Conflict', message: err.message });
    return;
  }
  if (err instanceof DeploymentError) {
    res.status(502).json({ error: 'Bad Gateway', message: err.message, failure: err.toFailure() });
    return;
  }
  next(err);
}

export function createDeploymentRouter(coordinator: DeploymentCoordinator): Router {
  const router = Router();

  router.get('/status', (_req: Request, res: Response) => {
    res.json(toStatusResponse(coordinator.getState()));
  });

  router.get('/updates', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const check = await coordinator.checkForUpdates();
      res.json(check);
    } catch (err) {
      sendOperationError(err, res, next);
    }
  });

  router.post('/deploy', async (req: Request, res: Response, next: NextFunction) => {
    const parsed = DeployRequestSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      res.status(400).json({ error: 'Bad Request', message: parsed.error.message });
      return;
    }
    const { wait, detail } = parsed.data;

    if (!coordinator.isRunning()) {
      sendOperationError(new CoordinatorNotRunningError(), res, next);
      return;
    }

    const attempt = coordinator.requestDeployment('manual', detail);
    if (!wait) {
      void attempt.catch((err: unknown) => {
        logger.error('Background deployment did not run', err instanceof Error ? err : undefined);
      });
      res.status(202).json({ accepted: true, state: toStatusResponse(coordinator.getState()) });
      return;
    }

    try {
      res.json(toStatusResponse(await attempt));
    } catch (err) {
      sendOperationError(err, res, next);
    }
  });

  router.post('/secrets/refresh', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const result = await coordinator.refreshSecrets();
      res.json(result);
    } catch (err) {
      sendOperationError(err, res, next);
    }
  });

  return router;
}

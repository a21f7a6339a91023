/**
 * RepairServlet: active repair signals.
 *
 * Endpoints:
 * - GET    /api/repairs        Active repairs, oldest first
 * - DELETE /api/repairs/:kind  Acknowledge (clear) one repair
 */

import { Router, Request, Response } from 'express';
import { isRepairKind, REPAIR_KINDS } from '../../repair/RepairRegistry.js';
import type { RepairRegistry } from '../../repair/RepairRegistry.js';
import { toRepairResponse } from '../models/DeploymentStatus.js';

export function createRepairRouter(repairs: RepairRegistry): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    res.json({ repairs: repairs.list().map(toRepairResponse) });
  });

  router.delete('/:kind', (req: Request, res: Response) => {
    const kind = req.params['kind'] ?? '';
    if (!isRepairKind(kind)) {
      res.status(400).json({
        error: 'Bad Request',
        message: `Unknown repair kind "${kind}"; expected one of ${REPAIR_KINDS.join(', ')}`,
      });
      return;
    }
    if (!repairs.resolve(kind)) {
      res.status(404).json({ error: 'Not Found', message: `No active ${kind} repair` });
      return;
    }
    res.status(204).end();
  });

  return router;
}

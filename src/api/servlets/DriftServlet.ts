/**
 * DriftServlet: working-tree drift.
 *
 * Endpoints:
 * - GET  /api/drift        Last drift report
 * - POST /api/drift/check  Check now (409 while the working tree is busy)
 */

import { Router, Request, Response, NextFunction } from 'express';
import type { DriftDetector } from '../../deploy/DriftDetector.js';
import { toDriftReportResponse } from '../models/DeploymentStatus.js';

export function createDriftRouter(detector: DriftDetector): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    const report = detector.getLastReport();
    res.json({
      enabled: detector.isRunning(),
      report: report ? toDriftReportResponse(report) : null,
    });
  });

  router.post('/check', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const report = await detector.check();
      if (!report) {
        res.status(409).json({ error: 'Conflict', message: 'Working tree busy; drift check skipped' });
        return;
      }
      res.json(toDriftReportResponse(report));
    } catch (err) {
      next(err);
    }
  });

  return router;
}

/**
 * LoggingServlet: runtime log levels.
 *
 * Endpoints:
 * - GET    /api/logging                   Global level and every registered component
 * - PUT    /api/logging/level             Set the global level
 * - PUT    /api/logging/components/:name  Override one component's level
 * - DELETE /api/logging/components/:name  Drop the override
 */

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import {
  LogLevel,
  clearComponentLevel,
  getGlobalLevel,
  getRegisteredComponents,
  setComponentLevel,
  setGlobalLevel,
} from '../../logging/index.js';

const LevelRequestSchema = z.object({
  level: z.preprocess(
    (value) => (typeof value === 'string' ? value.trim().toUpperCase() : value),
    z.nativeEnum(LogLevel)
  ),
});

function parseLevel(req: Request, res: Response): LogLevel | null {
  const parsed = LevelRequestSchema.safeParse(req.body ?? {});
  if (!parsed.success) {
    res.status(400).json({
      error: 'Bad Request',
      message: `Invalid log level; expected one of ${Object.values(LogLevel).join(', ')}`,
    });
    return null;
  }
  return parsed.data.level;
}

export function createLoggingRouter(): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    const globalLevel = getGlobalLevel();
    res.json({ globalLevel, components: getRegisteredComponents(globalLevel) });
  });

  router.put('/level', (req: Request, res: Response) => {
    const level = parseLevel(req, res);
    if (!level) return;
    setGlobalLevel(level);
    res.json({ level });
  });

  router.put('/components/:name', (req: Request, res: Response) => {
    const level = parseLevel(req, res);
    if (!level) return;
    const component = req.params['name'] ?? '';
    setComponentLevel(component, level);
    res.json({ component, level });
  });

  router.delete('/components/:name', (req: Request, res: Response) => {
    clearComponentLevel(req.params['name'] ?? '');
    res.status(204).end();
  });

  return router;
}

/**
 * config-gitops REST API Server
 *
 * Express app exposing the deployment status, manual triggers, webhooks,
 * repairs, drift reports and runtime log levels. JSON only.
 */

import express, { Express, Request, Response, NextFunction } from 'express';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import { createServer, Server as HttpServer } from 'http';
import type { DeploymentCoordinator } from '../deploy/DeploymentCoordinator.js';
import type { DriftDetector } from '../deploy/DriftDetector.js';
import type { RepairRegistry } from '../repair/RepairRegistry.js';
import { getLogger, registerComponent } from '../logging/index.js';
import { authMiddleware, requestIdMiddleware } from './middleware/index.js';
import {
  createDeploymentRouter,
  createDriftRouter,
  createLoggingRouter,
  createRepairRouter,
  createWebhookRouter,
} from './servlets/index.js';
import type { WebhookOptions } from './servlets/index.js';

registerComponent('api', 'REST API server');
const logger = getLogger('api');

export interface ApiDependencies {
  coordinator: DeploymentCoordinator;
  repairs: RepairRegistry;
  drift: DriftDetector;
}

export interface ServerOptions {
  port?: number;
  host?: string;
  /** Bearer token for the management routes */
  apiToken?: string;
  /** Requests per minute per client */
  rateLimit?: number;
  webhook?: WebhookOptions;
}

const DEFAULT_OPTIONS = {
  port: 8099,
  host: '0.0.0.0',
  rateLimit: 100,
};

/**
 * Create and configure Express application
 */
export function createApp(deps: ApiDependencies, options: ServerOptions = {}): Express {
  const app = express();
  const rateLimitPerMinute = options.rateLimit ?? DEFAULT_OPTIONS.rateLimit;

  // Security headers via helmet (CSP disabled for API-only server)
  app.use(helmet({ contentSecurityPolicy: false }));
  app.use(requestIdMiddleware());

  app.use('/api', rateLimit({
    windowMs: 60 * 1000, // 1 minute
    max: rateLimitPerMinute,
    standardHeaders: true,
    legacyHeaders: false,
    message: { error: 'Too Many Requests', message: 'Rate limit exceeded. Try again later.' },
  }));

  // Webhooks read the raw body for signature checks, so they mount before the JSON parser
  app.use('/api/webhook', createWebhookRouter(deps.coordinator, options.webhook ?? {}));

  app.use(express.json());

  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      coordinator: deps.coordinator.isRunning() ? 'running' : 'stopped',
      timestamp: new Date().toISOString(),
    });
  });

  app.get('/api', (_req: Request, res: Response) => {
    res.json({ name: 'config-gitops', version: '1.0.0', runtime: 'Node.js' });
  });

  const auth = authMiddleware({ token: options.apiToken });
  app.use('/api/deployment', auth, createDeploymentRouter(deps.coordinator));
  app.use('/api/repairs', auth, createRepairRouter(deps.repairs));
  app.use('/api/drift', auth, createDriftRouter(deps.drift));
  app.use('/api/logging', auth, createLoggingRouter());

  // 404 handler
  app.use((_req: Request, res: Response) => {
    res.status(404).json({
      error: 'Not Found',
      message: 'The requested resource was not found',
    });
  });

  // Error details are suppressed in production
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    // body-parser marks malformed requests with a 4xx status
    const status = 'status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500 ? err.status : 500;
    if (status < 500) {
      res.status(status).json({ error: 'Bad Request', message: err.message });
      return;
    }
    logger.error('API error', err);
    const isProd = process.env['NODE_ENV'] === 'production';
    res.status(500).json({
      error: 'Internal Server Error',
      message: isProd ? 'An unexpected error occurred' : err.message,
    });
  });

  return app;
}

/**
 * Start the API server
 */
export async function startServer(deps: ApiDependencies, options: ServerOptions = {}): Promise<HttpServer> {
  const port = options.port ?? DEFAULT_OPTIONS.port;
  const host = options.host ?? DEFAULT_OPTIONS.host;
  const server = createServer(createApp(deps, options));

  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      logger.info(`config-gitops API listening on http://${host}:${port}`);
      if (!options.apiToken) {
        logger.warn('GITOPS_API_TOKEN not set; management routes are unauthenticated');
      }
      resolve(server);
    });
  });
}

export { Express, HttpServer };

/**
 * API Application — Express app around a Job Runner.
 *
 * Routes are mounted under /api. CORS is open unless origins are configured.
 */

import express from 'express';
import type { Express, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import type { Logger } from '@inkline/shared';
import type { PlanBuilder } from '@inkline/pipeline';
import type { JobRunner } from '@inkline/jobs';
import { createWorkflowRoutes, errorHandler } from './routes.js';

export interface AppOptions {
  runner: JobRunner;
  planBuilder: PlanBuilder;
  logger: Logger;
  corsOrigins?: string[];
}

export function createApp(options: AppOptions): Express {
  const { runner, planBuilder, logger } = options;
  const origins = options.corsOrigins ?? [];

  const app = express();
  app.use(origins.length > 0 ? cors({ origin: origins }) : cors());
  app.use(express.json());

  app.use((req: Request, res: Response, next: NextFunction) => {
    res.on('finish', () => {
      logger.debug({ method: req.method, path: req.originalUrl, status: res.statusCode }, 'request handled');
    });
    next();
  });

  app.use('/api', createWorkflowRoutes(runner, planBuilder, logger));
  app.use(errorHandler(logger));

  return app;
}

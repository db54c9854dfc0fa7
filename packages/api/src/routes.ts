/**
 * Workflow API Routes
 *
 * Thin controllers: validate the body, hand off to the Plan Builder or the
 * Job Runner, return what they say. No pipeline logic here.
 */

import { Router } from 'express';
import type { ErrorRequestHandler, NextFunction, Request, Response } from 'express';
import type { Logger } from '@inkline/shared';
import { VERSION, describeForDisplay, parseRequest } from '@inkline/pipeline';
import type { PlanBuilder } from '@inkline/pipeline';
import type { JobRecord, JobRunner } from '@inkline/jobs';
import { isFinished } from '@inkline/jobs';

export function createWorkflowRoutes(runner: JobRunner, planBuilder: PlanBuilder, logger: Logger): Router {
  const router = Router();

  // GET /health
  router.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', version: VERSION });
  });

  // GET /workflows/shapes: the workflow table as configured
  router.get('/workflows/shapes', (_req: Request, res: Response) => {
    res.json({ shapes: planBuilder.describeShapes() });
  });

  // POST /workflows/plan: classify and expand without running anything
  router.post('/workflows/plan', (req: Request, res: Response) => {
    const parsed = parseRequest(req.body);
    if (!parsed.ok) {
      res.status(400).json({ errors: parsed.errors });
      return;
    }

    const plan = planBuilder.plan(parsed.request);
    res.json({
      workflowShape: plan.shape,
      description: plan.description,
      steps: plan.steps.map(describeForDisplay),
    });
  });

  // POST /workflows: submit a request as a background job
  router.post('/workflows', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = parseRequest(req.body);
      if (!parsed.ok) {
        logger.debug({ errors: parsed.errors }, 'request rejected');
        res.status(400).json({ errors: parsed.errors });
        return;
      }

      const job = await runner.submit(parsed.request);
      res.status(202).json({ jobId: job.jobId, status: job.status });
    } catch (error) {
      next(error);
    }
  });

  // GET /workflows/:jobId: poll status and progress
  router.get('/workflows/:jobId', (req: Request, res: Response) => {
    const job = runner.get(req.params.jobId);
    if (!job) {
      res.status(404).json({ error: 'Job not found' });
      return;
    }
    res.json(toJobResponse(job));
  });

  // GET /workflows/:jobId/result: the serialized Execution Result
  router.get('/workflows/:jobId/result', (req: Request, res: Response) => {
    const job = runner.get(req.params.jobId);
    if (!job) {
      res.status(404).json({ error: 'Job not found' });
      return;
    }
    if (!isFinished(job.status)) {
      res.status(409).json({ error: 'Job is not finished', status: job.status, progress: job.progress });
      return;
    }
    res.json({ jobId: job.jobId, status: job.status, result: job.result });
  });

  // POST /workflows/:jobId/cancel
  router.post('/workflows/:jobId/cancel', (req: Request, res: Response) => {
    const { jobId } = req.params;
    switch (runner.cancel(jobId)) {
      case 'accepted':
        res.status(202).json({ jobId, status: 'cancelling' });
        return;
      case 'not-found':
        res.status(404).json({ error: 'Job not found' });
        return;
      case 'finished':
        res.status(409).json({ error: 'Job has already finished' });
        return;
    }
  });

  return router;
}

function toJobResponse(job: JobRecord) {
  return {
    jobId: job.jobId,
    topic: job.topic,
    kinds: job.kinds,
    status: job.status,
    progress: job.progress,
    currentStep: job.currentStep,
    steps: job.steps,
    error: job.error,
    createdAt: job.createdAt,
    updatedAt: job.updatedAt,
    expiresAt: job.expiresAt,
  };
}

/**
 * Last handler in the chain: malformed JSON is a 400, anything else a 500.
 */
export function errorHandler(logger: Logger): ErrorRequestHandler {
  return (err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SyntaxError) {
      res.status(400).json({ errors: ['Request body must be valid JSON'] });
      return;
    }

    logger.error({ error: err }, 'Unhandled error');
    res.status(500).json({ error: 'Internal server error' });
  };
}

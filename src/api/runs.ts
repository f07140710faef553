/**
 * Run API routes.
 *
 * POST /workflows/:workflowId/runs - Submit a run
 * GET /workflows/:workflowId/runs - List a workflow's runs
 * GET /runs/:runId - Get the execution record
 * GET /runs/:runId/history - Get the record's change history
 * POST /runs/:runId/cancel - Cancel an in-flight run
 */

import { Router, Request } from 'express';
import { apiError, validationError } from '../domain/errors';
import { WorkflowScheduler } from '../engine/scheduler';
import { sendError } from './middleware';

interface RunRequestBody {
  inputs?: unknown;
  context?: unknown;
}

interface CancelRequestBody {
  reason?: unknown;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function createRunRoutes(scheduler: WorkflowScheduler): Router {
  const router = Router();

  /**
   * POST /workflows/:workflowId/runs
   * Responds as soon as the run is running; poll GET /runs/:runId for progress.
   */
  router.post(
    '/workflows/:workflowId/runs',
    async (req: Request<{ workflowId: string }, unknown, RunRequestBody | undefined>, res) => {
      try {
        const inputs = req.body?.inputs;
        const context = req.body?.context;
        if (inputs !== undefined && !isRecord(inputs)) {
          res.status(400).json(apiError(validationError('inputs must be an object keyed by input node id')));
          return;
        }
        if (context !== undefined && !isRecord(context)) {
          res.status(400).json(apiError(validationError('context must be an object')));
          return;
        }

        const submission = await scheduler.submitRun({ workflowId: req.params.workflowId, inputs, context });
        res.status(201).json(submission);
      } catch (err) {
        sendError(res, err);
      }
    },
  );

  router.get('/workflows/:workflowId/runs', async (req: Request<{ workflowId: string }>, res) => {
    try {
      await scheduler.getWorkflow(req.params.workflowId);
      const runs = await scheduler.listRuns(req.params.workflowId);
      res.json({ runs });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/runs/:runId', async (req: Request<{ runId: string }>, res) => {
    try {
      const run = await scheduler.getRun(req.params.runId);
      res.json({ run });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/runs/:runId/history', async (req: Request<{ runId: string }>, res) => {
    try {
      const history = await scheduler.runHistory(req.params.runId);
      res.json({ history });
    } catch (err) {
      sendError(res, err);
    }
  });

  /**
   * POST /runs/:runId/cancel
   * Idempotent; a finished run is returned unchanged.
   */
  router.post(
    '/runs/:runId/cancel',
    async (req: Request<{ runId: string }, unknown, CancelRequestBody | undefined>, res) => {
      try {
        const reason = req.body?.reason;
        const run = await scheduler.cancelRun(req.params.runId, typeof reason === 'string' ? reason : undefined);
        res.json({ run });
      } catch (err) {
        sendError(res, err);
      }
    },
  );

  return router;
}

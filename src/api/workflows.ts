/**
 * Workflow API routes.
 *
 * POST /workflows - Register a workflow definition snapshot
 * GET /workflows - List registered workflows
 * GET /workflows/:workflowId - Fetch a workflow definition
 * POST /workflows/validate - Validate a definition without storing it
 */

import { Router, Request } from 'express';
import { v4 as uuid } from 'uuid';
import { CreateWorkflowInput, Workflow } from '../domain/workflow';
import { apiError, validationError } from '../domain/errors';
import { compileWorkflow } from '../dsl/compiler';
import { WorkflowScheduler } from '../engine/scheduler';
import { sendError } from './middleware';

type WorkflowBody = Partial<CreateWorkflowInput> | undefined;

interface ListQuery {
  limit?: string;
  offset?: string;
}

function parseCount(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed >= 0 ? parsed : undefined;
}

export function createWorkflowRoutes(scheduler: WorkflowScheduler): Router {
  const router = Router();

  /**
   * POST /workflows
   * Register (or replace) a definition. The graph must validate.
   */
  router.post('/', async (req: Request<Record<string, string>, unknown, WorkflowBody>, res) => {
    try {
      const body = req.body;
      if (!body || typeof body.name !== 'string' || !Array.isArray(body.nodes) || !Array.isArray(body.edges)) {
        res.status(400).json(apiError(validationError('name, nodes and edges are required')));
        return;
      }

      const workflow: Workflow = {
        id: typeof body.id === 'string' && body.id.length > 0 ? body.id : `wf_${uuid()}`,
        name: body.name,
        description: body.description,
        nodes: body.nodes,
        edges: body.edges,
      };

      const stored = await scheduler.registerWorkflow(workflow);
      const compilation = compileWorkflow(stored, { transformNames: scheduler.transforms.names() });

      res.status(201).json({
        workflow: stored,
        compilation: {
          workflowHash: compilation.workflowHash,
          executionOrder: compilation.graph?.executionOrder,
          warnings: compilation.validation.warnings,
        },
      });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/', async (req: Request<Record<string, string>, unknown, unknown, ListQuery>, res) => {
    try {
      const workflows = await scheduler.listWorkflows({
        limit: parseCount(req.query.limit),
        offset: parseCount(req.query.offset),
      });
      res.json({ workflows });
    } catch (err) {
      sendError(res, err);
    }
  });

  /**
   * POST /workflows/validate
   * Always 200 for a well-formed body; the result says whether the graph is valid.
   */
  router.post('/validate', (req: Request<Record<string, string>, unknown, WorkflowBody>, res) => {
    const body = req.body;
    if (!body || typeof body !== 'object') {
      res.status(400).json(apiError(validationError('Request body must be a workflow definition')));
      return;
    }
    res.json(scheduler.validate(body));
  });

  router.get('/:workflowId', async (req: Request<{ workflowId: string }>, res) => {
    try {
      const workflow = await scheduler.getWorkflow(req.params.workflowId);
      res.json({ workflow });
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}

import express from 'express';
import { AppContext, createApp, createAppContext } from '../../src/server';
import { createStaticAgentDirectory } from '../../src/agents/invoker';
import { RunStatus } from '../../src/domain/run';
import {
  ScriptedInvoker,
  TEST_AGENT,
  agentNode,
  captureLogs,
  dataEdge,
  greetingWorkflow,
  inputNode,
  makeWorkflow,
  outputNode,
  reply,
  untilAborted,
} from '../fixtures';
import { field, request, stringField } from './request';

const agentWorkflow = (agentId: string) =>
  makeWorkflow(
    [inputNode('q'), agentNode('ask', { agentId }), outputNode('answer')],
    [dataEdge('e1', 'q', 'ask'), dataEdge('e2', 'ask', 'answer')],
    'wf_agent',
  );

describe('Run API', () => {
  captureLogs();
  let app: express.Application;
  let ctx: AppContext;
  let invoker: ScriptedInvoker;

  function setup(scripted: ScriptedInvoker): void {
    invoker = scripted;
    ctx = createAppContext({
      invoker,
      agents: createStaticAgentDirectory([TEST_AGENT]),
      settings: { backoffBaseMs: 0, backoffMaxMs: 0 },
    });
    app = createApp(ctx);
  }

  beforeEach(async () => {
    setup(new ScriptedInvoker(reply('42')));
    await ctx.scheduler.registerWorkflow(greetingWorkflow());
  });

  describe('POST /api/v1/workflows/:workflowId/runs', () => {
    it('submits a run that completes in the background', async () => {
      const res = await request(app, 'POST', '/api/v1/workflows/wf_greeting/runs', { inputs: { greeting: 'hi' } });

      expect(res.status).toBe(201);
      expect(field(res.body, 'status')).toBe(RunStatus.Running);
      const runId = stringField(res.body, 'runId');
      await ctx.scheduler.waitForRun(runId);

      const run = await request(app, 'GET', `/api/v1/runs/${runId}`);
      expect(run.status).toBe(200);
      expect(field(run.body, 'run', 'status')).toBe(RunStatus.Completed);
      expect(field(run.body, 'run', 'finalOutput')).toBe('HI');
      expect(field(run.body, 'run', 'nodeResults', 'upper', 'output')).toBe('HI');
    });

    it('passes the run context to agent prompts', async () => {
      await ctx.scheduler.registerWorkflow(agentWorkflow('writer'));
      const res = await request(app, 'POST', '/api/v1/workflows/wf_agent/runs', {
        inputs: { q: 'Meaning of life?' },
        context: { audience: 'kids' },
      });
      const done = await ctx.scheduler.waitForRun(stringField(res.body, 'runId'));

      expect(done.finalOutput).toBe('42');
      expect(invoker.calls[0].prompt).toMatchObject({ prompt: 'Meaning of life?', context: { audience: 'kids' } });
    });

    it('unknown workflows are 404', async () => {
      const res = await request(app, 'POST', '/api/v1/workflows/wf_missing/runs', {});
      expect(res.status).toBe(404);
      expect(field(res.body, 'error', 'code')).toBe('VALIDATION.NOT_FOUND');
    });

    it('inputs must be an object', async () => {
      const res = await request(app, 'POST', '/api/v1/workflows/wf_greeting/runs', { inputs: ['hi'] });
      expect(res.status).toBe(400);
      expect(field(res.body, 'error', 'message')).toBe('inputs must be an object keyed by input node id');
    });

    it('context must be an object', async () => {
      const res = await request(app, 'POST', '/api/v1/workflows/wf_greeting/runs', { context: 'loud' });
      expect(res.status).toBe(400);
      expect(field(res.body, 'error', 'message')).toBe('context must be an object');
    });

    it('unknown agents are rejected with 422', async () => {
      await ctx.scheduler.registerWorkflow(agentWorkflow('ghost'));
      const res = await request(app, 'POST', '/api/v1/workflows/wf_agent/runs', { inputs: { q: 'hi' } });

      expect(res.status).toBe(422);
      expect(field(res.body, 'error', 'code')).toBe('VALIDATION.GRAPH_INVALID');
      expect(field(res.body, 'error', 'details', 'errors', 0, 'code')).toBe('VALIDATION.UNRESOLVED_AGENT');
      expect(await ctx.scheduler.listRuns('wf_agent')).toEqual([]);
    });

    it('a missing input fails the run, not the request', async () => {
      const res = await request(app, 'POST', '/api/v1/workflows/wf_greeting/runs', {});
      expect(res.status).toBe(201);
      const done = await ctx.scheduler.waitForRun(stringField(res.body, 'runId'));
      expect(done.status).toBe(RunStatus.Failed);
      expect(done.error?.code).toBe('INPUT.MISSING');
    });
  });

  describe('run queries', () => {
    it('lists a workflow runs', async () => {
      const first = await ctx.scheduler.runWorkflow({ workflowId: 'wf_greeting', inputs: { greeting: 'a' } });
      const res = await request(app, 'GET', '/api/v1/workflows/wf_greeting/runs');

      expect(res.status).toBe(200);
      expect(field(res.body, 'runs', 0, 'runId')).toBe(first.runId);
      expect(field(res.body, 'runs', 1)).toBeUndefined();
    });

    it('listing runs of an unknown workflow is 404', async () => {
      const res = await request(app, 'GET', '/api/v1/workflows/wf_missing/runs');
      expect(res.status).toBe(404);
    });

    it('returns the change history', async () => {
      const run = await ctx.scheduler.runWorkflow({ workflowId: 'wf_greeting', inputs: { greeting: 'a' } });
      const res = await request(app, 'GET', `/api/v1/runs/${run.runId}/history`);

      expect(res.status).toBe(200);
      expect(field(res.body, 'history', 0, 'event')).toBe('run.created');
      expect(field(res.body, 'history', 8, 'event')).toBe('run.completed');
      expect(field(res.body, 'history', 8, 'record', 'finalOutput')).toBe('A');
    });

    it('unknown runs are 404', async () => {
      const res = await request(app, 'GET', '/api/v1/runs/run_missing');
      expect(res.status).toBe(404);
      expect(field(res.body, 'error', 'code')).toBe('RUN.NOT_FOUND');
      expect((await request(app, 'GET', '/api/v1/runs/run_missing/history')).status).toBe(404);
    });

    it('is also served without the version prefix', async () => {
      const submitted = await request(app, 'POST', '/api/workflows/wf_greeting/runs', { inputs: { greeting: 'yo' } });
      const runId = stringField(submitted.body, 'runId');
      await ctx.scheduler.waitForRun(runId);

      const res = await request(app, 'GET', `/api/runs/${runId}`);
      expect(field(res.body, 'run', 'finalOutput')).toBe('YO');
    });
  });

  describe('POST /api/v1/runs/:runId/cancel', () => {
    it('cancels an in-flight run', async () => {
      setup(new ScriptedInvoker((_prompt, signal) => untilAborted(signal)));
      await ctx.scheduler.registerWorkflow(agentWorkflow('writer'));

      const submitted = await request(app, 'POST', '/api/v1/workflows/wf_agent/runs', { inputs: { q: 'hi' } });
      const runId = stringField(submitted.body, 'runId');
      const res = await request(app, 'POST', `/api/v1/runs/${runId}/cancel`, { reason: 'user request' });

      expect(res.status).toBe(200);
      expect(field(res.body, 'run', 'cancelRequested')).toBe(true);

      const done = await ctx.scheduler.waitForRun(runId);
      expect(done.status).toBe(RunStatus.Cancelled);
      expect(done.error?.message).toBe('Run canceled: user request');
    });

    it('a finished run is returned unchanged', async () => {
      const run = await ctx.scheduler.runWorkflow({ workflowId: 'wf_greeting', inputs: { greeting: 'a' } });
      const res = await request(app, 'POST', `/api/v1/runs/${run.runId}/cancel`);

      expect(res.status).toBe(200);
      expect(field(res.body, 'run', 'status')).toBe(RunStatus.Completed);
      expect(field(res.body, 'run', 'cancelRequested')).toBe(false);
    });

    it('unknown runs are 404', async () => {
      const res = await request(app, 'POST', '/api/v1/runs/run_missing/cancel', {});
      expect(res.status).toBe(404);
    });
  });
});

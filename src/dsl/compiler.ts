/**
 * Workflow Compiler.
 *
 * Validates a workflow definition and compiles it, along with every nested
 * loop body, into an indexed WorkflowGraph ready for scheduling.
 */

import { createHash } from 'crypto';
import { TypedError, createTypedError } from '../domain/errors';
import { Edge, Workflow, WorkflowNode } from '../domain/workflow';
import { WorkflowGraph } from './graph';
import { validateWorkflow, ValidationOptions, ValidationResult } from './validator';

/** Compilation result. */
export interface CompilationResult {
  success: boolean;
  graph?: WorkflowGraph;
  /** SHA-256 of the canonical definition, recorded for traceability. */
  workflowHash?: string;
  errors: TypedError[];
  validation: ValidationResult;
}

/** Compile a workflow definition into an executable graph. */
export function compileWorkflow(workflow: Workflow, options: ValidationOptions = {}): CompilationResult {
  const validation = validateWorkflow(workflow, options);
  if (!validation.valid) {
    return { success: false, errors: validation.errors, validation };
  }

  const graph = buildGraph(workflow.id, workflow.nodes, workflow.edges);
  if (!graph) {
    return {
      success: false,
      errors: [
        createTypedError({
          code: 'VALIDATION.CYCLE_DETECTED',
          message: 'Failed to determine execution order: cycle detected',
          classification: 'validation',
        }),
      ],
      validation,
    };
  }

  return {
    success: true,
    graph,
    workflowHash: computeHash(JSON.stringify({ nodes: workflow.nodes, edges: workflow.edges })),
    errors: [],
    validation,
  };
}

function buildGraph(workflowId: string, nodes: WorkflowNode[], edges: Edge[]): WorkflowGraph | null {
  const order = topologicalSort(nodes, edges);
  if (!order) return null;

  const bodies = new Map<string, WorkflowGraph>();
  for (const node of nodes) {
    if (node.kind !== 'loop') continue;
    const body = buildGraph(`${workflowId}/${node.id}`, node.config.body.nodes, node.config.body.edges);
    if (!body) return null;
    bodies.set(node.id, body);
  }

  return new WorkflowGraph(workflowId, nodes, edges, order, bodies);
}

/**
 * Kahn's algorithm over every edge type. Ready nodes are taken in
 * declaration order so the result is stable for a given definition.
 * Returns null if a cycle remains.
 */
export function topologicalSort(nodes: WorkflowNode[], edges: Edge[]): string[] | null {
  const position = new Map(nodes.map((n, i) => [n.id, i]));
  const inDegree = new Map<string, number>();
  const adjacency = new Map<string, string[]>();

  for (const node of nodes) {
    inDegree.set(node.id, 0);
    adjacency.set(node.id, []);
  }

  for (const edge of edges) {
    adjacency.get(edge.source)?.push(edge.target);
    inDegree.set(edge.target, (inDegree.get(edge.target) ?? 0) + 1);
  }

  const ready: string[] = nodes.filter((n) => inDegree.get(n.id) === 0).map((n) => n.id);
  const order: string[] = [];

  while (ready.length > 0) {
    ready.sort((a, b) => (position.get(a) ?? 0) - (position.get(b) ?? 0));
    const current = ready.shift();
    if (current === undefined) break;
    order.push(current);

    for (const neighbor of adjacency.get(current) ?? []) {
      const remaining = (inDegree.get(neighbor) ?? 0) - 1;
      inDegree.set(neighbor, remaining);
      if (remaining === 0) ready.push(neighbor);
    }
  }

  return order.length === nodes.length ? order : null;
}

function computeHash(data: string): string {
  return createHash('sha256').update(data).digest('hex');
}

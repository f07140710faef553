/**
 * Graph Validator.
 *
 * Structural checks run before any execution. Failures are reported as a
 * list of typed errors, each naming the offending node and/or edge, so a
 * caller can highlight every problem at once.
 */

import { TypedError, createTypedError } from '../domain/errors';
import { Edge, LoopNodeConfig, Workflow, WorkflowNode } from '../domain/workflow';
import { checkExpressionSyntax } from '../engine/expressions';
import {
  BRANCH_LABELS,
  INPUT_DEPENDENT_KINDS,
  REQUIRED_WORKFLOW_FIELDS,
  SCHEMA_CONSTRAINTS,
  VALID_EDGE_TYPES,
  VALID_INPUT_TYPES,
  VALID_NODE_KINDS,
} from './schema';

/** Validation result. */
export interface ValidationResult {
  valid: boolean;
  errors: TypedError[];
  warnings: string[];
}

/** Optional knowledge the validator can check references against. */
export interface ValidationOptions {
  /** Registered transform names. Unknown names are reported when supplied. */
  transformNames?: Iterable<string>;
  /** Upper bound on any loop's maxIterations. */
  maxLoopIterations?: number;
}

const NODE_KINDS: ReadonlySet<string> = new Set(VALID_NODE_KINDS);
const EDGE_TYPES: ReadonlySet<string> = new Set(VALID_EDGE_TYPES);
const INPUT_TYPES: ReadonlySet<string> = new Set(VALID_INPUT_TYPES);
const LABELS: ReadonlySet<string> = new Set(BRANCH_LABELS);

interface GraphScope {
  transformNames?: ReadonlySet<string>;
  maxLoopIterations?: number;
  depth: number;
}

/** Validate a workflow definition. */
export function validateWorkflow(workflow: Partial<Workflow>, options: ValidationOptions = {}): ValidationResult {
  const errors: TypedError[] = [];
  const warnings: string[] = [];

  validateRequiredFields(workflow, errors);
  if (errors.length > 0 || !Array.isArray(workflow.nodes) || !Array.isArray(workflow.edges)) {
    return { valid: false, errors, warnings };
  }

  if (typeof workflow.name === 'string' && workflow.name.length > SCHEMA_CONSTRAINTS.maxWorkflowNameLength) {
    errors.push(
      createTypedError({
        code: 'VALIDATION.NAME_TOO_LONG',
        message: `Workflow name exceeds ${SCHEMA_CONSTRAINTS.maxWorkflowNameLength} characters`,
        classification: 'validation',
      }),
    );
  }

  const scope: GraphScope = {
    transformNames: options.transformNames ? new Set(options.transformNames) : undefined,
    maxLoopIterations: options.maxLoopIterations,
    depth: 0,
  };
  validateGraph(workflow.nodes, workflow.edges, scope, errors, warnings);

  return { valid: errors.length === 0, errors, warnings };
}

function validateRequiredFields(workflow: Partial<Workflow>, errors: TypedError[]): void {
  for (const field of REQUIRED_WORKFLOW_FIELDS) {
    if (workflow[field] === undefined || workflow[field] === null) {
      errors.push(
        issue('VALIDATION.REQUIRED_FIELD', `Missing required field: ${field}`, {}, [
          { type: 'ADD_FIELD', params: { field }, description: `Provide the "${field}" field` },
        ]),
      );
    }
  }
  if (workflow.nodes !== undefined && workflow.nodes !== null && !Array.isArray(workflow.nodes)) {
    errors.push(issue('VALIDATION.INVALID_NODES', 'nodes must be an array', {}));
  }
  if (workflow.edges !== undefined && workflow.edges !== null && !Array.isArray(workflow.edges)) {
    errors.push(issue('VALIDATION.INVALID_EDGES', 'edges must be an array', {}));
  }
}

/**
 * Validate one graph level: the top-level workflow or a loop body.
 * Loop bodies recurse through validateLoopNode.
 */
function validateGraph(
  nodes: WorkflowNode[],
  edges: Edge[],
  scope: GraphScope,
  errors: TypedError[],
  warnings: string[],
): void {
  if (nodes.length === 0) {
    errors.push(issue('VALIDATION.EMPTY_GRAPH', 'Workflow must have at least one node', {}));
    return;
  }

  if (nodes.length > SCHEMA_CONSTRAINTS.maxNodes) {
    errors.push(
      issue('VALIDATION.TOO_MANY_NODES', `Workflow exceeds maximum of ${SCHEMA_CONSTRAINTS.maxNodes} nodes`, {}),
    );
  }

  const nodeMap = new Map<string, WorkflowNode>();
  for (const [index, node] of nodes.entries()) {
    const entry: unknown = node;
    if (!isRecord(entry)) {
      errors.push(issue('VALIDATION.INVALID_NODE', `Node at index ${index} must be an object`, { details: { index } }));
      continue;
    }
    if (typeof node.id !== 'string' || node.id.length === 0) {
      errors.push(issue('VALIDATION.NODE_MISSING_ID', 'Every node needs a non-empty string id', {}));
      continue;
    }
    if (nodeMap.has(node.id)) {
      errors.push(issue('VALIDATION.DUPLICATE_NODE_ID', `Duplicate node ID: ${node.id}`, { nodeId: node.id }));
      continue;
    }
    nodeMap.set(node.id, node);
  }

  for (const node of nodeMap.values()) {
    validateNode(node, scope, errors, warnings);
  }

  const validEdges = validateEdges(edges, nodeMap, errors);

  if (![...nodeMap.values()].some((n) => n.kind === 'output')) {
    errors.push(
      issue('VALIDATION.NO_OUTPUT_NODE', 'Workflow must declare at least one output node', {}, [
        { type: 'ADD_OUTPUT_NODE', params: {}, description: 'Add a node of kind "output"' },
      ]),
    );
  }

  validateAcyclic(nodeMap, validEdges, errors);
  validateConditionalBranches(nodeMap, validEdges, errors);
  validateReachability(nodeMap, validEdges, errors, warnings);
}

function validateNode(node: WorkflowNode, scope: GraphScope, errors: TypedError[], warnings: string[]): void {
  if (!NODE_KINDS.has(node.kind)) {
    errors.push(
      issue('VALIDATION.INVALID_NODE_KIND', `Node "${node.id}": invalid kind "${String(node.kind)}"`, { nodeId: node.id }, [
        { type: 'SET_NODE_KIND', params: { validKinds: [...VALID_NODE_KINDS] }, description: 'Use a valid node kind' },
      ]),
    );
    return;
  }

  if (!isRecord(node.config)) {
    errors.push(issue('VALIDATION.NODE_MISSING_CONFIG', `Node "${node.id}": config must be an object`, { nodeId: node.id }));
    return;
  }

  switch (node.kind) {
    case 'agent': {
      const { agentId, maxAttempts, timeoutMs } = node.config;
      if (typeof agentId !== 'string' || agentId.trim().length === 0) {
        errors.push(
          issue('VALIDATION.AGENT_REFERENCE_MISSING', `Node "${node.id}": agent nodes must reference an agentId`, { nodeId: node.id }, [
            { type: 'SET_AGENT_ID', params: { nodeId: node.id }, description: 'Reference an agent identity' },
          ]),
        );
      }
      if (
        maxAttempts !== undefined &&
        (!Number.isInteger(maxAttempts) || maxAttempts < 1 || maxAttempts > SCHEMA_CONSTRAINTS.maxAgentAttempts)
      ) {
        errors.push(
          issue(
            'VALIDATION.INVALID_ATTEMPTS',
            `Node "${node.id}": maxAttempts must be an integer between 1 and ${SCHEMA_CONSTRAINTS.maxAgentAttempts}`,
            { nodeId: node.id },
          ),
        );
      }
      if (timeoutMs !== undefined && (!Number.isFinite(timeoutMs) || timeoutMs <= 0)) {
        errors.push(issue('VALIDATION.INVALID_TIMEOUT', `Node "${node.id}": timeoutMs must be a positive number`, { nodeId: node.id }));
      }
      break;
    }
    case 'input': {
      const { type } = node.config;
      if (type !== undefined && (typeof type !== 'string' || !INPUT_TYPES.has(type))) {
        errors.push(
          issue('VALIDATION.INVALID_INPUT_TYPE', `Node "${node.id}": invalid input type "${String(type)}"`, { nodeId: node.id }, [
            { type: 'SET_INPUT_TYPE', params: { validTypes: [...VALID_INPUT_TYPES] } },
          ]),
        );
      }
      break;
    }
    case 'output':
      break;
    case 'transform': {
      const { fn } = node.config;
      if (typeof fn !== 'string' || fn.length === 0) {
        errors.push(issue('VALIDATION.TRANSFORM_MISSING_FN', `Node "${node.id}": transform nodes must name a function`, { nodeId: node.id }));
      } else if (scope.transformNames && !scope.transformNames.has(fn)) {
        errors.push(
          issue('VALIDATION.UNKNOWN_TRANSFORM', `Node "${node.id}": unknown transform function "${fn}"`, { nodeId: node.id }, [
            { type: 'REGISTER_TRANSFORM', params: { fn }, description: `Register a transform named "${fn}"` },
          ]),
        );
      }
      break;
    }
    case 'conditional': {
      const { expression } = node.config;
      if (typeof expression !== 'string' || expression.trim().length === 0) {
        errors.push(
          issue('VALIDATION.CONDITION_MISSING_EXPRESSION', `Node "${node.id}": conditional nodes need an expression`, { nodeId: node.id }),
        );
        break;
      }
      const syntaxError = checkExpressionSyntax(expression);
      if (syntaxError) {
        errors.push(issue('VALIDATION.INVALID_EXPRESSION', `Node "${node.id}": ${syntaxError}`, { nodeId: node.id }));
      }
      break;
    }
    case 'loop':
      validateLoopNode(node.id, node.config, scope, errors, warnings);
      break;
  }
}

function validateLoopNode(
  nodeId: string,
  config: LoopNodeConfig,
  scope: GraphScope,
  errors: TypedError[],
  warnings: string[],
): void {
  const { maxIterations, until, body } = config;

  if (maxIterations === undefined && until === undefined) {
    errors.push(
      issue('VALIDATION.UNBOUNDED_LOOP', `Node "${nodeId}": loop must declare maxIterations or an until condition`, { nodeId }, [
        { type: 'SET_MAX_ITERATIONS', params: { nodeId }, description: 'Declare a bounded iteration count' },
      ]),
    );
  }

  if (maxIterations !== undefined) {
    if (typeof maxIterations !== 'number' || !Number.isInteger(maxIterations) || maxIterations < 1) {
      errors.push(issue('VALIDATION.INVALID_LOOP_BOUND', `Node "${nodeId}": maxIterations must be a positive integer`, { nodeId }));
    } else if (scope.maxLoopIterations !== undefined && maxIterations > scope.maxLoopIterations) {
      errors.push(
        issue(
          'VALIDATION.LOOP_BOUND_TOO_HIGH',
          `Node "${nodeId}": maxIterations must not exceed ${scope.maxLoopIterations}`,
          { nodeId },
        ),
      );
    }
  }

  if (until !== undefined) {
    const syntaxError = typeof until === 'string' ? checkExpressionSyntax(until) : 'until must be a string';
    if (syntaxError) {
      errors.push(issue('VALIDATION.INVALID_EXPRESSION', `Node "${nodeId}": ${syntaxError}`, { nodeId }));
    }
  }

  if (!isRecord(body) || !Array.isArray(body.nodes) || !Array.isArray(body.edges)) {
    errors.push(issue('VALIDATION.LOOP_BODY_MISSING', `Node "${nodeId}": loop body must have nodes and edges arrays`, { nodeId }));
    return;
  }

  if (scope.depth + 1 > SCHEMA_CONSTRAINTS.maxLoopDepth) {
    errors.push(
      issue('VALIDATION.LOOP_TOO_DEEP', `Node "${nodeId}": loops nest deeper than ${SCHEMA_CONSTRAINTS.maxLoopDepth}`, { nodeId }),
    );
    return;
  }

  const bodyErrors: TypedError[] = [];
  const bodyWarnings: string[] = [];
  validateGraph(body.nodes, body.edges, { ...scope, depth: scope.depth + 1 }, bodyErrors, bodyWarnings);

  for (const bodyError of bodyErrors) {
    errors.push({
      ...bodyError,
      message: `Loop "${nodeId}" body: ${bodyError.message}`,
      nodeId,
      edgeId: undefined,
      details: {
        ...bodyError.details,
        bodyNodeId: bodyError.nodeId,
        bodyEdgeId: bodyError.edgeId,
      },
    });
  }
  for (const warning of bodyWarnings) {
    warnings.push(`Loop "${nodeId}" body: ${warning}`);
  }
}

/** Validate edges and return the ones whose endpoints resolve. */
function validateEdges(edges: Edge[], nodeMap: Map<string, WorkflowNode>, errors: TypedError[]): Edge[] {
  const seenIds = new Set<string>();
  const valid: Edge[] = [];

  for (const [index, edge] of edges.entries()) {
    const entry: unknown = edge;
    if (!isRecord(entry)) {
      errors.push(issue('VALIDATION.INVALID_EDGE', `Edge at index ${index} must be an object`, { details: { index } }));
      continue;
    }
    if (typeof edge.id !== 'string' || edge.id.length === 0) {
      errors.push(issue('VALIDATION.EDGE_MISSING_ID', 'Every edge needs a non-empty string id', {}));
      continue;
    }
    if (seenIds.has(edge.id)) {
      errors.push(issue('VALIDATION.DUPLICATE_EDGE_ID', `Duplicate edge ID: ${edge.id}`, { edgeId: edge.id }));
      continue;
    }
    seenIds.add(edge.id);

    let ok = true;
    if (!EDGE_TYPES.has(edge.type)) {
      errors.push(
        issue('VALIDATION.INVALID_EDGE_TYPE', `Edge "${edge.id}": invalid type "${String(edge.type)}"`, { edgeId: edge.id }, [
          { type: 'SET_EDGE_TYPE', params: { validTypes: [...VALID_EDGE_TYPES] } },
        ]),
      );
      ok = false;
    }

    for (const endpoint of ['source', 'target'] as const) {
      const nodeId = edge[endpoint];
      if (!nodeMap.has(nodeId)) {
        errors.push(
          issue(
            'VALIDATION.UNKNOWN_EDGE_ENDPOINT',
            `Edge "${edge.id}": ${endpoint} references unknown node "${String(nodeId)}"`,
            { edgeId: edge.id, details: { endpoint, nodeId } },
          ),
        );
        ok = false;
      }
    }

    if (edge.source === edge.target) {
      errors.push(issue('VALIDATION.SELF_EDGE', `Edge "${edge.id}": a node cannot connect to itself`, { edgeId: edge.id, nodeId: edge.source }));
      ok = false;
    }

    if (edge.sourcePort !== undefined) {
      const source = nodeMap.get(edge.source);
      if (!LABELS.has(edge.sourcePort)) {
        errors.push(
          issue('VALIDATION.INVALID_PORT', `Edge "${edge.id}": branch label must be "true" or "false"`, { edgeId: edge.id }),
        );
        ok = false;
      } else if (source && source.kind !== 'conditional') {
        errors.push(
          issue(
            'VALIDATION.INVALID_PORT',
            `Edge "${edge.id}": only conditional nodes expose branch ports`,
            { edgeId: edge.id, nodeId: source.id },
          ),
        );
        ok = false;
      }
    }

    const target = nodeMap.get(edge.target);
    if (target && target.kind === 'input' && edge.type === 'data') {
      errors.push(
        issue('VALIDATION.INPUT_HAS_DATA_EDGE', `Edge "${edge.id}": input node "${target.id}" cannot receive data edges`, {
          edgeId: edge.id,
          nodeId: target.id,
        }),
      );
      ok = false;
    }

    if (ok) valid.push(edge);
  }

  return valid;
}

/**
 * Detect cycles with a white/gray/black DFS. The data+control subgraph must
 * be acyclic; context edges also order execution, so a cycle through them
 * is reported separately.
 */
function validateAcyclic(nodeMap: Map<string, WorkflowNode>, edges: Edge[], errors: TypedError[]): void {
  const orderingEdges = edges.filter((e) => e.type !== 'context');
  const cycles = findBackEdges(nodeMap, orderingEdges);
  for (const { edge, cycle } of cycles) {
    errors.push(
      issue('VALIDATION.CYCLE_DETECTED', `Edge "${edge.id}" closes a cycle: ${cycle.join(' -> ')}`, {
        edgeId: edge.id,
        nodeId: edge.target,
        details: { cycle },
      }, [{ type: 'REMOVE_CYCLE', params: { edgeId: edge.id }, description: 'Remove the edge or model repetition with a loop node' }]),
    );
  }
  if (cycles.length > 0) return;

  for (const { edge, cycle } of findBackEdges(nodeMap, edges)) {
    errors.push(
      issue('VALIDATION.CONTEXT_CYCLE', `Context edge "${edge.id}" closes a cycle: ${cycle.join(' -> ')}`, {
        edgeId: edge.id,
        nodeId: edge.target,
        details: { cycle },
      }),
    );
  }
}

const WHITE = 0;
const GRAY = 1;
const BLACK = 2;

function findBackEdges(
  nodeMap: Map<string, WorkflowNode>,
  edges: Edge[],
): Array<{ edge: Edge; cycle: string[] }> {
  const outgoing = new Map<string, Edge[]>();
  for (const id of nodeMap.keys()) outgoing.set(id, []);
  for (const edge of edges) outgoing.get(edge.source)?.push(edge);

  const color = new Map<string, number>();
  for (const id of nodeMap.keys()) color.set(id, WHITE);

  const found: Array<{ edge: Edge; cycle: string[] }> = [];
  const path: string[] = [];

  function visit(nodeId: string): void {
    color.set(nodeId, GRAY);
    path.push(nodeId);
    for (const edge of outgoing.get(nodeId) ?? []) {
      const state = color.get(edge.target);
      if (state === GRAY) {
        const start = path.indexOf(edge.target);
        found.push({ edge, cycle: [...path.slice(start), edge.target] });
      } else if (state === WHITE) {
        visit(edge.target);
      }
    }
    path.pop();
    color.set(nodeId, BLACK);
  }

  for (const id of nodeMap.keys()) {
    if (color.get(id) === WHITE) visit(id);
  }
  return found;
}

/** Conditional nodes declare exactly one "true" and one "false" data edge. */
function validateConditionalBranches(nodeMap: Map<string, WorkflowNode>, edges: Edge[], errors: TypedError[]): void {
  for (const node of nodeMap.values()) {
    if (node.kind !== 'conditional') continue;
    const dataEdges = edges.filter((e) => e.source === node.id && e.type === 'data');
    const labels = dataEdges.map((e) => e.sourcePort ?? null);
    const hasBoth = labels.includes('true') && labels.includes('false');
    if (dataEdges.length !== 2 || !hasBoth) {
      errors.push(
        issue(
          'VALIDATION.CONDITIONAL_BRANCHES',
          `Node "${node.id}": conditional must have exactly two outgoing data edges labelled "true" and "false"`,
          { nodeId: node.id, details: { dataEdgeCount: dataEdges.length, labels } },
          [{ type: 'LABEL_BRANCHES', params: { nodeId: node.id }, description: 'Set sourcePort to "true"/"false" on the two branch edges' }],
        ),
      );
    }
  }
}

/**
 * Every node must be reachable from an input node, or from a node with no
 * unresolved required inputs, along data and control edges.
 */
function validateReachability(
  nodeMap: Map<string, WorkflowNode>,
  edges: Edge[],
  errors: TypedError[],
  warnings: string[],
): void {
  const forward = new Map<string, string[]>();
  const hasIncomingData = new Set<string>();
  const hasOutgoing = new Set<string>();
  for (const edge of edges) {
    hasOutgoing.add(edge.source);
    if (edge.type === 'context') continue;
    const targets = forward.get(edge.source);
    if (targets) targets.push(edge.target);
    else forward.set(edge.source, [edge.target]);
    if (edge.type === 'data') hasIncomingData.add(edge.target);
  }

  const roots = [...nodeMap.values()]
    .filter((n) => n.kind === 'input' || (!hasIncomingData.has(n.id) && !requiresInput(n)))
    .map((n) => n.id);

  const reachable = new Set<string>();
  const queue = [...roots];
  while (queue.length > 0) {
    const current = queue.pop();
    if (current === undefined || reachable.has(current)) continue;
    reachable.add(current);
    for (const next of forward.get(current) ?? []) {
      if (!reachable.has(next)) queue.push(next);
    }
  }

  for (const node of nodeMap.values()) {
    if (!reachable.has(node.id)) {
      errors.push(
        issue('VALIDATION.UNREACHABLE_NODE', `Node "${node.id}" is not reachable from any input node and has unresolved inputs`, {
          nodeId: node.id,
        }, [{ type: 'CONNECT_NODE', params: { nodeId: node.id }, description: 'Connect this node to an input via a data edge' }]),
      );
    }
    if (node.kind !== 'output' && !hasOutgoing.has(node.id)) {
      warnings.push(`Node "${node.id}" has no outgoing edges; its result is recorded but never consumed`);
    }
  }
}

function requiresInput(node: WorkflowNode): boolean {
  if (node.kind === 'agent') return !node.config?.prompt;
  return INPUT_DEPENDENT_KINDS.has(node.kind);
}

function issue(
  code: string,
  message: string,
  where: { nodeId?: string; edgeId?: string; details?: Record<string, unknown> },
  suggestedFixes?: TypedError['suggestedFixes'],
): TypedError {
  return createTypedError({
    code,
    message,
    nodeId: where.nodeId,
    edgeId: where.edgeId,
    retryable: false,
    classification: 'validation',
    details: where.details,
    suggestedFixes,
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Workflow graph domain model.
 *
 * A workflow is a directed graph of heterogeneous nodes connected by typed
 * edges. Definitions are owned by the surrounding system; the engine only
 * ever receives an immutable snapshot for a single run.
 */

/** Node kinds understood by the engine. */
export type NodeKind = 'agent' | 'input' | 'output' | 'transform' | 'conditional' | 'loop';

/**
 * Edge types.
 *
 * - data: carries the source output into the target's input slot
 * - control: gates whether the target runs at all
 * - context: propagates a key/value bag without contributing direct input
 */
export type EdgeType = 'data' | 'control' | 'context';

/** Branch labels emitted by conditional nodes. */
export type BranchLabel = 'true' | 'false';

/** Value types an input node may declare. */
export type InputValueType = 'string' | 'number' | 'boolean' | 'object' | 'array';

/** Canvas position. Presentational only. */
export interface NodePosition {
  x: number;
  y: number;
}

interface NodeBase {
  id: string;
  name?: string;
  position?: NodePosition;
}

export interface InputNodeConfig {
  /** Defaults to true. */
  required?: boolean;
  /** Used when the submission omits this input. */
  defaultValue?: unknown;
  type?: InputValueType;
}

export interface OutputNodeConfig {
  /** Key in finalOutput when the workflow has several output nodes. */
  key?: string;
}

export interface TransformNodeConfig {
  /** Name of a function in the transform registry. */
  fn: string;
  args?: Record<string, unknown>;
}

export interface ConditionalNodeConfig {
  /** Boolean expression over the resolved inputs and context. */
  expression: string;
}

/** A nested sub-workflow executed once per loop iteration. */
export interface LoopBody {
  nodes: WorkflowNode[];
  edges: Edge[];
}

export interface LoopNodeConfig {
  body: LoopBody;
  maxIterations?: number;
  /** Termination predicate, evaluated after each iteration. */
  until?: string;
  /** The only context key shared between iterations and the outer run. */
  accumulatorKey?: string;
}

export interface AgentNodeConfig {
  /** Agent identity, resolved through the agent directory at run start. */
  agentId: string;
  /** Prompt template; `{{input}}`, `{{<slot>}}` and `{{context.<key>}}` are substituted. */
  prompt?: string;
  systemPrompt?: string;
  /** Context key holding conversation turns shared along context edges. */
  memoryKey?: string;
  maxAttempts?: number;
  timeoutMs?: number;
}

export interface InputNode extends NodeBase {
  kind: 'input';
  config: InputNodeConfig;
}

export interface OutputNode extends NodeBase {
  kind: 'output';
  config: OutputNodeConfig;
}

export interface TransformNode extends NodeBase {
  kind: 'transform';
  config: TransformNodeConfig;
}

export interface ConditionalNode extends NodeBase {
  kind: 'conditional';
  config: ConditionalNodeConfig;
}

export interface LoopNode extends NodeBase {
  kind: 'loop';
  config: LoopNodeConfig;
}

export interface AgentNode extends NodeBase {
  kind: 'agent';
  config: AgentNodeConfig;
}

/** Closed union over every node kind. */
export type WorkflowNode =
  | InputNode
  | OutputNode
  | TransformNode
  | ConditionalNode
  | LoopNode
  | AgentNode;

/** A typed relationship between two nodes. */
export interface Edge {
  id: string;
  source: string;
  target: string;
  type: EdgeType;
  /** Branch label on edges leaving a conditional node. */
  sourcePort?: BranchLabel;
  /** Input slot on the target; defaults to the source node id. */
  targetPort?: string;
}

/** The workflow definition snapshot handed to the engine. */
export interface Workflow {
  id: string;
  name: string;
  description?: string;
  nodes: WorkflowNode[];
  edges: Edge[];
  createdAt?: string;
  updatedAt?: string;
}

/** Input for registering a workflow snapshot. */
export interface CreateWorkflowInput {
  id?: string;
  name: string;
  description?: string;
  nodes: WorkflowNode[];
  edges: Edge[];
}

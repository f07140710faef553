/**
 * Immutable, indexed view of a validated workflow graph.
 *
 * Built once per definition by the compiler; the scheduler and the loop
 * executor only ever read from it.
 */

import { Edge, EdgeType, LoopNode, WorkflowNode } from '../domain/workflow';

export class WorkflowGraph {
  readonly nodes: readonly WorkflowNode[];
  readonly edges: readonly Edge[];
  /** Topological order over all edge types; ties keep declaration order. */
  readonly executionOrder: readonly string[];

  private readonly nodeMap: Map<string, WorkflowNode>;
  private readonly incomingEdges: Map<string, Edge[]>;
  private readonly outgoingEdges: Map<string, Edge[]>;
  private readonly bodies: Map<string, WorkflowGraph>;

  constructor(
    readonly workflowId: string,
    nodes: WorkflowNode[],
    edges: Edge[],
    executionOrder: string[],
    bodies: Map<string, WorkflowGraph>,
  ) {
    this.nodes = Object.freeze([...nodes]);
    this.edges = Object.freeze([...edges]);
    this.executionOrder = Object.freeze([...executionOrder]);
    this.nodeMap = new Map(nodes.map((n) => [n.id, n]));
    this.incomingEdges = new Map(nodes.map((n) => [n.id, []]));
    this.outgoingEdges = new Map(nodes.map((n) => [n.id, []]));
    for (const edge of edges) {
      this.incomingEdges.get(edge.target)?.push(edge);
      this.outgoingEdges.get(edge.source)?.push(edge);
    }
    this.bodies = bodies;
  }

  get nodeIds(): string[] {
    return this.nodes.map((n) => n.id);
  }

  node(nodeId: string): WorkflowNode | undefined {
    return this.nodeMap.get(nodeId);
  }

  /** Incoming edges in declaration order, optionally filtered by type. */
  incoming(nodeId: string, type?: EdgeType): Edge[] {
    const edges = this.incomingEdges.get(nodeId) ?? [];
    return type ? edges.filter((e) => e.type === type) : [...edges];
  }

  /** Outgoing edges in declaration order, optionally filtered by type. */
  outgoing(nodeId: string, type?: EdgeType): Edge[] {
    const edges = this.outgoingEdges.get(nodeId) ?? [];
    return type ? edges.filter((e) => e.type === type) : [...edges];
  }

  inputNodes(): WorkflowNode[] {
    return this.nodes.filter((n) => n.kind === 'input');
  }

  outputNodes(): WorkflowNode[] {
    return this.nodes.filter((n) => n.kind === 'output');
  }

  /** Nodes with no incoming edges of any type. */
  roots(): WorkflowNode[] {
    return this.nodes.filter((n) => (this.incomingEdges.get(n.id) ?? []).length === 0);
  }

  /** Compiled body of a loop node. */
  loopBody(nodeId: string): WorkflowGraph | undefined {
    return this.bodies.get(nodeId);
  }

  /** Every agent id referenced by this graph or any nested loop body. */
  agentIds(): Set<string> {
    const ids = new Set<string>();
    for (const node of this.nodes) {
      if (node.kind === 'agent') ids.add(node.config.agentId);
    }
    for (const body of this.bodies.values()) {
      for (const id of body.agentIds()) ids.add(id);
    }
    return ids;
  }

  loopNodes(): LoopNode[] {
    return this.nodes.filter((n): n is LoopNode => n.kind === 'loop');
  }
}

/**
 * Workflow graph schema constants.
 *
 * The single source of truth for the node kinds, edge types and limits the
 * validator and compiler enforce.
 */

/** Node kinds recognized by the schema. */
export const VALID_NODE_KINDS = [
  'agent',
  'input',
  'output',
  'transform',
  'conditional',
  'loop',
] as const;

/** Edge types recognized by the schema. */
export const VALID_EDGE_TYPES = ['data', 'control', 'context'] as const;

/** Branch labels a conditional node may emit. */
export const BRANCH_LABELS = ['true', 'false'] as const;

/** Value types an input node may declare. */
export const VALID_INPUT_TYPES = ['string', 'number', 'boolean', 'object', 'array'] as const;

/** Required fields for a workflow definition. */
export const REQUIRED_WORKFLOW_FIELDS = ['id', 'name', 'nodes', 'edges'] as const;

/**
 * Node kinds that cannot run without at least one incoming data edge.
 * Agent nodes join this set when they carry no prompt template.
 */
export const INPUT_DEPENDENT_KINDS: ReadonlySet<string> = new Set([
  'output',
  'transform',
  'conditional',
  'loop',
]);

/** Validation constraints. */
export const SCHEMA_CONSTRAINTS = {
  /** Maximum number of nodes per graph (loop bodies count separately). */
  maxNodes: 500,
  /** Maximum workflow name length. */
  maxWorkflowNameLength: 256,
  /** Maximum loop nesting depth. */
  maxLoopDepth: 4,
  /** Maximum agent attempts a node may request. */
  maxAgentAttempts: 10,
} as const;

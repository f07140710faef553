export { WorkflowScheduler } from './scheduler';
export type { SchedulerDependencies } from './scheduler';
export { GraphRunner } from './graph-runner';
export type { GraphRunOptions, GraphRunResult, GraphRunSettings } from './graph-runner';
export { ExecutionContext } from './context';
export { ExecutionSlots } from './slots';
export type { Binding, ExecutionContextOptions } from './context';
export { executeNode } from './node-executors';
export type {
  ExecutorServices,
  IterationInput,
  IterationResult,
  LoopBodyRunner,
  NodeInvocation,
  NodeOutcome,
  ResolvedInputs,
} from './node-executors';
export { runNode, computeBackoff, sleep } from './node-runner';
export type { AttemptPolicy, NodeRunOutcome, RunNodeOptions } from './node-runner';
export { TransformRegistry, createDefaultTransformRegistry, readPath, renderTemplate } from './transforms';
export type { TransformFunction, TransformInvocation } from './transforms';
export {
  ExpressionError,
  checkExpressionSyntax,
  compileExpression,
  evaluateExpression,
  evaluatePredicate,
} from './expressions';
export { transitionRunStatus, transitionNodeStatus, isTerminalRunStatus, isTerminalNodeStatus } from './state-machine';
export type { TransitionResult } from './state-machine';

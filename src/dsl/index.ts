export { compileWorkflow, topologicalSort } from './compiler';
export type { CompilationResult } from './compiler';
export { WorkflowGraph } from './graph';
export { validateWorkflow } from './validator';
export type { ValidationOptions, ValidationResult } from './validator';
export * from './schema';

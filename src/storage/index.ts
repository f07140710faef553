export { createMemoryStore, deepCopy } from './memory-store';
export type { ListOptions, Store, WorkflowStore } from './store';

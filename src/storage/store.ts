/**
 * Storage layer interfaces.
 *
 * Workflow definitions are owned by the surrounding system; the engine
 * only needs to look up a snapshot by id. Backends implement WorkflowStore.
 */

import { Workflow } from '../domain/workflow';

/** Generic list query options. */
export interface ListOptions {
  limit?: number;
  offset?: number;
}

/** Store interface for workflow definitions. */
export interface WorkflowStore {
  /** Insert or replace a definition. */
  create(workflow: Workflow): Promise<Workflow>;
  getById(id: string): Promise<Workflow | null>;
  list(options?: ListOptions): Promise<Workflow[]>;
  delete(id: string): Promise<boolean>;
}

/** Composite store interface. */
export interface Store {
  workflows: WorkflowStore;
}

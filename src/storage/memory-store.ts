/**
 * In-memory storage implementation.
 *
 * Reference implementation for development and testing. Values are deep
 * copied on the way in and out, so callers never alias stored state.
 */

import { Workflow } from '../domain/workflow';
import { ListOptions, Store, WorkflowStore } from './store';

function applyListOptions<T>(items: T[], options?: ListOptions): T[] {
  const offset = options?.offset ?? 0;
  const limit = options?.limit ?? 100;
  return items.slice(offset, offset + limit);
}

/** Structured deep copy; stored values must be structured-cloneable. */
export function deepCopy<T>(value: T): T {
  return structuredClone(value);
}

class MemoryWorkflowStore implements WorkflowStore {
  private data = new Map<string, Workflow>();

  async create(workflow: Workflow): Promise<Workflow> {
    const now = new Date().toISOString();
    const existing = this.data.get(workflow.id);
    const stored: Workflow = {
      ...deepCopy(workflow),
      createdAt: existing?.createdAt ?? workflow.createdAt ?? now,
      updatedAt: now,
    };
    this.data.set(workflow.id, stored);
    return deepCopy(stored);
  }

  async getById(id: string): Promise<Workflow | null> {
    const workflow = this.data.get(id);
    return workflow ? deepCopy(workflow) : null;
  }

  async list(options?: ListOptions): Promise<Workflow[]> {
    return applyListOptions([...this.data.values()], options).map(deepCopy);
  }

  async delete(id: string): Promise<boolean> {
    return this.data.delete(id);
  }
}

/** Create a complete in-memory store. */
export function createMemoryStore(): Store {
  return {
    workflows: new MemoryWorkflowStore(),
  };
}

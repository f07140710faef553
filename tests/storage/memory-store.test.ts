/**
 * Memory store isolation: mutating a returned or submitted workflow must
 * never reach the stored copy.
 */

import { createMemoryStore } from '../../src/storage/memory-store';
import { greetingWorkflow } from '../fixtures';

describe('MemoryWorkflowStore', () => {
  it('round-trips a definition and stamps timestamps', async () => {
    const store = createMemoryStore();
    const created = await store.workflows.create(greetingWorkflow());

    expect(created.createdAt).toBeDefined();
    expect(created.updatedAt).toBeDefined();
    expect(await store.workflows.getById('wf_greeting')).toEqual(created);
    expect(await store.workflows.getById('wf_missing')).toBeNull();
  });

  it('returned workflows are isolated from the store', async () => {
    const store = createMemoryStore();
    await store.workflows.create(greetingWorkflow());

    const fetched = await store.workflows.getById('wf_greeting');
    if (!fetched) throw new Error('workflow missing');
    fetched.nodes.pop();
    fetched.edges[0].target = 'elsewhere';

    const again = await store.workflows.getById('wf_greeting');
    expect(again?.nodes).toHaveLength(3);
    expect(again?.edges[0].target).toBe('upper');
  });

  it('submitted workflows are copied on the way in', async () => {
    const store = createMemoryStore();
    const workflow = greetingWorkflow();
    await store.workflows.create(workflow);
    workflow.name = 'Renamed';

    expect((await store.workflows.getById('wf_greeting'))?.name).toBe('Test Workflow');
  });

  it('replacing a definition keeps its creation time', async () => {
    const store = createMemoryStore();
    const first = await store.workflows.create({ ...greetingWorkflow(), createdAt: '2024-01-01T00:00:00.000Z' });
    const second = await store.workflows.create({ ...greetingWorkflow(), name: 'Second' });

    expect(second.createdAt).toBe(first.createdAt);
    expect(second.name).toBe('Second');
  });

  it('lists with offset and limit, and deletes', async () => {
    const store = createMemoryStore();
    for (const id of ['wf_a', 'wf_b', 'wf_c']) await store.workflows.create(greetingWorkflow(id));

    expect((await store.workflows.list({ offset: 1, limit: 1 })).map((w) => w.id)).toEqual(['wf_b']);
    expect(await store.workflows.delete('wf_b')).toBe(true);
    expect(await store.workflows.delete('wf_b')).toBe(false);
    expect((await store.workflows.list()).map((w) => w.id)).toEqual(['wf_a', 'wf_c']);
  });
});

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { ToolDispatcher } from '../../src/dispatcher.js';
import { defineTool } from '../../src/tools/define.js';
import { json } from '../support/fake-ticktick.js';
import { setupGateway } from '../support/harness.js';

const TOOL_NAMES = [
  'ticktick_get_projects',
  'ticktick_get_project',
  'ticktick_get_project_tasks',
  'ticktick_create_project',
  'ticktick_delete_project',
  'ticktick_get_task',
  'ticktick_create_task',
  'ticktick_update_task',
  'ticktick_complete_task',
  'ticktick_delete_task',
  'ticktick_create_subtask',
  'ticktick_get_all_tasks',
  'ticktick_get_tasks_by_priority',
  'ticktick_get_tasks_due_today',
  'ticktick_get_tasks_due_tomorrow',
  'ticktick_get_tasks_due_in_days',
  'ticktick_get_tasks_due_this_week',
  'ticktick_get_overdue_tasks',
  'ticktick_search_tasks',
  'ticktick_batch_create_tasks',
  'ticktick_get_engaged_tasks',
  'ticktick_get_next_tasks',
];

describe('ToolDispatcher', () => {
  it('exposes the full tool catalog', () => {
    const { gateway } = setupGateway();
    expect(gateway.dispatcher.list().map((t) => t.name)).toEqual(TOOL_NAMES);
  });

  it('rejects duplicate tool names', () => {
    const tool = defineTool({ name: 'echo', description: 'Echo', shape: {}, run: async () => null });
    expect(() => new ToolDispatcher([tool, tool])).toThrow('Duplicate tool name: echo');
  });

  it('answers an unknown tool with an error instead of throwing', async () => {
    const { api, gateway } = setupGateway();

    await expect(gateway.dispatcher.dispatch('ticktick_explode', {})).resolves.toEqual({
      error: { kind: 'UnknownTool', message: 'Unknown tool: ticktick_explode' },
    });
    expect(api.requests).toHaveLength(0);
  });

  it('validates arguments before any remote call', async () => {
    const { api, gateway } = setupGateway();

    await expect(gateway.dispatcher.dispatch('ticktick_create_task', { projectId: 'p1' })).resolves.toEqual({
      error: { kind: 'InvalidArguments', message: 'Invalid arguments: title: Required' },
    });
    await expect(gateway.dispatcher.dispatch('ticktick_search_tasks', { searchTerm: '   ' })).resolves.toEqual({
      error: { kind: 'InvalidArguments', message: 'Invalid arguments: searchTerm: Search term cannot be empty' },
    });
    await expect(
      gateway.dispatcher.dispatch('ticktick_get_tasks_by_priority', { priority: 2 }),
    ).resolves.toMatchObject({ error: { kind: 'InvalidArguments' } });
    await expect(gateway.dispatcher.dispatch('ticktick_get_task', undefined)).resolves.toMatchObject({
      error: { kind: 'InvalidArguments' },
    });
    expect(api.requests).toHaveLength(0);
  });

  it('returns the operation result', async () => {
    const { api, gateway } = setupGateway();
    const project = api.addProject({ name: 'Work' });

    await expect(
      gateway.dispatcher.dispatch('ticktick_create_task', { projectId: project.id, title: '  Write report  ' }),
    ).resolves.toMatchObject({ result: { projectId: project.id, title: 'Write report' } });
  });

  it('applies project defaults', async () => {
    const { api, gateway } = setupGateway();

    await gateway.dispatcher.dispatch('ticktick_create_project', { name: 'Garden' });

    expect(api.requests[0].body).toEqual({ name: 'Garden', color: '#F18181', viewMode: 'list', kind: 'TASK' });
  });

  it('maps remote failures to error envelopes', async () => {
    const { api, gateway } = setupGateway();
    api.respondWith(json(404, { errorMessage: 'project not found' }));

    await expect(gateway.dispatcher.dispatch('ticktick_get_project', { projectId: 'p9' })).resolves.toEqual({
      error: {
        kind: 'NotFound',
        message: 'Not found: GET /project/p9',
        detail: '{"errorMessage":"project not found"}',
      },
    });
  });

  it('summarizes batch creation', async () => {
    const { api, gateway } = setupGateway();
    const project = api.addProject({ name: 'Work' });

    const response = await gateway.dispatcher.dispatch('ticktick_batch_create_tasks', {
      tasks: [
        { projectId: project.id, title: 'One' },
        { projectId: project.id, title: '' },
        { projectId: project.id, title: 'Three' },
      ],
    });

    expect(response).toMatchObject({
      result: {
        created: 2,
        failed: 1,
        results: [
          { index: 0, status: 'created' },
          { index: 1, status: 'failed', error: { kind: 'InvalidArguments' } },
          { index: 2, status: 'created' },
        ],
      },
    });
  });

  it('accepts batch items of any shape and reports each one', async () => {
    const { api, gateway } = setupGateway();
    const project = api.addProject({ name: 'Work' });

    const response = await gateway.dispatcher.dispatch('ticktick_batch_create_tasks', {
      tasks: [{ projectId: project.id, title: 'a' }, 'oops', { projectId: project.id, title: 'c' }],
    });

    expect(response).toMatchObject({
      result: {
        created: 2,
        failed: 1,
        results: [
          { index: 0, status: 'created' },
          {
            index: 1,
            status: 'failed',
            error: { kind: 'InvalidArguments', message: 'Invalid arguments: (arguments): Expected object, received string' },
          },
          { index: 2, status: 'created' },
        ],
      },
    });
    expect(api.tasks.size).toBe(2);
  });

  it('rejects an empty batch', async () => {
    const { gateway } = setupGateway();

    await expect(gateway.dispatcher.dispatch('ticktick_batch_create_tasks', { tasks: [] })).resolves.toEqual({
      error: { kind: 'InvalidArguments', message: 'Invalid arguments: tasks: Provide at least one task' },
    });
  });

  it('runs derived views through the queries', async () => {
    const { api, gateway } = setupGateway();
    const project = api.addProject({ name: 'Work' });
    api.addTask({ projectId: project.id, title: 'Team meeting', dueDate: '2026-10-19T15:00:00.000+0000' });
    api.addTask({ projectId: project.id, title: 'Gym', dueDate: '2026-10-21T07:00:00.000+0000' });

    await expect(gateway.dispatcher.dispatch('ticktick_get_tasks_due_today', {})).resolves.toMatchObject({
      result: { count: 1, tasks: [{ title: 'Team meeting' }] },
    });
    await expect(
      gateway.dispatcher.dispatch('ticktick_get_tasks_due_in_days', { days: 2 }),
    ).resolves.toMatchObject({ result: { count: 1, tasks: [{ title: 'Gym' }] } });
    await expect(
      gateway.dispatcher.dispatch('ticktick_search_tasks', { searchTerm: 'MEETING' }),
    ).resolves.toMatchObject({ result: { count: 1 } });
  });

  it('reports unexpected failures as internal errors', async () => {
    const crashing = defineTool({
      name: 'crash',
      description: 'Always fails',
      shape: { value: z.string().optional() },
      run: async () => {
        throw new Error('boom');
      },
    });

    await expect(new ToolDispatcher([crashing]).dispatch('crash', {})).resolves.toEqual({
      error: { kind: 'Internal', message: 'Unexpected error: boom' },
    });
  });
});

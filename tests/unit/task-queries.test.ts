import { describe, it, expect, vi } from 'vitest';
import { TaskQueries, type TaskSource } from '../../src/task-queries.js';
import { TickTickProject, TickTickTask } from '../../src/types.js';
import { setupGateway } from '../support/harness.js';

describe('TaskQueries', () => {
  it('fetches open projects and then the Inbox one after another, skipping closed ones', async () => {
    const order: string[] = [];
    const source: TaskSource = {
      getProjects: vi.fn<TaskSource['getProjects']>().mockResolvedValue([
        TickTickProject.parse({ id: 'p1', name: 'Work' }),
        TickTickProject.parse({ id: 'p2', name: 'Archive', closed: true }),
        TickTickProject.parse({ id: 'p3', name: 'Home' }),
      ]),
      getProjectTasks: vi.fn<TaskSource['getProjectTasks']>().mockImplementation(async (projectId) => {
        order.push(`start ${projectId}`);
        await Promise.resolve();
        order.push(`end ${projectId}`);
        return [TickTickTask.parse({ id: `${projectId}-t`, projectId, title: `Task in ${projectId}` })];
      }),
    };

    const tasks = await new TaskQueries(source, 'UTC').fetchAllTasks();

    expect(tasks.map((t) => t.id)).toEqual(['p1-t', 'p3-t', 'inbox-t']);
    expect(order).toEqual(['start p1', 'end p1', 'start p3', 'end p3', 'start inbox', 'end inbox']);
  });

  it('fails the whole query when one project cannot be read', async () => {
    const source: TaskSource = {
      getProjects: vi.fn<TaskSource['getProjects']>().mockResolvedValue([
        TickTickProject.parse({ id: 'p1', name: 'Work' }),
      ]),
      getProjectTasks: vi.fn<TaskSource['getProjectTasks']>().mockRejectedValue(new Error('boom')),
    };

    await expect(new TaskQueries(source, 'UTC').run({ kind: 'all' })).rejects.toThrow('boom');
  });

  it('includes Inbox tasks in derived views', async () => {
    const { api, gateway } = setupGateway();
    const project = api.addProject({ name: 'Work' });
    api.addTask({ projectId: project.id, title: 'report', dueDate: '2026-10-25T09:00:00.000+0000' });
    api.addTask({ projectId: api.inbox.id, title: 'call the dentist', dueDate: '2026-10-19T09:00:00.000+0000' });

    const today = await gateway.queries.run({ kind: 'dueToday' });

    expect(today).toMatchObject({ count: 1, tasks: [{ title: 'call the dentist', projectId: 'inbox1' }] });
    expect(api.apiCalls().map((r) => `${r.method} ${r.path}`)).toEqual([
      'GET /project',
      `GET /project/${project.id}/data`,
      'GET /project/inbox/data',
    ]);
  });

  it('does not fetch the Inbox twice when the project list already has it', async () => {
    const source: TaskSource = {
      getProjects: vi.fn<TaskSource['getProjects']>().mockResolvedValue([
        TickTickProject.parse({ id: 'inbox123', name: 'Inbox' }),
      ]),
      getProjectTasks: vi.fn<TaskSource['getProjectTasks']>().mockResolvedValue([]),
    };

    await new TaskQueries(source, 'UTC').fetchAllTasks();

    expect(source.getProjectTasks).toHaveBeenCalledTimes(1);
    expect(source.getProjectTasks).toHaveBeenCalledWith('inbox123', undefined);
  });

  it('skips an Inbox the account does not have', async () => {
    const { api, gateway } = setupGateway();
    api.hasInbox = false;
    const project = api.addProject({ name: 'Work' });
    api.addTask({ projectId: project.id, title: 'report' });

    await expect(gateway.queries.run({ kind: 'all' })).resolves.toMatchObject({ count: 1, tasks: [{ title: 'report' }] });
  });

  it('evaluates date views against today in the configured zone', async () => {
    const { api, gateway } = setupGateway({ timeZone: 'Asia/Tokyo' });
    const project = api.addProject({ name: 'Work' });
    // 2026-10-19T12:00Z is 21:00 in Tokyo; 16:00Z is already the 20th there
    api.addTask({ projectId: project.id, title: 'tonight', dueDate: '2026-10-19T14:00:00.000+0000' });
    api.addTask({ projectId: project.id, title: 'tomorrow morning', dueDate: '2026-10-19T16:00:00.000+0000' });

    const today = await gateway.queries.run({ kind: 'dueToday' });
    const tomorrow = await gateway.queries.run({ kind: 'dueTomorrow' });

    expect(today).toMatchObject({ count: 1, tasks: [{ title: 'tonight' }] });
    expect(tomorrow).toMatchObject({ count: 1, tasks: [{ title: 'tomorrow morning' }] });
  });
});

import { z } from 'zod';
import type { TickTickClient } from '../ticktick-client.js';
import { CreateProjectFields } from '../types.js';
import { defineTool, type ToolDefinition } from './define.js';

const projectId = z.string().min(1).describe('Project/list ID');

export function projectTools(client: TickTickClient): ToolDefinition[] {
  return [
    defineTool({
      name: 'ticktick_get_projects',
      description:
        'Use this to list all TickTick projects/lists. Returns an array of projects with id, name, color, viewMode and kind. No parameters required.',
      shape: {},
      run: (_args, { signal }) => client.getProjects({ signal }),
    }),

    defineTool({
      name: 'ticktick_get_project',
      description: 'Use this to get a single TickTick project by ID. Required: projectId.',
      shape: { projectId },
      run: ({ projectId }, { signal }) => client.getProject(projectId, { signal }),
    }),

    defineTool({
      name: 'ticktick_get_project_tasks',
      description: 'Use this to list the uncompleted tasks of one project. Required: projectId.',
      shape: { projectId },
      run: async ({ projectId }, { signal }) => {
        const tasks = await client.getProjectTasks(projectId, { signal });
        return { count: tasks.length, tasks };
      },
    }),

    defineTool({
      name: 'ticktick_create_project',
      description:
        'Use this to create a new TickTick project/list. Required: name (1-200 characters). Optional: color (hex, default #F18181), viewMode (list, kanban or timeline; default list), kind (TASK or NOTE; default TASK).',
      shape: CreateProjectFields,
      run: (input, { signal }) => client.createProject(input, { signal }),
    }),

    defineTool({
      name: 'ticktick_delete_project',
      description: 'Use this to delete a project and all of its tasks. Required: projectId.',
      shape: { projectId },
      run: ({ projectId }, { signal }) => client.deleteProject(projectId, { signal }),
    }),
  ];
}

import type { TickTickClient } from '../ticktick-client.js';
import { CreateSubtaskFields, CreateTaskFields, TaskRefFields, UpdateTaskFields } from '../types.js';
import { defineTool, type ToolDefinition } from './define.js';

export function taskTools(client: TickTickClient): ToolDefinition[] {
  return [
    defineTool({
      name: 'ticktick_get_task',
      description: 'Use this to get a single task with full details. Required: projectId and taskId.',
      shape: TaskRefFields,
      run: ({ projectId, taskId }, { signal }) => client.getTask(projectId, taskId, { signal }),
    }),

    defineTool({
      name: 'ticktick_create_task',
      description:
        'Use this to create a new task in TickTick. Required: projectId, title. Optional: content, startDate, dueDate (ISO 8601, e.g. 2026-03-01T09:00:00+0000), priority (0=none, 1=low, 3=medium, 5=high), isAllDay.',
      shape: CreateTaskFields,
      run: (input, { signal }) => client.createTask(input, { signal }),
    }),

    defineTool({
      name: 'ticktick_update_task',
      description:
        'Use this to modify an existing task. Required: taskId, projectId. Optional: title, content, startDate, dueDate, priority, isAllDay. Only provided fields are updated; pass null for a date to clear it.',
      shape: UpdateTaskFields,
      run: ({ taskId, projectId, ...update }, { signal }) =>
        client.updateTask(taskId, projectId, update, { signal }),
    }),

    defineTool({
      name: 'ticktick_complete_task',
      description: 'Use this to mark a task as done. Completing an already completed task is not an error. Required: projectId and taskId.',
      shape: TaskRefFields,
      run: ({ projectId, taskId }, { signal }) => client.completeTask(projectId, taskId, { signal }),
    }),

    defineTool({
      name: 'ticktick_delete_task',
      description: 'Use this to delete a task and its subtasks. Required: projectId and taskId.',
      shape: TaskRefFields,
      run: ({ projectId, taskId }, { signal }) => client.deleteTask(projectId, taskId, { signal }),
    }),

    defineTool({
      name: 'ticktick_create_subtask',
      description:
        "Use this to add a subtask (checklist item) to the end of a task's subtask list. Required: projectId, parentTaskId, title. Returns the updated parent task.",
      shape: CreateSubtaskFields,
      run: ({ projectId, parentTaskId, title }, { signal }) =>
        client.createSubtask(projectId, parentTaskId, title, { signal }),
    }),
  ];
}

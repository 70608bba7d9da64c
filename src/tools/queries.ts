import { z } from 'zod';
import type { TaskQueries } from '../task-queries.js';
import type { TickTickClient } from '../ticktick-client.js';
import { defineTool, type ToolDefinition } from './define.js';

const ORDERING_NOTE = 'Results are sorted by due date (undated last), then by priority, highest first.';

export function queryTools(client: TickTickClient, queries: TaskQueries): ToolDefinition[] {
  return [
    defineTool({
      name: 'ticktick_get_all_tasks',
      description: `Use this to list every uncompleted task across all open projects. ${ORDERING_NOTE}`,
      shape: {},
      run: (_args, { signal }) => queries.run({ kind: 'all' }, { signal }),
    }),

    defineTool({
      name: 'ticktick_get_tasks_by_priority',
      description: `Use this to list tasks with an exact priority. Required: priority (0=none, 1=low, 3=medium, 5=high). ${ORDERING_NOTE}`,
      shape: {
        priority: z
          .union([z.literal(0), z.literal(1), z.literal(3), z.literal(5)])
          .describe('Priority: 0=none, 1=low, 3=medium, 5=high'),
      },
      run: ({ priority }, { signal }) => queries.run({ kind: 'priority', priority }, { signal }),
    }),

    defineTool({
      name: 'ticktick_get_tasks_due_today',
      description: `Use this to list tasks due today in the configured time zone. ${ORDERING_NOTE}`,
      shape: {},
      run: (_args, { signal }) => queries.run({ kind: 'dueToday' }, { signal }),
    }),

    defineTool({
      name: 'ticktick_get_tasks_due_tomorrow',
      description: `Use this to list tasks due tomorrow in the configured time zone. ${ORDERING_NOTE}`,
      shape: {},
      run: (_args, { signal }) => queries.run({ kind: 'dueTomorrow' }, { signal }),
    }),

    defineTool({
      name: 'ticktick_get_tasks_due_in_days',
      description: `Use this to list tasks due exactly N days from today (0 = today). Required: days. ${ORDERING_NOTE}`,
      shape: {
        days: z.number().int().min(0).max(3650).describe('Number of days from today'),
      },
      run: ({ days }, { signal }) => queries.run({ kind: 'dueInDays', days }, { signal }),
    }),

    defineTool({
      name: 'ticktick_get_tasks_due_this_week',
      description: `Use this to list tasks due from today through the next 6 days. ${ORDERING_NOTE}`,
      shape: {},
      run: (_args, { signal }) => queries.run({ kind: 'dueThisWeek' }, { signal }),
    }),

    defineTool({
      name: 'ticktick_get_overdue_tasks',
      description: `Use this to list open tasks whose due date is before today. ${ORDERING_NOTE}`,
      shape: {},
      run: (_args, { signal }) => queries.run({ kind: 'overdue' }, { signal }),
    }),

    defineTool({
      name: 'ticktick_search_tasks',
      description: `Use this to search tasks by title, content or subtask titles (case-insensitive). Required: searchTerm. ${ORDERING_NOTE}`,
      shape: {
        searchTerm: z.string().trim().min(1, 'Search term cannot be empty').describe('Text to search for'),
      },
      run: ({ searchTerm }, { signal }) => queries.run({ kind: 'search', term: searchTerm }, { signal }),
    }),

    defineTool({
      name: 'ticktick_batch_create_tasks',
      description:
        'Use this to create several tasks in one call. Required: tasks, a list of objects with projectId and title, plus optional content, startDate, dueDate, priority, isAllDay. Tasks are created in order; each gets its own result, and a failed item does not undo the others.',
      shape: {
        tasks: z
          .array(z.unknown())
          .min(1, 'Provide at least one task')
          .max(100)
          .describe('Task specifications, each validated on its own'),
      },
      run: async ({ tasks }, { signal }) => {
        const results = await client.batchCreateTasks(tasks, { signal });
        const created = results.filter((r) => r.status === 'created').length;
        return { created, failed: results.length - created, results };
      },
    }),

    defineTool({
      name: 'ticktick_get_engaged_tasks',
      description:
        'Use this to list GTD "engaged" tasks: open tasks that are high priority, due today, or overdue.',
      shape: {},
      run: (_args, { signal }) => queries.run({ kind: 'engaged' }, { signal }),
    }),

    defineTool({
      name: 'ticktick_get_next_tasks',
      description:
        'Use this to list GTD "next" tasks: open tasks that are not engaged and are medium priority or due tomorrow.',
      shape: {},
      run: (_args, { signal }) => queries.run({ kind: 'next' }, { signal }),
    }),
  ];
}

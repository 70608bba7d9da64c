import { z } from 'zod';
import { parseDate } from './dates.js';

// --- Enumerations ---

export const Priority = {
  None: 0,
  Low: 1,
  Medium: 3,
  High: 5,
} as const;

export type PriorityValue = (typeof Priority)[keyof typeof Priority];

export const TaskStatus = {
  Open: 0,
  Completed: 2,
} as const;

const priority = z.union([z.literal(0), z.literal(1), z.literal(3), z.literal(5)]);

const isoDate = z
  .string()
  .refine((s) => parseDate(s) !== null, { message: 'Expected an ISO 8601 date, e.g. 2026-03-01T09:00:00+0000' });

// --- Input shapes (tool parameters) ---

export const CreateProjectFields = {
  name: z.string().trim().min(1).max(200).describe('Project name'),
  color: z
    .string()
    .regex(/^#[0-9a-fA-F]{6}$/, 'Expected a hex color such as #F18181')
    .default('#F18181')
    .describe('Hex color code'),
  viewMode: z.enum(['list', 'kanban', 'timeline']).default('list').describe('View mode: list, kanban or timeline'),
  kind: z.enum(['TASK', 'NOTE']).default('TASK').describe('Project kind: TASK or NOTE'),
};

export const CreateProjectInput = z.object(CreateProjectFields);

export const CreateTaskFields = {
  projectId: z.string().min(1).describe('Project/list ID to add the task to'),
  title: z.string().trim().min(1).max(500).describe('Task title'),
  content: z.string().max(5000).optional().describe('Task description/notes'),
  startDate: isoDate.optional().describe('Start date in ISO 8601 format'),
  dueDate: isoDate.optional().describe('Due date in ISO 8601 format'),
  priority: priority.optional().describe('Priority: 0=none, 1=low, 3=medium, 5=high'),
  isAllDay: z.boolean().optional().describe('Whether the task is an all-day task'),
};

export const CreateTaskInput = z.object(CreateTaskFields);

export const UpdateTaskFields = {
  taskId: z.string().min(1).describe('Task ID to update'),
  projectId: z.string().min(1).describe('Project/list ID the task belongs to'),
  title: z.string().trim().min(1).max(500).optional().describe('New title'),
  content: z.string().max(5000).optional().describe('New description/notes'),
  startDate: isoDate.nullable().optional().describe('Start date (ISO 8601) or null to clear'),
  dueDate: isoDate.nullable().optional().describe('Due date (ISO 8601) or null to clear'),
  priority: priority.optional().describe('Priority: 0=none, 1=low, 3=medium, 5=high'),
  isAllDay: z.boolean().optional().describe('Whether the task is an all-day task'),
};

export const UpdateTaskInput = z.object(UpdateTaskFields);

export const TaskRefFields = {
  projectId: z.string().min(1).describe('Project/list ID the task belongs to'),
  taskId: z.string().min(1).describe('Task ID'),
};

export const CreateSubtaskFields = {
  projectId: z.string().min(1).describe('Project/list ID of the parent task'),
  parentTaskId: z.string().min(1).describe('ID of the parent task'),
  title: z.string().trim().min(1).max(500).describe('Subtask title'),
};

// --- OAuth token response schema ---

export const TokenRefreshResponse = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().min(1).optional(),
  expires_in: z.number().positive().optional(),
});

// --- API response schemas (output validation) ---

export const TickTickSubtask = z
  .object({
    id: z.string().optional(),
    title: z.string(),
    status: z.number().optional().default(0),
  })
  .passthrough();

export const TickTickTask = z
  .object({
    id: z.string(),
    projectId: z.string(),
    title: z.string(),
    content: z.string().optional(),
    status: z.number().optional().default(0),
    priority: z.number().optional().default(0),
    dueDate: z.string().nullable().optional(),
    startDate: z.string().nullable().optional(),
    isAllDay: z.boolean().optional(),
    timeZone: z.string().optional(),
    items: z.array(TickTickSubtask).optional().default([]),
  })
  .passthrough();

export const TickTickProject = z
  .object({
    id: z.string(),
    name: z.string(),
    color: z.string().optional(),
    viewMode: z.string().optional(),
    kind: z.string().optional(),
    closed: z.boolean().optional(),
  })
  .passthrough();

export const TickTickProjectData = z
  .object({
    project: z.unknown().optional(),
    tasks: z.array(z.unknown()).optional().default([]),
  })
  .passthrough();

// --- Inferred types ---

export type CreateProjectInputType = z.infer<typeof CreateProjectInput>;
export type CreateTaskInputType = z.infer<typeof CreateTaskInput>;
export type UpdateTaskInputType = z.infer<typeof UpdateTaskInput>;
export type TickTickTaskType = z.infer<typeof TickTickTask>;
export type TickTickProjectType = z.infer<typeof TickTickProject>;

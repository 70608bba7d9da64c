import type { z } from 'zod';
import {
  GatewayError,
  InvalidArgumentsError,
  InvalidRequestError,
  UpstreamError,
  toErrorEnvelope,
  type ErrorEnvelope,
} from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import type { ApiExecutor, RequestOptions } from './request-executor.js';
import {
  CreateTaskInput,
  TaskStatus,
  TickTickProject,
  TickTickProjectData,
  TickTickTask,
  type CreateProjectInputType,
  type CreateTaskInputType,
  type TickTickProjectType,
  type TickTickTaskType,
  type UpdateTaskInputType,
} from './types.js';

export type TaskUpdate = Omit<UpdateTaskInputType, 'taskId' | 'projectId'>;

export type BatchItemOutcome =
  | { index: number; status: 'created'; task: TickTickTaskType }
  | { index: number; status: 'failed'; error: ErrorEnvelope };

const enc = encodeURIComponent;

function taskPath(projectId: string, taskId: string): string {
  return `/project/${enc(projectId)}/task/${enc(taskId)}`;
}

function parseOne<S extends z.ZodTypeAny>(schema: S, raw: unknown, what: string): z.output<S> {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const firstIssue = parsed.error.issues[0];
    throw new UpstreamError(
      `Unexpected ${what} in TickTick response`,
      undefined,
      firstIssue ? `${firstIssue.path.join('.')}: ${firstIssue.message}` : undefined,
    );
  }
  return parsed.data;
}

export class TickTickClient {
  constructor(
    private readonly executor: ApiExecutor,
    private readonly logger: Logger = silentLogger,
  ) {}

  // --- Projects ---

  async getProjects(options?: RequestOptions): Promise<TickTickProjectType[]> {
    const raw = await this.executor.execute('GET', '/project', undefined, options);
    if (!Array.isArray(raw)) {
      throw new UpstreamError('Expected a list of projects in TickTick response');
    }
    return this.parseMany(TickTickProject, raw, 'project');
  }

  async getProject(projectId: string, options?: RequestOptions): Promise<TickTickProjectType> {
    const raw = await this.executor.execute('GET', `/project/${enc(projectId)}`, undefined, options);
    return parseOne(TickTickProject, raw, 'project');
  }

  async getProjectTasks(projectId: string, options?: RequestOptions): Promise<TickTickTaskType[]> {
    const raw = await this.executor.execute('GET', `/project/${enc(projectId)}/data`, undefined, options);
    const data = parseOne(TickTickProjectData, raw ?? {}, 'project data');
    return this.parseMany(TickTickTask, data.tasks, 'task');
  }

  async createProject(input: CreateProjectInputType, options?: RequestOptions): Promise<TickTickProjectType> {
    const raw = await this.executor.execute('POST', '/project', input, options);
    return parseOne(TickTickProject, raw, 'project');
  }

  async deleteProject(projectId: string, options?: RequestOptions): Promise<{ deleted: true; projectId: string }> {
    await this.executor.execute('DELETE', `/project/${enc(projectId)}`, undefined, options);
    return { deleted: true, projectId };
  }

  // --- Tasks ---

  async getTask(projectId: string, taskId: string, options?: RequestOptions): Promise<TickTickTaskType> {
    const raw = await this.executor.execute('GET', taskPath(projectId, taskId), undefined, options);
    return parseOne(TickTickTask, raw, 'task');
  }

  async createTask(input: CreateTaskInputType, options?: RequestOptions): Promise<TickTickTaskType> {
    const raw = await this.executor.execute('POST', '/task', input, options);
    return parseOne(TickTickTask, raw, 'task');
  }

  /** Sends only the supplied fields; the remote keeps everything else. */
  async updateTask(
    taskId: string,
    projectId: string,
    update: TaskUpdate,
    options?: RequestOptions,
  ): Promise<TickTickTaskType> {
    const body: Record<string, unknown> = { id: taskId, projectId };
    for (const [key, value] of Object.entries(update)) {
      if (value !== undefined) body[key] = value;
    }
    const raw = await this.executor.execute('POST', `/task/${enc(taskId)}`, body, options);
    return parseOne(TickTickTask, raw, 'task');
  }

  async completeTask(
    projectId: string,
    taskId: string,
    options?: RequestOptions,
  ): Promise<{ completed: true; projectId: string; taskId: string }> {
    try {
      await this.executor.execute('POST', `${taskPath(projectId, taskId)}/complete`, undefined, options);
    } catch (e: unknown) {
      if (!(e instanceof InvalidRequestError)) throw e;
      // Some accounts answer a repeated completion with a 4xx; a task that
      // reads back as completed means the call already took effect.
      const task = await this.getTask(projectId, taskId, options);
      if (task.status !== TaskStatus.Completed) throw e;
      this.logger.debug('Task was already completed', { projectId, taskId });
    }
    return { completed: true, projectId, taskId };
  }

  async deleteTask(
    projectId: string,
    taskId: string,
    options?: RequestOptions,
  ): Promise<{ deleted: true; projectId: string; taskId: string }> {
    await this.executor.execute('DELETE', taskPath(projectId, taskId), undefined, options);
    return { deleted: true, projectId, taskId };
  }

  /** Appends a checklist item to the parent task's subtask sequence. */
  async createSubtask(
    projectId: string,
    parentTaskId: string,
    title: string,
    options?: RequestOptions,
  ): Promise<TickTickTaskType> {
    const parent = await this.getTask(projectId, parentTaskId, options);
    const items = [...parent.items, { title, status: TaskStatus.Open }];
    const raw = await this.executor.execute(
      'POST',
      `/task/${enc(parentTaskId)}`,
      { id: parentTaskId, projectId, items },
      options,
    );
    return parseOne(TickTickTask, raw, 'task');
  }

  /**
   * Creates tasks one at a time. Each item gets its own outcome, in input
   * order; earlier successes stay in place when a later item fails.
   */
  async batchCreateTasks(items: readonly unknown[], options?: RequestOptions): Promise<BatchItemOutcome[]> {
    const outcomes: BatchItemOutcome[] = [];

    for (const [index, item] of items.entries()) {
      const parsed = CreateTaskInput.safeParse(item);
      if (!parsed.success) {
        outcomes.push({ index, status: 'failed', error: toErrorEnvelope(InvalidArgumentsError.fromZod(parsed.error)) });
        continue;
      }

      try {
        const task = await this.createTask(parsed.data, options);
        outcomes.push({ index, status: 'created', task });
      } catch (e: unknown) {
        if (!(e instanceof GatewayError)) throw e;
        if (e.kind === 'Cancelled') throw e;
        this.logger.warn('Batch item failed', { index, kind: e.kind });
        outcomes.push({ index, status: 'failed', error: toErrorEnvelope(e) });
      }
    }

    return outcomes;
  }

  private parseMany<S extends z.ZodTypeAny>(schema: S, raw: unknown[], what: string): z.output<S>[] {
    const valid: z.output<S>[] = [];
    let dropped = 0;
    for (const entry of raw) {
      const parsed = schema.safeParse(entry);
      if (parsed.success) {
        valid.push(parsed.data);
      } else {
        dropped++;
      }
    }
    if (dropped > 0) {
      this.logger.warn(`Dropped ${dropped} ${what}(s) that could not be parsed`);
    }
    return valid;
  }
}

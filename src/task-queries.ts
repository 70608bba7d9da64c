import { todayIn } from './dates.js';
import { NotFoundError } from './errors.js';
import { filterTasks, type TaskView } from './filtering.js';
import { silentLogger, type Logger } from './logger.js';
import type { RequestOptions } from './request-executor.js';
import type { TickTickClient } from './ticktick-client.js';
import type { TickTickTaskType } from './types.js';

export type TaskSource = Pick<TickTickClient, 'getProjects' | 'getProjectTasks'>;

/** Alias the open API accepts for the account's Inbox, which the project list omits. */
export const INBOX_PROJECT_ID = 'inbox';

export interface TaskQueryResult {
  count: number;
  tasks: TickTickTaskType[];
}

export class TaskQueries {
  private readonly now: () => Date;

  constructor(
    private readonly source: TaskSource,
    private readonly timeZone: string,
    now?: () => Date,
    private readonly logger: Logger = silentLogger,
  ) {
    this.now = now ?? (() => new Date());
  }

  /**
   * One list call per open project, then one for the Inbox, run one after
   * another so the pacing gate sees them in order. Any failure fails the
   * whole fetch, except an Inbox the account does not have.
   */
  async fetchAllTasks(options?: RequestOptions): Promise<TickTickTaskType[]> {
    const projects = await this.source.getProjects(options);
    const tasks: TickTickTaskType[] = [];
    for (const project of projects) {
      if (project.closed) continue;
      tasks.push(...(await this.source.getProjectTasks(project.id, options)));
    }
    if (!projects.some((project) => project.id.startsWith(INBOX_PROJECT_ID))) {
      tasks.push(...(await this.fetchInboxTasks(options)));
    }
    return tasks;
  }

  private async fetchInboxTasks(options?: RequestOptions): Promise<TickTickTaskType[]> {
    try {
      return await this.source.getProjectTasks(INBOX_PROJECT_ID, options);
    } catch (e: unknown) {
      if (!(e instanceof NotFoundError)) throw e;
      this.logger.warn('Inbox not found, skipping it', { detail: e.detail });
      return [];
    }
  }

  async run(view: TaskView, options?: RequestOptions): Promise<TaskQueryResult> {
    const all = await this.fetchAllTasks(options);
    const tasks = filterTasks(all, view, {
      today: todayIn(this.timeZone, this.now()),
      timeZone: this.timeZone,
    });
    return { count: tasks.length, tasks };
  }
}

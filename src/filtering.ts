import { addDays, parseDate, toCalendarDate } from './dates.js';
import { Priority, TaskStatus, type PriorityValue, type TickTickTaskType } from './types.js';

export type TaskView =
  | { kind: 'all' }
  | { kind: 'priority'; priority: PriorityValue }
  | { kind: 'dueToday' }
  | { kind: 'dueTomorrow' }
  | { kind: 'dueInDays'; days: number }
  | { kind: 'dueThisWeek' }
  | { kind: 'overdue' }
  | { kind: 'search'; term: string }
  | { kind: 'engaged' }
  | { kind: 'next' };

export interface DateContext {
  /** Today's calendar date (YYYY-MM-DD) in `timeZone`. */
  today: string;
  timeZone: string;
}

type DueInfo = { date: string; epochMs: number } | null;

function dueInfo(task: TickTickTaskType, timeZone: string): DueInfo {
  if (!task.dueDate) return null;
  const parsed = parseDate(task.dueDate);
  if (!parsed) return null;
  return {
    date: toCalendarDate(parsed, timeZone),
    epochMs: parsed.kind === 'instant' ? parsed.epochMs : Number.NEGATIVE_INFINITY,
  };
}

function dueDate(task: TickTickTaskType, ctx: DateContext): string | null {
  return dueInfo(task, ctx.timeZone)?.date ?? null;
}

export function isOpen(task: TickTickTaskType): boolean {
  return task.status !== TaskStatus.Completed;
}

export function isDueOn(task: TickTickTaskType, date: string, ctx: DateContext): boolean {
  return dueDate(task, ctx) === date;
}

export function isDueThisWeek(task: TickTickTaskType, ctx: DateContext): boolean {
  const due = dueDate(task, ctx);
  return due !== null && due >= ctx.today && due < addDays(ctx.today, 7);
}

export function isOverdue(task: TickTickTaskType, ctx: DateContext): boolean {
  const due = dueDate(task, ctx);
  return due !== null && due < ctx.today && isOpen(task);
}

export function matchesSearch(task: TickTickTaskType, term: string): boolean {
  const needle = term.toLowerCase();
  const fields = [task.title, task.content ?? '', ...task.items.map((item) => item.title)];
  return fields.some((field) => field.toLowerCase().includes(needle));
}

export function isEngaged(task: TickTickTaskType, ctx: DateContext): boolean {
  return (
    isOpen(task) &&
    (task.priority === Priority.High || isDueOn(task, ctx.today, ctx) || isOverdue(task, ctx))
  );
}

export function isNext(task: TickTickTaskType, ctx: DateContext): boolean {
  return (
    isOpen(task) &&
    !isEngaged(task, ctx) &&
    (task.priority === Priority.Medium || isDueOn(task, addDays(ctx.today, 1), ctx))
  );
}

function predicateFor(view: TaskView, ctx: DateContext): (task: TickTickTaskType) => boolean {
  switch (view.kind) {
    case 'all':
      return () => true;
    case 'priority':
      return (task) => task.priority === view.priority;
    case 'dueToday':
      return (task) => isDueOn(task, ctx.today, ctx);
    case 'dueTomorrow':
      return (task) => isDueOn(task, addDays(ctx.today, 1), ctx);
    case 'dueInDays': {
      const target = addDays(ctx.today, view.days);
      return (task) => isDueOn(task, target, ctx);
    }
    case 'dueThisWeek':
      return (task) => isDueThisWeek(task, ctx);
    case 'overdue':
      return (task) => isOverdue(task, ctx);
    case 'search':
      return (task) => matchesSearch(task, view.term);
    case 'engaged':
      return (task) => isEngaged(task, ctx);
    case 'next':
      return (task) => isNext(task, ctx);
  }
}

/**
 * Due date ascending (undated last), then priority descending. The sort is
 * stable, so equal keys keep fetch order.
 */
export function sortTasks(tasks: readonly TickTickTaskType[], timeZone: string): TickTickTaskType[] {
  const keyed = tasks.map((task) => ({ task, due: dueInfo(task, timeZone) }));
  keyed.sort((a, b) => {
    if (a.due && b.due) {
      if (a.due.date !== b.due.date) return a.due.date < b.due.date ? -1 : 1;
      if (a.due.epochMs !== b.due.epochMs) return a.due.epochMs < b.due.epochMs ? -1 : 1;
    } else if (a.due || b.due) {
      return a.due ? -1 : 1;
    }
    return b.task.priority - a.task.priority;
  });
  return keyed.map((entry) => entry.task);
}

export function filterTasks(
  tasks: readonly TickTickTaskType[],
  view: TaskView,
  ctx: DateContext,
): TickTickTaskType[] {
  return sortTasks(tasks.filter(predicateFor(view, ctx)), ctx.timeZone);
}

import type { TaskQueries } from '../task-queries.js';
import type { TickTickClient } from '../ticktick-client.js';
import type { ToolDefinition } from './define.js';
import { projectTools } from './projects.js';
import { queryTools } from './queries.js';
import { taskTools } from './tasks.js';

export type { ToolContext, ToolDefinition } from './define.js';

export function createToolCatalog(client: TickTickClient, queries: TaskQueries): ToolDefinition[] {
  return [...projectTools(client), ...taskTools(client), ...queryTools(client, queries)];
}

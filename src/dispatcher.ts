import { UnknownToolError, toErrorEnvelope, type ErrorEnvelope } from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import type { ToolContext, ToolDefinition } from './tools/index.js';

export type ToolResponse = { result: unknown } | { error: ErrorEnvelope };

export class ToolDispatcher {
  private readonly tools = new Map<string, ToolDefinition>();

  constructor(
    definitions: readonly ToolDefinition[],
    private readonly logger: Logger = silentLogger,
  ) {
    for (const definition of definitions) {
      if (this.tools.has(definition.name)) {
        throw new Error(`Duplicate tool name: ${definition.name}`);
      }
      this.tools.set(definition.name, definition);
    }
  }

  list(): ToolDefinition[] {
    return [...this.tools.values()];
  }

  /** Never throws: every failure comes back as an error envelope. */
  async dispatch(toolName: string, args: unknown, ctx: ToolContext = {}): Promise<ToolResponse> {
    const started = Date.now();
    try {
      const tool = this.tools.get(toolName);
      if (!tool) throw new UnknownToolError(toolName);

      const result = await tool.execute(args, ctx);
      this.logger.debug('Tool call succeeded', { tool: toolName, ms: Date.now() - started });
      return { result };
    } catch (e: unknown) {
      const error = toErrorEnvelope(e);
      if (error.kind === 'Internal') {
        this.logger.error('Tool call crashed', {
          tool: toolName,
          stack: e instanceof Error ? e.stack : undefined,
        });
      } else {
        this.logger.info('Tool call failed', { tool: toolName, kind: error.kind, ms: Date.now() - started });
      }
      return { error };
    }
  }
}

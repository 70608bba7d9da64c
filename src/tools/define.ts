import { z, type ZodRawShape } from 'zod';
import { InvalidArgumentsError } from '../errors.js';

export interface ToolContext {
  signal?: AbortSignal;
}

export interface ToolDefinition {
  name: string;
  description: string;
  shape: ZodRawShape;
  /** Validates raw arguments, then runs the tool. */
  execute(args: unknown, ctx: ToolContext): Promise<unknown>;
}

export function defineTool<S extends ZodRawShape>(options: {
  name: string;
  description: string;
  shape: S;
  run: (args: z.output<z.ZodObject<S>>, ctx: ToolContext) => Promise<unknown>;
}): ToolDefinition {
  const schema = z.object(options.shape);
  return {
    name: options.name,
    description: options.description,
    shape: options.shape,
    async execute(args, ctx) {
      const parsed = schema.safeParse(args ?? {});
      if (!parsed.success) {
        throw InvalidArgumentsError.fromZod(parsed.error);
      }
      return options.run(parsed.data, ctx);
    },
  };
}

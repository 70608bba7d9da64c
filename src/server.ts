import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { CallToolRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import type { ToolDispatcher, ToolResponse } from './dispatcher.js';

export const SERVER_INFO = {
  name: 'ticktick-gateway',
  version: '0.1.0',
} as const;

function toCallToolResult(response: ToolResponse) {
  if ('error' in response) {
    return {
      content: [{ type: 'text' as const, text: JSON.stringify(response, null, 2) }],
      isError: true as const,
    };
  }
  return {
    content: [{ type: 'text' as const, text: JSON.stringify(response.result ?? null, null, 2) }],
  };
}

export function createMcpServer(dispatcher: ToolDispatcher): McpServer {
  const server = new McpServer({ ...SERVER_INFO });

  const callTool = async (name: string, args: unknown, signal: AbortSignal) =>
    toCallToolResult(await dispatcher.dispatch(name, args, { signal }));

  // Registration advertises each tool's shape in tools/list
  for (const tool of dispatcher.list()) {
    server.tool(tool.name, tool.description, tool.shape, (args, extra) => callTool(tool.name, args, extra.signal));
  }

  // tools/call goes straight to the dispatcher, so argument problems and
  // unknown names come back as error envelopes rather than protocol errors
  server.server.removeRequestHandler('tools/call');
  server.server.setRequestHandler(CallToolRequestSchema, (request, extra) =>
    callTool(request.params.name, request.params.arguments, extra.signal),
  );

  return server;
}

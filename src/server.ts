import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ZoomTool } from './tools/zoom-tools.js';

export const SERVER_NAME = 'zoom-lms-connector';
export const SERVER_VERSION = '1.0.0';

export function buildServer(tools: Record<string, ZoomTool>): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  for (const [toolName, toolDef] of Object.entries(tools)) {
    server.registerTool(
      toolName,
      {
        title: toolName,
        description: toolDef.description,
        inputSchema: toolDef.inputShape,
      },
      (input) => toolDef.run(input)
    );
  }

  return server;
}

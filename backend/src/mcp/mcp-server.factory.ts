import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ToolRegistry } from '../tools/tool-registry';

export const MCP_SERVER_INFO = {
  name: 'identity-access-tools',
  version: '1.0.0',
} as const;

/**
 * Build an MCP server exposing every registry tool. Calls go through
 * ToolRegistry.dispatch, so MCP clients and the chat assistant share one
 * code path. Error results are returned with `isError: true`.
 */
export function createIdentityMcpServer(
  registry: Pick<ToolRegistry, 'list' | 'dispatch'>,
): McpServer {
  const server = new McpServer(MCP_SERVER_INFO);

  for (const definition of registry.list()) {
    server.registerTool(
      definition.name,
      {
        description: definition.description,
        inputSchema: definition.schema.shape,
      },
      async (args: unknown) => {
        const result = await registry.dispatch(definition.name, args);
        return {
          content: [{ type: 'text' as const, text: JSON.stringify(result) }],
          isError: result.status === 'error',
        };
      },
    );
  }

  return server;
}

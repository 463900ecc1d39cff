import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import logger from "./logger.js";

// Import all tool modules to trigger registration
import './tools/index.js';

import { getAllTools, executeTool, type ToolExecutionContext } from './services/routing/toolRegistry.js';
import type { ToolServices } from './services/service-container.js';

export const SERVER_NAME = "phase-state-mcp";
export const SERVER_VERSION = "0.1.0";

function contextFrom(extra: unknown, transportType: string): ToolExecutionContext {
  if (extra && typeof extra === 'object' && 'sessionId' in extra && typeof extra.sessionId === 'string') {
    return { sessionId: extra.sessionId, transportType };
  }
  return { sessionId: `${transportType}-session`, transportType };
}

/**
 * Creates an MCP server exposing every registered tool, bound to one set of
 * services. SSE creates one server per connection; all share `services`.
 */
export function createServer(services: ToolServices, transportType: 'stdio' | 'sse' = 'stdio'): McpServer {
  const server = new McpServer(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION
    },
    {
      instructions: "Tracks which workflow phase each git branch is in. Call initialize-project for an issue, initialize-branch for its branch, then transition-phase to advance one phase at a time."
    }
  );

  const allToolDefinitions = getAllTools();
  logger.info(`Registering ${allToolDefinitions.length} tools with MCP server.`);

  for (const definition of allToolDefinitions) {
    server.tool(
      definition.name,
      definition.description,
      definition.inputSchema,
      async (params: Record<string, unknown>, extra?: unknown): Promise<CallToolResult> => {
        const context = contextFrom(extra, transportType);
        logger.debug({ toolName: definition.name, sessionId: context.sessionId }, "Server handler executing tool with context");
        return executeTool(definition.name, params, services, context);
      }
    );
  }

  return server;
}

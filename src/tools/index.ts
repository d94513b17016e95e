// Tool Registry Index - registers all tools
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { Orchestrator } from '../orchestrator/orchestrator.js';
import { logger } from '../utils/logger.js';
import { runTool, toCallToolResult, type ToolDefinition } from './registry.js';
import { cleanupTaskTool, getTaskInfoTool, getTaskLogsTool, runTaskTool, waitNextEventTool } from './task-tools.js';
import { listReposTool, listSlotsTool, listTasksTool } from './status-tools.js';

export const toolRegistry: ToolDefinition[] = [
  runTaskTool,
  getTaskInfoTool,
  getTaskLogsTool,
  waitNextEventTool,
  cleanupTaskTool,
  listReposTool,
  listTasksTool,
  listSlotsTool,
];

export function getTool(name: string): ToolDefinition | undefined {
  return toolRegistry.find((tool) => tool.name === name);
}

/**
 * Register every tool on `server`. `connectionSignal` aborts when the HTTP
 * request carrying the call is closed.
 */
export function registerTools(server: McpServer, orchestrator: Orchestrator, connectionSignal?: AbortSignal): void {
  for (const tool of toolRegistry) {
    server.tool(tool.name, tool.description, tool.inputSchema, async (args, extra) => {
      logger.debug(`Tool call: ${tool.name}`, { args });
      const signal = connectionSignal ? AbortSignal.any([extra.signal, connectionSignal]) : extra.signal;
      return toCallToolResult(await runTool(tool, args, { orchestrator, signal }));
    });
  }
}

export * from './registry.js';
export { DEFAULT_WAIT_TIMEOUT_MS } from './task-tools.js';

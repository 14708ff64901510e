/**
 * Tool registration and dispatch
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { CommandOutput, ToolResult } from '../types/index.js';

import { logTool, logHandler } from './log.js';
import { reportTool, reportHandler, summaryTool, summaryHandler } from './report.js';
import { exportTool, exportHandler } from './export.js';
import { brainstormTool, brainstormHandler } from './brainstorm.js';
import { listTool, listHandler, removeTool, removeHandler } from './entries.js';

export type ToolHandler = (args: Record<string, unknown>) => Promise<ToolResult<CommandOutput>>;

// Tool registry
const tools: Map<string, Tool> = new Map();
const handlers: Map<string, ToolHandler> = new Map();

function register(tool: Tool, handler: ToolHandler): void {
  tools.set(tool.name, tool);
  handlers.set(tool.name, handler);
}

/**
 * Register all tools
 */
export function registerTools(): void {
  register(logTool, logHandler);
  register(summaryTool, summaryHandler);
  register(reportTool, reportHandler);
  register(exportTool, exportHandler);
  register(brainstormTool, brainstormHandler);
  register(listTool, listHandler);
  register(removeTool, removeHandler);
}

/**
 * Get all tool definitions
 */
export function getToolDefinitions(): Tool[] {
  if (tools.size === 0) {
    registerTools();
  }
  return Array.from(tools.values());
}

/**
 * Handle a tool call
 */
export async function handleToolCall(
  name: string,
  args: Record<string, unknown>
): Promise<ToolResult<CommandOutput>> {
  if (handlers.size === 0) {
    registerTools();
  }

  const handler = handlers.get(name);
  if (!handler) {
    return {
      success: false,
      error: `Unknown tool: ${name}`,
      code: 'UNKNOWN_TOOL',
    };
  }

  return handler(args);
}

/**
 * Shared Tool Registration
 *
 * Registers all MCP tools on a given McpServer instance.
 *
 * CRITICAL: NEVER use console.log() - stdout may be reserved for JSON-RPC protocol.
 *
 * @module server/register-tools
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ToolDefinition } from '../tools/shared.js';

import { extractionTools } from '../tools/extraction.js';
import { configTools } from '../tools/config.js';

/** All tool modules in registration order */
const allToolModules: Record<string, ToolDefinition>[] = [extractionTools, configTools];

/**
 * Register all tools on the given MCP server instance.
 *
 * @returns Number of tools registered
 * @throws Exits process with code 1 if duplicate tool names are detected
 */
export function registerAllTools(server: McpServer): number {
  const registeredToolNames = new Set<string>();
  let toolCount = 0;

  for (const toolModule of allToolModules) {
    for (const [name, tool] of Object.entries(toolModule)) {
      if (registeredToolNames.has(name)) {
        console.error(
          `[FATAL] Duplicate tool name detected: "${name}". Each tool must have a unique name.`
        );
        process.exit(1);
      }
      registeredToolNames.add(name);
      server.tool(name, tool.description, tool.inputSchema, tool.handler);
      toolCount++;
    }
  }

  return toolCount;
}

/**
 * Get total tool count without registering on a server instance.
 */
export function getToolCount(): number {
  let count = 0;
  for (const toolModule of allToolModules) {
    count += Object.keys(toolModule).length;
  }
  return count;
}

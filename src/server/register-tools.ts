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

import { searchTools, advancedSearchTools } from '../tools/search.js';
import { documentTools } from '../tools/documents.js';

export interface RegistrationOptions {
  /** Expose gallica_advanced_search */
  enableAdvancedSearch: boolean;
}

/**
 * Tool modules in registration order
 */
export function getToolModules(options: RegistrationOptions): Record<string, ToolDefinition>[] {
  return [
    searchTools,
    ...(options.enableAdvancedSearch ? [advancedSearchTools] : []),
    documentTools,
  ];
}

/**
 * Register all tools on the given MCP server instance.
 *
 * @returns Names of the registered tools
 * @throws Exits process with code 1 if duplicate tool names are detected
 */
export function registerAllTools(server: McpServer, options: RegistrationOptions): string[] {
  const registeredToolNames: string[] = [];

  for (const toolModule of getToolModules(options)) {
    for (const [name, tool] of Object.entries(toolModule)) {
      if (registeredToolNames.includes(name)) {
        console.error(
          `[FATAL] Duplicate tool name detected: "${name}". Each tool must have a unique name.`
        );
        process.exit(1);
      }
      registeredToolNames.push(name);
      server.tool(name, tool.description, tool.inputSchema, tool.handler);
    }
  }

  return registeredToolNames;
}

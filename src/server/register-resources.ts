/**
 * Shared Resource Registration
 *
 * Registers the read-only MCP resources on a given McpServer instance.
 *
 * @module server/register-resources
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { DOC_TYPE_CODES } from '../services/query/index.js';
import { getToolModules, type RegistrationOptions } from './register-tools.js';

export const INFO_RESOURCE_URI = 'gallica://info';

/**
 * Plain-text overview of the server: tools, query syntax and document types.
 */
export function buildServerInfo(options: RegistrationOptions): string {
  const toolNames = getToolModules(options).flatMap((toolModule) => Object.keys(toolModule));
  const docTypes = Object.entries(DOC_TYPE_CODES).map(([kind, code]) => `- ${kind} (${code})`);

  return [
    'Gallica MCP Server',
    '',
    'Full-text search and OCR retrieval on Gallica, the digital library of the',
    'Bibliothèque nationale de France (BnF). Results are restricted to the public',
    'domain unless advanced search says otherwise.',
    '',
    'Tools:',
    ...toolNames.map((name) => `- ${name}`),
    '',
    'Query syntax:',
    '- bare words are AND-ed: magie Houdini',
    '- "double quotes" match an exact phrase: "grand magicien"',
    '- AND, OR, NOT (uppercase) combine terms; parentheses group them',
    '- NOT excludes from a positive term or, in advanced search, from the filters',
    '',
    'Document types (doc_types in gallica_advanced_search):',
    ...docTypes,
    '',
    'Find documents with gallica_search, then read their OCR with gallica_snippets',
    'or gallica_download_text and gallica_read_text.',
    '',
  ].join('\n');
}

/**
 * Register all resources on the given MCP server instance.
 *
 * @returns URIs of the registered resources
 */
export function registerAllResources(server: McpServer, options: RegistrationOptions): string[] {
  const text = buildServerInfo(options);

  server.resource(
    'gallica-info',
    INFO_RESOURCE_URI,
    { description: 'Gallica MCP server info, query syntax and document types', mimeType: 'text/plain' },
    (uri) => ({
      contents: [{ uri: uri.href, mimeType: 'text/plain', text }],
    })
  );

  return [INFO_RESOURCE_URI];
}

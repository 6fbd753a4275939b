/**
 * MCP Server Type Definitions
 *
 * @module server/types
 */

import type { GallicaConfig, GallicaService } from '../services/gallica/index.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL RESULT TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Successful tool result
 */
interface ToolResultSuccess<T = unknown> {
  success: true;
  data: T;
}

/**
 * Helper to create success result
 */
export function successResult<T>(data: T): ToolResultSuccess<T> {
  return { success: true, data };
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER STATE
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Server state. The service (and with it the rate limiter and text store) is
 * created once and shared by every tool call.
 */
export interface ServerState {
  config: GallicaConfig | null;
  service: GallicaService | null;
}

/**
 * Gallica MCP - Data Models
 *
 * Barrel export for all model interfaces.
 */

// Document models
export * from './document.js';

// Search models
export * from './search.js';

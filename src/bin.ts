#!/usr/bin/env node
/**
 * Gallica MCP Server - CLI Entry Point
 *
 * Usage:
 *   gallica-mcp                            # after npm install -g
 *   gallica-mcp --enable-advanced-search   # also expose gallica_advanced_search
 *   node dist/bin.js
 *
 * @module bin
 */

import './index.js';

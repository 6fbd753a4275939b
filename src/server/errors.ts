/**
 * MCP Server Error Handling
 *
 * FAIL FAST: All errors throw immediately with descriptive context.
 * Every thrown value reaching the tool layer becomes an MCPError with a
 * category the client can act on.
 *
 * @module server/errors
 */

import { GallicaError, type GallicaErrorCategory } from '../services/gallica/errors.js';

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR CATEGORIES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Error categories for MCP tool errors.
 * Gallica domain errors keep their own category unchanged.
 */
export type ErrorCategory =
  // Validation errors
  | 'VALIDATION_ERROR'

  // Gallica retrieval errors
  | GallicaErrorCategory

  // Configuration errors
  | 'CONFIGURATION_ERROR'

  // Internal errors
  | 'INTERNAL_ERROR';

/**
 * Map error class names without their own category to MCPError categories
 */
const ERROR_NAME_TO_CATEGORY: Record<string, ErrorCategory> = {
  ValidationError: 'VALIDATION_ERROR',
  ZodError: 'VALIDATION_ERROR',
  RangeError: 'VALIDATION_ERROR',
  StorageError: 'INTERNAL_ERROR',
};

// ═══════════════════════════════════════════════════════════════════════════════
// MCP ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * MCPError - Structured error class for all MCP tool failures
 */
export class MCPError extends Error {
  public readonly category: ErrorCategory;
  public readonly details?: Record<string, unknown>;

  constructor(category: ErrorCategory, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'MCPError';
    this.category = category;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MCPError);
    }
  }

  /**
   * Create error from unknown caught value
   * FAIL FAST: Always produces a typed error
   */
  static fromUnknown(error: unknown, defaultCategory: ErrorCategory = 'INTERNAL_ERROR'): MCPError {
    if (error instanceof MCPError) {
      return error;
    }

    if (error instanceof GallicaError) {
      return new MCPError(error.category, error.message, {
        originalName: error.name,
        ...gallicaDetails(error),
      });
    }

    if (error instanceof Error) {
      const category = ERROR_NAME_TO_CATEGORY[error.name] ?? defaultCategory;
      const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
      return new MCPError(category, error.message, {
        originalName: error.name,
        ...(code && { errorCode: code }),
        stack: error.stack,
      });
    }

    return new MCPError(defaultCategory, String(error), {
      originalValue: error,
    });
  }
}

/** Diagnostic properties carried by the Gallica error subclasses */
function gallicaDetails(error: GallicaError): Record<string, unknown> {
  const details: Record<string, unknown> = {};
  if ('position' in error && typeof error.position === 'number') details.position = error.position;
  if ('page' in error && typeof error.page === 'number') details.page = error.page;
  if ('pageSize' in error && typeof error.pageSize === 'number') details.pageSize = error.pageSize;
  if ('status' in error && typeof error.status === 'number') details.status = error.status;
  if ('body' in error && typeof error.body === 'string' && error.body.length > 0) {
    details.body = error.body.slice(0, 500);
  }
  if ('timeoutMs' in error && typeof error.timeoutMs === 'number') details.timeoutMs = error.timeoutMs;
  if ('identifier' in error && typeof error.identifier === 'string') {
    details.identifier = error.identifier;
  }
  return details;
}

// ═══════════════════════════════════════════════════════════════════════════════
// RECOVERY HINTS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Recovery hint for AI agents to self-correct after errors.
 * Every ErrorCategory maps to a suggested tool and human-readable hint.
 */
export interface RecoveryHint {
  tool: string;
  hint: string;
}

const RECOVERY_HINTS: Record<ErrorCategory, RecoveryHint> = {
  VALIDATION_ERROR: { tool: 'gallica_search', hint: 'Check parameter types and required fields' },
  MALFORMED_QUERY: {
    tool: 'gallica_search',
    hint: 'Balance parentheses, close quotes, give every AND/OR/NOT two operands, and include at least one positive term',
  },
  INVALID_IDENTIFIER: {
    tool: 'gallica_search',
    hint: 'Use the identifier of a search result, e.g. ark:/12148/bpt6k5619759j',
  },
  INVALID_PAGE: { tool: 'gallica_search', hint: 'Use page >= 1; page size is at most 50' },
  REMOTE_ERROR: {
    tool: 'gallica_search',
    hint: 'Gallica refused or failed the request; simplify the query or retry later',
  },
  PARSE_ERROR: {
    tool: 'gallica_search',
    hint: 'Gallica returned an unexpected document; retry later',
  },
  SNIPPET_UNAVAILABLE: {
    tool: 'gallica_download_text',
    hint: 'This document has no searchable OCR; try downloading its text instead',
  },
  REQUEST_TIMEOUT: {
    tool: 'gallica_search',
    hint: 'Gallica is slow or the request queue is long; retry, or raise GALLICA_REQUEST_TIMEOUT_MS',
  },
  CONFIGURATION_ERROR: {
    tool: 'gallica_search',
    hint: 'Check GALLICA_* environment variables (see .env.example)',
  },
  INTERNAL_ERROR: { tool: 'gallica_search', hint: 'Retry; check server stderr for details' },
};

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR RESPONSE FORMATTING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Format MCPError for tool response
 * ALWAYS includes category, message, recovery hint, and optional details.
 */
export function formatErrorResponse(error: MCPError): {
  success: false;
  error: {
    category: ErrorCategory;
    message: string;
    recovery: RecoveryHint;
    details?: Record<string, unknown>;
  };
} {
  return {
    success: false,
    error: {
      category: error.category,
      message: error.message,
      recovery: RECOVERY_HINTS[error.category],
      details: error.details,
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR FACTORY FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Create configuration error for invalid environment variables or setup issues
 */
export function configurationError(message: string, details?: Record<string, unknown>): MCPError {
  return new MCPError('CONFIGURATION_ERROR', message, details);
}

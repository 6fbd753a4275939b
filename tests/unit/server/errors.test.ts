/**
 * Unit tests for MCP Server Error Handling
 *
 * Tests MCPError conversion of Gallica errors, recovery hints and error
 * response formatting.
 *
 * @module tests/unit/server/errors
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  MCPError,
  configurationError,
  formatErrorResponse,
  type ErrorCategory,
} from '../../../src/server/errors.js';
import {
  InvalidIdentifierError,
  InvalidPageError,
  MalformedQueryError,
  ParseError,
  RemoteError,
  SnippetUnavailableError,
  TimeoutError,
} from '../../../src/services/gallica/errors.js';
import { StorageError, StorageErrorCode } from '../../../src/services/storage/text-store.js';
import { ValidationError } from '../../../src/utils/validation.js';

const ALL_CATEGORIES: ErrorCategory[] = [
  'VALIDATION_ERROR',
  'MALFORMED_QUERY',
  'INVALID_IDENTIFIER',
  'INVALID_PAGE',
  'REMOTE_ERROR',
  'PARSE_ERROR',
  'SNIPPET_UNAVAILABLE',
  'REQUEST_TIMEOUT',
  'CONFIGURATION_ERROR',
  'INTERNAL_ERROR',
];

// ═══════════════════════════════════════════════════════════════════════════════
// MCPError CLASS TESTS
// ═══════════════════════════════════════════════════════════════════════════════

describe('MCPError', () => {
  it('should carry category, message and details', () => {
    const error = new MCPError('VALIDATION_ERROR', 'Invalid input', { field: 'query' });

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('MCPError');
    expect(error.category).toBe('VALIDATION_ERROR');
    expect(error.message).toBe('Invalid input');
    expect(error.details).toEqual({ field: 'query' });
  });

  describe('fromUnknown', () => {
    it('should return an MCPError unchanged', () => {
      const original = new MCPError('VALIDATION_ERROR', 'bad');
      expect(MCPError.fromUnknown(original)).toBe(original);
    });

    it('should keep the offset of a malformed query', () => {
      const error = MCPError.fromUnknown(new MalformedQueryError('Unbalanced parenthesis', 4));

      expect(error.category).toBe('MALFORMED_QUERY');
      expect(error.message).toBe('Unbalanced parenthesis (at offset 4)');
      expect(error.details).toEqual({ originalName: 'MalformedQueryError', position: 4 });
    });

    it('should keep page and page size of an invalid page', () => {
      const error = MCPError.fromUnknown(new InvalidPageError('page must be an integer >= 1, got 0', 0, 50));

      expect(error.category).toBe('INVALID_PAGE');
      expect(error.details).toEqual({ originalName: 'InvalidPageError', page: 0, pageSize: 50 });
    });

    it('should keep status and a bounded body of a remote error', () => {
      const error = MCPError.fromUnknown(new RemoteError('Gallica SRU returned HTTP 503', 503, 'x'.repeat(800)));

      expect(error.category).toBe('REMOTE_ERROR');
      expect(error.details?.status).toBe(503);
      expect(error.details?.body).toBe('x'.repeat(500));
    });

    it('should omit an empty body', () => {
      const error = MCPError.fromUnknown(new RemoteError('Network error', 0, ''));
      expect(error.details).toEqual({ originalName: 'RemoteError', status: 0 });
    });

    it.each([
      [new ParseError('bad envelope'), 'PARSE_ERROR'],
      [new TimeoutError('too slow', 20), 'REQUEST_TIMEOUT'],
      [new SnippetUnavailableError('ark:/12148/x'), 'SNIPPET_UNAVAILABLE'],
      [new InvalidIdentifierError('nope'), 'INVALID_IDENTIFIER'],
    ])('should map %s to its own category', (source, category) => {
      expect(MCPError.fromUnknown(source).category).toBe(category);
    });

    it('should keep the identifier of an unavailable snippet lookup', () => {
      const error = MCPError.fromUnknown(new SnippetUnavailableError('ark:/12148/x'));
      expect(error.details?.identifier).toBe('ark:/12148/x');
    });

    it('should map validation failures by error name', () => {
      expect(MCPError.fromUnknown(new ValidationError('query: required')).category).toBe('VALIDATION_ERROR');
      expect(MCPError.fromUnknown(new RangeError('offset must be >= 0')).category).toBe('VALIDATION_ERROR');

      const zodResult = z.string().safeParse(1);
      expect(zodResult.success).toBe(false);
      if (!zodResult.success) {
        expect(MCPError.fromUnknown(zodResult.error).category).toBe('VALIDATION_ERROR');
      }
    });

    it('should report a storage failure as internal with its code', () => {
      const error = MCPError.fromUnknown(new StorageError('disk full', StorageErrorCode.WRITE_FAILED));

      expect(error.category).toBe('INTERNAL_ERROR');
      expect(error.details?.errorCode).toBe('WRITE_FAILED');
      expect(error.details?.originalName).toBe('StorageError');
    });

    it('should use the default category for an unknown Error', () => {
      expect(MCPError.fromUnknown(new Error('x')).category).toBe('INTERNAL_ERROR');
      expect(MCPError.fromUnknown(new Error('x'), 'REMOTE_ERROR').category).toBe('REMOTE_ERROR');
    });

    it('should wrap a thrown non-Error value', () => {
      const error = MCPError.fromUnknown('plain string');

      expect(error.message).toBe('plain string');
      expect(error.details).toEqual({ originalValue: 'plain string' });
    });
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// RECOVERY HINTS AND FORMATTING
// ═══════════════════════════════════════════════════════════════════════════════

describe('formatErrorResponse', () => {
  it.each(ALL_CATEGORIES)('should attach a gallica tool hint for %s', (category) => {
    const { recovery } = formatErrorResponse(new MCPError(category, 'x')).error;

    expect(recovery.tool.startsWith('gallica_')).toBe(true);
    expect(recovery.hint.length).toBeGreaterThan(0);
  });

  it('should point unavailable snippets to the text download', () => {
    const { recovery } = formatErrorResponse(new MCPError('SNIPPET_UNAVAILABLE', 'x')).error;
    expect(recovery.tool).toBe('gallica_download_text');
  });

  it('should include category, message, recovery and details', () => {
    const response = formatErrorResponse(configurationError('Invalid Gallica configuration: x', { env: 'y' }));

    expect(response).toEqual({
      success: false,
      error: {
        category: 'CONFIGURATION_ERROR',
        message: 'Invalid Gallica configuration: x',
        recovery: {
          tool: 'gallica_search',
          hint: 'Check GALLICA_* environment variables (see .env.example)',
        },
        details: { env: 'y' },
      },
    });
  });
});

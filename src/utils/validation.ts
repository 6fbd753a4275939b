/**
 * Gallica MCP - Zod Validation Schemas
 *
 * Input validation for every MCP tool. Query syntax itself is checked by the
 * query compiler, which reports the offending offset.
 *
 * @module utils/validation
 */

import { z } from 'zod';
import { MAX_PAGE_SIZE } from '../services/gallica/config.js';

// ═══════════════════════════════════════════════════════════════════════════════
// CUSTOM ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Custom validation error with descriptive message
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Validate input against schema and throw descriptive error if invalid
 *
 * @throws ValidationError listing every failing field
 */
export function validateInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    const errors = result.error.errors.map((e) => {
      const path = e.path.length > 0 ? `${e.path.join('.')}: ` : '';
      return `${path}${e.message}`;
    });
    throw new ValidationError(errors.join('; '));
  }
  return result.data;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SHARED FIELDS
// ═══════════════════════════════════════════════════════════════════════════════

export const SortOrderSchema = z.enum(['relevance', 'date_ascending', 'date_descending']);

const identifierField = z
  .string()
  .trim()
  .min(1, 'identifier is required')
  .max(300)
  .describe('Gallica ARK identifier, e.g. ark:/12148/bpt6k5619759j (a gallica.bnf.fr URL also works)');

const pageField = z.number().int().min(1).default(1).describe('1-based results page');

const includeSnippetsField = z
  .boolean()
  .default(false)
  .describe('Fetch up to 5 OCR excerpts per result (one extra request per document)');

const yearField = z.number().int().min(0).max(9999);

// ═══════════════════════════════════════════════════════════════════════════════
// SEARCH SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const SearchInput = z.object({
  query: z
    .string()
    .trim()
    .min(1, 'query is required')
    .max(1000)
    .describe(
      'Full-text query. Bare words are AND-ed; AND, OR, NOT (uppercase) and parentheses combine them; "double quotes" match an exact phrase'
    ),
  page: pageField,
  include_snippets: includeSnippetsField,
});

export const AdvancedSearchInput = z.object({
  query: z
    .string()
    .max(1000)
    .default('')
    .describe('Full-text query (same syntax as gallica_search); may be empty when filters are given'),
  page: pageField,
  page_size: z
    .number()
    .int()
    .min(1)
    .max(MAX_PAGE_SIZE)
    .optional()
    .describe(`Results per page, at most ${MAX_PAGE_SIZE}`),
  creators: z.array(z.string().trim().min(1).max(200)).max(20).optional().describe('Any of these authors'),
  doc_types: z
    .array(z.string().trim().min(1))
    .max(10)
    .optional()
    .describe('Any of: monograph, periodical, manuscript, image, map, score'),
  date_start: yearField.optional().describe('Earliest publication year, inclusive'),
  date_end: yearField.optional().describe('Latest publication year, inclusive'),
  language: z
    .string()
    .trim()
    .regex(/^[a-z]{3}$/, 'language must be an ISO 639-2 code such as "fre"')
    .optional(),
  title: z.string().trim().min(1).max(500).optional().describe('Words that must appear in the title'),
  public_domain_only: z.boolean().default(true),
  exact_search: z
    .boolean()
    .default(true)
    .describe('Match bare words exactly (false allows fuzzy matching of bare words)'),
  sort: SortOrderSchema.default('relevance'),
  include_snippets: includeSnippetsField,
});

// ═══════════════════════════════════════════════════════════════════════════════
// DOCUMENT SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const SnippetsInput = z.object({
  identifier: identifierField,
  query: z
    .string()
    .trim()
    .min(1, 'query is required')
    .max(1000)
    .describe('Terms to locate inside the document (same syntax as gallica_search)'),
});

export const DownloadTextInput = z.object({
  identifier: identifierField,
});

export const ReadTextInput = z.object({
  identifier: identifierField,
  offset: z.number().int().min(0).default(0).describe('Character offset to start reading at'),
  limit: z
    .number()
    .int()
    .min(1)
    .max(100000)
    .default(20000)
    .describe('Maximum characters to return'),
});

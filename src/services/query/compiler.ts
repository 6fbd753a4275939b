/**
 * CQL Query Compiler
 *
 * Compiles caller query text plus structured filters into one CQL expression
 * for the Gallica SRU endpoint. Output is byte-identical for identical input.
 *
 * CQL boolean operators share one precedence level and associate left, so the
 * serializer parenthesizes every compound operand whose operator differs from
 * its parent instead of relying on precedence. CQL `not` is binary
 * (`a not b` = a AND NOT b): negated conjuncts are emitted after the positive
 * ones, and an expression with nothing positive to subtract from is rejected.
 *
 * @module services/query/compiler
 */

import type { CompiledExpression, SearchFilters, SortOrder } from '../../models/search.js';
import { MalformedQueryError } from '../gallica/errors.js';
import { parseQuery, type QueryNode } from './parser.js';

// ═══════════════════════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════════

/** Caller document types to Gallica dc:type codes */
export const DOC_TYPE_CODES: Readonly<Record<string, string>> = {
  monograph: 'monographie',
  periodical: 'périodique',
  manuscript: 'manuscrit',
  image: 'image',
  map: 'carte',
  score: 'partition',
};

const SERVICE_TYPE_CODES = new Set(Object.values(DOC_TYPE_CODES));

const PUBLIC_DOMAIN_PREDICATE = 'dc.rights any "domaine public"';

const SORT_CLAUSES: Record<SortOrder, string> = {
  relevance: '',
  date_ascending: ' sortby dc.date/sort.ascending',
  date_descending: ' sortby dc.date/sort.descending',
};

// ═══════════════════════════════════════════════════════════════════════════════
// LITERALS
// ═══════════════════════════════════════════════════════════════════════════════

/** Escape backslashes and double quotes for a CQL string literal */
export function escapeCqlLiteral(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

function quote(value: string): string {
  return `"${escapeCqlLiteral(value)}"`;
}

/**
 * Map a caller document type (English kind or Gallica code) to the dc:type code.
 *
 * @throws MalformedQueryError for an unknown type
 */
export function resolveDocTypeCode(docType: string): string {
  const key = docType.trim().toLowerCase();
  const code = DOC_TYPE_CODES[key];
  if (code) return code;
  if (SERVICE_TYPE_CODES.has(key)) return key;
  if (key === 'periodique') return DOC_TYPE_CODES.periodical;
  throw new MalformedQueryError(
    `Unknown document type "${docType}". Expected one of: ${Object.keys(DOC_TYPE_CODES).join(', ')}`
  );
}

// ═══════════════════════════════════════════════════════════════════════════════
// TEXT CLAUSE SERIALIZATION
// ═══════════════════════════════════════════════════════════════════════════════

/** Strip groups and cancel double negations */
function unwrap(node: QueryNode): QueryNode {
  if (node.kind === 'group') return unwrap(node.expression);
  if (node.kind === 'not') {
    const operand = unwrap(node.operand);
    if (operand.kind === 'not') return unwrap(operand.operand);
  }
  return node;
}

function splitNegations(children: QueryNode[]): { positives: QueryNode[]; negatives: QueryNode[] } {
  const positives: QueryNode[] = [];
  const negatives: QueryNode[] = [];
  for (const child of children) {
    const target = unwrap(child);
    if (target.kind === 'not') {
      negatives.push(target.operand);
    } else {
      positives.push(target);
    }
  }
  return { positives, negatives };
}

class TextClauseSerializer {
  constructor(private readonly exactSearch: boolean) {}

  serialize(node: QueryNode): string {
    const target = unwrap(node);
    switch (target.kind) {
      case 'term':
        return `text ${this.exactSearch ? 'adj' : 'all'} ${quote(target.value)}`;
      case 'phrase':
        return `text adj ${quote(target.value)}`;
      case 'and':
        return this.conjunction(target.children);
      case 'or':
        return target.children.map((child) => this.operand(child, 'or')).join(' or ');
      case 'not':
        throw new MalformedQueryError(
          'NOT needs a positive term to exclude from, e.g. "magic NOT card"'
        );
      default:
        throw new MalformedQueryError('Unsupported query node');
    }
  }

  /**
   * ' not X not Y' for a tree made only of negations, to follow other
   * predicates; null when the tree has a positive part.
   */
  exclusions(node: QueryNode): string | null {
    const target = unwrap(node);
    const children = target.kind === 'and' ? target.children : [target];
    const { positives, negatives } = splitNegations(children);
    if (positives.length > 0) return null;
    return this.notTail(negatives);
  }

  private conjunction(children: QueryNode[]): string {
    const { positives, negatives } = splitNegations(children);
    if (positives.length === 0) {
      throw new MalformedQueryError(
        'NOT needs a positive term to exclude from, e.g. "magic NOT card"'
      );
    }
    const head = positives.map((child) => this.operand(child, 'and')).join(' and ');
    return head + this.notTail(negatives);
  }

  private notTail(negatives: QueryNode[]): string {
    return negatives.map((child) => ` not ${this.operand(child, 'not')}`).join('');
  }

  /** Serialize an operand, parenthesized when it is a compound of another operator */
  private operand(node: QueryNode, parent: 'and' | 'or' | 'not'): string {
    const target = unwrap(node);
    const text = this.serialize(target);
    const compound = target.kind === 'and' || target.kind === 'or';
    return compound && target.kind !== parent ? `(${text})` : text;
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// FILTER PREDICATES
// ═══════════════════════════════════════════════════════════════════════════════

function orGroup(predicates: string[]): string | null {
  if (predicates.length === 0) return null;
  if (predicates.length === 1) return predicates[0];
  return `(${predicates.join(' or ')})`;
}

function nonBlank(values: string[] | undefined): string[] {
  return (values ?? []).map((v) => v.trim()).filter((v) => v.length > 0);
}

function filterPredicates(filters: SearchFilters): string[] {
  const parts: string[] = [];

  const title = filters.title?.trim();
  if (title) {
    parts.push(`dc.title all ${quote(title)}`);
  }

  const creators = orGroup(nonBlank(filters.creators).map((c) => `dc.creator all ${quote(c)}`));
  if (creators) parts.push(creators);

  const types = orGroup(
    nonBlank(filters.docTypes).map((t) => `dc.type adj ${quote(resolveDocTypeCode(t))}`)
  );
  if (types) parts.push(types);

  if (
    filters.dateStart !== undefined &&
    filters.dateEnd !== undefined &&
    filters.dateStart > filters.dateEnd
  ) {
    throw new MalformedQueryError(
      `date_start (${filters.dateStart}) is after date_end (${filters.dateEnd})`
    );
  }
  if (filters.dateStart !== undefined) parts.push(`dc.date >= ${filters.dateStart}`);
  if (filters.dateEnd !== undefined) parts.push(`dc.date <= ${filters.dateEnd}`);

  const language = filters.language?.trim();
  if (language) {
    parts.push(`dc.language adj ${quote(language)}`);
  }

  if (filters.publicDomainOnly ?? true) {
    parts.push(PUBLIC_DOMAIN_PREDICATE);
  }

  return parts;
}

// ═══════════════════════════════════════════════════════════════════════════════
// PUBLIC API
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Compile query text and filters into a frozen CQL expression.
 *
 * @throws MalformedQueryError on grammar errors, unknown document types,
 * inverted date ranges, or when there is nothing to search for
 */
export function compileQuery(queryText: string, filters: SearchFilters = {}): CompiledExpression {
  const exactSearch = filters.exactSearch ?? true;
  const predicates = filterPredicates(filters);
  const parts: string[] = [];
  let exclusions = '';

  if (queryText.trim().length > 0) {
    const tree = parseQuery(queryText);
    const serializer = new TextClauseSerializer(exactSearch);
    // A negation-only query subtracts from the filters instead
    const tail = predicates.length > 0 ? serializer.exclusions(tree) : null;
    if (tail !== null) {
      exclusions = tail;
    } else {
      const clause = serializer.serialize(tree);
      parts.push(unwrap(tree).kind === 'or' && predicates.length > 0 ? `(${clause})` : clause);
    }
  }
  parts.push(...predicates);

  if (parts.length === 0) {
    throw new MalformedQueryError('Nothing to search for: provide query text or at least one filter');
  }

  const cql = parts.join(' and ') + exclusions + SORT_CLAUSES[filters.sort ?? 'relevance'];
  return Object.freeze({ cql, exactSearch });
}

/**
 * Terms for the ContentSearch endpoint, which highlights words and phrases in
 * one document's OCR. Positive atoms only, deduplicated, phrases quoted.
 *
 * @throws MalformedQueryError on grammar errors
 */
export function compileSnippetQuery(queryText: string): string {
  const atoms: string[] = [];
  const seen = new Set<string>();

  const visit = (node: QueryNode, negated: boolean): void => {
    switch (node.kind) {
      case 'term':
      case 'phrase': {
        if (negated) return;
        const atom = node.kind === 'phrase' ? quote(node.value) : node.value;
        if (!seen.has(atom)) {
          seen.add(atom);
          atoms.push(atom);
        }
        return;
      }
      case 'and':
      case 'or':
        for (const child of node.children) visit(child, negated);
        return;
      case 'not':
        visit(node.operand, !negated);
        return;
      case 'group':
        visit(node.expression, negated);
        return;
    }
  };

  visit(parseQuery(queryText), false);

  if (atoms.length === 0) {
    throw new MalformedQueryError('Snippet query has no positive term to highlight');
  }
  return atoms.join(' ');
}

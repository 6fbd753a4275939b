/**
 * Unit tests for the CQL query compiler
 *
 * @module tests/unit/services/query/compiler
 */

import { describe, it, expect } from 'vitest';
import {
  compileQuery,
  compileSnippetQuery,
  escapeCqlLiteral,
  resolveDocTypeCode,
} from '../../../../src/services/query/compiler.js';
import { MalformedQueryError } from '../../../../src/services/gallica/errors.js';

const PD = 'dc.rights any "domaine public"';
const noRights = { publicDomainOnly: false } as const;

function count(haystack: string, needle: string): number {
  return haystack.split(needle).length - 1;
}

describe('compileQuery', () => {
  // ═══════════════════════════════════════════════════════════════════════════════
  // TEXT CLAUSE
  // ═══════════════════════════════════════════════════════════════════════════════

  describe('text clause', () => {
    it('should compile a bare term with exact matching by default', () => {
      expect(compileQuery('houdini').cql).toBe(`text adj "houdini" and ${PD}`);
    });

    it('should use fuzzy matching for bare terms when exact search is off', () => {
      const compiled = compileQuery('houdini', { exactSearch: false });

      expect(compiled.cql).toBe(`text all "houdini" and ${PD}`);
      expect(compiled.exactSearch).toBe(false);
    });

    it('should always compile phrases to adjacency', () => {
      expect(compileQuery('"grand magicien"', { exactSearch: false }).cql).toBe(
        `text adj "grand magicien" and ${PD}`
      );
    });

    it('should keep both atoms of an AND', () => {
      expect(compileQuery('magic AND card', noRights).cql).toBe(
        'text adj "magic" and text adj "card"'
      );
    });

    it('should emit NOT as a binary exclusion after the positive conjuncts', () => {
      expect(compileQuery('magic NOT card', noRights).cql).toBe(
        'text adj "magic" not text adj "card"'
      );
      expect(compileQuery('NOT card magic', noRights).cql).toBe(
        'text adj "magic" not text adj "card"'
      );
    });

    it('should parenthesize an OR group under AND', () => {
      expect(compileQuery('(Houdini OR Houdin) AND escape', { ...noRights, exactSearch: false }).cql).toBe(
        '(text all "Houdini" or text all "Houdin") and text all "escape"'
      );
    });

    it('should parenthesize an AND group under OR', () => {
      expect(compileQuery('a OR b c', noRights).cql).toBe(
        'text adj "a" or (text adj "b" and text adj "c")'
      );
    });

    it('should parenthesize a negated compound', () => {
      expect(compileQuery('a NOT (b OR c)', noRights).cql).toBe(
        'text adj "a" not (text adj "b" or text adj "c")'
      );
    });

    it('should wrap a top-level OR when predicates follow', () => {
      expect(compileQuery('Houdini OR Houdin').cql).toBe(
        `(text adj "Houdini" or text adj "Houdin") and ${PD}`
      );
    });

    it('should not wrap a top-level OR standing alone', () => {
      expect(compileQuery('Houdini OR Houdin', noRights).cql).toBe(
        'text adj "Houdini" or text adj "Houdin"'
      );
    });

    it('should cancel double negation', () => {
      expect(compileQuery('magic NOT NOT card', noRights).cql).toBe(
        'text adj "magic" and text adj "card"'
      );
    });

    it('should drop redundant parentheses', () => {
      expect(compileQuery('((houdini))', noRights).cql).toBe('text adj "houdini"');
    });

    it('should never produce an empty group', () => {
      const cql = compileQuery('(a OR b) (c OR d) NOT (e f)').cql;

      expect(cql).not.toContain('()');
      expect(cql).toBe(
        `(text adj "a" or text adj "b") and (text adj "c" or text adj "d") not (text adj "e" and text adj "f") and ${PD}`
      );
    });

    it('should escape quotes and backslashes in literals', () => {
      expect(compileQuery('"say \\"hi\\""', noRights).cql).toBe('text adj "say \\"hi\\""');
    });
  });

  // ═══════════════════════════════════════════════════════════════════════════════
  // FILTERS
  // ═══════════════════════════════════════════════════════════════════════════════

  describe('filters', () => {
    it('should join every predicate in the fixed order', () => {
      const compiled = compileQuery('magie', {
        title: 'Traité',
        creators: ['Robert-Houdin', 'Decremps'],
        docTypes: ['monograph', 'periodical'],
        dateStart: 1800,
        dateEnd: 1900,
        language: 'fre',
        sort: 'date_ascending',
      });

      expect(compiled.cql).toBe(
        'text adj "magie" and dc.title all "Traité" and ' +
          '(dc.creator all "Robert-Houdin" or dc.creator all "Decremps") and ' +
          '(dc.type adj "monographie" or dc.type adj "périodique") and ' +
          'dc.date >= 1800 and dc.date <= 1900 and dc.language adj "fre" and ' +
          `${PD} sortby dc.date/sort.ascending`
      );
    });

    it('should not parenthesize a single creator or type', () => {
      expect(compileQuery('', { creators: ['Houdini'], docTypes: ['manuscript'], ...noRights }).cql).toBe(
        'dc.creator all "Houdini" and dc.type adj "manuscrit"'
      );
    });

    it('should emit an open-ended date range', () => {
      expect(compileQuery('magie', { dateStart: 1850, ...noRights }).cql).toBe(
        'text adj "magie" and dc.date >= 1850'
      );
      expect(compileQuery('magie', { dateEnd: 1850, ...noRights }).cql).toBe(
        'text adj "magie" and dc.date <= 1850'
      );
    });

    it('should emit exactly one public-domain predicate by default', () => {
      const cql = compileQuery('a OR b', { creators: ['x', 'y'] }).cql;

      expect(count(cql, 'dc.rights')).toBe(1);
      expect(count(cql, PD)).toBe(1);
    });

    it('should emit no rights predicate when public-domain filtering is off', () => {
      const cql = compileQuery('magie NOT cartes', noRights).cql;

      expect(cql).not.toContain('dc.rights');
    });

    it('should compile filters without query text', () => {
      expect(compileQuery('   ', { creators: ['Houdini'] }).cql).toBe(
        `dc.creator all "Houdini" and ${PD}`
      );
    });

    it('should append a descending date sort', () => {
      expect(compileQuery('magie', { sort: 'date_descending', ...noRights }).cql).toBe(
        'text adj "magie" sortby dc.date/sort.descending'
      );
    });

    it('should add nothing for relevance sort', () => {
      expect(compileQuery('magie', { sort: 'relevance', ...noRights }).cql).toBe('text adj "magie"');
    });

    it('should ignore blank filter values', () => {
      expect(compileQuery('magie', { creators: ['  '], title: ' ', language: '', ...noRights }).cql).toBe(
        'text adj "magie"'
      );
    });
  });

  describe('negation-only query with filters', () => {
    it('should subtract the negated term from the filters', () => {
      expect(compileQuery('NOT card', { creators: ['Houdin'], ...noRights }).cql).toBe(
        'dc.creator all "Houdin" not text adj "card"'
      );
    });

    it('should subtract every negated conjunct after the rights predicate', () => {
      expect(compileQuery('NOT a NOT b').cql).toBe(`${PD} not text adj "a" not text adj "b"`);
    });

    it('should parenthesize a negated group', () => {
      expect(compileQuery('NOT (a OR b)', { dateStart: 1900, ...noRights }).cql).toBe(
        'dc.date >= 1900 not (text adj "a" or text adj "b")'
      );
    });

    it('should keep the sort clause last', () => {
      expect(compileQuery('NOT card', { sort: 'date_ascending' }).cql).toBe(
        `${PD} not text adj "card" sortby dc.date/sort.ascending`
      );
    });
  });

  // ═══════════════════════════════════════════════════════════════════════════════
  // ERRORS AND DETERMINISM
  // ═══════════════════════════════════════════════════════════════════════════════

  describe('errors', () => {
    it('should reject a query that only negates when no filter is set', () => {
      expect(() => compileQuery('NOT card', noRights)).toThrow(MalformedQueryError);
      expect(() => compileQuery('NOT a NOT b', noRights)).toThrow('NOT needs a positive term');
    });

    it('should reject a negated OR branch even with filters', () => {
      expect(() => compileQuery('a OR NOT b')).toThrow('NOT needs a positive term');
    });

    it('should reject unbalanced parentheses', () => {
      expect(() => compileQuery('(a OR b')).toThrow(MalformedQueryError);
      expect(() => compileQuery('a OR b)')).toThrow(MalformedQueryError);
    });

    it('should reject an inverted date range', () => {
      expect(() => compileQuery('magie', { dateStart: 1900, dateEnd: 1800 })).toThrow(
        'date_start (1900) is after date_end (1800)'
      );
    });

    it('should reject an unknown document type', () => {
      expect(() => compileQuery('magie', { docTypes: ['video'] })).toThrow(
        'Unknown document type "video"'
      );
    });

    it('should reject a request with nothing to search for', () => {
      expect(() => compileQuery('', noRights)).toThrow('Nothing to search for');
    });
  });

  describe('determinism', () => {
    it('should produce byte-identical frozen output for identical input', () => {
      const filters = { creators: ['Houdini'], dateStart: 1900, exactSearch: false };
      const first = compileQuery('"escape artist" OR magician', filters);
      const second = compileQuery('"escape artist" OR magician', filters);

      expect(first).toEqual(second);
      expect(Object.isFrozen(first)).toBe(true);
    });
  });
});

describe('resolveDocTypeCode', () => {
  it('should map caller kinds to service codes', () => {
    expect(resolveDocTypeCode('map')).toBe('carte');
    expect(resolveDocTypeCode('Score')).toBe('partition');
  });

  it('should accept service codes, with or without accents', () => {
    expect(resolveDocTypeCode('manuscrit')).toBe('manuscrit');
    expect(resolveDocTypeCode('périodique')).toBe('périodique');
    expect(resolveDocTypeCode('periodique')).toBe('périodique');
  });
});

describe('escapeCqlLiteral', () => {
  it('should escape backslashes before quotes', () => {
    expect(escapeCqlLiteral('a\\b"c')).toBe('a\\\\b\\"c');
  });
});

describe('compileSnippetQuery', () => {
  it('should list positive atoms once, phrases quoted', () => {
    expect(compileSnippetQuery('Houdini "grand magicien" NOT card Houdini')).toBe(
      'Houdini "grand magicien"'
    );
  });

  it('should escape quotes inside a phrase', () => {
    expect(compileSnippetQuery('"le \\"grand\\" Houdini" magie')).toBe('"le \\"grand\\" Houdini" magie');
  });

  it('should keep atoms under double negation', () => {
    expect(compileSnippetQuery('a NOT NOT b')).toBe('a b');
  });

  it('should collect atoms from every OR branch', () => {
    expect(compileSnippetQuery('(Houdini OR Houdin) escape')).toBe('Houdini Houdin escape');
  });

  it('should reject a query with nothing positive', () => {
    expect(() => compileSnippetQuery('NOT card')).toThrow(
      'Snippet query has no positive term to highlight'
    );
  });
});

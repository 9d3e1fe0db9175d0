/**
 * Syntax Dictionary and AI Table Tests
 */

import { describe, it, expect } from 'vitest';
import {
  loadSyntaxDictionary,
  parseSyntaxDictionary,
  parseSyntaxDictionaryEntry,
} from '../src/syntax/dictionary.js';
import { AITable, getBundledAITable, isGenericUnknownEntry } from '../src/syntax/table.js';
import { InitializationError, SyntaxDictionaryError } from '../src/errors.js';

describe('Syntax Dictionary', () => {
  describe('parseSyntaxDictionaryEntry', () => {
    it('should parse flags, components, attributes and title', () => {
      const [entry] = parseSyntaxDictionaryEntry(
        '01  *?  N14,csum,key  ex=02,255,37 dlpkey=22,10,21|235  # GTIN'
      );

      expect(entry).toEqual({
        ai: '01',
        fnc1: false,
        dlDataAttr: 'permitted',
        components: [{ cset: 'N', min: 14, max: 14, optional: false, linters: ['csum', 'key'] }],
        attrs: [
          { name: 'ex', value: '02,255,37' },
          { name: 'dlpkey', value: '22,10,21|235' },
        ],
        title: 'GTIN',
      });
    });

    it('should parse optional and variable length components', () => {
      const [entry] = parseSyntaxDictionaryEntry('253  ?  N13,csum,key [X..17]  dlpkey  # GDTI');

      expect(entry.fnc1).toBe(true);
      expect(entry.components).toEqual([
        { cset: 'N', min: 13, max: 13, optional: false, linters: ['csum', 'key'] },
        { cset: 'X', min: 1, max: 17, optional: true, linters: [] },
      ]);
      expect(entry.attrs).toEqual([{ name: 'dlpkey' }]);
    });

    it('should expand an AI range', () => {
      const entries = parseSyntaxDictionaryEntry('91-93  ?  X..90  # INTERNAL');

      expect(entries.map((e) => e.ai)).toEqual(['91', '92', '93']);
      expect(entries.every((e) => e.title === 'INTERNAL')).toBe(true);
    });

    it('should skip comments and blank lines', () => {
      expect(parseSyntaxDictionaryEntry('# a comment')).toEqual([]);
      expect(parseSyntaxDictionaryEntry('   ')).toEqual([]);
    });

    it('should name the line of a malformed entry', () => {
      expect(() => parseSyntaxDictionaryEntry('AB  X..20', 4)).toThrow(
        'Syntax Dictionary line 4: AI must be numeric'
      );
      expect(() => parseSyntaxDictionaryEntry('10  ?  X..20,nosuch', 7)).toThrow(
        "Syntax Dictionary line 7: Unknown linter 'nosuch'"
      );
    });

    it('should reject a truncated entry', () => {
      expect(() => parseSyntaxDictionaryEntry('10')).toThrow(SyntaxDictionaryError);
      expect(() => parseSyntaxDictionaryEntry('10  ?')).toThrow('Syntax Dictionary line 1: Truncated after flags');
    });
  });

  describe('parseSyntaxDictionary', () => {
    it('should number lines from one', () => {
      const text = '# header\n01  *?  N14,csum,key  dlpkey\n10  ?  X..20,bogus';

      expect(() => parseSyntaxDictionary(text)).toThrow("Syntax Dictionary line 3: Unknown linter 'bogus'");
    });
  });

  describe('loadSyntaxDictionary', () => {
    it('should load the bundled dictionary', () => {
      const entries = loadSyntaxDictionary();

      expect(entries.find((e) => e.ai === '01')?.title).toBe('GTIN');
      expect(entries.find((e) => e.ai === '99')?.title).toBe('INTERNAL');
    });

    it('should accept dictionary text spanning several lines', () => {
      const entries = loadSyntaxDictionary('01  *?  N14,csum,key  dlpkey  # GTIN\n99  ?  X..90  # INTERNAL\n');

      expect(entries.map((e) => e.ai)).toEqual(['01', '99']);
    });

    it('should report an unreadable file', () => {
      expect(() => loadSyntaxDictionary('/nonexistent/gs1.txt')).toThrow(InitializationError);
      expect(() => loadSyntaxDictionary('/nonexistent/gs1.txt')).toThrow('Cannot read file /nonexistent/gs1.txt');
    });
  });
});

describe('AI Table', () => {
  const table = getBundledAITable();

  describe('construction', () => {
    it('should share the bundled table', () => {
      expect(getBundledAITable()).toBe(table);
    });

    it('should reject AIs with one prefix but different lengths', () => {
      const entries = [
        ...parseSyntaxDictionaryEntry('01  *  N14'),
        ...parseSyntaxDictionaryEntry('012  *  N5'),
      ];

      expect(() => new AITable(entries)).toThrow("AI table is broken: AIs beginning '01' have different lengths");
    });

    it('should reject an FNC1 flag that disagrees with the prefix', () => {
      expect(() => new AITable(parseSyntaxDictionaryEntry('10  *  X..20'))).toThrow(
        'AI table is broken: AI (10) FNC1 requirement disagrees with its prefix'
      );
    });
  });

  describe('lookup', () => {
    it('should find AIs by exact length', () => {
      expect(table.lookup('01', 2, false)?.ai).toBe('01');
      expect(table.lookup('235', 3, false)?.ai).toBe('235');
      expect(table.lookup('8003', 4, false)?.ai).toBe('8003');
    });

    it('should find the AI that prefixes some data', () => {
      expect(table.lookup('0109521234543213', 0, false)?.ai).toBe('01');
      expect(table.lookup('800300952123454321', 0, false)?.ai).toBe('8003');
    });

    it('should reject a length that disagrees with the prefix', () => {
      expect(table.lookup('23', 2, false)).toBeNull();
      expect(table.lookup('0101', 4, true)).toBeNull();
    });

    it('should vivify unknown AIs only when permitted', () => {
      expect(table.lookup('89', 2, false)).toBeNull();

      const unknown = table.lookup('89', 2, true);
      expect(unknown?.title).toBe('UNKNOWN');
      expect(unknown?.dlDataAttr).toBe('unknown');
      expect(unknown !== null && isGenericUnknownEntry(unknown)).toBe(true);
    });

    it('should take the length of an unknown AI from its known prefix', () => {
      const unknown = table.lookup('4291234', 0, true);

      expect(unknown?.fnc1).toBe(true);
      expect(unknown !== null && isGenericUnknownEntry(unknown)).toBe(false);
      expect(unknown !== null && table.aiLength(unknown, '4291234')).toBe(3);
    });

    it('should give the AI length for the prefix', () => {
      expect(table.lengthByPrefix('01')).toBe(2);
      expect(table.lengthByPrefix('25')).toBe(3);
      expect(table.lengthByPrefix('80')).toBe(4);
      expect(table.lengthByPrefix('89')).toBe(0);
    });
  });

  describe('Digital Link key-qualifier sequences', () => {
    it('should know the primary keys', () => {
      expect(table.isDLpkey('01')).toBe(true);
      expect(table.isDLpkey('00')).toBe(true);
      expect(table.isDLpkey('10')).toBe(false);
    });

    it('should accept qualifiers in order and reject them out of order', () => {
      expect(table.isValidDLpathAIseq(['01', '22', '10', '21'])).toBe(true);
      expect(table.isValidDLpathAIseq(['01', '10', '21'])).toBe(true);
      expect(table.isValidDLpathAIseq(['01', '235'])).toBe(true);
      expect(table.isValidDLpathAIseq(['01', '10', '22'])).toBe(false);
      expect(table.isValidDLpathAIseq(['01', '21', '235'])).toBe(false);
    });

    it('should keep the sequences sorted', () => {
      const sorted = [...table.dlKeyQualifiers].sort();

      expect(table.dlKeyQualifiers).toEqual(sorted);
      expect(table.dlKeyQualifiers).toContain('01 22 10 21');
    });
  });
});

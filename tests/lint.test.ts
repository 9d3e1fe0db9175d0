/**
 * Linter Tests
 */

import { describe, it, expect } from 'vitest';
import { LINTERS, isLinterName, lintMessage } from '../src/syntax/lint/index.js';
import { lintCsum, lintCsumAlpha } from '../src/syntax/lint/checksum.js';
import { lintCset39, lintCset64, lintCset82, lintCsetNumeric } from '../src/syntax/lint/cset.js';
import { lintYymmd0, lintYymmdd, lintYyyymmdd, lintHhmm } from '../src/syntax/lint/datetime.js';
import { lintIban } from '../src/syntax/lint/iban.js';
import { lintIso3166, lintIso3166999, lintIso3166List, lintIso4217 } from '../src/syntax/lint/codelists.js';
import { lintKey, lintImporterIdx } from '../src/syntax/lint/gcp.js';
import { lintLatLong } from '../src/syntax/lint/location.js';
import { lintPcenc, lintPieceOfTotal, lintPosInSeqSlash } from '../src/syntax/lint/structured.js';
import { lintNonZero, lintNoZeroPrefix, lintYesNo, lintZero } from '../src/syntax/lint/values.js';

describe('Linters', () => {
  describe('registry', () => {
    it('should recognise linter names used by the syntax dictionary', () => {
      expect(isLinterName('csum')).toBe(true);
      expect(isLinterName('yymmd0')).toBe(true);
      expect(isLinterName('nosuchlinter')).toBe(false);
      expect(LINTERS.csum).toBe(lintCsum);
    });

    it('should give English messages for error codes', () => {
      expect(lintMessage('INCORRECT_CHECK_DIGIT')).toBe('The numeric check digit is incorrect.');
    });
  });

  describe('character sets', () => {
    it('should locate the first non-digit', () => {
      expect(lintCsetNumeric('0123')).toBeNull();
      expect(lintCsetNumeric('12a4')).toEqual({ code: 'NON_DIGIT_CHARACTER', pos: 2, len: 1 });
    });

    it('should reject characters outside CSET 82', () => {
      expect(lintCset82('ABC-123/xyz')).toBeNull();
      expect(lintCset82('AB CD')).toEqual({ code: 'INVALID_CSET82_CHARACTER', pos: 2, len: 1 });
    });

    it('should reject lower case in CSET 39', () => {
      expect(lintCset39('AB#-12/')).toBeNull();
      expect(lintCset39('ab')).toEqual({ code: 'INVALID_CSET39_CHARACTER', pos: 0, len: 1 });
    });

    it('should check CSET 64 characters and padding', () => {
      expect(lintCset64('ABCDE=')).toBeNull();
      expect(lintCset64('ABC=')).toEqual({ code: 'INVALID_CSET64_PADDING', pos: 3, len: 1 });
      expect(lintCset64('AB+C')).toEqual({ code: 'INVALID_CSET64_CHARACTER', pos: 2, len: 1 });
    });
  });

  describe('check characters', () => {
    it('should verify a mod-10 check digit', () => {
      expect(lintCsum('09521234543213')).toBeNull();
      expect(lintCsum('09521234543214')).toEqual({ code: 'INCORRECT_CHECK_DIGIT', pos: 13, len: 1 });
      expect(lintCsum('0952A234543213')).toEqual({ code: 'NON_DIGIT_CHARACTER', pos: 4, len: 1 });
    });

    it('should verify an alphanumeric check character pair', () => {
      expect(lintCsumAlpha('A3U')).toBeNull();
      expect(lintCsumAlpha('1987654Ad4X4bL5ttr2310c2K')).toBeNull();
      expect(lintCsumAlpha('1987654Ad4X4bL5ttr2310c2L')).toEqual({ code: 'INCORRECT_CHECK_PAIR', pos: 23, len: 2 });
      expect(lintCsumAlpha('A')).toEqual({ code: 'TOO_SHORT_FOR_CHECK_PAIR', pos: 0, len: 1 });
    });

    it('should verify an IBAN', () => {
      expect(lintIban('DE60123456780012345678')).toBeNull();
      expect(lintIban('DE61123456780012345678')).toEqual({ code: 'INCORRECT_IBAN_CHECKSUM', pos: 2, len: 2 });
      expect(lintIban('QQ60123456780012345678')).toEqual({ code: 'ILLEGAL_IBAN_COUNTRY_CODE', pos: 0, len: 2 });
    });
  });

  describe('dates and times', () => {
    it('should permit a zero day only where allowed', () => {
      expect(lintYymmd0('250200')).toBeNull();
      expect(lintYymmdd('250200')).toEqual({ code: 'ILLEGAL_DAY', pos: 4, len: 2 });
    });

    it('should apply leap years', () => {
      expect(lintYymmd0('240229')).toBeNull();
      expect(lintYymmd0('250229')).toEqual({ code: 'ILLEGAL_DAY', pos: 4, len: 2 });
      expect(lintYyyymmdd('20000229')).toBeNull();
      expect(lintYyyymmdd('21000229')).toEqual({ code: 'ILLEGAL_DAY', pos: 6, len: 2 });
    });

    it('should reject an illegal month', () => {
      expect(lintYymmd0('251301')).toEqual({ code: 'ILLEGAL_MONTH', pos: 2, len: 2 });
    });

    it('should check hours and minutes', () => {
      expect(lintHhmm('2359')).toBeNull();
      expect(lintHhmm('2400')).toEqual({ code: 'ILLEGAL_HOUR', pos: 0, len: 2 });
      expect(lintHhmm('1260')).toEqual({ code: 'ILLEGAL_MINUTE', pos: 2, len: 2 });
    });
  });

  describe('code lists', () => {
    it('should check ISO 3166 numeric codes', () => {
      expect(lintIso3166('826')).toBeNull();
      expect(lintIso3166('999')).toEqual({ code: 'NOT_ISO3166', pos: 0, len: 3 });
      expect(lintIso3166999('999')).toBeNull();
    });

    it('should check each code in a list of countries', () => {
      expect(lintIso3166List('826826')).toBeNull();
      expect(lintIso3166List('826000')).toEqual({ code: 'NOT_ISO3166', pos: 3, len: 3 });
      expect(lintIso3166List('82682')).toEqual({ code: 'NOT_ISO3166', pos: 3, len: 2 });
    });

    it('should check ISO 4217 currency codes', () => {
      expect(lintIso4217('978')).toBeNull();
      expect(lintIso4217('000')).toEqual({ code: 'NOT_ISO4217', pos: 0, len: 3 });
    });
  });

  describe('keys and structured values', () => {
    it('should require a numeric company prefix', () => {
      expect(lintKey('0952123454321')).toBeNull();
      expect(lintKey('095A123454321')).toEqual({ code: 'INVALID_GCP_PREFIX', pos: 3, len: 1 });
      expect(lintKey('095')).toEqual({ code: 'TOO_SHORT_FOR_GCP', pos: 0, len: 3 });
    });

    it('should check the importer index', () => {
      expect(lintImporterIdx('A')).toBeNull();
      expect(lintImporterIdx('#')).toEqual({ code: 'INVALID_IMPORT_IDX_CHARACTER', pos: 0, len: 1 });
    });

    it('should check piece of total', () => {
      expect(lintPieceOfTotal('0203')).toBeNull();
      expect(lintPieceOfTotal('0302')).toEqual({ code: 'PIECE_NUMBER_EXCEEDS_TOTAL', pos: 0, len: 4 });
      expect(lintPieceOfTotal('0002')).toEqual({ code: 'ZERO_PIECE_NUMBER', pos: 0, len: 2 });
    });

    it('should check position in sequence', () => {
      expect(lintPosInSeqSlash('3/12')).toBeNull();
      expect(lintPosInSeqSlash('13/12')).toEqual({ code: 'POSITION_EXCEEDS_END', pos: 0, len: 5 });
      expect(lintPosInSeqSlash('3/012')).toEqual({ code: 'ILLEGAL_ZERO_PREFIX', pos: 2, len: 3 });
    });

    it('should check percent encoding', () => {
      expect(lintPcenc('A%20B')).toBeNull();
      expect(lintPcenc('A%G0')).toEqual({ code: 'INVALID_PERCENT_SEQUENCE', pos: 1, len: 3 });
      expect(lintPcenc('ABC%2')).toEqual({ code: 'INVALID_PERCENT_SEQUENCE', pos: 3, len: 2 });
    });

    it('should check latitude and longitude ranges', () => {
      expect(lintLatLong('09000000001800000000')).toBeNull();
      expect(lintLatLong('18000000013600000000')).toEqual({ code: 'INVALID_LATITUDE', pos: 0, len: 10 });
    });

    it('should check zero and non-zero values', () => {
      expect(lintNonZero('0010')).toBeNull();
      expect(lintNonZero('0000')).toEqual({ code: 'ILLEGAL_ZERO_VALUE', pos: 0, len: 4 });
      expect(lintZero('0')).toBeNull();
      expect(lintNoZeroPrefix('012')).toEqual({ code: 'ILLEGAL_ZERO_PREFIX', pos: 0, len: 1 });
      expect(lintYesNo('2')).toEqual({ code: 'NOT_ZERO_OR_ONE', pos: 0, len: 1 });
    });
  });
});

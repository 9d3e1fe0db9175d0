/**
 * GS1 Encoder Tests
 */

import { describe, it, expect } from 'vitest';
import { GS1Encoder } from '../src/encoder.js';
import { ParameterError } from '../src/errors.js';
import { VERSION } from '../src/types.js';

describe('GS1Encoder', () => {
  describe('data strings', () => {
    it('should extract elements from AI data', () => {
      const encoder = new GS1Encoder();
      encoder.dataStr = '^010952123454321310ABC123^99TEST';

      expect(encoder.aiDataStr).toBe('(01)09521234543213(10)ABC123(99)TEST');
      expect(encoder.getHRI()).toEqual(['(01) 09521234543213', '(10) ABC123', '(99) TEST']);
    });

    it('should prefix HRI lines with data titles when asked', () => {
      const encoder = new GS1Encoder({ includeDataTitlesInHRI: true });
      encoder.dataStr = '^010952123454321310ABC123^99TEST';

      expect(encoder.getHRI()).toEqual([
        'GTIN (01) 09521234543213',
        'BATCH/LOT (10) ABC123',
        'INTERNAL (99) TEST',
      ]);
    });

    it('should hold non-GS1 data without elements', () => {
      const encoder = new GS1Encoder();
      encoder.dataStr = 'HELLO';

      expect(encoder.dataStr).toBe('HELLO');
      expect(encoder.aiDataStr).toBeNull();
      expect(encoder.getHRI()).toEqual([]);
    });

    it('should limit the data length', () => {
      const encoder = new GS1Encoder();

      expect(() => {
        encoder.dataStr = 'A'.repeat(8192);
      }).toThrow('Maximum data length is 8191 characters');
    });

    it('should round trip bracketed and plain data', () => {
      const encoder = new GS1Encoder();
      encoder.aiDataStr = '(01)09521234543213(3103)000195(10)AB\\(C(21)XYZ';
      const dataStr = encoder.dataStr;

      const other = new GS1Encoder();
      other.dataStr = dataStr;
      expect(other.aiDataStr).toBe('(01)09521234543213(3103)000195(10)AB\\(C(21)XYZ');
      expect(other.dataStr).toBe(dataStr);
    });
  });

  describe('composite data', () => {
    it('should keep the linear and composite parts apart', () => {
      const encoder = new GS1Encoder();
      encoder.aiDataStr = '(01)09521234543213|(99)CC';

      expect(encoder.dataStr).toBe('^0109521234543213|^99CC');
      expect(encoder.aiDataStr).toBe('(01)09521234543213|(99)CC');
    });

    it('should accept a non-GS1 linear part', () => {
      const encoder = new GS1Encoder();
      encoder.dataStr = '9521234543213|^99CC';

      expect(encoder.getHRI()).toEqual(['(99) CC']);
    });
  });

  describe('error state', () => {
    it('should record the message and markup of a failed linter', () => {
      const encoder = new GS1Encoder();

      expect(() => {
        encoder.aiDataStr = '(01)09521234543214';
      }).toThrow(ParameterError);
      expect(encoder.errMsg).toBe('AI (01): The numeric check digit is incorrect.');
      expect(encoder.errMarkup).toBe('(01)0952123454321|4|');
    });

    it('should keep the previous data after a failure', () => {
      const encoder = new GS1Encoder();
      encoder.aiDataStr = '(01)09521234543213';

      expect(() => {
        encoder.aiDataStr = '(01)09521234543214';
      }).toThrow();
      expect(encoder.aiDataStr).toBe('(01)09521234543213');
    });

    it('should clear the error on the next call', () => {
      const encoder = new GS1Encoder();
      expect(() => {
        encoder.dataStr = '^8912';
      }).toThrow();
      expect(encoder.errMsg).toBe('No known AI is a prefix of: 8912...');

      expect(encoder.dataStr).toBe('');
      expect(encoder.errMsg).toBe('');
      expect(encoder.errMarkup).toBe('');
    });

    it('should reject too many AIs', () => {
      const encoder = new GS1Encoder();

      expect(() => {
        encoder.aiDataStr = `(01)09521234543213${'(99)A'.repeat(64)}`;
      }).toThrow('Too many AIs');
    });
  });

  describe('options', () => {
    it('should reject an unknown symbology', () => {
      const encoder = new GS1Encoder();

      expect(() => {
        encoder.sym = 'Aztec';
      }).toThrow('Unknown symbology');
      expect(encoder.errMsg).toBe('Unknown symbology');
      expect(encoder.sym).toBe('NONE');
    });

    it('should toggle the requisite AIs validation', () => {
      const encoder = new GS1Encoder();

      encoder.validateAIassociations = false;
      encoder.aiDataStr = '(02)09521234543213';
      expect(encoder.dataStr).toBe('^0209521234543213');

      encoder.setValidationEnabled('REQUISITE_AIS', true);
      expect(encoder.getValidationEnabled('REQUISITE_AIS')).toBe(true);
      expect(() => {
        encoder.aiDataStr = '(02)09521234543213';
      }).toThrow('Required AIs for AI (02) are not satisfied: 37');
    });

    it('should refuse to change locked or unknown validations', () => {
      const encoder = new GS1Encoder();

      expect(() => encoder.setValidationEnabled('MUTEX_AIS', false)).toThrow('This validation cannot be amended');
      expect(() => encoder.setValidationEnabled('NO_SUCH_RULE', false)).toThrow('Unknown validation');
      expect(() => encoder.getValidationEnabled('NO_SUCH_RULE')).toThrow('Unknown validation');
      expect(encoder.getValidationEnabled('MUTEX_AIS')).toBe(true);
    });

    it('should apply validations given at construction', () => {
      const encoder = new GS1Encoder({ validations: { REQUISITE_AIS: false, MUTEX_AIS: true } });

      expect(encoder.validateAIassociations).toBe(false);
      expect(() => new GS1Encoder({ validations: { REPEATED_AIS: false } })).toThrow(
        'This validation cannot be amended'
      );
    });

    it('should admit unknown AIs when permitted', () => {
      const encoder = new GS1Encoder();
      expect(() => {
        encoder.aiDataStr = '(89)ABC';
      }).toThrow('Unrecognised AI: 89');

      encoder.permitUnknownAIs = true;
      encoder.aiDataStr = '(89)ABC';
      expect(encoder.dataStr).toBe('^89ABC');
    });

    it('should complete check digits when asked', () => {
      const encoder = new GS1Encoder();
      encoder.addCheckDigit = true;
      encoder.aiDataStr = '(01)0952123454321';

      expect(encoder.aiDataStr).toBe('(01)09521234543213');
    });

    it('should load a custom syntax dictionary', () => {
      const encoder = new GS1Encoder({
        syntaxDictionary: '01  *?  N14,csum,key  dlpkey  # GTIN\n99  ?  X..90  # INTERNAL\n',
      });

      encoder.aiDataStr = '(01)09521234543213(99)TEST';
      expect(encoder.aiTable.entries.length).toBe(2);
      expect(() => {
        encoder.aiDataStr = '(10)ABC';
      }).toThrow('Unrecognised AI: 10');
    });
  });

  it('should report its version', () => {
    expect(new GS1Encoder().version).toBe(VERSION);
  });

  it('should drop its data on clear', () => {
    const encoder = new GS1Encoder();
    encoder.aiDataStr = '(01)09521234543213';
    encoder.clear();

    expect(encoder.dataStr).toBe('');
    expect(encoder.aiDataStr).toBeNull();
  });
});

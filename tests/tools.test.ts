/**
 * MCP Tool Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { clearConfigCache } from '../src/config/index.js';
import { callTool, checkDigit, digitalLink, parse, scanData, toolDefs } from '../src/tools/index.js';

function resultOf(name: string, args: Record<string, unknown>): unknown {
  const response = callTool(name, args);
  expect(response.isError).toBeUndefined();
  return JSON.parse(response.content[0].text);
}

describe('MCP Tools', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'gs1-syntax-tools-'));
    process.env.GS1_SYNTAX_CONFIG = join(dir, 'config.json');
    clearConfigCache();
  });

  afterEach(() => {
    delete process.env.GS1_SYNTAX_CONFIG;
    clearConfigCache();
    rmSync(dir, { recursive: true, force: true });
  });

  it('should list a definition for every tool', () => {
    expect(toolDefs.map((def) => def.name)).toEqual([
      'gs1_parse',
      'gs1_digital_link',
      'gs1_scan_data',
      'gs1_check_digit',
      'gs1_config',
    ]);
  });

  describe('gs1_parse', () => {
    it('should parse bracketed data', () => {
      expect(parse({ data: '(01)09521234543213(10)ABC123' })).toEqual({
        success: true,
        message: 'Parsed 2 AI element(s).',
        dataStr: '^010952123454321310ABC123',
        aiDataStr: '(01)09521234543213(10)ABC123',
        hri: ['(01) 09521234543213', '(10) ABC123'],
        ignoredQueryParams: [],
      });
    });

    it('should detect a Digital Link URI', () => {
      const result = parse({ data: 'https://id.gs1.org/01/09521234543213?99=TEST&singleton' });

      expect(result).toMatchObject({
        success: true,
        aiDataStr: '(01)09521234543213(99)TEST',
        ignoredQueryParams: ['singleton'],
      });
    });

    it('should return the error message and markup', () => {
      expect(parse({ data: '(01)09521234543214' })).toEqual({
        success: false,
        message: 'AI (01): The numeric check digit is incorrect.',
        markup: '(01)0952123454321|4|',
      });
    });

    it('should hold data to the requested format', () => {
      expect(parse({ data: '^0109521234543213', format: 'digital_link' })).toEqual({
        success: false,
        message: 'Data is not a GS1 Digital Link URI',
        markup: '',
      });
    });

    it('should apply per-call validations', () => {
      expect(parse({ data: '(02)09521234543213' })).toMatchObject({ success: false });
      expect(parse({ data: '(02)09521234543213', validations: { REQUISITE_AIS: false } })).toMatchObject({
        success: true,
        dataStr: '^0209521234543213',
      });
    });
  });

  describe('gs1_digital_link', () => {
    it('should build a URI under the default stem', () => {
      expect(digitalLink({ data: '(01)12312312312319(99)TESTING123' })).toEqual({
        success: true,
        message: 'Generated GS1 Digital Link URI.',
        uri: 'https://id.gs1.org/01/12312312312319?99=TESTING123',
      });
    });

    it('should use a given stem', () => {
      expect(digitalLink({ data: '^0109521234543213', stem: 'https://example.com' })).toMatchObject({
        uri: 'https://example.com/01/09521234543213',
      });
    });

    it('should fail without a primary key', () => {
      expect(digitalLink({ data: '(99)TEST' })).toEqual({
        success: false,
        message: 'Cannot create a DL URI without a primary key AI',
        markup: '',
      });
    });
  });

  describe('gs1_scan_data', () => {
    it('should generate scan data', () => {
      expect(scanData({ data: '(01)09521234543213(10)ABC', symbology: 'QR' })).toEqual({
        success: true,
        message: 'Generated scan data for QR.',
        symbology: 'QR',
        scanData: ']Q3010952123454321310ABC',
        dataStr: '^010952123454321310ABC',
        hri: ['(01) 09521234543213', '(10) ABC'],
      });
    });

    it('should process scan data', () => {
      expect(scanData({ scanData: ']E09521234543213' })).toMatchObject({
        success: true,
        symbology: 'EAN13',
        dataStr: '9521234543213',
        hri: [],
      });
    });

    it('should need scan data or data with a symbology', () => {
      expect(scanData({ data: '(01)09521234543213' })).toEqual({
        success: false,
        message: 'Either scanData, or data together with symbology, is required',
        markup: '',
      });
    });
  });

  describe('gs1_check_digit', () => {
    it('should compute and verify', () => {
      expect(checkDigit({ digits: '0952123454321' })).toMatchObject({ success: true, checkDigit: '3' });
      expect(checkDigit({ digits: '09521234543213', mode: 'verify' })).toMatchObject({ valid: true });
      expect(checkDigit({ digits: '09521234543212', mode: 'verify' })).toMatchObject({ valid: false });
    });

    it('should reject non-digits', () => {
      expect(checkDigit({ digits: '12A' })).toEqual({
        success: false,
        message: 'Check digit input must be a non-empty string of digits',
        markup: '',
      });
    });
  });

  describe('callTool', () => {
    it('should dispatch by name and return JSON text', () => {
      expect(resultOf('gs1_check_digit', { digits: '1231231231231' })).toMatchObject({ checkDigit: '9' });
    });

    it('should update and show the config', () => {
      expect(resultOf('gs1_config', { dlStem: 'https://example.com' })).toMatchObject({
        success: true,
        message: 'Updated dlStem.',
        config: { dlStem: 'https://example.com' },
      });
      expect(resultOf('gs1_digital_link', { data: '(01)09521234543213' })).toMatchObject({
        uri: 'https://example.com/01/09521234543213',
      });
      expect(resultOf('gs1_config', { show: true })).toMatchObject({
        message: 'Current configuration:',
        config: { config_path: join(dir, 'config.json') },
      });
    });

    it('should report an unknown tool', () => {
      expect(callTool('gs1_nope')).toEqual({
        content: [{ type: 'text', text: 'Unknown tool: gs1_nope' }],
        isError: true,
      });
    });

    it('should report malformed arguments', () => {
      expect(callTool('gs1_parse', { data: 5 })).toEqual({
        content: [{ type: 'text', text: 'Error: Argument "data" must be a string' }],
        isError: true,
      });
      expect(callTool('gs1_parse', {})).toMatchObject({
        content: [{ type: 'text', text: 'Error: Missing required argument "data"' }],
      });
      expect(callTool('gs1_parse', { data: '(01)09521234543213', validations: { NO_SUCH_RULE: true } })).toMatchObject({
        content: [{ type: 'text', text: 'Error: Unknown validation: NO_SUCH_RULE' }],
      });
      expect(callTool('gs1_scan_data', { data: 'X', symbology: 'Aztec' })).toMatchObject({
        content: [{ type: 'text', text: 'Error: Unknown symbology: Aztec' }],
      });
    });
  });
});

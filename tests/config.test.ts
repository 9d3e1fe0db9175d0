/**
 * Configuration Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  clearConfigCache,
  getConfigForDisplay,
  getConfigPath,
  loadConfig,
  resetConfig,
  updateConfig,
  validateConfig,
} from '../src/config/index.js';
import { GS1Encoder } from '../src/encoder.js';
import { DEFAULT_CONFIG } from '../src/types.js';

describe('Configuration', () => {
  let dir: string;
  let configPath: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'gs1-syntax-config-'));
    configPath = join(dir, 'config.json');
    process.env.GS1_SYNTAX_CONFIG = configPath;
    clearConfigCache();
  });

  afterEach(() => {
    delete process.env.GS1_SYNTAX_CONFIG;
    delete process.env.GS1_ADD_CHECK_DIGIT;
    delete process.env.GS1_DL_STEM;
    vi.restoreAllMocks();
    clearConfigCache();
    rmSync(dir, { recursive: true, force: true });
  });

  it('should read the config path from the environment', () => {
    expect(getConfigPath()).toBe(configPath);
  });

  it('should use defaults without a config file', () => {
    expect(loadConfig()).toEqual(DEFAULT_CONFIG);
  });

  it('should persist updates', () => {
    updateConfig({ dlStem: 'https://example.com', permitUnknownAIs: true });
    clearConfigCache();

    const config = loadConfig();
    expect(config.dlStem).toBe('https://example.com');
    expect(config.permitUnknownAIs).toBe(true);

    const saved: unknown = JSON.parse(readFileSync(configPath, 'utf-8'));
    expect(saved).toMatchObject({ dlStem: 'https://example.com', permitUnknownAIs: true });
  });

  it('should ignore fields of the wrong type', () => {
    writeFileSync(configPath, JSON.stringify({ permitUnknownAIs: 'yes', dlStem: 'https://example.org' }));

    const config = loadConfig();
    expect(config.permitUnknownAIs).toBe(false);
    expect(config.dlStem).toBe('https://example.org');
  });

  it('should fall back to defaults when the file is not JSON', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    writeFileSync(configPath, '{ not json');

    expect(loadConfig()).toEqual(DEFAULT_CONFIG);
    expect(errorSpy).toHaveBeenCalledWith('Failed to load config file:', expect.any(SyntaxError));
  });

  it('should let environment variables override the file', () => {
    writeFileSync(configPath, JSON.stringify({ addCheckDigit: false, dlStem: 'https://example.org' }));
    process.env.GS1_ADD_CHECK_DIGIT = 'true';
    process.env.GS1_DL_STEM = 'https://example.net';

    const config = loadConfig();
    expect(config.addCheckDigit).toBe(true);
    expect(config.dlStem).toBe('https://example.net');
  });

  it('should cache the loaded config', () => {
    const first = loadConfig();
    writeFileSync(configPath, JSON.stringify({ dlStem: 'https://example.org' }));

    expect(loadConfig()).toBe(first);
  });

  it('should show the config file and the bundled dictionary', () => {
    const display = getConfigForDisplay();

    expect(display.config_path).toBe(configPath);
    expect(display.syntaxDictionaryPath).toBe('(bundled)');
  });

  it('should report invalid settings', () => {
    updateConfig({ dlStem: 'ftp://example.com', syntaxDictionaryPath: join(dir, 'missing.txt') });

    expect(validateConfig()).toEqual({
      valid: false,
      issues: [
        'DL stem must be an http:// or https:// URI: ftp://example.com',
        `Syntax dictionary not found: ${join(dir, 'missing.txt')}`,
      ],
    });
  });

  it('should reset to defaults', () => {
    updateConfig({ includeDataTitlesInHRI: true });

    expect(resetConfig()).toEqual(DEFAULT_CONFIG);
    expect(validateConfig()).toEqual({ valid: true, issues: [] });
  });

  it('should build an engine from the config', () => {
    const encoder = GS1Encoder.fromConfig({ ...DEFAULT_CONFIG, addCheckDigit: true, validateAIassociations: false });

    expect(encoder.addCheckDigit).toBe(true);
    expect(encoder.validateAIassociations).toBe(false);
    expect(encoder.permitUnknownAIs).toBe(false);
  });
});

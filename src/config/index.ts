/**
 * Configuration Management
 *
 * Default engine options and the DL stem, persisted as JSON.
 * Config is stored in ~/.gs1-syntax/config.json unless GS1_SYNTAX_CONFIG
 * names another file.
 */

import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'fs';
import { homedir } from 'os';
import { dirname, join } from 'path';
import type { GS1Config } from '../types.js';
import { DEFAULT_CONFIG } from '../types.js';

const DEFAULT_CONFIG_PATH = join(homedir(), '.gs1-syntax', 'config.json');

type BooleanField = {
  [K in keyof GS1Config]-?: GS1Config[K] extends boolean ? K : never;
}[keyof GS1Config];

const BOOLEAN_FIELDS: readonly BooleanField[] = [
  'permitUnknownAIs',
  'addCheckDigit',
  'permitZeroSuppressedGTINinDLuris',
  'permitConvenienceAlphas',
  'includeDataTitlesInHRI',
  'validateAIassociations',
];

const BOOLEAN_ENV: Readonly<Record<BooleanField, string>> = {
  permitUnknownAIs: 'GS1_PERMIT_UNKNOWN_AIS',
  addCheckDigit: 'GS1_ADD_CHECK_DIGIT',
  permitZeroSuppressedGTINinDLuris: 'GS1_PERMIT_ZERO_SUPPRESSED_GTIN_IN_DL_URIS',
  permitConvenienceAlphas: 'GS1_PERMIT_CONVENIENCE_ALPHAS',
  includeDataTitlesInHRI: 'GS1_INCLUDE_DATA_TITLES_IN_HRI',
  validateAIassociations: 'GS1_VALIDATE_AI_ASSOCIATIONS',
};

// In-memory config cache
let currentConfig: GS1Config | null = null;

/**
 * Path of the config file, read from the environment on each call
 */
export function getConfigPath(): string {
  return process.env.GS1_SYNTAX_CONFIG || DEFAULT_CONFIG_PATH;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Pick the recognised, correctly typed fields from a parsed config file
 */
function configFromJSON(value: unknown): Partial<GS1Config> {
  if (!isRecord(value)) {
    throw new Error('Config file must contain a JSON object');
  }

  const config: Partial<GS1Config> = {};
  for (const field of BOOLEAN_FIELDS) {
    const v = value[field];
    if (typeof v === 'boolean') {
      config[field] = v;
    }
  }
  if (typeof value.dlStem === 'string') {
    config.dlStem = value.dlStem;
  }
  if (typeof value.syntaxDictionaryPath === 'string') {
    config.syntaxDictionaryPath = value.syntaxDictionaryPath;
  }
  return config;
}

/**
 * Load configuration from disk or environment
 */
export function loadConfig(): GS1Config {
  if (currentConfig) {
    return currentConfig;
  }

  let config: GS1Config = { ...DEFAULT_CONFIG };
  const configPath = getConfigPath();

  // Try to load from file
  if (existsSync(configPath)) {
    try {
      const fileContent = readFileSync(configPath, 'utf-8');
      config = { ...config, ...configFromJSON(JSON.parse(fileContent)) };
    } catch (error) {
      console.error('Failed to load config file:', error);
    }
  }

  // Override with environment variables
  for (const field of BOOLEAN_FIELDS) {
    const env = process.env[BOOLEAN_ENV[field]];
    if (env !== undefined) {
      config[field] = env === 'true';
    }
  }

  if (process.env.GS1_DL_STEM) {
    config.dlStem = process.env.GS1_DL_STEM;
  }

  if (process.env.GS1_SYNTAX_DICTIONARY) {
    config.syntaxDictionaryPath = process.env.GS1_SYNTAX_DICTIONARY;
  }

  currentConfig = config;
  return config;
}

/**
 * Save configuration to disk
 */
export function saveConfig(config: GS1Config): void {
  const configPath = getConfigPath();
  mkdirSync(dirname(configPath), { recursive: true });
  writeFileSync(configPath, JSON.stringify(config, null, 2), 'utf-8');
  currentConfig = config;
}

/**
 * Update specific config values
 */
export function updateConfig(updates: Partial<GS1Config>): GS1Config {
  const config = loadConfig();
  const newConfig = { ...config, ...updates };
  saveConfig(newConfig);
  return newConfig;
}

/**
 * Get current config (cached)
 */
export function getConfig(): GS1Config {
  return loadConfig();
}

/**
 * Drop the cached config so that the next load rereads file and environment
 */
export function clearConfigCache(): void {
  currentConfig = null;
}

/**
 * Get config for display, with the file it came from
 */
export function getConfigForDisplay(): Record<string, unknown> {
  const config = loadConfig();
  return {
    ...config,
    syntaxDictionaryPath: config.syntaxDictionaryPath ?? '(bundled)',
    config_path: getConfigPath(),
  };
}

/**
 * Reset config to defaults
 */
export function resetConfig(): GS1Config {
  saveConfig({ ...DEFAULT_CONFIG });
  currentConfig = null;
  return loadConfig();
}

/**
 * Validate config and return any issues
 */
export function validateConfig(): { valid: boolean; issues: string[] } {
  const config = loadConfig();
  const issues: string[] = [];

  if (!/^https?:\/\/[^/]+/i.test(config.dlStem)) {
    issues.push(`DL stem must be an http:// or https:// URI: ${config.dlStem}`);
  }

  if (config.syntaxDictionaryPath !== undefined && !existsSync(config.syntaxDictionaryPath)) {
    issues.push(`Syntax dictionary not found: ${config.syntaxDictionaryPath}`);
  }

  return {
    valid: issues.length === 0,
    issues,
  };
}

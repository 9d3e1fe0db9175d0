/**
 * GS1 Syntax Engine
 *
 * Parses, validates and converts GS1 Application Identifier data between
 * bracketed AI data, "^" data strings, barcode scan data, GS1 Digital Link
 * URIs and HRI text.
 */

export { GS1Encoder } from './encoder.js';
export * from './types.js';
export * from './errors.js';
export {
  loadConfig,
  saveConfig,
  updateConfig,
  getConfig,
  clearConfigCache,
  getConfigPath,
  getConfigForDisplay,
  resetConfig,
  validateConfig,
} from './config/index.js';
export {
  loadSyntaxDictionary,
  parseSyntaxDictionary,
  parseSyntaxDictionaryEntry,
} from './syntax/dictionary.js';
export { AITable, getBundledAITable } from './syntax/table.js';
export { computeCheckDigit, verifyCheckDigit, addCheckDigit } from './ai/checkdigit.js';
export {
  LINTERS,
  LINT_MESSAGES,
  type LinterName,
  type Linter,
  type LintError,
  type LintCode,
  isLinterName,
  lintMessage,
} from './syntax/lint/index.js';

/**
 * Bundled data files
 *
 * Resolves files under data/ relative to this module, so the same lookup
 * works from src/ under the test runner and from dist/ once built.
 */

import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { InitializationError } from './errors.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

export const DATA_DIR = join(__dirname, '..', 'data');

const codeLists = new Map<string, ReadonlySet<string>>();

/**
 * Read a bundled text file
 */
export function readDataFile(name: string): string {
  return readFileSync(join(DATA_DIR, name), 'utf-8');
}

/**
 * Load a JSON array of codes as a set, cached per file
 */
export function loadCodeList(name: string): ReadonlySet<string> {
  const cached = codeLists.get(name);
  if (cached) {
    return cached;
  }

  const parsed: unknown = JSON.parse(readDataFile(name));
  if (!Array.isArray(parsed) || !parsed.every((code): code is string => typeof code === 'string')) {
    throw new InitializationError(`Code list ${name} must be an array of strings`);
  }

  const codes = new Set(parsed);
  codeLists.set(name, codes);
  return codes;
}

/**
 * Syntax Dictionary Parser
 *
 * Reads AI definitions in the GS1 Syntax Dictionary line format:
 *
 *   AI-or-range [flags] component... [attribute...] [# TITLE]
 *
 * e.g. "01  *?  N14,csum,key  ex=02,255,37 dlpkey=22,10,21|235  # GTIN"
 */

import { readFileSync } from 'fs';
import { readDataFile } from '../data.js';
import { InitializationError, SyntaxDictionaryError } from '../errors.js';
import type { AIAttribute, AIComponent, AIEntry, CharacterSet, DLDataAttr } from '../types.js';
import { type LinterName, isLinterName } from './lint/index.js';

export const MIN_AI_LEN = 2;
export const MAX_AI_LEN = 4;
export const DEFAULT_SYNTAX_DICTIONARY = 'gs1-syntax-dictionary.txt';

const FLAG_CHARS = /^[*?!"$%&'()+,\-./:;<=>@[\\\]^_`{|}~]+$/;
const ATTR_NAME = /^[a-z]+$/;
const ATTR_VALUE = /^[a-z0-9\-+_,|]*$/;
const TITLE_CHARS = /^[A-Za-z0-9#()\-+,./²³ ]*$/;

const CHARACTER_SETS: Record<string, CharacterSet> = { N: 'N', X: 'X', Y: 'Y', Z: 'Z' };

/** Thrown for a malformed line; the caller adds the line number */
class LineError extends Error {}

function isDigits(s: string): boolean {
  return /^[0-9]+$/.test(s);
}

/**
 * Parse a length specification such as "14" or "..20"
 */
function parseLength(spec: string, token: string): { min: number; max: number } {
  const fixed = /^[1-9]/.test(spec);
  const variable = spec.length >= 3 && spec.startsWith('..') && /^[1-9]$/.test(spec[2]);

  if (!fixed && !variable) {
    throw new LineError(`Unrecognised format specification for component: ${token}`);
  }

  const digits = fixed ? spec : spec.slice(2);
  if (digits.length > 2) {
    throw new LineError(`AI length too long: ${token}`);
  }
  if (!isDigits(digits)) {
    throw new LineError(`AI length is not a number: ${token}`);
  }

  const n = Number(digits);
  return fixed ? { min: n, max: n } : { min: 1, max: n };
}

/**
 * Parse a component such as "N14,csum,key" or "[X..17]"
 */
function parseComponent(component: string): AIComponent {
  const [token, ...linterNames] = component.split(',');

  let spec = token;
  const optional = token.startsWith('[');
  if (optional) {
    if (!token.endsWith(']')) {
      throw new LineError(`Format specification for optional component is missing ']': ${token}`);
    }
    spec = token.slice(1, -1);
  }

  const cset = CHARACTER_SETS[spec.charAt(0)];
  if (!cset) {
    throw new LineError(`Unknown character set ${spec.charAt(0)}`);
  }
  if (spec.length < 2) {
    throw new LineError(`Format specification for component is too short: ${token}`);
  }

  const { min, max } = parseLength(spec.slice(1), token);

  const linters: LinterName[] = [];
  for (const name of linterNames) {
    if (!isLinterName(name)) {
      throw new LineError(`Unknown linter '${name}'`);
    }
    linters.push(name);
  }

  return { cset, min, max, optional, linters };
}

/**
 * Parse the AI or AI range token into the list of AIs it covers
 */
function parseAIs(token: string): string[] {
  const dash = token.indexOf('-');

  if (dash === -1) {
    if (token.length < MIN_AI_LEN || token.length > MAX_AI_LEN) {
      throw new LineError('AI has wrong width');
    }
    if (!isDigits(token)) {
      throw new LineError('AI must be numeric');
    }
    return [token];
  }

  const len = token.length;
  if (len < MIN_AI_LEN * 2 + 1 || len > MAX_AI_LEN * 2 + 1) {
    throw new LineError('AI range has wrong width');
  }
  const width = Math.floor(len / 2);
  if (len % 2 !== 1 || dash !== width) {
    throw new LineError('AIs in range must have equal width');
  }

  const start = token.slice(0, width);
  const end = token.slice(width + 1);
  if (!isDigits(start) || !isDigits(end)) {
    throw new LineError('AIs must be numeric');
  }
  if (start.slice(0, -1) !== end.slice(0, -1)) {
    throw new LineError('AI range parts may only differ in their last digit');
  }

  const first = Number(start.slice(-1));
  const last = Number(end.slice(-1));
  if (first >= last) {
    throw new LineError('AI range end must exceed range start');
  }

  const ais: string[] = [];
  for (let d = first; d <= last; d++) {
    ais.push(start.slice(0, -1) + d);
  }
  return ais;
}

function parseAttribute(token: string): AIAttribute {
  const eq = token.indexOf('=');

  if (eq === -1) {
    if (!ATTR_NAME.test(token)) {
      throw new LineError('Singleton attribute name contains illegal characters');
    }
    return { name: token };
  }

  if (eq === 0) {
    throw new LineError('Attribute name required on LHS of assignment');
  }
  const name = token.slice(0, eq);
  const value = token.slice(eq + 1);
  if (!ATTR_NAME.test(name)) {
    throw new LineError('Attribute name contains illegal characters');
  }
  if (!ATTR_VALUE.test(value)) {
    throw new LineError('Attribute value contains illegal characters');
  }
  if (value === '') {
    throw new LineError('Attribute value required on RHS of assignment');
  }
  return { name, value };
}

function parseLine(line: string): AIEntry[] {
  const tokens = line.split(/[ \t]+/).filter((t) => t !== '');
  if (tokens.length === 0 || tokens[0].startsWith('#')) {
    return [];
  }

  const ais = parseAIs(tokens[0]);
  let i = 1;
  if (i >= tokens.length) {
    throw new LineError('Truncated after AI');
  }

  let fnc1 = true;
  let dlDataAttr: DLDataAttr = 'none';
  while (FLAG_CHARS.test(tokens[i])) {
    if (tokens[i].includes('*')) {
      fnc1 = false;
    }
    if (tokens[i].includes('?')) {
      dlDataAttr = 'permitted';
    }
    if (++i >= tokens.length) {
      throw new LineError('Truncated after flags');
    }
  }

  const components: AIComponent[] = [];
  while (i < tokens.length && /^[A-Z[]/.test(tokens[i])) {
    components.push(parseComponent(tokens[i++]));
  }
  if (components.length === 0) {
    throw new LineError('AI is missing components');
  }
  components.forEach((c, n) => {
    if (n < components.length - 1 && c.min !== c.max) {
      throw new LineError('Only the final component may have variable length');
    }
    if (n > 0 && !c.optional && components[n - 1].optional) {
      throw new LineError('A mandatory component cannot follow optional components');
    }
  });

  const attrs: AIAttribute[] = [];
  while (i < tokens.length && tokens[i] !== '#') {
    attrs.push(parseAttribute(tokens[i++]));
  }

  let title = '';
  const hash = line.search(/[ \t]#([ \t]|$)/);
  if (i < tokens.length && hash !== -1) {
    title = line.slice(hash + 2).trim();
    if (!TITLE_CHARS.test(title)) {
      throw new LineError('Title contains illegal characters');
    }
  }

  return ais.map((ai) => ({ ai, fnc1, dlDataAttr, components, attrs, title }));
}

/**
 * Parse one dictionary line into its AI entries (several for a range)
 */
export function parseSyntaxDictionaryEntry(line: string, lineNumber = 1): AIEntry[] {
  try {
    return parseLine(line);
  } catch (error) {
    if (error instanceof LineError) {
      throw new SyntaxDictionaryError(lineNumber, error.message);
    }
    throw error;
  }
}

/**
 * Parse a complete dictionary
 */
export function parseSyntaxDictionary(text: string): AIEntry[] {
  const entries: AIEntry[] = [];
  text.split(/\r?\n/).forEach((line, index) => {
    entries.push(...parseSyntaxDictionaryEntry(line, index + 1));
  });
  return entries;
}

/**
 * Load a dictionary from a file path or from dictionary text. Without a
 * source, the bundled dictionary is used. A source spanning several lines
 * is taken as dictionary text.
 */
export function loadSyntaxDictionary(source?: string): AIEntry[] {
  if (source === undefined) {
    return parseSyntaxDictionary(readDataFile(DEFAULT_SYNTAX_DICTIONARY));
  }
  if (source.includes('\n')) {
    return parseSyntaxDictionary(source);
  }

  let text: string;
  try {
    text = readFileSync(source, 'utf-8');
  } catch {
    throw new InitializationError(`Cannot read file ${source}`);
  }
  return parseSyntaxDictionary(text);
}

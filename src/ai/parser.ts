/**
 * AI Data Parser
 *
 * Converts between bracketed AI syntax "(01)...(10)..." and the plain
 * data string "^01...10...", where "^" stands for FNC1, extracting the
 * AI elements along the way.
 */

import { ParameterError } from '../errors.js';
import type { AITable } from '../syntax/table.js';
import { isGenericUnknownEntry } from '../syntax/table.js';
import type { AIElement, AIEntry, ProcessingOptions } from '../types.js';
import { addCheckDigit } from './checkdigit.js';
import { checkAIValueLengthAndContent, validateAIValue } from './validate.js';

export const MAX_AIS = 64;

export interface ParsedAIData {
  dataStr: string;
  elements: AIElement[];
}

type ParseOptions = Pick<ProcessingOptions, 'permitUnknownAIs' | 'addCheckDigit'>;

/**
 * Complete a value that is one digit short of a fixed-length, check
 * digit terminated first component
 */
function withCheckDigit(entry: AIEntry, value: string): string {
  const first = entry.components[0];
  if (!first || first.min !== first.max || !first.linters.includes('csum')) {
    return value;
  }
  if (value.length !== first.max - 1 || !/^[0-9]+$/.test(value)) {
    return value;
  }
  return addCheckDigit(value);
}

/**
 * Read one bracketed value starting at pos, unescaping "\(". Returns the
 * value and the position of the next "(" or the end.
 */
function readBracketedValue(aiData: string, pos: number): { value: string; next: number } {
  let value = '';
  let r = pos;
  for (;;) {
    let p = aiData.indexOf('(', r);
    if (p === -1) {
      p = aiData.length;
    }
    if (p < aiData.length && aiData[p - 1] === '\\') {
      value += aiData.slice(r, p - 1) + '(';
      r = p + 1;
      continue;
    }
    value += aiData.slice(r, p);
    return { value, next: p };
  }
}

/**
 * Check an element's value against its entry and return the element
 */
export function validateElement(element: AIElement): AIElement {
  const { ai, entry, value } = element;
  const consumed = validateAIValue(ai, entry, value);
  if (consumed !== value.length) {
    throw new ParameterError(`AI (${ai}) data is too long`);
  }
  return element;
}

/**
 * Parse bracketed AI data into a plain data string and its elements
 */
export function parseAIdata(table: AITable, aiData: string, options: ParseOptions): ParsedAIData {
  const elements: AIElement[] = [];
  let dataStr = '';
  let fnc1Required = true;
  let p = 0;

  const fail = (): never => {
    throw new ParameterError('Failed to parse AI data');
  };

  while (p < aiData.length) {
    if (aiData[p++] !== '(') {
      fail();
    }
    const close = aiData.indexOf(')', p);
    if (close === -1) {
      fail();
    }

    const ai = aiData.slice(p, close);
    const entry = table.lookup(ai, ai.length, options.permitUnknownAIs);
    if (!entry) {
      throw new ParameterError(`Unrecognised AI: ${ai}`);
    }

    if (close + 1 >= aiData.length) {
      fail();
    }
    const read = readBracketedValue(aiData, close + 1);
    const value = options.addCheckDigit ? withCheckDigit(entry, read.value) : read.value;
    p = read.next;

    checkAIValueLengthAndContent(ai, entry, value);

    if (elements.length >= MAX_AIS) {
      throw new ParameterError('Too many AIs');
    }

    if (fnc1Required) {
      dataStr += '^';
    }
    dataStr += ai + value;
    fnc1Required = entry.fnc1;

    elements.push({ kind: 'ai', ai, entry, value });
  }

  if (elements.length === 0) {
    fail();
  }

  elements.forEach(validateElement);
  return { dataStr, elements };
}

/**
 * Validate a plain data string starting with FNC1 and extract its AI
 * elements. Unknown AIs must have a length that can be inferred from
 * their prefix. The returned data string differs from the input only
 * where check digits were added.
 */
export function processAIdata(table: AITable, dataStr: string, options: ParseOptions): ParsedAIData {
  if (!dataStr.startsWith('^')) {
    throw new ParameterError('Missing FNC1 in first position');
  }
  if (dataStr.length === 1) {
    throw new ParameterError('The AI data is empty');
  }

  const elements: AIElement[] = [];
  let data = dataStr;
  let p = 1;

  while (p < data.length) {
    const rest = data.slice(p);
    const entry = table.lookup(rest, 0, options.permitUnknownAIs);
    if (!entry || isGenericUnknownEntry(entry)) {
      throw new ParameterError(`No known AI is a prefix of: ${rest.slice(0, 4)}...`);
    }

    const ai = rest.slice(0, table.aiLength(entry, rest));
    p += ai.length;

    let r = data.indexOf('^', p);
    if (r === -1) {
      r = data.length;
    }

    if (options.addCheckDigit) {
      const completed = withCheckDigit(entry, data.slice(p, r));
      data = data.slice(0, p) + completed + data.slice(r);
      r = p + completed.length;
    }

    const consumed = validateAIValue(ai, entry, data.slice(p, r));

    if (elements.length >= MAX_AIS) {
      throw new ParameterError('Too many AIs');
    }
    elements.push({ kind: 'ai', ai, entry, value: data.slice(p, p + consumed) });

    p += consumed;
    if (entry.fnc1 && p < data.length && data[p] !== '^') {
      throw new ParameterError(`AI (${ai}) data is too long`);
    }
    if (data[p] === '^') {
      p++;
    }
  }

  return { dataStr: data, elements };
}

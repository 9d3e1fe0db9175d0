/**
 * AI Value Validation
 *
 * Walks an AI value component by component, running the character set
 * linter and then each linter named by the component.
 */

import { ParameterError } from '../errors.js';
import { LINTERS, type Linter, lintMessage } from '../syntax/lint/index.js';
import type { AIComponent, AIEntry, CharacterSet } from '../types.js';

const CSET_LINTERS: Record<CharacterSet, Linter> = {
  N: LINTERS.csetnumeric,
  X: LINTERS.cset82,
  Y: LINTERS.cset39,
  Z: LINTERS.cset64,
};

/** Sum of the mandatory components' minimum lengths */
export function entryMinLength(entry: AIEntry): number {
  return entry.components.reduce((sum, c) => sum + (c.optional ? 0 : c.min), 0);
}

/** Sum of all components' maximum lengths */
export function entryMaxLength(entry: AIEntry): number {
  return entry.components.reduce((sum, c) => sum + c.max, 0);
}

function componentLinters(component: AIComponent): Linter[] {
  return [CSET_LINTERS[component.cset], ...component.linters.map((name) => LINTERS[name])];
}

/**
 * Validate the data following an AI, up to the next FNC1 or the end.
 * Returns how many characters the components consumed, which may be fewer
 * than supplied for a fixed-length AI.
 */
export function validateAIValue(ai: string, entry: AIEntry, data: string): number {
  if (data.length === 0) {
    throw new ParameterError(`AI (${ai}) data is empty`);
  }

  let p = 0;
  for (const component of entry.components) {
    const value = data.slice(p, p + component.max);

    if (component.optional && value.length === 0) {
      continue;
    }
    if (value.length < component.min) {
      throw new ParameterError(`AI (${ai}) data has incorrect length`);
    }

    for (const linter of componentLinters(component)) {
      const err = linter(value);
      if (!err) {
        continue;
      }
      const start = p + err.pos;
      const end = start + err.len;
      const markup = `(${ai})${data.slice(0, start)}|${data.slice(start, end)}|${data.slice(end, p + value.length)}`;
      throw new ParameterError(`AI (${ai}): ${lintMessage(err.code)}`, markup);
    }

    p += value.length;
  }

  return p;
}

/**
 * Length and "^" checks applied to a complete value before linting, so
 * that an over-long value is not reported as a check digit failure
 */
export function checkAIValueLengthAndContent(ai: string, entry: AIEntry, value: string): void {
  if (value.length < entryMinLength(entry)) {
    throw new ParameterError(`AI (${ai}) value is too short`);
  }
  if (value.length > entryMaxLength(entry)) {
    throw new ParameterError(`AI (${ai}) value is too long`);
  }
  if (value.includes('^')) {
    throw new ParameterError(`AI (${ai}) contains illegal ^ character`);
  }
}

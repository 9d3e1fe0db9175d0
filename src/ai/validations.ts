/**
 * AI Association Validations
 *
 * Rules that apply across the extracted AIs rather than to one value:
 * mutually exclusive AIs, required companions, repeated AIs and the
 * digital signature's serialised key.
 */

import { ParameterError } from '../errors.js';
import type { AIElement, DataElement, ValidationFlags, ValidationId } from '../types.js';
import { entryMinLength } from './validate.js';

/** Rules that are always enforced */
export const LOCKED_VALIDATIONS: ReadonlySet<ValidationId> = new Set(['MUTEX_AIS', 'REPEATED_AIS']);

export const DEFAULT_VALIDATIONS: Readonly<ValidationFlags> = {
  MUTEX_AIS: true,
  REQUISITE_AIS: true,
  REPEATED_AIS: true,
  DIGSIG_SERIAL_KEY: true,
  UNKNOWN_AI_NOT_DL_ATTR: true,
};

const DIGSIG_SERIALISED_KEYS = ['253', '255', '8003'];

/** AI elements only, sorted by AI */
function sortedAIs(elements: readonly DataElement[]): AIElement[] {
  const ais = elements.filter((e): e is AIElement => e.kind === 'ai');
  return ais.sort((a, b) => (a.ai < b.ai ? -1 : a.ai > b.ai ? 1 : 0));
}

/**
 * Find an AI matching a pattern such as "8030", "394n" or "35nn", where
 * "n" matches any digit. An AI equal to ignoreAI never matches.
 */
export function findAI(elements: readonly AIElement[], pattern: string, ignoreAI?: string): AIElement | undefined {
  const prefix = /^[0-9]*/.exec(pattern)?.[0] ?? '';
  if (prefix.length === 0) {
    return undefined;
  }
  return elements.find((e) =>
    e.ai.length === pattern.length && e.ai.startsWith(prefix) && e.ai !== ignoreAI
  );
}

function attrValues(element: AIElement, name: string): string[] {
  return element.entry.attrs
    .filter((attr) => attr.name === name && attr.value !== undefined)
    .map((attr) => attr.value ?? '');
}

function validateMutex(ais: AIElement[]): void {
  for (const element of ais) {
    for (const ex of attrValues(element, 'ex')) {
      for (const pattern of ex.split(',')) {
        const match = findAI(ais, pattern, element.ai);
        if (match) {
          throw new ParameterError(`It is invalid to pair AI (${element.ai}) with AI (${match.ai})`);
        }
      }
    }
  }
}

function validateRequisites(ais: AIElement[]): void {
  for (const element of ais) {
    for (const req of attrValues(element, 'req')) {
      const satisfied = req.split(',').some((group) =>
        group.split('+').every((pattern) => findAI(ais, pattern, element.ai) !== undefined)
      );
      if (!satisfied) {
        throw new ParameterError(`Required AIs for AI (${element.ai}) are not satisfied: ${req}`);
      }
    }
  }
}

function validateRepeats(ais: AIElement[]): void {
  for (let i = 0; i < ais.length - 1; i++) {
    const a = ais[i];
    const b = ais[i + 1];
    if (a.ai === b.ai && a.value !== b.value) {
      throw new ParameterError(`Multiple instances of AI (${a.ai}) have different values`);
    }
  }
}

function validateDigSigSerialKey(ais: AIElement[]): void {
  if (!findAI(ais, '8030')) {
    return;
  }
  for (const key of DIGSIG_SERIALISED_KEYS) {
    const match = findAI(ais, key);
    if (match && match.value.length === entryMinLength(match.entry)) {
      throw new ParameterError(`Serial component must be present for AI (${match.ai}) when used with AI (8030)`);
    }
  }
}

const RULES: ReadonlyArray<[ValidationId, (ais: AIElement[]) => void]> = [
  ['MUTEX_AIS', validateMutex],
  ['REQUISITE_AIS', validateRequisites],
  ['REPEATED_AIS', validateRepeats],
  ['DIGSIG_SERIAL_KEY', validateDigSigSerialKey],
];

/**
 * Run each enabled rule in turn, throwing on the first violation
 */
export function validateAIs(elements: readonly DataElement[], flags: ValidationFlags): void {
  const ais = sortedAIs(elements);
  for (const [id, rule] of RULES) {
    if (flags[id]) {
      rule(ais);
    }
  }
}

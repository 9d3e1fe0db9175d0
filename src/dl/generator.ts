/**
 * Digital Link URI Generator
 */

import { findAI } from '../ai/validations.js';
import { DigitalLinkError } from '../errors.js';
import type { AITable } from '../syntax/table.js';
import type { AIElement, DataElement, ValidationFlags } from '../types.js';
import { uriEscape } from './uri.js';

export const DEFAULT_DL_STEM = 'https://id.gs1.org';

/**
 * Path elements recorded when the data came from a DL URI, in path order
 */
function recordedPath(ais: readonly AIElement[]): AIElement[] {
  const path: AIElement[] = [];
  for (const element of ais) {
    if (element.dlPathOrder !== undefined) {
      path[element.dlPathOrder] = element;
    }
  }
  return path;
}

/**
 * Choose the primary key and the longest key-qualifier sequence that the
 * data satisfies, preferring the first such sequence in sorted order
 */
function selectPath(table: AITable, ais: readonly AIElement[]): AIElement[] {
  const key = ais.find((element) => table.isDLpkey(element.ai));
  if (!key) {
    throw new DigitalLinkError('Cannot create a DL URI without a primary key AI');
  }

  let best = [key.ai];
  for (const sequence of table.dlKeyQualifiers) {
    const [first, ...qualifiers] = sequence.split(' ');
    if (first !== key.ai) {
      continue;
    }
    if (qualifiers.length > best.length - 1 && qualifiers.every((q) => findAI(ais, q) !== undefined)) {
      best = [first, ...qualifiers];
    }
  }

  return [key, ...best.slice(1).flatMap((ai) => findAI(ais, ai) ?? [])];
}

/**
 * Build a DL URI from the elements. Path info holds the key and its
 * qualifiers; other AIs become query parameters, fixed-length AIs first.
 */
export function generateDLuri(
  table: AITable,
  elements: readonly DataElement[],
  validations: Pick<ValidationFlags, 'UNKNOWN_AI_NOT_DL_ATTR'>,
  stem: string = DEFAULT_DL_STEM
): string {
  const ais = elements.filter((e): e is AIElement => e.kind === 'ai');

  const recorded = recordedPath(ais);
  const path = recorded.length > 0 ? recorded : selectPath(table, ais);

  const emitted = new Set(path.map((element) => element.ai));
  let uri = stem.endsWith('/') ? stem.slice(0, -1) : stem;
  for (const element of path) {
    uri += `/${element.ai}/${uriEscape(element.value, false)}`;
  }

  const params: string[] = [];
  for (const fixed of [true, false]) {
    for (const element of ais) {
      if (element.dlPathOrder !== undefined || element.entry.fnc1 === fixed || emitted.has(element.ai)) {
        continue;
      }
      const { dlDataAttr } = element.entry;
      if (dlDataAttr === 'none' || (dlDataAttr === 'unknown' && validations.UNKNOWN_AI_NOT_DL_ATTR)) {
        throw new DigitalLinkError(`AI (${element.ai}) is not a valid DL URI data attribute`);
      }
      params.push(`${element.ai}=${uriEscape(element.value, true)}`);
      emitted.add(element.ai);
    }
  }

  return params.length > 0 ? `${uri}?${params.join('&')}` : uri;
}

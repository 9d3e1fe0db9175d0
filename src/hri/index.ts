/**
 * Human Readable Interpretation
 *
 * Renders extracted elements as HRI lines and as bracketed AI data.
 */

import type { DataElement } from '../types.js';

/**
 * One "(AI) value" line per AI element, optionally prefixed by the AI's
 * data title
 */
export function formatHRI(elements: readonly DataElement[], includeDataTitles: boolean): string[] {
  const lines: string[] = [];
  for (const element of elements) {
    if (element.kind !== 'ai') {
      continue;
    }
    const line = `(${element.ai}) ${element.value}`;
    lines.push(includeDataTitles && element.entry.title !== '' ? `${element.entry.title} ${line}` : line);
  }
  return lines;
}

/**
 * Bracketed AI data with "(" in values escaped, or null when there are
 * no AI elements
 */
export function formatAIdataStr(elements: readonly DataElement[]): string | null {
  if (elements.length === 0) {
    return null;
  }
  let out = '';
  for (const element of elements) {
    if (element.kind === 'ai') {
      out += `(${element.ai})${element.value.replaceAll('(', '\\(')}`;
    } else if (element.kind === 'ccsep') {
      out += '|';
    }
  }
  return out;
}

/** Non-AI query parameters of a parsed DL URI, in URI order */
export function ignoredQueryParams(elements: readonly DataElement[]): string[] {
  return elements.flatMap((element) => (element.kind === 'dlIgnored' ? [element.value] : []));
}

/**
 * Digital Link URI Parser
 *
 * Extracts AI elements from a GS1 Digital Link URI: the primary key and
 * its qualifiers from the path info, data attributes from the query
 * parameters. Other query parameters are kept, undecoded, as ignored
 * elements.
 */

import { checkAIValueLengthAndContent } from '../ai/validate.js';
import { MAX_AIS, validateElement } from '../ai/parser.js';
import { zeroSuppressedToGTIN14 } from '../ai/checkdigit.js';
import { DigitalLinkError, ParameterError } from '../errors.js';
import type { AITable } from '../syntax/table.js';
import type { AIElement, AIEntry, DataElement, ProcessingOptions } from '../types.js';
import { aiFromConvenienceAlpha, hasBadDomainCharacter, hasOnlyURICharacters, uriUnescape } from './uri.js';

const SCHEMES = ['https://', 'HTTPS://', 'http://', 'HTTP://'];

export interface ParsedDLuri {
  stem: string;
  dataStr: string;
  elements: DataElement[];
}

type DLParseOptions = Pick<
  ProcessingOptions,
  'permitUnknownAIs' | 'permitZeroSuppressedGTINinDLuris' | 'permitConvenienceAlphas' | 'validations'
>;

/** Whether the data looks like an http(s) URI and should be parsed as one */
export function isDLuri(data: string): boolean {
  return SCHEMES.some((scheme) => data.startsWith(scheme));
}

interface ResolvedAI {
  ai: string;
  entry: AIEntry;
}

/**
 * Resolve a path info AI, which may be a convenience alpha
 */
function resolvePathAI(table: AITable, token: string, options: DLParseOptions): ResolvedAI | null {
  if (options.permitConvenienceAlphas && token.length >= 3 && token.length <= 5 && !/^[0-9]/.test(token)) {
    const ai = aiFromConvenienceAlpha(token);
    const entry = ai === undefined ? undefined : table.getEntry(ai);
    if (ai !== undefined && entry) {
      return { ai, entry };
    }
  }
  const entry = table.lookup(token, token.length, options.permitUnknownAIs);
  return entry ? { ai: token, entry } : null;
}

/**
 * Split off the scheme and domain, returning the path info onwards
 */
function splitAuthority(uri: string): { authority: string; rest: string } {
  if (!hasOnlyURICharacters(uri)) {
    throw new DigitalLinkError('URI contains illegal characters');
  }

  const scheme = SCHEMES.find((s) => uri.startsWith(s));
  if (!scheme) {
    throw new DigitalLinkError('Scheme must be http:// or HTTP:// or https:// or HTTPS://');
  }

  const afterScheme = uri.slice(scheme.length);
  const slash = afterScheme.indexOf('/');
  const domain = slash === -1 ? afterScheme : afterScheme.slice(0, slash);
  if (hasBadDomainCharacter(domain)) {
    throw new DigitalLinkError('Domain contains illegal characters');
  }
  if (slash === -1 || slash === 0) {
    throw new DigitalLinkError('URI must contain a domain and path info');
  }

  return { authority: scheme + domain, rest: afterScheme.slice(slash) };
}

/**
 * Index into the path segments of the primary key AI, found by walking
 * "/AI/value" pairs backwards from the end
 */
function findPrimaryKey(table: AITable, segments: string[], options: DLParseOptions): number {
  for (let i = segments.length - 2; i >= 1; i -= 2) {
    const resolved = resolvePathAI(table, segments[i], options);
    if (!resolved) {
      break;
    }
    if (table.isDLpkey(resolved.entry.ai)) {
      return i;
    }
  }
  throw new DigitalLinkError('No GS1 DL keys found in path info');
}

/**
 * Check the path and query AIs against the DL key-qualifier rules
 */
function checkDLstructure(table: AITable, pathAIs: string[], elements: AIElement[], options: DLParseOptions): void {
  if (!table.isValidDLpathAIseq(pathAIs)) {
    throw new DigitalLinkError('The AIs in the path are not a valid key-qualifier sequence for the key');
  }

  const sorted = [...elements].sort((a, b) => (a.ai < b.ai ? -1 : a.ai > b.ai ? 1 : 0));
  for (let i = 0; i < sorted.length - 1; i++) {
    if (sorted[i].ai === sorted[i + 1].ai) {
      throw new DigitalLinkError(`AI (${sorted[i].ai}) is duplicated`);
    }
  }

  for (const element of sorted) {
    if (element.dlPathOrder !== undefined) {
      continue;
    }
    const { dlDataAttr } = element.entry;
    if (dlDataAttr === 'none' || (dlDataAttr === 'unknown' && options.validations.UNKNOWN_AI_NOT_DL_ATTR)) {
      throw new DigitalLinkError(`AI (${element.ai}) is not a valid DL URI data attribute`);
    }

    for (let j = 1; j <= pathAIs.length; j++) {
      const trial = [...pathAIs.slice(0, j), element.ai, ...pathAIs.slice(j)];
      if (table.isValidDLpathAIseq(trial)) {
        throw new DigitalLinkError(`AI (${element.ai}) from query params should be in the path info`);
      }
    }
  }
}

/**
 * Parse a GS1 Digital Link URI into its plain data string and elements.
 * Association validations are left to the caller.
 */
export function parseDLuri(table: AITable, uri: string, options: DLParseOptions): ParsedDLuri {
  const { authority, rest } = splitAuthority(uri);

  const withoutFragment = rest.split('#', 1)[0];
  const q = withoutFragment.indexOf('?');
  const pathInfo = q === -1 ? withoutFragment : withoutFragment.slice(0, q);
  const query = q === -1 ? null : withoutFragment.slice(q + 1);

  const segments = pathInfo.split('/');
  const keyIndex = findPrimaryKey(table, segments, options);
  const stem = authority + segments.slice(0, keyIndex).join('/');

  const elements: DataElement[] = [];
  const aiElements: AIElement[] = [];
  const pathAIs: string[] = [];
  let dataStr = '';
  let fnc1Required = true;

  const append = (element: AIElement): void => {
    if (elements.length >= MAX_AIS) {
      throw new ParameterError('Too many AIs');
    }
    if (fnc1Required) {
      dataStr += '^';
    }
    dataStr += element.ai + element.value;
    fnc1Required = element.entry.fnc1;
    elements.push(element);
    aiElements.push(element);
  };

  for (let i = keyIndex; i < segments.length; i += 2) {
    const resolved = resolvePathAI(table, segments[i], options);
    if (!resolved) {
      throw new DigitalLinkError('Failed to parse DL data');
    }
    const raw = segments[i + 1] ?? '';
    if (raw === '') {
      throw new DigitalLinkError(`AI (${resolved.ai}) value path element is empty`);
    }

    let value = uriUnescape(raw, false);
    if (value === null) {
      throw new DigitalLinkError(`Decoded AI (${resolved.ai}) from DL path info contains illegal null character`);
    }
    if (options.permitZeroSuppressedGTINinDLuris && resolved.entry.ai === '01') {
      value = zeroSuppressedToGTIN14(value);
    }

    checkAIValueLengthAndContent(resolved.ai, resolved.entry, value);
    append({ kind: 'ai', ai: resolved.ai, entry: resolved.entry, value, dlPathOrder: pathAIs.length });
    pathAIs.push(resolved.entry.ai === '' ? resolved.ai : resolved.entry.ai);
  }

  for (const param of query === null ? [] : query.split('&')) {
    if (param === '') {
      continue;
    }

    const eq = param.indexOf('=');
    const key = eq === -1 ? '' : param.slice(0, eq);
    if (eq === -1 || !/^[0-9]+$/.test(key)) {
      if (elements.length >= MAX_AIS) {
        throw new ParameterError('Too many AIs');
      }
      elements.push({ kind: 'dlIgnored', value: param });
      continue;
    }

    const entry = table.lookup(key, key.length, options.permitUnknownAIs);
    if (!entry) {
      throw new DigitalLinkError(`Unknown AI (${key}) in query parameters`);
    }

    const raw = param.slice(eq + 1);
    if (raw === '') {
      throw new DigitalLinkError(`AI (${key}) value query element is empty`);
    }

    let value = uriUnescape(raw, true);
    if (value === null) {
      throw new DigitalLinkError(`Decoded AI (${key}) value from DL query params contains illegal null character`);
    }
    if (entry.ai === '01') {
      value = zeroSuppressedToGTIN14(value);
    }

    checkAIValueLengthAndContent(key, entry, value);
    append({ kind: 'ai', ai: key, entry, value });
  }

  checkDLstructure(table, pathAIs, aiElements, options);
  aiElements.forEach(validateElement);

  return { stem, dataStr, elements };
}

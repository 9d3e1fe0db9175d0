/**
 * AI Table
 *
 * Immutable grammar table built from syntax dictionary entries, with the
 * derived length-by-prefix map and the list of valid GS1 Digital Link
 * key-qualifier sequences.
 */

import { InitializationError } from '../errors.js';
import type { AIComponent, AIEntry } from '../types.js';
import { MAX_AI_LEN, MIN_AI_LEN, loadSyntaxDictionary } from './dictionary.js';

/**
 * Value lengths of the AI prefixes that are fixed-length and need no FNC1
 * separator. All other prefixes are variable length.
 */
const FIXED_VALUE_LENGTH_BY_PREFIX: Readonly<Record<string, number>> = {
  '00': 18, '01': 14, '02': 14, '03': 14, '04': 16,
  '11': 6, '12': 6, '13': 6, '14': 6, '15': 6, '16': 6, '17': 6, '18': 6, '19': 6,
  '20': 2,
  '31': 6, '32': 6, '33': 6, '34': 6, '35': 6, '36': 6,
  '41': 13,
};

/** Fixed value length for an AI prefix, or 0 when variable */
export function fixedValueLengthByPrefix(ai: string): number {
  return FIXED_VALUE_LENGTH_BY_PREFIX[ai.slice(0, 2)] ?? 0;
}

function unknownEntry(fixedLength: number): AIEntry {
  const component: AIComponent = fixedLength
    ? { cset: 'X', min: fixedLength, max: fixedLength, optional: false, linters: [] }
    : { cset: 'X', min: 1, max: 90, optional: false, linters: [] };
  return {
    ai: '',
    fnc1: fixedLength === 0,
    dlDataAttr: 'unknown',
    components: [component],
    attrs: [],
    title: 'UNKNOWN',
  };
}

// Pseudo entries for vivified unknown AIs, keyed by fixed value length
// (0 for variable length). UNKNOWN_AI is used where the AI length itself
// cannot be determined from its prefix.
const UNKNOWN_AI = unknownEntry(0);
const UNKNOWN_AI_BY_LENGTH = new Map([0, 2, 6, 13, 14, 16, 18].map((len) => [len, unknownEntry(len)]));

/**
 * Whether the entry is the unknown AI of undetermined length
 */
export function isGenericUnknownEntry(entry: AIEntry): boolean {
  return entry === UNKNOWN_AI;
}

function isDigits(s: string): boolean {
  return /^[0-9]+$/.test(s);
}

/**
 * All key-qualifier sequences for one key and one "|" alternative: the key
 * alone, then every order-preserving subset of the qualifiers appended.
 */
function keyQualifierSequences(key: string, qualifiers: string[]): string[] {
  const sequences = [key];
  for (const qualifier of qualifiers) {
    const count = sequences.length;
    for (let k = 0; k < count; k++) {
      sequences.push(`${sequences[k]} ${qualifier}`);
    }
  }
  return sequences;
}

export class AITable {
  readonly entries: readonly AIEntry[];
  readonly dlKeyQualifiers: readonly string[];
  private readonly byAI: ReadonlyMap<string, AIEntry>;
  private readonly aiLengthByPrefix: ReadonlyMap<string, number>;
  private readonly dlKeyQualifierSet: ReadonlySet<string>;

  constructor(entries: readonly AIEntry[]) {
    const byAI = new Map<string, AIEntry>();
    const aiLengthByPrefix = new Map<string, number>();

    for (const entry of entries) {
      const prefix = entry.ai.slice(0, 2);
      const length = aiLengthByPrefix.get(prefix);
      if (length !== undefined && length !== entry.ai.length) {
        throw new InitializationError(`AI table is broken: AIs beginning '${prefix}' have different lengths`);
      }
      aiLengthByPrefix.set(prefix, entry.ai.length);

      if (entry.fnc1 === (fixedValueLengthByPrefix(entry.ai) !== 0)) {
        throw new InitializationError(
          `AI table is broken: AI (${entry.ai}) FNC1 requirement disagrees with its prefix`
        );
      }
      byAI.set(entry.ai, entry);
    }

    const sequences: string[] = [];
    for (const entry of entries) {
      for (const attr of entry.attrs) {
        if (attr.name !== 'dlpkey') {
          continue;
        }
        const alternatives = attr.value === undefined ? [''] : attr.value.split('|');
        for (const alternative of alternatives) {
          const qualifiers = alternative === '' ? [] : alternative.split(',');
          sequences.push(...keyQualifierSequences(entry.ai, qualifiers));
        }
      }
    }
    sequences.sort();

    this.entries = entries;
    this.byAI = byAI;
    this.aiLengthByPrefix = aiLengthByPrefix;
    this.dlKeyQualifiers = sequences;
    this.dlKeyQualifierSet = new Set(sequences);
  }

  /**
   * Build a table from a dictionary path or text, or the bundled dictionary
   */
  static fromSyntaxDictionary(source?: string): AITable {
    return new AITable(loadSyntaxDictionary(source));
  }

  /** Length of the AIs starting with the given two digits, or 0 if none */
  lengthByPrefix(ai: string): number {
    return this.aiLengthByPrefix.get(ai.slice(0, 2)) ?? 0;
  }

  /** Exact entry for a known AI */
  getEntry(ai: string): AIEntry | undefined {
    return this.byAI.get(ai);
  }

  /**
   * Find the entry for an AI. With ailen 0 the AI is the prefix of the given
   * data; otherwise the first ailen characters are the AI. Unknown AIs are
   * vivified as pseudo entries when permitted.
   */
  lookup(ai: string, ailen: number, permitUnknownAIs: boolean): AIEntry | null {
    if (ailen !== 0 && (ailen < MIN_AI_LEN || ailen > MAX_AI_LEN)) {
      return null;
    }
    if (ai.length < (ailen || MIN_AI_LEN) || !isDigits(ai.slice(0, ailen || MIN_AI_LEN))) {
      return null;
    }

    const prefixLen = this.lengthByPrefix(ai);
    if (ailen !== 0 && prefixLen !== 0 && ailen !== prefixLen) {
      return null;
    }

    if (prefixLen !== 0 && ai.length >= prefixLen) {
      const entry = this.byAI.get(ai.slice(0, prefixLen));
      if (entry) {
        return entry;
      }
    }

    if (!permitUnknownAIs) {
      return null;
    }

    if (prefixLen === 0) {
      return UNKNOWN_AI;
    }
    if (ai.length < prefixLen || !isDigits(ai.slice(0, prefixLen))) {
      return null;
    }

    const fixedLength = fixedValueLengthByPrefix(ai);
    const permitted = prefixLen === 2 ? [0, 2, 14, 16, 18] : prefixLen === 3 ? [0, 13] : [0, 6];
    if (!permitted.includes(fixedLength)) {
      return UNKNOWN_AI;
    }
    return UNKNOWN_AI_BY_LENGTH.get(fixedLength) ?? UNKNOWN_AI;
  }

  /**
   * Length of the AI at the start of the data for a looked up entry, or 0
   * when it cannot be determined
   */
  aiLength(entry: AIEntry, data: string): number {
    if (entry.ai !== '') {
      return entry.ai.length;
    }
    return isGenericUnknownEntry(entry) ? 0 : this.lengthByPrefix(data);
  }

  /** Whether the space-separated AI sequence is a valid DL key-qualifier path */
  isValidDLpathAIseq(seq: readonly string[]): boolean {
    return this.dlKeyQualifierSet.has(seq.join(' '));
  }

  /** Whether the AI alone forms a DL primary key path */
  isDLpkey(ai: string): boolean {
    return this.dlKeyQualifierSet.has(ai);
  }
}

let bundled: AITable | null = null;

/**
 * The table for the bundled dictionary, built once and shared
 */
export function getBundledAITable(): AITable {
  if (!bundled) {
    bundled = AITable.fromSyntaxDictionary();
  }
  return bundled;
}

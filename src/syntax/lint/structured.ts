/**
 * Structured value linters
 */

import { type LintError, firstNotIn, lintError } from './messages.js';

const DIGIT = /^[0-9]$/;
const HEX_PAIR = /^[0-9A-Fa-f]{2}$/;

/** Compare equal-length digit strings: -1, 0 or 1 */
function compareDigits(a: string, b: string): number {
  return a === b ? 0 : a < b ? -1 : 1;
}

/**
 * Piece number followed by an equal-length piece total
 */
export function lintPieceOfTotal(data: string): LintError | null {
  const len = data.length;
  if (len === 0 || len % 2 !== 0) {
    return lintError('INVALID_LENGTH_FOR_PIECE_OF_TOTAL', 0, len);
  }
  const pos = firstNotIn(data, DIGIT);
  if (pos !== -1) {
    return lintError('NON_DIGIT_CHARACTER', pos, 1);
  }

  const half = len / 2;
  const piece = data.slice(0, half);
  const total = data.slice(half);

  if (/^0+$/.test(piece)) {
    return lintError('ZERO_PIECE_NUMBER', 0, half);
  }
  if (/^0+$/.test(total)) {
    return lintError('ZERO_TOTAL_PIECES', half, half);
  }
  return compareDigits(piece, total) === 1 ? lintError('PIECE_NUMBER_EXCEEDS_TOTAL', 0, len) : null;
}

/**
 * "<pos>/<end>" with no leading zeros and pos not beyond end
 */
export function lintPosInSeqSlash(data: string): LintError | null {
  const len = data.length;
  const match = /^([0-9]+)\/([0-9]+)$/.exec(data);
  if (!match) {
    return lintError('POSITION_IN_SEQUENCE_MALFORMED', 0, len);
  }

  const [, position, end] = match;
  if (position.startsWith('0')) {
    return lintError('ILLEGAL_ZERO_PREFIX', 0, position.length);
  }
  if (end.startsWith('0')) {
    return lintError('ILLEGAL_ZERO_PREFIX', position.length + 1, end.length);
  }

  const exceeds = position.length === end.length
    ? compareDigits(position, end) === 1
    : position.length > end.length;
  return exceeds ? lintError('POSITION_EXCEEDS_END', 0, len) : null;
}

/**
 * Every "%" must introduce two hex digits
 */
export function lintPcenc(data: string): LintError | null {
  let p = data.indexOf('%');
  while (p !== -1) {
    if (data.length - p < 3) {
      return lintError('INVALID_PERCENT_SEQUENCE', p, data.length - p);
    }
    if (!HEX_PAIR.test(data.slice(p + 1, p + 3))) {
      return lintError('INVALID_PERCENT_SEQUENCE', p, 3);
    }
    p = data.indexOf('%', p + 3);
  }
  return null;
}

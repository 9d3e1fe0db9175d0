/**
 * Check character linters
 */

import { type LintError, isDigit, lintError } from './messages.js';

const PRIMES = [
  2, 3, 5, 7, 11, 13, 17, 19, 23, 29, 31, 37,
  41, 43, 47, 53, 59, 61, 67, 71, 73, 79, 83, 89,
  97, 101, 103, 107, 109, 113, 127, 131, 137, 139, 149, 151,
  157, 163, 167, 173, 179, 181, 191, 193, 197, 199, 211, 223,
  227, 229, 233, 239, 241, 251, 257, 263, 269, 271, 277, 281,
  283, 293, 307, 311, 313, 317, 331, 337, 347, 349, 353, 359,
  367, 373, 379, 383, 389, 397, 401, 409, 419, 421, 431, 433,
  439, 443, 449, 457, 461, 463, 467, 479, 487, 491, 499, 503,
  509,
];

// CSET 82 in weight order; a character's weight is its index
const CSET82_ORDER = '!"%&\'()*+,-./0123456789:;<=>?ABCDEFGHIJKLMNOPQRSTUVWXYZ_abcdefghijklmnopqrstuvwxyz';

const CSET32 = '23456789ABCDEFGHJKLMNPQRSTUVWXYZ';

/**
 * Mod-10 check digit in the final position
 */
export function lintCsum(data: string): LintError | null {
  if (data.length === 0) {
    return lintError('TOO_SHORT_FOR_CHECK_DIGIT', 0, 0);
  }

  let weight = data.length % 2 === 0 ? 3 : 1;
  let parity = 0;
  for (let i = 0; i < data.length - 1; i++) {
    if (!isDigit(data[i])) {
      return lintError('NON_DIGIT_CHARACTER', i, 1);
    }
    parity += weight * Number(data[i]);
    weight = 4 - weight;
  }

  const last = data.length - 1;
  if (!isDigit(data[last])) {
    return lintError('NON_DIGIT_CHARACTER', last, 1);
  }
  if ((10 - (parity % 10)) % 10 !== Number(data[last])) {
    return lintError('INCORRECT_CHECK_DIGIT', last, 1);
  }
  return null;
}

/**
 * Mod-1021 check character pair in the final two positions
 */
export function lintCsumAlpha(data: string): LintError | null {
  if (data.length > PRIMES.length + 2) {
    return lintError('TOO_LONG_FOR_CHECK_PAIR_IMPLEMENTATION', 0, data.length);
  }
  if (data.length < 2) {
    return lintError('TOO_SHORT_FOR_CHECK_PAIR', 0, data.length);
  }

  const pairPos = data.length - 2;
  if (data.length === 2) {
    return data === '22' ? null : lintError('INCORRECT_CHECK_PAIR', pairPos, 2);
  }

  let sum = 0;
  for (let i = 0; i < pairPos; i++) {
    const weight = CSET82_ORDER.indexOf(data[i]);
    if (weight === -1) {
      return lintError('INVALID_CSET82_CHARACTER', i, 1);
    }
    sum += weight * PRIMES[pairPos - 1 - i];
  }
  sum %= 1021;

  if (data[pairPos] !== CSET32[sum >> 5] || data[pairPos + 1] !== CSET32[sum & 31]) {
    return lintError('INCORRECT_CHECK_PAIR', pairPos, 2);
  }
  return null;
}

/**
 * Character set linters
 *
 * N: digits. X: CSET 82. Y: CSET 39. Z: CSET 64 (base64url with optional
 * "=" padding).
 */

import { type LintError, firstNotIn, lintError } from './messages.js';

const DIGIT = /^[0-9]$/;
const CSET82 = /^[!"%&'()*+,\-./0-9:;<=>?A-Z_a-z]$/;
const CSET39 = /^[#\-/0-9A-Z]$/;
const CSET64 = /^[\-0-9A-Z_a-z]$/;

export function lintCsetNumeric(data: string): LintError | null {
  const pos = firstNotIn(data, DIGIT);
  return pos === -1 ? null : lintError('NON_DIGIT_CHARACTER', pos, 1);
}

export function lintCset82(data: string): LintError | null {
  const pos = firstNotIn(data, CSET82);
  return pos === -1 ? null : lintError('INVALID_CSET82_CHARACTER', pos, 1);
}

export function lintCset39(data: string): LintError | null {
  const pos = firstNotIn(data, CSET39);
  return pos === -1 ? null : lintError('INVALID_CSET39_CHARACTER', pos, 1);
}

export function lintCset64(data: string): LintError | null {
  let pads = 0;
  while (pads < data.length && data[data.length - pads - 1] === '=') {
    pads++;
  }
  const len = data.length - pads;

  if (pads > 2 || (pads > 0 && data.length % 3 !== 0)) {
    return lintError('INVALID_CSET64_PADDING', len, pads);
  }

  const pos = firstNotIn(data.slice(0, len), CSET64);
  return pos === -1 ? null : lintError('INVALID_CSET64_CHARACTER', pos, 1);
}

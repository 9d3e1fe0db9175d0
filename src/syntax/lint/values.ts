/**
 * Value constraint linters
 */

import { type LintError, firstNotIn, isDigit, lintError } from './messages.js';

const DIGIT = /^[0-9]$/;

export function lintNonZero(data: string): LintError | null {
  let hasNonZero = false;
  for (let i = 0; i < data.length; i++) {
    if (!isDigit(data[i])) {
      return lintError('NON_DIGIT_CHARACTER', i, 1);
    }
    if (data[i] !== '0') {
      hasNonZero = true;
    }
  }
  return hasNonZero ? null : lintError('ILLEGAL_ZERO_VALUE', 0, data.length);
}

export function lintZero(data: string): LintError | null {
  if (data.length === 0) {
    return lintError('NOT_ZERO', 0, 0);
  }
  return /^0+$/.test(data) ? null : lintError('NOT_ZERO', 0, data.length);
}

export function lintNoZeroPrefix(data: string): LintError | null {
  const pos = firstNotIn(data, DIGIT);
  if (pos !== -1) {
    return lintError('NON_DIGIT_CHARACTER', pos, 1);
  }
  return data.startsWith('0') ? lintError('ILLEGAL_ZERO_PREFIX', 0, 1) : null;
}

export function lintHasNonDigit(data: string): LintError | null {
  return firstNotIn(data, DIGIT) === -1 ? lintError('REQUIRES_NON_DIGIT_CHARACTER', 0, data.length) : null;
}

export function lintHyphen(data: string): LintError | null {
  if (data.length === 0) {
    return lintError('NOT_HYPHEN', 0, 0);
  }
  return /^-+$/.test(data) ? null : lintError('NOT_HYPHEN', 0, data.length);
}

export function lintYesNo(data: string): LintError | null {
  return data === '0' || data === '1' ? null : lintError('NOT_ZERO_OR_ONE', 0, data.length);
}

export function lintWinding(data: string): LintError | null {
  return ['0', '1', '9'].includes(data) ? null : lintError('INVALID_WINDING_DIRECTION', 0, data.length);
}

export function lintIso5218(data: string): LintError | null {
  return ['0', '1', '2', '9'].includes(data) ? null : lintError('INVALID_BIOLOGICAL_SEX_CODE', 0, data.length);
}

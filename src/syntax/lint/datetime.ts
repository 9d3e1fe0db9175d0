/**
 * Date and time linters
 *
 * Two-digit years are placed in a century window around the current year
 * for the leap year check: up to 49 years back and 50 years ahead.
 */

import { type LintCode, type LintError, firstNotIn, isDigit, lintError } from './messages.js';

const DIGIT = /^[0-9]$/;
const DAYS_IN_MONTH = [31, 0, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

function twoDigits(data: string, pos: number): number {
  return Number(data.slice(pos, pos + 2));
}

/** Fixed-width two-digit field with an upper bound */
function lintTwoDigitField(
  data: string,
  tooShort: LintCode,
  tooLong: LintCode,
  illegal: LintCode,
  max: number
): LintError | null {
  if (data.length !== 2) {
    return lintError(data.length < 2 ? tooShort : tooLong, 0, data.length);
  }
  for (let i = 0; i < 2; i++) {
    if (!isDigit(data[i])) {
      return lintError('NON_DIGIT_CHARACTER', i, 1);
    }
  }
  return twoDigits(data, 0) > max ? lintError(illegal, 0, 2) : null;
}

function shifted(err: LintError | null, offset: number): LintError | null {
  return err ? { ...err, pos: err.pos + offset } : null;
}

/**
 * YYYYMMDD, permitting a "00" day
 */
export function lintYyyymmd0(data: string): LintError | null {
  if (data.length !== 8) {
    return lintError(data.length < 8 ? 'DATE_TOO_SHORT' : 'DATE_TOO_LONG', 0, data.length);
  }
  const pos = firstNotIn(data, DIGIT);
  if (pos !== -1) {
    return lintError('NON_DIGIT_CHARACTER', pos, 1);
  }

  const year = Number(data.slice(0, 4));
  const month = twoDigits(data, 4);
  const day = twoDigits(data, 6);

  if (month < 1 || month > 12) {
    return lintError('ILLEGAL_MONTH', 4, 2);
  }

  const leap = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
  const maxDay = month === 2 ? (leap ? 29 : 28) : DAYS_IN_MONTH[month - 1];
  return day > maxDay ? lintError('ILLEGAL_DAY', 6, 2) : null;
}

export function lintYyyymmdd(data: string): LintError | null {
  const err = lintYyyymmd0(data);
  if (err) {
    return err;
  }
  return data.slice(6, 8) === '00' ? lintError('ILLEGAL_DAY', 6, 2) : null;
}

/**
 * YYMMDD, permitting a "00" day
 */
export function lintYymmd0(data: string): LintError | null {
  let pos = 0;
  for (; pos < 6 && pos < data.length; pos++) {
    if (!isDigit(data[pos])) {
      return lintError('NON_DIGIT_CHARACTER', pos, 1);
    }
  }
  if (data.length !== 6) {
    return lintError(data.length < 6 ? 'DATE_TOO_SHORT' : 'DATE_TOO_LONG', 0, data.length < 6 ? data.length : 7);
  }

  const yy = twoDigits(data, 0);
  const currentYY = new Date().getFullYear() % 100;
  let century = '20';
  if (yy - currentYY >= 51) {
    century = '19';
  } else if (yy - currentYY <= -50) {
    century = '21';
  }

  return shifted(lintYyyymmd0(century + data), -2);
}

export function lintYymmdd(data: string): LintError | null {
  const err = lintYymmd0(data);
  if (err) {
    return err;
  }
  return data.slice(4, 6) === '00' ? lintError('ILLEGAL_DAY', 4, 2) : null;
}

/**
 * YYMMDDHH
 */
export function lintYymmddhh(data: string): LintError | null {
  if (data.length !== 8) {
    return lintError(data.length < 8 ? 'DATE_WITH_HOUR_TOO_SHORT' : 'DATE_WITH_HOUR_TOO_LONG', 0, data.length);
  }
  const pos = firstNotIn(data, DIGIT);
  if (pos !== -1) {
    return lintError('NON_DIGIT_CHARACTER', pos, 1);
  }
  const err = lintYymmdd(data.slice(0, 6));
  if (err) {
    return err;
  }
  return twoDigits(data, 6) > 23 ? lintError('ILLEGAL_HOUR', 6, 2) : null;
}

export function lintHh(data: string): LintError | null {
  return lintTwoDigitField(data, 'HOUR_TOO_SHORT', 'HOUR_TOO_LONG', 'ILLEGAL_HOUR', 23);
}

export function lintMi(data: string): LintError | null {
  return lintTwoDigitField(data, 'MINUTE_TOO_SHORT', 'MINUTE_TOO_LONG', 'ILLEGAL_MINUTE', 59);
}

export function lintSs(data: string): LintError | null {
  return lintTwoDigitField(data, 'SECOND_TOO_SHORT', 'SECOND_TOO_LONG', 'ILLEGAL_SECOND', 59);
}

/**
 * HHMI
 */
export function lintHhmi(data: string): LintError | null {
  if (data.length !== 4) {
    return lintError(data.length < 4 ? 'HOUR_WITH_MINUTE_TOO_SHORT' : 'HOUR_WITH_MINUTE_TOO_LONG', 0, data.length);
  }
  return lintHh(data.slice(0, 2)) ?? shifted(lintMi(data.slice(2)), 2);
}

/**
 * HHMM, checked as a whole before the hour and minute ranges
 */
export function lintHhmm(data: string): LintError | null {
  if (data.length !== 4) {
    return lintError(data.length < 4 ? 'HOUR_WITH_MINUTE_TOO_SHORT' : 'HOUR_WITH_MINUTE_TOO_LONG', 0, data.length);
  }
  const pos = firstNotIn(data, DIGIT);
  if (pos !== -1) {
    return lintError('NON_DIGIT_CHARACTER', pos, 1);
  }
  if (twoDigits(data, 0) > 23) {
    return lintError('ILLEGAL_HOUR', 0, 2);
  }
  return twoDigits(data, 2) > 59 ? lintError('ILLEGAL_MINUTE', 2, 2) : null;
}

/**
 * MM with optional SS
 */
export function lintMmoptss(data: string): LintError | null {
  if (data.length !== 2 && data.length !== 4) {
    return lintError('MINUTE_WITH_OPTIONAL_SECOND_INVALID_LENGTH', 0, data.length);
  }
  const pos = firstNotIn(data, DIGIT);
  if (pos !== -1) {
    return lintError('NON_DIGIT_CHARACTER', pos, 1);
  }
  if (twoDigits(data, 0) > 59) {
    return lintError('ILLEGAL_MINUTE', 0, 2);
  }
  return data.length === 4 && twoDigits(data, 2) > 59 ? lintError('ILLEGAL_SECOND', 2, 2) : null;
}

/**
 * IBAN linter (ISO 13616 mod-97 check)
 */

import { isIso3166Alpha2 } from './codelists.js';
import { type LintError, lintError } from './messages.js';

const IBAN_MIN_LENGTH = 10;
const IBAN_MAX_LENGTH = 34;

/** 0-9 weigh 0-9, A-Z weigh 10-35; anything else is invalid */
function ibanValue(c: string): number {
  if (c >= '0' && c <= '9') {
    return c.charCodeAt(0) - 48;
  }
  if (c >= 'A' && c <= 'Z') {
    return c.charCodeAt(0) - 55;
  }
  return -1;
}

export function lintIban(data: string): LintError | null {
  if (data.length < 4) {
    return lintError('IBAN_TOO_SHORT', 0, data.length);
  }
  if (!isIso3166Alpha2(data.slice(0, 2))) {
    return lintError('ILLEGAL_IBAN_COUNTRY_CODE', 0, 2);
  }
  if (data.length > IBAN_MAX_LENGTH) {
    return lintError('IBAN_TOO_LONG', 0, data.length);
  }
  if (data.length <= IBAN_MIN_LENGTH) {
    return lintError('IBAN_TOO_SHORT', 0, data.length);
  }

  // The country code and check characters are moved to the end
  let csum = 0;
  for (let i = 4; i < data.length + 4; i++) {
    const pos = i < data.length ? i : i - data.length;
    const value = ibanValue(data[pos]);
    if (value === -1) {
      return lintError('INVALID_IBAN_CHARACTER', pos, 1);
    }
    csum = (csum * (value < 10 ? 10 : 100) + value) % 97;
  }

  return csum === 1 ? null : lintError('INCORRECT_IBAN_CHECKSUM', 2, 2);
}

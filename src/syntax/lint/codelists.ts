/**
 * Code list linters
 *
 * The ISO and package type lists are read from data/ on first use.
 */

import { loadCodeList } from '../../data.js';
import { type LintError, lintError } from './messages.js';

const MEDIA_TYPES = /^(0[1-9]|10|[89][0-9])$/;

export function isIso3166(code: string): boolean {
  return loadCodeList('iso3166-numeric.json').has(code);
}

export function isIso3166Alpha2(code: string): boolean {
  return loadCodeList('iso3166-alpha2.json').has(code);
}

export function lintIso3166(data: string): LintError | null {
  return isIso3166(data) ? null : lintError('NOT_ISO3166', 0, data.length);
}

export function lintIso3166999(data: string): LintError | null {
  return data === '999' || isIso3166(data) ? null : lintError('NOT_ISO3166_OR_999', 0, data.length);
}

export function lintIso3166Alpha2(data: string): LintError | null {
  return isIso3166Alpha2(data) ? null : lintError('NOT_ISO3166_ALPHA2', 0, data.length);
}

/**
 * A non-empty run of three-digit ISO 3166 country codes
 */
export function lintIso3166List(data: string): LintError | null {
  let p = 0;
  for (; p + 3 <= data.length; p += 3) {
    if (!isIso3166(data.slice(p, p + 3))) {
      return lintError('NOT_ISO3166', p, 3);
    }
  }
  if (p !== data.length || data.length === 0) {
    return lintError('NOT_ISO3166', p, data.length - p);
  }
  return null;
}

export function lintIso4217(data: string): LintError | null {
  return loadCodeList('iso4217-numeric.json').has(data) ? null : lintError('NOT_ISO4217', 0, data.length);
}

export function lintMediaType(data: string): LintError | null {
  return MEDIA_TYPES.test(data) ? null : lintError('INVALID_MEDIA_TYPE', 0, data.length);
}

export function lintPackageType(data: string): LintError | null {
  return loadCodeList('package-types.json').has(data) ? null : lintError('INVALID_PACKAGE_TYPE', 0, data.length);
}

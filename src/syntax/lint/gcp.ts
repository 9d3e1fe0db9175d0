/**
 * GS1 Company Prefix and key linters
 */

import { type LintError, isDigit, lintError } from './messages.js';

const GCP_MIN_LENGTH = 4;
const IMPORTER_INDEX = /^[\-0-9A-Z_a-z]$/;

/**
 * A GS1 key must start with a plausible GS1 Company Prefix
 */
export function lintKey(data: string): LintError | null {
  return lintGcpPos1(data);
}

export function lintGcpPos1(data: string): LintError | null {
  if (data.length < GCP_MIN_LENGTH) {
    return lintError('TOO_SHORT_FOR_GCP', 0, data.length);
  }
  for (let i = 0; i < GCP_MIN_LENGTH; i++) {
    if (!isDigit(data[i])) {
      return lintError('INVALID_GCP_PREFIX', i, 1);
    }
  }
  return null;
}

/**
 * GS1 Company Prefix starting at the second character
 */
export function lintGcpPos2(data: string): LintError | null {
  if (data.length < 2) {
    return lintError('TOO_SHORT_FOR_GCP', 0, data.length);
  }
  const err = lintGcpPos1(data.slice(1));
  return err ? { ...err, pos: err.pos + 1 } : null;
}

export function lintImporterIdx(data: string): LintError | null {
  if (data.length !== 1) {
    return lintError('IMPORTER_IDX_MUST_BE_ONE_CHARACTER', 0, data.length);
  }
  return IMPORTER_INDEX.test(data) ? null : lintError('INVALID_IMPORT_IDX_CHARACTER', 0, 1);
}

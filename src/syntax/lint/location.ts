/**
 * Geolocation linters
 *
 * Latitude and longitude are ten-digit offsets: latitude + 90 and
 * longitude + 180, each scaled by 10^7.
 */

import { type LintCode, type LintError, firstNotIn, lintError } from './messages.js';

const DIGIT = /^[0-9]$/;
const MAX_LATITUDE = 1800000000;
const MAX_LONGITUDE = 3600000000;

function lintCoordinate(data: string, lengthCode: LintCode, rangeCode: LintCode, max: number): LintError | null {
  if (data.length !== 10) {
    return lintError(lengthCode, 0, data.length);
  }
  const pos = firstNotIn(data, DIGIT);
  if (pos !== -1) {
    return lintError('NON_DIGIT_CHARACTER', pos, 1);
  }
  return Number(data) > max ? lintError(rangeCode, 0, 10) : null;
}

export function lintLatitude(data: string): LintError | null {
  return lintCoordinate(data, 'LATITUDE_INVALID_LENGTH', 'INVALID_LATITUDE', MAX_LATITUDE);
}

export function lintLongitude(data: string): LintError | null {
  return lintCoordinate(data, 'LONGITUDE_INVALID_LENGTH', 'INVALID_LONGITUDE', MAX_LONGITUDE);
}

/**
 * Latitude immediately followed by longitude
 */
export function lintLatLong(data: string): LintError | null {
  if (data.length !== 20) {
    return lintError('LATLONG_INVALID_LENGTH', 0, data.length);
  }
  const pos = firstNotIn(data, DIGIT);
  if (pos !== -1) {
    return lintError('NON_DIGIT_CHARACTER', pos, 1);
  }
  if (Number(data.slice(0, 10)) > MAX_LATITUDE) {
    return lintError('INVALID_LATITUDE', 0, 10);
  }
  return Number(data.slice(10)) > MAX_LONGITUDE ? lintError('INVALID_LONGITUDE', 10, 10) : null;
}

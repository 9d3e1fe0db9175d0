/**
 * Linter error codes and their English messages
 */

export const LINT_MESSAGES = {
  NON_DIGIT_CHARACTER: 'A non-digit character was found where a digit is expected.',
  INVALID_CSET82_CHARACTER: 'A non-CSET 82 character was found where a CSET 82 character is expected.',
  INVALID_CSET39_CHARACTER: 'A non-CSET 39 character was found where a CSET 39 character is expected.',
  INVALID_CSET64_CHARACTER: 'A non-CSET 64 character was found where a CSET 64 character is expected.',
  INVALID_CSET64_PADDING: 'Incorrect number of CSET 64 pad characters.',
  INCORRECT_CHECK_DIGIT: 'The numeric check digit is incorrect.',
  TOO_SHORT_FOR_CHECK_DIGIT: 'The component is too short to perform a numeric check digit calculation.',
  INCORRECT_CHECK_PAIR: 'The alphanumeric check-character pair are incorrect.',
  TOO_SHORT_FOR_CHECK_PAIR: 'The component is too short to perform an alphanumeric check character pair calculation.',
  TOO_LONG_FOR_CHECK_PAIR_IMPLEMENTATION: 'The component is too long to perform an alphanumeric check character pair calculation.',
  INVALID_GCP_PREFIX: 'The GS1 Company Prefix is invalid.',
  TOO_SHORT_FOR_GCP: 'The component is shorter than the minimum length GS1 Company Prefix.',
  IMPORTER_IDX_MUST_BE_ONE_CHARACTER: 'The Importer Index must be a single character.',
  INVALID_IMPORT_IDX_CHARACTER: 'The Importer Index is an invalid character.',
  ILLEGAL_ZERO_VALUE: 'A non-zero value is required.',
  NOT_ZERO: 'A zero is required.',
  ILLEGAL_ZERO_PREFIX: 'A zero prefix is not permitted.',
  NOT_ZERO_OR_ONE: 'A "0" or "1" is required.',
  INVALID_WINDING_DIRECTION: 'The winding direction must be either "0", "1" or "9".',
  NOT_ISO3166: 'A valid ISO 3166 three-digit country code is required.',
  NOT_ISO3166_OR_999: 'A valid ISO 3166 three-digit country code or "999" is required.',
  NOT_ISO3166_ALPHA2: 'A valid ISO 3166 two-character country code is required.',
  NOT_ISO4217: 'A valid ISO 4217 three-digit currency code is required.',
  IBAN_TOO_SHORT: 'The IBAN is too short.',
  IBAN_TOO_LONG: 'The IBAN is too long.',
  INVALID_IBAN_CHARACTER: 'The IBAN contains an invalid character.',
  ILLEGAL_IBAN_COUNTRY_CODE: 'The IBAN must start with a valid ISO 3166 two-character country code.',
  INCORRECT_IBAN_CHECKSUM: 'The IBAN is invalid since the check characters are incorrect.',
  DATE_TOO_SHORT: 'The date is too short.',
  DATE_TOO_LONG: 'The date is too long.',
  DATE_WITH_HOUR_TOO_SHORT: 'The date with hour is too short for YYMMDDHH format.',
  DATE_WITH_HOUR_TOO_LONG: 'The date with hour is too long for YYMMDDHH format.',
  HOUR_WITH_MINUTE_TOO_SHORT: 'The hour with minute is too short for HHMI format.',
  HOUR_WITH_MINUTE_TOO_LONG: 'The hour with minute is too long for HHMI format.',
  MINUTE_WITH_OPTIONAL_SECOND_INVALID_LENGTH: 'The minute with optional second must be 2 or 4 digits.',
  HOUR_TOO_SHORT: 'The hour is too short for HH format.',
  HOUR_TOO_LONG: 'The hour is too long for HH format.',
  MINUTE_TOO_SHORT: 'The minute is too short for MI format.',
  MINUTE_TOO_LONG: 'The minute is too long for MI format.',
  SECOND_TOO_SHORT: 'The second is too short for SS format.',
  SECOND_TOO_LONG: 'The second is too long for SS format.',
  ILLEGAL_MONTH: 'The date contains an illegal month of the year.',
  ILLEGAL_DAY: 'The date contains an illegal day of the month.',
  ILLEGAL_HOUR: 'The time contains an illegal hour.',
  ILLEGAL_MINUTE: 'The time contains an illegal minute.',
  ILLEGAL_SECOND: 'The time contains an illegal seconds.',
  INVALID_LENGTH_FOR_PIECE_OF_TOTAL: 'The piece with total must have an even length, having equal-length components.',
  ZERO_PIECE_NUMBER: 'The piece number must not have a value of zero.',
  ZERO_TOTAL_PIECES: 'The piece total must not have a value of zero.',
  PIECE_NUMBER_EXCEEDS_TOTAL: 'The piece number must not exceed the piece total.',
  INVALID_PERCENT_SEQUENCE: 'The input contains an invalid percent hex-encoding "%hh" sequence.',
  INVALID_LATITUDE: 'The latitude is outside of the range "0000000000" to "1800000000".',
  INVALID_LONGITUDE: 'The longitude is outside of the range "0000000000" to "3600000000".',
  LATITUDE_INVALID_LENGTH: 'The latitude must be 10 digits.',
  LONGITUDE_INVALID_LENGTH: 'The longitude must be 10 digits.',
  LATLONG_INVALID_LENGTH: 'The latitude with longitude must be 20 digits.',
  INVALID_MEDIA_TYPE: 'A valid AIDC media type is required.',
  INVALID_PACKAGE_TYPE: 'A valid PackageTypeCode is required.',
  NOT_HYPHEN: 'Only hyphens are permitted.',
  INVALID_BIOLOGICAL_SEX_CODE: 'A valid ISO/IEC 5218 biological sex code required.',
  POSITION_IN_SEQUENCE_MALFORMED: 'The data must have the format "<pos>/<end>".',
  POSITION_EXCEEDS_END: 'The position number must not exceed the end number.',
  REQUIRES_NON_DIGIT_CHARACTER: 'A non-digit character is required.',
} as const;

export type LintCode = keyof typeof LINT_MESSAGES;

/** A linter failure, located within the linted value */
export interface LintError {
  code: LintCode;
  pos: number;
  len: number;
}

export type Linter = (data: string) => LintError | null;

/**
 * Build a linter failure
 */
export function lintError(code: LintCode, pos: number, len: number): LintError {
  return { code, pos, len };
}

/**
 * Message text for a linter failure
 */
export function lintMessage(code: LintCode): string {
  return LINT_MESSAGES[code];
}

/** Position of the first character outside the given set, or -1 */
export function firstNotIn(data: string, allowed: RegExp): number {
  for (let i = 0; i < data.length; i++) {
    if (!allowed.test(data[i])) {
      return i;
    }
  }
  return -1;
}

export function isDigit(c: string | undefined): boolean {
  return c !== undefined && c >= '0' && c <= '9' && c.length === 1;
}

/**
 * Check Digits
 *
 * GS1 mod-10 check digit arithmetic shared by the AI parser, the scan data
 * codec and the Digital Link converter.
 */

import { ParameterError } from '../errors.js';

const DIGITS = /^[0-9]+$/;

function assertDigits(digits: string): void {
  if (!DIGITS.test(digits)) {
    throw new ParameterError('Check digit input must be a non-empty string of digits');
  }
}

/**
 * Check digit for a payload that excludes it. Weights alternate 3,1,3...
 * starting from the rightmost payload digit.
 */
export function computeCheckDigit(payload: string): string {
  assertDigits(payload);

  let sum = 0;
  let weight = 3;
  for (let i = payload.length - 1; i >= 0; i--) {
    sum += weight * Number(payload[i]);
    weight = 4 - weight;
  }
  return String((10 - (sum % 10)) % 10);
}

/** Whether the final digit of the value is its correct check digit */
export function verifyCheckDigit(value: string): boolean {
  if (value.length < 2 || !DIGITS.test(value)) {
    return false;
  }
  return computeCheckDigit(value.slice(0, -1)) === value.slice(-1);
}

/** Payload with its check digit appended */
export function addCheckDigit(payload: string): string {
  return payload + computeCheckDigit(payload);
}

/**
 * Expand a GTIN-8, GTIN-12 or GTIN-13 to GTIN-14 by left-padding with
 * zeros. Other lengths are returned unchanged.
 */
export function zeroSuppressedToGTIN14(value: string): string {
  if (!DIGITS.test(value) || ![8, 12, 13].includes(value.length)) {
    return value;
  }
  return value.padStart(14, '0');
}

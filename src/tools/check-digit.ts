/**
 * gs1_check_digit - Compute or verify a GS1 mod-10 check digit
 */

import { computeCheckDigit, verifyCheckDigit } from '../ai/checkdigit.js';
import type { CheckDigitInput } from '../types.js';
import { failure, type FailureResult } from './shared.js';

export interface CheckDigitSuccess {
  success: true;
  message: string;
  checkDigit?: string;
  valid?: boolean;
}

export type CheckDigitResult = CheckDigitSuccess | FailureResult;

export function checkDigit(input: CheckDigitInput): CheckDigitResult {
  if (input.mode === 'verify') {
    const valid = verifyCheckDigit(input.digits);
    return {
      success: true,
      message: valid ? 'Check digit is valid.' : 'Check digit is incorrect.',
      valid,
    };
  }

  try {
    const digit = computeCheckDigit(input.digits);
    return {
      success: true,
      message: `Check digit for ${input.digits} is ${digit}.`,
      checkDigit: digit,
    };
  } catch (error) {
    return failure(error);
  }
}

/**
 * Tool definition for MCP
 */
export const checkDigitToolDef = {
  name: 'gs1_check_digit',
  description: 'Compute the GS1 mod-10 check digit of a digit string, or verify one whose last digit is the check digit.',
  inputSchema: {
    type: 'object',
    properties: {
      digits: {
        type: 'string',
        description: 'Digits without the check digit (compute) or ending in it (verify).',
      },
      mode: {
        type: 'string',
        enum: ['compute', 'verify'],
        description: 'Defaults to "compute".',
      },
    },
    required: ['digits'],
  },
};

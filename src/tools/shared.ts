/**
 * Shared tool helpers
 *
 * Engine construction from the config plus per-call options, data loading
 * by input format, and the failure result every tool returns for
 * rejected input.
 */

import { getConfig } from '../config/index.js';
import { GS1Encoder } from '../encoder.js';
import { GS1Error, ParameterError } from '../errors.js';
import { isDLuri } from '../dl/parser.js';
import type { EngineOptionsInput, InputFormat } from '../types.js';

export interface FailureResult {
  success: false;
  message: string;
  markup: string;
}

/**
 * Build an engine from the config, overridden by the options of one call
 */
export function createEncoder(input: EngineOptionsInput = {}): GS1Encoder {
  const config = getConfig();
  return new GS1Encoder({
    permitUnknownAIs: input.permitUnknownAIs ?? config.permitUnknownAIs,
    addCheckDigit: input.addCheckDigit ?? config.addCheckDigit,
    permitZeroSuppressedGTINinDLuris:
      input.permitZeroSuppressedGTINinDLuris ?? config.permitZeroSuppressedGTINinDLuris,
    permitConvenienceAlphas: input.permitConvenienceAlphas ?? config.permitConvenienceAlphas,
    includeDataTitlesInHRI: input.includeDataTitlesInHRI ?? config.includeDataTitlesInHRI,
    validations: { REQUISITE_AIS: config.validateAIassociations, ...input.validations },
    syntaxDictionary: config.syntaxDictionaryPath,
  });
}

/**
 * Guess the format of some input: bracketed AI data, a DL URI or a data
 * string
 */
export function detectFormat(data: string): Exclude<InputFormat, 'auto'> {
  if (data.startsWith('(')) {
    return 'bracketed';
  }
  if (isDLuri(data)) {
    return 'digital_link';
  }
  return 'plain';
}

/**
 * Load input into an engine according to its format
 */
export function loadData(encoder: GS1Encoder, data: string, format: InputFormat = 'auto'): void {
  const resolved = format === 'auto' ? detectFormat(data) : format;

  switch (resolved) {
    case 'bracketed':
      encoder.aiDataStr = data;
      break;
    case 'digital_link':
      if (!isDLuri(data)) {
        throw new ParameterError('Data is not a GS1 Digital Link URI');
      }
      encoder.dataStr = data;
      break;
    case 'plain':
      encoder.dataStr = data;
      break;
  }
}

/**
 * Turn an engine error into a tool result; anything else propagates
 */
export function failure(error: unknown): FailureResult {
  if (error instanceof GS1Error) {
    return { success: false, message: error.message, markup: error.markup };
  }
  throw error;
}

/** Schema properties for the engine options accepted by every data tool */
export const engineOptionsSchema = {
  permitUnknownAIs: {
    type: 'boolean',
    description: 'Admit AIs that are not in the syntax dictionary.',
  },
  addCheckDigit: {
    type: 'boolean',
    description: 'Compute the check digit of the leading key instead of verifying it.',
  },
  permitZeroSuppressedGTINinDLuris: {
    type: 'boolean',
    description: 'Accept GTIN-8, GTIN-12 and GTIN-13 values in a Digital Link path.',
  },
  permitConvenienceAlphas: {
    type: 'boolean',
    description: 'Accept alphabetic AI names such as "gtin" in a Digital Link path.',
  },
  includeDataTitlesInHRI: {
    type: 'boolean',
    description: 'Prefix each HRI line with the data title of its AI.',
  },
  validations: {
    type: 'object',
    description: 'Enable or disable individual AI association validations, e.g. {"REQUISITE_AIS": false}.',
    additionalProperties: { type: 'boolean' },
  },
} as const;

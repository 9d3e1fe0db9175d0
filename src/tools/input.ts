/**
 * Tool argument narrowing
 *
 * MCP hands tool arguments over as an untyped record; these readers pick
 * out the fields each tool takes and reject the wrong types.
 */

import {
  type CheckDigitInput,
  type ConfigInput,
  type DigitalLinkInput,
  type EngineOptionsInput,
  type InputFormat,
  type ParseInput,
  type ScanDataInput,
  type Symbology,
  type ValidationFlags,
  SYMBOLOGIES,
  VALIDATIONS,
} from '../types.js';

export type ToolArgs = Record<string, unknown>;

const FORMATS: readonly InputFormat[] = ['auto', 'bracketed', 'plain', 'digital_link'];

function optionalString(args: ToolArgs, key: string): string | undefined {
  const value = args[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new Error(`Argument "${key}" must be a string`);
  }
  return value;
}

function requiredString(args: ToolArgs, key: string): string {
  const value = optionalString(args, key);
  if (value === undefined) {
    throw new Error(`Missing required argument "${key}"`);
  }
  return value;
}

function optionalBoolean(args: ToolArgs, key: string): boolean | undefined {
  const value = args[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'boolean') {
    throw new Error(`Argument "${key}" must be a boolean`);
  }
  return value;
}

function readValidations(args: ToolArgs): Partial<ValidationFlags> | undefined {
  const value = args.validations;
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new Error('Argument "validations" must be an object');
  }

  const flags: Partial<ValidationFlags> = {};
  for (const [id, enabled] of Object.entries(value)) {
    const validation = VALIDATIONS.find((v) => v === id);
    if (validation === undefined) {
      throw new Error(`Unknown validation: ${id}`);
    }
    if (typeof enabled !== 'boolean') {
      throw new Error(`Validation "${id}" must be set to a boolean`);
    }
    flags[validation] = enabled;
  }
  return flags;
}

export function readEngineOptions(args: ToolArgs): EngineOptionsInput {
  return {
    permitUnknownAIs: optionalBoolean(args, 'permitUnknownAIs'),
    addCheckDigit: optionalBoolean(args, 'addCheckDigit'),
    permitZeroSuppressedGTINinDLuris: optionalBoolean(args, 'permitZeroSuppressedGTINinDLuris'),
    permitConvenienceAlphas: optionalBoolean(args, 'permitConvenienceAlphas'),
    includeDataTitlesInHRI: optionalBoolean(args, 'includeDataTitlesInHRI'),
    validations: readValidations(args),
  };
}

export function readParseInput(args: ToolArgs): ParseInput {
  const format = optionalString(args, 'format');
  const resolved = format === undefined ? undefined : FORMATS.find((f) => f === format);
  if (format !== undefined && resolved === undefined) {
    throw new Error(`Unknown format: ${format}`);
  }
  return { ...readEngineOptions(args), data: requiredString(args, 'data'), format: resolved };
}

export function readDigitalLinkInput(args: ToolArgs): DigitalLinkInput {
  return {
    ...readEngineOptions(args),
    data: requiredString(args, 'data'),
    stem: optionalString(args, 'stem'),
  };
}

export function readScanDataInput(args: ToolArgs): ScanDataInput {
  const symbology = optionalString(args, 'symbology');
  let sym: Symbology | undefined;
  if (symbology !== undefined) {
    sym = SYMBOLOGIES.find((s) => s === symbology);
    if (sym === undefined) {
      throw new Error(`Unknown symbology: ${symbology}`);
    }
  }
  return {
    ...readEngineOptions(args),
    scanData: optionalString(args, 'scanData'),
    data: optionalString(args, 'data'),
    symbology: sym,
  };
}

export function readCheckDigitInput(args: ToolArgs): CheckDigitInput {
  const digits = requiredString(args, 'digits');
  const mode = optionalString(args, 'mode');
  if (mode === undefined || mode === 'compute' || mode === 'verify') {
    return { digits, mode };
  }
  throw new Error(`Unknown mode: ${mode}`);
}

export function readConfigInput(args: ToolArgs): ConfigInput {
  return {
    show: optionalBoolean(args, 'show'),
    permitUnknownAIs: optionalBoolean(args, 'permitUnknownAIs'),
    addCheckDigit: optionalBoolean(args, 'addCheckDigit'),
    permitZeroSuppressedGTINinDLuris: optionalBoolean(args, 'permitZeroSuppressedGTINinDLuris'),
    permitConvenienceAlphas: optionalBoolean(args, 'permitConvenienceAlphas'),
    includeDataTitlesInHRI: optionalBoolean(args, 'includeDataTitlesInHRI'),
    validateAIassociations: optionalBoolean(args, 'validateAIassociations'),
    dlStem: optionalString(args, 'dlStem'),
    syntaxDictionaryPath: optionalString(args, 'syntaxDictionaryPath'),
  };
}

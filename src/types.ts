import type { LinterName } from './syntax/lint/index.js';

// Syntax dictionary types
export type CharacterSet = 'N' | 'X' | 'Y' | 'Z';
export type DLDataAttr = 'none' | 'permitted' | 'unknown';

export interface AIComponent {
  cset: CharacterSet;
  min: number;
  max: number;
  optional: boolean;
  linters: readonly LinterName[];
}

export interface AIAttribute {
  name: string;
  value?: string;  // Absent for singleton attributes such as "dlpkey"
}

export interface AIEntry {
  ai: string;                // Empty for the generic unknown entry
  fnc1: boolean;             // FNC1 separator required after the value
  dlDataAttr: DLDataAttr;
  components: readonly AIComponent[];
  attrs: readonly AIAttribute[];
  title: string;
}

// Extracted data
export type DataElement =
  | { kind: 'ai'; ai: string; entry: AIEntry; value: string; dlPathOrder?: number }
  | { kind: 'dlIgnored'; value: string }
  | { kind: 'ccsep' };

export type AIElement = Extract<DataElement, { kind: 'ai' }>;

// Symbologies, in the order that scan data identifiers are matched
export const SYMBOLOGIES = [
  'NONE',
  'DataBarOmni',
  'DataBarTruncated',
  'DataBarStacked',
  'DataBarStackedOmni',
  'DataBarLimited',
  'DataBarExpanded',
  'UPCA',
  'UPCE',
  'EAN13',
  'EAN8',
  'GS1_128_CCA',
  'GS1_128_CCC',
  'QR',
  'DM',
  'DotCode',
] as const;

export type Symbology = typeof SYMBOLOGIES[number];

// AI association validations
export const VALIDATIONS = [
  'MUTEX_AIS',
  'REQUISITE_AIS',
  'REPEATED_AIS',
  'DIGSIG_SERIAL_KEY',
  'UNKNOWN_AI_NOT_DL_ATTR',
] as const;

export type ValidationId = typeof VALIDATIONS[number];
export type ValidationFlags = Record<ValidationId, boolean>;

/** Processing options shared by the parsers, converters and validators */
export interface ProcessingOptions {
  permitUnknownAIs: boolean;
  addCheckDigit: boolean;
  permitZeroSuppressedGTINinDLuris: boolean;
  permitConvenienceAlphas: boolean;
  validations: ValidationFlags;
}

// Engine construction
export interface EncoderOptions {
  permitUnknownAIs?: boolean;
  addCheckDigit?: boolean;
  permitZeroSuppressedGTINinDLuris?: boolean;
  permitConvenienceAlphas?: boolean;
  includeDataTitlesInHRI?: boolean;
  validations?: Partial<ValidationFlags>;
  syntaxDictionary?: string;     // Path to, or contents of, a syntax dictionary
}

// Configuration
export interface GS1Config {
  permitUnknownAIs: boolean;
  addCheckDigit: boolean;
  permitZeroSuppressedGTINinDLuris: boolean;
  permitConvenienceAlphas: boolean;
  includeDataTitlesInHRI: boolean;
  validateAIassociations: boolean;
  dlStem: string;
  syntaxDictionaryPath?: string;
}

export const DEFAULT_CONFIG: GS1Config = {
  permitUnknownAIs: false,
  addCheckDigit: false,
  permitZeroSuppressedGTINinDLuris: false,
  permitConvenienceAlphas: false,
  includeDataTitlesInHRI: false,
  validateAIassociations: true,
  dlStem: 'https://id.gs1.org',
};

export const VERSION = '1.0.0';

// MCP tool inputs
export interface EngineOptionsInput {
  permitUnknownAIs?: boolean;
  addCheckDigit?: boolean;
  permitZeroSuppressedGTINinDLuris?: boolean;
  permitConvenienceAlphas?: boolean;
  includeDataTitlesInHRI?: boolean;
  validations?: Partial<ValidationFlags>;
}

export type InputFormat = 'auto' | 'bracketed' | 'plain' | 'digital_link';

export interface ParseInput extends EngineOptionsInput {
  data: string;
  format?: InputFormat;
}

export interface DigitalLinkInput extends EngineOptionsInput {
  data: string;
  stem?: string;
}

export interface ScanDataInput extends EngineOptionsInput {
  scanData?: string;
  data?: string;
  symbology?: Symbology;
}

export interface CheckDigitInput {
  digits: string;
  mode?: 'compute' | 'verify';
}

export interface ConfigInput {
  show?: boolean;
  permitUnknownAIs?: boolean;
  addCheckDigit?: boolean;
  permitZeroSuppressedGTINinDLuris?: boolean;
  permitConvenienceAlphas?: boolean;
  includeDataTitlesInHRI?: boolean;
  validateAIassociations?: boolean;
  dlStem?: string;
  syntaxDictionaryPath?: string;
}

/**
 * GS1 Encoder
 *
 * The engine context: one symbology, one set of extracted elements and
 * the options that govern parsing. Every setter parses into a candidate
 * state and commits it only once parsing and validation succeed; on
 * failure the previous state is kept and the error is recorded.
 */

import { parseAIdata, processAIdata, MAX_AIS } from './ai/parser.js';
import { DEFAULT_VALIDATIONS, LOCKED_VALIDATIONS, validateAIs } from './ai/validations.js';
import { getConfig } from './config/index.js';
import { generateDLuri } from './dl/generator.js';
import { isDLuri, parseDLuri } from './dl/parser.js';
import { GS1Error, ParameterError } from './errors.js';
import { formatAIdataStr, formatHRI, ignoredQueryParams } from './hri/index.js';
import { MAX_DATA, generateScanData, processScanData } from './scandata/codec.js';
import { AITable, getBundledAITable } from './syntax/table.js';
import {
  type DataElement,
  type EncoderOptions,
  type GS1Config,
  type ProcessingOptions,
  type Symbology,
  type ValidationFlags,
  type ValidationId,
  SYMBOLOGIES,
  VALIDATIONS,
  VERSION,
} from './types.js';

interface EncoderFlags {
  addCheckDigit: boolean;
  permitUnknownAIs: boolean;
  permitZeroSuppressedGTINinDLuris: boolean;
  permitConvenienceAlphas: boolean;
  includeDataTitlesInHRI: boolean;
}

interface EncoderState {
  dataStr: string;
  elements: DataElement[];
}

const EMPTY_STATE: EncoderState = { dataStr: '', elements: [] };

function isSymbology(value: string): value is Symbology {
  return SYMBOLOGIES.some((sym) => sym === value);
}

function isValidationId(value: string): value is ValidationId {
  return VALIDATIONS.some((v) => v === value);
}

export class GS1Encoder {
  private readonly table: AITable;
  private state: EncoderState = EMPTY_STATE;
  private currentSym: Symbology = 'NONE';
  private readonly validations: ValidationFlags = { ...DEFAULT_VALIDATIONS };
  private readonly options: EncoderFlags;
  private lastErrMsg = '';
  private lastErrMarkup = '';

  constructor(options: EncoderOptions = {}) {
    this.table = options.syntaxDictionary === undefined
      ? getBundledAITable()
      : AITable.fromSyntaxDictionary(options.syntaxDictionary);

    this.options = {
      addCheckDigit: options.addCheckDigit ?? false,
      permitUnknownAIs: options.permitUnknownAIs ?? false,
      permitZeroSuppressedGTINinDLuris: options.permitZeroSuppressedGTINinDLuris ?? false,
      permitConvenienceAlphas: options.permitConvenienceAlphas ?? false,
      includeDataTitlesInHRI: options.includeDataTitlesInHRI ?? false,
    };

    for (const [id, enabled] of Object.entries(options.validations ?? {})) {
      if (enabled === undefined || (isValidationId(id) && this.validations[id] === enabled)) {
        continue;
      }
      this.setValidationEnabled(id, enabled);
    }
  }

  /**
   * Build an engine with its options taken from the configuration
   */
  static fromConfig(config: GS1Config = getConfig()): GS1Encoder {
    return new GS1Encoder({
      permitUnknownAIs: config.permitUnknownAIs,
      addCheckDigit: config.addCheckDigit,
      permitZeroSuppressedGTINinDLuris: config.permitZeroSuppressedGTINinDLuris,
      permitConvenienceAlphas: config.permitConvenienceAlphas,
      includeDataTitlesInHRI: config.includeDataTitlesInHRI,
      validations: { REQUISITE_AIS: config.validateAIassociations },
      syntaxDictionary: config.syntaxDictionaryPath,
    });
  }

  get version(): string {
    return VERSION;
  }

  /** Message of the last failed operation, empty after a success */
  get errMsg(): string {
    return this.lastErrMsg;
  }

  /** Markup of the input that caused the last linter failure */
  get errMarkup(): string {
    return this.lastErrMarkup;
  }

  /** The AI table in use */
  get aiTable(): AITable {
    return this.table;
  }

  private resetError(): void {
    this.lastErrMsg = '';
    this.lastErrMarkup = '';
  }

  /**
   * Run an operation with the error state cleared first and recorded on
   * failure
   */
  private run<T>(operation: () => T): T {
    this.resetError();
    try {
      return operation();
    } catch (error) {
      if (error instanceof GS1Error) {
        this.lastErrMsg = error.message;
        this.lastErrMarkup = error.markup;
      }
      throw error;
    }
  }

  private get processingOptions(): ProcessingOptions {
    return {
      permitUnknownAIs: this.options.permitUnknownAIs,
      addCheckDigit: this.options.addCheckDigit,
      permitZeroSuppressedGTINinDLuris: this.options.permitZeroSuppressedGTINinDLuris,
      permitConvenienceAlphas: this.options.permitConvenienceAlphas,
      validations: { ...this.validations },
    };
  }

  /** Validate a candidate state and make it current */
  private commit(candidate: EncoderState): void {
    if (candidate.elements.length > MAX_AIS) {
      throw new ParameterError('Too many AIs');
    }
    validateAIs(candidate.elements, this.validations);
    this.state = candidate;
  }

  get sym(): Symbology {
    this.resetError();
    return this.currentSym;
  }

  set sym(value: string) {
    this.run(() => {
      if (!isSymbology(value)) {
        throw new ParameterError('Unknown symbology');
      }
      this.currentSym = value;
    });
  }

  get addCheckDigit(): boolean {
    this.resetError();
    return this.options.addCheckDigit;
  }

  set addCheckDigit(value: boolean) {
    this.resetError();
    this.options.addCheckDigit = value;
  }

  get permitUnknownAIs(): boolean {
    this.resetError();
    return this.options.permitUnknownAIs;
  }

  set permitUnknownAIs(value: boolean) {
    this.resetError();
    this.options.permitUnknownAIs = value;
  }

  get permitZeroSuppressedGTINinDLuris(): boolean {
    this.resetError();
    return this.options.permitZeroSuppressedGTINinDLuris;
  }

  set permitZeroSuppressedGTINinDLuris(value: boolean) {
    this.resetError();
    this.options.permitZeroSuppressedGTINinDLuris = value;
  }

  get permitConvenienceAlphas(): boolean {
    this.resetError();
    return this.options.permitConvenienceAlphas;
  }

  set permitConvenienceAlphas(value: boolean) {
    this.resetError();
    this.options.permitConvenienceAlphas = value;
  }

  get includeDataTitlesInHRI(): boolean {
    this.resetError();
    return this.options.includeDataTitlesInHRI;
  }

  set includeDataTitlesInHRI(value: boolean) {
    this.resetError();
    this.options.includeDataTitlesInHRI = value;
  }

  /** Shorthand for the requisite AIs validation */
  get validateAIassociations(): boolean {
    return this.getValidationEnabled('REQUISITE_AIS');
  }

  set validateAIassociations(value: boolean) {
    this.setValidationEnabled('REQUISITE_AIS', value);
  }

  getValidationEnabled(validation: string): boolean {
    return this.run(() => {
      if (!isValidationId(validation)) {
        throw new ParameterError('Unknown validation');
      }
      return this.validations[validation];
    });
  }

  setValidationEnabled(validation: string, enabled: boolean): void {
    this.run(() => {
      if (!isValidationId(validation)) {
        throw new ParameterError('Unknown validation');
      }
      if (LOCKED_VALIDATIONS.has(validation)) {
        throw new ParameterError('This validation cannot be amended');
      }
      this.validations[validation] = enabled;
    });
  }

  /**
   * The data string: AI data with "^" as FNC1, a DL URI, or plain data
   */
  get dataStr(): string {
    this.resetError();
    return this.state.dataStr;
  }

  set dataStr(dataStr: string) {
    this.run(() => {
      if (dataStr.length > MAX_DATA) {
        throw new ParameterError(`Maximum data length is ${MAX_DATA} characters`);
      }
      const options = this.processingOptions;

      if (isDLuri(dataStr)) {
        const parsed = parseDLuri(this.table, dataStr, options);
        this.commit({ dataStr, elements: parsed.elements });
        return;
      }

      const bar = dataStr.indexOf('|');
      if (bar !== -1) {
        const linear = dataStr.slice(0, bar);
        const cc = processAIdata(this.table, dataStr.slice(bar + 1), options);
        const lin = linear.startsWith('^')
          ? processAIdata(this.table, linear, options)
          : { dataStr: linear, elements: [] };
        this.commit({
          dataStr: `${lin.dataStr}|${cc.dataStr}`,
          elements: [...lin.elements, { kind: 'ccsep' }, ...cc.elements],
        });
        return;
      }

      if (dataStr.startsWith('^')) {
        this.commit(processAIdata(this.table, dataStr, options));
        return;
      }

      this.commit({ dataStr, elements: [] });
    });
  }

  /**
   * Bracketed AI data, or null when the data holds no AIs
   */
  get aiDataStr(): string | null {
    this.resetError();
    return formatAIdataStr(this.state.elements);
  }

  set aiDataStr(aiData: string) {
    this.run(() => {
      const options = this.processingOptions;
      const bar = aiData.indexOf('|');

      if (bar === -1) {
        this.commit(parseAIdata(this.table, aiData, options));
        return;
      }

      const linear = parseAIdata(this.table, aiData.slice(0, bar), options);
      const cc = parseAIdata(this.table, aiData.slice(bar + 1), options);
      this.commit({
        dataStr: `${linear.dataStr}|${cc.dataStr}`,
        elements: [...linear.elements, { kind: 'ccsep' }, ...cc.elements],
      });
    });
  }

  /**
   * Scan data as a reader would transmit it for the current symbology
   */
  get scanData(): string {
    return this.run(() =>
      generateScanData({
        sym: this.currentSym,
        dataStr: this.state.dataStr,
        elements: this.state.elements,
        addCheckDigit: this.options.addCheckDigit,
      })
    );
  }

  set scanData(scanData: string) {
    this.run(() => {
      const processed = processScanData(this.table, scanData, this.processingOptions);
      this.commit({ dataStr: processed.dataStr, elements: processed.elements });
      this.currentSym = processed.sym;
    });
  }

  /**
   * GS1 Digital Link URI for the current data
   */
  getDLuri(stem?: string): string {
    return this.run(() => generateDLuri(this.table, this.state.elements, this.validations, stem));
  }

  /** HRI lines for the current data */
  getHRI(): string[] {
    this.resetError();
    return formatHRI(this.state.elements, this.options.includeDataTitlesInHRI);
  }

  /** Non-AI query parameters from the last DL URI */
  getDLignoredQueryParams(): string[] {
    this.resetError();
    return ignoredQueryParams(this.state.elements);
  }

  /** Drop the current data */
  clear(): void {
    this.resetError();
    this.state = EMPTY_STATE;
  }
}

/**
 * Scan Data Codec
 *
 * Generates the string a barcode reader would transmit for the current
 * data and symbology, and processes such a string back into data.
 * Within scan data, FNC1 separators are sent as GS (0x1D).
 */

import { computeCheckDigit, verifyCheckDigit } from '../ai/checkdigit.js';
import { processAIdata } from '../ai/parser.js';
import { isDLuri, parseDLuri } from '../dl/parser.js';
import { ScanDataError } from '../errors.js';
import type { AITable } from '../syntax/table.js';
import type { DataElement, ProcessingOptions, Symbology } from '../types.js';
import { CC_SYM_ID, type DataMode, lookupSymId, symIdFor } from './symbologies.js';

export const GS = '\x1D';
export const MAX_DATA = 8191;

export interface ScanDataSource {
  sym: Symbology;
  dataStr: string;
  elements: readonly DataElement[];
  addCheckDigit: boolean;
}

export interface ProcessedScanData {
  sym: Symbology;
  dataStr: string;
  elements: DataElement[];
}

const UNSUITABLE = 'The data cannot be represented by the selected symbology';

/**
 * Append data to scan data: AI data loses its leading FNC1 and has the
 * others converted to GS; plain data has one escaping "\" removed from a
 * leading "\...\^"
 */
function scancat(data: string): string {
  if (data.startsWith('^')) {
    return data.slice(1).replaceAll('^', GS);
  }
  return /^\\+\^/.test(data) ? data.slice(1) : data;
}

function modeOf(data: string): DataMode {
  return data.startsWith('^') ? 'ai' : 'plain';
}

function prefix(sym: Symbology, mode: DataMode): string {
  const symId = symIdFor(sym, mode);
  if (symId === undefined) {
    throw new ScanDataError(UNSUITABLE);
  }
  return `]${symId}`;
}

/**
 * Check primary data digits and return them with a correct check digit
 */
function normalisePrimary(data: string, length: number, addCheckDigit: boolean): string {
  if (data.length !== (addCheckDigit ? length - 1 : length)) {
    throw new ScanDataError(
      addCheckDigit ? `Primary data must be ${length - 1} digits without check digit` : `Primary data must be ${length} digits`
    );
  }
  if (!/^[0-9]+$/.test(data)) {
    throw new ScanDataError('Primary data must be all digits');
  }
  if (addCheckDigit) {
    return data + computeCheckDigit(data);
  }
  if (!verifyCheckDigit(data)) {
    throw new ScanDataError('Primary data check digit is incorrect');
  }
  return data;
}

function requireAIdata(data: string): void {
  if (!data.startsWith('^')) {
    throw new ScanDataError(UNSUITABLE);
  }
}

/** Whether the last linear AI is variable length, so needs a separator */
function lastLinearAIneedsFNC1(elements: readonly DataElement[]): boolean {
  let fnc1 = false;
  for (const element of elements) {
    if (element.kind === 'ccsep') {
      break;
    }
    if (element.kind === 'ai') {
      fnc1 = element.entry.fnc1;
    }
  }
  return fnc1;
}

/**
 * Scan data for the current data and symbology
 */
export function generateScanData(source: ScanDataSource): string {
  const { sym, elements } = source;
  const bar = source.dataStr.indexOf('|');
  let linear = bar === -1 ? source.dataStr : source.dataStr.slice(0, bar);
  let cc = bar === -1 ? null : source.dataStr.slice(bar + 1);

  // Check digits are only completed for bare digit strings
  const addCheckDigit = source.addCheckDigit && !linear.startsWith('^');

  switch (sym) {
    case 'QR':
    case 'DM':
    case 'DotCode': {
      if (!linear.startsWith('^') && cc !== null) {
        linear = source.dataStr;
        cc = null;
      }
      return prefix(sym, modeOf(linear)) + scancat(linear);
    }

    case 'GS1_128_CCA':
    case 'GS1_128_CCC':
    case 'DataBarExpanded': {
      requireAIdata(linear);
      if (cc === null) {
        return (sym === 'DataBarExpanded' ? CC_SYM_ID : prefix(sym, 'ai')) + scancat(linear);
      }
      requireAIdata(cc);
      const separator = lastLinearAIneedsFNC1(elements) ? GS : '';
      return CC_SYM_ID + scancat(linear) + separator + scancat(cc);
    }

    case 'DataBarOmni':
    case 'DataBarTruncated':
    case 'DataBarStacked':
    case 'DataBarStackedOmni':
    case 'DataBarLimited': {
      const primary = normalisePrimary(linear.startsWith('^01') ? linear.slice(3) : linear, 14, addCheckDigit);
      if (sym === 'DataBarLimited' && primary[0] >= '2') {
        throw new ScanDataError('Primary data item value is too large');
      }
      let out = `${prefix(sym, modeOf(linear))}01${primary}`;
      if (cc !== null) {
        requireAIdata(cc);
        out += scancat(cc);
      }
      return out;
    }

    case 'UPCA':
    case 'UPCE':
    case 'EAN13':
    case 'EAN8': {
      const length = sym === 'EAN13' ? 13 : sym === 'EAN8' ? 8 : 12;
      const pad = sym === 'UPCA' || sym === 'UPCE' ? '0' : '';
      const aiZeros = 17 - length;
      const digits = linear.startsWith('^01000000'.slice(0, aiZeros)) ? linear.slice(aiZeros) : linear;

      let out = prefix(sym, modeOf(linear)) + pad + normalisePrimary(digits, length, addCheckDigit);
      if (cc !== null) {
        requireAIdata(cc);
        out += `|${CC_SYM_ID}${scancat(cc)}`;
      }
      return out;
    }

    case 'NONE':
      throw new ScanDataError('Unknown symbology');
  }
}

/**
 * Process scan data into a symbology, data string and elements. AI
 * association validations are left to the caller.
 */
export function processScanData(table: AITable, scanData: string, options: ProcessingOptions): ProcessedScanData {
  if (!scanData.startsWith(']') || scanData.length < 3) {
    throw new ScanDataError('Missing symbology identifier');
  }

  const found = lookupSymId(scanData.slice(1, 3));
  if (!found) {
    throw new ScanDataError('Unsupported symbology identifier');
  }
  const { sym } = found;
  let { mode } = found;

  let data = scanData.slice(3);
  if (data.length >= MAX_DATA) {
    throw new ScanDataError(`Maximum data length is ${MAX_DATA - 1} characters`);
  }

  let dataStr = '';

  if (sym === 'EAN13' || sym === 'EAN8') {
    const primaryLength = sym === 'EAN13' ? 13 : 8;
    if (data.length < primaryLength) {
      throw new ScanDataError('Primary scan data is too short');
    }

    const rest = data.slice(primaryLength);
    if (rest !== '' && !(rest.length > CC_SYM_ID.length && rest.startsWith(`|${CC_SYM_ID}`))) {
      throw new ScanDataError('Primary message is too long');
    }

    const primary = data.slice(0, primaryLength);
    if (!/^[0-9]+$/.test(primary)) {
      throw new ScanDataError('Primary message may only contain digits');
    }
    if (!verifyCheckDigit(primary)) {
      throw new ScanDataError('Primary message check digit is incorrect');
    }

    if (rest === '') {
      return { sym, dataStr: primary, elements: [] };
    }

    dataStr = `${primary}|`;
    data = rest.slice(1 + CC_SYM_ID.length);
    mode = 'ai';
  }

  if (mode === 'ai') {
    if (data.includes('^')) {
      throw new ScanDataError('Scan data contains illegal ^ character');
    }
    const aiData = `^${data.replaceAll(GS, '^')}`;
    const parsed = processAIdata(table, aiData, options);
    return { sym, dataStr: dataStr + parsed.dataStr, elements: parsed.elements };
  }

  dataStr = /^\\*\^/.test(data) ? `\\${data}` : data;
  if (isDLuri(dataStr)) {
    const parsed = parseDLuri(table, dataStr, options);
    return { sym, dataStr, elements: parsed.elements };
  }
  return { sym, dataStr, elements: [] };
}

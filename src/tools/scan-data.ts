/**
 * gs1_scan_data - Process or generate barcode scan data
 */

import { ParameterError } from '../errors.js';
import { SYMBOLOGIES, type ScanDataInput, type Symbology } from '../types.js';
import { createEncoder, engineOptionsSchema, failure, loadData, type FailureResult } from './shared.js';

export interface ScanDataSuccess {
  success: true;
  message: string;
  symbology: Symbology;
  scanData: string;
  dataStr: string;
  hri: string[];
}

export type ScanDataResult = ScanDataSuccess | FailureResult;

/**
 * Decode scan data with its symbology identifier, or produce the scan
 * data a reader would transmit for some data in a given symbology
 */
export function scanData(input: ScanDataInput): ScanDataResult {
  const encoder = createEncoder(input);

  try {
    if (input.scanData !== undefined) {
      encoder.scanData = input.scanData;
      return {
        success: true,
        message: `Processed scan data for ${encoder.sym}.`,
        symbology: encoder.sym,
        scanData: input.scanData,
        dataStr: encoder.dataStr,
        hri: encoder.getHRI(),
      };
    }

    if (input.data === undefined || input.symbology === undefined) {
      throw new ParameterError('Either scanData, or data together with symbology, is required');
    }

    encoder.sym = input.symbology;
    loadData(encoder, input.data);
    return {
      success: true,
      message: `Generated scan data for ${input.symbology}.`,
      symbology: input.symbology,
      scanData: encoder.scanData,
      dataStr: encoder.dataStr,
      hri: encoder.getHRI(),
    };
  } catch (error) {
    return failure(error);
  }
}

/**
 * Tool definition for MCP
 */
export const scanDataToolDef = {
  name: 'gs1_scan_data',
  description:
    'Process scan data beginning with a symbology identifier such as "]C1" or "]Q3", or generate the scan data ' +
    'for GS1 data in a chosen symbology.',
  inputSchema: {
    type: 'object',
    properties: {
      scanData: {
        type: 'string',
        description: 'Scan data to process, with GS (ASCII 29) as the separator.',
      },
      data: {
        type: 'string',
        description: 'GS1 data to encode when generating scan data.',
      },
      symbology: {
        type: 'string',
        enum: SYMBOLOGIES.filter((sym) => sym !== 'NONE'),
        description: 'Symbology to generate scan data for.',
      },
      ...engineOptionsSchema,
    },
  },
};

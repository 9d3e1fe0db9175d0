/**
 * gs1_parse - Parse GS1 data in any input format
 */

import type { ParseInput } from '../types.js';
import { createEncoder, engineOptionsSchema, failure, loadData, type FailureResult } from './shared.js';

export interface ParseSuccess {
  success: true;
  message: string;
  dataStr: string;
  aiDataStr: string | null;
  hri: string[];
  ignoredQueryParams: string[];
}

export type ParseResult = ParseSuccess | FailureResult;

/**
 * Parse bracketed AI data, a "^" data string or a Digital Link URI
 */
export function parse(input: ParseInput): ParseResult {
  const encoder = createEncoder(input);

  try {
    loadData(encoder, input.data, input.format);
  } catch (error) {
    return failure(error);
  }

  const hri = encoder.getHRI();
  return {
    success: true,
    message: hri.length > 0 ? `Parsed ${hri.length} AI element(s).` : 'Parsed non-GS1 data.',
    dataStr: encoder.dataStr,
    aiDataStr: encoder.aiDataStr,
    hri,
    ignoredQueryParams: encoder.getDLignoredQueryParams(),
  };
}

/**
 * Tool definition for MCP
 */
export const parseToolDef = {
  name: 'gs1_parse',
  description:
    'Parse and validate GS1 Application Identifier data given as bracketed AI data, a "^" data string ' +
    'or a GS1 Digital Link URI. Returns the normalised forms and the HRI text.',
  inputSchema: {
    type: 'object',
    properties: {
      data: {
        type: 'string',
        description: 'The data to parse, e.g. "(01)09521234543213(10)ABC123" or "^0109521234543213".',
      },
      format: {
        type: 'string',
        enum: ['auto', 'bracketed', 'plain', 'digital_link'],
        description: 'Input format. "auto" (default) detects it from the data.',
      },
      ...engineOptionsSchema,
    },
    required: ['data'],
  },
};

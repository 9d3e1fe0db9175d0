/**
 * gs1_digital_link - Build a GS1 Digital Link URI
 */

import { getConfig } from '../config/index.js';
import type { DigitalLinkInput } from '../types.js';
import { createEncoder, engineOptionsSchema, failure, loadData, type FailureResult } from './shared.js';

export interface DigitalLinkSuccess {
  success: true;
  message: string;
  uri: string;
}

export type DigitalLinkResult = DigitalLinkSuccess | FailureResult;

/**
 * Convert GS1 data in any input format into a Digital Link URI
 */
export function digitalLink(input: DigitalLinkInput): DigitalLinkResult {
  const encoder = createEncoder(input);

  try {
    loadData(encoder, input.data);
    const uri = encoder.getDLuri(input.stem ?? getConfig().dlStem);
    return { success: true, message: 'Generated GS1 Digital Link URI.', uri };
  } catch (error) {
    return failure(error);
  }
}

/**
 * Tool definition for MCP
 */
export const digitalLinkToolDef = {
  name: 'gs1_digital_link',
  description:
    'Convert GS1 AI data (bracketed, "^" data string or another Digital Link URI) into a GS1 Digital Link URI ' +
    'under the given or configured stem.',
  inputSchema: {
    type: 'object',
    properties: {
      data: {
        type: 'string',
        description: 'The GS1 data to convert, e.g. "(01)09521234543213(10)ABC123".',
      },
      stem: {
        type: 'string',
        description: 'URI stem such as "https://example.com". Defaults to the configured stem.',
      },
      ...engineOptionsSchema,
    },
    required: ['data'],
  },
};

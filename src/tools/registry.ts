/**
 * Tool registry
 *
 * The tool definitions served by the MCP server and the dispatch from a
 * tool name to its handler.
 */

import { checkDigit, checkDigitToolDef } from './check-digit.js';
import { config, configToolDef } from './config.js';
import { digitalLink, digitalLinkToolDef } from './digital-link.js';
import {
  type ToolArgs,
  readCheckDigitInput,
  readConfigInput,
  readDigitalLinkInput,
  readParseInput,
  readScanDataInput,
} from './input.js';
import { parse, parseToolDef } from './parse.js';
import { scanData, scanDataToolDef } from './scan-data.js';

export type ToolResponse = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

export const toolDefs = [
  parseToolDef,
  digitalLinkToolDef,
  scanDataToolDef,
  checkDigitToolDef,
  configToolDef,
];

function textResponse(result: unknown): ToolResponse {
  return {
    content: [
      {
        type: 'text',
        text: JSON.stringify(result, null, 2),
      },
    ],
  };
}

function errorResponse(text: string): ToolResponse {
  return {
    content: [
      {
        type: 'text',
        text,
      },
    ],
    isError: true,
  };
}

/**
 * Run a tool by name
 */
export function callTool(name: string, args: ToolArgs = {}): ToolResponse {
  try {
    switch (name) {
      case 'gs1_parse':
        return textResponse(parse(readParseInput(args)));

      case 'gs1_digital_link':
        return textResponse(digitalLink(readDigitalLinkInput(args)));

      case 'gs1_scan_data':
        return textResponse(scanData(readScanDataInput(args)));

      case 'gs1_check_digit':
        return textResponse(checkDigit(readCheckDigitInput(args)));

      case 'gs1_config':
        return textResponse(config(readConfigInput(args)));

      default:
        return errorResponse(`Unknown tool: ${name}`);
    }
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    return errorResponse(`Error: ${errorMessage}`);
  }
}

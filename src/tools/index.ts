/**
 * MCP Tools Module
 */

export { parse, parseToolDef, type ParseResult } from './parse.js';
export { digitalLink, digitalLinkToolDef, type DigitalLinkResult } from './digital-link.js';
export { scanData, scanDataToolDef, type ScanDataResult } from './scan-data.js';
export { checkDigit, checkDigitToolDef, type CheckDigitResult } from './check-digit.js';
export { config, configToolDef, type ConfigResult } from './config.js';
export { type FailureResult } from './shared.js';
export {
  type ToolArgs,
  readParseInput,
  readDigitalLinkInput,
  readScanDataInput,
  readCheckDigitInput,
  readConfigInput,
} from './input.js';
export { callTool, toolDefs, type ToolResponse } from './registry.js';

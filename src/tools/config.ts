/**
 * gs1_config - Show or update the default engine options
 */

import type { ConfigInput, GS1Config } from '../types.js';
import { getConfigForDisplay, updateConfig, validateConfig } from '../config/index.js';

export interface ConfigResult {
  success: boolean;
  config?: Record<string, unknown>;
  message: string;
  warnings?: string[];
}

/**
 * Configure engine defaults
 */
export function config(input: ConfigInput): ConfigResult {
  const { show, ...fields } = input;
  const updates: Partial<GS1Config> = {};
  if (fields.permitUnknownAIs !== undefined) updates.permitUnknownAIs = fields.permitUnknownAIs;
  if (fields.addCheckDigit !== undefined) updates.addCheckDigit = fields.addCheckDigit;
  if (fields.permitZeroSuppressedGTINinDLuris !== undefined) {
    updates.permitZeroSuppressedGTINinDLuris = fields.permitZeroSuppressedGTINinDLuris;
  }
  if (fields.permitConvenienceAlphas !== undefined) updates.permitConvenienceAlphas = fields.permitConvenienceAlphas;
  if (fields.includeDataTitlesInHRI !== undefined) updates.includeDataTitlesInHRI = fields.includeDataTitlesInHRI;
  if (fields.validateAIassociations !== undefined) updates.validateAIassociations = fields.validateAIassociations;
  if (fields.dlStem !== undefined) updates.dlStem = fields.dlStem;
  if (fields.syntaxDictionaryPath !== undefined) updates.syntaxDictionaryPath = fields.syntaxDictionaryPath;

  if (!show && Object.keys(updates).length > 0) {
    updateConfig(updates);
    const validation = validateConfig();

    return {
      success: true,
      config: getConfigForDisplay(),
      message: `Updated ${Object.keys(updates).join(', ')}.`,
      warnings: validation.issues.length > 0 ? validation.issues : undefined,
    };
  }

  const validation = validateConfig();
  return {
    success: true,
    config: getConfigForDisplay(),
    message: show
      ? 'Current configuration:'
      : `GS1 syntax engine configuration. Pass any of these to update it:
- permitUnknownAIs, addCheckDigit, permitZeroSuppressedGTINinDLuris, permitConvenienceAlphas,
  includeDataTitlesInHRI, validateAIassociations (true/false)
- dlStem: default Digital Link stem
- syntaxDictionaryPath: syntax dictionary file to use instead of the bundled one`,
    warnings: validation.issues.length > 0 ? validation.issues : undefined,
  };
}

/**
 * Tool definition for MCP
 */
export const configToolDef = {
  name: 'gs1_config',
  description: 'Show or change the default options used by the GS1 tools, including the Digital Link stem.',
  inputSchema: {
    type: 'object',
    properties: {
      show: {
        type: 'boolean',
        description: 'Display current configuration settings.',
      },
      permitUnknownAIs: { type: 'boolean', description: 'Admit AIs absent from the syntax dictionary.' },
      addCheckDigit: { type: 'boolean', description: 'Compute check digits instead of verifying them.' },
      permitZeroSuppressedGTINinDLuris: {
        type: 'boolean',
        description: 'Accept a zero-suppressed GTIN in a Digital Link path.',
      },
      permitConvenienceAlphas: { type: 'boolean', description: 'Accept alphabetic AI names in a Digital Link path.' },
      includeDataTitlesInHRI: { type: 'boolean', description: 'Prefix HRI lines with the AI data title.' },
      validateAIassociations: { type: 'boolean', description: 'Enable the requisite AI validation.' },
      dlStem: { type: 'string', description: 'Default stem for generated Digital Link URIs.' },
      syntaxDictionaryPath: { type: 'string', description: 'Syntax dictionary file replacing the bundled one.' },
    },
  },
};

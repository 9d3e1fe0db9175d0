#!/usr/bin/env node
/**
 * GS1 Syntax CLI
 *
 * Command-line interface for parsing, converting and checking GS1 data.
 */

import { computeCheckDigit } from './ai/checkdigit.js';
import { getConfig, getConfigForDisplay, validateConfig } from './config/index.js';
import { GS1Error } from './errors.js';
import { createEncoder, loadData } from './tools/shared.js';
import type { EngineOptionsInput } from './types.js';
import { VERSION } from './types.js';

// Colors for terminal output
const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  red: '\x1b[31m',
  cyan: '\x1b[36m',
};

// Options that take a value
const VALUE_OPTIONS = new Set(['--stem', '--sym']);

function log(message: string, color: keyof typeof colors = 'reset'): void {
  console.log(`${colors[color]}${message}${colors.reset}`);
}

function success(message: string): void {
  log(`✓ ${message}`, 'green');
}

function info(message: string): void {
  log(`ℹ ${message}`, 'blue');
}

function warn(message: string): void {
  log(`⚠ ${message}`, 'yellow');
}

function error(message: string): void {
  log(`✗ ${message}`, 'red');
}

/**
 * Show help message
 */
function showHelp(): void {
  console.log(`
${colors.bright}GS1 Syntax Engine${colors.reset} v${VERSION}

Parse, validate and convert GS1 Application Identifier data.

${colors.cyan}Usage:${colors.reset}
  gs1-syntax <command> [options]

${colors.cyan}Commands:${colors.reset}
  parse <data>        Parse bracketed AI data, a "^" data string or a DL URI
  dl <data>           Convert data to a GS1 Digital Link URI
  scan <data>         Generate scan data, or process scan data starting with "]"
  hri <data>          Print the human readable interpretation
  check-digit <digits>  Compute a GS1 mod-10 check digit
  config              Show current configuration
  version             Show version
  help                Show this help message

${colors.cyan}Options:${colors.reset}
  --permit-unknown-ais          Admit AIs that are not in the syntax dictionary
  --add-check-digit             Compute the leading key's check digit
  --permit-zero-suppressed-gtin Accept a zero-suppressed GTIN in a DL path
  --convenience-alphas          Accept AI names such as "gtin" in a DL path
  --titles                      Prefix HRI lines with data titles
  --no-requisite                Disable the requisite AI validation

${colors.cyan}DL Options:${colors.reset}
  --stem <url>        URI stem (default: configured stem)

${colors.cyan}Scan Options:${colors.reset}
  --sym <name>        Symbology, e.g. DataMatrix as "DM", or "QR", "GS1_128_CCA"

${colors.cyan}Examples:${colors.reset}
  gs1-syntax parse "(01)09521234543213(10)ABC123"
  gs1-syntax dl "(01)09521234543213(10)ABC123" --stem https://example.com
  gs1-syntax scan "(01)09521234543213" --sym QR
  gs1-syntax hri "^0109521234543213^99TEST" --titles
  gs1-syntax check-digit 0952123454321
`);
}

/**
 * Value of an option that takes one, if given
 */
function optionValue(args: string[], name: string): string | undefined {
  const index = args.indexOf(name);
  return index !== -1 ? args[index + 1] : undefined;
}

/**
 * First argument that is neither an option nor an option's value
 */
function positional(args: string[]): string | undefined {
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (VALUE_OPTIONS.has(arg)) {
      i++;
      continue;
    }
    if (!arg.startsWith('--')) {
      return arg;
    }
  }
  return undefined;
}

function engineOptions(args: string[]): EngineOptionsInput {
  const options: EngineOptionsInput = {};
  if (args.includes('--permit-unknown-ais')) options.permitUnknownAIs = true;
  if (args.includes('--add-check-digit')) options.addCheckDigit = true;
  if (args.includes('--permit-zero-suppressed-gtin')) options.permitZeroSuppressedGTINinDLuris = true;
  if (args.includes('--convenience-alphas')) options.permitConvenienceAlphas = true;
  if (args.includes('--titles')) options.includeDataTitlesInHRI = true;
  if (args.includes('--no-requisite')) options.validations = { REQUISITE_AIS: false };
  return options;
}

function requireData(args: string[], what = 'data'): string {
  const data = positional(args);
  if (data === undefined) {
    throw new Error(`Missing ${what}`);
  }
  return data;
}

/**
 * Parse data and print its forms
 */
function parse(args: string[]): void {
  const encoder = createEncoder(engineOptions(args));
  loadData(encoder, requireData(args));

  log('\n🔎 Parsed GS1 Data\n', 'bright');
  log(`  Data string: ${encoder.dataStr}`);
  const aiData = encoder.aiDataStr;
  if (aiData !== null) {
    log(`  AI data:     ${aiData}`);
    log('');
    for (const line of encoder.getHRI()) {
      log(`  ${line}`, 'cyan');
    }
  } else {
    info('Non-GS1 data: no AIs extracted');
  }

  const ignored = encoder.getDLignoredQueryParams();
  if (ignored.length > 0) {
    log('');
    warn(`Ignored query parameters: ${ignored.join(', ')}`);
  }
  log('');
}

function digitalLink(args: string[]): void {
  const encoder = createEncoder(engineOptions(args));
  loadData(encoder, requireData(args));
  console.log(encoder.getDLuri(optionValue(args, '--stem') ?? getConfig().dlStem));
}

function scan(args: string[]): void {
  const encoder = createEncoder(engineOptions(args));
  const data = requireData(args);

  if (data.startsWith(']')) {
    encoder.scanData = data;
    success(`Symbology: ${encoder.sym}`);
    log(`  Data string: ${encoder.dataStr}`);
    for (const line of encoder.getHRI()) {
      log(`  ${line}`, 'cyan');
    }
    return;
  }

  const sym = optionValue(args, '--sym');
  if (sym === undefined) {
    throw new Error('Missing --sym <name>');
  }
  encoder.sym = sym;
  loadData(encoder, data);
  console.log(encoder.scanData);
}

function hri(args: string[]): void {
  const encoder = createEncoder(engineOptions(args));
  loadData(encoder, requireData(args));
  for (const line of encoder.getHRI()) {
    console.log(line);
  }
}

function checkDigit(args: string[]): void {
  const digits = requireData(args, 'digits');
  const digit = computeCheckDigit(digits);
  success(`Check digit: ${digit}`);
  log(`  ${digits}${digit}`);
}

/**
 * Show current configuration
 */
function showConfig(): void {
  log('\n📋 GS1 Syntax Engine Configuration\n', 'bright');

  const display = getConfigForDisplay();
  log('Config file: ' + String(display.config_path), 'cyan');
  log('');

  for (const [key, value] of Object.entries(display)) {
    if (key !== 'config_path') {
      log(`  ${key}: ${JSON.stringify(value)}`);
    }
  }

  const validation = validateConfig();
  if (validation.issues.length > 0) {
    log('');
    for (const issue of validation.issues) {
      warn(issue);
    }
  }
  log('');
}

function run(command: string, args: string[]): void {
  switch (command) {
    case 'parse':
      parse(args);
      break;
    case 'dl':
      digitalLink(args);
      break;
    case 'scan':
      scan(args);
      break;
    case 'hri':
      hri(args);
      break;
    case 'check-digit':
      checkDigit(args);
      break;
    case 'config':
      showConfig();
      break;
    default:
      error(`Unknown command: ${command}`);
      showHelp();
      process.exit(1);
  }
}

/**
 * Main CLI entry point
 */
function main(): void {
  const args = process.argv.slice(2);
  const command = args[0];

  switch (command) {
    case 'version':
    case '-v':
    case '--version':
      console.log(`gs1-syntax v${VERSION}`);
      break;
    case 'help':
    case '-h':
    case '--help':
    case undefined:
      showHelp();
      break;
    default:
      try {
        run(command, args.slice(1));
      } catch (err) {
        error(err instanceof Error ? err.message : String(err));
        if (err instanceof GS1Error && err.markup !== '') {
          log(`  ${err.markup}`, 'yellow');
        }
        process.exit(1);
      }
  }
}

main();

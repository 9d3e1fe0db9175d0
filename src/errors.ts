/**
 * Error types
 *
 * Every failure raised by the engine carries a message and, for linter
 * failures, a markup string that brackets the offending characters.
 */

export class GS1Error extends Error {
  readonly markup: string;

  constructor(message: string, markup = '') {
    super(message);
    this.name = 'GS1Error';
    this.markup = markup;
  }
}

/** Rejected input: bad AI syntax, failed linter or validation, bad option */
export class ParameterError extends GS1Error {
  constructor(message: string, markup = '') {
    super(message, markup);
    this.name = 'ParameterError';
  }
}

/** GS1 Digital Link URI parse or generation failure */
export class DigitalLinkError extends GS1Error {
  constructor(message: string, markup = '') {
    super(message, markup);
    this.name = 'DigitalLinkError';
  }
}

/** Malformed scan data or unusable symbology */
export class ScanDataError extends GS1Error {
  constructor(message: string, markup = '') {
    super(message, markup);
    this.name = 'ScanDataError';
  }
}

/** The AI table could not be built */
export class InitializationError extends GS1Error {
  constructor(message: string) {
    super(message);
    this.name = 'InitializationError';
  }
}

/** A syntax dictionary line could not be parsed */
export class SyntaxDictionaryError extends InitializationError {
  readonly line: number;

  constructor(line: number, reason: string) {
    super(`Syntax Dictionary line ${line}: ${reason}`);
    this.name = 'SyntaxDictionaryError';
    this.line = line;
  }
}

/**
 * Error kinds raised by the codec. Naturalness rejection and failed
 * detection are reported as values, never thrown.
 */

export class StegoError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Malformed rule line, or a probability outside [0, 1] under strict parsing.
 */
export class GrammarSyntaxError extends StegoError {
  readonly line: number;

  constructor(line: number, detail: string) {
    super(`Grammar line ${line}: ${detail}`);
    this.line = line;
  }
}

export class GrammarIncompleteError extends StegoError {
  constructor(startSymbol: string) {
    super(`Grammar does not define start symbol '${startSymbol}'`);
  }
}

export class GrammarFileNotFoundError extends StegoError {
  readonly path: string;

  constructor(path: string) {
    super(`Grammar file not found: ${path}`);
    this.path = path;
  }
}

export class CodecOptionsError extends StegoError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid codec options: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

/**
 * A derivation kept expanding past its step ceiling (non-terminating grammar).
 */
export class DerivationLimitError extends StegoError {
  constructor(steps: number) {
    super(`Derivation exceeded ${steps} expansion steps`);
  }
}

export class ProfileFormatError extends StegoError {}

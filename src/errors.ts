/**
 * Error Types
 *
 * Structural errors abort the interpretation of a file. Every one of them
 * carries enough location information to point at the offending line.
 */

/**
 * Raised when a controller program (.tlan) is malformed or violates the
 * stream protocol (double on/off, stream left open, ...).
 */
export class ControllerProgramError extends Error {
  readonly line: number;
  readonly detail: string;

  constructor(detail: string, line: number = 0) {
    super(
      line > 0
        ? `The .tlan file has errors in line ${line}: ${detail}`
        : `The controller command has errors: ${detail}`
    );
    this.name = 'ControllerProgramError';
    this.line = line;
    this.detail = detail;
  }
}

/**
 * Raised when a stream is queried in a state where the answer does not exist
 */
export class StreamStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StreamStateError';
  }
}

/**
 * Raised when transmit and receive intervals overlap
 */
export class OverlapError extends Error {
  constructor(detail?: string) {
    super(detail ? `The radar transmits while receiving! ${detail}` : 'The radar transmits while receiving!');
    this.name = 'OverlapError';
  }
}

export type NcoErrorKind = 'version' | 'malformed' | 'frequency';

/**
 * Raised when an NCO file cannot be parsed
 */
export class NcoFormatError extends Error {
  readonly kind: NcoErrorKind;
  readonly line: number;

  constructor(kind: NcoErrorKind, detail: string, line: number) {
    super(`NCO file line ${line}: ${detail}`);
    this.name = 'NcoFormatError';
    this.kind = kind;
    this.line = line;
  }
}

// =============================================================================
// Console language
// =============================================================================

export interface SourceLocation {
  filename: string;
  line: number;
  /** First character of the offending text, 1-based column */
  char1: number;
  /** Last character; equal to char1 for a single position */
  char2: number;
}

export function formatLocation(location: SourceLocation): string {
  let s = location.filename;
  if (location.line > 0) {
    s += `, line ${location.line}`;
  }
  if (location.char1 > 0) {
    s += location.char2 > location.char1
      ? `, chars ${location.char1}–${location.char2}`
      : `, char ${location.char1}`;
  }
  return s;
}

/**
 * Raised for every fatal error in a console script: syntax, unknown
 * commands, undefined variables, bad escapes and argument mismatches.
 */
export class ConsoleScriptError extends Error {
  readonly location: SourceLocation;
  readonly detail: string;

  constructor(detail: string, location: SourceLocation) {
    super(`${formatLocation(location)}: ${detail}`);
    this.name = 'ConsoleScriptError';
    this.location = location;
    this.detail = detail;
  }
}

/**
 * Raised by the expression evaluator. Carries no location of its own; the
 * interpreter attaches the location of the command that evaluated it.
 */
export class ExpressionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ExpressionError';
  }
}

/**
 * Raised by command handlers for bad arguments. The interpreter attaches the
 * location of the calling command.
 */
export class CommandUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CommandUsageError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Raised when an experiment file cannot be found under any search root
 */
export class ExperimentFileError extends Error {
  readonly path: string;

  constructor(path: string, searched: readonly string[] = []) {
    super(
      searched.length > 0
        ? `Experiment file ${path} not found (searched ${searched.join(', ')})`
        : `Experiment file ${path} not found`
    );
    this.name = 'ExperimentFileError';
    this.path = path;
  }
}

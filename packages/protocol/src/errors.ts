/**
 * Error kinds reported by the UCI codec
 */
export type UciErrorKind =
  | 'MissingCmd'
  | 'UnknownOpt'
  | 'BadNumber'
  | 'BadBool'
  | 'BadMillis'
  | 'BadOpponent'
  | 'BadPlayerType'
  | 'BadTitle'
  | 'MissingOnOff'
  | 'Position'
  | 'GoErr'
  | 'NothingSetForGo'
  | 'SetOptErr'
  | 'What';

/**
 * A parse or validation failure. Only `BadMillis` carries a payload: the
 * keyword and the raw token that failed to parse.
 */
export type UciError =
  | { readonly kind: Exclude<UciErrorKind, 'BadMillis'> }
  | { readonly kind: 'BadMillis'; readonly field: string; readonly raw: string };

/**
 * Outcome of every fallible codec call
 */
export type ParseResult<T> =
  | { readonly success: true; readonly value: T }
  | { readonly success: false; readonly error: UciError };

export function ok<T>(value: T): ParseResult<T> {
  return { success: true, value };
}

export function fail<T>(kind: Exclude<UciErrorKind, 'BadMillis'>): ParseResult<T> {
  return { success: false, error: { kind } };
}

export function badMillis<T>(field: string, raw: string): ParseResult<T> {
  return { success: false, error: { kind: 'BadMillis', field, raw } };
}

const DESCRIPTIONS: Record<Exclude<UciErrorKind, 'BadMillis'>, string> = {
  MissingCmd: 'empty command line',
  UnknownOpt: 'unrecognized keyword',
  BadNumber: 'expected a number',
  BadBool: 'expected true or false',
  BadOpponent: 'malformed UCI_Opponent value',
  BadPlayerType: 'expected computer or human',
  BadTitle: 'unknown player title',
  MissingOnOff: 'expected on or off after debug',
  Position: 'position needs startpos or fen',
  GoErr: 'go keyword is missing its argument',
  NothingSetForGo: 'go needs at least one search limit',
  SetOptErr: 'setoption needs a name',
  What: 'malformed command',
};

/**
 * One-line human readable description of an error
 */
export function describeUciError(error: UciError): string {
  if (error.kind === 'BadMillis') {
    return `expected milliseconds for ${error.field}, got "${error.raw}"`;
  }
  return DESCRIPTIONS[error.kind];
}

/**
 * Error thrown by the `*OrThrow` variants of the parsers
 */
export class UciParseError extends Error {
  constructor(
    public readonly error: UciError,
    public readonly line?: string,
  ) {
    super(describeUciError(error));
    this.name = 'UciParseError';
  }

  get kind(): UciErrorKind {
    return this.error.kind;
  }
}

/**
 * Unwrap a result, throwing UciParseError on failure
 */
export function unwrap<T>(result: ParseResult<T>, line?: string): T {
  if (!result.success) {
    throw new UciParseError(result.error, line);
  }
  return result.value;
}

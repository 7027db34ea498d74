import { ValidationError } from '../shared/types.js';

export type ParseErrorKind =
  | 'UnknownOption'
  | 'MissingOptionValue'
  | 'InvalidOptionValue'
  | 'MissingRequiredOption'
  | 'MissingPositionalArgument'
  | 'InvalidPositionalValue'
  | 'UnexpectedPositionalArgument';

export interface ParseErrorDetails {
  token?: string;
  index?: number;
  /** Option name or positional slot name the error is about. */
  target?: string;
}

export class ParseError extends ValidationError {
  public readonly kind: ParseErrorKind;
  public readonly token?: string;
  public readonly index?: number;
  public readonly target?: string;

  constructor(kind: ParseErrorKind, message: string, details: ParseErrorDetails = {}) {
    super(message, kind);
    this.name = 'ParseError';
    this.kind = kind;
    this.token = details.token;
    this.index = details.index;
    this.target = details.target;
  }
}

export function isParseError(error: unknown): error is ParseError {
  return error instanceof ParseError;
}

/**
 * Error types raised while building or evaluating expressions.
 */
export type LispErrorType =
  | 'UnboundVariable'
  | 'NotAPair'
  | 'MalformedList'
  | 'TypeMismatch'
  | 'ArityMismatch'
  | 'NotAProcedure'
  | 'UnknownForm'
  | 'MalformedForm'
  | 'DivisionByZero'
  | 'IntegerOverflow'
  | 'RecursionDepthExceeded'
  | 'IterationLimitExceeded';

export class LispError extends Error {
  constructor(
    public errorType: LispErrorType,
    message: string,
  ) {
    super(`${errorType}: ${message}`);
    this.name = 'LispError';
  }
}

export function isLispError(error: unknown, errorType?: LispErrorType): error is LispError {
  if (!(error instanceof LispError)) return false;
  return errorType === undefined || error.errorType === errorType;
}

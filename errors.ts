export type CompileErrorCode =
  | 'E_NOTHING_TO_REPEAT'
  | 'E_UNMATCHED_PAREN'
  | 'E_GROUP_DEPTH'
  | 'E_UNSUPPORTED_CHAR';

export class CompileError extends Error {
  constructor(
    readonly code: CompileErrorCode,
    message: string,
    readonly position: number,
  ) {
    super(`${message} at position ${position}`);
    this.name = 'CompileError';
  }
}

/** Raised when a run would grow its thread set past the configured limit. */
export class ThreadLimitError extends Error {
  constructor(readonly limit: number) {
    super(`thread limit exceeded: ${limit}`);
    this.name = 'ThreadLimitError';
  }
}

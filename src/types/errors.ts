/**
 * Typed errors for the analyzer.
 *
 * Fatal conditions surface as one of these classes; non-fatal ones
 * (load warnings, scan skips) are plain records and never thrown.
 */

export type ScanErrorCode =
  | 'ROOT_NOT_FOUND'
  | 'ROOT_NOT_DIRECTORY'
  | 'ROOT_UNREADABLE'
  | 'SCAN_ABORTED';

export type RuleSourceErrorCode =
  | 'SOURCE_NOT_FOUND'
  | 'SOURCE_UNREADABLE'
  | 'SOURCE_PARSE_FAILED'
  | 'SOURCE_INVALID';

export type IsolationViolationCode =
  | 'MISSING_SESSION_ID'
  | 'MALFORMED_SESSION_ID'
  | 'MISSING_DOMAIN';

export type ExchangeFormatErrorCode = 'INVALID_SNAPSHOT' | 'INVALID_REPORT';

/**
 * Fatal to one scan: the root is unusable or the walk was cancelled.
 */
export class ScanError extends Error {
  readonly code: ScanErrorCode;
  readonly rootPath: string;

  constructor(code: ScanErrorCode, rootPath: string, message: string) {
    super(message);
    this.name = 'ScanError';
    this.code = code;
    this.rootPath = rootPath;
  }
}

/**
 * The rule document as a whole could not be read or parsed.
 * A single bad entry is a LoadWarning instead.
 */
export class RuleSourceError extends Error {
  readonly code: RuleSourceErrorCode;
  readonly source: string;

  constructor(code: RuleSourceErrorCode, source: string, message: string) {
    super(message);
    this.name = 'RuleSourceError';
    this.code = code;
    this.source = source;
  }
}

/**
 * A history call without usable isolation fields. Raised before any I/O.
 */
export class IsolationViolationError extends Error {
  readonly code: IsolationViolationCode;

  constructor(code: IsolationViolationCode, message: string) {
    super(message);
    this.name = 'IsolationViolationError';
    this.code = code;
  }
}

export class ExchangeFormatError extends Error {
  readonly code: ExchangeFormatErrorCode;

  constructor(code: ExchangeFormatErrorCode, message: string) {
    super(message);
    this.name = 'ExchangeFormatError';
    this.code = code;
  }
}

/** Any fatal error an analysis run can report */
export type AnalysisError = ScanError | RuleSourceError | ExchangeFormatError;

/**
 * Narrow an unknown thrown value to a fatal analysis error.
 */
export function isAnalysisError(error: unknown): error is AnalysisError {
  return (
    error instanceof ScanError ||
    error instanceof RuleSourceError ||
    error instanceof ExchangeFormatError
  );
}

/**
 * Error taxonomy for the analysis pipeline.
 *
 * Per-file failures (parse, encoding, size, access) are thrown inside the
 * file parser and converted to messages on the FileAnalysis; they never
 * escape it. Only InvalidRootError aborts a project scan.
 */

export type AnalysisErrorCode =
  | 'PARSE_ERROR'
  | 'ENCODING_ERROR'
  | 'SIZE_LIMIT_EXCEEDED'
  | 'FILE_ACCESS_ERROR'
  | 'INVALID_ROOT'
  | 'ENTITY_VALIDATION'
  | 'INDEX_FORMAT';

export class AnalysisError extends Error {
  constructor(
    message: string,
    readonly code: AnalysisErrorCode
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ParseError extends AnalysisError {
  constructor(
    readonly line: number,
    detail: string
  ) {
    super(`Syntax error at line ${line}: ${detail}`, 'PARSE_ERROR');
  }
}

export class EncodingError extends AnalysisError {
  constructor(detail: string) {
    super(`Encoding error: ${detail}`, 'ENCODING_ERROR');
  }
}

export class SizeLimitExceededError extends AnalysisError {
  constructor(
    readonly size: number,
    readonly limit: number
  ) {
    super(`File exceeds maximum size (${size} bytes)`, 'SIZE_LIMIT_EXCEEDED');
  }
}

export class FileAccessError extends AnalysisError {
  constructor(detail: string) {
    super(`File access error: ${detail}`, 'FILE_ACCESS_ERROR');
  }
}

export class InvalidRootError extends AnalysisError {
  constructor(
    readonly rootPath: string,
    detail: string
  ) {
    super(`Invalid project root ${rootPath}: ${detail}`, 'INVALID_ROOT');
  }
}

export class EntityValidationError extends AnalysisError {
  constructor(detail: string) {
    super(detail, 'ENTITY_VALIDATION');
  }
}

/**
 * A saved analysis or index that does not match the expected record shape.
 */
export class IndexFormatError extends AnalysisError {
  constructor(source: string, detail: string) {
    super(`Invalid ${source}: ${detail}`, 'INDEX_FORMAT');
  }
}

/**
 * Message of any thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Type guard for Node.js errors with code property.
 */
export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

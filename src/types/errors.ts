/**
 * Structured Error System for Construct Atlas
 *
 * Provides machine-readable errors with codes, context, and suggestions.
 */

/**
 * Error codes for knowledge base operations
 */
export type AtlasErrorCode =
  | 'LOAD_FAILURE'     // No candidate path exists or file unreadable
  | 'PARSE_FAILURE'    // File exists but is not well-formed YAML
  | 'SCHEMA_INVALID'   // Parsed document has the wrong shape
  | 'NOT_FOUND';       // Key absent from the relevant collection

/**
 * Position inside the source document
 */
export interface SourcePosition {
  line: number;
  col: number;
}

/**
 * Structured error with code, message, and suggestions
 */
export interface AtlasError {
  code: AtlasErrorCode;
  message: string;
  position?: SourcePosition;
  suggestion?: string;
  context?: string;          // The offending path or key
  details?: Record<string, unknown>;
}

/**
 * Exception class wrapping AtlasError for throw/catch patterns
 */
export class AtlasException extends Error {
  public readonly error: AtlasError;

  constructor(error: AtlasError) {
    super(error.message);
    this.name = 'AtlasException';
    this.error = error;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, AtlasException);
    }
  }

  get code(): AtlasErrorCode {
    return this.error.code;
  }

  toJSON(): AtlasError {
    return this.error;
  }
}

function listTried(tried: readonly string[], rejected: ReadonlyMap<string, string> = new Map()): string {
  if (tried.length === 0) {
    return '  (none)';
  }
  return tried
    .map(p => {
      const why = rejected.get(p);
      return why === undefined ? `  - ${p}` : `  - ${p} (${why})`;
    })
    .join('\n');
}

/**
 * Create a load failure: nothing usable at any candidate path
 */
export function createLoadFailure(
  tried: readonly string[],
  reason?: string,
  path?: string,
  rejected: ReadonlyMap<string, string> = new Map()
): AtlasException {
  const head = reason ?? 'No knowledge base file found';
  return new AtlasException({
    code: 'LOAD_FAILURE',
    message: `${head}. Tried:\n${listTried(tried, rejected)}`,
    suggestion: 'Place constructs.yaml beside the application, in the working directory, or under data/',
    context: path,
    details: rejected.size > 0
      ? { tried: [...tried], rejected: Object.fromEntries(rejected) }
      : { tried: [...tried] },
  });
}

/**
 * Create a parse failure with optional line/column
 */
export function createParseFailure(
  path: string,
  tried: readonly string[],
  reason: string,
  position?: SourcePosition
): AtlasException {
  const where = position ? ` (line ${position.line}, col ${position.col})` : '';
  return new AtlasException({
    code: 'PARSE_FAILURE',
    message: `Could not parse ${path}${where}: ${reason}`,
    position,
    suggestion: 'Check indentation and quoting in the YAML document',
    context: path,
    details: { tried: [...tried] },
  });
}

/**
 * Create a schema error for a structurally wrong document
 */
export function createSchemaInvalid(
  path: string,
  tried: readonly string[],
  reason: string
): AtlasException {
  return new AtlasException({
    code: 'SCHEMA_INVALID',
    message: `Invalid knowledge base ${path}: ${reason}`,
    suggestion: 'The document must be a mapping with a "constructs" mapping at the top level',
    context: path,
    details: { tried: [...tried] },
  });
}

/**
 * Create a not-found error for a construct or model key
 */
export function createNotFound(
  collection: 'construct' | 'model',
  key: string
): AtlasException {
  return new AtlasException({
    code: 'NOT_FOUND',
    message: `Unknown ${collection} '${key}'`,
    context: key,
    details: { collection, key },
  });
}

/**
 * Serialize an AtlasError for JSON output
 */
export function serializeAtlasError(error: AtlasError): object {
  return {
    code: error.code,
    message: error.message,
    ...(error.position && { position: error.position }),
    ...(error.suggestion && { suggestion: error.suggestion }),
    ...(error.context && { context: error.context }),
    ...(error.details && { details: error.details }),
  };
}

export function isAtlasException(e: unknown): e is AtlasException {
  return e instanceof AtlasException;
}

/**
 * @fileoverview Error codes and the error class raised across the SDK.
 * @module src/types-global/errors
 */

/**
 * Error codes carried by {@link EntrezError}. Callers branch on these
 * rather than on message text.
 */
export enum BaseErrorCode {
  /** The request asked for a return mode the SDK does not parse. */
  UNSUPPORTED_RETMODE = "UNSUPPORTED_RETMODE",
  /** NCBI answered with a 4xx or 5xx status. */
  NCBI_HTTP_ERROR = "NCBI_HTTP_ERROR",
  /** NCBI answered 2xx but the body reports an error message. */
  NCBI_API_ERROR = "NCBI_API_ERROR",
  /** No HTTP response was received (DNS, refused connection, timeout). */
  NCBI_SERVICE_UNAVAILABLE = "NCBI_SERVICE_UNAVAILABLE",
  /** A request or response does not match its schema. */
  VALIDATION_ERROR = "VALIDATION_ERROR",
  INTERNAL_ERROR = "INTERNAL_ERROR",
}

export interface EntrezErrorOptions {
  cause?: unknown;
}

export class EntrezError extends Error {
  public readonly code: BaseErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(
    code: BaseErrorCode,
    message: string,
    details?: Record<string, unknown>,
    options?: EntrezErrorOptions,
  ) {
    super(message, options);
    this.code = code;
    this.details = details;
    this.name = "EntrezError";
    Object.setPrototypeOf(this, EntrezError.prototype);
  }
}

export function isEntrezError(error: unknown): error is EntrezError {
  return error instanceof EntrezError;
}

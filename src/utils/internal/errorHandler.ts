/**
 * @fileoverview Centralized error normalization and logging. Every failure
 * that leaves an E-utility call is turned into an {@link EntrezError}.
 * @module src/utils/internal/errorHandler
 */

import axios from "axios";
import { BaseErrorCode, EntrezError } from "../../types-global/errors.js";
import { sanitizeInputForLogging } from "../security/sanitization.js";
import { logger } from "./logger.js";
import type { RequestContext } from "./requestContext.js";

export interface ErrorHandlerOptions {
  /** Name of the operation that failed, used in the log line. */
  operation: string;
  context?: RequestContext;
  /** Input of the failed operation; logged after sanitization. */
  input?: unknown;
  /** Whether to throw the normalized error. Defaults to false. */
  rethrow?: boolean;
  /** Code used when a non-EntrezError is wrapped. */
  errorCode?: BaseErrorCode;
}

const toEntrezError = (
  error: unknown,
  operation: string,
  fallbackCode: BaseErrorCode,
): EntrezError => {
  if (error instanceof EntrezError) {
    return error;
  }
  if (axios.isAxiosError(error) && !error.response) {
    return new EntrezError(
      BaseErrorCode.NCBI_SERVICE_UNAVAILABLE,
      `NCBI request failed without a response: ${error.message}`,
      { operation, axiosCode: error.code },
      { cause: error },
    );
  }
  const message = error instanceof Error ? error.message : String(error);
  return new EntrezError(
    fallbackCode,
    `Error in ${operation}: ${message}`,
    { operation },
    { cause: error },
  );
};

export class ErrorHandler {
  /**
   * Logs `error` with the operation context and returns it as an
   * {@link EntrezError}, throwing instead when `rethrow` is set.
   */
  public static handleError(
    error: unknown,
    options: ErrorHandlerOptions & { rethrow: true },
  ): never;
  public static handleError(
    error: unknown,
    options: ErrorHandlerOptions,
  ): EntrezError;
  public static handleError(
    error: unknown,
    options: ErrorHandlerOptions,
  ): EntrezError {
    const {
      operation,
      context,
      input,
      rethrow = false,
      errorCode = BaseErrorCode.INTERNAL_ERROR,
    } = options;
    const handled = toEntrezError(error, operation, errorCode);

    logger.error(`Error in ${operation}: ${handled.message}`, handled, {
      ...context,
      operation,
      errorCode: handled.code,
      details: sanitizeInputForLogging(handled.details),
      ...(input !== undefined ? { input: sanitizeInputForLogging(input) } : {}),
    });

    if (rethrow) {
      throw handled;
    }
    return handled;
  }

  /**
   * Runs `fn` and rethrows any failure as a logged {@link EntrezError}.
   */
  public static async tryCatch<T>(
    fn: () => Promise<T>,
    options: Omit<ErrorHandlerOptions, "rethrow">,
  ): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      return ErrorHandler.handleError(error, { ...options, rethrow: true });
    }
  }
}

/**
 * @fileoverview Decodes E-utility JSON bodies and validates them against
 * the endpoint's response model, surfacing NCBI-reported errors for bodies
 * that fail validation.
 * @module src/services/NCBI/core/ncbiResponseHandler
 */

import { BaseErrorCode, EntrezError } from "../../../types-global/errors.js";
import {
  logger,
  type RequestContext,
  requestContextService,
} from "../../../utils/index.js";
import type { NcbiEndpoint } from "./ncbiConstants.js";
import type { NcbiRawResponse } from "./ncbiCoreApiClient.js";

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Collects error messages NCBI embeds in a 2xx JSON body: a top-level
 * `error` string, or an `ERROR` string inside a result object such as
 * `esearchresult`.
 */
export function extractNcbiErrorMessages(json: unknown): string[] {
  if (!isRecord(json)) {
    return [];
  }
  const messages: string[] = [];
  if (typeof json.error === "string") {
    messages.push(json.error);
  }
  for (const value of Object.values(json)) {
    if (isRecord(value) && typeof value.ERROR === "string") {
      messages.push(value.ERROR);
    }
  }
  return messages;
}

export class NcbiResponseHandler {
  /**
   * Parses `response.body` as JSON and hands it to `parseModel`. A body the
   * model accepts is returned as is, even when it carries an NCBI `ERROR`.
   * @throws {EntrezError} `VALIDATION_ERROR` when the body is not JSON or
   * `parseModel` rejects it; `NCBI_API_ERROR` instead when a rejected body
   * reports an NCBI error message.
   */
  public parseAndHandleResponse<T>(
    response: NcbiRawResponse,
    endpoint: NcbiEndpoint,
    parseModel: (json: unknown) => T,
    context: RequestContext,
  ): T {
    const operationContext = requestContextService.createRequestContext({
      ...context,
      operation: "NCBI_ParseResponse",
      endpoint,
    });

    let json: unknown;
    try {
      json = JSON.parse(response.body);
    } catch (error) {
      throw new EntrezError(
        BaseErrorCode.VALIDATION_ERROR,
        `NCBI ${endpoint} response is not valid JSON.`,
        { endpoint, responseSnippet: response.body.substring(0, 200) },
        { cause: error },
      );
    }

    let parsed: T;
    try {
      parsed = parseModel(json);
    } catch (validationError) {
      const ncbiErrors = extractNcbiErrorMessages(json);
      if (ncbiErrors.length === 0) {
        throw validationError;
      }
      const error = new EntrezError(
        BaseErrorCode.NCBI_API_ERROR,
        `NCBI API Error: ${ncbiErrors.join("; ")}`,
        { endpoint, ncbiErrors },
        { cause: validationError },
      );
      logger.error("NCBI API returned an error in JSON response", error, {
        ...operationContext,
        errors: ncbiErrors,
      });
      throw error;
    }

    logger.debug("Successfully validated JSON response.", operationContext);
    return parsed;
  }
}

/**
 * @fileoverview Issues the single HTTP GET behind each E-utility call and
 * checks its status. Connection reuse and headers belong to the axios
 * instance the caller supplies.
 * @module src/services/NCBI/core/ncbiCoreApiClient
 */

import { trace } from "@opentelemetry/api";
import type { AxiosInstance } from "axios";
import { BaseErrorCode, EntrezError } from "../../../types-global/errors.js";
import {
  ErrorHandler,
  logger,
  type RequestContext,
  requestContextService,
  sanitizeInputForLogging,
} from "../../../utils/index.js";
import {
  ATTR_HTTP_RESPONSE_STATUS_CODE,
  ATTR_URL_FULL,
} from "../../../utils/telemetry/semconv.js";
import {
  type NcbiEndpoint,
  type NcbiQueryParams,
  ncbiEndpointUrl,
} from "./ncbiConstants.js";

/** Status and undecoded body of a successful E-utility response. */
export interface NcbiRawResponse {
  url: string;
  status: number;
  body: string;
}

const isSuccessStatus = (status: number): boolean =>
  status >= 200 && status < 300;

export class NcbiCoreApiClient {
  constructor(private readonly client: AxiosInstance) {}

  /**
   * GETs `{base}/{endpoint}.fcgi` with `params` as the query string.
   * @throws {EntrezError} `NCBI_HTTP_ERROR` with `details.status` and
   * `details.body` on a non-2xx status; `NCBI_SERVICE_UNAVAILABLE` when no
   * response was received.
   */
  public async makeRequest(
    endpoint: NcbiEndpoint,
    params: NcbiQueryParams,
    context: RequestContext,
  ): Promise<NcbiRawResponse> {
    const url = ncbiEndpointUrl(endpoint);
    const requestContext = requestContextService.createRequestContext({
      ...context,
      operation: "NCBI_HttpRequest",
      endpoint,
      requestParams: sanitizeInputForLogging(params),
    });

    logger.debug(`Making NCBI HTTP request: GET ${url}`, requestContext);

    const response = await this.client
      .get<unknown>(url, {
        params,
        responseType: "text",
        validateStatus: () => true,
      })
      .catch((error: unknown) =>
        ErrorHandler.handleError(error, {
          operation: "NCBI_HttpRequest",
          context: requestContext,
          rethrow: true,
        }),
      );

    const body =
      typeof response.data === "string"
        ? response.data
        : JSON.stringify(response.data ?? "");

    trace.getActiveSpan()?.setAttributes({
      [ATTR_URL_FULL]: url,
      [ATTR_HTTP_RESPONSE_STATUS_CODE]: response.status,
    });

    if (!isSuccessStatus(response.status)) {
      const error = new EntrezError(
        BaseErrorCode.NCBI_HTTP_ERROR,
        `NCBI ${endpoint} request failed with HTTP ${response.status}`,
        {
          endpoint,
          status: response.status,
          statusText: response.statusText,
          body,
        },
      );
      logger.error(error.message, error, {
        ...requestContext,
        status: response.status,
        responseSnippet: body.substring(0, 500),
      });
      throw error;
    }

    return { url, status: response.status, body };
  }
}

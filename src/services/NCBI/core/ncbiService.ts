/**
 * @fileoverview EInfo and ESearch endpoint functions. Each call checks the
 * requested return mode, serializes the set parameters, performs one GET
 * through the caller's axios instance, and returns the validated response
 * model unchanged.
 * @module src/services/NCBI/core/ncbiService
 */

import type { AxiosInstance } from "axios";
import { BaseErrorCode, EntrezError } from "../../../types-global/errors.js";
import {
  logger,
  measureEutilityRequest,
  type RequestContext,
  requestContextService,
} from "../../../utils/index.js";
import {
  createEInfoRequest,
  type EInfoRequest,
  type EInfoResponse,
  parseEInfoResponse,
} from "../models/eInfo.js";
import {
  type ESearchRequest,
  type ESearchResponse,
  parseESearchResponse,
} from "../models/eSearch.js";
import { toQueryParams } from "../models/modelValidation.js";
import { type RetMode, SUPPORTED_RETMODE } from "../models/retMode.js";
import type { NcbiEndpoint } from "./ncbiConstants.js";
import { NcbiCoreApiClient } from "./ncbiCoreApiClient.js";
import { NcbiResponseHandler } from "./ncbiResponseHandler.js";

type EutilityRequest = Readonly<
  { retmode?: RetMode } & Record<string, string | number | undefined>
>;

const responseHandler = new NcbiResponseHandler();

/**
 * Rejects any return mode other than JSON, naming the endpoint.
 * @throws {EntrezError} `UNSUPPORTED_RETMODE`
 */
export function assertSupportedRetMode(
  endpoint: NcbiEndpoint,
  retmode: RetMode | undefined,
): void {
  if (retmode !== undefined && retmode !== SUPPORTED_RETMODE) {
    throw new EntrezError(
      BaseErrorCode.UNSUPPORTED_RETMODE,
      `Only the "${SUPPORTED_RETMODE}" return mode is supported for ${endpoint}; received "${retmode}".`,
      { endpoint, retmode },
    );
  }
}

async function performEutilityRequest<T>(
  client: AxiosInstance,
  endpoint: NcbiEndpoint,
  request: EutilityRequest,
  parseModel: (json: unknown) => T,
  parentContext?: RequestContext,
): Promise<T> {
  const context = requestContextService.createRequestContext({
    parentRequestId: parentContext?.requestId,
    operation: `eutils.${endpoint}`,
    endpoint,
  });

  try {
    assertSupportedRetMode(endpoint, request.retmode);
  } catch (error) {
    logger.warning("Rejected E-utility request before sending.", {
      ...context,
      retmode: request.retmode,
    });
    throw error;
  }

  // The wire request always asks for JSON: it is the only mode parsed here.
  const params = { ...toQueryParams(request), retmode: SUPPORTED_RETMODE };

  return measureEutilityRequest(async () => {
    const rawResponse = await new NcbiCoreApiClient(client).makeRequest(
      endpoint,
      params,
      context,
    );
    return responseHandler.parseAndHandleResponse(
      rawResponse,
      endpoint,
      parseModel,
      context,
    );
  }, { ...context, endpoint });
}

/**
 * Queries EInfo for information about Entrez databases: the number of
 * records indexed in each field, the date of the last update, and the
 * links to other Entrez databases. With no `db`, lists all databases.
 *
 * @example
 * // List all databases
 * const all = await eInfo(client, createEInfoRequest());
 * // Describe PubMed, including field flags added in version 2.0
 * const pubmed = await eInfo(client, createEInfoRequest({ db: "pubmed", version: "2.0" }));
 */
export async function eInfo(
  client: AxiosInstance,
  request: EInfoRequest = createEInfoRequest(),
  parentContext?: RequestContext,
): Promise<EInfoResponse> {
  return performEutilityRequest(
    client,
    "einfo",
    request,
    parseEInfoResponse,
    parentContext,
  );
}

/**
 * Queries ESearch for the UIDs matching a text query, optionally storing
 * the result set on the Entrez History server (`usehistory: "y"`).
 *
 * For PubMed only the first 10,000 matching records can be retrieved;
 * other databases can page further with `retstart`.
 *
 * @example
 * await eSearch(client, createESearchRequest({ term: "asthma" }));
 * await eSearch(client, createESearchRequest({
 *   term: "asthma",
 *   mindate: "2020/01/01",
 *   maxdate: "2020/12/31",
 *   datetype: "pdat",
 * }));
 * await eSearch(client, createESearchRequest({ term: "asthma[title]", usehistory: "y", retmax: 100 }));
 */
export async function eSearch(
  client: AxiosInstance,
  request: ESearchRequest,
  parentContext?: RequestContext,
): Promise<ESearchResponse> {
  return performEutilityRequest(
    client,
    "esearch",
    request,
    parseESearchResponse,
    parentContext,
  );
}

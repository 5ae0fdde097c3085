/**
 * @fileoverview Public entry point: endpoint functions, request and
 * response models, the client scope, and the error types.
 * @module src/index
 */

export {
  assertSupportedRetMode,
  buildIdentificationHeaders,
  createEInfoRequest,
  createESearchRequest,
  eInfo,
  eSearch,
  isEInfoDbList,
  NCBI_ENDPOINT_PATHS,
  NCBI_EUTILS_BASE_URL,
  NCBI_IDENTIFICATION_HEADERS,
  ncbiEndpointUrl,
  parseEInfoResponse,
  parseESearchResponse,
  RetMode,
  safeCreateEInfoRequest,
  safeCreateESearchRequest,
  safeParseEInfoResponse,
  safeParseESearchResponse,
  summarizeESearchResult,
  toQueryParams,
  withNcbiClient,
} from "./services/NCBI/index.js";
export type {
  EInfoDbInfo,
  EInfoField,
  EInfoLink,
  EInfoRequest,
  EInfoRequestInput,
  EInfoResponse,
  ESearchRequest,
  ESearchRequestInput,
  ESearchResponse,
  ESearchResult,
  ESearchSummary,
  ESearchTranslation,
  ModelResult,
  NcbiClientOptions,
  NcbiEndpoint,
  NcbiQueryParams,
} from "./services/NCBI/index.js";
export {
  BaseErrorCode,
  EntrezError,
  isEntrezError,
} from "./types-global/errors.js";
export { ErrorHandler, logger } from "./utils/index.js";
export type { ErrorHandlerOptions, RequestContext } from "./utils/index.js";

/**
 * @fileoverview Constants and shared type definitions for NCBI E-utility interactions.
 * @module src/services/NCBI/core/ncbiConstants
 */

export const NCBI_EUTILS_BASE_URL =
  "https://eutils.ncbi.nlm.nih.gov/entrez/eutils";

/** Path suffix of each supported E-utility, relative to the base URL. */
export const NCBI_ENDPOINT_PATHS = Object.freeze({
  einfo: "einfo.fcgi",
  esearch: "esearch.fcgi",
} as const);

export type NcbiEndpoint = keyof typeof NCBI_ENDPOINT_PATHS;

/** Outgoing query parameters: only fields that were set, as strings. */
export type NcbiQueryParams = Record<string, string>;

export function ncbiEndpointUrl(endpoint: NcbiEndpoint): string {
  return `${NCBI_EUTILS_BASE_URL}/${NCBI_ENDPOINT_PATHS[endpoint]}`;
}

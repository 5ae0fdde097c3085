/**
 * @fileoverview Scoped construction of the axios instance used for NCBI
 * E-utility calls. The instance carries the `tool` and `email`
 * identification headers NCBI's usage policy asks for, and its sockets are
 * released when the scope settles.
 * @module src/services/NCBI/core/ncbiClientScope
 */

import axios, { type AxiosInstance, type CreateAxiosDefaults } from "axios";
import http from "http";
import https from "https";
import { config } from "../../../config/index.js";
import { logger, requestContextService } from "../../../utils/index.js";

export interface NcbiClientOptions {
  /** Overrides the configured `tool` header. */
  tool?: string;
  /** Overrides the configured `email` header. */
  email?: string;
  /** Overrides the configured API key, sent as the `api_key` query parameter. */
  apiKey?: string;
  /** Request timeout in milliseconds. No timeout is set when omitted. */
  timeout?: number;
  /** Extra axios defaults, e.g. a proxy or a custom adapter. */
  axiosConfig?: Omit<
    CreateAxiosDefaults,
    | "headers"
    | "httpAgent"
    | "httpsAgent"
    | "timeout"
    | "responseType"
    | "validateStatus"
  >;
}

/** Identification headers derived from configuration at startup. */
export const NCBI_IDENTIFICATION_HEADERS: Readonly<Record<string, string>> =
  Object.freeze({
    tool: config.ncbiToolIdentifier,
    ...(config.ncbiAdminEmail ? { email: config.ncbiAdminEmail } : {}),
  });

export function buildIdentificationHeaders(
  options: Pick<NcbiClientOptions, "tool" | "email"> = {},
): Record<string, string> {
  const headers: Record<string, string> = { ...NCBI_IDENTIFICATION_HEADERS };
  if (options.tool) {
    headers.tool = options.tool;
  }
  if (options.email) {
    headers.email = options.email;
  }
  return headers;
}

/**
 * Opens a client scope: builds an axios instance with keep-alive agents and
 * the identification headers, passes it to `fn`, and destroys the agents
 * once `fn` resolves or rejects. The client must not be used after the
 * returned promise settles.
 *
 * @example
 * const info = await withNcbiClient((client) =>
 *   eInfo(client, createEInfoRequest({ db: "pubmed", version: "2.0" })),
 * );
 */
export async function withNcbiClient<T>(
  fn: (client: AxiosInstance) => Promise<T>,
  options: NcbiClientOptions = {},
): Promise<T> {
  const context = requestContextService.createRequestContext({
    operation: "withNcbiClient",
  });
  const headers = buildIdentificationHeaders(options);
  if (!headers.email) {
    logger.warning(
      "No NCBI contact email configured; set NCBI_ADMIN_EMAIL so NCBI can reach you about your usage.",
      context,
    );
  }

  const httpAgent = new http.Agent({ keepAlive: true });
  const httpsAgent = new https.Agent({ keepAlive: true });
  const client = axios.create({
    ...options.axiosConfig,
    headers,
    httpAgent,
    httpsAgent,
    ...(options.timeout !== undefined ? { timeout: options.timeout } : {}),
  });

  const apiKey = options.apiKey ?? config.ncbiApiKey;
  if (apiKey) {
    client.interceptors.request.use((requestConfig) => {
      requestConfig.params = { ...requestConfig.params, api_key: apiKey };
      return requestConfig;
    });
  }

  logger.debug("NCBI client scope opened.", {
    ...context,
    tool: headers.tool,
    apiKeyConfigured: Boolean(apiKey),
  });

  try {
    return await fn(client);
  } finally {
    httpAgent.destroy();
    httpsAgent.destroy();
    logger.debug("NCBI client scope closed.", context);
  }
}

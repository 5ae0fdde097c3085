/**
 * @fileoverview Local OpenTelemetry semantic convention constants, kept here
 * so the SDK only depends on `@opentelemetry/api`.
 * @module src/utils/telemetry/semconv
 */

/**
 * The method or function name, or equivalent (usually rightmost part of the code unit's name).
 */
export const ATTR_CODE_FUNCTION = "code.function";

/**
 * The "namespace" within which `code.function` is defined.
 */
export const ATTR_CODE_NAMESPACE = "code.namespace";

/** Full URL requested, without the query string. */
export const ATTR_URL_FULL = "url.full";

/** HTTP response status code. */
export const ATTR_HTTP_RESPONSE_STATUS_CODE = "http.response.status_code";

/** E-utility endpoint name, e.g. `esearch`. */
export const ATTR_EUTILS_ENDPOINT = "eutils.endpoint";

export const ATTR_EUTILS_DURATION_MS = "eutils.duration_ms";
export const ATTR_EUTILS_SUCCESS = "eutils.success";
export const ATTR_EUTILS_ERROR_CODE = "eutils.error_code";

/**
 * @fileoverview Span and timing wrapper for E-utility calls. The span is a
 * no-op unless the host application registers an OpenTelemetry SDK.
 * @module src/utils/internal/performance
 */

import { SpanStatusCode, trace } from "@opentelemetry/api";
import { config } from "../../config/index.js";
import { EntrezError } from "../../types-global/errors.js";
import {
  ATTR_CODE_FUNCTION,
  ATTR_CODE_NAMESPACE,
  ATTR_EUTILS_DURATION_MS,
  ATTR_EUTILS_ENDPOINT,
  ATTR_EUTILS_ERROR_CODE,
  ATTR_EUTILS_SUCCESS,
} from "../telemetry/semconv.js";
import { logger } from "./logger.js";
import type { RequestContext } from "./requestContext.js";

/**
 * Runs `fn` inside an `eutils:{endpoint}` span, recording duration, outcome
 * and error code, and logs one completion line. Errors are rethrown as-is.
 *
 * @template T The result type of `fn`.
 */
export async function measureEutilityRequest<T>(
  fn: () => Promise<T>,
  context: RequestContext & { endpoint: string },
): Promise<T> {
  const tracer = trace.getTracer(
    config.openTelemetry.serviceName,
    config.openTelemetry.serviceVersion,
  );
  const { endpoint } = context;

  return tracer.startActiveSpan(`eutils:${endpoint}`, async (span) => {
    span.setAttributes({
      [ATTR_CODE_FUNCTION]: endpoint,
      [ATTR_CODE_NAMESPACE]: "eutils",
      [ATTR_EUTILS_ENDPOINT]: endpoint,
    });

    const startTime = process.hrtime.bigint();
    let isSuccess = false;
    let errorCode: string | undefined;

    try {
      const result = await fn();
      isSuccess = true;
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      if (error instanceof EntrezError) {
        errorCode = error.code;
      } else if (error instanceof Error) {
        errorCode = "UNHANDLED_ERROR";
      } else {
        errorCode = "UNKNOWN_ERROR";
      }

      if (error instanceof Error) {
        span.recordException(error);
      }
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: error instanceof Error ? error.message : String(error),
      });
      throw error;
    } finally {
      const durationMs = parseFloat(
        (Number(process.hrtime.bigint() - startTime) / 1_000_000).toFixed(2),
      );

      span.setAttributes({
        [ATTR_EUTILS_DURATION_MS]: durationMs,
        [ATTR_EUTILS_SUCCESS]: isSuccess,
      });
      if (errorCode) {
        span.setAttribute(ATTR_EUTILS_ERROR_CODE, errorCode);
      }
      span.end();

      logger.info("E-utility request finished.", {
        ...context,
        metrics: { durationMs, isSuccess, errorCode },
      });
    }
  });
}

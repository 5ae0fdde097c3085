/**
 * @fileoverview Creation of request contexts used to correlate log lines
 * and spans belonging to one E-utility call.
 * @module src/utils/internal/requestContext
 */

import { randomUUID } from "node:crypto";

export interface RequestContext {
  requestId: string;
  timestamp: string;
  [key: string]: unknown;
}

const createRequestContext = (
  additionalContext: Record<string, unknown> = {},
): RequestContext => {
  const requestId =
    typeof additionalContext.requestId === "string"
      ? additionalContext.requestId
      : randomUUID();
  return {
    ...additionalContext,
    requestId,
    timestamp: new Date().toISOString(),
  };
};

export const requestContextService = {
  createRequestContext,
};

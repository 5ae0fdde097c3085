/**
 * @fileoverview Shared validation and serialization helpers for the
 * E-utility request and response models.
 * @module src/services/NCBI/models/modelValidation
 */

import { z } from "zod";
import { BaseErrorCode, EntrezError } from "../../../types-global/errors.js";
import type { NcbiQueryParams } from "../core/ncbiConstants.js";

/** Outcome of a non-throwing model construction or parse. */
export type ModelResult<T> =
  | { success: true; data: T }
  | { success: false; error: EntrezError };

/** Renders Zod issues as `path: message` pairs joined by `; `. */
export function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const issuePath = issue.path.length ? issue.path.join(".") : "(root)";
      return `${issuePath}: ${issue.message}`;
    })
    .join("; ");
}

/** Freezes `value` and every object or array reachable from it. */
export function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

export function safeValidateModel<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  modelName: string,
): ModelResult<Readonly<z.output<S>>> {
  const parsed = schema.safeParse(input);
  if (parsed.success) {
    return { success: true, data: deepFreeze(parsed.data) };
  }
  return {
    success: false,
    error: new EntrezError(
      BaseErrorCode.VALIDATION_ERROR,
      `Invalid ${modelName}: ${formatZodIssues(parsed.error)}`,
      {
        model: modelName,
        issues: parsed.error.issues.map((issue) => ({
          path: issue.path.join("."),
          code: issue.code,
          message: issue.message,
        })),
      },
      { cause: parsed.error },
    ),
  };
}

/**
 * Validates `input` against `schema` and returns a deeply frozen copy.
 * @throws {EntrezError} `VALIDATION_ERROR` listing every failing path.
 */
export function validateModel<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  modelName: string,
): Readonly<z.output<S>> {
  const result = safeValidateModel(schema, input, modelName);
  if (!result.success) {
    throw result.error;
  }
  return result.data;
}

/**
 * Serializes a request model into outgoing query parameters. Fields left
 * `undefined` are omitted entirely; numbers are stringified.
 */
export function toQueryParams(
  request: Readonly<Record<string, string | number | undefined>>,
): NcbiQueryParams {
  const params: NcbiQueryParams = {};
  for (const [key, value] of Object.entries(request)) {
    if (value !== undefined) {
      params[key] = String(value);
    }
  }
  return params;
}

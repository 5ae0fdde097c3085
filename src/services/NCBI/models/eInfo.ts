/**
 * @fileoverview Request and response models for the EInfo E-utility.
 * EInfo lists the Entrez databases or, given `db`, describes one of them:
 * the number of records indexed in each field, the date of its last
 * update, and its links to other Entrez databases.
 * @module src/services/NCBI/models/eInfo
 */

import { z } from "zod";
import {
  type ModelResult,
  safeValidateModel,
  validateModel,
} from "./modelValidation.js";
import { RetModeSchema } from "./retMode.js";

export const EInfoRequestSchema = z
  .object({
    /** Database to describe. Omit to list every database. */
    db: z
      .string()
      .regex(/^[a-z0-9_]+$/, "Database names are lowercase identifiers")
      .optional(),
    /** `2.0` adds the `istruncatable` and `israngeable` field flags. */
    version: z.literal("2.0").optional(),
    retmode: RetModeSchema.optional(),
  })
  .strict();

export type EInfoRequestInput = z.input<typeof EInfoRequestSchema>;
export type EInfoRequest = Readonly<z.output<typeof EInfoRequestSchema>>;

export const EntrezHeaderSchema = z
  .object({
    type: z.string(),
    version: z.string(),
  })
  .passthrough();

const YesNoSchema = z.enum(["Y", "N"]);

export const EInfoFieldSchema = z
  .object({
    name: z.string(),
    fullname: z.string(),
    description: z.string().optional(),
    termcount: z.string().optional(),
    isdate: YesNoSchema.optional(),
    isnumerical: YesNoSchema.optional(),
    singletoken: YesNoSchema.optional(),
    hierarchy: YesNoSchema.optional(),
    ishidden: YesNoSchema.optional(),
    istruncatable: YesNoSchema.optional(),
    israngeable: YesNoSchema.optional(),
  })
  .passthrough();

export const EInfoLinkSchema = z
  .object({
    name: z.string(),
    menu: z.string(),
    description: z.string().optional(),
    dbto: z.string(),
  })
  .passthrough();

export const EInfoDbInfoSchema = z
  .object({
    dbname: z.string(),
    menuname: z.string().optional(),
    description: z.string().optional(),
    dbbuild: z.string().optional(),
    count: z.string().optional(),
    lastupdate: z.string(),
    fieldlist: z.array(EInfoFieldSchema),
    linklist: z.array(EInfoLinkSchema),
  })
  .passthrough();

export const EInfoDbListResultSchema = z
  .object({ dblist: z.array(z.string()) })
  .passthrough();

export const EInfoDbInfoResultSchema = z
  .object({ dbinfo: z.array(EInfoDbInfoSchema).min(1) })
  .passthrough();

export const EInfoResponseSchema = z
  .object({
    header: EntrezHeaderSchema.optional(),
    einforesult: z.union([EInfoDbListResultSchema, EInfoDbInfoResultSchema]),
  })
  .passthrough();

export type EInfoField = z.infer<typeof EInfoFieldSchema>;
export type EInfoLink = z.infer<typeof EInfoLinkSchema>;
export type EInfoDbInfo = z.infer<typeof EInfoDbInfoSchema>;
export type EInfoResponse = Readonly<z.infer<typeof EInfoResponseSchema>>;

/**
 * Builds an {@link EInfoRequest}. An empty input lists all databases.
 * @throws {EntrezError} `VALIDATION_ERROR` on an unknown key or invalid value.
 */
export function createEInfoRequest(input: EInfoRequestInput = {}): EInfoRequest {
  return validateModel(EInfoRequestSchema, input, "EInfoRequest");
}

export function safeCreateEInfoRequest(
  input: unknown = {},
): ModelResult<EInfoRequest> {
  return safeValidateModel(EInfoRequestSchema, input, "EInfoRequest");
}

/**
 * Validates a parsed EInfo JSON body.
 * @throws {EntrezError} `VALIDATION_ERROR` when the body does not match.
 */
export function parseEInfoResponse(json: unknown): EInfoResponse {
  return validateModel(EInfoResponseSchema, json, "EInfoResponse");
}

export function safeParseEInfoResponse(
  json: unknown,
): ModelResult<EInfoResponse> {
  return safeValidateModel(EInfoResponseSchema, json, "EInfoResponse");
}

/** Narrows an EInfo result to the database-list variant. */
export function isEInfoDbList(
  result: EInfoResponse["einforesult"],
): result is z.infer<typeof EInfoDbListResultSchema> {
  return "dblist" in result && Array.isArray(result.dblist);
}

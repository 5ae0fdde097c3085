/**
 * @fileoverview Request and response models for the ESearch E-utility.
 * @module src/services/NCBI/models/eSearch
 */

import { z } from "zod";
import { EntrezHeaderSchema } from "./eInfo.js";
import {
  type ModelResult,
  safeValidateModel,
  validateModel,
} from "./modelValidation.js";
import { RetModeSchema } from "./retMode.js";

const EntrezDateSchema = z
  .string()
  .regex(
    /^\d{4}(\/\d{2}(\/\d{2})?)?$/,
    "Date must be YYYY, YYYY/MM, or YYYY/MM/DD",
  );

export const ESearchRequestSchema = z
  .object({
    /** Entrez query, e.g. `asthma[title]`. */
    term: z
      .string()
      .refine((term) => term.trim().length > 0, "Search term must not be empty"),
    /** Database to search. NCBI defaults to `pubmed` when omitted. */
    db: z
      .string()
      .regex(/^[a-z0-9_]+$/, "Database names are lowercase identifiers")
      .optional(),
    /** History server environment to search within or append to. */
    WebEnv: z.string().min(1).optional(),
    query_key: z.number().int().positive().optional(),
    /** `y` stores the result set on the History server. */
    usehistory: z.enum(["y", "n"]).optional(),
    retstart: z.number().int().nonnegative().optional(),
    retmax: z.number().int().nonnegative().max(10_000).optional(),
    /** `count` asks for the hit count alone, without `idlist`. */
    rettype: z.enum(["uilist", "count"]).optional(),
    retmode: RetModeSchema.optional(),
    sort: z.string().min(1).optional(),
    /** Restricts the whole query to one search field. */
    field: z.string().min(1).optional(),
    idtype: z.literal("acc").optional(),
    datetype: z.enum(["mdat", "pdat", "edat"]).optional(),
    /** Limits results to the last `reldate` days of `datetype`. */
    reldate: z.number().int().positive().optional(),
    mindate: EntrezDateSchema.optional(),
    maxdate: EntrezDateSchema.optional(),
  })
  .strict()
  .superRefine((request, ctx) => {
    if ((request.mindate === undefined) !== (request.maxdate === undefined)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [request.mindate === undefined ? "mindate" : "maxdate"],
        message: "mindate and maxdate must be provided together",
      });
    }
    if (request.query_key !== undefined && request.WebEnv === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["WebEnv"],
        message: "query_key requires WebEnv",
      });
    }
  });

export type ESearchRequestInput = z.input<typeof ESearchRequestSchema>;
export type ESearchRequest = Readonly<z.output<typeof ESearchRequestSchema>>;

const CountStringSchema = z.string().regex(/^\d+$/, "Expected a numeric string");

export const ESearchTranslationSchema = z
  .object({
    from: z.string(),
    to: z.string(),
  })
  .passthrough();

export const ESearchErrorListSchema = z
  .object({
    phrasesnotfound: z.array(z.string()).optional(),
    fieldsnotfound: z.array(z.string()).optional(),
  })
  .passthrough();

export const ESearchWarningListSchema = z
  .object({
    phrasesignored: z.array(z.string()).optional(),
    quotedphrasesnotfound: z.array(z.string()).optional(),
    outputmessages: z.array(z.string()).optional(),
  })
  .passthrough();

const PAGED_RESULT_KEYS = ["retmax", "retstart", "idlist"] as const;

/**
 * `retmax`, `retstart` and `idlist` come together, or are all absent in a
 * `rettype=count` result that carries only `count`.
 */
export const ESearchResultSchema = z
  .object({
    count: CountStringSchema,
    retmax: CountStringSchema.optional(),
    retstart: CountStringSchema.optional(),
    querykey: z.string().optional(),
    webenv: z.string().optional(),
    idlist: z.array(z.string()).optional(),
    translationset: z.array(ESearchTranslationSchema).optional(),
    /** Mix of term objects and operator strings such as `AND`. */
    translationstack: z.array(z.unknown()).optional(),
    querytranslation: z.string().optional(),
    errorlist: ESearchErrorListSchema.optional(),
    warninglist: ESearchWarningListSchema.optional(),
  })
  .passthrough()
  .superRefine((result, ctx) => {
    const missing = PAGED_RESULT_KEYS.filter((key) => result[key] === undefined);
    if (missing.length === PAGED_RESULT_KEYS.length) {
      return;
    }
    for (const key of missing) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [key],
        message: "Required",
      });
    }
  });

export const ESearchResponseSchema = z
  .object({
    header: EntrezHeaderSchema.optional(),
    esearchresult: ESearchResultSchema,
  })
  .passthrough();

export type ESearchTranslation = z.infer<typeof ESearchTranslationSchema>;
export type ESearchResult = z.infer<typeof ESearchResultSchema>;
export type ESearchResponse = Readonly<z.infer<typeof ESearchResponseSchema>>;

/**
 * Builds an {@link ESearchRequest}.
 * @throws {EntrezError} `VALIDATION_ERROR` on an unknown key, an invalid
 * value, or a half-open date range.
 */
export function createESearchRequest(input: ESearchRequestInput): ESearchRequest {
  return validateModel(ESearchRequestSchema, input, "ESearchRequest");
}

export function safeCreateESearchRequest(
  input: unknown,
): ModelResult<ESearchRequest> {
  return safeValidateModel(ESearchRequestSchema, input, "ESearchRequest");
}

/**
 * Validates a parsed ESearch JSON body.
 * @throws {EntrezError} `VALIDATION_ERROR` when the body does not match.
 */
export function parseESearchResponse(json: unknown): ESearchResponse {
  return validateModel(ESearchResponseSchema, json, "ESearchResponse");
}

export function safeParseESearchResponse(
  json: unknown,
): ModelResult<ESearchResponse> {
  return safeValidateModel(ESearchResponseSchema, json, "ESearchResponse");
}

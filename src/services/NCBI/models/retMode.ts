/**
 * @fileoverview Return modes understood by the E-utilities.
 * @module src/services/NCBI/models/retMode
 */

import { z } from "zod";

/**
 * Response encodings the E-utilities can produce. The endpoint functions
 * only parse {@link RetMode.JSON}.
 */
export enum RetMode {
  JSON = "json",
  XML = "xml",
  TEXT = "text",
}

export const RetModeSchema = z.nativeEnum(RetMode);

export const SUPPORTED_RETMODE = RetMode.JSON;

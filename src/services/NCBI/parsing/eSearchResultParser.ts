/**
 * @fileoverview Flattens an ESearch response into numeric counts and plain
 * error/warning messages. Never applied by `eSearch` itself.
 * @module src/services/NCBI/parsing/eSearchResultParser
 */

import type {
  ESearchResponse,
  ESearchTranslation,
} from "../models/eSearch.js";

export interface ESearchSummary {
  count: number;
  retmax: number;
  retstart: number;
  idList: string[];
  queryKey?: string;
  webEnv?: string;
  queryTranslation?: string;
  translations: ESearchTranslation[];
  errors: string[];
  warnings: string[];
}

const prefixAll = (prefix: string, items?: string[]): string[] =>
  (items ?? []).map((item) => `${prefix}${item}`);

/**
 * Summarizes an {@link ESearchResponse}. Counts are parsed as base-10
 * integers; `errorlist` and `warninglist` entries become prefixed messages
 * such as `Phrase not found: foo`. A count-only result summarizes with
 * `retmax` and `retstart` of 0 and an empty `idList`.
 */
export function summarizeESearchResult(
  response: ESearchResponse,
): ESearchSummary {
  const result = response.esearchresult;
  const { errorlist, warninglist } = result;

  return {
    count: parseInt(result.count, 10),
    retmax: parseInt(result.retmax ?? "0", 10),
    retstart: parseInt(result.retstart ?? "0", 10),
    idList: [...(result.idlist ?? [])],
    queryKey: result.querykey,
    webEnv: result.webenv,
    queryTranslation: result.querytranslation,
    translations: [...(result.translationset ?? [])],
    errors: [
      ...prefixAll("Phrase not found: ", errorlist?.phrasesnotfound),
      ...prefixAll("Field not found: ", errorlist?.fieldsnotfound),
    ],
    warnings: [
      ...prefixAll("Phrase ignored: ", warninglist?.phrasesignored),
      ...prefixAll(
        "Quoted phrase not found: ",
        warninglist?.quotedphrasesnotfound,
      ),
      ...(warninglist?.outputmessages ?? []),
    ],
  };
}

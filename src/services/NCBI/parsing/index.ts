/**
 * @fileoverview Barrel file for helpers that post-process validated
 * E-utility responses.
 * @module src/services/NCBI/parsing/index
 */

export * from "./eSearchResultParser.js";

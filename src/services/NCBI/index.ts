/**
 * @fileoverview Barrel file for the NCBI E-utilities service.
 * @module src/services/NCBI/index
 */

export * from "./core/ncbiClientScope.js";
export * from "./core/ncbiConstants.js";
export * from "./core/ncbiService.js";
export * from "./models/index.js";
export * from "./parsing/index.js";

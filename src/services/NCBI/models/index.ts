/**
 * @fileoverview Barrel file for the E-utility request and response models.
 * @module src/services/NCBI/models/index
 */

export * from "./eInfo.js";
export * from "./eSearch.js";
export * from "./modelValidation.js";
export * from "./retMode.js";

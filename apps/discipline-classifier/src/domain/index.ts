/**
 * @fileoverview Domain barrel exports
 *
 * Entities, ports, taxonomy, text analysis and the pipeline stages of the
 * discipline classifier.
 *
 * @module domain
 */

export * from "./entities/index.js";
export * from "./taxonomy/index.js";
export * from "./text/index.js";
export * from "./stages/index.js";
export * from "./DisciplinePipeline.js";
export type * from "./ports/index.js";

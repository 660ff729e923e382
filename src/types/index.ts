/**
 * Shared type foundations for the compliance pipeline.
 */

export * from "./series.js";
export * from "./warnings.js";

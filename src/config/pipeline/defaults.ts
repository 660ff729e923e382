/**
 * Default pipeline configuration.
 *
 * Strict on data defects (duplicate timestamps are fatal), permissive on
 * policy gating (no safe mode, no human QA gate).
 */

import type { PipelineConfig } from "./schema.js";

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  safeMode: false,
  humanQaRequiredForPass: false,
  failOnParserWarnings: false,
  duplicatePolicy: "error",
  gapPolicy: "warn",
  dateOrder: "month-first",
  defaultTimezone: "UTC",
  minDistinctPoints: 5,
  maxPoints: 1_000_000,
  maxInputBytes: 50 * 1024 * 1024,
  resampleStepS: null,
  shadowRelativeTolerance: 0.05,
  verifyNumericTolerance: 1e-9,
};

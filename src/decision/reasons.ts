/**
 * Decision reason codes.
 *
 * A closed set: every reason a decision can carry is listed here, so
 * consumers can switch on them and the verifier can compare them as sets.
 */

import { z } from "zod";

export const ReasonCode = z.enum([
  "ALL_REQUIREMENTS_MET",

  // temperature hold
  "THRESHOLD_NEVER_REACHED",
  "THRESHOLD_WITHIN_UNCERTAINTY",
  "HOLD_TIME_INSUFFICIENT",
  "HOLD_TIME_WITHIN_UNCERTAINTY",
  "RAMP_RATE_EXCEEDED",
  "TIME_TO_THRESHOLD_EXCEEDED",
  "TEMPERATURE_ABOVE_BAND",
  "TEMPERATURE_WITHIN_UNCERTAINTY",

  // autoclave
  "F0_INSUFFICIENT",
  "F0_WITHIN_UNCERTAINTY",
  "STERILIZATION_HOLD_INSUFFICIENT",
  "OVER_TEMPERATURE",
  "PRESSURE_BELOW_MINIMUM",
  "PRESSURE_ABOVE_MAXIMUM",

  // haccp cooling
  "PEAK_BELOW_START_THRESHOLD",
  "COOLING_PHASE_1_EXCEEDED",
  "COOLING_PHASE_2_EXCEEDED",
  "COOLING_INCOMPLETE",
  "COOLING_WITHIN_UNCERTAINTY",

  // band compliance
  "COMPLIANCE_BELOW_MINIMUM",
  "COMPLIANCE_WITHIN_UNCERTAINTY",
  "EXCURSION_TOO_LONG",
  "EXCURSION_WITHIN_UNCERTAINTY",
  "CURING_WINDOW_INCOMPLETE",
  "TEMPERATURE_RATE_EXCEEDED",

  // sterile exposure
  "EXPOSURE_TIME_INSUFFICIENT",
  "HUMIDITY_BELOW_MINIMUM",

  // policy
  "SHADOW_DISAGREEMENT",
  "SHADOW_UNAVAILABLE",
  "HUMAN_QA_REQUIRED",

  // errors
  "DATA_QUALITY_ERROR",
  "SCHEMA_VALIDATION_ERROR",
  "REQUIRED_SIGNAL_MISSING",
  "COMPUTATION_ERROR",
]);
export type ReasonCode = z.infer<typeof ReasonCode>;

export const Outcome = z.enum(["PASS", "FAIL", "INDETERMINATE", "ERROR"]);
export type Outcome = z.infer<typeof Outcome>;

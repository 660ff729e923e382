/**
 * Specification enumerations.
 */

import { z } from "zod";

/**
 * Regulated process families with a dedicated metric calculator.
 */
export const Industry = z.enum([
  "powder",
  "autoclave",
  "haccp",
  "coldchain",
  "concrete",
  "sterile",
]);
export type Industry = z.infer<typeof Industry>;

/**
 * How time above threshold accumulates.
 *
 *   continuous - longest single interval counts
 *   cumulative - intervals add up; gaps between them are tolerated up to
 *                logic.max_total_dips_s
 */
export const HoldMode = z.enum(["continuous", "cumulative"]);
export type HoldMode = z.infer<typeof HoldMode>;

/**
 * Per-sample combination of the selected temperature sensors.
 */
export const SensorSelectionMode = z.enum([
  "min_of_set",
  "mean_of_set",
  "majority_over_threshold",
]);
export type SensorSelectionMode = z.infer<typeof SensorSelectionMode>;

/**
 * Measurement method. PMT (part metal temperature) only applies to powder
 * coating cures.
 */
export const Method = z.enum(["OVEN_AIR", "PMT"]);
export type Method = z.infer<typeof Method>;

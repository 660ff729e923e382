/**
 * Policy enumerations for the decision pipeline.
 *
 * Each value changes how a defect class is handled, so every one of them is
 * recorded in the evidence bundle's job descriptor alongside the inputs.
 */

import { z } from "zod";

/**
 * Resolution of rows that share a timestamp.
 *
 *   error      - fatal DataQualityError (default)
 *   first-wins - keep the first row in file order
 *   mean       - average every sensor over the rows' non-missing readings
 */
export const DuplicatePolicy = z.enum(["error", "first-wins", "mean"]);
export type DuplicatePolicy = z.infer<typeof DuplicatePolicy>;

/**
 * Handling of inter-sample gaps longer than the specification allows.
 */
export const GapPolicy = z.enum(["warn", "error"]);
export type GapPolicy = z.infer<typeof GapPolicy>;

/**
 * Day/month order used when a slash date such as 03/04/2024 carries no
 * evidence either way.
 */
export const DateOrder = z.enum(["month-first", "day-first"]);
export type DateOrder = z.infer<typeof DateOrder>;

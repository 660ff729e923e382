/**
 * Pipeline configuration schema.
 *
 * The configuration is the only non-data input that may influence an
 * outcome. It is validated once, frozen, and threaded through every call;
 * no stage reads environment variables or other process-wide state.
 */

import { z } from "zod";
import { DuplicatePolicy, GapPolicy, DateOrder } from "./enums.js";

export const PipelineConfigSchema = z
  .object({
    safeMode: z
      .boolean()
      .describe(
        "Run the independent calculator and require agreement before reporting PASS"
      ),

    humanQaRequiredForPass: z
      .boolean()
      .describe("Report PASS results as INDETERMINATE pending human review"),

    failOnParserWarnings: z
      .boolean()
      .describe("Treat parser warnings (ambiguous dates, assumed timezone) as fatal"),

    duplicatePolicy: DuplicatePolicy.describe(
      "Resolution policy for rows sharing a timestamp"
    ),

    gapPolicy: GapPolicy.describe(
      "Whether gaps above allowed_gaps_s warn or fail normalization"
    ),

    dateOrder: DateOrder.describe(
      "Day/month order for slash dates without disambiguating evidence"
    ),

    defaultTimezone: z
      .string()
      .min(1)
      .describe("Timezone assumed for naive timestamps when none is declared"),

    minDistinctPoints: z
      .number()
      .int()
      .min(2)
      .describe("Minimum number of distinct timestamps required"),

    maxPoints: z
      .number()
      .int()
      .min(2)
      .describe("Maximum number of rows accepted"),

    maxInputBytes: z
      .number()
      .int()
      .min(1)
      .describe("Maximum raw payload size in bytes"),

    resampleStepS: z
      .number()
      .positive()
      .nullable()
      .describe("Canonical cadence in seconds; null uses the median interval"),

    shadowRelativeTolerance: z
      .number()
      .min(0)
      .max(1)
      .describe("Relative tolerance for shadow quantities without a fixed tolerance"),

    verifyNumericTolerance: z
      .number()
      .min(0)
      .describe("Absolute tolerance when the verifier compares numeric decision fields"),
  })
  .strict()
  .refine((cfg) => cfg.maxPoints >= cfg.minDistinctPoints, {
    message: "maxPoints must be at least minDistinctPoints",
    path: ["maxPoints"],
  });

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

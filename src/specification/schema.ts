/**
 * Process specification schema.
 *
 * A specification states what a sensor log must demonstrate for one
 * industry: thresholds, durations, tolerances and how sensors combine. It is
 * a discriminated union on `industry`; each member carries its own strict
 * parameter block with the defaults listed below.
 *
 * IMMUTABILITY CONTRACT:
 * Validated specifications are deep-frozen. The metric calculators, the
 * decision engine and the evidence bundle all see the same object.
 *
 * VERSIONING:
 * `version` is "major.minor". Documents with another major version are
 * rejected; minor versions are accepted as-is.
 */

import { z } from "zod";
import { HoldMode, Method, SensorSelectionMode } from "./enums.js";

export const SPECIFICATION_VERSION = "1.0";

export const JOB_ID_PATTERN = /^[A-Za-z0-9_-]{1,100}$/;

const Uncertainty = z.number().min(0).max(10);

// ═══════════════════════════════════════════════════════════════════════════
// SHARED BLOCKS
// ═══════════════════════════════════════════════════════════════════════════

export const SensorSelectionSchema = z
  .object({
    mode: SensorSelectionMode.default("min_of_set").describe(
      "Per-sample combination of the selected temperature sensors"
    ),
    sensors: z
      .array(z.string().min(1))
      .min(1)
      .optional()
      .describe("Sensor names or `*` globs; every entry must match a channel"),
    require_at_least: z
      .number()
      .int()
      .min(1)
      .optional()
      .describe("Minimum number of matched temperature sensors"),
  })
  .strict()
  .superRefine((selection, ctx) => {
    if (selection.sensors === undefined) return;
    const seen = new Set<string>();
    selection.sensors.forEach((name, i) => {
      if (name.trim() === "") {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["sensors", i], message: "sensor name must not be blank" });
      }
      if (seen.has(name)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["sensors", i], message: `duplicate sensor "${name}"` });
      }
      seen.add(name);
    });
  });

export type SensorSelection = z.infer<typeof SensorSelectionSchema>;

export const DataRequirementsSchema = z
  .object({
    max_sample_period_s: z.number().positive().optional().describe("Expected maximum sampling period"),
    allowed_gaps_s: z.number().positive().optional().describe("Largest tolerated interval between samples"),
  })
  .strict();

export type DataRequirements = z.infer<typeof DataRequirementsSchema>;

export const LogicSchema = z
  .object({
    hold_mode: HoldMode.default("continuous"),
    max_total_dips_s: z
      .number()
      .min(0)
      .default(0)
      .describe("Total time below threshold tolerated between hold intervals (cumulative mode)"),
  })
  .strict();

export type Logic = z.infer<typeof LogicSchema>;

export const DecisionPolicySchema = z
  .object({
    boundary_check: z
      .boolean()
      .default(true)
      .describe("Report INDETERMINATE when a requirement is met only within measurement uncertainty"),
  })
  .strict();

export type DecisionPolicy = z.infer<typeof DecisionPolicySchema>;

const TemperatureBandSchema = z
  .object({
    min: z.number(),
    max: z.number(),
  })
  .strict();

// ═══════════════════════════════════════════════════════════════════════════
// INDUSTRY PARAMETERS
// ═══════════════════════════════════════════════════════════════════════════

export const PowderParametersSchema = z
  .object({
    target_temp_C: z.number().gt(0).max(300).describe("Cure temperature"),
    hold_time_s: z.number().int().min(1).max(172_800).describe("Required time at temperature"),
    sensor_uncertainty_C: Uncertainty.default(2),
    hysteresis_C: z.number().min(0).max(20).default(2),
    temp_band_C: TemperatureBandSchema.optional().describe("Permitted temperature band during the cure"),
    max_ramp_rate_C_per_min: z.number().positive().optional(),
    max_time_to_threshold_s: z.number().int().positive().optional(),
  })
  .strict();

export const AutoclaveParametersSchema = z
  .object({
    sterilization_temp_C: z.number().min(100).max(150).default(121),
    sterilization_time_min: z.number().gt(0).max(600).default(15),
    temp_tolerance_C: z.number().gt(0).max(10).default(2),
    hysteresis_C: z.number().min(0).max(10).default(1),
    sensor_uncertainty_C: Uncertainty.default(0.5),
    z_value_C: z.number().min(2).max(30).default(10),
    reference_temp_C: z.number().min(100).max(140).default(121.1),
    min_f0: z.number().min(0).default(12).describe("Minimum accumulated lethality, minutes at the reference temperature"),
    min_pressure_bar: z.number().min(0).default(2.0),
    max_pressure_bar: z.number().positive().optional(),
    require_pressure: z.boolean().default(true),
  })
  .strict();

export const HaccpParametersSchema = z
  .object({
    temp_1_F: z.number().min(-100).max(400).default(135),
    temp_2_F: z.number().min(-100).max(400).default(70),
    temp_3_F: z.number().min(-100).max(400).default(41),
    phase_1_limit_h: z.number().gt(0).max(48).default(2),
    phase_2_limit_h: z.number().gt(0).max(48).default(4),
    sensor_uncertainty_C: Uncertainty.default(0.5),
  })
  .strict();

export const ColdChainParametersSchema = z
  .object({
    min_temp_C: z.number().min(-100).max(100).default(2),
    max_temp_C: z.number().min(-100).max(100).default(8),
    min_compliance_pct: z.number().min(0).max(100).default(95),
    max_excursion_min: z.number().min(0).default(30),
    min_excursion_s: z.number().min(0).default(60),
    sensor_uncertainty_C: Uncertainty.default(0.5),
  })
  .strict();

export const ConcreteParametersSchema = z
  .object({
    min_temp_C: z.number().min(-50).max(100).default(10),
    max_temp_C: z.number().min(-50).max(100).default(30),
    min_humidity_pct: z.number().min(0).max(100).default(80),
    window_h: z.number().gt(0).max(720).default(24),
    min_compliance_pct: z.number().min(0).max(100).default(95),
    max_temp_rate_C_per_h: z.number().positive().optional(),
    sensor_uncertainty_C: Uncertainty.default(0.5),
    humidity_uncertainty_pct: z.number().min(0).max(20).default(0),
  })
  .strict();

export const SterileParametersSchema = z
  .object({
    min_temp_C: z.number().min(0).max(300).default(55),
    exposure_h: z.number().gt(0).max(720).default(12),
    max_temp_C: z.number().min(0).max(300).default(60),
    min_humidity_pct: z.number().min(0).max(100).optional(),
    sensor_uncertainty_C: Uncertainty.default(0.5),
  })
  .strict();

export type PowderParameters = z.infer<typeof PowderParametersSchema>;
export type AutoclaveParameters = z.infer<typeof AutoclaveParametersSchema>;
export type HaccpParameters = z.infer<typeof HaccpParametersSchema>;
export type ColdChainParameters = z.infer<typeof ColdChainParametersSchema>;
export type ConcreteParameters = z.infer<typeof ConcreteParametersSchema>;
export type SterileParameters = z.infer<typeof SterileParametersSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// SPECIFICATION
// ═══════════════════════════════════════════════════════════════════════════

const baseShape = {
  version: z
    .string()
    .regex(/^\d+\.\d+$/, "version must look like 1.0")
    .default(SPECIFICATION_VERSION),
  job_id: z
    .string()
    .regex(JOB_ID_PATTERN, "job_id must be 1-100 characters of A-Z, a-z, 0-9, _ or -")
    .optional(),
  method: Method.default("OVEN_AIR"),
  data_requirements: DataRequirementsSchema.default({}),
  sensor_selection: SensorSelectionSchema.default({}),
  logic: LogicSchema.default({}),
  decision: DecisionPolicySchema.default({}),
  required_signals: z
    .array(z.string().min(1))
    .default([])
    .describe("Sensor names that must be present in the data"),
  aliases_applied: z
    .array(z.string())
    .default([])
    .describe("Legacy keys rewritten during validation"),
};

export const SpecificationSchema = z.discriminatedUnion("industry", [
  z.object({ ...baseShape, industry: z.literal("powder"), parameters: PowderParametersSchema }).strict(),
  z
    .object({ ...baseShape, industry: z.literal("autoclave"), parameters: AutoclaveParametersSchema.default({}) })
    .strict(),
  z.object({ ...baseShape, industry: z.literal("haccp"), parameters: HaccpParametersSchema.default({}) }).strict(),
  z
    .object({ ...baseShape, industry: z.literal("coldchain"), parameters: ColdChainParametersSchema.default({}) })
    .strict(),
  z
    .object({ ...baseShape, industry: z.literal("concrete"), parameters: ConcreteParametersSchema.default({}) })
    .strict(),
  z.object({ ...baseShape, industry: z.literal("sterile"), parameters: SterileParametersSchema.default({}) }).strict(),
]);

export type Specification = z.infer<typeof SpecificationSchema>;

export type SpecificationFor<I extends Specification["industry"]> = Extract<Specification, { industry: I }>;

export type PowderSpecification = SpecificationFor<"powder">;
export type AutoclaveSpecification = SpecificationFor<"autoclave">;
export type HaccpSpecification = SpecificationFor<"haccp">;
export type ColdChainSpecification = SpecificationFor<"coldchain">;
export type ConcreteSpecification = SpecificationFor<"concrete">;
export type SterileSpecification = SpecificationFor<"sterile">;

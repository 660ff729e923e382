/**
 * Legacy specification aliases.
 *
 * Older documents use a v1 layout (`spec`, `job`, `preconditions`,
 * `logic.continuous`) and unit-less parameter names. They are rewritten to
 * the current layout before schema validation; every rewrite is recorded in
 * `aliases_applied`. A document that carries both an alias and its
 * canonical key is rejected.
 */

import type { SchemaIssue } from "../errors/index.js";

export type AliasScope = "layout" | "parameter" | "industry";

export interface SpecAlias {
  readonly scope: AliasScope;
  readonly from: string;
  readonly to: string;
  /** Multiplier applied to numeric values */
  readonly scale?: number;
}

export const SPEC_ALIASES: readonly SpecAlias[] = [
  // v1 layout
  { scope: "layout", from: "spec", to: "parameters" },
  { scope: "layout", from: "spec.method", to: "method" },
  { scope: "layout", from: "job.job_id", to: "job_id" },
  { scope: "layout", from: "preconditions.*", to: "parameters.*" },
  { scope: "layout", from: "logic.continuous", to: "logic.hold_mode" },

  // parameter names
  { scope: "parameter", from: "target_temp", to: "target_temp_C" },
  { scope: "parameter", from: "hold_duration_minutes", to: "hold_time_s", scale: 60 },
  { scope: "parameter", from: "sensor_uncertainty", to: "sensor_uncertainty_C" },
  { scope: "parameter", from: "hysteresis", to: "hysteresis_C" },
  { scope: "parameter", from: "max_ramp_rate", to: "max_ramp_rate_C_per_min" },
  { scope: "parameter", from: "sterilization_temp", to: "sterilization_temp_C" },
  { scope: "parameter", from: "sterilization_time_minutes", to: "sterilization_time_min" },
  { scope: "parameter", from: "z_value", to: "z_value_C" },
  { scope: "parameter", from: "min_temp", to: "min_temp_C" },
  { scope: "parameter", from: "max_temp", to: "max_temp_C" },
  { scope: "parameter", from: "compliance_percentage", to: "min_compliance_pct" },
  { scope: "parameter", from: "max_excursion_minutes", to: "max_excursion_min" },
  { scope: "parameter", from: "temp_1", to: "temp_1_F" },
  { scope: "parameter", from: "temp_2", to: "temp_2_F" },
  { scope: "parameter", from: "temp_3", to: "temp_3_F" },
  { scope: "parameter", from: "time_1_to_2_hours", to: "phase_1_limit_h" },
  { scope: "parameter", from: "time_2_to_3_hours", to: "phase_2_limit_h" },
  { scope: "parameter", from: "min_humidity", to: "min_humidity_pct" },
  { scope: "parameter", from: "time_window_hours", to: "window_h" },
  { scope: "parameter", from: "exposure_hours", to: "exposure_h" },

  // industry tags
  { scope: "industry", from: "powder-coating", to: "powder" },
  { scope: "industry", from: "cold-chain", to: "coldchain" },
  { scope: "industry", from: "eto", to: "sterile" },
  { scope: "industry", from: "dry-heat", to: "sterile" },
];

const PARAMETER_ALIASES = new Map(
  SPEC_ALIASES.filter((alias) => alias.scope === "parameter").map((alias) => [alias.from, alias])
);

const INDUSTRY_ALIASES = new Map(
  SPEC_ALIASES.filter((alias) => alias.scope === "industry").map((alias) => [alias.from, alias.to])
);

export type JsonObject = Record<string, unknown>;

export function isJsonObject(value: unknown): value is JsonObject {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Resolve an industry tag through the alias table. Unknown tags pass through.
 */
export function resolveIndustryAlias(tag: string): string {
  return INDUSTRY_ALIASES.get(tag.trim().toLowerCase()) ?? tag;
}

export interface AliasOutcome {
  readonly document: JsonObject;
  readonly applied: string[];
  readonly issues: SchemaIssue[];
}

function conflict(path: (string | number)[], alias: string, canonical: string): SchemaIssue {
  return {
    path,
    code: "alias_conflict",
    message: `both "${alias}" and its canonical form "${canonical}" are present`,
  };
}

/**
 * Rewrite legacy keys. The input is not modified.
 */
export function applyAliases(input: JsonObject): AliasOutcome {
  const doc: JsonObject = { ...input };
  const applied: string[] = [];
  const issues: SchemaIssue[] = [];

  // spec -> parameters, spec.method -> method
  if (Object.hasOwn(doc, "spec")) {
    if (Object.hasOwn(doc, "parameters")) {
      issues.push(conflict(["spec"], "spec", "parameters"));
    } else {
      const spec = doc.spec;
      if (isJsonObject(spec) && Object.hasOwn(spec, "method")) {
        const { method, ...rest } = spec;
        if (Object.hasOwn(doc, "method")) {
          issues.push(conflict(["spec", "method"], "spec.method", "method"));
        } else {
          doc.method = method;
          applied.push("spec.method -> method");
        }
        doc.parameters = rest;
      } else {
        doc.parameters = spec;
      }
      applied.push("spec -> parameters");
    }
    delete doc.spec;
  }

  // job.job_id -> job_id
  if (Object.hasOwn(doc, "job")) {
    const job = doc.job;
    if (!isJsonObject(job)) {
      issues.push({ path: ["job"], code: "invalid_type", message: "job must be an object" });
    } else {
      for (const key of Object.keys(job)) {
        if (key === "job_id") continue;
        issues.push({ path: ["job", key], code: "unrecognized_keys", message: `Unrecognized key "job.${key}"` });
      }
      if (Object.hasOwn(job, "job_id")) {
        if (Object.hasOwn(doc, "job_id")) {
          issues.push(conflict(["job", "job_id"], "job.job_id", "job_id"));
        } else {
          doc.job_id = job.job_id;
          applied.push("job.job_id -> job_id");
        }
      }
    }
    delete doc.job;
  }

  // preconditions.* -> parameters.*
  if (Object.hasOwn(doc, "preconditions")) {
    const preconditions = doc.preconditions;
    const parameters = doc.parameters === undefined ? {} : doc.parameters;
    if (!isJsonObject(preconditions) || !isJsonObject(parameters)) {
      issues.push({
        path: ["preconditions"],
        code: "invalid_type",
        message: "preconditions and parameters must be objects",
      });
    } else {
      const merged: JsonObject = { ...parameters };
      for (const [key, value] of Object.entries(preconditions)) {
        if (Object.hasOwn(merged, key)) {
          issues.push(conflict(["preconditions", key], `preconditions.${key}`, `parameters.${key}`));
        } else {
          merged[key] = value;
          applied.push(`preconditions.${key} -> parameters.${key}`);
        }
      }
      doc.parameters = merged;
    }
    delete doc.preconditions;
  }

  // logic.continuous -> logic.hold_mode
  if (isJsonObject(doc.logic) && Object.hasOwn(doc.logic, "continuous")) {
    const { continuous, ...logic } = doc.logic;
    if (Object.hasOwn(logic, "hold_mode")) {
      issues.push(conflict(["logic", "continuous"], "logic.continuous", "logic.hold_mode"));
    } else if (typeof continuous !== "boolean") {
      issues.push({ path: ["logic", "continuous"], code: "invalid_type", message: "logic.continuous must be a boolean" });
    } else {
      logic.hold_mode = continuous ? "continuous" : "cumulative";
      applied.push("logic.continuous -> logic.hold_mode");
    }
    doc.logic = logic;
  }

  // industry tags
  if (typeof doc.industry === "string") {
    const resolved = resolveIndustryAlias(doc.industry);
    if (resolved !== doc.industry) {
      applied.push(`industry ${doc.industry} -> ${resolved}`);
      doc.industry = resolved;
    }
  }

  // parameter names
  if (isJsonObject(doc.parameters)) {
    const parameters: JsonObject = {};
    const source = doc.parameters;
    for (const [key, value] of Object.entries(source)) {
      const alias = PARAMETER_ALIASES.get(key);
      if (alias === undefined) {
        parameters[key] = value;
        continue;
      }
      if (Object.hasOwn(source, alias.to)) {
        issues.push(conflict(["parameters", key], `parameters.${key}`, `parameters.${alias.to}`));
        continue;
      }
      parameters[alias.to] =
        alias.scale !== undefined && typeof value === "number" ? value * alias.scale : value;
      applied.push(
        alias.scale !== undefined
          ? `parameters.${key} -> parameters.${alias.to} (x${alias.scale})`
          : `parameters.${key} -> parameters.${alias.to}`
      );
    }
    doc.parameters = parameters;
  }

  return { document: doc, applied, issues };
}

/**
 * Specification serialization for audit and reproducibility.
 *
 * The validated specification is serialized into every evidence bundle:
 *
 * 1. AUDIT TRAIL: The bundle records exactly which thresholds, defaults and
 *    alias rewrites governed the decision, not just the submitted document.
 *
 * 2. REPRODUCIBILITY: Canonical JSON means the same specification always
 *    serializes to the same bytes, so its digest is stable across runs.
 *
 * 3. VERSIONING: The version field lets loaders reject documents written
 *    for an incompatible major version.
 */

import { canonicalJson } from "../utils/canonical-json.js";
import type { Specification } from "./schema.js";
import { validateSpecification } from "./validator.js";

/**
 * Serialize a specification to canonical JSON.
 */
export function serializeSpecification(spec: Specification): string {
  return canonicalJson(spec);
}

/**
 * Deserialize a specification from a JSON string.
 *
 * The document is validated again, including the major-version check.
 *
 * @returns Validated and frozen specification
 * @throws SchemaValidationError if parsing or validation fails
 */
export function deserializeSpecification(json: string): Readonly<Specification> {
  const result = validateSpecification(json);
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

function formatValue(value: unknown): string {
  if (value !== null && typeof value === "object") {
    return JSON.stringify(value);
  }
  return String(value);
}

/**
 * Create a human-readable summary of a specification.
 * Useful for logging and display purposes.
 */
export function summarizeSpecification(spec: Specification): string {
  const lines: string[] = [
    "=== Process Specification ===",
    `Version: ${spec.version}`,
    `Industry: ${spec.industry}`,
    `Job ID: ${spec.job_id ?? "(none)"}`,
    `Method: ${spec.method}`,
    "",
    "--- Parameters ---",
  ];

  for (const [key, value] of Object.entries(spec.parameters).sort(([a], [b]) => (a < b ? -1 : 1))) {
    lines.push(`  ${key}: ${formatValue(value)}`);
  }

  lines.push("");
  lines.push("--- Logic ---");
  lines.push(`Hold mode: ${spec.logic.hold_mode}`);
  if (spec.logic.hold_mode === "cumulative") {
    lines.push(`Max total dips: ${spec.logic.max_total_dips_s} s`);
  }
  lines.push(`Boundary check: ${spec.decision.boundary_check ? "on" : "off"}`);

  lines.push("");
  lines.push("--- Sensors ---");
  lines.push(`Mode: ${spec.sensor_selection.mode}`);
  lines.push(`Selected: ${spec.sensor_selection.sensors?.join(", ") ?? "all temperature channels"}`);
  if (spec.sensor_selection.require_at_least !== undefined) {
    lines.push(`Require at least: ${spec.sensor_selection.require_at_least}`);
  }
  if (spec.required_signals.length > 0) {
    lines.push(`Required signals: ${spec.required_signals.join(", ")}`);
  }

  const requirements = spec.data_requirements;
  if (requirements.max_sample_period_s !== undefined || requirements.allowed_gaps_s !== undefined) {
    lines.push("");
    lines.push("--- Data Requirements ---");
    if (requirements.max_sample_period_s !== undefined) {
      lines.push(`Max sample period: ${requirements.max_sample_period_s} s`);
    }
    if (requirements.allowed_gaps_s !== undefined) {
      lines.push(`Allowed gaps: ${requirements.allowed_gaps_s} s`);
    }
  }

  if (spec.aliases_applied.length > 0) {
    lines.push("");
    lines.push("--- Aliases Applied ---");
    for (const alias of spec.aliases_applied) {
      lines.push(`  - ${alias}`);
    }
  }

  return lines.join("\n");
}

/**
 * Specification validator.
 *
 * Accepts a JSON string, UTF-8 bytes or an already parsed object. Legacy
 * aliases are rewritten first, then the document is checked against the
 * strict per-industry schema, then against cross-field rules zod cannot
 * express. Only a fully valid, frozen specification leaves this module.
 */

import { formatZodIssues } from "../config/pipeline/index.js";
import { err, ok, SchemaValidationError, type Result, type SchemaIssue } from "../errors/index.js";
import { deepFreeze } from "../utils/freeze.js";
import { applyAliases, isJsonObject, resolveIndustryAlias } from "./aliases.js";
import { Industry } from "./enums.js";
import { SPECIFICATION_VERSION, SpecificationSchema, type Specification } from "./schema.js";

export type SpecificationInput = string | Uint8Array | Record<string, unknown>;

function invalid(issues: SchemaIssue[]): Result<never, SchemaValidationError> {
  return err(
    new SchemaValidationError(
      `Invalid specification: ${issues.length} validation error(s)`,
      issues
    )
  );
}

/**
 * Check if a specification version is compatible with the current version.
 * Only the major version must match.
 */
export function isVersionCompatible(version: string): boolean {
  const [major] = version.split(".").map(Number);
  const [currentMajor] = SPECIFICATION_VERSION.split(".").map(Number);
  return major === currentMajor;
}

function parseInput(input: SpecificationInput): Result<unknown, SchemaValidationError> {
  if (typeof input !== "string" && !(input instanceof Uint8Array)) {
    return ok(input);
  }
  const text = typeof input === "string" ? input : new TextDecoder("utf-8").decode(input);
  try {
    return ok(JSON.parse(text));
  } catch (error) {
    return invalid([
      {
        path: [],
        code: "invalid_json",
        message: `Specification is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      },
    ]);
  }
}

/**
 * Rules spanning several fields.
 */
export function crossFieldIssues(spec: Specification): SchemaIssue[] {
  const issues: SchemaIssue[] = [];
  const add = (path: (string | number)[], message: string): void => {
    issues.push({ path, message, code: "cross_field" });
  };

  if (!isVersionCompatible(spec.version)) {
    add(["version"], `version ${spec.version} is not compatible with ${SPECIFICATION_VERSION}`);
  }

  if (spec.industry !== "powder" && spec.method !== "OVEN_AIR") {
    add(["method"], `method ${spec.method} only applies to powder specifications`);
  }

  const selection = spec.sensor_selection;
  if (
    selection.sensors !== undefined &&
    selection.require_at_least !== undefined &&
    selection.require_at_least > selection.sensors.length
  ) {
    add(
      ["sensor_selection", "require_at_least"],
      `require_at_least (${selection.require_at_least}) exceeds the ${selection.sensors.length} listed sensor(s)`
    );
  }

  const uniqueSignals = new Set(spec.required_signals);
  if (uniqueSignals.size !== spec.required_signals.length) {
    add(["required_signals"], "required_signals contains duplicates");
  }

  switch (spec.industry) {
    case "powder": {
      const p = spec.parameters;
      if (p.temp_band_C !== undefined) {
        const { min, max } = p.temp_band_C;
        if (min >= max) {
          add(["parameters", "temp_band_C"], "temp_band_C.min must be below temp_band_C.max");
        } else {
          if (p.target_temp_C < min || p.target_temp_C > max) {
            add(["parameters", "target_temp_C"], "target_temp_C must lie inside temp_band_C");
          }
          if (p.hysteresis_C >= max - min) {
            add(["parameters", "hysteresis_C"], "hysteresis_C must be smaller than the temp_band_C width");
          }
        }
      }
      break;
    }
    case "autoclave": {
      const p = spec.parameters;
      if (p.hysteresis_C >= p.temp_tolerance_C) {
        add(["parameters", "hysteresis_C"], "hysteresis_C must be smaller than temp_tolerance_C");
      }
      if (p.max_pressure_bar !== undefined && p.max_pressure_bar <= p.min_pressure_bar) {
        add(["parameters", "max_pressure_bar"], "max_pressure_bar must exceed min_pressure_bar");
      }
      break;
    }
    case "haccp": {
      const p = spec.parameters;
      if (!(p.temp_1_F > p.temp_2_F && p.temp_2_F > p.temp_3_F)) {
        add(["parameters"], "HACCP thresholds must satisfy temp_1_F > temp_2_F > temp_3_F");
      }
      break;
    }
    case "coldchain":
    case "concrete": {
      const p = spec.parameters;
      if (p.min_temp_C + p.sensor_uncertainty_C >= p.max_temp_C - p.sensor_uncertainty_C) {
        add(
          ["parameters", "min_temp_C"],
          "temperature band is empty once narrowed by sensor_uncertainty_C on both sides"
        );
      }
      break;
    }
    case "sterile": {
      const p = spec.parameters;
      if (p.min_temp_C + p.sensor_uncertainty_C >= p.max_temp_C) {
        add(["parameters", "min_temp_C"], "min_temp_C + sensor_uncertainty_C must stay below max_temp_C");
      }
      break;
    }
  }

  return issues;
}

/**
 * Validate a specification document.
 *
 * @param input - JSON text, UTF-8 bytes, or a parsed object
 * @param industry - Industry declared by the caller; must match the document
 */
export function validateSpecification(
  input: SpecificationInput,
  industry?: string
): Result<Readonly<Specification>, SchemaValidationError> {
  const parsed = parseInput(input);
  if (!parsed.ok) return parsed;

  if (!isJsonObject(parsed.value)) {
    return invalid([{ path: [], code: "invalid_type", message: "Specification must be a JSON object" }]);
  }

  const aliased = applyAliases(parsed.value);
  const issues: SchemaIssue[] = [...aliased.issues];
  const document = { ...aliased.document };

  if (industry !== undefined) {
    const declared = resolveIndustryAlias(industry);
    if (!Industry.safeParse(declared).success) {
      issues.push({
        path: ["industry"],
        code: "invalid_enum_value",
        message: `Unknown industry "${industry}"; expected one of ${Industry.options.join(", ")}`,
      });
    } else if (document.industry === undefined) {
      document.industry = declared;
    } else if (document.industry !== declared) {
      issues.push({
        path: ["industry"],
        code: "industry_mismatch",
        message: `Specification is for "${String(document.industry)}" but "${declared}" was requested`,
      });
    }
  }

  if (issues.length > 0) return invalid(issues);

  const existing: unknown[] = Array.isArray(document.aliases_applied) ? document.aliases_applied : [];
  document.aliases_applied = [...existing, ...aliased.applied];

  const result = SpecificationSchema.safeParse(document);
  if (!result.success) {
    return invalid(formatZodIssues(result.error.issues));
  }

  const crossField = crossFieldIssues(result.data);
  if (crossField.length > 0) return invalid(crossField);

  return ok(deepFreeze(result.data));
}

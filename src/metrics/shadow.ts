/**
 * Comparison of primary and independent metrics.
 */

import type { PipelineConfig } from "../config/pipeline/index.js";
import type { Result } from "../errors/index.js";
import type { ShadowQuantities } from "./independent.js";
import type { MetricResult } from "./types.js";

export type ShadowStatus = "AGREEMENT" | "TOLERANCE_VIOLATION" | "INDEPENDENT_ERROR" | "DISABLED";

export interface ShadowDifference {
  readonly quantity: string;
  readonly primary: number | null;
  readonly independent: number | null;
  readonly difference: number | null;
  readonly tolerance: number;
  readonly withinTolerance: boolean;
}

export interface ShadowReport {
  readonly status: ShadowStatus;
  readonly differences: readonly ShadowDifference[];
  readonly error?: string;
}

export type Tolerance = { readonly kind: "absolute" | "relative"; readonly value: number };

const abs = (value: number): Tolerance => ({ kind: "absolute", value });
const rel = (value: number): Tolerance => ({ kind: "relative", value });

/** Per industry: comparable quantity and its tolerance. */
export const SHADOW_TOLERANCES: Readonly<Record<MetricResult["industry"], Readonly<Record<string, Tolerance>>>> = {
  powder: { holdS: abs(1), maxRampRateCPerMin: rel(0.05), timeToThresholdS: abs(1) },
  autoclave: { f0: abs(0.1), holdS: abs(1) },
  haccp: { phase1S: abs(30), phase2S: abs(30) },
  coldchain: { compliancePct: abs(0.5), longestExcursionS: abs(1) },
  concrete: { compliancePct: abs(1) },
  sterile: { holdS: abs(60) },
};

export const SHADOW_DISABLED: ShadowReport = { status: "DISABLED", differences: [] };

/** The primary calculator's value for each comparable quantity. */
export function comparableQuantities(metric: MetricResult): ShadowQuantities {
  switch (metric.industry) {
    case "powder":
      return {
        holdS: metric.values.holdS,
        maxRampRateCPerMin: metric.values.maxRampRateCPerMin,
        timeToThresholdS: metric.values.timeToThresholdS,
      };
    case "autoclave":
      return { f0: metric.values.f0, holdS: metric.values.holdS };
    case "haccp":
      return { phase1S: metric.values.phase1S, phase2S: metric.values.phase2S };
    case "coldchain":
      return {
        compliancePct: metric.values.compliancePct,
        longestExcursionS: metric.values.longestExcursionS,
      };
    case "concrete":
      return { compliancePct: metric.values.compliancePct };
    case "sterile":
      return { holdS: metric.values.holdS };
  }
}

function allowed(tolerance: Tolerance, primary: number, independent: number): number {
  if (tolerance.kind === "absolute") return tolerance.value;
  return tolerance.value * Math.max(Math.abs(primary), Math.abs(independent));
}

export function compareQuantity(
  quantity: string,
  primary: number | null,
  independent: number | null,
  tolerance: Tolerance
): ShadowDifference {
  if (primary === null || independent === null) {
    return {
      quantity,
      primary,
      independent,
      difference: null,
      tolerance: tolerance.value,
      withinTolerance: primary === independent,
    };
  }
  const difference = Math.abs(primary - independent);
  const limit = allowed(tolerance, primary, independent);
  return {
    quantity,
    primary,
    independent,
    difference,
    tolerance: limit,
    withinTolerance: difference <= limit + 1e-9 * Math.max(1, limit),
  };
}

/**
 * Compare every comparable quantity of the primary result with the
 * independent one. Quantities without a fixed tolerance use
 * `config.shadowRelativeTolerance`.
 */
export function compareShadow(
  primary: MetricResult,
  independent: Result<ShadowQuantities, Error>,
  config: Pick<PipelineConfig, "shadowRelativeTolerance">
): ShadowReport {
  if (!independent.ok) {
    return { status: "INDEPENDENT_ERROR", differences: [], error: independent.error.message };
  }

  const values = independent.value;
  const table = SHADOW_TOLERANCES[primary.industry];
  const fallback = rel(config.shadowRelativeTolerance);
  const differences = Object.entries(comparableQuantities(primary)).map(([quantity, value]) =>
    compareQuantity(quantity, value, values[quantity] ?? null, table[quantity] ?? fallback)
  );

  return {
    status: differences.every((item) => item.withinTolerance) ? "AGREEMENT" : "TOLERANCE_VIOLATION",
    differences,
  };
}

/**
 * Requirement check evaluation.
 */

import type { ReasonCode } from "../decision/reasons.js";
import type { CheckStatus, Comparator, RequirementCheck } from "./types.js";

export interface CheckDefinition {
  id: string;
  label: string;
  comparator: Comparator;
  limit: number;
  unit: string;
  reason: ReasonCode;
  ambiguousReason: ReasonCode;
}

/** Absolute slack for floating-point noise, scaled by the limit. */
function slack(limit: number): number {
  return 1e-9 * Math.max(1, Math.abs(limit));
}

/**
 * Whether a value satisfies the comparator. Values equal to the limit
 * comply; an unmeasured value never does.
 */
export function satisfies(value: number | null, comparator: Comparator, limit: number): boolean {
  if (value === null || Number.isNaN(value)) return false;
  return comparator === ">=" ? value >= limit - slack(limit) : value <= limit + slack(limit);
}

export function evaluateCheck(
  definition: CheckDefinition,
  nominal: number | null,
  conservative: number | null = nominal
): RequirementCheck {
  let status: CheckStatus;
  if (!satisfies(nominal, definition.comparator, definition.limit)) {
    status = "violated";
  } else if (satisfies(conservative, definition.comparator, definition.limit)) {
    status = "met";
  } else {
    status = "ambiguous";
  }
  return { ...definition, nominal, conservative, status };
}

/**
 * Decision engine.
 *
 * Reduces a metric result to an outcome:
 *
 *   any violated check            → FAIL, every violated reason in check order
 *   any ambiguous check           → INDETERMINATE (decision.boundary_check on)
 *   otherwise                     → PASS, ALL_REQUIREMENTS_MET
 *
 * then applies the configured policy gates (safe mode, human QA). Inputs are
 * assumed valid: the specification was validated and the metrics were
 * computed from it. ERROR is never produced here.
 */

import type { PipelineConfig } from "../config/pipeline/index.js";
import type { ErrorReport } from "../errors/index.js";
import { SHADOW_DISABLED, type MetricResult, type RequirementCheck, type ShadowReport } from "../metrics/index.js";
import type { Industry, Specification } from "../specification/index.js";
import { warning, type PipelineWarning } from "../types/index.js";
import type { Outcome, ReasonCode } from "./reasons.js";

export interface Decision {
  readonly outcome: Outcome;
  readonly reasons: readonly ReasonCode[];
  readonly industry: Industry | null;
  readonly job_id: string | null;
  readonly checks: readonly RequirementCheck[];
  readonly metrics: MetricResult["values"] | null;
  readonly warnings: readonly PipelineWarning[];
  readonly shadow: ShadowReport;
  /** Present on ERROR only */
  readonly error?: ErrorReport;
}

export type DecisionPolicyConfig = Pick<PipelineConfig, "safeMode" | "humanQaRequiredForPass">;

function unique(reasons: readonly ReasonCode[]): ReasonCode[] {
  return [...new Set(reasons)];
}

function shadowReason(shadow: ShadowReport): ReasonCode {
  return shadow.status === "TOLERANCE_VIOLATION" ? "SHADOW_DISAGREEMENT" : "SHADOW_UNAVAILABLE";
}

/**
 * Outcome and reasons from the checks alone.
 */
export function evaluateChecks(
  checks: readonly RequirementCheck[],
  boundaryCheck: boolean
): { outcome: Exclude<Outcome, "ERROR">; reasons: ReasonCode[] } {
  const violated = checks.filter((check) => check.status === "violated");
  if (violated.length > 0) {
    return { outcome: "FAIL", reasons: unique(violated.map((check) => check.reason)) };
  }

  const ambiguous = checks.filter((check) => check.status === "ambiguous");
  if (boundaryCheck && ambiguous.length > 0) {
    return { outcome: "INDETERMINATE", reasons: unique(ambiguous.map((check) => check.ambiguousReason)) };
  }

  return { outcome: "PASS", reasons: ["ALL_REQUIREMENTS_MET"] };
}

export function decide(
  metric: MetricResult,
  spec: Readonly<Specification>,
  config: DecisionPolicyConfig,
  shadow: ShadowReport = SHADOW_DISABLED
): Decision {
  let { outcome, reasons } = evaluateChecks(metric.checks, spec.decision.boundary_check);
  const warnings: PipelineWarning[] = [...metric.warnings];

  if (config.safeMode && shadow.status !== "AGREEMENT") {
    const reason = shadowReason(shadow);
    warnings.push(
      warning("shadow", reason, `Independent calculation ${shadow.status === "TOLERANCE_VIOLATION" ? "disagrees" : "is unavailable"}`, {
        status: shadow.status,
        ...(shadow.error !== undefined ? { error: shadow.error } : {}),
      })
    );
    if (outcome === "PASS") {
      outcome = "INDETERMINATE";
      reasons = [reason];
    } else {
      reasons = unique([...reasons, reason]);
    }
  }

  if (config.humanQaRequiredForPass && outcome === "PASS") {
    outcome = "INDETERMINATE";
    reasons = ["HUMAN_QA_REQUIRED"];
  }

  return {
    outcome,
    reasons,
    industry: metric.industry,
    job_id: spec.job_id ?? null,
    checks: metric.checks,
    metrics: metric.values,
    warnings,
    shadow,
  };
}

/**
 * ERROR decision for a job that never reached the engine.
 */
export function errorDecision(
  reason: ReasonCode,
  report: ErrorReport,
  context: { industry: Industry | null; jobId: string | null; warnings?: readonly PipelineWarning[] }
): Decision {
  return {
    outcome: "ERROR",
    reasons: [reason],
    industry: context.industry,
    job_id: context.jobId,
    checks: [],
    metrics: null,
    warnings: context.warnings ?? [],
    shadow: SHADOW_DISABLED,
    error: report,
  };
}

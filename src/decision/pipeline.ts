/**
 * Job orchestration.
 *
 * normalize → validate → metrics → shadow (safe mode) → decide
 *
 * Each stage returns a Result. This is the one place an Err becomes the
 * ERROR outcome, carrying the error report and a reason code. The
 * specification is validated before the data is normalized because its
 * data requirements (allowed gaps, sample period) parameterize the
 * normalizer, but a data defect is still reported ahead of a schema defect.
 */

import type { PipelineConfig } from "../config/pipeline/index.js";
import { toErrorReport, type PipelineError } from "../errors/index.js";
import { buildBundle, type BuiltBundle, type JobDescriptor } from "../evidence/builder.js";
import { createSilentLogger, type Logger } from "../logging/index.js";
import {
  calculateIndependent,
  calculateMetrics,
  compareShadow,
  SHADOW_DISABLED,
  type MetricResult,
} from "../metrics/index.js";
import { normalize, type ColumnAliasTable } from "../normalize/index.js";
import {
  Industry,
  resolveIndustryAlias,
  validateSpecification,
  type Specification,
  type SpecificationInput,
} from "../specification/index.js";
import type { NormalizedSeries, PipelineWarning } from "../types/index.js";
import { canonicalJsonBytes } from "../utils/canonical-json.js";
import { decide, errorDecision, type Decision } from "./engine.js";
import type { ReasonCode } from "./reasons.js";

export interface JobInput {
  /** Raw sensor log bytes (CSV) */
  readonly rawData: Uint8Array | string;
  /** Specification as submitted: JSON text, bytes or a parsed object */
  readonly specification: SpecificationInput;
  /** Industry requested by the caller; must match the document */
  readonly industry?: string;
  readonly declaredTimezone?: string;
  readonly declaredUnits?: string;
}

export interface JobOptions {
  readonly config: Readonly<PipelineConfig>;
  readonly logger?: Logger;
  readonly aliasTable?: ColumnAliasTable;
}

export interface JobEvaluation {
  readonly decision: Decision;
  readonly series: Readonly<NormalizedSeries> | null;
  readonly specification: Readonly<Specification> | null;
  readonly metrics: MetricResult | null;
}

export interface JobRun extends JobEvaluation {
  /** Null when the outcome is ERROR */
  readonly bundle: BuiltBundle | null;
}

const ERROR_REASONS: Record<PipelineError["kind"], ReasonCode> = {
  data_quality: "DATA_QUALITY_ERROR",
  schema_validation: "SCHEMA_VALIDATION_ERROR",
  required_signal_missing: "REQUIRED_SIGNAL_MISSING",
  computation: "COMPUTATION_ERROR",
};

function requestedIndustry(input: JobInput, spec: Readonly<Specification> | null): Industry | null {
  if (spec !== null) return spec.industry;
  if (input.industry === undefined) return null;
  const parsed = Industry.safeParse(resolveIndustryAlias(input.industry));
  return parsed.success ? parsed.data : null;
}

export function evaluateJob(input: JobInput, options: JobOptions): JobEvaluation {
  const { config } = options;
  const logger = options.logger ?? createSilentLogger();
  const log = logger.child({ component: "pipeline" });

  const spec = validateSpecification(input.specification, input.industry);
  const validSpec = spec.ok ? spec.value : null;

  const series = normalize(input.rawData, {
    config,
    declaredTimezone: input.declaredTimezone,
    declaredUnits: input.declaredUnits,
    allowedGapS: validSpec?.data_requirements.allowed_gaps_s,
    maxSamplePeriodS: validSpec?.data_requirements.max_sample_period_s,
    logger,
    aliasTable: options.aliasTable,
  });

  const failed = (error: PipelineError, warnings: readonly PipelineWarning[] = []): JobEvaluation => {
    const reason = ERROR_REASONS[error.kind];
    log.warn("Job ended in ERROR", { reason, error: error.message });
    return {
      decision: errorDecision(reason, toErrorReport(error), {
        industry: requestedIndustry(input, validSpec),
        jobId: validSpec?.job_id ?? null,
        warnings,
      }),
      series: series.ok ? series.value : null,
      specification: validSpec,
      metrics: null,
    };
  };

  if (!series.ok) return failed(series.error);
  if (!spec.ok) return failed(spec.error, series.value.warnings);

  const metrics = calculateMetrics(series.value, spec.value, logger);
  if (!metrics.ok) return failed(metrics.error, series.value.warnings);

  const shadow = config.safeMode
    ? compareShadow(metrics.value, calculateIndependent(series.value, spec.value), config)
    : SHADOW_DISABLED;

  const decided = decide(metrics.value, spec.value, config, shadow);
  const decision: Decision = { ...decided, warnings: [...series.value.warnings, ...decided.warnings] };

  log.info("Job decided", {
    industry: decision.industry,
    jobId: decision.job_id,
    outcome: decision.outcome,
    reasons: decision.reasons,
    shadow: shadow.status,
  });

  return { decision, series: series.value, specification: spec.value, metrics: metrics.value };
}

/** Bytes of the specification exactly as submitted (objects as canonical JSON). */
export function submittedSpecificationBytes(specification: SpecificationInput): Buffer {
  if (typeof specification === "string") return Buffer.from(specification, "utf-8");
  if (specification instanceof Uint8Array) return Buffer.from(specification);
  return canonicalJsonBytes(specification);
}

export function jobDescriptor(input: JobInput, config: Readonly<PipelineConfig>): JobDescriptor {
  return {
    industry: input.industry ?? null,
    declared_timezone: input.declaredTimezone ?? null,
    declared_units: input.declaredUnits ?? null,
    config,
  };
}

/**
 * Evaluate a job and, unless the outcome is ERROR, build its evidence
 * bundle.
 */
export function runJob(input: JobInput, options: JobOptions & { clock?: () => Date }): JobRun {
  const evaluation = evaluateJob(input, options);
  const { decision, series, specification, metrics } = evaluation;

  if (decision.outcome === "ERROR" || series === null || specification === null || metrics === null) {
    return { ...evaluation, bundle: null };
  }

  const bundle = buildBundle(
    {
      rawData: typeof input.rawData === "string" ? Buffer.from(input.rawData, "utf-8") : Buffer.from(input.rawData),
      submittedSpecification: submittedSpecificationBytes(input.specification),
      job: jobDescriptor(input, options.config),
      series,
      specification,
      metrics,
      decision,
    },
    { clock: options.clock }
  );

  return { ...evaluation, bundle };
}

/**
 * Evidence bundle builder.
 *
 * A bundle is a fixed set of files: the raw inputs exactly as received, the
 * job descriptor needed to replay the evaluation, each stage's output as
 * canonical JSON, and the manifest that hashes all of them. Building is a
 * pure function of its input and the clock; with the default clock two
 * builds of the same job are byte-identical.
 */

import { z } from "zod";
import { PipelineConfigSchema, type PipelineConfig } from "../config/pipeline/index.js";
import type { Decision } from "../decision/engine.js";
import type { MetricResult } from "../metrics/index.js";
import type { Specification } from "../specification/index.js";
import type { NormalizedSeries } from "../types/index.js";
import { canonicalJsonBytes } from "../utils/canonical-json.js";
import {
  buildManifest,
  comparePaths,
  DEFAULT_CREATED_AT,
  serializeManifest,
  type BundleFile,
  type EvidenceManifest,
} from "./manifest.js";

export const BUNDLE_PATHS = {
  rawData: "inputs/raw_data.csv",
  job: "inputs/job.json",
  submittedSpecification: "inputs/specification.json",
  series: "outputs/normalized_series.json",
  specification: "outputs/specification.json",
  metrics: "outputs/metrics.json",
  decision: "outputs/decision.json",
  manifest: "manifest.json",
} as const;

/**
 * Everything besides the raw bytes that the evaluation depended on.
 */
export const JobDescriptorSchema = z
  .object({
    industry: z.string().nullable(),
    declared_timezone: z.string().nullable(),
    declared_units: z.string().nullable(),
    config: PipelineConfigSchema,
  })
  .strict();

export interface JobDescriptor {
  readonly industry: string | null;
  readonly declared_timezone: string | null;
  readonly declared_units: string | null;
  readonly config: Readonly<PipelineConfig>;
}

export interface BundleInput {
  readonly rawData: Buffer;
  readonly submittedSpecification: Buffer;
  readonly job: JobDescriptor;
  readonly series: Readonly<NormalizedSeries>;
  readonly specification: Readonly<Specification>;
  readonly metrics: MetricResult;
  readonly decision: Decision;
}

export interface BundleOptions {
  /** Source of `created_at`; defaults to a fixed instant */
  readonly clock?: () => Date;
}

export interface EvidenceBundle {
  readonly files: readonly BundleFile[];
}

export interface BuiltBundle extends EvidenceBundle {
  readonly manifest: EvidenceManifest;
}

/** Normalized series as written to the bundle, timestamps in ISO-8601 UTC. */
export function seriesDocument(series: Readonly<NormalizedSeries>): Record<string, unknown> {
  return {
    timezone: series.timezone,
    cadence_s: series.cadenceS,
    resampled: series.resampled,
    source_row_count: series.sourceRowCount,
    metadata: series.metadata,
    channels: series.channels,
    warnings: series.warnings,
    samples: series.samples.map((sample) => ({ t: new Date(sample.t), values: sample.values })),
  };
}

const fixedClock = (): Date => new Date(DEFAULT_CREATED_AT);

export function buildBundle(input: BundleInput, options: BundleOptions = {}): BuiltBundle {
  const createdAt = (options.clock ?? fixedClock)().toISOString();

  const files: BundleFile[] = [
    { path: BUNDLE_PATHS.rawData, content: input.rawData },
    { path: BUNDLE_PATHS.job, content: canonicalJsonBytes(input.job) },
    { path: BUNDLE_PATHS.submittedSpecification, content: input.submittedSpecification },
    { path: BUNDLE_PATHS.series, content: canonicalJsonBytes(seriesDocument(input.series)) },
    { path: BUNDLE_PATHS.specification, content: canonicalJsonBytes(input.specification) },
    { path: BUNDLE_PATHS.metrics, content: canonicalJsonBytes(input.metrics) },
    { path: BUNDLE_PATHS.decision, content: canonicalJsonBytes(input.decision) },
  ].sort((a, b) => comparePaths(a.path, b.path));

  const manifest = buildManifest(files, createdAt);

  return {
    files: [...files, { path: BUNDLE_PATHS.manifest, content: serializeManifest(manifest) }],
    manifest,
  };
}

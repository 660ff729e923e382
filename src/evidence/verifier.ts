/**
 * Evidence bundle verifier.
 *
 * Two independent questions:
 *
 *   integrity    Do the files match the manifest, and does the manifest's
 *                root hash match its entries?
 *   reproduction Does re-running the evaluation on inputs/* alone give the
 *                decision recorded in outputs/decision.json?
 *
 * Reproduction compares the outcome, the reasons as a set and every other
 * leaf of the recorded decision, then every leaf of the recorded series,
 * specification and metrics against the same documents rendered from the
 * recomputation. Numbers match within config.verifyNumericTolerance; strings,
 * booleans, nulls, keys and array lengths must match exactly. Nothing in
 * outputs/* is trusted as an input.
 */

import type { z } from "zod";
import { evaluateJob } from "../decision/pipeline.js";
import type { Decision } from "../decision/engine.js";
import { err, ok, type Result } from "../errors/index.js";
import { createSilentLogger, type Logger } from "../logging/index.js";
import type { ColumnAliasTable } from "../normalize/index.js";
import { canonicalJson } from "../utils/canonical-json.js";
import { BUNDLE_PATHS, JobDescriptorSchema, seriesDocument, type EvidenceBundle } from "./builder.js";
import {
  computeRootHash,
  isCanonicalManifest,
  parseManifest,
  sha256Hex,
  type BundleFile,
} from "./manifest.js";

export type MismatchKind =
  | "missing_file"
  | "extra_file"
  | "hash_mismatch"
  | "root_hash"
  | "manifest_invalid"
  | "manifest_noncanonical"
  | "decision_field"
  | "output_field"
  | "recompute_failed";

export interface Mismatch {
  readonly kind: MismatchKind;
  readonly path: string;
  readonly message: string;
  /** JSON path inside the file, for output_field */
  readonly field?: string;
  readonly expected?: unknown;
  readonly actual?: unknown;
}

export interface HashMismatch {
  readonly path: string;
  readonly expected: string;
  readonly actual: string;
}

export interface IntegrityReport {
  readonly files_total: number;
  readonly files_verified: number;
  readonly missing_files: string[];
  readonly extra_files: string[];
  readonly hash_mismatches: HashMismatch[];
  readonly root_hash_valid: boolean;
  readonly manifest_canonical: boolean;
}

export interface VerificationReport {
  readonly match: boolean;
  readonly integrity: IntegrityReport;
  readonly recomputed_decision: Decision | null;
  readonly mismatches: Mismatch[];
}

export interface VerifyOptions {
  readonly logger?: Logger;
  readonly aliasTable?: ColumnAliasTable;
}

// ---------------------------------------------------------------------------
// Integrity
// ---------------------------------------------------------------------------

function checkIntegrity(files: ReadonlyMap<string, Buffer>, mismatches: Mismatch[]): IntegrityReport {
  const manifestBytes = files.get(BUNDLE_PATHS.manifest);
  const others = [...files.keys()].filter((path) => path !== BUNDLE_PATHS.manifest);

  if (manifestBytes === undefined) {
    mismatches.push({ kind: "manifest_invalid", path: BUNDLE_PATHS.manifest, message: "manifest.json is missing" });
    return {
      files_total: 0,
      files_verified: 0,
      missing_files: [BUNDLE_PATHS.manifest],
      extra_files: others,
      hash_mismatches: [],
      root_hash_valid: false,
      manifest_canonical: false,
    };
  }

  const parsed = parseManifest(manifestBytes);
  if (!parsed.ok) {
    for (const problem of parsed.error) {
      mismatches.push({ kind: "manifest_invalid", path: BUNDLE_PATHS.manifest, message: problem });
    }
    return {
      files_total: 0,
      files_verified: 0,
      missing_files: [],
      extra_files: others,
      hash_mismatches: [],
      root_hash_valid: false,
      manifest_canonical: false,
    };
  }

  const manifest = parsed.value;
  const listed = new Set(manifest.files.map((entry) => entry.path));
  const missing: string[] = [];
  const hashMismatches: HashMismatch[] = [];
  let verified = 0;

  for (const entry of manifest.files) {
    const content = files.get(entry.path);
    if (content === undefined) {
      missing.push(entry.path);
      mismatches.push({ kind: "missing_file", path: entry.path, message: `${entry.path} is listed but absent` });
      continue;
    }
    const digest = sha256Hex(content);
    if (digest !== entry.digest || content.byteLength !== entry.size_bytes) {
      hashMismatches.push({ path: entry.path, expected: entry.digest, actual: digest });
      mismatches.push({
        kind: "hash_mismatch",
        path: entry.path,
        message: `${entry.path} does not match its manifest entry`,
        expected: { digest: entry.digest, size_bytes: entry.size_bytes },
        actual: { digest, size_bytes: content.byteLength },
      });
      continue;
    }
    verified++;
  }

  const extra = others.filter((path) => !listed.has(path));
  for (const path of extra) {
    mismatches.push({ kind: "extra_file", path, message: `${path} is not listed in the manifest` });
  }

  const rootHash = computeRootHash(manifest.created_at, manifest.files);
  const rootHashValid = rootHash === manifest.root_hash;
  if (!rootHashValid) {
    mismatches.push({
      kind: "root_hash",
      path: BUNDLE_PATHS.manifest,
      message: "root_hash does not match the manifest entries",
      expected: manifest.root_hash,
      actual: rootHash,
    });
  }

  const canonical = isCanonicalManifest(manifestBytes, manifest);
  if (!canonical) {
    mismatches.push({
      kind: "manifest_noncanonical",
      path: BUNDLE_PATHS.manifest,
      message: "manifest.json is not in canonical form",
    });
  }

  return {
    files_total: manifest.files.length,
    files_verified: verified,
    missing_files: missing,
    extra_files: extra,
    hash_mismatches: hashMismatches,
    root_hash_valid: rootHashValid,
    manifest_canonical: canonical,
  };
}

// ---------------------------------------------------------------------------
// Reproduction
// ---------------------------------------------------------------------------

function parseJson(content: Buffer): unknown {
  return JSON.parse(content.toString("utf-8"));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

interface LeafDiff {
  readonly path: string;
  readonly recorded: unknown;
  readonly recomputed: unknown;
}

/**
 * Collect every leaf where `recorded` and `recomputed` disagree. Paths in
 * `skip` are compared by the caller.
 */
function diffLeaves(
  recorded: unknown,
  recomputed: unknown,
  path: string,
  tolerance: number,
  out: LeafDiff[],
  skip: ReadonlySet<string> = new Set()
): void {
  if (skip.has(path)) return;

  if (typeof recorded === "number" && typeof recomputed === "number") {
    if (Math.abs(recorded - recomputed) > tolerance * Math.max(1, Math.abs(recorded))) {
      out.push({ path, recorded, recomputed });
    }
    return;
  }
  if (Array.isArray(recorded) && Array.isArray(recomputed)) {
    if (recorded.length !== recomputed.length) {
      out.push({ path: `${path}.length`, recorded: recorded.length, recomputed: recomputed.length });
    }
    const shared = Math.min(recorded.length, recomputed.length);
    for (let i = 0; i < shared; i++) {
      diffLeaves(recorded[i], recomputed[i], `${path}[${i}]`, tolerance, out, skip);
    }
    return;
  }
  if (isRecord(recorded) && isRecord(recomputed)) {
    const keys = [...new Set([...Object.keys(recorded), ...Object.keys(recomputed)])].sort();
    for (const key of keys) {
      const childPath = `${path}.${key}`;
      if (!(key in recorded) || !(key in recomputed)) {
        if (!skip.has(childPath)) {
          out.push({ path: childPath, recorded: recorded[key] ?? null, recomputed: recomputed[key] ?? null });
        }
        continue;
      }
      diffLeaves(recorded[key], recomputed[key], childPath, tolerance, out, skip);
    }
    return;
  }
  if (recorded !== recomputed) {
    out.push({ path, recorded: recorded ?? null, recomputed: recomputed ?? null });
  }
}

/** Round-trip through canonical JSON so both sides have the same shape. */
function asWritten(value: unknown): unknown {
  return value === null ? null : JSON.parse(canonicalJson(value));
}

/**
 * Compare one embedded output file with its recomputed document and report
 * the first differing leaf.
 */
function compareOutput(
  files: ReadonlyMap<string, Buffer>,
  path: string,
  recomputed: unknown,
  tolerance: number,
  mismatches: Mismatch[]
): void {
  const content = files.get(path);
  if (content === undefined) return;

  let recorded: unknown;
  try {
    recorded = parseJson(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    mismatches.push({ kind: "output_field", path, field: "$", message: `${path} is not valid JSON: ${message}` });
    return;
  }

  const diffs: LeafDiff[] = [];
  diffLeaves(recorded, recomputed, "$", tolerance, diffs);
  const first = diffs[0];
  if (first === undefined) return;

  const more = diffs.length > 1 ? ` (${diffs.length} differences)` : "";
  mismatches.push({
    kind: "output_field",
    path,
    field: first.path,
    message: `${first.path} differs from the recomputed value${more}`,
    expected: first.recorded,
    actual: first.recomputed,
  });
}

function stringSet(value: unknown): Set<string> {
  const items: unknown[] = Array.isArray(value) ? value : [];
  return new Set(items.filter((item): item is string => typeof item === "string"));
}

function sameSet(a: Set<string>, b: Set<string>): boolean {
  return a.size === b.size && [...a].every((item) => b.has(item));
}

function readJobInputs(
  read: (path: string) => Buffer
): Result<{ job: z.infer<typeof JobDescriptorSchema>; recorded: unknown }, string> {
  try {
    const job = JobDescriptorSchema.parse(parseJson(read(BUNDLE_PATHS.job)));
    const recorded = parseJson(read(BUNDLE_PATHS.decision));
    return ok({ job, recorded });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return err(`Cannot read job inputs: ${message}`);
  }
}

const DECISION_COMPARED_SEPARATELY: ReadonlySet<string> = new Set(["$.outcome", "$.reasons"]);

function reproduce(
  files: ReadonlyMap<string, Buffer>,
  options: VerifyOptions,
  mismatches: Mismatch[]
): Decision | null {
  const needed = [
    BUNDLE_PATHS.rawData,
    BUNDLE_PATHS.job,
    BUNDLE_PATHS.submittedSpecification,
    BUNDLE_PATHS.decision,
  ];
  const absent = needed.filter((path) => !files.has(path));
  if (absent.length > 0) {
    mismatches.push({
      kind: "recompute_failed",
      path: absent[0],
      message: `Cannot recompute: missing ${absent.join(", ")}`,
    });
    return null;
  }

  const read = (path: string): Buffer => files.get(path) ?? Buffer.alloc(0);

  const inputs = readJobInputs(read);
  if (!inputs.ok) {
    mismatches.push({ kind: "recompute_failed", path: BUNDLE_PATHS.job, message: inputs.error });
    return null;
  }
  const { job, recorded } = inputs.value;

  const evaluation = evaluateJob(
    {
      rawData: read(BUNDLE_PATHS.rawData),
      specification: read(BUNDLE_PATHS.submittedSpecification),
      industry: job.industry ?? undefined,
      declaredTimezone: job.declared_timezone ?? undefined,
      declaredUnits: job.declared_units ?? undefined,
    },
    { config: job.config, logger: options.logger, aliasTable: options.aliasTable }
  );
  const { decision } = evaluation;
  const tolerance = job.config.verifyNumericTolerance;

  const recordedRecord: Record<string, unknown> = isRecord(recorded) ? recorded : {};

  if (recordedRecord.outcome !== decision.outcome) {
    mismatches.push({
      kind: "decision_field",
      path: "$.outcome",
      message: "Recorded outcome differs from the recomputed outcome",
      expected: recordedRecord.outcome ?? null,
      actual: decision.outcome,
    });
  }

  const recordedReasons = stringSet(recordedRecord.reasons);
  const recomputedReasons = new Set<string>(decision.reasons);
  if (!sameSet(recordedReasons, recomputedReasons)) {
    mismatches.push({
      kind: "decision_field",
      path: "$.reasons",
      message: "Recorded reasons differ from the recomputed reasons",
      expected: [...recordedReasons].sort(),
      actual: [...recomputedReasons].sort(),
    });
  }

  const decisionDiffs: LeafDiff[] = [];
  diffLeaves(recorded, asWritten(decision), "$", tolerance, decisionDiffs, DECISION_COMPARED_SEPARATELY);
  for (const diff of decisionDiffs) {
    mismatches.push({
      kind: "decision_field",
      path: diff.path,
      message: `${diff.path} differs from the recomputed value`,
      expected: diff.recorded,
      actual: diff.recomputed,
    });
  }

  const series = evaluation.series === null ? null : seriesDocument(evaluation.series);
  compareOutput(files, BUNDLE_PATHS.series, asWritten(series), tolerance, mismatches);
  compareOutput(files, BUNDLE_PATHS.specification, asWritten(evaluation.specification), tolerance, mismatches);
  compareOutput(files, BUNDLE_PATHS.metrics, asWritten(evaluation.metrics), tolerance, mismatches);

  return decision;
}

/**
 * Verify a bundle's integrity and re-derive its decision.
 */
export function verifyBundle(bundle: EvidenceBundle, options: VerifyOptions = {}): VerificationReport {
  const log = (options.logger ?? createSilentLogger()).child({ component: "verifier" });
  const files = new Map<string, Buffer>(bundle.files.map((file: BundleFile) => [file.path, file.content]));
  const mismatches: Mismatch[] = [];

  const integrity = checkIntegrity(files, mismatches);
  const recomputed = reproduce(files, options, mismatches);

  const match = mismatches.length === 0;
  log.info("Bundle verified", {
    match,
    filesVerified: integrity.files_verified,
    filesTotal: integrity.files_total,
    mismatches: mismatches.length,
  });

  return { match, integrity, recomputed_decision: recomputed, mismatches };
}

/**
 * Sensor log normalizer.
 *
 * Turns raw CSV bytes into a NormalizedSeries: UTC epoch-ms timestamps,
 * strictly increasing, canonical units, gaps filled at the canonical cadence.
 * Any fatal defect yields a DataQualityError listing every issue found at the
 * failing step; non-fatal findings travel with the series as warnings.
 */

import type { PipelineConfig } from "../config/pipeline/index.js";
import {
  DataQualityError,
  err,
  ok,
  type DataQualityIssue,
  type Result,
} from "../errors/index.js";
import { createSilentLogger, type Logger } from "../logging/index.js";
import {
  warning,
  type NormalizedSeries,
  type PipelineWarning,
  type Sample,
} from "../types/index.js";
import { deepFreeze } from "../utils/freeze.js";
import { parseCsv, type CsvRow } from "./csv.js";
import { detectColumns, type ColumnAliasTable, type ColumnBinding } from "./columns.js";
import { gridSize, medianIntervalMs, resampleStepHold } from "./resample.js";
import { parseTimestampColumn, resolveZone } from "./timestamps.js";
import { toCanonical } from "./units.js";

export interface NormalizeOptions {
  config: PipelineConfig;
  /** Zone for timestamps without an offset; falls back to `# timezone:` metadata */
  declaredTimezone?: string;
  /** Temperature unit for untagged columns; falls back to `# units:` metadata */
  declaredUnits?: string;
  /** Largest acceptable interval between samples, seconds */
  allowedGapS?: number;
  /** Expected maximum sampling period, seconds */
  maxSamplePeriodS?: number;
  logger?: Logger;
  aliasTable?: ColumnAliasTable;
}

const MISSING_MARKERS = new Set(["", "na", "n/a", "nan", "null", "none", "-"]);
const NUMBER = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

const MAX_LISTED_DUPLICATES = 5;

interface TimedRow {
  t: number;
  line: number;
  values: Record<string, number | null>;
}

function fail(issues: DataQualityIssue[]): Result<never, DataQualityError> {
  return err(new DataQualityError(issues));
}

function metadataValue(
  metadata: Readonly<Record<string, string>>,
  ...keys: string[]
): string | undefined {
  for (const key of keys) {
    if (Object.hasOwn(metadata, key) && metadata[key] !== "") return metadata[key];
  }
  return undefined;
}

function iso(t: number): string {
  return new Date(t).toISOString();
}

function readValues(
  rows: readonly CsvRow[],
  bindings: readonly ColumnBinding[],
  warnings: PipelineWarning[]
): Record<string, number | null>[] {
  const missing: Record<string, number> = {};
  const nonNumeric: Record<string, number> = {};
  for (const { channel } of bindings) {
    missing[channel.name] = 0;
    nonNumeric[channel.name] = 0;
  }

  const out = rows.map((row) => {
    const values: Record<string, number | null> = {};
    for (const { index, channel } of bindings) {
      const cell = row.cells[index].trim();
      if (MISSING_MARKERS.has(cell.toLowerCase())) {
        values[channel.name] = null;
        missing[channel.name]++;
      } else if (NUMBER.test(cell)) {
        values[channel.name] = toCanonical(Number(cell), channel.sourceUnit);
      } else {
        values[channel.name] = null;
        missing[channel.name]++;
        nonNumeric[channel.name]++;
      }
    }
    return values;
  });

  for (const { channel } of bindings) {
    const name = channel.name;
    if (nonNumeric[name] > 0) {
      warnings.push(
        warning(
          "parser",
          "NON_NUMERIC_VALUE",
          `${nonNumeric[name]} non-numeric value(s) in column "${channel.sourceColumn}" treated as missing`,
          { sensor: name, count: nonNumeric[name] }
        )
      );
    }
    if (missing[name] > 0) {
      warnings.push(
        warning(
          "quality",
          "MISSING_VALUES",
          `${missing[name]} of ${rows.length} readings missing for sensor "${name}"`,
          { sensor: name, count: missing[name], rows: rows.length }
        )
      );
    }
  }

  return out;
}

function sortRows(rows: TimedRow[], warnings: PipelineWarning[]): TimedRow[] {
  let inversions = 0;
  for (let i = 1; i < rows.length; i++) {
    if (rows[i].t < rows[i - 1].t) inversions++;
  }
  if (inversions === 0) return rows;

  warnings.push(
    warning(
      "quality",
      "OUT_OF_ORDER_ROWS",
      `${inversions} row(s) out of timestamp order; rows sorted`,
      { count: inversions }
    )
  );
  return [...rows].sort((a, b) => a.t - b.t);
}

function mergeGroup(group: readonly TimedRow[], sensors: readonly string[]): TimedRow {
  const values: Record<string, number | null> = {};
  for (const sensor of sensors) {
    let sum = 0;
    let n = 0;
    for (const row of group) {
      const value = row.values[sensor];
      if (value !== null) {
        sum += value;
        n++;
      }
    }
    values[sensor] = n > 0 ? sum / n : null;
  }
  return { t: group[0].t, line: group[0].line, values };
}

function resolveDuplicates(
  rows: readonly TimedRow[],
  sensors: readonly string[],
  policy: PipelineConfig["duplicatePolicy"],
  warnings: PipelineWarning[]
): Result<TimedRow[], DataQualityError> {
  const groups: TimedRow[][] = [];
  for (const row of rows) {
    const current = groups[groups.length - 1];
    if (current !== undefined && current[0].t === row.t) {
      current.push(row);
    } else {
      groups.push([row]);
    }
  }

  const duplicated = groups.filter((group) => group.length > 1);
  if (duplicated.length === 0) return ok([...rows]);

  const extraRows = duplicated.reduce((sum, group) => sum + group.length - 1, 0);

  if (policy === "error") {
    const listed = duplicated.slice(0, MAX_LISTED_DUPLICATES).map((group) => ({
      timestamp: iso(group[0].t),
      lines: group.map((row) => row.line),
    }));
    return fail([
      {
        code: "DUPLICATE_TIMESTAMPS",
        message: `${duplicated.length} timestamp(s) appear more than once (first: ${listed[0].timestamp})`,
        detail: { timestamps: duplicated.length, extraRows, examples: listed },
      },
    ]);
  }

  warnings.push(
    warning(
      "quality",
      "DUPLICATES_RESOLVED",
      `${extraRows} duplicate row(s) over ${duplicated.length} timestamp(s) resolved by ${policy}`,
      { policy, timestamps: duplicated.length, extraRows }
    )
  );

  return ok(
    groups.map((group) =>
      group.length === 1 || policy === "first-wins" ? group[0] : mergeGroup(group, sensors)
    )
  );
}

function checkGaps(
  times: readonly number[],
  options: NormalizeOptions,
  warnings: PipelineWarning[]
): DataQualityIssue[] {
  const issues: DataQualityIssue[] = [];
  const over = (limitS: number): { count: number; maxS: number } => {
    let count = 0;
    let maxS = 0;
    for (let i = 1; i < times.length; i++) {
      const gapS = (times[i] - times[i - 1]) / 1000;
      if (gapS > limitS) {
        count++;
        maxS = Math.max(maxS, gapS);
      }
    }
    return { count, maxS };
  };

  if (options.allowedGapS !== undefined) {
    const { count, maxS } = over(options.allowedGapS);
    if (count > 0) {
      const message = `${count} gap(s) exceed the allowed ${options.allowedGapS} s (largest ${maxS} s)`;
      const detail = { count, largestS: maxS, allowedS: options.allowedGapS };
      if (options.config.gapPolicy === "error") {
        issues.push({ code: "GAP_EXCEEDS_ALLOWED", message, detail });
      } else {
        warnings.push(warning("quality", "GAP_EXCEEDS_ALLOWED", message, detail));
      }
    }
  }

  if (options.maxSamplePeriodS !== undefined) {
    const { count, maxS } = over(options.maxSamplePeriodS);
    if (count > 0) {
      warnings.push(
        warning(
          "quality",
          "SAMPLE_PERIOD_EXCEEDED",
          `${count} interval(s) exceed the maximum sample period of ${options.maxSamplePeriodS} s (largest ${maxS} s)`,
          { count, largestS: maxS, maxSamplePeriodS: options.maxSamplePeriodS }
        )
      );
    }
  }

  return issues;
}

/**
 * Normalize a raw sensor log.
 */
export function normalize(
  raw: Uint8Array | string,
  options: NormalizeOptions
): Result<NormalizedSeries, DataQualityError> {
  const { config } = options;
  const logger = (options.logger ?? createSilentLogger()).child({ component: "normalizer" });
  const warnings: PipelineWarning[] = [];

  const byteLength = typeof raw === "string" ? Buffer.byteLength(raw, "utf-8") : raw.byteLength;
  if (byteLength > config.maxInputBytes) {
    return fail([
      {
        code: "INPUT_TOO_LARGE",
        message: `Input is ${byteLength} bytes; the limit is ${config.maxInputBytes}`,
        detail: { bytes: byteLength, limit: config.maxInputBytes },
      },
    ]);
  }

  const text = typeof raw === "string" ? raw : new TextDecoder("utf-8").decode(raw);
  const parsed = parseCsv(text);
  if (!parsed.ok) return parsed;
  const doc = parsed.value;

  const declaredTimezone = options.declaredTimezone ?? metadataValue(doc.metadata, "timezone", "tz");
  const declaredUnits = options.declaredUnits ?? metadataValue(doc.metadata, "units", "unit");

  const layout = detectColumns(doc.header, declaredUnits, options.aliasTable);
  if (!layout.ok) return layout;
  const { bindings, timestampIndex } = layout.value;
  for (const column of layout.value.unrecognized) {
    warnings.push(
      warning("parser", "UNRECOGNIZED_COLUMN", `Column "${column}" ignored: not a known sensor column`, {
        column,
      })
    );
  }

  const zoneName = declaredTimezone ?? config.defaultTimezone;
  const zone = resolveZone(zoneName);
  if (zone === null) {
    return fail([
      {
        code: "UNKNOWN_TIMEZONE",
        message: `Unknown timezone "${zoneName}"`,
        detail: { timezone: zoneName, declared: declaredTimezone !== undefined },
      },
    ]);
  }

  const stamps = parseTimestampColumn(
    doc.rows.map((row) => ({ line: row.line, text: row.cells[timestampIndex] })),
    { zone, zoneAssumed: declaredTimezone === undefined, dateOrder: config.dateOrder }
  );
  if (!stamps.ok) return stamps;
  warnings.push(...stamps.value.warnings);

  const values = readValues(doc.rows, bindings, warnings);
  const sensors = bindings.map((binding) => binding.channel.name);
  const timed: TimedRow[] = doc.rows.map((row, i) => ({
    t: stamps.value.times[i],
    line: row.line,
    values: values[i],
  }));

  const sorted = sortRows(timed, warnings);
  const deduped = resolveDuplicates(sorted, sensors, config.duplicatePolicy, warnings);
  if (!deduped.ok) return deduped;
  const rows = deduped.value;

  if (rows.length < config.minDistinctPoints) {
    return fail([
      {
        code: "INSUFFICIENT_DATA_POINTS",
        message: `insufficient data points: ${rows.length} distinct timestamp(s), at least ${config.minDistinctPoints} required`,
        detail: { distinct: rows.length, required: config.minDistinctPoints },
      },
    ]);
  }
  if (rows.length > config.maxPoints) {
    return fail([
      {
        code: "TOO_MANY_POINTS",
        message: `${rows.length} data points exceed the limit of ${config.maxPoints}`,
        detail: { points: rows.length, limit: config.maxPoints },
      },
    ]);
  }

  const times = rows.map((row) => row.t);
  const gapIssues = checkGaps(times, options, warnings);
  if (gapIssues.length > 0) return fail(gapIssues);

  const stepMs = config.resampleStepS !== null ? config.resampleStepS * 1000 : medianIntervalMs(times);
  const grid = gridSize(times, stepMs);
  if (grid > config.maxPoints) {
    return fail([
      {
        code: "TOO_MANY_POINTS",
        message: `Resampling at ${stepMs / 1000} s would produce ${grid} points; the limit is ${config.maxPoints}`,
        detail: { points: grid, limit: config.maxPoints, stepS: stepMs / 1000 },
      },
    ]);
  }

  const samples: Sample[] = rows.map((row) => ({ t: row.t, values: row.values }));
  const resampled = resampleStepHold(samples, sensors, stepMs);
  if (resampled.samples.length > config.maxPoints) {
    return fail([
      {
        code: "TOO_MANY_POINTS",
        message: `Filling gaps at ${stepMs / 1000} s would produce ${resampled.samples.length} points; the limit is ${config.maxPoints}`,
        detail: { points: resampled.samples.length, limit: config.maxPoints, stepS: stepMs / 1000 },
      },
    ]);
  }
  if (resampled.resampled) {
    warnings.push(
      warning(
        "resample",
        "RESAMPLED",
        `Series resampled to ${stepMs / 1000} s cadence: ${samples.length} samples in, ${resampled.samples.length} out, ${resampled.offGrid} off-grid`,
        {
          stepS: stepMs / 1000,
          inputSamples: samples.length,
          outputSamples: resampled.samples.length,
          offGrid: resampled.offGrid,
          filled: resampled.filled,
        }
      )
    );
  }

  if (config.failOnParserWarnings) {
    const blocking = warnings.filter((w) => w.source === "parser");
    if (blocking.length > 0) {
      return fail(
        blocking.map((w) => ({
          code: "PARSER_WARNING",
          message: `${w.code}: ${w.message}`,
          detail: { warning: w.code },
        }))
      );
    }
  }

  const series: NormalizedSeries = {
    samples: resampled.samples,
    channels: bindings.map((binding) => binding.channel),
    cadenceS: stepMs / 1000,
    resampled: resampled.resampled,
    timezone: stamps.value.usedZone ? zone.label : "UTC",
    metadata: { ...doc.metadata },
    sourceRowCount: doc.rows.length,
    warnings,
  };

  logger.debug("Series normalized", {
    samples: series.samples.length,
    channels: sensors,
    cadenceS: series.cadenceS,
    warnings: warnings.map((w) => w.code),
  });

  return ok(deepFreeze(series));
}

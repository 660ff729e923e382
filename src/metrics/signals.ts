/**
 * Signal resolution and per-sample sensor combination.
 */

import { err, ok, RequiredSignalMissingError, type Result } from "../errors/index.js";
import type { SensorSelectionMode, Specification } from "../specification/index.js";
import { warning, type NormalizedSeries, type PipelineWarning, type Sample } from "../types/index.js";

export interface SignalNeeds {
  pressure: boolean;
  humidity: boolean;
}

export interface ResolvedSignals {
  readonly temperature: readonly string[];
  readonly pressure: readonly string[];
  readonly humidity: readonly string[];
}

function globToRegExp(pattern: string): RegExp {
  const escaped = pattern
    .toLowerCase()
    .split("*")
    .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, "\\$&"))
    .join(".*");
  return new RegExp(`^${escaped}$`);
}

/**
 * Match a selection entry (exact name or `*` glob) against channel names.
 * Names are compared case-insensitively.
 */
export function matchSensors(entry: string, names: readonly string[]): string[] {
  if (!entry.includes("*")) {
    const wanted = entry.toLowerCase();
    return names.filter((name) => name === wanted);
  }
  const pattern = globToRegExp(entry);
  return names.filter((name) => pattern.test(name));
}

/**
 * Decide which channels feed the calculators.
 *
 * Temperature: the listed `sensor_selection.sensors` (every entry must match)
 * or all temperature channels. Pressure and humidity: all channels of that
 * kind, when the industry needs them.
 */
export function resolveSignals(
  series: NormalizedSeries,
  spec: Specification,
  needs: SignalNeeds
): Result<ResolvedSignals, RequiredSignalMissingError> {
  const available = series.channels.map((channel) => channel.name);
  const ofKind = (kind: string): string[] =>
    series.channels.filter((channel) => channel.kind === kind).map((channel) => channel.name);

  const temperatureNames = ofKind("temperature");
  const required: string[] = [];
  const missing: string[] = [];

  let temperature: string[];
  const listed = spec.sensor_selection.sensors;
  if (listed !== undefined) {
    const selected = new Set<string>();
    for (const entry of listed) {
      required.push(entry);
      const matches = matchSensors(entry, temperatureNames);
      if (matches.length === 0) missing.push(entry);
      for (const name of matches) selected.add(name);
    }
    temperature = temperatureNames.filter((name) => selected.has(name));
  } else {
    required.push("temperature");
    temperature = temperatureNames;
    if (temperature.length === 0) missing.push("temperature");
  }

  const atLeast = spec.sensor_selection.require_at_least;
  if (atLeast !== undefined && temperature.length < atLeast && missing.length === 0) {
    missing.push(`${atLeast - temperature.length} more temperature sensor(s) (require_at_least ${atLeast})`);
  }

  for (const signal of spec.required_signals) {
    required.push(signal);
    if (!available.includes(signal.toLowerCase())) missing.push(signal);
  }

  const pressure = needs.pressure ? ofKind("pressure") : [];
  if (needs.pressure) {
    required.push("pressure");
    if (pressure.length === 0) missing.push("pressure");
  }

  const humidity = needs.humidity ? ofKind("humidity") : [];
  if (needs.humidity) {
    required.push("humidity");
    if (humidity.length === 0) missing.push("humidity");
  }

  if (missing.length > 0) {
    return err(
      new RequiredSignalMissingError({ industry: spec.industry, required, missing, available })
    );
  }

  return ok({ temperature, pressure, humidity });
}

// ═══════════════════════════════════════════════════════════════════════════
// COMBINATION
// ═══════════════════════════════════════════════════════════════════════════

/** Readings of `sensors` at one sample, missing values dropped. */
export function readingsAt(sample: Sample, sensors: readonly string[]): number[] {
  const out: number[] = [];
  for (const sensor of sensors) {
    const value = sample.values[sensor];
    if (value !== null && value !== undefined) out.push(value);
  }
  return out;
}

/**
 * Combine one sample's readings.
 *
 * majority_over_threshold: when more than half the readings are at or above
 * `threshold`, the lowest of those; otherwise the highest reading.
 */
export function combineReadings(
  readings: readonly number[],
  mode: SensorSelectionMode,
  threshold: number
): number {
  switch (mode) {
    case "min_of_set":
      return Math.min(...readings);
    case "mean_of_set":
      return readings.reduce((sum, value) => sum + value, 0) / readings.length;
    case "majority_over_threshold": {
      const above = readings.filter((value) => value >= threshold);
      return above.length > readings.length / 2 ? Math.min(...above) : Math.max(...readings);
    }
  }
}

export interface CombinedSeries {
  /** Epoch ms */
  readonly t: number[];
  readonly v: number[];
  /** Index into series.samples for each kept point */
  readonly sampleIndex: number[];
  readonly dropped: number;
}

export function combineSeries(
  samples: readonly Sample[],
  sensors: readonly string[],
  reduce: (readings: number[]) => number
): CombinedSeries {
  const t: number[] = [];
  const v: number[] = [];
  const sampleIndex: number[] = [];
  let dropped = 0;
  samples.forEach((sample, i) => {
    const readings = readingsAt(sample, sensors);
    if (readings.length === 0) {
      dropped++;
      return;
    }
    t.push(sample.t);
    v.push(reduce(readings));
    sampleIndex.push(i);
  });
  return { t, v, sampleIndex, dropped };
}

/**
 * Combined temperature series per the specification's selection mode.
 *
 * Fewer than two usable samples is reported as a missing signal.
 */
export function temperatureSeries(
  series: NormalizedSeries,
  spec: Specification,
  sensors: readonly string[],
  threshold: number,
  warnings: PipelineWarning[]
): Result<CombinedSeries, RequiredSignalMissingError> {
  const mode = spec.sensor_selection.mode;
  const combined = combineSeries(series.samples, sensors, (readings) =>
    combineReadings(readings, mode, threshold)
  );

  if (combined.dropped > 0) {
    warnings.push(
      warning(
        "metrics",
        "SAMPLES_WITHOUT_READING",
        `${combined.dropped} sample(s) had no temperature reading and were excluded`,
        { count: combined.dropped, sensors: [...sensors] }
      )
    );
  }

  if (combined.t.length < 2) {
    return err(
      new RequiredSignalMissingError({
        industry: spec.industry,
        required: [...sensors],
        missing: [`temperature readings (${combined.t.length} usable sample(s))`],
        available: series.channels.map((channel) => channel.name),
      })
    );
  }

  return ok(combined);
}

/** Lowest reading of `sensors` per sample, null when none. */
export function minReadingAt(sample: Sample, sensors: readonly string[]): number | null {
  const readings = readingsAt(sample, sensors);
  return readings.length === 0 ? null : Math.min(...readings);
}

/** Highest reading of `sensors` per sample, null when none. */
export function maxReadingAt(sample: Sample, sensors: readonly string[]): number | null {
  const readings = readingsAt(sample, sensors);
  return readings.length === 0 ? null : Math.max(...readings);
}

/** Highest single reading of any of `sensors` across the series. */
export function seriesMaximum(samples: readonly Sample[], sensors: readonly string[]): number | null {
  let max: number | null = null;
  for (const sample of samples) {
    const value = maxReadingAt(sample, sensors);
    if (value !== null && (max === null || value > max)) max = value;
  }
  return max;
}

/**
 * Dry-heat / gas sterilization exposure.
 *
 *   threshold = min_temp_C + u, no hysteresis
 *   exposure  = hold per logic.hold_mode, at least exposure_h
 *   maximum   = highest single reading <= max_temp_C, ambiguous within u
 *   humidity  = lowest reading during the longest hold (the whole series
 *               when there is none) >= min_humidity_pct, when set
 */

import { ok, type RequiredSignalMissingError, type Result } from "../errors/index.js";
import type { SterileSpecification } from "../specification/index.js";
import type { NormalizedSeries, PipelineWarning } from "../types/index.js";
import { evaluateCheck } from "./checks.js";
import { holdIntervals, holdSeconds, longestInterval, maxOf, summarizeIntervals } from "./hold.js";
import { minReadingAt, resolveSignals, seriesMaximum, temperatureSeries } from "./signals.js";
import type { RequirementCheck, SterileMetrics } from "./types.js";

export function sterileThreshold(spec: SterileSpecification): number {
  return spec.parameters.min_temp_C + spec.parameters.sensor_uncertainty_C;
}

export function calculateSterile(
  series: NormalizedSeries,
  spec: SterileSpecification
): Result<SterileMetrics, RequiredSignalMissingError> {
  const p = spec.parameters;
  const warnings: PipelineWarning[] = [];
  const needsHumidity = p.min_humidity_pct !== undefined;

  const signals = resolveSignals(series, spec, { pressure: false, humidity: needsHumidity });
  if (!signals.ok) return signals;

  const threshold = sterileThreshold(spec);
  const combined = temperatureSeries(series, spec, signals.value.temperature, threshold, warnings);
  if (!combined.ok) return combined;
  const { t, v, sampleIndex } = combined.value;

  const intervals = holdIntervals(t, v, threshold, 0);
  const holdS = holdSeconds(intervals, spec.logic.hold_mode, spec.logic.max_total_dips_s);
  const maxTempC = seriesMaximum(series.samples, signals.value.temperature) ?? maxOf(v);

  const checks: RequirementCheck[] = [
    evaluateCheck(
      {
        id: "exposure_time",
        label: "Exposure at or above minimum temperature",
        comparator: ">=",
        limit: p.exposure_h * 3600,
        unit: "s",
        reason: "EXPOSURE_TIME_INSUFFICIENT",
        ambiguousReason: "HOLD_TIME_WITHIN_UNCERTAINTY",
      },
      holdS
    ),
    evaluateCheck(
      {
        id: "over_temperature",
        label: "Maximum temperature",
        comparator: "<=",
        limit: p.max_temp_C,
        unit: "C",
        reason: "OVER_TEMPERATURE",
        ambiguousReason: "TEMPERATURE_WITHIN_UNCERTAINTY",
      },
      maxTempC,
      maxTempC + p.sensor_uncertainty_C
    ),
  ];

  let minHumidity: number | null = null;
  if (p.min_humidity_pct !== undefined) {
    const longest = longestInterval(intervals);
    const from = longest === null ? 0 : sampleIndex[longest.startIndex];
    const to = longest === null ? series.samples.length - 1 : sampleIndex[longest.endIndex];
    for (let i = from; i <= to; i++) {
      const value = minReadingAt(series.samples[i], signals.value.humidity);
      if (value !== null && (minHumidity === null || value < minHumidity)) minHumidity = value;
    }
    checks.push(
      evaluateCheck(
        {
          id: "humidity",
          label: "Minimum humidity during exposure",
          comparator: ">=",
          limit: p.min_humidity_pct,
          unit: "%RH",
          reason: "HUMIDITY_BELOW_MINIMUM",
          ambiguousReason: "HUMIDITY_BELOW_MINIMUM",
        },
        minHumidity
      )
    );
  }

  const result: SterileMetrics = {
    industry: "sterile",
    values: {
      thresholdC: threshold,
      holdMode: spec.logic.hold_mode,
      holdS,
      intervals: summarizeIntervals(intervals),
      maxTempC,
      minHumidityPct: minHumidity,
      samples: t.length,
    },
    checks,
    sensors: signals.value.temperature,
    warnings,
  };
  return ok(result);
}

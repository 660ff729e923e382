/**
 * Powder coating cure.
 *
 * The part must stay at or above the cure threshold for the hold time. The
 * threshold already includes the sensor uncertainty (target + u), so the
 * hold and threshold checks have no ambiguous band; only the optional
 * band maximum does.
 *
 * Method:
 *   threshold   = target_temp_C + sensor_uncertainty_C
 *   hold        = longest hysteresis interval (continuous) or the sum of
 *                 intervals less excess dips (cumulative)
 *   ramp rate   = maximum centered difference, °C/min
 *   time to thr = first sample >= threshold, from the first sample
 */

import { ok, type RequiredSignalMissingError, type Result } from "../errors/index.js";
import type { PowderSpecification } from "../specification/index.js";
import type { NormalizedSeries, PipelineWarning } from "../types/index.js";
import { evaluateCheck } from "./checks.js";
import {
  centeredRates,
  holdIntervals,
  holdSeconds,
  maxOf,
  minOf,
  summarizeIntervals,
  timeToThresholdS,
} from "./hold.js";
import { resolveSignals, temperatureSeries } from "./signals.js";
import type { PowderMetrics, RequirementCheck } from "./types.js";

export function powderThreshold(spec: PowderSpecification): number {
  return spec.parameters.target_temp_C + spec.parameters.sensor_uncertainty_C;
}

export function calculatePowder(
  series: NormalizedSeries,
  spec: PowderSpecification
): Result<PowderMetrics, RequiredSignalMissingError> {
  const p = spec.parameters;
  const warnings: PipelineWarning[] = [];

  const signals = resolveSignals(series, spec, { pressure: false, humidity: false });
  if (!signals.ok) return signals;

  const threshold = powderThreshold(spec);
  const combined = temperatureSeries(series, spec, signals.value.temperature, threshold, warnings);
  if (!combined.ok) return combined;
  const { t, v } = combined.value;

  const intervals = holdIntervals(t, v, threshold, p.hysteresis_C);
  const holdS = holdSeconds(intervals, spec.logic.hold_mode, spec.logic.max_total_dips_s);
  const maxTempC = maxOf(v);
  const maxRampRate = maxOf(centeredRates(t, v, 60_000));
  const tts = timeToThresholdS(t, v, threshold);

  const checks: RequirementCheck[] = [
    evaluateCheck(
      {
        id: "threshold_reached",
        label: "Cure threshold reached",
        comparator: ">=",
        limit: threshold,
        unit: "C",
        reason: "THRESHOLD_NEVER_REACHED",
        ambiguousReason: "THRESHOLD_WITHIN_UNCERTAINTY",
      },
      maxTempC
    ),
    evaluateCheck(
      {
        id: "hold_time",
        label: `${spec.logic.hold_mode === "cumulative" ? "Cumulative" : "Continuous"} hold at or above threshold`,
        comparator: ">=",
        limit: p.hold_time_s,
        unit: "s",
        reason: "HOLD_TIME_INSUFFICIENT",
        ambiguousReason: "HOLD_TIME_WITHIN_UNCERTAINTY",
      },
      holdS
    ),
  ];

  if (p.max_ramp_rate_C_per_min !== undefined) {
    checks.push(
      evaluateCheck(
        {
          id: "ramp_rate",
          label: "Maximum heating rate",
          comparator: "<=",
          limit: p.max_ramp_rate_C_per_min,
          unit: "C/min",
          reason: "RAMP_RATE_EXCEEDED",
          ambiguousReason: "RAMP_RATE_EXCEEDED",
        },
        maxRampRate
      )
    );
  }

  if (p.max_time_to_threshold_s !== undefined) {
    checks.push(
      evaluateCheck(
        {
          id: "time_to_threshold",
          label: "Time to reach threshold",
          comparator: "<=",
          limit: p.max_time_to_threshold_s,
          unit: "s",
          reason: "TIME_TO_THRESHOLD_EXCEEDED",
          ambiguousReason: "TIME_TO_THRESHOLD_EXCEEDED",
        },
        tts
      )
    );
  }

  if (p.temp_band_C !== undefined) {
    checks.push(
      evaluateCheck(
        {
          id: "band_maximum",
          label: "Temperature within band maximum",
          comparator: "<=",
          limit: p.temp_band_C.max,
          unit: "C",
          reason: "TEMPERATURE_ABOVE_BAND",
          ambiguousReason: "TEMPERATURE_WITHIN_UNCERTAINTY",
        },
        maxTempC,
        maxTempC + p.sensor_uncertainty_C
      )
    );
  }

  const result: PowderMetrics = {
    industry: "powder",
    values: {
      targetC: p.target_temp_C,
      thresholdC: threshold,
      hysteresisC: p.hysteresis_C,
      holdMode: spec.logic.hold_mode,
      holdS,
      intervals: summarizeIntervals(intervals),
      maxTempC,
      minTempC: minOf(v),
      maxRampRateCPerMin: maxRampRate,
      timeToThresholdS: tts,
      samples: t.length,
    },
    checks,
    sensors: signals.value.temperature,
    warnings,
  };
  return ok(result);
}

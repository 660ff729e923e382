/**
 * Steam autoclave sterilization.
 *
 * Method:
 *   F0           = Σ Δt_min × (L(Tᵢ₋₁) + L(Tᵢ)) / 2, L(T) = 10^((T - T_ref) / z)
 *                  (trapezoidal rule over lethal rates); the conservative F0
 *                  uses T - u
 *   hold         = time at or above sterilization - tolerance + u, with
 *                  hysteresis_C
 *   over-temp    = highest single reading <= sterilization + tolerance,
 *                  ambiguous within u
 *   pressure     = lowest / highest reading during the longest hold (the
 *                  whole cycle when there is no hold)
 */

import { ok, type RequiredSignalMissingError, type Result } from "../errors/index.js";
import type { AutoclaveSpecification } from "../specification/index.js";
import type { NormalizedSeries, PipelineWarning } from "../types/index.js";
import { evaluateCheck } from "./checks.js";
import {
  holdIntervals,
  holdSeconds,
  longestInterval,
  maxOf,
  summarizeIntervals,
} from "./hold.js";
import {
  maxReadingAt,
  minReadingAt,
  resolveSignals,
  seriesMaximum,
  temperatureSeries,
} from "./signals.js";
import type { AutoclaveMetrics, RequirementCheck } from "./types.js";

export function lethalRate(tempC: number, referenceC: number, zC: number): number {
  return Math.pow(10, (tempC - referenceC) / zC);
}

/**
 * Accumulated lethality in minutes at the reference temperature.
 */
export function f0Trapezoid(
  t: readonly number[],
  v: readonly number[],
  referenceC: number,
  zC: number,
  offsetC = 0
): number {
  let f0 = 0;
  for (let i = 1; i < v.length; i++) {
    const dtMin = (t[i] - t[i - 1]) / 60_000;
    const a = lethalRate(v[i - 1] + offsetC, referenceC, zC);
    const b = lethalRate(v[i] + offsetC, referenceC, zC);
    f0 += (dtMin * (a + b)) / 2;
  }
  return f0;
}

export function autoclaveHoldThreshold(spec: AutoclaveSpecification): number {
  const p = spec.parameters;
  return p.sterilization_temp_C - p.temp_tolerance_C + p.sensor_uncertainty_C;
}

export function calculateAutoclave(
  series: NormalizedSeries,
  spec: AutoclaveSpecification
): Result<AutoclaveMetrics, RequiredSignalMissingError> {
  const p = spec.parameters;
  const warnings: PipelineWarning[] = [];

  const signals = resolveSignals(series, spec, { pressure: p.require_pressure, humidity: false });
  if (!signals.ok) return signals;

  const threshold = autoclaveHoldThreshold(spec);
  const combined = temperatureSeries(series, spec, signals.value.temperature, threshold, warnings);
  if (!combined.ok) return combined;
  const { t, v, sampleIndex } = combined.value;

  const f0 = f0Trapezoid(t, v, p.reference_temp_C, p.z_value_C);
  const f0Conservative = f0Trapezoid(t, v, p.reference_temp_C, p.z_value_C, -p.sensor_uncertainty_C);

  const intervals = holdIntervals(t, v, threshold, p.hysteresis_C);
  const holdS = holdSeconds(intervals, spec.logic.hold_mode, spec.logic.max_total_dips_s);
  const maxTempC = seriesMaximum(series.samples, signals.value.temperature) ?? maxOf(v);
  const overLimit = p.sterilization_temp_C + p.temp_tolerance_C;

  const checks: RequirementCheck[] = [
    evaluateCheck(
      {
        id: "f0",
        label: "Accumulated F0",
        comparator: ">=",
        limit: p.min_f0,
        unit: "min",
        reason: "F0_INSUFFICIENT",
        ambiguousReason: "F0_WITHIN_UNCERTAINTY",
      },
      f0,
      f0Conservative
    ),
    evaluateCheck(
      {
        id: "sterilization_hold",
        label: "Hold at sterilization temperature",
        comparator: ">=",
        limit: p.sterilization_time_min * 60,
        unit: "s",
        reason: "STERILIZATION_HOLD_INSUFFICIENT",
        ambiguousReason: "HOLD_TIME_WITHIN_UNCERTAINTY",
      },
      holdS
    ),
    evaluateCheck(
      {
        id: "over_temperature",
        label: "Maximum temperature",
        comparator: "<=",
        limit: overLimit,
        unit: "C",
        reason: "OVER_TEMPERATURE",
        ambiguousReason: "TEMPERATURE_WITHIN_UNCERTAINTY",
      },
      maxTempC,
      maxTempC + p.sensor_uncertainty_C
    ),
  ];

  let pressureWindow: AutoclaveMetrics["values"]["pressureWindow"] = null;
  let minPressure: number | null = null;
  let maxPressure: number | null = null;

  if (signals.value.pressure.length > 0) {
    const longest = longestInterval(intervals);
    pressureWindow = longest === null ? "cycle" : "hold";
    const from = longest === null ? 0 : sampleIndex[longest.startIndex];
    const to = longest === null ? series.samples.length - 1 : sampleIndex[longest.endIndex];
    for (let i = from; i <= to; i++) {
      const lo = minReadingAt(series.samples[i], signals.value.pressure);
      const hi = maxReadingAt(series.samples[i], signals.value.pressure);
      if (lo !== null && (minPressure === null || lo < minPressure)) minPressure = lo;
      if (hi !== null && (maxPressure === null || hi > maxPressure)) maxPressure = hi;
    }
  }

  if (p.require_pressure) {
    checks.push(
      evaluateCheck(
        {
          id: "pressure_minimum",
          label: `Minimum pressure during ${pressureWindow === "hold" ? "hold" : "cycle"}`,
          comparator: ">=",
          limit: p.min_pressure_bar,
          unit: "bar",
          reason: "PRESSURE_BELOW_MINIMUM",
          ambiguousReason: "PRESSURE_BELOW_MINIMUM",
        },
        minPressure
      )
    );
    if (p.max_pressure_bar !== undefined) {
      checks.push(
        evaluateCheck(
          {
            id: "pressure_maximum",
            label: `Maximum pressure during ${pressureWindow === "hold" ? "hold" : "cycle"}`,
            comparator: "<=",
            limit: p.max_pressure_bar,
            unit: "bar",
            reason: "PRESSURE_ABOVE_MAXIMUM",
            ambiguousReason: "PRESSURE_ABOVE_MAXIMUM",
          },
          maxPressure
        )
      );
    }
  }

  const result: AutoclaveMetrics = {
    industry: "autoclave",
    values: {
      f0,
      f0Conservative,
      referenceTempC: p.reference_temp_C,
      zValueC: p.z_value_C,
      holdThresholdC: threshold,
      holdS,
      intervals: summarizeIntervals(intervals),
      maxTempC,
      pressureWindow,
      minPressureBar: minPressure,
      maxPressureBar: maxPressure,
      samples: t.length,
    },
    checks,
    sensors: signals.value.temperature,
    warnings,
  };
  return ok(result);
}

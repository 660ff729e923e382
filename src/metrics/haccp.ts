/**
 * HACCP two-stage cooling of cooked food.
 *
 * Thresholds are given in °F and converted to °C. Cooling is measured from
 * the peak sample, which must reach temp_1:
 *
 *   phase 1 = t(temp_2) - t(temp_1)   limit phase_1_limit_h
 *   phase 2 = t(temp_3) - t(temp_2)   limit phase_2_limit_h
 *
 * Each crossing time is linearly interpolated between the last sample above
 * the threshold and the first sample at or below it. Phases share their
 * boundary crossing so they cannot overlap. Conservative crossings are taken
 * at threshold - u and measured from the nominal previous crossing.
 */

import { ComputationError, ok, type RequiredSignalMissingError, type Result } from "../errors/index.js";
import { fahrenheitToCelsius } from "../normalize/index.js";
import type { HaccpSpecification } from "../specification/index.js";
import type { NormalizedSeries, PipelineWarning } from "../types/index.js";
import { evaluateCheck } from "./checks.js";
import { resolveSignals, temperatureSeries } from "./signals.js";
import type { HaccpMetrics, RequirementCheck } from "./types.js";

export interface Crossing {
  /** Epoch ms, interpolated */
  readonly t: number;
  /** Index of the last sample above the threshold (or the start index) */
  readonly index: number;
}

/**
 * First downward crossing of `threshold` at or after `from`.
 *
 * @throws ComputationError when the bracketing samples are not decreasing
 */
export function crossingTime(
  t: readonly number[],
  v: readonly number[],
  threshold: number,
  from: number
): Crossing | null {
  if (v[from] <= threshold) return { t: t[from], index: from };

  for (let j = from + 1; j < v.length; j++) {
    if (v[j] > threshold) continue;
    const i = j - 1;
    const dT = v[j] - v[i];
    if (Math.abs(dT) < 1e-10) return { t: t[i], index: i };
    if (dT > 0) {
      throw new ComputationError("haccp", "cooling bracket is not decreasing", {
        threshold,
        index: i,
        before: v[i],
        after: v[j],
      });
    }
    return { t: t[i] + ((threshold - v[i]) * (t[j] - t[i])) / dT, index: i };
  }
  return null;
}

function firstArgmax(v: readonly number[]): number {
  let best = 0;
  for (let i = 1; i < v.length; i++) if (v[i] > v[best]) best = i;
  return best;
}

function iso(ms: number | undefined): string | null {
  return ms === undefined ? null : new Date(Math.round(ms)).toISOString();
}

function phaseCheck(
  id: string,
  label: string,
  limitH: number,
  reason: "COOLING_PHASE_1_EXCEEDED" | "COOLING_PHASE_2_EXCEEDED",
  nominal: number | null,
  conservative: number | null
): RequirementCheck {
  return evaluateCheck(
    {
      id,
      label,
      comparator: "<=",
      limit: limitH * 3600,
      unit: "s",
      reason: nominal === null ? "COOLING_INCOMPLETE" : reason,
      ambiguousReason: "COOLING_WITHIN_UNCERTAINTY",
    },
    nominal,
    conservative
  );
}

export function haccpThresholdsC(spec: HaccpSpecification): [number, number, number] {
  const p = spec.parameters;
  return [fahrenheitToCelsius(p.temp_1_F), fahrenheitToCelsius(p.temp_2_F), fahrenheitToCelsius(p.temp_3_F)];
}

export function calculateHaccp(
  series: NormalizedSeries,
  spec: HaccpSpecification
): Result<HaccpMetrics, RequiredSignalMissingError | ComputationError> {
  const p = spec.parameters;
  const u = p.sensor_uncertainty_C;
  const warnings: PipelineWarning[] = [];

  const signals = resolveSignals(series, spec, { pressure: false, humidity: false });
  if (!signals.ok) return signals;

  const [t1C, t2C, t3C] = haccpThresholdsC(spec);
  const combined = temperatureSeries(series, spec, signals.value.temperature, t3C, warnings);
  if (!combined.ok) return combined;
  const { t, v } = combined.value;

  const peakIndex = firstArgmax(v);
  const peakC = v[peakIndex];

  const checks: RequirementCheck[] = [
    evaluateCheck(
      {
        id: "peak_temperature",
        label: "Peak reaches cooling start temperature",
        comparator: ">=",
        limit: t1C,
        unit: "C",
        reason: "PEAK_BELOW_START_THRESHOLD",
        ambiguousReason: "THRESHOLD_WITHIN_UNCERTAINTY",
      },
      peakC,
      peakC - u
    ),
  ];

  let c1: Crossing | null = null;
  let c2: Crossing | null = null;
  let c3: Crossing | null = null;
  let phase1S: number | null = null;
  let phase2S: number | null = null;
  let phase1ConservativeS: number | null = null;
  let phase2ConservativeS: number | null = null;

  if (peakC >= t1C) {
    c1 = crossingTime(t, v, t1C, peakIndex);
    if (c1 !== null) {
      c2 = crossingTime(t, v, t2C, c1.index);
      const c2Conservative = crossingTime(t, v, t2C - u, c1.index);
      if (c2 !== null) phase1S = (c2.t - c1.t) / 1000;
      if (c2Conservative !== null) phase1ConservativeS = (c2Conservative.t - c1.t) / 1000;
    }
    if (c2 !== null) {
      c3 = crossingTime(t, v, t3C, c2.index);
      const c3Conservative = crossingTime(t, v, t3C - u, c2.index);
      if (c3 !== null) phase2S = (c3.t - c2.t) / 1000;
      if (c3Conservative !== null) phase2ConservativeS = (c3Conservative.t - c2.t) / 1000;
    }

    checks.push(
      phaseCheck(
        "cooling_phase_1",
        `Cooling ${p.temp_1_F}°F to ${p.temp_2_F}°F`,
        p.phase_1_limit_h,
        "COOLING_PHASE_1_EXCEEDED",
        phase1S,
        phase1ConservativeS
      ),
      phaseCheck(
        "cooling_phase_2",
        `Cooling ${p.temp_2_F}°F to ${p.temp_3_F}°F`,
        p.phase_2_limit_h,
        "COOLING_PHASE_2_EXCEEDED",
        phase2S,
        phase2ConservativeS
      )
    );
  }

  const result: HaccpMetrics = {
    industry: "haccp",
    values: {
      thresholdsC: [t1C, t2C, t3C],
      peakC,
      peakAt: new Date(t[peakIndex]).toISOString(),
      crossings: { temp1: iso(c1?.t), temp2: iso(c2?.t), temp3: iso(c3?.t) },
      phase1S,
      phase2S,
      phase1ConservativeS,
      phase2ConservativeS,
      samples: t.length,
    },
    checks,
    sensors: signals.value.temperature,
    warnings,
  };
  return ok(result);
}

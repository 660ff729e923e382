/**
 * Independent (shadow) calculators.
 *
 * A second implementation of each industry's headline quantities, written
 * without the primary calculators' numeric helpers. Safe mode compares the
 * two and withholds PASS unless they agree.
 *
 *   hold            sum of Δt over consecutive in-hold sample pairs
 *   ramp rate       three-point least-squares slope (two-point at the ends)
 *   autoclave F0    mean-temperature rule: Σ Δt_min × L((Tᵢ₋₁ + Tᵢ) / 2)
 *   HACCP crossing  interpolated back from the first sample at or below the
 *                   threshold
 *   band compliance per-sample counting and run scanning
 */

import { ComputationError, err, ok, type Result } from "../errors/index.js";
import { fahrenheitToCelsius } from "../normalize/index.js";
import type {
  AutoclaveSpecification,
  ColdChainSpecification,
  ConcreteSpecification,
  HaccpSpecification,
  PowderSpecification,
  Specification,
  SterileSpecification,
} from "../specification/index.js";
import type { NormalizedSeries } from "../types/index.js";
import { resolveSignals } from "./signals.js";

/** Quantity name to value; null when the quantity does not exist. */
export type ShadowQuantities = Record<string, number | null>;

interface Points {
  t: number[];
  v: number[];
  /** Warmest temperature reading per point */
  peak: number[];
  humidity: (number | null)[];
}

function collect(
  series: NormalizedSeries,
  spec: Readonly<Specification>,
  threshold: number,
  needs: { pressure: boolean; humidity: boolean }
): Points {
  const signals = resolveSignals(series, spec, needs);
  if (!signals.ok) throw signals.error;
  const { temperature, humidity } = signals.value;
  const mode = spec.sensor_selection.mode;

  const points: Points = { t: [], v: [], peak: [], humidity: [] };
  for (const sample of series.samples) {
    const readings: number[] = [];
    for (const name of temperature) {
      const value = sample.values[name];
      if (typeof value === "number") readings.push(value);
    }
    if (readings.length === 0) continue;
    const sorted = [...readings].sort((a, b) => a - b);

    let combined: number;
    if (mode === "mean_of_set") {
      let sum = 0;
      for (const value of sorted) sum += value;
      combined = sum / sorted.length;
    } else if (mode === "majority_over_threshold") {
      const above = sorted.filter((value) => value >= threshold);
      combined = above.length * 2 > sorted.length ? above[0] : sorted[sorted.length - 1];
    } else {
      combined = sorted[0];
    }

    let lowestHumidity: number | null = null;
    for (const name of humidity) {
      const value = sample.values[name];
      if (typeof value === "number" && (lowestHumidity === null || value < lowestHumidity)) lowestHumidity = value;
    }

    points.t.push(sample.t);
    points.v.push(combined);
    points.peak.push(sorted[sorted.length - 1]);
    points.humidity.push(lowestHumidity);
  }
  return points;
}

// ═══════════════════════════════════════════════════════════════════════════
// HOLD
// ═══════════════════════════════════════════════════════════════════════════

function inHoldFlags(v: readonly number[], threshold: number, hysteresis: number): boolean[] {
  const flags: boolean[] = [];
  let holding = false;
  for (const value of v) {
    holding = holding ? value >= threshold - hysteresis : value >= threshold;
    flags.push(holding);
  }
  return flags;
}

function holdByPairs(
  t: readonly number[],
  v: readonly number[],
  threshold: number,
  hysteresis: number,
  mode: "continuous" | "cumulative",
  maxDipsS: number
): number {
  const flags = inHoldFlags(v, threshold, hysteresis);
  const runs: number[] = [];
  let gaps = 0;
  let current = 0;
  let lastHoldT: number | null = null;

  for (let i = 0; i < flags.length; i++) {
    if (!flags[i]) continue;
    if (i > 0 && flags[i - 1]) {
      current += (t[i] - t[i - 1]) / 1000;
    } else {
      if (lastHoldT !== null) {
        runs.push(current);
        gaps += (t[i] - lastHoldT) / 1000;
      }
      current = 0;
    }
    lastHoldT = t[i];
  }
  if (lastHoldT !== null) runs.push(current);

  if (mode === "continuous") return runs.reduce((a, b) => Math.max(a, b), 0);
  const total = runs.reduce((a, b) => a + b, 0);
  return Math.max(0, total - Math.max(0, gaps - maxDipsS));
}

function leastSquaresSlope(t: readonly number[], v: readonly number[], from: number, to: number): number {
  const n = to - from + 1;
  let meanT = 0;
  let meanV = 0;
  for (let i = from; i <= to; i++) {
    meanT += t[i] / n;
    meanV += v[i] / n;
  }
  let num = 0;
  let den = 0;
  for (let i = from; i <= to; i++) {
    num += (t[i] - meanT) * (v[i] - meanV);
    den += (t[i] - meanT) ** 2;
  }
  return den === 0 ? 0 : num / den;
}

function maxSlopePerMinute(t: readonly number[], v: readonly number[]): number {
  let best = -Infinity;
  for (let i = 0; i < v.length; i++) {
    const slope = leastSquaresSlope(t, v, Math.max(0, i - 1), Math.min(v.length - 1, i + 1));
    best = Math.max(best, slope * 60_000);
  }
  return best;
}

// ═══════════════════════════════════════════════════════════════════════════
// PER INDUSTRY
// ═══════════════════════════════════════════════════════════════════════════

function shadowPowder(series: NormalizedSeries, spec: Readonly<PowderSpecification>): ShadowQuantities {
  const p = spec.parameters;
  const threshold = p.target_temp_C + p.sensor_uncertainty_C;
  const { t, v } = collect(series, spec, threshold, { pressure: false, humidity: false });

  let reachedAt: number | null = null;
  for (let i = 0; i < v.length && reachedAt === null; i++) {
    if (v[i] >= threshold) reachedAt = (t[i] - t[0]) / 1000;
  }

  return {
    holdS: holdByPairs(t, v, threshold, p.hysteresis_C, spec.logic.hold_mode, spec.logic.max_total_dips_s),
    maxRampRateCPerMin: maxSlopePerMinute(t, v),
    timeToThresholdS: reachedAt,
  };
}

function shadowAutoclave(series: NormalizedSeries, spec: Readonly<AutoclaveSpecification>): ShadowQuantities {
  const p = spec.parameters;
  const threshold = p.sterilization_temp_C - p.temp_tolerance_C + p.sensor_uncertainty_C;
  const { t, v } = collect(series, spec, threshold, { pressure: false, humidity: false });

  let f0 = 0;
  for (let i = 1; i < v.length; i++) {
    const meanT = (v[i] + v[i - 1]) / 2;
    f0 += ((t[i] - t[i - 1]) / 60_000) * 10 ** ((meanT - p.reference_temp_C) / p.z_value_C);
  }

  return {
    f0,
    holdS: holdByPairs(t, v, threshold, p.hysteresis_C, spec.logic.hold_mode, spec.logic.max_total_dips_s),
  };
}

function shadowHaccp(series: NormalizedSeries, spec: Readonly<HaccpSpecification>): ShadowQuantities {
  const p = spec.parameters;
  const limits = [p.temp_1_F, p.temp_2_F, p.temp_3_F].map(fahrenheitToCelsius);
  const { t, v } = collect(series, spec, limits[2], { pressure: false, humidity: false });

  const peak = v.reduce((best, value, i) => (value > v[best] ? i : best), 0);
  if (v[peak] < limits[0]) return { phase1S: null, phase2S: null };

  const times: number[] = [];
  let cursor = peak;
  for (const limit of limits) {
    let j = cursor;
    while (j < v.length && v[j] > limit) j++;
    if (j === v.length) break;
    if (j === cursor) {
      times.push(t[j]);
      continue;
    }
    const drop = v[j - 1] - v[j];
    if (drop < 0) throw new ComputationError("haccp-shadow", "rising bracket", { index: j });
    times.push(drop < 1e-10 ? t[j - 1] : t[j] - ((limit - v[j]) / drop) * (t[j] - t[j - 1]));
    cursor = j - 1;
  }

  return {
    phase1S: times.length >= 2 ? (times[1] - times[0]) / 1000 : null,
    phase2S: times.length >= 3 ? (times[2] - times[1]) / 1000 : null,
  };
}

function shadowColdChain(series: NormalizedSeries, spec: Readonly<ColdChainSpecification>): ShadowQuantities {
  const p = spec.parameters;
  const { t, v, peak } = collect(series, spec, p.min_temp_C, { pressure: false, humidity: false });

  const outside = v.map((value, i) => value < p.min_temp_C || peak[i] > p.max_temp_C);
  let longest = 0;
  let runStart = -1;
  for (let i = 0; i < outside.length; i++) {
    if (!outside[i]) continue;
    if (runStart === -1) runStart = t[i];
    if (i === outside.length - 1 || !outside[i + 1]) {
      const duration = (t[i] - runStart) / 1000;
      if (duration >= p.min_excursion_s) longest = Math.max(longest, duration);
      runStart = -1;
    }
  }

  return {
    compliancePct: (100 * outside.filter((isOut) => !isOut).length) / v.length,
    longestExcursionS: longest,
  };
}

function shadowConcrete(series: NormalizedSeries, spec: Readonly<ConcreteSpecification>): ShadowQuantities {
  const p = spec.parameters;
  const { t, v, peak, humidity } = collect(series, spec, p.min_temp_C, { pressure: false, humidity: true });
  const limitMs = p.window_h * 3_600_000;

  let total = 0;
  let good = 0;
  for (let i = 0; i < t.length && t[i] - t[0] <= limitMs; i++) {
    total++;
    const rh = humidity[i];
    if (rh !== null && rh >= p.min_humidity_pct && v[i] >= p.min_temp_C && peak[i] <= p.max_temp_C) good++;
  }

  return { compliancePct: total === 0 ? 0 : (good * 100) / total };
}

function shadowSterile(series: NormalizedSeries, spec: Readonly<SterileSpecification>): ShadowQuantities {
  const p = spec.parameters;
  const threshold = p.min_temp_C + p.sensor_uncertainty_C;
  const { t, v } = collect(series, spec, threshold, { pressure: false, humidity: false });
  return {
    holdS: holdByPairs(t, v, threshold, 0, spec.logic.hold_mode, spec.logic.max_total_dips_s),
  };
}

/**
 * Compute the comparable quantities independently. Any failure is returned
 * as an Err so that safe mode can report the shadow as unavailable.
 */
export function calculateIndependent(
  series: NormalizedSeries,
  spec: Readonly<Specification>
): Result<ShadowQuantities, Error> {
  try {
    switch (spec.industry) {
      case "powder":
        return ok(shadowPowder(series, spec));
      case "autoclave":
        return ok(shadowAutoclave(series, spec));
      case "haccp":
        return ok(shadowHaccp(series, spec));
      case "coldchain":
        return ok(shadowColdChain(series, spec));
      case "concrete":
        return ok(shadowConcrete(series, spec));
      case "sterile":
        return ok(shadowSterile(series, spec));
    }
  } catch (error) {
    return err(error instanceof Error ? error : new Error(String(error)));
  }
}

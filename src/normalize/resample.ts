/**
 * Cadence detection and gap filling.
 *
 * Every source sample is kept. Intervals longer than one step get grid
 * points (on a grid anchored at the first timestamp) that carry the most
 * recent non-missing reading of each sensor. No values are interpolated and
 * no reading is ever replaced by a later one in the same grid cell.
 */

import type { Sample } from "../types/index.js";

/** Interval differences below this are treated as equal. */
const GRID_EPSILON_MS = 1;

/**
 * Median of consecutive intervals, in milliseconds.
 * Requires at least two samples with strictly increasing times.
 */
export function medianIntervalMs(times: readonly number[]): number {
  const intervals: number[] = [];
  for (let i = 1; i < times.length; i++) {
    intervals.push(times[i] - times[i - 1]);
  }
  intervals.sort((a, b) => a - b);
  const mid = Math.floor(intervals.length / 2);
  return intervals.length % 2 === 1
    ? intervals[mid]
    : (intervals[mid - 1] + intervals[mid]) / 2;
}

export function isUniform(times: readonly number[], stepMs: number): boolean {
  for (let i = 1; i < times.length; i++) {
    if (Math.abs(times[i] - times[i - 1] - stepMs) > GRID_EPSILON_MS) return false;
  }
  return true;
}

/** Number of grid points a resample would produce. */
export function gridSize(times: readonly number[], stepMs: number): number {
  if (times.length === 0) return 0;
  return Math.floor((times[times.length - 1] - times[0]) / stepMs + 1e-9) + 1;
}

export interface ResampleOutcome {
  readonly samples: Sample[];
  readonly resampled: boolean;
  /** Input samples whose time does not fall on a grid point */
  readonly offGrid: number;
  /** Grid points added inside gaps */
  readonly filled: number;
}

/**
 * Fill intervals longer than `stepMs` with step-hold grid points.
 *
 * A series already uniform at `stepMs` is returned unchanged.
 */
export function resampleStepHold(
  samples: readonly Sample[],
  sensors: readonly string[],
  stepMs: number
): ResampleOutcome {
  const times = samples.map((sample) => sample.t);
  if (samples.length < 2 || isUniform(times, stepMs)) {
    return { samples: [...samples], resampled: false, offGrid: 0, filled: 0 };
  }

  const t0 = times[0];
  let offGrid = 0;
  for (const t of times) {
    const offset = (t - t0) % stepMs;
    if (offset > GRID_EPSILON_MS && stepMs - offset > GRID_EPSILON_MS) offGrid++;
  }

  const last: Record<string, number | null> = {};
  for (const sensor of sensors) last[sensor] = null;

  const out: Sample[] = [];
  let filled = 0;
  samples.forEach((sample, i) => {
    for (const sensor of sensors) {
      const value = sample.values[sensor];
      if (value !== null && value !== undefined) last[sensor] = value;
    }
    out.push(sample);

    const next = samples[i + 1];
    if (next === undefined || next.t - sample.t <= stepMs + GRID_EPSILON_MS) return;

    let k = Math.floor((sample.t - t0) / stepMs) + 1;
    let t = t0 + Math.round(k * stepMs);
    while (t < next.t - GRID_EPSILON_MS) {
      if (t - sample.t > GRID_EPSILON_MS) {
        out.push({ t, values: { ...last } });
        filled++;
      }
      k++;
      t = t0 + Math.round(k * stepMs);
    }
  });

  return { samples: out, resampled: filled > 0, offGrid, filled };
}

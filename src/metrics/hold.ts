/**
 * Hold detection and shared time-series measures.
 *
 * Hold state machine: enter when T >= threshold, leave when
 * T < threshold - hysteresis. An interval runs from its first to its last
 * in-hold sample, so its duration is the time between those two samples.
 */

import type { HoldMode } from "../specification/index.js";
import type { HoldIntervalSummary } from "./types.js";

export interface HoldInterval {
  readonly startIndex: number;
  readonly endIndex: number;
  /** Epoch ms */
  readonly startT: number;
  readonly endT: number;
  readonly durationS: number;
}

function interval(t: readonly number[], startIndex: number, endIndex: number): HoldInterval {
  return {
    startIndex,
    endIndex,
    startT: t[startIndex],
    endT: t[endIndex],
    durationS: (t[endIndex] - t[startIndex]) / 1000,
  };
}

/**
 * All hold intervals of a series, in time order.
 */
export function holdIntervals(
  t: readonly number[],
  v: readonly number[],
  threshold: number,
  hysteresis: number
): HoldInterval[] {
  const intervals: HoldInterval[] = [];
  const exit = threshold - hysteresis;
  let start = -1;
  let last = -1;

  for (let i = 0; i < v.length; i++) {
    if (start === -1) {
      if (v[i] >= threshold) {
        start = i;
        last = i;
      }
    } else if (v[i] < exit) {
      intervals.push(interval(t, start, last));
      start = -1;
    } else {
      last = i;
    }
  }
  if (start !== -1) {
    intervals.push(interval(t, start, last));
  }

  return intervals;
}

/** Longest interval; the earliest wins a tie. */
export function longestInterval(intervals: readonly HoldInterval[]): HoldInterval | null {
  let best: HoldInterval | null = null;
  for (const candidate of intervals) {
    if (best === null || candidate.durationS > best.durationS) best = candidate;
  }
  return best;
}

/**
 * Sum of interval durations, less whatever part of the time between
 * intervals exceeds `maxTotalDipsS`.
 */
export function cumulativeHoldS(intervals: readonly HoldInterval[], maxTotalDipsS: number): number {
  let total = 0;
  let dips = 0;
  intervals.forEach((current, i) => {
    total += current.durationS;
    if (i > 0) dips += (current.startT - intervals[i - 1].endT) / 1000;
  });
  return Math.max(0, total - Math.max(0, dips - maxTotalDipsS));
}

export function holdSeconds(
  intervals: readonly HoldInterval[],
  mode: HoldMode,
  maxTotalDipsS: number
): number {
  if (mode === "cumulative") return cumulativeHoldS(intervals, maxTotalDipsS);
  return longestInterval(intervals)?.durationS ?? 0;
}

export function summarizeIntervals(intervals: readonly HoldInterval[]): HoldIntervalSummary[] {
  return intervals.map((item) => ({
    start: new Date(item.startT).toISOString(),
    end: new Date(item.endT).toISOString(),
    durationS: item.durationS,
  }));
}

/**
 * Rate of change per sample: centered difference, one-sided at the ends.
 *
 * @param perMs - Output unit in milliseconds (60_000 for per minute)
 */
export function centeredRates(t: readonly number[], v: readonly number[], perMs: number): number[] {
  const n = v.length;
  if (n < 2) return [];
  const rates: number[] = [];
  for (let i = 0; i < n; i++) {
    const lo = i === 0 ? 0 : i - 1;
    const hi = i === n - 1 ? n - 1 : i + 1;
    rates.push(((v[hi] - v[lo]) / (t[hi] - t[lo])) * perMs);
  }
  return rates;
}

/** Seconds from the first sample to the first sample at or above threshold. */
export function timeToThresholdS(
  t: readonly number[],
  v: readonly number[],
  threshold: number
): number | null {
  const index = v.findIndex((value) => value >= threshold);
  return index === -1 ? null : (t[index] - t[0]) / 1000;
}

export function maxOf(values: readonly number[]): number {
  let max = -Infinity;
  for (const value of values) if (value > max) max = value;
  return max;
}

export function minOf(values: readonly number[]): number {
  let min = Infinity;
  for (const value of values) if (value < min) min = value;
  return min;
}

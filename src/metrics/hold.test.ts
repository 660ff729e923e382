/**
 * Hold detection and rate helper tests.
 *
 * Run: node --import tsx --test src/metrics/hold.test.ts
 *
 * Tests cover:
 *   1. Hysteresis state machine (enter at threshold, leave below threshold - h)
 *   2. Boundary inclusion (a reading equal to the threshold is in hold)
 *   3. Hysteresis idempotence on series that never enter the dead band
 *   4. Continuous and cumulative hold totals
 *   5. Centered rates and time to threshold
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";

import {
  centeredRates,
  cumulativeHoldS,
  holdIntervals,
  holdSeconds,
  longestInterval,
  maxOf,
  minOf,
  summarizeIntervals,
  timeToThresholdS,
} from "./hold.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST FIXTURES
// ═══════════════════════════════════════════════════════════════════════════

/** Epoch ms at a fixed step, starting at 2024-01-15T08:00:00Z. */
function times(count: number, stepS = 1): number[] {
  const t0 = Date.UTC(2024, 0, 15, 8, 0, 0);
  return Array.from({ length: count }, (_, i) => t0 + i * stepS * 1000);
}

// ═══════════════════════════════════════════════════════════════════════════
// HOLD INTERVALS
// ═══════════════════════════════════════════════════════════════════════════

test("hysteresis keeps a hold through a shallow dip", () => {
  const v = [100, 181, 182, 181, 179, 182, 182];
  const intervals = holdIntervals(times(v.length), v, 180, 2);

  assert.equal(intervals.length, 1);
  assert.equal(intervals[0].startIndex, 1);
  assert.equal(intervals[0].endIndex, 6);
  assert.equal(intervals[0].durationS, 5);
});

test("without hysteresis the same dip splits the hold", () => {
  const v = [100, 181, 182, 181, 179, 182, 182];
  const intervals = holdIntervals(times(v.length), v, 180, 0);

  assert.deepEqual(
    intervals.map((item) => [item.startIndex, item.endIndex, item.durationS]),
    [
      [1, 3, 2],
      [5, 6, 1],
    ]
  );
});

test("a reading equal to the threshold enters the hold", () => {
  const v = [179, 180, 180, 170];
  const intervals = holdIntervals(times(v.length), v, 180, 0);

  assert.equal(intervals.length, 1);
  assert.equal(intervals[0].durationS, 1);
});

test("a hold still open at the end of the series is closed at the last sample", () => {
  const v = [150, 185, 185, 185];
  const intervals = holdIntervals(times(v.length, 60), v, 180, 2);

  assert.equal(intervals.length, 1);
  assert.equal(intervals[0].endIndex, 3);
  assert.equal(intervals[0].durationS, 120);
});

test("a series that never reaches the threshold has no hold", () => {
  const v = [100, 150, 179.9, 150];
  assert.deepEqual(holdIntervals(times(v.length), v, 180, 2), []);
  assert.equal(holdSeconds([], "continuous", 0), 0);
  assert.equal(longestInterval([]), null);
});

test("hysteresis does not change series that skip the dead band", () => {
  // Every reading is either >= 180 or < 175, so any hysteresis up to 5 agrees
  const v = [170, 181, 190, 185, 160, 150, 183, 184, 174, 182];
  const t = times(v.length, 30);
  const reference = holdIntervals(t, v, 180, 0);

  for (const hysteresis of [0.5, 1, 2, 4.9]) {
    assert.deepEqual(holdIntervals(t, v, 180, hysteresis), reference, `hysteresis ${hysteresis}`);
  }
  // Running the detector again on the same input gives the same intervals
  assert.deepEqual(holdIntervals(t, v, 180, 2), holdIntervals(t, v, 180, 2));
});

// ═══════════════════════════════════════════════════════════════════════════
// HOLD TOTALS
// ═══════════════════════════════════════════════════════════════════════════

test("longest interval wins; the earliest wins a tie", () => {
  const v = [181, 181, 100, 181, 181, 100, 181, 181, 181];
  const intervals = holdIntervals(times(v.length), v, 180, 0);
  const longest = longestInterval(intervals);

  assert.equal(intervals.length, 3);
  assert.equal(longest?.startIndex, 6);

  const tie = holdIntervals(times(5), [181, 181, 100, 181, 181], 180, 0);
  assert.equal(longestInterval(tie)?.startIndex, 0);
});

test("cumulative hold subtracts only dips beyond the allowance", () => {
  // Intervals 0..10 s and 15..25 s: 20 s of hold, 5 s of dip
  const v = [...Array<number>(11).fill(185), 170, 170, 170, 170, ...Array<number>(11).fill(185)];
  const intervals = holdIntervals(times(v.length), v, 180, 0);

  assert.equal(intervals.length, 2);
  assert.equal(cumulativeHoldS(intervals, 10), 20);
  assert.equal(cumulativeHoldS(intervals, 2), 17);
  assert.equal(holdSeconds(intervals, "cumulative", 5), 20);
  assert.equal(holdSeconds(intervals, "continuous", 5), 10);
});

test("interval summaries carry ISO timestamps", () => {
  const intervals = holdIntervals(times(3, 60), [185, 185, 185], 180, 0);
  assert.deepEqual(summarizeIntervals(intervals), [
    { start: "2024-01-15T08:00:00.000Z", end: "2024-01-15T08:02:00.000Z", durationS: 120 },
  ]);
});

// ═══════════════════════════════════════════════════════════════════════════
// RATES
// ═══════════════════════════════════════════════════════════════════════════

test("centered rates use one-sided differences at the ends", () => {
  const rates = centeredRates([0, 60_000, 120_000], [0, 6, 18], 60_000);
  assert.deepEqual(rates, [6, 9, 12]);
  assert.deepEqual(centeredRates([0], [1], 60_000), []);
});

test("time to threshold counts from the first sample", () => {
  const t = times(5, 10);
  assert.equal(timeToThresholdS(t, [100, 150, 180, 190, 200], 180), 20);
  assert.equal(timeToThresholdS(t, [100, 150, 170, 175, 179], 180), null);
});

test("maxOf and minOf scan without spreading", () => {
  assert.equal(maxOf([3, 9, -2]), 9);
  assert.equal(minOf([3, 9, -2]), -2);
  assert.equal(maxOf([]), -Infinity);
});

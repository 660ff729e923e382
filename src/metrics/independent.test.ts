/**
 * Independent calculator and shadow comparison tests.
 *
 * Run: node --import tsx --test src/metrics/independent.test.ts
 *
 * Tests cover:
 *   1. Agreement with the primary calculators on regular cycles
 *   2. The autoclave mean-temperature rule diverging on a steep ramp
 *   3. Independent failures surfacing as INDEPENDENT_ERROR
 *   4. Tolerance handling for null and relative comparisons
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";

import { DEFAULT_PIPELINE_CONFIG } from "../config/pipeline/index.js";
import { err, ok, RequiredSignalMissingError } from "../errors/index.js";
import { fahrenheitToCelsius } from "../normalize/index.js";
import { validateSpecification, type Specification } from "../specification/index.js";
import type { NormalizedSeries, SensorChannel, SensorKind } from "../types/index.js";
import { calculateMetrics } from "./calculator.js";
import { calculateIndependent } from "./independent.js";
import { compareQuantity, compareShadow, comparableQuantities } from "./shadow.js";
import type { MetricResult } from "./types.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST FIXTURES
// ═══════════════════════════════════════════════════════════════════════════

const T0 = Date.UTC(2024, 0, 15, 8, 0, 0);
const UNITS = { temperature: "C", pressure: "bar", humidity: "%RH" } as const;

function channel(name: string, kind: SensorKind): SensorChannel {
  return { name, kind, unit: UNITS[kind], sourceColumn: name, sourceUnit: UNITS[kind] };
}

function makeSeries(
  stepS: number,
  columns: Record<string, { kind: SensorKind; values: (number | null)[] }>
): NormalizedSeries {
  const names = Object.keys(columns);
  const length = columns[names[0]].values.length;
  return {
    samples: Array.from({ length }, (_, i) => {
      const values: Record<string, number | null> = {};
      for (const name of names) values[name] = columns[name].values[i];
      return { t: T0 + i * stepS * 1000, values };
    }),
    channels: names.map((name) => channel(name, columns[name].kind)),
    cadenceS: stepS,
    resampled: false,
    timezone: "UTC",
    metadata: {},
    sourceRowCount: length,
    warnings: [],
  };
}

function temperatures(stepS: number, values: number[]): NormalizedSeries {
  return makeSeries(stepS, { temp_1: { kind: "temperature", values } });
}

function makeSpec(doc: Record<string, unknown>): Readonly<Specification> {
  const result = validateSpecification(doc);
  if (!result.ok) throw new Error(result.error.format());
  return result.value;
}

function primary(series: NormalizedSeries, spec: Readonly<Specification>): MetricResult {
  const result = calculateMetrics(series, spec);
  if (!result.ok) throw result.error;
  return result.value;
}

function powderProfile(): number[] {
  const v: number[] = [];
  for (let s = 0; s <= 800; s++) {
    if (s < 60) v.push(120 + s);
    else if (s <= 781) v.push(182);
    else v.push(175 - (s - 782));
  }
  return v;
}

function haccpProfileF(points: [number, number][]): number[] {
  const v: number[] = [];
  for (let s = 0; s < points.length - 1; s++) {
    const [m0, f0] = points[s];
    const [m1, f1] = points[s + 1];
    for (let m = m0; m < m1; m++) v.push(f0 + ((f1 - f0) * (m - m0)) / (m1 - m0));
  }
  v.push(points[points.length - 1][1]);
  return v;
}

// ═══════════════════════════════════════════════════════════════════════════
// AGREEMENT
// ═══════════════════════════════════════════════════════════════════════════

test("powder: independent hold, ramp and time to threshold agree", () => {
  const series = temperatures(1, powderProfile());
  const spec = makeSpec({ industry: "powder", parameters: { target_temp_C: 180, hold_time_s: 720 } });
  const independent = calculateIndependent(series, spec);

  assert.ok(independent.ok);
  assert.equal(independent.value.holdS, 721);
  assert.equal(independent.value.timeToThresholdS, 60);
  assert.ok(Math.abs((independent.value.maxRampRateCPerMin ?? 0) - 120) < 1e-3);

  const report = compareShadow(primary(series, spec), independent, DEFAULT_PIPELINE_CONFIG);
  assert.equal(report.status, "AGREEMENT");
  assert.deepEqual(
    report.differences.map((item) => item.quantity),
    ["holdS", "maxRampRateCPerMin", "timeToThresholdS"]
  );
});

test("haccp: back-interpolated crossings agree with the primary phases", () => {
  const v = haccpProfileF([
    [0, 140],
    [5, 135],
    [88, 70],
    [280, 41],
    [320, 35],
  ]).map(fahrenheitToCelsius);
  const series = temperatures(60, v);
  const spec = makeSpec({ industry: "haccp" });
  const independent = calculateIndependent(series, spec);

  assert.ok(independent.ok);
  assert.ok(Math.abs((independent.value.phase1S ?? 0) - 4980) < 1e-6);
  assert.ok(Math.abs((independent.value.phase2S ?? 0) - 11520) < 1e-6);
  assert.equal(compareShadow(primary(series, spec), independent, DEFAULT_PIPELINE_CONFIG).status, "AGREEMENT");
});

test("coldchain: run scanning matches episode detection", () => {
  const v = Array.from({ length: 200 }, (_, i) => (i >= 50 && i <= 60 ? 12 : 4));
  const series = temperatures(300, v);
  const spec = makeSpec({ industry: "coldchain" });
  const independent = calculateIndependent(series, spec);

  assert.ok(independent.ok);
  assert.equal(independent.value.longestExcursionS, 3000);
  assert.equal(independent.value.compliancePct, (189 * 100) / 200);
  assert.equal(compareShadow(primary(series, spec), independent, DEFAULT_PIPELINE_CONFIG).status, "AGREEMENT");
});

test("coldchain: both sides judge the upper limit on the warmest sensor", () => {
  const series = makeSeries(300, {
    temp_1: { kind: "temperature", values: [5, 5, 5, 5] },
    temp_2: { kind: "temperature", values: [5, 20, 20, 5] },
  });
  const spec = makeSpec({ industry: "coldchain" });
  const independent = calculateIndependent(series, spec);

  assert.ok(independent.ok);
  assert.equal(independent.value.compliancePct, 50);
  assert.equal(independent.value.longestExcursionS, 300);
  assert.equal(compareShadow(primary(series, spec), independent, DEFAULT_PIPELINE_CONFIG).status, "AGREEMENT");
});

test("sterile and concrete agree on regular data", () => {
  const sterileSeries = temperatures(3600, [40, ...Array<number>(13).fill(56), 40]);
  const sterile = makeSpec({ industry: "sterile" });
  assert.equal(
    compareShadow(primary(sterileSeries, sterile), calculateIndependent(sterileSeries, sterile), DEFAULT_PIPELINE_CONFIG)
      .status,
    "AGREEMENT"
  );

  const concreteSeries = makeSeries(3600, {
    temp_1: { kind: "temperature", values: Array<number>(25).fill(20) },
    humidity: { kind: "humidity", values: [70, ...Array<number>(24).fill(90)] },
  });
  const concrete = makeSpec({ industry: "concrete" });
  const independent = calculateIndependent(concreteSeries, concrete);
  assert.ok(independent.ok);
  assert.equal(independent.value.compliancePct, 96);
  assert.equal(compareShadow(primary(concreteSeries, concrete), independent, DEFAULT_PIPELINE_CONFIG).status, "AGREEMENT");
});

// ═══════════════════════════════════════════════════════════════════════════
// DISAGREEMENT
// ═══════════════════════════════════════════════════════════════════════════

test("autoclave: the mean-temperature rule matches the trapezoid at constant temperature", () => {
  const series = makeSeries(60, {
    temp_1: { kind: "temperature", values: Array<number>(21).fill(121.1) },
    pressure: { kind: "pressure", values: Array<number>(21).fill(2.1) },
  });
  const spec = makeSpec({ industry: "autoclave" });
  const independent = calculateIndependent(series, spec);

  assert.ok(independent.ok);
  assert.ok(Math.abs((independent.value.f0 ?? 0) - 20) < 1e-9);
  assert.equal(independent.value.holdS, 1200);
  assert.equal(compareShadow(primary(series, spec), independent, DEFAULT_PIPELINE_CONFIG).status, "AGREEMENT");
});

test("autoclave: a steep ramp separates the two F0 rules", () => {
  // Trapezoid: (1 + 10) / 2 = 5.5; mean temperature 126.1 gives 10^0.5
  const series = makeSeries(60, {
    temp_1: { kind: "temperature", values: [121.1, 131.1] },
    pressure: { kind: "pressure", values: [2.1, 2.1] },
  });
  const spec = makeSpec({ industry: "autoclave" });
  const independent = calculateIndependent(series, spec);

  assert.ok(independent.ok);
  assert.ok(Math.abs((independent.value.f0 ?? 0) - Math.sqrt(10)) < 1e-9);

  const report = compareShadow(primary(series, spec), independent, DEFAULT_PIPELINE_CONFIG);
  assert.equal(report.status, "TOLERANCE_VIOLATION");
  const f0 = report.differences.find((item) => item.quantity === "f0");
  assert.equal(f0?.withinTolerance, false);
  assert.equal(f0?.tolerance, 0.1);
});

test("a missing signal in the independent path is an INDEPENDENT_ERROR", () => {
  const series = temperatures(3600, Array<number>(25).fill(20));
  const independent = calculateIndependent(series, makeSpec({ industry: "concrete" }));

  assert.ok(!independent.ok);
  assert.ok(independent.error instanceof RequiredSignalMissingError);

  const concreteMetric = primary(
    makeSeries(3600, {
      temp_1: { kind: "temperature", values: [20, 20] },
      humidity: { kind: "humidity", values: [90, 90] },
    }),
    makeSpec({ industry: "concrete" })
  );
  const report = compareShadow(concreteMetric, err(new Error("shadow exploded")), DEFAULT_PIPELINE_CONFIG);
  assert.deepEqual(report, { status: "INDEPENDENT_ERROR", differences: [], error: "shadow exploded" });
});

test("a diverging hold is a tolerance violation", () => {
  const series = temperatures(1, powderProfile());
  const metric = primary(series, makeSpec({ industry: "powder", parameters: { target_temp_C: 180, hold_time_s: 720 } }));
  const forged = ok({ ...comparableQuantities(metric), holdS: 700 });

  const report = compareShadow(metric, forged, DEFAULT_PIPELINE_CONFIG);
  assert.equal(report.status, "TOLERANCE_VIOLATION");
  assert.deepEqual(
    report.differences.filter((item) => !item.withinTolerance).map((item) => [item.quantity, item.difference]),
    [["holdS", 21]]
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// TOLERANCES
// ═══════════════════════════════════════════════════════════════════════════

test("null quantities agree only with null", () => {
  const tolerance = { kind: "absolute", value: 30 } as const;
  assert.equal(compareQuantity("phase2S", null, null, tolerance).withinTolerance, true);
  assert.equal(compareQuantity("phase2S", 100, null, tolerance).withinTolerance, false);
  assert.equal(compareQuantity("phase2S", 100, 130, tolerance).withinTolerance, true);
  assert.equal(compareQuantity("phase2S", 100, 130.5, tolerance).withinTolerance, false);
});

test("relative tolerance scales with the larger magnitude", () => {
  const tolerance = { kind: "relative", value: 0.05 } as const;
  const within = compareQuantity("maxRampRateCPerMin", 100, 105, tolerance);
  assert.equal(within.tolerance, 0.05 * 105);
  assert.equal(within.withinTolerance, true);
  assert.equal(compareQuantity("maxRampRateCPerMin", 100, 106, tolerance).withinTolerance, false);
});

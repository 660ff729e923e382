/**
 * Signal resolution and sensor combination tests.
 *
 * Run: node --import tsx --test src/metrics/signals.test.ts
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";

import { RequiredSignalMissingError } from "../errors/index.js";
import { validateSpecification, type Specification } from "../specification/index.js";
import type { NormalizedSeries, PipelineWarning, SensorChannel, SensorKind } from "../types/index.js";
import { combineReadings, matchSensors, resolveSignals, seriesMaximum, temperatureSeries } from "./signals.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST FIXTURES
// ═══════════════════════════════════════════════════════════════════════════

const UNITS = { temperature: "C", pressure: "bar", humidity: "%RH" } as const;

function channel(name: string, kind: SensorKind): SensorChannel {
  return { name, kind, unit: UNITS[kind], sourceColumn: name, sourceUnit: UNITS[kind] };
}

function makeSeries(
  columns: Record<string, { kind: SensorKind; values: (number | null)[] }>,
  stepS = 60
): NormalizedSeries {
  const names = Object.keys(columns);
  const length = columns[names[0]].values.length;
  const t0 = Date.UTC(2024, 0, 15, 8, 0, 0);
  return {
    samples: Array.from({ length }, (_, i) => {
      const values: Record<string, number | null> = {};
      for (const name of names) values[name] = columns[name].values[i];
      return { t: t0 + i * stepS * 1000, values };
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

function makeSpec(doc: Record<string, unknown>): Readonly<Specification> {
  const result = validateSpecification(doc);
  if (!result.ok) throw new Error(result.error.format());
  return result.value;
}

const POWDER = { industry: "powder", parameters: { target_temp_C: 180, hold_time_s: 600 } };

// ═══════════════════════════════════════════════════════════════════════════
// MATCHING
// ═══════════════════════════════════════════════════════════════════════════

test("sensor entries match exactly or by glob, case-insensitively", () => {
  const names = ["temp_1", "temp_2", "rh_a"];
  assert.deepEqual(matchSensors("TEMP_1", names), ["temp_1"]);
  assert.deepEqual(matchSensors("temp_*", names), ["temp_1", "temp_2"]);
  assert.deepEqual(matchSensors("*", names), names);
  assert.deepEqual(matchSensors("oven", names), []);
});

// ═══════════════════════════════════════════════════════════════════════════
// COMBINATION
// ═══════════════════════════════════════════════════════════════════════════

test("min_of_set and mean_of_set", () => {
  assert.equal(combineReadings([10, 20, 30], "min_of_set", 0), 10);
  assert.equal(combineReadings([10, 20, 30], "mean_of_set", 0), 20);
});

test("majority_over_threshold takes the lowest agreeing reading or the highest overall", () => {
  assert.equal(combineReadings([10, 20, 30], "majority_over_threshold", 15), 20);
  assert.equal(combineReadings([10, 20, 30], "majority_over_threshold", 25), 30);
  // Exactly half is not a majority
  assert.equal(combineReadings([10, 30], "majority_over_threshold", 25), 30);
});

test("samples without any temperature reading are dropped with a warning", () => {
  const series = makeSeries({
    temp_1: { kind: "temperature", values: [100, null, 120, 130] },
    temp_2: { kind: "temperature", values: [110, null, null, 125] },
  });
  const spec = makeSpec(POWDER);
  const warnings: PipelineWarning[] = [];
  const combined = temperatureSeries(series, spec, ["temp_1", "temp_2"], 180, warnings);

  assert.ok(combined.ok);
  assert.deepEqual(combined.value.v, [100, 120, 125]);
  assert.deepEqual(combined.value.sampleIndex, [0, 2, 3]);
  assert.equal(combined.value.dropped, 1);
  assert.deepEqual(
    warnings.map((w) => w.code),
    ["SAMPLES_WITHOUT_READING"]
  );
});

test("fewer than two usable samples is a missing signal", () => {
  const series = makeSeries({ temp_1: { kind: "temperature", values: [null, 150, null] } });
  const result = temperatureSeries(series, makeSpec(POWDER), ["temp_1"], 180, []);

  assert.ok(!result.ok);
  assert.ok(result.error instanceof RequiredSignalMissingError);
});

test("series maximum is the highest single reading", () => {
  const series = makeSeries({
    temp_1: { kind: "temperature", values: [100, 140, 120] },
    temp_2: { kind: "temperature", values: [105, 135, 150] },
  });
  assert.equal(seriesMaximum(series.samples, ["temp_1", "temp_2"]), 150);
  assert.equal(seriesMaximum(series.samples, ["temp_1"]), 140);
});

// ═══════════════════════════════════════════════════════════════════════════
// RESOLUTION
// ═══════════════════════════════════════════════════════════════════════════

test("all temperature channels are used when none are listed", () => {
  const series = makeSeries({
    temp_1: { kind: "temperature", values: [1, 2] },
    pressure: { kind: "pressure", values: [2, 2] },
    temp_2: { kind: "temperature", values: [1, 2] },
  });
  const result = resolveSignals(series, makeSpec(POWDER), { pressure: false, humidity: false });

  assert.ok(result.ok);
  assert.deepEqual(result.value.temperature, ["temp_1", "temp_2"]);
  assert.deepEqual(result.value.pressure, []);
});

test("listed sensors must all be present", () => {
  const series = makeSeries({ temp_1: { kind: "temperature", values: [1, 2] } });
  const spec = makeSpec({ ...POWDER, sensor_selection: { sensors: ["temp_1", "oven_*"] } });
  const result = resolveSignals(series, spec, { pressure: false, humidity: false });

  assert.ok(!result.ok);
  assert.deepEqual(result.error.missing, ["oven_*"]);
  assert.deepEqual(result.error.available, ["temp_1"]);
});

test("require_at_least counts matched temperature sensors", () => {
  const series = makeSeries({
    temp_1: { kind: "temperature", values: [1, 2] },
    temp_2: { kind: "temperature", values: [1, 2] },
  });
  const spec = makeSpec({ ...POWDER, sensor_selection: { sensors: ["temp_*"], require_at_least: 1 } });
  assert.ok(resolveSignals(series, spec, { pressure: false, humidity: false }).ok);

  const strict = makeSpec({
    ...POWDER,
    sensor_selection: { sensors: ["temp_1", "temp_2", "temp_*"], require_at_least: 3 },
  });
  const result = resolveSignals(series, strict, { pressure: false, humidity: false });
  assert.ok(!result.ok);
  assert.deepEqual(result.error.missing, ["1 more temperature sensor(s) (require_at_least 3)"]);
});

test("pressure and humidity are required only when the industry needs them", () => {
  const series = makeSeries({ temp_1: { kind: "temperature", values: [1, 2] } });
  const spec = makeSpec(POWDER);

  assert.ok(resolveSignals(series, spec, { pressure: false, humidity: false }).ok);

  const result = resolveSignals(series, spec, { pressure: true, humidity: true });
  assert.ok(!result.ok);
  assert.deepEqual(result.error.missing, ["pressure", "humidity"]);
  assert.equal(result.error.industry, "powder");
});

test("required_signals are checked against every channel", () => {
  const series = makeSeries({
    temp_1: { kind: "temperature", values: [1, 2] },
    humidity: { kind: "humidity", values: [50, 50] },
  });
  assert.ok(
    resolveSignals(series, makeSpec({ ...POWDER, required_signals: ["humidity"] }), {
      pressure: false,
      humidity: false,
    }).ok
  );

  const result = resolveSignals(series, makeSpec({ ...POWDER, required_signals: ["door_switch"] }), {
    pressure: false,
    humidity: false,
  });
  assert.ok(!result.ok);
  assert.deepEqual(result.error.missing, ["door_switch"]);
});

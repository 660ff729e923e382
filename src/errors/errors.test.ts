/**
 * Pipeline error tests.
 *
 * Run: node --import tsx --test src/errors/errors.test.ts
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";

import {
  ComputationError,
  DataQualityError,
  err,
  isPipelineError,
  ok,
  RequiredSignalMissingError,
  SchemaValidationError,
  toErrorReport,
} from "./index.js";

test("a single data issue becomes the message; several are counted", () => {
  const one = new DataQualityError([{ code: "EMPTY_INPUT", message: "Input has no data rows" }]);
  assert.equal(one.message, "Input has no data rows");
  assert.ok(one.has("EMPTY_INPUT"));
  assert.ok(!one.has("MALFORMED_ROW"));

  const two = new DataQualityError([
    { code: "UNRECOGNIZED_UNIT", message: "bad unit" },
    { code: "NO_TIMESTAMP_COLUMN", message: "no timestamp" },
  ]);
  assert.equal(two.message, "2 data quality defects: UNRECOGNIZED_UNIT, NO_TIMESTAMP_COLUMN");
  assert.equal(
    two.format(),
    ["Data quality checks failed:", "  - [UNRECOGNIZED_UNIT] bad unit", "  - [NO_TIMESTAMP_COLUMN] no timestamp"].join("\n")
  );
});

test("missing signals name what is required and what is there", () => {
  const error = new RequiredSignalMissingError({
    industry: "autoclave",
    required: ["temperature", "pressure"],
    missing: ["pressure"],
    available: ["temp_1"],
  });

  assert.equal(error.message, "autoclave validation requires required signal missing: pressure (available: temp_1)");
  assert.equal(
    error.format(),
    [
      "Required signals missing for autoclave:",
      "  required:  temperature, pressure",
      "  missing:   pressure",
      "  available: temp_1",
    ].join("\n")
  );

  const none = new RequiredSignalMissingError({ industry: "concrete", required: ["humidity"], missing: ["humidity", "temperature"], available: [] });
  assert.equal(none.message, "concrete validation requires required signals missing: humidity, temperature (available: none)");
});

test("schema errors format each issue with its path", () => {
  const error = new SchemaValidationError("Invalid specification: 2 validation error(s)", [
    { path: ["parameters", "hold_time_s"], message: "Required", code: "invalid_type" },
    { path: [], message: "Specification must be a JSON object", code: "invalid_type" },
  ]);

  assert.equal(
    error.format(),
    [
      "Specification validation failed:",
      "  - parameters.hold_time_s: Required",
      "  - (root): Specification must be a JSON object",
    ].join("\n")
  );
});

test("error reports keep the kind and structured detail", () => {
  assert.deepEqual(toErrorReport(new ComputationError("haccp", "crossing out of range", { index: 4 })), {
    kind: "computation",
    name: "ComputationError",
    message: "haccp: crossing out of range",
    details: { calculator: "haccp", index: 4 },
  });

  const missing = toErrorReport(
    new RequiredSignalMissingError({ industry: "concrete", required: ["humidity"], missing: ["humidity"], available: ["temp_1"] })
  );
  assert.equal(missing.kind, "required_signal_missing");
  assert.deepEqual(missing.details, {
    industry: "concrete",
    required: ["humidity"],
    missing: ["humidity"],
    available: ["temp_1"],
  });
});

test("only the four pipeline errors are pipeline errors", () => {
  assert.ok(isPipelineError(new ComputationError("powder", "x")));
  assert.ok(isPipelineError(new DataQualityError([{ code: "EMPTY_INPUT", message: "x" }])));
  assert.ok(!isPipelineError(new Error("plain")));
  assert.ok(!isPipelineError({ kind: "computation" }));
});

test("results carry either a value or an error", () => {
  const good = ok(42);
  const bad = err("nope");

  assert.deepEqual(good, { ok: true, value: 42 });
  assert.deepEqual(bad, { ok: false, error: "nope" });
});

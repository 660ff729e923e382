/**
 * Pipeline configuration tests.
 *
 * Run: node --import tsx --test src/config/pipeline/pipeline-config.test.ts
 *
 * Tests cover:
 *   1. Defaults, partial overrides and freezing
 *   2. Structured validation errors
 *   3. Policy flags read from the environment
 *   4. Application settings (log level, environment name)
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";

import { ConfigError, parseLogLevel, validateConfig } from "../index.js";
import {
  DEFAULT_PIPELINE_CONFIG,
  loadPipelineConfig,
  PipelineConfigError,
  pipelineConfigFromEnv,
  summarizePolicy,
  validatePipelineConfig,
} from "./index.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST FIXTURES
// ═══════════════════════════════════════════════════════════════════════════

const POLICY_ENV = [
  "SAFE_MODE",
  "HUMAN_QA_REQUIRED_FOR_PASS",
  "FAIL_ON_PARSER_WARNINGS",
  "DUPLICATE_POLICY",
  "GAP_POLICY",
  "DATE_ORDER",
  "DEFAULT_TIMEZONE",
  "MIN_DISTINCT_POINTS",
  "RESAMPLE_STEP_S",
];

/** Run `body` with only `vars` set among the policy variables. */
function withEnv(vars: Record<string, string>, body: () => void): void {
  const saved = new Map(POLICY_ENV.map((key) => [key, process.env[key]]));
  for (const key of POLICY_ENV) delete process.env[key];
  Object.assign(process.env, vars);
  try {
    body();
  } finally {
    for (const [key, value] of saved) {
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
  }
}

function configError(input: unknown): PipelineConfigError {
  try {
    loadPipelineConfig(input);
  } catch (error) {
    if (error instanceof PipelineConfigError) return error;
    throw error;
  }
  throw new Error("expected PipelineConfigError");
}

// ═══════════════════════════════════════════════════════════════════════════
// LOADING
// ═══════════════════════════════════════════════════════════════════════════

test("an empty input loads the defaults, frozen", () => {
  const config = loadPipelineConfig();

  assert.deepEqual(config, DEFAULT_PIPELINE_CONFIG);
  assert.ok(Object.isFrozen(config));
  assert.equal(config.duplicatePolicy, "error");
  assert.equal(config.resampleStepS, null);
});

test("partial input overrides only the given fields", () => {
  const config = loadPipelineConfig({ safeMode: true, duplicatePolicy: "mean" });

  assert.equal(config.safeMode, true);
  assert.equal(config.duplicatePolicy, "mean");
  assert.equal(config.minDistinctPoints, DEFAULT_PIPELINE_CONFIG.minDistinctPoints);
});

test("invalid values are reported per field", () => {
  const error = configError({ duplicatePolicy: "last", minDistinctPoints: 1 });

  assert.equal(error.message, "Invalid pipeline configuration: 2 validation error(s)");
  assert.deepEqual(
    error.issues.map((issue) => issue.path),
    [["duplicatePolicy"], ["minDistinctPoints"]]
  );
  assert.equal(error.format().split("\n")[0], "Pipeline configuration validation failed:");
});

test("unknown keys and inverted limits are rejected", () => {
  assert.equal(configError({ colour: "blue" }).issues[0].code, "unrecognized_keys");

  const limits = configError({ maxPoints: 3 });
  assert.deepEqual(limits.issues, [
    { path: ["maxPoints"], message: "maxPoints must be at least minDistinctPoints", code: "custom" },
  ]);
});

test("validation without merging reports missing fields", () => {
  assert.deepEqual(validatePipelineConfig(DEFAULT_PIPELINE_CONFIG), { success: true, config: DEFAULT_PIPELINE_CONFIG });

  const partial = validatePipelineConfig({ safeMode: true });
  assert.equal(partial.success, false);
  assert.ok((partial.errors ?? []).some((issue) => issue.path[0] === "duplicatePolicy"));
});

test("the policy summary reads as one line", () => {
  assert.equal(
    summarizePolicy(DEFAULT_PIPELINE_CONFIG),
    "Safe Mode: DISABLED | Human QA: BYPASSED | Parser Warnings: LOG ONLY | Duplicates: error"
  );
  assert.equal(
    summarizePolicy({ ...DEFAULT_PIPELINE_CONFIG, safeMode: true, humanQaRequiredForPass: true }),
    "Safe Mode: ENABLED | Human QA: REQUIRED | Parser Warnings: LOG ONLY | Duplicates: error"
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// ENVIRONMENT
// ═══════════════════════════════════════════════════════════════════════════

test("unset policy variables fall back to the defaults", () => {
  withEnv({}, () => {
    assert.deepEqual(pipelineConfigFromEnv(), DEFAULT_PIPELINE_CONFIG);
  });
});

test("policy variables are parsed by type", () => {
  withEnv(
    { SAFE_MODE: "yes", DUPLICATE_POLICY: "first-wins", DATE_ORDER: "day-first", RESAMPLE_STEP_S: "30", MIN_DISTINCT_POINTS: "10" },
    () => {
      const config = pipelineConfigFromEnv();
      assert.equal(config.safeMode, true);
      assert.equal(config.duplicatePolicy, "first-wins");
      assert.equal(config.dateOrder, "day-first");
      assert.equal(config.resampleStepS, 30);
      assert.equal(config.minDistinctPoints, 10);
    }
  );
});

test("malformed policy variables are configuration errors", () => {
  withEnv({ DUPLICATE_POLICY: "last" }, () => {
    assert.throws(pipelineConfigFromEnv, {
      name: "ConfigError",
      message: "Environment variable DUPLICATE_POLICY must be one of error, first-wins, mean, got: last",
    });
  });
  withEnv({ SAFE_MODE: "maybe" }, () => {
    assert.throws(pipelineConfigFromEnv, ConfigError);
  });
  withEnv({ RESAMPLE_STEP_S: "fast" }, () => {
    assert.throws(pipelineConfigFromEnv, ConfigError);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// APPLICATION SETTINGS
// ═══════════════════════════════════════════════════════════════════════════

test("log levels and environment names are checked", () => {
  assert.equal(parseLogLevel("debug"), "debug");
  assert.throws(() => parseLogLevel("verbose"), ConfigError);

  const settings = { env: "test", debug: false, logLevel: "info", logDir: "output/logs", appName: "app" };
  assert.doesNotThrow(() => validateConfig(settings));
  assert.throws(() => validateConfig({ ...settings, env: "staging" }), {
    message: "Invalid NODE_ENV: staging. Must be development, production, or test.",
  });
});

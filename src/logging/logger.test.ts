/**
 * Logger tests.
 *
 * Run: node --import tsx --test src/logging/logger.test.ts
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";
import { existsSync, mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { createLogger, createSilentLogger, formatLogEntry, generateRunId, getRunId, initRunId } from "./index.js";

const AT = new Date(Date.UTC(2024, 0, 15, 8, 0, 0));

test("run ids carry the UTC date and a random suffix", () => {
  assert.match(generateRunId(AT), /^20240115-[0-9a-f]{6}$/);
  assert.equal(initRunId("run-42"), "run-42");
  assert.equal(getRunId(), "run-42");
});

test("entries carry time, padded level, run id and context", () => {
  initRunId("run-42");

  assert.equal(
    formatLogEntry("info", "Series normalized", { samples: 5 }, AT),
    '[2024-01-15T08:00:00.000Z] [INFO ] [run-42] Series normalized {"samples":5}'
  );
  assert.equal(formatLogEntry("error", "Bundle write failed", {}, AT), "[2024-01-15T08:00:00.000Z] [ERROR] [run-42] Bundle write failed");
});

test("file output respects the level and merges child bindings", () => {
  initRunId("run-42");
  const dir = mkdtempSync(join(tmpdir(), "logger-test-"));
  try {
    const logger = createLogger({ level: "warn", logDir: join(dir, "logs"), logFile: "test.log", console: false });
    logger.info("dropped");
    logger.child({ component: "normalizer" }).warn("Gap found", { largestS: 120 });
    logger.error("Failed");

    const lines = readFileSync(join(dir, "logs", "test.log"), "utf-8").trimEnd().split("\n");
    assert.equal(lines.length, 2);
    assert.match(lines[0], /^\[[^\]]+\] \[WARN \] \[run-42\] Gap found \{"component":"normalizer","largestS":120\}$/);
    assert.match(lines[1], /^\[[^\]]+\] \[ERROR\] \[run-42\] Failed$/);
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
});

test("the silent logger writes nothing", () => {
  const cwdLog = join("output", "logs", "pipeline.log");
  const before = existsSync(cwdLog) ? readFileSync(cwdLog, "utf-8") : null;

  const logger = createSilentLogger();
  logger.error("nothing to see", { code: 1 });
  logger.child({ component: "verifier" }).info("still nothing");

  const after = existsSync(cwdLog) ? readFileSync(cwdLog, "utf-8") : null;
  assert.equal(after, before);
});

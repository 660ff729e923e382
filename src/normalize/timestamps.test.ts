/**
 * Timestamp parsing and timezone tests.
 *
 * Run: node --import tsx --test src/normalize/timestamps.test.ts
 *
 * Tests cover:
 *   1. Zone designators: UTC, fixed offsets, IANA names
 *   2. Wall-clock conversion across DST transitions
 *   3. Numeric epochs in seconds and milliseconds
 *   4. Day/month order inference and its warnings
 *   5. Unparseable and mixed columns
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";

import {
  localToEpoch,
  parseTimestampColumn,
  resolveZone,
  type LocalDateTime,
  type TimestampParseOptions,
  type Zone,
} from "./timestamps.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST FIXTURES
// ═══════════════════════════════════════════════════════════════════════════

const UTC: Zone = { kind: "utc", label: "UTC" };

function zone(designator: string): Zone {
  const resolved = resolveZone(designator);
  if (resolved === null) throw new Error(`unknown zone ${designator}`);
  return resolved;
}

function wall(year: number, month: number, day: number, hour: number, minute = 0): LocalDateTime {
  return { year, month, day, hour, minute, second: 0, millisecond: 0 };
}

function cells(...texts: string[]) {
  return texts.map((text, i) => ({ line: i + 2, text }));
}

const DECLARED_UTC: TimestampParseOptions = { zone: UTC, zoneAssumed: false, dateOrder: "month-first" };

const iso = (ms: number) => new Date(ms).toISOString();

// ═══════════════════════════════════════════════════════════════════════════
// ZONES
// ═══════════════════════════════════════════════════════════════════════════

test("zone designators resolve to UTC, fixed offsets or IANA zones", () => {
  assert.deepEqual(resolveZone("utc"), UTC);
  assert.deepEqual(resolveZone("Z"), UTC);
  assert.deepEqual(resolveZone("+05:30"), { kind: "fixed", label: "+05:30", offsetMinutes: 330 });
  assert.deepEqual(resolveZone("UTC-3"), { kind: "fixed", label: "-03:00", offsetMinutes: -180 });
  assert.deepEqual(resolveZone("Europe/Berlin"), { kind: "iana", label: "Europe/Berlin", name: "Europe/Berlin" });
});

test("unknown or out-of-range designators do not resolve", () => {
  assert.equal(resolveZone("Mars/Olympus_Mons"), null);
  assert.equal(resolveZone("+15:00"), null);
  assert.equal(resolveZone("   "), null);
});

test("summer time in Berlin is two hours ahead of UTC", () => {
  assert.equal(iso(localToEpoch(wall(2024, 7, 1, 12), zone("Europe/Berlin"))), "2024-07-01T10:00:00.000Z");
  assert.equal(iso(localToEpoch(wall(2024, 1, 15, 12), zone("Europe/Berlin"))), "2024-01-15T11:00:00.000Z");
});

test("a wall time skipped by the spring jump lands after it", () => {
  assert.equal(iso(localToEpoch(wall(2024, 3, 10, 2, 30), zone("America/New_York"))), "2024-03-10T07:30:00.000Z");
});

test("a repeated wall time in autumn resolves to the earlier instant", () => {
  assert.equal(iso(localToEpoch(wall(2024, 11, 3, 1, 30), zone("America/New_York"))), "2024-11-03T05:30:00.000Z");
});

test("fixed offsets subtract from the wall time", () => {
  assert.equal(iso(localToEpoch(wall(2024, 1, 15, 13, 30), zone("+05:30"))), "2024-01-15T08:00:00.000Z");
});

// ═══════════════════════════════════════════════════════════════════════════
// NUMERIC COLUMNS
// ═══════════════════════════════════════════════════════════════════════════

test("epoch seconds are detected by magnitude", () => {
  const result = parseTimestampColumn(cells("1705305600", "1705305660.5"), DECLARED_UTC);

  assert.ok(result.ok);
  assert.equal(result.value.format, "unix_s");
  assert.deepEqual(result.value.times, [1705305600000, 1705305660500]);
  assert.equal(iso(result.value.times[0]), "2024-01-15T08:00:00.000Z");
});

test("epoch milliseconds are detected by magnitude", () => {
  const result = parseTimestampColumn(cells("1705305600000", "1705305660000"), DECLARED_UTC);

  assert.ok(result.ok);
  assert.equal(result.value.format, "unix_ms");
  assert.deepEqual(result.value.times, [1705305600000, 1705305660000]);
});

test("small relative seconds are still seconds", () => {
  const result = parseTimestampColumn(cells("0", "60", "120"), DECLARED_UTC);

  assert.ok(result.ok);
  assert.deepEqual(result.value.times, [0, 60_000, 120_000]);
});

// ═══════════════════════════════════════════════════════════════════════════
// CALENDAR COLUMNS
// ═══════════════════════════════════════════════════════════════════════════

test("ISO stamps honor their own offset over the column zone", () => {
  const options = { ...DECLARED_UTC, zone: zone("Europe/Berlin") };
  const result = parseTimestampColumn(cells("2024-01-15T09:00:00+01:00", "2024-01-15 08:01:00.250Z"), options);

  assert.ok(result.ok);
  assert.deepEqual(result.value.times.map(iso), ["2024-01-15T08:00:00.000Z", "2024-01-15T08:01:00.250Z"]);
  assert.equal(result.value.usedZone, false);
  assert.deepEqual(result.value.warnings, []);
});

test("naive stamps under an assumed zone carry a warning", () => {
  const options: TimestampParseOptions = { zone: zone("Europe/Berlin"), zoneAssumed: true, dateOrder: "month-first" };
  const result = parseTimestampColumn(cells("2024-07-01 12:00", "2024-07-01 12:01"), options);

  assert.ok(result.ok);
  assert.equal(iso(result.value.times[0]), "2024-07-01T10:00:00.000Z");
  assert.deepEqual(result.value.warnings, [
    {
      code: "TIMEZONE_ASSUMED",
      message: "No timezone declared; local timestamps interpreted as Europe/Berlin",
      source: "parser",
      detail: { timezone: "Europe/Berlin" },
    },
  ]);
});

test("a day above twelve fixes the day-first order for the whole column", () => {
  const result = parseTimestampColumn(cells("03/01/2024 08:00", "15/01/2024 08:00"), DECLARED_UTC);

  assert.ok(result.ok);
  assert.deepEqual(result.value.times.map(iso), ["2024-01-03T08:00:00.000Z", "2024-01-15T08:00:00.000Z"]);
  assert.deepEqual(result.value.warnings, []);
});

test("ambiguous dates fall back to the configured order with a warning", () => {
  const monthFirst = parseTimestampColumn(cells("03/04/2024"), DECLARED_UTC);
  assert.ok(monthFirst.ok);
  assert.equal(iso(monthFirst.value.times[0]), "2024-03-04T00:00:00.000Z");
  assert.deepEqual(
    monthFirst.value.warnings.map((w) => w.code),
    ["AMBIGUOUS_DATE_ORDER"]
  );

  const dayFirst = parseTimestampColumn(cells("03.04.2024"), { ...DECLARED_UTC, dateOrder: "day-first" });
  assert.ok(dayFirst.ok);
  assert.equal(iso(dayFirst.value.times[0]), "2024-04-03T00:00:00.000Z");
});

test("twelve-hour clock times convert to the day's hours", () => {
  const result = parseTimestampColumn(cells("01/15/2024 12:05 AM", "01/15/2024 12:30 PM", "01/15/2024 1:15:30 pm"), DECLARED_UTC);

  assert.ok(result.ok);
  assert.deepEqual(result.value.times.map(iso), [
    "2024-01-15T00:05:00.000Z",
    "2024-01-15T12:30:00.000Z",
    "2024-01-15T13:15:30.000Z",
  ]);
});

// ═══════════════════════════════════════════════════════════════════════════
// FAILURES
// ═══════════════════════════════════════════════════════════════════════════

test("a column with evidence both ways is inconsistent", () => {
  const result = parseTimestampColumn(cells("13/01/2024", "01/13/2024"), DECLARED_UTC);

  assert.ok(!result.ok);
  assert.equal(result.error.issues[0].code, "INCONSISTENT_DATE_ORDER");
});

test("unparseable cells are reported with their line", () => {
  const result = parseTimestampColumn(cells("2024-01-15T08:00:00Z", "not a time", "2024-02-30 08:00"), DECLARED_UTC);

  assert.ok(!result.ok);
  assert.deepEqual(
    result.error.issues.map((issue) => issue.message),
    ['Unparseable timestamp "not a time" on line 3', 'Unparseable timestamp "2024-02-30 08:00" on line 4']
  );
});

test("numbers mixed into a calendar column are unparseable", () => {
  const result = parseTimestampColumn(cells("2024-01-15T08:00:00Z", "1705305660"), DECLARED_UTC);

  assert.ok(!result.ok);
  assert.equal(result.error.message, 'Unparseable timestamp "1705305660" on line 3');
});

test("numbers past the millisecond horizon are unparseable", () => {
  const result = parseTimestampColumn(cells("0", "99999999999999999"), DECLARED_UTC);

  assert.ok(!result.ok);
  assert.equal(result.error.issues[0].code, "UNPARSEABLE_TIMESTAMP");
});

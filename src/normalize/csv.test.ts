/**
 * CSV reader tests.
 *
 * Run: node --import tsx --test src/normalize/csv.test.ts
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";

import { parseCsv } from "./csv.js";

test("reads a header and rows with CRLF endings and a byte order mark", () => {
  const result = parseCsv("\ufefftimestamp,temp_1\r\n0,20\r\n60,21\r\n");

  assert.ok(result.ok);
  assert.deepEqual(result.value.header, ["timestamp", "temp_1"]);
  assert.equal(result.value.headerLine, 1);
  assert.deepEqual(
    result.value.rows.map((row) => [row.line, [...row.cells]]),
    [
      [2, ["0", "20"]],
      [3, ["60", "21"]],
    ]
  );
});

test("quoted fields keep commas, doubled quotes and newlines", () => {
  const result = parseCsv('timestamp,note\n0,"a, b"\n60,"say ""hi"""\n120,"two\nlines"\n180,plain');

  assert.ok(result.ok);
  assert.deepEqual(
    result.value.rows.map((row) => row.cells[1]),
    ["a, b", 'say "hi"', "two\nlines", "plain"]
  );
  assert.deepEqual(
    result.value.rows.map((row) => row.line),
    [2, 3, 4, 6]
  );
});

test("header cells are trimmed and blank lines skipped", () => {
  const result = parseCsv(" timestamp , temp_1 \n\n0,20\n   \n60,21\n");

  assert.ok(result.ok);
  assert.deepEqual(result.value.header, ["timestamp", "temp_1"]);
  assert.deepEqual(
    result.value.rows.map((row) => row.line),
    [3, 5]
  );
});

test("comment lines become metadata when shaped key: value", () => {
  const text = [
    "# Site: Plant A",
    "# Oven-ID : OV 3",
    "# free text without a key",
    "timestamp,temp_1",
    "0,20",
  ].join("\n");
  const result = parseCsv(text);

  assert.ok(result.ok);
  assert.deepEqual(result.value.metadata, { site: "Plant A", "oven-id": "OV 3" });
  assert.equal(result.value.headerLine, 4);
  assert.equal(result.value.rows[0].line, 5);
});

test("rows with the wrong field count are reported by line", () => {
  const result = parseCsv("timestamp,temp_1\n0,20\n60,21,22\n120\n");

  assert.ok(!result.ok);
  assert.deepEqual(
    result.error.issues.map((issue) => issue.message),
    ["Line 3 has 3 fields, header has 2", "Line 4 has 1 fields, header has 2"]
  );
});

test("malformed rows beyond ten collapse into a count", () => {
  const lines = ["timestamp,temp_1", ...Array.from({ length: 12 }, (_, i) => `${i},1,2`)];
  const result = parseCsv(lines.join("\n"));

  assert.ok(!result.ok);
  assert.equal(result.error.issues.length, 11);
  assert.equal(result.error.issues[10].message, "2 further malformed rows not listed");
});

test("an unterminated quote is malformed", () => {
  const result = parseCsv('timestamp,note\n0,"open\n60,x\n');

  assert.ok(!result.ok);
  assert.equal(result.error.issues[0].code, "MALFORMED_ROW");
  assert.equal(result.error.message, "Unterminated quoted field in row starting on line 2");
});

test("empty input and header-only input are rejected", () => {
  const empty = parseCsv("\n\n# only: comments\n");
  assert.ok(!empty.ok);
  assert.equal(empty.error.message, "Input has no header row");

  const headerOnly = parseCsv("timestamp,temp_1\n");
  assert.ok(!headerOnly.ok);
  assert.equal(headerOnly.error.message, "Input has no data rows");
  assert.ok(headerOnly.error.has("EMPTY_INPUT"));
});

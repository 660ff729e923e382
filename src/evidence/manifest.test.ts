/**
 * Manifest and canonical JSON tests.
 *
 * Run: node --import tsx --test src/evidence/manifest.test.ts
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";
import { createHash } from "node:crypto";

import { canonicalJson, CanonicalJsonError } from "../utils/canonical-json.js";
import {
  buildManifest,
  comparePaths,
  computeRootHash,
  DEFAULT_CREATED_AT,
  isCanonicalManifest,
  parseManifest,
  serializeManifest,
  sha256Hex,
  type BundleFile,
} from "./manifest.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST FIXTURES
// ═══════════════════════════════════════════════════════════════════════════

const FILES: BundleFile[] = [
  { path: "outputs/decision.json", content: Buffer.from('{"outcome":"PASS"}\n') },
  { path: "inputs/raw_data.csv", content: Buffer.from("timestamp,temp_1\n0,20\n") },
  { path: "inputs/job.json", content: Buffer.from("{}\n") },
];

// ═══════════════════════════════════════════════════════════════════════════
// CANONICAL JSON
// ═══════════════════════════════════════════════════════════════════════════

test("canonical JSON sorts keys at every level and ends with a newline", () => {
  const text = canonicalJson({ b: 1, a: { d: [true, null], c: "x" } });
  assert.equal(text, '{\n  "a": {\n    "c": "x",\n    "d": [\n      true,\n      null\n    ]\n  },\n  "b": 1\n}\n');
});

test("canonical JSON renders dates as ISO and drops undefined properties", () => {
  assert.equal(
    canonicalJson({ at: new Date(Date.UTC(2024, 0, 15)), skipped: undefined, empty: [] }),
    '{\n  "at": "2024-01-15T00:00:00.000Z",\n  "empty": []\n}\n'
  );
});

test("canonical JSON rejects non-finite numbers with their path", () => {
  assert.throws(
    () => canonicalJson({ metrics: { f0: Number.NaN } }),
    (error: unknown) => error instanceof CanonicalJsonError && error.path === "$.metrics.f0"
  );
  assert.throws(() => canonicalJson([Infinity]), CanonicalJsonError);
});

// ═══════════════════════════════════════════════════════════════════════════
// HASHING
// ═══════════════════════════════════════════════════════════════════════════

test("sha256 of a known string", () => {
  assert.equal(sha256Hex("abc"), "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad");
});

test("paths order by their UTF-8 bytes", () => {
  const paths = ["inputs/x", "Inputs/x", "inputs-x", "inputs/é", "inputs/z"];
  assert.deepEqual([...paths].sort(comparePaths), ["Inputs/x", "inputs-x", "inputs/x", "inputs/z", "inputs/é"]);
});

test("root hash follows the documented preimage", () => {
  const manifest = buildManifest(FILES, DEFAULT_CREATED_AT);
  const hash = createHash("sha256");
  hash.update("evidence-root/1\n");
  hash.update(`created_at ${DEFAULT_CREATED_AT}\n`);
  for (const entry of manifest.files) {
    hash.update(`sha256 ${entry.size_bytes} ${entry.path}\n${entry.digest}\n`);
  }

  assert.equal(manifest.root_hash, hash.digest("hex"));
  assert.equal(computeRootHash(manifest.created_at, manifest.files), manifest.root_hash);
});

// ═══════════════════════════════════════════════════════════════════════════
// MANIFEST
// ═══════════════════════════════════════════════════════════════════════════

test("manifest entries are sorted and sized", () => {
  const manifest = buildManifest(FILES, DEFAULT_CREATED_AT);

  assert.equal(manifest.format, "evidence-manifest/1");
  assert.deepEqual(
    manifest.files.map((entry) => [entry.path, entry.size_bytes]),
    [
      ["inputs/job.json", 3],
      ["inputs/raw_data.csv", 22],
      ["outputs/decision.json", 19],
    ]
  );
  assert.equal(manifest.files[0].digest, sha256Hex("{}\n"));
});

test("the root hash depends on the creation time and every byte", () => {
  const base = buildManifest(FILES, DEFAULT_CREATED_AT);
  assert.notEqual(buildManifest(FILES, "2024-01-15T00:00:00.000Z").root_hash, base.root_hash);

  const changed = FILES.map((file, i) => (i === 1 ? { ...file, content: Buffer.from("timestamp,temp_1\n0,21\n") } : file));
  assert.notEqual(buildManifest(changed, DEFAULT_CREATED_AT).root_hash, base.root_hash);
});

test("a serialized manifest parses back and is canonical", () => {
  const manifest = buildManifest(FILES, DEFAULT_CREATED_AT);
  const bytes = serializeManifest(manifest);
  const parsed = parseManifest(bytes);

  assert.ok(parsed.ok);
  assert.deepEqual(parsed.value, manifest);
  assert.ok(isCanonicalManifest(bytes, parsed.value));

  const reformatted = Buffer.from(JSON.stringify(manifest));
  assert.ok(!isCanonicalManifest(reformatted, manifest));
});

test("malformed manifests are rejected with readable reasons", () => {
  const broken = parseManifest(Buffer.from("{ nope"));
  assert.ok(!broken.ok);
  assert.match(broken.error[0], /^manifest\.json is not valid JSON: /);

  const manifest = buildManifest(FILES, DEFAULT_CREATED_AT);
  const badDigest = {
    ...manifest,
    files: manifest.files.map((entry, i) => (i === 0 ? { ...entry, digest: "ABC" } : entry)),
  };
  const invalid = parseManifest(Buffer.from(JSON.stringify(badDigest)));
  assert.ok(!invalid.ok);
  assert.deepEqual(invalid.error, ["files.0.digest: digest must be 64 lowercase hex characters"]);
});

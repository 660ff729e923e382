/**
 * Evidence manifest and root hash.
 *
 * The manifest lists every bundle file with its SHA-256 digest and size.
 * Entries are ordered by the UTF-8 bytes of their path, so the manifest of
 * a given set of files is unique. The root hash binds the manifest's
 * creation time and every entry:
 *
 *   sha256( "evidence-root/1\n"
 *         + "created_at <created_at>\n"
 *         + for each entry: "<algorithm> <size_bytes> <path>\n<digest>\n" )
 *
 * `created_at` comes from the caller's clock; the default is a fixed
 * instant so that identical inputs give byte-identical bundles.
 */

import { createHash } from "node:crypto";
import { z } from "zod";
import { err, ok, type Result } from "../errors/index.js";
import { canonicalJson } from "../utils/canonical-json.js";

export const MANIFEST_FORMAT = "evidence-manifest/1";
export const ROOT_HASH_DOMAIN = "evidence-root/1";
export const HASH_ALGORITHM = "sha256";
export const DEFAULT_CREATED_AT = "1980-01-01T00:00:00.000Z";

export const ManifestEntrySchema = z
  .object({
    path: z.string().min(1),
    algorithm: z.literal(HASH_ALGORITHM),
    digest: z.string().regex(/^[0-9a-f]{64}$/, "digest must be 64 lowercase hex characters"),
    size_bytes: z.number().int().min(0),
  })
  .strict();

export const ManifestSchema = z
  .object({
    format: z.literal(MANIFEST_FORMAT),
    algorithm: z.literal(HASH_ALGORITHM),
    created_at: z.string().datetime(),
    files: z.array(ManifestEntrySchema),
    root_hash: z.string().regex(/^[0-9a-f]{64}$/, "root_hash must be 64 lowercase hex characters"),
  })
  .strict();

export type ManifestEntry = z.infer<typeof ManifestEntrySchema>;
export type EvidenceManifest = z.infer<typeof ManifestSchema>;

export interface BundleFile {
  readonly path: string;
  readonly content: Buffer;
}

// ---------------------------------------------------------------------------
// Hashing
// ---------------------------------------------------------------------------

export function sha256Hex(content: Uint8Array | string): string {
  return createHash(HASH_ALGORITHM).update(content).digest("hex");
}

/** Order of paths by their UTF-8 bytes. */
export function comparePaths(a: string, b: string): number {
  return Buffer.compare(Buffer.from(a, "utf-8"), Buffer.from(b, "utf-8"));
}

export function computeRootHash(createdAt: string, entries: readonly ManifestEntry[]): string {
  const hash = createHash(HASH_ALGORITHM);
  hash.update(`${ROOT_HASH_DOMAIN}\n`, "utf-8");
  hash.update(`created_at ${createdAt}\n`, "utf-8");
  for (const entry of entries) {
    hash.update(`${entry.algorithm} ${entry.size_bytes} ${entry.path}\n${entry.digest}\n`, "utf-8");
  }
  return hash.digest("hex");
}

// ---------------------------------------------------------------------------
// Manifest
// ---------------------------------------------------------------------------

export function manifestEntry(file: BundleFile): ManifestEntry {
  return {
    path: file.path,
    algorithm: HASH_ALGORITHM,
    digest: sha256Hex(file.content),
    size_bytes: file.content.byteLength,
  };
}

export function buildManifest(files: readonly BundleFile[], createdAt: string): EvidenceManifest {
  const entries = files.map(manifestEntry).sort((a, b) => comparePaths(a.path, b.path));
  return {
    format: MANIFEST_FORMAT,
    algorithm: HASH_ALGORITHM,
    created_at: createdAt,
    files: entries,
    root_hash: computeRootHash(createdAt, entries),
  };
}

export function serializeManifest(manifest: EvidenceManifest): Buffer {
  return Buffer.from(canonicalJson(manifest), "utf-8");
}

/**
 * Parse manifest bytes.
 *
 * @returns the manifest, or the reasons it could not be read
 */
export function parseManifest(content: Buffer): Result<EvidenceManifest, string[]> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content.toString("utf-8"));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return err([`manifest.json is not valid JSON: ${message}`]);
  }
  const result = ManifestSchema.safeParse(parsed);
  if (!result.success) {
    return err(result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`));
  }
  return ok(result.data);
}

/**
 * Whether the manifest bytes are exactly its canonical rendering with
 * strictly ordered, unique paths.
 */
export function isCanonicalManifest(content: Buffer, manifest: EvidenceManifest): boolean {
  for (let i = 1; i < manifest.files.length; i++) {
    if (comparePaths(manifest.files[i - 1].path, manifest.files[i].path) >= 0) return false;
  }
  return serializeManifest(manifest).equals(content);
}

/**
 * Evidence bundles: build, store, verify.
 *
 * Usage:
 *   import { readBundle, verifyBundle } from "./evidence/index.js";
 *
 *   const report = verifyBundle(readBundle("evidence/job-42"));
 *   if (!report.match) console.error(report.mismatches);
 */

export {
  buildBundle,
  seriesDocument,
  BUNDLE_PATHS,
  JobDescriptorSchema,
  type BundleInput,
  type BundleOptions,
  type BuiltBundle,
  type EvidenceBundle,
  type JobDescriptor,
} from "./builder.js";
export {
  buildManifest,
  computeRootHash,
  comparePaths,
  isCanonicalManifest,
  manifestEntry,
  parseManifest,
  serializeManifest,
  sha256Hex,
  ManifestSchema,
  ManifestEntrySchema,
  DEFAULT_CREATED_AT,
  HASH_ALGORITHM,
  MANIFEST_FORMAT,
  ROOT_HASH_DOMAIN,
  type BundleFile,
  type EvidenceManifest,
  type ManifestEntry,
} from "./manifest.js";
export { writeBundle, readBundle, isSafeBundlePath, BundleStorageError } from "./storage.js";
export {
  verifyBundle,
  type HashMismatch,
  type IntegrityReport,
  type Mismatch,
  type MismatchKind,
  type VerificationReport,
  type VerifyOptions,
} from "./verifier.js";

/**
 * Bundle directories on disk.
 *
 * writeBundle stages every file in a sibling temporary directory and
 * renames it into place, so a bundle directory is either complete or
 * absent. The temporary directory is removed on every exit path.
 */

import { existsSync, mkdirSync, mkdtempSync, readdirSync, readFileSync, renameSync, rmSync, writeFileSync } from "node:fs";
import { basename, dirname, join, posix, resolve } from "node:path";
import type { EvidenceBundle } from "./builder.js";
import { comparePaths, type BundleFile } from "./manifest.js";

export class BundleStorageError extends Error {
  public readonly path: string;

  constructor(message: string, path: string) {
    super(message);
    this.name = "BundleStorageError";
    this.path = path;
  }
}

/** Relative, forward-slash, no `.` or `..` segments. */
export function isSafeBundlePath(path: string): boolean {
  if (path === "" || path.startsWith("/") || path.includes("\\")) return false;
  return path.split("/").every((segment) => segment !== "" && segment !== "." && segment !== "..");
}

/**
 * Write a bundle to `dir`, which must not exist yet.
 *
 * @returns the absolute bundle directory
 */
export function writeBundle(bundle: EvidenceBundle, dir: string): string {
  const target = resolve(dir);
  if (existsSync(target)) {
    throw new BundleStorageError(`Bundle directory already exists: ${target}`, target);
  }
  for (const file of bundle.files) {
    if (!isSafeBundlePath(file.path)) {
      throw new BundleStorageError(`Unsafe bundle path "${file.path}"`, file.path);
    }
  }

  const parent = dirname(target);
  mkdirSync(parent, { recursive: true });
  const staging = mkdtempSync(join(parent, `.${basename(target)}.tmp-`));

  try {
    for (const file of bundle.files) {
      const destination = join(staging, ...file.path.split("/"));
      mkdirSync(dirname(destination), { recursive: true });
      writeFileSync(destination, file.content);
    }
    renameSync(staging, target);
  } finally {
    rmSync(staging, { recursive: true, force: true });
  }

  return target;
}

function walk(root: string, relative: string, out: BundleFile[]): void {
  const entries = readdirSync(join(root, relative), { withFileTypes: true });
  for (const entry of entries) {
    const path = relative === "" ? entry.name : posix.join(relative, entry.name);
    if (entry.isDirectory()) {
      walk(root, path, out);
    } else if (entry.isFile()) {
      out.push({ path, content: readFileSync(join(root, path)) });
    }
  }
}

/**
 * Read every regular file under `dir` into a bundle, in canonical path
 * order.
 *
 * @throws BundleStorageError when the directory cannot be read
 */
export function readBundle(dir: string): EvidenceBundle {
  const root = resolve(dir);
  const files: BundleFile[] = [];
  try {
    walk(root, "", files);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new BundleStorageError(`Cannot read bundle directory ${root}: ${message}`, root);
  }
  files.sort((a, b) => comparePaths(a.path, b.path));
  return { files };
}

/**
 * Canonical JSON rendering.
 *
 * Object keys sorted recursively, 2-space indent, trailing newline. Dates
 * render as ISO-8601 UTC. Values JSON cannot represent faithfully
 * (non-finite numbers, bigint, functions, undefined array slots) are rejected.
 */

export class CanonicalJsonError extends Error {
  public readonly path: string;

  constructor(message: string, path: string) {
    super(`${message} at ${path}`);
    this.name = "CanonicalJsonError";
    this.path = path;
  }
}

function compareKeys(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function render(value: unknown, indent: string, path: string): string {
  if (value === null) return "null";

  switch (typeof value) {
    case "boolean":
      return value ? "true" : "false";
    case "string":
      return JSON.stringify(value);
    case "number":
      if (!Number.isFinite(value)) {
        throw new CanonicalJsonError(`Non-finite number ${String(value)}`, path);
      }
      return JSON.stringify(value);
    case "object":
      break;
    default:
      throw new CanonicalJsonError(`Unsupported ${typeof value} value`, path);
  }

  if (value instanceof Date) {
    return JSON.stringify(value.toISOString());
  }

  const inner = indent + "  ";

  if (Array.isArray(value)) {
    if (value.length === 0) return "[]";
    const items = value.map((item: unknown, i) => {
      if (item === undefined) {
        throw new CanonicalJsonError("Undefined array element", `${path}[${i}]`);
      }
      return inner + render(item, inner, `${path}[${i}]`);
    });
    return `[\n${items.join(",\n")}\n${indent}]`;
  }

  const keys = Object.keys(value)
    .filter((key) => Reflect.get(value, key) !== undefined)
    .sort(compareKeys);
  if (keys.length === 0) return "{}";
  const entries = keys.map(
    (key) =>
      `${inner}${JSON.stringify(key)}: ${render(Reflect.get(value, key), inner, `${path}.${key}`)}`
  );
  return `{\n${entries.join(",\n")}\n${indent}}`;
}

/**
 * Render a value as canonical JSON text.
 *
 * @throws CanonicalJsonError for values without a canonical form
 */
export function canonicalJson(value: unknown): string {
  return render(value, "", "$") + "\n";
}

/** Canonical JSON as UTF-8 bytes. */
export function canonicalJsonBytes(value: unknown): Buffer {
  return Buffer.from(canonicalJson(value), "utf-8");
}

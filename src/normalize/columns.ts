/**
 * Column detection.
 *
 * Headers are matched against the alias table in `data/column-aliases.json`
 * (exact names first, then patterns). Units come from a `[unit]` / `(unit)`
 * suffix or a trailing `_c`, `_f`, `_bar`, `_kpa`, `_psi`, `_mbar` token.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import { ConfigError } from "../config/env.js";
import { formatZodIssues } from "../config/pipeline/index.js";
import {
  DataQualityError,
  err,
  ok,
  type DataQualityIssue,
  type Result,
} from "../errors/index.js";
import type { SensorChannel, SensorKind, SourceUnit } from "../types/index.js";
import { canonicalUnit, kindOfUnit, parseUnitToken } from "./units.js";

// ═══════════════════════════════════════════════════════════════════════════
// ALIAS TABLE
// ═══════════════════════════════════════════════════════════════════════════

const AliasList = z.array(z.string().min(1));

export const ColumnAliasFileSchema = z
  .object({
    timestamp: AliasList.describe("Header names of the timestamp column"),
    temperature: AliasList,
    pressure: AliasList,
    humidity: AliasList,
    patterns: z
      .object({
        temperature: AliasList,
        pressure: AliasList,
        humidity: AliasList,
      })
      .strict()
      .describe("Regular expressions matched against normalized header names"),
  })
  .strict();

export type ColumnAliasFile = z.infer<typeof ColumnAliasFileSchema>;

export interface ColumnAliasTable {
  readonly timestamp: ReadonlySet<string>;
  readonly names: Readonly<Record<SensorKind, ReadonlySet<string>>>;
  readonly patterns: Readonly<Record<SensorKind, readonly RegExp[]>>;
}

export const DEFAULT_ALIAS_FILE = new URL("../../data/column-aliases.json", import.meta.url);

const SENSOR_KINDS: readonly SensorKind[] = ["temperature", "pressure", "humidity"];

/**
 * Build a lookup table from a validated alias file.
 */
export function buildAliasTable(file: ColumnAliasFile): ColumnAliasTable {
  const lower = (values: string[]): Set<string> => new Set(values.map((v) => v.toLowerCase()));
  return {
    timestamp: lower(file.timestamp),
    names: {
      temperature: lower(file.temperature),
      pressure: lower(file.pressure),
      humidity: lower(file.humidity),
    },
    patterns: {
      temperature: file.patterns.temperature.map((p) => new RegExp(p, "i")),
      pressure: file.patterns.pressure.map((p) => new RegExp(p, "i")),
      humidity: file.patterns.humidity.map((p) => new RegExp(p, "i")),
    },
  };
}

let defaultTable: ColumnAliasTable | null = null;

/**
 * Load and validate an alias file. The default file is read once.
 *
 * @throws ConfigError if the file is unreadable or fails validation
 */
export function loadColumnAliases(path: URL | string = DEFAULT_ALIAS_FILE): ColumnAliasTable {
  const isDefault = path === DEFAULT_ALIAS_FILE;
  if (isDefault && defaultTable !== null) return defaultTable;

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    throw new ConfigError(
      `Failed to read column alias table ${String(path)}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const result = ColumnAliasFileSchema.safeParse(parsed);
  if (!result.success) {
    const details = formatZodIssues(result.error.issues)
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid column alias table: ${details}`);
  }

  const table = buildAliasTable(result.data);
  if (isDefault) defaultTable = table;
  return table;
}

// ═══════════════════════════════════════════════════════════════════════════
// HEADER ANALYSIS
// ═══════════════════════════════════════════════════════════════════════════

const BRACKET_UNIT = /^(.*?)\s*[[(]\s*([^\])]*?)\s*[\])]\s*$/;
const SUFFIX_UNIT = /(?:^|_)(c|f|degc|degf|celsius|fahrenheit|bar|kpa|psi|mbar)$/;

export interface HeaderParts {
  /** Sensor name: lowercased, unit removed, whitespace runs as `_` */
  readonly name: string;
  /** Text inside a trailing `[...]` or `(...)`, if any */
  readonly unitToken: string | null;
}

export function splitHeader(raw: string): HeaderParts {
  const text = raw.trim();
  const match = BRACKET_UNIT.exec(text);
  const base = match ? match[1] : text;
  return {
    name: base.trim().toLowerCase().replace(/\s+/g, "_"),
    unitToken: match ? match[2] : null,
  };
}

function kindFromName(name: string, table: ColumnAliasTable): SensorKind | null {
  for (const kind of SENSOR_KINDS) {
    if (table.names[kind].has(name)) return kind;
  }
  for (const kind of SENSOR_KINDS) {
    if (table.patterns[kind].some((pattern) => pattern.test(name))) return kind;
  }
  return null;
}

function suffixUnit(name: string): SourceUnit | null {
  const match = SUFFIX_UNIT.exec(name);
  return match ? parseUnitToken(match[1]) : null;
}

// ═══════════════════════════════════════════════════════════════════════════
// DETECTION
// ═══════════════════════════════════════════════════════════════════════════

export interface ColumnBinding {
  readonly index: number;
  readonly channel: SensorChannel;
}

export interface ColumnLayout {
  readonly timestampIndex: number;
  readonly timestampColumn: string;
  readonly bindings: readonly ColumnBinding[];
  /** Header cells that matched nothing */
  readonly unrecognized: readonly string[];
}

/**
 * Parse a declared temperature unit (`C`, `°F`, `fahrenheit`, ...).
 */
export function parseDeclaredUnit(declared: string): "C" | "F" | null {
  const unit = parseUnitToken(declared);
  return unit === "C" || unit === "F" ? unit : null;
}

/**
 * Map header cells to a timestamp column and sensor channels.
 *
 * `declaredUnits` applies to temperature columns without their own unit.
 */
export function detectColumns(
  header: readonly string[],
  declaredUnits?: string,
  table: ColumnAliasTable = loadColumnAliases()
): Result<ColumnLayout, DataQualityError> {
  const issues: DataQualityIssue[] = [];

  let declared: "C" | "F" = "C";
  if (declaredUnits !== undefined) {
    const parsed = parseDeclaredUnit(declaredUnits);
    if (parsed === null) {
      issues.push({
        code: "UNRECOGNIZED_UNIT",
        message: `Declared temperature unit "${declaredUnits}" is not recognized (expected C or F)`,
        detail: { declared: declaredUnits },
      });
    } else {
      declared = parsed;
    }
  }

  let timestampIndex = -1;
  const bindings: ColumnBinding[] = [];
  const unrecognized: string[] = [];
  const seen = new Map<string, string>();

  header.forEach((raw, index) => {
    const { name, unitToken } = splitHeader(raw);

    if (timestampIndex === -1 && table.timestamp.has(name)) {
      timestampIndex = index;
      return;
    }

    const bracketUnit = unitToken === null ? null : parseUnitToken(unitToken);
    let nameSuffixUnit = suffixUnit(name);
    const kind =
      kindFromName(name, table) ??
      (bracketUnit !== null ? kindOfUnit(bracketUnit) : null) ??
      (nameSuffixUnit !== null ? kindOfUnit(nameSuffixUnit) : null);

    if (kind === null) {
      unrecognized.push(raw);
      return;
    }

    if (unitToken !== null && (bracketUnit === null || kindOfUnit(bracketUnit) !== kind)) {
      issues.push({
        code: "UNRECOGNIZED_UNIT",
        message: `Column "${raw}": unit "${unitToken}" is not a recognized ${kind} unit`,
        detail: { column: raw, unit: unitToken, kind },
      });
      return;
    }
    if (nameSuffixUnit !== null && kindOfUnit(nameSuffixUnit) !== kind) {
      nameSuffixUnit = null;
    }

    const sourceUnit: SourceUnit =
      bracketUnit ?? nameSuffixUnit ?? (kind === "temperature" ? declared : kind === "pressure" ? "bar" : "%RH");

    const previous = seen.get(name);
    if (previous !== undefined) {
      issues.push({
        code: "DUPLICATE_COLUMN",
        message: `Columns "${previous}" and "${raw}" both map to sensor "${name}"`,
        detail: { sensor: name, columns: [previous, raw] },
      });
      return;
    }
    seen.set(name, raw);

    bindings.push({
      index,
      channel: { name, kind, unit: canonicalUnit(kind), sourceColumn: raw, sourceUnit },
    });
  });

  if (timestampIndex === -1) {
    issues.push({
      code: "NO_TIMESTAMP_COLUMN",
      message: `No timestamp column found among: ${header.join(", ")}`,
      detail: { header: [...header] },
    });
  } else if (bindings.length === 0 && issues.length === 0) {
    issues.push({
      code: "NO_SENSOR_COLUMNS",
      message: `No temperature, pressure or humidity columns found among: ${header.join(", ")}`,
      detail: { header: [...header] },
    });
  }

  if (issues.length > 0) {
    return err(new DataQualityError(issues));
  }

  return ok({
    timestampIndex,
    timestampColumn: header[timestampIndex],
    bindings,
    unrecognized,
  });
}

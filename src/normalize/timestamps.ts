/**
 * Timestamp column parsing and timezone resolution.
 *
 * Accepted forms:
 *   - unix seconds / milliseconds (the column's magnitude decides)
 *   - ISO-8601 with `T` or space, optional fraction, optional `Z` / offset
 *   - `yyyy/mm/dd [hh:mm[:ss]]`
 *   - `a/b/yyyy`, `a.b.yyyy`, `a-b-yyyy` with optional time and AM/PM
 *
 * Day/month order for `a/b/yyyy` is inferred once per column. Local times
 * are converted through Intl zone offsets.
 */

import type { DateOrder } from "../config/pipeline/index.js";
import {
  DataQualityError,
  err,
  ok,
  type DataQualityIssue,
  type Result,
} from "../errors/index.js";
import { warning, type PipelineWarning } from "../types/index.js";

/** 2100-01-01T00:00:00Z in seconds; numeric stamps above it are milliseconds. */
export const MAX_UNIX_SECONDS = 4_102_444_800;
export const MAX_UNIX_MILLISECONDS = MAX_UNIX_SECONDS * 1000;

// ═══════════════════════════════════════════════════════════════════════════
// TIMEZONES
// ═══════════════════════════════════════════════════════════════════════════

export type Zone =
  | { kind: "utc"; label: string }
  | { kind: "fixed"; label: string; offsetMinutes: number }
  | { kind: "iana"; label: string; name: string };

const FIXED_OFFSET = /^(?:UTC|GMT)?\s*([+-])(\d{1,2})(?::?(\d{2}))?$/i;

const formatters = new Map<string, Intl.DateTimeFormat>();

function zoneFormatter(name: string): Intl.DateTimeFormat | null {
  const cached = formatters.get(name);
  if (cached) return cached;
  try {
    const formatter = new Intl.DateTimeFormat("en-US", {
      timeZone: name,
      hourCycle: "h23",
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
    });
    formatters.set(name, formatter);
    return formatter;
  } catch (error) {
    if (error instanceof RangeError) return null;
    throw error;
  }
}

/**
 * Resolve a zone designator: `UTC`, `±HH:MM` (optionally `UTC+HH:MM`) or an
 * IANA name. Returns null for anything else.
 */
export function resolveZone(designator: string): Zone | null {
  const text = designator.trim();
  if (text === "") return null;
  const upper = text.toUpperCase();
  if (upper === "UTC" || upper === "Z" || upper === "GMT" || upper === "ETC/UTC") {
    return { kind: "utc", label: "UTC" };
  }

  const fixed = FIXED_OFFSET.exec(text);
  if (fixed) {
    const hours = Number(fixed[2]);
    const minutes = fixed[3] === undefined ? 0 : Number(fixed[3]);
    if (hours > 14 || minutes > 59) return null;
    const sign = fixed[1] === "-" ? -1 : 1;
    const offsetMinutes = sign * (hours * 60 + minutes);
    return { kind: "fixed", label: formatOffset(offsetMinutes), offsetMinutes };
  }

  return zoneFormatter(text) === null ? null : { kind: "iana", label: text, name: text };
}

function formatOffset(offsetMinutes: number): string {
  const sign = offsetMinutes < 0 ? "-" : "+";
  const abs = Math.abs(offsetMinutes);
  const hh = String(Math.floor(abs / 60)).padStart(2, "0");
  const mm = String(abs % 60).padStart(2, "0");
  return `${sign}${hh}:${mm}`;
}

/** Offset of an IANA zone from UTC at the given instant, in milliseconds. */
function ianaOffsetMs(formatter: Intl.DateTimeFormat, epochMs: number): number {
  const fields: Record<string, number> = {};
  for (const part of formatter.formatToParts(new Date(epochMs))) {
    if (part.type !== "literal") fields[part.type] = Number(part.value);
  }
  const hour = fields.hour === 24 ? 0 : fields.hour;
  const asUtc = Date.UTC(
    fields.year,
    fields.month - 1,
    fields.day,
    hour,
    fields.minute,
    fields.second
  );
  return asUtc - Math.floor(epochMs / 1000) * 1000;
}

/**
 * Convert a wall-clock time in `zone` to epoch milliseconds.
 *
 * The offset is taken at the naive instant, then re-checked at the result.
 * Wall times skipped by a DST jump land after the jump; repeated wall times
 * resolve to the earlier instant.
 */
export function localToEpoch(local: LocalDateTime, zone: Zone): number {
  const naive = Date.UTC(
    local.year,
    local.month - 1,
    local.day,
    local.hour,
    local.minute,
    local.second,
    local.millisecond
  );
  switch (zone.kind) {
    case "utc":
      return naive;
    case "fixed":
      return naive - zone.offsetMinutes * 60_000;
    case "iana": {
      const formatter = zoneFormatter(zone.name);
      if (formatter === null) return naive;
      const first = ianaOffsetMs(formatter, naive);
      const guess = naive - first;
      const second = ianaOffsetMs(formatter, guess);
      if (second === first) return guess;
      const retry = naive - second;
      return ianaOffsetMs(formatter, retry) === second ? retry : guess;
    }
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// CELL PARSING
// ═══════════════════════════════════════════════════════════════════════════

export interface LocalDateTime {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  millisecond: number;
}

type ParsedCell =
  | { kind: "numeric"; value: number }
  | { kind: "datetime"; local: LocalDateTime; offsetMinutes: number | null }
  | { kind: "ambiguous-date"; a: number; b: number; year: number; time: TimeOfDay }
  | { kind: "invalid" };

interface TimeOfDay {
  hour: number;
  minute: number;
  second: number;
  millisecond: number;
}

const NUMERIC = /^\d+(?:\.\d+)?$/;
const ISO =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d{1,9}))?)?)?\s*(Z|[+-]\d{2}(?::?\d{2})?)?$/i;
const YMD = /^(\d{4})\/(\d{1,2})\/(\d{1,2})(?:[T ]+(.+))?$/;
const AB_YEAR = /^(\d{1,2})([/.-])(\d{1,2})\2(\d{4})(?:[T ]+(.+))?$/;
const TIME = /^(\d{1,2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?\s*(AM|PM)?$/i;

const MIDNIGHT: TimeOfDay = { hour: 0, minute: 0, second: 0, millisecond: 0 };

function fractionToMs(fraction: string | undefined): number {
  if (fraction === undefined) return 0;
  return Number(fraction.padEnd(3, "0").slice(0, 3));
}

function parseTime(text: string | undefined): TimeOfDay | null {
  if (text === undefined) return MIDNIGHT;
  const match = TIME.exec(text.trim());
  if (!match) return null;
  let hour = Number(match[1]);
  const minute = Number(match[2]);
  const second = match[3] === undefined ? 0 : Number(match[3]);
  const meridiem = match[5]?.toUpperCase();
  if (meridiem !== undefined) {
    if (hour < 1 || hour > 12) return null;
    if (meridiem === "AM" && hour === 12) hour = 0;
    if (meridiem === "PM" && hour !== 12) hour += 12;
  }
  if (hour > 23 || minute > 59 || second > 59) return null;
  return { hour, minute, second, millisecond: fractionToMs(match[4]) };
}

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function validDate(year: number, month: number, day: number): boolean {
  return month >= 1 && month <= 12 && day >= 1 && day <= daysInMonth(year, month);
}

function parseOffset(text: string | undefined): number | null {
  if (text === undefined) return null;
  if (text.toUpperCase() === "Z") return 0;
  const sign = text[0] === "-" ? -1 : 1;
  const digits = text.slice(1).replace(":", "");
  const hours = Number(digits.slice(0, 2));
  const minutes = digits.length > 2 ? Number(digits.slice(2, 4)) : 0;
  return sign * (hours * 60 + minutes);
}

function parseCell(raw: string): ParsedCell {
  const text = raw.trim();

  if (NUMERIC.test(text)) {
    return { kind: "numeric", value: Number(text) };
  }

  const iso = ISO.exec(text);
  if (iso) {
    const year = Number(iso[1]);
    const month = Number(iso[2]);
    const day = Number(iso[3]);
    const hour = iso[4] === undefined ? 0 : Number(iso[4]);
    const minute = iso[5] === undefined ? 0 : Number(iso[5]);
    const second = iso[6] === undefined ? 0 : Number(iso[6]);
    if (!validDate(year, month, day) || hour > 23 || minute > 59 || second > 59) {
      return { kind: "invalid" };
    }
    return {
      kind: "datetime",
      local: { year, month, day, hour, minute, second, millisecond: fractionToMs(iso[7]) },
      offsetMinutes: parseOffset(iso[8]),
    };
  }

  const ymd = YMD.exec(text);
  if (ymd) {
    const year = Number(ymd[1]);
    const month = Number(ymd[2]);
    const day = Number(ymd[3]);
    const time = parseTime(ymd[4]);
    if (time === null || !validDate(year, month, day)) return { kind: "invalid" };
    return { kind: "datetime", local: { year, month, day, ...time }, offsetMinutes: null };
  }

  const ab = AB_YEAR.exec(text);
  if (ab) {
    const time = parseTime(ab[5]);
    if (time === null) return { kind: "invalid" };
    return { kind: "ambiguous-date", a: Number(ab[1]), b: Number(ab[3]), year: Number(ab[4]), time };
  }

  return { kind: "invalid" };
}

// ═══════════════════════════════════════════════════════════════════════════
// COLUMN PARSING
// ═══════════════════════════════════════════════════════════════════════════

export interface TimestampCell {
  readonly line: number;
  readonly text: string;
}

export interface TimestampParseOptions {
  /** Zone for local timestamps; already resolved */
  zone: Zone;
  /** Whether `zone` came from configuration rather than a declaration */
  zoneAssumed: boolean;
  dateOrder: DateOrder;
}

export interface ParsedTimestamps {
  /** Epoch milliseconds, in input row order */
  readonly times: number[];
  readonly format: "unix_s" | "unix_ms" | "datetime";
  /** Whether any timestamp was converted through the zone */
  readonly usedZone: boolean;
  readonly warnings: PipelineWarning[];
}

const MAX_LISTED_CELLS = 5;

function unparseable(cells: TimestampCell[], total: number): DataQualityError {
  const listed = cells.slice(0, MAX_LISTED_CELLS);
  const issues: DataQualityIssue[] = listed.map((cell) => ({
    code: "UNPARSEABLE_TIMESTAMP",
    message: `Unparseable timestamp "${cell.text}" on line ${cell.line}`,
    detail: { line: cell.line, value: cell.text },
  }));
  if (total > listed.length) {
    issues.push({
      code: "UNPARSEABLE_TIMESTAMP",
      message: `${total - listed.length} further unparseable timestamps not listed`,
      detail: { total },
    });
  }
  return new DataQualityError(issues);
}

function parseNumericColumn(
  cells: readonly TimestampCell[],
  values: number[]
): Result<ParsedTimestamps, DataQualityError> {
  const max = values.reduce((acc, value) => (value > acc ? value : acc), 0);
  if (max > MAX_UNIX_MILLISECONDS) {
    const bad = cells.filter((_, i) => values[i] > MAX_UNIX_MILLISECONDS);
    return err(unparseable(bad, bad.length));
  }
  const millis = max > MAX_UNIX_SECONDS;
  return ok({
    times: values.map((value) => Math.round(millis ? value : value * 1000)),
    format: millis ? "unix_ms" : "unix_s",
    usedZone: false,
    warnings: [],
  });
}

/**
 * Parse a whole timestamp column to epoch milliseconds.
 *
 * Numeric and calendar forms are not mixed within one column.
 */
export function parseTimestampColumn(
  cells: readonly TimestampCell[],
  options: TimestampParseOptions
): Result<ParsedTimestamps, DataQualityError> {
  const parsed = cells.map((cell) => parseCell(cell.text));

  const invalid = cells.filter((_, i) => parsed[i].kind === "invalid");
  if (invalid.length > 0) {
    return err(unparseable(invalid, invalid.length));
  }

  const numeric: number[] = [];
  for (const cell of parsed) {
    if (cell.kind === "numeric") numeric.push(cell.value);
  }
  if (numeric.length === parsed.length) {
    return parseNumericColumn(cells, numeric);
  }
  if (numeric.length > 0) {
    const mixed = cells.filter((_, i) => parsed[i].kind === "numeric");
    return err(unparseable(mixed, mixed.length));
  }

  const warnings: PipelineWarning[] = [];
  const order = inferDateOrder(parsed, options.dateOrder);
  if (!order.ok) return order;
  if (order.value.assumed) {
    warnings.push(
      warning(
        "parser",
        "AMBIGUOUS_DATE_ORDER",
        `Day/month order could not be inferred; assumed ${options.dateOrder}`,
        { dateOrder: options.dateOrder }
      )
    );
  }

  const dayFirst = order.value.order === "day-first";
  const times: number[] = [];
  const badDates: TimestampCell[] = [];
  let usedZone = false;

  parsed.forEach((cell, i) => {
    let local: LocalDateTime;
    let offsetMinutes: number | null = null;
    if (cell.kind === "datetime") {
      local = cell.local;
      offsetMinutes = cell.offsetMinutes;
    } else if (cell.kind === "ambiguous-date") {
      const day = dayFirst ? cell.a : cell.b;
      const month = dayFirst ? cell.b : cell.a;
      if (!validDate(cell.year, month, day)) {
        badDates.push(cells[i]);
        times.push(Number.NaN);
        return;
      }
      local = { year: cell.year, month, day, ...cell.time };
    } else {
      times.push(Number.NaN);
      return;
    }

    if (offsetMinutes !== null) {
      times.push(localToEpoch(local, { kind: "fixed", label: "", offsetMinutes }));
    } else {
      usedZone = true;
      times.push(localToEpoch(local, options.zone));
    }
  });

  if (badDates.length > 0) {
    return err(unparseable(badDates, badDates.length));
  }

  if (usedZone && options.zoneAssumed) {
    warnings.push(
      warning(
        "parser",
        "TIMEZONE_ASSUMED",
        `No timezone declared; local timestamps interpreted as ${options.zone.label}`,
        { timezone: options.zone.label }
      )
    );
  }

  return ok({ times, format: "datetime", usedZone, warnings });
}

/**
 * Decide day/month order for `a/b/yyyy` cells of one column.
 * A component above 12 is evidence; evidence both ways is fatal.
 */
function inferDateOrder(
  parsed: readonly ParsedCell[],
  fallback: DateOrder
): Result<{ order: DateOrder; assumed: boolean }, DataQualityError> {
  let dayFirst = 0;
  let monthFirst = 0;
  let ambiguous = 0;

  for (const cell of parsed) {
    if (cell.kind !== "ambiguous-date") continue;
    if (cell.a > 12) dayFirst++;
    else if (cell.b > 12) monthFirst++;
    else if (cell.a !== cell.b) ambiguous++;
  }

  if (dayFirst > 0 && monthFirst > 0) {
    return err(
      new DataQualityError([
        {
          code: "INCONSISTENT_DATE_ORDER",
          message: `Timestamp column mixes day-first (${dayFirst} rows) and month-first (${monthFirst} rows) dates`,
          detail: { dayFirst, monthFirst },
        },
      ])
    );
  }
  if (dayFirst > 0) return ok({ order: "day-first", assumed: false });
  if (monthFirst > 0) return ok({ order: "month-first", assumed: false });
  return ok({ order: fallback, assumed: ambiguous > 0 });
}

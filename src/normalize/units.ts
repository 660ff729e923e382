/**
 * Unit tokens and conversion to canonical units.
 */

import type { CanonicalUnit, SensorKind, SourceUnit } from "../types/index.js";

export const PSI_TO_BAR = 0.0689475729;

const UNIT_TOKENS: Record<string, SourceUnit> = {
  c: "C",
  degc: "C",
  celsius: "C",
  f: "F",
  degf: "F",
  fahrenheit: "F",
  bar: "bar",
  kpa: "kPa",
  psi: "psi",
  mbar: "mbar",
  "%": "%RH",
  "%rh": "%RH",
  rh: "%RH",
  pct: "%RH",
  percent: "%RH",
};

/**
 * Parse a unit token such as `°C`, `degF`, `kPa` or `%RH`.
 * Returns null for tokens that are not recognised.
 */
export function parseUnitToken(token: string): SourceUnit | null {
  const key = token
    .trim()
    .toLowerCase()
    .replace(/[°º\s_]/g, "");
  return UNIT_TOKENS[key] ?? null;
}

export function kindOfUnit(unit: SourceUnit): SensorKind {
  switch (unit) {
    case "C":
    case "F":
      return "temperature";
    case "bar":
    case "kPa":
    case "psi":
    case "mbar":
      return "pressure";
    case "%RH":
      return "humidity";
  }
}

export function canonicalUnit(kind: SensorKind): CanonicalUnit {
  switch (kind) {
    case "temperature":
      return "C";
    case "pressure":
      return "bar";
    case "humidity":
      return "%RH";
  }
}

export function fahrenheitToCelsius(value: number): number {
  return ((value - 32) * 5) / 9;
}

export function celsiusToFahrenheit(value: number): number {
  return (value * 9) / 5 + 32;
}

/** Convert a reading in `unit` to its kind's canonical unit. */
export function toCanonical(value: number, unit: SourceUnit): number {
  switch (unit) {
    case "F":
      return fahrenheitToCelsius(value);
    case "kPa":
      return value / 100;
    case "psi":
      return value * PSI_TO_BAR;
    case "mbar":
      return value / 1000;
    case "C":
    case "bar":
    case "%RH":
      return value;
  }
}

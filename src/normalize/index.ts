/**
 * Normalizer: raw sensor logs to canonical series.
 *
 * Usage:
 *   import { normalize } from "./normalize/index.js";
 *
 *   const result = normalize(bytes, { config, declaredTimezone: "Europe/Berlin" });
 *   if (!result.ok) console.error(result.error.format());
 */

export { normalize, type NormalizeOptions } from "./normalizer.js";
export { parseCsv, type CsvDocument, type CsvRow } from "./csv.js";
export {
  detectColumns,
  splitHeader,
  parseDeclaredUnit,
  loadColumnAliases,
  buildAliasTable,
  ColumnAliasFileSchema,
  DEFAULT_ALIAS_FILE,
  type ColumnAliasFile,
  type ColumnAliasTable,
  type ColumnBinding,
  type ColumnLayout,
  type HeaderParts,
} from "./columns.js";
export {
  parseTimestampColumn,
  resolveZone,
  localToEpoch,
  MAX_UNIX_SECONDS,
  MAX_UNIX_MILLISECONDS,
  type Zone,
  type LocalDateTime,
  type TimestampCell,
  type ParsedTimestamps,
  type TimestampParseOptions,
} from "./timestamps.js";
export { medianIntervalMs, isUniform, gridSize, resampleStepHold, type ResampleOutcome } from "./resample.js";
export {
  parseUnitToken,
  kindOfUnit,
  canonicalUnit,
  toCanonical,
  fahrenheitToCelsius,
  celsiusToFahrenheit,
  PSI_TO_BAR,
} from "./units.js";

/**
 * Normalized sensor series.
 * The only shape of sensor data that crosses a stage boundary.
 */

import type { PipelineWarning } from "./warnings.js";

export type SensorKind = "temperature" | "pressure" | "humidity";

/** Canonical unit per sensor kind. */
export type CanonicalUnit = "C" | "bar" | "%RH";

/** Units accepted in source data. */
export type SourceUnit = "C" | "F" | "bar" | "kPa" | "psi" | "mbar" | "%RH";

export interface SensorChannel {
  readonly name: string;
  readonly kind: SensorKind;
  readonly unit: CanonicalUnit;
  /** Header text as it appeared in the source file */
  readonly sourceColumn: string;
  readonly sourceUnit: SourceUnit;
}

export interface Sample {
  /** Epoch milliseconds, UTC */
  readonly t: number;
  /** Reading per sensor name; null when missing */
  readonly values: Readonly<Record<string, number | null>>;
}

export interface NormalizedSeries {
  /** Strictly increasing in t */
  readonly samples: readonly Sample[];
  readonly channels: readonly SensorChannel[];
  /** Canonical sampling interval in seconds */
  readonly cadenceS: number;
  readonly resampled: boolean;
  /** Zone applied to local timestamps ("UTC" when all were absolute) */
  readonly timezone: string;
  /** `# key: value` lines from the source file */
  readonly metadata: Readonly<Record<string, string>>;
  readonly sourceRowCount: number;
  readonly warnings: readonly PipelineWarning[];
}

export function channelsOfKind(
  series: Pick<NormalizedSeries, "channels">,
  kind: SensorKind
): SensorChannel[] {
  return series.channels.filter((channel) => channel.kind === kind);
}

/**
 * Metric result types.
 *
 * Every calculator returns the quantities it measured (`values`) and an
 * ordered list of requirement checks. The decision engine only reads the
 * checks; the values are evidence.
 */

import type { ReasonCode } from "../decision/reasons.js";
import type { HoldMode } from "../specification/index.js";
import type { PipelineWarning } from "../types/index.js";

export type Comparator = ">=" | "<=";

/**
 *   met       - passes on the conservative value
 *   ambiguous - passes nominally, fails once uncertainty is applied
 *   violated  - fails nominally
 */
export type CheckStatus = "met" | "ambiguous" | "violated";

export interface RequirementCheck {
  readonly id: string;
  readonly label: string;
  readonly comparator: Comparator;
  readonly limit: number;
  /** Measured value; null when the quantity could not be measured */
  readonly nominal: number | null;
  /** Value with sensor uncertainty applied against the process */
  readonly conservative: number | null;
  readonly unit: string;
  readonly status: CheckStatus;
  /** Reason reported when violated */
  readonly reason: ReasonCode;
  /** Reason reported when ambiguous */
  readonly ambiguousReason: ReasonCode;
}

export interface HoldIntervalSummary {
  readonly start: string;
  readonly end: string;
  readonly durationS: number;
}

export interface PowderValues {
  readonly targetC: number;
  readonly thresholdC: number;
  readonly hysteresisC: number;
  readonly holdMode: HoldMode;
  readonly holdS: number;
  readonly intervals: readonly HoldIntervalSummary[];
  readonly maxTempC: number;
  readonly minTempC: number;
  readonly maxRampRateCPerMin: number;
  readonly timeToThresholdS: number | null;
  readonly samples: number;
}

export interface AutoclaveValues {
  readonly f0: number;
  readonly f0Conservative: number;
  readonly referenceTempC: number;
  readonly zValueC: number;
  readonly holdThresholdC: number;
  readonly holdS: number;
  readonly intervals: readonly HoldIntervalSummary[];
  readonly maxTempC: number;
  readonly pressureWindow: "hold" | "cycle" | null;
  readonly minPressureBar: number | null;
  readonly maxPressureBar: number | null;
  readonly samples: number;
}

export interface HaccpValues {
  readonly thresholdsC: readonly [number, number, number];
  readonly peakC: number;
  readonly peakAt: string;
  readonly crossings: {
    readonly temp1: string | null;
    readonly temp2: string | null;
    readonly temp3: string | null;
  };
  readonly phase1S: number | null;
  readonly phase2S: number | null;
  readonly phase1ConservativeS: number | null;
  readonly phase2ConservativeS: number | null;
  readonly samples: number;
}

export interface ExcursionEpisode {
  readonly start: string;
  readonly end: string;
  readonly durationS: number;
  readonly minTempC: number;
  readonly maxTempC: number;
  readonly peakDeviationC: number;
  readonly direction: "above" | "below" | "both";
}

export interface DailyCompliance {
  readonly date: string;
  readonly samples: number;
  readonly inBand: number;
  readonly compliancePct: number;
}

export interface ColdChainValues {
  readonly bandC: { readonly min: number; readonly max: number };
  readonly compliancePct: number;
  readonly compliancePctConservative: number;
  readonly excursions: readonly ExcursionEpisode[];
  readonly filteredExcursions: number;
  readonly longestExcursionS: number;
  readonly longestExcursionConservativeS: number;
  readonly daily: readonly DailyCompliance[];
  readonly samples: number;
}

export interface ConcreteValues {
  readonly windowS: number;
  readonly observedS: number;
  readonly windowSamples: number;
  readonly compliantSamples: number;
  readonly compliancePct: number;
  readonly compliancePctConservative: number;
  readonly maxTempRateCPerH: number | null;
  readonly minHumidityPct: number | null;
  readonly samples: number;
}

export interface SterileValues {
  readonly thresholdC: number;
  readonly holdMode: HoldMode;
  readonly holdS: number;
  readonly intervals: readonly HoldIntervalSummary[];
  readonly maxTempC: number;
  readonly minHumidityPct: number | null;
  readonly samples: number;
}

interface MetricResultBase<I extends string, V> {
  readonly industry: I;
  readonly values: V;
  readonly checks: readonly RequirementCheck[];
  /** Temperature sensors that fed the combined series */
  readonly sensors: readonly string[];
  readonly warnings: readonly PipelineWarning[];
}

export type PowderMetrics = MetricResultBase<"powder", PowderValues>;
export type AutoclaveMetrics = MetricResultBase<"autoclave", AutoclaveValues>;
export type HaccpMetrics = MetricResultBase<"haccp", HaccpValues>;
export type ColdChainMetrics = MetricResultBase<"coldchain", ColdChainValues>;
export type ConcreteMetrics = MetricResultBase<"concrete", ConcreteValues>;
export type SterileMetrics = MetricResultBase<"sterile", SterileValues>;

export type MetricResult =
  | PowderMetrics
  | AutoclaveMetrics
  | HaccpMetrics
  | ColdChainMetrics
  | ConcreteMetrics
  | SterileMetrics;

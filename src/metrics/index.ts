/**
 * Metric calculators.
 *
 * Usage:
 *   import { calculateMetrics } from "./metrics/index.js";
 *
 *   const metrics = calculateMetrics(series, spec);
 *   if (metrics.ok) console.log(metrics.value.checks);
 */

export { calculateMetrics, type MetricError } from "./calculator.js";
export { calculatePowder, powderThreshold } from "./powder.js";
export { calculateAutoclave, autoclaveHoldThreshold, f0Trapezoid, lethalRate } from "./autoclave.js";
export { calculateHaccp, crossingTime, haccpThresholdsC, type Crossing } from "./haccp.js";
export {
  calculateColdChain,
  compliancePct,
  dailyCompliance,
  excursionEpisodes,
  inBand,
  longestDurationS,
  type Band,
  type ExcursionScan,
} from "./coldchain.js";
export { calculateConcrete } from "./concrete.js";
export { calculateSterile, sterileThreshold } from "./sterile.js";
export { evaluateCheck, satisfies, type CheckDefinition } from "./checks.js";
export {
  holdIntervals,
  longestInterval,
  cumulativeHoldS,
  holdSeconds,
  summarizeIntervals,
  centeredRates,
  timeToThresholdS,
  type HoldInterval,
} from "./hold.js";
export {
  resolveSignals,
  matchSensors,
  combineReadings,
  combineSeries,
  temperatureSeries,
  type CombinedSeries,
  type ResolvedSignals,
  type SignalNeeds,
} from "./signals.js";
export { calculateIndependent, type ShadowQuantities } from "./independent.js";
export {
  compareShadow,
  compareQuantity,
  comparableQuantities,
  SHADOW_TOLERANCES,
  SHADOW_DISABLED,
  type ShadowDifference,
  type ShadowReport,
  type ShadowStatus,
  type Tolerance,
} from "./shadow.js";
export type {
  CheckStatus,
  Comparator,
  RequirementCheck,
  HoldIntervalSummary,
  MetricResult,
  PowderMetrics,
  AutoclaveMetrics,
  HaccpMetrics,
  ColdChainMetrics,
  ConcreteMetrics,
  SterileMetrics,
  PowderValues,
  AutoclaveValues,
  HaccpValues,
  ColdChainValues,
  ConcreteValues,
  SterileValues,
  ExcursionEpisode,
  DailyCompliance,
} from "./types.js";

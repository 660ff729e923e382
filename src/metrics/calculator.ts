/**
 * Closed dispatch from a validated specification to its calculator.
 */

import { ComputationError, err, type RequiredSignalMissingError, type Result } from "../errors/index.js";
import { createSilentLogger, type Logger } from "../logging/index.js";
import type { Specification } from "../specification/index.js";
import type { NormalizedSeries } from "../types/index.js";
import { calculateAutoclave } from "./autoclave.js";
import { calculateColdChain } from "./coldchain.js";
import { calculateConcrete } from "./concrete.js";
import { calculateHaccp } from "./haccp.js";
import { calculatePowder } from "./powder.js";
import { calculateSterile } from "./sterile.js";
import type { MetricResult } from "./types.js";

export type MetricError = RequiredSignalMissingError | ComputationError;

function assertNever(value: never): never {
  throw new Error(`Unhandled industry: ${JSON.stringify(value)}`);
}

function dispatch(series: NormalizedSeries, spec: Readonly<Specification>): Result<MetricResult, MetricError> {
  switch (spec.industry) {
    case "powder":
      return calculatePowder(series, spec);
    case "autoclave":
      return calculateAutoclave(series, spec);
    case "haccp":
      return calculateHaccp(series, spec);
    case "coldchain":
      return calculateColdChain(series, spec);
    case "concrete":
      return calculateConcrete(series, spec);
    case "sterile":
      return calculateSterile(series, spec);
    default:
      return assertNever(spec);
  }
}

/**
 * Compute the industry's metrics and requirement checks.
 *
 * A ComputationError thrown by a numeric routine is returned as an Err;
 * any other exception is a bug and propagates.
 */
export function calculateMetrics(
  series: NormalizedSeries,
  spec: Readonly<Specification>,
  logger: Logger = createSilentLogger()
): Result<MetricResult, MetricError> {
  const log = logger.child({ component: "metrics", industry: spec.industry });
  try {
    const result = dispatch(series, spec);
    if (result.ok) {
      log.debug("Metrics computed", {
        checks: result.value.checks.map((check) => `${check.id}:${check.status}`),
      });
    } else {
      log.warn("Metrics unavailable", { error: result.error.message });
    }
    return result;
  } catch (error) {
    if (error instanceof ComputationError) {
      log.error("Computation failed", { error: error.message });
      return err(error);
    }
    throw error;
  }
}

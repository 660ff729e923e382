/**
 * Concrete curing environment.
 *
 * Only the curing window counts: samples with t - t0 <= window_h. A window
 * sample complies when its temperature lies in [min_temp_C, max_temp_C] and
 * the lowest humidity reading is at least min_humidity_pct; a sample with no
 * humidity reading does not comply. The conservative evaluation narrows the
 * temperature band by u on both sides and raises the humidity floor by
 * humidity_uncertainty_pct. The lower temperature limit applies to the
 * combined reading, the upper one to the warmest sensor.
 *
 * Temperature stability is the largest |centered difference| in °C/h.
 */

import { ok, type RequiredSignalMissingError, type Result } from "../errors/index.js";
import type { ConcreteSpecification } from "../specification/index.js";
import type { NormalizedSeries, PipelineWarning } from "../types/index.js";
import { evaluateCheck } from "./checks.js";
import { centeredRates, maxOf } from "./hold.js";
import { maxReadingAt, minReadingAt, resolveSignals, temperatureSeries } from "./signals.js";
import type { ConcreteMetrics, RequirementCheck } from "./types.js";

export function calculateConcrete(
  series: NormalizedSeries,
  spec: ConcreteSpecification
): Result<ConcreteMetrics, RequiredSignalMissingError> {
  const p = spec.parameters;
  const u = p.sensor_uncertainty_C;
  const warnings: PipelineWarning[] = [];

  const signals = resolveSignals(series, spec, { pressure: false, humidity: true });
  if (!signals.ok) return signals;

  const combined = temperatureSeries(series, spec, signals.value.temperature, p.min_temp_C, warnings);
  if (!combined.ok) return combined;
  const { t, v, sampleIndex } = combined.value;

  const windowS = p.window_h * 3600;
  const t0 = t[0];
  let end = 0;
  while (end + 1 < t.length && (t[end + 1] - t0) / 1000 <= windowS) end++;
  const windowSamples = end + 1;
  const observedS = (t[end] - t0) / 1000;

  let compliant = 0;
  let compliantConservative = 0;
  let minHumidity: number | null = null;
  for (let i = 0; i <= end; i++) {
    const humidity = minReadingAt(series.samples[sampleIndex[i]], signals.value.humidity);
    if (humidity !== null && (minHumidity === null || humidity < minHumidity)) minHumidity = humidity;
    if (humidity === null) continue;
    const high = maxReadingAt(series.samples[sampleIndex[i]], signals.value.temperature) ?? v[i];
    if (v[i] >= p.min_temp_C && high <= p.max_temp_C && humidity >= p.min_humidity_pct) compliant++;
    if (
      v[i] >= p.min_temp_C + u &&
      high <= p.max_temp_C - u &&
      humidity >= p.min_humidity_pct + p.humidity_uncertainty_pct
    ) {
      compliantConservative++;
    }
  }

  const pct = (compliant / windowSamples) * 100;
  const pctConservative = (compliantConservative / windowSamples) * 100;

  const rates = centeredRates(t.slice(0, windowSamples), v.slice(0, windowSamples), 3_600_000);
  const maxRate = rates.length === 0 ? null : maxOf(rates.map(Math.abs));

  const checks: RequirementCheck[] = [
    evaluateCheck(
      {
        id: "window_complete",
        label: "Curing window covered by data",
        comparator: ">=",
        limit: windowS,
        unit: "s",
        reason: "CURING_WINDOW_INCOMPLETE",
        ambiguousReason: "CURING_WINDOW_INCOMPLETE",
      },
      observedS
    ),
    evaluateCheck(
      {
        id: "compliance",
        label: "Samples within temperature and humidity limits",
        comparator: ">=",
        limit: p.min_compliance_pct,
        unit: "%",
        reason: "COMPLIANCE_BELOW_MINIMUM",
        ambiguousReason: "COMPLIANCE_WITHIN_UNCERTAINTY",
      },
      pct,
      pctConservative
    ),
  ];

  if (p.max_temp_rate_C_per_h !== undefined) {
    checks.push(
      evaluateCheck(
        {
          id: "temperature_rate",
          label: "Maximum temperature rate",
          comparator: "<=",
          limit: p.max_temp_rate_C_per_h,
          unit: "C/h",
          reason: "TEMPERATURE_RATE_EXCEEDED",
          ambiguousReason: "TEMPERATURE_RATE_EXCEEDED",
        },
        maxRate
      )
    );
  }

  const result: ConcreteMetrics = {
    industry: "concrete",
    values: {
      windowS,
      observedS,
      windowSamples,
      compliantSamples: compliant,
      compliancePct: pct,
      compliancePctConservative: pctConservative,
      maxTempRateCPerH: maxRate,
      minHumidityPct: minHumidity,
      samples: t.length,
    },
    checks,
    sensors: signals.value.temperature,
    warnings,
  };
  return ok(result);
}

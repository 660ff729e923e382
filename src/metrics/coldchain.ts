/**
 * Cold-chain storage.
 *
 * Every sample is classified against the inclusive band [min_temp_C,
 * max_temp_C]. Consecutive out-of-band samples form an excursion episode
 * whose duration is the time from its first to its last outside sample;
 * episodes shorter than min_excursion_s are dropped from the report but
 * counted. The conservative evaluation narrows the band to
 * [min + u, max - u].
 *
 * The lower limit applies to the combined reading (per the selection mode);
 * the upper limit applies to the warmest sensor, so one warm sensor is never
 * hidden by a colder one.
 */

import { ok, type RequiredSignalMissingError, type Result } from "../errors/index.js";
import type { ColdChainSpecification } from "../specification/index.js";
import type { NormalizedSeries, PipelineWarning } from "../types/index.js";
import { evaluateCheck } from "./checks.js";
import { maxReadingAt, resolveSignals, temperatureSeries } from "./signals.js";
import type { ColdChainMetrics, DailyCompliance, ExcursionEpisode } from "./types.js";

export interface Band {
  readonly min: number;
  readonly max: number;
}

/**
 * @param high - Warmest reading at the same instant; defaults to `low`
 */
export function inBand(low: number, band: Band, high = low): boolean {
  return low >= band.min && high <= band.max;
}

export function compliancePct(v: readonly number[], band: Band, high: readonly number[] = v): number {
  if (v.length === 0) return 0;
  let inside = 0;
  v.forEach((value, i) => {
    if (inBand(value, band, high[i])) inside++;
  });
  return (inside / v.length) * 100;
}

function deviation(low: number, high: number, band: Band): number {
  return Math.max(0, high - band.max, band.min - low);
}

function episode(
  t: readonly number[],
  v: readonly number[],
  high: readonly number[],
  from: number,
  to: number,
  band: Band
): ExcursionEpisode {
  let minTempC = Infinity;
  let maxTempC = -Infinity;
  let peakDeviationC = 0;
  let above = false;
  let below = false;
  for (let i = from; i <= to; i++) {
    minTempC = Math.min(minTempC, v[i]);
    maxTempC = Math.max(maxTempC, high[i]);
    peakDeviationC = Math.max(peakDeviationC, deviation(v[i], high[i], band));
    if (high[i] > band.max) above = true;
    if (v[i] < band.min) below = true;
  }
  return {
    start: new Date(t[from]).toISOString(),
    end: new Date(t[to]).toISOString(),
    durationS: (t[to] - t[from]) / 1000,
    minTempC,
    maxTempC,
    peakDeviationC,
    direction: above && below ? "both" : above ? "above" : "below",
  };
}

export interface ExcursionScan {
  readonly episodes: ExcursionEpisode[];
  readonly filtered: number;
}

export function excursionEpisodes(
  t: readonly number[],
  v: readonly number[],
  band: Band,
  minDurationS: number,
  high: readonly number[] = v
): ExcursionScan {
  const episodes: ExcursionEpisode[] = [];
  let filtered = 0;
  let start = -1;

  const close = (end: number): void => {
    const found = episode(t, v, high, start, end, band);
    if (found.durationS < minDurationS) filtered++;
    else episodes.push(found);
    start = -1;
  };

  for (let i = 0; i < v.length; i++) {
    const outside = !inBand(v[i], band, high[i]);
    if (outside && start === -1) start = i;
    if (!outside && start !== -1) close(i - 1);
  }
  if (start !== -1) close(v.length - 1);

  return { episodes, filtered };
}

export function longestDurationS(episodes: readonly ExcursionEpisode[]): number {
  return episodes.reduce((longest, item) => Math.max(longest, item.durationS), 0);
}

/** Per-day (UTC) compliance, in date order. */
export function dailyCompliance(
  t: readonly number[],
  v: readonly number[],
  band: Band,
  high: readonly number[] = v
): DailyCompliance[] {
  const days = new Map<string, { samples: number; inBand: number }>();
  t.forEach((ms, i) => {
    const date = new Date(ms).toISOString().slice(0, 10);
    const day = days.get(date) ?? { samples: 0, inBand: 0 };
    day.samples++;
    if (inBand(v[i], band, high[i])) day.inBand++;
    days.set(date, day);
  });
  return [...days.entries()].map(([date, day]) => ({
    date,
    samples: day.samples,
    inBand: day.inBand,
    compliancePct: (day.inBand / day.samples) * 100,
  }));
}

export function calculateColdChain(
  series: NormalizedSeries,
  spec: ColdChainSpecification
): Result<ColdChainMetrics, RequiredSignalMissingError> {
  const p = spec.parameters;
  const u = p.sensor_uncertainty_C;
  const warnings: PipelineWarning[] = [];

  const signals = resolveSignals(series, spec, { pressure: false, humidity: false });
  if (!signals.ok) return signals;

  const combined = temperatureSeries(series, spec, signals.value.temperature, p.min_temp_C, warnings);
  if (!combined.ok) return combined;
  const { t, v, sampleIndex } = combined.value;
  const high = sampleIndex.map((index, i) => maxReadingAt(series.samples[index], signals.value.temperature) ?? v[i]);

  const band: Band = { min: p.min_temp_C, max: p.max_temp_C };
  const narrowed: Band = { min: p.min_temp_C + u, max: p.max_temp_C - u };

  const nominal = excursionEpisodes(t, v, band, p.min_excursion_s, high);
  const conservative = excursionEpisodes(t, v, narrowed, p.min_excursion_s, high);
  const longestExcursionS = longestDurationS(nominal.episodes);
  const longestExcursionConservativeS = longestDurationS(conservative.episodes);
  const pct = compliancePct(v, band, high);
  const pctConservative = compliancePct(v, narrowed, high);

  const checks = [
    evaluateCheck(
      {
        id: "compliance",
        label: "Time in temperature band",
        comparator: ">=",
        limit: p.min_compliance_pct,
        unit: "%",
        reason: "COMPLIANCE_BELOW_MINIMUM",
        ambiguousReason: "COMPLIANCE_WITHIN_UNCERTAINTY",
      },
      pct,
      pctConservative
    ),
    evaluateCheck(
      {
        id: "longest_excursion",
        label: "Longest excursion",
        comparator: "<=",
        limit: p.max_excursion_min,
        unit: "min",
        reason: "EXCURSION_TOO_LONG",
        ambiguousReason: "EXCURSION_WITHIN_UNCERTAINTY",
      },
      longestExcursionS / 60,
      longestExcursionConservativeS / 60
    ),
  ];

  const result: ColdChainMetrics = {
    industry: "coldchain",
    values: {
      bandC: band,
      compliancePct: pct,
      compliancePctConservative: pctConservative,
      excursions: nominal.episodes,
      filteredExcursions: nominal.filtered,
      longestExcursionS,
      longestExcursionConservativeS,
      daily: dailyCompliance(t, v, band, high),
      samples: t.length,
    },
    checks,
    sensors: signals.value.temperature,
    warnings,
  };
  return ok(result);
}

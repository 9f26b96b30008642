import { InvalidInputError } from "./Errors.ts";
import {
  average,
  coefficientOfVariation,
  findOutliers,
  median,
  medianAbsoluteDeviation,
  percentile,
  sortAscending,
  standardDeviation,
} from "./StatisticalUtils.ts";

/** z value for a two-sided 95% interval (normal approximation) */
export const z95 = 1.96;

/** Descriptive statistics for one sample, in the sample's own units */
export interface StatisticalSummary {
  readonly sampleSize: number;
  readonly mean: number;
  readonly median: number;
  /** sample standard deviation (n - 1) */
  readonly stdDev: number;
  readonly min: number;
  readonly max: number;
  readonly p25: number;
  readonly p75: number;
  readonly p95: number;
  readonly p99: number;
  /** 95% interval for the mean, [lower, upper] */
  readonly confidenceInterval95: readonly [number, number];
  readonly coefficientOfVariation: number;

  /** median absolute deviation, informational */
  readonly mad: number;
  /** fraction of values outside Tukey's fences, informational */
  readonly outlierRate: number;
}

/** @return summary statistics for a non-empty sample */
export function summarize(sample: readonly number[]): StatisticalSummary {
  if (sample.length === 0) {
    throw new InvalidInputError(
      "Cannot calculate statistics for empty dataset",
    );
  }

  const n = sample.length;
  const sorted = sortAscending(sample);
  const mean = average(sample);
  const stdDev = n > 1 ? standardDeviation(sample) : 0;

  return Object.freeze({
    sampleSize: n,
    mean,
    median: median(sorted),
    stdDev,
    min: sorted[0],
    max: sorted[n - 1],
    p25: percentile(sorted, 25),
    p75: percentile(sorted, 75),
    p95: percentile(sorted, 95),
    p99: percentile(sorted, 99),
    confidenceInterval95: meanInterval(mean, stdDev, n),
    coefficientOfVariation: coefficientOfVariation(sample),
    mad: medianAbsoluteDeviation(sample),
    outlierRate: findOutliers(sample).rate,
  });
}

/** @return mean ± z·s/√n, or a point interval for n ≤ 1 */
function meanInterval(
  mean: number,
  stdDev: number,
  n: number,
): readonly [number, number] {
  if (n <= 1) return Object.freeze([mean, mean] as const);
  const margin = z95 * (stdDev / Math.sqrt(n));
  return Object.freeze([mean - margin, mean + margin] as const);
}

/**
 * Two-sample comparison of independent benchmark measurements.
 *
 * Uses an unpooled (Welch-style) standard error for the t statistic and a
 * tanh-based approximation of the normal CDF for the p-value. The
 * approximation is coarse; p-values are comparable between reports produced
 * by this tool, not exact.
 */

import { z95 } from "./DescriptiveStats.ts";
import { average, standardDeviation } from "./StatisticalUtils.ts";

/** Raw outputs of the two-sample test, optimized relative to baseline */
export interface TwoSampleResult {
  tStat: number;
  pValue: number;
  cohensD: number;
  /** 95% interval for mean(optimized) - mean(baseline) */
  ciDiff: readonly [number, number];
}

export type EffectSizeLabel = "negligible" | "small" | "medium" | "large";

const cdfSaturation = 6;
const tanhScale = 0.7;

interface SampleMoments {
  n: number;
  mean: number;
  std: number;
}

/** @return t statistic, p-value, effect size and difference interval */
export function compareSamples(
  baseline: readonly number[],
  optimized: readonly number[],
): TwoSampleResult {
  const a = moments(baseline);
  const b = moments(optimized);
  const { tStat, pValue } = welchTest(a, b);
  return {
    tStat,
    pValue,
    cohensD: cohensD(a, b),
    ciDiff: differenceInterval(a, b),
  };
}

/** Approximate standard normal CDF: 0.5 + 0.5·tanh(0.7x), saturating at ±6 */
export function approxNormalCdf(x: number): number {
  if (x > cdfSaturation) return 1;
  if (x < -cdfSaturation) return 0;
  const p = 0.5 + 0.5 * Math.tanh(x * tanhScale);
  return Math.min(1, Math.max(0, p));
}

/** @return two-sided p-value for a t statistic using the approximate CDF */
export function twoSidedPValue(tStat: number): number {
  const p = 2 * (1 - approxNormalCdf(Math.abs(tStat)));
  return Math.min(p, 1);
}

/** @return conventional magnitude label for Cohen's d */
export function interpretEffectSize(d: number): EffectSizeLabel {
  const absD = Math.abs(d);
  if (absD < 0.2) return "negligible";
  if (absD < 0.5) return "small";
  if (absD < 0.8) return "medium";
  return "large";
}

function moments(values: readonly number[]): SampleMoments {
  const n = values.length;
  if (n === 0) return { n, mean: 0, std: 0 };
  return { n, mean: average(values), std: standardDeviation(values) };
}

/** t = Δmean / √(s1²/n1 + s2²/n2); t=0, p=1 when undefined */
function welchTest(
  a: SampleMoments,
  b: SampleMoments,
): { tStat: number; pValue: number } {
  if (a.n < 2 || b.n < 2) return { tStat: 0, pValue: 1 };
  const se = standardError(a, b);
  if (se === 0) return { tStat: 0, pValue: 1 };

  const tStat = (b.mean - a.mean) / se;
  return { tStat, pValue: twoSidedPValue(tStat) };
}

/** @return Δmean / pooled standard deviation, 0 when undefined */
function cohensD(a: SampleMoments, b: SampleMoments): number {
  if (a.n < 2 || b.n < 2) return 0;
  const pooledVariance =
    ((a.n - 1) * a.std ** 2 + (b.n - 1) * b.std ** 2) / (a.n + b.n - 2);
  const pooledStd = Math.sqrt(pooledVariance);
  if (pooledStd === 0) return 0;
  return (b.mean - a.mean) / pooledStd;
}

function differenceInterval(
  a: SampleMoments,
  b: SampleMoments,
): readonly [number, number] {
  const diff = b.mean - a.mean;
  if (a.n <= 1 || b.n <= 1) return [diff, diff];
  const margin = z95 * standardError(a, b);
  return [diff - margin, diff + margin];
}

function standardError(a: SampleMoments, b: SampleMoments): number {
  return Math.sqrt(a.std ** 2 / a.n + b.std ** 2 / b.n);
}

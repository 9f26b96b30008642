import { type StatisticalSummary, summarize } from "./DescriptiveStats.ts";
import { compareSamples } from "./TwoSampleTest.ts";

/** Statistical protocol a performance claim must satisfy */
export interface ValidationThresholds {
  /** minimum measurements per condition */
  minSampleSize: number;
  /** p-value must fall below this */
  significanceLevel: number;
  /** minimum |Cohen's d| */
  minEffectSize: number;
  /** reporting only; intervals use the 95% normal approximation */
  confidenceLevel: number;
  /** maximum coefficient of variation per condition */
  maxCv: number;
}

export const defaultThresholds: Readonly<ValidationThresholds> = Object.freeze(
  {
    minSampleSize: 30,
    significanceLevel: 0.05,
    minEffectSize: 0.5, // Cohen's d for a medium effect
    confidenceLevel: 0.95,
    maxCv: 0.3,
  },
);

export type Side = "baseline" | "optimized";

/** Non-fatal protocol finding from one validation run */
export type Violation =
  | {
      kind: "sample-size";
      side: Side;
      actual: number;
      required: number;
      message: string;
    }
  | {
      kind: "variability";
      side: Side;
      cv: number;
      max: number;
      message: string;
    };

/** Statistical comparison between baseline and optimized measurements */
export interface ComparisonResult {
  baselineStats: StatisticalSummary;
  optimizedStats: StatisticalSummary;
  /** optimized.mean - baseline.mean */
  improvementAbsolute: number;
  /** improvementAbsolute as a percentage of baseline.mean (0 if that is 0) */
  improvementPercent: number;
  tStat: number;
  pValue: number;
  cohensD: number;
  confidenceIntervalDiff: readonly [number, number];
  statisticalSignificance: boolean;
  practicalSignificance: boolean;
  sampleAdequate: boolean;
}

/** Everything one validation run produces */
export interface ValidationOutcome {
  comparison: ComparisonResult;
  violations: Violation[];
  /** conjunctive verdict, see isClaimValid() */
  valid: boolean;
}

/**
 * Applies a fixed statistical protocol to baseline/optimized samples.
 *
 * Thresholds are fixed at construction. validate() keeps no state between
 * calls, so one instance may serve concurrent or repeated validations.
 */
export class PerformanceValidator {
  readonly thresholds: Readonly<ValidationThresholds>;

  constructor(thresholds: Partial<ValidationThresholds> = {}) {
    this.thresholds = Object.freeze({ ...defaultThresholds, ...thresholds });
  }

  /** @throws InvalidInputError if either sample is empty */
  validate(
    baseline: readonly number[],
    optimized: readonly number[],
  ): ValidationOutcome {
    const { minSampleSize, maxCv } = this.thresholds;
    const { significanceLevel, minEffectSize } = this.thresholds;
    const violations: Violation[] = [];

    const baselineSized = checkSampleSize("baseline", baseline, minSampleSize);
    const optimizedSized = checkSampleSize(
      "optimized",
      optimized,
      minSampleSize,
    );
    if (baselineSized) violations.push(baselineSized);
    if (optimizedSized) violations.push(optimizedSized);
    const sampleAdequate = !baselineSized && !optimizedSized;

    const baselineStats = summarize(baseline);
    const optimizedStats = summarize(optimized);

    for (const [side, stats] of sides(baselineStats, optimizedStats)) {
      const found = checkVariability(side, stats, maxCv);
      if (found) violations.push(found);
    }

    const improvementAbsolute = optimizedStats.mean - baselineStats.mean;
    const improvementPercent =
      baselineStats.mean !== 0
        ? (improvementAbsolute / baselineStats.mean) * 100
        : 0;

    const { tStat, pValue, cohensD, ciDiff } = compareSamples(
      baseline,
      optimized,
    );

    const comparison: ComparisonResult = {
      baselineStats,
      optimizedStats,
      improvementAbsolute,
      improvementPercent,
      tStat,
      pValue,
      cohensD,
      confidenceIntervalDiff: ciDiff,
      statisticalSignificance: pValue < significanceLevel,
      practicalSignificance: Math.abs(cohensD) >= minEffectSize,
      sampleAdequate,
    };
    return {
      comparison,
      violations,
      valid: isClaimValid(comparison, violations),
    };
  }
}

/** @return true only if every criterion holds (no partial credit) */
export function isClaimValid(
  comparison: ComparisonResult,
  violations: readonly Violation[],
): boolean {
  const { sampleAdequate, statisticalSignificance, practicalSignificance } =
    comparison;
  return (
    sampleAdequate &&
    statisticalSignificance &&
    practicalSignificance &&
    violations.length === 0
  );
}

function checkSampleSize(
  side: Side,
  sample: readonly number[],
  required: number,
): Violation | undefined {
  const actual = sample.length;
  if (actual >= required) return undefined;
  const message = `Insufficient ${side} sample size: ${actual} < ${required}`;
  return { kind: "sample-size", side, actual, required, message };
}

function checkVariability(
  side: Side,
  stats: StatisticalSummary,
  max: number,
): Violation | undefined {
  const cv = stats.coefficientOfVariation;
  if (cv <= max) return undefined;
  const message = `High ${side} variability: CV=${cv.toFixed(3)} > ${max}`;
  return { kind: "variability", side, cv, max, message };
}

function sides(
  baseline: StatisticalSummary,
  optimized: StatisticalSummary,
): [Side, StatisticalSummary][] {
  return [
    ["baseline", baseline],
    ["optimized", optimized],
  ];
}

import type { StatisticalSummary } from "./DescriptiveStats.ts";
import { formatGitVersion, type GitVersion } from "./GitUtils.ts";
import {
  higherIsBetter,
  type Metric,
  metricUnits,
} from "./measurement/MeasurementRecords.ts";
import { interval, signed, withUnit } from "./table-util/Formatters.ts";
import { interpretEffectSize } from "./TwoSampleTest.ts";
import {
  type ComparisonResult,
  defaultThresholds,
  type ValidationOutcome,
  type ValidationThresholds,
} from "./ValidationPolicy.ts";

export interface ReportOptions {
  thresholds?: Readonly<ValidationThresholds>;
  metric?: Metric;
  /** report timestamp, defaults to now */
  generatedAt?: Date;
  gitVersion?: GitVersion;
}

export type ChangeDirection = "improvement" | "regression" | "no change";

const yes = (ok: boolean) => (ok ? "✅ YES" : "❌ NO");
const pass = (ok: boolean) => (ok ? "✅ PASS" : "❌ FAIL");

/** @return markdown validation report for one outcome */
export function generateValidationReport(
  outcome: ValidationOutcome,
  options: ReportOptions = {},
): string {
  const { thresholds = defaultThresholds, metric = "latency" } = options;
  const { generatedAt = new Date(), gitVersion } = options;
  const { comparison: c, violations, valid } = outcome;
  const unit = metricUnits[metric];
  const { confidenceLevel, significanceLevel } = thresholds;
  const { minSampleSize, minEffectSize, maxCv } = thresholds;

  const change = `${signed(c.improvementPercent)}% (${signed(c.improvementAbsolute)}${unit})`;
  const lines = [
    "# 📊 Statistical Performance Validation Report",
    "",
    `**Generated**: ${generatedAt.toISOString()}`,
    ...(gitVersion ? [`**Commit**: ${formatGitVersion(gitVersion)}`] : []),
    `**Validation Standard**: ${+(confidenceLevel * 100).toFixed(2)}% confidence, p<${significanceLevel}`,
    "",
    "## 🎯 Executive Summary",
    "",
    `**Performance Change**: ${change}`,
    `**Direction**: ${changeDirection(c, metric)} (${higherIsBetter[metric] ? "higher" : "lower"} is better)`,
    `**Statistical Significance**: ${yes(c.statisticalSignificance)} (p=${c.pValue.toFixed(4)})`,
    `**Practical Significance**: ${yes(c.practicalSignificance)} (d=${c.cohensD.toFixed(3)})`,
    `**Sample Size Adequate**: ${yes(c.sampleAdequate)}`,
    "",
    "## 📈 Statistical Results",
    "",
    "### Baseline Performance",
    ...summaryLines(c.baselineStats, unit),
    "",
    "### Optimized Performance",
    ...summaryLines(c.optimizedStats, unit),
    "",
    "### Statistical Comparison",
    `- **Improvement**: ${change}`,
    `- **95% CI for Difference**: ${interval(c.confidenceIntervalDiff)}${unit}`,
    `- **t-statistic**: ${c.tStat.toFixed(3)}`,
    `- **P-value**: ${c.pValue.toFixed(4)}`,
    `- **Effect Size (Cohen's d)**: ${c.cohensD.toFixed(3)}`,
    `- **Effect Interpretation**: ${effectLabel(c.cohensD)}`,
    "",
    "## ✅ Validation Status",
    "",
    "### Statistical Requirements",
    `- **Sample Size**: ${pass(c.sampleAdequate)} (n≥${minSampleSize})`,
    `- **Statistical Significance**: ${pass(c.statisticalSignificance)} (p<${significanceLevel})`,
    `- **Effect Size**: ${pass(c.practicalSignificance)} (|d|≥${minEffectSize})`,
    `- **Baseline Stability**: ${pass(c.baselineStats.coefficientOfVariation <= maxCv)} (CV≤${maxCv})`,
    `- **Optimized Stability**: ${pass(c.optimizedStats.coefficientOfVariation <= maxCv)} (CV≤${maxCv})`,
    "",
    "### Overall Validation",
    `${valid ? "✅ VALIDATED" : "❌ NOT VALIDATED"}: Performance improvement claim`,
    "",
    "## 🚨 Violations Found",
    ...(violations.length
      ? violations.map(v => `- ❌ ${v.message}`)
      : ["- ✅ No violations found"]),
    "",
    "## 🎯 Recommendations",
    "",
    ...generateRecommendations(outcome, thresholds).map(r => `- ${r}`),
    "",
    "---",
    "*Performance claims are only valid if all validation criteria pass.*",
  ];
  return `${lines.join("\n")}\n`;
}

/** @return actionable next steps, or a single confirmation when all criteria pass */
export function generateRecommendations(
  outcome: ValidationOutcome,
  thresholds: Readonly<ValidationThresholds> = defaultThresholds,
): string[] {
  const { comparison: c, violations } = outcome;
  const recommendations: string[] = [];

  if (!c.sampleAdequate) {
    recommendations.push(
      `Increase sample size to at least ${thresholds.minSampleSize} per condition`,
    );
  }
  if (!c.statisticalSignificance) {
    recommendations.push(
      "No statistical significance detected - improvement may be due to chance",
    );
  }
  if (!c.practicalSignificance) {
    recommendations.push(
      "Effect size is small - improvement may not be practically meaningful",
    );
  }
  if (c.baselineStats.coefficientOfVariation > thresholds.maxCv) {
    recommendations.push(
      "High baseline variability - consider controlling external factors",
    );
  }
  if (violations.length > 0) {
    recommendations.push(
      "Address all validation violations before making performance claims",
    );
  }

  if (recommendations.length === 0) {
    recommendations.push(
      "All validation criteria met - performance improvement is statistically supported",
    );
  }
  return recommendations;
}

/** @return whether the mean moved in the metric's better direction */
export function changeDirection(
  comparison: ComparisonResult,
  metric: Metric = "latency",
): ChangeDirection {
  const delta = comparison.improvementAbsolute;
  if (delta === 0) return "no change";
  const better = higherIsBetter[metric] ? delta > 0 : delta < 0;
  return better ? "improvement" : "regression";
}

/** @return "Large effect", "Negligible effect", ... */
export function effectLabel(d: number): string {
  const label = interpretEffectSize(d);
  return `${label[0].toUpperCase()}${label.slice(1)} effect`;
}

function summaryLines(stats: StatisticalSummary, unit: string): string[] {
  return [
    `- **Mean**: ${withUnit(stats.mean, unit)}`,
    `- **Median**: ${withUnit(stats.median, unit)}`,
    `- **Std Dev**: ${withUnit(stats.stdDev, unit)}`,
    `- **P95 / P99**: ${withUnit(stats.p95, unit)} / ${withUnit(stats.p99, unit)}`,
    `- **95% CI**: ${interval(stats.confidenceInterval95)}${unit}`,
    `- **Sample Size**: n=${stats.sampleSize}`,
    `- **Coefficient of Variation**: ${stats.coefficientOfVariation.toFixed(3)}`,
  ];
}

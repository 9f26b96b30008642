import type { StatisticalSummary } from "./DescriptiveStats.ts";
import { type Metric, metricUnits } from "./measurement/MeasurementRecords.ts";
import {
  decimal,
  integer,
  percent,
  signed,
} from "./table-util/Formatters.ts";
import { buildTable, type ColumnGroup } from "./table-util/TableReport.ts";
import type { ValidationOutcome } from "./ValidationPolicy.ts";

/** One table row per measured condition */
export interface SummaryRow {
  name: string;
  mean: number;
  median: number;
  p95: number;
  p99: number;
  stdDev: number;
  cv: number;
  n: number;
  outlierRate: number;
}

/** @return row values for one summary */
export function summaryRow(
  name: string,
  stats: StatisticalSummary,
): SummaryRow {
  return {
    name,
    mean: stats.mean,
    median: stats.median,
    p95: stats.p95,
    p99: stats.p99,
    stdDev: stats.stdDev,
    cv: stats.coefficientOfVariation,
    n: stats.sampleSize,
    outlierRate: stats.outlierRate,
  };
}

/** @return percentage change against the baseline value, e.g. "-20.0%" */
export function diffPercent(value: unknown, baseline: unknown): string {
  if (typeof value !== "number" || typeof baseline !== "number") return " ";
  if (baseline === 0) return " ";
  return `${signed(((value - baseline) / baseline) * 100)}%`;
}

/** Columns: location stats with a Δ% against baseline, then spread and size */
export function summaryColumns(metric: Metric): ColumnGroup<SummaryRow>[] {
  const unit = metricUnits[metric].trim();
  return [
    { columns: [{ key: "name", title: "name", alignment: "left" }] },
    {
      groupTitle: `${metric} (${unit})`,
      columns: [
        { key: "mean", title: "mean", formatter: decimal },
        { diffKey: "mean", title: "Δ%", diffFormatter: diffPercent },
        { key: "median", title: "p50", formatter: decimal },
        { key: "p95", title: "p95", formatter: decimal },
        { key: "p99", title: "p99", formatter: decimal },
      ],
    },
    {
      groupTitle: "spread",
      columns: [
        { key: "stdDev", title: "std dev", formatter: decimal },
        { key: "cv", title: "cv", formatter: percent },
        { key: "outlierRate", title: "outliers", formatter: percent },
      ],
    },
    { columns: [{ key: "n", title: "n", formatter: integer }] },
  ];
}

/** @return terminal table comparing optimized against baseline */
export function summaryTable(
  outcome: ValidationOutcome,
  metric: Metric = "latency",
): string {
  const { baselineStats, optimizedStats } = outcome.comparison;
  const group = {
    results: [summaryRow("optimized", optimizedStats)],
    baseline: summaryRow("baseline", baselineStats),
  };
  return buildTable(summaryColumns(metric), group, "name");
}

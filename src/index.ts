export type { ValidateCliArgs } from "./cli/CliArgs.ts";
export { cliThresholds, defaultCliArgs, parseCliArgs } from "./cli/CliArgs.ts";
export type { CliEnvironment } from "./cli/ValidateCLI.ts";
export { runValidateCli, validateWithArgs } from "./cli/ValidateCLI.ts";
export type { StatisticalSummary } from "./DescriptiveStats.ts";
export { summarize } from "./DescriptiveStats.ts";
export { InvalidInputError, MeasurementFileError } from "./Errors.ts";
export type { ValidationJsonData } from "./export/JsonExport.ts";
export { exportValidationJson, prepareJsonData } from "./export/JsonExport.ts";
export type { GitVersion } from "./GitUtils.ts";
export { formatGitVersion, getCurrentGitVersion } from "./GitUtils.ts";
export type {
  MeasurementRecord,
  Metric,
} from "./measurement/MeasurementRecords.ts";
export {
  extractMetric,
  loadMeasurements,
  MeasurementRecordSchema,
  parseMeasurementRecords,
} from "./measurement/MeasurementRecords.ts";
export type {
  BenchmarkRunOptions,
  CommandExecutor,
  CommandResult,
  ParsedBenchmarkOutput,
} from "./runners/BenchmarkRunner.ts";
export {
  execCommand,
  parseBenchmarkOutput,
  runBenchmark,
} from "./runners/BenchmarkRunner.ts";
export {
  average,
  coefficientOfVariation,
  findOutliers,
  median,
  medianAbsoluteDeviation,
  percentile,
  standardDeviation,
} from "./StatisticalUtils.ts";
export type { SummaryRow } from "./SummaryTable.ts";
export { summaryTable } from "./SummaryTable.ts";
export type { EffectSizeLabel, TwoSampleResult } from "./TwoSampleTest.ts";
export {
  approxNormalCdf,
  compareSamples,
  interpretEffectSize,
  twoSidedPValue,
} from "./TwoSampleTest.ts";
export type {
  ComparisonResult,
  Side,
  ValidationOutcome,
  ValidationThresholds,
  Violation,
} from "./ValidationPolicy.ts";
export {
  defaultThresholds,
  isClaimValid,
  PerformanceValidator,
} from "./ValidationPolicy.ts";
export type { ChangeDirection, ReportOptions } from "./ValidationReport.ts";
export {
  changeDirection,
  effectLabel,
  generateRecommendations,
  generateValidationReport,
} from "./ValidationReport.ts";

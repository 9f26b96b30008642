import { writeFile } from "node:fs/promises";
import pico from "picocolors";
import { hideBin } from "yargs/helpers";
import { InvalidInputError, MeasurementFileError } from "../Errors.ts";
import { exportValidationJson } from "../export/JsonExport.ts";
import { getCurrentGitVersion } from "../GitUtils.ts";
import {
  extractMetric,
  loadMeasurements,
  type MeasurementRecord,
  type Metric,
} from "../measurement/MeasurementRecords.ts";
import {
  type CommandExecutor,
  runBenchmark,
} from "../runners/BenchmarkRunner.ts";
import { summaryTable } from "../SummaryTable.ts";
import {
  PerformanceValidator,
  type ValidationOutcome,
} from "../ValidationPolicy.ts";
import { generateValidationReport } from "../ValidationReport.ts";
import { cliThresholds, parseCliArgs, type ValidateCliArgs } from "./CliArgs.ts";

const isTest = process.env.NODE_ENV === "test" || process.env.VITEST === "true";
const identity = (s: string) => s;
const { red, green, dim } = isTest
  ? { red: identity, green: identity, dim: identity }
  : pico;

/** Hooks for embedding the CLI, e.g. a fake subprocess executor in tests */
export interface CliEnvironment {
  exec?: CommandExecutor;
}

interface Samples {
  baseline: number[];
  optimized: number[];
}

/** Parse argv, validate, report. @return process exit code */
export async function runValidateCli(
  argv: string[] = hideBin(process.argv),
  env: CliEnvironment = {},
): Promise<number> {
  const args = parseCliArgs(argv);
  try {
    return await validateWithArgs(args, env);
  } catch (e) {
    if (e instanceof InvalidInputError || e instanceof MeasurementFileError) {
      console.error(red(`Error: ${e.message}`));
      return 1;
    }
    throw e;
  }
}

/** Run the validation described by parsed args. @return process exit code */
export async function validateWithArgs(
  args: ValidateCliArgs,
  env: CliEnvironment = {},
): Promise<number> {
  const thresholds = cliThresholds(args);
  const metric: Metric = args.metric;
  const samples = await collectSamples(args, metric, env);
  if (!samples) {
    console.error(
      red(
        "Error: Must provide either --baseline-data and --optimized-data, or --run-benchmark",
      ),
    );
    return 1;
  }

  const validator = new PerformanceValidator(thresholds);
  const outcome = validator.validate(samples.baseline, samples.optimized);
  const gitVersion = args.git ? getCurrentGitVersion() : undefined;

  console.log(summaryTable(outcome, metric));
  const report = generateValidationReport(outcome, {
    thresholds: validator.thresholds,
    metric,
    gitVersion,
  });
  await writeReport(report, args.output);

  if (args.json) {
    await exportValidationJson(
      outcome,
      args.json,
      args,
      validator.thresholds,
      gitVersion,
    );
  }

  logVerdict(outcome);
  return outcome.valid ? 0 : 1;
}

/** @return metric samples from files or fresh benchmark runs, undefined if neither was requested */
async function collectSamples(
  args: ValidateCliArgs,
  metric: Metric,
  env: CliEnvironment,
): Promise<Samples | undefined> {
  const baselinePath = args["baseline-data"];
  const optimizedPath = args["optimized-data"];
  const binaryPath = args["run-benchmark"];

  if (baselinePath && optimizedPath) {
    const baseline = await loadMeasurements(baselinePath);
    const optimized = await loadMeasurements(optimizedPath);
    return {
      baseline: extractMetric(baseline, metric),
      optimized: extractMetric(optimized, metric),
    };
  }

  if (binaryPath) {
    const run = (label: string) => {
      console.log(`Running ${label} benchmark...`);
      return runBenchmark({
        binaryPath,
        url: args.url,
        requests: args.requests,
        timeoutMs: args.timeout * 1000,
        minSampleSize: args["min-samples"],
        exec: env.exec,
      });
    };
    const baseline = await run("baseline");
    logFailures("baseline", baseline);
    const optimized = await run("optimized");
    logFailures("optimized", optimized);
    return {
      baseline: extractMetric(baseline, metric),
      optimized: extractMetric(optimized, metric),
    };
  }

  return undefined;
}

function logFailures(label: string, records: MeasurementRecord[]): void {
  const failed = records.filter(r => r.success === false).length;
  if (failed > 0) {
    console.warn(
      dim(`  ${label}: ${failed} of ${records.length} runs failed (excluded)`),
    );
  }
}

async function writeReport(
  report: string,
  outputPath: string | undefined,
): Promise<void> {
  if (!outputPath) {
    console.log(report);
    return;
  }
  await writeFile(outputPath, report, "utf-8");
  console.log(`Validation report written to ${outputPath}`);
}

function logVerdict(outcome: ValidationOutcome): void {
  if (outcome.valid) {
    console.log(
      green(
        "\n✅ VALIDATION PASSED: Performance claims are statistically supported",
      ),
    );
  } else {
    console.log(
      red(
        "\n🚨 VALIDATION FAILED: Performance claims are not statistically supported",
      ),
    );
  }
}

import type { Argv, InferredOptionTypes } from "yargs";
import yargs from "yargs";
import {
  defaultThresholds,
  type ValidationThresholds,
} from "../ValidationPolicy.ts";

/** CLI args type inferred from cliOptions */
export type ValidateCliArgs = InferredOptionTypes<typeof cliOptions>;

const t = defaultThresholds;

// biome-ignore format: compact option definitions
const cliOptions = {
  "baseline-data":  { type: "string",  requiresArg: true, describe: "JSON file with baseline measurements" },
  "optimized-data": { type: "string",  requiresArg: true, describe: "JSON file with optimized measurements" },
  "run-benchmark":  { type: "string",  requiresArg: true, describe: "path to benchmark binary (runs both conditions)" },
  url:              { type: "string",  default: "http://localhost:8080", describe: "target URL passed to the benchmark binary" },
  requests:         { type: "number",  default: 50, describe: "requests per condition with --run-benchmark" },
  timeout:          { type: "number",  default: 30, describe: "per-request benchmark timeout in seconds" },
  metric:           { choices: ["latency", "throughput"], default: "latency", describe: "measurement field to validate" },
  output:           { type: "string",  requiresArg: true, describe: "write the markdown report to this file" },
  json:             { type: "string",  requiresArg: true, describe: "export validation data to JSON file" },
  git:              { type: "boolean", default: true, describe: "include the current git commit in the report" },
  "min-samples":    { type: "number",  default: t.minSampleSize, describe: "minimum measurements per condition" },
  significance:     { type: "number",  default: t.significanceLevel, describe: "p-value threshold" },
  "min-effect":     { type: "number",  default: t.minEffectSize, describe: "minimum |Cohen's d|" },
  "max-cv":         { type: "number",  default: t.maxCv, describe: "maximum coefficient of variation" },
} as const;

/** @return yargs with validation options */
export function defaultCliArgs(yargsInstance: Argv): Argv<ValidateCliArgs> {
  return yargsInstance
    .scriptName("perfgate")
    .usage("$0 [options]\n\nStatistically validate a performance claim.")
    .options(cliOptions)
    .help()
    .strict();
}

/** @return parsed command line arguments */
export function parseCliArgs(args: string[]): ValidateCliArgs {
  return defaultCliArgs(yargs(args)).parseSync();
}

/** @return validation thresholds selected on the command line */
export function cliThresholds(args: ValidateCliArgs): ValidationThresholds {
  return {
    ...defaultThresholds,
    minSampleSize: args["min-samples"],
    significanceLevel: args.significance,
    minEffectSize: args["min-effect"],
    maxCv: args["max-cv"],
  };
}

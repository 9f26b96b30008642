import { writeFile } from "node:fs/promises";
import type { ValidateCliArgs } from "../cli/CliArgs.ts";
import type { GitVersion } from "../GitUtils.ts";
import type {
  ValidationOutcome,
  ValidationThresholds,
} from "../ValidationPolicy.ts";

/** Serialized form of one validation run */
export interface ValidationJsonData {
  meta: {
    timestamp: string;
    version: string;
    args: Record<string, unknown>;
    git?: GitVersion;
    environment: {
      node: string;
      platform: string;
      arch: string;
    };
  };
  thresholds: Readonly<ValidationThresholds>;
  outcome: ValidationOutcome;
}

/** Export a validation outcome to a JSON file */
export async function exportValidationJson(
  outcome: ValidationOutcome,
  outputPath: string,
  args: ValidateCliArgs,
  thresholds: Readonly<ValidationThresholds>,
  git?: GitVersion,
): Promise<void> {
  const jsonData = prepareJsonData(outcome, args, thresholds, git);
  const jsonString = JSON.stringify(jsonData, null, 2);

  await writeFile(outputPath, jsonString, "utf-8");
  console.log(`Validation data exported to: ${outputPath}`);
}

/** @return outcome wrapped with run metadata */
export function prepareJsonData(
  outcome: ValidationOutcome,
  args: ValidateCliArgs,
  thresholds: Readonly<ValidationThresholds>,
  git?: GitVersion,
): ValidationJsonData {
  return {
    meta: {
      timestamp: new Date().toISOString(),
      version: process.env.npm_package_version || "unknown",
      args: cleanCliArgs(args),
      git,
      environment: {
        node: process.version,
        platform: process.platform,
        arch: process.arch,
      },
    },
    thresholds,
    outcome,
  };
}

/** Clean CLI args for JSON export (camelCase keys, no yargs internals) */
function cleanCliArgs(args: ValidateCliArgs): Record<string, unknown> {
  const toCamel = (k: string) =>
    k.replace(/-([a-z])/g, (_, l: string) => l.toUpperCase());
  const entries = Object.entries(args)
    .filter(([k, v]) => v !== undefined && v !== null && k !== "$0" && k !== "_")
    .map(([k, v]) => [toCamel(k), v] as const);
  return Object.fromEntries(entries);
}

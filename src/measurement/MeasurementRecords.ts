import { readFile } from "node:fs/promises";
import { type ZodIssue, z } from "zod";
import { MeasurementFileError } from "../Errors.ts";

/** Which field of a measurement record is analyzed */
export type Metric = "latency" | "throughput";

/** Unit suffix appended to formatted values */
export const metricUnits: Record<Metric, string> = {
  latency: "ms",
  throughput: " req/s",
};

/** For latency lower is better; for throughput higher is better */
export const higherIsBetter: Record<Metric, boolean> = {
  latency: false,
  throughput: true,
};

const NonNegativeNumber = z.number().finite().min(0, "Must be non-negative");

/** One benchmark request, as written by the runner or by external tools */
export const MeasurementRecordSchema = z
  .object({
    latency_ms: NonNegativeNumber,
    throughput_rps: NonNegativeNumber.optional(),
    timestamp: z.string().optional(),
    success: z.boolean().optional(),
    metadata: z.record(z.unknown()).optional(),
  })
  .passthrough();

export const MeasurementFileSchema = z.array(MeasurementRecordSchema);

export type MeasurementRecord = z.infer<typeof MeasurementRecordSchema>;

/** @return validated records from already-parsed JSON */
export function parseMeasurementRecords(
  json: unknown,
  path?: string,
): MeasurementRecord[] {
  const result = MeasurementFileSchema.safeParse(json);
  if (!result.success) {
    const summary = result.error.issues.slice(0, 5).map(formatIssue);
    const more = result.error.issues.length - summary.length;
    if (more > 0) summary.push(`(${more} more)`);
    throw new MeasurementFileError(
      `invalid measurement records: ${summary.join("; ")}`,
      path,
    );
  }
  return result.data;
}

/** @return validated records read from a JSON file */
export async function loadMeasurements(
  path: string,
): Promise<MeasurementRecord[]> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (cause) {
    throw new MeasurementFileError("cannot read file", path, { cause });
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (cause) {
    throw new MeasurementFileError("not valid JSON", path, { cause });
  }
  return parseMeasurementRecords(json, path);
}

/** @return metric values of successful records (success absent counts as true) */
export function extractMetric(
  records: readonly MeasurementRecord[],
  metric: Metric = "latency",
): number[] {
  const successful = records.filter(r => r.success ?? true);
  if (metric === "latency") return successful.map(r => r.latency_ms);
  return successful.flatMap(r =>
    r.throughput_rps === undefined ? [] : [r.throughput_rps],
  );
}

/** @return "[3].latency_ms: Expected number, received string" */
function formatIssue(issue: ZodIssue): string {
  const path = issue.path
    .map(p => (typeof p === "number" ? `[${p}]` : `.${p}`))
    .join("")
    .replace(/^\./, "");
  return path ? `${path}: ${issue.message}` : issue.message;
}

import { execFile } from "node:child_process";
import pico from "picocolors";
import type { MeasurementRecord } from "../measurement/MeasurementRecords.ts";

const isTest = process.env.NODE_ENV === "test" || process.env.VITEST === "true";
const { yellow } = isTest ? { yellow: (s: string) => s } : pico;

export const defaultTimeoutMs = 30_000;

/** Completed process: exit code plus captured output */
export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  /** set when the process was killed for exceeding its timeout */
  timedOut?: boolean;
}

/** Runs one command to completion; rejects only if it could not be started */
export type CommandExecutor = (
  file: string,
  args: string[],
  timeoutMs: number,
) => Promise<CommandResult>;

export interface BenchmarkRunOptions {
  /** path to the benchmark binary */
  binaryPath: string;
  url: string;
  /** single-request runs to perform */
  requests: number;
  timeoutMs?: number;
  /** warn when fewer requests than this are planned */
  minSampleSize?: number;
  exec?: CommandExecutor;
  /** called after each run, e.g. for progress output */
  onRecord?: (record: MeasurementRecord, index: number) => void;
}

/** Values extracted from the benchmark binary's text report */
export interface ParsedBenchmarkOutput {
  latencyMs: number;
  throughputRps?: number;
}

/**
 * Run the benchmark binary once per request, sequentially.
 *
 * Failed runs (timeout, non-zero exit, unreadable output, spawn errors) are
 * recorded with success: false and never abort the batch.
 */
export async function runBenchmark(
  options: BenchmarkRunOptions,
): Promise<MeasurementRecord[]> {
  const { binaryPath, url, requests, onRecord } = options;
  const { timeoutMs = defaultTimeoutMs, exec = execCommand } = options;
  const { minSampleSize } = options;

  if (minSampleSize !== undefined && requests < minSampleSize) {
    console.warn(
      yellow(`WARNING: Request count ${requests} < minimum ${minSampleSize}`),
    );
  }

  const args = ["-url", url, "-requests", "1", "-concurrency", "1"];
  const records: MeasurementRecord[] = [];
  for (let i = 0; i < requests; i++) {
    const record = await runOnce(exec, binaryPath, args, timeoutMs);
    records.push(record);
    onRecord?.(record, i);
  }
  return records;
}

async function runOnce(
  exec: CommandExecutor,
  binaryPath: string,
  args: string[],
  timeoutMs: number,
): Promise<MeasurementRecord> {
  let result: CommandResult;
  try {
    result = await exec(binaryPath, args, timeoutMs);
  } catch (e) {
    return failedRecord(e instanceof Error ? e.message : String(e));
  }

  if (result.timedOut) return failedRecord("timeout");
  if (result.exitCode !== 0) {
    return failedRecord(result.stderr.trim() || `exit code ${result.exitCode}`);
  }

  const parsed = parseBenchmarkOutput(result.stdout);
  if (!parsed) return failedRecord("unparseable benchmark output");
  const { latencyMs, throughputRps } = parsed;
  return {
    latency_ms: latencyMs,
    ...(throughputRps !== undefined && { throughput_rps: throughputRps }),
    timestamp: new Date().toISOString(),
    success: true,
  };
}

function failedRecord(error: string): MeasurementRecord {
  return {
    latency_ms: 0,
    throughput_rps: 0,
    timestamp: new Date().toISOString(),
    success: false,
    metadata: { error },
  };
}

const latencySectionHeader = "--- Total Latency Statistics ---";
const meanLine = /^Mean:\s*([\d.]+)\s*ms/m;
const throughputLine = /^Requests\/sec:\s*([\d.]+)/m;

/**
 * Extract mean latency and throughput from the benchmark's text report.
 *
 * Latency is the "Mean: N ms" line of the total latency section; other
 * sections (TTFB, TCP, TLS) report means in the same format.
 * @return undefined if no latency could be found
 */
export function parseBenchmarkOutput(
  stdout: string,
): ParsedBenchmarkOutput | undefined {
  const sectionStart = stdout.indexOf(latencySectionHeader);
  if (sectionStart < 0) return undefined;

  const afterHeader = stdout.slice(sectionStart + latencySectionHeader.length);
  const nextSection = afterHeader.search(/^--- /m);
  const section =
    nextSection < 0 ? afterHeader : afterHeader.slice(0, nextSection);

  const latencyMs = parseNumber(section.match(meanLine)?.[1]);
  if (latencyMs === undefined) return undefined;

  const throughputRps = parseNumber(stdout.match(throughputLine)?.[1]);
  return { latencyMs, throughputRps };
}

function parseNumber(text: string | undefined): number | undefined {
  if (text === undefined) return undefined;
  const value = Number.parseFloat(text);
  return Number.isFinite(value) ? value : undefined;
}

/** Default executor: execFile with a kill timeout */
export const execCommand: CommandExecutor = (file, args, timeoutMs) =>
  new Promise((resolve, reject) => {
    execFile(
      file,
      args,
      { timeout: timeoutMs, encoding: "utf-8" },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ exitCode: 0, stdout, stderr });
          return;
        }
        if (typeof error.code === "string") {
          reject(error); // spawn failure, e.g. ENOENT
          return;
        }
        const timedOut = error.killed === true && Boolean(error.signal);
        const exitCode = typeof error.code === "number" ? error.code : 1;
        resolve({ exitCode, stdout, stderr, timedOut });
      },
    );
  });

/**
 * CLI: viking-extract
 *
 *   viking-extract [extract] <url...> [--format json|text] [--output <path>] [--timeout <ms>]
 *   viking-extract stats <oxx-files.json> [--format json|text] [--output <path>]
 *
 * Exits 0 on success, including partial results after a failed page fetch,
 * and 1 on any unrecoverable error.
 */
import * as fs from "fs";
import config from "./config";
import { logger } from "./monitoring/logger";
import { getVikingStatistics, loadOxxFiles } from "./processing/oxx-file.handler";
import {
  formatOutcomes,
  formatStatistics,
  OUTPUT_FORMATS,
  type OutputFormat,
} from "./processing/output-formatter";
import { VikingFileScraper } from "./scraping/viking-file.scraper";
import { InvalidArgumentsError } from "./shared/errors/scrape.errors";
import type { ExtractionOutcome } from "./shared/types/viking.types";
import { runBatch } from "./workers/batch.runner";

export type CliCommand = "extract" | "stats";

export interface CliOptions {
  command: CliCommand;
  /** Page URLs for extract, the JSON file path for stats */
  inputs: string[];
  format: OutputFormat;
  output?: string;
  timeoutMs: number;
}

export const USAGE = `Usage:
  viking-extract [extract] <url...> [--format json|text] [--output <path>] [--timeout <ms>]
  viking-extract stats <oxx-files.json> [--format json|text] [--output <path>]`;

/**
 * @throws InvalidArgumentsError on unknown flags, missing values or inputs
 */
export function parseCliArgs(args: string[]): CliOptions {
  const options: CliOptions = {
    command: "extract",
    inputs: [],
    format: "json",
    timeoutMs: config.requestTimeoutMs,
  };

  const command = args[0];
  let rest = args;
  if (command === "extract" || command === "stats") {
    options.command = command;
    rest = args.slice(1);
  }

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    if (!arg.startsWith("--")) {
      options.inputs.push(arg);
      continue;
    }

    const [flag, inlineValue] = arg.split(/=(.*)/s, 2);
    const value = inlineValue ?? rest[++i];
    if (value === undefined) {
      throw new InvalidArgumentsError(`Missing value for ${flag}`);
    }

    switch (flag) {
      case "--format":
        options.format = parseFormat(value);
        break;
      case "--output":
        options.output = value;
        break;
      case "--timeout":
        options.timeoutMs = parseTimeout(value);
        break;
      default:
        throw new InvalidArgumentsError(`Unknown option: ${flag}`);
    }
  }

  if (options.inputs.length === 0) {
    throw new InvalidArgumentsError(
      options.command === "stats" ? "Missing OxxFile JSON path" : "Missing page URL"
    );
  }
  if (options.command === "stats" && options.inputs.length > 1) {
    throw new InvalidArgumentsError("stats takes exactly one file");
  }

  return options;
}

/**
 * Runs one CLI invocation.
 * @returns The process exit code
 */
export async function runCli(args: string[]): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(args);
  } catch (error) {
    process.stderr.write(`${(error as Error).message}\n${USAGE}\n`);
    return 1;
  }

  try {
    const { text, exitCode } =
      options.command === "stats" ? runStats(options) : await runExtract(options);
    writeOutput(text, options.output);
    return exitCode;
  } catch (error) {
    logger.error({ command: options.command, error: (error as Error).message }, "Command failed");
    return 1;
  }
}

async function runExtract(options: CliOptions): Promise<{ text: string; exitCode: number }> {
  const scraper = new VikingFileScraper({ timeoutMs: options.timeoutMs });
  const results = await runBatch(scraper, options.inputs);

  const outcomes: ExtractionOutcome[] = [];
  let firstError: Error | undefined;
  for (const result of results) {
    if (result.ok) outcomes.push(result.outcome);
    else if (!firstError) firstError = result.error;
  }

  if (firstError && outcomes.length === 0) throw firstError;

  return { text: formatOutcomes(outcomes, options.format), exitCode: firstError ? 1 : 0 };
}

function runStats(options: CliOptions): { text: string; exitCode: number } {
  const files = loadOxxFiles(options.inputs[0]);
  return { text: formatStatistics(getVikingStatistics(files), options.format), exitCode: 0 };
}

function writeOutput(text: string, destination?: string): void {
  if (destination) {
    fs.writeFileSync(destination, `${text}\n`, "utf-8");
    logger.info({ destination }, "Output written");
  } else {
    process.stdout.write(`${text}\n`);
  }
}

function parseFormat(value: string): OutputFormat {
  const format = OUTPUT_FORMATS.find((f) => f === value);
  if (!format) {
    throw new InvalidArgumentsError(`Invalid format: ${value} (expected json or text)`);
  }
  return format;
}

function parseTimeout(value: string): number {
  const timeoutMs = Number(value);
  if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
    throw new InvalidArgumentsError(`Invalid timeout: ${value}`);
  }
  return timeoutMs;
}

/**
 * dashcam2gpx command line
 *
 * Usage:
 *   npx tsx src/scripts/dashcam2gpx.ts <input.txt> [options]
 *
 * Options:
 *   -o, --output <path>          GPX output (default: input with .gpx extension)
 *   -s, --segments-limit <n>     Max tracks per GPX file, 0 = no limit (default: 0)
 *   -i, --info                   Print a summary instead of writing GPX
 *   -z, --time-zone <zone>       IANA zone for timestamps (default: TIME_ZONE or system)
 *   -v, --verbose                Enable debug logging
 *   -h, --help                   Show this help
 */

import { DEFAULT_TIME_ZONE } from "../config/constants.js";
import { logger, setDebugLogging } from "../lib/logger.js";
import { convertLogFile } from "../services/converter.service.js";
import { parseTracks } from "../services/track-parser.service.js";
import { isValidTimeZone } from "../services/timestamp.service.js";
import { formatTrackSummary, summarizeTracks } from "../services/track-summary.service.js";

export const USAGE = `Usage: dashcam2gpx <input> [options]

Convert dashcam GPS logs (.txt) to GPX tracks.

Options:
  -o, --output <path>        GPX output path (default: input with .gpx extension)
  -s, --segments-limit <n>   Max track segments per GPX file, 0 = no limit (default: 0)
  -i, --info                 Print a summary of the log instead of writing GPX
  -z, --time-zone <zone>     IANA time zone for timestamps (default: ${DEFAULT_TIME_ZONE})
  -v, --verbose              Enable debug logging
  -h, --help                 Show this help`;

export interface CliArgs {
  input: string;
  output?: string;
  segmentsLimit: number;
  info: boolean;
  timeZone: string;
  verbose: boolean;
}

export type ParsedCli = { help: true } | ({ help: false } & CliArgs);

const VALUE_OPTIONS: Record<string, "output" | "segmentsLimit" | "timeZone"> = {
  "-o": "output",
  "--output": "output",
  "-s": "segmentsLimit",
  "--segments-limit": "segmentsLimit",
  "-z": "timeZone",
  "--time-zone": "timeZone",
};

/**
 * Parse command line arguments (without node and script path)
 *
 * @throws CliUsageError for unknown options, missing values or a bad limit
 */
export function parseCliArgs(argv: string[]): ParsedCli {
  const values: Partial<Record<"output" | "segmentsLimit" | "timeZone", string>> = {};
  const positional: string[] = [];
  let info = false;
  let verbose = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === "-h" || arg === "--help") {
      return { help: true };
    }
    if (arg === "-i" || arg === "--info") {
      info = true;
      continue;
    }
    if (arg === "-v" || arg === "--verbose") {
      verbose = true;
      continue;
    }

    // --output=trip.gpx
    const equalsIndex = arg.startsWith("--") ? arg.indexOf("=") : -1;
    const flag = equalsIndex === -1 ? arg : arg.slice(0, equalsIndex);
    const inlineValue = equalsIndex === -1 ? undefined : arg.slice(equalsIndex + 1);

    const key: "output" | "segmentsLimit" | "timeZone" | undefined = VALUE_OPTIONS[flag];
    if (key) {
      const value = inlineValue ?? argv[++i];
      if (value === undefined || value === "") {
        throw new CliUsageError(`Option ${flag} requires a value`);
      }
      values[key] = value;
      continue;
    }

    if (arg.startsWith("-") && arg !== "-") {
      throw new CliUsageError(`Unknown option ${arg}`);
    }
    positional.push(arg);
  }

  if (positional.length !== 1) {
    throw new CliUsageError(
      positional.length === 0 ? "Missing input file" : `Unexpected argument ${positional[1]}`
    );
  }

  const segmentsLimit = values.segmentsLimit === undefined ? 0 : Number(values.segmentsLimit);
  if (!Number.isInteger(segmentsLimit) || segmentsLimit < 0) {
    throw new CliUsageError(`Invalid segments limit "${values.segmentsLimit}"`);
  }

  const timeZone = values.timeZone ?? DEFAULT_TIME_ZONE;
  if (!isValidTimeZone(timeZone)) {
    throw new CliUsageError(`Unknown time zone "${timeZone}"`);
  }

  return {
    help: false,
    input: positional[0],
    output: values.output,
    segmentsLimit,
    info,
    timeZone,
    verbose,
  };
}

/**
 * Run the CLI and return the process exit code
 */
export function runCli(argv: string[]): number {
  let parsed: ParsedCli;
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof CliUsageError) {
      logger.error(`❌ ${error.message}\n`);
      logger.error(USAGE);
      return 1;
    }
    throw error;
  }

  if (parsed.help) {
    logger.info(USAGE);
    return 0;
  }

  // --verbose only turns debug on; LOG_LEVEL=debug stays in effect without it
  if (parsed.verbose) {
    setDebugLogging(true);
  }

  try {
    if (parsed.info) {
      const tracks = parseTracks(parsed.input);
      const summary = summarizeTracks(tracks, parsed.timeZone);
      for (const line of formatTrackSummary(summary)) {
        logger.info(line);
      }
      return 0;
    }

    const result = convertLogFile({
      inputPath: parsed.input,
      outputPath: parsed.output,
      segmentsLimit: parsed.segmentsLimit,
      timeZone: parsed.timeZone,
    });

    if (result.files.length > 0) {
      logger.info(
        `✅ Converted ${result.trackCount} tracks (${result.pointCount} points) into ${result.files.length} GPX file(s)`
      );
    }
    return 0;
  } catch (error) {
    logger.error(`❌ ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

#!/usr/bin/env node
/**
 * Convert a dashcam GPS log to GPX
 *
 * Usage: npx tsx src/scripts/dashcam2gpx.ts GPSData000001.txt [-o out.gpx] [-s 10] [-v]
 *
 * Run with --help for all options.
 */

import "dotenv/config";
import { runCli } from "../utils/cli.js";

function main(): void {
  process.exitCode = runCli(process.argv.slice(2));
}

main();

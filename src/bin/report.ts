#!/usr/bin/env node
import fs from "fs";
import path from "path";
import { config } from "../config.js";
import { readObservations } from "../observationLog.js";
import { buildReport, formatSummary, renderChart } from "../report/index.js";
import { parseSince } from "../utils/parseSince.js";

// Usage: ground-report [--since 24h]
function readSinceArg(argv: string[]): Date | null {
  const i = argv.indexOf("--since");
  if (i === -1) return null;

  const raw = argv[i + 1] ?? "";
  const since = parseSince(raw);
  if (!since) {
    throw new Error(`Invalid --since value "${raw}" (try 24h, 3d, 90m)`);
  }
  return since;
}

function main(): void {
  console.log(`\n--- Starting ground-time reporter at ${new Date().toISOString()} ---`);

  const since = readSinceArg(process.argv.slice(2));

  console.log(`Loading data from ${config.logFilePath}...`);
  const rows = readObservations(config.logFilePath);
  if (rows === null) {
    console.error(`The file ${config.logFilePath} was not found. Run the monitor first to generate some data.`);
    return;
  }

  const report = buildReport(rows, { topN: config.reportTopN, since });
  console.log(`Data loaded and cleaned. Found ${report.aircraft.length} unique aircraft on the ground.`);

  if (!report.analysis) {
    console.log("No data available for analysis.");
    return;
  }

  fs.mkdirSync(path.dirname(config.reportImagePath), { recursive: true });
  fs.writeFileSync(config.reportImagePath, renderChart(report.top, config.airport.name), "utf-8");
  console.log(`Visual report saved to ${config.reportImagePath}.`);

  console.log("\n" + formatSummary(report.analysis).join("\n"));
  console.log("\n--- Reporter run finished. ---");
}

try {
  main();
} catch (err) {
  console.error("Reporter run failed:", err);
  process.exitCode = 1;
}

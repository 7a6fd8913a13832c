#!/usr/bin/env node
import { sendSlackAlert } from "../alertChannel.js";
import { config } from "../config.js";
import { openDatabase } from "../db.js";
import { PersistenceError } from "../errors.js";
import { GroundTracker } from "../groundTracker.js";
import { runMonitor } from "../monitor.js";
import { fetchSnapshot } from "../snapshotSource.js";

// Meant to be started by cron, one process per poll. Overlapping runs are not supported.
async function main(): Promise<void> {
  console.log(`--- Starting ground-time monitor for ${config.airport.iata} at ${new Date().toISOString()} ---`);

  const db = openDatabase(config.stateDbPath);
  try {
    await runMonitor({
      db,
      tracker: new GroundTracker(config.groundThresholdMinutes),
      logFilePath: config.logFilePath,
      fetchSnapshot: () =>
        fetchSnapshot({ url: config.openskyUrl, area: config.area, timeoutMs: config.openskyTimeoutMs }),
      notify: (flagged) =>
        sendSlackAlert(config.slackWebhookUrl, flagged, config.airport, config.groundThresholdMinutes),
    });
  } finally {
    db.close();
  }

  console.log(`--- Monitor run finished at ${new Date().toISOString()} ---`);
}

main().catch((err: unknown) => {
  if (err instanceof PersistenceError) {
    console.error(`Fatal: ${err.message}`);
  } else {
    console.error("Monitor run failed:", err);
  }
  process.exitCode = 1;
});

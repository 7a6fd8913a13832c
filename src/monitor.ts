import type { StateDatabase } from "./db.js";
import { PersistenceError } from "./errors.js";
import type { GroundTracker } from "./groundTracker.js";
import { appendObservations } from "./observationLog.js";
import { loadTrackingState, saveTrackingState } from "./trackingStore.js";
import type { GroundRecord, Observation, TrackingState } from "./types.js";

export interface MonitorDeps {
  fetchSnapshot: () => Promise<Observation[]>;
  notify: (flagged: GroundRecord[]) => Promise<boolean>;
  tracker: GroundTracker;
  db: StateDatabase;
  logFilePath: string;
  now?: () => Date;
}

export interface MonitorSummary {
  seen: number;
  grounded: number;
  flagged: number;
  delivered: boolean;
}

function loadState(db: StateDatabase): TrackingState {
  try {
    return loadTrackingState(db);
  } catch (err) {
    throw new PersistenceError("tracking-state", `Could not load tracking state: ${(err as Error).message}`, err);
  }
}

/**
 * One monitor invocation: fetch → track → save state → append log → alert.
 *
 * Flagged aircraft are marked as alerted before delivery is attempted, so a
 * failed Slack post is not retried on the next run.
 *
 * @throws PersistenceError when the tracking state or the log can't be read or written
 */
export async function runMonitor(deps: MonitorDeps): Promise<MonitorSummary> {
  const { tracker, db, logFilePath } = deps;
  const now = deps.now ?? (() => new Date());

  const snapshot = await deps.fetchSnapshot();
  const logSummary = (grounded: number, flagged: number) =>
    console.log(`Processed ${snapshot.length} aircraft. Found ${grounded} on the ground. ${flagged} flagged.`);

  let state: TrackingState;
  try {
    state = loadState(db);
  } catch (err) {
    logSummary(0, 0);
    throw err;
  }

  const runAt = now();
  if (snapshot.length === 0) {
    console.log("No state vector data to process.");
  }
  const { loggable, toAlert } = tracker.process(snapshot, runAt, state);

  logSummary(loggable.length, toAlert.length);

  try {
    saveTrackingState(db, state);
  } catch (err) {
    throw new PersistenceError("tracking-state", `Could not save tracking state: ${(err as Error).message}`, err);
  }

  try {
    appendObservations(logFilePath, runAt, loggable);
  } catch (err) {
    throw new PersistenceError("observation-log", `Could not append to ${logFilePath}: ${(err as Error).message}`, err);
  }

  const sent = await deps.notify(toAlert);
  // nothing flagged means nothing was owed
  const delivered = toAlert.length === 0 || sent;

  return {
    seen: snapshot.length,
    grounded: loggable.length,
    flagged: toAlert.length,
    delivered,
  };
}

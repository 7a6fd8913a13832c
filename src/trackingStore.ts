import type { StateDatabase } from "./db.js";
import type { TrackingRow, TrackingState } from "./types.js";

/**
 * Read the persisted tracking state. An empty table is an empty map.
 * Rows with an unreadable `first_seen` are dropped.
 */
export function loadTrackingState(db: StateDatabase): TrackingState {
  const rows = db
    .prepare<[], TrackingRow>("SELECT callsign, first_seen, alert_sent FROM tracked_aircraft")
    .all();

  const state: TrackingState = new Map();
  for (const row of rows) {
    const firstSeen = new Date(row.first_seen);
    if (Number.isNaN(firstSeen.getTime())) {
      console.warn(`Dropping tracking entry ${row.callsign}: bad first_seen "${row.first_seen}"`);
      continue;
    }
    state.set(row.callsign, { firstSeen, alertSent: row.alert_sent === 1 });
  }

  return state;
}

/**
 * Replace the persisted tracking state with `state` in one transaction, so a
 * reader never sees a half-written table.
 */
export function saveTrackingState(db: StateDatabase, state: TrackingState): void {
  const clear = db.prepare("DELETE FROM tracked_aircraft");
  const insert = db.prepare<TrackingRow>(
    `INSERT INTO tracked_aircraft (callsign, first_seen, alert_sent)
     VALUES (@callsign, @first_seen, @alert_sent)`
  );

  const replaceAll = db.transaction((entries: TrackingState) => {
    clear.run();
    for (const [callsign, tracked] of entries) {
      insert.run({
        callsign,
        first_seen: tracked.firstSeen.toISOString(),
        alert_sent: tracked.alertSent ? 1 : 0,
      });
    }
  });

  replaceAll(state);
}

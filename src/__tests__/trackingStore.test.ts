import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { openDatabase, type StateDatabase } from "../db.js";
import { loadTrackingState, saveTrackingState } from "../trackingStore.js";
import type { TrackingState } from "../types.js";

describe("tracking store", () => {
  let db: StateDatabase;

  beforeEach(() => {
    db = openDatabase(":memory:");
  });

  afterEach(() => {
    db.close();
  });

  it("loads an empty map from a fresh database", () => {
    expect(loadTrackingState(db).size).toBe(0);
  });

  it("round-trips first_seen and alert_sent", () => {
    const state: TrackingState = new Map([
      ["ACA870", { firstSeen: new Date("2025-03-01T12:00:00.000Z"), alertSent: true }],
      ["WJA22", { firstSeen: new Date("2025-03-01T12:30:00.000Z"), alertSent: false }],
    ]);
    saveTrackingState(db, state);

    expect(loadTrackingState(db)).toEqual(state);
  });

  it("stores first_seen as ISO-8601 text", () => {
    saveTrackingState(db, new Map([["ACA870", { firstSeen: new Date("2025-03-01T12:00:00.000Z"), alertSent: false }]]));
    const row = db.prepare("SELECT first_seen, alert_sent FROM tracked_aircraft WHERE callsign = ?").get("ACA870");
    expect(row).toEqual({ first_seen: "2025-03-01T12:00:00.000Z", alert_sent: 0 });
  });

  it("replaces the previous contents on save", () => {
    saveTrackingState(db, new Map([["OLD1", { firstSeen: new Date("2025-03-01T10:00:00.000Z"), alertSent: false }]]));
    saveTrackingState(db, new Map([["NEW1", { firstSeen: new Date("2025-03-01T11:00:00.000Z"), alertSent: false }]]));

    expect(Array.from(loadTrackingState(db).keys())).toEqual(["NEW1"]);
  });

  it("saving an empty map clears the table", () => {
    saveTrackingState(db, new Map([["OLD1", { firstSeen: new Date("2025-03-01T10:00:00.000Z"), alertSent: true }]]));
    saveTrackingState(db, new Map());
    expect(loadTrackingState(db).size).toBe(0);
  });

  it("drops rows with an unreadable first_seen", () => {
    db.prepare("INSERT INTO tracked_aircraft (callsign, first_seen, alert_sent) VALUES (?, ?, ?)").run("BAD1", "yesterday-ish", 0);
    db.prepare("INSERT INTO tracked_aircraft (callsign, first_seen, alert_sent) VALUES (?, ?, ?)").run(
      "GOOD1",
      "2025-03-01T12:00:00.000Z",
      1
    );

    const state = loadTrackingState(db);
    expect(Array.from(state.keys())).toEqual(["GOOD1"]);
    expect(state.get("GOOD1")?.alertSent).toBe(true);
  });
});

import { Router, Request, Response } from "express";

import type { StateDatabase } from "./db.js";
import { minutesOnGround } from "./groundTracker.js";
import { readObservations } from "./observationLog.js";
import { buildReport } from "./report/index.js";
import { loadTrackingState } from "./trackingStore.js";
import type { TrackingState } from "./types.js";
import { readSinceParam } from "./utils/parseSince.js";

export interface ApiOptions {
  db: StateDatabase;
  logFilePath: string;
  thresholdMinutes: number;
  topN: number;
}

export interface TrackedAircraftView {
  callsign: string;
  firstSeen: string;
  minutesOnGround: number;
  overThreshold: boolean;
  alertSent: boolean;
}

/** Current ground streaks, longest first. */
export function describeTracking(state: TrackingState, now: Date, thresholdMinutes: number): TrackedAircraftView[] {
  return Array.from(state, ([callsign, tracked]) => {
    const minutes = minutesOnGround(tracked.firstSeen, now);
    return {
      callsign,
      firstSeen: tracked.firstSeen.toISOString(),
      minutesOnGround: minutes,
      overThreshold: minutes > thresholdMinutes,
      alertSent: tracked.alertSent,
    };
  }).sort((a, b) => b.minutesOnGround - a.minutesOnGround || a.callsign.localeCompare(b.callsign));
}

export function createApiRouter({ db, logFilePath, thresholdMinutes, topN }: ApiOptions): Router {
  const router = Router();

  // ---------- report ----------
  router.get("/api/report", (req: Request, res: Response) => {
    const sinceParam = readSinceParam(req.query.since);
    if (!sinceParam.ok) {
      return res.status(400).json({ error: `Invalid since value "${sinceParam.raw}"` });
    }

    try {
      const rows = readObservations(logFilePath);
      if (rows === null) {
        return res.status(404).json({ error: "Observation log not found" });
      }
      res.json(buildReport(rows, { topN, since: sinceParam.since }));
    } catch (error) {
      console.error("Error building report:", error);
      res.status(500).json({ error: "Failed to build report" });
    }
  });

  // ---------- live tracking state ----------
  router.get("/api/tracking", (_req: Request, res: Response) => {
    try {
      const state = loadTrackingState(db);
      res.json({
        thresholdMinutes,
        aircraft: describeTracking(state, new Date(), thresholdMinutes),
      });
    } catch (error) {
      console.error("Error reading tracking state:", error);
      res.status(500).json({ error: "Failed to read tracking state" });
    }
  });

  return router;
}

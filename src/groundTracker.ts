import type { GroundRecord, Observation, ProcessResult, TrackingState } from "./types.js";

const MS_PER_SECOND = 1000;

/**
 * Whole minutes between the start of a ground streak and `now`.
 * Elapsed seconds are truncated first, then divided by 60; never negative.
 */
export function minutesOnGround(firstSeen: Date, now: Date): number {
  const elapsedSeconds = Math.floor((now.getTime() - firstSeen.getTime()) / MS_PER_SECOND);
  if (elapsedSeconds <= 0) return 0;
  return Math.floor(elapsedSeconds / 60);
}

function toRecord(obs: Observation, callsign: string, dwell: number): GroundRecord {
  return {
    callsign,
    icao24: obs.icao24,
    airline: "Unknown", // OpenSky does not carry an airline name
    originCountry: obs.originCountry,
    lastContact: obs.lastContact,
    minutesOnGround: dwell,
  };
}

/**
 * Advance the tracking state by one snapshot.
 *
 * Every grounded observation with a callsign is returned in `loggable`, in
 * snapshot order. Those whose dwell strictly exceeds `thresholdMinutes` for
 * the first time in their current streak are also returned in `toAlert`,
 * and their entry is marked as alerted. Entries not seen on the ground in
 * this snapshot are evicted.
 *
 * An empty snapshot is a no-op and leaves `state` untouched.
 */
export function processSnapshot(
  snapshot: readonly Observation[],
  now: Date,
  state: TrackingState,
  thresholdMinutes: number
): ProcessResult {
  const loggable: GroundRecord[] = [];
  const toAlert: GroundRecord[] = [];

  if (snapshot.length === 0) {
    return { loggable, toAlert };
  }

  const live = new Set<string>();

  for (const obs of snapshot) {
    if (obs.onGround !== true) continue;

    const callsign = typeof obs.callsign === "string" ? obs.callsign.trim() : "";
    if (!callsign) continue;

    live.add(callsign);

    let tracked = state.get(callsign);
    let dwell = 0;
    if (!tracked) {
      tracked = { firstSeen: now, alertSent: false };
      state.set(callsign, tracked);
    } else {
      dwell = minutesOnGround(tracked.firstSeen, now);
    }

    const record = toRecord(obs, callsign, dwell);
    loggable.push(record);

    if (dwell > thresholdMinutes && !tracked.alertSent) {
      toAlert.push(record);
      tracked.alertSent = true;
    }
  }

  for (const callsign of Array.from(state.keys())) {
    if (!live.has(callsign)) {
      state.delete(callsign);
    }
  }

  return { loggable, toAlert };
}

/**
 * Ground-time tracker bound to one alert threshold.
 */
export class GroundTracker {
  constructor(private readonly thresholdMinutes: number) {}

  get threshold(): number {
    return this.thresholdMinutes;
  }

  public process(snapshot: readonly Observation[], now: Date, state: TrackingState): ProcessResult {
    return processSnapshot(snapshot, now, state, this.thresholdMinutes);
  }
}

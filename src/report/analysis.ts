import type { ObservationLogRow } from "../types.js";

export interface GroundTimeAnalysis {
  uniqueAircraftCount: number;
  averageMinutesOnGround: number;
  longest: ObservationLogRow;
}

const loggedAt = (row: ObservationLogRow): number => {
  const t = Date.parse(row.log_timestamp_utc);
  return Number.isNaN(t) ? 0 : t;
};

/**
 * Keep only the latest row per callsign, since each run logs every aircraft
 * still on the ground and only the last row carries its final dwell time.
 * Result is ordered by log timestamp.
 */
export function cleanObservations(rows: readonly ObservationLogRow[]): ObservationLogRow[] {
  const sorted = [...rows].sort((a, b) => loggedAt(a) - loggedAt(b));

  const latest = new Map<string, ObservationLogRow>();
  for (const row of sorted) {
    latest.delete(row.callsign);
    latest.set(row.callsign, row);
  }

  return Array.from(latest.values());
}

/** Rows logged at or after `since`. */
export function filterSince(rows: readonly ObservationLogRow[], since: Date): ObservationLogRow[] {
  const cutoff = since.getTime();
  return rows.filter((row) => loggedAt(row) >= cutoff);
}

export function analyzeObservations(rows: readonly ObservationLogRow[]): GroundTimeAnalysis | null {
  if (rows.length === 0) return null;

  let total = 0;
  let longest = rows[0];
  for (const row of rows) {
    total += row.minutes_on_ground;
    if (row.minutes_on_ground > longest.minutes_on_ground) longest = row;
  }

  return {
    uniqueAircraftCount: new Set(rows.map((r) => r.callsign)).size,
    averageMinutesOnGround: total / rows.length,
    longest,
  };
}

/**
 * The `n` longest ground times, ascending so a horizontal bar chart draws the
 * longest bar last (at the top).
 */
export function topGroundTimes(rows: readonly ObservationLogRow[], n: number): ObservationLogRow[] {
  return [...rows]
    .sort((a, b) => b.minutes_on_ground - a.minutes_on_ground)
    .slice(0, Math.max(0, n))
    .reverse();
}

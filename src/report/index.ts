import type { ObservationLogRow } from "../types.js";
import { analyzeObservations, cleanObservations, filterSince, topGroundTimes } from "./analysis.js";
import type { GroundTimeAnalysis } from "./analysis.js";

export { analyzeObservations, cleanObservations, filterSince, topGroundTimes };
export type { GroundTimeAnalysis };
export { layoutChart, renderChart } from "./chart.js";

export interface GroundTimeReport {
  since: string | null;
  rowsLogged: number;
  aircraft: ObservationLogRow[];
  analysis: GroundTimeAnalysis | null;
  top: ObservationLogRow[];
}

export function buildReport(
  rows: readonly ObservationLogRow[],
  options: { topN: number; since?: Date | null }
): GroundTimeReport {
  const windowed = options.since ? filterSince(rows, options.since) : [...rows];
  const aircraft = cleanObservations(windowed);

  return {
    since: options.since ? options.since.toISOString() : null,
    rowsLogged: windowed.length,
    aircraft,
    analysis: analyzeObservations(aircraft),
    top: topGroundTimes(aircraft, options.topN),
  };
}

/** Plain-text summary printed by the reporter. */
export function formatSummary(analysis: GroundTimeAnalysis): string[] {
  const { longest } = analysis;
  return [
    "--- Analysis Summary ---",
    `Total Unique Aircraft Logged: ${analysis.uniqueAircraftCount}`,
    `Average Time on Ground: ${analysis.averageMinutesOnGround.toFixed(2)} minutes`,
    "",
    "--- Flight with Longest Ground Time ---",
    `Callsign: ${longest.callsign}`,
    `Time on Ground: ${Math.trunc(longest.minutes_on_ground)} minutes`,
    `Origin Country: ${longest.origin_country || "N/A"}`,
    `Last Contact (UTC): ${longest.last_contact_time_utc || "N/A"}`,
  ];
}

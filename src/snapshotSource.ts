import type { BoundingBox, Observation, OpenSkyStateVector } from "./types.js";

export interface SnapshotOptions {
  url: string;
  area: BoundingBox;
  timeoutMs: number;
}

const asNumber = (value: unknown): number | null =>
  typeof value === "number" && Number.isFinite(value) ? value : null;

/**
 * Turn one OpenSky state vector into an Observation.
 * Returns null for vectors with no callsign. A missing or non-numeric
 * last_contact is kept as null since it is only ever displayed.
 * A non-boolean on_ground is read as "not on ground".
 */
export function normalizeStateVector(vector: unknown): Observation | null {
  if (!Array.isArray(vector)) return null;
  const [icao24, rawCallsign, originCountry, , lastContact, longitude, latitude, , onGround]: OpenSkyStateVector = vector;

  const callsign = typeof rawCallsign === "string" ? rawCallsign.trim() : "";
  if (!callsign) return null;

  const lastContactSeconds = asNumber(lastContact);

  return {
    callsign,
    icao24: typeof icao24 === "string" ? icao24 : "",
    onGround: onGround === true,
    lastContact: lastContactSeconds === null ? null : new Date(lastContactSeconds * 1000),
    originCountry: typeof originCountry === "string" && originCountry ? originCountry : "N/A",
    longitude: asNumber(longitude),
    latitude: asNumber(latitude),
  };
}

function statesOf(body: unknown): unknown {
  if (typeof body !== "object" || body === null || !("states" in body)) return undefined;
  return body.states;
}

/** Normalize a decoded `states/all` body, dropping entries that don't survive. */
export function parseStatesResponse(body: unknown): Observation[] {
  const states = statesOf(body);
  if (!Array.isArray(states)) return [];

  const observations: Observation[] = [];
  for (const vector of states) {
    const obs = normalizeStateVector(vector);
    if (obs) observations.push(obs);
  }
  return observations;
}

export function buildStatesUrl(baseUrl: string, area: BoundingBox): string {
  const url = new URL(baseUrl);
  url.searchParams.set("lamin", String(area.minLat));
  url.searchParams.set("lamax", String(area.maxLat));
  url.searchParams.set("lomin", String(area.minLon));
  url.searchParams.set("lomax", String(area.maxLon));
  return url.toString();
}

/**
 * Fetch the aircraft currently inside `area`.
 * Any failure (timeout, HTTP error, bad body) is logged and yields [].
 */
export async function fetchSnapshot({ url, area, timeoutMs }: SnapshotOptions): Promise<Observation[]> {
  console.log("Fetching live flight data from OpenSky Network...");

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const res = await fetch(buildStatesUrl(url, area), {
      cache: "no-store",
      signal: controller.signal,
    });

    if (!res.ok) {
      throw new Error(`OpenSky error: ${res.status} ${res.statusText}`);
    }

    const body: unknown = await res.json();
    if (statesOf(body) == null) {
      console.log("No state vectors found in the OpenSky response.");
      return [];
    }

    const observations = parseStatesResponse(body);
    console.log(`Fetched ${observations.length} aircraft with a callsign from OpenSky.`);
    return observations;
  } catch (err) {
    console.error("OpenSky fetch failed:", (err as Error).message);
    return [];
  } finally {
    clearTimeout(timeoutId);
  }
}

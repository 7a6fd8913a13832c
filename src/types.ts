/**
 * Raw state vector delivered by the OpenSky `states/all` endpoint.
 * Positional: 0 icao24, 1 callsign, 2 origin_country, 3 time_position,
 * 4 last_contact, 5 longitude, 6 latitude, 7 baro_altitude, 8 on_ground,
 * 9 velocity, 10 true_track, 11 vertical_rate, 12 sensors, 13 geo_altitude,
 * 14 squawk, 15 spi, 16 position_source
 */
export type OpenSkyStateVector = unknown[];

/** One aircraft in one snapshot, after normalization */
export interface Observation {
  callsign: string; // trimmed, never empty
  icao24: string;
  onGround: boolean;
  lastContact: Date | null; // null when the feed sent no usable value
  originCountry: string;
  latitude: number | null;
  longitude: number | null;
}

export interface TrackedAircraft {
  firstSeen: Date; // snapshot time the current ground streak started
  alertSent: boolean;
}

/** Callsign → tracking entry. Owned by one invocation at a time. */
export type TrackingState = Map<string, TrackedAircraft>;

/** Grounded aircraft as logged and alerted on */
export interface GroundRecord {
  callsign: string;
  icao24: string;
  airline: string;
  originCountry: string;
  lastContact: Date | null;
  minutesOnGround: number;
}

export interface ProcessResult {
  loggable: GroundRecord[];
  toAlert: GroundRecord[];
}

export interface BoundingBox {
  minLat: number;
  maxLat: number;
  minLon: number;
  maxLon: number;
}

export interface Airport {
  iata: string;
  name: string;
}

/** A row of the observation log as read back from disk */
export type ObservationLogRow = {
  log_timestamp_utc: string;
  callsign: string;
  airline: string;
  origin_country: string;
  last_contact_time_utc: string;
  minutes_on_ground: number;
};

export type TrackingRow = {
  callsign: string;
  first_seen: string;
  alert_sent: number;
};

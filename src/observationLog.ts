import fs from "fs";
import path from "path";
import type { GroundRecord, ObservationLogRow } from "./types.js";

export const LOG_COLUMNS = [
  "log_timestamp_utc",
  "callsign",
  "airline",
  "origin_country",
  "last_contact_time_utc",
  "minutes_on_ground",
] as const;

export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function toCsvLine(runAt: Date, record: GroundRecord): string {
  return [
    runAt.toISOString(),
    record.callsign,
    record.airline,
    record.originCountry,
    record.lastContact ? record.lastContact.toISOString() : "",
    String(record.minutesOnGround),
  ]
    .map(escapeCsvField)
    .join(",");
}

/**
 * Append one row per grounded aircraft. The header goes in only when the file
 * is created; existing rows are never rewritten. Write errors propagate.
 */
export function appendObservations(logPath: string, runAt: Date, records: readonly GroundRecord[]): number {
  if (records.length === 0) return 0;

  fs.mkdirSync(path.dirname(logPath), { recursive: true });
  const isNew = !fs.existsSync(logPath);

  const lines = records.map((r) => toCsvLine(runAt, r));
  if (isNew) lines.unshift(LOG_COLUMNS.join(","));

  fs.appendFileSync(logPath, lines.join("\n") + "\n", "utf-8");
  console.log(`Logged ${records.length} entries to ${logPath}`);
  return records.length;
}

/** Split one CSV line into fields, honouring double-quoted fields. */
export function parseCsvLine(line: string): string[] {
  const fields: string[] = [];
  let current = "";
  let quoted = false;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (quoted) {
      if (ch === '"' && line[i + 1] === '"') {
        current += '"';
        i++;
      } else if (ch === '"') {
        quoted = false;
      } else {
        current += ch;
      }
    } else if (ch === '"') {
      quoted = true;
    } else if (ch === ",") {
      fields.push(current);
      current = "";
    } else {
      current += ch;
    }
  }
  fields.push(current);
  return fields;
}

/** Split file content into CSV records; newlines inside quotes stay in the field. */
function splitRecords(content: string): string[] {
  const records: string[] = [];
  let current = "";
  let quoted = false;

  for (const ch of content) {
    if (ch === '"') quoted = !quoted;
    if (!quoted && (ch === "\n" || ch === "\r")) {
      if (current) records.push(current);
      current = "";
      continue;
    }
    current += ch;
  }
  if (current) records.push(current);
  return records;
}

/**
 * Read the observation log back. Returns null when the file does not exist.
 * Rows with the wrong column count or a non-numeric dwell are skipped.
 */
export function readObservations(logPath: string): ObservationLogRow[] | null {
  if (!fs.existsSync(logPath)) return null;

  const [header, ...lines] = splitRecords(fs.readFileSync(logPath, "utf-8"));
  if (!header) return [];

  const columns = parseCsvLine(header);
  const index = (name: (typeof LOG_COLUMNS)[number]) => columns.indexOf(name);
  const missing = LOG_COLUMNS.filter((c) => index(c) === -1);
  if (missing.length > 0) {
    console.warn(`Observation log ${logPath} is missing columns: ${missing.join(", ")}`);
    return [];
  }

  const rows: ObservationLogRow[] = [];
  for (const line of lines) {
    const fields = parseCsvLine(line);
    if (fields.length !== columns.length) continue;

    const rawMinutes = fields[index("minutes_on_ground")].trim();
    const minutes = Number(rawMinutes);
    if (rawMinutes === "" || !Number.isFinite(minutes)) continue;

    rows.push({
      log_timestamp_utc: fields[index("log_timestamp_utc")],
      callsign: fields[index("callsign")],
      airline: fields[index("airline")],
      origin_country: fields[index("origin_country")],
      last_contact_time_utc: fields[index("last_contact_time_utc")],
      minutes_on_ground: minutes,
    });
  }
  return rows;
}

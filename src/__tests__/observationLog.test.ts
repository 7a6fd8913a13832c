import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { appendObservations, escapeCsvField, parseCsvLine, readObservations } from "../observationLog.js";
import type { GroundRecord } from "../types.js";

const record = (callsign: string, minutesOnGround: number, originCountry = "Canada"): GroundRecord => ({
  callsign,
  icao24: "c07b1a",
  airline: "Unknown",
  originCountry,
  lastContact: new Date("2025-03-01T11:59:30.000Z"),
  minutesOnGround,
});

const HEADER = "log_timestamp_utc,callsign,airline,origin_country,last_contact_time_utc,minutes_on_ground";

describe("observation log", () => {
  let dir: string;
  let logPath: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "ground-log-"));
    logPath = path.join(dir, "logs", "ground_log.csv");
    vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it("writes the header once, then appends rows", () => {
    appendObservations(logPath, new Date("2025-03-01T12:00:00.000Z"), [record("ACA870", 0)]);
    appendObservations(logPath, new Date("2025-03-01T12:05:00.000Z"), [record("ACA870", 5), record("WJA22", 0)]);

    expect(fs.readFileSync(logPath, "utf-8").split("\n")).toEqual([
      HEADER,
      "2025-03-01T12:00:00.000Z,ACA870,Unknown,Canada,2025-03-01T11:59:30.000Z,0",
      "2025-03-01T12:05:00.000Z,ACA870,Unknown,Canada,2025-03-01T11:59:30.000Z,5",
      "2025-03-01T12:05:00.000Z,WJA22,Unknown,Canada,2025-03-01T11:59:30.000Z,0",
      "",
    ]);
  });

  it("leaves the last contact cell empty when it is unknown", () => {
    appendObservations(logPath, new Date("2025-03-01T12:00:00.000Z"), [{ ...record("ACA870", 7), lastContact: null }]);

    expect(fs.readFileSync(logPath, "utf-8").split("\n")[1]).toBe("2025-03-01T12:00:00.000Z,ACA870,Unknown,Canada,,7");
    expect(readObservations(logPath)?.[0]?.last_contact_time_utc).toBe("");
  });

  it("does not create the file for an empty batch", () => {
    expect(appendObservations(logPath, new Date(), [])).toBe(0);
    expect(fs.existsSync(logPath)).toBe(false);
  });

  it("reads back what it wrote, quoted fields included", () => {
    appendObservations(logPath, new Date("2025-03-01T12:00:00.000Z"), [
      record("ACA870", 42, 'Korea, Republic of "South"'),
    ]);

    expect(readObservations(logPath)).toEqual([
      {
        log_timestamp_utc: "2025-03-01T12:00:00.000Z",
        callsign: "ACA870",
        airline: "Unknown",
        origin_country: 'Korea, Republic of "South"',
        last_contact_time_utc: "2025-03-01T11:59:30.000Z",
        minutes_on_ground: 42,
      },
    ]);
  });

  it("returns null when the log does not exist", () => {
    expect(readObservations(logPath)).toBeNull();
  });

  it("skips malformed rows", () => {
    fs.mkdirSync(path.dirname(logPath), { recursive: true });
    fs.writeFileSync(
      logPath,
      [
        HEADER,
        "2025-03-01T12:00:00.000Z,ACA870,Unknown,Canada,2025-03-01T11:59:30.000Z,12",
        "2025-03-01T12:00:00.000Z,short,row",
        "2025-03-01T12:00:00.000Z,WJA22,Unknown,Canada,2025-03-01T11:59:30.000Z,lots",
        "2025-03-01T12:00:00.000Z,TSC101,Unknown,Canada,2025-03-01T11:59:30.000Z,",
        "",
      ].join("\n")
    );

    expect(readObservations(logPath)?.map((r) => r.callsign)).toEqual(["ACA870"]);
  });
});

describe("CSV helpers", () => {
  it("quotes only when needed", () => {
    expect(escapeCsvField("Canada")).toBe("Canada");
    expect(escapeCsvField("a,b")).toBe('"a,b"');
    expect(escapeCsvField('say "hi"')).toBe('"say ""hi"""');
  });

  it("splits quoted fields", () => {
    expect(parseCsvLine('x,"a,b","say ""hi""",')).toEqual(["x", "a,b", 'say "hi"', ""]);
  });
});

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { formatAlertMessage, sendSlackAlert } from "../alertChannel.js";
import type { GroundRecord } from "../types.js";

const airport = { iata: "YUL", name: "Montréal-Trudeau International Airport" };

const flagged: GroundRecord[] = [
  {
    callsign: "ACA870",
    icao24: "c07b1a",
    airline: "Unknown",
    originCountry: "Canada",
    lastContact: new Date("2025-03-01T11:59:30.000Z"),
    minutesOnGround: 65,
  },
];

describe("formatAlertMessage()", () => {
  it("summarizes the batch and lists each aircraft", () => {
    expect(formatAlertMessage(flagged, airport, 60)).toBe(
      [
        ":warning: *Alert: 1 flights at Montréal-Trudeau International Airport (YUL) have been on the ground for over 60 minutes!* :warning:",
        "",
        "Here are the details:",
        "\n*- Flight ACA870* (Unknown)\n  - Arrived from: Canada\n  - On ground for: *65 minutes*\n",
      ].join("\n")
    );
  });
});

describe("sendSlackAlert()", () => {
  const fetchMock = vi.fn();

  beforeEach(() => {
    vi.stubGlobal("fetch", fetchMock);
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    fetchMock.mockReset();
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it("sends nothing for an empty batch", async () => {
    expect(await sendSlackAlert("https://hooks.slack.test/T000/B000/test", [], airport, 60)).toBe(true);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("sends nothing without a webhook URL", async () => {
    expect(await sendSlackAlert(undefined, flagged, airport, 60)).toBe(false);
    expect(fetchMock).not.toHaveBeenCalled();
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it("posts the message as JSON", async () => {
    fetchMock.mockResolvedValue(new Response("ok", { status: 200 }));

    expect(await sendSlackAlert("https://hooks.slack.test/T000/B000/test", flagged, airport, 60)).toBe(true);

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("https://hooks.slack.test/T000/B000/test");
    expect(init.method).toBe("POST");
    expect(JSON.parse(init.body)).toEqual({ text: formatAlertMessage(flagged, airport, 60) });
  });

  it("logs and swallows a rejected delivery", async () => {
    fetchMock.mockResolvedValue(new Response("invalid_token", { status: 403 }));

    expect(await sendSlackAlert("https://hooks.slack.test/T000/B000/test", flagged, airport, 60)).toBe(false);
    expect(console.error).toHaveBeenCalledTimes(1);
  });

  it("logs and swallows a network failure", async () => {
    fetchMock.mockRejectedValue(new Error("ECONNRESET"));
    expect(await sendSlackAlert("https://hooks.slack.test/T000/B000/test", flagged, airport, 60)).toBe(false);
  });
});

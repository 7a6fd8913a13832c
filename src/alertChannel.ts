import type { Airport, GroundRecord } from "./types.js";

interface SlackPayload {
  text: string;
}

/**
 * Build the Slack message for a batch of newly flagged aircraft.
 */
export function formatAlertMessage(records: readonly GroundRecord[], airport: Airport, thresholdMinutes: number): string {
  const lines = [
    `:warning: *Alert: ${records.length} flights at ${airport.name} (${airport.iata}) have been on the ground for over ${thresholdMinutes} minutes!* :warning:`,
    "",
    "Here are the details:",
  ];

  for (const record of records) {
    lines.push(
      `\n*- Flight ${record.callsign}* (${record.airline})\n` +
        `  - Arrived from: ${record.originCountry}\n` +
        `  - On ground for: *${record.minutesOnGround} minutes*\n`
    );
  }

  return lines.join("\n");
}

/**
 * Post one summary message to a Slack incoming webhook.
 * Best effort: nothing is thrown. Returns true when Slack accepted it or when
 * there was nothing to send.
 */
export async function sendSlackAlert(
  webhookUrl: string | undefined,
  records: readonly GroundRecord[],
  airport: Airport,
  thresholdMinutes: number,
  timeoutMs = 5000
): Promise<boolean> {
  if (records.length === 0) {
    console.log("No flights flagged for alert. No Slack message sent.");
    return true;
  }

  if (!webhookUrl) {
    console.warn(`SLACK_WEBHOOK_URL is not set; ${records.length} alert(s) not delivered.`);
    return false;
  }

  const payload: SlackPayload = { text: formatAlertMessage(records, airport, thresholdMinutes) };

  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  try {
    console.log("Sending Slack alert...");
    const response = await fetch(webhookUrl, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        "User-Agent": "GroundTimeMonitor/1.0",
      },
      body: JSON.stringify(payload),
      signal: controller.signal,
    });

    if (!response.ok) {
      throw new Error(`Webhook failed: ${response.status} ${response.statusText}`);
    }

    console.log("Slack alert sent successfully.");
    return true;
  } catch (error) {
    console.error("Could not send Slack alert:", error);
    return false;
  } finally {
    clearTimeout(timeout);
  }
}

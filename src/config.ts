import dotenv from "dotenv";
import path from "path";
import type { Airport, BoundingBox } from "./types.js";

dotenv.config();

export const parseNumber = (value: string | undefined, fallback: number): number => {
  if (value === undefined || value.trim() === "") return fallback;
  const parsed = Number(value);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const airport: Airport = {
  iata: process.env.AIRPORT_IATA || "YUL",
  name: process.env.AIRPORT_NAME || "Montréal-Trudeau International Airport",
};

// Default box covers the YUL field and its approaches.
const area: BoundingBox = {
  minLat: parseNumber(process.env.MIN_LAT, 45.3),
  maxLat: parseNumber(process.env.MAX_LAT, 45.7),
  minLon: parseNumber(process.env.MIN_LON, -74.1),
  maxLon: parseNumber(process.env.MAX_LON, -73.5),
};

export const config = {
  airport,
  area,
  groundThresholdMinutes: Math.trunc(parseNumber(process.env.GROUND_THRESHOLD_MINUTES, 60)),
  openskyUrl: process.env.OPENSKY_URL || "https://opensky-network.org/api/states/all",
  openskyTimeoutMs: parseNumber(process.env.OPENSKY_TIMEOUT_MS, 15000),
  slackWebhookUrl: process.env.SLACK_WEBHOOK_URL || undefined,
  stateDbPath: process.env.STATE_DB_PATH || "data/tracking.db",
  logFilePath: process.env.LOG_FILE_PATH || "data/logs/ground_log.csv",
  reportImagePath: process.env.REPORT_IMAGE_PATH || "data/reports/ground_time_report.svg",
  reportTopN: Math.max(1, Math.trunc(parseNumber(process.env.REPORT_TOP_N, 10))),
  port: parseNumber(process.env.PORT, 3000),
  viewsDir: process.env.VIEWS_DIR || path.join(process.cwd(), "src", "web", "views"),
};

export type AppConfig = typeof config;

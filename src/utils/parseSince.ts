const UNIT_MS = new Map<string, number>([
  ["w", 7 * 24 * 3600_000],
  ["d", 24 * 3600_000],
  ["h", 3600_000],
  ["m", 60_000],
  ["s", 1000],
]);

const UNIT_ALIASES = new Map<string, string>([
  ["w", "w"], ["week", "w"], ["weeks", "w"],
  ["d", "d"], ["day", "d"], ["days", "d"],
  ["h", "h"], ["hr", "h"], ["hour", "h"], ["hours", "h"],
  ["m", "m"], ["min", "m"], ["mins", "m"], ["minute", "m"], ["minutes", "m"],
  ["s", "s"], ["sec", "s"], ["second", "s"], ["seconds", "s"],
]);

/**
 * Turn a look-back window such as "24h", "3 days" or "1w" into the instant
 * that far before `now`. Returns null for anything it can't read, including
 * windows too large to land on a valid date.
 */
export function parseSince(sinceStr: string, now: Date = new Date()): Date | null {
  const match = sinceStr.trim().match(/^(\d+)\s*([a-z_]+)$/i);
  if (!match) return null;

  const unit = UNIT_ALIASES.get(match[2].toLowerCase());
  const unitMs = unit === undefined ? undefined : UNIT_MS.get(unit);
  if (unitMs === undefined) return null;

  const value = parseInt(match[1], 10);
  const since = new Date(now.getTime() - value * unitMs);
  return Number.isFinite(since.getTime()) ? since : null;
}

export type SinceParam =
  | { ok: true; since: Date | null }
  | { ok: false; raw: string };

/**
 * Read a `since` query parameter. A missing or empty value means no window;
 * a value parseSince can't read is reported back so the route can answer 400.
 */
export function readSinceParam(raw: unknown, now: Date = new Date()): SinceParam {
  if (typeof raw !== "string" || !raw) return { ok: true, since: null };
  const since = parseSince(raw, now);
  return since ? { ok: true, since } : { ok: false, raw };
}

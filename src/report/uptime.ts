// ── Uptime Statement ────────────────────────────────────────────────────────

const MINUTE_MS = 60_000;

function plural(count: number, unit: string): string {
  return `${count} ${unit}${count === 1 ? "" : "s"}`;
}

/** "2 hours, 5 minutes"; zero components are left out. */
export function formatElapsed(elapsedMs: number): string {
  const totalMinutes = Math.floor(elapsedMs / MINUTE_MS);
  if (totalMinutes < 1) return "less than a minute";

  const days = Math.floor(totalMinutes / 1440);
  const hours = Math.floor((totalMinutes % 1440) / 60);
  const minutes = totalMinutes % 60;

  const parts: string[] = [];
  if (days > 0) parts.push(plural(days, "day"));
  if (hours > 0) parts.push(plural(hours, "hour"));
  if (minutes > 0) parts.push(plural(minutes, "minute"));
  return parts.join(", ");
}

/**
 * Human-readable time since the previous recorded start, e.g.
 * "Ran for 2 hours, 5 minutes since last start".
 */
export function formatUptime(previousStart: string | null, now: Date): string {
  if (previousStart === null) return "First recorded start";

  const previous = Date.parse(previousStart);
  if (Number.isNaN(previous)) return "First recorded start";

  return `Ran for ${formatElapsed(now.getTime() - previous)} since last start`;
}

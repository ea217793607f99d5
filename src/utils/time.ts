// -----------------------------------------------------------------------------
// Date helpers for directory names and progress notices.
// -----------------------------------------------------------------------------

// ─────────────────────────────────────────────────────────────────────────────
// Returns a date key string ("YYYY-MM-DD") in the server's local time zone.
// Save directories follow the wall clock of the machine the bot runs on (TZ).
// ─────────────────────────────────────────────────────────────────────────────
export function toLocalDayKey(date: Date): string {
  const y = date.getFullYear();
  const m = String(date.getMonth() + 1).padStart(2, "0");
  const d = String(date.getDate()).padStart(2, "0");
  return `${y}-${m}-${d}`;
}

/** Unix time in whole seconds. */
export function toUnixSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

/** Elapsed seconds between two instants with one decimal ("3.2"). */
export function formatElapsedSeconds(start: Date, end: Date): string {
  const ms = Math.max(0, end.getTime() - start.getTime());
  return (ms / 1000).toFixed(1);
}

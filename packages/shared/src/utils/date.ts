/** Calendar date (YYYY-MM-DD) of an instant, in UTC. */
export function toIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function todayIsoDate(now: Date = new Date()): string {
  return toIsoDate(now);
}

/** First and last calendar day of the month containing `date`. */
export function monthBounds(date: Date): { start: string; end: string } {
  const year = date.getUTCFullYear();
  const month = date.getUTCMonth();
  const start = new Date(Date.UTC(year, month, 1));
  const end = new Date(Date.UTC(year, month + 1, 0));
  return { start: toIsoDate(start), end: toIsoDate(end) };
}

const DAY_MS = 24 * 60 * 60 * 1000;

export const DEFAULT_LOOKBACK_DAYS = 365;

export interface IndexingWindow {
  since: Date;
  until: Date;
}

/**
 * Time range a connector run fetches. Starts at the checkpoint, or
 * `lookbackDays` before `now` for a connector that was never indexed. A
 * checkpoint on the current UTC day (or later) is pulled back to the start of
 * the previous UTC day so items from a partial same-day run are fetched again.
 */
export function computeIndexingWindow(
  lastIndexedAt: Date | null,
  now: Date,
  lookbackDays: number = DEFAULT_LOOKBACK_DAYS,
): IndexingWindow {
  if (!lastIndexedAt) {
    return { since: new Date(now.getTime() - lookbackDays * DAY_MS), until: now };
  }

  const todayStart = startOfUtcDay(now);
  if (lastIndexedAt.getTime() >= todayStart.getTime()) {
    return { since: new Date(todayStart.getTime() - DAY_MS), until: now };
  }

  return { since: lastIndexedAt, until: now };
}

export function startOfUtcDay(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

export function formatDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function describeWindow(window: IndexingWindow): string {
  return `${window.since.toISOString()} and ${window.until.toISOString()}`;
}

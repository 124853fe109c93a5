import type { StoreRow, Window } from '../types/index.js';
import { addDays, parseTimestamp, timestampToDate, todayIn } from '../utils/dates.js';

export interface PlanOptions {
    /** Days re-queried before the last ingestion, for records indexed late */
    overlapDays?: number;
    /** Zone in which "today" is computed */
    timeZone?: string;
    now?: Date;
}

/**
 * Most recent ingestion timestamp across the store, as stored.
 */
export function lastIngestedAt(rows: readonly StoreRow[]): string | null {
    let latest: string | null = null;
    let latestMs = -Infinity;

    for (const row of rows) {
        const ms = parseTimestamp(row.ingestedAt);
        if (ms !== null && ms > latestMs) {
            latestMs = ms;
            latest = row.ingestedAt;
        }
    }

    return latest;
}

/**
 * Compute the load-date window the next run should query.
 *
 * - empty store (no ingestion timestamp): [today - 1, today + 1)
 * - otherwise: [lastIngestedDate - overlapDays, today + 1)
 *
 * The start never passes today - 1, so the window is never empty even if a
 * stored timestamp lies in the future.
 */
export function planWindow(rows: readonly StoreRow[], options: PlanOptions = {}): Window {
    const { overlapDays = 2, timeZone = 'UTC', now = new Date() } = options;

    const today = todayIn(timeZone, now);
    const end = addDays(today, 1);
    const earliestStart = addDays(today, -1);

    const lastDate = timestampToDate(lastIngestedAt(rows), timeZone);
    if (!lastDate) {
        return { start: earliestStart, end };
    }

    const start = addDays(lastDate, -Math.max(0, overlapDays));
    return { start: start < earliestStart ? start : earliestStart, end };
}

import type { FetchReport, SearchSource, Slice, SliceOutcome, Window } from '../types/index.js';
import { buildSliceQuery } from '../sources/query.js';
import { addDays, eachDay, todayIn, yearOf } from '../utils/dates.js';
import { CapExceededError, TransportError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

export interface FetchOptions {
    /** First publication year tried when a bucket exceeds the cap */
    fallbackFromYear?: number;
    /** Zone in which the current year is read */
    timeZone?: string;
    now?: Date;
}

/**
 * Publication years queried when a daily bucket is too large: from
 * `fallbackFromYear` through the current year + 1 (in-press records carry
 * next year's cover date).
 */
export function fallbackYears(options: FetchOptions = {}): number[] {
    const { fallbackFromYear = 2000, timeZone = 'UTC', now = new Date() } = options;
    const toYear = (yearOf(todayIn(timeZone, now)) ?? now.getUTCFullYear()) + 1;

    const years: number[] = [];
    for (let year = fallbackFromYear; year <= toYear; year++) {
        years.push(year);
    }
    return years;
}

/**
 * Split a window into consecutive one-day buckets [d, d+1).
 */
export function dailyBuckets(window: Window): Window[] {
    return Array.from(eachDay(window.start, window.end), (day) => ({ start: day, end: addDays(day, 1) }));
}

/**
 * Fetch every record loaded in `window` that matches `terms`.
 *
 * Buckets are queried one after another in date order. A bucket over the
 * result cap is re-queried once per publication year; a year slice still
 * over the cap contributes the records the source returns (partial), and a
 * year slice failing for any other reason contributes none. Transport
 * failures abort the fetch, and so does any non-cap error on a bucket.
 *
 * Records are concatenated without deduplication.
 */
export async function fetchWindow(
    source: SearchSource,
    window: Window,
    terms: string,
    options: FetchOptions = {}
): Promise<FetchReport> {
    const logger = getLogger();
    const slices: SliceOutcome[] = [];
    const buckets = dailyBuckets(window);

    logger.info({ window, buckets: buckets.length }, 'Fetching window');

    for (const bucket of buckets) {
        const slice: Slice = { window: bucket, query: buildSliceQuery(terms, bucket) };

        try {
            const result = await source.search(slice.query, { onCapExceeded: 'throw' });
            slices.push({ status: 'ok', slice, records: result.records, total: result.total });
            logger.debug({ bucket: bucket.start, count: result.records.length }, 'Bucket fetched');
        } catch (error) {
            if (!(error instanceof CapExceededError)) {
                logger.error({ bucket: bucket.start, query: slice.query, err: error }, 'Bucket query failed');
                throw error;
            }

            logger.warn(
                { bucket: bucket.start, total: error.total, cap: error.cap },
                'Bucket exceeds result cap, splitting by publication year'
            );
            slices.push(...(await fetchByYear(source, bucket, terms, options)));
        }
    }

    const records = slices.flatMap((outcome) => (outcome.status === 'failed' ? [] : outcome.records));
    logger.info(
        {
            records: records.length,
            slices: slices.length,
            partial: slices.filter((s) => s.status === 'partial').length,
            failed: slices.filter((s) => s.status === 'failed').length,
        },
        'Window fetched'
    );

    return { records, slices };
}

/**
 * Query one bucket once per fallback year.
 */
async function fetchByYear(
    source: SearchSource,
    bucket: Window,
    terms: string,
    options: FetchOptions
): Promise<SliceOutcome[]> {
    const logger = getLogger();
    const outcomes: SliceOutcome[] = [];

    for (const year of fallbackYears(options)) {
        const slice: Slice = { window: bucket, year, query: buildSliceQuery(terms, bucket, year) };

        try {
            const result = await source.search(slice.query, { onCapExceeded: 'truncate' });
            if (result.truncated) {
                logger.warn(
                    { bucket: bucket.start, year, total: result.total, returned: result.records.length },
                    'Year slice still exceeds result cap, keeping partial results'
                );
                outcomes.push({ status: 'partial', slice, records: result.records, total: result.total });
            } else {
                outcomes.push({ status: 'ok', slice, records: result.records, total: result.total });
            }
        } catch (error) {
            if (error instanceof TransportError) throw error;

            if (error instanceof CapExceededError) {
                // Source could not truncate; the slice is over the cap with nothing returned
                logger.warn({ bucket: bucket.start, year, total: error.total }, 'Year slice exceeds result cap, no results kept');
                outcomes.push({ status: 'partial', slice, records: [], total: error.total });
                continue;
            }

            logger.warn({ bucket: bucket.start, year, query: slice.query, err: error }, 'Year slice failed, skipping');
            outcomes.push({
                status: 'failed',
                slice,
                error: error instanceof Error ? error : new Error(String(error)),
            });
        }
    }

    return outcomes;
}

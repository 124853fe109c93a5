/**
 * Calendar-date helpers. Dates are YYYY-MM-DD strings; arithmetic is done
 * in UTC so the result never depends on the machine's local zone.
 */

const DATE_ONLY = /^(\d{4})-(\d{2})-(\d{2})$/;
const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * The calendar date of `now` in the given IANA time zone.
 */
export function todayIn(timeZone: string, now: Date = new Date()): string {
    const parts = new Intl.DateTimeFormat('en-CA', {
        timeZone,
        year: 'numeric',
        month: '2-digit',
        day: '2-digit',
    }).formatToParts(now);

    const get = (type: Intl.DateTimeFormatPartTypes): string =>
        parts.find((p) => p.type === type)?.value ?? '';

    return `${get('year')}-${get('month')}-${get('day')}`;
}

export function isCalendarDate(value: string): boolean {
    return DATE_ONLY.test(value);
}

/**
 * Add (or subtract) whole days to a calendar date.
 */
export function addDays(date: string, days: number): string {
    const match = DATE_ONLY.exec(date);
    if (!match) {
        throw new RangeError(`Not a calendar date: ${date}`);
    }
    const ms = Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3])) + days * MS_PER_DAY;
    return new Date(ms).toISOString().slice(0, 10);
}

/**
 * Every date in [start, end), in order.
 */
export function* eachDay(start: string, end: string): Generator<string> {
    for (let day = start; day < end; day = addDays(day, 1)) {
        yield day;
    }
}

/**
 * "2024-01-05" → "20240105", the date token Scopus date predicates take.
 */
export function toCompactDate(date: string): string {
    return date.replace(/-/g, '');
}

/**
 * Milliseconds since epoch for a stored timestamp, or null if it does not parse.
 * Date-only values are read as UTC midnight.
 */
export function parseTimestamp(value: string | null | undefined): number | null {
    if (!value) return null;
    const ms = Date.parse(value.trim());
    return Number.isNaN(ms) ? null : ms;
}

/**
 * The calendar date of a stored timestamp in the given zone.
 * Date-only values are returned unchanged.
 */
export function timestampToDate(value: string | null | undefined, timeZone: string): string | null {
    if (!value) return null;
    const trimmed = value.trim();
    if (isCalendarDate(trimmed)) return trimmed;

    const ms = parseTimestamp(trimmed);
    return ms === null ? null : todayIn(timeZone, new Date(ms));
}

/**
 * Leading four-digit year of a (possibly partial) date string.
 */
export function yearOf(date: string | null | undefined): number | null {
    const match = date ? /^(\d{4})/.exec(date.trim()) : null;
    return match ? Number(match[1]) : null;
}

import type { Window } from '../types/index.js';
import { addDays, toCompactDate } from '../utils/dates.js';

/**
 * Scopus predicate on the date a record was first loaded into the index.
 * AFT and BEF are exclusive, so [start, end) becomes AFT start-1 AND BEF end.
 */
export function loadDatePredicate(window: Window): string {
    const after = toCompactDate(addDays(window.start, -1));
    const before = toCompactDate(window.end);
    return `ORIG-LOAD-DATE AFT ${after} AND ORIG-LOAD-DATE BEF ${before}`;
}

export function pubYearPredicate(year: number): string {
    return `PUBYEAR = ${year}`;
}

/**
 * `terms AND <load-date predicate> [AND PUBYEAR = year]`.
 * The topical terms are inserted as given.
 */
export function buildSliceQuery(terms: string, window: Window, year?: number): string {
    const parts = [terms.trim(), loadDatePredicate(window)];
    if (year !== undefined) {
        parts.push(pubYearPredicate(year));
    }
    return parts.join(' AND ');
}

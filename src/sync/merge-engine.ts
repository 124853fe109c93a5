import type { RecordSnapshot, StoreRow } from '../types/index.js';
import { doiKey, stripDoiPrefix } from '../sources/utils.js';
import { parseTimestamp, yearOf } from '../utils/dates.js';
import { IdentifierRegistry } from './identifier-registry.js';

export interface MergeResult {
    /** Whole store after the merge, re-sorted */
    rows: StoreRow[];
    /** Number of rows added */
    added: number;
    /** The added rows (same objects as in `rows`) */
    addedRows: StoreRow[];
    /** Number of stored rows whose duplicate-DOI flag changed */
    reflagged: number;
}

/**
 * Map a fetched record to a new store row.
 */
export function toStoreRow(record: RecordSnapshot, ingestedAt: string): StoreRow {
    return {
        eid: record.eid.trim(),
        doi: stripDoiPrefix(record.doi),
        title: record.title,
        authors: [...record.authors],
        venue: record.venue,
        documentType: record.documentType,
        citationCount: record.citationCount,
        coverDate: record.coverDate,
        year: yearOf(record.coverDate),
        abstract: record.abstract,
        keywords: [...record.keywords],
        included: true,
        screeningStatus: 'new',
        ingestedAt,
        duplicateDoi: false,
        annotations: null,
        extra: {},
    };
}

/**
 * Flag every row whose DOI appears on two or more rows, over the whole store.
 * Returns new row objects; rows whose flag does not change are returned as-is.
 */
export function flagDuplicateDois(rows: readonly StoreRow[]): StoreRow[] {
    const counts = new Map<string, number>();
    for (const row of rows) {
        const key = doiKey(row.doi);
        if (key) counts.set(key, (counts.get(key) ?? 0) + 1);
    }

    return rows.map((row) => {
        const key = doiKey(row.doi);
        const duplicate = key !== null && (counts.get(key) ?? 0) >= 2;
        return duplicate === row.duplicateDoi ? row : { ...row, duplicateDoi: duplicate };
    });
}

/**
 * Ingestion timestamp desc, then publication year desc; missing values last.
 * Array.prototype.sort is stable, so equal rows keep their relative order.
 */
export function compareRows(a: StoreRow, b: StoreRow): number {
    return compareDescNullsLast(parseTimestamp(a.ingestedAt), parseTimestamp(b.ingestedAt))
        || compareDescNullsLast(a.year, b.year);
}

function compareDescNullsLast(a: number | null, b: number | null): number {
    if (a === b) return 0;
    if (a === null) return 1;
    if (b === null) return -1;
    return b - a;
}

/**
 * Merge fetched records into the store.
 *
 * Records are taken in fetch order; any record the registry already knows
 * (by EID, or by DOI) is skipped, and each accepted record is registered at
 * once so a record returned by several slices is added only once.
 *
 * @param registry - defaults to one built from `rows`; pass the run's registry to share it
 */
export function mergeRecords(
    rows: readonly StoreRow[],
    records: readonly RecordSnapshot[],
    runTimestamp: string,
    registry: IdentifierRegistry = IdentifierRegistry.fromRows(rows)
): MergeResult {
    const addedRows: StoreRow[] = [];

    for (const record of records) {
        if (registry.contains(record)) continue;

        const row = toStoreRow(record, runTimestamp);
        addedRows.push(row);
        registry.recordSeen(record);
    }

    const flagged = flagDuplicateDois([...rows, ...addedRows]);
    const merged = [...flagged].sort(compareRows);

    const reflagged = rows.filter((row, i) => flagged[i] !== row).length;

    return { rows: merged, added: addedRows.length, addedRows: flagged.slice(rows.length), reflagged };
}

import type { RecordSnapshot } from './record.js';

/**
 * Half-open calendar date range [start, end), dates as YYYY-MM-DD.
 */
export interface Window {
    start: string;
    end: string;
}

/**
 * What a search does when the query matches more results than the source returns.
 * - 'throw': raise CapExceededError without reading further pages
 * - 'truncate': read up to the cap and flag the result as truncated
 */
export type CapPolicy = 'throw' | 'truncate';

export interface SearchOptions {
    onCapExceeded?: CapPolicy;
}

export interface SearchResult {
    records: RecordSnapshot[];
    /** Total number of matches reported by the source */
    total: number;
    truncated: boolean;
}

/**
 * Search capability consumed by the partitioned fetcher.
 * Implementations raise CapExceededError, QueryError or TransportError.
 */
export interface SearchSource {
    readonly name: string;
    search(query: string, options?: SearchOptions): Promise<SearchResult>;
}

/**
 * One sub-query issued by the fetcher: a daily bucket, optionally narrowed to a publication year.
 */
export interface Slice {
    window: Window;
    year?: number;
    query: string;
}

/**
 * Outcome of one slice. Empty and failed slices stay distinguishable.
 */
export type SliceOutcome =
    | { status: 'ok'; slice: Slice; records: RecordSnapshot[]; total: number }
    | { status: 'partial'; slice: Slice; records: RecordSnapshot[]; total: number }
    | { status: 'failed'; slice: Slice; error: Error };

export interface FetchReport {
    /** Accepted records across all slices, in bucket order */
    records: RecordSnapshot[];
    slices: SliceOutcome[];
}

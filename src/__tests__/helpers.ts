import { vi, type Mock } from 'vitest';
import type { RecordSnapshot, SearchOptions, SearchResult, SearchSource, StoreRow } from '../types/index.js';

export function makeRow(overrides: Partial<StoreRow> = {}): StoreRow {
    return {
        eid: null,
        doi: null,
        title: 'Untitled',
        authors: [],
        venue: null,
        documentType: null,
        citationCount: null,
        coverDate: null,
        year: null,
        abstract: null,
        keywords: [],
        included: true,
        screeningStatus: null,
        ingestedAt: null,
        duplicateDoi: false,
        annotations: null,
        extra: {},
        ...overrides,
    };
}

export function makeRecord(eid: string, overrides: Partial<RecordSnapshot> = {}): RecordSnapshot {
    return {
        eid,
        doi: null,
        title: `Record ${eid}`,
        authors: ['Doe J.'],
        venue: 'Journal of Test Data',
        documentType: 'Article',
        citationCount: 0,
        coverDate: '2023-12-01',
        abstract: null,
        keywords: [],
        ...overrides,
    };
}

export function result(records: RecordSnapshot[], total = records.length, truncated = false): SearchResult {
    return { records, total, truncated };
}

type SearchFn = (query: string, options?: SearchOptions) => Promise<SearchResult>;

export interface FakeSearch extends SearchSource {
    queries: string[];
    search: Mock<SearchFn>;
}

/**
 * In-process search source driven by a handler; records every query it receives.
 */
export function fakeSearch(
    handler: (query: string, options: SearchOptions) => SearchResult | Promise<SearchResult>
): FakeSearch {
    const queries: string[] = [];
    const search = vi.fn<SearchFn>(async (query, options = {}) => {
        queries.push(query);
        return handler(query, options);
    });
    return { name: 'fake', queries, search };
}

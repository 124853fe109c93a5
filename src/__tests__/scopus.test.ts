import { describe, it, expect, vi, afterEach } from 'vitest';
import { ScopusSearchClient, normalizeEntry, parseScopusPage, scopusErrorMessage } from '../sources/scopus.js';
import { createHttpClient } from '../utils/http-client.js';
import { CapExceededError, QueryError, TransportError } from '../utils/errors.js';

function entry(n: number): Record<string, unknown> {
    return { 'eid': `2-s2.0-${n}`, 'dc:title': `Paper ${n}` };
}

function page(total: number, entries: Array<Record<string, unknown>>): unknown {
    return { 'search-results': { 'opensearch:totalResults': String(total), 'entry': entries } };
}

function jsonResponse(body: unknown, status = 200, statusText = 'OK') {
    return {
        ok: status >= 200 && status < 300,
        status,
        statusText,
        headers: new Headers({ 'content-type': 'application/json' }),
        json: async () => body,
        text: async () => JSON.stringify(body),
    };
}

function makeClient(options: { keys?: string[]; pageSize?: number; maxResults?: number } = {}) {
    return new ScopusSearchClient({
        credentials: { apiKeys: options.keys ?? ['test-key'], instTokens: [] },
        config: { pageSize: options.pageSize ?? 25, maxResults: options.maxResults ?? 5000 },
        httpClient: createHttpClient({
            maxRetries: 0,
            rateLimits: { scopus: { tokensPerSecond: 1000, maxBurst: 1000 } },
        }),
    });
}

function requestedUrl(mock: ReturnType<typeof vi.fn>, call: number): URL {
    return new URL(String(mock.mock.calls[call]?.[0]));
}

function requestedHeaders(mock: ReturnType<typeof vi.fn>, call: number): Record<string, string> {
    const init: unknown = mock.mock.calls[call]?.[1];
    if (typeof init === 'object' && init !== null && 'headers' in init && typeof init.headers === 'object' && init.headers !== null) {
        return Object.fromEntries(Object.entries(init.headers));
    }
    return {};
}

describe('Scopus payload parsing', () => {
    it('should normalize a complete entry', () => {
        const record = normalizeEntry(parseScopusPage(page(1, [{
            'eid': '2-s2.0-85000000001',
            'dc:identifier': 'SCOPUS_ID:85000000001',
            'prism:doi': '10.1000/paw.2024.1',
            'dc:title': 'Nitrate formation in plasma-activated water',
            'dc:creator': 'Doe J.',
            'author': [{ authname: 'Doe J.' }, { authname: 'Roe R.' }],
            'prism:publicationName': 'Journal of Test Data',
            'subtypeDescription': 'Article',
            'citedby-count': '4',
            'prism:coverDate': '2024-01-15',
            'dc:description': 'An abstract.',
            'authkeywords': 'plasma | water |  nitrate ',
        }])).entries[0] ?? {});

        expect(record).toEqual({
            eid: '2-s2.0-85000000001',
            doi: '10.1000/paw.2024.1',
            title: 'Nitrate formation in plasma-activated water',
            authors: ['Doe J.', 'Roe R.'],
            venue: 'Journal of Test Data',
            documentType: 'Article',
            citationCount: 4,
            coverDate: '2024-01-15',
            abstract: 'An abstract.',
            keywords: ['plasma', 'water', 'nitrate'],
        });
    });

    it('should fall back to dc:creator when the author list is absent', () => {
        const record = normalizeEntry({ 'eid': '2-s2.0-1', 'dc:creator': 'Doe J.' });
        expect(record?.authors).toEqual(['Doe J.']);
        expect(record?.title).toBe('Untitled');
        expect(record?.citationCount).toBe(0);
        expect(record?.keywords).toEqual([]);
    });

    it('should drop the empty-result sentinel and entries without an EID', () => {
        const parsed = parseScopusPage(page(0, [{ '@_fa': 'true', 'error': 'Result set was empty' }]));
        expect(parsed.total).toBe(0);
        expect(parsed.entries.map(normalizeEntry)).toEqual([null]);
    });

    it('should accept a single entry given as an object', () => {
        const parsed = parseScopusPage({ 'search-results': { 'opensearch:totalResults': '1', 'entry': entry(7) } });
        expect(parsed.entries).toHaveLength(1);
    });

    it('should read service error messages', () => {
        expect(scopusErrorMessage({ 'service-error': { status: { statusCode: 'INVALID_INPUT', statusText: 'Error translating query' } } }))
            .toBe('Error translating query');
        expect(scopusErrorMessage({ 'error-response': { 'error-message': 'APIKey is invalid' } })).toBe('APIKey is invalid');
        expect(scopusErrorMessage(42)).toBeUndefined();
    });
});

describe('ScopusSearchClient', () => {
    afterEach(() => {
        vi.unstubAllGlobals();
    });

    it('should send the query with key and paging parameters', async () => {
        const mockFetch = vi.fn().mockResolvedValue(jsonResponse(page(1, [entry(1)])));
        vi.stubGlobal('fetch', mockFetch);

        const result = await makeClient().search('TITLE-ABS-KEY(plasma)');

        expect(result).toEqual({
            records: [expect.objectContaining({ eid: '2-s2.0-1', title: 'Paper 1' })],
            total: 1,
            truncated: false,
        });
        const url = requestedUrl(mockFetch, 0);
        expect(url.origin + url.pathname).toBe('https://api.elsevier.com/content/search/scopus');
        expect(url.searchParams.get('query')).toBe('TITLE-ABS-KEY(plasma)');
        expect(url.searchParams.get('start')).toBe('0');
        expect(url.searchParams.get('count')).toBe('25');
        expect(url.searchParams.get('view')).toBe('COMPLETE');
        expect(requestedHeaders(mockFetch, 0)['X-ELS-APIKey']).toBe('test-key');
    });

    it('should map abstracts, keywords and authors under the default view', async () => {
        vi.stubGlobal('fetch', vi.fn().mockResolvedValue(jsonResponse(page(1, [{
            'eid': '2-s2.0-42',
            'dc:title': 'Reactive species in treated water',
            'dc:creator': 'Doe J.',
            'author': [{ authname: 'Doe J.' }, { authname: 'Roe R.' }],
            'dc:description': 'Hydrogen peroxide and nitrite were measured.',
            'authkeywords': 'plasma | nitrite',
        }]))));

        const [record] = (await makeClient().search('q')).records;

        expect(record).toMatchObject({
            abstract: 'Hydrogen peroxide and nitrite were measured.',
            authors: ['Doe J.', 'Roe R.'],
            keywords: ['plasma', 'nitrite'],
        });
    });

    it('should page until every result is read', async () => {
        const mockFetch = vi.fn()
            .mockResolvedValueOnce(jsonResponse(page(3, [entry(1), entry(2)])))
            .mockResolvedValueOnce(jsonResponse(page(3, [entry(3)])));
        vi.stubGlobal('fetch', mockFetch);

        const result = await makeClient({ pageSize: 2 }).search('q');

        expect(result.records.map((r) => r.eid)).toEqual(['2-s2.0-1', '2-s2.0-2', '2-s2.0-3']);
        expect(mockFetch).toHaveBeenCalledTimes(2);
        expect(requestedUrl(mockFetch, 1).searchParams.get('start')).toBe('2');
        expect(requestedUrl(mockFetch, 1).searchParams.get('count')).toBe('1');
    });

    it('should raise CapExceededError after the first page when over the cap', async () => {
        const mockFetch = vi.fn().mockResolvedValue(jsonResponse(page(10, [entry(1), entry(2)])));
        vi.stubGlobal('fetch', mockFetch);

        const error = await makeClient({ pageSize: 2, maxResults: 5 }).search('q').catch((e: unknown) => e);

        expect(error).toBeInstanceOf(CapExceededError);
        expect(error).toMatchObject({ total: 10, cap: 5, query: 'q' });
        expect(mockFetch).toHaveBeenCalledTimes(1);
    });

    it('should read up to the cap in truncating mode', async () => {
        const mockFetch = vi.fn()
            .mockResolvedValueOnce(jsonResponse(page(10, [entry(1), entry(2)])))
            .mockResolvedValueOnce(jsonResponse(page(10, [entry(3)])));
        vi.stubGlobal('fetch', mockFetch);

        const result = await makeClient({ pageSize: 2, maxResults: 3 }).search('q', { onCapExceeded: 'truncate' });

        expect(result.records).toHaveLength(3);
        expect(result.total).toBe(10);
        expect(result.truncated).toBe(true);
        expect(requestedUrl(mockFetch, 1).searchParams.get('count')).toBe('1');
    });

    it('should raise QueryError when the query is rejected', async () => {
        const body = { 'service-error': { status: { statusCode: 'INVALID_INPUT', statusText: 'Error translating query' } } };
        vi.stubGlobal('fetch', vi.fn().mockResolvedValue(jsonResponse(body, 400, 'Bad Request')));

        const error = await makeClient().search('TITLE-ABS-KEY(').catch((e: unknown) => e);

        expect(error).toBeInstanceOf(QueryError);
        expect(error).toMatchObject({ message: 'Scopus rejected the query: Error translating query', status: 400 });
    });

    it('should raise TransportError on server failures', async () => {
        vi.stubGlobal('fetch', vi.fn().mockResolvedValue(jsonResponse({}, 503, 'Service Unavailable')));
        await expect(makeClient().search('q')).rejects.toBeInstanceOf(TransportError);
    });

    it('should switch to the next key when quota is exhausted', async () => {
        const quota = { 'error-response': { 'error-message': 'QUOTA_EXCEEDED' } };
        const mockFetch = vi.fn()
            .mockResolvedValueOnce(jsonResponse(quota, 429, 'Too Many Requests'))
            .mockResolvedValueOnce(jsonResponse(page(1, [entry(1)])));
        vi.stubGlobal('fetch', mockFetch);

        const result = await makeClient({ keys: ['key-a', 'key-b'] }).search('q');

        expect(result.records).toHaveLength(1);
        expect(requestedHeaders(mockFetch, 0)['X-ELS-APIKey']).toBe('key-a');
        expect(requestedHeaders(mockFetch, 1)['X-ELS-APIKey']).toBe('key-b');
    });

    it('should raise TransportError when the last key is exhausted', async () => {
        vi.stubGlobal('fetch', vi.fn().mockResolvedValue(jsonResponse({}, 429, 'Too Many Requests')));
        await expect(makeClient({ keys: ['key-a'] }).search('q')).rejects.toBeInstanceOf(TransportError);
    });
});

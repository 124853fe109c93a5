import type { RecordSnapshot, ScopusConfig, SearchOptions, SearchResult, SearchSource } from '../types/index.js';
import { DEFAULT_CONFIG } from '../types/index.js';
import { getHttpClient, HttpError, type HttpClient } from '../utils/http-client.js';
import { CapExceededError, QueryError, TransportError } from '../utils/errors.js';
import type { ScopusCredentials } from '../utils/credentials.js';
import { getLogger } from '../utils/logger.js';
import { splitList, stripDoiPrefix } from './utils.js';

/**
 * Scopus Search API payloads (subset of relevant fields).
 * Numbers arrive as strings.
 */
interface ScopusEntry {
    'eid'?: string;
    'dc:identifier'?: string;
    'prism:doi'?: string;
    'dc:title'?: string;
    'dc:creator'?: string;
    'author'?: Array<{ authname?: string }>;
    'prism:publicationName'?: string;
    'subtypeDescription'?: string;
    'citedby-count'?: string;
    'prism:coverDate'?: string;
    'dc:description'?: string;
    'authkeywords'?: string;
    'error'?: string;
}

interface ScopusPage {
    total: number;
    entries: ScopusEntry[];
}

export interface ScopusClientOptions {
    credentials: ScopusCredentials;
    config?: Partial<ScopusConfig>;
    httpClient?: HttpClient;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function str(value: unknown): string | undefined {
    return typeof value === 'string' && value.trim().length > 0 ? value.trim() : undefined;
}

/**
 * Validate one raw entry, keeping only string-typed fields.
 */
function toEntry(raw: Record<string, unknown>): ScopusEntry {
    const authors = Array.isArray(raw['author'])
        ? raw['author'].filter(isRecord).map((a) => ({ authname: str(a['authname']) }))
        : undefined;

    return {
        'eid': str(raw['eid']),
        'dc:identifier': str(raw['dc:identifier']),
        'prism:doi': str(raw['prism:doi']),
        'dc:title': str(raw['dc:title']),
        'dc:creator': str(raw['dc:creator']),
        'author': authors,
        'prism:publicationName': str(raw['prism:publicationName']),
        'subtypeDescription': str(raw['subtypeDescription']),
        'citedby-count': str(raw['citedby-count']),
        'prism:coverDate': str(raw['prism:coverDate']),
        'dc:description': str(raw['dc:description']),
        'authkeywords': str(raw['authkeywords']),
        'error': str(raw['error']),
    };
}

/**
 * Parse a `search-results` payload. A single entry may arrive as an object.
 */
export function parseScopusPage(payload: unknown): ScopusPage {
    const root = isRecord(payload) ? payload : {};
    const results = isRecord(root['search-results']) ? root['search-results'] : {};
    const rawEntries = results['entry'];
    const list = Array.isArray(rawEntries) ? rawEntries : isRecord(rawEntries) ? [rawEntries] : [];
    const total = Number(results['opensearch:totalResults'] ?? 0);

    return {
        total: Number.isFinite(total) ? total : 0,
        entries: list.filter(isRecord).map(toEntry),
    };
}

/**
 * Human-readable message from a Scopus error body.
 */
export function scopusErrorMessage(body: unknown): string | undefined {
    if (!isRecord(body)) return str(body);

    const serviceError = body['service-error'];
    if (isRecord(serviceError) && isRecord(serviceError['status'])) {
        const status = serviceError['status'];
        return str(status['statusText']) ?? str(status['statusCode']);
    }

    const errorResponse = body['error-response'];
    if (isRecord(errorResponse)) {
        return str(errorResponse['error-message']);
    }

    return undefined;
}

/**
 * Normalize a Scopus entry into a RecordSnapshot.
 * Returns null for entries without an EID (including the empty-result sentinel).
 */
export function normalizeEntry(entry: ScopusEntry): RecordSnapshot | null {
    const eid = entry['eid'];
    if (!eid || entry['error']) return null;

    const authorNames = entry['author']
        ?.map((a) => a.authname)
        .filter((name): name is string => !!name) ?? [];
    const creator = entry['dc:creator'];
    const citations = Number(entry['citedby-count'] ?? 0);

    return {
        eid,
        doi: stripDoiPrefix(entry['prism:doi']),
        title: entry['dc:title'] ?? 'Untitled',
        authors: authorNames.length > 0 ? authorNames : creator ? [creator] : [],
        venue: entry['prism:publicationName'] ?? null,
        documentType: entry['subtypeDescription'] ?? null,
        citationCount: Number.isFinite(citations) ? citations : 0,
        coverDate: entry['prism:coverDate'] ?? null,
        abstract: entry['dc:description'] ?? null,
        keywords: splitList(entry['authkeywords'], '|'),
    };
}

/**
 * Scopus Search API client.
 *
 * Pages through results with start/count offsets. The API serves at most
 * `maxResults` records per query; larger queries raise CapExceededError
 * unless the caller asks for truncation.
 *
 * Several API keys may be configured: when one runs out of quota (HTTP 429
 * after the HTTP client's retries) the next one is used for the rest of the run.
 *
 * @see https://dev.elsevier.com/documentation/ScopusSearchAPI.wadl
 */
export class ScopusSearchClient implements SearchSource {
    readonly name = 'Scopus';
    private readonly config: ScopusConfig;
    private readonly credentials: ScopusCredentials;
    private readonly httpClient: HttpClient;
    private keyIndex = 0;

    constructor(options: ScopusClientOptions) {
        this.credentials = options.credentials;
        this.config = { ...DEFAULT_CONFIG.scopus, ...options.config };
        this.httpClient = options.httpClient ?? getHttpClient();
    }

    async search(query: string, options: SearchOptions = {}): Promise<SearchResult> {
        const { onCapExceeded = 'throw' } = options;
        const logger = getLogger();

        const first = await this.fetchPage(query, 0, this.config.pageSize);
        const total = first.total;
        const truncated = total > this.config.maxResults;

        if (truncated && onCapExceeded === 'throw') {
            throw new CapExceededError(query, total, this.config.maxResults);
        }

        const limit = Math.min(total, this.config.maxResults);
        const entries = [...first.entries];

        while (entries.length < limit) {
            const page = await this.fetchPage(query, entries.length, Math.min(this.config.pageSize, limit - entries.length));
            if (page.entries.length === 0) break;
            entries.push(...page.entries);
        }

        const records = entries
            .slice(0, Math.max(limit, 0))
            .map(normalizeEntry)
            .filter((record): record is RecordSnapshot => record !== null);

        logger.debug({ query, total, returned: records.length, truncated }, 'Scopus search complete');
        return { records, total, truncated };
    }

    /**
     * Fetch one page, rotating API keys on quota exhaustion.
     */
    private async fetchPage(query: string, start: number, count: number): Promise<ScopusPage> {
        const logger = getLogger();
        const params = new URLSearchParams({
            query,
            start: String(start),
            count: String(count),
            view: this.config.view,
        });
        const url = `${this.config.baseUrl}?${params.toString()}`;

        for (;;) {
            try {
                const response = await this.httpClient.get(url, { source: 'scopus', headers: this.buildHeaders() });
                return parseScopusPage(response.data);
            } catch (error) {
                if (!(error instanceof HttpError)) throw error;

                const detail = scopusErrorMessage(error.response) ?? error.message;

                if (error.status === 429 && this.keyIndex < this.credentials.apiKeys.length - 1) {
                    this.keyIndex++;
                    logger.warn({ keyIndex: this.keyIndex, detail }, 'Scopus API key quota exhausted, switching key');
                    continue;
                }

                if (error.status === 400) {
                    throw new QueryError(`Scopus rejected the query: ${detail}`, query, error.status);
                }

                throw new TransportError(`Scopus request failed: ${detail}`, query, error.status, { cause: error });
            }
        }
    }

    private buildHeaders(): Record<string, string> {
        const headers: Record<string, string> = {
            'Accept': 'application/json',
            'X-ELS-APIKey': this.credentials.apiKeys[this.keyIndex] ?? '',
        };

        const instToken = this.credentials.instTokens[this.keyIndex] ?? this.credentials.instTokens[0];
        if (instToken) {
            headers['X-ELS-Insttoken'] = instToken;
        }

        return headers;
    }
}

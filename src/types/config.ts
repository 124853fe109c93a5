/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'silent';

/**
 * Scopus view. COMPLETE includes abstracts, author keywords and full author
 * lists but needs a subscriber key and allows at most 25 results per page.
 * STANDARD carries only the first author and no abstract.
 */
export type ScopusView = 'STANDARD' | 'COMPLETE';

/**
 * Scopus Search API configuration.
 */
export interface ScopusConfig {
    baseUrl: string;
    view: ScopusView;
    pageSize: number;
    /** Hard result ceiling per query enforced by the API */
    maxResults: number;
}

/**
 * LLM classifier configuration.
 */
export interface ClassifierConfig {
    enabled: boolean;
    provider: 'openai' | 'ollama';
    model: string;
    baseUrl?: string;
}

/**
 * Full configuration merged from CLI flags, env vars, and config file.
 */
export interface LitSyncConfig {
    /** Path to the SQLite record store */
    store: string;

    /** Fixed topical query, in Scopus advanced search syntax */
    query: string;

    // Window planning
    overlapDays: number;
    /** IANA time zone used to compute "today" */
    timeZone: string;

    /** First publication year tried when a daily bucket exceeds the result cap */
    fallbackFromYear: number;

    dryRun: boolean;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;

    scopus: ScopusConfig;
    classifier: ClassifierConfig;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: LitSyncConfig = {
    store: './litsync.db',
    query: 'TITLE-ABS-KEY("plasma-activated water" OR "plasma-activated liquids")',
    overlapDays: 2,
    timeZone: 'UTC',
    fallbackFromYear: 2000,
    dryRun: false,
    logLevel: 'info',
    jsonLogs: false,
    scopus: {
        baseUrl: 'https://api.elsevier.com/content/search/scopus',
        view: 'COMPLETE',
        pageSize: 25,
        maxResults: 5000,
    },
    classifier: {
        enabled: false,
        provider: 'openai',
        model: 'gpt-4.1-mini',
    },
};

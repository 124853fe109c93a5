import { cosmiconfig } from 'cosmiconfig';
import { DEFAULT_CONFIG, type LitSyncConfig } from '../types/index.js';
import { getLogger } from './logger.js';

/**
 * Config overrides as accepted from the config file and CLI flags.
 * Nested sections may be given in part.
 */
export type ConfigOverrides = Partial<Omit<LitSyncConfig, 'scopus' | 'classifier'>> & {
    scopus?: Partial<LitSyncConfig['scopus']>;
    classifier?: Partial<LitSyncConfig['classifier']>;
};

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function str(value: unknown): string | undefined {
    return typeof value === 'string' ? value : undefined;
}

function num(value: unknown): number | undefined {
    return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function bool(value: unknown): boolean | undefined {
    return typeof value === 'boolean' ? value : undefined;
}

/**
 * Pick the known settings out of a parsed config file, ignoring anything mistyped.
 */
export function parseConfigFile(raw: Record<string, unknown>): ConfigOverrides {
    const logLevel = str(raw['logLevel']);
    const scopus = isRecord(raw['scopus']) ? raw['scopus'] : {};
    const classifier = isRecord(raw['classifier']) ? raw['classifier'] : {};
    const view = str(scopus['view']);
    const provider = str(classifier['provider']);

    return {
        store: str(raw['store']),
        query: str(raw['query']),
        overlapDays: num(raw['overlapDays']),
        timeZone: str(raw['timeZone']),
        fallbackFromYear: num(raw['fallbackFromYear']),
        dryRun: bool(raw['dryRun']),
        logLevel: logLevel === 'error' || logLevel === 'warn' || logLevel === 'info' || logLevel === 'debug' || logLevel === 'silent'
            ? logLevel
            : undefined,
        jsonLogs: bool(raw['jsonLogs']),
        scopus: {
            baseUrl: str(scopus['baseUrl']),
            view: view === 'STANDARD' || view === 'COMPLETE' ? view : undefined,
            pageSize: num(scopus['pageSize']),
            maxResults: num(scopus['maxResults']),
        },
        classifier: {
            enabled: bool(classifier['enabled']),
            provider: provider === 'openai' || provider === 'ollama' ? provider : undefined,
            model: str(classifier['model']),
            baseUrl: str(classifier['baseUrl']),
        },
    };
}

/**
 * Load configuration from litsync.config.json using cosmiconfig.
 * Returns null if no config file is found (which is fine — defaults are used).
 */
async function loadConfigFile(searchFrom?: string): Promise<ConfigOverrides | null> {
    const explorer = cosmiconfig('litsync', {
        searchPlaces: ['litsync.config.json'],
    });

    try {
        const result = await explorer.search(searchFrom);
        if (result && !result.isEmpty && isRecord(result.config)) {
            getLogger().debug({ path: result.filepath }, 'Loaded config file');
            return parseConfigFile(result.config);
        }
    } catch (error) {
        getLogger().warn({ err: error }, 'Failed to load config file, using defaults');
    }

    return null;
}

/**
 * Read relevant environment variables.
 * Credentials are read separately (see credentials.ts) and never stored in config.
 */
export function loadEnvVars(env: NodeJS.ProcessEnv = process.env): ConfigOverrides {
    const config: ConfigOverrides = {};

    if (env['LITSYNC_STORE']) {
        config.store = env['LITSYNC_STORE'];
    }
    if (env['LITSYNC_TIME_ZONE']) {
        config.timeZone = env['LITSYNC_TIME_ZONE'];
    }

    return config;
}

/**
 * Drop keys whose value is undefined so they do not shadow lower-precedence sources.
 */
function defined<T extends object>(value: T | null | undefined): Partial<T> {
    const out: Partial<T> = {};
    if (!value) return out;
    for (const key in value) {
        if (value[key] !== undefined) out[key] = value[key];
    }
    return out;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 */
export async function resolveConfig(
    cliFlags: ConfigOverrides,
    options: { env?: NodeJS.ProcessEnv; searchFrom?: string } = {}
): Promise<LitSyncConfig> {
    const fileConfig = await loadConfigFile(options.searchFrom);
    const envConfig = loadEnvVars(options.env);

    const { scopus: fileScopus, classifier: fileClassifier, ...fileTop } = fileConfig ?? {};
    const { scopus: cliScopus, classifier: cliClassifier, ...cliTop } = cliFlags;

    return {
        ...DEFAULT_CONFIG,
        ...defined(fileTop),
        ...defined(envConfig),
        ...defined(cliTop),
        // Deep merge nested objects
        scopus: {
            ...DEFAULT_CONFIG.scopus,
            ...defined(fileScopus),
            ...defined(cliScopus),
        },
        classifier: {
            ...DEFAULT_CONFIG.classifier,
            ...defined(fileClassifier),
            ...defined(cliClassifier),
        },
    };
}

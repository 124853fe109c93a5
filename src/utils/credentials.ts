import { MissingCredentialError } from './errors.js';

export interface ScopusCredentials {
    /** API keys in rotation order */
    apiKeys: string[];
    /** Institutional tokens, paired with keys by position */
    instTokens: string[];
}

function splitList(raw: string | undefined): string[] {
    return (raw ?? '')
        .split(',')
        .map((part) => part.trim())
        .filter((part) => part.length > 0);
}

/**
 * Read Scopus credentials from the environment.
 * SCOPUS_API_KEY may hold several comma-separated keys; SCOPUS_INST_TOKEN is optional.
 */
export function readScopusCredentials(env: NodeJS.ProcessEnv = process.env): ScopusCredentials {
    const apiKeys = splitList(env['SCOPUS_API_KEY']);
    if (apiKeys.length === 0) {
        throw new MissingCredentialError('SCOPUS_API_KEY', 'Elsevier API key for the Scopus Search API');
    }

    return { apiKeys, instTokens: splitList(env['SCOPUS_INST_TOKEN']) };
}

/**
 * API key for the classifier's LLM provider. Local providers need none.
 */
export function readLlmApiKey(provider: 'openai' | 'ollama', env: NodeJS.ProcessEnv = process.env): string | undefined {
    if (provider === 'ollama') return undefined;

    const key = env['OPENAI_API_KEY']?.trim();
    if (!key) {
        throw new MissingCredentialError('OPENAI_API_KEY', 'required when the classifier is enabled with the openai provider');
    }
    return key;
}

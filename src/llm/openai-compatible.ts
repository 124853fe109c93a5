import type { LlmCompletionParams, LlmCompletionResult, LlmProvider, LlmProviderOptions } from '../types/index.js';
import { getHttpClient, type HttpClient } from '../utils/http-client.js';

const DEFAULT_BASE_URLS: Record<'openai' | 'ollama', string> = {
    openai: 'https://api.openai.com/v1',
    ollama: 'http://localhost:11434/v1',
};

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function count(value: unknown): number {
    return typeof value === 'number' ? value : 0;
}

/**
 * Provider for OpenAI-style `/chat/completions` endpoints.
 * Ollama exposes the same API under /v1, so one adapter serves both.
 */
export class OpenAiCompatibleProvider implements LlmProvider {
    readonly name: 'openai' | 'ollama';
    private readonly baseUrl: string;
    private readonly apiKey?: string;
    private readonly model: string;
    private readonly httpClient: HttpClient;

    constructor(name: 'openai' | 'ollama', options: LlmProviderOptions, httpClient: HttpClient = getHttpClient()) {
        this.name = name;
        this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URLS[name]).replace(/\/$/, '');
        this.apiKey = options.apiKey;
        this.model = options.model;
        this.httpClient = httpClient;
    }

    async complete(prompt: string, params: LlmCompletionParams = {}): Promise<LlmCompletionResult> {
        const messages: Array<{ role: 'system' | 'user'; content: string }> = [];
        if (params.systemPrompt) {
            messages.push({ role: 'system', content: params.systemPrompt });
        }
        messages.push({ role: 'user', content: prompt });

        const model = params.model ?? this.model;
        const body: Record<string, unknown> = {
            model,
            messages,
            temperature: params.temperature ?? 0,
        };
        if (params.maxTokens !== undefined) {
            body['max_tokens'] = params.maxTokens;
        }
        if (params.jsonMode) {
            body['response_format'] = { type: 'json_object' };
        }

        const headers: Record<string, string> = {};
        if (this.apiKey) {
            headers['Authorization'] = `Bearer ${this.apiKey}`;
        }

        const response = await this.httpClient.post(`${this.baseUrl}/chat/completions`, body, {
            source: this.name,
            headers,
        });

        const data = isRecord(response.data) ? response.data : {};
        const choices = Array.isArray(data['choices']) ? data['choices'] : [];
        const first: unknown = choices[0];
        const message = isRecord(first) && isRecord(first['message']) ? first['message'] : {};
        const usage = isRecord(data['usage']) ? data['usage'] : {};

        return {
            text: typeof message['content'] === 'string' ? message['content'] : '',
            usage: {
                promptTokens: count(usage['prompt_tokens']),
                completionTokens: count(usage['completion_tokens']),
                totalTokens: count(usage['total_tokens']),
            },
            model: typeof data['model'] === 'string' ? data['model'] : model,
            provider: this.name,
        };
    }
}

import type { Annotations, Classifier, LlmProvider, StoreRow } from '../types/index.js';
import { ClassificationError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

/** Free-text fields requested from the model */
const TEXT_FIELDS = ['domain', 'reactor', 'gas', 'endpoint'] as const;

/** Presence flags (0/1) for the water-chemistry parameters a study reports */
const CORE6_FIELDS = ['ph', 'orp', 'conductivity', 'h2o2', 'no2', 'no3'] as const;
const FLAG_FIELDS = ['time', 'power', ...CORE6_FIELDS] as const;

const SYSTEM_PROMPT = 'You annotate research articles on plasma-activated water (PAW). Answer with a single JSON object and nothing else.';

export function buildPrompt(title: string, abstract: string | null): string {
    return `Title: ${title}
Abstract: ${abstract ?? '(no abstract)'}

Return a JSON object with exactly these keys:
{
  "domain": one of "Agriculture", "Food Systems", "Biomedical", "Fundamentals", "Environmental",
  "reactor": plasma reactor family,
  "gas": working gas,
  "endpoint": main outcome or target,
  "time": 1 if treatment time is reported, else 0,
  "power": 1 if power or energy is reported, else 0,
  "ph": 1 if pH is reported, else 0,
  "orp": 1 if oxidation-reduction potential is reported, else 0,
  "conductivity": 1 if conductivity or TDS is reported, else 0,
  "h2o2": 1 if H2O2 concentration is reported, else 0,
  "no2": 1 if nitrite concentration is reported, else 0,
  "no3": 1 if nitrate concentration is reported, else 0
}`;
}

/**
 * Remove a surrounding markdown code fence, if any.
 */
export function stripCodeFence(text: string): string {
    return text
        .trim()
        .replace(/^```(?:json)?\s*/i, '')
        .replace(/\s*```$/, '')
        .trim();
}

function toFlag(value: unknown): 0 | 1 | null {
    if (value === 1 || value === true || value === '1') return 1;
    if (value === 0 || value === false || value === '0') return 0;
    return null;
}

function toText(value: unknown): string | null {
    return typeof value === 'string' && value.trim().length > 0 ? value.trim() : null;
}

/**
 * Validate a model reply and derive `core6Count`.
 */
export function parseAnnotations(text: string): Annotations {
    let parsed: unknown;
    try {
        parsed = JSON.parse(stripCodeFence(text));
    } catch (error) {
        throw new ClassificationError('Classifier reply is not valid JSON', { cause: error });
    }

    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
        throw new ClassificationError('Classifier reply is not a JSON object');
    }
    const reply: Record<string, unknown> = Object.fromEntries(Object.entries(parsed));

    const annotations: Annotations = {};
    for (const field of TEXT_FIELDS) {
        annotations[field] = toText(reply[field]);
    }
    for (const field of FLAG_FIELDS) {
        annotations[field] = toFlag(reply[field]);
    }
    annotations['core6Count'] = CORE6_FIELDS.reduce((sum, field) => sum + (toFlag(reply[field]) ?? 0), 0);

    return annotations;
}

/**
 * Classifier backed by an LLM provider.
 */
export class LlmClassifier implements Classifier {
    constructor(private readonly provider: LlmProvider) {}

    async classify(title: string, abstract: string | null): Promise<Annotations> {
        let text: string;
        try {
            const result = await this.provider.complete(buildPrompt(title, abstract), {
                systemPrompt: SYSTEM_PROMPT,
                jsonMode: true,
                temperature: 0,
                maxTokens: 400,
            });
            text = result.text;
        } catch (error) {
            throw new ClassificationError(
                `${this.provider.name} request failed: ${error instanceof Error ? error.message : String(error)}`,
                { cause: error }
            );
        }

        return parseAnnotations(text);
    }
}

/**
 * Annotate rows in place, one at a time. A row whose classification fails
 * keeps `annotations = null`. Returns the number of rows annotated.
 */
export async function annotateRows(rows: readonly StoreRow[], classifier: Classifier): Promise<number> {
    const logger = getLogger();
    let annotated = 0;

    for (const row of rows) {
        try {
            row.annotations = await classifier.classify(row.title ?? '', row.abstract);
            annotated++;
            logger.debug({ eid: row.eid }, 'Row classified');
        } catch (error) {
            if (!(error instanceof ClassificationError)) throw error;
            logger.warn({ eid: row.eid, err: error }, 'Classification failed, leaving annotations unset');
        }
    }

    return annotated;
}

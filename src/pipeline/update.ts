import type { Classifier, LitSyncConfig, SearchSource, SliceOutcome, Window } from '../types/index.js';
import { RecordStore } from '../storage/record-store.js';
import { ScopusSearchClient } from '../sources/scopus.js';
import { OpenAiCompatibleProvider } from '../llm/openai-compatible.js';
import { LlmClassifier, annotateRows } from '../classify/llm-classifier.js';
import { IdentifierRegistry } from '../sync/identifier-registry.js';
import { planWindow } from '../sync/window-planner.js';
import { fetchWindow } from '../sync/partitioned-fetcher.js';
import { mergeRecords } from '../sync/merge-engine.js';
import { readLlmApiKey, readScopusCredentials } from '../utils/credentials.js';
import { getLogger } from '../utils/logger.js';
import { VERSION } from '../version.js';

/**
 * Collaborators of a run. Anything left out is built from the config and environment.
 */
export interface UpdateDeps {
    search?: SearchSource;
    /** null disables classification regardless of config */
    classifier?: Classifier | null;
    env?: NodeJS.ProcessEnv;
    now?: () => Date;
}

export interface UpdateSummary {
    window: Window;
    fetched: number;
    added: number;
    annotated: number;
    slices: Record<SliceOutcome['status'], number>;
    saved: boolean;
}

/**
 * Build the collaborators the config asks for. Credentials are checked
 * here, before the store is touched or any request is made.
 */
export function createDeps(config: LitSyncConfig, deps: UpdateDeps = {}): { search: SearchSource; classifier: Classifier | null } {
    const env = deps.env ?? process.env;

    const search = deps.search ?? new ScopusSearchClient({
        credentials: readScopusCredentials(env),
        config: config.scopus,
    });

    let classifier: Classifier | null = null;
    if (deps.classifier !== undefined) {
        classifier = deps.classifier;
    } else if (config.classifier.enabled) {
        const provider = new OpenAiCompatibleProvider(config.classifier.provider, {
            apiKey: readLlmApiKey(config.classifier.provider, env),
            baseUrl: config.classifier.baseUrl,
            model: config.classifier.model,
        });
        classifier = new LlmClassifier(provider);
    }

    return { search, classifier };
}

/**
 * One incremental sync run:
 *
 * 1. Load the store and build the identifier registry
 * 2. Plan the load-date window
 * 3. Fetch the window (daily buckets, per-year fallback)
 * 4. Merge new records, re-flag duplicate DOIs, re-sort
 * 5. Classify the new rows (optional)
 * 6. Save the whole store in one transaction, when rows were added or a
 *    stored duplicate-DOI flag changed
 *
 * Any fatal error propagates before step 6, leaving the store untouched.
 */
export async function runUpdate(config: LitSyncConfig, deps: UpdateDeps = {}): Promise<UpdateSummary> {
    const logger = getLogger();
    const now = deps.now ?? (() => new Date());
    const { search, classifier } = createDeps(config, deps);

    const store = RecordStore.open(config.store);

    try {
        // ──────────────────────────────────────────────────
        // Step 1: Snapshot
        // ──────────────────────────────────────────────────
        const rows = store.load();
        const registry = IdentifierRegistry.fromRows(rows);
        logger.info({ store: config.store, rows: rows.length, ...registry.size }, 'Store loaded');

        // ──────────────────────────────────────────────────
        // Step 2-3: Plan and fetch
        // ──────────────────────────────────────────────────
        const startedAt = now();
        const window = planWindow(rows, {
            overlapDays: config.overlapDays,
            timeZone: config.timeZone,
            now: startedAt,
        });

        const report = await fetchWindow(search, window, config.query, {
            fallbackFromYear: config.fallbackFromYear,
            timeZone: config.timeZone,
            now: startedAt,
        });

        // ──────────────────────────────────────────────────
        // Step 4: Merge
        // ──────────────────────────────────────────────────
        const runTimestamp = now().toISOString();
        const merged = mergeRecords(rows, report.records, runTimestamp, registry);
        logger.info({ fetched: report.records.length, added: merged.added, reflagged: merged.reflagged }, 'Records merged');

        // ──────────────────────────────────────────────────
        // Step 5: Classify
        // ──────────────────────────────────────────────────
        const annotated = classifier ? await annotateRows(merged.addedRows, classifier) : 0;

        const slices: UpdateSummary['slices'] = { ok: 0, partial: 0, failed: 0 };
        for (const outcome of report.slices) {
            slices[outcome.status]++;
        }

        // ──────────────────────────────────────────────────
        // Step 6: Save
        // ──────────────────────────────────────────────────
        const saved = !config.dryRun && (merged.added > 0 || merged.reflagged > 0);
        if (saved) {
            store.save(merged.rows, {
                created_at: runTimestamp,
                litsync_version: VERSION,
                window_start: window.start,
                window_end: window.end,
                fetched: report.records.length,
                added: merged.added,
                stats_json: JSON.stringify({ slices, annotated, reflagged: merged.reflagged }),
            });
            logger.info({ store: config.store, rows: merged.rows.length }, 'Store saved');
        } else if (config.dryRun) {
            logger.info('Dry run, store not saved');
        }

        return { window, fetched: report.records.length, added: merged.added, annotated, slices, saved };
    } finally {
        store.close();
    }
}

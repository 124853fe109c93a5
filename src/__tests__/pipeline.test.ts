import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import path from 'node:path';
import fs from 'node:fs';
import os from 'node:os';
import { runUpdate, createDeps } from '../pipeline/update.js';
import { RecordStore } from '../storage/record-store.js';
import { LlmClassifier } from '../classify/llm-classifier.js';
import { ScopusSearchClient } from '../sources/scopus.js';
import { DEFAULT_CONFIG, type Classifier, type LitSyncConfig } from '../types/index.js';
import { ClassificationError, MissingCredentialError, StoreSchemaError, TransportError } from '../utils/errors.js';
import { fakeSearch, makeRecord, makeRow, result } from './helpers.js';

const NOW = new Date('2024-01-01T12:00:00Z');
const now = () => NOW;

describe('runUpdate', () => {
    let tmpDir: string;
    let config: LitSyncConfig;

    // E1 is already stored; E1 and E2 are both loaded on 2024-01-01
    const search = () => fakeSearch((query) =>
        query.includes('BEF 20240102')
            ? result([
                makeRecord('E1', { doi: '10.1000/one' }),
                makeRecord('E2', { doi: '10.1000/two', title: 'Nitrite in treated water', abstract: 'Text.' }),
            ])
            : result([])
    );

    function loadStore(): { rows: ReturnType<RecordStore['load']>; runs: number } {
        const store = RecordStore.open(config.store);
        const snapshot = { rows: store.load(), runs: store.getRunCount() };
        store.close();
        return snapshot;
    }

    beforeEach(() => {
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'litsync-run-'));
        config = { ...DEFAULT_CONFIG, store: path.join(tmpDir, 'records.db'), query: 'TITLE-ABS-KEY(plasma)' };

        const store = RecordStore.create(config.store);
        store.save([makeRow({ eid: 'E1', doi: '10.1000/one', title: 'Stored', ingestedAt: '2024-01-01T00:00:00.000Z' })]);
        store.close();
    });

    afterEach(() => {
        fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it('should add only records the store does not hold', async () => {
        const source = search();
        const summary = await runUpdate(config, { search: source, classifier: null, now });

        expect(summary).toEqual({
            window: { start: '2023-12-30', end: '2024-01-02' },
            fetched: 2,
            added: 1,
            annotated: 0,
            slices: { ok: 3, partial: 0, failed: 0 },
            saved: true,
        });
        expect(source.queries).toEqual([
            'TITLE-ABS-KEY(plasma) AND ORIG-LOAD-DATE AFT 20231229 AND ORIG-LOAD-DATE BEF 20231231',
            'TITLE-ABS-KEY(plasma) AND ORIG-LOAD-DATE AFT 20231230 AND ORIG-LOAD-DATE BEF 20240101',
            'TITLE-ABS-KEY(plasma) AND ORIG-LOAD-DATE AFT 20231231 AND ORIG-LOAD-DATE BEF 20240102',
        ]);

        const { rows, runs } = loadStore();
        expect(rows.map((r) => [r.eid, r.ingestedAt, r.screeningStatus])).toEqual([
            ['E2', '2024-01-01T12:00:00.000Z', 'new'],
            ['E1', '2024-01-01T00:00:00.000Z', null],
        ]);
        expect(rows[0]?.year).toBe(2023);
        expect(runs).toBe(1);
    });

    it('should leave the store untouched when nothing is new', async () => {
        await runUpdate(config, { search: search(), classifier: null, now });
        const second = await runUpdate(config, { search: search(), classifier: null, now });

        expect(second.added).toBe(0);
        expect(second.saved).toBe(false);
        expect(loadStore().runs).toBe(1);
    });

    it('should save corrected duplicate flags even when nothing is added', async () => {
        const seeded = RecordStore.open(config.store);
        seeded.save([
            ...seeded.load(),
            makeRow({ title: 'Copy A', doi: '10.1000/dup' }),
            makeRow({ title: 'Copy B', doi: 'https://doi.org/10.1000/DUP' }),
        ]);
        seeded.close();

        const onlyKnown = fakeSearch((query) =>
            result(query.includes('BEF 20240102') ? [makeRecord('E1', { doi: '10.1000/one' })] : [])
        );
        const summary = await runUpdate(config, { search: onlyKnown, classifier: null, now });

        expect(summary).toMatchObject({ added: 0, saved: true });
        const { rows, runs } = loadStore();
        expect(rows.map((r) => [r.title, r.duplicateDoi])).toEqual([
            ['Stored', false],
            ['Copy A', true],
            ['Copy B', true],
        ]);
        expect(runs).toBe(1);
    });

    it('should not save in dry-run mode', async () => {
        const summary = await runUpdate({ ...config, dryRun: true }, { search: search(), classifier: null, now });

        expect(summary.added).toBe(1);
        expect(summary.saved).toBe(false);
        expect(loadStore().rows.map((r) => r.eid)).toEqual(['E1']);
    });

    it('should annotate added rows only', async () => {
        const classify = vi.fn<Classifier['classify']>(async () => ({ domain: 'Agriculture', core6Count: 2 }));
        const summary = await runUpdate(config, { search: search(), classifier: { classify }, now });

        expect(summary.annotated).toBe(1);
        expect(classify).toHaveBeenCalledTimes(1);
        expect(classify).toHaveBeenCalledWith('Nitrite in treated water', 'Text.');
        expect(loadStore().rows.map((r) => r.annotations)).toEqual([{ domain: 'Agriculture', core6Count: 2 }, null]);
    });

    it('should keep added rows when classification fails', async () => {
        const classify = vi.fn<Classifier['classify']>(async () => {
            throw new ClassificationError('Classifier reply is not valid JSON');
        });
        const summary = await runUpdate(config, { search: search(), classifier: { classify }, now });

        expect(summary).toMatchObject({ added: 1, annotated: 0, saved: true });
        expect(loadStore().rows[0]).toMatchObject({ eid: 'E2', annotations: null });
    });

    it('should abort without saving on transport failure', async () => {
        const failing = fakeSearch(() => {
            throw new TransportError('Scopus request failed: HTTP 503: Service Unavailable', 'q', 503);
        });

        await expect(runUpdate(config, { search: failing, classifier: null, now })).rejects.toBeInstanceOf(TransportError);
        const { rows, runs } = loadStore();
        expect(rows.map((r) => r.eid)).toEqual(['E1']);
        expect(runs).toBe(0);
    });

    it('should fail on a missing store before searching', async () => {
        const source = search();
        const missing = { ...config, store: path.join(tmpDir, 'missing.db') };

        await expect(runUpdate(missing, { search: source, classifier: null, now })).rejects.toBeInstanceOf(StoreSchemaError);
        expect(source.search).not.toHaveBeenCalled();
    });

    it('should check credentials before opening the store', async () => {
        const missing = { ...config, store: path.join(tmpDir, 'missing.db') };

        await expect(runUpdate(missing, { env: {}, now })).rejects.toMatchObject({
            name: 'MissingCredentialError',
            variable: 'SCOPUS_API_KEY',
        });
    });
});

describe('createDeps', () => {
    const env = { SCOPUS_API_KEY: 'test-key' };

    it('should build a Scopus client without a classifier by default', () => {
        const deps = createDeps(DEFAULT_CONFIG, { env });
        expect(deps.search).toBeInstanceOf(ScopusSearchClient);
        expect(deps.classifier).toBeNull();
    });

    it('should require an OpenAI key when the openai classifier is enabled', () => {
        const config = { ...DEFAULT_CONFIG, classifier: { ...DEFAULT_CONFIG.classifier, enabled: true } };
        expect(() => createDeps(config, { env })).toThrow(MissingCredentialError);
        expect(createDeps(config, { env: { ...env, OPENAI_API_KEY: 'test-secret' } }).classifier).toBeInstanceOf(LlmClassifier);
    });

    it('should not need a key for a local provider', () => {
        const config: LitSyncConfig = {
            ...DEFAULT_CONFIG,
            classifier: { enabled: true, provider: 'ollama', model: 'llama3.1' },
        };
        expect(createDeps(config, { env }).classifier).toBeInstanceOf(LlmClassifier);
    });

    it('should let an explicit null disable a configured classifier', () => {
        const config = { ...DEFAULT_CONFIG, classifier: { ...DEFAULT_CONFIG.classifier, enabled: true } };
        expect(createDeps(config, { env, classifier: null }).classifier).toBeNull();
    });
});

#!/usr/bin/env node
import { Command } from 'commander';
import { resolveConfig, type ConfigOverrides } from '../utils/config.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { getHttpClient } from '../utils/http-client.js';
import { runUpdate } from '../pipeline/update.js';
import { VERSION } from '../version.js';
import { exportStore, isExportFormat, EXPORT_FORMATS } from '../exporters/export.js';
import { RecordStore } from '../storage/record-store.js';
import { planWindow } from '../sync/window-planner.js';
import type { LitSyncConfig, LogLevel } from '../types/index.js';

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug', 'silent'];

interface CommonOptions {
    store?: string;
    logLevel?: string;
    jsonLogs?: boolean;
}

function parseInteger(value: string): number {
    const n = parseInt(value, 10);
    if (Number.isNaN(n)) {
        throw new Error(`Not a number: ${value}`);
    }
    return n;
}

function toLogLevel(value: string | undefined): LogLevel | undefined {
    return LOG_LEVELS.find((level) => level === value);
}

/**
 * Resolve config and start the logger. Shared by every command.
 */
async function setup(opts: CommonOptions, overrides: ConfigOverrides = {}): Promise<LitSyncConfig> {
    const config = await resolveConfig({
        ...overrides,
        store: opts.store,
        logLevel: toLogLevel(opts.logLevel),
        jsonLogs: opts.jsonLogs,
    });
    initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
    return config;
}

/**
 * Print a fatal error and exit non-zero.
 */
function fail(action: string, error: unknown): never {
    getLogger().error({ err: error }, `${action} failed`);
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
}

const program = new Command();

program
    .name('litsync')
    .description('Keep a deduplicated table of Scopus records for a fixed query up to date.')
    .version(VERSION);

// ─── UPDATE command ───────────────────────────────────────

program
    .command('update')
    .description('Fetch records loaded since the last run and merge them into the store')
    .option('-s, --store <path>', 'Record store path')
    .option('-q, --query <query>', 'Topical query (Scopus advanced search syntax)')
    .option('--overlap-days <n>', 'Days re-queried before the last ingestion', parseInteger)
    .option('--time-zone <zone>', 'IANA time zone in which "today" is computed')
    .option('--fallback-from-year <year>', 'First publication year tried for oversized days', parseInteger)
    .option('--classify', 'Annotate new rows with the LLM classifier')
    .option('--dry-run', 'Fetch and merge without saving')
    .option('--log-level <level>', 'Log level: debug | info | warn | error | silent')
    .option('--json-logs', 'Output JSON logs')
    .action(async (opts: CommonOptions & {
        query?: string;
        overlapDays?: number;
        timeZone?: string;
        fallbackFromYear?: number;
        classify?: boolean;
        dryRun?: boolean;
    }) => {
        try {
            const config = await setup(opts, {
                query: opts.query,
                overlapDays: opts.overlapDays,
                timeZone: opts.timeZone,
                fallbackFromYear: opts.fallbackFromYear,
                dryRun: opts.dryRun,
                classifier: { enabled: opts.classify },
            });
            getHttpClient({ timeout: 30000 });

            getLogger().info({ store: config.store, query: config.query }, 'Starting update');
            const summary = await runUpdate(config);

            console.log(`Window: ${summary.window.start} to ${summary.window.end} (end exclusive)`);
            console.log(`Fetched: ${summary.fetched} record(s) from ${summary.slices.ok + summary.slices.partial + summary.slices.failed} slice(s)`);
            if (summary.slices.partial > 0 || summary.slices.failed > 0) {
                console.log(`Incomplete slices: ${summary.slices.partial} partial, ${summary.slices.failed} failed`);
            }
            if (summary.added > 0) {
                console.log(`Added ${summary.added} new record(s).${config.dryRun ? ' (dry run, not saved)' : ''}`);
            } else {
                console.log('No new records.');
            }
        } catch (error) {
            fail('Update', error);
        }
    });

// ─── PLAN command ─────────────────────────────────────────

program
    .command('plan')
    .description('Show the load-date window the next update would query')
    .option('-s, --store <path>', 'Record store path')
    .option('--overlap-days <n>', 'Days re-queried before the last ingestion', parseInteger)
    .option('--time-zone <zone>', 'IANA time zone in which "today" is computed')
    .option('--log-level <level>', 'Log level: debug | info | warn | error | silent')
    .action(async (opts: CommonOptions & { overlapDays?: number; timeZone?: string }) => {
        try {
            const config = await setup(opts, { overlapDays: opts.overlapDays, timeZone: opts.timeZone });
            const store = RecordStore.open(config.store);
            try {
                const window = planWindow(store.load(), { overlapDays: config.overlapDays, timeZone: config.timeZone });
                console.log(`${window.start} to ${window.end} (end exclusive)`);
            } finally {
                store.close();
            }
        } catch (error) {
            fail('Plan', error);
        }
    });

// ─── INIT command ─────────────────────────────────────────

program
    .command('init')
    .description('Create an empty record store')
    .option('-s, --store <path>', 'Record store path')
    .option('--log-level <level>', 'Log level: debug | info | warn | error | silent')
    .action(async (opts: CommonOptions) => {
        try {
            const config = await setup(opts);
            RecordStore.create(config.store).close();
            console.log(`Created ${config.store}`);
        } catch (error) {
            fail('Init', error);
        }
    });

// ─── INSPECT command ──────────────────────────────────────

program
    .command('inspect')
    .description('Show record store statistics')
    .option('-s, --store <path>', 'Record store path')
    .option('--log-level <level>', 'Log level: debug | info | warn | error | silent')
    .action(async (opts: CommonOptions) => {
        try {
            const config = await setup(opts);
            const store = RecordStore.open(config.store);
            const stats = store.getStats();
            store.close();

            console.log('\nRecord Store Statistics\n');
            console.log(`  Rows:           ${stats.rows}`);
            console.log(`  Added by sync:  ${stats.botAdded}`);
            console.log(`  Manual:         ${stats.manual}`);
            console.log(`  Duplicate DOIs: ${stats.duplicateFlagged}`);
            console.log(`  Last ingestion: ${stats.lastIngestedAt ?? 'never'}`);
            console.log(`  Runs:           ${stats.runs}`);
            console.log('');
        } catch (error) {
            fail('Inspect', error);
        }
    });

// ─── EXPORT command ───────────────────────────────────────

program
    .command('export')
    .description('Export the record store to JSON or CSV')
    .requiredOption('-f, --format <format>', `Export format: ${EXPORT_FORMATS.join(' | ')}`)
    .option('-s, --store <path>', 'Record store path')
    .option('-o, --out <path>', 'Output file path')
    .option('--log-level <level>', 'Log level: debug | info | warn | error | silent')
    .action(async (opts: CommonOptions & { format: string; out?: string }) => {
        const format = opts.format.toLowerCase();

        if (!isExportFormat(format)) {
            console.error(`Invalid format: ${format}. Valid: ${EXPORT_FORMATS.join(', ')}`);
            process.exit(1);
        }

        try {
            const config = await setup(opts);
            const outputPath = opts.out ?? config.store.replace(/\.db$/, '') + `.${format}`;
            const count = exportStore(config.store, outputPath, format);
            console.log(`Exported ${count} record(s) to ${outputPath}`);
        } catch (error) {
            fail('Export', error);
        }
    });

await program.parseAsync();

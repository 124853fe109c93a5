import Database from 'better-sqlite3';
import { existsSync } from 'node:fs';
import type { Annotations, StoreRow } from '../types/index.js';
import { StoreSchemaError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

/**
 * SQLite schema migration v1.
 */
const MIGRATION_V1 = `
-- Records: one row per bibliographic entry
CREATE TABLE IF NOT EXISTS records (
  row_id INTEGER PRIMARY KEY,
  position INTEGER NOT NULL DEFAULT 0,
  eid TEXT,
  doi TEXT,
  title TEXT,
  authors_json TEXT NOT NULL DEFAULT '[]',
  venue TEXT,
  document_type TEXT,
  citation_count INTEGER,
  cover_date TEXT,
  year INTEGER,
  abstract TEXT,
  keywords_json TEXT NOT NULL DEFAULT '[]',
  included INTEGER NOT NULL DEFAULT 1,
  screening_status TEXT,
  ingested_at TEXT,
  duplicate_doi INTEGER NOT NULL DEFAULT 0,
  annotations_json TEXT,
  extra_json TEXT NOT NULL DEFAULT '{}'
);

-- Runs: one row per saved sync run
CREATE TABLE IF NOT EXISTS runs (
  run_id INTEGER PRIMARY KEY,
  created_at TEXT NOT NULL,
  litsync_version TEXT NOT NULL,
  window_start TEXT NOT NULL,
  window_end TEXT NOT NULL,
  fetched INTEGER NOT NULL DEFAULT 0,
  added INTEGER NOT NULL DEFAULT 0,
  stats_json TEXT NOT NULL DEFAULT '{}'
);
`;

/**
 * Indexes, created once every required column exists.
 */
const INDEXES_V1 = `
CREATE INDEX IF NOT EXISTS idx_records_doi ON records(doi);
CREATE INDEX IF NOT EXISTS idx_records_ingested ON records(ingested_at);

-- EIDs are unique among rows that have one; hand-entered rows may have none
CREATE UNIQUE INDEX IF NOT EXISTS idx_records_eid_unique ON records(eid) WHERE eid IS NOT NULL AND eid <> '';
`;

/**
 * Columns the pipeline reads or writes, with the definition used to add
 * them to stores created before they existed.
 */
const REQUIRED_COLUMNS: Record<string, string> = {
    position: 'INTEGER NOT NULL DEFAULT 0',
    eid: 'TEXT',
    doi: 'TEXT',
    title: 'TEXT',
    authors_json: "TEXT NOT NULL DEFAULT '[]'",
    venue: 'TEXT',
    document_type: 'TEXT',
    citation_count: 'INTEGER',
    cover_date: 'TEXT',
    year: 'INTEGER',
    abstract: 'TEXT',
    keywords_json: "TEXT NOT NULL DEFAULT '[]'",
    included: 'INTEGER NOT NULL DEFAULT 1',
    screening_status: 'TEXT',
    ingested_at: 'TEXT',
    duplicate_doi: 'INTEGER NOT NULL DEFAULT 0',
    annotations_json: 'TEXT',
    extra_json: "TEXT NOT NULL DEFAULT '{}'",
};

const KNOWN_COLUMNS = new Set(['row_id', ...Object.keys(REQUIRED_COLUMNS)]);

/**
 * Run metadata stored in the `runs` table.
 */
export interface RunRecord {
    run_id?: number;
    created_at: string;
    litsync_version: string;
    window_start: string;
    window_end: string;
    fetched: number;
    added: number;
    stats_json: string;
}

export interface StoreStats {
    rows: number;
    botAdded: number;
    manual: number;
    duplicateFlagged: number;
    lastIngestedAt: string | null;
    runs: number;
}

type SqlValue = string | number | bigint | Buffer | null;

// ─── Cell decoding ────────────────────────────────────────

function textOrNull(value: unknown): string | null {
    if (typeof value === 'string') return value.trim().length > 0 ? value : null;
    if (typeof value === 'number' || typeof value === 'bigint') return String(value);
    return null;
}

function numberOrNull(value: unknown): number | null {
    if (typeof value === 'number') return Number.isFinite(value) ? value : null;
    if (typeof value === 'bigint') return Number(value);
    if (typeof value === 'string' && value.trim() !== '') {
        const n = Number(value);
        return Number.isFinite(n) ? n : null;
    }
    return null;
}

function parseJson(value: unknown): unknown {
    if (typeof value !== 'string' || value.trim() === '') return null;
    try {
        return JSON.parse(value);
    } catch {
        return null;
    }
}

function stringList(value: unknown): string[] {
    const parsed = parseJson(value);
    return Array.isArray(parsed) ? parsed.filter((v): v is string => typeof v === 'string') : [];
}

function objectOrNull(value: unknown): Record<string, unknown> | null {
    const parsed = parseJson(value);
    return typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)
        ? Object.fromEntries(Object.entries(parsed))
        : null;
}

function annotationsOrNull(value: unknown): Annotations | null {
    const parsed = objectOrNull(value);
    if (!parsed) return null;

    const annotations: Annotations = {};
    for (const [key, v] of Object.entries(parsed)) {
        annotations[key] = typeof v === 'string' || typeof v === 'number' ? v : null;
    }
    return annotations;
}

/**
 * Map a `records` row to a StoreRow. Columns the pipeline does not know
 * are folded into `extra`.
 */
export function decodeRow(raw: Record<string, unknown>): StoreRow {
    const extra: Record<string, unknown> = { ...objectOrNull(raw['extra_json']) };
    for (const [column, value] of Object.entries(raw)) {
        if (!KNOWN_COLUMNS.has(column)) extra[column] = value;
    }

    const rowId = numberOrNull(raw['row_id']);
    const row: StoreRow = {
        eid: textOrNull(raw['eid'])?.trim() ?? null,
        doi: textOrNull(raw['doi'])?.trim() ?? null,
        title: textOrNull(raw['title']),
        authors: stringList(raw['authors_json']),
        venue: textOrNull(raw['venue']),
        documentType: textOrNull(raw['document_type']),
        citationCount: numberOrNull(raw['citation_count']),
        coverDate: textOrNull(raw['cover_date']),
        year: numberOrNull(raw['year']),
        abstract: textOrNull(raw['abstract']),
        keywords: stringList(raw['keywords_json']),
        included: numberOrNull(raw['included']) !== 0,
        screeningStatus: textOrNull(raw['screening_status']),
        ingestedAt: textOrNull(raw['ingested_at']),
        duplicateDoi: numberOrNull(raw['duplicate_doi']) === 1,
        annotations: annotationsOrNull(raw['annotations_json']),
        extra,
    };
    if (rowId !== null) row.row_id = rowId;
    return row;
}

function toSqlValue(value: unknown): SqlValue {
    if (value === null || value === undefined) return null;
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'bigint') return value;
    if (typeof value === 'boolean') return value ? 1 : 0;
    if (Buffer.isBuffer(value)) return value;
    return JSON.stringify(value);
}

/**
 * Record store backed by a SQLite file.
 * Handles schema migration, forward-compatible columns, and whole-store saves.
 */
export class RecordStore {
    private db: Database.Database;

    private constructor(db: Database.Database, private readonly path: string) {
        this.db = db;
        this.db.pragma('journal_mode = WAL');
        this.migrate();
        getLogger().debug({ path }, 'Record store opened');
    }

    /**
     * Open an existing store. Fails if the file does not exist.
     */
    static open(path: string): RecordStore {
        if (!existsSync(path)) {
            throw new StoreSchemaError(`Record store not found: ${path} (run "litsync init" to create one)`, path);
        }

        try {
            return new RecordStore(new Database(path, { fileMustExist: true }), path);
        } catch (error) {
            throw new StoreSchemaError(
                `Cannot open record store ${path}: ${error instanceof Error ? error.message : String(error)}`,
                path,
                { cause: error }
            );
        }
    }

    /**
     * Create a new, empty store. Fails if the file already exists.
     */
    static create(path: string): RecordStore {
        if (existsSync(path)) {
            throw new StoreSchemaError(`Record store already exists: ${path}`, path);
        }
        return new RecordStore(new Database(path), path);
    }

    /**
     * Run schema migrations and add any required column the table lacks.
     */
    private migrate(): void {
        const currentVersion = this.db.pragma('user_version', { simple: true });

        const upgrade = typeof currentVersion !== 'number' || currentVersion < 1;

        if (upgrade) {
            this.db.exec(MIGRATION_V1);
        }

        // Stores created by hand or by older versions may lack columns
        const present = new Set(this.getColumns());
        for (const [column, definition] of Object.entries(REQUIRED_COLUMNS)) {
            if (!present.has(column)) {
                this.db.exec(`ALTER TABLE records ADD COLUMN ${column} ${definition}`);
                getLogger().info({ column }, 'Added missing column to records');
            }
        }

        if (upgrade) {
            this.db.exec(INDEXES_V1);
            this.db.pragma('user_version = 1');
            getLogger().info({ path: this.path }, 'Record store migrated to v1');
        }
    }

    private getColumns(): string[] {
        const info: unknown[] = this.db.prepare('PRAGMA table_info(records)').all();
        return info.flatMap((col) =>
            typeof col === 'object' && col !== null && 'name' in col && typeof col.name === 'string' ? [col.name] : []
        );
    }

    // ─── Records ──────────────────────────────────────────────

    /**
     * All rows in stored order.
     */
    load(): StoreRow[] {
        const raw: unknown[] = this.db.prepare('SELECT * FROM records ORDER BY position, rowid').all();
        return raw.flatMap((r) =>
            typeof r === 'object' && r !== null ? [decodeRow(Object.fromEntries(Object.entries(r)))] : []
        );
    }

    /**
     * Replace the store content with `rows`, in order, in one transaction.
     * Extra values whose key is a column of the table go back to that column.
     *
     * Rows that already carry a `row_id` are written first so that new rows,
     * whatever their position, are numbered after every id in use.
     */
    save(rows: readonly StoreRow[], run?: Omit<RunRecord, 'run_id'>): void {
        const present = this.getColumns();
        const extraColumns = present.filter((c) => !KNOWN_COLUMNS.has(c));
        // Hand-made tables may rely on SQLite's implicit rowid
        const keyColumns = present.includes('row_id') ? ['row_id'] : [];
        const columns = [...keyColumns, ...Object.keys(REQUIRED_COLUMNS), ...extraColumns];
        const quoted = columns.map((c) => `"${c.replace(/"/g, '""')}"`);

        const insert = this.db.prepare(
            `INSERT INTO records (${quoted.join(', ')}) VALUES (${columns.map(() => '?').join(', ')})`
        );

        const writeAll = this.db.transaction((batch: readonly StoreRow[]) => {
            this.db.prepare('DELETE FROM records').run();

            const positioned = batch.map((row, position) => ({ row, position }));
            const ordered = [
                ...positioned.filter(({ row }) => row.row_id !== undefined),
                ...positioned.filter(({ row }) => row.row_id === undefined),
            ];

            for (const { row, position } of ordered) {
                const extra: Record<string, unknown> = { ...row.extra };
                const extraValues = extraColumns.map((column) => {
                    const value = extra[column];
                    delete extra[column];
                    return toSqlValue(value);
                });

                const key = keyColumns.length > 0 ? [row.row_id ?? null] : [];
                insert.run(
                    ...key,
                    position,
                    row.eid,
                    row.doi,
                    row.title,
                    JSON.stringify(row.authors),
                    row.venue,
                    row.documentType,
                    row.citationCount,
                    row.coverDate,
                    row.year,
                    row.abstract,
                    JSON.stringify(row.keywords),
                    row.included ? 1 : 0,
                    row.screeningStatus,
                    row.ingestedAt,
                    row.duplicateDoi ? 1 : 0,
                    row.annotations ? JSON.stringify(row.annotations) : null,
                    JSON.stringify(extra),
                    ...extraValues
                );
            }

            if (run) this.insertRun(run);
        });

        writeAll(rows);
        getLogger().debug({ path: this.path, rows: rows.length }, 'Record store saved');
    }

    // ─── Runs ─────────────────────────────────────────────────

    insertRun(run: Omit<RunRecord, 'run_id'>): number {
        const stmt = this.db.prepare(`
      INSERT INTO runs (created_at, litsync_version, window_start, window_end, fetched, added, stats_json)
      VALUES (@created_at, @litsync_version, @window_start, @window_end, @fetched, @added, @stats_json)
    `);
        const result = stmt.run(run);
        return Number(result.lastInsertRowid);
    }

    getRunCount(): number {
        const row: unknown = this.db.prepare('SELECT COUNT(*) as count FROM runs').get();
        return typeof row === 'object' && row !== null && 'count' in row ? numberOrNull(row.count) ?? 0 : 0;
    }

    // ─── Stats ────────────────────────────────────────────────

    getStats(): StoreStats {
        const rows = this.load();
        const bot = rows.filter((r) => r.ingestedAt !== null);
        const lastIngestedAt = bot
            .map((r) => r.ingestedAt)
            .reduce<string | null>((max, t) => (t !== null && (max === null || t > max) ? t : max), null);

        return {
            rows: rows.length,
            botAdded: bot.length,
            manual: rows.length - bot.length,
            duplicateFlagged: rows.filter((r) => r.duplicateDoi).length,
            lastIngestedAt,
            runs: this.getRunCount(),
        };
    }

    // ─── Utility ──────────────────────────────────────────────

    /**
     * Close the database connection.
     */
    close(): void {
        this.db.close();
        getLogger().debug({ path: this.path }, 'Record store closed');
    }

    /**
     * Get the raw better-sqlite3 instance (for advanced queries).
     */
    getRawDb(): Database.Database {
        return this.db;
    }
}

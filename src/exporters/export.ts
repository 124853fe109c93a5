import { writeFileSync } from 'node:fs';
import { RecordStore } from '../storage/record-store.js';
import type { StoreRow } from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import { VERSION } from '../version.js';

// ─── Types ───────────────────────────────────────────────

export type ExportFormat = 'json' | 'csv';

export const EXPORT_FORMATS: readonly ExportFormat[] = ['json', 'csv'];

export function isExportFormat(value: string): value is ExportFormat {
    return value === 'json' || value === 'csv';
}

// ─── Main Export Function ────────────────────────────────

/**
 * Export the record store to a file.
 */
export function exportStore(storePath: string, outputPath: string, format: ExportFormat): number {
    const store = RecordStore.open(storePath);

    try {
        const rows = store.load();
        const content = format === 'json' ? exportJson(rows) : exportCSV(rows);

        writeFileSync(outputPath, content, 'utf-8');
        getLogger().info({ format, outputPath, rows: rows.length }, 'Store exported');
        return rows.length;
    } finally {
        store.close();
    }
}

// ─── Format Implementations ─────────────────────────────

export function exportJson(rows: readonly StoreRow[], exportedAt: Date = new Date()): string {
    return JSON.stringify({
        litsync: {
            version: VERSION,
            exported_at: exportedAt.toISOString(),
        },
        records: rows.map(({ row_id, ...row }) => ({ id: row_id ?? null, ...row })),
    }, null, 2);
}

const CSV_HEADER = [
    'eid', 'doi', 'title', 'authors', 'venue', 'document_type', 'year', 'cover_date',
    'citation_count', 'included', 'screening_status', 'ingested_at', 'duplicate_doi',
];

function quote(value: string | null): string {
    return `"${(value ?? '').replace(/"/g, '""')}"`;
}

export function exportCSV(rows: readonly StoreRow[]): string {
    let csv = CSV_HEADER.join(',') + '\n';
    for (const row of rows) {
        csv += [
            quote(row.eid),
            quote(row.doi),
            quote(row.title),
            quote(row.authors.join('; ')),
            quote(row.venue),
            quote(row.documentType),
            row.year ?? '',
            quote(row.coverDate),
            row.citationCount ?? '',
            row.included ? 'YES' : 'NO',
            quote(row.screeningStatus),
            row.ingestedAt ?? '',
            row.duplicateDoi ? 1 : 0,
        ].join(',') + '\n';
    }
    return csv;
}

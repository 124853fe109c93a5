/**
 * Record model — a bibliographic entry as returned by the search source,
 * and the row shape persisted in the record store.
 */

/**
 * Immutable snapshot of one search result.
 * Produced by the partitioned fetcher and discarded after the merge.
 */
export interface RecordSnapshot {
    /** Primary identifier (Scopus EID, e.g. "2-s2.0-85012345678") */
    readonly eid: string;

    /** Secondary identifier (DOI without https://doi.org/ prefix) */
    readonly doi: string | null;

    readonly title: string;
    readonly authors: readonly string[];

    /** Journal or proceedings name */
    readonly venue: string | null;

    /** Document type as reported by the source (e.g. "Article", "Review") */
    readonly documentType: string | null;

    readonly citationCount: number;

    /** Publication cover date; may be partial ("2024", "2024-03") */
    readonly coverDate: string | null;

    readonly abstract: string | null;
    readonly keywords: readonly string[];
}

/**
 * Screening status tag. Rows added by the pipeline start as 'new';
 * other values are set by people reviewing the table.
 */
export type ScreeningStatus = 'new' | 'screened' | 'excluded' | (string & {});

/**
 * Annotation values returned by the classifier.
 */
export type AnnotationValue = string | number | null;
export type Annotations = Record<string, AnnotationValue>;

/**
 * One persisted row of the record store.
 */
export interface StoreRow {
    /** Internal auto-increment ID (SQLite rowid); absent on rows not yet saved */
    row_id?: number;

    /** Primary identifier; null only on rows entered by hand */
    eid: string | null;
    doi: string | null;
    title: string | null;
    authors: string[];
    venue: string | null;
    documentType: string | null;
    citationCount: number | null;
    coverDate: string | null;
    year: number | null;
    abstract: string | null;
    keywords: string[];

    /** Inclusion flag; rows matched by the topical query are included by default */
    included: boolean;
    screeningStatus: ScreeningStatus | null;

    /** ISO timestamp of the run that added this row; null for manual rows. Never rewritten. */
    ingestedAt: string | null;

    /** Set when this row's DOI appears on two or more rows */
    duplicateDoi: boolean;

    /** Classifier output, null when not classified */
    annotations: Annotations | null;

    /** Columns of legacy rows the pipeline does not know about, kept as-is */
    extra: Record<string, unknown>;
}

/**
 * Shared utilities for source adapters and identifier handling.
 */

/**
 * Strip DOI prefix URLs to get just the DOI identifier.
 * "https://doi.org/10.1234/test" → "10.1234/test"
 */
export function stripDoiPrefix(doi: string | null | undefined): string | null {
    if (!doi) return null;
    return doi
        .trim()
        .replace(/^https?:\/\/(dx\.)?doi\.org\//i, '')
        .replace(/^doi:\s*/i, '')
        .trim() || null;
}

/**
 * Normalize an identifier read from a store cell: stringify, trim, empty → null.
 * Spreadsheet-born stores hold numbers and strings in the same column.
 */
export function normalizeIdentifier(value: unknown): string | null {
    if (value === null || value === undefined) return null;
    if (typeof value !== 'string' && typeof value !== 'number') return null;
    const text = String(value).trim();
    return text.length > 0 ? text : null;
}

/**
 * Comparison key for a DOI. DOIs are case-insensitive.
 */
export function doiKey(value: unknown): string | null {
    const doi = stripDoiPrefix(normalizeIdentifier(value));
    return doi ? doi.toLowerCase() : null;
}

/**
 * Split a delimited list ("a | b", "a; b") into trimmed, non-empty parts.
 */
export function splitList(value: string | null | undefined, delimiter: string | RegExp): string[] {
    if (!value) return [];
    return value
        .split(delimiter)
        .map((part) => part.trim())
        .filter((part) => part.length > 0);
}

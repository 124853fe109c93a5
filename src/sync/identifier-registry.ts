import type { RecordSnapshot, StoreRow } from '../types/index.js';
import { doiKey, normalizeIdentifier } from '../sources/utils.js';

type Identified = Pick<RecordSnapshot, 'eid' | 'doi'> | Pick<StoreRow, 'eid' | 'doi'>;

/**
 * Set-membership index over the identifiers already in the store.
 *
 * Built once per run from the store snapshot. The only mutation is
 * `recordSeen()`, called by the merge as each new record is accepted.
 */
export class IdentifierRegistry {
    private readonly eids = new Set<string>();
    private readonly dois = new Set<string>();

    static fromRows(rows: readonly StoreRow[]): IdentifierRegistry {
        const registry = new IdentifierRegistry();
        for (const row of rows) {
            registry.recordSeen(row);
        }
        return registry;
    }

    /**
     * True when the record must not be merged: it has no EID, or its EID
     * or (non-empty) DOI is already known.
     */
    contains(record: Identified): boolean {
        const eid = normalizeIdentifier(record.eid);
        if (!eid) return true;
        if (this.eids.has(eid)) return true;

        const doi = doiKey(record.doi);
        return doi !== null && this.dois.has(doi);
    }

    /**
     * Add the record's identifiers. Idempotent.
     */
    recordSeen(record: Identified): void {
        const eid = normalizeIdentifier(record.eid);
        if (eid) this.eids.add(eid);

        const doi = doiKey(record.doi);
        if (doi) this.dois.add(doi);
    }

    get size(): { eids: number; dois: number } {
        return { eids: this.eids.size, dois: this.dois.size };
    }
}

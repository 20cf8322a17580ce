import type { RawOntologyRecord } from './ontology.js';

/**
 * A source that can hand over its whole extract at once
 * (HGNC complete set, the TACA list, a DOID dump, a snapshot).
 */
export interface BulkLookupSource {
    readonly kind: 'bulk';

    /** Human-readable source name, used for priority and provenance */
    readonly name: string;

    /** Records in source order; shapes are validated by the dictionary builder */
    fetchAll(): Promise<readonly unknown[]>;
}

/**
 * A source that is better queried per term than downloaded in bulk
 * (ChEMBL, BioPortal). Candidates come back best first.
 */
export interface SearchLookupSource {
    readonly kind: 'search';
    readonly name: string;

    search(term: string): Promise<RawOntologyRecord[]>;
}

/**
 * Lookup capability consumed by the dictionary loader. Implementations must
 * throw a typed error on failure instead of returning an empty result.
 */
export type LookupSource = BulkLookupSource | SearchLookupSource;

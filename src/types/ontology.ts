/**
 * Field types the resolver understands. Each has its own dictionary,
 * normalisation rules and output shape.
 */
export const FIELD_TYPES = ['drug', 'antigen', 'disease', 'payload', 'linker'] as const;

export type FieldType = (typeof FIELD_TYPES)[number];

/**
 * Any JSON-serialisable value. Entity attributes and field details are
 * written to output documents verbatim, so they must stay within JSON.
 */
export type JsonValue =
    | string
    | number
    | boolean
    | null
    | JsonValue[]
    | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/**
 * One reference-ontology record (a ChEMBL molecule, an HGNC gene,
 * a DOID/NCIT disease, a TACA antigen).
 */
export interface CanonicalEntity {
    field_type: FieldType;

    /** ChEMBL ID, HGNC ID, DOID/NCIT CURIE, … — unique within field_type */
    primary_id: string;

    preferred_label: string;

    /** Normalised alternate surface forms */
    aliases: string[];

    /** Field-specific metadata (mechanism of action, gene group, parents, …) */
    attributes: JsonObject;

    /** Name of the lookup source that contributed the record */
    source: string;
}

/**
 * What a lookup source hands to the dictionary builder.
 * Everything is optional here; the builder validates.
 */
export interface RawOntologyRecord {
    id?: string | null;
    label?: string | null;
    aliases?: string | string[] | null;
    attributes?: JsonObject | null;
}

/**
 * Records of one source, in the order the builder should prioritise them.
 */
export interface SourceExtract {
    source: string;
    records: readonly unknown[];
}

/**
 * A key the fuzzy stage scores against.
 */
export interface FuzzyKey {
    key: string;
    entity: CanonicalEntity;
}

/**
 * In-memory lookup tables for one field type. Built once per run and
 * shared read-only by every resolver.
 */
export interface Dictionary {
    readonly field_type: FieldType;
    readonly exact_index: ReadonlyMap<string, CanonicalEntity>;
    readonly alias_index: ReadonlyMap<string, readonly CanonicalEntity[]>;
    readonly entities: readonly CanonicalEntity[];
    readonly fuzzy_keys: readonly FuzzyKey[];
    readonly sources: readonly string[];
}

/**
 * Precomputed disease hierarchy: primary_id → labels from the root
 * down to the entity itself.
 */
export type DiseaseHierarchy = ReadonlyMap<string, readonly string[]>;

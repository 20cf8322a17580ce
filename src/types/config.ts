import type { FieldType } from './ontology.js';

/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Similarity scorers available to the fuzzy stage.
 */
export type SimilarityAlgorithm = 'levenshtein' | 'sequence';

/**
 * Where a field's canonical records come from.
 */
export type SourceSpec =
    | { kind: 'json'; path: string; name?: string }
    | { kind: 'hgnc-tsv'; path: string }
    | { kind: 'taca'; path: string }
    | { kind: 'doid-paths'; path: string }
    | { kind: 'chembl'; withMechanisms?: boolean }
    | { kind: 'bioportal'; ontology: string };

/**
 * Sources for one field type, highest priority first.
 */
export interface FieldSources {
    primary: SourceSpec[];
    fallback?: SourceSpec[];
}

/**
 * Which keys of a source entity carry the terms of a field.
 * The first key holding a value wins; alternate keys are tried
 * only when the main term stays unresolved.
 */
export interface FieldBinding {
    keys: string[];
    alternateKeys?: string[];
}

export interface MatchingConfig {
    fuzzyThreshold: number;
    similarity: SimilarityAlgorithm;
    /** Seed terms shorter than this are not sent to search sources */
    minSearchLength: number;
}

export interface HttpConfig {
    timeout: number;
    maxRetries: number;
    initialBackoffMs: number;
    maxBackoffMs: number;
    email?: string;
}

/**
 * Full configuration merged from CLI flags, config file and defaults.
 */
export interface OntoResolveConfig {
    // Input / output
    input?: string;
    out: string;
    unknownsOut?: string;

    /** SQLite snapshot to load dictionaries from instead of the sources */
    snapshot?: string;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;

    matching: MatchingConfig;
    sources: Record<FieldType, FieldSources>;
    bindings: Record<FieldType, FieldBinding>;
    http: HttpConfig;
}

export const VERSION = '1.0.0';

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: OntoResolveConfig = {
    out: './enriched.json',
    logLevel: 'info',
    jsonLogs: false,
    matching: {
        fuzzyThreshold: 0.85,
        similarity: 'levenshtein',
        minSearchLength: 3,
    },
    sources: {
        drug: { primary: [{ kind: 'chembl', withMechanisms: true }] },
        antigen: {
            primary: [{ kind: 'hgnc-tsv', path: 'hgnc_complete_set.tsv' }],
            fallback: [{ kind: 'taca', path: 'taca.json' }],
        },
        disease: {
            primary: [{ kind: 'doid-paths', path: 'dictionaries/disease/doid_cancer_leaf_paths.json' }],
        },
        payload: { primary: [{ kind: 'chembl' }] },
        linker: { primary: [{ kind: 'chembl' }] },
    },
    bindings: {
        drug: { keys: ['drugName'], alternateKeys: ['drugAlias'] },
        antigen: { keys: ['targetAntigenCanonicalized', 'targetAntigen'] },
        disease: { keys: ['cancerIndication'] },
        payload: { keys: ['payload'] },
        linker: { keys: ['linker'] },
    },
    http: {
        timeout: 30000,
        maxRetries: 3,
        initialBackoffMs: 1000,
        maxBackoffMs: 30000,
    },
};

/**
 * Run metadata stored in the SQLite `runs` table.
 */
export interface RunRecord {
    run_id?: number;
    created_at: string;
    ontoresolve_version: string;
    command: string;
    config_json: string;
    stats_json: string;
}

import { readFile } from 'node:fs/promises';
import type { FieldType, OntoResolveConfig, SourceDocument } from '../types/index.js';
import { FIELD_TYPES, VERSION } from '../types/index.js';
import { exportEnrichment, type MatchStats } from '../exporters/export.js';
import { createLookupSource, saveDictionary, snapshotSources } from '../sources/index.js';
import { OntologyDatabase, type DatabaseStats } from '../storage/database.js';
import { createHttpClient, type HttpClient } from '../utils/http-client.js';
import { isJsonObject } from '../utils/json-schema.js';
import { getLogger } from '../utils/logger.js';
import {
    collectSeeds,
    EnrichmentEngine,
    loadDictionaries,
    type FieldSourceSet,
    type LoadedDictionaries,
    type SourcePlan,
} from './engine.js';

const logger = getLogger();

/**
 * Input file is missing, unreadable or not a list of documents.
 */
export class InputError extends Error {
    constructor(
        message: string,
        public readonly path: string
    ) {
        super(message);
        this.name = 'InputError';
    }
}

export interface PipelineDeps {
    http?: HttpClient;
}

// ─── Input ───────────────────────────────────────────────

/**
 * Read the input documents: a JSON array of article objects.
 */
export async function readDocuments(path: string): Promise<SourceDocument[]> {
    let text: string;
    try {
        text = await readFile(path, 'utf-8');
    } catch (error) {
        throw new InputError(`Cannot read input ${path}: ${error instanceof Error ? error.message : String(error)}`, path);
    }

    let data: unknown;
    try {
        data = JSON.parse(text);
    } catch (error) {
        throw new InputError(`Input ${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`, path);
    }

    if (!Array.isArray(data)) {
        throw new InputError(`Input ${path} must be a JSON array of documents`, path);
    }

    const documents = data.filter(isJsonObject);
    if (documents.length < data.length) {
        logger.warn({ path, dropped: data.length - documents.length }, 'Ignored non-object items in input');
    }
    return documents;
}

// ─── Source plans ────────────────────────────────────────

/**
 * Adapters for every configured source.
 */
export function plannedSources(config: OntoResolveConfig, http: HttpClient): SourcePlan {
    const plan = (fieldType: FieldType): FieldSourceSet => {
        const specs = config.sources[fieldType];
        return {
            primary: specs.primary.map((spec) => createLookupSource(spec, { http })),
            fallback: specs.fallback?.map((spec) => createLookupSource(spec, { http })),
        };
    };

    return {
        drug: plan('drug'),
        antigen: plan('antigen'),
        disease: plan('disease'),
        payload: plan('payload'),
        linker: plan('linker'),
    };
}

/**
 * Adapters reading a dictionary snapshot back.
 */
export function snapshotPlan(db: OntologyDatabase): SourcePlan {
    const plan = (fieldType: FieldType): FieldSourceSet => ({
        primary: snapshotSources(db, fieldType, 'primary'),
        fallback: snapshotSources(db, fieldType, 'fallback'),
    });

    return {
        drug: plan('drug'),
        antigen: plan('antigen'),
        disease: plan('disease'),
        payload: plan('payload'),
        linker: plan('linker'),
    };
}

function httpFor(config: OntoResolveConfig, deps: PipelineDeps): HttpClient {
    return deps.http ?? createHttpClient({ ...config.http, version: VERSION });
}

async function loadForRun(
    config: OntoResolveConfig,
    documents: readonly SourceDocument[],
    deps: PipelineDeps
): Promise<LoadedDictionaries> {
    const seeds = collectSeeds(documents, config.bindings);
    logger.info(
        Object.fromEntries(FIELD_TYPES.map((fieldType) => [fieldType, seeds[fieldType].length])),
        'Distinct terms per field'
    );

    if (config.snapshot) {
        const db = new OntologyDatabase(config.snapshot);
        try {
            return await loadDictionaries(snapshotPlan(db), { hierarchy: db.getHierarchy() });
        } finally {
            db.close();
        }
    }

    return loadDictionaries(plannedSources(config, httpFor(config, deps)), {
        seeds,
        minSearchLength: config.matching.minSearchLength,
    });
}

// ─── Commands ────────────────────────────────────────────

export interface EnrichRunResult {
    out: string;
    unknownsOut: string;
    stats: MatchStats;
}

/**
 * Full enrichment run:
 *
 * 1. Read input documents and collect seed terms
 * 2. Load all dictionaries (concurrently; failures contained per field)
 * 3. Resolve every entity through the cache
 * 4. Write enriched output, unknowns side file, log statistics
 */
export async function runEnrich(config: OntoResolveConfig, deps: PipelineDeps = {}): Promise<EnrichRunResult> {
    if (!config.input) {
        throw new InputError('No input file given', '');
    }

    const startTime = Date.now();
    logger.info({ input: config.input, out: config.out, snapshot: config.snapshot ?? null }, 'Starting enrichment');

    const documents = await readDocuments(config.input);
    const loaded = await loadForRun(config, documents, deps);

    const engine = new EnrichmentEngine(loaded, { matching: config.matching, bindings: config.bindings });
    const { documents: enriched, stats } = engine.enrich(documents);

    const written = exportEnrichment(enriched, { out: config.out, unknownsOut: config.unknownsOut }, [
        ...config.bindings.drug.keys,
    ]);

    logger.info({ fields: stats.fields, elapsedMs: Date.now() - startTime }, 'Enrichment complete');

    return { out: written.out, unknownsOut: written.unknownsOut, stats };
}

export interface SnapshotRunResult {
    path: string;
    runId: number;
    stats: DatabaseStats;
}

/**
 * Load every configured source and persist the dictionaries (and disease
 * hierarchy) to SQLite. Seed terms for search sources come from the
 * input, when one is given.
 */
export async function runSnapshot(config: OntoResolveConfig, dbPath: string, deps: PipelineDeps = {}): Promise<SnapshotRunResult> {
    const documents = config.input ? await readDocuments(config.input) : [];
    const loaded = await loadDictionaries(plannedSources(config, httpFor(config, deps)), {
        seeds: collectSeeds(documents, config.bindings),
        minSearchLength: config.matching.minSearchLength,
    });

    const db = new OntologyDatabase(dbPath);
    try {
        db.transaction(() => {
            for (const fieldType of FIELD_TYPES) {
                const { primary, fallback } = loaded.dictionaries[fieldType];
                saveDictionary(db, primary, 'primary');
                if (fallback) saveDictionary(db, fallback, 'fallback');
            }
            db.replaceHierarchy(loaded.hierarchy);
        });

        const stats = db.getStats();
        const runId = db.insertRun({
            created_at: new Date().toISOString(),
            ontoresolve_version: VERSION,
            command: 'snapshot',
            config_json: JSON.stringify(config),
            stats_json: JSON.stringify({ ...stats, dictionary_errors: loaded.errors }),
        });

        logger.info({ path: dbPath, runId, entities: stats.entities, errors: loaded.errors.length }, 'Snapshot written');
        return { path: dbPath, runId, stats };
    } finally {
        db.close();
    }
}

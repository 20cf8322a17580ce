import type {
    Dictionary,
    DiseaseHierarchy,
    FieldType,
    LookupSource,
    MatchingConfig,
    SourceDocument,
} from '../types/index.js';
import { FIELD_TYPES } from '../types/index.js';
import { emptyDictionary } from '../dictionary/builder.js';
import { hierarchyFromParents } from '../dictionary/hierarchy.js';
import { loadDictionary } from '../dictionary/loader.js';
import { collectFieldTerms, enrichDocuments, ENTRIES_KEY, type FieldBindings } from '../merge/unified-merge.js';
import { getSimilarity } from '../nlp/similarity.js';
import { ResolutionCache } from '../resolution/cache.js';
import { createFieldResolvers, FIELD_PROFILES, type FieldDictionaries } from '../resolution/field-resolvers.js';
import { computeMatchStats, type DictionaryLoadFailure, type MatchStats } from '../exporters/export.js';
import { DoidLeafPathsSource } from '../sources/doid.js';
import { isJsonObject } from '../utils/json-schema.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

// ─── Types ───────────────────────────────────────────────

export interface FieldSourceSet {
    primary: readonly LookupSource[];
    fallback?: readonly LookupSource[];
}

export type SourcePlan = Readonly<Record<FieldType, FieldSourceSet>>;

export type SeedTerms = Record<FieldType, string[]>;

export interface LoadedDictionaries {
    dictionaries: Record<FieldType, FieldDictionaries>;
    hierarchy: DiseaseHierarchy;
    errors: DictionaryLoadFailure[];
}

export interface LoadDictionariesOptions {
    seeds?: SeedTerms;
    minSearchLength?: number;
    /** Precomputed hierarchy (e.g. from a snapshot) */
    hierarchy?: DiseaseHierarchy;
}

export interface EnrichmentResult {
    documents: SourceDocument[];
    stats: MatchStats;
}

// ─── Seeds ───────────────────────────────────────────────

/**
 * Distinct raw terms per field across all documents, in first-seen order.
 */
export function collectSeeds(documents: readonly SourceDocument[], bindings: FieldBindings): SeedTerms {
    const seen: Record<FieldType, Set<string>> = {
        drug: new Set(),
        antigen: new Set(),
        disease: new Set(),
        payload: new Set(),
        linker: new Set(),
    };

    for (const document of documents) {
        const entries = document[ENTRIES_KEY];
        if (!Array.isArray(entries)) continue;

        for (const entry of entries) {
            if (!isJsonObject(entry)) continue;
            for (const fieldType of FIELD_TYPES) {
                for (const term of collectFieldTerms(entry, bindings[fieldType])) {
                    seen[fieldType].add(term.trim());
                }
            }
        }
    }

    return {
        drug: [...seen.drug],
        antigen: [...seen.antigen],
        disease: [...seen.disease],
        payload: [...seen.payload],
        linker: [...seen.linker],
    };
}

// ─── Dictionaries ────────────────────────────────────────

interface LoadTask {
    fieldType: FieldType;
    role: 'primary' | 'fallback';
    sources: readonly LookupSource[];
}

function hierarchyFor(plan: SourcePlan, disease: Dictionary | undefined): DiseaseHierarchy {
    const merged = new Map<string, readonly string[]>();

    for (const source of plan.disease.primary) {
        if (source instanceof DoidLeafPathsSource) {
            for (const [id, path] of source.hierarchy()) {
                if (!merged.has(id)) merged.set(id, path);
            }
        }
    }

    if (merged.size === 0 && disease?.entities.some((entity) => 'parents' in entity.attributes)) {
        return hierarchyFromParents(disease.entities);
    }

    return merged;
}

/**
 * Load every field's dictionaries concurrently. A field whose load fails
 * gets an empty dictionary; the failure is reported, not thrown.
 */
export async function loadDictionaries(plan: SourcePlan, options: LoadDictionariesOptions = {}): Promise<LoadedDictionaries> {
    const tasks: LoadTask[] = [];
    for (const fieldType of FIELD_TYPES) {
        tasks.push({ fieldType, role: 'primary', sources: plan[fieldType].primary });
        const fallback = plan[fieldType].fallback;
        if (fallback && fallback.length > 0) {
            tasks.push({ fieldType, role: 'fallback', sources: fallback });
        }
    }

    const settled = await Promise.allSettled(
        tasks.map((task) =>
            loadDictionary(task.fieldType, task.sources, {
                seeds: options.seeds?.[task.fieldType],
                minSearchLength: options.minSearchLength,
                accept: task.role === 'primary' ? FIELD_PROFILES[task.fieldType].accept : undefined,
            })
        )
    );

    const primaries = new Map<FieldType, Dictionary>();
    const fallbacks = new Map<FieldType, Dictionary>();
    const errors: DictionaryLoadFailure[] = [];

    settled.forEach((outcome, i) => {
        const task = tasks[i];
        if (!task) return;
        const target = task.role === 'primary' ? primaries : fallbacks;

        if (outcome.status === 'fulfilled') {
            target.set(task.fieldType, outcome.value);
            return;
        }

        const error: unknown = outcome.reason;
        const failure: DictionaryLoadFailure = {
            field_type: task.fieldType,
            dictionary: task.role,
            error: error instanceof Error ? error.name : 'Error',
            message: error instanceof Error ? error.message : String(error),
        };
        errors.push(failure);
        logger.error(failure, 'Dictionary load failed; field resolves to unknown');
        target.set(task.fieldType, emptyDictionary(task.fieldType));
    });

    const entry = (fieldType: FieldType): FieldDictionaries => ({
        primary: primaries.get(fieldType) ?? emptyDictionary(fieldType),
        fallback: fallbacks.get(fieldType),
    });

    return {
        dictionaries: {
            drug: entry('drug'),
            antigen: entry('antigen'),
            disease: entry('disease'),
            payload: entry('payload'),
            linker: entry('linker'),
        },
        hierarchy: options.hierarchy ?? hierarchyFor(plan, primaries.get('disease')),
        errors,
    };
}

// ─── Engine ──────────────────────────────────────────────

export interface EngineOptions {
    matching: MatchingConfig;
    bindings: FieldBindings;
    cache?: ResolutionCache;
}

/**
 * Resolves documents against loaded dictionaries. One engine serves one
 * run; the cache is cleared at the start of every `enrich` call.
 */
export class EnrichmentEngine {
    private readonly cache: ResolutionCache;

    constructor(
        private readonly loaded: LoadedDictionaries,
        private readonly options: EngineOptions
    ) {
        this.cache = options.cache ?? new ResolutionCache();
    }

    enrich(documents: readonly SourceDocument[]): EnrichmentResult {
        this.cache.clear();

        const resolvers = createFieldResolvers(this.loaded.dictionaries, this.cache, {
            threshold: this.options.matching.fuzzyThreshold,
            similarity: getSimilarity(this.options.matching.similarity),
            hierarchy: this.loaded.hierarchy,
        });

        const startTime = Date.now();
        const result = enrichDocuments(documents, resolvers, this.options.bindings);

        const stats: MatchStats = {
            ...computeMatchStats(result.documents),
            skipped: result.skipped,
            dictionary_errors: [...this.loaded.errors],
            cache: this.cache.stats(),
        };

        logger.debug({ cache: stats.cache }, 'Resolution cache');
        logger.info(
            { documents: stats.documents, entities: result.entities, skipped: result.skipped, elapsedMs: Date.now() - startTime },
            'Documents enriched'
        );

        return { documents: result.documents, stats };
    }
}

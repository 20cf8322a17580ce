/**
 * Public API.
 */
export * from './types/index.js';

export { normalize, candidateTerms, expandAcronyms, searchVariants } from './nlp/normalizer.js';
export { CANCER_ACRONYMS } from './nlp/acronyms.js';
export {
    getSimilarity,
    levenshteinDistance,
    levenshteinSimilarity,
    sequenceRatio,
    type SimilarityFn,
} from './nlp/similarity.js';

export { buildDictionary, emptyDictionary, type BuildOptions } from './dictionary/builder.js';
export { loadDictionary, type LoadOptions } from './dictionary/loader.js';
export { hierarchyFromLabelPaths, hierarchyFromParents } from './dictionary/hierarchy.js';

export { resolve, DEFAULT_FUZZY_THRESHOLD, type CascadeOptions } from './resolution/cascade.js';
export { ResolutionCache, type CacheStats } from './resolution/cache.js';
export {
    FieldResolver,
    FIELD_PROFILES,
    createFieldResolvers,
    type FieldDictionaries,
    type FieldProfile,
    type FieldResolvers,
} from './resolution/field-resolvers.js';

export {
    mergeEntity,
    enrichEntity,
    enrichDocuments,
    extractFieldTerms,
    toFieldRecord,
    pickBest,
    type FieldResolutions,
    type MergeOptions,
    type FieldBindings,
} from './merge/unified-merge.js';

export {
    EnrichmentEngine,
    collectSeeds,
    loadDictionaries,
    type LoadedDictionaries,
    type SourcePlan,
} from './pipeline/engine.js';
export { runEnrich, runSnapshot, readDocuments, InputError } from './pipeline/enrichment-pipeline.js';

export * from './sources/index.js';
export { OntologyDatabase } from './storage/database.js';
export { computeMatchStats, collectUnknowns, exportEnrichment, type MatchStats } from './exporters/export.js';
export { HttpClient, HttpError, createHttpClient } from './utils/http-client.js';
export { ConfigError, resolveConfig, mergeConfig, loadConfigFile } from './utils/config.js';
export { initLogger, getLogger } from './utils/logger.js';

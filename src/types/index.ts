/**
 * Barrel export for all shared types.
 */
export { FIELD_TYPES } from './ontology.js';
export type {
    FieldType,
    JsonValue,
    JsonObject,
    CanonicalEntity,
    RawOntologyRecord,
    SourceExtract,
    FuzzyKey,
    Dictionary,
    DiseaseHierarchy,
} from './ontology.js';
export { MATCH_STATUS_RANK } from './resolution.js';
export type { MatchStatus, MatchStage, ResolutionResult } from './resolution.js';
export type { SourceEntity, SourceDocument, OntologyFieldRecord, EnrichedEntity } from './enriched.js';
export type { LookupSource, BulkLookupSource, SearchLookupSource } from './lookup-source.js';
export { DEFAULT_CONFIG, VERSION } from './config.js';
export type {
    OntoResolveConfig,
    LogLevel,
    SimilarityAlgorithm,
    SourceSpec,
    FieldSources,
    FieldBinding,
    MatchingConfig,
    HttpConfig,
    RunRecord,
} from './config.js';

import type {
    EnrichedEntity,
    FieldBinding,
    FieldType,
    JsonObject,
    JsonValue,
    OntologyFieldRecord,
    ResolutionResult,
    SourceDocument,
    SourceEntity,
} from '../types/index.js';
import { FIELD_TYPES, MATCH_STATUS_RANK } from '../types/index.js';
import type { FieldResolvers } from '../resolution/field-resolvers.js';
import { isJsonObject } from '../utils/json-schema.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

export const ONTOLOGY_KEY = 'ontology';
export const NOTES_KEY = 'processing_notes';
export const ENTRIES_KEY = 'extractedDrugs';

export type FieldResolutions = Partial<Record<FieldType, ResolutionResult | readonly ResolutionResult[]>>;

export interface MergeOptions {
    notes?: readonly string[];
}

// ─── Field records ────────────────────────────────────────

const FIXED_KEYS = new Set(['input_term', 'primary_id', 'preferred_label', 'match_status', 'confidence', 'source', 'matches']);

function roundConfidence(value: number): number {
    return Math.round(value * 10000) / 10000;
}

export function toFieldRecord(result: ResolutionResult): OntologyFieldRecord {
    const record: OntologyFieldRecord = {
        input_term: result.input_term,
        primary_id: result.matched_entity?.primary_id ?? null,
        preferred_label: result.matched_entity?.preferred_label ?? null,
        match_status: result.match_status,
        confidence: roundConfidence(result.confidence),
        source: result.matched_entity?.source ?? null,
    };

    for (const [key, value] of Object.entries(result.details)) {
        if (!FIXED_KEYS.has(key)) {
            record[key] = value;
        }
    }

    return record;
}

/**
 * Best result of a list: lower status rank, then higher confidence, then
 * earlier position.
 */
export function pickBest(results: readonly ResolutionResult[]): ResolutionResult | undefined {
    let best: ResolutionResult | undefined;
    for (const result of results) {
        if (
            !best ||
            MATCH_STATUS_RANK[result.match_status] < MATCH_STATUS_RANK[best.match_status] ||
            (MATCH_STATUS_RANK[result.match_status] === MATCH_STATUS_RANK[best.match_status] &&
                result.confidence > best.confidence)
        ) {
            best = result;
        }
    }
    return best;
}

function toFieldValue(resolution: ResolutionResult | readonly ResolutionResult[]): OntologyFieldRecord | null {
    if (!isResultList(resolution)) return toFieldRecord(resolution);

    const best = pickBest(resolution);
    if (!best) return null;

    const record = toFieldRecord(best);
    if (resolution.length > 1) {
        record['matches'] = resolution.map((result) => toFieldRecord(result));
    }
    return record;
}

function isResultList(
    resolution: ResolutionResult | readonly ResolutionResult[]
): resolution is readonly ResolutionResult[] {
    return Array.isArray(resolution);
}

// ─── Merge ────────────────────────────────────────────────

/**
 * Copy `source` and attach one record per resolved field under `ontology`.
 * Fields not in `resolutions` are left out. An existing `ontology` object
 * keeps its keys; a field key already there is not overwritten.
 */
export function mergeEntity(source: SourceEntity, resolutions: FieldResolutions, options: MergeOptions = {}): EnrichedEntity {
    const existing = source[ONTOLOGY_KEY];
    if (existing !== undefined && !isJsonObject(existing)) {
        return { ...source };
    }

    const ontology: JsonObject = existing ? { ...existing } : {};
    const notes: string[] = [...(options.notes ?? [])];

    for (const fieldType of FIELD_TYPES) {
        const resolution = resolutions[fieldType];
        if (resolution === undefined) continue;

        const record = toFieldValue(resolution);
        if (!record) continue;

        if (fieldType in ontology) {
            notes.push(`${ONTOLOGY_KEY}.${fieldType} already present; kept existing value`);
            continue;
        }
        ontology[fieldType] = record;
    }

    if (notes.length > 0) {
        const previous = ontology[NOTES_KEY];
        const kept = Array.isArray(previous) ? previous.filter((note): note is string => typeof note === 'string') : [];
        ontology[NOTES_KEY] = [...kept, ...notes];
    }

    return { ...source, [ONTOLOGY_KEY]: ontology };
}

// ─── Field extraction ─────────────────────────────────────

export type FieldTerms =
    | { kind: 'absent' }
    | { kind: 'terms'; key: string; terms: string[] }
    | { kind: 'malformed'; key: string };

function termsOf(value: JsonValue | undefined): string[] | 'malformed' | null {
    if (value === undefined || value === null) return null;
    if (typeof value === 'string') {
        return value.trim() ? [value] : null;
    }
    if (Array.isArray(value)) {
        if (!value.every((item) => typeof item === 'string' || item === null)) return 'malformed';
        const terms = value.filter((item): item is string => typeof item === 'string' && item.trim().length > 0);
        return terms.length > 0 ? terms : null;
    }
    return 'malformed';
}

/**
 * Terms of the first key in `keys` that holds a value.
 */
export function extractFieldTerms(source: SourceEntity, keys: readonly string[]): FieldTerms {
    for (const key of keys) {
        const terms = termsOf(source[key]);
        if (terms === null) continue;
        if (terms === 'malformed') return { kind: 'malformed', key };
        return { kind: 'terms', key, terms };
    }
    return { kind: 'absent' };
}

/**
 * Every raw term an entity carries for a field, alternates included.
 * Used to seed search sources.
 */
export function collectFieldTerms(source: SourceEntity, binding: FieldBinding): string[] {
    const out: string[] = [];
    for (const keys of [binding.keys, ...(binding.alternateKeys ?? []).map((key) => [key])]) {
        const found = extractFieldTerms(source, keys);
        if (found.kind === 'terms') out.push(...found.terms);
    }
    return out;
}

// ─── Enrichment ───────────────────────────────────────────

export type FieldBindings = Readonly<Record<FieldType, FieldBinding>>;

export interface EnrichOutcome {
    entity: EnrichedEntity;
    skipped: boolean;
}

function resolveTerms(
    resolvers: FieldResolvers,
    fieldType: FieldType,
    terms: readonly string[]
): ResolutionResult[] {
    return terms.map((term) => resolvers[fieldType].resolveField(term));
}

/**
 * Try the alternate keys in order while the main terms stayed unknown.
 */
function resolveAlternates(
    source: SourceEntity,
    resolvers: FieldResolvers,
    fieldType: FieldType,
    alternateKeys: readonly string[]
): ResolutionResult | null {
    for (const key of alternateKeys) {
        const found = extractFieldTerms(source, [key]);
        if (found.kind !== 'terms') continue;

        const best = pickBest(resolveTerms(resolvers, fieldType, found.terms));
        if (best && best.match_status !== 'unknown') {
            return { ...best, details: { ...best.details, resolved_from: key } };
        }
    }
    return null;
}

/**
 * Resolve every bound field of one entity and merge the results.
 * Failures are contained to the field that raised them.
 */
export function enrichEntity(
    source: SourceEntity,
    resolvers: FieldResolvers,
    bindings: FieldBindings
): EnrichOutcome {
    const existing = source[ONTOLOGY_KEY];
    if (existing !== undefined && !isJsonObject(existing)) {
        logger.warn({ id: source['id'] ?? null }, 'Entity has a non-object ontology value; left unchanged');
        return { entity: { ...source }, skipped: true };
    }

    const resolutions: FieldResolutions = {};
    const notes: string[] = [];

    for (const fieldType of FIELD_TYPES) {
        const binding = bindings[fieldType];
        const found = extractFieldTerms(source, binding.keys);

        if (found.kind === 'absent') continue;
        if (found.kind === 'malformed') {
            notes.push(`${fieldType}: value of "${found.key}" is not a string or a list of strings`);
            continue;
        }

        try {
            const results = resolveTerms(resolvers, fieldType, found.terms);
            const best = pickBest(results);

            if (best?.match_status === 'unknown' && binding.alternateKeys?.length) {
                const alternate = resolveAlternates(source, resolvers, fieldType, binding.alternateKeys);
                if (alternate) {
                    resolutions[fieldType] = alternate;
                    continue;
                }
            }

            resolutions[fieldType] = results.length === 1 && best ? best : results;
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            logger.error({ fieldType, error: message }, 'Field resolution failed');
            notes.push(`${fieldType}: resolution failed (${message})`);
        }
    }

    return { entity: mergeEntity(source, resolutions, { notes }), skipped: false };
}

export interface EnrichDocumentsResult {
    documents: SourceDocument[];
    entities: number;
    skipped: number;
}

/**
 * Enrich every `extractedDrugs` entry of every document. Documents without
 * that array are copied through.
 */
export function enrichDocuments(
    documents: readonly SourceDocument[],
    resolvers: FieldResolvers,
    bindings: FieldBindings
): EnrichDocumentsResult {
    let entities = 0;
    let skipped = 0;

    const enriched = documents.map((document) => {
        const entries = document[ENTRIES_KEY];
        if (!Array.isArray(entries)) return { ...document };

        const out = entries.map((entry) => {
            if (!isJsonObject(entry)) return entry;
            const outcome = enrichEntity(entry, resolvers, bindings);
            entities++;
            if (outcome.skipped) skipped++;
            return outcome.entity;
        });

        return { ...document, [ENTRIES_KEY]: out };
    });

    return { documents: enriched, entities, skipped };
}

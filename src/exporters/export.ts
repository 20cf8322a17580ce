import { mkdirSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import type { FieldType, JsonObject, JsonValue, MatchStatus, SourceDocument } from '../types/index.js';
import { FIELD_TYPES, MATCH_STATUS_RANK } from '../types/index.js';
import { ENTRIES_KEY, ONTOLOGY_KEY } from '../merge/unified-merge.js';
import type { CacheStats } from '../resolution/cache.js';
import { isJsonObject } from '../utils/json-schema.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

// ─── Types ───────────────────────────────────────────────

export interface FieldMatchStats {
    total: number;
    matched: number;
    match_rate: number;
    by_status: Record<MatchStatus, number>;
}

export interface DictionaryLoadFailure {
    field_type: FieldType;
    dictionary: 'primary' | 'fallback';
    error: string;
    message: string;
}

export interface MatchStats {
    documents: number;
    entities: number;
    skipped: number;
    fields: Record<FieldType, FieldMatchStats>;
    dictionary_errors: DictionaryLoadFailure[];
    cache?: CacheStats;
}

export interface UnknownEntry {
    entry_id: JsonValue;
    drug_name: string | null;
    field: FieldType;
    record: JsonObject;
}

const MATCH_STATUSES = Object.keys(MATCH_STATUS_RANK).filter(isMatchStatus);

function isMatchStatus(value: unknown): value is MatchStatus {
    return typeof value === 'string' && value in MATCH_STATUS_RANK;
}

function emptyFieldStats(): FieldMatchStats {
    const byStatus: Record<MatchStatus, number> = {
        exact_match: 0,
        alias_match: 0,
        fuzzy_match: 0,
        fallback_match: 0,
        unknown: 0,
    };
    return { total: 0, matched: 0, match_rate: 0, by_status: byStatus };
}

// ─── Traversal ───────────────────────────────────────────

/**
 * Visit every entity of every document that carries an `ontology` object.
 */
function forEachEnrichedEntity(
    documents: readonly SourceDocument[],
    visit: (entity: JsonObject, ontology: JsonObject, document: SourceDocument) => void
): void {
    for (const document of documents) {
        const entries = document[ENTRIES_KEY];
        if (!Array.isArray(entries)) continue;

        for (const entry of entries) {
            if (!isJsonObject(entry)) continue;
            const ontology = entry[ONTOLOGY_KEY];
            if (isJsonObject(ontology)) visit(entry, ontology, document);
        }
    }
}

function countEntities(documents: readonly SourceDocument[]): number {
    let count = 0;
    for (const document of documents) {
        const entries = document[ENTRIES_KEY];
        if (Array.isArray(entries)) count += entries.filter(isJsonObject).length;
    }
    return count;
}

// ─── Statistics ──────────────────────────────────────────

/**
 * Per-field match statistics of enriched documents. Works on any enriched
 * file, so `inspect` can report on earlier runs.
 */
export function computeMatchStats(documents: readonly SourceDocument[]): MatchStats {
    const fields: Record<FieldType, FieldMatchStats> = {
        drug: emptyFieldStats(),
        antigen: emptyFieldStats(),
        disease: emptyFieldStats(),
        payload: emptyFieldStats(),
        linker: emptyFieldStats(),
    };

    forEachEnrichedEntity(documents, (_entity, ontology) => {
        for (const fieldType of FIELD_TYPES) {
            const record = ontology[fieldType];
            if (!isJsonObject(record)) continue;

            const status = record['match_status'];
            if (!isMatchStatus(status)) continue;

            const stats = fields[fieldType];
            stats.total++;
            stats.by_status[status]++;
            if (status !== 'unknown') stats.matched++;
        }
    });

    for (const stats of Object.values(fields)) {
        stats.match_rate = stats.total > 0 ? Math.round((stats.matched / stats.total) * 10000) / 10000 : 0;
    }

    return {
        documents: documents.length,
        entities: countEntities(documents),
        skipped: 0,
        fields,
        dictionary_errors: [],
    };
}

/**
 * Every field record that stayed `unknown`, with enough context to find
 * the entry again.
 */
export function collectUnknowns(documents: readonly SourceDocument[], drugKeys: readonly string[] = ['drugName']): UnknownEntry[] {
    const unknowns: UnknownEntry[] = [];

    forEachEnrichedEntity(documents, (entity, ontology, document) => {
        const drugName = drugKeys.map((key) => entity[key]).find((value): value is string => typeof value === 'string') ?? null;

        for (const fieldType of FIELD_TYPES) {
            const record = ontology[fieldType];
            if (isJsonObject(record) && record['match_status'] === 'unknown') {
                unknowns.push({
                    entry_id: document['id'] ?? null,
                    drug_name: drugName,
                    field: fieldType,
                    record,
                });
            }
        }
    });

    return unknowns;
}

/**
 * Human-readable statistics, one line per field.
 */
export function formatMatchStats(stats: MatchStats): string {
    const lines = [
        `  Documents: ${stats.documents}`,
        `  Entities:  ${stats.entities}${stats.skipped > 0 ? ` (${stats.skipped} skipped)` : ''}`,
        '',
        '  Field      Total  Matched  Rate     ' + MATCH_STATUSES.join(' / '),
    ];

    for (const fieldType of FIELD_TYPES) {
        const field = stats.fields[fieldType];
        const counts = MATCH_STATUSES.map((status) => field.by_status[status]).join(' / ');
        lines.push(
            `  ${fieldType.padEnd(9)}  ${String(field.total).padStart(5)}  ${String(field.matched).padStart(7)}  ${(field.match_rate * 100).toFixed(1).padStart(5)}%  ${counts}`
        );
    }

    if (stats.cache) {
        lines.push('', `  Cache: ${stats.cache.hits} hits, ${stats.cache.misses} misses, ${stats.cache.size} keys`);
    }

    for (const failure of stats.dictionary_errors) {
        lines.push(`  ! ${failure.field_type} (${failure.dictionary}): ${failure.error}: ${failure.message}`);
    }

    return lines.join('\n');
}

// ─── Writers ─────────────────────────────────────────────

export function writeJson(outputPath: string, data: unknown): void {
    mkdirSync(dirname(outputPath), { recursive: true });
    writeFileSync(outputPath, JSON.stringify(data, null, 2) + '\n', 'utf-8');
}

/**
 * Default side-file path: "out.json" → "out_unknowns.json".
 */
export function unknownsPathFor(outputPath: string): string {
    return outputPath.endsWith('.json')
        ? `${outputPath.slice(0, -'.json'.length)}_unknowns.json`
        : `${outputPath}_unknowns.json`;
}

export interface ExportPaths {
    out: string;
    unknownsOut?: string;
}

/**
 * Write the enriched documents and the unknowns side file.
 */
export function exportEnrichment(
    documents: readonly SourceDocument[],
    paths: ExportPaths,
    drugKeys?: readonly string[]
): { out: string; unknownsOut: string; unknowns: number } {
    const unknownsOut = paths.unknownsOut ?? unknownsPathFor(paths.out);
    const unknowns = collectUnknowns(documents, drugKeys);

    writeJson(paths.out, documents);
    writeJson(unknownsOut, unknowns);

    logger.info({ out: paths.out, unknownsOut, documents: documents.length, unknowns: unknowns.length }, 'Enrichment exported');

    return { out: paths.out, unknownsOut, unknowns: unknowns.length };
}

import { z } from 'zod';
import type {
    CanonicalEntity,
    Dictionary,
    FieldType,
    FuzzyKey,
    JsonObject,
    SourceExtract,
} from '../types/index.js';
import { normalize } from '../nlp/normalizer.js';
import { SourceFormatError } from '../sources/errors.js';
import { jsonObjectSchema } from '../utils/json-schema.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

/**
 * Lenient record schema: every field may be missing, ids may be numbers,
 * aliases may be a single string. Required-field checks happen afterwards
 * so we can tell "this record is incomplete" from "this source is broken".
 */
const rawRecordSchema = z.object({
    id: z
        .union([z.string(), z.number()])
        .nullish()
        .transform((value) => (value === null || value === undefined ? '' : String(value).trim())),
    label: z
        .string()
        .nullish()
        .transform((value) => value?.trim() ?? ''),
    aliases: z
        .union([z.string(), z.array(z.unknown())])
        .nullish()
        .transform((value) => {
            if (value === null || value === undefined) return [];
            if (typeof value === 'string') return [value];
            return value.filter((alias): alias is string => typeof alias === 'string');
        }),
    attributes: jsonObjectSchema.nullish().transform((value) => value ?? {}),
});

interface ParsedRecord {
    id: string;
    label: string;
    aliases: string[];
    attributes: JsonObject;
}

export interface BuildOptions {
    /** Field restriction, e.g. "only antibody-drug conjugates" */
    accept?: (entity: CanonicalEntity) => boolean;
}

interface RankedEntity {
    entity: CanonicalEntity;
    rank: number;
}

/**
 * Tie-break policy: earlier source first, then the smaller primary_id.
 */
function precedes(a: RankedEntity, b: RankedEntity): boolean {
    if (a.rank !== b.rank) return a.rank < b.rank;
    return a.entity.primary_id < b.entity.primary_id;
}

function compareRanked(a: RankedEntity, b: RankedEntity): number {
    if (precedes(a, b)) return -1;
    if (precedes(b, a)) return 1;
    return 0;
}

/**
 * Validate one extract. Incomplete records are skipped; a source where no
 * record has an id (or none has a label) cannot build anything.
 */
function parseExtract(fieldType: FieldType, extract: SourceExtract): ParsedRecord[] {
    if (extract.records.length === 0) {
        logger.warn({ fieldType, source: extract.source }, 'Source returned no records');
        return [];
    }

    const parsed: ParsedRecord[] = [];
    let withId = 0;
    let withLabel = 0;

    for (const raw of extract.records) {
        const result = rawRecordSchema.safeParse(raw);
        if (!result.success) continue;

        const record = result.data;
        if (record.id) withId++;
        if (record.label) withLabel++;
        if (record.id && record.label) {
            parsed.push(record);
        }
    }

    if (withId === 0) {
        throw new SourceFormatError(
            `Source "${extract.source}" has no record with an id (${fieldType})`,
            extract.source,
            fieldType
        );
    }
    if (withLabel === 0) {
        throw new SourceFormatError(
            `Source "${extract.source}" has no record with a label (${fieldType})`,
            extract.source,
            fieldType
        );
    }

    const skipped = extract.records.length - parsed.length;
    if (skipped > 0) {
        logger.debug({ fieldType, source: extract.source, skipped }, 'Skipped records missing id or label');
    }

    return parsed;
}

function addAliases(entity: CanonicalEntity, aliases: readonly string[]): void {
    const labelKey = normalize(entity.preferred_label, entity.field_type);
    const known = new Set(entity.aliases);

    for (const alias of aliases) {
        const key = normalize(alias, entity.field_type);
        if (!key || key === labelKey || known.has(key)) continue;
        known.add(key);
        entity.aliases.push(key);
    }
}

/**
 * A record whose primary_id is already known: the first one keeps its
 * label, the newcomer's label and aliases become aliases, and attributes
 * only fill keys that are still missing.
 */
function mergeDuplicate(existing: CanonicalEntity, record: ParsedRecord): void {
    addAliases(existing, [record.label, ...record.aliases]);

    for (const [key, value] of Object.entries(record.attributes)) {
        if (!(key in existing.attributes)) {
            existing.attributes[key] = value;
        }
    }
}

/**
 * Build the lookup tables for one field type.
 *
 * @param fieldType - Field the dictionary serves
 * @param extracts - Source extracts, highest priority first
 * @throws SourceFormatError when an extract lacks ids or labels entirely
 */
export function buildDictionary(
    fieldType: FieldType,
    extracts: readonly SourceExtract[],
    options: BuildOptions = {}
): Dictionary {
    const byId = new Map<string, RankedEntity>();

    extracts.forEach((extract, rank) => {
        for (const record of parseExtract(fieldType, extract)) {
            const existing = byId.get(record.id);
            if (existing) {
                mergeDuplicate(existing.entity, record);
                continue;
            }

            const entity: CanonicalEntity = {
                field_type: fieldType,
                primary_id: record.id,
                preferred_label: record.label,
                aliases: [],
                attributes: { ...record.attributes },
                source: extract.source,
            };
            addAliases(entity, record.aliases);
            byId.set(record.id, { entity, rank });
        }
    });

    const accept = options.accept ?? (() => true);
    const kept = [...byId.values()].filter(({ entity }) => accept(entity));
    const rejected = byId.size - kept.length;

    const exact = new Map<string, RankedEntity>();
    const aliasLists = new Map<string, RankedEntity[]>();
    const fuzzyKeys: FuzzyKey[] = [];

    for (const item of kept) {
        const labelKey = normalize(item.entity.preferred_label, fieldType);
        const current = exact.get(labelKey);
        if (labelKey && (!current || precedes(item, current))) {
            exact.set(labelKey, item);
        }

        for (const alias of item.entity.aliases) {
            const list = aliasLists.get(alias);
            if (list) {
                list.push(item);
            } else {
                aliasLists.set(alias, [item]);
            }
        }

        for (const key of new Set([labelKey, ...item.entity.aliases])) {
            if (key) fuzzyKeys.push({ key, entity: item.entity });
        }
    }

    const aliasIndex = new Map<string, readonly CanonicalEntity[]>();
    for (const [alias, list] of aliasLists) {
        aliasIndex.set(alias, [...list].sort(compareRanked).map(({ entity }) => entity));
    }

    const exactIndex = new Map<string, CanonicalEntity>();
    for (const [key, { entity }] of exact) {
        exactIndex.set(key, entity);
    }

    logger.info(
        {
            fieldType,
            entities: kept.length,
            labels: exactIndex.size,
            aliases: aliasIndex.size,
            rejected,
            sources: extracts.map((extract) => extract.source),
        },
        'Dictionary built'
    );

    return {
        field_type: fieldType,
        exact_index: exactIndex,
        alias_index: aliasIndex,
        entities: kept.map(({ entity }) => entity),
        fuzzy_keys: fuzzyKeys,
        sources: extracts.map((extract) => extract.source),
    };
}

/**
 * A dictionary with nothing in it. Used for a field type whose sources
 * failed to load, so its terms resolve to `unknown` instead of aborting.
 */
export function emptyDictionary(fieldType: FieldType): Dictionary {
    return {
        field_type: fieldType,
        exact_index: new Map(),
        alias_index: new Map(),
        entities: [],
        fuzzy_keys: [],
        sources: [],
    };
}

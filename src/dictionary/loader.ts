import type {
    Dictionary,
    FieldType,
    LookupSource,
    RawOntologyRecord,
    SearchLookupSource,
    SourceExtract,
} from '../types/index.js';
import { normalize, searchVariants } from '../nlp/normalizer.js';
import { SourceUnavailableError, isSourceError } from '../sources/errors.js';
import { getLogger } from '../utils/logger.js';
import { buildDictionary, type BuildOptions } from './builder.js';

const logger = getLogger();

export interface LoadOptions extends BuildOptions {
    /** Distinct raw terms of the run; queried against search sources */
    seeds?: readonly string[];

    /** Search variants shorter than this are not queried */
    minSearchLength?: number;
}

function withSeedAlias(record: RawOntologyRecord, seed: string): RawOntologyRecord {
    const aliases = record.aliases === null || record.aliases === undefined
        ? []
        : typeof record.aliases === 'string' ? [record.aliases] : record.aliases;
    return { ...record, aliases: [...aliases, seed] };
}

/**
 * Query a search source for each distinct seed, trying its search variants
 * in order and skipping variants shorter than `minSearchLength`. The first
 * hit is kept and the seed becomes one of its aliases, so the seed resolves
 * by alias even when the source's label differs.
 */
async function searchExtract(
    fieldType: FieldType,
    source: SearchLookupSource,
    seeds: readonly string[],
    minSearchLength: number
): Promise<RawOntologyRecord[]> {
    const records: RawOntologyRecord[] = [];
    const seenSeeds = new Set<string>();
    const firstHits = new Map<string, RawOntologyRecord | null>();

    for (const seed of seeds) {
        const seedKey = normalize(seed, fieldType);
        if (!seedKey || seenSeeds.has(seedKey)) continue;
        seenSeeds.add(seedKey);

        for (const variant of searchVariants(seed)) {
            if (variant.length < minSearchLength) continue;

            const queryKey = normalize(variant, fieldType);
            let hit = firstHits.get(queryKey);
            if (hit === undefined) {
                const [first] = await source.search(variant);
                hit = first ?? null;
                firstHits.set(queryKey, hit);
            }

            if (hit) {
                records.push(withSeedAlias(hit, seed.trim()));
                break;
            }
        }
    }

    logger.debug({ fieldType, source: source.name, queries: firstHits.size, hits: records.length }, 'Search source queried');
    return records;
}

async function fetchExtract(
    fieldType: FieldType,
    source: LookupSource,
    options: LoadOptions
): Promise<SourceExtract> {
    try {
        const records = source.kind === 'bulk'
            ? await source.fetchAll()
            : await searchExtract(fieldType, source, options.seeds ?? [], options.minSearchLength ?? 3);
        return { source: source.name, records };
    } catch (error) {
        if (isSourceError(error)) throw error;
        throw new SourceUnavailableError(
            `Source "${source.name}" failed: ${error instanceof Error ? error.message : String(error)}`,
            source.name,
            { cause: error, fieldType }
        );
    }
}

/**
 * Pull every source of a field type (in priority order) and build its
 * dictionary.
 *
 * @throws SourceFormatError | SourceUnavailableError for the field type
 */
export async function loadDictionary(
    fieldType: FieldType,
    sources: readonly LookupSource[],
    options: LoadOptions = {}
): Promise<Dictionary> {
    const extracts: SourceExtract[] = [];

    for (const source of sources) {
        extracts.push(await fetchExtract(fieldType, source, options));
    }

    return buildDictionary(fieldType, extracts, { accept: options.accept });
}

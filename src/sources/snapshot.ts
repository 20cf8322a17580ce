import type { BulkLookupSource, Dictionary, FieldType, RawOntologyRecord } from '../types/index.js';
import type { DictionaryRole, OntologyDatabase, StoredEntity } from '../storage/database.js';

/**
 * One source's share of a stored dictionary. Entities come back under the
 * source name and priority they were built with, so rebuilding from the
 * snapshot applies the same tie-breaks.
 */
export class SnapshotSource implements BulkLookupSource {
    readonly kind = 'bulk';

    constructor(
        readonly name: string,
        private readonly entities: readonly StoredEntity[]
    ) {}

    async fetchAll(): Promise<RawOntologyRecord[]> {
        return this.entities.map(({ entity }) => ({
            id: entity.primary_id,
            label: entity.preferred_label,
            aliases: [...entity.aliases],
            attributes: { ...entity.attributes },
        }));
    }
}

/**
 * Snapshot sources of one dictionary, in source priority order.
 */
export function snapshotSources(db: OntologyDatabase, fieldType: FieldType, role: DictionaryRole = 'primary'): SnapshotSource[] {
    const byRank = new Map<number, StoredEntity[]>();

    for (const stored of db.getEntities(fieldType, role)) {
        const group = byRank.get(stored.sourceRank);
        if (group) {
            group.push(stored);
        } else {
            byRank.set(stored.sourceRank, [stored]);
        }
    }

    return [...byRank.entries()]
        .sort(([a], [b]) => a - b)
        .map(([, group]) => new SnapshotSource(group[0]?.entity.source ?? 'snapshot', group));
}

/**
 * Persist a built dictionary under its role.
 */
export function saveDictionary(db: OntologyDatabase, dictionary: Dictionary, role: DictionaryRole = 'primary'): void {
    const stored = dictionary.entities.map((entity) => ({
        entity,
        sourceRank: Math.max(0, dictionary.sources.indexOf(entity.source)),
    }));
    db.replaceEntities(dictionary.field_type, role, stored);
}

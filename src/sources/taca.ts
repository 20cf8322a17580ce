import { z } from 'zod';
import type { BulkLookupSource, JsonObject, RawOntologyRecord } from '../types/index.js';
import { SourceFormatError } from './errors.js';
import { idSlug, readJsonFile } from './utils.js';

const tacaEntrySchema = z.object({
    id: z.string().trim().min(1).optional(),
    name: z.string().trim().min(1),
    synonyms: z.array(z.string()).default([]),
    subtype: z.string().optional(),
    family: z.string().optional(),
});

const tacaListSchema = z.array(tacaEntrySchema);

export type TacaEntry = z.infer<typeof tacaEntrySchema>;

/**
 * Curated tumour-associated carbohydrate antigens (Tn, sialyl-Tn,
 * Globo H, GD2, …). Fallback for antigens that are not gene products.
 */
export class TacaSource implements BulkLookupSource {
    readonly kind = 'bulk';
    readonly name = 'taca';

    constructor(private readonly path: string) {}

    async fetchAll(): Promise<RawOntologyRecord[]> {
        const data = await readJsonFile(this.path, this.name);
        const parsed = tacaListSchema.safeParse(data);
        if (!parsed.success) {
            throw new SourceFormatError(
                `TACA list is invalid: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`,
                this.name,
                'antigen'
            );
        }
        return parsed.data.map(tacaRecord);
    }
}

export function tacaRecord(entry: TacaEntry): RawOntologyRecord {
    const attributes: JsonObject = {};
    if (entry.subtype) attributes['subtype'] = entry.subtype;
    if (entry.family) attributes['family'] = entry.family;

    return {
        id: entry.id ?? `TACA:${idSlug(entry.name)}`,
        label: entry.name,
        aliases: entry.synonyms,
        attributes,
    };
}

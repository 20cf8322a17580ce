import { z } from 'zod';
import type { BulkLookupSource, DiseaseHierarchy, RawOntologyRecord } from '../types/index.js';
import { hierarchyFromLabelPaths } from '../dictionary/hierarchy.js';
import { SourceFormatError } from './errors.js';
import { readJsonFile } from './utils.js';

const doidEntrySchema = z.object({
    label: z.string().trim().min(1),
    paths_to_root: z.array(z.array(z.string())).optional(),
    label_paths_to_root: z.array(z.array(z.string())).optional(),
});

const doidFileSchema = z.record(z.string(), doidEntrySchema);

export type DoidEntry = z.infer<typeof doidEntrySchema>;

/**
 * Synonyms for a disease label the way literature phrases it:
 * cancer ↔ carcinoma, tumor → cancer, with "malignant" dropped.
 */
export function generateDiseaseSynonyms(label: string): string[] {
    const variants = [
        label.replace(/\bcancer\b/gi, 'carcinoma'),
        label.replace(/\bcarcinoma\b/gi, 'cancer'),
        label.replace(/\btumou?r\b/gi, 'cancer'),
        label.replace(/\bmalignant\s+/gi, ''),
        label.replace(/\bmalignancy\b/gi, '').trim(),
    ];
    return [...new Set(variants.filter((variant) => variant && variant !== label))];
}

/**
 * DOID cancer-leaf file: `{ "DOID:x": { label, paths_to_root,
 * label_paths_to_root } }`. Besides the records it yields the disease
 * hierarchy, available after `fetchAll()`.
 */
export class DoidLeafPathsSource implements BulkLookupSource {
    readonly kind = 'bulk';
    readonly name = 'doid';

    private entries = new Map<string, DoidEntry>();

    constructor(private readonly path: string) {}

    async fetchAll(): Promise<RawOntologyRecord[]> {
        const data = await readJsonFile(this.path, this.name);
        const parsed = doidFileSchema.safeParse(data);
        if (!parsed.success) {
            throw new SourceFormatError(
                `DOID file is invalid: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`,
                this.name,
                'disease'
            );
        }

        this.entries = new Map(Object.entries(parsed.data));

        return [...this.entries].map(([id, entry]): RawOntologyRecord => ({
            id,
            label: entry.label,
            aliases: generateDiseaseSynonyms(entry.label),
            attributes: entry.paths_to_root ? { paths_to_root: entry.paths_to_root } : {},
        }));
    }

    hierarchy(): DiseaseHierarchy {
        return hierarchyFromLabelPaths(this.entries);
    }
}

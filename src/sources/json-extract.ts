import type { BulkLookupSource } from '../types/index.js';
import { SourceFormatError } from './errors.js';
import { isJsonObject } from '../utils/json-schema.js';
import { readJsonFile } from './utils.js';

/**
 * Raw records from a local JSON file: either an array of
 * `{ id, label, aliases?, attributes? }` or an object keyed by id.
 * Record validation is left to the dictionary builder.
 */
export class JsonExtractSource implements BulkLookupSource {
    readonly kind = 'bulk';
    readonly name: string;

    constructor(
        private readonly path: string,
        name?: string
    ) {
        this.name = name ?? `json:${path}`;
    }

    async fetchAll(): Promise<readonly unknown[]> {
        const data = await readJsonFile(this.path, this.name);

        if (Array.isArray(data)) {
            return data.filter(isJsonObject);
        }

        if (isJsonObject(data)) {
            return Object.entries(data).flatMap(([id, value]) =>
                isJsonObject(value) ? [{ id, ...value }] : []
            );
        }

        throw new SourceFormatError(`${this.name}: expected an array or an object of records`, this.name);
    }
}

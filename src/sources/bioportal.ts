import { z } from 'zod';
import type { JsonObject, RawOntologyRecord, SearchLookupSource } from '../types/index.js';
import type { HttpClient } from '../utils/http-client.js';
import { getApiKey } from '../utils/config.js';
import { getLogger } from '../utils/logger.js';
import { SourceFormatError, SourceUnavailableError } from './errors.js';

const logger = getLogger();

const BIOPORTAL_BASE_URL = 'https://data.bioontology.org';
export const BIOPORTAL_API_KEY_ENV = 'BIOPORTAL_API_KEY';

const classSchema = z.object({
    '@id': z.string(),
    prefLabel: z.string().nullish(),
    synonym: z.array(z.string()).nullish(),
    notation: z.string().nullish(),
    definition: z.array(z.string()).nullish(),
});

const searchResponseSchema = z.object({
    collection: z.array(classSchema),
});

type BioPortalClass = z.infer<typeof classSchema>;

export interface BioPortalSourceOptions {
    apiKey?: string;
    baseUrl?: string;
    pageSize?: number;
}

/**
 * Local part of a class IRI: ".../obo/NCIT_C4872" → "C4872",
 * ".../obo/DOID_1612" → "1612".
 */
export function localId(iri: string): string {
    const tail = iri.split(/[/#]/).pop() ?? iri;
    const underscore = tail.indexOf('_');
    return underscore >= 0 ? tail.slice(underscore + 1) : tail;
}

/**
 * BioPortal class search restricted to one ontology (NCIT, DOID, …).
 */
export class BioPortalSource implements SearchLookupSource {
    readonly kind = 'search';
    readonly name: string;
    private readonly baseUrl: string;
    private readonly ontology: string;

    constructor(
        private readonly http: HttpClient,
        ontology: string,
        private readonly options: BioPortalSourceOptions = {}
    ) {
        this.ontology = ontology.toUpperCase();
        this.name = `bioportal:${this.ontology}`;
        this.baseUrl = options.baseUrl ?? BIOPORTAL_BASE_URL;
    }

    async search(term: string): Promise<RawOntologyRecord[]> {
        const apiKey = this.options.apiKey ?? getApiKey(BIOPORTAL_API_KEY_ENV);
        if (!apiKey) {
            throw new SourceUnavailableError(`${BIOPORTAL_API_KEY_ENV} is not set`, this.name);
        }

        const params = new URLSearchParams({
            q: term,
            ontologies: this.ontology,
            pagesize: String(this.options.pageSize ?? 5),
        });
        const url = `${this.baseUrl}/search?${params}`;
        logger.debug({ url }, 'BioPortal search');

        const response = await this.http.get(url, {
            source: 'bioportal',
            headers: { Authorization: `apikey token=${apiKey}` },
        });

        const parsed = searchResponseSchema.safeParse(response.data);
        if (!parsed.success) {
            throw new SourceFormatError(
                `Unexpected BioPortal response: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`,
                this.name
            );
        }

        return parsed.data.collection.map((item) => this.toRecord(item));
    }

    private toRecord(item: BioPortalClass): RawOntologyRecord {
        const attributes: JsonObject = { iri: item['@id'], ontology: this.ontology };
        const definition = item.definition?.[0];
        if (definition) attributes['definition'] = definition;

        return {
            id: `${this.ontology}:${item.notation ?? localId(item['@id'])}`,
            label: item.prefLabel ?? null,
            aliases: item.synonym ?? [],
            attributes,
        };
    }
}

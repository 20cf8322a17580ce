import { z } from 'zod';
import type { JsonObject, RawOntologyRecord, SearchLookupSource } from '../types/index.js';
import type { HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { SourceFormatError } from './errors.js';

const logger = getLogger();

const CHEMBL_BASE_URL = 'https://www.ebi.ac.uk/chembl/api/data';

// max_phase comes back as "4.0" from newer API versions
const phaseSchema = z
    .union([z.number(), z.string()])
    .nullish()
    .transform((value) => {
        if (value === null || value === undefined) return null;
        const phase = typeof value === 'number' ? value : parseFloat(value);
        return isNaN(phase) ? null : phase;
    });

const moleculeSchema = z.object({
    molecule_chembl_id: z.string(),
    pref_name: z.string().nullish(),
    molecule_type: z.string().nullish(),
    max_phase: phaseSchema,
    first_approval: z.number().nullish(),
    molecule_synonyms: z
        .array(z.object({ molecule_synonym: z.string(), syn_type: z.string().nullish() }))
        .nullish(),
});

const searchResponseSchema = z.object({
    molecules: z.array(moleculeSchema),
});

const mechanismResponseSchema = z.object({
    mechanisms: z.array(
        z.object({
            mechanism_of_action: z.string().nullish(),
            action_type: z.string().nullish(),
            target_chembl_id: z.string().nullish(),
        })
    ),
});

const indicationResponseSchema = z.object({
    drug_indications: z.array(
        z.object({
            efo_id: z.string().nullish(),
            efo_term: z.string().nullish(),
            mesh_id: z.string().nullish(),
            mesh_heading: z.string().nullish(),
            max_phase_for_ind: phaseSchema,
        })
    ),
});

type ChemblMolecule = z.infer<typeof moleculeSchema>;

export interface ChemblSourceOptions {
    /** Also fetch mechanisms and indications for each hit */
    withMechanisms?: boolean;
    baseUrl?: string;
    limit?: number;
}

function parse<S extends z.ZodTypeAny>(schema: S, data: unknown, what: string): z.infer<S> {
    const parsed = schema.safeParse(data);
    if (!parsed.success) {
        throw new SourceFormatError(
            `Unexpected ChEMBL ${what} response: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`,
            'chembl'
        );
    }
    return parsed.data;
}

function compact(values: ReadonlyArray<string | null | undefined>): string[] {
    return [...new Set(values.filter((value): value is string => typeof value === 'string' && value.length > 0))];
}

/**
 * ChEMBL molecule search. Candidates keep ChEMBL's relevance order.
 */
export class ChemblSource implements SearchLookupSource {
    readonly kind = 'search';
    readonly name = 'chembl';
    private readonly baseUrl: string;

    constructor(
        private readonly http: HttpClient,
        private readonly options: ChemblSourceOptions = {}
    ) {
        this.baseUrl = options.baseUrl ?? CHEMBL_BASE_URL;
    }

    async search(term: string): Promise<RawOntologyRecord[]> {
        const params = new URLSearchParams({ q: term, limit: String(this.options.limit ?? 5) });
        const url = `${this.baseUrl}/molecule/search.json?${params}`;
        logger.debug({ url }, 'ChEMBL search');

        const response = await this.http.get(url, { source: this.name });
        const { molecules } = parse(searchResponseSchema, response.data, 'search');

        const usable = molecules.filter((molecule) => molecule.pref_name || molecule.max_phase !== null);
        const records: RawOntologyRecord[] = [];

        for (const [position, molecule] of usable.entries()) {
            const record = this.toRecord(molecule);
            if (this.options.withMechanisms && position === 0 && record.attributes) {
                Object.assign(record.attributes, await this.annotations(molecule.molecule_chembl_id));
            }
            records.push(record);
        }

        return records;
    }

    private toRecord(molecule: ChemblMolecule): RawOntologyRecord {
        const synonyms = compact((molecule.molecule_synonyms ?? []).map((synonym) => synonym.molecule_synonym));
        const attributes: JsonObject = {};

        if (molecule.molecule_type) attributes['molecule_type'] = molecule.molecule_type;
        if (molecule.max_phase !== null) attributes['max_phase'] = molecule.max_phase;
        if (molecule.first_approval) attributes['first_approval'] = molecule.first_approval;

        return {
            id: molecule.molecule_chembl_id,
            label: molecule.pref_name ?? synonyms[0] ?? null,
            aliases: synonyms,
            attributes,
        };
    }

    /**
     * Mechanisms of action, target ids and indications of one molecule.
     */
    private async annotations(chemblId: string): Promise<JsonObject> {
        const params = new URLSearchParams({ molecule_chembl_id: chemblId });

        const mechanismResponse = await this.http.get(`${this.baseUrl}/mechanism.json?${params}`, { source: this.name });
        const { mechanisms } = parse(mechanismResponseSchema, mechanismResponse.data, 'mechanism');

        const indicationResponse = await this.http.get(`${this.baseUrl}/drug_indication.json?${params}`, { source: this.name });
        const { drug_indications: indications } = parse(indicationResponseSchema, indicationResponse.data, 'indication');

        return {
            mechanism_of_action: compact(mechanisms.map((mechanism) => mechanism.mechanism_of_action)),
            targets: compact(mechanisms.map((mechanism) => mechanism.target_chembl_id)),
            indications: indications.map((indication) => ({
                efo_id: indication.efo_id ?? null,
                efo_term: indication.efo_term ?? null,
                mesh_id: indication.mesh_id ?? null,
                mesh_heading: indication.mesh_heading ?? null,
                max_phase_for_ind: indication.max_phase_for_ind,
            })),
        };
    }
}

import type {
    CanonicalEntity,
    Dictionary,
    DiseaseHierarchy,
    FieldType,
    JsonObject,
    ResolutionResult,
} from '../types/index.js';
import { levenshteinSimilarity, type SimilarityFn } from '../nlp/similarity.js';
import { ResolutionCache } from './cache.js';
import { DEFAULT_FUZZY_THRESHOLD, resolve } from './cascade.js';

// ─── Profiles ─────────────────────────────────────────────

/**
 * Per-field behaviour: which entities the dictionary keeps, whether a
 * fallback dictionary is consulted, and which details a match carries.
 */
export interface FieldProfile {
    fieldType: FieldType;
    accept?: (entity: CanonicalEntity) => boolean;
    allowsFallback: boolean;
    details: (entity: CanonicalEntity, context: DetailContext) => JsonObject;
}

export interface DetailContext {
    hierarchy?: DiseaseHierarchy;
}

/**
 * Entities that declare a molecule type must have this one; entities
 * without the attribute (curated local lists) pass.
 */
function moleculeTypeIs(expected: string): (entity: CanonicalEntity) => boolean {
    const wanted = expected.toLowerCase();
    return (entity) => {
        const type = entity.attributes['molecule_type'];
        return typeof type !== 'string' || type.toLowerCase() === wanted;
    };
}

/**
 * Copy the listed attributes that are present, optionally renamed.
 */
function pick(entity: CanonicalEntity, mapping: Record<string, string>): JsonObject {
    const out: JsonObject = {};
    for (const [output, attribute] of Object.entries(mapping)) {
        const value = entity.attributes[attribute];
        if (value !== undefined && value !== null) {
            out[output] = value;
        }
    }
    return out;
}

function synonyms(entity: CanonicalEntity): JsonObject {
    return entity.aliases.length > 0 ? { synonyms: [...entity.aliases] } : {};
}

const smallMolecule = moleculeTypeIs('Small molecule');

export const FIELD_PROFILES: Readonly<Record<FieldType, FieldProfile>> = {
    drug: {
        fieldType: 'drug',
        accept: moleculeTypeIs('Antibody drug conjugate'),
        allowsFallback: true,
        details: (entity) =>
            pick(entity, {
                mechanism_of_action: 'mechanism_of_action',
                indications: 'indications',
                max_phase: 'max_phase',
                first_approval: 'first_approval',
                targets: 'targets',
            }),
    },
    antigen: {
        fieldType: 'antigen',
        allowsFallback: true,
        details: (entity) => ({
            ...pick(entity, {
                ensembl_gene_id: 'ensembl_gene_id',
                locus_type: 'locus_type',
                gene_group: 'gene_group',
                taca_subtype: 'subtype',
                taca_family: 'family',
            }),
            ...synonyms(entity),
        }),
    },
    disease: {
        fieldType: 'disease',
        allowsFallback: true,
        details: (entity, { hierarchy }) => {
            const path = hierarchy?.get(entity.primary_id);
            return {
                ...(path && path.length > 0 ? { hierarchy_path: [...path] } : {}),
                ...synonyms(entity),
            };
        },
    },
    payload: {
        fieldType: 'payload',
        accept: smallMolecule,
        allowsFallback: false,
        details: (entity) => pick(entity, { max_phase: 'max_phase', molecule_type: 'molecule_type' }),
    },
    linker: {
        fieldType: 'linker',
        accept: smallMolecule,
        allowsFallback: false,
        details: (entity) => pick(entity, { max_phase: 'max_phase', molecule_type: 'molecule_type' }),
    },
};

// ─── Resolver ─────────────────────────────────────────────

export interface FieldDictionaries {
    primary: Dictionary;
    fallback?: Dictionary;
}

export interface FieldResolverOptions {
    threshold?: number;
    similarity?: SimilarityFn;
    hierarchy?: DiseaseHierarchy;
}

/**
 * Resolves terms of one field type through the shared cache and adds the
 * field's details to every match.
 */
export class FieldResolver {
    private readonly fallback: Dictionary | undefined;

    constructor(
        readonly profile: FieldProfile,
        private readonly dictionaries: FieldDictionaries,
        private readonly cache: ResolutionCache,
        private readonly options: FieldResolverOptions = {}
    ) {
        this.fallback = profile.allowsFallback ? dictionaries.fallback : undefined;
    }

    get fieldType(): FieldType {
        return this.profile.fieldType;
    }

    resolveField(term: string): ResolutionResult {
        return this.cache.getOrResolve(this.fieldType, term, (raw) => this.compute(raw));
    }

    private compute(term: string): ResolutionResult {
        const result = resolve(term, this.dictionaries.primary, {
            fallback: this.fallback,
            threshold: this.options.threshold ?? DEFAULT_FUZZY_THRESHOLD,
            similarity: this.options.similarity ?? levenshteinSimilarity,
        });

        if (!result.matched_entity) return result;

        return {
            ...result,
            details: this.profile.details(result.matched_entity, { hierarchy: this.options.hierarchy }),
        };
    }
}

export type FieldResolvers = Record<FieldType, FieldResolver>;

/**
 * Build the five resolvers over one shared cache.
 */
export function createFieldResolvers(
    dictionaries: Readonly<Record<FieldType, FieldDictionaries>>,
    cache: ResolutionCache,
    options: FieldResolverOptions = {}
): FieldResolvers {
    const build = (fieldType: FieldType): FieldResolver =>
        new FieldResolver(FIELD_PROFILES[fieldType], dictionaries[fieldType], cache, {
            ...options,
            hierarchy: fieldType === 'disease' ? options.hierarchy : undefined,
        });

    return {
        drug: build('drug'),
        antigen: build('antigen'),
        disease: build('disease'),
        payload: build('payload'),
        linker: build('linker'),
    };
}


import { describe, it, expect } from 'vitest';
import {
    enrichDocuments,
    enrichEntity,
    extractFieldTerms,
    mergeEntity,
    pickBest,
    toFieldRecord,
    type FieldBindings,
} from '../merge/unified-merge.js';
import { ResolutionCache } from '../resolution/cache.js';
import { createFieldResolvers, type FieldResolvers } from '../resolution/field-resolvers.js';
import { DEFAULT_CONFIG } from '../types/index.js';
import type { JsonObject, MatchStatus, ResolutionResult } from '../types/index.js';
import { fixtureDictionaries } from './fixtures.js';

const bindings: FieldBindings = DEFAULT_CONFIG.bindings;

function result(term: string, status: MatchStatus, confidence: number, primaryId: string | null = null): ResolutionResult {
    return {
        input_term: term,
        normalized_term: term.toLowerCase(),
        matched_entity: primaryId
            ? {
                  field_type: 'antigen',
                  primary_id: primaryId,
                  preferred_label: primaryId.toLowerCase(),
                  aliases: [],
                  attributes: {},
                  source: 'test',
              }
            : null,
        match_status: status,
        confidence,
        matched_key: null,
        stage: null,
        details: {},
    };
}

function resolvers(): FieldResolvers {
    return createFieldResolvers(fixtureDictionaries(), new ResolutionCache());
}

describe('Unified merge', () => {
    describe('toFieldRecord', () => {
        it('should flatten a resolution and round the confidence', () => {
            const record = toFieldRecord({
                ...result('Her-2', 'fuzzy_match', 0.833333333, 'HGNC:3430'),
                details: { locus_type: 'gene', match_status: 'ignored' },
            });

            expect(record).toEqual({
                input_term: 'Her-2',
                primary_id: 'HGNC:3430',
                preferred_label: 'hgnc:3430',
                match_status: 'fuzzy_match',
                confidence: 0.8333,
                source: 'test',
                locus_type: 'gene',
            });
        });

        it('should write nulls for unknown terms', () => {
            expect(toFieldRecord(result('XYZZY123', 'unknown', 0))).toEqual({
                input_term: 'XYZZY123',
                primary_id: null,
                preferred_label: null,
                match_status: 'unknown',
                confidence: 0,
                source: null,
            });
        });
    });

    describe('pickBest', () => {
        it('should prefer the better status, then the higher confidence, then the first', () => {
            const fuzzyLow = result('a', 'fuzzy_match', 0.86, 'X:1');
            const fuzzyHigh = result('b', 'fuzzy_match', 0.9, 'X:2');
            const alias = result('c', 'alias_match', 1, 'X:3');
            const unknown = result('d', 'unknown', 0);

            expect(pickBest([unknown, fuzzyLow, fuzzyHigh])).toBe(fuzzyHigh);
            expect(pickBest([fuzzyHigh, alias])).toBe(alias);
            expect(pickBest([fuzzyLow, result('e', 'fuzzy_match', 0.86, 'X:4')])).toBe(fuzzyLow);
            expect(pickBest([])).toBeUndefined();
        });
    });

    describe('mergeEntity', () => {
        it('should keep every source key and not mutate the source', () => {
            const source: JsonObject = { drugName: 'T-DXd', targetAntigen: 'HER2', extra: { nested: [1, 2] } };
            const snapshot = structuredClone(source);

            const merged = mergeEntity(source, { antigen: result('HER2', 'alias_match', 1, 'HGNC:3430') });

            expect(source).toEqual(snapshot);
            expect(merged['drugName']).toBe('T-DXd');
            expect(merged['extra']).toEqual({ nested: [1, 2] });
            expect(merged['ontology']).toEqual({
                antigen: {
                    input_term: 'HER2',
                    primary_id: 'HGNC:3430',
                    preferred_label: 'hgnc:3430',
                    match_status: 'alias_match',
                    confidence: 1,
                    source: 'test',
                },
            });
        });

        it('should not overwrite a field already under ontology', () => {
            const source: JsonObject = {
                ontology: { disease: { primary_id: 'CURATED:1' }, reviewer: 'test-user' },
            };

            const merged = mergeEntity(source, {
                disease: result('TNBC', 'alias_match', 1, 'DOID:1612'),
                antigen: result('HER2', 'unknown', 0),
            });

            expect(merged['ontology']).toEqual({
                disease: { primary_id: 'CURATED:1' },
                reviewer: 'test-user',
                antigen: {
                    input_term: 'HER2',
                    primary_id: null,
                    preferred_label: null,
                    match_status: 'unknown',
                    confidence: 0,
                    source: null,
                },
                processing_notes: ['ontology.disease already present; kept existing value'],
            });
        });

        it('should leave an entity with a non-object ontology unchanged', () => {
            const source: JsonObject = { drugName: 'x', ontology: 'legacy' };
            const merged = mergeEntity(source, { drug: result('x', 'unknown', 0) });
            expect(merged).toEqual(source);
            expect(merged).not.toBe(source);
        });

        it('should attach every match of a multi-valued field', () => {
            const merged = mergeEntity(
                {},
                {
                    antigen: [
                        result('TROP2', 'fallback_match', 1, 'TACA:TROP2'),
                        result('HER2', 'alias_match', 1, 'HGNC:3430'),
                    ],
                }
            );

            const ontology = merged['ontology'];
            expect(ontology).toMatchObject({
                antigen: {
                    input_term: 'HER2',
                    primary_id: 'HGNC:3430',
                    matches: [
                        { input_term: 'TROP2', match_status: 'fallback_match' },
                        { input_term: 'HER2', match_status: 'alias_match' },
                    ],
                },
            });
        });

        it('should append notes to existing processing notes', () => {
            const merged = mergeEntity(
                { ontology: { processing_notes: ['earlier note'] } },
                {},
                { notes: ['drug: resolution failed (boom)'] }
            );
            expect(merged['ontology']).toEqual({
                processing_notes: ['earlier note', 'drug: resolution failed (boom)'],
            });
        });
    });

    describe('extractFieldTerms', () => {
        it('should use the first key that holds a value', () => {
            expect(extractFieldTerms({ targetAntigen: 'HER2', targetAntigenCanonicalized: '' }, [
                'targetAntigenCanonicalized',
                'targetAntigen',
            ])).toEqual({ kind: 'terms', key: 'targetAntigen', terms: ['HER2'] });
        });

        it('should read lists of strings and skip blanks and nulls', () => {
            expect(extractFieldTerms({ payload: ['DXd', null, ' ', 'SN-38'] }, ['payload'])).toEqual({
                kind: 'terms',
                key: 'payload',
                terms: ['DXd', 'SN-38'],
            });
        });

        it('should flag values that are not strings', () => {
            expect(extractFieldTerms({ linker: 42 }, ['linker'])).toEqual({ kind: 'malformed', key: 'linker' });
            expect(extractFieldTerms({ linker: ['a', 1] }, ['linker'])).toEqual({ kind: 'malformed', key: 'linker' });
        });

        it('should report absent fields', () => {
            expect(extractFieldTerms({ linker: null }, ['linker'])).toEqual({ kind: 'absent' });
        });
    });

    describe('enrichEntity', () => {
        it('should resolve every bound field', () => {
            const { entity, skipped } = enrichEntity(
                {
                    drugName: 'Enhertu',
                    targetAntigen: 'HER2',
                    cancerIndication: 'Triple Negative Breast Cancer',
                    payload: 'Deruxtecan (DXd)',
                },
                resolvers(),
                bindings
            );

            expect(skipped).toBe(false);
            expect(entity['ontology']).toMatchObject({
                drug: { primary_id: 'CHEMBL4297844', match_status: 'alias_match', max_phase: 4 },
                antigen: { primary_id: 'HGNC:3430', match_status: 'alias_match' },
                disease: { primary_id: 'DOID:1612', match_status: 'alias_match' },
                payload: { primary_id: 'CHEMBL4297175', match_status: 'exact_match' },
            });
            expect(entity['ontology']).not.toHaveProperty('linker');
        });

        it('should note malformed field values and resolve the rest', () => {
            const { entity } = enrichEntity({ drugName: 'Enhertu', linker: 42 }, resolvers(), bindings);

            expect(entity['ontology']).toMatchObject({
                drug: { match_status: 'alias_match' },
                processing_notes: ['linker: value of "linker" is not a string or a list of strings'],
            });
        });

        it('should try alternate keys when the main term stays unknown', () => {
            const { entity } = enrichEntity({ drugName: 'ADC-XYZZY', drugAlias: 'DS-8201a' }, resolvers(), bindings);

            expect(entity['ontology']).toEqual({
                drug: {
                    input_term: 'DS-8201a',
                    primary_id: 'CHEMBL4297844',
                    preferred_label: 'trastuzumab deruxtecan',
                    match_status: 'alias_match',
                    confidence: 1,
                    source: 'chembl',
                    mechanism_of_action: ['Receptor protein-tyrosine kinase erbB-2 inhibitor'],
                    max_phase: 4,
                    targets: ['CHEMBL1824'],
                    resolved_from: 'drugAlias',
                },
            });
        });

        it('should keep the unknown main term when alternates do not resolve', () => {
            const { entity } = enrichEntity({ drugName: 'ADC-XYZZY', drugAlias: 'QQQQ' }, resolvers(), bindings);
            expect(entity['ontology']).toMatchObject({ drug: { input_term: 'ADC-XYZZY', match_status: 'unknown' } });
        });

        it('should contain a failing field resolver to its field', () => {
            const failing = resolvers();
            failing.disease.resolveField = () => {
                throw new Error('dictionary corrupted');
            };

            const { entity } = enrichEntity(
                { targetAntigen: 'HER2', cancerIndication: 'NSCLC' },
                failing,
                bindings
            );

            expect(entity['ontology']).toMatchObject({
                antigen: { match_status: 'alias_match' },
                processing_notes: ['disease: resolution failed (dictionary corrupted)'],
            });
            expect(entity['ontology']).not.toHaveProperty('disease');
        });

        it('should skip entities whose ontology is not an object', () => {
            const outcome = enrichEntity({ drugName: 'Enhertu', ontology: ['legacy'] }, resolvers(), bindings);
            expect(outcome.skipped).toBe(true);
            expect(outcome.entity).toEqual({ drugName: 'Enhertu', ontology: ['legacy'] });
        });
    });

    describe('enrichDocuments', () => {
        it('should enrich every extracted entry and count them', () => {
            const documents: JsonObject[] = [
                { id: 'PMC1', extractedDrugs: [{ drugName: 'Enhertu' }, 'stray', { drugName: 'x', ontology: 'bad' }] },
                { id: 'PMC2', title: 'No entries' },
            ];

            const result = enrichDocuments(documents, resolvers(), bindings);

            expect(result.entities).toBe(2);
            expect(result.skipped).toBe(1);
            expect(result.documents[1]).toEqual({ id: 'PMC2', title: 'No entries' });

            const entries = result.documents[0]?.['extractedDrugs'];
            expect(Array.isArray(entries) && entries[1]).toBe('stray');
            expect(documents[0]?.['extractedDrugs']).toEqual([
                { drugName: 'Enhertu' },
                'stray',
                { drugName: 'x', ontology: 'bad' },
            ]);
        });
    });
});

import { buildDictionary, emptyDictionary } from '../dictionary/builder.js';
import type { FieldDictionaries } from '../resolution/field-resolvers.js';
import type { Dictionary, FieldType, RawOntologyRecord } from '../types/index.js';

/**
 * Small hand-made dictionaries shared by the resolution, merge and
 * pipeline tests.
 */

export const HGNC_RECORDS: RawOntologyRecord[] = [
    {
        id: 'HGNC:3430',
        label: 'ERBB2',
        aliases: ['HER2', 'NEU'],
        attributes: { ensembl_gene_id: 'ENSG00000141736', locus_type: 'gene with protein product' },
    },
    {
        id: 'HGNC:3236',
        label: 'EGFR',
        aliases: ['HER1', 'ERBB'],
        attributes: { ensembl_gene_id: 'ENSG00000146648', locus_type: 'gene with protein product' },
    },
];

export const TACA_RECORDS: RawOntologyRecord[] = [
    {
        id: 'TACA:TROP2',
        label: 'TROP2',
        aliases: ['Trop-2'],
        attributes: { subtype: 'glycoprotein epitope', family: 'test-family' },
    },
    {
        id: 'TACA:GLOBO_H',
        label: 'Globo H',
        aliases: [],
        attributes: { subtype: 'glycolipid', family: 'globo-series' },
    },
];

export const DOID_RECORDS: RawOntologyRecord[] = [
    {
        id: 'DOID:1612',
        label: 'breast cancer',
        aliases: ['TNBC', 'triple-negative breast cancer'],
    },
    {
        id: 'DOID:3908',
        label: 'lung non-small cell carcinoma',
        aliases: ['non-small cell lung cancer'],
    },
];

export const DRUG_RECORDS: RawOntologyRecord[] = [
    {
        id: 'CHEMBL4297844',
        label: 'trastuzumab deruxtecan',
        aliases: ['Enhertu', 'DS-8201a'],
        attributes: {
            molecule_type: 'Antibody drug conjugate',
            max_phase: 4,
            mechanism_of_action: ['Receptor protein-tyrosine kinase erbB-2 inhibitor'],
            targets: ['CHEMBL1824'],
        },
    },
];

export const PAYLOAD_RECORDS: RawOntologyRecord[] = [
    {
        id: 'CHEMBL4297175',
        label: 'deruxtecan',
        aliases: ['DXd'],
        attributes: { molecule_type: 'Small molecule', max_phase: 3 },
    },
];

export function dictionaryOf(fieldType: FieldType, source: string, records: RawOntologyRecord[]): Dictionary {
    return buildDictionary(fieldType, [{ source, records }]);
}

/**
 * Dictionaries for all five fields; linker stays empty.
 */
export function fixtureDictionaries(): Record<FieldType, FieldDictionaries> {
    return {
        drug: { primary: dictionaryOf('drug', 'chembl', DRUG_RECORDS) },
        antigen: {
            primary: dictionaryOf('antigen', 'hgnc', HGNC_RECORDS),
            fallback: dictionaryOf('antigen', 'taca', TACA_RECORDS),
        },
        disease: { primary: dictionaryOf('disease', 'doid', DOID_RECORDS) },
        payload: { primary: dictionaryOf('payload', 'chembl', PAYLOAD_RECORDS) },
        linker: { primary: emptyDictionary('linker') },
    };
}

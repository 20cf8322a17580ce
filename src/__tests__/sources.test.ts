import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { BioPortalSource, localId } from '../sources/bioportal.js';
import { ChemblSource } from '../sources/chembl.js';
import { DoidLeafPathsSource, generateDiseaseSynonyms } from '../sources/doid.js';
import { SourceFormatError, SourceUnavailableError } from '../sources/errors.js';
import { HgncTsvSource, parseHgncTsv } from '../sources/hgnc.js';
import { createLookupSource } from '../sources/index.js';
import { JsonExtractSource } from '../sources/json-extract.js';
import { TacaSource } from '../sources/taca.js';
import { idSlug, splitList } from '../sources/utils.js';
import { HttpClient } from '../utils/http-client.js';

function jsonResponse(body: unknown, status = 200) {
    return {
        ok: status >= 200 && status < 300,
        status,
        statusText: status === 200 ? 'OK' : 'Error',
        headers: new Headers({ 'content-type': 'application/json' }),
        json: async () => body,
        text: async () => JSON.stringify(body),
    };
}

describe('Sources', () => {
    let tmpDir: string;

    beforeEach(() => {
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'ontoresolve-sources-'));
    });

    afterEach(() => {
        fs.rmSync(tmpDir, { recursive: true, force: true });
        vi.unstubAllGlobals();
        vi.unstubAllEnvs();
    });

    function writeFile(name: string, content: string): string {
        const file = path.join(tmpDir, name);
        fs.writeFileSync(file, content, 'utf-8');
        return file;
    }

    describe('utils', () => {
        it('should split multi-valued cells', () => {
            expect(splitList('HER2|NEU, "ERBB2"')).toEqual(['HER2', 'NEU', 'ERBB2']);
            expect(splitList('')).toEqual([]);
            expect(splitList(null)).toEqual([]);
        });

        it('should build id slugs', () => {
            expect(idSlug(' Sialyl Tn ')).toBe('SIALYL_TN');
            expect(idSlug('Globo H')).toBe('GLOBO_H');
        });
    });

    describe('HGNC', () => {
        const TSV = [
            'hgnc_id\tsymbol\tname\tlocus_type\tensembl_gene_id\talias_symbol\tprev_symbol\tgene_group',
            'HGNC:3430\tERBB2\terb-b2 receptor tyrosine kinase 2\tgene with protein product\tENSG00000141736\t"NEU|HER-2|CD340"\tNGL\tErb-b2 receptor tyrosine kinases',
            'HGNC:12345\tTESTG\t\t\t\t\t\t',
        ].join('\n');

        it('should map rows to records', () => {
            const [erbb2, bare] = parseHgncTsv(TSV);

            expect(erbb2).toEqual({
                id: 'HGNC:3430',
                label: 'ERBB2',
                aliases: ['NEU', 'HER-2', 'CD340', 'NGL', 'erb-b2 receptor tyrosine kinase 2'],
                attributes: {
                    ensembl_gene_id: 'ENSG00000141736',
                    locus_type: 'gene with protein product',
                    gene_group: 'Erb-b2 receptor tyrosine kinases',
                    name: 'erb-b2 receptor tyrosine kinase 2',
                },
            });
            expect(bare).toEqual({ id: 'HGNC:12345', label: 'TESTG', aliases: [], attributes: {} });
        });

        it('should reject a table without the symbol column', () => {
            expect(() => parseHgncTsv('hgnc_id\tname\nHGNC:1\tx')).toThrow('HGNC table is missing the "symbol" column');
        });

        it('should read a TSV file', async () => {
            const records = await new HgncTsvSource(writeFile('hgnc.tsv', TSV)).fetchAll();
            expect(records).toHaveLength(2);
        });

        it('should report a missing file as unavailable', async () => {
            await expect(new HgncTsvSource(path.join(tmpDir, 'missing.tsv')).fetchAll()).rejects.toBeInstanceOf(
                SourceUnavailableError
            );
        });
    });

    describe('TACA', () => {
        it('should derive ids and keep subtype and family', async () => {
            const file = writeFile(
                'taca.json',
                JSON.stringify([
                    { name: 'Sialyl-Tn', synonyms: ['STn'], subtype: 'O-glycan', family: 'mucin-type' },
                    { id: 'TACA:GD2', name: 'GD2' },
                ])
            );

            expect(await new TacaSource(file).fetchAll()).toEqual([
                {
                    id: 'TACA:SIALYL-TN',
                    label: 'Sialyl-Tn',
                    aliases: ['STn'],
                    attributes: { subtype: 'O-glycan', family: 'mucin-type' },
                },
                { id: 'TACA:GD2', label: 'GD2', aliases: [], attributes: {} },
            ]);
        });

        it('should reject entries without a name', async () => {
            const file = writeFile('taca.json', JSON.stringify([{ synonyms: ['x'] }]));
            await expect(new TacaSource(file).fetchAll()).rejects.toBeInstanceOf(SourceFormatError);
        });
    });

    describe('DOID', () => {
        it('should generate literature synonyms', () => {
            expect(generateDiseaseSynonyms('breast cancer')).toEqual(['breast carcinoma']);
            expect(generateDiseaseSynonyms('malignant glioma')).toEqual(['glioma']);
            expect(generateDiseaseSynonyms('Wilms tumor')).toEqual(['Wilms cancer']);
        });

        it('should read records and the hierarchy', async () => {
            const source = new DoidLeafPathsSource(
                writeFile(
                    'doid.json',
                    JSON.stringify({
                        'DOID:1612': {
                            label: 'breast cancer',
                            paths_to_root: [['DOID:4', 'DOID:162']],
                            label_paths_to_root: [['disease', 'cancer']],
                        },
                    })
                )
            );

            expect(await source.fetchAll()).toEqual([
                {
                    id: 'DOID:1612',
                    label: 'breast cancer',
                    aliases: ['breast carcinoma'],
                    attributes: { paths_to_root: [['DOID:4', 'DOID:162']] },
                },
            ]);
            expect(source.hierarchy().get('DOID:1612')).toEqual(['disease', 'cancer', 'breast cancer']);
        });

        it('should reject invalid JSON', async () => {
            const source = new DoidLeafPathsSource(writeFile('doid.json', '{'));
            await expect(source.fetchAll()).rejects.toBeInstanceOf(SourceFormatError);
        });
    });

    describe('JSON extract', () => {
        it('should read arrays of records', async () => {
            const file = writeFile('drugs.json', JSON.stringify([{ id: 'D:1', label: 'alpha' }, 3, { id: 'D:2' }]));
            const source = new JsonExtractSource(file);

            expect(source.name).toBe(`json:${file}`);
            expect(await source.fetchAll()).toEqual([{ id: 'D:1', label: 'alpha' }, { id: 'D:2' }]);
        });

        it('should read objects keyed by id', async () => {
            const file = writeFile('drugs.json', JSON.stringify({ 'D:1': { label: 'alpha' }, 'D:2': 'skip' }));
            expect(await new JsonExtractSource(file, 'local').fetchAll()).toEqual([{ id: 'D:1', label: 'alpha' }]);
        });

        it('should reject scalar files', async () => {
            const file = writeFile('drugs.json', '42');
            await expect(new JsonExtractSource(file, 'local').fetchAll()).rejects.toThrow(
                'local: expected an array or an object of records'
            );
        });
    });

    describe('ChEMBL', () => {
        const molecule = {
            molecule_chembl_id: 'CHEMBL4297844',
            pref_name: 'TRASTUZUMAB DERUXTECAN',
            molecule_type: 'Antibody drug conjugate',
            max_phase: '4.0',
            first_approval: 2019,
            molecule_synonyms: [
                { molecule_synonym: 'Enhertu', syn_type: 'TRADE_NAME' },
                { molecule_synonym: 'DS-8201a', syn_type: 'RESEARCH_CODE' },
            ],
        };

        it('should map search hits to records', async () => {
            const fetchMock = vi.fn().mockResolvedValue(
                jsonResponse({
                    molecules: [
                        molecule,
                        { molecule_chembl_id: 'CHEMBL1', pref_name: null, max_phase: null },
                    ],
                })
            );
            vi.stubGlobal('fetch', fetchMock);

            const source = new ChemblSource(new HttpClient({ maxRetries: 0 }), { baseUrl: 'https://chembl.test/api' });
            const records = await source.search('T-DXd');

            expect(fetchMock).toHaveBeenCalledTimes(1);
            expect(fetchMock.mock.calls[0]?.[0]).toBe('https://chembl.test/api/molecule/search.json?q=T-DXd&limit=5');
            expect(records).toEqual([
                {
                    id: 'CHEMBL4297844',
                    label: 'TRASTUZUMAB DERUXTECAN',
                    aliases: ['Enhertu', 'DS-8201a'],
                    attributes: { molecule_type: 'Antibody drug conjugate', max_phase: 4, first_approval: 2019 },
                },
            ]);
        });

        it('should add mechanisms and indications to the first hit', async () => {
            const fetchMock = vi
                .fn()
                .mockResolvedValueOnce(jsonResponse({ molecules: [molecule] }))
                .mockResolvedValueOnce(
                    jsonResponse({
                        mechanisms: [
                            {
                                mechanism_of_action: 'Receptor protein-tyrosine kinase erbB-2 inhibitor',
                                action_type: 'INHIBITOR',
                                target_chembl_id: 'CHEMBL1824',
                            },
                        ],
                    })
                )
                .mockResolvedValueOnce(
                    jsonResponse({
                        drug_indications: [
                            { efo_id: 'EFO_0000305', efo_term: 'breast carcinoma', mesh_id: 'D001943', mesh_heading: 'Breast Neoplasms', max_phase_for_ind: '4.0' },
                        ],
                    })
                );
            vi.stubGlobal('fetch', fetchMock);

            const source = new ChemblSource(new HttpClient({ maxRetries: 0 }), {
                withMechanisms: true,
                baseUrl: 'https://chembl.test/api',
            });
            const [record] = await source.search('Enhertu');

            expect(fetchMock.mock.calls[1]?.[0]).toBe('https://chembl.test/api/mechanism.json?molecule_chembl_id=CHEMBL4297844');
            expect(record?.attributes).toEqual({
                molecule_type: 'Antibody drug conjugate',
                max_phase: 4,
                first_approval: 2019,
                mechanism_of_action: ['Receptor protein-tyrosine kinase erbB-2 inhibitor'],
                targets: ['CHEMBL1824'],
                indications: [
                    {
                        efo_id: 'EFO_0000305',
                        efo_term: 'breast carcinoma',
                        mesh_id: 'D001943',
                        mesh_heading: 'Breast Neoplasms',
                        max_phase_for_ind: 4,
                    },
                ],
            });
        });

        it('should reject responses of the wrong shape', async () => {
            vi.stubGlobal('fetch', vi.fn().mockResolvedValue(jsonResponse({ page_meta: {} })));
            const source = new ChemblSource(new HttpClient({ maxRetries: 0 }));
            await expect(source.search('x')).rejects.toBeInstanceOf(SourceFormatError);
        });
    });

    describe('BioPortal', () => {
        it('should extract local ids from IRIs', () => {
            expect(localId('http://purl.obolibrary.org/obo/NCIT_C4872')).toBe('C4872');
            expect(localId('http://purl.obolibrary.org/obo/DOID_1612')).toBe('1612');
            expect(localId('http://example.org/onto#Thing')).toBe('Thing');
        });

        it('should need an API key', async () => {
            vi.stubEnv('BIOPORTAL_API_KEY', '');
            const source = new BioPortalSource(new HttpClient(), 'ncit');
            await expect(source.search('breast cancer')).rejects.toThrow('BIOPORTAL_API_KEY is not set');
        });

        it('should map search results to records', async () => {
            const fetchMock = vi.fn().mockResolvedValue(
                jsonResponse({
                    collection: [
                        {
                            '@id': 'http://purl.obolibrary.org/obo/NCIT_C4872',
                            prefLabel: 'Breast Carcinoma',
                            synonym: ['Breast Cancer', 'Carcinoma of the Breast'],
                            definition: ['A carcinoma that arises from the breast.'],
                        },
                    ],
                })
            );
            vi.stubGlobal('fetch', fetchMock);

            const source = new BioPortalSource(new HttpClient({ maxRetries: 0 }), 'ncit', {
                apiKey: 'test-secret',
                baseUrl: 'https://bioportal.test',
            });
            const records = await source.search('breast cancer');

            expect(source.name).toBe('bioportal:NCIT');
            expect(records).toEqual([
                {
                    id: 'NCIT:C4872',
                    label: 'Breast Carcinoma',
                    aliases: ['Breast Cancer', 'Carcinoma of the Breast'],
                    attributes: {
                        iri: 'http://purl.obolibrary.org/obo/NCIT_C4872',
                        ontology: 'NCIT',
                        definition: 'A carcinoma that arises from the breast.',
                    },
                },
            ]);

            const init: unknown = fetchMock.mock.calls[0]?.[1];
            expect(init).toMatchObject({ headers: { Authorization: 'apikey token=test-secret' } });
            expect(fetchMock.mock.calls[0]?.[0]).toBe(
                'https://bioportal.test/search?q=breast+cancer&ontologies=NCIT&pagesize=5'
            );
        });
    });

    describe('createLookupSource', () => {
        it('should resolve relative paths against the base directory', () => {
            const http = new HttpClient();
            const source = createLookupSource({ kind: 'json', path: 'local.json' }, { http, baseDir: tmpDir });
            expect(source.name).toBe(`json:${path.join(tmpDir, 'local.json')}`);
        });

        it('should build search sources for remote specs', () => {
            const http = new HttpClient();
            expect(createLookupSource({ kind: 'chembl' }, { http }).kind).toBe('search');
            expect(createLookupSource({ kind: 'bioportal', ontology: 'doid' }, { http }).name).toBe('bioportal:DOID');
        });
    });
});

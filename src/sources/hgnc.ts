import type { BulkLookupSource, JsonObject, RawOntologyRecord } from '../types/index.js';
import { SourceFormatError } from './errors.js';
import { cleanString, readSourceFile, splitList } from './utils.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

const REQUIRED_COLUMNS = ['hgnc_id', 'symbol'] as const;

/**
 * HGNC complete-set TSV (one row per approved gene symbol).
 * Symbol is the label; alias and previous symbols plus the gene name
 * become aliases.
 */
export class HgncTsvSource implements BulkLookupSource {
    readonly kind = 'bulk';
    readonly name = 'hgnc';

    constructor(private readonly path: string) {}

    async fetchAll(): Promise<RawOntologyRecord[]> {
        const text = await readSourceFile(this.path, this.name);
        const records = parseHgncTsv(text, this.name);
        logger.debug({ path: this.path, rows: records.length }, 'HGNC table read');
        return records;
    }
}

/**
 * Parse HGNC TSV text into raw records.
 */
export function parseHgncTsv(text: string, source = 'hgnc'): RawOntologyRecord[] {
    const lines = text.split(/\r?\n/).filter((line) => line.trim().length > 0);
    const [headerLine, ...rows] = lines;
    if (headerLine === undefined) return [];

    const header = headerLine.split('\t').map((column) => column.trim());
    const index = new Map(header.map((column, i) => [column, i]));

    for (const column of REQUIRED_COLUMNS) {
        if (!index.has(column)) {
            throw new SourceFormatError(`HGNC table is missing the "${column}" column`, source, 'antigen');
        }
    }

    const cell = (cells: string[], column: string): string | null => {
        const i = index.get(column);
        return i === undefined ? null : cleanString(cells[i]?.replace(/^"|"$/g, ''));
    };

    return rows.map((line) => {
        const cells = line.split('\t');
        const name = cell(cells, 'name');

        const attributes: JsonObject = {};
        for (const column of ['ensembl_gene_id', 'locus_type', 'gene_group'] as const) {
            const value = cell(cells, column);
            if (value) attributes[column] = value;
        }
        if (name) attributes['name'] = name;

        return {
            id: cell(cells, 'hgnc_id'),
            label: cell(cells, 'symbol'),
            aliases: [
                ...splitList(cell(cells, 'alias_symbol')),
                ...splitList(cell(cells, 'prev_symbol')),
                ...(name ? [name] : []),
            ],
            attributes,
        };
    });
}

import { resolve as resolvePath } from 'node:path';
import type { LookupSource, SourceSpec } from '../types/index.js';
import type { HttpClient } from '../utils/http-client.js';
import { BioPortalSource } from './bioportal.js';
import { ChemblSource } from './chembl.js';
import { DoidLeafPathsSource } from './doid.js';
import { HgncTsvSource } from './hgnc.js';
import { JsonExtractSource } from './json-extract.js';
import { TacaSource } from './taca.js';

export interface SourceFactoryOptions {
    http: HttpClient;
    /** Directory relative source paths are resolved against */
    baseDir?: string;
}

/**
 * Instantiate the adapter a source spec names.
 */
export function createLookupSource(spec: SourceSpec, options: SourceFactoryOptions): LookupSource {
    const file = (path: string): string => resolvePath(options.baseDir ?? process.cwd(), path);

    switch (spec.kind) {
        case 'json':
            return new JsonExtractSource(file(spec.path), spec.name);
        case 'hgnc-tsv':
            return new HgncTsvSource(file(spec.path));
        case 'taca':
            return new TacaSource(file(spec.path));
        case 'doid-paths':
            return new DoidLeafPathsSource(file(spec.path));
        case 'chembl':
            return new ChemblSource(options.http, { withMechanisms: spec.withMechanisms });
        case 'bioportal':
            return new BioPortalSource(options.http, spec.ontology);
    }
}

export { BioPortalSource, ChemblSource, DoidLeafPathsSource, HgncTsvSource, JsonExtractSource, TacaSource };
export { SnapshotSource, snapshotSources, saveDictionary } from './snapshot.js';
export { SourceFormatError, SourceUnavailableError, isSourceError } from './errors.js';

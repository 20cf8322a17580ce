#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import { ConfigError, resolveConfig, type ConfigOverrides } from '../utils/config.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { VERSION, type LogLevel, type OntoResolveConfig, type SimilarityAlgorithm } from '../types/index.js';

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];
const SIMILARITY_ALGORITHMS: readonly SimilarityAlgorithm[] = ['levenshtein', 'sequence'];

function parseThreshold(value: string): number {
    const threshold = parseFloat(value);
    if (isNaN(threshold) || threshold < 0 || threshold > 1) {
        throw new InvalidArgumentError('Threshold must be a number between 0 and 1.');
    }
    return threshold;
}

function parseLogLevel(value: string): LogLevel {
    const level = LOG_LEVELS.find((candidate) => candidate === value);
    if (!level) {
        throw new InvalidArgumentError(`Valid levels: ${LOG_LEVELS.join(', ')}`);
    }
    return level;
}

function parseSimilarity(value: string): SimilarityAlgorithm {
    const algorithm = SIMILARITY_ALGORITHMS.find((candidate) => candidate === value);
    if (!algorithm) {
        throw new InvalidArgumentError(`Valid algorithms: ${SIMILARITY_ALGORITHMS.join(', ')}`);
    }
    return algorithm;
}

function fail(message: string, error: unknown): never {
    if (error instanceof ConfigError) {
        console.error(`Configuration error: ${error.message}`);
    } else {
        console.error(`${message}:`, error instanceof Error ? error.message : error);
    }
    process.exit(1);
}

interface CommonOptions {
    config?: string;
    logLevel?: LogLevel;
    jsonLogs?: boolean;
}

/**
 * Resolve config and start the logger. Pipeline modules are imported after
 * this so their loggers pick up the configured level and format.
 */
async function setup(opts: CommonOptions, overrides: ConfigOverrides): Promise<OntoResolveConfig> {
    const config = await resolveConfig(
        { ...overrides, logLevel: opts.logLevel, jsonLogs: opts.jsonLogs },
        { configPath: opts.config }
    );
    initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
    return config;
}

const program = new Command();

program
    .name('ontoresolve')
    .description('Resolve biomedical terms (drugs, antigens, diseases, payloads, linkers) to ontology identifiers.')
    .version(VERSION);

// ─── ENRICH command ───────────────────────────────────────

program
    .command('enrich')
    .description('Enrich extracted drug entries with ontology matches')
    .requiredOption('-i, --input <path>', 'Input JSON (array of documents with extractedDrugs)')
    .option('-o, --out <path>', 'Output JSON path')
    .option('--unknowns-out <path>', 'Unknown-terms side file (default: <out>_unknowns.json)')
    .option('--snapshot <dbPath>', 'Load dictionaries from a snapshot database instead of the sources')
    .option('--threshold <n>', 'Fuzzy match threshold (0-1)', parseThreshold)
    .option('--similarity <algorithm>', 'Fuzzy scorer: levenshtein | sequence', parseSimilarity)
    .option('-c, --config <path>', 'Config file (default: ontoresolve.config.json)')
    .option('--log-level <level>', 'Log level: debug | info | warn | error', parseLogLevel)
    .option('--json-logs', 'Output JSON logs')
    .action(async (opts) => {
        try {
            const config = await setup(opts, {
                input: opts.input,
                out: opts.out,
                unknownsOut: opts.unknownsOut,
                snapshot: opts.snapshot,
                matching: { fuzzyThreshold: opts.threshold, similarity: opts.similarity },
            });

            const { runEnrich } = await import('../pipeline/enrichment-pipeline.js');
            const { formatMatchStats } = await import('../exporters/export.js');

            const result = await runEnrich(config);
            console.log(`\nEnriched: ${result.out}\nUnknowns: ${result.unknownsOut}\n`);
            console.log(formatMatchStats(result.stats));
            console.log('');
        } catch (error) {
            getLogger().error({ err: error }, 'Enrichment failed');
            fail('Enrichment failed', error);
        }
    });

// ─── SNAPSHOT command ─────────────────────────────────────

program
    .command('snapshot')
    .description('Load every configured source and store the dictionaries in SQLite')
    .requiredOption('-o, --out <dbPath>', 'Output database path')
    .option('-i, --input <path>', 'Input JSON whose terms seed search sources (ChEMBL, BioPortal)')
    .option('-c, --config <path>', 'Config file (default: ontoresolve.config.json)')
    .option('--log-level <level>', 'Log level: debug | info | warn | error', parseLogLevel)
    .option('--json-logs', 'Output JSON logs')
    .action(async (opts) => {
        try {
            const config = await setup(opts, { input: opts.input });
            const { runSnapshot } = await import('../pipeline/enrichment-pipeline.js');

            const result = await runSnapshot(config, opts.out);
            console.log(`\nSnapshot written: ${result.path} (run ${result.runId})`);
            for (const [field, count] of Object.entries(result.stats.entitiesByField)) {
                console.log(`  ${field.padEnd(9)} ${count}`);
            }
            console.log('');
        } catch (error) {
            getLogger().error({ err: error }, 'Snapshot failed');
            fail('Snapshot failed', error);
        }
    });

// ─── INSPECT command ──────────────────────────────────────

program
    .command('inspect')
    .description('Show match statistics of an enriched file, or the contents of a snapshot database')
    .requiredOption('-i, --input <path>', 'Enriched JSON or snapshot database')
    .action(async (opts) => {
        try {
            if (opts.input.endsWith('.db')) {
                const { OntologyDatabase } = await import('../storage/database.js');
                const db = new OntologyDatabase(opts.input);
                const stats = db.getStats();
                db.close();

                console.log('\nSnapshot Statistics\n');
                console.log(`  Entities:        ${stats.entities}`);
                for (const [field, count] of Object.entries(stats.entitiesByField)) {
                    console.log(`    ${field}: ${count}`);
                }
                console.log(`  Hierarchy paths: ${stats.hierarchyPaths}`);
                console.log(`  Runs:            ${stats.runs}`);
                console.log('');
                return;
            }

            const { readDocuments } = await import('../pipeline/enrichment-pipeline.js');
            const { computeMatchStats, formatMatchStats } = await import('../exporters/export.js');

            const stats = computeMatchStats(await readDocuments(opts.input));
            console.log('\nMatch Statistics\n');
            console.log(formatMatchStats(stats));
            console.log('');
        } catch (error) {
            fail('Inspect failed', error);
        }
    });

program.parseAsync().catch((error: unknown) => fail('Command failed', error));

import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import {
    DEFAULT_CONFIG,
    FIELD_TYPES,
    type FieldBinding,
    type FieldSources,
    type FieldType,
    type HttpConfig,
    type MatchingConfig,
    type OntoResolveConfig,
} from '../types/index.js';
import { getLogger } from './logger.js';

/**
 * Invalid configuration file or flag values. Fatal for the CLI command.
 */
export class ConfigError extends Error {
    constructor(
        message: string,
        public readonly path?: string
    ) {
        super(message);
        this.name = 'ConfigError';
    }
}

// ─── Schema ───────────────────────────────────────────────

const sourceSpecSchema = z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('json'), path: z.string().min(1), name: z.string().min(1).optional() }),
    z.object({ kind: z.literal('hgnc-tsv'), path: z.string().min(1) }),
    z.object({ kind: z.literal('taca'), path: z.string().min(1) }),
    z.object({ kind: z.literal('doid-paths'), path: z.string().min(1) }),
    z.object({ kind: z.literal('chembl'), withMechanisms: z.boolean().optional() }),
    z.object({ kind: z.literal('bioportal'), ontology: z.string().min(1) }),
]);

const fieldSourcesSchema = z.object({
    primary: z.array(sourceSpecSchema),
    fallback: z.array(sourceSpecSchema).optional(),
});

const fieldBindingSchema = z.object({
    keys: z.array(z.string().min(1)).min(1),
    alternateKeys: z.array(z.string().min(1)).optional(),
});

const matchingSchema = z
    .object({
        fuzzyThreshold: z.number().min(0).max(1),
        similarity: z.enum(['levenshtein', 'sequence']),
        minSearchLength: z.number().int().min(0),
    })
    .partial();

const httpSchema = z
    .object({
        timeout: z.number().int().positive(),
        maxRetries: z.number().int().min(0),
        initialBackoffMs: z.number().int().min(0),
        maxBackoffMs: z.number().int().min(0),
        email: z.string().email(),
    })
    .partial();

function perField<T extends z.ZodTypeAny>(schema: T) {
    return z
        .object({
            drug: schema,
            antigen: schema,
            disease: schema,
            payload: schema,
            linker: schema,
        })
        .partial();
}

export const fileConfigSchema = z
    .object({
        input: z.string().min(1),
        out: z.string().min(1),
        unknownsOut: z.string().min(1),
        snapshot: z.string().min(1),
        logLevel: z.enum(['error', 'warn', 'info', 'debug']),
        jsonLogs: z.boolean(),
        matching: matchingSchema,
        sources: perField(fieldSourcesSchema),
        bindings: perField(fieldBindingSchema),
        http: httpSchema,
    })
    .partial()
    .strict();

export type FileConfig = z.infer<typeof fileConfigSchema>;

/**
 * Overrides coming from CLI flags. Nested groups may be partial.
 */
export type ConfigOverrides = Partial<Omit<OntoResolveConfig, 'matching' | 'http' | 'sources' | 'bindings'>> & {
    matching?: Partial<MatchingConfig>;
    http?: Partial<HttpConfig>;
};

function describeIssues(error: z.ZodError): string {
    return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

// ─── Loading ──────────────────────────────────────────────

/**
 * Load ontoresolve.config.json using cosmiconfig, or the file at
 * `configPath` when given. Returns null if no config file is found.
 *
 * @throws ConfigError when the file cannot be parsed or fails validation
 */
export async function loadConfigFile(options: { configPath?: string; searchFrom?: string } = {}): Promise<FileConfig | null> {
    const explorer = cosmiconfig('ontoresolve', {
        searchPlaces: ['ontoresolve.config.json'],
    });

    const result = await (options.configPath ? explorer.load(options.configPath) : explorer.search(options.searchFrom))
        .catch((error: unknown) => {
            throw new ConfigError(
                `Failed to read config file: ${error instanceof Error ? error.message : String(error)}`,
                options.configPath
            );
        });

    if (!result || result.isEmpty) return null;

    const parsed = fileConfigSchema.safeParse(result.config);
    if (!parsed.success) {
        throw new ConfigError(`Invalid config file ${result.filepath}: ${describeIssues(parsed.error)}`, result.filepath);
    }

    getLogger().debug({ path: result.filepath }, 'Loaded config file');
    return parsed.data;
}

function mergePerField<T>(defaults: Readonly<Record<FieldType, T>>, override: Partial<Record<FieldType, T>> | undefined): Record<FieldType, T> {
    const merged = { ...defaults };
    for (const fieldType of FIELD_TYPES) {
        const value = override?.[fieldType];
        if (value !== undefined) merged[fieldType] = value;
    }
    return merged;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > config file > defaults
 */
export function mergeConfig(fileConfig: FileConfig | null, cliFlags: ConfigOverrides = {}): OntoResolveConfig {
    const merged: OntoResolveConfig = {
        ...DEFAULT_CONFIG,
        ...fileConfig,
        ...defined(cliFlags),
        matching: {
            ...DEFAULT_CONFIG.matching,
            ...fileConfig?.matching,
            ...defined(cliFlags.matching),
        },
        sources: mergePerField<FieldSources>(DEFAULT_CONFIG.sources, fileConfig?.sources),
        bindings: mergePerField<FieldBinding>(DEFAULT_CONFIG.bindings, fileConfig?.bindings),
        http: {
            ...DEFAULT_CONFIG.http,
            ...fileConfig?.http,
            ...defined(cliFlags.http),
        },
    };

    const matching = matchingSchema.required().safeParse(merged.matching);
    if (!matching.success) {
        throw new ConfigError(`Invalid matching options: ${describeIssues(matching.error)}`);
    }

    return merged;
}

/**
 * Drop keys whose value is undefined, so unset flags do not mask the file.
 */
function defined<T extends object>(value: T | undefined): Partial<T> {
    const out: Partial<T> = {};
    if (!value) return out;
    for (const key in value) {
        if (value[key] !== undefined) out[key] = value[key];
    }
    return out;
}

/**
 * Load the config file and merge it with CLI flags and defaults.
 */
export async function resolveConfig(
    cliFlags: ConfigOverrides,
    options: { configPath?: string; searchFrom?: string } = {}
): Promise<OntoResolveConfig> {
    const fileConfig = await loadConfigFile(options);
    return mergeConfig(fileConfig, cliFlags);
}

/**
 * Get API key from environment variable.
 * @param name - Environment variable name
 * @returns The API key or undefined
 */
export function getApiKey(name: string): string | undefined {
    return process.env[name] || undefined;
}

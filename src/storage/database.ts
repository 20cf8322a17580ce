import Database from 'better-sqlite3';
import { z } from 'zod';
import type { CanonicalEntity, DiseaseHierarchy, FieldType, RunRecord } from '../types/index.js';
import { FIELD_TYPES } from '../types/index.js';
import { jsonObjectSchema } from '../utils/json-schema.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

/**
 * SQLite schema migration v1.
 * Runs, canonical entities per field type, and precomputed disease paths.
 */
const MIGRATION_V1 = `
-- Runs: snapshot / enrich session metadata
CREATE TABLE IF NOT EXISTS runs (
  run_id INTEGER PRIMARY KEY,
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  ontoresolve_version TEXT NOT NULL,
  command TEXT NOT NULL,
  config_json TEXT NOT NULL,
  stats_json TEXT NOT NULL DEFAULT '{}'
);

-- Canonical entities, one row per (field_type, dictionary, primary_id)
CREATE TABLE IF NOT EXISTS canonical_entities (
  field_type TEXT NOT NULL,
  dictionary TEXT NOT NULL DEFAULT 'primary',
  primary_id TEXT NOT NULL,
  preferred_label TEXT NOT NULL,
  aliases_json TEXT NOT NULL DEFAULT '[]',
  attributes_json TEXT NOT NULL DEFAULT '{}',
  source_name TEXT NOT NULL,
  source_rank INTEGER NOT NULL DEFAULT 0,
  position INTEGER NOT NULL DEFAULT 0,
  PRIMARY KEY (field_type, dictionary, primary_id)
);

-- Disease hierarchy: labels from the root down to the entity
CREATE TABLE IF NOT EXISTS hierarchy_paths (
  primary_id TEXT PRIMARY KEY,
  path_json TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_entities_field ON canonical_entities(field_type, dictionary, source_rank, position);
`;

const entityRowSchema = z.object({
    field_type: z.enum(FIELD_TYPES),
    primary_id: z.string(),
    preferred_label: z.string(),
    aliases_json: z.string(),
    attributes_json: z.string(),
    source_name: z.string(),
    source_rank: z.number(),
});

const countRowSchema = z.object({ count: z.number() });

const fieldCountRowSchema = z.object({ field_type: z.string(), count: z.number() });

const hierarchyRowSchema = z.object({ primary_id: z.string(), path_json: z.string() });

const runRowSchema = z.object({
    run_id: z.number(),
    created_at: z.string(),
    ontoresolve_version: z.string(),
    command: z.string(),
    config_json: z.string(),
    stats_json: z.string(),
});

const stringListSchema = z.array(z.string());

export type DictionaryRole = 'primary' | 'fallback';

/**
 * Entity as stored: the entity plus the priority of the source it came from.
 */
export interface StoredEntity {
    entity: CanonicalEntity;
    sourceRank: number;
}

export interface DatabaseStats {
    entities: number;
    entitiesByField: Record<string, number>;
    hierarchyPaths: number;
    runs: number;
}

/**
 * Dictionary snapshot store around better-sqlite3.
 * Handles schema migration, WAL mode and the snapshot tables.
 */
export class OntologyDatabase {
    private db: Database.Database;

    constructor(dbPath: string) {
        this.db = new Database(dbPath);

        this.db.pragma('journal_mode = WAL');
        this.db.pragma('foreign_keys = ON');

        this.migrate();

        logger.debug({ dbPath }, 'Database initialized');
    }

    /**
     * Run schema migrations.
     */
    private migrate(): void {
        const currentVersion = z.number().parse(this.db.pragma('user_version', { simple: true }));

        if (currentVersion < 1) {
            this.db.exec(MIGRATION_V1);
            this.db.pragma('user_version = 1');
            logger.info('Database migrated to v1');
        }
    }

    // ─── Entities ─────────────────────────────────────────────

    /**
     * Replace the stored entities of one dictionary, in build order.
     */
    replaceEntities(fieldType: FieldType, role: DictionaryRole, entities: readonly StoredEntity[]): void {
        const deleteStmt = this.db.prepare('DELETE FROM canonical_entities WHERE field_type = ? AND dictionary = ?');
        const insertStmt = this.db.prepare(`
      INSERT INTO canonical_entities (field_type, dictionary, primary_id, preferred_label, aliases_json, attributes_json, source_name, source_rank, position)
      VALUES (@field_type, @dictionary, @primary_id, @preferred_label, @aliases_json, @attributes_json, @source_name, @source_rank, @position)
    `);

        const replaceAll = this.db.transaction((rows: readonly StoredEntity[]) => {
            deleteStmt.run(fieldType, role);
            rows.forEach(({ entity, sourceRank }, position) => {
                insertStmt.run({
                    field_type: fieldType,
                    dictionary: role,
                    primary_id: entity.primary_id,
                    preferred_label: entity.preferred_label,
                    aliases_json: JSON.stringify(entity.aliases),
                    attributes_json: JSON.stringify(entity.attributes),
                    source_name: entity.source,
                    source_rank: sourceRank,
                    position,
                });
            });
        });

        replaceAll(entities);
        logger.debug({ fieldType, role, entities: entities.length }, 'Entities stored');
    }

    /**
     * Stored entities of one dictionary, ordered by source priority then
     * insertion order.
     */
    getEntities(fieldType: FieldType, role: DictionaryRole = 'primary'): StoredEntity[] {
        const rows = this.db
            .prepare('SELECT * FROM canonical_entities WHERE field_type = ? AND dictionary = ? ORDER BY source_rank, position')
            .all(fieldType, role);

        return rows.map((raw) => {
            const row = entityRowSchema.parse(raw);
            return {
                entity: {
                    field_type: row.field_type,
                    primary_id: row.primary_id,
                    preferred_label: row.preferred_label,
                    aliases: stringListSchema.parse(JSON.parse(row.aliases_json)),
                    attributes: jsonObjectSchema.parse(JSON.parse(row.attributes_json)),
                    source: row.source_name,
                },
                sourceRank: row.source_rank,
            };
        });
    }

    getEntityCount(fieldType?: FieldType): number {
        const row = fieldType
            ? this.db.prepare('SELECT COUNT(*) as count FROM canonical_entities WHERE field_type = ?').get(fieldType)
            : this.db.prepare('SELECT COUNT(*) as count FROM canonical_entities').get();
        return countRowSchema.parse(row).count;
    }

    // ─── Hierarchy ────────────────────────────────────────────

    replaceHierarchy(hierarchy: DiseaseHierarchy): void {
        const insertStmt = this.db.prepare('INSERT INTO hierarchy_paths (primary_id, path_json) VALUES (?, ?)');

        this.transaction(() => {
            this.db.prepare('DELETE FROM hierarchy_paths').run();
            for (const [id, path] of hierarchy) {
                insertStmt.run(id, JSON.stringify(path));
            }
        });
    }

    getHierarchy(): DiseaseHierarchy {
        const rows = this.db.prepare('SELECT primary_id, path_json FROM hierarchy_paths').all();
        const hierarchy = new Map<string, readonly string[]>();

        for (const raw of rows) {
            const row = hierarchyRowSchema.parse(raw);
            hierarchy.set(row.primary_id, stringListSchema.parse(JSON.parse(row.path_json)));
        }

        return hierarchy;
    }

    // ─── Runs ─────────────────────────────────────────────────

    insertRun(run: Omit<RunRecord, 'run_id'>): number {
        const stmt = this.db.prepare(`
      INSERT INTO runs (created_at, ontoresolve_version, command, config_json, stats_json)
      VALUES (@created_at, @ontoresolve_version, @command, @config_json, @stats_json)
    `);
        const result = stmt.run(run);
        return Number(result.lastInsertRowid);
    }

    getRuns(): RunRecord[] {
        return this.db
            .prepare('SELECT * FROM runs ORDER BY run_id')
            .all()
            .map((raw) => runRowSchema.parse(raw));
    }

    // ─── Stats ────────────────────────────────────────────────

    getStats(): DatabaseStats {
        const entities = this.getEntityCount();
        const hierarchyPaths = countRowSchema.parse(this.db.prepare('SELECT COUNT(*) as count FROM hierarchy_paths').get()).count;
        const runs = countRowSchema.parse(this.db.prepare('SELECT COUNT(*) as count FROM runs').get()).count;

        const entitiesByField: Record<string, number> = {};
        const fieldRows = this.db
            .prepare('SELECT field_type, COUNT(*) as count FROM canonical_entities GROUP BY field_type')
            .all();
        for (const raw of fieldRows) {
            const row = fieldCountRowSchema.parse(raw);
            entitiesByField[row.field_type] = row.count;
        }

        return { entities, entitiesByField, hierarchyPaths, runs };
    }

    // ─── Utility ──────────────────────────────────────────────

    /**
     * Execute a function within a transaction.
     */
    transaction<T>(fn: () => T): T {
        return this.db.transaction(fn)();
    }

    /**
     * Close the database connection.
     */
    close(): void {
        this.db.close();
        logger.debug('Database closed');
    }
}

import type { JsonObject, JsonValue } from './ontology.js';
import type { MatchStatus } from './resolution.js';

/**
 * One extracted drug mention, as it arrives from the extraction step.
 * Arbitrary keys; the field bindings say which ones carry terms.
 */
export type SourceEntity = JsonObject;

/**
 * One article (`{ id, title, …, extractedDrugs: SourceEntity[] }`).
 */
export type SourceDocument = JsonObject;

/**
 * The sub-record written under `ontology.<field>`. Field details
 * (hierarchy_path, mechanism_of_action, matches, …) sit beside the
 * fixed keys.
 */
export interface OntologyFieldRecord {
    input_term: string;
    primary_id: string | null;
    preferred_label: string | null;
    match_status: MatchStatus;
    confidence: number;
    source: string | null;
    [detail: string]: JsonValue;
}

/**
 * A source entity plus its `ontology` block. Every original key is kept.
 */
export type EnrichedEntity = JsonObject;

import type { CanonicalEntity, JsonObject } from './ontology.js';

/**
 * How a resolution was obtained.
 */
export type MatchStatus = 'exact_match' | 'alias_match' | 'fuzzy_match' | 'fallback_match' | 'unknown';

/**
 * Cascade stage that produced a match. For a fallback match this is the
 * stage reached inside the fallback dictionary.
 */
export type MatchStage = 'exact' | 'alias' | 'fuzzy';

/**
 * Rank used when several results compete for one field (lower is better).
 */
export const MATCH_STATUS_RANK: Readonly<Record<MatchStatus, number>> = {
    exact_match: 0,
    alias_match: 1,
    fuzzy_match: 2,
    fallback_match: 3,
    unknown: 4,
};

/**
 * Outcome of resolving one raw term against one field type.
 */
export interface ResolutionResult {
    input_term: string;
    normalized_term: string;
    matched_entity: CanonicalEntity | null;
    match_status: MatchStatus;

    /** 1.0 for exact/alias, the similarity score for fuzzy, 0 for unknown */
    confidence: number;

    /** Dictionary key the term matched on */
    matched_key: string | null;

    stage: MatchStage | null;

    /** Field-specific output added by a field resolver */
    details: JsonObject;
}

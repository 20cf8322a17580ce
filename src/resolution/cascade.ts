import type {
    CanonicalEntity,
    Dictionary,
    MatchStage,
    MatchStatus,
    ResolutionResult,
} from '../types/index.js';
import { candidateTerms } from '../nlp/normalizer.js';
import { levenshteinSimilarity, type SimilarityFn } from '../nlp/similarity.js';

export const DEFAULT_FUZZY_THRESHOLD = 0.85;

export interface CascadeOptions {
    fallback?: Dictionary;
    threshold?: number;
    similarity?: SimilarityFn;
}

interface StageMatch {
    entity: CanonicalEntity;
    key: string;
    stage: MatchStage;
    confidence: number;
}

function exactStage(candidates: readonly string[], dictionary: Dictionary): StageMatch | null {
    for (const key of candidates) {
        const entity = dictionary.exact_index.get(key);
        if (entity) return { entity, key, stage: 'exact', confidence: 1.0 };
    }
    return null;
}

function aliasStage(candidates: readonly string[], dictionary: Dictionary): StageMatch | null {
    for (const key of candidates) {
        const entity = dictionary.alias_index.get(key)?.[0];
        if (entity) return { entity, key, stage: 'alias', confidence: 1.0 };
    }
    return null;
}

/**
 * Best-scoring fuzzy key over all candidates. Equal scores go to the
 * smaller primary_id.
 */
function fuzzyStage(
    candidates: readonly string[],
    dictionary: Dictionary,
    threshold: number,
    similarity: SimilarityFn
): StageMatch | null {
    let best: StageMatch | null = null;

    for (const candidate of candidates) {
        for (const { key, entity } of dictionary.fuzzy_keys) {
            const score = similarity(candidate, key);
            if (score < threshold) continue;

            if (
                !best ||
                score > best.confidence ||
                (score === best.confidence && entity.primary_id < best.entity.primary_id)
            ) {
                best = { entity, key, stage: 'fuzzy', confidence: score };
            }
        }
    }

    return best;
}

function runStages(
    candidates: readonly string[],
    dictionary: Dictionary,
    threshold: number,
    similarity: SimilarityFn
): StageMatch | null {
    return (
        exactStage(candidates, dictionary) ??
        aliasStage(candidates, dictionary) ??
        fuzzyStage(candidates, dictionary, threshold, similarity)
    );
}

const STAGE_STATUS: Record<MatchStage, MatchStatus> = {
    exact: 'exact_match',
    alias: 'alias_match',
    fuzzy: 'fuzzy_match',
};

/**
 * Resolve one raw term: exact, then alias, then fuzzy against the primary
 * dictionary, then the same three stages against the fallback.
 * Pure and deterministic for fixed dictionaries and options.
 */
export function resolve(term: string, dictionary: Dictionary, options: CascadeOptions = {}): ResolutionResult {
    const threshold = options.threshold ?? DEFAULT_FUZZY_THRESHOLD;
    const similarity = options.similarity ?? levenshteinSimilarity;
    const candidates = candidateTerms(term, dictionary.field_type);
    const normalized = candidates[0] ?? '';

    const base = {
        input_term: term,
        normalized_term: normalized,
        details: {},
    };

    if (!normalized) {
        return { ...base, matched_entity: null, match_status: 'unknown', confidence: 0, matched_key: null, stage: null };
    }

    const primary = runStages(candidates, dictionary, threshold, similarity);
    if (primary) {
        return {
            ...base,
            matched_entity: primary.entity,
            match_status: STAGE_STATUS[primary.stage],
            confidence: primary.confidence,
            matched_key: primary.key,
            stage: primary.stage,
        };
    }

    if (options.fallback) {
        const fallbackCandidates = candidateTerms(term, options.fallback.field_type);
        const secondary = runStages(fallbackCandidates, options.fallback, threshold, similarity);
        if (secondary) {
            return {
                ...base,
                matched_entity: secondary.entity,
                match_status: 'fallback_match',
                confidence: secondary.confidence,
                matched_key: secondary.key,
                stage: secondary.stage,
            };
        }
    }

    return { ...base, matched_entity: null, match_status: 'unknown', confidence: 0, matched_key: null, stage: null };
}

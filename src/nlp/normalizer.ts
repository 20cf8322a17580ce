import type { FieldType } from '../types/index.js';
import { CANCER_ACRONYMS } from './acronyms.js';

const PARENTHETICAL = /\([^()]*\)|\[[^[\]]*\]/g;
const TRAILING_PARENTHETICAL = /\(([^()]*)\)\s*$/;

/**
 * Normalise a raw term for dictionary lookup.
 * - NFKC, lowercase
 * - Strip parenthetical qualifiers
 * - Drop punctuation except `-` and `+` (disease terms lose hyphens too)
 * - Collapse whitespace
 *
 * Idempotent: normalize(normalize(x, f), f) === normalize(x, f).
 */
export function normalize(raw: string, fieldType: FieldType): string {
    let text = raw.normalize('NFKC').toLowerCase();

    let previous: string;
    do {
        previous = text;
        text = text.replace(PARENTHETICAL, ' ');
    } while (text !== previous);

    text = text.replace(/[^\p{L}\p{N}\s+-]/gu, ' ');

    // "triple-negative" and "triple negative" are the same disease
    if (fieldType === 'disease') {
        text = text.replace(/-/g, ' ');
    }

    return text
        .split(/\s+/)
        .map((token) => token.replace(/^-+|-+$/g, ''))
        .filter((token) => token.length > 0)
        .join(' ');
}

interface AcronymRule {
    tokens: string[];
    expansion: string[];
}

const ACRONYM_RULES: AcronymRule[] = Object.entries(CANCER_ACRONYMS).map(([acronym, expansion]) => ({
    tokens: normalize(acronym, 'disease').split(' '),
    expansion: normalize(expansion, 'disease').split(' '),
}));

/**
 * Replace every whole-token occurrence of `rule.tokens` in `tokens`.
 * Returns null when the acronym does not occur.
 */
function replaceAcronym(tokens: string[], rule: AcronymRule): string[] | null {
    const out: string[] = [];
    let replaced = false;
    let i = 0;

    while (i < tokens.length) {
        const matches = rule.tokens.every((token, offset) => tokens[i + offset] === token);
        if (matches) {
            out.push(...rule.expansion);
            i += rule.tokens.length;
            replaced = true;
        } else {
            out.push(tokens[i] ?? '');
            i += 1;
        }
    }

    return replaced ? out : null;
}

/**
 * Acronym-expanded variants of an already normalised disease term:
 * one per acronym found, then one with every acronym expanded.
 */
export function expandAcronyms(normalized: string): string[] {
    if (!normalized) return [];

    const tokens = normalized.split(' ');
    const variants: string[] = [];
    let combined = tokens;
    let hits = 0;

    for (const rule of ACRONYM_RULES) {
        const single = replaceAcronym(tokens, rule);
        if (!single) continue;

        variants.push(single.join(' '));
        hits++;
        combined = replaceAcronym(combined, rule) ?? combined;
    }

    if (hits > 1) {
        variants.push(combined.join(' '));
    }

    return variants;
}

/**
 * All lookup candidates for a raw term, the normalised term first.
 * - disease: acronym expansions
 * - drug / payload / linker: the content of a trailing parenthetical
 *   ("Deruxtecan (DXd)" also tries "dxd")
 */
export function candidateTerms(raw: string, fieldType: FieldType): string[] {
    const primary = normalize(raw, fieldType);
    const candidates = [primary];

    if (fieldType === 'disease') {
        candidates.push(...expandAcronyms(primary));
    } else if (fieldType !== 'antigen') {
        const inner = TRAILING_PARENTHETICAL.exec(raw.trim())?.[1];
        if (inner) {
            candidates.push(normalize(inner, fieldType));
        }
    }

    return [...new Set(candidates.filter((candidate) => candidate.length > 0))];
}

/**
 * Raw query strings for a search source, in the order to try them:
 * the text before a trailing parenthetical, then its content.
 * "Deruxtecan (DXd)" → ["Deruxtecan", "DXd"]
 */
export function searchVariants(raw: string): string[] {
    const trimmed = raw.trim();
    const match = TRAILING_PARENTHETICAL.exec(trimmed);
    if (!match) return trimmed ? [trimmed] : [];

    const outside = trimmed.slice(0, match.index).trim();
    const inside = (match[1] ?? '').trim();
    return [...new Set([outside, inside].filter((variant) => variant.length > 0))];
}

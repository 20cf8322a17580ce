import type { FieldType, ResolutionResult } from '../types/index.js';
import { candidateTerms } from '../nlp/normalizer.js';

export interface CacheStats {
    hits: number;
    misses: number;
    size: number;
}

/**
 * Run-scoped memo of resolutions keyed by (field type, lookup candidates).
 * The key covers every candidate the cascade tries, so two terms share an
 * entry only when they resolve identically.
 * Resolution is synchronous, so check-and-insert cannot interleave.
 */
export class ResolutionCache {
    private entries = new Map<string, ResolutionResult>();
    private hits = 0;
    private misses = 0;

    private static key(fieldType: FieldType, term: string): string {
        return `${fieldType}\u0000${candidateTerms(term, fieldType).join('\u0001')}`;
    }

    /**
     * Return the stored result for the key, or run `resolver` once and store
     * what it returns. A hit for a differently spelled raw term keeps the
     * caller's spelling in `input_term`.
     */
    getOrResolve(fieldType: FieldType, term: string, resolver: (term: string) => ResolutionResult): ResolutionResult {
        const key = ResolutionCache.key(fieldType, term);
        const cached = this.entries.get(key);

        if (cached) {
            this.hits++;
            return cached.input_term === term ? cached : { ...cached, input_term: term };
        }

        this.misses++;
        const result = resolver(term);
        this.entries.set(key, result);
        return result;
    }

    has(fieldType: FieldType, term: string): boolean {
        return this.entries.has(ResolutionCache.key(fieldType, term));
    }

    clear(): void {
        this.entries.clear();
        this.hits = 0;
        this.misses = 0;
    }

    stats(): CacheStats {
        return { hits: this.hits, misses: this.misses, size: this.entries.size };
    }
}

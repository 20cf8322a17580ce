import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, FIELD_TYPES, MATCH_STATUS_RANK } from '../types/index.js';

describe('Types', () => {
    describe('FIELD_TYPES', () => {
        it('should list the five field types', () => {
            expect(FIELD_TYPES).toEqual(['drug', 'antigen', 'disease', 'payload', 'linker']);
        });
    });

    describe('MATCH_STATUS_RANK', () => {
        it('should rank statuses from exact to unknown', () => {
            const ordered = Object.entries(MATCH_STATUS_RANK)
                .sort(([, a], [, b]) => a - b)
                .map(([status]) => status);
            expect(ordered).toEqual(['exact_match', 'alias_match', 'fuzzy_match', 'fallback_match', 'unknown']);
        });
    });

    describe('DEFAULT_CONFIG', () => {
        it('should use a fuzzy threshold of 0.85', () => {
            expect(DEFAULT_CONFIG.matching.fuzzyThreshold).toBe(0.85);
        });

        it('should use Levenshtein similarity by default', () => {
            expect(DEFAULT_CONFIG.matching.similarity).toBe('levenshtein');
        });

        it('should configure sources and bindings for every field', () => {
            for (const fieldType of FIELD_TYPES) {
                expect(DEFAULT_CONFIG.sources[fieldType].primary.length).toBeGreaterThan(0);
                expect(DEFAULT_CONFIG.bindings[fieldType].keys.length).toBeGreaterThan(0);
            }
        });

        it('should give only antigens a fallback dictionary', () => {
            const withFallback = FIELD_TYPES.filter((fieldType) => DEFAULT_CONFIG.sources[fieldType].fallback);
            expect(withFallback).toEqual(['antigen']);
        });
    });
});

import { describe, it, expect } from 'vitest';
import { calculateSimilarity, levenshteinDistance, normalizeForMatch } from './Levenshtein';

describe('Levenshtein Similarity', () => {
    it('should compute edit distance', () => {
        expect(levenshteinDistance("kitten", "sitting")).toBe(3);
        expect(levenshteinDistance("", "abc")).toBe(3);
        expect(levenshteinDistance("abc", "abc")).toBe(0);
    });

    it('should match exact strings', () => {
        expect(calculateSimilarity("hello", "hello")).toBe(1.0);
    });

    it('should ignore case', () => {
        expect(calculateSimilarity("Hello", "hello")).toBe(1.0);
    });

    it('should ignore accents and punctuation', () => {
        expect(calculateSimilarity("Beyonce", "Beyoncé")).toBe(1.0);
        expect(calculateSimilarity("Mötley Crüe", "Motley Crue")).toBe(1.0);
        expect(calculateSimilarity("Don't Stop", "Don t Stop")).toBe(1.0);
        expect(normalizeForMatch("  AC/DC!  ")).toBe("ac dc");
    });

    it('should handle partial mismatches', () => {
        const sim = calculateSimilarity("test", "tent");
        // dist=1, len=4 -> 0.75
        expect(sim).toBe(0.75);
    });
});

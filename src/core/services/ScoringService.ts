import type { LyricsQuery } from "../interfaces/LyricsProvider";
import { calculateSimilarity } from "../utils/Levenshtein";
import { Logger } from "../utils/Logger";

/**
 * A search hit returned by a remote provider before its lyrics are fetched.
 */
export interface SongCandidate {
    title: string;
    artist: string;
    url: string;
}

/**
 * Ranks provider search hits against the queried artist and title.
 */
export class ScoringService {
    // Weights
    private static WEIGHT_TITLE = 60;
    private static WEIGHT_ARTIST = 40;

    public static ACCEPT_THRESHOLD = 50;

    public calculateScore(target: LyricsQuery, candidate: SongCandidate): number {
        const titleSim = calculateSimilarity(target.title, candidate.title);
        const artistSim = this.calculateArtistSimilarity(target.artist, candidate.artist);
        const score = Math.round(titleSim * ScoringService.WEIGHT_TITLE + artistSim * ScoringService.WEIGHT_ARTIST);

        Logger.debug(`[Scoring] '${candidate.artist} - ${candidate.title}' title ${titleSim.toFixed(2)} artist ${artistSim.toFixed(2)} => ${score}`);
        return score;
    }

    /**
     * Best candidate scoring at or above the acceptance threshold, or null.
     * Ties keep the provider's own order.
     */
    public pickBest<T extends SongCandidate>(target: LyricsQuery, candidates: T[]): { candidate: T; score: number } | null {
        let best: { candidate: T; score: number } | null = null;
        for (const candidate of candidates) {
            const score = this.calculateScore(target, candidate);
            if (score < ScoringService.ACCEPT_THRESHOLD) continue;
            if (!best || score > best.score) best = { candidate, score };
        }
        return best;
    }

    private calculateArtistSimilarity(targetArtist: string, candidateArtist: string): number {
        // Helper to tokenize an artist string
        const tokenize = (str: string) => {
            return str.toLowerCase()
                .replace(/[&/]/g, ',') // Unify separators
                .split(/[, ]+/) // Split by comma or space
                .map(s => s.trim())
                .filter(s => s.length > 0);
        };

        const targetTokens = new Set(tokenize(targetArtist));
        const candidateTokens = new Set(tokenize(candidateArtist));

        let matchCount = 0;
        targetTokens.forEach(t => {
            if (candidateTokens.has(t)) matchCount++;
        });

        const union = new Set([...targetTokens, ...candidateTokens]).size;
        if (union === 0) return 0;

        // All tokens of one side present in the other, e.g. "Kano" vs "Kano & Someone"
        if (matchCount > 0 && (matchCount === targetTokens.size || matchCount === candidateTokens.size)) {
            return 1.0;
        }

        const jaccard = matchCount / union;
        if (jaccard > 0.5) return jaccard;

        // Levenshtein fallback for typos and accents
        return Math.max(jaccard, calculateSimilarity(targetArtist, candidateArtist));
    }
}

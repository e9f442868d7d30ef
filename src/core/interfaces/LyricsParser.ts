/**
 * Lines ready for display, with optional per-line start times in seconds.
 */
export interface ParsedLyrics {
    lines: string[];
    timestamps?: (number | null)[];
}

/**
 * Interface for lyrics parsing strategies.
 * Design Pattern: Strategy Pattern.
 */
export interface LyricsParser {
    /**
     * @returns null when the text is not in this parser's format.
     */
    parse(rawText: string): ParsedLyrics | null;
}

import type { LyricsParser, ParsedLyrics } from "../interfaces/LyricsParser";

/**
 * Splits untimed text into display lines. Accepts any input.
 * Trailing blank lines are dropped so proportional scrolling ends on the last sung line.
 */
export class PlainTextParser implements LyricsParser {
    public parse(rawText: string): ParsedLyrics {
        const lines = rawText.split(/\r?\n/);
        while (lines.length > 0 && lines[lines.length - 1].trim() === '') {
            lines.pop();
        }
        return { lines };
    }
}

import type { LyricsParser, ParsedLyrics } from "../interfaces/LyricsParser";
import { PlainTextParser } from "./PlainTextParser";

/**
 * Parses line-timed LRC text `[mm:ss.xx]Text` while keeping the original line order.
 * Lines without a timestamp stay in place with a null start time,
 * ID tags such as `[ar:Artist]` are dropped.
 */
export class LrcLineParser implements LyricsParser {
    // Leading [m:ss], [mm:ss.xx] or [mm:ss.xxx]; a line may repeat the tag
    private static LEADING_TIMESTAMPS = /^((?:\[\d{1,2}:\d{1,2}(?:\.\d{1,3})?\])+)/;
    private static TIMESTAMP = /\[(\d{1,2}):(\d{1,2}(?:\.\d{1,3})?)\]/;
    private static META_REGEX = /^\[([a-zA-Z]+):([^\]]*)\]\s*$/;

    private plain = new PlainTextParser();

    public parse(rawText: string): ParsedLyrics | null {
        const { lines: rawLines } = this.plain.parse(rawText);
        const lines: string[] = [];
        const timestamps: (number | null)[] = [];
        let timed = false;

        for (const raw of rawLines) {
            const trimmed = raw.trim();
            if (LrcLineParser.META_REGEX.test(trimmed)) continue;

            const leading = trimmed.match(LrcLineParser.LEADING_TIMESTAMPS);
            if (!leading) {
                lines.push(raw);
                timestamps.push(null);
                continue;
            }

            // First tag wins; repeated tags on one line would need the line duplicated
            const first = leading[1].match(LrcLineParser.TIMESTAMP);
            timed = true;
            lines.push(trimmed.slice(leading[1].length).trim());
            timestamps.push(first ? parseInt(first[1], 10) * 60 + parseFloat(first[2]) : null);
        }

        if (!timed) return null;
        return { lines, timestamps };
    }
}

const strategies: LyricsParser[] = [
    new LrcLineParser(), // Try timed first
    new PlainTextParser()
];

/**
 * Parses tag lyrics with the first strategy that accepts the text.
 */
export function parseTagLyrics(rawText: string): ParsedLyrics {
    for (const parser of strategies) {
        const parsed = parser.parse(rawText);
        if (parsed) return parsed;
    }
    return { lines: [] };
}

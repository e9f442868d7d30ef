import type { LyricsProvider, LyricsQuery, ProviderOutcome } from "../interfaces/LyricsProvider";
import { Logger } from "../utils/Logger";
import { htmlToText } from "../utils/html";
import { BROWSER_USER_AGENT, httpGet, trimLeadingNewlines } from "./http";

// The unmarked lyrics div follows this licensing comment on every song page
const LYRICS_BLOCK = /<!-- Usage of azlyrics\.com content[\s\S]*?-->([\s\S]*?)<\/div>/i;

/**
 * Scrapes lyrics from AZLyrics song pages. Needs no credentials.
 */
export class AzLyricsScrapeProvider implements LyricsProvider {
    public name = "AZLyrics";
    public kind = 'scrape' as const;

    constructor(private readonly baseUrl: string) {}

    public buildUrl(query: LyricsQuery): string {
        const base = this.baseUrl.replace(/\/+$/, '');
        return `${base}/lyrics/${urlPart(query.artist)}/${urlPart(query.title)}.html`;
    }

    public async fetch(query: LyricsQuery, signal?: AbortSignal): Promise<ProviderOutcome> {
        const artist = urlPart(query.artist);
        const title = urlPart(query.title);
        if (!artist || !title) {
            Logger.info(`[AZLyrics] Nothing left of "${query.artist} - ${query.title}" after normalizing.`);
            return { status: 'not_found' };
        }

        const url = this.buildUrl(query);
        Logger.info(`[AZLyrics] Fetching: ${url}`);

        const page = await httpGet(this.name, url, r => r.text(), {
            headers: { 'User-Agent': BROWSER_USER_AGENT },
            signal
        });
        if (page.kind === 'error') return { status: 'error', error: page.error };
        if (page.kind === 'missing') return { status: 'not_found' };

        const text = extractAzLyrics(page.body);
        if (text === null) {
            Logger.warn(`[AZLyrics] No lyrics block on ${url}`);
            return { status: 'not_found' };
        }
        return { status: 'found', text };
    }
}

/**
 * Lowercase, ASCII letters and digits only; words run together.
 */
export function urlPart(value: string): string {
    return value.toLowerCase().replace(/[^a-z0-9]/g, '');
}

export function extractAzLyrics(html: string): string | null {
    const match = html.match(LYRICS_BLOCK);
    if (!match) return null;
    const text = trimLeadingNewlines(htmlToText(match[1]));
    return text.trim() ? text : null;
}
